export interface VolatilityReading {
  /** Annualized, as a decimal (0.2 for 20%). */
  value: number;
  week: number | null;
}

export interface VolatilityPhrasing {
  name: string;
  pattern: RegExp;
  pick: (match: RegExpMatchArray) => VolatilityReading | null;
}

const NUMBER = String.raw`(\d+(?:\.\d+)?)\s*(%)?`;

/**
 * Decimal form of a quoted volatility. A "%" suffix, or a bare figure above 1.5,
 * is read as a percentage.
 */
export function normalizeVolatility(raw: number, percent: boolean): number | null {
  if (!Number.isFinite(raw) || raw <= 0) return null;
  return percent || raw > 1.5 ? raw / 100 : raw;
}

function readNumber(value: string | undefined, percent: string | undefined): number | null {
  if (value === undefined) return null;
  return normalizeVolatility(Number(value), percent === "%");
}

function readWeek(value: string | undefined): number | null {
  if (value === undefined) return null;
  const week = Number(value);
  return Number.isInteger(week) ? week : null;
}

// Checked in order; the first phrasing that matches decides the reading.
export const VOLATILITY_PHRASINGS: VolatilityPhrasing[] = [
  {
    name: "numbered_week",
    pattern: new RegExp(
      String.raw`realized volatility (?:of \w+ )?for week (\d+) (?:will be|is|was) ${NUMBER}`,
      "i"
    ),
    pick: (match) => {
      const value = readNumber(match[2], match[3]);
      return value === null ? null : { value, week: readWeek(match[1]) };
    }
  },
  {
    name: "this_week",
    pattern: new RegExp(
      String.raw`realized volatility (?:of \w+ )?(?:for|in) this week (?:will be|is|was) ${NUMBER}`,
      "i"
    ),
    pick: (match) => {
      const value = readNumber(match[1], match[2]);
      return value === null ? null : { value, week: null };
    }
  },
  {
    name: "annualized",
    pattern: new RegExp(
      String.raw`annualized (?:realized )?volatility (?:of \w+ )?(?:will be|is|was) ${NUMBER}`,
      "i"
    ),
    pick: (match) => {
      const value = readNumber(match[1], match[2]);
      return value === null ? null : { value, week: null };
    }
  },
  {
    name: "range_midpoint",
    pattern: new RegExp(
      String.raw`realized volatility (?:of \w+ )?(?:for week (\d+) |for this week )?will be between ${NUMBER} and ${NUMBER}`,
      "i"
    ),
    pick: (match) => {
      const low = readNumber(match[2], match[3] ?? match[5]);
      const high = readNumber(match[4], match[5]);
      if (low === null || high === null) return null;
      return { value: (low + high) / 2, week: readWeek(match[1]) };
    }
  }
];
