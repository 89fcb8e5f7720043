import { VOLATILITY_PHRASINGS, type VolatilityPhrasing } from "./volatilityPatterns";

export interface VolState {
  volatility: number;
  lastPeriod: number | null;
  announced: boolean;
  updatedAtTick: number | null;
}

export interface ParsedAnnouncement {
  value: number;
  week: number | null;
  phrasing: string;
}

export function parseAnnouncement(
  text: string,
  phrasings: VolatilityPhrasing[] = VOLATILITY_PHRASINGS
): ParsedAnnouncement | null {
  const normalized = text.replace(/\s+/g, " ");
  for (const phrasing of phrasings) {
    const match = normalized.match(phrasing.pattern);
    if (!match) continue;
    const reading = phrasing.pick(match);
    if (reading) return { ...reading, phrasing: phrasing.name };
  }
  return null;
}

/**
 * Holds the realized-volatility estimate fed by news announcements. Only
 * announcements from a newer period than the last applied one take effect,
 * and anything unparseable leaves the estimate as it was.
 */
export class RealizedVolatilityTracker {
  private volatility: number;
  private lastPeriod: number | null = null;
  private announced = false;
  private updatedAtTick: number | null = null;
  private misses = 0;

  constructor(
    initialVolatility: number,
    private phrasings: VolatilityPhrasing[] = VOLATILITY_PHRASINGS
  ) {
    if (!Number.isFinite(initialVolatility) || initialVolatility <= 0) {
      throw new RangeError("initial volatility must be positive");
    }
    this.volatility = initialVolatility;
  }

  /**
   * Applies an announcement. `period` orders announcements (the news id);
   * without it the week number in the text is used. Returns whether the
   * estimate changed.
   */
  update(text: string, period?: number, tick?: number): boolean {
    const parsed = parseAnnouncement(text, this.phrasings);
    if (!parsed) {
      this.misses += 1;
      console.warn("volatility.parse_miss", { period: period ?? null, text: text.slice(0, 160) });
      return false;
    }

    const announcementPeriod = period ?? parsed.week;
    if (
      announcementPeriod !== null &&
      this.lastPeriod !== null &&
      announcementPeriod <= this.lastPeriod
    ) {
      console.info("volatility.stale_announcement", {
        period: announcementPeriod,
        lastPeriod: this.lastPeriod
      });
      return false;
    }

    if (announcementPeriod !== null) this.lastPeriod = announcementPeriod;
    this.announced = true;
    if (tick !== undefined) this.updatedAtTick = tick;
    if (parsed.value === this.volatility) return false;

    console.info("volatility.updated", {
      previous: this.volatility,
      volatility: parsed.value,
      phrasing: parsed.phrasing,
      period: announcementPeriod
    });
    this.volatility = parsed.value;
    return true;
  }

  current(): number {
    return this.volatility;
  }

  hasAnnouncement(): boolean {
    return this.announced;
  }

  parseMisses(): number {
    return this.misses;
  }

  state(): VolState {
    return {
      volatility: this.volatility,
      lastPeriod: this.lastPeriod,
      announced: this.announced,
      updatedAtTick: this.updatedAtTick
    };
  }
}
