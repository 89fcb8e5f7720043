import Decimal from "decimal.js";

export type SignalDirection = "LONG" | "SHORT" | "NONE";

export interface Signal {
  direction: SignalDirection;
  /** Theoretical value minus market mid. */
  magnitude: Decimal;
}

/**
 * Mispricing of one option. `threshold` is an absolute premium difference, so
 * the same threshold demands a much larger relative edge on a cheap wing than on
 * an at-the-money strike.
 */
export function evaluateSignal(
  theoreticalValue: Decimal.Value,
  marketMid: Decimal.Value,
  threshold: Decimal.Value
): Signal {
  const magnitude = new Decimal(theoreticalValue).minus(marketMid);
  const limit = new Decimal(threshold);
  if (magnitude.gte(limit)) return { direction: "LONG", magnitude };
  if (magnitude.lte(limit.negated())) return { direction: "SHORT", magnitude };
  return { direction: "NONE", magnitude };
}
