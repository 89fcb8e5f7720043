import type { OptionKind, SessionSettings } from "./types";

export interface PricingInput {
  underlyingPrice: number;
  strike: number;
  timeToExpiryYears: number;
  volatility: number;
  riskFreeRate: number;
  kind: OptionKind;
}

export interface PricingResult {
  value: number;
  delta: number;
}

export class PricingError extends Error {
  constructor(
    message: string,
    readonly input: PricingInput
  ) {
    super(message);
    this.name = "PricingError";
  }
}

// Abramowitz & Stegun 7.1.26, |error| < 1.5e-7
const A1 = 0.254829592;
const A2 = -0.284496736;
const A3 = 1.421413741;
const A4 = -1.453152027;
const A5 = 1.061405429;
const P = 0.3275911;

export function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + P * ax);
  const y = 1 - ((((A5 * t + A4) * t + A3) * t + A2) * t + A1) * t * Math.exp(-ax * ax);
  return sign * y;
}

export function normCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

export function intrinsicValue(underlyingPrice: number, strike: number, kind: OptionKind): number {
  return kind === "call"
    ? Math.max(underlyingPrice - strike, 0)
    : Math.max(strike - underlyingPrice, 0);
}

function validate(input: PricingInput): void {
  const { underlyingPrice, strike, timeToExpiryYears, volatility, riskFreeRate } = input;
  const values = [underlyingPrice, strike, timeToExpiryYears, volatility, riskFreeRate];
  if (!values.every(Number.isFinite)) {
    throw new PricingError("non-finite pricing input", input);
  }
  if (underlyingPrice <= 0) throw new PricingError("underlying price must be positive", input);
  if (strike <= 0) throw new PricingError("strike must be positive", input);
  if (volatility <= 0) throw new PricingError("volatility must be positive", input);
  if (timeToExpiryYears < 0) throw new PricingError("time to expiry must not be negative", input);
}

/**
 * Black-Scholes value and delta of a European option. At expiry the value is
 * the intrinsic value and delta is a step (call 1/0, put -1/0).
 */
export function price(input: PricingInput): PricingResult {
  validate(input);
  const {
    underlyingPrice: s,
    strike: k,
    timeToExpiryYears: t,
    volatility: sigma,
    riskFreeRate: r,
    kind
  } = input;

  if (t === 0) {
    const delta = kind === "call" ? (s > k ? 1 : 0) : s < k ? -1 : 0;
    return { value: intrinsicValue(s, k, kind), delta };
  }

  const sqrtT = Math.sqrt(t);
  const d1 = (Math.log(s / k) + (r + 0.5 * sigma * sigma) * t) / (sigma * sqrtT);
  const d2 = d1 - sigma * sqrtT;
  const discount = Math.exp(-r * t);

  if (kind === "call") {
    return {
      value: Math.max(0, s * normCdf(d1) - k * discount * normCdf(d2)),
      delta: normCdf(d1)
    };
  }
  return {
    value: Math.max(0, k * discount * normCdf(-d2) - s * normCdf(-d1)),
    delta: normCdf(d1) - 1
  };
}

export function timeToExpiryYears(tick: number, session: SessionSettings): number {
  return Math.max(0, (session.totalTicks - tick) / session.ticksPerYear);
}
