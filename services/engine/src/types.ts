import type Decimal from "decimal.js";

export type OptionKind = "call" | "put";
export type InstrumentKind = "underlying" | OptionKind;

export interface Instrument {
  readonly id: string;
  readonly kind: InstrumentKind;
  readonly strike?: number;
  /** Shares of the underlying per unit of quantity. */
  readonly multiplier: number;
}

export interface OptionInstrument extends Instrument {
  readonly kind: OptionKind;
  readonly strike: number;
}

export interface MarketQuote {
  instrumentId: string;
  bid: Decimal | null;
  ask: Decimal | null;
  mid: Decimal;
  last: Decimal;
  vwap: Decimal | null;
  tick: number;
}

export interface Position {
  instrumentId: string;
  /** Positive is long. */
  quantity: Decimal;
  averagePrice: Decimal | null;
}

export interface TheoreticalValue {
  instrumentId: string;
  value: Decimal;
  delta: Decimal;
}

export type OrderType = "market" | "limit";

export interface Order {
  instrumentId: string;
  /** Signed: positive buys, negative sells. */
  quantity: Decimal;
  type: OrderType;
  price?: Decimal;
}

/** An order still working on the exchange. */
export interface RestingOrder {
  orderId: number;
  instrumentId: string;
  /** Signed quantity still open. */
  quantity: Decimal;
  price: Decimal | null;
}

export interface NewsItem {
  id: number;
  tick: number;
  headline: string;
  body: string;
}

export interface MarketSnapshot {
  tick: number;
  status: string;
  timeToExpiryYears: number;
  quotes: Map<string, MarketQuote>;
  positions: Map<string, Position>;
  openOrders: RestingOrder[];
  news: NewsItem[];
}

export interface SessionSettings {
  totalTicks: number;
  ticksPerYear: number;
}

export interface StrategySettings {
  optionsQtyPerTrade: number;
  /** Absolute premium difference (not a percentage) that opens a position. */
  openThreshold: number;
  /** Absolute premium difference under which a held position is closed. */
  closeThreshold: number;
  scaleStep: number;
  profitTargetFraction: number;
  riskFreeRate: number;
  initialVolatility: number;
  requireAnnouncedVolatility: boolean;
  hedgeRatio: number;
  marketFeePerShare: number;
  maxHedgeChildOrders: number;
}

export interface RiskLimits {
  optionsOrderLimit: number;
  sharesOrderLimit: number;
  netDeltaLimit: number;
  maxOptionPosition: number;
  maxUnderlyingPosition: number;
}

export interface InstrumentUniverse {
  underlying: { id: string; multiplier: number };
  options: Array<{ id: string; kind: OptionKind; strike: number; multiplier: number }>;
}

export interface EngineConfig {
  session: SessionSettings;
  instruments: InstrumentUniverse;
  strategy: StrategySettings;
  risk: RiskLimits;
}
