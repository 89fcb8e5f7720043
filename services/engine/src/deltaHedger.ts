import Decimal from "decimal.js";
import type {
  Instrument,
  MarketQuote,
  OptionInstrument,
  Order,
  Position,
  RestingOrder,
  TheoreticalValue
} from "./types";

export interface HedgeSettings {
  netDeltaLimit: number;
  hedgeRatio: number;
  marketFeePerShare: number;
}

export type HedgeReason =
  | "within_limit"
  | "rebalance"
  | "unwind_profit"
  | "unwind_residual"
  | "unwind_resting"
  | "hedge_retained";

export interface HedgeDecision {
  order: Order | null;
  optionDelta: Decimal;
  netDelta: Decimal;
  reason: HedgeReason;
  /** Resting order already working the residual; every other resting order is stale. */
  working: RestingOrder | null;
}

/**
 * Keeps portfolio delta inside the limit with the underlying. There is no hedge
 * ledger: the hedge is always derived from the current option exposure, so a
 * hedge whose options are gone shows up as excess underlying and is unwound.
 */
export class DeltaHedger {
  constructor(
    private underlying: Instrument,
    private options: Map<string, OptionInstrument>,
    private settings: HedgeSettings
  ) {}

  optionDelta(
    positions: Map<string, Position>,
    theoreticals: Map<string, TheoreticalValue>
  ): Decimal {
    let total = new Decimal(0);
    for (const [id, instrument] of this.options) {
      const position = positions.get(id);
      if (!position || position.quantity.isZero()) continue;
      const theoretical = theoreticals.get(id);
      if (!theoretical) {
        console.warn("hedge.missing_delta", { instrumentId: id });
        continue;
      }
      total = total.add(theoretical.delta.mul(position.quantity).mul(instrument.multiplier));
    }
    return total;
  }

  netDelta(
    positions: Map<string, Position>,
    theoreticals: Map<string, TheoreticalValue>,
    underlyingPosition: Decimal
  ): Decimal {
    return this.optionDelta(positions, theoreticals).add(underlyingPosition);
  }

  rehedge(
    positions: Map<string, Position>,
    theoreticals: Map<string, TheoreticalValue>,
    underlyingPosition: Decimal,
    underlyingQuote: MarketQuote | null = null,
    resting: RestingOrder[] = []
  ): HedgeDecision {
    const optionDelta = this.optionDelta(positions, theoreticals);
    const netDelta = optionDelta.add(underlyingPosition);
    const limit = new Decimal(this.settings.netDeltaLimit);
    const decision = (order: Order | null, reason: HedgeReason): HedgeDecision => ({
      order,
      optionDelta,
      netDelta,
      reason,
      working: null
    });

    if (netDelta.abs().gt(limit)) {
      const quantity = netDelta.mul(this.settings.hedgeRatio).negated().round();
      if (quantity.isZero()) return decision(null, "within_limit");
      return decision(this.order(quantity), "rebalance");
    }

    if (underlyingPosition.isZero() || optionDelta.abs().gt(limit)) {
      return decision(null, "within_limit");
    }

    // The options alone are inside the limit, so the hedge is no longer needed.
    const quantity = underlyingPosition.negated();
    if (underlyingQuote?.vwap) {
      const fee = new Decimal(this.settings.marketFeePerShare);
      const edge = underlyingPosition.isPositive()
        ? underlyingQuote.mid.minus(underlyingQuote.vwap)
        : underlyingQuote.vwap.minus(underlyingQuote.mid);
      if (edge.gte(fee)) {
        return decision(this.order(quantity), "unwind_profit");
      }
    }

    if (underlyingQuote && !this.hasOptionExposure(positions)) {
      const limitPrice = vwapBiasedPrice(underlyingQuote, quantity);
      const working = resting.find(
        (order) =>
          order.instrumentId === this.underlying.id &&
          order.quantity.eq(quantity) &&
          order.price !== null &&
          order.price.eq(limitPrice)
      );
      if (working) return { ...decision(null, "unwind_resting"), working };
      return decision(this.order(quantity, limitPrice), "unwind_residual");
    }

    return decision(null, "hedge_retained");
  }

  private hasOptionExposure(positions: Map<string, Position>): boolean {
    for (const id of this.options.keys()) {
      const quantity = positions.get(id)?.quantity;
      if (quantity && !quantity.isZero()) return true;
    }
    return false;
  }

  private order(quantity: Decimal, limitPrice?: Decimal): Order {
    if (limitPrice) {
      return { instrumentId: this.underlying.id, quantity, type: "limit", price: limitPrice };
    }
    return { instrumentId: this.underlying.id, quantity, type: "market" };
  }
}

/**
 * Limit price for working a residual hedge out near its VWAP: sells rest at
 * max(bid, vwap), buys at min(ask, vwap).
 */
export function vwapBiasedPrice(quote: MarketQuote, quantity: Decimal): Decimal {
  const anchor = quote.vwap ?? quote.mid;
  if (quantity.isNegative()) {
    return quote.bid ? Decimal.max(quote.bid, anchor) : anchor;
  }
  return quote.ask ? Decimal.min(quote.ask, anchor) : anchor;
}
