import Decimal from "decimal.js";
import { DeltaHedger, type HedgeDecision } from "./deltaHedger";
import { PositionManager, type PositionDecision, type PositionState } from "./positionManager";
import { PricingError, price } from "./pricing";
import { RiskGovernor, type RiskVerdict } from "./riskGovernor";
import { evaluateSignal, type Signal } from "./signal";
import type {
  EngineConfig,
  Instrument,
  MarketSnapshot,
  OptionInstrument,
  Order,
  Position,
  RestingOrder,
  TheoreticalValue
} from "./types";
import { RealizedVolatilityTracker } from "./volatilityTracker";

export const ACTIVE_STATUS = "ACTIVE";

export type SkipReason = "inactive" | "no_underlying_quote";

export interface TickDecision {
  tick: number;
  active: boolean;
  skipped: SkipReason | null;
  volatility: number;
  orders: Order[];
  /** Resting orders to cancel before `orders` are sent. */
  cancels: RestingOrder[];
  theoreticals: Map<string, TheoreticalValue>;
  signals: Map<string, Signal>;
  transitions: PositionDecision[];
  risk: RiskVerdict[];
  hedge: HedgeDecision | null;
  /** Projected after this tick's option orders, before hedging. */
  netDelta: Decimal | null;
  /** Projected after the hedge orders. */
  postHedgeNetDelta: Decimal | null;
}

const ZERO = new Decimal(0);
const ONE = new Decimal(1);

/**
 * One full decision pass per tick: news → volatility → pricing → signals →
 * position decisions → hedge, with every order passing the risk governor.
 * Synchronous; the caller submits the returned orders.
 */
export class VolArbEngine {
  readonly volatility: RealizedVolatilityTracker;
  readonly positions: PositionManager;
  readonly underlying: Instrument;
  readonly options: Map<string, OptionInstrument>;
  private hedger: DeltaHedger;
  private governor: RiskGovernor;

  constructor(private config: EngineConfig) {
    const { instruments, strategy, risk } = config;
    this.underlying = {
      id: instruments.underlying.id,
      kind: "underlying",
      multiplier: instruments.underlying.multiplier
    };
    this.options = new Map<string, OptionInstrument>(
      instruments.options.map((option) => [option.id, { ...option }])
    );
    this.volatility = new RealizedVolatilityTracker(strategy.initialVolatility);
    this.positions = new PositionManager({
      optionsQtyPerTrade: strategy.optionsQtyPerTrade,
      closeThreshold: strategy.closeThreshold,
      scaleStep: strategy.scaleStep,
      profitTargetFraction: strategy.profitTargetFraction,
      maxOptionPosition: risk.maxOptionPosition
    });
    this.hedger = new DeltaHedger(this.underlying, this.options, {
      netDeltaLimit: risk.netDeltaLimit,
      hedgeRatio: strategy.hedgeRatio,
      marketFeePerShare: strategy.marketFeePerShare
    });
    this.governor = new RiskGovernor(risk);
  }

  states(): Map<string, PositionState> {
    return this.positions.states();
  }

  evaluateTick(snapshot: MarketSnapshot): TickDecision {
    this.ingestNews(snapshot);

    const decision: TickDecision = {
      tick: snapshot.tick,
      active: snapshot.status === ACTIVE_STATUS,
      skipped: null,
      volatility: this.volatility.current(),
      orders: [],
      cancels: [],
      theoreticals: new Map(),
      signals: new Map(),
      transitions: [],
      risk: [],
      hedge: null,
      netDelta: null,
      postHedgeNetDelta: null
    };

    if (!decision.active) return { ...decision, skipped: "inactive" };

    const underlyingQuote = snapshot.quotes.get(this.underlying.id);
    if (!underlyingQuote) {
      console.warn("engine.no_underlying_quote", { tick: snapshot.tick });
      return { ...decision, skipped: "no_underlying_quote" };
    }

    const theoreticals = this.priceOptions(underlyingQuote.mid, snapshot);
    decision.theoreticals = theoreticals;

    const projected = new Map<string, Position>(snapshot.positions);
    const quantityOf = (id: string) => projected.get(id)?.quantity ?? ZERO;
    const addFill = (order: Order) => {
      const before = projected.get(order.instrumentId);
      projected.set(order.instrumentId, {
        instrumentId: order.instrumentId,
        quantity: quantityOf(order.instrumentId).add(order.quantity),
        averagePrice: before?.averagePrice ?? null
      });
    };

    let netDelta = this.hedger.netDelta(projected, theoreticals, quantityOf(this.underlying.id));
    const tradable =
      !this.config.strategy.requireAnnouncedVolatility || this.volatility.hasAnnouncement();

    for (const option of this.options.values()) {
      const position = snapshot.positions.get(option.id);
      const quantity = position?.quantity ?? ZERO;
      const quote = snapshot.quotes.get(option.id);
      const theoretical = theoreticals.get(option.id);
      if (!tradable || !quote || !theoretical) {
        this.positions.observe(option.id, quantity);
        continue;
      }

      const signal = evaluateSignal(
        theoretical.value,
        quote.mid,
        this.config.strategy.openThreshold
      );
      decision.signals.set(option.id, signal);

      const transition = this.positions.propose({
        instrumentId: option.id,
        quantity,
        averagePrice: position?.averagePrice ?? null,
        signal,
        mid: quote.mid
      });
      if (!transition.order) {
        this.positions.commit(option.id);
        decision.transitions.push(transition);
        continue;
      }

      const verdict = this.governor.clip(transition.order, {
        instrument: option,
        position: quantityOf(option.id),
        netDelta,
        deltaPerUnit: theoretical.delta.mul(option.multiplier)
      });
      decision.risk.push(verdict);
      if (!verdict.order) {
        decision.transitions.push({ ...transition, to: transition.from });
        continue;
      }

      this.positions.commit(option.id);
      decision.transitions.push(transition);
      decision.orders.push(verdict.order);
      addFill(verdict.order);
      netDelta = verdict.projectedNetDelta;
    }

    decision.netDelta = netDelta;
    const hedge = this.hedger.rehedge(
      projected,
      theoreticals,
      quantityOf(this.underlying.id),
      underlyingQuote,
      snapshot.openOrders
    );
    decision.hedge = hedge;
    decision.cancels = snapshot.openOrders.filter((order) => order.orderId !== hedge.working?.orderId);
    decision.postHedgeNetDelta = hedge.order
      ? this.issueHedge(hedge.order, hedge.netDelta, quantityOf(this.underlying.id), decision)
      : hedge.netDelta;

    return decision;
  }

  /**
   * Issues the hedge through the governor. While the per-order cap leaves the
   * projected net delta beyond the limit, the remainder goes out as further
   * child orders.
   */
  private issueHedge(
    hedgeOrder: Order,
    startingNetDelta: Decimal,
    startingPosition: Decimal,
    decision: TickDecision
  ): Decimal {
    const limit = new Decimal(this.config.risk.netDeltaLimit);
    let remaining = hedgeOrder.quantity;
    let position = startingPosition;
    let netDelta = startingNetDelta;

    for (let child = 0; child < this.config.strategy.maxHedgeChildOrders; child += 1) {
      if (remaining.isZero()) break;
      const verdict = this.governor.clip(
        { ...hedgeOrder, quantity: remaining },
        { instrument: this.underlying, position, netDelta, deltaPerUnit: ONE }
      );
      decision.risk.push(verdict);
      if (!verdict.order) break;

      decision.orders.push(verdict.order);
      position = position.add(verdict.order.quantity);
      netDelta = verdict.projectedNetDelta;
      remaining = remaining.minus(verdict.order.quantity);
      if (netDelta.abs().lte(limit)) break;
    }
    return netDelta;
  }

  private ingestNews(snapshot: MarketSnapshot): void {
    const ordered = [...snapshot.news].sort((a, b) => a.id - b.id);
    for (const item of ordered) {
      this.volatility.update(`${item.headline} ${item.body}`, item.id, item.tick);
    }
  }

  private priceOptions(
    underlyingMid: Decimal,
    snapshot: MarketSnapshot
  ): Map<string, TheoreticalValue> {
    const theoreticals = new Map<string, TheoreticalValue>();
    const volatility = this.volatility.current();
    for (const option of this.options.values()) {
      try {
        const result = price({
          underlyingPrice: underlyingMid.toNumber(),
          strike: option.strike,
          timeToExpiryYears: snapshot.timeToExpiryYears,
          volatility,
          riskFreeRate: this.config.strategy.riskFreeRate,
          kind: option.kind
        });
        theoreticals.set(option.id, {
          instrumentId: option.id,
          value: new Decimal(result.value),
          delta: new Decimal(result.delta)
        });
      } catch (error) {
        if (!(error instanceof PricingError)) throw error;
        console.warn("pricing.skip", {
          instrumentId: option.id,
          tick: snapshot.tick,
          error: error.message
        });
      }
    }
    return theoreticals;
  }
}
