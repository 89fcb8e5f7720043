import Decimal from "decimal.js";
import type { Signal } from "./signal";
import type { Order } from "./types";

export type PositionState = "FLAT" | "OPENING" | "HELD" | "SCALING" | "UNWINDING";
export type HeldDirection = "LONG" | "SHORT";

export interface InstrumentRecord {
  state: PositionState;
  direction: HeldDirection | null;
  /** |magnitude| when the position was opened or adopted. */
  entryMagnitude: Decimal;
  /** Market mid at the opening order. */
  entryPrice: Decimal | null;
  /** |magnitude| at the last open or scale; the next scale needs scaleStep more. */
  scaleBase: Decimal;
}

export interface PositionContext {
  instrumentId: string;
  quantity: Decimal;
  averagePrice: Decimal | null;
  signal: Signal;
  mid: Decimal;
}

export type DecisionReason =
  | "idle"
  | "open_long"
  | "open_short"
  | "hold"
  | "scale"
  | "max_position"
  | "reversed"
  | "converged"
  | "target_met"
  | "unwind_remaining";

export interface PositionDecision {
  instrumentId: string;
  from: PositionState;
  to: PositionState;
  order: Order | null;
  reason: DecisionReason;
}

export interface PositionManagerSettings {
  optionsQtyPerTrade: number;
  closeThreshold: number;
  scaleStep: number;
  profitTargetFraction: number;
  maxOptionPosition: number;
}

const ZERO = new Decimal(0);

function flatRecord(): InstrumentRecord {
  return {
    state: "FLAT",
    direction: null,
    entryMagnitude: ZERO,
    entryPrice: null,
    scaleBase: ZERO
  };
}

function directionOf(quantity: Decimal): HeldDirection | null {
  if (quantity.gt(0)) return "LONG";
  if (quantity.lt(0)) return "SHORT";
  return null;
}

function sideSign(direction: HeldDirection): number {
  return direction === "LONG" ? 1 : -1;
}

function marketOrder(instrumentId: string, quantity: Decimal): Order {
  return { instrumentId, quantity, type: "market" };
}

/**
 * Per-option state machine FLAT → OPENING → HELD ⇄ SCALING → UNWINDING → FLAT.
 * The recorded state is reconciled with the snapshot quantity at the start of
 * every tick; orders only propose, fills observed in the next snapshot decide.
 */
export class PositionManager {
  private records = new Map<string, InstrumentRecord>();
  private pending = new Map<string, InstrumentRecord>();

  constructor(private settings: PositionManagerSettings) {}

  stateOf(instrumentId: string): PositionState {
    return this.records.get(instrumentId)?.state ?? "FLAT";
  }

  recordOf(instrumentId: string): InstrumentRecord {
    return { ...(this.records.get(instrumentId) ?? flatRecord()) };
  }

  states(): Map<string, PositionState> {
    return new Map<string, PositionState>([...this.records].map(([id, record]) => [id, record.state]));
  }

  /** Reconciles with the snapshot without deciding, for ticks with no usable signal. */
  observe(instrumentId: string, quantity: Decimal): PositionState {
    const record = this.reconcile(instrumentId, quantity, null);
    this.pending.delete(instrumentId);
    this.records.set(instrumentId, record);
    return record.state;
  }

  /**
   * Reconciles with the snapshot and proposes the next transition. The
   * reconciled state is kept; the proposed one only takes effect on `commit`,
   * so a vetoed order leaves the instrument where the snapshot put it.
   */
  propose(context: PositionContext): PositionDecision {
    const record = this.reconcile(context.instrumentId, context.quantity, context.signal.magnitude);
    this.records.set(context.instrumentId, record);
    const { next, order, reason } = this.decide(record, context);
    this.pending.set(context.instrumentId, next);
    return {
      instrumentId: context.instrumentId,
      from: record.state,
      to: next.state,
      order,
      reason
    };
  }

  commit(instrumentId: string): PositionState {
    const next = this.pending.get(instrumentId);
    if (!next) return this.stateOf(instrumentId);
    this.pending.delete(instrumentId);
    this.records.set(instrumentId, next);
    return next.state;
  }

  /** Proposes and commits in one go, for callers without a risk check. */
  step(context: PositionContext): PositionDecision {
    const decision = this.propose(context);
    this.commit(context.instrumentId);
    return decision;
  }

  private reconcile(
    instrumentId: string,
    quantity: Decimal,
    magnitude: Decimal | null
  ): InstrumentRecord {
    const current = this.records.get(instrumentId) ?? flatRecord();
    const held = directionOf(quantity);
    if (!held) return flatRecord();

    switch (current.state) {
      case "FLAT": {
        const adopted = magnitude?.abs() ?? ZERO;
        return {
          state: "HELD",
          direction: held,
          entryMagnitude: adopted,
          entryPrice: null,
          scaleBase: adopted
        };
      }
      case "OPENING":
      case "SCALING":
      case "HELD":
        return { ...current, state: "HELD", direction: held };
      case "UNWINDING":
        return { ...current, direction: held };
    }
  }

  private decide(
    record: InstrumentRecord,
    context: PositionContext
  ): { next: InstrumentRecord; order: Order | null; reason: DecisionReason } {
    const { instrumentId, quantity, signal, mid } = context;
    const { optionsQtyPerTrade, closeThreshold, scaleStep, profitTargetFraction, maxOptionPosition } =
      this.settings;

    if (record.state === "UNWINDING") {
      return {
        next: record,
        order: marketOrder(instrumentId, quantity.negated()),
        reason: "unwind_remaining"
      };
    }

    if (record.state !== "HELD" || !record.direction) {
      if (signal.direction === "NONE") {
        return { next: record, order: null, reason: "idle" };
      }
      const magnitude = signal.magnitude.abs();
      const sign = sideSign(signal.direction);
      return {
        next: {
          state: "OPENING",
          direction: signal.direction,
          entryMagnitude: magnitude,
          entryPrice: mid,
          scaleBase: magnitude
        },
        order: marketOrder(instrumentId, new Decimal(optionsQtyPerTrade).mul(sign)),
        reason: signal.direction === "LONG" ? "open_long" : "open_short"
      };
    }

    const sign = sideSign(record.direction);
    const magnitude = signal.magnitude;
    const unwind = (reason: DecisionReason) => ({
      next: { ...record, state: "UNWINDING" as const },
      order: marketOrder(instrumentId, quantity.negated()),
      reason
    });

    if (magnitude.mul(sign).lt(0)) return unwind("reversed");
    if (magnitude.abs().lt(closeThreshold)) return unwind("converged");

    const entryPrice = context.averagePrice ?? record.entryPrice;
    if (entryPrice && record.entryMagnitude.gt(0)) {
      const captured = mid.minus(entryPrice).mul(sign);
      if (captured.gte(record.entryMagnitude.mul(profitTargetFraction))) {
        return unwind("target_met");
      }
    }

    if (signal.direction === record.direction && magnitude.abs().gte(record.scaleBase.plus(scaleStep))) {
      const room = new Decimal(maxOptionPosition).minus(quantity.abs());
      if (room.lte(0)) {
        return { next: record, order: null, reason: "max_position" };
      }
      const size = Decimal.min(new Decimal(optionsQtyPerTrade), room);
      return {
        next: { ...record, state: "SCALING", scaleBase: magnitude.abs() },
        order: marketOrder(instrumentId, size.mul(sign)),
        reason: "scale"
      };
    }

    return { next: record, order: null, reason: "hold" };
  }
}
