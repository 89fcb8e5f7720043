import Decimal from "decimal.js";
import type { Instrument, Order, RiskLimits } from "./types";

export interface RiskContext {
  instrument: Instrument;
  /** Position in the order's instrument, including orders already issued this tick. */
  position: Decimal;
  /** Projected portfolio delta before this order. */
  netDelta: Decimal;
  /** Delta added per unit bought (1 for the underlying, delta × multiplier for an option). */
  deltaPerUnit: Decimal;
}

export type RiskOutcome = "accepted" | "clipped" | "vetoed";

export type RiskReason =
  | "zero_quantity"
  | "order_size_capped"
  | "position_cap"
  | "net_delta_capped"
  | "net_delta_breached"
  | "net_delta_still_breached";

export interface RiskVerdict {
  requested: Order;
  order: Order | null;
  outcome: RiskOutcome;
  reasons: RiskReason[];
  projectedNetDelta: Decimal;
  interventionRequired: boolean;
}

function signed(magnitude: Decimal.Value, like: Decimal): Decimal {
  const value = new Decimal(magnitude);
  return like.isNegative() ? value.negated() : value;
}

/**
 * Last word on every order. Quantities are only ever reduced; a veto returns
 * no order. Every clip and veto is logged and carried in the verdict.
 */
export class RiskGovernor {
  constructor(private limits: RiskLimits) {}

  clip(order: Order, context: RiskContext): RiskVerdict {
    const reasons: RiskReason[] = [];
    const isUnderlying = context.instrument.kind === "underlying";
    const veto = (reason: RiskReason, interventionRequired = false): RiskVerdict =>
      this.report({
        requested: order,
        order: null,
        outcome: "vetoed",
        reasons: [...reasons, reason],
        projectedNetDelta: context.netDelta,
        interventionRequired
      });

    let quantity = order.quantity;
    if (quantity.isZero()) return veto("zero_quantity");

    const orderCap = isUnderlying ? this.limits.sharesOrderLimit : this.limits.optionsOrderLimit;
    if (quantity.abs().gt(orderCap)) {
      quantity = signed(orderCap, quantity);
      reasons.push("order_size_capped");
    }

    const positionCap = isUnderlying
      ? this.limits.maxUnderlyingPosition
      : this.limits.maxOptionPosition;
    const nextPosition = context.position.add(quantity);
    const reducesPosition = nextPosition.abs().lt(context.position.abs());
    if (nextPosition.abs().gt(positionCap) && !reducesPosition) {
      return veto("position_cap");
    }

    const limit = new Decimal(this.limits.netDeltaLimit);
    const current = context.netDelta;
    let projected = current.add(quantity.mul(context.deltaPerUnit));

    if (projected.abs().gt(limit)) {
      if (projected.abs().lt(current.abs())) {
        reasons.push("net_delta_still_breached");
      } else if (current.abs().gt(limit)) {
        return veto("net_delta_breached", true);
      } else {
        // Largest quantity in the order's direction that keeps |net delta| within the limit.
        const exposureSign = quantity.mul(context.deltaPerUnit).isNegative() ? -1 : 1;
        const headroom = limit.minus(current.mul(exposureSign));
        const maxUnits = headroom.div(context.deltaPerUnit.abs()).floor();
        if (maxUnits.lte(0)) return veto("net_delta_capped");
        quantity = signed(Decimal.min(maxUnits, quantity.abs()), quantity);
        projected = current.add(quantity.mul(context.deltaPerUnit));
        reasons.push("net_delta_capped");
      }
    }

    const clipped = !quantity.eq(order.quantity);
    return this.report({
      requested: order,
      order: { ...order, quantity },
      outcome: clipped ? "clipped" : "accepted",
      reasons,
      projectedNetDelta: projected,
      interventionRequired: false
    });
  }

  private report(verdict: RiskVerdict): RiskVerdict {
    if (verdict.outcome === "accepted" && verdict.reasons.length === 0) return verdict;
    const event =
      verdict.outcome === "vetoed" ? "risk.veto" : verdict.outcome === "clipped" ? "risk.clip" : "risk.flag";
    console.warn(event, {
      instrumentId: verdict.requested.instrumentId,
      requested: verdict.requested.quantity.toString(),
      granted: verdict.order?.quantity.toString() ?? null,
      reasons: verdict.reasons,
      projectedNetDelta: verdict.projectedNetDelta.toFixed(2),
      interventionRequired: verdict.interventionRequired
    });
    return verdict;
  }
}
