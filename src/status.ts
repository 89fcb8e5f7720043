import type { Order, VolArbEngine } from "@volarb/engine";
import type { AgentStatus, InstrumentStatus, OrderView } from "@volarb/shared";
import type { LoopState } from "./tradingLoop";

export function toOrderView(order: Order): OrderView {
  return {
    instrumentId: order.instrumentId,
    quantity: order.quantity.toString(),
    type: order.type,
    price: order.price?.toString() ?? null
  };
}

export function buildStatus(engine: VolArbEngine, loop: LoopState): AgentStatus {
  const decision = loop.lastDecision;
  const states = engine.states();

  const instruments: InstrumentStatus[] = [...engine.options.values()].map((option) => {
    const theoretical = decision?.theoreticals.get(option.id);
    const signal = decision?.signals.get(option.id);
    return {
      instrumentId: option.id,
      kind: option.kind,
      strike: option.strike,
      state: states.get(option.id) ?? "FLAT",
      theoreticalValue: theoretical?.value.toFixed(4) ?? null,
      delta: theoretical?.delta.toFixed(4) ?? null,
      direction: signal?.direction ?? null,
      magnitude: signal?.magnitude.toFixed(4) ?? null
    };
  });

  return {
    tick: loop.lastTick,
    active: decision?.active ?? false,
    volatility: engine.volatility.current().toFixed(4),
    volatilityAnnounced: engine.volatility.hasAnnouncement(),
    netDelta: decision?.netDelta?.toFixed(2) ?? null,
    postHedgeNetDelta: decision?.postHedgeNetDelta?.toFixed(2) ?? null,
    lastOrders: decision?.orders.map(toOrderView) ?? [],
    instruments
  };
}
