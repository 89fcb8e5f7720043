import Decimal from "decimal.js";
import { describe, expect, it } from "vitest";
import { VolArbEngine, type MarketSnapshot, type NewsItem, type Position, type RestingOrder } from "@volarb/engine";
import { ExecutionRegistry, type VenueExecutor } from "../../src/executionRegistry";
import type { SnapshotSource } from "../../src/snapshotSource";
import { createLoopState, runTradingLoop } from "../../src/tradingLoop";
import { testConfig } from "../fixtures/session";

function snapshot(
  tick: number,
  status = "ACTIVE",
  extra: { news?: NewsItem[]; underlyingPosition?: number; openOrders?: RestingOrder[] } = {}
): MarketSnapshot {
  const mid = new Decimal(50);
  const positions = new Map<string, Position>(
    extra.underlyingPosition === undefined
      ? []
      : [["RTM", { instrumentId: "RTM", quantity: new Decimal(extra.underlyingPosition), averagePrice: null }]]
  );
  return {
    tick,
    status,
    timeToExpiryYears: (300 - tick) / 3600,
    quotes: new Map([
      ["RTM", { instrumentId: "RTM", bid: new Decimal(49.99), ask: new Decimal(50.01), mid, last: mid, vwap: null, tick }]
    ]),
    positions,
    openOrders: extra.openOrders ?? [],
    news: extra.news ?? []
  };
}

function scripted(steps: Array<MarketSnapshot | Error>): SnapshotSource & { calls: number } {
  return {
    calls: 0,
    async next() {
      const step = steps[Math.min(this.calls, steps.length - 1)];
      this.calls += 1;
      if (step instanceof Error) throw step;
      return step;
    }
  };
}

function options(source: SnapshotSource, registry = new ExecutionRegistry()) {
  const config = testConfig();
  return {
    engine: new VolArbEngine(config),
    source,
    registry,
    venue: "exchange",
    session: config.session,
    pollIntervalMs: 0,
    sleep: async () => undefined
  };
}

describe("runTradingLoop", () => {
  it("evaluates each tick once and stops at the end of the session", async () => {
    const state = createLoopState();
    const source = scripted([snapshot(5), snapshot(5), snapshot(6), snapshot(300)]);

    const reason = await runTradingLoop({ ...options(source), state });

    expect(reason).toBe("session_complete");
    expect(source.calls).toBe(4);
    expect(state.ticksEvaluated).toBe(3);
    expect(state.lastTick).toBe(300);
  });

  it("waits for the market to open before treating a stop as the end", async () => {
    const state = createLoopState();
    const source = scripted([snapshot(0, "STOPPED"), snapshot(1), snapshot(2, "STOPPED")]);

    const reason = await runTradingLoop({ ...options(source), state });

    expect(reason).toBe("market_closed");
    expect(state.seenActive).toBe(true);
    expect(state.ticksEvaluated).toBe(3);
  });

  it("skips a tick when the snapshot fails", async () => {
    const state = createLoopState();
    const source = scripted([new Error("exchange down"), snapshot(1), snapshot(300)]);

    const reason = await runTradingLoop({ ...options(source), state });

    expect(reason).toBe("session_complete");
    expect(state.snapshotErrors).toBe(1);
    expect(state.ticksEvaluated).toBe(2);
  });

  it("stops when aborted", async () => {
    const controller = new AbortController();
    const state = createLoopState();
    const source = scripted([snapshot(1), snapshot(2), snapshot(3)]);

    const reason = await runTradingLoop({
      ...options(source),
      state,
      signal: controller.signal,
      sleep: async () => {
        if (source.calls === 2) controller.abort();
      }
    });

    expect(reason).toBe("aborted");
    expect(state.running).toBe(false);
    expect(state.lastTick).toBe(2);
  });

  it("applies news read on a repeated poll at the next evaluated tick", async () => {
    const announcement: NewsItem = {
      id: 1,
      tick: 1,
      headline: "Volatility update",
      body: "The realized volatility of RTM for this week will be 30%"
    };
    const source = scripted([
      snapshot(1),
      snapshot(1, "ACTIVE", { news: [announcement] }),
      snapshot(2),
      snapshot(300)
    ]);
    const loop = options(source);

    await runTradingLoop(loop);

    expect(loop.engine.volatility.hasAnnouncement()).toBe(true);
    expect(loop.engine.volatility.current()).toBeCloseTo(0.3, 10);
  });

  it("cancels a stale resting order before sending its replacement", async () => {
    const calls: string[] = [];
    const executor: VenueExecutor = {
      placeOrder: async (request) => {
        calls.push(`place ${request.action} ${request.quantity} @ ${request.price}`);
        return { ...request, order_id: 8, price: request.price ?? null, status: "OPEN" };
      },
      cancelOrder: async (orderId) => {
        calls.push(`cancel ${orderId}`);
      }
    };
    const registry = new ExecutionRegistry();
    registry.register("exchange", executor);
    const stale: RestingOrder = {
      orderId: 7,
      instrumentId: "RTM",
      quantity: new Decimal(-3000),
      price: new Decimal(49.5)
    };
    const state = createLoopState();
    const source = scripted([snapshot(300, "ACTIVE", { underlyingPosition: 3000, openOrders: [stale] })]);

    await runTradingLoop({ ...options(source, registry), state });

    expect(calls).toEqual(["cancel 7", "place SELL 3000 @ 50"]);
    expect(state.ordersCancelled).toBe(1);
    expect(state.ordersSubmitted).toBe(1);
  });

  it("holds back the replacement when the stale order cannot be cancelled", async () => {
    const placed: number[] = [];
    const registry = new ExecutionRegistry();
    registry.register("exchange", {
      placeOrder: async (request) => {
        placed.push(request.quantity);
        return { ...request, order_id: 8, price: request.price ?? null, status: "OPEN" };
      },
      cancelOrder: async () => {
        throw new Error("exchange request orders/7 failed: 500 busy");
      }
    });
    const stale: RestingOrder = {
      orderId: 7,
      instrumentId: "RTM",
      quantity: new Decimal(-3000),
      price: new Decimal(49.5)
    };
    const state = createLoopState();
    const source = scripted([snapshot(300, "ACTIVE", { underlyingPosition: 3000, openOrders: [stale] })]);

    await runTradingLoop({ ...options(source, registry), state });

    expect(placed).toEqual([]);
    expect(state.ordersCancelled).toBe(0);
    expect(state.ordersSubmitted).toBe(0);
  });
});
