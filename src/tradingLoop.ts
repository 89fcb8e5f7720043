import { setTimeout as delay } from "node:timers/promises";
import {
  ACTIVE_STATUS,
  type MarketSnapshot,
  type NewsItem,
  type SessionSettings,
  type TickDecision,
  type VolArbEngine
} from "@volarb/engine";
import type { AuditLog } from "./audit";
import type { ExecutionRegistry } from "./executionRegistry";
import type { SnapshotSource } from "./snapshotSource";
import { toOrderView } from "./status";

export type StopReason = "market_closed" | "session_complete" | "aborted";

export type LoopState = {
  running: boolean;
  seenActive: boolean;
  lastTick: number | null;
  lastDecision: TickDecision | null;
  ticksEvaluated: number;
  ordersSubmitted: number;
  ordersFailed: number;
  ordersCancelled: number;
  snapshotErrors: number;
};

export function createLoopState(): LoopState {
  return {
    running: false,
    seenActive: false,
    lastTick: null,
    lastDecision: null,
    ticksEvaluated: 0,
    ordersSubmitted: 0,
    ordersFailed: 0,
    ordersCancelled: 0,
    snapshotErrors: 0
  };
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type TradingLoopOptions = {
  engine: VolArbEngine;
  source: SnapshotSource;
  registry: ExecutionRegistry;
  venue: string;
  session: SessionSettings;
  pollIntervalMs: number;
  audit?: AuditLog;
  state?: LoopState;
  signal?: AbortSignal;
  sleep?: Sleep;
};

const sleepUnlessAborted: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!(error instanceof Error && error.name === "AbortError")) throw error;
  }
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Polls the exchange one tick at a time: snapshot, synchronous engine pass,
 * cancellations, sequential order submission, sleep. A tick already evaluated
 * is not evaluated again, but news read on a repeated poll is held for the next
 * evaluated tick. Failed submissions are not retried; the next snapshot shows
 * what actually happened and the engine re-derives its orders from it. Orders
 * for an instrument whose stale order could not be cancelled are held back.
 */
export async function runTradingLoop(options: TradingLoopOptions): Promise<StopReason> {
  const { engine, source, registry, venue, session, pollIntervalMs, audit, signal } = options;
  const state = options.state ?? createLoopState();
  const sleep = options.sleep ?? sleepUnlessAborted;

  const stop = async (reason: StopReason): Promise<StopReason> => {
    state.running = false;
    console.info("loop.stopped", { reason, tick: state.lastTick });
    await audit?.record("loop_stopped", {
      reason,
      tick: state.lastTick,
      ticksEvaluated: state.ticksEvaluated,
      ordersSubmitted: state.ordersSubmitted,
      ordersFailed: state.ordersFailed,
      ordersCancelled: state.ordersCancelled
    });
    return reason;
  };

  let heldNews: NewsItem[] = [];

  state.running = true;
  while (!signal?.aborted) {
    let snapshot: MarketSnapshot;
    try {
      snapshot = await source.next();
    } catch (error) {
      state.snapshotErrors += 1;
      console.error("loop.snapshot_error", { error: describeError(error) });
      await sleep(pollIntervalMs, signal);
      continue;
    }

    const active = snapshot.status === ACTIVE_STATUS;
    if (active) state.seenActive = true;

    if (snapshot.tick === state.lastTick) {
      heldNews = [...heldNews, ...snapshot.news];
    } else {
      const decision = engine.evaluateTick({ ...snapshot, news: [...heldNews, ...snapshot.news] });
      heldNews = [];
      state.lastTick = snapshot.tick;
      state.lastDecision = decision;
      state.ticksEvaluated += 1;
      if (decision.active) {
        await audit?.record("tick_decision", {
          tick: decision.tick,
          volatility: decision.volatility,
          skipped: decision.skipped,
          orders: decision.orders.map(toOrderView),
          cancels: decision.cancels.map((order) => order.orderId),
          risk: decision.risk
            .filter((verdict) => verdict.outcome !== "accepted" || verdict.reasons.length > 0)
            .map((verdict) => ({
              instrumentId: verdict.requested.instrumentId,
              outcome: verdict.outcome,
              reasons: verdict.reasons,
              interventionRequired: verdict.interventionRequired
            })),
          netDelta: decision.netDelta?.toFixed(2) ?? null,
          postHedgeNetDelta: decision.postHedgeNetDelta?.toFixed(2) ?? null
        });
      }

      const uncancelled = new Set<string>();
      for (const resting of decision.cancels) {
        const view = { orderId: resting.orderId, instrumentId: resting.instrumentId, tick: decision.tick };
        try {
          await registry.cancel(venue, resting.orderId);
          state.ordersCancelled += 1;
          await audit?.record("order_cancelled", view);
        } catch (error) {
          uncancelled.add(resting.instrumentId);
          console.error("loop.cancel_error", { ...view, error: describeError(error) });
          await audit?.record("cancel_failed", { ...view, error: describeError(error) });
        }
      }

      for (const order of decision.orders) {
        const view = toOrderView(order);
        if (uncancelled.has(order.instrumentId)) {
          console.warn("loop.order_held", { ...view, tick: decision.tick });
          continue;
        }
        try {
          const result = await registry.submit(venue, order);
          state.ordersSubmitted += 1;
          await audit?.record("order_submitted", {
            ...view,
            tick: decision.tick,
            orderId: result.order_id,
            status: result.status
          });
        } catch (error) {
          state.ordersFailed += 1;
          console.error("loop.order_error", { ...view, error: describeError(error) });
          await audit?.record("order_failed", { ...view, tick: decision.tick, error: describeError(error) });
        }
      }
    }

    if (!active && state.seenActive) return stop("market_closed");
    if (snapshot.tick >= session.totalTicks) return stop("session_complete");

    await sleep(pollIntervalMs, signal);
  }

  return stop("aborted");
}
