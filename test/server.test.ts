import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { VolArbEngine } from "@volarb/engine";
import type { AgentStatus } from "@volarb/shared";
import { createAuditLog, type AuditLog } from "../src/audit";
import { createServer } from "../src/server";
import { ExchangeSnapshotSource } from "../src/snapshotSource";
import { createLoopState, type LoopState } from "../src/tradingLoop";
import { ROUND_TRIP, testConfig } from "./fixtures/session";
import { MockExchangeConnector } from "./mocks/mockExchangeConnector";

describe("server endpoints", () => {
  let dir: string;
  let engine: VolArbEngine;
  let loopState: LoopState;
  let audit: AuditLog;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "volarb-server-"));
    engine = new VolArbEngine(testConfig());
    loopState = createLoopState();
    audit = createAuditLog(join(dir, "audit.log"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("GET /health returns ok", async () => {
    const { app } = await createServer({ engine, loopState, audit, logger: false });

    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", loopRunning: false, lastTick: null });
    await app.close();
  });

  it("GET /status reports the last decision", async () => {
    const config = testConfig();
    const source = new ExchangeSnapshotSource(new MockExchangeConnector(ROUND_TRIP), config.session, [
      "RTM",
      "RTM50C",
      "RTM50P"
    ]);
    const decision = engine.evaluateTick(await source.next());
    loopState.lastTick = decision.tick;
    loopState.lastDecision = decision;

    const { app } = await createServer({ engine, loopState, audit, logger: false });
    const res = await app.inject({ method: "GET", url: "/status" });
    const status: AgentStatus = res.json();

    expect(res.statusCode).toBe(200);
    expect(status.tick).toBe(1);
    expect(status.active).toBe(true);
    expect(status.volatility).toBe("0.2000");
    expect(status.volatilityAnnounced).toBe(true);
    expect(status.lastOrders).toEqual([{ instrumentId: "RTM50C", quantity: "90", type: "market", price: null }]);
    expect(status.instruments.map((instrument) => [instrument.instrumentId, instrument.state])).toEqual([
      ["RTM50C", "OPENING"],
      ["RTM50P", "FLAT"]
    ]);
    expect(status.instruments[0].direction).toBe("LONG");
    await app.close();
  });

  it("GET /metrics reports loop counters", async () => {
    loopState.ordersSubmitted = 4;
    const { app } = await createServer({ engine, loopState, audit, logger: false });

    const res = await app.inject({ method: "GET", url: "/metrics" });
    expect(res.json()).toMatchObject({ ordersSubmitted: 4, ordersFailed: 0, volatilityParseMisses: 0 });
    await app.close();
  });

  it("GET /audit/logs returns the latest entries", async () => {
    await audit.record("agent_started", { port: 8000 });
    await audit.record("loop_stopped", { reason: "market_closed" });
    const { app } = await createServer({ engine, loopState, audit, logger: false });

    const res = await app.inject({ method: "GET", url: "/audit/logs?limit=1" });
    const json = res.json();
    expect(json.count).toBe(1);
    expect(json.entries[0]).toMatchObject({ event: "loop_stopped", payload: { reason: "market_closed" } });

    const bad = await app.inject({ method: "GET", url: "/audit/logs?limit=zero" });
    expect(bad.statusCode).toBe(400);
    await app.close();
  });
});
