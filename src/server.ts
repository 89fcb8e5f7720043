import Fastify from "fastify";
import cors from "@fastify/cors";
import type { VolArbEngine } from "@volarb/engine";
import type { AuditLog } from "./audit";
import { setupMonitoring } from "./monitoring";
import { buildStatus } from "./status";
import type { LoopState } from "./tradingLoop";

export type ServerDeps = {
  engine: VolArbEngine;
  loopState: LoopState;
  audit: AuditLog;
  logger?: boolean;
};

type AuditQuery = { limit?: string };

/** Read-only status API over a running agent. The caller listens. */
export async function createServer(deps: ServerDeps) {
  const { engine, loopState, audit } = deps;

  const app = Fastify({ logger: deps.logger ?? true });
  await app.register(cors, { origin: true });

  setupMonitoring(app, {
    getLoopState: () => loopState,
    getVolatilityParseMisses: () => engine.volatility.parseMisses()
  });

  app.get("/health", async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      loopRunning: loopState.running,
      lastTick: loopState.lastTick
    };
  });

  app.get("/status", async () => buildStatus(engine, loopState));

  app.get<{ Querystring: AuditQuery }>("/audit/logs", async (request, reply) => {
    const limit = request.query.limit === undefined ? 200 : Number(request.query.limit);
    if (!Number.isInteger(limit) || limit <= 0) {
      reply.code(400);
      return { status: "error", reason: "limit must be a positive integer" };
    }
    const entries = await audit.tail(Math.min(limit, 1000));
    return { entries, count: entries.length };
  });

  return { app };
}
