import type { FastifyInstance } from "fastify";
import type { LoopState } from "./tradingLoop";

export type MonitoringDeps = {
  getLoopState: () => LoopState;
  getVolatilityParseMisses: () => number;
};

export function setupMonitoring(app: FastifyInstance, deps: MonitoringDeps): void {
  app.get("/metrics", async () => {
    const loop = deps.getLoopState();
    return {
      uptime: process.uptime(),
      memoryUsage: process.memoryUsage(),
      loopRunning: loop.running,
      lastTick: loop.lastTick,
      ticksEvaluated: loop.ticksEvaluated,
      ordersSubmitted: loop.ordersSubmitted,
      ordersFailed: loop.ordersFailed,
      ordersCancelled: loop.ordersCancelled,
      snapshotErrors: loop.snapshotErrors,
      volatilityParseMisses: deps.getVolatilityParseMisses()
    };
  });

  app.addHook("onRequest", async (request) => {
    request.log.info({
      method: request.method,
      url: request.url,
      requestId: request.id
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    request.log.info({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.getResponseTime(),
      requestId: request.id
    });
  });
}
