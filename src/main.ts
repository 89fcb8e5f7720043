import { DEFAULT_EXCHANGE_URL, SimExchangeConnector } from "@volarb/connectors";
import { VolArbEngine } from "@volarb/engine";
import { createAuditLog } from "./audit";
import { loadAgentConfig } from "./configLoader";
import { ExecutionRegistry, createExchangeExecutor } from "./executionRegistry";
import { createServer } from "./server";
import { ExchangeSnapshotSource } from "./snapshotSource";
import { createLoopState, runTradingLoop } from "./tradingLoop";

const PORT = Number(process.env.PORT || "8000");
const HOST = process.env.HOST || "0.0.0.0";
const EXCHANGE_URL = process.env.EXCHANGE_URL || DEFAULT_EXCHANGE_URL;
const EXCHANGE_API_KEY = process.env.EXCHANGE_API_KEY;
const AGENT_CONFIG_PATH = process.env.AGENT_CONFIG_PATH;
const AUDIT_LOG_PATH = process.env.AUDIT_LOG_PATH || "./logs/audit.log";
const POLL_INTERVAL_MS = Number(process.env.POLL_INTERVAL_MS || "250");
const VENUE = "exchange";

const start = async () => {
  if (!EXCHANGE_API_KEY) {
    throw new Error("EXCHANGE_API_KEY is required");
  }

  const config = await loadAgentConfig(AGENT_CONFIG_PATH || new URL("../configs/agent.json", import.meta.url));
  console.info("agent.config_loaded", {
    underlying: config.instruments.underlying.id,
    options: config.instruments.options.length,
    netDeltaLimit: config.risk.netDeltaLimit
  });

  const exchange = new SimExchangeConnector({ baseUrl: EXCHANGE_URL, apiKey: EXCHANGE_API_KEY });
  const engine = new VolArbEngine(config);
  const registry = new ExecutionRegistry();
  registry.register(VENUE, createExchangeExecutor(exchange));
  const source = new ExchangeSnapshotSource(exchange, config.session, [
    config.instruments.underlying.id,
    ...config.instruments.options.map((option) => option.id)
  ]);
  const audit = createAuditLog(AUDIT_LOG_PATH);
  const loopState = createLoopState();

  const { app } = await createServer({ engine, loopState, audit });
  await app.listen({ port: PORT, host: HOST });

  const controller = new AbortController();
  const shutdown = () => controller.abort();
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await audit.record("agent_started", {
    exchangeUrl: EXCHANGE_URL,
    pollIntervalMs: POLL_INTERVAL_MS,
    port: PORT,
    host: HOST
  });

  const reason = await runTradingLoop({
    engine,
    source,
    registry,
    venue: VENUE,
    session: config.session,
    pollIntervalMs: POLL_INTERVAL_MS,
    audit,
    state: loopState,
    signal: controller.signal
  });

  try {
    const trader = await exchange.getTrader();
    console.info("agent.final_nlv", { reason, nlv: trader.nlv });
  } catch (error) {
    console.error("agent.final_nlv_unavailable", {
      reason,
      error: error instanceof Error ? error.message : String(error)
    });
  }

  await app.close();
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
