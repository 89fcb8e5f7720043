import { readFile, stat } from "node:fs/promises";
import { z } from "zod";

const optionSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["call", "put"]),
  strike: z.number().positive(),
  multiplier: z.number().positive().default(100)
});

const sessionSchema = z.object({
  totalTicks: z.number().int().positive().default(300),
  ticksPerYear: z.number().positive().default(3600)
});

const strategySchema = z.object({
  optionsQtyPerTrade: z.number().int().positive().default(90),
  openThreshold: z.number().positive().default(0.04),
  closeThreshold: z.number().nonnegative().default(0.01),
  scaleStep: z.number().positive().default(0.02),
  profitTargetFraction: z.number().positive().default(1),
  riskFreeRate: z.number().default(0),
  initialVolatility: z.number().positive().default(0.2),
  requireAnnouncedVolatility: z.boolean().default(true),
  hedgeRatio: z.number().positive().max(1).default(1),
  marketFeePerShare: z.number().nonnegative().default(0.02),
  maxHedgeChildOrders: z.number().int().positive().default(5)
});

const riskSchema = z.object({
  optionsOrderLimit: z.number().int().positive().default(100),
  sharesOrderLimit: z.number().int().positive().default(10000),
  netDeltaLimit: z.number().positive().default(5000),
  maxOptionPosition: z.number().int().positive().default(270),
  maxUnderlyingPosition: z.number().int().positive().default(50000)
});

export const agentConfigSchema = z
  .object({
    session: sessionSchema.default({}),
    instruments: z.object({
      underlying: z.object({
        id: z.string().min(1),
        multiplier: z.number().positive().default(1)
      }),
      options: z.array(optionSchema).min(1)
    }),
    strategy: strategySchema.default({}),
    risk: riskSchema.default({})
  })
  .refine((config) => config.strategy.closeThreshold < config.strategy.openThreshold, {
    message: "strategy.closeThreshold must be below strategy.openThreshold",
    path: ["strategy", "closeThreshold"]
  })
  .refine(
    (config) => new Set(config.instruments.options.map((option) => option.id)).size === config.instruments.options.length,
    { message: "option ids must be unique", path: ["instruments", "options"] }
  );

export type AgentConfig = z.infer<typeof agentConfigSchema>;

let cachedConfig: AgentConfig | null = null;
let cachedMtime = 0;

export function parseAgentConfig(raw: unknown): AgentConfig {
  const result = agentConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid config: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Reads and validates the agent config, re-reading only when the file's mtime
 * changes. After a successful load, a broken or missing file falls back to the
 * cached copy with a warning.
 */
export async function loadAgentConfig(configPath: string | URL): Promise<AgentConfig> {
  const pathStr = configPath instanceof URL ? configPath.pathname : configPath;

  try {
    const stats = await stat(pathStr);
    const mtime = stats.mtimeMs;

    if (cachedConfig && mtime === cachedMtime) {
      return cachedConfig;
    }

    const raw = await readFile(pathStr, "utf-8");
    const config = parseAgentConfig(JSON.parse(raw));
    cachedConfig = config;
    cachedMtime = mtime;
    return config;
  } catch (error) {
    if (cachedConfig) {
      console.warn("config.cached_fallback", {
        path: pathStr,
        error: error instanceof Error ? error.message : String(error)
      });
      return cachedConfig;
    }
    throw error;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
  cachedMtime = 0;
}
