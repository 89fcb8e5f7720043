import { z } from "zod";

export const caseSchema = z.object({
  name: z.string().optional(),
  period: z.number().int().optional(),
  tick: z.number().int(),
  ticks_per_period: z.number().int().optional(),
  total_periods: z.number().int().optional(),
  status: z.string(),
  is_enforce_trading_limits: z.boolean().optional()
});

export const securitySchema = z.object({
  ticker: z.string(),
  type: z.string(),
  position: z.number(),
  last: z.number(),
  bid: z.number(),
  ask: z.number(),
  vwap: z.number().nullable().optional()
});

export const securitiesSchema = z.array(securitySchema);

export const newsEntrySchema = z.object({
  news_id: z.number().int(),
  period: z.number().int().optional(),
  tick: z.number().int(),
  ticker: z.string().optional(),
  headline: z.string(),
  body: z.string()
});

export const newsSchema = z.array(newsEntrySchema);

export const traderSchema = z.object({
  trader_id: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  nlv: z.number()
});

export const orderResultSchema = z.object({
  order_id: z.number().int(),
  ticker: z.string(),
  type: z.enum(["MARKET", "LIMIT"]),
  quantity: z.number(),
  action: z.enum(["BUY", "SELL"]),
  price: z.number().nullable().optional(),
  quantity_filled: z.number().optional(),
  vwap: z.number().nullable().optional(),
  status: z.string()
});

export const openOrdersSchema = z.array(orderResultSchema);

export const cancelResultSchema = z.object({
  success: z.boolean()
});

export type CaseData = z.infer<typeof caseSchema>;
export type Security = z.infer<typeof securitySchema>;
export type NewsEntry = z.infer<typeof newsEntrySchema>;
export type TraderData = z.infer<typeof traderSchema>;
export type OrderResult = z.infer<typeof orderResultSchema>;
export type CancelResult = z.infer<typeof cancelResultSchema>;
