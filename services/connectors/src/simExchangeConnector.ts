import type { z } from "zod";
import {
  cancelResultSchema,
  caseSchema,
  newsSchema,
  openOrdersSchema,
  orderResultSchema,
  securitiesSchema,
  traderSchema,
  type CaseData,
  type ExchangeOrderRequest,
  type NewsEntry,
  type OrderResult,
  type Security,
  type TraderData
} from "@volarb/shared";

export const DEFAULT_EXCHANGE_URL = "http://localhost:9999/v1/";

export interface SimExchangeOptions {
  baseUrl?: string;
  apiKey: string;
  attempts?: number;
  fetchImpl?: typeof fetch;
}

export class ExchangeRequestError extends Error {
  constructor(
    readonly path: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`exchange request ${path} failed: ${status} ${body}`);
    this.name = "ExchangeRequestError";
  }
}

async function withRetry<T>(fn: () => Promise<T>, attempts = 3): Promise<T> {
  let lastError: unknown;
  for (let i = 0; i < attempts; i += 1) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
    }
  }
  throw lastError;
}

/**
 * REST client for the simulated exchange: case clock, securities (top of book,
 * positions, VWAP), news feed, trader NLV, order entry and cancellation. Every response is
 * validated against the shared zod schemas before it leaves this class.
 */
export class SimExchangeConnector {
  private readonly baseUrl: string;
  private readonly attempts: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private options: SimExchangeOptions) {
    const base = options.baseUrl ?? DEFAULT_EXCHANGE_URL;
    this.baseUrl = base.endsWith("/") ? base : `${base}/`;
    this.attempts = options.attempts ?? 3;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private url(path: string, params?: Record<string, string | number>): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async request<T>(
    method: "GET" | "POST" | "DELETE",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: Record<string, string | number>
  ): Promise<T> {
    const res = await this.fetchImpl(this.url(path, params), {
      method,
      headers: { "X-API-Key": this.options.apiKey }
    });
    if (!res.ok) {
      throw new ExchangeRequestError(path, res.status, await res.text());
    }
    return schema.parse(await res.json());
  }

  async getCase(): Promise<CaseData> {
    return withRetry(() => this.request("GET", "case", caseSchema), this.attempts);
  }

  async getSecurities(): Promise<Security[]> {
    return withRetry(() => this.request("GET", "securities", securitiesSchema), this.attempts);
  }

  async getNews(since?: number): Promise<NewsEntry[]> {
    const params = since !== undefined && since > 0 ? { since } : undefined;
    return withRetry(() => this.request("GET", "news", newsSchema, params), this.attempts);
  }

  async getTrader(): Promise<TraderData> {
    return withRetry(() => this.request("GET", "trader", traderSchema), this.attempts);
  }

  // Not retried: a lost acknowledgement would otherwise double the order.
  async placeOrder(order: ExchangeOrderRequest): Promise<OrderResult> {
    if (!order.ticker || !Number.isFinite(order.quantity) || order.quantity <= 0) {
      throw new Error("Invalid order request: missing ticker or quantity");
    }
    const params: Record<string, string | number> = {
      ticker: order.ticker,
      type: order.type,
      quantity: order.quantity,
      action: order.action
    };
    if (order.type === "LIMIT") {
      if (order.price === undefined) {
        throw new Error("Limit orders require price");
      }
      params.price = order.price;
    }
    return this.request("POST", "orders", orderResultSchema, params);
  }

  async getOpenOrders(): Promise<OrderResult[]> {
    return withRetry(
      () => this.request("GET", "orders", openOrdersSchema, { status: "OPEN" }),
      this.attempts
    );
  }

  async cancelOrder(orderId: number): Promise<void> {
    const result = await this.request("DELETE", `orders/${orderId}`, cancelResultSchema);
    if (!result.success) {
      throw new Error(`Exchange refused to cancel order ${orderId}`);
    }
  }
}
