import Decimal from "decimal.js";
import type { SimExchangeConnector } from "@volarb/connectors";
import {
  timeToExpiryYears,
  type MarketQuote,
  type MarketSnapshot,
  type Position,
  type RestingOrder,
  type SessionSettings
} from "@volarb/engine";
import type { OrderResult, Security } from "@volarb/shared";

export type ExchangeReader = Pick<
  SimExchangeConnector,
  "getCase" | "getSecurities" | "getNews" | "getOpenOrders"
>;

export interface SnapshotSource {
  next(): Promise<MarketSnapshot>;
}

/**
 * Top-of-book quote for a security, or null when neither a two-sided market nor
 * a last trade gives a usable price.
 */
export function quoteFromSecurity(security: Security, tick: number): MarketQuote | null {
  const bid = security.bid > 0 ? new Decimal(security.bid) : null;
  const ask = security.ask > 0 ? new Decimal(security.ask) : null;
  const last = new Decimal(security.last);

  let mid: Decimal;
  if (bid && ask) {
    mid = bid.add(ask).div(2);
  } else if (last.gt(0)) {
    mid = last;
  } else {
    return null;
  }

  return {
    instrumentId: security.ticker,
    bid,
    ask,
    mid,
    last,
    vwap: security.vwap && security.vwap > 0 ? new Decimal(security.vwap) : null,
    tick
  };
}

/** Signed unfilled remainder of an open exchange order. */
export function restingFromOrder(order: OrderResult): RestingOrder {
  const open = new Decimal(order.quantity).minus(order.quantity_filled ?? 0);
  return {
    orderId: order.order_id,
    instrumentId: order.ticker,
    quantity: order.action === "SELL" ? open.negated() : open,
    price: order.price ? new Decimal(order.price) : null
  };
}

export class ExchangeSnapshotSource implements SnapshotSource {
  private lastNewsId = 0;
  private readonly tickers: Set<string>;

  constructor(
    private exchange: ExchangeReader,
    private session: SessionSettings,
    tickers: Iterable<string>
  ) {
    this.tickers = new Set(tickers);
  }

  async next(): Promise<MarketSnapshot> {
    const caseData = await this.exchange.getCase();
    const [securities, news, openOrders] = await Promise.all([
      this.exchange.getSecurities(),
      this.exchange.getNews(this.lastNewsId),
      this.exchange.getOpenOrders()
    ]);

    const quotes = new Map<string, MarketQuote>();
    const positions = new Map<string, Position>();
    for (const security of securities) {
      if (!this.tickers.has(security.ticker)) continue;
      positions.set(security.ticker, {
        instrumentId: security.ticker,
        quantity: new Decimal(security.position),
        // The exchange reports the position's average fill price as its vwap.
        averagePrice:
          security.position !== 0 && security.vwap && security.vwap > 0 ? new Decimal(security.vwap) : null
      });
      const quote = quoteFromSecurity(security, caseData.tick);
      if (quote) quotes.set(security.ticker, quote);
    }

    const fresh = news
      .filter((entry) => entry.news_id > this.lastNewsId)
      .map((entry) => ({
        id: entry.news_id,
        tick: entry.tick,
        headline: entry.headline,
        body: entry.body
      }));
    for (const item of fresh) {
      this.lastNewsId = Math.max(this.lastNewsId, item.id);
    }

    return {
      tick: caseData.tick,
      status: caseData.status,
      timeToExpiryYears: timeToExpiryYears(caseData.tick, this.session),
      quotes,
      positions,
      openOrders: openOrders
        .filter((order) => this.tickers.has(order.ticker))
        .map(restingFromOrder),
      news: fresh
    };
  }
}
