export type OrderAction = "BUY" | "SELL";
export type ExchangeOrderType = "MARKET" | "LIMIT";

export interface ExchangeOrderRequest {
  ticker: string;
  type: ExchangeOrderType;
  quantity: number;
  action: OrderAction;
  price?: number;
}

export interface OrderView {
  instrumentId: string;
  quantity: string;
  type: "market" | "limit";
  price: string | null;
}

export interface InstrumentStatus {
  instrumentId: string;
  kind: "call" | "put";
  strike: number;
  state: string;
  theoreticalValue: string | null;
  delta: string | null;
  direction: string | null;
  magnitude: string | null;
}

export interface AgentStatus {
  tick: number | null;
  active: boolean;
  volatility: string;
  volatilityAnnounced: boolean;
  netDelta: string | null;
  postHedgeNetDelta: string | null;
  lastOrders: OrderView[];
  instruments: InstrumentStatus[];
}
