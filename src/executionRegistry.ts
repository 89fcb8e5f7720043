import type { SimExchangeConnector } from "@volarb/connectors";
import type { Order } from "@volarb/engine";
import type { ExchangeOrderRequest, OrderResult } from "@volarb/shared";

export type VenueExecutor = {
  placeOrder: (request: ExchangeOrderRequest) => Promise<OrderResult>;
  cancelOrder: (orderId: number) => Promise<void>;
};

/** Signed engine order to the exchange's side-and-size form. */
export function toVenueOrder(order: Order): ExchangeOrderRequest {
  if (order.quantity.isZero()) {
    throw new Error(`Refusing to send an empty order for ${order.instrumentId}`);
  }
  const request: ExchangeOrderRequest = {
    ticker: order.instrumentId,
    type: order.type === "limit" ? "LIMIT" : "MARKET",
    quantity: order.quantity.abs().toNumber(),
    action: order.quantity.isNegative() ? "SELL" : "BUY"
  };
  if (order.type === "limit") {
    if (!order.price) {
      throw new Error("Limit orders require price");
    }
    request.price = order.price.toNumber();
  }
  return request;
}

export class ExecutionRegistry {
  private executors = new Map<string, VenueExecutor>();

  register(venue: string, executor: VenueExecutor): void {
    this.executors.set(venue, executor);
  }

  venues(): string[] {
    return [...this.executors.keys()];
  }

  async submit(venue: string, order: Order): Promise<OrderResult> {
    return await this.executor(venue).placeOrder(toVenueOrder(order));
  }

  async cancel(venue: string, orderId: number): Promise<void> {
    await this.executor(venue).cancelOrder(orderId);
  }

  private executor(venue: string): VenueExecutor {
    const executor = this.executors.get(venue);
    if (!executor) {
      throw new Error(`Venue not registered: ${venue}`);
    }
    return executor;
  }
}

export function createExchangeExecutor(
  connector: Pick<SimExchangeConnector, "placeOrder" | "cancelOrder">
): VenueExecutor {
  return {
    placeOrder: (request) => connector.placeOrder(request),
    cancelOrder: (orderId) => connector.cancelOrder(orderId)
  };
}
