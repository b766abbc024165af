import type { CreateOrderParams, ExchangePayload } from '../core/types.js';

export interface ServerTime {
  serverTime: number;
}

/**
 * Futures account operations. Implementations throw `ExchangeError` for errors the
 * exchange reports and `TransportError` for everything else; payloads are returned as received.
 */
export interface FuturesExchangeAdapter {
  getServerTime(): Promise<ServerTime>;
  getAccountInfo(): Promise<ExchangePayload>;
  createOrder(params: CreateOrderParams): Promise<ExchangePayload>;
  getOrder(symbol: string, orderId: number): Promise<ExchangePayload>;
  cancelOrder(symbol: string, orderId: number): Promise<ExchangePayload>;
  getAccountBalance(): Promise<ExchangePayload>;
}
