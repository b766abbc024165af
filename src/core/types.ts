import type { BotErrorKind } from './errors.js';

export type OrderSide = 'BUY' | 'SELL';
export type OrderType = 'MARKET' | 'LIMIT' | 'STOP';
export type TimeInForce = 'GTC';

export interface Credentials {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly testnet: boolean;
}

/** Exchange response body (a JSON object or array), forwarded as received. */
export type ExchangePayload = Record<string, unknown> | unknown[];

export interface MarketOrderRequest {
  symbol: string;
  side: OrderSide;
  quantity: number;
}

export interface LimitOrderRequest extends MarketOrderRequest {
  price: number;
}

export interface StopLimitOrderRequest extends MarketOrderRequest {
  stopPrice: number;
  limitPrice: number;
}

export interface OrderLookup {
  symbol: string;
  orderId: number;
}

/** Parameters of a single create-order call. */
export interface CreateOrderParams {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  price?: number;
  stopPrice?: number;
  timeInForce?: TimeInForce;
}

export type OperationResult<T extends ExchangePayload = ExchangePayload> =
  | { ok: true; data: T }
  | { ok: false; error: string; kind: BotErrorKind };
