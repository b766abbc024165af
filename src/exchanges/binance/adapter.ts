import type { AxiosInstance } from 'axios';
import { TransportError } from '../../core/errors.js';
import { deleteJson, getJson, postJson } from '../../core/http.js';
import type { CreateOrderParams, ExchangePayload } from '../../core/types.js';
import type { FuturesExchangeAdapter, ServerTime } from '../adapter.js';
import { buildBinanceHeaders, buildSignedQuery, type BinanceAuthMaterial, type QueryParams } from './auth.js';
import { createBinanceFuturesClient } from './client.js';
import { binanceFuturesEndpoints } from './endpoints.js';
import { toBinanceError } from './errors.js';
import { binancePayloadSchema, binanceServerTimeSchema } from './types.js';

export interface BinanceFuturesOptions {
  testnet: boolean;
  baseUrl?: string;
  recvWindowMs?: number;
  timeoutMs?: number;
  now?: () => number;
}

type Send = (client: AxiosInstance, path: string, headers?: Record<string, string>) => Promise<unknown>;

/**
 * Exponent notation is not accepted for decimal parameters. Covers values below 1e21, where
 * `toFixed` switches to exponents too; validated order values stay far below that.
 */
export const formatDecimal = (value: number): string => {
  const plain = String(value);
  if (!/e/i.test(plain)) return plain;
  return value.toFixed(20).replace(/\.?0+$/, '');
};

const toOrderQuery = (params: CreateOrderParams): QueryParams => ({
  symbol: params.symbol,
  side: params.side,
  type: params.type,
  timeInForce: params.timeInForce,
  quantity: formatDecimal(params.quantity),
  price: params.price === undefined ? undefined : formatDecimal(params.price),
  stopPrice: params.stopPrice === undefined ? undefined : formatDecimal(params.stopPrice)
});

export class BinanceFuturesAdapter implements FuturesExchangeAdapter {
  private readonly client: AxiosInstance;

  constructor(
    private readonly auth: BinanceAuthMaterial,
    private readonly options: BinanceFuturesOptions
  ) {
    this.client = createBinanceFuturesClient(options);
  }

  async getServerTime(): Promise<ServerTime> {
    const body = await this.send(getJson, binanceFuturesEndpoints.time());
    const parsed = binanceServerTimeSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError('Malformed server time response');
    }
    return parsed.data;
  }

  async getAccountInfo(): Promise<ExchangePayload> {
    return this.signed(getJson, binanceFuturesEndpoints.account(), {});
  }

  async createOrder(params: CreateOrderParams): Promise<ExchangePayload> {
    return this.signed(postJson, binanceFuturesEndpoints.order(), toOrderQuery(params));
  }

  async getOrder(symbol: string, orderId: number): Promise<ExchangePayload> {
    return this.signed(getJson, binanceFuturesEndpoints.order(), { symbol, orderId });
  }

  async cancelOrder(symbol: string, orderId: number): Promise<ExchangePayload> {
    return this.signed(deleteJson, binanceFuturesEndpoints.order(), { symbol, orderId });
  }

  async getAccountBalance(): Promise<ExchangePayload> {
    return this.signed(getJson, binanceFuturesEndpoints.balance(), {});
  }

  private async signed(send: Send, path: string, params: QueryParams): Promise<ExchangePayload> {
    const query = buildSignedQuery(this.auth, params, {
      recvWindowMs: this.options.recvWindowMs ?? 5000,
      now: this.options.now
    });
    const body = await this.send(send, `${path}?${query}`, buildBinanceHeaders(this.auth));
    const parsed = binancePayloadSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(`Malformed response from ${path}`);
    }
    return parsed.data;
  }

  private async send(send: Send, path: string, headers?: Record<string, string>): Promise<unknown> {
    try {
      return await send(this.client, path, headers);
    } catch (err) {
      throw toBinanceError(err);
    }
  }
}
