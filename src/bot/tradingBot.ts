import {
  ConnectivityError,
  ExchangeError,
  TransportError,
  errorMessage,
  toBotError
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type {
  CreateOrderParams,
  ExchangePayload,
  LimitOrderRequest,
  MarketOrderRequest,
  OperationResult,
  OrderLookup,
  StopLimitOrderRequest
} from '../core/types.js';
import {
  limitOrderSchema,
  marketOrderSchema,
  orderLookupSchema,
  stopLimitOrderSchema,
  validate
} from '../core/validation.js';
import type { FuturesExchangeAdapter } from '../exchanges/adapter.js';
import { BINANCE_PERMISSION_DENIED } from '../exchanges/binance/endpoints.js';

const isAuthStatus = (status: unknown): boolean => status === 401 || status === 403;

const isPermissionDenied = (err: unknown): boolean => {
  if (err instanceof ExchangeError) {
    return err.exchangeCode === BINANCE_PERMISSION_DENIED || isAuthStatus(err.httpStatus);
  }
  return err instanceof TransportError && isAuthStatus(err.details?.httpStatus);
};

/**
 * Order and account operations on a futures account.
 *
 * Every operation resolves to an {@link OperationResult}: the exchange payload untouched, or
 * an error message. Nothing is retried.
 */
export class TradingBot {
  private constructor(
    private readonly exchange: FuturesExchangeAdapter,
    private readonly logger: Logger
  ) {}

  /**
   * Check that the exchange is reachable and the key may trade futures.
   * @throws ConnectivityError when either check fails
   */
  static async connect(exchange: FuturesExchangeAdapter, logger: Logger): Promise<TradingBot> {
    try {
      const { serverTime } = await exchange.getServerTime();
      logger.info('connection verified', { serverTime });
    } catch (err) {
      logger.error('error verifying connection', { err: errorMessage(err) });
      throw new ConnectivityError(`Exchange unreachable: ${errorMessage(err)}`, 'unreachable', { cause: err });
    }

    try {
      await exchange.getAccountInfo();
      logger.info('API key has futures permissions');
    } catch (err) {
      if (isPermissionDenied(err)) {
        logger.error("API key doesn't have futures permissions or IP not whitelisted", { err: errorMessage(err) });
        logger.error("create a new API key with 'Enable Futures' checked");
        throw new ConnectivityError(
          `API key is missing futures trading permission: ${errorMessage(err)}`,
          'permission_denied',
          { cause: err }
        );
      }
      logger.error('error reading account info', { err: errorMessage(err) });
      throw new ConnectivityError(`Account check failed: ${errorMessage(err)}`, 'unreachable', { cause: err });
    }

    return new TradingBot(exchange, logger);
  }

  placeMarketOrder(request: MarketOrderRequest): Promise<OperationResult> {
    return this.placeOrder('MARKET', request, () => {
      const order = validate(marketOrderSchema, request);
      return { ...order, type: 'MARKET' };
    });
  }

  placeLimitOrder(request: LimitOrderRequest): Promise<OperationResult> {
    return this.placeOrder('LIMIT', request, () => {
      const order = validate(limitOrderSchema, request);
      return { ...order, type: 'LIMIT', timeInForce: 'GTC' };
    });
  }

  /** Rests as a limit order at `limitPrice` once `stopPrice` trades. */
  placeStopLimitOrder(request: StopLimitOrderRequest): Promise<OperationResult> {
    return this.placeOrder('STOP_LIMIT', request, () => {
      const { stopPrice, limitPrice, ...order } = validate(stopLimitOrderSchema, request);
      return { ...order, type: 'STOP', timeInForce: 'GTC', price: limitPrice, stopPrice };
    });
  }

  getOrderStatus(lookup: OrderLookup): Promise<OperationResult> {
    this.logger.info('getting order status', { ...lookup });
    return this.run('get order status', async () => {
      const { symbol, orderId } = validate(orderLookupSchema, lookup);
      return this.exchange.getOrder(symbol, orderId);
    });
  }

  cancelOrder(lookup: OrderLookup): Promise<OperationResult> {
    this.logger.info('cancelling order', { ...lookup });
    return this.run('cancel order', async () => {
      const { symbol, orderId } = validate(orderLookupSchema, lookup);
      return this.exchange.cancelOrder(symbol, orderId);
    });
  }

  getAccountBalance(): Promise<OperationResult> {
    this.logger.info('getting account balance');
    return this.run('get account balance', () => this.exchange.getAccountBalance());
  }

  private placeOrder(
    label: string,
    request: MarketOrderRequest,
    build: () => CreateOrderParams
  ): Promise<OperationResult> {
    this.logger.info(`placing ${label} order`, { ...request });
    return this.run(`place ${label} order`, () => this.exchange.createOrder(build()));
  }

  private async run(action: string, call: () => Promise<ExchangePayload>): Promise<OperationResult> {
    try {
      const data = await call();
      this.logger.info(`${action} succeeded`, { response: data });
      return { ok: true, data };
    } catch (err) {
      const botError = toBotError(err);
      this.logger.error(`${action} failed`, { kind: botError.kind, code: botError.code, err: botError.message });
      return { ok: false, error: botError.message, kind: botError.kind };
    }
  }
}
