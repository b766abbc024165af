export const BINANCE_FUTURES_BASE_URL = 'https://fapi.binance.com';
export const BINANCE_FUTURES_TESTNET_BASE_URL = 'https://testnet.binancefuture.com';

export const binanceFuturesEndpoints = {
  time: (): string => '/fapi/v1/time',
  account: (): string => '/fapi/v2/account',
  order: (): string => '/fapi/v1/order',
  balance: (): string => '/fapi/v2/balance'
};

/** Error code for a key without futures permission, or a request from a non-whitelisted IP. */
export const BINANCE_PERMISSION_DENIED = -2015;

export const resolveBaseUrl = (opts: { testnet: boolean; baseUrl?: string }): string =>
  opts.baseUrl ?? (opts.testnet ? BINANCE_FUTURES_TESTNET_BASE_URL : BINANCE_FUTURES_BASE_URL);
