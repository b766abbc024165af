import * as crypto from 'node:crypto';

export interface BinanceAuthMaterial {
  apiKey: string;
  apiSecret: string;
}

export type QueryParams = Record<string, string | number | undefined>;

/** Query string in insertion order, skipping undefined values. */
export const toQueryString = (params: QueryParams): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, String(value));
  }
  return search.toString();
};

export const signQuery = (query: string, apiSecret: string): string =>
  crypto.createHmac('sha256', apiSecret).update(query).digest('hex');

/**
 * Build the query for a SIGNED (TRADE / USER_DATA) endpoint.
 *
 * `timestamp` and `recvWindow` are appended after the caller's params and the
 * HMAC-SHA256 signature of the whole query goes last.
 */
export const buildSignedQuery = (
  auth: BinanceAuthMaterial,
  params: QueryParams,
  opts: { recvWindowMs: number; now?: () => number }
): string => {
  const query = toQueryString({
    ...params,
    recvWindow: opts.recvWindowMs,
    timestamp: (opts.now ?? Date.now)()
  });
  return `${query}&signature=${signQuery(query, auth.apiSecret)}`;
};

export const buildBinanceHeaders = (auth: BinanceAuthMaterial): Record<string, string> => ({
  'X-MBX-APIKEY': auth.apiKey
});
