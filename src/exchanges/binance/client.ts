import type { AxiosInstance } from 'axios';
import { createHttpClient } from '../../core/http.js';
import { resolveBaseUrl } from './endpoints.js';

export const createBinanceFuturesClient = (opts: {
  testnet: boolean;
  baseUrl?: string;
  timeoutMs?: number;
}): AxiosInstance => createHttpClient(resolveBaseUrl(opts), opts.timeoutMs ?? 0);
