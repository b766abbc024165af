import axios from 'axios';
import { ExchangeError, TransportError, errorMessage } from '../../core/errors.js';
import { binanceErrorBodySchema } from './types.js';

/**
 * Map a failed request to the bot's error kinds: an error body from the exchange becomes an
 * `ExchangeError`, anything else (no response, timeout, unreadable body) a `TransportError`.
 */
export const toBinanceError = (err: unknown): ExchangeError | TransportError => {
  if (err instanceof ExchangeError || err instanceof TransportError) return err;

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const body = binanceErrorBodySchema.safeParse(err.response?.data);
    if (body.success) {
      return new ExchangeError(body.data.code, body.data.msg, status);
    }
    if (status !== undefined) {
      return new TransportError(`HTTP ${status} from exchange: ${err.message}`, { httpStatus: status }, { cause: err });
    }
    return new TransportError(`Network error: ${err.message}`, { code: err.code }, { cause: err });
  }

  return new TransportError(`Unexpected error: ${errorMessage(err)}`, undefined, { cause: err });
};
