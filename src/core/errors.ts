export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credentials or settings are missing or unusable. Fatal before any network call. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION', details);
  }
}

export type ConnectivityFailure = 'permission_denied' | 'unreachable';

/** The startup reachability/permission check failed. Fatal. */
export class ConnectivityError extends AppError {
  constructor(
    message: string,
    public readonly reason: ConnectivityFailure,
    options?: { cause?: unknown }
  ) {
    super(message, 'CONNECTIVITY', { reason }, options);
  }
}

/** The exchange answered with its own `{ code, msg }` error body. */
export class ExchangeError extends AppError {
  readonly kind = 'exchange';

  constructor(
    public readonly exchangeCode: number,
    public readonly exchangeMessage: string,
    public readonly httpStatus?: number
  ) {
    super(`APIError(code=${exchangeCode}): ${exchangeMessage}`, 'EXCHANGE', {
      exchangeCode,
      httpStatus
    });
  }
}

/** Order parameters were rejected before reaching the exchange. */
export class ValidationError extends AppError {
  readonly kind = 'validation';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION', details);
  }
}

/** Network failure, timeout or a response that could not be understood. */
export class TransportError extends AppError {
  readonly kind = 'transport';

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT', details, options);
  }
}

export type BotError = ExchangeError | ValidationError | TransportError;
export type BotErrorKind = BotError['kind'];

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export const toBotError = (err: unknown): BotError => {
  if (err instanceof ExchangeError || err instanceof ValidationError || err instanceof TransportError) {
    return err;
  }
  const message = errorMessage(err);
  return new TransportError(message === '' ? 'Unexpected error' : `Unexpected error: ${message}`, undefined, {
    cause: err
  });
};
