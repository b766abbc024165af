/**
 * Shared test helpers: in-process stand-ins for the logger, exchange and terminal.
 */

import { AxiosError, AxiosHeaders } from 'axios';
import { vi } from 'vitest';
import { EndOfInputError, type LineSource, type ShellOutput } from '../src/cli/lineSource.js';
import type { Logger } from '../src/core/logger.js';
import type { CreateOrderParams, ExchangePayload } from '../src/core/types.js';
import type { FuturesExchangeAdapter } from '../src/exchanges/adapter.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  logger: string;
  message: string;
  context?: Record<string, unknown>;
}

export type MockLogger = Logger & { entries: LogEntry[]; closeCalls: number };

export const createMockLogger = (name = 'test'): MockLogger => {
  const entries: LogEntry[] = [];
  const root = { entries, closeCalls: 0 };
  const make = (loggerName: string): Logger => ({
    debug: (message, context) => { root.entries.push({ level: 'debug', logger: loggerName, message, context }); },
    info: (message, context) => { root.entries.push({ level: 'info', logger: loggerName, message, context }); },
    warn: (message, context) => { root.entries.push({ level: 'warn', logger: loggerName, message, context }); },
    error: (message, context) => { root.entries.push({ level: 'error', logger: loggerName, message, context }); },
    child: (child) => make(`${loggerName}.${child}`),
    close: async () => { root.closeCalls += 1; },
  });
  return Object.assign(root, make(name));
};

// ── Fake Exchange ───────────────────────────────────────────────────

export const createFakeExchange = () => ({
  getServerTime: vi.fn(async () => ({ serverTime: 1_700_000_000_000 })),
  getAccountInfo: vi.fn(async (): Promise<ExchangePayload> => ({ canTrade: true })),
  createOrder: vi.fn(async (_params: CreateOrderParams): Promise<ExchangePayload> => ({ orderId: 1001, status: 'NEW' })),
  getOrder: vi.fn(async (_symbol: string, _orderId: number): Promise<ExchangePayload> => ({ orderId: 1001, status: 'NEW' })),
  cancelOrder: vi.fn(async (_symbol: string, _orderId: number): Promise<ExchangePayload> => ({ orderId: 1001, status: 'CANCELED' })),
  getAccountBalance: vi.fn(async (): Promise<ExchangePayload> => [{ asset: 'USDT', balance: '1000.00' }]),
}) satisfies FuturesExchangeAdapter;

export type FakeExchange = ReturnType<typeof createFakeExchange>;

// ── Terminal ────────────────────────────────────────────────────────

/** Feeds fixed lines, then reports end of input. */
export class ScriptedLineSource implements LineSource {
  readonly prompts: string[] = [];
  closed = false;
  private readonly lines: string[];

  constructor(lines: string[]) {
    this.lines = [...lines];
  }

  async readLine(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const line = this.lines.shift();
    if (line === undefined) throw new EndOfInputError();
    return line;
  }

  close(): void {
    this.closed = true;
  }
}

export const createOutput = (): ShellOutput & { text(): string } => {
  const chunks: string[] = [];
  return {
    write: (text: string) => { chunks.push(text); },
    text: () => chunks.join(''),
  };
};

export const countOccurrences = (haystack: string, needle: string): number => haystack.split(needle).length - 1;

// ── HTTP errors ─────────────────────────────────────────────────────

/** An axios error as thrown for a response with `status`, or for no response at all. */
export const makeAxiosError = (status: number | undefined, data?: unknown, message = 'Request failed'): AxiosError => {
  const config = { headers: new AxiosHeaders() };
  if (status === undefined) {
    return new AxiosError(message, 'ECONNREFUSED', config);
  }
  const response = { data, status, statusText: '', headers: {}, config };
  return new AxiosError(message, 'ERR_BAD_REQUEST', config, undefined, response);
};
