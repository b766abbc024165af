import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TradingBot } from '../../src/bot/tradingBot.js';
import type { TradingOperations } from '../../src/cli/menu.js';
import { InteractiveShell } from '../../src/cli/shell.js';
import { ExchangeError } from '../../src/core/errors.js';
import {
  ScriptedLineSource,
  countOccurrences,
  createFakeExchange,
  createMockLogger,
  createOutput,
  type FakeExchange,
  type MockLogger
} from '../helpers.js';

const MENU_HEADER = 'BINANCE FUTURES TESTNET BOT';

describe('InteractiveShell', () => {
  let exchange: FakeExchange;
  let logger: MockLogger;
  let output: ReturnType<typeof createOutput>;

  const runShell = async (lines: string[], bot?: TradingOperations) => {
    const input = new ScriptedLineSource(lines);
    const ops = bot ?? (await TradingBot.connect(exchange, createMockLogger('bot')));
    const shell = new InteractiveShell(ops, input, output, logger);
    const reason = await shell.run();
    return { reason, input };
  };

  beforeEach(() => {
    exchange = createFakeExchange();
    logger = createMockLogger('shell');
    output = createOutput();
  });

  it('prints the balance and returns to the menu', async () => {
    exchange.getAccountBalance.mockResolvedValueOnce({ balance: 100 });

    const { reason } = await runShell(['6', '7']);

    expect(reason).toBe('user');
    expect(output.text()).toContain('\nAccount Balance: {\n  "balance": 100\n}\n');
    expect(countOccurrences(output.text(), MENU_HEADER)).toBe(2);
    expect(output.text().endsWith('Exiting bot...\n')).toBe(true);
    expect(logger.entries.at(-1)).toMatchObject({ level: 'info', message: 'bot shutdown by user' });
  });

  it('places a market order with the side upper-cased', async () => {
    const { input } = await runShell(['1', 'BTCUSDT', 'buy', '0.01', '7']);

    expect(exchange.createOrder).toHaveBeenCalledOnce();
    expect(exchange.createOrder).toHaveBeenCalledWith({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: 0.01 });
    expect(input.prompts.slice(1, 4)).toEqual([
      'Enter symbol (e.g., BTCUSDT): ',
      'Enter side (BUY or SELL): ',
      'Enter quantity: ',
    ]);
    expect(output.text()).toContain('\nResult: {\n  "orderId": 1001,\n  "status": "NEW"\n}\n');
  });

  it('collects every stop-limit field in order', async () => {
    await runShell(['3', 'ETHUSDT', 'SELL', '2', '1800', '1795.5', '7']);

    expect(exchange.createOrder).toHaveBeenCalledWith({
      symbol: 'ETHUSDT',
      side: 'SELL',
      type: 'STOP',
      timeInForce: 'GTC',
      quantity: 2,
      price: 1795.5,
      stopPrice: 1800,
    });
  });

  it('re-prompts numeric fields and dispatches once', async () => {
    const { input } = await runShell(['4', 'BTCUSDT', 'abc', '12.5', '42', '7']);

    expect(countOccurrences(output.text(), 'Invalid input. Please enter a valid int.')).toBe(2);
    expect(input.prompts.filter((p) => p === 'Enter order ID: ')).toHaveLength(3);
    expect(exchange.getOrder).toHaveBeenCalledOnce();
    expect(exchange.getOrder).toHaveBeenCalledWith('BTCUSDT', 42);
  });

  it('never dispatches while a field is invalid', async () => {
    const { reason } = await runShell(['1', 'BTCUSDT', 'BUY', 'lots']);

    expect(reason).toBe('end_of_input');
    expect(exchange.createOrder).not.toHaveBeenCalled();
    expect(output.text()).toContain('Invalid input. Please enter a valid float.');
  });

  it('reports invalid menu choices', async () => {
    await runShell(['9', '', 'seven', '7']);

    expect(countOccurrences(output.text(), 'Invalid choice. Please select 1-7\n')).toBe(3);
    expect(countOccurrences(output.text(), MENU_HEADER)).toBe(4);
  });

  it('renders error results as {"error": message}', async () => {
    exchange.createOrder.mockRejectedValueOnce(new ExchangeError(-2019, 'Margin is insufficient.', 400));

    await runShell(['2', 'BTCUSDT', 'SELL', '1', '30000', '7']);

    expect(output.text()).toContain('\nResult: {\n  "error": "APIError(code=-2019): Margin is insufficient."\n}\n');
  });

  it('cancels by symbol and order id', async () => {
    await runShell(['5', 'BTCUSDT', '1001', '7']);

    expect(exchange.cancelOrder).toHaveBeenCalledWith('BTCUSDT', 1001);
    expect(output.text()).toContain('"status": "CANCELED"');
  });

  it('survives an operation that throws', async () => {
    const ops: TradingOperations = {
      placeMarketOrder: vi.fn(),
      placeLimitOrder: vi.fn(),
      placeStopLimitOrder: vi.fn(),
      getOrderStatus: vi.fn(),
      cancelOrder: vi.fn(),
      getAccountBalance: vi.fn(async () => {
        throw new Error('boom');
      }),
    };

    const { reason } = await runShell(['6', '7'], ops);

    expect(reason).toBe('user');
    expect(output.text()).toContain('An unexpected error occurred in the main loop: boom\n');
    expect(logger.entries).toContainEqual({
      level: 'warn',
      logger: 'shell',
      message: 'unexpected error in main loop',
      context: { option: 'Check Account Balance', err: 'boom' },
    });
  });

  it('stops when input ends at the menu', async () => {
    const { reason } = await runShell([]);

    expect(reason).toBe('end_of_input');
    expect(logger.entries).toContainEqual({
      level: 'info',
      logger: 'shell',
      message: 'input closed, shutting down',
      context: undefined,
    });
  });

  it('leaves the exit state unchanged', async () => {
    const shell = new InteractiveShell(
      await TradingBot.connect(exchange, createMockLogger()),
      new ScriptedLineSource([]),
      output,
      logger
    );

    await expect(shell.step({ kind: 'exit', reason: 'user' })).resolves.toEqual({ kind: 'exit', reason: 'user' });
  });
});
