import type { TradingBot } from '../bot/tradingBot.js';
import type { OperationResult } from '../core/types.js';
import type { FieldReader } from './fields.js';

export type TradingOperations = Pick<
  TradingBot,
  'placeMarketOrder' | 'placeLimitOrder' | 'placeStopLimitOrder' | 'getOrderStatus' | 'cancelOrder' | 'getAccountBalance'
>;

/** A collected request, ready to send. */
export type Dispatch = (bot: TradingOperations) => Promise<OperationResult>;

export interface MenuOption {
  choice: string;
  label: string;
  resultTitle: string;
  collect(fields: FieldReader): Promise<Dispatch>;
}

export const EXIT_CHOICE = '7';

const SYMBOL_PROMPT = 'Enter symbol (e.g., BTCUSDT): ';
const SIDE_PROMPT = 'Enter side (BUY or SELL): ';

export const menuOptions: readonly MenuOption[] = [
  {
    choice: '1',
    label: 'Place Market Order',
    resultTitle: 'Result',
    async collect(fields) {
      const symbol = await fields.text(SYMBOL_PROMPT);
      const side = await fields.side(SIDE_PROMPT);
      const quantity = await fields.float('Enter quantity: ');
      return (bot) => bot.placeMarketOrder({ symbol, side, quantity });
    }
  },
  {
    choice: '2',
    label: 'Place Limit Order',
    resultTitle: 'Result',
    async collect(fields) {
      const symbol = await fields.text(SYMBOL_PROMPT);
      const side = await fields.side(SIDE_PROMPT);
      const quantity = await fields.float('Enter quantity: ');
      const price = await fields.float('Enter limit price: ');
      return (bot) => bot.placeLimitOrder({ symbol, side, quantity, price });
    }
  },
  {
    choice: '3',
    label: 'Place Stop-Limit Order',
    resultTitle: 'Result',
    async collect(fields) {
      const symbol = await fields.text(SYMBOL_PROMPT);
      const side = await fields.side(SIDE_PROMPT);
      const quantity = await fields.float('Enter quantity: ');
      const stopPrice = await fields.float('Enter stop price: ');
      const limitPrice = await fields.float('Enter limit price: ');
      return (bot) => bot.placeStopLimitOrder({ symbol, side, quantity, stopPrice, limitPrice });
    }
  },
  {
    choice: '4',
    label: 'Check Order Status',
    resultTitle: 'Result',
    async collect(fields) {
      const symbol = await fields.text(SYMBOL_PROMPT);
      const orderId = await fields.int('Enter order ID: ');
      return (bot) => bot.getOrderStatus({ symbol, orderId });
    }
  },
  {
    choice: '5',
    label: 'Cancel Order',
    resultTitle: 'Result',
    async collect(fields) {
      const symbol = await fields.text(SYMBOL_PROMPT);
      const orderId = await fields.int('Enter order ID: ');
      return (bot) => bot.cancelOrder({ symbol, orderId });
    }
  },
  {
    choice: '6',
    label: 'Check Account Balance',
    resultTitle: 'Account Balance',
    async collect() {
      return (bot) => bot.getAccountBalance();
    }
  }
];

const RULE = '='.repeat(50);

export const renderMenu = (title: string): string =>
  [
    '',
    RULE,
    title,
    RULE,
    ...menuOptions.map((o) => `${o.choice}. ${o.label}`),
    `${EXIT_CHOICE}. Exit`,
    RULE,
    ''
  ].join('\n');

/** Success payloads as-is, failures as `{ "error": message }`. */
export const renderResult = (title: string, result: OperationResult): string => {
  const body = result.ok ? result.data : { error: result.error };
  return `\n${title}: ${JSON.stringify(body, null, 2)}\n`;
};
