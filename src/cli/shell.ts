import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { OperationResult } from '../core/types.js';
import { FieldReader } from './fields.js';
import { EndOfInputError, type LineSource, type ShellOutput } from './lineSource.js';
import {
  EXIT_CHOICE,
  menuOptions,
  renderMenu,
  renderResult,
  type Dispatch,
  type MenuOption,
  type TradingOperations
} from './menu.js';

export type ShellExitReason = 'user' | 'end_of_input';

export type ShellState =
  | { kind: 'menu' }
  | { kind: 'collect'; option: MenuOption }
  | { kind: 'dispatch'; option: MenuOption; call: Dispatch }
  | { kind: 'result'; option: MenuOption; result: OperationResult }
  | { kind: 'exit'; reason: ShellExitReason };

export interface ShellOptions {
  title?: string;
}

export class InteractiveShell {
  private readonly fields: FieldReader;
  private readonly title: string;

  constructor(
    private readonly bot: TradingOperations,
    private readonly input: LineSource,
    private readonly output: ShellOutput,
    private readonly logger: Logger,
    options: ShellOptions = {}
  ) {
    this.fields = new FieldReader(input, output);
    this.title = options.title ?? 'BINANCE FUTURES TESTNET BOT';
  }

  /** Loop until the user picks Exit or input ends. */
  async run(): Promise<ShellExitReason> {
    let state: ShellState = { kind: 'menu' };
    for (;;) {
      state = await this.step(state);
      if (state.kind === 'exit') return state.reason;
    }
  }

  async step(state: ShellState): Promise<ShellState> {
    try {
      switch (state.kind) {
        case 'menu':
          return await this.showMenu();
        case 'collect':
          return { kind: 'dispatch', option: state.option, call: await state.option.collect(this.fields) };
        case 'dispatch':
          return await this.dispatch(state.option, state.call);
        case 'result':
          this.output.write(renderResult(state.option.resultTitle, state.result));
          return { kind: 'menu' };
        case 'exit':
          return state;
      }
    } catch (err) {
      if (err instanceof EndOfInputError) {
        this.output.write('\n');
        this.logger.info('input closed, shutting down');
        return { kind: 'exit', reason: 'end_of_input' };
      }
      throw err;
    }
  }

  private async showMenu(): Promise<ShellState> {
    this.output.write(renderMenu(this.title));
    const choice = (await this.input.readLine('Enter your choice (1-7): ')).trim();

    if (choice === EXIT_CHOICE) {
      this.output.write('Exiting bot...\n');
      this.logger.info('bot shutdown by user');
      return { kind: 'exit', reason: 'user' };
    }

    const option = menuOptions.find((o) => o.choice === choice);
    if (!option) {
      this.output.write('Invalid choice. Please select 1-7\n');
      return { kind: 'menu' };
    }
    return { kind: 'collect', option };
  }

  private async dispatch(option: MenuOption, call: Dispatch): Promise<ShellState> {
    try {
      return { kind: 'result', option, result: await call(this.bot) };
    } catch (err) {
      this.output.write(`An unexpected error occurred in the main loop: ${errorMessage(err)}\n`);
      this.logger.warn('unexpected error in main loop', { option: option.label, err: errorMessage(err) });
      return { kind: 'menu' };
    }
  }
}
