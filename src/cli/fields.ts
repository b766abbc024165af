import type { OrderSide } from '../core/types.js';
import type { LineSource, ShellOutput } from './lineSource.js';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER = /^[+-]?\d+$/;

export const parseFloatField = (raw: string): number | undefined => {
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
};

export const parseIntField = (raw: string): number | undefined => {
  const trimmed = raw.trim();
  if (!INTEGER.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : undefined;
};

export const parseSideField = (raw: string): OrderSide | undefined => {
  const upper = raw.trim().toUpperCase();
  return upper === 'BUY' || upper === 'SELL' ? upper : undefined;
};

/** Prompts for typed values, asking again until the line parses. */
export class FieldReader {
  constructor(
    private readonly input: LineSource,
    private readonly output: ShellOutput
  ) {}

  async text(prompt: string): Promise<string> {
    return (await this.input.readLine(prompt)).trim();
  }

  side(prompt: string): Promise<OrderSide> {
    return this.ask(prompt, 'side (BUY or SELL)', parseSideField);
  }

  float(prompt: string): Promise<number> {
    return this.ask(prompt, 'float', parseFloatField);
  }

  int(prompt: string): Promise<number> {
    return this.ask(prompt, 'int', parseIntField);
  }

  private async ask<T>(prompt: string, kind: string, parse: (raw: string) => T | undefined): Promise<T> {
    for (;;) {
      const value = parse(await this.input.readLine(prompt));
      if (value !== undefined) return value;
      this.output.write(`Invalid input. Please enter a valid ${kind}.\n`);
    }
  }
}
