import readline from 'node:readline';

/** Raised by a {@link LineSource} once its input has closed. */
export class EndOfInputError extends Error {
  constructor() {
    super('end of input');
    this.name = 'EndOfInputError';
  }
}

export interface ShellOutput {
  write(text: string): void;
}

export interface LineSource {
  /** Show `prompt` and wait for the next line. Rejects with EndOfInputError after input closes. */
  readLine(prompt: string): Promise<string>;
  close(): void;
}

export class ReadlineSource implements LineSource {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterableIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: ShellOutput = process.stdout
  ) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(prompt: string): Promise<string> {
    this.output.write(prompt);
    const next = await this.lines.next();
    if (next.done) throw new EndOfInputError();
    return next.value;
  }

  close(): void {
    this.rl.close();
  }
}
