import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError, errorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Same sinks, entries tagged with `name`. */
  child(name: string): Logger;
  /** Flush and release the file sink. Safe to call more than once. */
  close(): Promise<void>;
}

export interface LogSink {
  write(line: string): void;
  close?(): Promise<void>;
}

export const streamSink = (stream: NodeJS.WritableStream): LogSink => ({
  write: (line) => {
    stream.write(line);
  }
});

/**
 * Append-only file sink. The file is opened up front so an unusable path throws here; a write
 * error later on disables the sink and is passed to `onError`.
 */
export const fileSink = (filePath: string, onError?: (err: Error) => void): Required<LogSink> => {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  const fd = fs.openSync(filePath, 'a');
  const stream = fs.createWriteStream(filePath, { fd, encoding: 'utf8' });
  let failed = false;
  stream.on('error', (err) => {
    if (failed) return;
    failed = true;
    onError?.(err);
  });

  let closed: Promise<void> | undefined;
  return {
    write: (line) => {
      if (!closed && !failed) stream.write(line);
    },
    close: () => {
      closed ??= new Promise<void>((resolve) => {
        if (failed || stream.destroyed) {
          resolve();
          return;
        }
        stream.once('error', () => resolve());
        stream.end(() => resolve());
      });
      return closed;
    }
  };
};

export class JsonLogger implements Logger {
  constructor(
    private readonly name: string,
    private readonly sinks: LogSink[],
    private readonly minLevel: LogLevel = 'info'
  ) {}

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) return;
    const entry = {
      ts: new Date().toISOString(),
      level,
      logger: this.name,
      message,
      ...context
    };
    // Avoid passing secrets into logs from higher-level callers.
    const line = `${JSON.stringify(entry)}\n`;
    for (const sink of this.sinks) sink.write(line);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  child(name: string): Logger {
    return new JsonLogger(`${this.name}.${name}`, this.sinks, this.minLevel);
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.close?.()));
  }
}

/**
 * Console (stderr) plus the optional append-only log file.
 * @throws ConfigurationError when the log file cannot be opened
 */
export const createLogger = (opts: { name: string; level: LogLevel; file?: string }): JsonLogger => {
  const stderr = streamSink(process.stderr);
  const sinks: LogSink[] = [stderr];
  if (opts.file) {
    const file = opts.file;
    const reportFailure = (err: Error): void => {
      stderr.write(
        `${JSON.stringify({
          ts: new Date().toISOString(),
          level: 'error',
          logger: opts.name,
          message: 'log file disabled after write error',
          file,
          err: err.message
        })}\n`
      );
    };
    try {
      sinks.push(fileSink(file, reportFailure));
    } catch (err) {
      throw new ConfigurationError(`Unable to open log file ${file}: ${errorMessage(err)}`, { file });
    }
  }
  return new JsonLogger(opts.name, sinks, opts.level);
};
