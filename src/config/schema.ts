import { z } from 'zod';

const TRUE_FLAGS: readonly string[] = ['1', 'true', 'yes', 'on'];
const FALSE_FLAGS: readonly string[] = ['0', 'false', 'no', 'off'];

// Unrecognised values are rejected rather than read as false.
const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => v === '' || TRUE_FLAGS.includes(v) || FALSE_FLAGS.includes(v), {
    message: 'expected one of true/false, 1/0, yes/no, on/off'
  })
  .optional();

const parseBoolean = (v: string | undefined, fallback: boolean): boolean =>
  v === undefined || v === '' ? fallback : TRUE_FLAGS.includes(v);

const parseNumber = (v: unknown, fallback: number): number => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FILE: z.string().default('trading_bot.log'),

  BINANCE_TESTNET: booleanFlag,
  BINANCE_BASE_URL: z.string().url().optional(),
  BINANCE_RECV_WINDOW_MS: z.coerce.number().int().positive().max(60000).default(5000),
  HTTP_TIMEOUT_MS: z.string().optional(),

  SECRETS_PROVIDER: z.enum(['env', 'aws']).default('env'),
  AWS_REGION: z.string().default('us-east-1'),
  SECRET_ID_BINANCE_KEY: z.string().default('testnet/futures/binance/key'),
  SECRET_ID_BINANCE_SECRET: z.string().default('testnet/futures/binance/secret')
});

export const configSchema = rawSchema.transform((raw) => ({
  nodeEnv: raw.NODE_ENV,
  logLevel: raw.LOG_LEVEL,
  logFile: raw.LOG_FILE.trim() === '' ? undefined : raw.LOG_FILE.trim(),

  exchange: {
    testnet: parseBoolean(raw.BINANCE_TESTNET, true),
    baseUrl: raw.BINANCE_BASE_URL,
    recvWindowMs: raw.BINANCE_RECV_WINDOW_MS,
    // 0 leaves axios without a timeout
    timeoutMs: Math.max(0, parseNumber(raw.HTTP_TIMEOUT_MS, 0))
  },

  secrets: {
    provider: raw.SECRETS_PROVIDER,
    awsRegion: raw.AWS_REGION,
    secretIds: {
      binanceKey: raw.SECRET_ID_BINANCE_KEY,
      binanceSecret: raw.SECRET_ID_BINANCE_SECRET
    }
  }
}));
