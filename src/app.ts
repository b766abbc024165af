import { TradingBot } from './bot/tradingBot.js';
import { connectivityHelp, missingCredentialsHelp } from './cli/guidance.js';
import { ReadlineSource, type LineSource, type ShellOutput } from './cli/lineSource.js';
import { InteractiveShell } from './cli/shell.js';
import { loadConfig } from './config/load.js';
import type { AppConfig } from './config/types.js';
import { ConfigurationError, ConnectivityError, errorMessage } from './core/errors.js';
import { createLogger, type Logger } from './core/logger.js';
import type { Credentials } from './core/types.js';
import type { FuturesExchangeAdapter } from './exchanges/adapter.js';
import { BinanceFuturesAdapter } from './exchanges/binance/adapter.js';
import { resolveBaseUrl } from './exchanges/binance/endpoints.js';
import { buildSecretsProvider, resolveCredentials, type SecretsProvider } from './secrets/provider.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/** Seams for swapping the process-bound collaborators in tests. */
export interface AppDeps {
  env?: NodeJS.ProcessEnv;
  output?: ShellOutput;
  createLogger?: (config: AppConfig) => Logger;
  createSecrets?: (config: AppConfig) => SecretsProvider;
  createExchange?: (credentials: Credentials, config: AppConfig) => FuturesExchangeAdapter;
  createInput?: () => LineSource;
}

export const defaultExchange = (credentials: Credentials, config: AppConfig): FuturesExchangeAdapter =>
  new BinanceFuturesAdapter(
    { apiKey: credentials.apiKey, apiSecret: credentials.apiSecret },
    {
      testnet: credentials.testnet,
      baseUrl: config.exchange.baseUrl,
      recvWindowMs: config.exchange.recvWindowMs,
      timeoutMs: config.exchange.timeoutMs
    }
  );

/** Wire everything together, run the menu, and return the process exit code. */
export const run = async (deps: AppDeps = {}): Promise<number> => {
  const env = deps.env ?? process.env;
  const output = deps.output ?? process.stdout;

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    output.write(`${errorMessage(err)}\n`);
    return EXIT_FAILURE;
  }

  let rootLogger: Logger;
  try {
    rootLogger =
      deps.createLogger?.(config) ?? createLogger({ name: 'futures-bot', level: config.logLevel, file: config.logFile });
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    output.write(`${err.message}\n`);
    return EXIT_FAILURE;
  }
  const logger = rootLogger.child('app');

  try {
    let credentials: Credentials;
    try {
      const secrets = deps.createSecrets?.(config) ?? buildSecretsProvider(config, env);
      credentials = await resolveCredentials(config, secrets);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      const reported = err.details?.unset;
      const unset = Array.isArray(reported)
        ? reported.filter((v): v is string => typeof v === 'string')
        : ['BINANCE_API_KEY', 'BINANCE_API_SECRET'];
      const consoleUrl = resolveBaseUrl({ testnet: config.exchange.testnet, baseUrl: config.exchange.baseUrl });
      output.write(missingCredentialsHelp(consoleUrl, unset));
      logger.error('API keys not set. Exiting.', { err: err.message });
      return EXIT_FAILURE;
    }

    const exchange = (deps.createExchange ?? defaultExchange)(credentials, config);
    logger.info('bot initialized', { testnet: credentials.testnet });

    let bot: TradingBot;
    try {
      bot = await TradingBot.connect(exchange, rootLogger.child('bot'));
    } catch (err) {
      if (!(err instanceof ConnectivityError)) throw err;
      output.write(connectivityHelp(err));
      logger.error('error during bot initialization', { reason: err.reason, err: err.message });
      return EXIT_FAILURE;
    }

    const input = deps.createInput?.() ?? new ReadlineSource(process.stdin, output);
    try {
      const shell = new InteractiveShell(bot, input, output, rootLogger.child('shell'), {
        title: credentials.testnet ? 'BINANCE FUTURES TESTNET BOT' : 'BINANCE FUTURES BOT'
      });
      const reason = await shell.run();
      logger.info('shell stopped', { reason });
      return EXIT_OK;
    } finally {
      input.close();
    }
  } finally {
    await rootLogger.close();
  }
};
