import type { AppConfig } from '../config/types.js';
import { ConfigurationError } from '../core/errors.js';
import type { Credentials } from '../core/types.js';
import { AwsSecretsManagerProvider } from './awsSecretsManager.js';
import { EnvFallbackSecretsProvider } from './envFallback.js';

export interface SecretsProvider {
  getSecret(secretId: string, fallbackEnvName?: string): Promise<string>;
}

export const buildSecretsProvider = (config: AppConfig, env: NodeJS.ProcessEnv = process.env): SecretsProvider => {
  if (config.secrets.provider === 'aws') {
    return new AwsSecretsManagerProvider(config.secrets.awsRegion, env);
  }
  return new EnvFallbackSecretsProvider(env);
};

const PLACEHOLDER_PATTERNS = [/^YOUR_.*_HERE$/i, /^<.*>$/, /^changeme$/i, /^replace[-_]?me$/i, /^x+$/i];

/** True for empty values and the stand-ins shipped in `.env.example`. */
export const isPlaceholderSecret = (value: string): boolean => {
  const trimmed = value.trim();
  return trimmed === '' || PLACEHOLDER_PATTERNS.some((p) => p.test(trimmed));
};

export const resolveCredentials = async (config: AppConfig, secrets: SecretsProvider): Promise<Credentials> => {
  const apiKey = await secrets.getSecret(config.secrets.secretIds.binanceKey, 'BINANCE_API_KEY');
  const apiSecret = await secrets.getSecret(config.secrets.secretIds.binanceSecret, 'BINANCE_API_SECRET');

  const unset = [
    ...(isPlaceholderSecret(apiKey) ? ['BINANCE_API_KEY'] : []),
    ...(isPlaceholderSecret(apiSecret) ? ['BINANCE_API_SECRET'] : [])
  ];
  if (unset.length > 0) {
    throw new ConfigurationError(`API credentials not set: ${unset.join(', ')}`, { unset });
  }

  return Object.freeze({ apiKey, apiSecret, testnet: config.exchange.testnet });
};
