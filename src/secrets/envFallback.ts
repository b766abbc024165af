import { ConfigurationError } from '../core/errors.js';
import type { SecretsProvider } from './provider.js';

const fallbackMap: Record<string, string> = {
  'testnet/futures/binance/key': 'BINANCE_API_KEY',
  'testnet/futures/binance/secret': 'BINANCE_API_SECRET'
};

export class EnvFallbackSecretsProvider implements SecretsProvider {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  async getSecret(secretId: string, fallbackEnvName?: string): Promise<string> {
    const envKey = fallbackEnvName ?? fallbackMap[secretId];
    const value = envKey ? this.env[envKey] : undefined;
    if (!value) {
      throw new ConfigurationError(`Missing secret in env fallback for ${secretId} (env var: ${envKey})`, {
        secretId
      });
    }
    return value.trim();
  }
}
