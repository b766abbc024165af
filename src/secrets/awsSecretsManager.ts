import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import type { SecretsProvider } from './provider.js';

/** Client surface used here, so tests can pass an in-process stand-in. */
export interface SecretsManagerLike {
  send(command: GetSecretValueCommand): Promise<{ SecretString?: string }>;
}

export class AwsSecretsManagerProvider implements SecretsProvider {
  private readonly client: SecretsManagerLike;

  constructor(region: string, private readonly env: NodeJS.ProcessEnv, client?: SecretsManagerLike) {
    this.client = client ?? new SecretsManagerClient({ region });
  }

  async getSecret(secretId: string, fallbackEnvName?: string): Promise<string> {
    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }));
      const secretString = response.SecretString;
      if (!secretString) {
        throw new Error(`Secret ${secretId} is empty`);
      }
      return unwrapSecretValue(secretString);
    } catch (err) {
      const fallback = fallbackEnvName ? this.env[fallbackEnvName] : undefined;
      if (fallback) {
        return fallback.trim();
      }
      throw new ConfigurationError(`Unable to read secret ${secretId}: ${errorMessage(err)}`, { secretId });
    }
  }
}

/** Secrets may be stored raw or as `{"value": "..."}`. */
const unwrapSecretValue = (secretString: string): string => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch {
    return secretString.trim();
  }
  if (typeof parsed === 'object' && parsed !== null && 'value' in parsed) {
    const { value } = parsed;
    if (typeof value === 'string' && value.length > 0) return value.trim();
  }
  return secretString.trim();
};
