import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  if (env === process.env) {
    dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || '.env' });
  }
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Config validation failed: ${details}`);
  }
  return parsed.data;
};
