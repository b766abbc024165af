#!/usr/bin/env tsx
import { defaultExchange } from '../src/app.js';
import { loadConfig } from '../src/config/load.js';
import { resolveCredentials, buildSecretsProvider } from '../src/secrets/provider.js';

async function main() {
  const config = loadConfig();
  const credentials = await resolveCredentials(config, buildSecretsProvider(config));
  const adapter = defaultExchange(credentials, config);

  const { serverTime } = await adapter.getServerTime();
  console.log(`Server time: ${new Date(serverTime).toISOString()} (testnet: ${credentials.testnet})`);

  const balances = await adapter.getAccountBalance();
  console.log(JSON.stringify(balances, null, 2));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
