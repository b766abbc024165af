#!/usr/bin/env tsx
// Usage: npm run check:order -- BTCUSDT 123456789
import { defaultExchange } from '../src/app.js';
import { loadConfig } from '../src/config/load.js';
import { parseIntField } from '../src/cli/fields.js';
import { resolveCredentials, buildSecretsProvider } from '../src/secrets/provider.js';

async function main() {
  const [symbol, rawOrderId] = process.argv.slice(2);
  const orderId = rawOrderId === undefined ? undefined : parseIntField(rawOrderId);
  if (!symbol || orderId === undefined) {
    throw new Error('usage: check-order <SYMBOL> <ORDER_ID>');
  }

  const config = loadConfig();
  const credentials = await resolveCredentials(config, buildSecretsProvider(config));
  const adapter = defaultExchange(credentials, config);

  const order = await adapter.getOrder(symbol, orderId);
  console.log(JSON.stringify(order, null, 2));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
