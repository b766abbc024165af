import type { ConnectivityError } from '../core/errors.js';

const RULE = '='.repeat(50);

export const missingCredentialsHelp = (consoleUrl: string, unset: readonly string[]): string =>
  [
    RULE,
    `ERROR: Please set ${unset.join(' and ')} (environment, .env or secrets provider)`,
    '',
    'STEPS TO FIX:',
    `1. Go to: ${consoleUrl}`,
    '2. Login and go to API Key Management',
    "3. Generate NEW API Key with 'Enable Futures' CHECKED",
    '4. If setting IP restrictions, whitelist your current IP',
    '5. Put the new keys in .env as BINANCE_API_KEY and BINANCE_API_SECRET',
    RULE,
    ''
  ].join('\n');

export const connectivityHelp = (err: ConnectivityError): string =>
  [
    '',
    RULE,
    'Failed to initialize bot. Please check:',
    "1. API key has 'Enable Futures' permission",
    '2. Your IP is whitelisted (if you set restrictions)',
    '3. You are using keys from the same environment as BINANCE_TESTNET',
    RULE,
    '',
    `Error: ${err.message}`,
    ''
  ].join('\n');
