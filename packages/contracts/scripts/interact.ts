#!/usr/bin/env node
/**
 * Buy one cupcake from the deployed vending machine and print the balance
 */

import { privateKeyToAccount } from 'viem/accounts';
import { createScopedLogger, generateCorrelationId, toError } from '@cupcake-vending/logger';
import { parseCliArgs } from '../src/cli-args.js';
import { loadConfig, loadEnvFile, requirePrivateKey } from '../src/config.js';
import { purchaseCupcake } from '../src/interact.js';

const HELP = `
Get a cupcake from the deployed vending machine

Usage:
  npm run interact -- [options]

Options:
  --network NAME        localhost | sepolia | baseSepolia | base (default: $NETWORK or localhost)
  --rpc-url URL         Override the network's RPC endpoint
  --artifacts-dir DIR   Where deploy wrote contract-address.json and VendingMachine.json
  --help, -h            Show this help message
`;

async function main(): Promise<void> {
  const logger = createScopedLogger('interact').child({ correlationId: generateCorrelationId() });

  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      console.log(HELP);
      return;
    }

    loadEnvFile();
    const config = loadConfig({ overrides: args.overrides });
    const account = privateKeyToAccount(requirePrivateKey(config));

    const result = await purchaseCupcake({ config, account, logger });
    if (!result.success) {
      process.exitCode = 1;
      return;
    }

    console.log(`Cupcake balance: ${result.balance}`);
  } catch (error) {
    logger.error('Interaction failed', toError(error));
    process.exitCode = 1;
  }
}

void main();
