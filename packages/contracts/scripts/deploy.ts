#!/usr/bin/env node
/**
 * Deploy VendingMachine.sol and write the frontend artifacts
 */

import { privateKeyToAccount } from 'viem/accounts';
import { createScopedLogger, generateCorrelationId, toError } from '@cupcake-vending/logger';
import { parseCliArgs } from '../src/cli-args.js';
import { loadConfig, loadEnvFile, requirePrivateKey } from '../src/config.js';
import { deployVendingMachine } from '../src/deploy.js';

const HELP = `
Deploy the cupcake vending machine

Usage:
  npm run deploy -- [options]

Options:
  --network NAME      localhost | sepolia | baseSepolia | base (default: $NETWORK or localhost)
  --rpc-url URL       Override the network's RPC endpoint
  --out-dir DIR       Where to write contract-address.json and VendingMachine.json
  --allow-mainnet     Required to deploy to a mainnet
  --help, -h          Show this help message

Configuration:
  Set DEPLOYER_PRIVATE_KEY in .env (see .env.example)
`;

async function main(): Promise<void> {
  const logger = createScopedLogger('deploy').child({ correlationId: generateCorrelationId() });

  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      console.log(HELP);
      return;
    }

    loadEnvFile();
    const config = loadConfig({ overrides: args.overrides });
    const account = privateKeyToAccount(requirePrivateKey(config));

    const result = await deployVendingMachine({
      config,
      account,
      allowMainnet: args.allowMainnet,
      logger,
    });

    if (!result.success) {
      logger.error('Deployment failed', new Error(result.error));
      process.exitCode = 1;
      return;
    }

    console.log('\n=== VendingMachine deployed ===');
    console.log(`Network:      ${config.network.displayName} (${config.network.chain.id})`);
    console.log(`Address:      ${result.address}`);
    console.log(`Transaction:  ${result.transactionHash}`);
    console.log(`Block:        ${result.blockNumber}`);
    if (result.explorerUrl) {
      console.log(`Explorer:     ${result.explorerUrl}`);
    }
    console.log(`Artifacts:    ${result.artifactPaths.addressPath}`);
    console.log(`              ${result.artifactPaths.abiPath}`);
  } catch (error) {
    logger.error('Deployment failed', toError(error));
    process.exitCode = 1;
  }
}

void main();
