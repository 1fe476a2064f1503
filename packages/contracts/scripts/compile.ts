#!/usr/bin/env node
/**
 * Compile VendingMachine.sol and print the ABI, without deploying
 */

import { createScopedLogger, toError } from '@cupcake-vending/logger';
import { compileContract } from '../src/compiler.js';

const logger = createScopedLogger('compile');

async function main(): Promise<void> {
  const result = await compileContract();

  if (!result.success) {
    logger.error('Compilation failed', new Error(result.error));
    process.exitCode = 1;
    return;
  }

  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  logger.info('Compiled', { contract: result.contractName, bytecodeBytes: (result.bytecode.length - 2) / 2 });
  console.log(JSON.stringify(result.abi, null, 2));
}

main().catch((error: unknown) => {
  logger.error('Compilation failed', toError(error));
  process.exitCode = 1;
});
