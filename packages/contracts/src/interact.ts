/**
 * Buy a cupcake from the deployed vending machine and report the balance
 */

import { http, type Account, type Address, type Hash, type Transport } from 'viem';
import { createScopedLogger, toError, type Logger } from '@cupcake-vending/logger';
import { readArtifacts } from './artifacts.js';
import type { AppConfig } from './config.js';
import type { DeploymentArtifacts } from './schemas.js';
import { VendingMachineClient, classifyContractError, type ContractErrorKind } from './vending-machine.js';

export interface InteractOptions {
  config: AppConfig;
  account: Account;
  /** Defaults to http(config.rpcUrl) */
  transport?: Transport;
  /** Defaults to the records in config.artifactsDir */
  artifacts?: DeploymentArtifacts;
  logger?: Logger;
}

export type InteractResult =
  | {
      success: true;
      address: Address;
      transactionHash: Hash;
      balance: bigint;
    }
  | {
      success: false;
      kind: ContractErrorKind | 'artifacts';
      error: string;
    };

export async function purchaseCupcake(options: InteractOptions): Promise<InteractResult> {
  const { config, account } = options;
  const network = config.network;
  const logger = (options.logger ?? createScopedLogger('interact')).child({ network: network.name });

  let artifacts: DeploymentArtifacts;
  try {
    artifacts = options.artifacts ?? (await readArtifacts(config.artifactsDir));
  } catch (error) {
    const err = toError(error);
    logger.error('Could not load deployment artifacts', err);
    return { success: false, kind: 'artifacts', error: err.message };
  }

  const record = artifacts.address;
  if (record.chainId !== network.chain.id) {
    return {
      success: false,
      kind: 'artifacts',
      error: `Artifacts were written for chain ${record.chainId} (${record.network}) but the configured network is ${network.name} (${network.chain.id}). Redeploy or pick the matching network.`,
    };
  }

  const client = new VendingMachineClient({
    address: record.VendingMachine,
    chain: network.chain,
    transport: options.transport ?? http(config.rpcUrl),
    account,
    confirmations: config.confirmations,
    pollingInterval: config.pollingIntervalMs,
  });

  try {
    logger.info('Requesting a cupcake', { contract: client.address, buyer: account.address });
    const receipt = await client.getCupcake();
    logger.info('Cupcake transaction confirmed', { hash: receipt.hash, blockNumber: receipt.blockNumber });

    const balance = await client.getBalance();
    logger.info('Cupcake balance', { balance });

    return { success: true, address: client.address, transactionHash: receipt.hash, balance };
  } catch (error) {
    const classified = classifyContractError(error);
    if (classified.kind === 'cooldown') {
      logger.warn(classified.message);
    } else {
      logger.error('Cupcake purchase failed', toError(error), { kind: classified.kind });
    }
    return { success: false, kind: classified.kind, error: classified.message };
  }
}
