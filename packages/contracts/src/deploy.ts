/**
 * Deploy the vending machine
 *
 * Compiles VendingMachine.sol, deploys it with viem and writes the address and
 * ABI records where the frontend picks them up.
 */

import {
  createPublicClient,
  createWalletClient,
  formatEther,
  http,
  type Account,
  type Address,
  type Hash,
  type Transport,
} from 'viem';
import { createScopedLogger, toError, type Logger } from '@cupcake-vending/logger';
import { compileContract } from './compiler.js';
import { writeArtifacts, type ArtifactPaths } from './artifacts.js';
import { explorerAddressUrl } from './chains.js';
import type { AppConfig } from './config.js';
import { CONTRACT_NAME, type DeploymentArtifacts } from './schemas.js';
import { classifyContractError } from './vending-machine.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DeployOptions {
  config: AppConfig;
  account: Account;
  /** Defaults to http(config.rpcUrl) */
  transport?: Transport;
  allowMainnet?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export type DeployResult =
  | {
      success: true;
      address: Address;
      deployer: Address;
      transactionHash: Hash;
      blockNumber: bigint;
      explorerUrl?: string;
      artifactPaths: ArtifactPaths;
    }
  | {
      success: false;
      error: string;
    };

// ============================================================================
// DEPLOYMENT
// ============================================================================

export async function deployVendingMachine(options: DeployOptions): Promise<DeployResult> {
  const { config, account } = options;
  const network = config.network;
  const logger = (options.logger ?? createScopedLogger('deploy')).child({ network: network.name });
  const now = options.now ?? (() => new Date());

  if (!network.testnet && !options.allowMainnet) {
    return {
      success: false,
      error: `${network.displayName} is a mainnet. Pass --allow-mainnet to deploy there.`,
    };
  }

  try {
    logger.info('Compiling contract', { contract: CONTRACT_NAME });
    const compiled = await compileContract();
    if (!compiled.success) {
      return { success: false, error: compiled.error };
    }
    for (const warning of compiled.warnings) {
      logger.warn(warning);
    }

    const transport = options.transport ?? http(config.rpcUrl);
    const publicClient = createPublicClient({
      chain: network.chain,
      transport,
      pollingInterval: config.pollingIntervalMs,
    });
    const walletClient = createWalletClient({
      account,
      chain: network.chain,
      transport,
      pollingInterval: config.pollingIntervalMs,
    });

    // Check deployer balance
    const balance = await publicClient.getBalance({ address: account.address });
    const currency = network.chain.nativeCurrency.symbol;
    logger.info('Deployer balance', { deployer: account.address, balance: `${formatEther(balance)} ${currency}` });

    if (balance === 0n) {
      const faucet = network.faucetUrl ? ` Get testnet tokens from ${network.faucetUrl}` : '';
      return {
        success: false,
        error: `Deployer wallet ${account.address} has 0 ${currency}.${faucet}`,
      };
    }

    const hash = await walletClient.deployContract({
      abi: compiled.abi,
      bytecode: compiled.bytecode,
    });
    logger.info('Deployment transaction sent', { hash });

    const receipt = await publicClient.waitForTransactionReceipt({
      hash,
      confirmations: config.confirmations,
      pollingInterval: config.pollingIntervalMs,
    });

    const contractAddress = receipt.contractAddress;
    if (receipt.status !== 'success' || !contractAddress) {
      return {
        success: false,
        error: 'Contract deployment failed: no contract address in receipt',
      };
    }

    const artifacts: DeploymentArtifacts = {
      address: {
        VendingMachine: contractAddress,
        chainId: network.chain.id,
        network: network.name,
        deployer: account.address,
        transactionHash: hash,
        blockNumber: receipt.blockNumber.toString(),
        deployedAt: now().toISOString(),
      },
      abi: {
        contractName: CONTRACT_NAME,
        abi: compiled.abi,
      },
    };

    const artifactPaths = await writeArtifacts(config.artifactsDir, artifacts);
    const explorerUrl = explorerAddressUrl(network, contractAddress);

    logger.info('Contract deployed', {
      address: contractAddress,
      blockNumber: receipt.blockNumber,
      artifacts: config.artifactsDir,
    });

    return {
      success: true,
      address: contractAddress,
      deployer: account.address,
      transactionHash: hash,
      blockNumber: receipt.blockNumber,
      explorerUrl,
      artifactPaths,
    };
  } catch (error) {
    logger.error('Deployment failed', toError(error));
    return {
      success: false,
      error: classifyContractError(error).message,
    };
  }
}
