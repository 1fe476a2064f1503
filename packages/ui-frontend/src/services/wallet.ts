/**
 * Injected wallet connection
 */

import { createWalletClient, custom, getAddress, type Address, type CustomTransport } from 'viem';
import { getNetworkByChainId, type NetworkConfig } from '@cupcake-vending/contracts/chains';
import { VendingMachineClient } from '@cupcake-vending/contracts/client';
import type { DeploymentArtifacts } from '@cupcake-vending/contracts/schemas';
import type { InjectedProvider } from '../types/ethereum.js';
import { logger } from '../utils/logger.js';

export interface WalletSession {
  account: Address;
  client: VendingMachineClient;
}

function walletContext(provider: InjectedProvider, deployment: DeploymentArtifacts) {
  const network = getNetworkByChainId(deployment.address.chainId);
  if (!network) {
    throw new Error(`The contract is deployed on unsupported chain ${deployment.address.chainId}`);
  }

  // wallet prompts must not be retried
  const transport = custom(provider, { retryCount: 0 });
  return { network, transport, walletClient: createWalletClient({ chain: network.chain, transport }) };
}

function sessionFor(
  { network, transport }: { network: NetworkConfig; transport: CustomTransport },
  deployment: DeploymentArtifacts,
  account: Address,
): WalletSession {
  return {
    account,
    client: new VendingMachineClient({
      address: deployment.address.VendingMachine,
      chain: network.chain,
      transport,
      account: { address: account, type: 'json-rpc' },
    }),
  };
}

/**
 * Ask the wallet for an account, move it to the deployment's chain and build a
 * contract client over it.
 */
export async function connectWallet(provider: InjectedProvider, deployment: DeploymentArtifacts): Promise<WalletSession> {
  const context = walletContext(provider, deployment);
  const { network, walletClient } = context;

  const [account] = await walletClient.requestAddresses();
  if (!account) {
    throw new Error('No account authorized in wallet');
  }

  const currentChainId = await walletClient.getChainId();
  if (currentChainId !== network.chain.id) {
    logger.info('Switching wallet network', { from: currentChainId, to: network.chain.id });
    await walletClient.switchChain({ id: network.chain.id });
  }

  return sessionFor(context, deployment, getAddress(account));
}

/**
 * Session for an account the wallet already exposes, without prompting.
 * Null when nothing is authorized yet or the wallet sits on another chain.
 */
export async function restoreWallet(
  provider: InjectedProvider,
  deployment: DeploymentArtifacts,
): Promise<WalletSession | null> {
  const context = walletContext(provider, deployment);
  const { network, walletClient } = context;

  const [account] = await walletClient.getAddresses();
  if (!account) {
    return null;
  }

  if ((await walletClient.getChainId()) !== network.chain.id) {
    return null;
  }

  return sessionFor(context, deployment, getAddress(account));
}

export function formatAddress(address: string): string {
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}
