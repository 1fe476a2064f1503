/**
 * Networks the vending machine can be deployed to
 */

import type { Address, Chain, Hash } from 'viem';
import { base, baseSepolia, hardhat, sepolia } from 'viem/chains';

export const NETWORK_NAMES = ['localhost', 'sepolia', 'baseSepolia', 'base'] as const;

export type NetworkName = (typeof NETWORK_NAMES)[number];

export interface NetworkConfig {
  name: NetworkName;
  displayName: string;
  chain: Chain;
  rpcUrl: string;
  explorerUrl?: string;
  faucetUrl?: string;
  testnet: boolean;
}

// ============================================================================
// SUPPORTED NETWORKS
// ============================================================================

export const NETWORKS: Record<NetworkName, NetworkConfig> = {
  // Local node (hardhat node, anvil)
  localhost: {
    name: 'localhost',
    displayName: 'Localhost 8545',
    chain: hardhat,
    rpcUrl: 'http://127.0.0.1:8545',
    testnet: true,
  },
  sepolia: {
    name: 'sepolia',
    displayName: 'Sepolia',
    chain: sepolia,
    rpcUrl: 'https://ethereum-sepolia-rpc.publicnode.com',
    explorerUrl: 'https://sepolia.etherscan.io',
    faucetUrl: 'https://sepoliafaucet.com',
    testnet: true,
  },
  baseSepolia: {
    name: 'baseSepolia',
    displayName: 'Base Sepolia',
    chain: baseSepolia,
    rpcUrl: 'https://sepolia.base.org',
    explorerUrl: 'https://sepolia.basescan.org',
    faucetUrl: 'https://www.alchemy.com/faucets/base-sepolia',
    testnet: true,
  },
  // Mainnet: deploys need an explicit opt-in
  base: {
    name: 'base',
    displayName: 'Base',
    chain: base,
    rpcUrl: 'https://mainnet.base.org',
    explorerUrl: 'https://basescan.org',
    testnet: false,
  },
};

export function isNetworkName(value: string): value is NetworkName {
  return NETWORK_NAMES.some((name) => name === value);
}

export function getNetwork(name: string): NetworkConfig {
  if (!isNetworkName(name)) {
    throw new Error(`Unknown network "${name}". Known networks: ${NETWORK_NAMES.join(', ')}`);
  }
  return NETWORKS[name];
}

export function getNetworkByChainId(chainId: number): NetworkConfig | undefined {
  return Object.values(NETWORKS).find((network) => network.chain.id === chainId);
}

export function explorerAddressUrl(network: NetworkConfig, address: Address): string | undefined {
  return network.explorerUrl ? `${network.explorerUrl}/address/${address}` : undefined;
}

export function explorerTxUrl(network: NetworkConfig, hash: Hash): string | undefined {
  return network.explorerUrl ? `${network.explorerUrl}/tx/${hash}` : undefined;
}
