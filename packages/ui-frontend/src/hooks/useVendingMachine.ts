import { useEffect } from 'react';
import { skipToken, useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import { toast } from 'react-hot-toast';
import type { Address } from 'viem';
import { toError } from '@cupcake-vending/logger';
import { classifyContractError } from '@cupcake-vending/contracts/client';
import type { DeploymentArtifacts } from '@cupcake-vending/contracts/schemas';
import { loadDeployment } from '../services/deployment.js';
import { connectWallet, restoreWallet, type WalletSession } from '../services/wallet.js';
import type { InjectedProvider } from '../types/ethereum.js';
import { logger } from '../utils/logger.js';

export interface UseVendingMachineOptions {
  provider?: InjectedProvider;
  loadDeployment?: () => Promise<DeploymentArtifacts>;
}

export interface VendingMachineState {
  deployment?: DeploymentArtifacts;
  deploymentError: Error | null;
  isLoadingDeployment: boolean;
  account?: Address;
  balance?: bigint;
  isPending: boolean;
  getCupcake: () => void;
}

interface PurchaseInput {
  deployment: DeploymentArtifacts;
  session: WalletSession | null;
}

const DEPLOYMENT_KEY = ['vending-machine-deployment'] as const;
const SESSION_KEY = ['wallet-session'] as const;
const BALANCE_KEY = ['cupcake-balance'] as const;

/**
 * Wallet connection, purchase and balance for the cupcake button.
 *
 * An account the wallet already exposes is picked up without a prompt; the
 * first click otherwise requests access. The session follows the wallet's
 * `accountsChanged` event. All purchase failures end in one toast.
 */
export function useVendingMachine({ provider, loadDeployment: load = loadDeployment }: UseVendingMachineOptions): VendingMachineState {
  const queryClient = useQueryClient();

  const deploymentQuery = useQuery({
    queryKey: DEPLOYMENT_KEY,
    queryFn: () => load(),
    staleTime: Infinity,
  });
  const deployment = deploymentQuery.data;
  const contract = deployment?.address.VendingMachine;

  const sessionQuery = useQuery({
    queryKey: [...SESSION_KEY, contract],
    queryFn: provider && deployment ? () => restoreWallet(provider, deployment) : skipToken,
    staleTime: Infinity,
  });
  const session = sessionQuery.data ?? null;

  const balanceQuery = useQuery({
    queryKey: [...BALANCE_KEY, contract, session?.account],
    queryFn: session ? () => session.client.getBalance() : skipToken,
  });

  useEffect(() => {
    const wallet = provider;
    if (!wallet?.on) return;

    const onAccountsChanged = (accounts: string[]) => {
      logger.info('Wallet accounts changed', { account: accounts[0] ?? 'none' });
      queryClient.invalidateQueries({ queryKey: SESSION_KEY }).catch((error: unknown) => {
        logger.error('Could not refresh wallet session', toError(error));
      });
    };

    wallet.on('accountsChanged', onAccountsChanged);
    return () => {
      wallet.removeListener?.('accountsChanged', onAccountsChanged);
    };
  }, [provider, queryClient]);

  const purchase = useMutation({
    mutationFn: async ({ deployment: target, session: current }: PurchaseInput) => {
      if (!provider) {
        throw new Error('No wallet found. Install a browser wallet to buy cupcakes.');
      }

      let active = current;
      if (!active) {
        active = await connectWallet(provider, target);
        queryClient.setQueryData([...SESSION_KEY, target.address.VendingMachine], active);
      }

      const receipt = await active.client.getCupcake();
      logger.info('Cupcake purchased', { hash: receipt.hash, blockNumber: receipt.blockNumber });
      return receipt;
    },
    onSuccess: async () => {
      toast.success('Cupcake dispensed!');
      await queryClient.invalidateQueries({ queryKey: BALANCE_KEY });
    },
    onError: (error) => {
      const classified = classifyContractError(error);
      logger.warn('Cupcake purchase failed', { kind: classified.kind, reason: error.message });
      toast.error(classified.message);
    },
  });

  return {
    deployment,
    deploymentError: deploymentQuery.error,
    isLoadingDeployment: deploymentQuery.isPending,
    account: session?.account,
    balance: balanceQuery.data,
    isPending: purchase.isPending,
    getCupcake: () => {
      if (deployment && !purchase.isPending) {
        purchase.mutate({ deployment, session });
      }
    },
  };
}
