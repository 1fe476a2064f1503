import type { Address } from 'viem';
import { VENDING_MACHINE_ABI } from '@cupcake-vending/contracts/client';
import type { DeploymentArtifacts } from '@cupcake-vending/contracts/schemas';

export function deploymentFor(address: Address, chainId = 31337): DeploymentArtifacts {
  return {
    address: {
      VendingMachine: address,
      chainId,
      network: chainId === 31337 ? 'localhost' : 'sepolia',
      deployer: '0x1000000000000000000000000000000000000001',
      transactionHash: `0x${'cd'.repeat(32)}`,
      blockNumber: '1',
      deployedAt: '2026-05-06T07:08:09.000Z',
    },
    abi: { contractName: 'VendingMachine', abi: [...VENDING_MACHINE_ABI] },
  };
}
