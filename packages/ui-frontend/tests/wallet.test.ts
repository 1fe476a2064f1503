import { describe, it, expect } from 'vitest';
import { createFakeChain } from '@cupcake-vending/contracts/testing';
import { connectWallet, formatAddress, restoreWallet } from '../src/services/wallet.js';
import { deploymentFor } from './fixtures.js';

describe('connectWallet', () => {
  it('returns the first authorized account and a working contract client', async () => {
    const chain = createFakeChain();
    const contract = chain.deployVendingMachine();

    const session = await connectWallet(chain, deploymentFor(contract));

    expect(session.account).toBe(chain.accounts[0]);
    expect(session.client.address).toBe(contract);
    expect(await session.client.getBalance()).toBe(0n);
    expect(chain.countRequests('wallet_switchEthereumChain')).toBe(0);
  });

  it('switches the wallet to the deployment chain', async () => {
    const chain = createFakeChain({ switchableChainIds: [11155111] });
    const contract = chain.deployVendingMachine();

    await connectWallet(chain, deploymentFor(contract, 11155111));

    expect(chain.chainId).toBe(11155111);
    expect(chain.countRequests('wallet_switchEthereumChain')).toBe(1);
  });

  it('fails when the wallet cannot switch', async () => {
    const chain = createFakeChain();
    const contract = chain.deployVendingMachine();

    await expect(connectWallet(chain, deploymentFor(contract, 11155111))).rejects.toThrow();
    expect(chain.chainId).toBe(31337);
  });

  it('fails when no account is authorized', async () => {
    const chain = createFakeChain({ accounts: [] });

    await expect(connectWallet(chain, deploymentFor('0x5FbDB2315678afecb367f032d93F642f64180aa3'))).rejects.toThrow(
      'No account authorized in wallet',
    );
  });

  it('rejects deployments on unknown chains', async () => {
    const chain = createFakeChain();

    await expect(connectWallet(chain, deploymentFor('0x5FbDB2315678afecb367f032d93F642f64180aa3', 999))).rejects.toThrow(
      'The contract is deployed on unsupported chain 999',
    );
    expect(chain.requests).toEqual([]);
  });
});

describe('restoreWallet', () => {
  it('picks up the selected account without prompting', async () => {
    const chain = createFakeChain();
    const contract = chain.deployVendingMachine();
    chain.switchAccount(chain.accounts[1]);

    const session = await restoreWallet(chain, deploymentFor(contract));

    expect(session?.account).toBe(chain.accounts[1]);
    expect(session?.client.address).toBe(contract);
    expect(chain.countRequests('eth_requestAccounts')).toBe(0);
  });

  it('returns null before the wallet has authorized the page', async () => {
    const chain = createFakeChain({ authorized: false });
    const contract = chain.deployVendingMachine();

    await expect(restoreWallet(chain, deploymentFor(contract))).resolves.toBeNull();
    expect(chain.countRequests('eth_requestAccounts')).toBe(0);
  });

  it('returns null while the wallet is on another chain', async () => {
    const chain = createFakeChain({ switchableChainIds: [11155111] });
    const contract = chain.deployVendingMachine();

    await expect(restoreWallet(chain, deploymentFor(contract, 11155111))).resolves.toBeNull();
    expect(chain.countRequests('wallet_switchEthereumChain')).toBe(0);
  });
});

describe('formatAddress', () => {
  it('shortens an address', () => {
    expect(formatAddress('0x1000000000000000000000000000000000000001')).toBe('0x1000...0001');
  });
});
