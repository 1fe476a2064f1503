/**
 * Vending machine contract client
 *
 * Thin wrapper over viem clients, shared by the interact script and the
 * frontend. Works with any transport: http() for scripts, custom() over an
 * injected wallet in the browser.
 */

import {
  BaseError,
  ContractFunctionRevertedError,
  InsufficientFundsError,
  UserRejectedRequestError,
  createPublicClient,
  createWalletClient,
  type Account,
  type Address,
  type Chain,
  type Hash,
  type PublicClient,
  type Transport,
  type WalletClient,
} from 'viem';

export const VENDING_MACHINE_ABI = [
  {
    type: 'function',
    name: 'getCupcake',
    inputs: [],
    outputs: [{ name: '', type: 'bool', internalType: 'bool' }],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'getBalance',
    inputs: [],
    outputs: [{ name: '', type: 'uint256', internalType: 'uint256' }],
    stateMutability: 'view',
  },
] as const;

export const COOLDOWN_SECONDS = 5;
export const COOLDOWN_REVERT_MARKER = 'Too Many Cupcakes';

export interface VendingMachineClientOptions {
  address: Address;
  chain: Chain;
  transport: Transport;
  account: Account;
  confirmations?: number;
  pollingInterval?: number;
}

export interface PurchaseReceipt {
  hash: Hash;
  blockNumber: bigint;
  status: 'success' | 'reverted';
}

export class VendingMachineClient {
  readonly address: Address;
  readonly account: Account;
  private readonly confirmations: number;
  private readonly pollingInterval?: number;
  private readonly publicClient: PublicClient<Transport, Chain>;
  private readonly walletClient: WalletClient<Transport, Chain, Account>;

  constructor(options: VendingMachineClientOptions) {
    this.address = options.address;
    this.account = options.account;
    this.confirmations = options.confirmations ?? 1;
    this.pollingInterval = options.pollingInterval;

    this.publicClient = createPublicClient({
      chain: options.chain,
      transport: options.transport,
      pollingInterval: options.pollingInterval,
    });

    this.walletClient = createWalletClient({
      account: options.account,
      chain: options.chain,
      transport: options.transport,
      pollingInterval: options.pollingInterval,
    });
  }

  /**
   * Buy one cupcake. Simulates first so a cooldown revert surfaces before
   * anything is signed, then waits for the receipt.
   */
  async getCupcake(): Promise<PurchaseReceipt> {
    const { request } = await this.publicClient.simulateContract({
      address: this.address,
      abi: VENDING_MACHINE_ABI,
      functionName: 'getCupcake',
      account: this.account,
    });

    const hash = await this.walletClient.writeContract(request);

    const receipt = await this.publicClient.waitForTransactionReceipt({
      hash,
      confirmations: this.confirmations,
      pollingInterval: this.pollingInterval,
    });

    if (receipt.status !== 'success') {
      throw new Error(`getCupcake transaction ${hash} reverted in block ${receipt.blockNumber}`);
    }

    return { hash, blockNumber: receipt.blockNumber, status: receipt.status };
  }

  /**
   * Cupcake balance of the client's account (the contract reads msg.sender)
   */
  async getBalance(): Promise<bigint> {
    return this.publicClient.readContract({
      address: this.address,
      abi: VENDING_MACHINE_ABI,
      functionName: 'getBalance',
      account: this.account,
    });
  }
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

export type ContractErrorKind = 'cooldown' | 'user-rejected' | 'insufficient-funds' | 'reverted' | 'unknown';

export interface ClassifiedContractError {
  kind: ContractErrorKind;
  message: string;
}

export const COOLDOWN_MESSAGE = `Please wait ${COOLDOWN_SECONDS} seconds between cupcakes`;

function hasCode(value: unknown): value is { code: unknown } {
  return typeof value === 'object' && value !== null && 'code' in value;
}

export function classifyContractError(error: unknown): ClassifiedContractError {
  if (error instanceof BaseError) {
    if (error.walk((e) => e instanceof UserRejectedRequestError)) {
      return { kind: 'user-rejected', message: 'Transaction rejected in wallet' };
    }

    if (error.walk((e) => e instanceof InsufficientFundsError)) {
      return { kind: 'insufficient-funds', message: 'Insufficient funds to pay for gas' };
    }

    const reverted = error.walk((e) => e instanceof ContractFunctionRevertedError);
    if (reverted instanceof ContractFunctionRevertedError) {
      const reason = reverted.reason ?? reverted.shortMessage;
      if (reason.includes(COOLDOWN_REVERT_MARKER)) {
        return { kind: 'cooldown', message: COOLDOWN_MESSAGE };
      }
      return { kind: 'reverted', message: `Transaction reverted: ${reason}` };
    }

    if (error.message.includes(COOLDOWN_REVERT_MARKER)) {
      return { kind: 'cooldown', message: COOLDOWN_MESSAGE };
    }

    return { kind: 'unknown', message: error.shortMessage };
  }

  // raw EIP-1193 errors from an injected wallet
  if (hasCode(error) && error.code === 4001) {
    return { kind: 'user-rejected', message: 'Transaction rejected in wallet' };
  }

  const message = error instanceof Error ? error.message : String(error);
  if (message.includes(COOLDOWN_REVERT_MARKER)) {
    return { kind: 'cooldown', message: COOLDOWN_MESSAGE };
  }

  return { kind: 'unknown', message };
}
