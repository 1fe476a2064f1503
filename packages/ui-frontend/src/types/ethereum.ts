/**
 * Minimal EIP-1193 surface the app needs from an injected wallet
 */
export type AccountsChangedListener = (accounts: string[]) => void;

export interface InjectedProvider {
  request(args: { method: string; params?: unknown }): Promise<unknown>;
  on?(event: 'accountsChanged', listener: AccountsChangedListener): void;
  removeListener?(event: 'accountsChanged', listener: AccountsChangedListener): void;
}

declare global {
  interface Window {
    ethereum?: InjectedProvider;
  }
}
