/**
 * Loads the records `npm run deploy` wrote into public/contracts/
 */

import {
  ABI_RECORD_FILE,
  ADDRESS_RECORD_FILE,
  parseAbiRecord,
  parseAddressRecord,
  type DeploymentArtifacts,
} from '@cupcake-vending/contracts/schemas';

export type FetchLike = (url: string) => Promise<Pick<Response, 'ok' | 'status' | 'json'>>;

export interface LoadDeploymentOptions {
  baseUrl?: string;
  fetch?: FetchLike;
}

async function fetchJson(url: string, fetchImpl: FetchLike): Promise<unknown> {
  const response = await fetchImpl(url);
  if (!response.ok) {
    throw new Error(`Could not load ${url} (HTTP ${response.status}). Deploy the contract first: npm run deploy`);
  }
  return response.json();
}

export async function loadDeployment(options: LoadDeploymentOptions = {}): Promise<DeploymentArtifacts> {
  const baseUrl = options.baseUrl ?? '/contracts';
  const fetchImpl = options.fetch ?? ((url: string) => fetch(url));

  const addressUrl = `${baseUrl}/${ADDRESS_RECORD_FILE}`;
  const abiUrl = `${baseUrl}/${ABI_RECORD_FILE}`;
  const [address, abi] = await Promise.all([fetchJson(addressUrl, fetchImpl), fetchJson(abiUrl, fetchImpl)]);

  return {
    address: parseAddressRecord(address, addressUrl),
    abi: parseAbiRecord(abi, abiUrl),
  };
}
