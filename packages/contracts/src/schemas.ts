/**
 * Artifact record schemas
 *
 * Shared by the Node scripts (which write and read the files) and the frontend
 * (which fetches them), so this module must stay free of Node built-ins.
 */

import { z } from 'zod';
import { Abi as AbiSchema } from 'abitype/zod';
import { getAddress, isAddress, isHex, type Abi, type Address, type Hash } from 'viem';

export const ADDRESS_RECORD_FILE = 'contract-address.json';
export const ABI_RECORD_FILE = 'VendingMachine.json';
export const CONTRACT_NAME = 'VendingMachine';

const AddressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value, { strict: false }), { message: 'Invalid address' })
  .transform((value) => getAddress(value));

const HashSchema = z
  .string()
  .refine((value): value is Hash => isHex(value) && value.length === 66, { message: 'Invalid transaction hash' });

export const AddressRecordSchema = z.object({
  VendingMachine: AddressSchema,
  chainId: z.number().int().positive(),
  network: z.string().min(1),
  deployer: AddressSchema,
  transactionHash: HashSchema,
  blockNumber: z.string().regex(/^\d+$/, 'Expected a decimal block number'),
  deployedAt: z.string().datetime(),
});

export const AbiRecordSchema = z.object({
  contractName: z.literal(CONTRACT_NAME),
  abi: AbiSchema,
});

export type AddressRecord = z.infer<typeof AddressRecordSchema>;
export type AbiRecord = z.infer<typeof AbiRecordSchema>;

export interface DeploymentArtifacts {
  address: AddressRecord;
  abi: AbiRecord;
}

function describeIssues(file: string, error: z.ZodError): Error {
  const lines = error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new Error(`Invalid ${file}:\n${lines.join('\n')}`);
}

export function parseAddressRecord(value: unknown, file: string = ADDRESS_RECORD_FILE): AddressRecord {
  const result = AddressRecordSchema.safeParse(value);
  if (!result.success) {
    throw describeIssues(file, result.error);
  }
  return result.data;
}

export function parseAbiRecord(value: unknown, file: string = ABI_RECORD_FILE): AbiRecord {
  const result = AbiRecordSchema.safeParse(value);
  if (!result.success) {
    throw describeIssues(file, result.error);
  }
  assertVendingMachineAbi(result.data.abi, file);
  return result.data;
}

/**
 * The frontend and scripts call the contract through a fixed ABI; a record
 * that lacks either function was written for some other contract.
 */
export function assertVendingMachineAbi(abi: Abi, file: string = ABI_RECORD_FILE): void {
  const functions = new Set(abi.flatMap((item) => (item.type === 'function' ? [item.name] : [])));
  const missing = ['getCupcake', 'getBalance'].filter((name) => !functions.has(name));
  if (missing.length > 0) {
    throw new Error(`Invalid ${file}: ABI is missing ${missing.join(', ')}`);
  }
}
