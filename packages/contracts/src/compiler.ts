/**
 * Contract compiler
 *
 * Compiles Solidity with solc-js (standard JSON input/output).
 */

import solc from 'solc';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { Abi as AbiSchema } from 'abitype/zod';
import type { Abi, Hex } from 'viem';
import { CONTRACT_NAME } from './schemas.js';

export const VENDING_MACHINE_SOURCE_PATH = fileURLToPath(new URL('../contracts/VendingMachine.sol', import.meta.url));

const SOURCE_UNIT = 'VendingMachine.sol';

// ============================================================================
// TYPES
// ============================================================================

export interface CompileContractParams {
  contractName?: string;
  source?: string;
  sourcePath?: string;
  optimizationRuns?: number;
}

export type CompileResult =
  | {
      success: true;
      contractName: string;
      abi: Abi;
      bytecode: Hex;
      warnings: string[];
    }
  | {
      success: false;
      error: string;
    };

const SolcDiagnosticSchema = z.object({
  severity: z.string(),
  message: z.string(),
  formattedMessage: z.string().optional(),
});

const SolcOutputSchema = z.object({
  errors: z.array(SolcDiagnosticSchema).optional(),
  contracts: z
    .record(
      z.record(
        z.object({
          abi: AbiSchema,
          evm: z.object({
            bytecode: z.object({ object: z.string() }),
          }),
        }),
      ),
    )
    .optional(),
});

type SolcDiagnostic = z.infer<typeof SolcDiagnosticSchema>;

function describe(diagnostic: SolcDiagnostic): string {
  return (diagnostic.formattedMessage ?? diagnostic.message).trim();
}

export async function loadVendingMachineSource(): Promise<string> {
  return readFile(VENDING_MACHINE_SOURCE_PATH, 'utf-8');
}

/**
 * Compile a contract from a source string or file
 */
export async function compileContract(params: CompileContractParams = {}): Promise<CompileResult> {
  const contractName = params.contractName ?? CONTRACT_NAME;
  const source = params.source ?? (await readFile(params.sourcePath ?? VENDING_MACHINE_SOURCE_PATH, 'utf-8'));

  const input = {
    language: 'Solidity',
    sources: {
      [SOURCE_UNIT]: { content: source },
    },
    settings: {
      optimizer: {
        enabled: true,
        runs: params.optimizationRuns ?? 200,
      },
      outputSelection: {
        '*': {
          '*': ['abi', 'evm.bytecode.object'],
        },
      },
    },
  };

  const parsed = SolcOutputSchema.safeParse(JSON.parse(solc.compile(JSON.stringify(input))));
  if (!parsed.success) {
    return { success: false, error: `Unexpected compiler output: ${parsed.error.issues[0]?.message ?? 'unknown'}` };
  }

  const diagnostics = parsed.data.errors ?? [];
  const errors = diagnostics.filter((d) => d.severity === 'error');
  if (errors.length > 0) {
    return {
      success: false,
      error: `Compilation failed:\n${errors.map(describe).join('\n')}`,
    };
  }

  const contract = parsed.data.contracts?.[SOURCE_UNIT]?.[contractName];
  if (!contract) {
    return { success: false, error: `Contract ${contractName} not found in ${SOURCE_UNIT}` };
  }

  return {
    success: true,
    contractName,
    abi: contract.abi,
    bytecode: `0x${contract.evm.bytecode.object}`,
    warnings: diagnostics.filter((d) => d.severity === 'warning').map(describe),
  };
}
