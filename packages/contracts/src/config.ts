/**
 * Configuration loader
 *
 * Reads `.env` at the repository root, then validates the environment.
 * Command line flags override environment values.
 */

import { config as loadDotenv } from 'dotenv';
import { fileURLToPath } from 'url';
import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { isHex, type Hex } from 'viem';
import { NETWORK_NAMES, getNetwork, type NetworkConfig } from './chains.js';

export const REPO_ROOT = fileURLToPath(new URL('../../../', import.meta.url));

export const DEFAULT_ARTIFACTS_DIR = 'packages/ui-frontend/public/contracts';

const PrivateKeySchema = z
  .string()
  .refine((value): value is Hex => isHex(value) && value.length === 66, {
    message: 'Expected a 0x-prefixed 32-byte hex private key',
  });

const EnvSchema = z.object({
  NETWORK: z.enum(NETWORK_NAMES).default('localhost'),
  RPC_URL: z.string().url().optional(),
  DEPLOYER_PRIVATE_KEY: PrivateKeySchema.optional(),
  ARTIFACTS_DIR: z.string().min(1).default(DEFAULT_ARTIFACTS_DIR),
  CONFIRMATIONS: z.coerce.number().int().positive().default(1),
  POLLING_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
});

export interface ConfigOverrides {
  network?: string;
  rpcUrl?: string;
  artifactsDir?: string;
}

export interface AppConfig {
  network: NetworkConfig;
  rpcUrl: string;
  privateKey?: Hex;
  artifactsDir: string;
  confirmations: number;
  pollingIntervalMs: number;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  rootDir?: string;
}

/**
 * Load `.env` into process.env. Variables already set win.
 */
export function loadEnvFile(rootDir: string = REPO_ROOT): void {
  loadDotenv({ path: resolve(rootDir, '.env') });
}

// `KEY=` lines in .env arrive as empty strings; treat them as unset
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const rootDir = options.rootDir ?? REPO_ROOT;
  const overrides = options.overrides ?? {};
  const env = withoutBlankValues(options.env ?? process.env);

  const merged = {
    ...env,
    ...(overrides.network !== undefined && { NETWORK: overrides.network }),
    ...(overrides.rpcUrl !== undefined && { RPC_URL: overrides.rpcUrl }),
    ...(overrides.artifactsDir !== undefined && { ARTIFACTS_DIR: overrides.artifactsDir }),
  };

  const result = EnvSchema.safeParse(merged);
  if (!result.success) {
    const lines = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${lines.join('\n')}`);
  }

  const parsed = result.data;
  const network = getNetwork(parsed.NETWORK);

  return {
    network,
    rpcUrl: parsed.RPC_URL ?? network.rpcUrl,
    privateKey: parsed.DEPLOYER_PRIVATE_KEY,
    artifactsDir: isAbsolute(parsed.ARTIFACTS_DIR) ? parsed.ARTIFACTS_DIR : resolve(rootDir, parsed.ARTIFACTS_DIR),
    confirmations: parsed.CONFIRMATIONS,
    pollingIntervalMs: parsed.POLLING_INTERVAL_MS,
  };
}

export function requirePrivateKey(config: AppConfig): Hex {
  if (!config.privateKey) {
    throw new Error('No private key configured. Set DEPLOYER_PRIVATE_KEY in .env');
  }
  return config.privateKey;
}
