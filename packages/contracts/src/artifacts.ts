/**
 * Deployment artifacts on disk
 *
 * Deploy writes the address record and the ABI record side by side; the
 * interact script and the frontend read them back.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  ABI_RECORD_FILE,
  ADDRESS_RECORD_FILE,
  parseAbiRecord,
  parseAddressRecord,
  type DeploymentArtifacts,
} from './schemas.js';

export interface ArtifactPaths {
  addressPath: string;
  abiPath: string;
}

export function artifactPaths(dir: string): ArtifactPaths {
  return {
    addressPath: join(dir, ADDRESS_RECORD_FILE),
    abiPath: join(dir, ABI_RECORD_FILE),
  };
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export async function writeArtifacts(dir: string, artifacts: DeploymentArtifacts): Promise<ArtifactPaths> {
  const paths = artifactPaths(dir);

  await mkdir(dir, { recursive: true });
  await writeFile(paths.addressPath, toJson(artifacts.address), 'utf-8');
  await writeFile(paths.abiPath, toJson(artifacts.abi), 'utf-8');

  return paths;
}

async function readJson(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Artifact not found: ${path}\nRun the deploy script first (npm run deploy).`);
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Artifact is not valid JSON: ${path} (${reason})`);
  }
}

export async function readArtifacts(dir: string): Promise<DeploymentArtifacts> {
  const paths = artifactPaths(dir);
  const [address, abi] = await Promise.all([readJson(paths.addressPath), readJson(paths.abiPath)]);

  return {
    address: parseAddressRecord(address, paths.addressPath),
    abi: parseAbiRecord(abi, paths.abiPath),
  };
}
