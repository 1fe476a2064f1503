import { describe, it, expect } from 'vitest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { DEFAULT_ARTIFACTS_DIR, REPO_ROOT, loadConfig, requirePrivateKey } from '../config.js';

const TEST_KEY = `0x${'1'.repeat(64)}`;

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({ env: {}, rootDir: '/repo' });

    expect(config.network.name).toBe('localhost');
    expect(config.rpcUrl).toBe('http://127.0.0.1:8545');
    expect(config.artifactsDir).toBe('/repo/packages/ui-frontend/public/contracts');
    expect(config.confirmations).toBe(1);
    expect(config.pollingIntervalMs).toBe(1000);
    expect(config.privateKey).toBeUndefined();
  });

  it('reads network, rpc url, key and numbers from the environment', () => {
    const config = loadConfig({
      env: {
        NETWORK: 'sepolia',
        RPC_URL: 'https://rpc.example.org',
        DEPLOYER_PRIVATE_KEY: TEST_KEY,
        CONFIRMATIONS: '3',
        POLLING_INTERVAL_MS: '250',
        ARTIFACTS_DIR: '/tmp/artifacts',
      },
      rootDir: '/repo',
    });

    expect(config.network.chain.id).toBe(11155111);
    expect(config.rpcUrl).toBe('https://rpc.example.org');
    expect(config.privateKey).toBe(TEST_KEY);
    expect(config.confirmations).toBe(3);
    expect(config.pollingIntervalMs).toBe(250);
    expect(config.artifactsDir).toBe('/tmp/artifacts');
  });

  it('lets command line overrides win over the environment', () => {
    const config = loadConfig({
      env: { NETWORK: 'sepolia', ARTIFACTS_DIR: 'from-env' },
      overrides: { network: 'baseSepolia', artifactsDir: 'from-flag' },
      rootDir: '/repo',
    });

    expect(config.network.name).toBe('baseSepolia');
    expect(config.rpcUrl).toBe('https://sepolia.base.org');
    expect(config.artifactsDir).toBe('/repo/from-flag');
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ env: { RPC_URL: '', DEPLOYER_PRIVATE_KEY: '  ' }, rootDir: '/repo' });

    expect(config.rpcUrl).toBe('http://127.0.0.1:8545');
    expect(config.privateKey).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    const load = () => loadConfig({ env: { NETWORK: 'moon', DEPLOYER_PRIVATE_KEY: '0x1234', CONFIRMATIONS: '0' } });

    expect(load).toThrow(/^Invalid configuration:/);
    expect(load).toThrow(/- NETWORK: /);
    expect(load).toThrow(/- DEPLOYER_PRIVATE_KEY: Expected a 0x-prefixed 32-byte hex private key/);
    expect(load).toThrow(/- CONFIRMATIONS: /);
  });
});

describe('requirePrivateKey', () => {
  it('returns the configured key', () => {
    const config = loadConfig({ env: { DEPLOYER_PRIVATE_KEY: TEST_KEY } });
    expect(requirePrivateKey(config)).toBe(TEST_KEY);
  });

  it('explains how to configure a missing key', () => {
    const config = loadConfig({ env: {} });
    expect(() => requirePrivateKey(config)).toThrow('No private key configured. Set DEPLOYER_PRIVATE_KEY in .env');
  });
});

describe('default artifacts directory', () => {
  it('keeps deployment records out of version control', async () => {
    const gitignore = await readFile(join(REPO_ROOT, '.gitignore'), 'utf8');

    expect(gitignore.split('\n')).toContain(`${DEFAULT_ARTIFACTS_DIR}/*.json`);
  });
});
