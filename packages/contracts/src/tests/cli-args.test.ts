import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../cli-args.js';

describe('parseCliArgs', () => {
  it('returns defaults for no arguments', () => {
    expect(parseCliArgs([])).toEqual({ help: false, allowMainnet: false, overrides: {} });
  });

  it('reads value flags in both spellings', () => {
    const args = parseCliArgs(['--network', 'sepolia', '--rpc-url=https://rpc.example.org', '--out-dir', 'out']);

    expect(args.overrides).toEqual({
      network: 'sepolia',
      rpcUrl: 'https://rpc.example.org',
      artifactsDir: 'out',
    });
  });

  it('reads boolean flags', () => {
    const args = parseCliArgs(['--allow-mainnet', '-h']);
    expect(args.allowMainnet).toBe(true);
    expect(args.help).toBe(true);
  });

  it('rejects a value flag without a value', () => {
    expect(() => parseCliArgs(['--network'])).toThrow('Missing value for --network');
    expect(() => parseCliArgs(['--network', '--allow-mainnet'])).toThrow('Missing value for --network');
  });

  it('rejects unknown arguments', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
    expect(() => parseCliArgs(['toString'])).toThrow('Unknown argument: toString');
  });
});
