/**
 * Command line parsing shared by the deploy and interact scripts
 */

import type { ConfigOverrides } from './config.js';

export interface CliArgs {
  help: boolean;
  allowMainnet: boolean;
  overrides: ConfigOverrides;
}

const VALUE_FLAGS: Record<string, keyof ConfigOverrides> = {
  '--network': 'network',
  '--rpc-url': 'rpcUrl',
  '--out-dir': 'artifactsDir',
  '--artifacts-dir': 'artifactsDir',
};

export function parseCliArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { help: false, allowMainnet: false, overrides: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inlineValue] = arg.split(/=(.*)/s, 2);

    if (flag === '--help' || flag === '-h') {
      parsed.help = true;
    } else if (flag === '--allow-mainnet') {
      parsed.allowMainnet = true;
    } else if (Object.hasOwn(VALUE_FLAGS, flag)) {
      const value = inlineValue ?? argv[++i];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${flag}`);
      }
      parsed.overrides[VALUE_FLAGS[flag]] = value;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}
