import { custom, type Account, type Address, type Hex } from 'viem';
import { createLogger, type LogLevel, type Logger } from '@cupcake-vending/logger';
import { NETWORKS, type NetworkName } from '../chains.js';
import type { AppConfig } from '../config.js';
import type { FakeChain } from '../testing/index.js';

export function testConfig(artifactsDir: string, network: NetworkName = 'localhost'): AppConfig {
  return {
    network: NETWORKS[network],
    rpcUrl: NETWORKS[network].rpcUrl,
    artifactsDir,
    confirmations: 1,
    pollingIntervalMs: 10,
  };
}

/** Placeholder key for a locally signing account */
export const TEST_PRIVATE_KEY: Hex = `0x${'11'.repeat(32)}`;

export function jsonRpcAccount(address: Address): Account {
  return { address, type: 'json-rpc' };
}

export function fakeTransport(chain: FakeChain) {
  return custom(chain, { retryCount: 0 });
}

export function captureLogger(): { logger: Logger; lines: Array<{ line: string; level: LogLevel }> } {
  const lines: Array<{ line: string; level: LogLevel }> = [];
  const logger = createLogger({
    format: 'pretty',
    minLevel: 'trace',
    write: (line, level) => {
      lines.push({ line, level });
    },
  });
  return { logger, lines };
}
