export { NETWORKS, NETWORK_NAMES, getNetwork, getNetworkByChainId, isNetworkName, explorerAddressUrl, explorerTxUrl } from './chains.js';
export type { NetworkConfig, NetworkName } from './chains.js';

export { loadConfig, loadEnvFile, requirePrivateKey, REPO_ROOT, DEFAULT_ARTIFACTS_DIR } from './config.js';
export type { AppConfig, ConfigOverrides, LoadConfigOptions } from './config.js';

export { compileContract, loadVendingMachineSource, VENDING_MACHINE_SOURCE_PATH } from './compiler.js';
export type { CompileContractParams, CompileResult } from './compiler.js';

export { writeArtifacts, readArtifacts, artifactPaths } from './artifacts.js';
export type { ArtifactPaths } from './artifacts.js';

export {
  AddressRecordSchema,
  AbiRecordSchema,
  parseAddressRecord,
  parseAbiRecord,
  assertVendingMachineAbi,
  ADDRESS_RECORD_FILE,
  ABI_RECORD_FILE,
  CONTRACT_NAME,
} from './schemas.js';
export type { AddressRecord, AbiRecord, DeploymentArtifacts } from './schemas.js';

export {
  VendingMachineClient,
  VENDING_MACHINE_ABI,
  COOLDOWN_SECONDS,
  COOLDOWN_MESSAGE,
  classifyContractError,
} from './vending-machine.js';
export type {
  VendingMachineClientOptions,
  PurchaseReceipt,
  ContractErrorKind,
  ClassifiedContractError,
} from './vending-machine.js';

export { deployVendingMachine } from './deploy.js';
export type { DeployOptions, DeployResult } from './deploy.js';

export { purchaseCupcake } from './interact.js';
export type { InteractOptions, InteractResult } from './interact.js';
