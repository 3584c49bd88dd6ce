export type { Felt, U256, Index } from "./types/brands";
export type * from "./core/types";

export {
  FIELD_PRIME,
  MAX_FELT,
  MAX_INDEX,
  GENESIS_BLOCK_NUMBER,
  ZERO,
  asFelt,
  isFelt,
  toU256,
  toIndex,
  feltToHex,
} from "./core/felt";
export { AppchainError, isAppchainError } from "./core/errors";
export type { AppchainErrorCode } from "./core/errors";

export {
  BOOTLOADER_HEADER_SIZE,
  OS_HEADER_SIZE,
  HeaderOffset,
  decodeProgramOutput,
  encodeProgramOutput,
} from "./codec/programOutput";
export { encodeSnapshot, decodeSnapshot } from "./codec/snapshot";

export { applyStateUpdate, isGenesis } from "./core/state";
export {
  computeFact,
  hashMessageToAppchain,
  hashMessageToStarknet,
  outputHash,
  starknetKeccak,
} from "./core/hash";
export { MemoryFactsRegistry } from "./core/facts";
export type { FactsRegistry } from "./core/facts";
export { Appchain } from "./core/appchain";
export type { AppchainOptions, StateUpdateListener } from "./core/appchain";

export type { StateStore } from "./store/types";
export { MemoryStateStore } from "./store/memoryStore";
export { FileStateStore } from "./store/fileStore";

export { parseFelt, parseFelts } from "./model/validation";
export { loadConfig } from "./config";
export type { AppchainConfig } from "./config";
export { makeLogger } from "./logging";
export type { ILogger, LogLevel } from "./logging";
export { openAppchain } from "./open";
export type { Deployment } from "./open";
