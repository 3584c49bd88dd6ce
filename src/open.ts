import type { Felt } from "./types/brands";
import type { AppchainConfig } from "./config";
import { makeLogger, type ILogger } from "./logging";
import { Appchain } from "./core/appchain";
import type { FactsRegistry } from "./core/facts";
import { FileStateStore } from "./store/fileStore";
import { MemoryStateStore } from "./store/memoryStore";

export type Deployment = {
  owner: Felt;
  stateRoot: Felt;
  blockNumber: Felt;
  blockHash: Felt;
  facts?: FactsRegistry;
  logger?: ILogger;
};

/** Build an appchain core from environment config and deployment arguments. */
export const openAppchain = (cfg: AppchainConfig, d: Deployment): Appchain =>
  new Appchain({
    ...d,
    store: cfg.stateFile ? new FileStateStore(cfg.stateFile) : new MemoryStateStore(),
    policy: { checkPrevBlockHash: cfg.checkPrevBlockHash },
    decode: { truncation: cfg.truncation },
    logger: d.logger ?? makeLogger(cfg.logLevel, cfg.logPretty),
  });
