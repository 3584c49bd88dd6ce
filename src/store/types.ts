import type { AppchainSnapshot } from "../core/types";

/**
 * Owner of the persisted snapshot. `save` replaces the whole snapshot in one
 * step; a failed update never reaches it.
 */
export interface StateStore {
  load(): AppchainSnapshot | undefined;
  save(snapshot: AppchainSnapshot): void;
}
