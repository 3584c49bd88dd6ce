import type { AppchainSnapshot } from "../core/types";
import type { StateStore } from "./types";

const clone = (s: AppchainSnapshot): AppchainSnapshot => ({
  state: { ...s.state },
  access: { owner: s.access.owner, operators: [...s.access.operators] },
  program: { ...s.program },
  messages: {
    toStarknet: new Map(s.messages.toStarknet),
    toAppchain: new Map(s.messages.toAppchain),
  },
});

/** Keeps its own copy; nothing handed in or out aliases the stored snapshot. */
export class MemoryStateStore implements StateStore {
  private snapshot: AppchainSnapshot | undefined;

  constructor(initial?: AppchainSnapshot) {
    this.snapshot = initial && clone(initial);
  }

  load(): AppchainSnapshot | undefined {
    return this.snapshot && clone(this.snapshot);
  }

  save(snapshot: AppchainSnapshot): void {
    this.snapshot = clone(snapshot);
  }
}
