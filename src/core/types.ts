import type { Felt } from "../types/brands";

export type { Felt };
export type Hex = `0x${string}`;

/* ── messages carried by the OS output ───────────────────── */
export type MessageToStarknet = {
  fromAddress: Felt; // appchain sender
  toAddress: Felt; // Starknet receiver
  payload: Felt[];
};

export type MessageToAppchain = {
  fromAddress: Felt; // Starknet sender
  toAddress: Felt; // appchain receiver
  nonce: Felt;
  selector: Felt;
  payload: Felt[];
};

/* ── decoded program output ──────────────────────────────── */
export type ProgramOutput = {
  initialRoot: Felt;
  finalRoot: Felt;
  prevBlockNumber: Felt;
  newBlockNumber: Felt;
  prevBlockHash: Felt;
  newBlockHash: Felt;
  osProgramHash: Felt;
  configHash: Felt;
  useKzgDa: Felt;
  fullOutput: Felt;
  messagesToStarknet: MessageToStarknet[];
  messagesToAppchain: MessageToAppchain[];
};

/* ── persistent components ───────────────────────────────── */
export type RollingState = Readonly<{
  stateRoot: Felt;
  blockNumber: Felt;
  blockHash: Felt;
}>;

export type AccessState = Readonly<{
  owner: Felt;
  operators: readonly Felt[];
}>;

export type ProgramInfo = Readonly<{
  programHash: Felt;
  configHash: Felt;
}>;

export type MessageLedger = Readonly<{
  toStarknet: ReadonlyMap<Felt, bigint>;
  toAppchain: ReadonlyMap<Felt, bigint>;
}>;

/** Everything the host persists, written back whole on every mutation. */
export type AppchainSnapshot = Readonly<{
  state: RollingState;
  access: AccessState;
  program: ProgramInfo;
  messages: MessageLedger;
}>;

/* ── policies ────────────────────────────────────────────── */
export type TruncationPolicy = "lenient" | "strict";

export type DecodeOptions = {
  truncation: TruncationPolicy;
};

export type ValidationPolicy = {
  checkPrevBlockHash: boolean;
};

/* ── emitted after a committed update ────────────────────── */
export type StateUpdated = Readonly<{
  stateRoot: Felt;
  blockNumber: Felt;
  blockHash: Felt;
  messagesToStarknet: readonly Felt[]; // message hashes, stream order
  messagesToAppchain: readonly Felt[];
}>;
