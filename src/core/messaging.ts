import type { Felt } from "../types/brands";
import type { MessageLedger, ProgramOutput } from "./types";
import { hashMessageToAppchain, hashMessageToStarknet } from "./hash";

export const EMPTY_LEDGER: MessageLedger = {
  toStarknet: new Map(),
  toAppchain: new Map(),
};

const bump = (
  m: ReadonlyMap<Felt, bigint>,
  hashes: readonly Felt[],
): Map<Felt, bigint> => {
  const next = new Map(m);
  for (const h of hashes) next.set(h, (next.get(h) ?? 0n) + 1n);
  return next;
};

/**
 * Record the presence of every message carried by `out`. Only counts are
 * kept; delivery and consumption happen elsewhere.
 */
export const recordMessages = (
  ledger: MessageLedger,
  out: ProgramOutput,
): { ledger: MessageLedger; toStarknet: Felt[]; toAppchain: Felt[] } => {
  const toStarknet = out.messagesToStarknet.map(hashMessageToStarknet);
  const toAppchain = out.messagesToAppchain.map(hashMessageToAppchain);
  return {
    ledger: {
      toStarknet: bump(ledger.toStarknet, toStarknet),
      toAppchain: bump(ledger.toAppchain, toAppchain),
    },
    toStarknet,
    toAppchain,
  };
};

export const messageCount = (
  m: ReadonlyMap<Felt, bigint>,
  hash: Felt,
): bigint => m.get(hash) ?? 0n;
