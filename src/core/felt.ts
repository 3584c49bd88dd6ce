import { brandFelt, brandIndex, brandU256 } from "../types/brands";
import type { Felt, Index, U256 } from "../types/brands";
import { fail } from "./errors";

/* ── field constants ─────────────────────────────────────── */
export const FIELD_PRIME = 2n ** 251n + 17n * 2n ** 192n + 1n;
export const MAX_FELT = FIELD_PRIME - 1n;
const MAX_U256 = 2n ** 256n - 1n;
// native index width of the on-chain runtime (u32)
export const MAX_INDEX = 2 ** 32 - 1;

export const ZERO = brandFelt(0n);
/** Stored block number meaning "no block accepted yet". */
export const GENESIS_BLOCK_NUMBER = brandFelt(MAX_FELT);

export const isFelt = (n: bigint): boolean => n >= 0n && n < FIELD_PRIME;

export const asFelt = (n: bigint | number): Felt => {
  const v = BigInt(n);
  if (!isFelt(v))
    fail("MalformedStream", `value out of field bounds: ${v}`, { value: v.toString() });
  return brandFelt(v);
};

/**
 * Widen a felt for magnitude comparison. Field elements carry no order of
 * their own, so every `<`/`>` in this codebase goes through here.
 */
export const toU256 = (f: Felt): U256 => {
  if (f < 0n || f > MAX_U256) fail("MalformedStream", `value out of u256 range: ${f}`);
  return brandU256(f);
};

/** Narrow a felt used as a count or length to a native index. */
export const toIndex = (f: Felt, what: string): Index => {
  if (f > BigInt(MAX_INDEX))
    fail("MalformedStream", `${what} does not fit a native index: ${f}`, {
      value: f.toString(),
    });
  return brandIndex(Number(f));
};

export const feltToHex = (f: Felt): `0x${string}` => `0x${f.toString(16)}`;

/** 32-byte big-endian word, the layout used for hashing. */
export const feltToWord = (f: Felt): Uint8Array => {
  const out = new Uint8Array(32);
  let v: bigint = f;
  for (let i = 31; i >= 0 && v > 0n; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
};
