import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes } from "@noble/hashes/utils";
import type { Felt } from "../types/brands";
import type { Hex, MessageToAppchain, MessageToStarknet } from "./types";
import { asFelt, feltToWord } from "./felt";
import {
  encodeMessageToAppchain,
  encodeMessageToStarknet,
} from "../codec/programOutput";

const MASK_250 = 2n ** 250n - 1n;

const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

/* ── word hashing ────────────────────────────────────────── */
export const keccakWords = (words: readonly Felt[]): Uint8Array =>
  keccak_256(concatBytes(...words.map(feltToWord)));

/** keccak256 truncated to 250 bits, so the result is always a felt. */
export const starknetKeccak = (words: readonly Felt[]): Felt =>
  asFelt(BigInt(toHex(keccakWords(words))) & MASK_250);

/* ── message hashes ──────────────────────────────────────── */
export const hashMessageToStarknet = (m: MessageToStarknet): Felt =>
  starknetKeccak(encodeMessageToStarknet(m));

export const hashMessageToAppchain = (m: MessageToAppchain): Felt =>
  starknetKeccak(encodeMessageToAppchain(m));

/* ── fact of a proven output ─────────────────────────────── */
export const outputHash = (stream: readonly Felt[]): Hex =>
  toHex(keccakWords(stream));

/** keccak256(programHash ‖ keccak256(output)), the fact a registry attests. */
export const computeFact = (programHash: Felt, stream: readonly Felt[]): Hex =>
  toHex(keccak_256(concatBytes(feltToWord(programHash), keccakWords(stream))));
