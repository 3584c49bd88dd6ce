// RLP snapshot of everything the host persists.

import * as rlp from "rlp";
import { bytesToHex } from "@noble/hashes/utils";
import type { Felt } from "../types/brands";
import type { AppchainSnapshot } from "../core/types";
import { AppchainError, fail, isAppchainError } from "../core/errors";
import { asFelt } from "../core/felt";

export const SNAPSHOT_VERSION = 1n;

type Node = Uint8Array | rlp.NestedUint8Array;

/* helpers */
const bytes = (n: Node, what: string): Uint8Array =>
  n instanceof Uint8Array ? n : fail("MalformedSnapshot", `${what}: expected bytes`);
const list = (n: Node, what: string, size?: number): rlp.NestedUint8Array => {
  if (n instanceof Uint8Array) return fail("MalformedSnapshot", `${what}: expected list`);
  if (size !== undefined && n.length !== size)
    fail("MalformedSnapshot", `${what}: expected ${size} items, got ${n.length}`);
  return n;
};
const bufToBn = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt("0x" + bytesToHex(b));
const felt = (n: Node, what: string): Felt => asFelt(bufToBn(bytes(n, what)));

const encCounts = (m: ReadonlyMap<Felt, bigint>): rlp.Input =>
  [...m.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([h, c]) => [h, c]);
const decCounts = (n: Node, what: string): Map<Felt, bigint> =>
  new Map(
    list(n, what).map((e) => {
      const [h, c] = list(e, what, 2);
      return [felt(h, what), bufToBn(bytes(c, what))];
    }),
  );

/* snapshot */
export const encodeSnapshot = (s: AppchainSnapshot): Uint8Array =>
  rlp.encode([
    SNAPSHOT_VERSION,
    [s.state.stateRoot, s.state.blockNumber, s.state.blockHash],
    [s.access.owner, [...s.access.operators]],
    [s.program.programHash, s.program.configHash],
    encCounts(s.messages.toStarknet),
    encCounts(s.messages.toAppchain),
  ]);

export const decodeSnapshot = (b: Uint8Array): AppchainSnapshot => {
  let root: Node;
  try {
    root = rlp.decode(b);
  } catch (err) {
    throw new AppchainError("MalformedSnapshot", "not valid RLP", {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  try {
    const [version, state, access, program, toStarknet, toAppchain] = list(
      root,
      "snapshot",
      6,
    );
    const v = bufToBn(bytes(version, "version"));
    if (v !== SNAPSHOT_VERSION) fail("MalformedSnapshot", `unsupported version ${v}`);
    const [stateRoot, blockNumber, blockHash] = list(state, "state", 3);
    const [owner, operators] = list(access, "access", 2);
    const [programHash, configHash] = list(program, "program", 2);
    return {
      state: {
        stateRoot: felt(stateRoot, "stateRoot"),
        blockNumber: felt(blockNumber, "blockNumber"),
        blockHash: felt(blockHash, "blockHash"),
      },
      access: {
        owner: felt(owner, "owner"),
        operators: list(operators, "operators").map((o) => felt(o, "operator")),
      },
      program: {
        programHash: felt(programHash, "programHash"),
        configHash: felt(configHash, "configHash"),
      },
      messages: {
        toStarknet: decCounts(toStarknet, "toStarknet"),
        toAppchain: decCounts(toAppchain, "toAppchain"),
      },
    };
  } catch (err) {
    // out-of-field values surface from asFelt as stream errors
    if (isAppchainError(err, "MalformedStream"))
      throw new AppchainError("MalformedSnapshot", "value out of field bounds", err.details);
    throw err;
  }
};
