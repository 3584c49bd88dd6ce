import type { Felt } from "../types/brands";
import type { ProgramOutput, RollingState, ValidationPolicy } from "./types";
import { fail } from "./errors";
import { GENESIS_BLOCK_NUMBER, feltToHex, toU256 } from "./felt";

export const DEFAULT_VALIDATION_POLICY: ValidationPolicy = {
  checkPrevBlockHash: true,
};

export const makeRollingState = (
  stateRoot: Felt,
  blockNumber: Felt,
  blockHash: Felt,
): RollingState => ({ stateRoot, blockNumber, blockHash });

/** No block has been accepted yet; the next update may start at any height. */
export const isGenesis = (s: RollingState): boolean =>
  s.blockNumber === GENESIS_BLOCK_NUMBER;

/**
 * Validate `out` against `s` and return the state it leads to. Throws on the
 * first failed check; the caller commits nothing in that case.
 */
export const applyStateUpdate = (
  s: RollingState,
  out: ProgramOutput,
  policy: ValidationPolicy = DEFAULT_VALIDATION_POLICY,
): RollingState => {
  if (out.prevBlockNumber !== s.blockNumber)
    fail("InvalidPreviousBlockNumber", "previous block number mismatch", {
      expected: feltToHex(s.blockNumber),
      got: feltToHex(out.prevBlockNumber),
    });

  // the sentinel can only be seeded by initialize, never reached by an update
  if (out.newBlockNumber === GENESIS_BLOCK_NUMBER)
    fail("InvalidBlockNumber", "new block number is the genesis sentinel");

  const next = toU256(out.newBlockNumber);
  const ok = isGenesis(s) ? next >= 0n : next > toU256(s.blockNumber);
  if (!ok)
    fail("InvalidBlockNumber", "new block number must increase", {
      current: feltToHex(s.blockNumber),
      got: feltToHex(out.newBlockNumber),
    });

  if (out.initialRoot !== s.stateRoot)
    fail("InvalidPreviousRoot", "initial root mismatch", {
      expected: feltToHex(s.stateRoot),
      got: feltToHex(out.initialRoot),
    });

  if (policy.checkPrevBlockHash && out.prevBlockHash !== s.blockHash)
    fail("InvalidPreviousBlockHash", "previous block hash mismatch", {
      expected: feltToHex(s.blockHash),
      got: feltToHex(out.prevBlockHash),
    });

  return makeRollingState(out.finalRoot, out.newBlockNumber, out.newBlockHash);
};
