import type { Felt, ProgramOutput } from "../../src/core/types";
import { asFelt, GENESIS_BLOCK_NUMBER, ZERO } from "../../src/core/felt";

export const f = (n: bigint | number): Felt => asFelt(n);
export const fs = (...ns: (bigint | number)[]): Felt[] => ns.map(f);

export const SENTINEL = GENESIS_BLOCK_NUMBER;

export const mkOutput = (o: Partial<ProgramOutput> = {}): ProgramOutput => ({
  initialRoot: f(5),
  finalRoot: f(10),
  prevBlockNumber: SENTINEL,
  newBlockNumber: f(0),
  prevBlockHash: f(7),
  newBlockHash: f(9),
  osProgramHash: ZERO,
  configHash: ZERO,
  useKzgDa: ZERO,
  fullOutput: ZERO,
  messagesToStarknet: [],
  messagesToAppchain: [],
  ...o,
});

/** Raw stream: bootloader header, OS header, then the given tail. */
export const mkStream = (
  header: Partial<ProgramOutput> = {},
  tail: (bigint | number)[] = [0, 0],
): Felt[] => {
  const o = mkOutput(header);
  return [
    ...fs(1, 2, 3),
    o.initialRoot,
    o.finalRoot,
    o.prevBlockNumber,
    o.newBlockNumber,
    o.prevBlockHash,
    o.newBlockHash,
    o.osProgramHash,
    o.configHash,
    o.useKzgDa,
    o.fullOutput,
    ...fs(...tail),
  ];
};
