import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  decodeProgramOutput,
  encodeMessageToStarknet,
  encodeProgramOutput,
} from "../src/codec/programOutput";
import { applyStateUpdate, makeRollingState } from "../src/core/state";
import { MAX_FELT, ZERO } from "../src/core/felt";
import type { MessageToStarknet, ProgramOutput } from "../src/core/types";
import { f, mkOutput, mkStream, SENTINEL } from "./helpers/output";

const felt = fc.bigInt({ min: 0n, max: MAX_FELT }).map(f);
// block numbers that are not the sentinel
const height = fc.bigInt({ min: 0n, max: MAX_FELT - 1n }).map(f);
const payload = fc.array(felt, { maxLength: 6 });

const toStarknet: fc.Arbitrary<MessageToStarknet> = fc.record({
  fromAddress: felt,
  toAddress: felt,
  payload,
});

const output: fc.Arbitrary<ProgramOutput> = fc.record({
  initialRoot: felt,
  finalRoot: felt,
  prevBlockNumber: felt,
  newBlockNumber: felt,
  prevBlockHash: felt,
  newBlockHash: felt,
  osProgramHash: fc.constant(ZERO),
  configHash: felt,
  useKzgDa: fc.constant(ZERO),
  fullOutput: fc.constant(ZERO),
  messagesToStarknet: fc.array(toStarknet, { maxLength: 4 }),
  messagesToAppchain: fc.array(
    fc.record({
      fromAddress: felt,
      toAddress: felt,
      nonce: felt,
      selector: felt,
      payload,
    }),
    { maxLength: 4 },
  ),
});

describe("Property-based tests", () => {
  it("decoding an encoded output reproduces it", () => {
    fc.assert(
      fc.property(output, (o) => {
        const stream = encodeProgramOutput(o);
        expect(decodeProgramOutput(stream)).toEqual(o);
        expect(decodeProgramOutput(stream, { truncation: "strict" })).toEqual(o);
      }),
    );
  });

  it("a cut batch yields exactly the records that fit, never an error", () => {
    fc.assert(
      fc.property(
        fc.array(toStarknet, { maxLength: 5 }),
        fc.nat(),
        (msgs, seed) => {
          const flat = msgs.flatMap(encodeMessageToStarknet);
          const k = seed % (flat.length + 1);

          let used = 0;
          const fit = msgs.filter((m) => {
            used += encodeMessageToStarknet(m).length;
            return used <= k;
          });

          const out = decodeProgramOutput(mkStream({}, [k, ...flat.slice(0, k), 0]));
          expect(out.messagesToStarknet).toEqual(fit);
          expect(out.messagesToAppchain).toEqual([]);
        },
      ),
    );
  });

  it("a tracked chain only moves to a strictly higher block", () => {
    fc.assert(
      fc.property(height, height, (n, next) => {
        const s = makeRollingState(f(1), n, f(2));
        const out = mkOutput({
          initialRoot: f(1),
          prevBlockNumber: n,
          prevBlockHash: f(2),
          newBlockNumber: next,
        });
        const ok = (() => {
          try {
            applyStateUpdate(s, out);
            return true;
          } catch {
            return false;
          }
        })();
        expect(ok).toBe(next > n);
      }),
    );
  });

  it("genesis accepts any starting height", () => {
    fc.assert(
      fc.property(height, (next) => {
        const s = makeRollingState(f(5), SENTINEL, f(7));
        const res = applyStateUpdate(s, mkOutput({ newBlockNumber: next }));
        expect(res.blockNumber).toBe(next);
      }),
    );
  });
});
