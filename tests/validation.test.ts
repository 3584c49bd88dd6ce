import { describe, it, expect } from "vitest";
import { parseFelt, parseFelts } from "../src/model/validation";
import { decodeProgramOutput } from "../src/codec/programOutput";
import { FIELD_PRIME } from "../src/core/felt";
import type { Felt } from "../src/core/types";

describe("parseFelts", () => {
  it("accepts hex, decimal, bigint and safe integers", () => {
    expect(parseFelts(["0x1f", "31", 31n, 31])).toEqual([31n, 31n, 31n, 31n]);
  });

  it("returns typed felts", () => {
    const felts: Felt[] = parseFelts(["0x2", 3]);
    expect(felts[0] * felts[1]).toBe(6n);
  });

  it("rejects integers beyond the safe range", () => {
    expect(() => parseFelts([2 ** 53])).toThrow(
      /^MalformedStream: invalid felt at 0: unsafe integer/,
    );
  });

  it("accepts the largest felt", () => {
    expect(parseFelt(`0x${(FIELD_PRIME - 1n).toString(16)}`)).toBe(FIELD_PRIME - 1n);
  });

  it("rejects values at or above the modulus", () => {
    expect(() => parseFelts(["1", FIELD_PRIME.toString()])).toThrow(
      /^MalformedStream: invalid felt at 1: value exceeds field modulus/,
    );
  });

  it("rejects malformed entries", () => {
    expect(() => parseFelts(["0xzz"])).toThrow(/^MalformedStream: invalid felt at 0/);
    expect(() => parseFelts([-1])).toThrow(/^MalformedStream: invalid felt at 0/);
    expect(() => parseFelts([1.5])).toThrow(/^MalformedStream: invalid felt at 0/);
    expect(() => parseFelts("0x1")).toThrow(/^MalformedStream: invalid felt/);
  });

  it("feeds the decoder from JSON", () => {
    const raw: unknown = JSON.parse(
      '["0x1","0x2","0x3","5","10","0","1","7","9","0","0","0","0","0","0"]',
    );
    const out = decodeProgramOutput(parseFelts(raw));
    expect(out.initialRoot).toBe(5n);
    expect(out.newBlockNumber).toBe(1n);
    expect(out.newBlockHash).toBe(9n);
  });
});
