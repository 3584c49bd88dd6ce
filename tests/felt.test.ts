import { describe, it, expect } from "vitest";
import {
  asFelt,
  feltToHex,
  feltToWord,
  FIELD_PRIME,
  GENESIS_BLOCK_NUMBER,
  MAX_INDEX,
  toIndex,
  toU256,
} from "../src/core/felt";
import { isAppchainError } from "../src/core/errors";
import { f } from "./helpers/output";

describe("felt", () => {
  it("uses the Stark prime", () => {
    expect(FIELD_PRIME).toBe(
      0x800000000000011000000000000000000000000000000000000000000000001n,
    );
    expect(GENESIS_BLOCK_NUMBER).toBe(FIELD_PRIME - 1n);
  });

  it("accepts values in [0, P)", () => {
    expect(asFelt(0)).toBe(0n);
    expect(asFelt(FIELD_PRIME - 1n)).toBe(FIELD_PRIME - 1n);
  });

  it("rejects values outside the field", () => {
    expect(() => asFelt(FIELD_PRIME)).toThrow(/^MalformedStream: value out of field bounds/);
    expect(() => asFelt(-1n)).toThrow(/^MalformedStream/);
  });

  it("narrows counts to u32", () => {
    expect(toIndex(f(MAX_INDEX), "count")).toBe(4294967295);
    expect(() => toIndex(f(2n ** 32n), "count")).toThrow(
      /^MalformedStream: count does not fit a native index: 4294967296/,
    );
  });

  it("widens without changing the value", () => {
    expect(toU256(GENESIS_BLOCK_NUMBER)).toBe(FIELD_PRIME - 1n);
  });

  it("renders hex and 32-byte words", () => {
    expect(feltToHex(f(255))).toBe("0xff");
    const w = feltToWord(f(0x0102));
    expect(w).toHaveLength(32);
    expect(Array.from(w.slice(29))).toEqual([0, 1, 2]);
    expect(feltToWord(f(0)).every((b) => b === 0)).toBe(true);
  });

  it("carries a stable error code", () => {
    try {
      asFelt(FIELD_PRIME);
      expect.unreachable();
    } catch (err) {
      expect(isAppchainError(err, "MalformedStream")).toBe(true);
      expect(isAppchainError(err, "UnsupportedMode")).toBe(false);
    }
  });
});
