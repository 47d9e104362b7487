/**
 * Tests for address normalization and id newtypes.
 */

import { describe, it, expect } from "vitest";
import {
  toAddress,
  isZeroAddress,
  ZERO_ADDRESS,
  allocationId,
  scheduleId,
  airdropId,
  NO_ALLOCATION,
} from "../src/identity.js";
import { isTerminal } from "../src/records.js";

describe("toAddress", () => {
  it("lower-cases and trims", () => {
    expect(toAddress("  0x00000000000000000000000000000000000A11CE ")).toBe(
      "0x00000000000000000000000000000000000a11ce",
    );
  });

  it("throws on malformed input", () => {
    expect(() => toAddress("alice")).toThrow(/Invalid address/);
    expect(() => toAddress("0x123")).toThrow(TypeError);
  });

  it("recognizes the zero address", () => {
    expect(isZeroAddress(ZERO_ADDRESS)).toBe(true);
    expect(isZeroAddress(toAddress("0x0000000000000000000000000000000000000001"))).toBe(false);
  });
});

describe("id newtypes", () => {
  it("accepts non-negative safe integers", () => {
    expect(allocationId(0)).toBe(0);
    expect(scheduleId(7)).toBe(7);
    expect(airdropId(3)).toBe(3);
  });

  it("rejects negatives and fractions", () => {
    expect(() => allocationId(-1)).toThrow(/allocation id/);
    expect(() => scheduleId(1.5)).toThrow(/schedule id/);
    expect(() => airdropId(Number.MAX_SAFE_INTEGER + 1)).toThrow(/airdrop id/);
  });

  it("uses 0 as the unlinked allocation sentinel", () => {
    expect(NO_ALLOCATION).toBe(0);
  });
});

describe("isTerminal", () => {
  it("treats completed and revoked as terminal", () => {
    expect(isTerminal("active")).toBe(false);
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("revoked")).toBe(true);
  });
});
