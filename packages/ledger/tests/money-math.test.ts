/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Arithmetic operations (add, subtract, negate, compare)
 * - Rescaling and half-even rounding
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import type { Money } from "@tally/types";
import {
  parseAmount,
  formatAmount,
  toMoney,
  validateMoney,
  assertSameScale,
  addMoney,
  subtractMoney,
  negateMoney,
  isZero,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  rescaleMoney,
  roundMoney,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function money(amount: string, decimals = 4): Money {
  return { amount, decimals };
}

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 4)).toBe(1_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses zero with decimals", () => {
    expect(parseAmount("0.0000", 4)).toBe(0n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("1.5", 4)).toBe(15_000n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  2.5 ", 1)).toBe(25n);
  });

  it("rejects empty and whitespace-only strings", () => {
    expect(() => parseAmount("", 4)).toThrow(LedgerError);
    expect(() => parseAmount("   ", 4)).toThrow(LedgerError);
  });

  it("rejects non-numeric input", () => {
    expect(() => parseAmount("abc", 4)).toThrow(LedgerError);
    expect(() => parseAmount("1.2.3", 4)).toThrow(LedgerError);
    expect(() => parseAmount("+100", 4)).toThrow(LedgerError);
    expect(() => parseAmount(".5", 4)).toThrow(LedgerError);
  });

  it("rejects excess decimal places", () => {
    expect(() => parseAmount("1.12345", 4)).toThrow(/5 decimal places/);
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats a whole number with decimals", () => {
    expect(formatAmount(1_000_000n, 4)).toBe("100.0000");
  });

  it("formats a sub-unit amount", () => {
    expect(formatAmount(5n, 4)).toBe("0.0005");
  });

  it("formats a negative amount", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("formats zero decimals", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });
});

describe("toMoney", () => {
  it("normalizes to the requested scale", () => {
    expect(toMoney("1.5", 4)).toEqual({ amount: "1.5000", decimals: 4 });
    expect(toMoney("-0.5", 2)).toEqual({ amount: "-0.50", decimals: 2 });
  });
});

// ─── Validation ──────────────────────────────────────────────────────────

describe("validateMoney", () => {
  it("accepts valid money", () => {
    expect(() => validateMoney(money("100.0000"))).not.toThrow();
  });

  it("rejects empty amount", () => {
    expect(() => validateMoney(money(""))).toThrow(LedgerError);
  });

  it("rejects negative or non-integer decimals", () => {
    expect(() => validateMoney({ amount: "100", decimals: -1 })).toThrow(LedgerError);
    expect(() => validateMoney({ amount: "100", decimals: 1.5 })).toThrow(LedgerError);
  });

  it("rejects an amount more precise than its scale", () => {
    expect(() => validateMoney({ amount: "1.25", decimals: 1 })).toThrow(LedgerError);
  });
});

describe("assertSameScale", () => {
  it("accepts equal scales", () => {
    expect(() => assertSameScale(money("10"), money("20"))).not.toThrow();
  });

  it("rejects different scales", () => {
    expect(() => assertSameScale(money("10", 4), money("10", 2))).toThrow(/different scales/);
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("addMoney", () => {
  it("adds two positive amounts", () => {
    expect(addMoney(money("100.0000"), money("50.5000"))).toEqual({ amount: "150.5000", decimals: 4 });
  });

  it("crosses zero", () => {
    expect(addMoney(money("-10.0000"), money("2.5000")).amount).toBe("-7.5000");
  });

  it("rejects mixed scales", () => {
    expect(() => addMoney(money("1", 4), money("1", 2))).toThrow(LedgerError);
  });
});

describe("subtractMoney", () => {
  it("subtracts equal amounts to zero", () => {
    expect(subtractMoney(money("50.0000"), money("50.0000")).amount).toBe("0.0000");
  });

  it("produces a negative result", () => {
    expect(subtractMoney(money("10.0000"), money("30.0000")).amount).toBe("-20.0000");
  });
});

describe("negateMoney", () => {
  it("flips the sign", () => {
    expect(negateMoney(money("1.2500")).amount).toBe("-1.2500");
    expect(negateMoney(money("-1.2500")).amount).toBe("1.2500");
  });

  it("keeps zero unsigned", () => {
    expect(negateMoney(money("0.0000")).amount).toBe("0.0000");
  });
});

// ─── Comparison & Predicates ─────────────────────────────────────────────

describe("compareMoney", () => {
  it("orders amounts exactly", () => {
    expect(compareMoney(money("100.0000"), money("100.0000"))).toBe(0);
    expect(compareMoney(money("0.0001"), money("0.0002"))).toBe(-1);
    expect(compareMoney(money("-1.0000"), money("-2.0000"))).toBe(1);
  });
});

describe("isZero / isPositive / isNegative", () => {
  it("classifies amounts by sign", () => {
    expect(isZero(money("0.0000"))).toBe(true);
    expect(isZero(money("-0"))).toBe(true);
    expect(isPositive(money("0.0001"))).toBe(true);
    expect(isPositive(money("0.0000"))).toBe(false);
    expect(isNegative(money("-0.0001"))).toBe(true);
    expect(isNegative(money("0.0000"))).toBe(false);
  });
});

describe("zeroMoney", () => {
  it("creates zero at the given scale", () => {
    expect(zeroMoney(4)).toEqual({ amount: "0.0000", decimals: 4 });
  });
});

// ─── Rescale & Round ─────────────────────────────────────────────────────

describe("rescaleMoney", () => {
  it("widens without changing the value", () => {
    expect(rescaleMoney(money("1.50", 2), 4)).toEqual({ amount: "1.5000", decimals: 4 });
  });

  it("narrows when only zeros are dropped", () => {
    expect(rescaleMoney(money("1.50", 2), 1)).toEqual({ amount: "1.5", decimals: 1 });
  });

  it("refuses to drop significant digits", () => {
    expect(() => rescaleMoney(money("1.55", 2), 1)).toThrow(LedgerError);
  });

  it("rejects malformed money", () => {
    expect(() => rescaleMoney(money("abc", 2), 4)).toThrow(LedgerError);
  });
});

describe("roundMoney", () => {
  it("rounds below the midpoint down", () => {
    expect(roundMoney(money("0.12344", 5), 4).amount).toBe("0.1234");
  });

  it("rounds above the midpoint up", () => {
    expect(roundMoney(money("0.12346", 5), 4).amount).toBe("0.1235");
  });

  it("rounds midpoints to the even neighbour", () => {
    expect(roundMoney(money("0.12345", 5), 4).amount).toBe("0.1234");
    expect(roundMoney(money("0.12355", 5), 4).amount).toBe("0.1236");
    expect(roundMoney(money("2.5", 1), 0).amount).toBe("2");
    expect(roundMoney(money("3.5", 1), 0).amount).toBe("4");
  });

  it("rounds negative amounts symmetrically", () => {
    expect(roundMoney(money("-0.12355", 5), 4).amount).toBe("-0.1236");
  });

  it("does not produce a negative zero", () => {
    expect(roundMoney(money("-0.00004", 5), 4).amount).toBe("0.0000");
  });

  it("pads when the target scale is larger", () => {
    expect(roundMoney(money("1.5", 1), 4)).toEqual({ amount: "1.5000", decimals: 4 });
  });
});
