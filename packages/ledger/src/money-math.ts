/**
 * @tally/ledger: deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Scale (decimals) must match for all binary operations
 * - Amounts must be valid decimal strings
 * - Rounding only happens when explicitly requested (roundMoney)
 */

import type { Money } from "@tally/types";
import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are kept`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

function fromScaled(scaled: bigint, decimals: number): Money {
  return { amount: formatAmount(scaled, decimals), decimals };
}

/**
 * Divide by 10^shift, rounding half to even.
 */
function divideHalfEven(value: bigint, shift: number): bigint {
  if (shift <= 0) {
    return value;
  }
  const divisor = 10n ** BigInt(shift);
  const negative = value < 0n;
  const abs = negative ? -value : value;
  let quotient = abs / divisor;
  const twice = (abs % divisor) * 2n;

  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    quotient += 1n;
  }

  return negative ? -quotient : quotient;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Build a Money value normalized to exactly `decimals` places.
 *
 * toMoney("1.5", 4) → { amount: "1.5000", decimals: 4 }
 */
export function toMoney(amount: string, decimals: number): Money {
  return fromScaled(parseAmount(amount, decimals), decimals);
}

/**
 * Validate that a Money object is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.amount !== "string" || money.amount.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money amount must be a non-empty string, got: "${String(money.amount)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

/**
 * Assert two Money values share the same scale.
 */
export function assertSameScale(a: Money, b: Money): void {
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "SCALE_MISMATCH",
      `Cannot combine amounts with different scales: ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

export function addMoney(a: Money, b: Money): Money {
  assertSameScale(a, b);
  return fromScaled(parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals), a.decimals);
}

/**
 * Subtract b from a.
 */
export function subtractMoney(a: Money, b: Money): Money {
  assertSameScale(a, b);
  return fromScaled(parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals), a.decimals);
}

export function negateMoney(money: Money): Money {
  return fromScaled(-parseAmount(money.amount, money.decimals), money.decimals);
}

export function isZero(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) === 0n;
}

export function isPositive(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) > 0n;
}

export function isNegative(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) < 0n;
}

export function zeroMoney(decimals: number): Money {
  return fromScaled(0n, decimals);
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameScale(a, b);
  const va = parseAmount(a.amount, a.decimals);
  const vb = parseAmount(b.amount, b.decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

/**
 * Express a Money value at another scale without losing precision.
 * Throws if narrowing would drop a non-zero digit.
 *
 * rescaleMoney({ amount: "1.50", decimals: 2 }, 4) → "1.5000"
 * rescaleMoney({ amount: "1.50", decimals: 2 }, 1) → "1.5"
 * rescaleMoney({ amount: "1.55", decimals: 2 }, 1) → throws
 */
export function rescaleMoney(money: Money, decimals: number): Money {
  validateMoney(money);
  const scaled = parseAmount(money.amount, money.decimals);

  if (decimals >= money.decimals) {
    return fromScaled(scaled * 10n ** BigInt(decimals - money.decimals), decimals);
  }

  const divisor = 10n ** BigInt(money.decimals - decimals);
  if (scaled % divisor !== 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${money.amount}" cannot be expressed with ${String(decimals)} decimal places`,
    );
  }
  return fromScaled(scaled / divisor, decimals);
}

/**
 * Round a Money value to `decimals` places, half to even.
 * Rounding up to a larger scale is a lossless rescale.
 *
 * roundMoney("0.12345", 4) → "0.1234"
 * roundMoney("0.12355", 4) → "0.1236"
 */
export function roundMoney(money: Money, decimals: number): Money {
  const scaled = parseAmount(money.amount, money.decimals);

  if (decimals >= money.decimals) {
    return fromScaled(scaled * 10n ** BigInt(decimals - money.decimals), decimals);
  }

  return fromScaled(divideHalfEven(scaled, money.decimals - decimals), decimals);
}
