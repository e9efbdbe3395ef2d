/**
 * @payledger/ledger — Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint internally. Amounts are integers scaled by
 * 10^4 and must stay inside the signed 64-bit range.
 *
 * Rules:
 * - No floating-point operations
 * - At most 4 fractional digits on input
 * - Every result is range-checked; overflow throws
 * - Zero runtime dependencies
 */

import type { Amount } from "@payledger/types";
import { ArithmeticOverflowError, ParseError } from "./types.js";
import type { AmountOperation } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

export const AMOUNT_DECIMALS = 4;
export const AMOUNT_SCALE = 10_000n;

/** Largest scaled value (2^63 - 1). */
export const MAX_SCALED = 9_223_372_036_854_775_807n;
/** Smallest scaled value (-2^63). */
export const MIN_SCALED = -9_223_372_036_854_775_808n;

export const ZERO_AMOUNT: Amount = Object.freeze({ scaled: 0n });

const AMOUNT_PATTERN = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

function inRange(scaled: bigint): boolean {
  return scaled >= MIN_SCALED && scaled <= MAX_SCALED;
}

function checked(scaled: bigint, operation: AmountOperation, detail: string): Amount {
  if (!inRange(scaled)) {
    throw new ArithmeticOverflowError(
      operation,
      `Amount overflow on ${operation}: ${detail} is outside the 64-bit scaled range`,
    );
  }
  return Object.freeze({ scaled });
}

// ─── Construction ────────────────────────────────────────────────────────

/**
 * Parse a decimal string into an Amount.
 *
 * "12.34" → 123400n
 * "-0.5" → -5000n
 * "3" → 30000n
 *
 * Trailing fractional zeros carry no precision, so "1.234500" is accepted.
 */
export function parseAmount(text: string): Amount {
  if (typeof text !== "string" || text.trim() === "") {
    throw new ParseError("INVALID_AMOUNT", `Invalid amount: "${String(text)}"`);
  }

  const trimmed = text.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new ParseError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "", rawFrac = ""] = abs.split(".");
  const fracPart = rawFrac.replace(/0+$/, "");

  if (fracPart.length > AMOUNT_DECIMALS) {
    throw new ParseError(
      "PRECISION_EXCEEDED",
      `Amount "${trimmed}" has ${String(fracPart.length)} fractional digits, at most ${String(AMOUNT_DECIMALS)} are allowed`,
    );
  }

  const magnitude = BigInt((intPart === "" ? "0" : intPart) + fracPart.padEnd(AMOUNT_DECIMALS, "0"));
  const scaled = negative ? -magnitude : magnitude;

  if (!inRange(scaled)) {
    throw new ParseError(
      "OVERFLOW",
      `Amount "${trimmed}" exceeds the representable range once scaled by ${AMOUNT_SCALE.toString()}`,
    );
  }

  return Object.freeze({ scaled });
}

/**
 * Render an Amount as a decimal string with up to 4 fractional digits.
 *
 * 70000n → "7.0"
 * 12345n → "1.2345"
 * -5n → "-0.0005"
 */
export function formatAmount(amount: Amount): string {
  const negative = amount.scaled < 0n;
  const abs = negative ? -amount.scaled : amount.scaled;
  const digits = abs.toString().padStart(AMOUNT_DECIMALS + 1, "0");
  const intPart = digits.slice(0, digits.length - AMOUNT_DECIMALS);
  const fracPart = digits.slice(digits.length - AMOUNT_DECIMALS).replace(/0+$/, "");
  const result = `${intPart}.${fracPart === "" ? "0" : fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Add two amounts. Throws ArithmeticOverflowError on overflow.
 */
export function addAmounts(a: Amount, b: Amount): Amount {
  return checked(a.scaled + b.scaled, "add", `${formatAmount(a)} + ${formatAmount(b)}`);
}

/**
 * Subtract b from a. Throws ArithmeticOverflowError on overflow.
 */
export function subtractAmounts(a: Amount, b: Amount): Amount {
  return checked(a.scaled - b.scaled, "subtract", `${formatAmount(a)} - ${formatAmount(b)}`);
}

/**
 * Whether `balance` covers `amount` (balance >= amount).
 */
export function isSufficient(balance: Amount, amount: Amount): boolean {
  return balance.scaled >= amount.scaled;
}

export function isNegative(amount: Amount): boolean {
  return amount.scaled < 0n;
}
