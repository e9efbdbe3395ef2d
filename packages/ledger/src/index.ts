/**
 * @payledger/ledger — Per-client balance ledgers with dispute tracking.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces:
 * - Fixed-point amounts (bigint scaled by 10^4, 64-bit range)
 * - Checked arithmetic (overflow is fatal)
 * - A dispute state machine per retained deposit/withdrawal
 * - Account locking on chargeback
 *
 * Design rules:
 * - Semantic failures are outcomes, never exceptions
 * - Fatal failures always throw
 * - Zero runtime dependencies
 */

// Ledgers
export { AccountLedger } from "./account-ledger.js";
export { LedgerStore } from "./ledger-store.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  AMOUNT_SCALE,
  MAX_SCALED,
  MIN_SCALED,
  ZERO_AMOUNT,
  parseAmount,
  formatAmount,
  addAmounts,
  subtractAmounts,
  isSufficient,
  isNegative,
} from "./money-math.js";

// Types
export type {
  DisputeState,
  DisputeEntry,
  RejectionReason,
  ApplyOutcome,
  ParseErrorCode,
  AmountOperation,
} from "./types.js";

export { ParseError, ArithmeticOverflowError } from "./types.js";
