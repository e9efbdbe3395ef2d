/**
 * Financial Types
 *
 * Fixed-point monetary primitive shared by every package.
 *
 * Rules:
 * - Amounts are never floating point
 * - One implicit currency (no currency field)
 * - Values are immutable once constructed
 */

/**
 * A fixed-point monetary amount.
 *
 * Stored as a signed integer scaled by 10^4, so `12.3456` is `123456n`.
 * Construct through the ledger's `parseAmount`, which enforces the
 * precision and range invariants.
 */
export interface Amount {
  /** Value multiplied by 10,000. Always within the signed 64-bit range. */
  readonly scaled: bigint;
}
