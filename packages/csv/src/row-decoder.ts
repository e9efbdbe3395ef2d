/**
 * @payledger/csv — Row decoder.
 *
 * Turns one raw CSV row into a validated TransactionRecord, or throws
 * ParseError.
 *
 * Rules:
 * - the header names at least type, client and tx
 * - a row has at most one field per header column; only trailing columns may be absent
 * - type must be one of the five kinds, exactly
 * - client and tx are unsigned integers within their ID ranges
 * - deposit/withdrawal require a non-negative amount with at most 4 decimals
 * - an amount on dispute/resolve/chargeback is ignored
 */

import { z } from "zod";
import type { Amount, TransactionRecord } from "@payledger/types";
import { isClientId, isDisputeActionKind, isTransactionId, isTransactionKind } from "@payledger/types";
import { isNegative, parseAmount, ParseError } from "@payledger/ledger";
import type { ParseErrorCode } from "@payledger/ledger";

// =============================================================================
// Schemas
// =============================================================================

/**
 * A row keyed by header column. A short row simply lacks the trailing keys.
 */
export const RawRowSchema = z.object({
  type: z.string().optional(),
  client: z.string().optional(),
  tx: z.string().optional(),
  amount: z.string().optional(),
});

export type RawRow = z.infer<typeof RawRowSchema>;

const FieldsSchema = z.array(z.string());

const KindSchema = z.string().refine(isTransactionKind);

const DigitsSchema = z.string().regex(/^\d+$/).transform(Number);
const ClientIdSchema = DigitsSchema.refine(isClientId);
const TxIdSchema = DigitsSchema.refine(isTransactionId);

export const HEADER_COLUMNS = ["type", "client", "tx", "amount"] as const;
const REQUIRED_COLUMNS = ["type", "client", "tx"] as const;

// =============================================================================
// Header and row shape
// =============================================================================

/**
 * Validate the header record and return its column names.
 */
export function readHeader(fields: unknown): readonly string[] {
  const parsed = FieldsSchema.safeParse(fields);
  const columns = parsed.success ? parsed.data : [];
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));

  if (missing.length > 0) {
    throw new ParseError(
      "INVALID_HEADER",
      `Missing or invalid header row: expected "${HEADER_COLUMNS.join(",")}", found "${columns.join(",")}"`,
    );
  }
  return columns;
}

/**
 * Key a data record by the header columns.
 * Rows longer than the header are rejected rather than truncated.
 */
export function toRawRow(header: readonly string[], fields: unknown, line?: number): Record<string, string> {
  const parsed = FieldsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new ParseError("MALFORMED_ROW", "Row is not a list of CSV fields", line);
  }

  const values = parsed.data;
  if (values.length > header.length) {
    throw new ParseError(
      "MALFORMED_ROW",
      `Expected at most ${String(header.length)} fields, found ${String(values.length)}`,
      line,
    );
  }

  const row: Record<string, string> = {};
  values.forEach((value, i) => {
    const column = header[i];
    if (column !== undefined) {
      row[column] = value;
    }
  });
  return row;
}

// =============================================================================
// Decoder
// =============================================================================

function decodeField<S extends z.ZodTypeAny>(
  schema: S,
  value: string | undefined,
  code: ParseErrorCode,
  message: string,
  line: number | undefined,
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ParseError(code, message, line);
  }
  return result.data;
}

function decodeAmount(text: string, line: number | undefined): Amount {
  try {
    return parseAmount(text);
  } catch (err: unknown) {
    if (err instanceof ParseError && line !== undefined) {
      throw new ParseError(err.code, err.message, line);
    }
    throw err;
  }
}

/**
 * Decode one CSV row.
 *
 * @param raw - the header-keyed row from toRawRow()
 * @param line - 1-based data row number, attached to any ParseError
 */
export function decodeRow(raw: unknown, line?: number): TransactionRecord {
  const parsed = RawRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError("INVALID_TYPE", "Row is not a keyed CSV record", line);
  }
  const row = parsed.data;

  const kind = decodeField(KindSchema, row.type, "INVALID_TYPE", `Unknown transaction type "${row.type ?? ""}"`, line);
  const clientId = decodeField(ClientIdSchema, row.client, "INVALID_CLIENT_ID", `Invalid client ID "${row.client ?? ""}"`, line);
  const txId = decodeField(TxIdSchema, row.tx, "INVALID_TX_ID", `Invalid transaction ID "${row.tx ?? ""}"`, line);

  if (isDisputeActionKind(kind)) {
    return { kind, clientId, txId };
  }

  if (row.amount === undefined || row.amount === "") {
    throw new ParseError("MISSING_AMOUNT", `A ${kind} requires an amount`, line);
  }

  const amount = decodeAmount(row.amount, line);
  if (isNegative(amount)) {
    throw new ParseError("NEGATIVE_AMOUNT", `A ${kind} amount cannot be negative: "${row.amount}"`, line);
  }

  return { kind, clientId, txId, amount };
}
