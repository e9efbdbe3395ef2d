/**
 * @payledger/csv — Streaming transaction source.
 *
 * Reads `type,client,tx,amount` rows lazily with the csv-parse stream API
 * and yields decoded TransactionRecords in file order.
 *
 * Rules:
 * - Header row required (type, client, tx); a UTF-8 BOM is stripped
 * - Whitespace around fields is trimmed; blank lines are skipped
 * - Rows may omit the trailing amount column, never carry extra fields
 * - The first undecodable row ends iteration with a ParseError, CSV syntax
 *   errors included
 * - ParseError.line counts data rows from 1, blank lines excluded
 */

import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { CsvError, parse } from "csv-parse";
import type { TransactionRecord } from "@payledger/types";
import { ParseError } from "@payledger/ledger";
import { decodeRow, readHeader, toRawRow } from "./row-decoder.js";

export type CsvInput = string | Readable;

export class CsvTransactionSource implements AsyncIterable<TransactionRecord> {
  private readonly _input: CsvInput;
  private _consumed = false;

  /**
   * @param input - a file path, or a readable stream of CSV text
   */
  constructor(input: CsvInput) {
    this._input = input;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TransactionRecord> {
    if (this._consumed) {
      throw new Error("CsvTransactionSource can only be iterated once");
    }
    this._consumed = true;

    const input = typeof this._input === "string" ? createReadStream(this._input) : this._input;
    const parser = input.pipe(
      parse({
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
    // pipe() does not forward source errors (e.g. ENOENT)
    input.once("error", (err: Error) => parser.destroy(err));

    let header: readonly string[] | undefined;
    let line = 0;
    try {
      for await (const fields of parser) {
        if (header === undefined) {
          header = readHeader(fields);
          continue;
        }
        line++;
        yield decodeRow(toRawRow(header, fields, line), line);
      }
    } catch (err: unknown) {
      if (err instanceof CsvError) {
        throw new ParseError("MALFORMED_ROW", err.message, line + 1);
      }
      throw err;
    } finally {
      if (typeof this._input === "string") {
        input.destroy();
      }
    }
  }
}
