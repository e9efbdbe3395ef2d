/**
 * @payledger/csv — CSV boundary for the payment engines.
 *
 * - CsvTransactionSource: streaming `type,client,tx,amount` decoder
 * - CsvSnapshotSink: `client,available,held,total,locked` writer
 */

export { CsvTransactionSource } from "./transaction-source.js";
export type { CsvInput } from "./transaction-source.js";

export { CsvSnapshotSink, formatSnapshotRow, formatSnapshots, SNAPSHOT_HEADER } from "./snapshot-sink.js";

export { decodeRow, readHeader, toRawRow, HEADER_COLUMNS, RawRowSchema } from "./row-decoder.js";
export type { RawRow } from "./row-decoder.js";
