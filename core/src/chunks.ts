/**
 * Read-stream wire units.
 *
 * A read stream is a sequence of {@link ReadRowsResponse} messages, each
 * holding {@link CellChunk}s. A chunk carries (part of) one cell; fields it
 * omits are inherited from the previous chunk of the same row. Large values
 * are split across several chunks: every fragment but the last has a
 * positive `valueSize` (the total size of the value).
 */

export interface CellChunk {
  /** Present on the first chunk of a row; may repeat on later chunks */
  rowKey?: Uint8Array;
  /** Present when the family changes; requires `qualifier` too */
  familyName?: string;
  /** Present when the column changes */
  qualifier?: Uint8Array;
  timestampMicros?: number;
  labels?: string[];
  value?: Uint8Array;
  /** Positive on every fragment of a split value but the last */
  valueSize?: number;
  /** Discard everything accumulated for the current row */
  resetRow?: boolean;
  /** The current row is complete */
  commitRow?: boolean;
}

export interface ReadRowsResponse {
  chunks: CellChunk[];
  /**
   * Key the server has scanned past without returning a row for it, so a
   * resumed read can start after it.
   */
  lastScannedRowKey?: Uint8Array;
}

/**
 * True when `chunk` carries anything besides the reset marker.
 */
export function chunkHasData(chunk: CellChunk): boolean {
  return (
    chunk.rowKey !== undefined ||
    chunk.familyName !== undefined ||
    chunk.qualifier !== undefined ||
    chunk.timestampMicros !== undefined ||
    (chunk.labels !== undefined && chunk.labels.length > 0) ||
    (chunk.value !== undefined && chunk.value.length > 0) ||
    (chunk.valueSize !== undefined && chunk.valueSize > 0) ||
    chunk.commitRow === true
  );
}

export function isValueFragment(chunk: CellChunk): boolean {
  return chunk.valueSize !== undefined && chunk.valueSize > 0;
}
