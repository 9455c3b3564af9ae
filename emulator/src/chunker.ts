import { bytesEqual, type CellChunk, type ReadRowsResponse } from '@widecol/core';

import type { FlatCell } from './filters.js';

export interface OutputRow {
  key: Uint8Array;
  cells: readonly FlatCell[];
}

export interface ChunkerOptions {
  /** Values longer than this are split across chunks */
  maxChunkValueBytes: number;
  chunksPerResponse: number;
}

/**
 * Chunks of one row. Coordinates are only sent when they change, and the
 * last chunk commits the row.
 */
export function rowToChunks(row: OutputRow, maxChunkValueBytes: number): CellChunk[] {
  const chunks: CellChunk[] = [];
  let family: string | undefined;
  let qualifier: Uint8Array | undefined;

  for (const { family: cellFamily, qualifier: cellQualifier, cell } of row.cells) {
    const chunk: CellChunk = { timestampMicros: cell.timestampMicros };
    if (chunks.length === 0) {
      chunk.rowKey = row.key;
    }
    if (cellFamily !== family) {
      chunk.familyName = cellFamily;
      chunk.qualifier = cellQualifier;
    } else if (qualifier === undefined || !bytesEqual(qualifier, cellQualifier)) {
      chunk.qualifier = cellQualifier;
    }
    family = cellFamily;
    qualifier = cellQualifier;
    if (cell.labels.length > 0) {
      chunk.labels = [...cell.labels];
    }

    const value = cell.value;
    if (value.length <= maxChunkValueBytes) {
      chunk.value = value;
      chunks.push(chunk);
      continue;
    }

    chunk.value = value.subarray(0, maxChunkValueBytes);
    chunk.valueSize = value.length;
    chunks.push(chunk);
    for (let offset = maxChunkValueBytes; offset < value.length; offset += maxChunkValueBytes) {
      const end = Math.min(offset + maxChunkValueBytes, value.length);
      const fragment: CellChunk = { value: value.subarray(offset, end) };
      if (end < value.length) {
        fragment.valueSize = value.length;
      }
      chunks.push(fragment);
    }
  }

  const last = chunks[chunks.length - 1];
  if (last !== undefined) {
    last.commitRow = true;
  }
  return chunks;
}

/**
 * Batch the chunks of `rows` into responses of at most `chunksPerResponse`
 * chunks. Once `rows` is drained, a trailing empty response reports the
 * key `lastScannedRowKey` returns, if any.
 */
export function* toResponses(
  rows: Iterable<OutputRow>,
  options: ChunkerOptions,
  lastScannedRowKey: () => Uint8Array | undefined = () => undefined
): Generator<ReadRowsResponse, void, undefined> {
  let batch: CellChunk[] = [];
  for (const row of rows) {
    for (const chunk of rowToChunks(row, options.maxChunkValueBytes)) {
      batch.push(chunk);
      if (batch.length >= options.chunksPerResponse) {
        yield { chunks: batch };
        batch = [];
      }
    }
  }
  if (batch.length > 0) {
    yield { chunks: batch };
  }
  const scanned = lastScannedRowKey();
  if (scanned !== undefined) {
    yield { chunks: [], lastScannedRowKey: scanned };
  }
}
