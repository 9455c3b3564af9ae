/**
 * Read streams that resume after transient failures.
 *
 * When the transport fails with a retryable status, the request is issued
 * again for the rows not yet delivered: keys after the last committed (or
 * last scanned) row, and a row limit reduced by the rows already read.
 * Before the resumed responses, a response holding a single reset chunk
 * tells the reader to drop the row that was in flight.
 *
 * @module read-rows
 */

import {
  calculateDelay,
  compareBytes,
  copyBytes,
  createNoopLogger,
  describeBytes,
  isRetryableError,
  RetryError,
  RowRange,
  RowSet,
  sleep,
  type Logger,
  type ReadRowsResponse,
  type ResolvedRetryOptions,
  type RowSetRequest,
} from '@widecol/core';

import type { DataTransport, ReadRowsRequest } from './transport.js';

export interface ResumableReadOptions {
  retry: ResolvedRetryOptions;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * What the responses delivered so far committed.
 */
export class ReadProgress {
  rowsCommitted = 0;
  lastCommittedKey: Uint8Array | undefined;
  lastScannedKey: Uint8Array | undefined;
  private currentKey: Uint8Array | undefined;

  observe(response: ReadRowsResponse): void {
    for (const chunk of response.chunks) {
      if (chunk.resetRow === true) {
        this.currentKey = undefined;
      }
      if (chunk.rowKey !== undefined && chunk.rowKey.length > 0) {
        this.currentKey = chunk.rowKey;
      }
      if (chunk.commitRow === true && this.currentKey !== undefined) {
        this.lastCommittedKey = copyBytes(this.currentKey);
        this.rowsCommitted++;
        this.currentKey = undefined;
      }
    }
    if (response.lastScannedRowKey !== undefined && response.lastScannedRowKey.length > 0) {
      this.lastScannedKey = copyBytes(response.lastScannedRowKey);
    }
  }

  /**
   * Forget the row in flight.
   */
  dropInFlight(): void {
    this.currentKey = undefined;
  }

  /**
   * The furthest key known to be fully delivered.
   */
  get resumeAfter(): Uint8Array | undefined {
    const committed = this.lastCommittedKey;
    const scanned = this.lastScannedKey;
    if (committed === undefined) return scanned;
    if (scanned === undefined) return committed;
    return compareBytes(scanned, committed) > 0 ? scanned : committed;
  }
}

function keyAdvanced(before: Uint8Array | undefined, after: Uint8Array | undefined): boolean {
  if (after === undefined) return false;
  return before === undefined || compareBytes(after, before) > 0;
}

/**
 * The part of `rows` strictly after `after`, or `null` when nothing is left.
 * An absent or empty row set means the whole table.
 */
export function rowSetAfter(rows: RowSetRequest | undefined, after: Uint8Array): RowSetRequest | null {
  const original = rows === undefined ? new RowSet() : RowSet.fromRequest(rows);
  if (original.isEmpty()) {
    return new RowSet().addRowRange(new RowRange(after, undefined, false)).toRequest();
  }

  const narrowed = new RowSet();
  for (const key of original.keys) {
    if (compareBytes(key, after) > 0) {
      narrowed.addRowKey(key);
    }
  }
  for (const range of original.ranges) {
    if (range.endKey !== undefined && compareBytes(range.endKey, after) <= 0) {
      continue;
    }
    if (range.startKey === undefined || compareBytes(range.startKey, after) <= 0) {
      narrowed.addRowRange(new RowRange(after, range.endKey, false, range.endInclusive));
    } else {
      narrowed.addRowRange(range);
    }
  }
  return narrowed.isEmpty() ? null : narrowed.toRequest();
}

/**
 * The request that reads what `original` has not yet delivered, or `null`
 * when the read is complete.
 */
export function resumeRequest(original: ReadRowsRequest, progress: ReadProgress): ReadRowsRequest | null {
  let rowsLimit = original.rowsLimit;
  if (rowsLimit !== undefined && rowsLimit > 0) {
    rowsLimit -= progress.rowsCommitted;
    if (rowsLimit <= 0) {
      return null;
    }
  }

  const after = progress.resumeAfter;
  if (after === undefined) {
    return { ...original, rowsLimit };
  }
  const rows = rowSetAfter(original.rows, after);
  if (rows === null) {
    return null;
  }
  return { ...original, rows, rowsLimit };
}

/**
 * Read `request` through `transport`, resuming after retryable failures.
 *
 * @throws RetryError once `retry.maxRetries` consecutive attempts failed
 * @throws the transport's error when it is not retryable
 */
export async function* createResumableReadStream(
  transport: DataTransport,
  request: ReadRowsRequest,
  options: ResumableReadOptions
): AsyncGenerator<ReadRowsResponse, void, undefined> {
  const logger = options.logger ?? createNoopLogger();
  const progress = new ReadProgress();
  let current: ReadRowsRequest | null = request;
  let failures = 0;

  while (current !== null) {
    try {
      for await (const response of transport.readRows(current, { signal: options.signal })) {
        const committedBefore = progress.rowsCommitted;
        const resumeBefore = progress.resumeAfter;
        progress.observe(response);
        if (progress.rowsCommitted > committedBefore || keyAdvanced(resumeBefore, progress.resumeAfter)) {
          failures = 0;
        }
        yield response;
      }
      return;
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (!isRetryableError(error) || options.signal?.aborted === true) {
        throw error;
      }
      if (failures >= options.retry.maxRetries) {
        throw new RetryError(`All ${failures + 1} retry attempts failed: ${error.message}`, error, failures + 1);
      }

      const delay = calculateDelay(failures, options.retry);
      failures++;
      const resumeAfter = progress.resumeAfter;
      logger.warn('Read stream interrupted, resuming', {
        operation: 'readRows',
        table: request.tableName,
        attempt: failures,
        delayMs: delay,
        rowsRead: progress.rowsCommitted,
        ...(resumeAfter !== undefined && { resumeAfter: describeBytes(resumeAfter) }),
        cause: error.message,
      });
      await sleep(delay);

      yield { chunks: [{ resetRow: true }] };
      progress.dropInFlight();
      current = resumeRequest(request, progress);
    }
  }
}
