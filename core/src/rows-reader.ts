/**
 * @widecol/core - Rows reader
 *
 * Turns a stream of {@link ReadRowsResponse} messages into committed
 * {@link Row}s, one {@link PartialRowData} per row, and checks the ordering
 * rules that span rows: every row starts with a key and keys strictly
 * increase.
 *
 * @example
 * ```typescript
 * const reader = table.readRows({ limit: 10 });
 *
 * // Lazily, one row at a time
 * for await (const row of reader) {
 *   if (done(row)) break;   // the reader stays open
 * }
 *
 * // Or everything that is left
 * await reader.consumeAll();
 * reader.rows.get('row-key');
 * ```
 *
 * @module rows-reader
 */

import { ByteKeyMap, compareBytes, copyBytes, describeBytes } from './bytes.js';
import type { CellChunk, ReadRowsResponse } from './chunks.js';
import { MalformedChunkSequenceError, StreamingCancelledError } from './errors.js';
import { createNoopLogger, type Logger } from './logging.js';
import { PartialRowData, type Row } from './row-data.js';

export type RowsReaderState = 'awaiting-row' | 'row-in-progress' | 'done' | 'cancelled' | 'failed';

export interface RowsReaderStats {
  /** Rows committed so far */
  rowsRead: number;
  /** Chunks applied so far, reset markers included */
  chunksRead: number;
  responsesRead: number;
  /** Value bytes received */
  bytesRead: number;
}

export interface RowsReaderOptions {
  /**
   * Aborting cancels the reader; a pending or later read rejects with
   * StreamingCancelledError.
   */
  signal?: AbortSignal;
  logger?: Logger;
  /** Require row keys to increase from row to row (default true) */
  validateRowOrder?: boolean;
}

type NextResponse = IteratorResult<ReadRowsResponse> | 'cancelled';

/**
 * Row cursor over a read stream.
 */
export class RowsReader implements AsyncIterable<Row> {
  /** Rows collected by {@link consumeAll}, keyed by row key */
  readonly rows = new ByteKeyMap<Row>();

  private readonly iterator: AsyncIterator<ReadRowsResponse>;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;
  private readonly validateRowOrder: boolean;
  private readonly onAbort = (): void => {
    this.abortedBySignal = true;
    this.cancel();
  };

  private _state: RowsReaderState = 'awaiting-row';
  private partial = new PartialRowData();
  private buffered: CellChunk[] = [];
  private bufferIndex = 0;
  private _lastRowKey: Uint8Array | undefined;
  private _lastScannedRowKey: Uint8Array | undefined;
  private failure: Error | undefined;
  private abortedBySignal = false;
  private notifyCancelled: () => void = () => {};
  private readonly cancelled: Promise<'cancelled'>;
  private readonly _stats: RowsReaderStats = {
    rowsRead: 0,
    chunksRead: 0,
    responsesRead: 0,
    bytesRead: 0,
  };

  constructor(source: AsyncIterable<ReadRowsResponse>, options: RowsReaderOptions = {}) {
    this.iterator = source[Symbol.asyncIterator]();
    this.logger = options.logger ?? createNoopLogger();
    this.signal = options.signal;
    this.validateRowOrder = options.validateRowOrder ?? true;
    this.cancelled = new Promise<'cancelled'>((resolve) => {
      this.notifyCancelled = () => resolve('cancelled');
    });

    if (this.signal?.aborted) {
      this.onAbort();
    } else {
      this.signal?.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  get state(): RowsReaderState {
    return this._state;
  }

  /**
   * Key of the last committed row.
   */
  get lastRowKey(): Uint8Array | undefined {
    return this._lastRowKey;
  }

  /**
   * Furthest key the server reported scanning, committed rows included.
   */
  get lastScannedRowKey(): Uint8Array | undefined {
    return this._lastScannedRowKey;
  }

  get stats(): Readonly<RowsReaderStats> {
    return { ...this._stats };
  }

  /**
   * Next committed row, or `null` once the stream is exhausted or cancelled.
   *
   * @throws {MalformedChunkSequenceError} when the chunks cannot form rows
   * @throws {StreamingCancelledError} when aborted through the signal
   */
  async readNextRow(): Promise<Row | null> {
    for (;;) {
      const finished = this.checkFinished();
      if (finished) return null;

      const chunk = this.nextBufferedChunk();
      if (chunk === undefined) {
        const next = await this.nextResponse();
        if (next === 'cancelled' || this._state === 'cancelled') {
          this.checkFinished();
          return null;
        }
        if (next.done) {
          this.finish();
          return null;
        }
        this.acceptResponse(next.value);
        continue;
      }

      const row = this.applyChunk(chunk);
      if (row !== null) {
        return row;
      }
    }
  }

  /**
   * Read every remaining row into {@link rows}. Safe to call again.
   */
  async consumeAll(): Promise<void> {
    for (;;) {
      const row = await this.readNextRow();
      if (row === null) return;
      this.rows.set(row.rowKey, row);
    }
  }

  /**
   * Stop reading: close the source and drop any partially assembled row.
   */
  cancel(): void {
    if (this._state === 'done' || this._state === 'failed' || this._state === 'cancelled') {
      return;
    }
    this._state = 'cancelled';
    this.partial.reset();
    this.buffered = [];
    this.bufferIndex = 0;
    this.notifyCancelled();
    this.detachSignal();
    this.closeSource('cancelled');
  }

  /**
   * Iterate the remaining rows. Breaking out of the loop leaves the reader
   * open; a later loop or {@link consumeAll} continues from there.
   */
  [Symbol.asyncIterator](): AsyncIterator<Row> {
    return {
      next: async (): Promise<IteratorResult<Row>> => {
        const row = await this.readNextRow();
        return row === null ? { done: true, value: undefined } : { done: false, value: row };
      },
      return: async (): Promise<IteratorResult<Row>> => ({ done: true, value: undefined }),
    };
  }

  /**
   * True when no more rows will come; throws the stored failure or the
   * cancellation error.
   */
  private checkFinished(): boolean {
    switch (this._state) {
      case 'done':
        return true;
      case 'failed':
        throw this.failure ?? new Error('Read stream failed');
      case 'cancelled':
        if (this.abortedBySignal) {
          throw new StreamingCancelledError();
        }
        return true;
      default:
        return false;
    }
  }

  private nextBufferedChunk(): CellChunk | undefined {
    if (this.bufferIndex >= this.buffered.length) {
      return undefined;
    }
    return this.buffered[this.bufferIndex++];
  }

  private async nextResponse(): Promise<NextResponse> {
    const pending = this.iterator.next();
    try {
      return await Promise.race([pending, this.cancelled]);
    } catch (error) {
      throw this.fail(error instanceof Error ? error : new Error(String(error)));
    } finally {
      if (this._state === 'cancelled') {
        pending.catch((error: unknown) => {
          this.logger.debug('Read stream source failed after cancel', {
            operation: 'readRows',
            cause: error instanceof Error ? error.message : String(error),
          });
        });
      }
    }
  }

  private acceptResponse(response: ReadRowsResponse): void {
    this._stats.responsesRead++;
    this.buffered = response.chunks;
    this.bufferIndex = 0;
    if (response.lastScannedRowKey !== undefined && response.lastScannedRowKey.length > 0) {
      this._lastScannedRowKey = copyBytes(response.lastScannedRowKey);
    }
  }

  private applyChunk(chunk: CellChunk): Row | null {
    this._stats.chunksRead++;
    this._stats.bytesRead += chunk.value?.length ?? 0;

    try {
      if (!this.partial.chunksEncountered && chunk.resetRow !== true) {
        this.checkRowStart(chunk);
      }
      const result = this.partial.applyChunk(chunk);
      if (result === 'pending') {
        this._state = this.partial.chunksEncountered ? 'row-in-progress' : 'awaiting-row';
        return null;
      }
    } catch (error) {
      throw this.fail(error instanceof Error ? error : new Error(String(error)));
    }

    const row = this.partial.toRow();
    this.partial = new PartialRowData();
    this._state = 'awaiting-row';
    this._lastRowKey = row.rowKey;
    this._lastScannedRowKey = row.rowKey;
    this._stats.rowsRead++;
    return row;
  }

  private checkRowStart(chunk: CellChunk): void {
    if (chunk.rowKey === undefined) {
      throw MalformedChunkSequenceError.invalidChunk('a new row must begin with a row key');
    }
    if (
      this.validateRowOrder &&
      this._lastRowKey !== undefined &&
      compareBytes(chunk.rowKey, this._lastRowKey) <= 0
    ) {
      throw MalformedChunkSequenceError.rowKeyOutOfOrder(
        describeBytes(this._lastRowKey),
        describeBytes(chunk.rowKey)
      );
    }
  }

  private finish(): void {
    if (this.partial.chunksEncountered) {
      const rowKey = this.partial.rowKey;
      throw this.fail(
        MalformedChunkSequenceError.pendingRowAtEndOfStream(rowKey === undefined ? '' : describeBytes(rowKey))
      );
    }
    this._state = 'done';
    this.detachSignal();
    this.logger.debug('Read stream finished', {
      operation: 'readRows',
      rowsRead: this._stats.rowsRead,
      chunksRead: this._stats.chunksRead,
    });
  }

  private fail(error: Error): Error {
    this._state = 'failed';
    this.failure = error;
    this.partial.reset();
    this.detachSignal();
    this.closeSource('failed');
    return error;
  }

  private detachSignal(): void {
    this.signal?.removeEventListener('abort', this.onAbort);
  }

  private closeSource(reason: string): void {
    const closing = this.iterator.return?.();
    closing?.catch((error: unknown) => {
      this.logger.warn('Closing read stream source failed', {
        operation: 'readRows',
        reason,
        cause: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
