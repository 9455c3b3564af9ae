import { describe, it, expect, vi } from 'vitest';
import { describeBytes, toBytes } from '../bytes.js';
import type { CellChunk, ReadRowsResponse } from '../chunks.js';
import { ErrorCode, MalformedChunkSequenceError, StreamingCancelledError, TransportError } from '../errors.js';
import { createTestLogger } from '../logging.js';
import { RowsReader } from '../rows-reader.js';

function rowChunks(key: string, value = `value-of-${key}`): CellChunk[] {
  return [
    { rowKey: toBytes(key), familyName: 'cf1', qualifier: toBytes('col'), timestampMicros: 1_000, value: toBytes(value) },
    { commitRow: true },
  ];
}

async function* stream(responses: ReadRowsResponse[]): AsyncGenerator<ReadRowsResponse> {
  for (const response of responses) {
    yield response;
  }
}

function keysOf(rows: Iterable<{ rowKey: Uint8Array }>): string[] {
  return [...rows].map(row => describeBytes(row.rowKey));
}

describe('RowsReader', () => {
  it('yields committed rows across response boundaries', async () => {
    const [first, commit] = rowChunks('a');
    const reader = new RowsReader(
      stream([{ chunks: [first] }, { chunks: [commit, ...rowChunks('b')] }])
    );

    const keys: string[] = [];
    for await (const row of reader) {
      keys.push(describeBytes(row.rowKey));
    }

    expect(keys).toEqual(['a', 'b']);
    expect(reader.state).toBe('done');
    expect(reader.stats).toEqual({ rowsRead: 2, chunksRead: 4, responsesRead: 2, bytesRead: 20 });
  });

  it('returns null from the cursor once exhausted', async () => {
    const reader = new RowsReader(stream([{ chunks: rowChunks('a') }]));
    expect(describeBytes((await reader.readNextRow())?.rowKey ?? new Uint8Array())).toBe('a');
    expect(await reader.readNextRow()).toBeNull();
    expect(await reader.readNextRow()).toBeNull();
  });

  it('consumeAll collects rows and is idempotent', async () => {
    const reader = new RowsReader(stream([{ chunks: [...rowChunks('a'), ...rowChunks('b')] }]));
    await reader.consumeAll();
    await reader.consumeAll();

    expect(keysOf(reader.rows.values())).toEqual(['a', 'b']);
    expect(reader.rows.get('b')?.cellValue('cf1', 'col')).toEqual(toBytes('value-of-b'));
    expect(reader.rows.get('missing')).toBeUndefined();
  });

  it('continues after an early break', async () => {
    const reader = new RowsReader(
      stream([{ chunks: [...rowChunks('a'), ...rowChunks('b'), ...rowChunks('c')] }])
    );

    for await (const row of reader) {
      expect(describeBytes(row.rowKey)).toBe('a');
      break;
    }
    expect(reader.state).toBe('awaiting-row');

    await reader.consumeAll();
    expect(keysOf(reader.rows.values())).toEqual(['b', 'c']);
  });

  it('tolerates a reset between rows', async () => {
    const reader = new RowsReader(
      stream([{ chunks: [...rowChunks('a'), { resetRow: true }, ...rowChunks('b')] }])
    );
    await reader.consumeAll();
    expect(keysOf(reader.rows.values())).toEqual(['a', 'b']);
  });

  it('discards a row interrupted by a reset', async () => {
    const [aCell] = rowChunks('a', 'partial');
    const reader = new RowsReader(
      stream([{ chunks: [aCell, { resetRow: true }, ...rowChunks('a', 'complete')] }])
    );
    await reader.consumeAll();
    expect(reader.rows.get('a')?.cellValue('cf1', 'col')).toEqual(toBytes('complete'));
    expect(reader.rows.get('a')?.cellCount).toBe(1);
  });

  it('fails when a new row has no key', async () => {
    const reader = new RowsReader(
      stream([{ chunks: [...rowChunks('a'), { familyName: 'cf1', qualifier: toBytes('q'), value: toBytes('v') }] }])
    );
    await expect(reader.consumeAll()).rejects.toBeInstanceOf(MalformedChunkSequenceError);
    expect(reader.state).toBe('failed');
  });

  it('fails when row keys do not increase', async () => {
    const reader = new RowsReader(stream([{ chunks: [...rowChunks('b'), ...rowChunks('a')] }]));
    await expect(reader.consumeAll()).rejects.toMatchObject({ code: ErrorCode.ROW_KEY_OUT_OF_ORDER });
  });

  it('accepts unordered row keys when row order checks are off', async () => {
    const reader = new RowsReader(stream([{ chunks: [...rowChunks('b'), ...rowChunks('a')] }]), {
      validateRowOrder: false,
    });
    const keys: string[] = [];
    for await (const row of reader) {
      keys.push(describeBytes(row.rowKey));
    }
    expect(keys).toEqual(['b', 'a']);
  });

  it('fails on a repeated row key', async () => {
    const reader = new RowsReader(stream([{ chunks: [...rowChunks('a'), ...rowChunks('a')] }]));
    await expect(reader.consumeAll()).rejects.toMatchObject({ code: ErrorCode.ROW_KEY_OUT_OF_ORDER });
  });

  it('fails when the stream ends mid-row', async () => {
    const [aCell] = rowChunks('a');
    const reader = new RowsReader(stream([{ chunks: [aCell] }]));
    await expect(reader.readNextRow()).rejects.toMatchObject({
      code: ErrorCode.PENDING_ROW_AT_END_OF_STREAM,
    });
    await expect(reader.readNextRow()).rejects.toMatchObject({
      code: ErrorCode.PENDING_ROW_AT_END_OF_STREAM,
    });
  });

  it('propagates source errors unchanged', async () => {
    const failure = TransportError.unavailable();
    async function* failing(): AsyncGenerator<ReadRowsResponse> {
      yield { chunks: rowChunks('a') };
      throw failure;
    }
    const reader = new RowsReader(failing());
    expect(await reader.readNextRow()).not.toBeNull();
    await expect(reader.readNextRow()).rejects.toBe(failure);
    expect(reader.state).toBe('failed');
  });

  it('tracks the last scanned row key', async () => {
    const reader = new RowsReader(
      stream([{ chunks: rowChunks('a') }, { chunks: [], lastScannedRowKey: toBytes('m') }])
    );
    await reader.readNextRow();
    expect(reader.lastRowKey).toEqual(toBytes('a'));
    await reader.consumeAll();
    expect(reader.lastScannedRowKey).toEqual(toBytes('m'));
  });

  describe('cancellation', () => {
    it('stops yielding and closes the source', async () => {
      const closed = vi.fn();
      async function* source(): AsyncGenerator<ReadRowsResponse> {
        try {
          yield { chunks: rowChunks('a') };
          yield { chunks: rowChunks('b') };
        } finally {
          closed();
        }
      }
      const reader = new RowsReader(source());
      await reader.readNextRow();
      reader.cancel();

      expect(reader.state).toBe('cancelled');
      expect(await reader.readNextRow()).toBeNull();
      await vi.waitFor(() => expect(closed).toHaveBeenCalledTimes(1));
    });

    it('discards the partial row', async () => {
      const [aCell] = rowChunks('a');
      const reader = new RowsReader(stream([{ chunks: [aCell] }, { chunks: [{ commitRow: true }] }]));
      const pending = reader.readNextRow();
      reader.cancel();
      expect(await pending).toBeNull();
      await reader.consumeAll();
      expect(reader.rows.size).toBe(0);
    });

    it('rejects pending reads when aborted through the signal', async () => {
      const controller = new AbortController();
      async function* never(): AsyncGenerator<ReadRowsResponse> {
        await new Promise<void>(() => {});
        yield { chunks: [] };
      }
      const reader = new RowsReader(never(), { signal: controller.signal });
      const pending = reader.readNextRow();
      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(StreamingCancelledError);
      expect(reader.state).toBe('cancelled');
    });

    it('is cancelled from the start by an already aborted signal', async () => {
      const reader = new RowsReader(stream([{ chunks: rowChunks('a') }]), { signal: AbortSignal.abort() });
      await expect(reader.readNextRow()).rejects.toBeInstanceOf(StreamingCancelledError);
    });
  });

  it('logs completion at debug', async () => {
    const logger = createTestLogger();
    const reader = new RowsReader(stream([{ chunks: rowChunks('a') }]), { logger });
    await reader.consumeAll();
    expect(logger.getLogsByLevel('debug').map(entry => entry.context)).toEqual([
      { operation: 'readRows', rowsRead: 1, chunksRead: 2 },
    ]);
  });
});
