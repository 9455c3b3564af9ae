import { describe, it, expect } from 'vitest';
import {
  decodeUtf8,
  describeBytes,
  RetryError,
  RowRange,
  RowSet,
  StatusCode,
  toBytes,
  TransportError,
  type ReadRowsResponse,
  type ResolvedRetryOptions,
} from '@widecol/core';
import { cellChunk, createScriptedDataTransport, response, singleCellRow } from '@widecol/test-utils';

import { createResumableReadStream, ReadProgress, resumeRequest, rowSetAfter } from '../read-rows.js';
import type { ReadRowsRequest } from '../transport.js';
import { createScriptedClient, TABLE_NAME } from './test-helpers.js';

const NO_BACKOFF: ResolvedRetryOptions = { maxRetries: 3, baseDelay: 0, maxDelay: 0, jitter: false };

async function collect(stream: AsyncIterable<ReadRowsResponse>): Promise<ReadRowsResponse[]> {
  const out: ReadRowsResponse[] = [];
  for await (const item of stream) {
    out.push(item);
  }
  return out;
}

describe('ReadProgress', () => {
  it('tracks committed rows and ignores the row in flight', () => {
    const progress = new ReadProgress();
    progress.observe(
      response(singleCellRow('a', 'cf1', 'q', 'v'), cellChunk({ rowKey: 'b', familyName: 'cf1', qualifier: 'q', timestampMicros: 1, value: 'v' }))
    );
    expect(progress.rowsCommitted).toBe(1);
    expect(describeBytes(progress.resumeAfter ?? new Uint8Array())).toBe('a');
  });

  it('resumes after the last scanned key when it is further along', () => {
    const progress = new ReadProgress();
    progress.observe({ chunks: [singleCellRow('a', 'cf1', 'q', 'v')], lastScannedRowKey: toBytes('m') });
    expect(describeBytes(progress.resumeAfter ?? new Uint8Array())).toBe('m');

    progress.observe(response(singleCellRow('z', 'cf1', 'q', 'v')));
    expect(describeBytes(progress.resumeAfter ?? new Uint8Array())).toBe('z');
  });

  it('forgets a row dropped by a reset chunk', () => {
    const progress = new ReadProgress();
    progress.observe(response(cellChunk({ rowKey: 'a', familyName: 'cf1', qualifier: 'q', timestampMicros: 1, value: 'v' })));
    progress.observe(response({ resetRow: true }, { commitRow: true }));
    expect(progress.rowsCommitted).toBe(0);
    expect(progress.resumeAfter).toBeUndefined();
  });
});

describe('rowSetAfter', () => {
  it('turns a full-table read into an open range after the key', () => {
    expect(rowSetAfter(undefined, toBytes('b'))).toEqual({
      rowKeys: [],
      rowRanges: [{ startKeyOpen: toBytes('b') }],
    });
  });

  it('drops delivered keys and narrows ranges that started before the key', () => {
    const rows = new RowSet()
      .addRowKey('a')
      .addRowKey('c')
      .addRowRange(new RowRange('b', 'd'))
      .addRowRange(new RowRange('x', 'y', true, true))
      .addRowRange(new RowRange(undefined, 'b'))
      .toRequest();

    expect(rowSetAfter(rows, toBytes('b'))).toEqual({
      rowKeys: [toBytes('c')],
      rowRanges: [
        { startKeyOpen: toBytes('b'), endKeyOpen: toBytes('d') },
        { startKeyClosed: toBytes('x'), endKeyClosed: toBytes('y') },
      ],
    });
  });

  it('returns null when nothing is left', () => {
    const rows = new RowSet().addRowKey('a').addRowRange(new RowRange('0', 'a', true, true)).toRequest();
    expect(rowSetAfter(rows, toBytes('a'))).toBeNull();
  });
});

describe('resumeRequest', () => {
  const original: ReadRowsRequest = { tableName: TABLE_NAME, rowsLimit: 3 };

  it('reduces the row limit by the rows already read', () => {
    const progress = new ReadProgress();
    progress.observe(response(singleCellRow('a', 'cf1', 'q', 'v')));
    expect(resumeRequest(original, progress)).toEqual({
      tableName: TABLE_NAME,
      rowsLimit: 2,
      rows: { rowKeys: [], rowRanges: [{ startKeyOpen: toBytes('a') }] },
    });
  });

  it('finishes once the limit is reached', () => {
    const progress = new ReadProgress();
    progress.observe(
      response(singleCellRow('a', 'cf1', 'q', 'v'), singleCellRow('b', 'cf1', 'q', 'v'), singleCellRow('c', 'cf1', 'q', 'v'))
    );
    expect(resumeRequest(original, progress)).toBeNull();
  });

  it('repeats the original request when nothing was delivered', () => {
    expect(resumeRequest({ tableName: TABLE_NAME }, new ReadProgress())).toEqual({ tableName: TABLE_NAME });
  });
});

describe('createResumableReadStream', () => {
  it('resumes after a retryable failure with a reset chunk in between', async () => {
    const transport = createScriptedDataTransport();
    const first = response(
      singleCellRow('a', 'cf1', 'q', '1'),
      cellChunk({ rowKey: 'b', familyName: 'cf1', qualifier: 'q', timestampMicros: 1_000, value: 'partial' })
    );
    const second = response(singleCellRow('b', 'cf1', 'q', '2'));
    transport.scriptRead(first, TransportError.unavailable());
    transport.scriptRead(second);

    const responses = await collect(
      createResumableReadStream(transport, { tableName: TABLE_NAME }, { retry: NO_BACKOFF })
    );

    expect(responses).toEqual([first, { chunks: [{ resetRow: true }] }, second]);
    expect(transport.readRequests).toHaveLength(2);
    expect(transport.readRequests[1].rows).toEqual({ rowKeys: [], rowRanges: [{ startKeyOpen: toBytes('a') }] });
  });

  it('resumes a keyed read with the remaining keys and limit', async () => {
    const transport = createScriptedDataTransport();
    transport.scriptRead(response(singleCellRow('a', 'cf1', 'q', 'v')), TransportError.unavailable());
    transport.scriptRead();
    const request: ReadRowsRequest = {
      tableName: TABLE_NAME,
      rows: new RowSet().addRowKey('a').addRowKey('b').addRowKey('c').toRequest(),
      rowsLimit: 3,
    };

    await collect(createResumableReadStream(transport, request, { retry: NO_BACKOFF }));

    expect(transport.readRequests[1]).toEqual({
      tableName: TABLE_NAME,
      rows: { rowKeys: [toBytes('b'), toBytes('c')], rowRanges: [] },
      rowsLimit: 2,
    });
  });

  it('gives up with RetryError after the configured retries', async () => {
    const transport = createScriptedDataTransport();
    for (let i = 0; i < 3; i++) {
      transport.scriptRead(TransportError.unavailable('node restarting'));
    }

    const error = await collect(
      createResumableReadStream(transport, { tableName: TABLE_NAME }, { retry: { ...NO_BACKOFF, maxRetries: 2 } })
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryError);
    expect(error).toMatchObject({ attempts: 3, message: 'All 3 retry attempts failed: node restarting' });
    expect(transport.readRequests).toHaveLength(3);
  });

  it('counts attempts that deliver no committed row as consecutive failures', async () => {
    const transport = createScriptedDataTransport();
    for (let i = 0; i < 5; i++) {
      transport.scriptRead(
        response(cellChunk({ rowKey: 'a', familyName: 'cf1', qualifier: 'q', timestampMicros: 1_000, value: 'par', valueSize: 9 })),
        TransportError.unavailable('node restarting')
      );
    }

    const error = await collect(
      createResumableReadStream(transport, { tableName: TABLE_NAME }, { retry: NO_BACKOFF })
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryError);
    expect(error).toMatchObject({ attempts: 4, message: 'All 4 retry attempts failed: node restarting' });
    expect(transport.readRequests).toHaveLength(4);
  });

  it('restarts the failure count once an attempt commits a row', async () => {
    const transport = createScriptedDataTransport();
    transport.scriptRead(response(singleCellRow('a', 'cf1', 'q', '1')), TransportError.unavailable());
    transport.scriptRead(response(singleCellRow('b', 'cf1', 'q', '2')), TransportError.unavailable());
    transport.scriptRead(response(singleCellRow('c', 'cf1', 'q', '3')));

    const responses = await collect(
      createResumableReadStream(transport, { tableName: TABLE_NAME }, { retry: { ...NO_BACKOFF, maxRetries: 1 } })
    );

    expect(responses).toHaveLength(5);
    expect(transport.readRequests).toHaveLength(3);
  });

  it('rethrows errors that are not retryable', async () => {
    const transport = createScriptedDataTransport();
    transport.scriptRead(new TransportError('bad filter', StatusCode.INVALID_ARGUMENT));

    await expect(
      collect(createResumableReadStream(transport, { tableName: TABLE_NAME }, { retry: NO_BACKOFF }))
    ).rejects.toThrow('bad filter');
    expect(transport.readRequests).toHaveLength(1);
  });
});

describe('Table.readRows resumption', () => {
  it('assembles the same rows as an uninterrupted read', async () => {
    const { table, data } = createScriptedClient();
    data.scriptRead(
      response(
        singleCellRow('a', 'cf1', 'q', '1'),
        cellChunk({ rowKey: 'b', familyName: 'cf1', qualifier: 'q', timestampMicros: 1_000, value: 'stale' })
      ),
      TransportError.unavailable()
    );
    data.scriptRead(response(singleCellRow('b', 'cf1', 'q', '2')));

    const reader = table.readRows();
    await reader.consumeAll();

    expect([...reader.rows.keys()].map(key => describeBytes(key))).toEqual(['a', 'b']);
    expect(decodeUtf8(reader.rows.get('b')?.cellValue('cf1', 'q') ?? new Uint8Array())).toBe('2');
  });
});
