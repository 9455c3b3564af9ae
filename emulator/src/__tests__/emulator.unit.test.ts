import { describe, it, expect, beforeEach } from 'vitest';
import {
  createTestLogger,
  describeBytes,
  NotFoundError,
  RowFilters,
  filterToRequest,
  StatusCode,
  toBytes,
  TransportError,
  ValidationError,
  type ReadRowsResponse,
} from '@widecol/core';
import { InstanceType, type Client, type ReadRowsRequest, type Table, type Transport } from '@widecol/client';
import { createEmulatedClient } from '@widecol/test-utils';

import { Emulator } from '../emulator.js';

const INSTANCE = 'projects/test-project/instances/test-instance';
const TABLE = `${INSTANCE}/tables/test-table`;

async function collect(stream: AsyncIterable<ReadRowsResponse>): Promise<ReadRowsResponse[]> {
  const out: ReadRowsResponse[] = [];
  for await (const response of stream) {
    out.push(response);
  }
  return out;
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

describe('Emulator', () => {
  let emulator: Emulator;
  let client: Client;
  let table: Table;
  let transport: Transport;

  async function seed(keys: string[]): Promise<void> {
    for (const key of keys) {
      await table.row(key).setCell('cf1', 'q', `value-${key}`, { timestamp: 1_000 }).commit();
    }
  }

  beforeEach(async () => {
    emulator = new Emulator({ chunksPerResponse: 1, now: () => 1_700_000_000_000 });
    ({ client } = createEmulatedClient({
      emulatorInstance: emulator,
      config: { read: { initialRetryDelayMs: 0, maxRetryDelayMs: 0, retryJitter: false } },
    }));
    const instance = client.instance('test-instance', { type: InstanceType.DEVELOPMENT });
    await (await instance.create({ locationId: 'us-central1-c' })).result();
    table = instance.table('test-table');
    await table.create({ columnFamilies: { cf1: undefined } });
    transport = emulator.transport();
  });

  describe('reads', () => {
    it('honors the row limit', async () => {
      await seed(['a', 'b', 'c']);
      const responses = await collect(transport.data.readRows({ tableName: TABLE, rowsLimit: 2 }));
      expect(responses.map(r => describeBytes(r.chunks[0].rowKey ?? new Uint8Array()))).toEqual(['a', 'b']);
    });

    it('reports the last scanned key when the filter drops the last rows', async () => {
      await seed(['a', 'b', 'c']);
      const request: ReadRowsRequest = { tableName: TABLE, filter: filterToRequest(RowFilters.rowKeyRegex('a')) };
      const responses = await collect(transport.data.readRows(request));

      expect(responses).toHaveLength(2);
      expect(describeBytes(responses[1].lastScannedRowKey ?? new Uint8Array())).toBe('c');
    });

    it('rejects invalid requests with INVALID_ARGUMENT', async () => {
      const badLimit = await failure(collect(transport.data.readRows({ tableName: TABLE, rowsLimit: -1 })));
      expect(badLimit).toMatchObject({ status: StatusCode.INVALID_ARGUMENT });

      const badRegex = await failure(
        collect(transport.data.readRows({ tableName: TABLE, filter: { rowKeyRegexFilter: toBytes('(') } }))
      );
      expect(badRegex).toBeInstanceOf(TransportError);
      expect(badRegex).toMatchObject({ status: StatusCode.INVALID_ARGUMENT });
    });

    it('rejects reads of missing tables and app profiles', async () => {
      await expect(collect(transport.data.readRows({ tableName: `${INSTANCE}/tables/missing` }))).rejects.toThrow(
        NotFoundError
      );
      await expect(
        collect(transport.data.readRows({ tableName: TABLE, appProfileId: 'no-such-profile' }))
      ).rejects.toThrow(NotFoundError);
      expect(await collect(transport.data.readRows({ tableName: TABLE, appProfileId: 'default' }))).toEqual([]);
    });

    it('stops a read whose signal is aborted', async () => {
      await seed(['a']);
      const controller = new AbortController();
      controller.abort();
      const error = await failure(collect(transport.data.readRows({ tableName: TABLE }, { signal: controller.signal })));
      expect(error).toMatchObject({ status: StatusCode.CANCELLED });
    });
  });

  describe('read faults', () => {
    it('fails a read after the given number of chunks', async () => {
      await seed(['a', 'b', 'c']);
      emulator.failNextRead({ afterChunks: 2, code: StatusCode.INTERNAL, message: 'disk on fire' });

      const delivered: ReadRowsResponse[] = [];
      let caught: unknown;
      try {
        for await (const response of transport.data.readRows({ tableName: TABLE })) {
          delivered.push(response);
        }
      } catch (error) {
        caught = error;
      }

      expect(delivered).toHaveLength(2);
      expect(caught).toBeInstanceOf(TransportError);
      expect(caught).toMatchObject({ status: StatusCode.INTERNAL, message: 'disk on fire' });
      expect(emulator.pendingReadFaults).toBe(0);
    });

    it('fails at the end of a stream shorter than the fault offset', async () => {
      await seed(['a']);
      emulator.failNextRead({ afterChunks: 10 });
      const error = await failure(collect(transport.data.readRows({ tableName: TABLE })));
      expect(error).toMatchObject({ status: StatusCode.UNAVAILABLE, message: 'Injected read failure' });
    });

    it('is survived by the client through resumption', async () => {
      await seed(['a', 'b', 'c']);
      emulator.failNextRead({ afterChunks: 1 });
      emulator.failNextRead({ afterChunks: 1 });

      const reader = table.readRows();
      await reader.consumeAll();

      expect(reader.rows.keys().map(key => describeBytes(key))).toEqual(['a', 'b', 'c']);
      expect(emulator.pendingReadFaults).toBe(0);
    });

    it('drops queued faults on reset', () => {
      emulator.failNextRead();
      emulator.reset();
      expect(emulator.pendingReadFaults).toBe(0);
    });
  });

  describe('mutations', () => {
    it('reports a status per entry of mutateRows', async () => {
      const statuses = await table.mutateRows([
        table.row('a').setCell('cf1', 'q', 'v', { timestamp: 1_000 }),
        table.row('b').setCell('missing', 'q', 'v', { timestamp: 1_000 }),
      ]);

      expect(statuses.map(status => status.code)).toEqual([StatusCode.OK, StatusCode.NOT_FOUND]);
      expect(await table.readRow('b')).toBeNull();
    });

    it('rejects a mutateRow without mutations', async () => {
      const error = await failure(transport.data.mutateRow({ tableName: TABLE, rowKey: toBytes('a'), mutations: [] }));
      expect(error).toMatchObject({ status: StatusCode.INVALID_ARGUMENT });
      expect(error instanceof Error && error.message.startsWith('Invalid mutateRow request:')).toBe(true);
    });

    it('timestamps server-assigned cells with the emulator clock', async () => {
      await table.row('a').setCell('cf1', 'q', 'v').commit();
      const row = await table.readRow('a');
      expect(row?.cellsFor('cf1', 'q')?.[0]?.timestampMicros).toBe(1_700_000_000_000_000);
    });
  });

  describe('operations', () => {
    it('reports running for the configured number of polls', async () => {
      const slow = new Emulator({ operationPolls: 2 });
      const { client: slowClient } = createEmulatedClient({ emulatorInstance: slow });
      const operation = await slowClient.instance('slow-instance').create({ locationId: 'us-central1-c' });

      expect(await operation.done()).toBe(false);
      expect(await operation.done()).toBe(false);
      expect(await operation.done()).toBe(true);
    });
  });

  it('logs through the given logger', async () => {
    const logger = createTestLogger();
    const logged = new Emulator({ logger });
    const { client: loggedClient } = createEmulatedClient({ emulatorInstance: logged });
    await loggedClient.instance('test-instance').create({ locationId: 'us-central1-c' });

    expect(logger.getLogs().some(entry => entry.message === 'createInstance')).toBe(true);
  });

  it('validates its options', () => {
    expect(() => new Emulator({ chunksPerResponse: 0 })).toThrow(ValidationError);
    expect(() => new Emulator({ maxChunkValueBytes: 1.5 })).toThrow(ValidationError);
  });
});
