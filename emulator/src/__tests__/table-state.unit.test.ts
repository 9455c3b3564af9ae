import { describe, it, expect, beforeEach } from 'vitest';
import {
  AlreadyExistsError,
  decodeUtf8,
  describeBytes,
  NotFoundError,
  RowSet,
  StatusCode,
  toBytes,
  TransportError,
} from '@widecol/core';
import type { MutationRequest } from '@widecol/client';

import { TableState } from '../table-state.js';

const NOW = 5_123_456;

function setCell(familyName: string, qualifier: string, value: string, timestampMicros = -1): MutationRequest {
  return { type: 'setCell', familyName, qualifier: toBytes(qualifier), value: toBytes(value), timestampMicros };
}

function dump(table: TableState, rows?: RowSet): string[] {
  return [...table.scan(rows?.toRequest(), NOW)].flatMap(row =>
    row.cells.map(
      c => `${describeBytes(row.key)}/${c.family}:${decodeUtf8(c.qualifier)}@${c.cell.timestampMicros}=${decodeUtf8(c.cell.value)}`
    )
  );
}

describe('TableState', () => {
  let table: TableState;

  beforeEach(() => {
    table = new TableState('projects/p/instances/i/tables/t', { cf1: {}, cf2: {} }, [toBytes('m'), toBytes('c'), toBytes('m')]);
  });

  describe('mutateRow', () => {
    it('assigns server timestamps floored to milliseconds', () => {
      table.mutateRow(toBytes('r1'), [setCell('cf1', 'q', 'v')], NOW);
      expect(dump(table)).toEqual(['r1/cf1:q@5123000=v']);
    });

    it('overwrites a cell with the same timestamp', () => {
      table.mutateRow(toBytes('r1'), [setCell('cf1', 'q', 'first', 1_000)], NOW);
      table.mutateRow(toBytes('r1'), [setCell('cf1', 'q', 'second', 1_000), setCell('cf1', 'q', 'older', 0)], NOW);
      expect(dump(table)).toEqual(['r1/cf1:q@1000=second', 'r1/cf1:q@0=older']);
    });

    it('rejects timestamps that are not whole milliseconds and applies nothing', () => {
      let caught: unknown;
      try {
        table.mutateRow(toBytes('r1'), [setCell('cf1', 'a', 'v', 1_000), setCell('cf1', 'b', 'v', 1_500)], NOW);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(TransportError);
      expect(caught).toMatchObject({ status: StatusCode.INVALID_ARGUMENT });
      expect(table.rowCount).toBe(0);
    });

    it('rejects unknown families and applies nothing', () => {
      expect(() =>
        table.mutateRow(toBytes('r1'), [setCell('cf1', 'a', 'v', 1_000), setCell('nope', 'b', 'v', 1_000)], NOW)
      ).toThrow(NotFoundError);
      expect(table.rowCount).toBe(0);
    });

    it('deletes cells of a column within a time range', () => {
      table.mutateRow(
        toBytes('r1'),
        [setCell('cf1', 'q', 'a', 1_000), setCell('cf1', 'q', 'b', 2_000), setCell('cf1', 'q', 'c', 3_000)],
        NOW
      );
      table.mutateRow(
        toBytes('r1'),
        [
          {
            type: 'deleteFromColumn',
            familyName: 'cf1',
            qualifier: toBytes('q'),
            timeRange: { startTimestampMicros: 2_000, endTimestampMicros: 3_000 },
          },
        ],
        NOW
      );
      expect(dump(table)).toEqual(['r1/cf1:q@3000=c', 'r1/cf1:q@1000=a']);
    });

    it('deletes families and whole rows', () => {
      table.mutateRow(toBytes('r1'), [setCell('cf1', 'a', '1', 1_000), setCell('cf2', 'b', '2', 1_000)], NOW);
      table.mutateRow(toBytes('r1'), [{ type: 'deleteFromFamily', familyName: 'cf1' }], NOW);
      expect(dump(table)).toEqual(['r1/cf2:b@1000=2']);

      table.mutateRow(toBytes('r1'), [{ type: 'deleteFromRow' }], NOW);
      expect(table.rowCount).toBe(0);
    });

    it('applies mutations in order within a row', () => {
      table.mutateRow(toBytes('r1'), [{ type: 'deleteFromRow' }, setCell('cf1', 'a', 'after', 1_000)], NOW);
      expect(dump(table)).toEqual(['r1/cf1:a@1000=after']);
    });
  });

  describe('column families', () => {
    it('garbage-collects on write with the family rule', () => {
      table.modifyColumnFamilies([{ type: 'update', id: 'cf1', gcRule: { maxNumVersions: 1 } }], NOW);
      table.mutateRow(toBytes('r1'), [setCell('cf1', 'q', 'old', 1_000), setCell('cf1', 'q', 'new', 2_000)], NOW);
      expect(dump(table)).toEqual(['r1/cf1:q@2000=new']);
    });

    it('applies modifications atomically', () => {
      expect(() =>
        table.modifyColumnFamilies(
          [
            { type: 'create', id: 'cf3' },
            { type: 'create', id: 'cf1' },
          ],
          NOW
        )
      ).toThrow(AlreadyExistsError);
      expect(Object.keys(table.toResource().columnFamilies)).toEqual(['cf1', 'cf2']);
    });

    it('drops the data of a dropped family', () => {
      table.mutateRow(toBytes('r1'), [setCell('cf1', 'a', '1', 1_000), setCell('cf2', 'b', '2', 1_000)], NOW);
      table.mutateRow(toBytes('r2'), [setCell('cf1', 'a', '1', 1_000)], NOW);
      table.modifyColumnFamilies([{ type: 'drop', id: 'cf1' }], NOW);

      expect(dump(table)).toEqual(['r1/cf2:b@1000=2']);
      expect(table.rowCount).toBe(1);
    });

    it('rejects updates of missing families', () => {
      expect(() => table.modifyColumnFamilies([{ type: 'update', id: 'cf9' }], NOW)).toThrow(NotFoundError);
    });

    it('describes only names in the NAME_ONLY view', () => {
      table.modifyColumnFamilies([{ type: 'update', id: 'cf2', gcRule: { maxAgeMs: 5 } }], NOW);
      expect(table.toResource('NAME_ONLY')).toEqual({ name: 'projects/p/instances/i/tables/t', columnFamilies: {} });
      expect(table.toResource().columnFamilies).toEqual({ cf1: {}, cf2: { gcRule: { maxAgeMs: 5 } } });
    });
  });

  describe('scan', () => {
    beforeEach(() => {
      for (const key of ['a', 'b', 'c', 'd']) {
        table.mutateRow(toBytes(key), [setCell('cf1', 'q', key, 1_000)], NOW);
      }
    });

    it('returns rows of a row set in key order', () => {
      const rows = new RowSet().addRowKey('d').addRowRangeWithPrefix('a').addRowKey('b');
      expect([...table.scan(rows.toRequest(), NOW)].map(row => describeBytes(row.key))).toEqual(['a', 'b', 'd']);
    });

    it('drops rows by prefix and counts them', () => {
      table.mutateRow(toBytes('ab'), [setCell('cf1', 'q', 'ab', 1_000)], NOW);
      expect(table.dropRowsWithPrefix(toBytes('a'))).toBe(2);
      expect([...table.scan(undefined, NOW)].map(row => describeBytes(row.key))).toEqual(['b', 'c', 'd']);
    });

    it('drops every row', () => {
      table.dropAllRows();
      expect(table.rowCount).toBe(0);
    });
  });

  describe('sampleRowKeys', () => {
    it('reports one sample per split key and a final sample', () => {
      // each row: key (1) + qualifier (1) + value (2) + 8
      for (const key of ['a', 'd', 'x']) {
        table.mutateRow(toBytes(key), [setCell('cf1', 'q', 'vv', 1_000)], NOW);
      }

      const samples = table.sampleRowKeys().map(s => [describeBytes(s.rowKey), s.offsetBytes]);
      expect(samples).toEqual([
        ['c', 12],
        ['m', 24],
        ['', 36],
      ]);
    });
  });
});
