/**
 * Contents of one emulated table: column families, split keys and rows.
 *
 * Rows map family -> qualifier -> cells, newest first. Garbage collection
 * runs on the columns a mutation touched and again on every read, since
 * age-based rules depend on the clock.
 *
 * @module table-state
 */

import {
  AlreadyExistsError,
  ByteKeyMap,
  Cell,
  compareBytes,
  copyBytes,
  hasPrefix,
  insertByTimestampDesc,
  MICROS_PER_MILLI,
  NotFoundError,
  RowSet,
  SERVER_ASSIGNED_TIMESTAMP,
  StatusCode,
  TransportError,
  type RowSetRequest,
  type TimestampRangeRequest,
} from '@widecol/core';
import type {
  ColumnFamilyModification,
  ColumnFamilyResource,
  GCRuleRequest,
  MutationRequest,
  SampleRowKeysResponse,
  TableResource,
  TableView,
} from '@widecol/client';

import type { FlatCell } from './filters.js';
import { applyGCRule } from './gc.js';

type Columns = ByteKeyMap<Cell[]>;
type StoredRow = Map<string, Columns>;

/** Bytes a cell adds to the table size beyond its qualifier and value */
const CELL_OVERHEAD_BYTES = 8;

function inTimeRange(timestampMicros: number, range: TimestampRangeRequest | undefined): boolean {
  if (range === undefined) return true;
  if (range.startTimestampMicros !== undefined && timestampMicros < range.startTimestampMicros) return false;
  if (range.endTimestampMicros !== undefined && timestampMicros >= range.endTimestampMicros) return false;
  return true;
}

export class TableState {
  readonly name: string;
  private readonly families = new Map<string, ColumnFamilyResource>();
  private readonly splitKeys: Uint8Array[];
  private readonly rows = new ByteKeyMap<StoredRow>();

  constructor(name: string, families: Record<string, ColumnFamilyResource>, splitKeys: readonly Uint8Array[]) {
    this.name = name;
    for (const [id, family] of Object.entries(families)) {
      this.families.set(id, { ...family });
    }
    this.splitKeys = [...splitKeys]
      .filter(key => key.length > 0)
      .map(key => copyBytes(key))
      .sort(compareBytes)
      .filter((key, i, sorted) => i === 0 || compareBytes(sorted[i - 1], key) !== 0);
  }

  get rowCount(): number {
    return this.rows.size;
  }

  toResource(view: TableView = 'SCHEMA_VIEW'): TableResource {
    const columnFamilies: Record<string, ColumnFamilyResource> = {};
    if (view !== 'NAME_ONLY') {
      for (const id of [...this.families.keys()].sort()) {
        const family = this.families.get(id);
        if (family !== undefined) columnFamilies[id] = { ...family };
      }
    }
    return { name: this.name, columnFamilies };
  }

  /**
   * Apply every modification or none of them.
   */
  modifyColumnFamilies(modifications: readonly ColumnFamilyModification[], nowMicros: number): void {
    const next = new Map(this.families);
    for (const modification of modifications) {
      const exists = next.has(modification.id);
      switch (modification.type) {
        case 'create':
          if (exists) throw AlreadyExistsError.resource('Column family', modification.id);
          next.set(modification.id, gcRuleResource(modification.gcRule));
          break;
        case 'update':
          if (!exists) throw NotFoundError.resource('Column family', modification.id);
          next.set(modification.id, gcRuleResource(modification.gcRule));
          break;
        case 'drop':
          if (!exists) throw NotFoundError.resource('Column family', modification.id);
          next.delete(modification.id);
          break;
      }
    }

    this.families.clear();
    for (const [id, family] of next) this.families.set(id, family);
    for (const [key, row] of this.rows) {
      for (const family of [...row.keys()]) {
        if (!this.families.has(family)) row.delete(family);
      }
      this.collect(key, row, nowMicros);
    }
  }

  /**
   * Apply a row's mutations atomically.
   *
   * @throws NotFoundError when a mutation names an unknown family
   * @throws TransportError INVALID_ARGUMENT for timestamps that are not
   * whole milliseconds
   */
  mutateRow(rowKey: Uint8Array, mutations: readonly MutationRequest[], nowMicros: number): void {
    for (const mutation of mutations) {
      if (mutation.type === 'deleteFromRow') continue;
      if (!this.families.has(mutation.familyName)) {
        throw NotFoundError.resource('Column family', mutation.familyName);
      }
      if (
        mutation.type === 'setCell' &&
        mutation.timestampMicros !== SERVER_ASSIGNED_TIMESTAMP &&
        mutation.timestampMicros % MICROS_PER_MILLI !== 0
      ) {
        throw new TransportError(
          `Timestamp ${mutation.timestampMicros} is not a whole number of milliseconds`,
          StatusCode.INVALID_ARGUMENT
        );
      }
    }

    let row = this.rows.get(rowKey);
    if (row === undefined) {
      row = new Map();
      this.rows.set(rowKey, row);
    }
    for (const mutation of mutations) {
      if (mutation.type === 'deleteFromRow') {
        row.clear();
      } else {
        this.applyMutation(row, mutation, nowMicros);
      }
    }
    this.collect(rowKey, row, nowMicros);
  }

  /**
   * Rows selected by `rows` (all rows when absent or empty) in key order,
   * with garbage-collected cells left out.
   */
  *scan(rows: RowSetRequest | undefined, nowMicros: number): Generator<{ key: Uint8Array; cells: FlatCell[] }> {
    const rowSet = rows === undefined ? new RowSet() : RowSet.fromRequest(rows);
    for (const [key, row] of this.rows) {
      if (!rowSet.contains(key)) continue;
      const cells: FlatCell[] = [];
      for (const family of [...row.keys()].sort()) {
        const columns = row.get(family);
        if (columns === undefined) continue;
        const rule = this.families.get(family)?.gcRule;
        for (const [qualifier, versions] of columns) {
          for (const cell of applyGCRule(versions, rule, nowMicros)) {
            cells.push({ family, qualifier, cell });
          }
        }
      }
      if (cells.length > 0) {
        yield { key, cells };
      }
    }
  }

  dropAllRows(): void {
    this.rows.clear();
  }

  /**
   * @returns the number of rows deleted
   */
  dropRowsWithPrefix(prefix: Uint8Array): number {
    let dropped = 0;
    for (const key of this.rows.keys()) {
      if (hasPrefix(key, prefix)) {
        this.rows.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  /**
   * One sample per split key plus a final sample with an empty key; each
   * offset is the approximate size of the rows sorting before the key.
   */
  sampleRowKeys(): SampleRowKeysResponse[] {
    const sizes = this.rows.entries().map(([key, row]) => ({ key, size: rowSize(key, row) }));
    const offsetBefore = (boundary: Uint8Array | undefined): number =>
      sizes
        .filter(({ key }) => boundary === undefined || compareBytes(key, boundary) < 0)
        .reduce((total, { size }) => total + size, 0);

    return [
      ...this.splitKeys.map(key => ({ rowKey: copyBytes(key), offsetBytes: offsetBefore(key) })),
      { rowKey: new Uint8Array(0), offsetBytes: offsetBefore(undefined) },
    ];
  }

  private applyMutation(
    row: StoredRow,
    mutation: Exclude<MutationRequest, { type: 'deleteFromRow' }>,
    nowMicros: number
  ): void {
    switch (mutation.type) {
      case 'setCell': {
        const timestampMicros =
          mutation.timestampMicros === SERVER_ASSIGNED_TIMESTAMP
            ? Math.floor(nowMicros / MICROS_PER_MILLI) * MICROS_PER_MILLI
            : mutation.timestampMicros;
        let columns = row.get(mutation.familyName);
        if (columns === undefined) {
          columns = new ByteKeyMap();
          row.set(mutation.familyName, columns);
        }
        const versions = (columns.get(mutation.qualifier) ?? []).filter(
          cell => cell.timestampMicros !== timestampMicros
        );
        insertByTimestampDesc(versions, new Cell(mutation.value, timestampMicros));
        columns.set(mutation.qualifier, versions);
        return;
      }
      case 'deleteFromColumn': {
        const columns = row.get(mutation.familyName);
        const versions = columns?.get(mutation.qualifier);
        if (columns === undefined || versions === undefined) return;
        const kept = versions.filter(cell => !inTimeRange(cell.timestampMicros, mutation.timeRange));
        if (kept.length > 0) {
          columns.set(mutation.qualifier, kept);
        } else {
          columns.delete(mutation.qualifier);
        }
        return;
      }
      case 'deleteFromFamily':
        row.delete(mutation.familyName);
        return;
    }
  }

  /**
   * Drop collectable cells and anything left empty.
   */
  private collect(rowKey: Uint8Array, row: StoredRow, nowMicros: number): void {
    for (const [family, columns] of [...row.entries()]) {
      const rule = this.families.get(family)?.gcRule;
      for (const [qualifier, versions] of columns) {
        const kept = applyGCRule(versions, rule, nowMicros);
        if (kept.length > 0) {
          columns.set(qualifier, kept);
        } else {
          columns.delete(qualifier);
        }
      }
      if (columns.size === 0) row.delete(family);
    }
    if (row.size === 0) this.rows.delete(rowKey);
  }
}

function gcRuleResource(gcRule: GCRuleRequest | undefined): ColumnFamilyResource {
  return gcRule === undefined ? {} : { gcRule };
}

function rowSize(key: Uint8Array, row: StoredRow): number {
  let size = key.length;
  for (const columns of row.values()) {
    for (const [qualifier, versions] of columns) {
      for (const cell of versions) {
        size += qualifier.length + cell.value.length + CELL_OVERHEAD_BYTES;
      }
    }
  }
  return size;
}
