/**
 * Tables: schema administration and the data API.
 */

import {
  describeBytes,
  filterToRequest,
  NotFoundError,
  RowRange,
  RowSet,
  RowsReader,
  StatusCode,
  toBytes,
  validateFilter,
  validateTableId,
  ValidationError,
  type BytesLike,
  type Row,
  type RowFilter,
  type Status,
} from '@widecol/core';

import { ColumnFamily } from './column-family.js';
import type { GCRule } from './gc-rules.js';
import type { Instance } from './instance.js';
import { createResumableReadStream } from './read-rows.js';
import { DirectRow } from './row.js';
import { withTimeout } from './timeout.js';
import {
  tableName,
  type ColumnFamilyResource,
  type ReadRowsRequest,
  type SampleRowKeysResponse,
  type TableAdminTransport,
} from './transport.js';

export interface TableOptions {
  /** Overrides the client's configured app profile for this table's data requests */
  appProfileId?: string;
}

export interface CreateTableOptions {
  /** Keys to pre-split the table at */
  initialSplitKeys?: BytesLike[];
  /** Families to create with the table, with optional GC rules */
  columnFamilies?: Record<string, GCRule | undefined>;
}

export interface ReadRowsOptions {
  /** First key to read (inclusive) */
  startKey?: BytesLike;
  /** Key to stop at (exclusive unless `endInclusive`) */
  endKey?: BytesLike;
  endInclusive?: boolean;
  /** Maximum rows to return */
  limit?: number;
  filter?: RowFilter;
  /** Keys and ranges to read; cannot be combined with start or end keys */
  rowSet?: RowSet;
  signal?: AbortSignal;
}

export interface ReadRowOptions {
  filter?: RowFilter;
}

export interface DropRowsOptions {
  timeoutMs?: number;
}

/**
 * @example
 * ```typescript
 * const table = instance.table('my-table');
 * await table.create({ columnFamilies: { cf1: new MaxVersionsGCRule(1) } });
 *
 * const row = table.row('row-key-1');
 * row.setCell('cf1', 'col', 'value');
 * await row.commit();
 *
 * const reader = table.readRows({ startKey: 'row-key-0', limit: 10 });
 * await reader.consumeAll();
 * ```
 */
export class Table {
  readonly tableId: string;
  readonly name: string;
  readonly instance: Instance;
  readonly appProfileId: string | undefined;

  constructor(tableId: string, instance: Instance, options: TableOptions = {}) {
    this.tableId = validateTableId(tableId);
    this.instance = instance;
    this.name = tableName(instance.name, tableId);
    this.appProfileId = options.appProfileId ?? instance.client.config.client.appProfileId;
  }

  // ===========================================================================
  // Administration
  // ===========================================================================

  async create(options: CreateTableOptions = {}): Promise<void> {
    const columnFamilies: Record<string, ColumnFamilyResource> = {};
    for (const [familyId, gcRule] of Object.entries(options.columnFamilies ?? {})) {
      columnFamilies[familyId] = new ColumnFamily(familyId, this, gcRule).toResource();
    }

    await this.admin('createTable').createTable({
      parent: this.instance.name,
      tableId: this.tableId,
      columnFamilies,
      initialSplits: (options.initialSplitKeys ?? []).map(toBytes),
    });
    this.logger.info('Created table', {
      operation: 'createTable',
      table: this.name,
      families: Object.keys(columnFamilies).length,
    });
  }

  async delete(): Promise<void> {
    await this.admin('deleteTable').deleteTable({ name: this.name });
    this.logger.info('Deleted table', { operation: 'deleteTable', table: this.name });
  }

  async exists(): Promise<boolean> {
    try {
      await this.admin('getTable').getTable({ name: this.name, view: 'NAME_ONLY' });
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  async listColumnFamilies(): Promise<Map<string, ColumnFamily>> {
    const table = await this.admin('getTable').getTable({ name: this.name, view: 'SCHEMA_VIEW' });
    const families = new Map<string, ColumnFamily>();
    for (const [familyId, resource] of Object.entries(table.columnFamilies)) {
      families.set(familyId, ColumnFamily.fromResource(familyId, resource, this));
    }
    return families;
  }

  columnFamily(columnFamilyId: string, gcRule?: GCRule): ColumnFamily {
    return new ColumnFamily(columnFamilyId, this, gcRule);
  }

  /**
   * Delete every row.
   *
   * @throws TimeoutError when `timeoutMs` passes first
   */
  async truncate(options: DropRowsOptions = {}): Promise<void> {
    await withTimeout(
      this.admin('dropRowRange').dropRowRange({ name: this.name, deleteAllDataFromTable: true }),
      options.timeoutMs,
      'truncate'
    );
    this.logger.info('Truncated table', { operation: 'dropRowRange', table: this.name });
  }

  /**
   * Delete every row whose key starts with `prefix`.
   *
   * @throws TimeoutError when `timeoutMs` passes first
   */
  async dropByPrefix(prefix: BytesLike, options: DropRowsOptions = {}): Promise<void> {
    const rowKeyPrefix = toBytes(prefix);
    if (rowKeyPrefix.length === 0) {
      throw new ValidationError('Row key prefix must not be empty; use truncate() to delete every row');
    }
    await withTimeout(
      this.admin('dropRowRange').dropRowRange({ name: this.name, rowKeyPrefix }),
      options.timeoutMs,
      'dropByPrefix'
    );
    this.logger.info('Dropped rows by prefix', {
      operation: 'dropRowRange',
      table: this.name,
      prefix: describeBytes(rowKeyPrefix),
    });
  }

  // ===========================================================================
  // Data
  // ===========================================================================

  row(rowKey: BytesLike): DirectRow {
    return new DirectRow(rowKey, this);
  }

  /**
   * Read one row; `null` when it does not exist or the filter drops every cell.
   */
  async readRow(rowKey: BytesLike, options: ReadRowOptions = {}): Promise<Row | null> {
    const reader = this.readRows({ rowSet: new RowSet().addRowKey(rowKey), filter: options.filter });
    const row = await reader.readNextRow();
    if (row !== null && (await reader.readNextRow()) !== null) {
      throw new ValidationError(`Read of row ${describeBytes(toBytes(rowKey))} returned more than one row`);
    }
    return row;
  }

  /**
   * Start a read; rows arrive in key order.
   *
   * @example
   * ```typescript
   * const reader = table.readRows({ filter: RowFilters.cellsColumnLimit(1) });
   * for await (const row of reader) {
   *   console.log(row.toString());
   * }
   * ```
   */
  readRows(options: ReadRowsOptions = {}): RowsReader {
    const request = this.readRowsRequest(options);
    const client = this.instance.client;
    const source = createResumableReadStream(client.dataTransport, request, {
      retry: {
        maxRetries: client.config.read.maxRetries,
        baseDelay: client.config.read.initialRetryDelayMs,
        maxDelay: client.config.read.maxRetryDelayMs,
        jitter: client.config.read.retryJitter,
      },
      signal: options.signal,
      logger: this.logger,
    });
    this.logger.debug('Reading rows', {
      operation: 'readRows',
      table: this.name,
      ...(request.rowsLimit !== undefined && { rowsLimit: request.rowsLimit }),
    });
    return new RowsReader(source, {
      signal: options.signal,
      logger: this.logger,
      validateRowOrder: client.config.read.chunkValidation === 'strict',
    });
  }

  /**
   * Rows of {@link readRows} as an async iterable.
   */
  async *yieldRows(options: ReadRowsOptions = {}): AsyncGenerator<Row, void, undefined> {
    const reader = this.readRows(options);
    try {
      for (;;) {
        const row = await reader.readNextRow();
        if (row === null) return;
        yield row;
      }
    } finally {
      reader.cancel();
    }
  }

  /**
   * Commit the pending mutations of several rows in one request.
   *
   * @returns one status per row, in order; rows that succeeded have their
   * pending mutations cleared
   */
  async mutateRows(rows: readonly DirectRow[]): Promise<Status[]> {
    const maxMutations = this.instance.client.config.mutate.maxMutationsPerRow;
    for (const row of rows) {
      if (row.table.name !== this.name) {
        throw new ValidationError(
          `Row ${describeBytes(row.rowKey)} belongs to table ${row.table.name}, not ${this.name}`
        );
      }
      row.assertMutationLimit(maxMutations);
    }

    const statuses = await this.instance.client.dataTransport.mutateRows({
      tableName: this.name,
      appProfileId: this.appProfileId,
      entries: rows.map(row => ({ rowKey: row.rowKey, mutations: [...row.pendingMutations] })),
    });

    let failed = 0;
    statuses.forEach((status, i) => {
      if (status.code === StatusCode.OK) {
        rows[i]?.clear();
      } else {
        failed++;
      }
    });
    const level = failed > 0 ? 'warn' : 'debug';
    this.logger[level]('Mutated rows', {
      operation: 'mutateRows',
      table: this.name,
      rows: rows.length,
      failed,
    });
    return statuses;
  }

  /**
   * Sample keys splitting the table into roughly equal parts; the last
   * sample has an empty key and the table's approximate size.
   */
  async sampleRowKeys(): Promise<SampleRowKeysResponse[]> {
    return this.instance.client.dataTransport.sampleRowKeys({
      tableName: this.name,
      appProfileId: this.appProfileId,
    });
  }

  /**
   * Same table name in the same instance.
   */
  equals(other: Table): boolean {
    return other.name === this.name && other.instance.equals(this.instance);
  }

  private get logger() {
    return this.instance.client.logger;
  }

  private admin(operation: string): TableAdminTransport {
    return this.instance.client.tableAdmin(operation);
  }

  private readRowsRequest(options: ReadRowsOptions): ReadRowsRequest {
    const hasRange = options.startKey !== undefined || options.endKey !== undefined;
    if (hasRange && options.rowSet !== undefined) {
      throw new ValidationError('A row set cannot be combined with start or end keys');
    }
    if (options.limit !== undefined && (!Number.isSafeInteger(options.limit) || options.limit < 0)) {
      throw new ValidationError(`Row limit must be a non-negative integer, got ${options.limit}`);
    }

    let rowSet = options.rowSet;
    if (hasRange) {
      rowSet = new RowSet().addRowRange(
        new RowRange(options.startKey, options.endKey, true, options.endInclusive ?? false)
      );
    }

    const request: ReadRowsRequest = { tableName: this.name };
    if (this.appProfileId !== undefined) request.appProfileId = this.appProfileId;
    if (rowSet !== undefined && !rowSet.isEmpty()) request.rows = rowSet.toRequest();
    if (options.filter !== undefined) {
      validateFilter(options.filter);
      request.filter = filterToRequest(options.filter);
    }
    if (options.limit !== undefined && options.limit > 0) request.rowsLimit = options.limit;
    return request;
  }
}
