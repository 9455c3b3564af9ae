/**
 * Row mutations buffered on the client until committed.
 */

import {
  copyBytes,
  describeBytes,
  encodeInt64,
  SERVER_ASSIGNED_TIMESTAMP,
  timestampRangeToRequest,
  toMicros,
  truncateToMillis,
  ValidationError,
  ErrorCode,
  type BytesLike,
  type TimestampRange,
} from '@widecol/core';

import type { Table } from './table.js';
import type { MutationRequest } from './transport.js';

/**
 * Pass to {@link DirectRow.deleteCells} to delete every column of a family.
 */
export const ALL_COLUMNS: unique symbol = Symbol('ALL_COLUMNS');

/** Bytes, UTF-8 text, or an integer stored as 8 bytes big-endian */
export type CellValue = BytesLike | number | bigint;

export interface SetCellOptions {
  /** Cell time; the server assigns one when absent. Truncated to milliseconds. */
  timestamp?: Date | number;
}

export interface DeleteCellsOptions {
  /** Only delete cells in this range; ignored when deleting a whole family */
  timeRange?: TimestampRange;
}

function encodeCellValue(value: CellValue): Uint8Array {
  if (typeof value === 'bigint') {
    return encodeInt64(value);
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(`Integer cell values must be safe integers, got ${value}`, ErrorCode.INVALID_MUTATION);
    }
    return encodeInt64(value);
  }
  return copyBytes(value);
}

/**
 * A row whose mutations apply unconditionally.
 *
 * @example
 * ```typescript
 * const row = table.row('user#42');
 * row.setCell('cf1', 'name', 'Ada');
 * row.setCell('cf1', 'visits', 3);
 * row.deleteCells('cf2', ALL_COLUMNS);
 * await row.commit();
 * ```
 */
export class DirectRow {
  readonly rowKey: Uint8Array;
  readonly table: Table;
  private mutations: MutationRequest[] = [];

  constructor(rowKey: BytesLike, table: Table) {
    this.rowKey = copyBytes(rowKey);
    this.table = table;
  }

  get mutationCount(): number {
    return this.mutations.length;
  }

  get pendingMutations(): readonly MutationRequest[] {
    return this.mutations;
  }

  setCell(familyId: string, qualifier: BytesLike, value: CellValue, options: SetCellOptions = {}): this {
    const timestampMicros =
      options.timestamp === undefined
        ? SERVER_ASSIGNED_TIMESTAMP
        : truncateToMillis(toMicros(options.timestamp));

    this.mutations.push({
      type: 'setCell',
      familyName: familyId,
      qualifier: copyBytes(qualifier),
      timestampMicros,
      value: encodeCellValue(value),
    });
    return this;
  }

  deleteCell(familyId: string, qualifier: BytesLike, options: DeleteCellsOptions = {}): this {
    return this.deleteCells(familyId, [qualifier], options);
  }

  deleteCells(
    familyId: string,
    columns: readonly BytesLike[] | typeof ALL_COLUMNS,
    options: DeleteCellsOptions = {}
  ): this {
    if (columns === ALL_COLUMNS) {
      this.mutations.push({ type: 'deleteFromFamily', familyName: familyId });
      return this;
    }

    const timeRange = options.timeRange === undefined ? undefined : timestampRangeToRequest(options.timeRange);
    for (const column of columns) {
      this.mutations.push({
        type: 'deleteFromColumn',
        familyName: familyId,
        qualifier: copyBytes(column),
        ...(timeRange !== undefined && { timeRange }),
      });
    }
    return this;
  }

  /**
   * Delete the whole row.
   */
  delete(): this {
    this.mutations.push({ type: 'deleteFromRow' });
    return this;
  }

  /**
   * Drop pending mutations without sending them.
   */
  clear(): void {
    this.mutations = [];
  }

  /**
   * Check the pending mutations against the configured limit.
   *
   * @throws ValidationError with code TOO_MANY_MUTATIONS
   */
  assertMutationLimit(max: number): void {
    if (this.mutations.length > max) {
      throw ValidationError.tooManyMutations(describeBytes(this.rowKey), this.mutations.length, max);
    }
  }

  /**
   * Send the pending mutations; a no-op when there are none. The pending
   * list is cleared once the server accepts it.
   */
  async commit(): Promise<void> {
    if (this.mutations.length === 0) {
      return;
    }
    const client = this.table.instance.client;
    this.assertMutationLimit(client.config.mutate.maxMutationsPerRow);

    await client.dataTransport.mutateRow({
      tableName: this.table.name,
      appProfileId: this.table.appProfileId,
      rowKey: this.rowKey,
      mutations: [...this.mutations],
    });
    client.logger.debug('Committed row', {
      operation: 'mutateRow',
      table: this.table.name,
      rowKey: describeBytes(this.rowKey),
      mutations: this.mutations.length,
    });
    this.clear();
  }
}
