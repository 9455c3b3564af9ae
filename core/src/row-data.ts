/**
 * @widecol/core - Row assembly
 *
 * {@link PartialRowData} folds the chunks of one row into a finalized,
 * immutable {@link Row}. It validates everything that can be checked within
 * a single row; ordering across rows is the reader's job.
 *
 * State machine:
 * ```
 *   empty --chunk--> accumulating --commitRow--> committed
 *     ^                   |
 *     +-----resetRow------+
 * ```
 *
 * @module row-data
 */

import {
  ByteKeyMap,
  bytesEqual,
  concatBytes,
  copyBytes,
  describeBytes,
  EMPTY_BYTES,
  type BytesLike,
  type ReadonlyByteKeyMap,
} from './bytes.js';
import { Cell, cellListsEqual, insertByTimestampDesc } from './cell.js';
import { chunkHasData, isValueFragment, type CellChunk } from './chunks.js';
import { MalformedChunkSequenceError } from './errors.js';

// =============================================================================
// Row
// =============================================================================

/**
 * Cells of a row: family name -> qualifier -> cells, newest first.
 */
export type RowCells = ReadonlyMap<string, ReadonlyByteKeyMap<readonly Cell[]>>;

/**
 * Expected-row literal for {@link Row.create}: family -> qualifier -> cells.
 */
export type RowCellsInit = Record<string, Record<string, readonly Cell[]>>;

/**
 * A completely read row. Immutable.
 *
 * @example
 * ```typescript
 * const row = await table.readRow('row-key');
 * row?.cellValue('cf1', 'col-name1');        // newest value
 * row?.cellsFor('cf1', 'col-name1')?.length; // number of versions
 * row?.cellsFor('cf1', 'missing');           // undefined
 * ```
 */
export class Row {
  readonly rowKey: Uint8Array;
  readonly cells: RowCells;

  constructor(rowKey: BytesLike, cells: Map<string, ByteKeyMap<Cell[]>>) {
    this.rowKey = copyBytes(rowKey);
    const families = new Map<string, ReadonlyByteKeyMap<readonly Cell[]>>();
    for (const family of [...cells.keys()].sort()) {
      const columns = cells.get(family);
      if (columns === undefined || columns.size === 0) continue;
      families.set(
        family,
        new ByteKeyMap<readonly Cell[]>(
          columns.entries().map(([qualifier, list]): [Uint8Array, readonly Cell[]] => [
            qualifier,
            Object.freeze([...list]),
          ])
        )
      );
    }
    this.cells = families;
    Object.freeze(this);
  }

  /**
   * Build a row from a literal, sorting each cell list newest first.
   *
   * @example
   * ```typescript
   * const expected = Row.create('row-key', {
   *   cf1: { 'col-name1': [new Cell('cell-val', ts)] },
   * });
   * expect(actual.equals(expected)).toBe(true);
   * ```
   */
  static create(rowKey: BytesLike, init: RowCellsInit): Row {
    const cells = new Map<string, ByteKeyMap<Cell[]>>();
    for (const [family, columns] of Object.entries(init)) {
      const qualifiers = new ByteKeyMap<Cell[]>();
      for (const [qualifier, list] of Object.entries(columns)) {
        if (list.length === 0) continue;
        qualifiers.set(qualifier, [...list].sort((a, b) => b.timestampMicros - a.timestampMicros));
      }
      cells.set(family, qualifiers);
    }
    return new Row(rowKey, cells);
  }

  /**
   * Family names in ascending order.
   */
  families(): string[] {
    return [...this.cells.keys()];
  }

  cellsFor(family: string, qualifier: BytesLike): readonly Cell[] | undefined {
    return this.cells.get(family)?.get(qualifier);
  }

  /**
   * Value of the `index`-th newest cell of a column.
   */
  cellValue(family: string, qualifier: BytesLike, index = 0): Uint8Array | undefined {
    const value = this.cellsFor(family, qualifier)?.[index]?.value;
    return value === undefined ? undefined : copyBytes(value);
  }

  get cellCount(): number {
    let count = 0;
    for (const columns of this.cells.values()) {
      for (const list of columns.values()) {
        count += list.length;
      }
    }
    return count;
  }

  equals(other: Row): boolean {
    if (!bytesEqual(this.rowKey, other.rowKey) || this.cells.size !== other.cells.size) {
      return false;
    }
    for (const [family, columns] of this.cells) {
      const otherColumns = other.cells.get(family);
      if (otherColumns === undefined || otherColumns.size !== columns.size) return false;
      for (const [qualifier, list] of columns) {
        const otherList = otherColumns.get(qualifier);
        if (otherList === undefined || !cellListsEqual(list, otherList)) return false;
      }
    }
    return true;
  }

  toString(): string {
    return `Row(${describeBytes(this.rowKey)}, ${this.cellCount} cells)`;
  }
}

// =============================================================================
// PartialRowData
// =============================================================================

export type PartialRowState = 'empty' | 'accumulating' | 'committed';

export type ApplyChunkResult = 'pending' | 'committed';

interface OpenCell {
  family: string;
  qualifier: Uint8Array;
  timestampMicros: number;
  labels: readonly string[];
  fragments: Uint8Array[];
}

interface CellPosition {
  family: string;
  qualifier: Uint8Array;
  timestampMicros: number;
}

/**
 * Accumulator for the chunks of a single row.
 *
 * @example
 * ```typescript
 * const partial = new PartialRowData();
 * partial.applyChunk({ rowKey, familyName: 'cf1', qualifier, timestampMicros: 1000, value });
 * if (partial.applyChunk({ commitRow: true }) === 'committed') {
 *   const row = partial.toRow();
 * }
 * ```
 */
export class PartialRowData {
  private _state: PartialRowState = 'empty';
  private _rowKey: Uint8Array | undefined;
  private _chunksEncountered = false;
  private cells = new Map<string, ByteKeyMap<Cell[]>>();
  private previous: CellPosition | undefined;
  private open: OpenCell | undefined;
  private row: Row | undefined;

  get state(): PartialRowState {
    return this._state;
  }

  /**
   * Key of the row being assembled, once a chunk named it.
   */
  get rowKey(): Uint8Array | undefined {
    return this._rowKey;
  }

  /**
   * True once a chunk has been applied since creation or the last reset.
   */
  get chunksEncountered(): boolean {
    return this._chunksEncountered;
  }

  applyChunk(chunk: CellChunk): ApplyChunkResult {
    if (this._state === 'committed') {
      throw this.invalid('chunk received after the row was committed');
    }

    if (chunk.resetRow === true) {
      if (chunkHasData(chunk)) {
        throw this.invalid('reset chunk carries row data');
      }
      this.reset();
      return 'pending';
    }

    this.applyRowKey(chunk);
    this._chunksEncountered = true;
    this._state = 'accumulating';

    if (this.open !== undefined) {
      this.continueValue(chunk);
    } else if (startsCell(chunk)) {
      this.startCell(chunk);
    }

    if (chunk.commitRow === true) {
      if (this.open !== undefined) {
        throw this.invalid('commit while a value is still being split across chunks');
      }
      this.row = new Row(this.requireRowKey(), this.cells);
      this._state = 'committed';
      return 'committed';
    }
    return 'pending';
  }

  /**
   * Discard every cell and any partially received value.
   */
  reset(): void {
    this._state = 'empty';
    this._rowKey = undefined;
    this._chunksEncountered = false;
    this.cells = new Map();
    this.previous = undefined;
    this.open = undefined;
    this.row = undefined;
  }

  /**
   * The committed row.
   *
   * @throws {MalformedChunkSequenceError} ROW_NOT_COMMITTED before commit
   */
  toRow(): Row {
    if (this.row === undefined) {
      throw MalformedChunkSequenceError.rowNotCommitted(this.describeKey());
    }
    return this.row;
  }

  private applyRowKey(chunk: CellChunk): void {
    if (chunk.rowKey === undefined) {
      if (this._rowKey === undefined) {
        throw this.invalid('first chunk of a row has no row key');
      }
      return;
    }
    if (this._rowKey === undefined) {
      this._rowKey = copyBytes(chunk.rowKey);
    } else if (!bytesEqual(this._rowKey, chunk.rowKey)) {
      throw this.invalid('row key changed within a row', { chunkRowKey: describeBytes(chunk.rowKey) });
    }
  }

  private startCell(chunk: CellChunk): void {
    if (chunk.familyName !== undefined && chunk.qualifier === undefined) {
      throw this.invalid('chunk names a family without a qualifier', { familyName: chunk.familyName });
    }

    let family: string;
    let qualifier: Uint8Array;
    if (chunk.qualifier !== undefined) {
      const inherited = chunk.familyName ?? this.previous?.family;
      if (inherited === undefined) {
        throw this.invalid('first cell of a row needs a family and a qualifier');
      }
      family = inherited;
      qualifier = chunk.qualifier;
    } else if (chunk.timestampMicros === undefined) {
      throw this.invalid('value continuation without an open cell');
    } else if (this.previous !== undefined) {
      family = this.previous.family;
      qualifier = this.previous.qualifier;
    } else {
      throw this.invalid('first cell of a row needs a family and a qualifier');
    }

    const timestampMicros = chunk.timestampMicros ?? this.previous?.timestampMicros ?? 0;
    this.previous = { family, qualifier, timestampMicros };
    this.open = {
      family,
      qualifier,
      timestampMicros,
      labels: chunk.labels ?? [],
      fragments: [chunk.value ?? EMPTY_BYTES],
    };
    if (!isValueFragment(chunk)) {
      this.finishCell();
    }
  }

  private continueValue(chunk: CellChunk): void {
    if (
      chunk.familyName !== undefined ||
      chunk.qualifier !== undefined ||
      chunk.timestampMicros !== undefined ||
      (chunk.labels !== undefined && chunk.labels.length > 0)
    ) {
      throw this.invalid('value continuation carries cell coordinates');
    }
    this.open?.fragments.push(chunk.value ?? EMPTY_BYTES);
    if (!isValueFragment(chunk)) {
      this.finishCell();
    }
  }

  private finishCell(): void {
    const open = this.open;
    if (open === undefined) return;
    this.open = undefined;

    const cell = new Cell(concatBytes(open.fragments), open.timestampMicros, open.labels);
    let columns = this.cells.get(open.family);
    if (columns === undefined) {
      columns = new ByteKeyMap<Cell[]>();
      this.cells.set(open.family, columns);
    }
    let list = columns.get(open.qualifier);
    if (list === undefined) {
      list = [];
      columns.set(open.qualifier, list);
    }
    insertByTimestampDesc(list, cell);
  }

  private requireRowKey(): Uint8Array {
    if (this._rowKey === undefined) {
      throw this.invalid('row has no key');
    }
    return this._rowKey;
  }

  private describeKey(): string {
    return this._rowKey === undefined ? '' : describeBytes(this._rowKey);
  }

  private invalid(reason: string, details?: Record<string, unknown>): MalformedChunkSequenceError {
    return MalformedChunkSequenceError.invalidChunk(reason, {
      rowKey: this.describeKey(),
      state: this._state,
      ...details,
    });
  }
}

/**
 * True when a chunk (outside a value continuation) carries a cell.
 */
function startsCell(chunk: CellChunk): boolean {
  return (
    chunk.familyName !== undefined ||
    chunk.qualifier !== undefined ||
    chunk.timestampMicros !== undefined ||
    chunk.labels !== undefined ||
    chunk.value !== undefined ||
    isValueFragment(chunk)
  );
}

