/**
 * A single versioned value stored at (row, family, qualifier).
 */

import { bytesEqual, copyBytes, describeBytes, type BytesLike } from './bytes.js';
import { assertValidMicros, dateFromMicros } from './timestamps.js';

/**
 * Immutable cell: value bytes, timestamp in microseconds and the labels a
 * read filter attached to it. `value` is shared with every row holding the
 * cell and must not be written to; `Row.cellValue` hands out a copy.
 *
 * @example
 * ```typescript
 * const cell = new Cell('cell-val', 1_700_000_000_000_000);
 * cell.equals(new Cell(toBytes('cell-val'), 1_700_000_000_000_000)); // true
 * ```
 */
export class Cell {
  readonly value: Uint8Array;
  readonly timestampMicros: number;
  readonly labels: readonly string[];

  constructor(value: BytesLike, timestampMicros: number, labels: readonly string[] = []) {
    this.value = copyBytes(value);
    this.timestampMicros = assertValidMicros(timestampMicros);
    this.labels = Object.freeze([...labels]);
    Object.freeze(this);
  }

  /**
   * Timestamp as a Date (millisecond precision).
   */
  get timestamp(): Date {
    return dateFromMicros(this.timestampMicros);
  }

  equals(other: Cell): boolean {
    return (
      this.timestampMicros === other.timestampMicros &&
      bytesEqual(this.value, other.value) &&
      this.labels.length === other.labels.length &&
      this.labels.every((label, i) => label === other.labels[i])
    );
  }

  /**
   * Copy of this cell with `label` appended.
   */
  withLabel(label: string): Cell {
    return new Cell(this.value, this.timestampMicros, [...this.labels, label]);
  }

  toString(): string {
    const labels = this.labels.length > 0 ? ` labels=[${this.labels.join(',')}]` : '';
    return `Cell(${describeBytes(this.value)} @${this.timestampMicros}${labels})`;
  }
}

/**
 * Element-wise {@link Cell.equals} over two cell lists.
 */
export function cellListsEqual(a: readonly Cell[], b: readonly Cell[]): boolean {
  return a.length === b.length && a.every((cell, i) => cell.equals(b[i]));
}

/**
 * Insert `cell` into `cells` (newest first); equal timestamps keep arrival order.
 */
export function insertByTimestampDesc(cells: Cell[], cell: Cell): void {
  let index = cells.length;
  while (index > 0 && cells[index - 1].timestampMicros < cell.timestampMicros) {
    index--;
  }
  cells.splice(index, 0, cell);
}
