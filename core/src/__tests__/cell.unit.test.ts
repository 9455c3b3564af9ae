import { describe, it, expect } from 'vitest';
import { toBytes } from '../bytes.js';
import { Cell, cellListsEqual, insertByTimestampDesc } from '../cell.js';
import { ValidationError } from '../errors.js';
import {
  ceilToMillis,
  dateFromMicros,
  microsFromDate,
  toMicros,
  truncateToMillis,
} from '../timestamps.js';

describe('Cell', () => {
  it('is equal when value, timestamp and labels match', () => {
    const a = new Cell('cell-val', 1_000, ['label-red']);
    const b = new Cell(toBytes('cell-val'), 1_000, ['label-red']);
    expect(a.equals(b)).toBe(true);
  });

  it('differs on value, timestamp or label order', () => {
    const base = new Cell('v', 1_000, ['a', 'b']);
    expect(base.equals(new Cell('w', 1_000, ['a', 'b']))).toBe(false);
    expect(base.equals(new Cell('v', 2_000, ['a', 'b']))).toBe(false);
    expect(base.equals(new Cell('v', 1_000, ['b', 'a']))).toBe(false);
  });

  it('copies its value and freezes itself', () => {
    const value = toBytes('abc');
    const cell = new Cell(value, 0);
    value[0] = 0x7a;
    expect(cell.value).toEqual(toBytes('abc'));
    expect(Object.isFrozen(cell)).toBe(true);
    expect(Object.isFrozen(cell.labels)).toBe(true);
  });

  it('rejects non-integral timestamps', () => {
    expect(() => new Cell('v', 1.5)).toThrow(ValidationError);
    expect(() => new Cell('v', Number.NaN)).toThrow(ValidationError);
  });

  it('exposes the timestamp as a Date', () => {
    expect(new Cell('v', 1_500_999).timestamp.getTime()).toBe(1_500);
  });

  it('adds labels without touching the original', () => {
    const cell = new Cell('v', 0);
    const labelled = cell.withLabel('label-red');
    expect(labelled.labels).toEqual(['label-red']);
    expect(cell.labels).toEqual([]);
  });
});

describe('insertByTimestampDesc', () => {
  it('keeps cells newest first', () => {
    const cells: Cell[] = [];
    insertByTimestampDesc(cells, new Cell('a', 1_000));
    insertByTimestampDesc(cells, new Cell('b', 3_000));
    insertByTimestampDesc(cells, new Cell('c', 2_000));
    expect(cells.map(cell => cell.timestampMicros)).toEqual([3_000, 2_000, 1_000]);
  });

  it('keeps arrival order for equal timestamps', () => {
    const cells: Cell[] = [];
    insertByTimestampDesc(cells, new Cell('first', 1_000));
    insertByTimestampDesc(cells, new Cell('second', 1_000));
    expect(cells.map(cell => cell.toString())).toEqual(['Cell(first @1000)', 'Cell(second @1000)']);
  });
});

describe('cellListsEqual', () => {
  it('compares element-wise', () => {
    expect(cellListsEqual([new Cell('a', 1)], [new Cell('a', 1)])).toBe(true);
    expect(cellListsEqual([new Cell('a', 1)], [])).toBe(false);
  });
});

describe('timestamps', () => {
  it('converts Dates to microseconds', () => {
    expect(microsFromDate(new Date(1_234))).toBe(1_234_000);
    expect(toMicros(new Date(5))).toBe(5_000);
    expect(toMicros(42)).toBe(42);
  });

  it('drops sub-millisecond precision going back to a Date', () => {
    expect(dateFromMicros(1_234_567).getTime()).toBe(1_234);
  });

  it('truncates and ceils to whole milliseconds', () => {
    expect(truncateToMillis(1_234_567)).toBe(1_234_000);
    expect(truncateToMillis(-1_500)).toBe(-2_000);
    expect(ceilToMillis(1_234_001)).toBe(1_235_000);
    expect(ceilToMillis(1_234_000)).toBe(1_234_000);
  });

  it('rejects invalid Dates', () => {
    expect(() => microsFromDate(new Date(Number.NaN))).toThrow(ValidationError);
  });
});
