/**
 * Server-side evaluation of row filters.
 *
 * A row is a flat list of cells sorted by family, qualifier and timestamp
 * (newest first). Each filter node maps such a list to another one; the row
 * is omitted from the result when nothing is left.
 *
 * @module filters
 */

import {
  bytesToKey,
  Cell,
  compareBytes,
  compileFilterRegex,
  EMPTY_BYTES,
  type RowFilter,
} from '@widecol/core';

export interface FlatCell {
  family: string;
  qualifier: Uint8Array;
  cell: Cell;
}

export type CompiledFilter = (rowKey: Uint8Array, cells: readonly FlatCell[]) => FlatCell[];

export function compareFlatCells(a: FlatCell, b: FlatCell): number {
  if (a.family !== b.family) return a.family < b.family ? -1 : 1;
  const byQualifier = compareBytes(a.qualifier, b.qualifier);
  if (byQualifier !== 0) return byQualifier;
  return b.cell.timestampMicros - a.cell.timestampMicros;
}

function inRange(
  value: Uint8Array,
  start: Uint8Array | undefined,
  end: Uint8Array | undefined,
  inclusiveStart: boolean,
  inclusiveEnd: boolean
): boolean {
  if (start !== undefined) {
    const cmp = compareBytes(value, start);
    if (cmp < 0 || (cmp === 0 && !inclusiveStart)) return false;
  }
  if (end !== undefined) {
    const cmp = compareBytes(value, end);
    if (cmp > 0 || (cmp === 0 && !inclusiveEnd)) return false;
  }
  return true;
}

function sameColumn(a: FlatCell, b: FlatCell): boolean {
  return a.family === b.family && compareBytes(a.qualifier, b.qualifier) === 0;
}

const blockAll: CompiledFilter = () => [];

/**
 * Compile `filter` once per read; regexes are full matches over the bytes.
 */
export function compileFilter(filter: RowFilter): CompiledFilter {
  switch (filter.type) {
    case 'passAll':
      return (_, cells) => [...cells];
    case 'blockAll':
      return blockAll;
    case 'rowKeyRegex': {
      const regex = compileFilterRegex(filter.pattern, filter.type);
      return (rowKey, cells) => (regex.test(bytesToKey(rowKey)) ? [...cells] : []);
    }
    case 'familyNameRegex': {
      const regex = compileFilterRegex(filter.pattern, filter.type);
      return (_, cells) => cells.filter(c => regex.test(c.family));
    }
    case 'columnQualifierRegex': {
      const regex = compileFilterRegex(filter.pattern, filter.type);
      return (_, cells) => cells.filter(c => regex.test(bytesToKey(c.qualifier)));
    }
    case 'valueRegex': {
      const regex = compileFilterRegex(filter.pattern, filter.type);
      return (_, cells) => cells.filter(c => regex.test(bytesToKey(c.cell.value)));
    }
    case 'columnRange':
      return (_, cells) =>
        cells.filter(
          c =>
            c.family === filter.familyId &&
            inRange(c.qualifier, filter.startQualifier, filter.endQualifier, filter.inclusiveStart, filter.inclusiveEnd)
        );
    case 'valueRange':
      return (_, cells) =>
        cells.filter(c =>
          inRange(c.cell.value, filter.startValue, filter.endValue, filter.inclusiveStart, filter.inclusiveEnd)
        );
    case 'timestampRange': {
      const { startMicros, endMicros } = filter.range;
      return (_, cells) =>
        cells.filter(
          c =>
            (startMicros === undefined || c.cell.timestampMicros >= startMicros) &&
            (endMicros === undefined || c.cell.timestampMicros < endMicros)
        );
    }
    case 'cellsRowOffset':
      return (_, cells) => cells.slice(filter.count);
    case 'cellsRowLimit':
      return (_, cells) => cells.slice(0, filter.count);
    case 'cellsColumnLimit':
      return (_, cells) => {
        const out: FlatCell[] = [];
        let kept = 0;
        cells.forEach((c, i) => {
          const previous = cells[i - 1];
          if (i === 0 || !sameColumn(previous, c)) kept = 0;
          if (kept < filter.count) out.push(c);
          kept++;
        });
        return out;
      };
    case 'stripValue':
      return (_, cells) =>
        cells.map(c => ({ ...c, cell: new Cell(EMPTY_BYTES, c.cell.timestampMicros, c.cell.labels) }));
    case 'applyLabel':
      return (_, cells) => cells.map(c => ({ ...c, cell: c.cell.withLabel(filter.label) }));
    case 'chain': {
      const steps = filter.filters.map(compileFilter);
      return (rowKey, cells) => steps.reduce<FlatCell[]>((current, step) => step(rowKey, current), [...cells]);
    }
    case 'union': {
      const branches = filter.filters.map(compileFilter);
      return (rowKey, cells) => branches.flatMap(branch => branch(rowKey, cells)).sort(compareFlatCells);
    }
    case 'condition': {
      const predicate = compileFilter(filter.predicate);
      const onTrue = filter.trueFilter === undefined ? blockAll : compileFilter(filter.trueFilter);
      const onFalse = filter.falseFilter === undefined ? blockAll : compileFilter(filter.falseFilter);
      return (rowKey, cells) => (predicate(rowKey, cells).length > 0 ? onTrue : onFalse)(rowKey, cells);
    }
  }
}
