/**
 * @widecol/core - Row filters
 *
 * A read request can carry one filter tree, evaluated server side against
 * every row the scan visits. Nodes are immutable plain objects discriminated
 * by `type` and built through {@link RowFilters}.
 *
 * @example
 * ```typescript
 * import { RowFilters } from '@widecol/core';
 *
 * // Label every cell of two columns, each with its own label
 * const filter = RowFilters.union(
 *   RowFilters.chain(RowFilters.columnQualifierRegex('col-name1'), RowFilters.applyLabel('label-red')),
 *   RowFilters.chain(RowFilters.columnQualifierRegex('col-name2'), RowFilters.applyLabel('label-blue')),
 * );
 * const row = await table.readRow('row-key', { filter });
 * ```
 *
 * A union returns each branch's output merged in (family, qualifier,
 * timestamp descending) order without de-duplication: a cell matched by two
 * branches comes back twice, once with each branch's labels.
 *
 * @module row-filters
 */

import { bytesEqual, bytesToKey, copyBytes, type BytesLike } from './bytes.js';
import { ValidationError } from './errors.js';
import { ceilToMillis, toMicros, truncateToMillis } from './timestamps.js';
import { isValidIdentifier } from './validation.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Half-open timestamp interval `[startMicros, endMicros)`; a missing bound
 * is unbounded.
 */
export interface TimestampRange {
  readonly startMicros?: number;
  readonly endMicros?: number;
}

export interface PassAllFilter {
  readonly type: 'passAll';
}

export interface BlockAllFilter {
  readonly type: 'blockAll';
}

export interface RowKeyRegexFilter {
  readonly type: 'rowKeyRegex';
  readonly pattern: Uint8Array;
}

export interface FamilyNameRegexFilter {
  readonly type: 'familyNameRegex';
  readonly pattern: string;
}

export interface ColumnQualifierRegexFilter {
  readonly type: 'columnQualifierRegex';
  readonly pattern: Uint8Array;
}

export interface ValueRegexFilter {
  readonly type: 'valueRegex';
  readonly pattern: Uint8Array;
}

export interface ColumnRangeFilter {
  readonly type: 'columnRange';
  readonly familyId: string;
  readonly startQualifier?: Uint8Array;
  readonly endQualifier?: Uint8Array;
  readonly inclusiveStart: boolean;
  readonly inclusiveEnd: boolean;
}

export interface ValueRangeFilter {
  readonly type: 'valueRange';
  readonly startValue?: Uint8Array;
  readonly endValue?: Uint8Array;
  readonly inclusiveStart: boolean;
  readonly inclusiveEnd: boolean;
}

export interface TimestampRangeFilter {
  readonly type: 'timestampRange';
  readonly range: TimestampRange;
}

export interface CellsRowOffsetFilter {
  readonly type: 'cellsRowOffset';
  readonly count: number;
}

export interface CellsRowLimitFilter {
  readonly type: 'cellsRowLimit';
  readonly count: number;
}

export interface CellsColumnLimitFilter {
  readonly type: 'cellsColumnLimit';
  readonly count: number;
}

export interface StripValueFilter {
  readonly type: 'stripValue';
}

export interface ApplyLabelFilter {
  readonly type: 'applyLabel';
  readonly label: string;
}

export interface ChainFilter {
  readonly type: 'chain';
  readonly filters: readonly RowFilter[];
}

export interface UnionFilter {
  readonly type: 'union';
  readonly filters: readonly RowFilter[];
}

export interface ConditionFilter {
  readonly type: 'condition';
  readonly predicate: RowFilter;
  readonly trueFilter?: RowFilter;
  readonly falseFilter?: RowFilter;
}

export type RowFilter =
  | PassAllFilter
  | BlockAllFilter
  | RowKeyRegexFilter
  | FamilyNameRegexFilter
  | ColumnQualifierRegexFilter
  | ValueRegexFilter
  | ColumnRangeFilter
  | ValueRangeFilter
  | TimestampRangeFilter
  | CellsRowOffsetFilter
  | CellsRowLimitFilter
  | CellsColumnLimitFilter
  | StripValueFilter
  | ApplyLabelFilter
  | ChainFilter
  | UnionFilter
  | ConditionFilter;

export type RowFilterType = RowFilter['type'];

export interface RangeBoundsOptions {
  /** @default true */
  inclusiveStart?: boolean;
  /** @default true */
  inclusiveEnd?: boolean;
}

export interface ColumnRangeOptions extends RangeBoundsOptions {
  startQualifier?: BytesLike;
  endQualifier?: BytesLike;
}

export interface ValueRangeOptions extends RangeBoundsOptions {
  startValue?: BytesLike;
  endValue?: BytesLike;
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Timestamp interval from Dates or integral microseconds.
 */
export function timestampRange(bounds: { start?: Date | number; end?: Date | number } = {}): TimestampRange {
  const range: { startMicros?: number; endMicros?: number } = {};
  if (bounds.start !== undefined) {
    range.startMicros = toMicros(bounds.start);
  }
  if (bounds.end !== undefined) {
    range.endMicros = toMicros(bounds.end);
  }
  return Object.freeze(range);
}

function optionalCopy(value: BytesLike | undefined): Uint8Array | undefined {
  return value === undefined ? undefined : copyBytes(value);
}

/**
 * Factories for every filter kind. Construction never throws; use
 * {@link validateFilter} to check parameters.
 */
export const RowFilters = {
  passAll(): PassAllFilter {
    return Object.freeze({ type: 'passAll' });
  },

  blockAll(): BlockAllFilter {
    return Object.freeze({ type: 'blockAll' });
  },

  /** Keep rows whose whole key matches `pattern` */
  rowKeyRegex(pattern: BytesLike): RowKeyRegexFilter {
    return Object.freeze({ type: 'rowKeyRegex', pattern: copyBytes(pattern) });
  },

  familyNameRegex(pattern: string): FamilyNameRegexFilter {
    return Object.freeze({ type: 'familyNameRegex', pattern });
  },

  columnQualifierRegex(pattern: BytesLike): ColumnQualifierRegexFilter {
    return Object.freeze({ type: 'columnQualifierRegex', pattern: copyBytes(pattern) });
  },

  valueRegex(pattern: BytesLike): ValueRegexFilter {
    return Object.freeze({ type: 'valueRegex', pattern: copyBytes(pattern) });
  },

  /**
   * Keep cells of `familyId` whose qualifier lies in the range. Both ends
   * are inclusive unless told otherwise.
   */
  columnRange(familyId: string, options: ColumnRangeOptions = {}): ColumnRangeFilter {
    return Object.freeze({
      type: 'columnRange',
      familyId,
      startQualifier: optionalCopy(options.startQualifier),
      endQualifier: optionalCopy(options.endQualifier),
      inclusiveStart: options.inclusiveStart ?? true,
      inclusiveEnd: options.inclusiveEnd ?? true,
    });
  },

  valueRange(options: ValueRangeOptions = {}): ValueRangeFilter {
    return Object.freeze({
      type: 'valueRange',
      startValue: optionalCopy(options.startValue),
      endValue: optionalCopy(options.endValue),
      inclusiveStart: options.inclusiveStart ?? true,
      inclusiveEnd: options.inclusiveEnd ?? true,
    });
  },

  timestampRange(range: TimestampRange): TimestampRangeFilter {
    return Object.freeze({ type: 'timestampRange', range: Object.freeze({ ...range }) });
  },

  cellsRowOffset(count: number): CellsRowOffsetFilter {
    return Object.freeze({ type: 'cellsRowOffset', count });
  },

  cellsRowLimit(count: number): CellsRowLimitFilter {
    return Object.freeze({ type: 'cellsRowLimit', count });
  },

  /** Keep the newest `count` cells of each column */
  cellsColumnLimit(count: number): CellsColumnLimitFilter {
    return Object.freeze({ type: 'cellsColumnLimit', count });
  },

  stripValue(): StripValueFilter {
    return Object.freeze({ type: 'stripValue' });
  },

  applyLabel(label: string): ApplyLabelFilter {
    return Object.freeze({ type: 'applyLabel', label });
  },

  /** Apply each filter to the previous one's output; empty passes all */
  chain(...filters: RowFilter[]): ChainFilter {
    return Object.freeze({ type: 'chain', filters: Object.freeze([...filters]) });
  },

  /** Apply each filter to the same input and merge the outputs; empty blocks all */
  union(...filters: RowFilter[]): UnionFilter {
    return Object.freeze({ type: 'union', filters: Object.freeze([...filters]) });
  },

  /**
   * `trueFilter` when `predicate` yields any cell for the row, else
   * `falseFilter`. A missing branch blocks all.
   */
  condition(predicate: RowFilter, trueFilter?: RowFilter, falseFilter?: RowFilter): ConditionFilter {
    return Object.freeze({ type: 'condition', predicate, trueFilter, falseFilter });
  },
} as const;

// =============================================================================
// Equality
// =============================================================================

function optionalBytesEqual(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return bytesEqual(a, b);
}

function optionalFiltersEqual(a: RowFilter | undefined, b: RowFilter | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return filtersEqual(a, b);
}

function filterListsEqual(a: readonly RowFilter[], b: readonly RowFilter[]): boolean {
  return a.length === b.length && a.every((filter, i) => filtersEqual(filter, b[i]));
}

/**
 * Structural equality: same kind, same parameters, children equal in order.
 */
export function filtersEqual(a: RowFilter, b: RowFilter): boolean {
  switch (a.type) {
    case 'passAll':
    case 'blockAll':
    case 'stripValue':
      return b.type === a.type;
    case 'rowKeyRegex':
      return b.type === 'rowKeyRegex' && bytesEqual(a.pattern, b.pattern);
    case 'familyNameRegex':
      return b.type === 'familyNameRegex' && a.pattern === b.pattern;
    case 'columnQualifierRegex':
      return b.type === 'columnQualifierRegex' && bytesEqual(a.pattern, b.pattern);
    case 'valueRegex':
      return b.type === 'valueRegex' && bytesEqual(a.pattern, b.pattern);
    case 'columnRange':
      return (
        b.type === 'columnRange' &&
        a.familyId === b.familyId &&
        optionalBytesEqual(a.startQualifier, b.startQualifier) &&
        optionalBytesEqual(a.endQualifier, b.endQualifier) &&
        a.inclusiveStart === b.inclusiveStart &&
        a.inclusiveEnd === b.inclusiveEnd
      );
    case 'valueRange':
      return (
        b.type === 'valueRange' &&
        optionalBytesEqual(a.startValue, b.startValue) &&
        optionalBytesEqual(a.endValue, b.endValue) &&
        a.inclusiveStart === b.inclusiveStart &&
        a.inclusiveEnd === b.inclusiveEnd
      );
    case 'timestampRange':
      return (
        b.type === 'timestampRange' &&
        a.range.startMicros === b.range.startMicros &&
        a.range.endMicros === b.range.endMicros
      );
    case 'cellsRowOffset':
    case 'cellsRowLimit':
    case 'cellsColumnLimit':
      return b.type === a.type && 'count' in b && a.count === b.count;
    case 'applyLabel':
      return b.type === 'applyLabel' && a.label === b.label;
    case 'chain':
    case 'union':
      return b.type === a.type && 'filters' in b && filterListsEqual(a.filters, b.filters);
    case 'condition':
      return (
        b.type === 'condition' &&
        filtersEqual(a.predicate, b.predicate) &&
        optionalFiltersEqual(a.trueFilter, b.trueFilter) &&
        optionalFiltersEqual(a.falseFilter, b.falseFilter)
      );
  }
}

// =============================================================================
// Validation
// =============================================================================

/**
 * JavaScript regular expression matching whole binary strings (one char per
 * byte), or a ValidationError naming the filter when it does not compile.
 */
export function compileFilterRegex(pattern: string | Uint8Array, filterType: RowFilterType): RegExp {
  const source = typeof pattern === 'string' ? pattern : bytesToKey(pattern);
  try {
    return new RegExp(`^(?:${source})$`);
  } catch (error) {
    throw ValidationError.invalidFilter(`${filterType} pattern does not compile`, {
      filterType,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

function assertCount(filter: CellsRowOffsetFilter | CellsRowLimitFilter | CellsColumnLimitFilter): void {
  if (!Number.isSafeInteger(filter.count) || filter.count < 0) {
    throw ValidationError.invalidFilter(`${filter.type} count must be a non-negative integer`, {
      filterType: filter.type,
      count: filter.count,
    });
  }
}

function assertTimestampRange(range: TimestampRange): void {
  for (const bound of [range.startMicros, range.endMicros]) {
    if (bound !== undefined && !Number.isSafeInteger(bound)) {
      throw ValidationError.invalidFilter('timestamp bounds must be integral microseconds', {
        filterType: 'timestampRange',
        bound,
      });
    }
  }
  if (range.startMicros !== undefined && range.endMicros !== undefined && range.startMicros > range.endMicros) {
    throw ValidationError.invalidFilter('timestamp range start is after its end', {
      filterType: 'timestampRange',
      startMicros: range.startMicros,
      endMicros: range.endMicros,
    });
  }
}

/**
 * Check every node of `filter`.
 *
 * @throws {ValidationError} with code INVALID_FILTER for negative or
 * non-integer counts, malformed labels, inverted timestamp ranges, patterns
 * that do not compile and conditions without a predicate
 */
export function validateFilter(filter: RowFilter): void {
  switch (filter.type) {
    case 'passAll':
    case 'blockAll':
    case 'stripValue':
      return;
    case 'rowKeyRegex':
    case 'columnQualifierRegex':
    case 'valueRegex':
    case 'familyNameRegex':
      compileFilterRegex(filter.pattern, filter.type);
      return;
    case 'columnRange':
      if (filter.familyId.length === 0) {
        throw ValidationError.invalidFilter('columnRange requires a family', { filterType: filter.type });
      }
      return;
    case 'valueRange':
      return;
    case 'timestampRange':
      assertTimestampRange(filter.range);
      return;
    case 'cellsRowOffset':
    case 'cellsRowLimit':
    case 'cellsColumnLimit':
      assertCount(filter);
      return;
    case 'applyLabel':
      if (!isValidIdentifier('label', filter.label)) {
        throw ValidationError.invalidFilter(`label "${filter.label}" must match [a-z0-9-]{1,15}`, {
          filterType: filter.type,
          label: filter.label,
        });
      }
      return;
    case 'chain':
    case 'union':
      filter.filters.forEach(validateFilter);
      return;
    case 'condition':
      if (filter.predicate === undefined) {
        throw ValidationError.invalidFilter('condition requires a predicate', { filterType: filter.type });
      }
      validateFilter(filter.predicate);
      if (filter.trueFilter) validateFilter(filter.trueFilter);
      if (filter.falseFilter) validateFilter(filter.falseFilter);
      return;
  }
}

// =============================================================================
// Request encoding
// =============================================================================

export interface ColumnRangeRequest {
  familyName: string;
  startQualifierClosed?: Uint8Array;
  startQualifierOpen?: Uint8Array;
  endQualifierClosed?: Uint8Array;
  endQualifierOpen?: Uint8Array;
}

export interface ValueRangeRequest {
  startValueClosed?: Uint8Array;
  startValueOpen?: Uint8Array;
  endValueClosed?: Uint8Array;
  endValueOpen?: Uint8Array;
}

export interface TimestampRangeRequest {
  startTimestampMicros?: number;
  endTimestampMicros?: number;
}

export interface FilterListRequest {
  filters: RowFilterRequest[];
}

export interface ConditionRequest {
  predicateFilter: RowFilterRequest;
  trueFilter?: RowFilterRequest;
  falseFilter?: RowFilterRequest;
}

/**
 * Scan-request encoding of a filter: exactly one key per node.
 */
export type RowFilterRequest =
  | { passAllFilter: true }
  | { blockAllFilter: true }
  | { rowKeyRegexFilter: Uint8Array }
  | { familyNameRegexFilter: string }
  | { columnQualifierRegexFilter: Uint8Array }
  | { valueRegexFilter: Uint8Array }
  | { columnRangeFilter: ColumnRangeRequest }
  | { valueRangeFilter: ValueRangeRequest }
  | { timestampRangeFilter: TimestampRangeRequest }
  | { cellsPerRowOffsetFilter: number }
  | { cellsPerRowLimitFilter: number }
  | { cellsPerColumnLimitFilter: number }
  | { stripValueTransformer: true }
  | { applyLabelTransformer: string }
  | { chain: FilterListRequest }
  | { interleave: FilterListRequest }
  | { condition: ConditionRequest };

/**
 * Millisecond-granular encoding of a timestamp range: the start rounded
 * down, the end rounded up.
 */
export function timestampRangeToRequest(range: TimestampRange): TimestampRangeRequest {
  const request: TimestampRangeRequest = {};
  if (range.startMicros !== undefined) {
    request.startTimestampMicros = truncateToMillis(range.startMicros);
  }
  if (range.endMicros !== undefined) {
    request.endTimestampMicros = ceilToMillis(range.endMicros);
  }
  return request;
}

/**
 * Encode `filter` for a scan request. Timestamp ranges are sent at
 * millisecond granularity: the start rounded down, the end rounded up.
 *
 * @example
 * ```typescript
 * filterToRequest(RowFilters.chain(RowFilters.cellsColumnLimit(1)));
 * // { chain: { filters: [{ cellsPerColumnLimitFilter: 1 }] } }
 * ```
 */
export function filterToRequest(filter: RowFilter): RowFilterRequest {
  switch (filter.type) {
    case 'passAll':
      return { passAllFilter: true };
    case 'blockAll':
      return { blockAllFilter: true };
    case 'rowKeyRegex':
      return { rowKeyRegexFilter: filter.pattern };
    case 'familyNameRegex':
      return { familyNameRegexFilter: filter.pattern };
    case 'columnQualifierRegex':
      return { columnQualifierRegexFilter: filter.pattern };
    case 'valueRegex':
      return { valueRegexFilter: filter.pattern };
    case 'columnRange': {
      const request: ColumnRangeRequest = { familyName: filter.familyId };
      if (filter.startQualifier !== undefined) {
        if (filter.inclusiveStart) request.startQualifierClosed = filter.startQualifier;
        else request.startQualifierOpen = filter.startQualifier;
      }
      if (filter.endQualifier !== undefined) {
        if (filter.inclusiveEnd) request.endQualifierClosed = filter.endQualifier;
        else request.endQualifierOpen = filter.endQualifier;
      }
      return { columnRangeFilter: request };
    }
    case 'valueRange': {
      const request: ValueRangeRequest = {};
      if (filter.startValue !== undefined) {
        if (filter.inclusiveStart) request.startValueClosed = filter.startValue;
        else request.startValueOpen = filter.startValue;
      }
      if (filter.endValue !== undefined) {
        if (filter.inclusiveEnd) request.endValueClosed = filter.endValue;
        else request.endValueOpen = filter.endValue;
      }
      return { valueRangeFilter: request };
    }
    case 'timestampRange':
      return { timestampRangeFilter: timestampRangeToRequest(filter.range) };
    case 'cellsRowOffset':
      return { cellsPerRowOffsetFilter: filter.count };
    case 'cellsRowLimit':
      return { cellsPerRowLimitFilter: filter.count };
    case 'cellsColumnLimit':
      return { cellsPerColumnLimitFilter: filter.count };
    case 'stripValue':
      return { stripValueTransformer: true };
    case 'applyLabel':
      return { applyLabelTransformer: filter.label };
    case 'chain':
      return { chain: { filters: filter.filters.map(filterToRequest) } };
    case 'union':
      return { interleave: { filters: filter.filters.map(filterToRequest) } };
    case 'condition': {
      const request: ConditionRequest = { predicateFilter: filterToRequest(filter.predicate) };
      if (filter.trueFilter) request.trueFilter = filterToRequest(filter.trueFilter);
      if (filter.falseFilter) request.falseFilter = filterToRequest(filter.falseFilter);
      return { condition: request };
    }
  }
}

/**
 * Decode a scan-request filter back into a {@link RowFilter}.
 */
export function filterFromRequest(request: RowFilterRequest): RowFilter {
  if ('passAllFilter' in request) return RowFilters.passAll();
  if ('blockAllFilter' in request) return RowFilters.blockAll();
  if ('rowKeyRegexFilter' in request) return RowFilters.rowKeyRegex(request.rowKeyRegexFilter);
  if ('familyNameRegexFilter' in request) return RowFilters.familyNameRegex(request.familyNameRegexFilter);
  if ('columnQualifierRegexFilter' in request) {
    return RowFilters.columnQualifierRegex(request.columnQualifierRegexFilter);
  }
  if ('valueRegexFilter' in request) return RowFilters.valueRegex(request.valueRegexFilter);
  if ('columnRangeFilter' in request) {
    const range = request.columnRangeFilter;
    return RowFilters.columnRange(range.familyName, {
      startQualifier: range.startQualifierClosed ?? range.startQualifierOpen,
      endQualifier: range.endQualifierClosed ?? range.endQualifierOpen,
      inclusiveStart: range.startQualifierOpen === undefined,
      inclusiveEnd: range.endQualifierOpen === undefined,
    });
  }
  if ('valueRangeFilter' in request) {
    const range = request.valueRangeFilter;
    return RowFilters.valueRange({
      startValue: range.startValueClosed ?? range.startValueOpen,
      endValue: range.endValueClosed ?? range.endValueOpen,
      inclusiveStart: range.startValueOpen === undefined,
      inclusiveEnd: range.endValueOpen === undefined,
    });
  }
  if ('timestampRangeFilter' in request) {
    const range = request.timestampRangeFilter;
    return RowFilters.timestampRange({
      startMicros: range.startTimestampMicros,
      endMicros: range.endTimestampMicros,
    });
  }
  if ('cellsPerRowOffsetFilter' in request) return RowFilters.cellsRowOffset(request.cellsPerRowOffsetFilter);
  if ('cellsPerRowLimitFilter' in request) return RowFilters.cellsRowLimit(request.cellsPerRowLimitFilter);
  if ('cellsPerColumnLimitFilter' in request) {
    return RowFilters.cellsColumnLimit(request.cellsPerColumnLimitFilter);
  }
  if ('stripValueTransformer' in request) return RowFilters.stripValue();
  if ('applyLabelTransformer' in request) return RowFilters.applyLabel(request.applyLabelTransformer);
  if ('chain' in request) return RowFilters.chain(...request.chain.filters.map(filterFromRequest));
  if ('interleave' in request) return RowFilters.union(...request.interleave.filters.map(filterFromRequest));
  const condition = request.condition;
  return RowFilters.condition(
    filterFromRequest(condition.predicateFilter),
    condition.trueFilter === undefined ? undefined : filterFromRequest(condition.trueFilter),
    condition.falseFilter === undefined ? undefined : filterFromRequest(condition.falseFilter)
  );
}

