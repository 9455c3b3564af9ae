import { describe, it, expect } from 'vitest';
import { toBytes } from '../bytes.js';
import { ErrorCode, ValidationError } from '../errors.js';
import {
  RowFilters,
  compileFilterRegex,
  filterFromRequest,
  filterToRequest,
  filtersEqual,
  timestampRange,
  validateFilter,
  type RowFilter,
} from '../row-filters.js';

function expectInvalid(filter: RowFilter): ValidationError {
  try {
    validateFilter(filter);
  } catch (error) {
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.code).toBe(ErrorCode.INVALID_FILTER);
      return error;
    }
  }
  throw new Error('expected validateFilter to throw');
}

describe('RowFilters construction', () => {
  it('freezes nodes', () => {
    const chain = RowFilters.chain(RowFilters.cellsColumnLimit(1));
    expect(Object.isFrozen(chain)).toBe(true);
    expect(Object.isFrozen(chain.filters)).toBe(true);
  });

  it('copies byte patterns', () => {
    const pattern = toBytes('col-.*');
    const filter = RowFilters.columnQualifierRegex(pattern);
    pattern[0] = 0x7a;
    expect(filter.pattern).toEqual(toBytes('col-.*'));
  });

  it('defaults range bounds to inclusive', () => {
    const filter = RowFilters.columnRange('cf1', { startQualifier: 'a', endQualifier: 'c' });
    expect(filter.inclusiveStart).toBe(true);
    expect(filter.inclusiveEnd).toBe(true);
  });
});

describe('timestampRange', () => {
  it('accepts Dates and microseconds', () => {
    expect(timestampRange({ start: new Date(1_000), end: 3_000_500 })).toEqual({
      startMicros: 1_000_000,
      endMicros: 3_000_500,
    });
  });

  it('leaves missing bounds unset', () => {
    expect(timestampRange({ end: new Date(2) })).toEqual({ endMicros: 2_000 });
  });
});

describe('filtersEqual', () => {
  it('is structural', () => {
    const build = (): RowFilter =>
      RowFilters.union(
        RowFilters.chain(RowFilters.columnQualifierRegex('col-name1'), RowFilters.applyLabel('label-red')),
        RowFilters.chain(RowFilters.columnQualifierRegex('col-name2'), RowFilters.applyLabel('label-blue'))
      );
    expect(filtersEqual(build(), build())).toBe(true);
  });

  it('distinguishes kinds with the same parameter', () => {
    expect(filtersEqual(RowFilters.cellsRowLimit(1), RowFilters.cellsColumnLimit(1))).toBe(false);
    expect(filtersEqual(RowFilters.chain(), RowFilters.union())).toBe(false);
  });

  it('is sensitive to child order', () => {
    const a = RowFilters.chain(RowFilters.stripValue(), RowFilters.passAll());
    const b = RowFilters.chain(RowFilters.passAll(), RowFilters.stripValue());
    expect(filtersEqual(a, b)).toBe(false);
  });

  it('compares condition branches', () => {
    const a = RowFilters.condition(RowFilters.passAll(), RowFilters.stripValue());
    const b = RowFilters.condition(RowFilters.passAll(), undefined, RowFilters.stripValue());
    expect(filtersEqual(a, b)).toBe(false);
    expect(filtersEqual(a, RowFilters.condition(RowFilters.passAll(), RowFilters.stripValue()))).toBe(true);
  });
});

describe('validateFilter', () => {
  it('accepts a well-formed tree', () => {
    expect(() =>
      validateFilter(
        RowFilters.condition(
          RowFilters.rowKeyRegex('row-.*'),
          RowFilters.chain(RowFilters.cellsColumnLimit(1), RowFilters.applyLabel('latest')),
          RowFilters.blockAll()
        )
      )
    ).not.toThrow();
  });

  it('rejects negative or fractional counts', () => {
    expect(expectInvalid(RowFilters.cellsRowLimit(-1)).details).toMatchObject({ count: -1 });
    expectInvalid(RowFilters.cellsRowOffset(1.5));
    expectInvalid(RowFilters.chain(RowFilters.cellsColumnLimit(-2)));
  });

  it('rejects malformed labels', () => {
    expectInvalid(RowFilters.applyLabel('Label-Red'));
    expectInvalid(RowFilters.applyLabel(''));
    expectInvalid(RowFilters.applyLabel('a-label-that-is-too-long'));
  });

  it('rejects a timestamp range whose start is after its end', () => {
    expectInvalid(RowFilters.timestampRange({ startMicros: 2_000, endMicros: 1_000 }));
  });

  it('rejects patterns that do not compile', () => {
    expectInvalid(RowFilters.valueRegex('('));
  });

  it('rejects a condition without a predicate', () => {
    const decoded: unknown = { type: 'condition' };
    expect(() => validateFilter(decoded as RowFilter)).toThrow(/requires a predicate/);
  });
});

describe('compileFilterRegex', () => {
  it('matches the whole input', () => {
    const regex = compileFilterRegex(toBytes('col-name1'), 'columnQualifierRegex');
    expect(regex.test('col-name1')).toBe(true);
    expect(regex.test('col-name10')).toBe(false);
  });

  it('keeps alternation inside the anchors', () => {
    const regex = compileFilterRegex('a|b', 'familyNameRegex');
    expect(regex.test('a')).toBe(true);
    expect(regex.test('ab')).toBe(false);
  });
});

describe('filterToRequest', () => {
  it('encodes one key per node', () => {
    expect(
      filterToRequest(
        RowFilters.union(
          RowFilters.chain(RowFilters.columnQualifierRegex('col-name1'), RowFilters.applyLabel('label-red')),
          RowFilters.stripValue()
        )
      )
    ).toEqual({
      interleave: {
        filters: [
          {
            chain: {
              filters: [{ columnQualifierRegexFilter: toBytes('col-name1') }, { applyLabelTransformer: 'label-red' }],
            },
          },
          { stripValueTransformer: true },
        ],
      },
    });
  });

  it('sends timestamp ranges at millisecond granularity', () => {
    expect(filterToRequest(RowFilters.timestampRange({ startMicros: 1_234_567, endMicros: 2_000_001 }))).toEqual({
      timestampRangeFilter: { startTimestampMicros: 1_234_000, endTimestampMicros: 2_001_000 },
    });
  });

  it('encodes range bounds as open or closed', () => {
    expect(
      filterToRequest(RowFilters.columnRange('cf1', { startQualifier: 'a', endQualifier: 'c', inclusiveEnd: false }))
    ).toEqual({
      columnRangeFilter: { familyName: 'cf1', startQualifierClosed: toBytes('a'), endQualifierOpen: toBytes('c') },
    });
    expect(filterToRequest(RowFilters.valueRange({ startValue: 'v', inclusiveStart: false }))).toEqual({
      valueRangeFilter: { startValueOpen: toBytes('v') },
    });
  });

  it('omits absent condition branches', () => {
    expect(filterToRequest(RowFilters.condition(RowFilters.passAll(), RowFilters.cellsRowLimit(2)))).toEqual({
      condition: { predicateFilter: { passAllFilter: true }, trueFilter: { cellsPerRowLimitFilter: 2 } },
    });
  });

  it('decodes back to an equal filter', () => {
    const filter = RowFilters.condition(
      RowFilters.familyNameRegex('cf.*'),
      RowFilters.chain(
        RowFilters.columnRange('cf1', { startQualifier: 'a', inclusiveStart: false }),
        RowFilters.valueRange({ endValue: 'z' }),
        RowFilters.cellsRowOffset(1)
      ),
      RowFilters.union(RowFilters.valueRegex('v.*'), RowFilters.blockAll())
    );
    expect(filtersEqual(filterFromRequest(filterToRequest(filter)), filter)).toBe(true);
  });
});
