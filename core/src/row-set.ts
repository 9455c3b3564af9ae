/**
 * Scan scopes: explicit row keys plus row key ranges.
 *
 * @example
 * ```typescript
 * const rowSet = new RowSet();
 * rowSet.addRowRange(new RowRange('row_key_3', 'row_key_7'));
 * rowSet.addRowKey('row_key_1');
 * // selects row_key_1 and row_key_3 .. row_key_6
 * for await (const row of table.yieldRows({ rowSet })) { ... }
 * ```
 */

import {
  bytesEqual,
  bytesToKey,
  compareBytes,
  copyBytes,
  describeBytes,
  keyToBytes,
  prefixSuccessor,
  toBytes,
  type BytesLike,
} from './bytes.js';

/**
 * Scan-request encoding of a {@link RowRange}. Unbounded sides carry no key.
 */
export interface RowRangeRequest {
  startKeyClosed?: Uint8Array;
  startKeyOpen?: Uint8Array;
  endKeyOpen?: Uint8Array;
  endKeyClosed?: Uint8Array;
}

/**
 * Scan-request encoding of a {@link RowSet}.
 */
export interface RowSetRequest {
  rowKeys: Uint8Array[];
  rowRanges: RowRangeRequest[];
}

/**
 * Contiguous key range. A missing start or end key leaves that side open,
 * so `new RowRange()` covers the whole table. By default the start key is
 * included and the end key excluded.
 */
export class RowRange {
  readonly startKey?: Uint8Array;
  readonly endKey?: Uint8Array;
  readonly startInclusive: boolean;
  readonly endInclusive: boolean;

  constructor(startKey?: BytesLike, endKey?: BytesLike, startInclusive = true, endInclusive = false) {
    this.startKey = startKey === undefined ? undefined : copyBytes(startKey);
    this.endKey = endKey === undefined ? undefined : copyBytes(endKey);
    this.startInclusive = startInclusive;
    this.endInclusive = endInclusive;
    Object.freeze(this);
  }

  /**
   * Range covering every key starting with `prefix`.
   */
  static withPrefix(prefix: BytesLike): RowRange {
    const start = toBytes(prefix);
    return new RowRange(start, prefixSuccessor(start));
  }

  /**
   * Decode the scan-request form produced by {@link toRequest}.
   */
  static fromRequest(request: RowRangeRequest): RowRange {
    const start = request.startKeyClosed ?? request.startKeyOpen;
    const end = request.endKeyOpen ?? request.endKeyClosed;
    return new RowRange(start, end, request.startKeyOpen === undefined, request.endKeyClosed !== undefined);
  }

  contains(key: BytesLike): boolean {
    const bytes = toBytes(key);
    if (this.startKey !== undefined) {
      const cmp = compareBytes(bytes, this.startKey);
      if (cmp < 0 || (cmp === 0 && !this.startInclusive)) return false;
    }
    if (this.endKey !== undefined) {
      const cmp = compareBytes(bytes, this.endKey);
      if (cmp > 0 || (cmp === 0 && !this.endInclusive)) return false;
    }
    return true;
  }

  equals(other: RowRange): boolean {
    return (
      optionalBytesEqual(this.startKey, other.startKey) &&
      optionalBytesEqual(this.endKey, other.endKey) &&
      this.startInclusive === other.startInclusive &&
      this.endInclusive === other.endInclusive
    );
  }

  toRequest(): RowRangeRequest {
    const request: RowRangeRequest = {};
    if (this.startKey !== undefined) {
      if (this.startInclusive) {
        request.startKeyClosed = this.startKey;
      } else {
        request.startKeyOpen = this.startKey;
      }
    }
    if (this.endKey !== undefined) {
      if (this.endInclusive) {
        request.endKeyClosed = this.endKey;
      } else {
        request.endKeyOpen = this.endKey;
      }
    }
    return request;
  }

  toString(): string {
    const open = this.startInclusive ? '[' : '(';
    const close = this.endInclusive ? ']' : ')';
    const start = this.startKey === undefined ? '' : describeBytes(this.startKey);
    const end = this.endKey === undefined ? '' : describeBytes(this.endKey);
    return `${open}${start}, ${end}${close}`;
  }
}

function optionalBytesEqual(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return bytesEqual(a, b);
}

/**
 * Set of explicit row keys and row ranges scoping a scan. An empty set
 * means the entire table. Keys and ranges may overlap; the scanned key
 * space is their union.
 */
export class RowSet {
  private readonly rowKeys = new Set<string>();
  private readonly rowRanges: RowRange[] = [];

  /**
   * Add an explicit key. Adding the same key twice is a no-op.
   */
  addRowKey(key: BytesLike): this {
    this.rowKeys.add(bytesToKey(toBytes(key)));
    return this;
  }

  addRowRange(range: RowRange): this {
    this.rowRanges.push(range);
    return this;
  }

  addRowRangeFromKeys(
    startKey?: BytesLike,
    endKey?: BytesLike,
    startInclusive = true,
    endInclusive = false
  ): this {
    return this.addRowRange(new RowRange(startKey, endKey, startInclusive, endInclusive));
  }

  addRowRangeWithPrefix(prefix: BytesLike): this {
    return this.addRowRange(RowRange.withPrefix(prefix));
  }

  isEmpty(): boolean {
    return this.rowKeys.size === 0 && this.rowRanges.length === 0;
  }

  /**
   * Explicit keys in ascending byte order.
   */
  get keys(): Uint8Array[] {
    return [...this.rowKeys].sort().map(keyToBytes);
  }

  get ranges(): readonly RowRange[] {
    return [...this.rowRanges];
  }

  /**
   * True when a scan with this set would consider `key`.
   */
  contains(key: BytesLike): boolean {
    if (this.isEmpty()) return true;
    const bytes = toBytes(key);
    if (this.rowKeys.has(bytesToKey(bytes))) return true;
    return this.rowRanges.some(range => range.contains(bytes));
  }

  equals(other: RowSet): boolean {
    if (this.rowKeys.size !== other.rowKeys.size) return false;
    for (const key of this.rowKeys) {
      if (!other.rowKeys.has(key)) return false;
    }
    return (
      this.rowRanges.length === other.rowRanges.length &&
      this.rowRanges.every((range, i) => range.equals(other.rowRanges[i]))
    );
  }

  toRequest(): RowSetRequest {
    return {
      rowKeys: this.keys,
      rowRanges: this.rowRanges.map(range => range.toRequest()),
    };
  }

  static fromRequest(request: RowSetRequest): RowSet {
    const rowSet = new RowSet();
    for (const key of request.rowKeys) {
      rowSet.addRowKey(key);
    }
    for (const range of request.rowRanges) {
      rowSet.addRowRange(RowRange.fromRequest(range));
    }
    return rowSet;
  }
}
