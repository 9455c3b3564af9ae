/**
 * Byte-string helpers.
 *
 * Row keys, column qualifiers and cell values are arbitrary bytes. They are
 * carried as `Uint8Array` and ordered lexicographically by unsigned byte.
 * To use them as `Map` keys they are converted to a "binary string" holding
 * one UTF-16 code unit per byte (0x00-0xff): two binary strings compare with
 * `<` exactly as their bytes compare.
 */

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export type BytesLike = Uint8Array | string;

export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);

/**
 * Bytes of `value`; strings are UTF-8 encoded, arrays returned as-is.
 */
export function toBytes(value: BytesLike): Uint8Array {
  return typeof value === 'string' ? textEncoder.encode(value) : value;
}

/**
 * Fresh copy of `value`, so callers cannot mutate stored bytes.
 */
export function copyBytes(value: BytesLike): Uint8Array {
  return typeof value === 'string' ? textEncoder.encode(value) : value.slice();
}

export function compareBytes(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  if (parts.length === 1) return parts[0];
  let total = 0;
  for (const part of parts) total += part.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * True when `value` starts with `prefix`.
 */
export function hasPrefix(value: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > value.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (value[i] !== prefix[i]) return false;
  }
  return true;
}

/**
 * Smallest key greater than every key starting with `prefix`, or
 * `undefined` when no such key exists (empty prefix, or all 0xff bytes).
 */
export function prefixSuccessor(prefix: Uint8Array): Uint8Array | undefined {
  let end = prefix.length;
  while (end > 0 && prefix[end - 1] === 0xff) {
    end--;
  }
  if (end === 0) return undefined;
  const successor = prefix.slice(0, end);
  successor[end - 1] += 1;
  return successor;
}

// =============================================================================
// Binary strings
// =============================================================================

const BINARY_STRING_BATCH = 0x8000;

/**
 * Binary-string form of `bytes` (one char per byte).
 */
export function bytesToKey(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i < bytes.length; i += BINARY_STRING_BATCH) {
    out += String.fromCharCode(...bytes.subarray(i, i + BINARY_STRING_BATCH));
  }
  return out;
}

/**
 * Inverse of {@link bytesToKey}.
 */
export function keyToBytes(key: string): Uint8Array {
  const out = new Uint8Array(key.length);
  for (let i = 0; i < key.length; i++) {
    out[i] = key.charCodeAt(i) & 0xff;
  }
  return out;
}

/**
 * UTF-8 decoding of `bytes`, for messages and logs. Long values are cut.
 */
export function describeBytes(bytes: Uint8Array, maxLength = 64): string {
  const text = textDecoder.decode(bytes.subarray(0, maxLength));
  return bytes.length > maxLength ? `${text}...` : text;
}

export function decodeUtf8(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/**
 * 8-byte big-endian two's-complement encoding of an integer.
 */
export function encodeInt64(value: number | bigint): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigInt64(0, BigInt(value));
  return out;
}

export function decodeInt64(bytes: Uint8Array): bigint {
  if (bytes.length !== 8) {
    throw new RangeError(`Expected 8 bytes, got ${bytes.length}`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, 8).getBigInt64(0);
}

// =============================================================================
// ByteKeyMap
// =============================================================================

/**
 * Read-only view of a {@link ByteKeyMap}.
 */
export interface ReadonlyByteKeyMap<V> extends Iterable<[Uint8Array, V]> {
  readonly size: number;
  get(key: BytesLike): V | undefined;
  has(key: BytesLike): boolean;
  keys(): Uint8Array[];
  values(): V[];
  entries(): Array<[Uint8Array, V]>;
}

/**
 * Map keyed by byte strings. Lookups of absent keys return `undefined`;
 * iteration is in ascending byte order of the keys.
 *
 * @example
 * ```typescript
 * const columns = new ByteKeyMap<Cell[]>();
 * columns.set('col-name1', [cell]);
 * columns.get(toBytes('col-name1'));  // [cell]
 * columns.get('missing');             // undefined
 * ```
 */
export class ByteKeyMap<V> implements ReadonlyByteKeyMap<V> {
  private readonly map = new Map<string, V>();

  constructor(entries?: Iterable<readonly [BytesLike, V]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.map.size;
  }

  get(key: BytesLike): V | undefined {
    return this.map.get(bytesToKey(toBytes(key)));
  }

  has(key: BytesLike): boolean {
    return this.map.has(bytesToKey(toBytes(key)));
  }

  set(key: BytesLike, value: V): this {
    this.map.set(bytesToKey(toBytes(key)), value);
    return this;
  }

  delete(key: BytesLike): boolean {
    return this.map.delete(bytesToKey(toBytes(key)));
  }

  clear(): void {
    this.map.clear();
  }

  keys(): Uint8Array[] {
    return this.sortedEntries().map(([key]) => keyToBytes(key));
  }

  values(): V[] {
    return this.sortedEntries().map(([, value]) => value);
  }

  entries(): Array<[Uint8Array, V]> {
    return this.sortedEntries().map(([key, value]): [Uint8Array, V] => [keyToBytes(key), value]);
  }

  [Symbol.iterator](): Iterator<[Uint8Array, V]> {
    return this.entries()[Symbol.iterator]();
  }

  private sortedEntries(): Array<[string, V]> {
    return [...this.map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
}
