/**
 * @widecol/test-utils
 *
 * Shared test utilities for widecol packages:
 * - Chunk and read-response builders
 * - Scripted data transports for client tests
 * - Emulator-backed clients
 * - Unique resource ids
 */

import {
  StatusCode,
  toBytes,
  type BytesLike,
  type CellChunk,
  type Logger,
  type ReadRowsResponse,
  type Status,
} from '@widecol/core';
import type { DeepPartial, WidecolConfig } from '@widecol/config';
import {
  Client,
  type DataCallOptions,
  type DataTransport,
  type MutateRowRequest,
  type MutateRowsRequest,
  type ReadRowsRequest,
  type SampleRowKeysRequest,
  type SampleRowKeysResponse,
} from '@widecol/client';
import { Emulator, type EmulatorOptions } from '@widecol/emulator';

// =============================================================================
// Chunk Builders
// =============================================================================

export interface CellChunkInit {
  rowKey?: BytesLike;
  familyName?: string;
  qualifier?: BytesLike;
  timestampMicros?: number;
  labels?: string[];
  value?: BytesLike;
  valueSize?: number;
  commitRow?: boolean;
}

/**
 * Build a chunk from strings or bytes; absent fields stay absent.
 *
 * @example
 * ```ts
 * cellChunk({ rowKey: 'row-key', familyName: 'cf1', qualifier: 'col', timestampMicros: 1000, value: 'v', commitRow: true });
 * ```
 */
export function cellChunk(init: CellChunkInit): CellChunk {
  const chunk: CellChunk = {};
  if (init.rowKey !== undefined) chunk.rowKey = toBytes(init.rowKey);
  if (init.familyName !== undefined) chunk.familyName = init.familyName;
  if (init.qualifier !== undefined) chunk.qualifier = toBytes(init.qualifier);
  if (init.timestampMicros !== undefined) chunk.timestampMicros = init.timestampMicros;
  if (init.labels !== undefined) chunk.labels = [...init.labels];
  if (init.value !== undefined) chunk.value = toBytes(init.value);
  if (init.valueSize !== undefined) chunk.valueSize = init.valueSize;
  if (init.commitRow !== undefined) chunk.commitRow = init.commitRow;
  return chunk;
}

/**
 * A whole single-cell row in one committed chunk.
 */
export function singleCellRow(
  rowKey: BytesLike,
  familyName: string,
  qualifier: BytesLike,
  value: BytesLike,
  timestampMicros = 1_000
): CellChunk {
  return cellChunk({ rowKey, familyName, qualifier, timestampMicros, value, commitRow: true });
}

export function resetChunk(): CellChunk {
  return { resetRow: true };
}

export function commitChunk(): CellChunk {
  return { commitRow: true };
}

/**
 * Chunks carrying `value` split into `parts` fragments; the first one
 * carries the cell coordinates from `init`.
 */
export function splitValueChunks(
  init: Omit<CellChunkInit, 'value' | 'valueSize'>,
  value: BytesLike,
  parts: number
): CellChunk[] {
  const bytes = toBytes(value);
  const size = Math.ceil(bytes.length / parts);
  const chunks: CellChunk[] = [];
  for (let i = 0; i < parts; i++) {
    const fragment = bytes.subarray(i * size, Math.min((i + 1) * size, bytes.length));
    const last = i === parts - 1;
    const chunk: CellChunk = i === 0 ? cellChunk({ ...init, commitRow: undefined }) : {};
    chunk.value = fragment;
    if (!last) chunk.valueSize = bytes.length;
    if (last && init.commitRow === true) chunk.commitRow = true;
    chunks.push(chunk);
  }
  return chunks;
}

export function response(...chunks: CellChunk[]): ReadRowsResponse {
  return { chunks };
}

// =============================================================================
// Scripted Data Transport
// =============================================================================

/** One step of a scripted read: a response to deliver or an error to throw */
export type ReadStep = ReadRowsResponse | Error;

export type ScriptedDataTransport = DataTransport & {
  /** Requests received by readRows, in order */
  readonly readRequests: ReadRowsRequest[];
  readonly mutateRowRequests: MutateRowRequest[];
  readonly mutateRowsRequests: MutateRowsRequest[];
  /** Queue the steps of the next readRows call */
  scriptRead(...steps: ReadStep[]): void;
  /** Queue the statuses the next mutateRows call returns */
  scriptMutateRows(statuses: Status[]): void;
  /** Samples every sampleRowKeys call returns */
  samples: SampleRowKeysResponse[];
};

/**
 * Data transport that replays scripted read streams and records every
 * request. A read with nothing scripted returns an empty stream; mutateRows
 * without scripted statuses reports OK for every entry.
 *
 * @example
 * ```ts
 * const transport = createScriptedDataTransport();
 * transport.scriptRead(response(singleCellRow('a', 'cf1', 'q', 'v')), TransportError.unavailable());
 * transport.scriptRead(response(singleCellRow('b', 'cf1', 'q', 'v')));
 * ```
 */
export function createScriptedDataTransport(): ScriptedDataTransport {
  const reads: ReadStep[][] = [];
  const mutateRowsStatuses: Status[][] = [];

  const transport: ScriptedDataTransport = {
    readRequests: [],
    mutateRowRequests: [],
    mutateRowsRequests: [],
    samples: [],

    scriptRead(...steps: ReadStep[]): void {
      reads.push(steps);
    },

    scriptMutateRows(statuses: Status[]): void {
      mutateRowsStatuses.push(statuses);
    },

    readRows(request: ReadRowsRequest, _options?: DataCallOptions): AsyncIterable<ReadRowsResponse> {
      transport.readRequests.push(request);
      const steps = reads.shift() ?? [];
      return (async function* () {
        for (const step of steps) {
          if (step instanceof Error) throw step;
          yield step;
        }
      })();
    },

    async mutateRow(request: MutateRowRequest): Promise<void> {
      transport.mutateRowRequests.push(request);
    },

    async mutateRows(request: MutateRowsRequest): Promise<Status[]> {
      transport.mutateRowsRequests.push(request);
      return mutateRowsStatuses.shift() ?? request.entries.map(() => ({ code: StatusCode.OK, message: '' }));
    },

    async sampleRowKeys(_request: SampleRowKeysRequest): Promise<SampleRowKeysResponse[]> {
      return transport.samples;
    },
  };
  return transport;
}

// =============================================================================
// Emulator-backed Clients
// =============================================================================

export interface EmulatedClientOptions {
  /** Reuse an emulator; a new one is created from `emulator` options otherwise */
  emulatorInstance?: Emulator;
  emulator?: EmulatorOptions;
  projectId?: string;
  /** Defaults to true */
  admin?: boolean;
  config?: DeepPartial<WidecolConfig>;
  logger?: Logger;
}

/**
 * A client talking to an in-process emulator.
 *
 * @example
 * ```ts
 * const { client, emulator } = createEmulatedClient({ emulator: { chunksPerResponse: 2 } });
 * const instance = client.instance('test-instance');
 * ```
 */
export function createEmulatedClient(options: EmulatedClientOptions = {}): { client: Client; emulator: Emulator } {
  const emulator = options.emulatorInstance ?? new Emulator(options.emulator);
  const client = new Client({
    transport: emulator.transport(),
    config: {
      ...options.config,
      client: {
        ...options.config?.client,
        projectId: options.projectId ?? options.config?.client?.projectId ?? 'test-project',
        admin: options.admin ?? true,
      },
    },
    logger: options.logger,
  });
  return { client, emulator };
}

// =============================================================================
// ID Generators
// =============================================================================

let idCounter = 0;

/**
 * Suffix for resource ids that must not collide across test runs, e.g.
 * `'g-c-p' + uniqueResourceId('-')`.
 */
export function uniqueResourceId(delimiter = ''): string {
  return `${delimiter}${Date.now()}${delimiter}${++idCounter}`;
}

/**
 * Generate a unique ID for testing
 */
export function generateId(prefix: string = 'id'): string {
  return `${prefix}-${++idCounter}-${Date.now().toString(36)}`;
}

/**
 * Reset the ID counter (useful between tests)
 */
export function resetIdCounter(): void {
  idCounter = 0;
}
