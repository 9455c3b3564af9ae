/**
 * In-process server for the data, table admin and instance admin APIs.
 *
 * @example
 * ```typescript
 * const emulator = new Emulator({ chunksPerResponse: 2 });
 * const client = new Client({
 *   transport: emulator.transport(),
 *   config: { client: { projectId: 'test-project', admin: true } },
 * });
 *
 * emulator.failNextRead({ afterChunks: 3 });   // the next read drops after 3 chunks
 * ```
 *
 * @module emulator
 */

import { createNoopLogger, StatusCode, ValidationError, type Logger } from '@widecol/core';
import type { Transport } from '@widecol/client';

import type { ReadFault, ServiceContext } from './context.js';
import { DataService } from './data-service.js';
import { InstanceAdminService } from './instance-admin-service.js';
import { EmulatorState } from './state.js';
import { TableAdminService } from './table-admin-service.js';

export interface EmulatorOptions {
  /** Milliseconds since the epoch; defaults to `Date.now` */
  now?: () => number;
  /** Values longer than this are split across chunks (default 1 MiB) */
  maxChunkValueBytes?: number;
  /** Chunks per read response (default 100) */
  chunksPerResponse?: number;
  /** Polls an operation reports as running before it settles (default 0) */
  operationPolls?: number;
  /** Locations `listInstances` reports as unreachable */
  failedLocations?: string[];
  logger?: Logger;
}

export interface ReadFaultOptions {
  /** Chunks delivered before the failure (default 0) */
  afterChunks?: number;
  /** Status of the failure (default UNAVAILABLE) */
  code?: StatusCode;
  message?: string;
}

export const DEFAULT_MAX_CHUNK_VALUE_BYTES = 1024 * 1024;
export const DEFAULT_CHUNKS_PER_RESPONSE = 100;

export class Emulator {
  private readonly state = new EmulatorState();
  private readonly context: ServiceContext;

  constructor(options: EmulatorOptions = {}) {
    const maxChunkValueBytes = options.maxChunkValueBytes ?? DEFAULT_MAX_CHUNK_VALUE_BYTES;
    const chunksPerResponse = options.chunksPerResponse ?? DEFAULT_CHUNKS_PER_RESPONSE;
    if (!Number.isSafeInteger(maxChunkValueBytes) || maxChunkValueBytes < 1) {
      throw new ValidationError(`maxChunkValueBytes must be a positive integer, got ${maxChunkValueBytes}`);
    }
    if (!Number.isSafeInteger(chunksPerResponse) || chunksPerResponse < 1) {
      throw new ValidationError(`chunksPerResponse must be a positive integer, got ${chunksPerResponse}`);
    }

    this.context = {
      state: this.state,
      logger: options.logger ?? createNoopLogger(),
      now: options.now ?? Date.now,
      maxChunkValueBytes,
      chunksPerResponse,
      operationPolls: options.operationPolls ?? 0,
      failedLocations: options.failedLocations ?? [],
      readFaults: [],
    };
  }

  /**
   * Fresh service handles over this emulator's state.
   */
  transport(): Transport {
    return {
      data: new DataService(this.context),
      tableAdmin: new TableAdminService(this.context),
      instanceAdmin: new InstanceAdminService(this.context),
    };
  }

  /**
   * Make the next read fail after `afterChunks` chunks. Several calls queue
   * faults for successive reads.
   */
  failNextRead(options: ReadFaultOptions = {}): void {
    const fault: ReadFault = {
      afterChunks: options.afterChunks ?? 0,
      code: options.code ?? StatusCode.UNAVAILABLE,
      message: options.message ?? 'Injected read failure',
    };
    this.context.readFaults.push(fault);
  }

  /**
   * Faults queued by {@link failNextRead} that no read has consumed yet.
   */
  get pendingReadFaults(): number {
    return this.context.readFaults.length;
  }

  /**
   * Drop every instance and queued fault.
   */
  reset(): void {
    this.state.instances.clear();
    this.context.readFaults.length = 0;
  }
}
