import { MICROS_PER_MILLI, type Logger, type StatusCode } from '@widecol/core';

import type { EmulatorState } from './state.js';

export interface ReadFault {
  /** Chunks delivered before the stream fails */
  afterChunks: number;
  code: StatusCode;
  message: string;
}

/**
 * What the emulated services share.
 */
export interface ServiceContext {
  readonly state: EmulatorState;
  readonly logger: Logger;
  /** Milliseconds since the epoch */
  now(): number;
  readonly maxChunkValueBytes: number;
  readonly chunksPerResponse: number;
  /** Polls a long-running operation reports as running before it settles */
  readonly operationPolls: number;
  /** Locations `listInstances` reports as unreachable */
  readonly failedLocations: readonly string[];
  /** Faults for upcoming reads, consumed one per read */
  readonly readFaults: ReadFault[];
}

export function nowMicros(context: ServiceContext): number {
  return Math.floor(context.now()) * MICROS_PER_MILLI;
}
