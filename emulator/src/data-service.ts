/**
 * Emulated data API: reads, mutations and row key sampling.
 *
 * @module data-service
 */

import {
  describeBytes,
  filterFromRequest,
  StatusCode,
  TransportError,
  validateFilter,
  ValidationError,
  type ReadRowsResponse,
  type RowFilterRequest,
  type Status,
} from '@widecol/core';
import type {
  DataCallOptions,
  DataTransport,
  MutateRowRequest,
  MutateRowsRequest,
  ReadRowsRequest,
  SampleRowKeysRequest,
  SampleRowKeysResponse,
} from '@widecol/client';

import { toResponses, type OutputRow } from './chunker.js';
import { nowMicros, type ReadFault, type ServiceContext } from './context.js';
import { compileFilter, type CompiledFilter } from './filters.js';
import {
  mutateRowRequestSchema,
  mutateRowsRequestSchema,
  parseRequest,
  readRowsRequestSchema,
} from './schemas.js';
import type { TableState } from './table-state.js';

function errorStatus(error: unknown): Status {
  if (error instanceof TransportError) {
    return { code: error.status, message: error.message };
  }
  return { code: StatusCode.INTERNAL, message: error instanceof Error ? error.message : String(error) };
}

export class DataService implements DataTransport {
  constructor(private readonly context: ServiceContext) {}

  readRows(request: ReadRowsRequest, options: DataCallOptions = {}): AsyncIterable<ReadRowsResponse> {
    return this.streamRows(request, options);
  }

  async mutateRow(request: MutateRowRequest): Promise<void> {
    const valid = parseRequest(mutateRowRequestSchema, request, 'mutateRow');
    const table = this.context.state.requireTableForData(valid.tableName, valid.appProfileId);
    table.mutateRow(valid.rowKey, valid.mutations, nowMicros(this.context));
    this.context.logger.debug('mutateRow', {
      operation: 'mutateRow',
      table: valid.tableName,
      rowKey: describeBytes(valid.rowKey),
      mutations: valid.mutations.length,
    });
  }

  async mutateRows(request: MutateRowsRequest): Promise<Status[]> {
    const valid = parseRequest(mutateRowsRequestSchema, request, 'mutateRows');
    const table = this.context.state.requireTableForData(valid.tableName, valid.appProfileId);
    const now = nowMicros(this.context);

    const statuses = valid.entries.map((entry): Status => {
      if (entry.rowKey.length === 0 || entry.mutations.length === 0) {
        return { code: StatusCode.INVALID_ARGUMENT, message: 'Entry needs a row key and at least one mutation' };
      }
      try {
        table.mutateRow(entry.rowKey, entry.mutations, now);
        return { code: StatusCode.OK, message: '' };
      } catch (error) {
        return errorStatus(error);
      }
    });
    this.context.logger.debug('mutateRows', {
      operation: 'mutateRows',
      table: valid.tableName,
      rows: statuses.length,
      failed: statuses.filter(status => status.code !== StatusCode.OK).length,
    });
    return statuses;
  }

  async sampleRowKeys(request: SampleRowKeysRequest): Promise<SampleRowKeysResponse[]> {
    const table = this.context.state.requireTableForData(request.tableName, request.appProfileId);
    return table.sampleRowKeys();
  }

  private async *streamRows(
    request: ReadRowsRequest,
    options: DataCallOptions
  ): AsyncGenerator<ReadRowsResponse, void, undefined> {
    const valid = parseRequest(readRowsRequestSchema, request, 'readRows');
    const table = this.context.state.requireTableForData(valid.tableName, valid.appProfileId);
    const filter = valid.filter === undefined ? undefined : this.compile(valid.filter);
    const fault = this.context.readFaults.shift();

    const rows = this.selectRows(table, valid, filter);
    let sent = 0;
    for (const response of toResponses(rows.output, this.context, rows.lastScannedRowKey)) {
      if (options.signal?.aborted === true) {
        throw new TransportError('Read cancelled by the client', StatusCode.CANCELLED);
      }
      if (fault !== undefined && sent + response.chunks.length > fault.afterChunks) {
        const partial = response.chunks.slice(0, fault.afterChunks - sent);
        if (partial.length > 0) {
          yield { chunks: partial };
        }
        throw this.injected(fault, valid.tableName);
      }
      sent += response.chunks.length;
      yield response;
    }
    if (fault !== undefined) {
      throw this.injected(fault, valid.tableName);
    }
    this.context.logger.debug('readRows', { operation: 'readRows', table: valid.tableName, chunksRead: sent });
  }

  private compile(request: RowFilterRequest): CompiledFilter {
    try {
      const filter = filterFromRequest(request);
      validateFilter(filter);
      return compileFilter(filter);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new TransportError(`Invalid filter: ${error.message}`, StatusCode.INVALID_ARGUMENT, error.details);
      }
      throw error;
    }
  }

  /**
   * Rows the read returns, lazily, plus the last key scanned once the
   * output is drained.
   */
  private selectRows(
    table: TableState,
    request: ReadRowsRequest,
    filter: CompiledFilter | undefined
  ): { output: Iterable<OutputRow>; lastScannedRowKey: () => Uint8Array | undefined } {
    const limit = request.rowsLimit ?? 0;
    const now = nowMicros(this.context);
    let lastScanned: Uint8Array | undefined;
    let lastReturned: Uint8Array | undefined;

    function* output(): Generator<OutputRow> {
      let returned = 0;
      for (const row of table.scan(request.rows, now)) {
        if (limit > 0 && returned >= limit) return;
        lastScanned = row.key;
        const cells = filter === undefined ? row.cells : filter(row.key, row.cells);
        if (cells.length === 0) continue;
        lastReturned = row.key;
        returned++;
        yield { key: row.key, cells };
      }
    }

    return {
      output: { [Symbol.iterator]: output },
      lastScannedRowKey: () => (lastScanned !== undefined && lastScanned !== lastReturned ? lastScanned : undefined),
    };
  }

  private injected(fault: ReadFault, tableName: string): TransportError {
    this.context.logger.debug('Injected read failure', {
      operation: 'readRows',
      table: tableName,
      status: StatusCode[fault.code],
    });
    return new TransportError(fault.message, fault.code, { injected: true });
  }
}
