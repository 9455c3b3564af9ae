import {
  AlreadyExistsError,
  describeBytes,
  isValidIdentifier,
  StatusCode,
  TransportError,
} from '@widecol/core';
import type {
  CreateTableRequest,
  DropRowRangeRequest,
  ModifyColumnFamiliesRequest,
  TableAdminTransport,
  TableResource,
  TableView,
} from '@widecol/client';

import { nowMicros, type ServiceContext } from './context.js';
import {
  createTableRequestSchema,
  dropRowRangeRequestSchema,
  modifyColumnFamiliesRequestSchema,
  parseRequest,
} from './schemas.js';
import { parseChildName } from './state.js';
import { TableState } from './table-state.js';

function invalidArgument(message: string, details?: Record<string, unknown>): TransportError {
  return new TransportError(message, StatusCode.INVALID_ARGUMENT, details);
}

export class TableAdminService implements TableAdminTransport {
  constructor(private readonly context: ServiceContext) {}

  async createTable(request: CreateTableRequest): Promise<TableResource> {
    const valid = parseRequest(createTableRequestSchema, request, 'createTable');
    const instance = this.context.state.requireInstance(valid.parent);
    if (!isValidIdentifier('table', valid.tableId)) {
      throw invalidArgument(`Invalid table id: ${valid.tableId}`, { tableId: valid.tableId });
    }
    const families = valid.columnFamilies ?? {};
    for (const familyId of Object.keys(families)) {
      if (!isValidIdentifier('family', familyId)) {
        throw invalidArgument(`Invalid column family id: ${familyId}`, { familyId });
      }
    }

    const name = `${valid.parent}/tables/${valid.tableId}`;
    if (instance.tables.has(valid.tableId)) {
      throw AlreadyExistsError.resource('Table', name);
    }
    const table = new TableState(name, families, valid.initialSplits ?? []);
    instance.tables.set(valid.tableId, table);
    this.context.logger.debug('createTable', {
      operation: 'createTable',
      table: name,
      families: Object.keys(families).length,
    });
    return table.toResource();
  }

  async getTable(request: { name: string; view?: TableView }): Promise<TableResource> {
    return this.context.state.requireTable(request.name).toResource(request.view ?? 'SCHEMA_VIEW');
  }

  async listTables(request: { parent: string; view?: TableView }): Promise<TableResource[]> {
    const instance = this.context.state.requireInstance(request.parent);
    return [...instance.tables.keys()]
      .sort()
      .flatMap(id => {
        const table = instance.tables.get(id);
        return table === undefined ? [] : [table.toResource(request.view ?? 'NAME_ONLY')];
      });
  }

  async deleteTable(request: { name: string }): Promise<void> {
    const { instance, id } = parseChildName(request.name, 'tables');
    this.context.state.requireTable(request.name);
    this.context.state.requireInstance(instance).tables.delete(id);
    this.context.logger.debug('deleteTable', { operation: 'deleteTable', table: request.name });
  }

  async modifyColumnFamilies(request: ModifyColumnFamiliesRequest): Promise<TableResource> {
    const valid = parseRequest(modifyColumnFamiliesRequestSchema, request, 'modifyColumnFamilies');
    for (const modification of valid.modifications) {
      if (!isValidIdentifier('family', modification.id)) {
        throw invalidArgument(`Invalid column family id: ${modification.id}`, { familyId: modification.id });
      }
    }
    const table = this.context.state.requireTable(valid.name);
    table.modifyColumnFamilies(valid.modifications, nowMicros(this.context));
    this.context.logger.debug('modifyColumnFamilies', {
      operation: 'modifyColumnFamilies',
      table: valid.name,
      changes: valid.modifications.map(m => `${m.type}:${m.id}`),
    });
    return table.toResource();
  }

  async dropRowRange(request: DropRowRangeRequest): Promise<void> {
    const valid = parseRequest(dropRowRangeRequestSchema, request, 'dropRowRange');
    const table = this.context.state.requireTable(valid.name);
    if ('deleteAllDataFromTable' in valid) {
      const rows = table.rowCount;
      table.dropAllRows();
      this.context.logger.debug('dropRowRange', { operation: 'dropRowRange', table: valid.name, rows });
      return;
    }
    const rows = table.dropRowsWithPrefix(valid.rowKeyPrefix);
    this.context.logger.debug('dropRowRange', {
      operation: 'dropRowRange',
      table: valid.name,
      prefix: describeBytes(valid.rowKeyPrefix),
      rows,
    });
  }
}
