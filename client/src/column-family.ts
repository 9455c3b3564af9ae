import { validateFamilyId } from '@widecol/core';

import { gcRuleFromRequest, gcRulesEqual, gcRuleToRequest, type GCRule } from './gc-rules.js';
import type { Table } from './table.js';
import type { ColumnFamilyModification, ColumnFamilyResource } from './transport.js';

/**
 * A column family of a table and its garbage-collection rule.
 *
 * @example
 * ```typescript
 * const family = table.columnFamily('cf1', new MaxVersionsGCRule(1));
 * await family.create();
 * family.gcRule = new MaxVersionsGCRule(3);
 * await family.update();
 * ```
 */
export class ColumnFamily {
  readonly columnFamilyId: string;
  readonly table: Table;
  gcRule: GCRule | undefined;

  constructor(columnFamilyId: string, table: Table, gcRule?: GCRule) {
    this.columnFamilyId = validateFamilyId(columnFamilyId);
    this.table = table;
    this.gcRule = gcRule;
  }

  static fromResource(columnFamilyId: string, resource: ColumnFamilyResource, table: Table): ColumnFamily {
    const gcRule = resource.gcRule === undefined ? undefined : gcRuleFromRequest(resource.gcRule);
    return new ColumnFamily(columnFamilyId, table, gcRule);
  }

  toResource(): ColumnFamilyResource {
    return this.gcRule === undefined ? {} : { gcRule: gcRuleToRequest(this.gcRule) };
  }

  async create(): Promise<void> {
    await this.modify({ type: 'create', id: this.columnFamilyId, ...this.toResource() });
  }

  /**
   * Replace the family's GC rule with the local one.
   */
  async update(): Promise<void> {
    await this.modify({ type: 'update', id: this.columnFamilyId, ...this.toResource() });
  }

  async delete(): Promise<void> {
    await this.modify({ type: 'drop', id: this.columnFamilyId });
  }

  /**
   * Same id, same table and structurally equal GC rules.
   */
  equals(other: ColumnFamily): boolean {
    return (
      other.columnFamilyId === this.columnFamilyId &&
      other.table.name === this.table.name &&
      gcRulesEqual(this.gcRule, other.gcRule)
    );
  }

  private async modify(modification: ColumnFamilyModification): Promise<void> {
    await this.table.instance.client.tableAdmin('modifyColumnFamilies').modifyColumnFamilies({
      name: this.table.name,
      modifications: [modification],
    });
    this.table.instance.client.logger.info('Modified column family', {
      operation: 'modifyColumnFamilies',
      table: this.table.name,
      family: this.columnFamilyId,
      change: modification.type,
    });
  }
}
