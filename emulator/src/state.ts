/**
 * The emulator's resource tree and name lookups.
 *
 * @module state
 */

import { NotFoundError, StatusCode, TransportError } from '@widecol/core';
import type { AppProfileResource, ClusterResource, InstanceResource } from '@widecol/client';

import type { TableState } from './table-state.js';

export interface InstanceRecord {
  resource: InstanceResource;
  clusters: Map<string, ClusterResource>;
  appProfiles: Map<string, AppProfileResource>;
  tables: Map<string, TableState>;
}

const INSTANCE_NAME = /^projects\/[^/]+\/instances\/[^/]+$/;
const CHILD_NAME = /^(projects\/[^/]+\/instances\/[^/]+)\/(tables|appProfiles|clusters)\/([^/]+)$/;

export interface ChildName {
  instance: string;
  id: string;
}

/**
 * Split `projects/{p}/instances/{i}/{collection}/{id}`.
 *
 * @throws TransportError INVALID_ARGUMENT when `name` has another shape
 */
export function parseChildName(name: string, collection: 'tables' | 'appProfiles' | 'clusters'): ChildName {
  const match = CHILD_NAME.exec(name);
  if (match === null || match[2] !== collection) {
    throw new TransportError(`Malformed ${collection} name: ${name}`, StatusCode.INVALID_ARGUMENT, { name });
  }
  return { instance: match[1], id: match[3] };
}

export class EmulatorState {
  readonly instances = new Map<string, InstanceRecord>();

  requireInstance(name: string): InstanceRecord {
    if (!INSTANCE_NAME.test(name)) {
      throw new TransportError(`Malformed instance name: ${name}`, StatusCode.INVALID_ARGUMENT, { name });
    }
    const record = this.instances.get(name);
    if (record === undefined) {
      throw NotFoundError.resource('Instance', name);
    }
    return record;
  }

  requireTable(name: string): TableState {
    const { instance, id } = parseChildName(name, 'tables');
    const table = this.requireInstance(instance).tables.get(id);
    if (table === undefined) {
      throw NotFoundError.resource('Table', name);
    }
    return table;
  }

  /**
   * The table, after checking that `appProfileId` (when given) exists in
   * the table's instance.
   */
  requireTableForData(name: string, appProfileId: string | undefined): TableState {
    const table = this.requireTable(name);
    if (appProfileId !== undefined && appProfileId !== '' && appProfileId !== 'default') {
      const { instance } = parseChildName(name, 'tables');
      if (!this.requireInstance(instance).appProfiles.has(appProfileId)) {
        throw NotFoundError.resource('App profile', `${instance}/appProfiles/${appProfileId}`);
      }
    }
    return table;
  }

  requireAppProfile(name: string): { record: InstanceRecord; id: string; profile: AppProfileResource } {
    const { instance, id } = parseChildName(name, 'appProfiles');
    const record = this.requireInstance(instance);
    const profile = record.appProfiles.get(id);
    if (profile === undefined) {
      throw NotFoundError.resource('App profile', name);
    }
    return { record, id, profile };
  }
}
