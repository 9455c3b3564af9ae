/**
 * Instances: the container of tables, clusters and app profiles.
 */

import {
  NotFoundError,
  ValidationError,
  validateInstanceId,
  withContext,
  type Logger,
} from '@widecol/core';

import { AppProfile, type AppProfileOptions, type AppProfileWriteOptions } from './app-profile.js';
import type { Client } from './client.js';
import type { Operation } from './operation.js';
import { Table, type TableOptions } from './table.js';
import {
  instanceName,
  InstanceType,
  locationName,
  resourceId,
  type InstanceResource,
  type InstanceState,
  type InstanceUpdateField,
} from './transport.js';

/** Serve nodes of a production cluster when none are requested */
export const DEFAULT_SERVE_NODES = 3;

export interface InstanceOptions {
  /** Defaults to the instance id */
  displayName?: string;
  /** Left to the server when absent, which creates a PRODUCTION instance */
  type?: InstanceType;
  labels?: Record<string, string>;
}

export interface CreateInstanceOptions {
  /** Zone of the instance's cluster, e.g. `us-central1-c` */
  locationId: string;
  /** Defaults to `<instanceId>-cluster` */
  clusterId?: string;
  /** Must be left out for DEVELOPMENT instances */
  serveNodes?: number;
}

/**
 * Handle on an instance.
 *
 * @example
 * ```typescript
 * const instance = client.instance('my-instance', {
 *   type: InstanceType.DEVELOPMENT,
 *   labels: { env: 'test' },
 * });
 * const operation = await instance.create({ locationId: 'us-central1-c' });
 * await operation.result({ timeoutMs: 10_000 });
 * ```
 */
export class Instance {
  readonly instanceId: string;
  readonly name: string;
  readonly client: Client;
  displayName: string;
  type: InstanceType | undefined;
  labels: Record<string, string> | undefined;
  /** Known after create or reload */
  state: InstanceState | undefined;
  private readonly logger: Logger;

  constructor(instanceId: string, client: Client, options: InstanceOptions = {}) {
    this.instanceId = validateInstanceId(instanceId);
    this.client = client;
    this.name = instanceName(client.projectId, instanceId);
    this.displayName = options.displayName ?? instanceId;
    this.type = options.type;
    this.labels = options.labels === undefined ? undefined : { ...options.labels };
    this.logger = withContext(client.logger, { instance: this.name });
  }

  static fromResource(resource: InstanceResource, client: Client): Instance {
    const instance = new Instance(resourceId(resource.name), client);
    instance.applyResource(resource);
    return instance;
  }

  /**
   * Create the instance with one cluster.
   *
   * @throws ValidationError when serve nodes are given for a DEVELOPMENT instance
   */
  async create(options: CreateInstanceOptions): Promise<Operation<Instance>> {
    const type = this.type ?? InstanceType.UNSPECIFIED;
    if (type === InstanceType.DEVELOPMENT && options.serveNodes !== undefined) {
      throw new ValidationError('DEVELOPMENT instances take no serve nodes', undefined, {
        instance: this.name,
        serveNodes: options.serveNodes,
      });
    }

    const clusterId = options.clusterId ?? `${this.instanceId}-cluster`;
    const serveNodes = type === InstanceType.DEVELOPMENT ? 0 : options.serveNodes ?? DEFAULT_SERVE_NODES;

    const handle = await this.client.instanceAdmin('createInstance').createInstance({
      parent: this.client.projectName,
      instanceId: this.instanceId,
      instance: {
        displayName: this.displayName,
        type,
        labels: { ...this.labels },
      },
      clusters: {
        [clusterId]: {
          location: locationName(this.client.projectId, options.locationId),
          serveNodes,
        },
      },
    });
    this.logger.info('Creating instance', { operation: 'createInstance', cluster: clusterId });

    return this.client.operation<InstanceResource, Instance>(handle, (resource) => {
      this.applyResource(resource);
      return this;
    });
  }

  /**
   * Refresh display name, type, labels and state from the server.
   */
  async reload(): Promise<this> {
    const resource = await this.client.instanceAdmin('getInstance').getInstance({ name: this.name });
    this.applyResource(resource);
    return this;
  }

  async exists(): Promise<boolean> {
    try {
      await this.client.instanceAdmin('getInstance').getInstance({ name: this.name });
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Send the local display name, and the type and labels when they are set.
   */
  async update(): Promise<Operation<Instance>> {
    const updateMask: InstanceUpdateField[] = ['displayName'];
    if (this.labels !== undefined) updateMask.push('labels');
    if (this.type !== undefined) updateMask.push('type');

    const handle = await this.client.instanceAdmin('partialUpdateInstance').partialUpdateInstance({
      instance: {
        name: this.name,
        displayName: this.displayName,
        labels: this.labels,
        type: this.type,
      },
      updateMask,
    });
    this.logger.info('Updating instance', { operation: 'partialUpdateInstance', fields: updateMask.join(',') });

    return this.client.operation<InstanceResource, Instance>(handle, (resource) => {
      this.applyResource(resource);
      return this;
    });
  }

  async delete(): Promise<void> {
    await this.client.instanceAdmin('deleteInstance').deleteInstance({ name: this.name });
    this.logger.info('Deleted instance', { operation: 'deleteInstance' });
  }

  /**
   * Same instance name through the same client.
   */
  equals(other: Instance): boolean {
    return other.name === this.name && other.client === this.client;
  }

  // ===========================================================================
  // Tables
  // ===========================================================================

  table(tableId: string, options: TableOptions = {}): Table {
    return new Table(tableId, this, options);
  }

  async listTables(): Promise<Table[]> {
    const tables = await this.client.tableAdmin('listTables').listTables({ parent: this.name });
    return tables.map(resource => {
      const expectedPrefix = `${this.name}/tables/`;
      if (!resource.name.startsWith(expectedPrefix)) {
        throw new ValidationError(`Table name ${resource.name} does not belong to instance ${this.name}`);
      }
      return this.table(resourceId(resource.name));
    });
  }

  // ===========================================================================
  // App profiles
  // ===========================================================================

  appProfile(appProfileId: string, options: AppProfileOptions = {}): AppProfile {
    return new AppProfile(appProfileId, this, options);
  }

  async createAppProfile(
    appProfileId: string,
    options: AppProfileOptions,
    writeOptions: AppProfileWriteOptions = {}
  ): Promise<AppProfile> {
    return this.appProfile(appProfileId, options).create(writeOptions);
  }

  async getAppProfile(appProfileId: string): Promise<AppProfile> {
    return this.appProfile(appProfileId).reload();
  }

  async listAppProfiles(): Promise<AppProfile[]> {
    const resources = await this.client.instanceAdmin('listAppProfiles').listAppProfiles({ parent: this.name });
    return resources.map(resource => AppProfile.fromResource(resource, this));
  }

  /**
   * Replace description and routing policy of an existing profile.
   */
  async updateAppProfile(
    appProfileId: string,
    options: AppProfileOptions,
    writeOptions: AppProfileWriteOptions = {}
  ): Promise<Operation<AppProfile>> {
    return this.appProfile(appProfileId, options).update(writeOptions);
  }

  async deleteAppProfile(appProfileId: string, writeOptions: AppProfileWriteOptions = {}): Promise<void> {
    await this.appProfile(appProfileId).delete(writeOptions);
  }

  private applyResource(resource: InstanceResource): void {
    this.displayName = resource.displayName;
    this.type = resource.type;
    this.labels = { ...resource.labels };
    this.state = resource.state;
  }
}
