/**
 * Emulated instance admin: instances with their clusters, and app profiles.
 *
 * @module instance-admin-service
 */

import {
  AlreadyExistsError,
  FailedPreconditionError,
  isValidIdentifier,
  NotFoundError,
  StatusCode,
  TransportError,
} from '@widecol/core';
import {
  InstanceType,
  type AppProfileResource,
  type CreateAppProfileRequest,
  type CreateInstanceRequest,
  type InstanceAdminTransport,
  type InstanceResource,
  type ListInstancesResponse,
  type LongRunningOperation,
  type PartialUpdateInstanceRequest,
  type RoutingPolicyResource,
  type UpdateAppProfileRequest,
} from '@widecol/client';

import type { ServiceContext } from './context.js';
import { EmulatedOperation, operationName } from './operations.js';
import {
  createAppProfileRequestSchema,
  createInstanceRequestSchema,
  parseRequest,
  partialUpdateInstanceRequestSchema,
  updateAppProfileRequestSchema,
} from './schemas.js';
import type { InstanceRecord } from './state.js';

const PROJECT_NAME = /^projects\/[^/]+$/;
const LOCATION_NAME = /^projects\/[^/]+\/locations\/[^/]+$/;

/** Serve nodes a development cluster gets when promoted to production */
const PROMOTED_SERVE_NODES = 1;

function invalidArgument(message: string, details?: Record<string, unknown>): TransportError {
  return new TransportError(message, StatusCode.INVALID_ARGUMENT, details);
}

function copyInstance(resource: InstanceResource): InstanceResource {
  return { ...resource, labels: { ...resource.labels } };
}

function copyAppProfile(resource: AppProfileResource): AppProfileResource {
  return { ...resource, routingPolicy: copyRoutingPolicy(resource.routingPolicy) };
}

function copyRoutingPolicy(policy: RoutingPolicyResource): RoutingPolicyResource {
  if ('singleClusterRouting' in policy) {
    return { singleClusterRouting: { ...policy.singleClusterRouting } };
  }
  return { multiClusterRoutingUseAny: {} };
}

export class InstanceAdminService implements InstanceAdminTransport {
  constructor(private readonly context: ServiceContext) {}

  // ===========================================================================
  // Instances
  // ===========================================================================

  async createInstance(request: CreateInstanceRequest): Promise<LongRunningOperation<InstanceResource>> {
    const valid = parseRequest(createInstanceRequestSchema, request, 'createInstance');
    if (!PROJECT_NAME.test(valid.parent)) {
      throw invalidArgument(`Malformed project name: ${valid.parent}`);
    }
    if (!isValidIdentifier('instance', valid.instanceId)) {
      throw invalidArgument(`Invalid instance id: ${valid.instanceId}`, { instanceId: valid.instanceId });
    }
    const name = `${valid.parent}/instances/${valid.instanceId}`;
    if (this.context.state.instances.has(name)) {
      throw AlreadyExistsError.resource('Instance', name);
    }

    const type = valid.instance.type === InstanceType.UNSPECIFIED ? InstanceType.PRODUCTION : valid.instance.type;
    const record: InstanceRecord = {
      resource: {
        name,
        displayName: valid.instance.displayName,
        type,
        labels: { ...valid.instance.labels },
        state: 'CREATING',
      },
      clusters: new Map(),
      appProfiles: new Map(),
      tables: new Map(),
    };
    for (const [clusterId, cluster] of Object.entries(valid.clusters)) {
      if (!isValidIdentifier('cluster', clusterId)) {
        throw invalidArgument(`Invalid cluster id: ${clusterId}`, { clusterId });
      }
      if (!LOCATION_NAME.test(cluster.location)) {
        throw invalidArgument(`Malformed location: ${cluster.location}`, { clusterId });
      }
      if (type === InstanceType.DEVELOPMENT && cluster.serveNodes !== 0) {
        throw invalidArgument('Development instances take no serve nodes', { clusterId, serveNodes: cluster.serveNodes });
      }
      if (type === InstanceType.PRODUCTION && cluster.serveNodes < 1) {
        throw invalidArgument('Production clusters need at least one serve node', { clusterId });
      }
      record.clusters.set(clusterId, { ...cluster });
    }

    this.context.state.instances.set(name, record);
    this.context.logger.debug('createInstance', { operation: 'createInstance', instance: name, type });
    return new EmulatedOperation(operationName(name), this.context.operationPolls, () => {
      record.resource.state = 'READY';
      return { done: true, result: copyInstance(record.resource) };
    });
  }

  async getInstance(request: { name: string }): Promise<InstanceResource> {
    return copyInstance(this.context.state.requireInstance(request.name).resource);
  }

  async listInstances(request: { parent: string }): Promise<ListInstancesResponse> {
    if (!PROJECT_NAME.test(request.parent)) {
      throw invalidArgument(`Malformed project name: ${request.parent}`);
    }
    const prefix = `${request.parent}/instances/`;
    const instances = [...this.context.state.instances.values()]
      .filter(record => record.resource.name.startsWith(prefix))
      .map(record => copyInstance(record.resource))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return { instances, failedLocations: [...this.context.failedLocations] };
  }

  /**
   * Apply the fields named by the update mask.
   *
   * @throws FailedPreconditionError when a PRODUCTION instance would become
   * DEVELOPMENT
   */
  async partialUpdateInstance(
    request: PartialUpdateInstanceRequest
  ): Promise<LongRunningOperation<InstanceResource>> {
    const valid = parseRequest(partialUpdateInstanceRequestSchema, request, 'partialUpdateInstance');
    const record = this.context.state.requireInstance(valid.instance.name);
    const next = copyInstance(record.resource);

    for (const field of new Set(valid.updateMask)) {
      switch (field) {
        case 'displayName':
          if (valid.instance.displayName === undefined) throw invalidArgument('displayName is in the mask but unset');
          next.displayName = valid.instance.displayName;
          break;
        case 'labels':
          next.labels = { ...valid.instance.labels };
          break;
        case 'type': {
          const type = valid.instance.type;
          if (type === undefined || type === InstanceType.UNSPECIFIED) {
            throw invalidArgument('type is in the mask but unset');
          }
          if (record.resource.type === InstanceType.PRODUCTION && type === InstanceType.DEVELOPMENT) {
            throw new FailedPreconditionError('A PRODUCTION instance cannot become DEVELOPMENT', {
              instance: record.resource.name,
            });
          }
          next.type = type;
          break;
        }
      }
    }

    if (record.resource.type === InstanceType.DEVELOPMENT && next.type === InstanceType.PRODUCTION) {
      for (const cluster of record.clusters.values()) {
        cluster.serveNodes = Math.max(cluster.serveNodes, PROMOTED_SERVE_NODES);
      }
    }
    record.resource = next;
    this.context.logger.debug('partialUpdateInstance', {
      operation: 'partialUpdateInstance',
      instance: next.name,
      fields: valid.updateMask,
    });
    return new EmulatedOperation(operationName(next.name), this.context.operationPolls, () => ({
      done: true,
      result: copyInstance(record.resource),
    }));
  }

  async deleteInstance(request: { name: string }): Promise<void> {
    this.context.state.requireInstance(request.name);
    this.context.state.instances.delete(request.name);
    this.context.logger.debug('deleteInstance', { operation: 'deleteInstance', instance: request.name });
  }

  // ===========================================================================
  // App profiles
  // ===========================================================================

  async createAppProfile(request: CreateAppProfileRequest): Promise<AppProfileResource> {
    const valid = parseRequest(createAppProfileRequestSchema, request, 'createAppProfile');
    const record = this.context.state.requireInstance(valid.parent);
    if (!isValidIdentifier('appProfile', valid.appProfileId)) {
      throw invalidArgument(`Invalid app profile id: ${valid.appProfileId}`);
    }
    const name = `${valid.parent}/appProfiles/${valid.appProfileId}`;
    if (record.appProfiles.has(valid.appProfileId)) {
      throw AlreadyExistsError.resource('App profile', name);
    }
    this.checkRouting(record, valid.appProfile.routingPolicy);

    const profile: AppProfileResource = {
      name,
      description: valid.appProfile.description,
      routingPolicy: copyRoutingPolicy(valid.appProfile.routingPolicy),
    };
    record.appProfiles.set(valid.appProfileId, profile);
    this.context.logger.debug('createAppProfile', { operation: 'createAppProfile', appProfile: name });
    return copyAppProfile(profile);
  }

  async getAppProfile(request: { name: string }): Promise<AppProfileResource> {
    return copyAppProfile(this.context.state.requireAppProfile(request.name).profile);
  }

  async listAppProfiles(request: { parent: string }): Promise<AppProfileResource[]> {
    const record = this.context.state.requireInstance(request.parent);
    return [...record.appProfiles.keys()]
      .sort()
      .flatMap(id => {
        const profile = record.appProfiles.get(id);
        return profile === undefined ? [] : [copyAppProfile(profile)];
      });
  }

  /**
   * @throws FailedPreconditionError, unless warnings are ignored, when the
   * update switches single-cluster routing to multi-cluster routing or
   * turns transactional writes off
   */
  async updateAppProfile(request: UpdateAppProfileRequest): Promise<LongRunningOperation<AppProfileResource>> {
    const valid = parseRequest(updateAppProfileRequestSchema, request, 'updateAppProfile');
    const { record, id, profile } = this.context.state.requireAppProfile(valid.appProfile.name);
    const next = copyAppProfile(profile);
    const mask = new Set(valid.updateMask);

    if (mask.has('description')) {
      next.description = valid.appProfile.description;
    }
    if (mask.has('routingPolicy')) {
      const routing = valid.appProfile.routingPolicy;
      this.checkRouting(record, routing);
      const warning = routingChangeWarning(profile.routingPolicy, routing);
      if (warning !== undefined && valid.ignoreWarnings !== true) {
        throw new FailedPreconditionError(`${warning}; set ignoreWarnings to proceed`, {
          appProfile: profile.name,
        });
      }
      next.routingPolicy = copyRoutingPolicy(routing);
    }

    record.appProfiles.set(id, next);
    this.context.logger.debug('updateAppProfile', {
      operation: 'updateAppProfile',
      appProfile: next.name,
      fields: [...mask],
    });
    return new EmulatedOperation(operationName(next.name), this.context.operationPolls, () => ({
      done: true,
      result: copyAppProfile(next),
    }));
  }

  async deleteAppProfile(request: { name: string; ignoreWarnings?: boolean }): Promise<void> {
    const { record, id } = this.context.state.requireAppProfile(request.name);
    record.appProfiles.delete(id);
    this.context.logger.debug('deleteAppProfile', { operation: 'deleteAppProfile', appProfile: request.name });
  }

  private checkRouting(record: InstanceRecord, routing: RoutingPolicyResource): void {
    if ('singleClusterRouting' in routing && !record.clusters.has(routing.singleClusterRouting.clusterId)) {
      throw NotFoundError.resource(
        'Cluster',
        `${record.resource.name}/clusters/${routing.singleClusterRouting.clusterId}`
      );
    }
  }
}

function routingChangeWarning(current: RoutingPolicyResource, next: RoutingPolicyResource): string | undefined {
  if (!('singleClusterRouting' in current)) {
    return undefined;
  }
  if ('multiClusterRoutingUseAny' in next) {
    return 'Switching from single-cluster to multi-cluster routing';
  }
  if (current.singleClusterRouting.allowTransactionalWrites && !next.singleClusterRouting.allowTransactionalWrites) {
    return 'Turning off transactional writes';
  }
  return undefined;
}
