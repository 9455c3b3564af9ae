/**
 * App profiles: how an application's requests are routed to clusters.
 */

import { NotFoundError, ValidationError, validateAppProfileId } from '@widecol/core';

import type { Instance } from './instance.js';
import type { Operation } from './operation.js';
import {
  appProfileName,
  resourceId,
  type AppProfileResource,
  type InstanceAdminTransport,
  type RoutingPolicyResource,
} from './transport.js';

export type RoutingPolicy =
  | { type: 'multiClusterRoutingUseAny' }
  | { type: 'singleClusterRouting'; clusterId: string; allowTransactionalWrites: boolean };

export interface AppProfileOptions {
  routingPolicy?: RoutingPolicy;
  description?: string;
}

export interface AppProfileWriteOptions {
  /**
   * Proceed despite server warnings, e.g. when switching a single-cluster
   * profile to multi-cluster routing or turning transactional writes off.
   */
  ignoreWarnings?: boolean;
}

/**
 * Single-cluster routing to `clusterId`; transactional writes are off unless asked for.
 */
export function singleClusterRouting(clusterId: string, allowTransactionalWrites = false): RoutingPolicy {
  return { type: 'singleClusterRouting', clusterId, allowTransactionalWrites };
}

export function multiClusterRouting(): RoutingPolicy {
  return { type: 'multiClusterRoutingUseAny' };
}

export function routingPolicyToResource(policy: RoutingPolicy): RoutingPolicyResource {
  switch (policy.type) {
    case 'multiClusterRoutingUseAny':
      return { multiClusterRoutingUseAny: {} };
    case 'singleClusterRouting':
      return {
        singleClusterRouting: {
          clusterId: policy.clusterId,
          allowTransactionalWrites: policy.allowTransactionalWrites,
        },
      };
  }
}

export function routingPolicyFromResource(resource: RoutingPolicyResource): RoutingPolicy {
  if ('singleClusterRouting' in resource) {
    return singleClusterRouting(
      resource.singleClusterRouting.clusterId,
      resource.singleClusterRouting.allowTransactionalWrites
    );
  }
  return multiClusterRouting();
}

function routingPoliciesEqual(a: RoutingPolicy | undefined, b: RoutingPolicy | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  if (a.type === 'multiClusterRoutingUseAny') {
    return b.type === 'multiClusterRoutingUseAny';
  }
  return (
    b.type === 'singleClusterRouting' &&
    a.clusterId === b.clusterId &&
    a.allowTransactionalWrites === b.allowTransactionalWrites
  );
}

/**
 * @example
 * ```typescript
 * const profile = await instance.createAppProfile('batch', {
 *   routingPolicy: singleClusterRouting('my-instance-cluster'),
 *   description: 'Batch jobs',
 * }, { ignoreWarnings: true });
 * ```
 */
export class AppProfile {
  readonly appProfileId: string;
  readonly name: string;
  readonly instance: Instance;
  routingPolicy: RoutingPolicy | undefined;
  description: string;

  constructor(appProfileId: string, instance: Instance, options: AppProfileOptions = {}) {
    this.appProfileId = validateAppProfileId(appProfileId);
    this.instance = instance;
    this.name = appProfileName(instance.name, appProfileId);
    this.routingPolicy = options.routingPolicy;
    this.description = options.description ?? '';
  }

  static fromResource(resource: AppProfileResource, instance: Instance): AppProfile {
    const profile = new AppProfile(resourceId(resource.name), instance);
    profile.applyResource(resource);
    return profile;
  }

  async create(options: AppProfileWriteOptions = {}): Promise<this> {
    const resource = await this.admin('createAppProfile').createAppProfile({
      parent: this.instance.name,
      appProfileId: this.appProfileId,
      appProfile: this.toResource('createAppProfile'),
      ignoreWarnings: options.ignoreWarnings ?? false,
    });
    this.applyResource(resource);
    this.instance.client.logger.info('Created app profile', {
      operation: 'createAppProfile',
      appProfile: this.name,
    });
    return this;
  }

  async reload(): Promise<this> {
    const resource = await this.admin('getAppProfile').getAppProfile({ name: this.name });
    this.applyResource(resource);
    return this;
  }

  async exists(): Promise<boolean> {
    try {
      await this.admin('getAppProfile').getAppProfile({ name: this.name });
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Send the local description and routing policy.
   */
  async update(options: AppProfileWriteOptions = {}): Promise<Operation<AppProfile>> {
    const handle = await this.admin('updateAppProfile').updateAppProfile({
      appProfile: { name: this.name, ...this.toResource('updateAppProfile') },
      updateMask: ['description', 'routingPolicy'],
      ignoreWarnings: options.ignoreWarnings ?? false,
    });
    return this.instance.client.operation<AppProfileResource, AppProfile>(handle, (resource) => {
      this.applyResource(resource);
      return this;
    });
  }

  async delete(options: AppProfileWriteOptions = {}): Promise<void> {
    await this.admin('deleteAppProfile').deleteAppProfile({
      name: this.name,
      ignoreWarnings: options.ignoreWarnings ?? false,
    });
  }

  /**
   * Same name, description and routing policy.
   */
  equals(other: AppProfile): boolean {
    return (
      other.name === this.name &&
      other.description === this.description &&
      routingPoliciesEqual(this.routingPolicy, other.routingPolicy)
    );
  }

  private admin(operation: string): InstanceAdminTransport {
    return this.instance.client.instanceAdmin(operation);
  }

  private toResource(operation: string): Omit<AppProfileResource, 'name'> {
    if (this.routingPolicy === undefined) {
      throw new ValidationError(`App profile ${this.name} needs a routing policy`, undefined, { operation });
    }
    return {
      description: this.description,
      routingPolicy: routingPolicyToResource(this.routingPolicy),
    };
  }

  private applyResource(resource: AppProfileResource): void {
    this.description = resource.description;
    this.routingPolicy = routingPolicyFromResource(resource.routingPolicy);
  }
}
