/**
 * @widecol/e2e - Instance Admin System Test
 *
 * Instance lifecycle and app profile routing through the public client API:
 * 1. Lists and reloads the suite's instance
 * 2. Creates instances with default and explicit types
 * 3. Updates display name, labels and type
 * 4. Creates and re-routes app profiles
 */

import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import { FailedPreconditionError } from '@widecol/core';
import {
  InstanceType,
  multiClusterRouting,
  singleClusterRouting,
  type Client,
  type Instance,
} from '@widecol/client';
import { uniqueResourceId } from '@widecol/test-utils';

import { createSystemEnv, LABELS, LOCATION_ID } from './fixtures.js';

describe('Instance admin API', () => {
  let client: Client;
  let instance: Instance;
  let clusterId: string;
  let instancesToDelete: Instance[] = [];

  beforeAll(async () => {
    ({ client, instance } = await createSystemEnv());
    clusterId = `${instance.instanceId}-cluster`;
  });

  afterEach(async () => {
    for (const created of instancesToDelete) {
      await created.delete();
    }
    instancesToDelete = [];
  });

  it('lists the suite instance', async () => {
    const { instances, failedLocations } = await client.listInstances();

    expect(failedLocations).toEqual([]);
    expect(instances.map(found => found.name)).toContain(instance.name);
  });

  it('reloads metadata into a fresh handle', async () => {
    const fresh = client.instance(instance.instanceId);
    fresh.displayName = '';

    await fresh.reload();

    expect(fresh.displayName).toBe(instance.displayName);
    expect(fresh.labels).toEqual(LABELS);
    expect(fresh.type).toBe(InstanceType.PRODUCTION);
  });

  it('creates a PRODUCTION instance when no type is given', async () => {
    const instanceId = `ndef${uniqueResourceId('-')}`;
    const created = client.instance(instanceId);
    const operation = await created.create({ locationId: LOCATION_ID });
    instancesToDelete.push(created);
    await operation.result({ timeoutMs: 10_000 });

    const alt = await client.instance(instanceId).reload();

    expect(created.equals(alt)).toBe(true);
    expect(alt.displayName).toBe(instanceId);
    expect(alt.type).toBe(InstanceType.PRODUCTION);
    expect(alt.labels).toEqual({});
  });

  it('creates a DEVELOPMENT instance with labels', async () => {
    const instanceId = `new${uniqueResourceId('-')}`;
    const created = client.instance(instanceId, { type: InstanceType.DEVELOPMENT, labels: { ...LABELS } });
    const operation = await created.create({ locationId: LOCATION_ID });
    instancesToDelete.push(created);
    await operation.result({ timeoutMs: 10_000 });

    const alt = await client.instance(instanceId).reload();

    expect(created.equals(alt)).toBe(true);
    expect(alt.displayName).toBe(created.displayName);
    expect(alt.type).toBe(InstanceType.DEVELOPMENT);
    expect(alt.labels).toEqual(LABELS);
  });

  it('updates display name and labels', async () => {
    const oldDisplayName = instance.displayName;
    instance.displayName = 'Foo Bar Baz';
    instance.labels = { foo_bar: 'foo_bar' };
    await (await instance.update()).result({ timeoutMs: 10_000 });

    const alt = client.instance(instance.instanceId, { labels: { ...LABELS } });
    expect(alt.displayName).toBe(instance.instanceId);
    expect(alt.labels).toEqual(LABELS);
    await alt.reload();
    expect(alt.displayName).toBe('Foo Bar Baz');
    expect(alt.labels).toEqual({ foo_bar: 'foo_bar' });

    instance.displayName = oldDisplayName;
    instance.labels = { ...LABELS };
    await (await instance.update()).result({ timeoutMs: 10_000 });
    expect((await client.instance(instance.instanceId).reload()).labels).toEqual(LABELS);
  });

  it('promotes a DEVELOPMENT instance to PRODUCTION', async () => {
    const instanceId = `new${uniqueResourceId('-')}`;
    const created = client.instance(instanceId, { type: InstanceType.DEVELOPMENT });
    await (await created.create({ locationId: LOCATION_ID })).result({ timeoutMs: 10_000 });
    instancesToDelete.push(created);

    created.type = InstanceType.PRODUCTION;
    await (await created.update()).result({ timeoutMs: 10_000 });

    const alt = client.instance(instanceId);
    expect(alt.type).toBeUndefined();
    await alt.reload();
    expect(alt.type).toBe(InstanceType.PRODUCTION);
  });

  describe('app profiles', () => {
    it('moves a multi-cluster profile to single-cluster routing', async () => {
      const appProfileId = 'app_profile_id_1';
      const created = await instance.createAppProfile(
        appProfileId,
        { routingPolicy: multiClusterRouting(), description: 'Foo App Profile' },
        { ignoreWarnings: true }
      );

      expect(created.equals(await instance.getAppProfile(appProfileId))).toBe(true);

      const operation = await instance.updateAppProfile(appProfileId, {
        routingPolicy: singleClusterRouting(clusterId, false),
        description: 'To single routing policy',
      });
      await operation.result({ timeoutMs: 10_000 });

      const alt = await instance.getAppProfile(appProfileId);
      expect(alt.description).toBe('To single routing policy');
      expect(alt.routingPolicy).toEqual({ type: 'singleClusterRouting', clusterId, allowTransactionalWrites: false });

      await instance.deleteAppProfile(appProfileId, { ignoreWarnings: true });
      expect(await instance.appProfile(appProfileId).exists()).toBe(false);
    });

    it('turns on transactional writes, then moves to multi-cluster routing', async () => {
      const appProfileId = 'app_profile_id_2';
      const created = await instance.createAppProfile(appProfileId, {
        routingPolicy: singleClusterRouting(clusterId),
        description: 'Foo App Profile',
      });
      expect(created.equals(await instance.getAppProfile(appProfileId))).toBe(true);

      await (
        await instance.updateAppProfile(appProfileId, {
          routingPolicy: singleClusterRouting(clusterId, true),
          description: 'Allow transactional writes',
        })
      ).result({ timeoutMs: 10_000 });

      let alt = await instance.getAppProfile(appProfileId);
      expect(alt.description).toBe('Allow transactional writes');
      expect(alt.routingPolicy).toEqual({ type: 'singleClusterRouting', clusterId, allowTransactionalWrites: true });

      const toMulti = { routingPolicy: multiClusterRouting(), description: 'To multi cluster routing' };
      await expect(instance.updateAppProfile(appProfileId, toMulti)).rejects.toThrow(FailedPreconditionError);
      await (await instance.updateAppProfile(appProfileId, toMulti, { ignoreWarnings: true })).result({
        timeoutMs: 10_000,
      });

      alt = await instance.getAppProfile(appProfileId);
      expect(alt.description).toBe('To multi cluster routing');
      expect(alt.routingPolicy).toEqual({ type: 'multiClusterRoutingUseAny' });
    });
  });
});
