import type { DeepPartial, WidecolConfig } from '@widecol/config';
import { Emulator } from '@widecol/emulator';
import { createScriptedDataTransport, type ScriptedDataTransport } from '@widecol/test-utils';

import { Client } from '../client.js';
import type { Table } from '../table.js';

export const PROJECT = 'test-project';
export const INSTANCE_NAME = `projects/${PROJECT}/instances/test-instance`;
export const TABLE_NAME = `${INSTANCE_NAME}/tables/test-table`;

export interface ScriptedClient {
  client: Client;
  data: ScriptedDataTransport;
  table: Table;
}

/**
 * Client whose data calls go to a scripted transport; admin calls reach an
 * emulator. Read retries back off for 0ms.
 */
export function createScriptedClient(overrides: DeepPartial<WidecolConfig> = {}): ScriptedClient {
  const data = createScriptedDataTransport();
  const client = new Client({
    transport: { ...new Emulator().transport(), data },
    config: {
      ...overrides,
      client: { projectId: PROJECT, admin: true, ...overrides.client },
      read: {
        initialRetryDelayMs: 0,
        maxRetryDelayMs: 0,
        retryJitter: false,
        ...overrides.read,
      },
    },
  });
  return { client, data, table: client.instance('test-instance').table('test-table') };
}
