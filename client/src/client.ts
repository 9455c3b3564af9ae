/**
 * Entry point of the widecol client.
 *
 * @example
 * ```typescript
 * import { Client } from '@widecol/client';
 * import { Emulator } from '@widecol/emulator';
 *
 * const emulator = new Emulator();
 * const client = new Client({
 *   transport: emulator.transport(),
 *   config: { client: { projectId: 'my-project', admin: true } },
 * });
 *
 * const instance = client.instance('my-instance');
 * const table = instance.table('my-table');
 * const row = await table.readRow('row-key-1');
 * ```
 */

import {
  createConsoleLogger,
  createNoopLogger,
  ValidationError,
  type Logger,
} from '@widecol/core';
import { createConfig, type DeepPartial, type WidecolConfig } from '@widecol/config';

import { Instance, type InstanceOptions } from './instance.js';
import { Operation, mapOperation } from './operation.js';
import {
  projectName,
  type DataTransport,
  type InstanceAdminTransport,
  type LongRunningOperation,
  type TableAdminTransport,
  type Transport,
} from './transport.js';

export interface ClientOptions {
  transport: Transport;
  /** Overrides merged into the default configuration */
  config?: DeepPartial<WidecolConfig>;
  /** Defaults to a console logger when `observability.logToConsole` is set, else a no-op logger */
  logger?: Logger;
}

export interface ListInstancesResult {
  instances: Instance[];
  failedLocations: string[];
}

function defaultLogger(config: WidecolConfig): Logger {
  if (!config.observability.logToConsole) {
    return createNoopLogger();
  }
  return createConsoleLogger({
    minLevel: config.observability.logLevel,
    format: config.observability.logFormat,
  });
}

export class Client {
  readonly config: WidecolConfig;
  readonly logger: Logger;
  private readonly transport: Transport;

  constructor(options: ClientOptions) {
    this.config = createConfig(options.config);
    this.logger = options.logger ?? defaultLogger(this.config);
    this.transport = options.transport;
  }

  get projectId(): string {
    return this.config.client.projectId;
  }

  /** `projects/{projectId}` */
  get projectName(): string {
    return projectName(this.projectId);
  }

  get admin(): boolean {
    return this.config.client.admin;
  }

  get dataTransport(): DataTransport {
    return this.transport.data;
  }

  /**
   * @throws ValidationError unless the client was created with admin enabled
   */
  tableAdmin(operation: string): TableAdminTransport {
    this.requireAdmin(operation);
    return this.transport.tableAdmin;
  }

  /**
   * @throws ValidationError unless the client was created with admin enabled
   */
  instanceAdmin(operation: string): InstanceAdminTransport {
    this.requireAdmin(operation);
    return this.transport.instanceAdmin;
  }

  /**
   * Local handle on an instance; nothing is sent until a method is called.
   */
  instance(instanceId: string, options: InstanceOptions = {}): Instance {
    return new Instance(instanceId, this, options);
  }

  async listInstances(): Promise<ListInstancesResult> {
    const response = await this.instanceAdmin('listInstances').listInstances({
      parent: this.projectName,
    });
    return {
      instances: response.instances.map(resource => Instance.fromResource(resource, this)),
      failedLocations: response.failedLocations,
    };
  }

  /**
   * Wrap a server-side operation handle with this client's polling settings.
   */
  operation<T, U>(handle: LongRunningOperation<T>, map: (result: T) => U): Operation<U> {
    return new Operation(mapOperation(handle, map), {
      defaultTimeoutMs: this.config.operation.defaultTimeoutMs,
      pollIntervalMs: this.config.operation.pollIntervalMs,
      logger: this.logger,
    });
  }

  private requireAdmin(operation: string): void {
    if (!this.admin) {
      throw ValidationError.adminRequired(operation);
    }
  }
}
