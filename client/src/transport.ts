/**
 * Transport interfaces: the three services a {@link Client} talks to.
 *
 * Requests name resources by their fully qualified name:
 * - instance: `projects/{project}/instances/{instance}`
 * - table: `projects/{project}/instances/{instance}/tables/{table}`
 * - app profile: `projects/{project}/instances/{instance}/appProfiles/{profile}`
 * - cluster: `projects/{project}/instances/{instance}/clusters/{cluster}`
 *
 * Failures are reported by rejecting with a `TransportError` (or one of its
 * subclasses) carrying the status code.
 *
 * @module transport
 */

import type {
  ReadRowsResponse,
  RowFilterRequest,
  RowSetRequest,
  Status,
  TimestampRangeRequest,
} from '@widecol/core';

import type { GCRuleRequest } from './gc-rules.js';

// =============================================================================
// Data
// =============================================================================

export interface ReadRowsRequest {
  tableName: string;
  appProfileId?: string;
  /** Rows to read; all rows when absent */
  rows?: RowSetRequest;
  filter?: RowFilterRequest;
  /** Maximum rows to return; 0 or absent for no limit */
  rowsLimit?: number;
}

export interface DataCallOptions {
  signal?: AbortSignal;
}

export type MutationRequest =
  | {
      type: 'setCell';
      familyName: string;
      qualifier: Uint8Array;
      /** -1 lets the server assign the time */
      timestampMicros: number;
      value: Uint8Array;
    }
  | {
      type: 'deleteFromColumn';
      familyName: string;
      qualifier: Uint8Array;
      timeRange?: TimestampRangeRequest;
    }
  | { type: 'deleteFromFamily'; familyName: string }
  | { type: 'deleteFromRow' };

export type MutationType = MutationRequest['type'];

export interface MutateRowRequest {
  tableName: string;
  appProfileId?: string;
  rowKey: Uint8Array;
  mutations: MutationRequest[];
}

export interface MutateRowsEntry {
  rowKey: Uint8Array;
  mutations: MutationRequest[];
}

export interface MutateRowsRequest {
  tableName: string;
  appProfileId?: string;
  entries: MutateRowsEntry[];
}

export interface SampleRowKeysRequest {
  tableName: string;
  appProfileId?: string;
}

export interface SampleRowKeysResponse {
  rowKey: Uint8Array;
  /** Approximate bytes stored before `rowKey` */
  offsetBytes: number;
}

export interface DataTransport {
  readRows(request: ReadRowsRequest, options?: DataCallOptions): AsyncIterable<ReadRowsResponse>;
  mutateRow(request: MutateRowRequest): Promise<void>;
  /** One status per entry, in request order */
  mutateRows(request: MutateRowsRequest): Promise<Status[]>;
  sampleRowKeys(request: SampleRowKeysRequest): Promise<SampleRowKeysResponse[]>;
}

// =============================================================================
// Long-running operations
// =============================================================================

export type OperationState<T> =
  | { done: false }
  | { done: true; result: T }
  | { done: true; error: Status };

/**
 * Server-side handle on a long-running operation.
 */
export interface LongRunningOperation<T> {
  readonly name: string;
  poll(): Promise<OperationState<T>>;
}

// =============================================================================
// Table admin
// =============================================================================

export interface ColumnFamilyResource {
  gcRule?: GCRuleRequest;
}

export interface TableResource {
  name: string;
  columnFamilies: Record<string, ColumnFamilyResource>;
}

export type TableView = 'NAME_ONLY' | 'SCHEMA_VIEW' | 'FULL';

export interface CreateTableRequest {
  /** Instance name */
  parent: string;
  tableId: string;
  columnFamilies?: Record<string, ColumnFamilyResource>;
  /** Keys the table is split at up front */
  initialSplits?: Uint8Array[];
}

export type ColumnFamilyModification =
  | { type: 'create'; id: string; gcRule?: GCRuleRequest }
  | { type: 'update'; id: string; gcRule?: GCRuleRequest }
  | { type: 'drop'; id: string };

export interface ModifyColumnFamiliesRequest {
  name: string;
  modifications: ColumnFamilyModification[];
}

export type DropRowRangeRequest =
  | { name: string; deleteAllDataFromTable: true }
  | { name: string; rowKeyPrefix: Uint8Array };

export interface TableAdminTransport {
  createTable(request: CreateTableRequest): Promise<TableResource>;
  getTable(request: { name: string; view?: TableView }): Promise<TableResource>;
  listTables(request: { parent: string; view?: TableView }): Promise<TableResource[]>;
  deleteTable(request: { name: string }): Promise<void>;
  modifyColumnFamilies(request: ModifyColumnFamiliesRequest): Promise<TableResource>;
  dropRowRange(request: DropRowRangeRequest): Promise<void>;
}

// =============================================================================
// Instance admin
// =============================================================================

export enum InstanceType {
  UNSPECIFIED = 'TYPE_UNSPECIFIED',
  PRODUCTION = 'PRODUCTION',
  DEVELOPMENT = 'DEVELOPMENT',
}

export type InstanceState = 'STATE_NOT_KNOWN' | 'READY' | 'CREATING';

export interface InstanceResource {
  name: string;
  displayName: string;
  type: InstanceType;
  labels: Record<string, string>;
  state: InstanceState;
}

export interface ClusterResource {
  /** `projects/{project}/locations/{location}` */
  location: string;
  /** 0 for development instances */
  serveNodes: number;
}

export interface CreateInstanceRequest {
  /** Project name */
  parent: string;
  instanceId: string;
  instance: {
    displayName: string;
    type: InstanceType;
    labels: Record<string, string>;
  };
  clusters: Record<string, ClusterResource>;
}

export type InstanceUpdateField = 'displayName' | 'labels' | 'type';

export interface PartialUpdateInstanceRequest {
  instance: {
    name: string;
    displayName?: string;
    labels?: Record<string, string>;
    type?: InstanceType;
  };
  updateMask: InstanceUpdateField[];
}

export interface ListInstancesResponse {
  instances: InstanceResource[];
  /** Locations that could not be reached */
  failedLocations: string[];
}

export type RoutingPolicyResource =
  | { multiClusterRoutingUseAny: Record<string, never> }
  | { singleClusterRouting: { clusterId: string; allowTransactionalWrites: boolean } };

export interface AppProfileResource {
  name: string;
  description: string;
  routingPolicy: RoutingPolicyResource;
}

export type AppProfileUpdateField = 'description' | 'routingPolicy';

export interface CreateAppProfileRequest {
  /** Instance name */
  parent: string;
  appProfileId: string;
  appProfile: Omit<AppProfileResource, 'name'>;
  ignoreWarnings?: boolean;
}

export interface UpdateAppProfileRequest {
  appProfile: AppProfileResource;
  updateMask: AppProfileUpdateField[];
  ignoreWarnings?: boolean;
}

export interface InstanceAdminTransport {
  createInstance(request: CreateInstanceRequest): Promise<LongRunningOperation<InstanceResource>>;
  getInstance(request: { name: string }): Promise<InstanceResource>;
  listInstances(request: { parent: string }): Promise<ListInstancesResponse>;
  partialUpdateInstance(request: PartialUpdateInstanceRequest): Promise<LongRunningOperation<InstanceResource>>;
  deleteInstance(request: { name: string }): Promise<void>;
  createAppProfile(request: CreateAppProfileRequest): Promise<AppProfileResource>;
  getAppProfile(request: { name: string }): Promise<AppProfileResource>;
  listAppProfiles(request: { parent: string }): Promise<AppProfileResource[]>;
  updateAppProfile(request: UpdateAppProfileRequest): Promise<LongRunningOperation<AppProfileResource>>;
  deleteAppProfile(request: { name: string; ignoreWarnings?: boolean }): Promise<void>;
}

/**
 * Everything a {@link Client} needs.
 */
export interface Transport {
  data: DataTransport;
  tableAdmin: TableAdminTransport;
  instanceAdmin: InstanceAdminTransport;
}

// =============================================================================
// Names
// =============================================================================

export function projectName(projectId: string): string {
  return `projects/${projectId}`;
}

export function instanceName(projectId: string, instanceId: string): string {
  return `${projectName(projectId)}/instances/${instanceId}`;
}

export function tableName(instance: string, tableId: string): string {
  return `${instance}/tables/${tableId}`;
}

export function appProfileName(instance: string, appProfileId: string): string {
  return `${instance}/appProfiles/${appProfileId}`;
}

export function locationName(projectId: string, locationId: string): string {
  return `${projectName(projectId)}/locations/${locationId}`;
}

/**
 * Last path segment of a resource name.
 */
export function resourceId(name: string): string {
  return name.slice(name.lastIndexOf('/') + 1);
}
