// @widecol/client
// Client for wide-column store instances: admin, mutations and read streams

// =============================================================================
// Client, Instances, App Profiles
// =============================================================================

export { Client, type ClientOptions, type ListInstancesResult } from './client.js';

export {
  Instance,
  DEFAULT_SERVE_NODES,
  type InstanceOptions,
  type CreateInstanceOptions,
} from './instance.js';

export {
  AppProfile,
  singleClusterRouting,
  multiClusterRouting,
  routingPolicyToResource,
  routingPolicyFromResource,
  type RoutingPolicy,
  type AppProfileOptions,
  type AppProfileWriteOptions,
} from './app-profile.js';

export {
  Operation,
  mapOperation,
  type OperationOptions,
  type OperationResultOptions,
} from './operation.js';

// =============================================================================
// Tables and Column Families
// =============================================================================

export {
  Table,
  type TableOptions,
  type CreateTableOptions,
  type ReadRowsOptions,
  type ReadRowOptions,
  type DropRowsOptions,
} from './table.js';

export { ColumnFamily } from './column-family.js';

export {
  MaxVersionsGCRule,
  MaxAgeGCRule,
  GCRuleUnion,
  GCRuleIntersection,
  gcRulesEqual,
  gcRuleToRequest,
  gcRuleFromRequest,
  type GCRule,
  type GCRuleRequest,
} from './gc-rules.js';

// =============================================================================
// Rows and Read Streams
// =============================================================================

export {
  DirectRow,
  ALL_COLUMNS,
  type CellValue,
  type SetCellOptions,
  type DeleteCellsOptions,
} from './row.js';

export {
  ReadProgress,
  rowSetAfter,
  resumeRequest,
  createResumableReadStream,
  type ResumableReadOptions,
} from './read-rows.js';

export { withTimeout } from './timeout.js';

// =============================================================================
// Transport
// =============================================================================

export {
  InstanceType,
  projectName,
  instanceName,
  tableName,
  appProfileName,
  locationName,
  resourceId,
  type Transport,
  type DataTransport,
  type TableAdminTransport,
  type InstanceAdminTransport,
  type DataCallOptions,
  type ReadRowsRequest,
  type MutationRequest,
  type MutationType,
  type MutateRowRequest,
  type MutateRowsEntry,
  type MutateRowsRequest,
  type SampleRowKeysRequest,
  type SampleRowKeysResponse,
  type OperationState,
  type LongRunningOperation,
  type ColumnFamilyResource,
  type TableResource,
  type TableView,
  type CreateTableRequest,
  type ColumnFamilyModification,
  type ModifyColumnFamiliesRequest,
  type DropRowRangeRequest,
  type InstanceState,
  type InstanceResource,
  type ClusterResource,
  type CreateInstanceRequest,
  type InstanceUpdateField,
  type PartialUpdateInstanceRequest,
  type ListInstancesResponse,
  type RoutingPolicyResource,
  type AppProfileResource,
  type AppProfileUpdateField,
  type CreateAppProfileRequest,
  type UpdateAppProfileRequest,
} from './transport.js';
