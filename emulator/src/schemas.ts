/**
 * Request schemas checked by every emulated RPC.
 *
 * Filter and GC rule nodes are strict objects, so a node carrying more than
 * one key is rejected rather than silently narrowed to its first match.
 *
 * @module schemas
 */

import { z } from 'zod';

import {
  safeValidate,
  formatIssues,
  StatusCode,
  TransportError,
  type ColumnRangeRequest,
  type RowFilterRequest,
  type RowRangeRequest,
  type RowSetRequest,
  type TimestampRangeRequest,
  type ValueRangeRequest,
  type ZodSchemaLike,
} from '@widecol/core';
import {
  InstanceType,
  type ColumnFamilyModification,
  type CreateAppProfileRequest,
  type CreateInstanceRequest,
  type CreateTableRequest,
  type DropRowRangeRequest,
  type GCRuleRequest,
  type ModifyColumnFamiliesRequest,
  type MutateRowRequest,
  type MutateRowsRequest,
  type MutationRequest,
  type PartialUpdateInstanceRequest,
  type ReadRowsRequest,
  type RoutingPolicyResource,
  type UpdateAppProfileRequest,
} from '@widecol/client';

const bytes = z.instanceof(Uint8Array);
const micros = z.number().int();
const count = z.number().int().nonnegative();
const name = z.string().min(1);

// =============================================================================
// Row sets and filters
// =============================================================================

const rowRangeSchema: z.ZodType<RowRangeRequest> = z
  .object({
    startKeyClosed: bytes.optional(),
    startKeyOpen: bytes.optional(),
    endKeyOpen: bytes.optional(),
    endKeyClosed: bytes.optional(),
  })
  .refine(range => !(range.startKeyClosed !== undefined && range.startKeyOpen !== undefined), {
    message: 'a range has at most one start key',
  })
  .refine(range => !(range.endKeyClosed !== undefined && range.endKeyOpen !== undefined), {
    message: 'a range has at most one end key',
  });

const rowSetSchema: z.ZodType<RowSetRequest> = z.object({
  rowKeys: z.array(bytes),
  rowRanges: z.array(rowRangeSchema),
});

const columnRangeSchema: z.ZodType<ColumnRangeRequest> = z.object({
  familyName: name,
  startQualifierClosed: bytes.optional(),
  startQualifierOpen: bytes.optional(),
  endQualifierClosed: bytes.optional(),
  endQualifierOpen: bytes.optional(),
});

const valueRangeSchema: z.ZodType<ValueRangeRequest> = z.object({
  startValueClosed: bytes.optional(),
  startValueOpen: bytes.optional(),
  endValueClosed: bytes.optional(),
  endValueOpen: bytes.optional(),
});

const timestampRangeSchema: z.ZodType<TimestampRangeRequest> = z.object({
  startTimestampMicros: micros.optional(),
  endTimestampMicros: micros.optional(),
});

export const rowFilterSchema: z.ZodType<RowFilterRequest> = z.lazy(() =>
  z.union([
    z.object({ passAllFilter: z.literal(true) }).strict(),
    z.object({ blockAllFilter: z.literal(true) }).strict(),
    z.object({ rowKeyRegexFilter: bytes }).strict(),
    z.object({ familyNameRegexFilter: z.string() }).strict(),
    z.object({ columnQualifierRegexFilter: bytes }).strict(),
    z.object({ valueRegexFilter: bytes }).strict(),
    z.object({ columnRangeFilter: columnRangeSchema }).strict(),
    z.object({ valueRangeFilter: valueRangeSchema }).strict(),
    z.object({ timestampRangeFilter: timestampRangeSchema }).strict(),
    z.object({ cellsPerRowOffsetFilter: count }).strict(),
    z.object({ cellsPerRowLimitFilter: count }).strict(),
    z.object({ cellsPerColumnLimitFilter: count }).strict(),
    z.object({ stripValueTransformer: z.literal(true) }).strict(),
    z.object({ applyLabelTransformer: z.string() }).strict(),
    z.object({ chain: z.object({ filters: z.array(rowFilterSchema) }) }).strict(),
    z.object({ interleave: z.object({ filters: z.array(rowFilterSchema) }) }).strict(),
    z
      .object({
        condition: z.object({
          predicateFilter: rowFilterSchema,
          trueFilter: rowFilterSchema.optional(),
          falseFilter: rowFilterSchema.optional(),
        }),
      })
      .strict(),
  ])
);

// =============================================================================
// Data
// =============================================================================

export const readRowsRequestSchema: z.ZodType<ReadRowsRequest> = z.object({
  tableName: name,
  appProfileId: z.string().optional(),
  rows: rowSetSchema.optional(),
  filter: rowFilterSchema.optional(),
  rowsLimit: count.optional(),
});

const mutationSchema: z.ZodType<MutationRequest> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('setCell'),
    familyName: name,
    qualifier: bytes,
    timestampMicros: micros.min(-1),
    value: bytes,
  }),
  z.object({
    type: z.literal('deleteFromColumn'),
    familyName: name,
    qualifier: bytes,
    timeRange: timestampRangeSchema.optional(),
  }),
  z.object({ type: z.literal('deleteFromFamily'), familyName: name }),
  z.object({ type: z.literal('deleteFromRow') }),
]);

export const mutateRowRequestSchema: z.ZodType<MutateRowRequest> = z.object({
  tableName: name,
  appProfileId: z.string().optional(),
  rowKey: bytes.refine(key => key.length > 0, { message: 'row key must not be empty' }),
  mutations: z.array(mutationSchema).min(1),
});

export const mutateRowsRequestSchema: z.ZodType<MutateRowsRequest> = z.object({
  tableName: name,
  appProfileId: z.string().optional(),
  entries: z
    .array(
      z.object({
        rowKey: bytes,
        mutations: z.array(mutationSchema),
      })
    )
    .min(1),
});

// =============================================================================
// Table admin
// =============================================================================

export const gcRuleSchema: z.ZodType<GCRuleRequest> = z.lazy(() =>
  z.union([
    z.object({ maxNumVersions: z.number().int().positive() }).strict(),
    z.object({ maxAgeMs: count }).strict(),
    z.object({ union: z.object({ rules: z.array(gcRuleSchema) }) }).strict(),
    z.object({ intersection: z.object({ rules: z.array(gcRuleSchema) }) }).strict(),
  ])
);

const columnFamilySchema = z.object({ gcRule: gcRuleSchema.optional() });

export const createTableRequestSchema: z.ZodType<CreateTableRequest> = z.object({
  parent: name,
  tableId: name,
  columnFamilies: z.record(columnFamilySchema).optional(),
  initialSplits: z.array(bytes).optional(),
});

const modificationSchema: z.ZodType<ColumnFamilyModification> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('create'), id: name, gcRule: gcRuleSchema.optional() }),
  z.object({ type: z.literal('update'), id: name, gcRule: gcRuleSchema.optional() }),
  z.object({ type: z.literal('drop'), id: name }),
]);

export const modifyColumnFamiliesRequestSchema: z.ZodType<ModifyColumnFamiliesRequest> = z.object({
  name,
  modifications: z.array(modificationSchema).min(1),
});

export const dropRowRangeRequestSchema: z.ZodType<DropRowRangeRequest> = z.union([
  z.object({ name, deleteAllDataFromTable: z.literal(true) }).strict(),
  z
    .object({
      name,
      rowKeyPrefix: bytes.refine(prefix => prefix.length > 0, { message: 'prefix must not be empty' }),
    })
    .strict(),
]);

// =============================================================================
// Instance admin
// =============================================================================

const labelsSchema = z.record(z.string());

export const createInstanceRequestSchema: z.ZodType<CreateInstanceRequest> = z.object({
  parent: name,
  instanceId: name,
  instance: z.object({
    displayName: name,
    type: z.nativeEnum(InstanceType),
    labels: labelsSchema,
  }),
  clusters: z
    .record(
      z.object({
        location: name,
        serveNodes: count,
      })
    )
    .refine(clusters => Object.keys(clusters).length > 0, { message: 'at least one cluster is required' }),
});

export const partialUpdateInstanceRequestSchema: z.ZodType<PartialUpdateInstanceRequest> = z.object({
  instance: z.object({
    name,
    displayName: name.optional(),
    labels: labelsSchema.optional(),
    type: z.nativeEnum(InstanceType).optional(),
  }),
  updateMask: z.array(z.enum(['displayName', 'labels', 'type'])).min(1),
});

const routingPolicySchema: z.ZodType<RoutingPolicyResource> = z.union([
  z.object({ multiClusterRoutingUseAny: z.record(z.never()) }).strict(),
  z
    .object({
      singleClusterRouting: z.object({
        clusterId: name,
        allowTransactionalWrites: z.boolean(),
      }),
    })
    .strict(),
]);

export const createAppProfileRequestSchema: z.ZodType<CreateAppProfileRequest> = z.object({
  parent: name,
  appProfileId: name,
  appProfile: z.object({
    description: z.string(),
    routingPolicy: routingPolicySchema,
  }),
  ignoreWarnings: z.boolean().optional(),
});

export const updateAppProfileRequestSchema: z.ZodType<UpdateAppProfileRequest> = z.object({
  appProfile: z.object({
    name,
    description: z.string(),
    routingPolicy: routingPolicySchema,
  }),
  updateMask: z.array(z.enum(['description', 'routingPolicy'])).min(1),
  ignoreWarnings: z.boolean().optional(),
});

/**
 * The request narrowed by `schema`, or an INVALID_ARGUMENT TransportError
 * listing every issue.
 */
export function parseRequest<T>(schema: ZodSchemaLike<T>, request: unknown, method: string): T {
  const result = safeValidate(request, schema);
  if (!result.success) {
    throw new TransportError(
      `Invalid ${method} request: ${formatIssues(result.error)}`,
      StatusCode.INVALID_ARGUMENT,
      { method, issues: result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) }
    );
  }
  return result.data;
}
