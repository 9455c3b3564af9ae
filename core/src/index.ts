// @widecol/core
// Row-data model for wide-column tables: cells, row sets, filters and
// read-stream row assembly

// =============================================================================
// Bytes and Timestamps
// =============================================================================

export {
  EMPTY_BYTES,
  ByteKeyMap,
  toBytes,
  copyBytes,
  compareBytes,
  bytesEqual,
  concatBytes,
  hasPrefix,
  prefixSuccessor,
  bytesToKey,
  keyToBytes,
  describeBytes,
  decodeUtf8,
  encodeInt64,
  decodeInt64,
  type BytesLike,
  type ReadonlyByteKeyMap,
} from './bytes.js';

export {
  MICROS_PER_MILLI,
  SERVER_ASSIGNED_TIMESTAMP,
  assertValidMicros,
  microsFromDate,
  dateFromMicros,
  truncateToMillis,
  ceilToMillis,
  toMicros,
} from './timestamps.js';

// =============================================================================
// Row Data Model
// =============================================================================

export { Cell, cellListsEqual, insertByTimestampDesc } from './cell.js';

export { chunkHasData, isValueFragment, type CellChunk, type ReadRowsResponse } from './chunks.js';

export {
  Row,
  PartialRowData,
  type RowCells,
  type RowCellsInit,
  type PartialRowState,
  type ApplyChunkResult,
} from './row-data.js';

export {
  RowsReader,
  type RowsReaderState,
  type RowsReaderStats,
  type RowsReaderOptions,
} from './rows-reader.js';

export { RowRange, RowSet, type RowRangeRequest, type RowSetRequest } from './row-set.js';

export {
  RowFilters,
  timestampRange,
  filtersEqual,
  validateFilter,
  compileFilterRegex,
  filterToRequest,
  timestampRangeToRequest,
  filterFromRequest,
  type TimestampRange,
  type RowFilter,
  type RowFilterType,
  type PassAllFilter,
  type BlockAllFilter,
  type RowKeyRegexFilter,
  type FamilyNameRegexFilter,
  type ColumnQualifierRegexFilter,
  type ValueRegexFilter,
  type ColumnRangeFilter,
  type ValueRangeFilter,
  type TimestampRangeFilter,
  type CellsRowOffsetFilter,
  type CellsRowLimitFilter,
  type CellsColumnLimitFilter,
  type StripValueFilter,
  type ApplyLabelFilter,
  type ChainFilter,
  type UnionFilter,
  type ConditionFilter,
  type RangeBoundsOptions,
  type ColumnRangeOptions,
  type ValueRangeOptions,
  type RowFilterRequest,
  type ColumnRangeRequest,
  type ValueRangeRequest,
  type TimestampRangeRequest,
  type FilterListRequest,
  type ConditionRequest,
} from './row-filters.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  StatusCode,
  isErrorCode,
  WidecolError,
  ValidationError,
  MalformedChunkSequenceError,
  TransportError,
  NotFoundError,
  AlreadyExistsError,
  FailedPreconditionError,
  TimeoutError,
  RetryError,
  StreamingCancelledError,
  statusToError,
  type Status,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  isLogLevel,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// =============================================================================
// Retry
// =============================================================================

export {
  DEFAULT_RETRY_OPTIONS,
  isRetryableError,
  calculateDelay,
  resolveRetryOptions,
  sleep,
  withRetry,
  type RetryOptions,
  type ResolvedRetryOptions,
} from './retry.js';

// =============================================================================
// Validation
// =============================================================================

export {
  isValidIdentifier,
  assertValidIdentifier,
  validateInstanceId,
  validateTableId,
  validateFamilyId,
  validateAppProfileId,
  SchemaValidationError,
  formatIssues,
  validate,
  safeValidate,
  createTypeGuard,
  type IdentifierKind,
  type ZodErrorLike,
  type ZodSchemaLike,
  type SafeValidateResult,
} from './validation.js';
