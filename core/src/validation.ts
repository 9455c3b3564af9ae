/**
 * @widecol/core - Input validation
 *
 * Two families of helpers live here:
 * - Identifier checks for instance, cluster, table, column family and app
 *   profile ids, throwing {@link ValidationError} with the expected pattern.
 * - Schema validation over any Zod-compatible schema ({@link ZodSchemaLike});
 *   the emulator passes its zod request schemas in.
 *
 * @module validation
 */

import { ErrorCode, ValidationError } from './errors.js';
import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Identifiers
// =============================================================================

const IdentifierPatterns = Object.freeze({
  instance: /^[a-z][-a-z0-9]{5,32}$/,
  cluster: /^[a-z][-a-z0-9]{5,49}$/,
  table: /^[_a-zA-Z0-9][-_.a-zA-Z0-9]{0,49}$/,
  family: /^[_a-zA-Z0-9][-_.a-zA-Z0-9]{0,63}$/,
  appProfile: /^[_a-zA-Z0-9][-_.a-zA-Z0-9]{0,49}$/,
  label: /^[a-z0-9-]{1,15}$/,
});

export type IdentifierKind = keyof typeof IdentifierPatterns;

/**
 * True when `value` is a well-formed identifier of the given kind.
 */
export function isValidIdentifier(kind: IdentifierKind, value: string): boolean {
  return IdentifierPatterns[kind].test(value);
}

/**
 * Throw a ValidationError unless `value` is a well-formed identifier.
 *
 * @example
 * ```typescript
 * assertValidIdentifier('table', 'test-data-api');   // ok
 * assertValidIdentifier('instance', 'Bad Instance');  // throws INVALID_IDENTIFIER
 * ```
 */
export function assertValidIdentifier(kind: IdentifierKind, value: string): void {
  const pattern = IdentifierPatterns[kind];
  if (!pattern.test(value)) {
    throw ValidationError.invalidIdentifier(kind, value, pattern.source);
  }
}

export function validateInstanceId(instanceId: string): string {
  assertValidIdentifier('instance', instanceId);
  return instanceId;
}

export function validateTableId(tableId: string): string {
  assertValidIdentifier('table', tableId);
  return tableId;
}

export function validateFamilyId(familyId: string): string {
  assertValidIdentifier('family', familyId);
  return familyId;
}

export function validateAppProfileId(appProfileId: string): string {
  assertValidIdentifier('appProfile', appProfileId);
  return appProfileId;
}

// =============================================================================
// Schema validation
// =============================================================================

/**
 * Shape of a Zod error, without importing zod.
 */
export interface ZodErrorLike {
  issues: Array<{
    code: string;
    path: (string | number)[];
    message: string;
  }>;
  message: string;
}

/**
 * Anything with Zod's `safeParse` / `parse` contract.
 */
export interface ZodSchemaLike<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: ZodErrorLike };
  parse(data: unknown): T;
}

export type SafeValidateResult<T> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: ZodErrorLike };

/**
 * Error thrown when a value does not match its schema.
 */
export class SchemaValidationError extends ValidationError {
  public readonly zodError: ZodErrorLike;

  constructor(message: string, zodError: ZodErrorLike) {
    super(
      message,
      ErrorCode.SCHEMA_VALIDATION_ERROR,
      { issues: zodError.issues.map(i => ({ path: i.path, message: i.message })) }
    );
    this.name = 'SchemaValidationError';
    this.zodError = zodError;
    captureStackTrace(this, SchemaValidationError);
  }
}

/**
 * One line per issue, `path: message`.
 */
export function formatIssues(error: ZodErrorLike): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join(', ');
}

/**
 * Validate `value` against `schema` and return the narrowed value.
 *
 * @param what - Name of the validated thing, used in the error message
 * @throws {SchemaValidationError} when validation fails
 */
export function validate<T>(value: unknown, schema: ZodSchemaLike<T>, what = 'value'): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SchemaValidationError(`Invalid ${what}: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Non-throwing form of {@link validate}.
 */
export function safeValidate<T>(value: unknown, schema: ZodSchemaLike<T>): SafeValidateResult<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, data: result.data };
}

/**
 * Build a type guard from a schema.
 */
export function createTypeGuard<T>(schema: ZodSchemaLike<T>): (value: unknown) => value is T {
  return (value: unknown): value is T => schema.safeParse(value).success;
}
