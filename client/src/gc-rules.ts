/**
 * Garbage-collection rules for column families.
 *
 * A rule decides which cells of a column the server may delete. Rules
 * combine: a union deletes a cell when ANY of its rules would, an
 * intersection only when ALL of them would.
 *
 * @example
 * ```typescript
 * // keep at most 2 versions, and nothing older than a week
 * const rule = new GCRuleUnion([new MaxVersionsGCRule(2), new MaxAgeGCRule(7 * 24 * 3600 * 1000)]);
 * await table.columnFamily('cf1', rule).create();
 * ```
 */

import { ValidationError } from '@widecol/core';

/**
 * Wire encoding of a GC rule: exactly one key per node.
 */
export type GCRuleRequest =
  | { maxNumVersions: number }
  | { maxAgeMs: number }
  | { union: { rules: GCRuleRequest[] } }
  | { intersection: { rules: GCRuleRequest[] } };

export type GCRule = MaxVersionsGCRule | MaxAgeGCRule | GCRuleUnion | GCRuleIntersection;

export class MaxVersionsGCRule {
  readonly type = 'maxVersions';

  constructor(readonly maxNumVersions: number) {
    if (!Number.isSafeInteger(maxNumVersions) || maxNumVersions < 1) {
      throw new ValidationError(`Max versions must be a positive integer, got ${maxNumVersions}`);
    }
  }

  equals(other: GCRule): boolean {
    return gcRulesEqual(this, other);
  }

  toRequest(): GCRuleRequest {
    return gcRuleToRequest(this);
  }
}

export class MaxAgeGCRule {
  readonly type = 'maxAge';

  /**
   * @param maxAgeMs - cells older than this many milliseconds may be deleted
   */
  constructor(readonly maxAgeMs: number) {
    if (!Number.isSafeInteger(maxAgeMs) || maxAgeMs < 0) {
      throw new ValidationError(`Max age must be a non-negative number of milliseconds, got ${maxAgeMs}`);
    }
  }

  equals(other: GCRule): boolean {
    return gcRulesEqual(this, other);
  }

  toRequest(): GCRuleRequest {
    return gcRuleToRequest(this);
  }
}

export class GCRuleUnion {
  readonly type = 'union';
  readonly rules: readonly GCRule[];

  constructor(rules: readonly GCRule[]) {
    this.rules = Object.freeze([...rules]);
  }

  equals(other: GCRule): boolean {
    return gcRulesEqual(this, other);
  }

  toRequest(): GCRuleRequest {
    return gcRuleToRequest(this);
  }
}

export class GCRuleIntersection {
  readonly type = 'intersection';
  readonly rules: readonly GCRule[];

  constructor(rules: readonly GCRule[]) {
    this.rules = Object.freeze([...rules]);
  }

  equals(other: GCRule): boolean {
    return gcRulesEqual(this, other);
  }

  toRequest(): GCRuleRequest {
    return gcRuleToRequest(this);
  }
}

function rulesEqual(a: readonly GCRule[], b: readonly GCRule[]): boolean {
  return a.length === b.length && a.every((rule, i) => gcRulesEqual(rule, b[i]));
}

/**
 * Structural equality; `undefined` (no rule) only equals `undefined`.
 */
export function gcRulesEqual(a: GCRule | undefined, b: GCRule | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  switch (a.type) {
    case 'maxVersions':
      return b.type === 'maxVersions' && a.maxNumVersions === b.maxNumVersions;
    case 'maxAge':
      return b.type === 'maxAge' && a.maxAgeMs === b.maxAgeMs;
    case 'union':
      return b.type === 'union' && rulesEqual(a.rules, b.rules);
    case 'intersection':
      return b.type === 'intersection' && rulesEqual(a.rules, b.rules);
  }
}

export function gcRuleToRequest(rule: GCRule): GCRuleRequest {
  switch (rule.type) {
    case 'maxVersions':
      return { maxNumVersions: rule.maxNumVersions };
    case 'maxAge':
      return { maxAgeMs: rule.maxAgeMs };
    case 'union':
      return { union: { rules: rule.rules.map(gcRuleToRequest) } };
    case 'intersection':
      return { intersection: { rules: rule.rules.map(gcRuleToRequest) } };
  }
}

export function gcRuleFromRequest(request: GCRuleRequest): GCRule {
  if ('maxNumVersions' in request) {
    return new MaxVersionsGCRule(request.maxNumVersions);
  }
  if ('maxAgeMs' in request) {
    return new MaxAgeGCRule(request.maxAgeMs);
  }
  if ('union' in request) {
    return new GCRuleUnion(request.union.rules.map(gcRuleFromRequest));
  }
  return new GCRuleIntersection(request.intersection.rules.map(gcRuleFromRequest));
}
