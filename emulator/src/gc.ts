import { MICROS_PER_MILLI, type Cell } from '@widecol/core';
import type { GCRuleRequest } from '@widecol/client';

/**
 * Indexes of the cells `rule` lets the server delete. `cells` is one
 * column's versions, newest first.
 */
export function collectableCells(cells: readonly Cell[], rule: GCRuleRequest, nowMicros: number): Set<number> {
  if ('maxNumVersions' in rule) {
    const out = new Set<number>();
    for (let i = rule.maxNumVersions; i < cells.length; i++) out.add(i);
    return out;
  }
  if ('maxAgeMs' in rule) {
    const cutoff = nowMicros - rule.maxAgeMs * MICROS_PER_MILLI;
    const out = new Set<number>();
    cells.forEach((cell, i) => {
      if (cell.timestampMicros < cutoff) out.add(i);
    });
    return out;
  }
  if ('union' in rule) {
    const out = new Set<number>();
    for (const child of rule.union.rules) {
      for (const index of collectableCells(cells, child, nowMicros)) out.add(index);
    }
    return out;
  }

  const rules = rule.intersection.rules;
  if (rules.length === 0) return new Set();
  let out = collectableCells(cells, rules[0], nowMicros);
  for (const child of rules.slice(1)) {
    const next = collectableCells(cells, child, nowMicros);
    out = new Set([...out].filter(index => next.has(index)));
  }
  return out;
}

/**
 * The versions of a column that survive `rule`; all of them without a rule.
 */
export function applyGCRule(cells: readonly Cell[], rule: GCRuleRequest | undefined, nowMicros: number): Cell[] {
  if (rule === undefined) return [...cells];
  const doomed = collectableCells(cells, rule, nowMicros);
  return cells.filter((_, i) => !doomed.has(i));
}
