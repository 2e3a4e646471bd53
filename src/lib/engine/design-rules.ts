// ============================================================
// Design Rule Validator — all inputs must share one rule set
// ============================================================

import type { DesignRuleSet } from '@/types';
import { DesignRuleMismatchError } from './errors';

/**
 * Names of every differing parameter, sorted. The rule set's own `name`
 * and `description` count as parameters.
 */
export function diffDesignRules(a: DesignRuleSet, b: DesignRuleSet): string[] {
  const differing: string[] = [];
  if (a.name !== b.name) differing.push('name');
  if (a.description !== b.description) differing.push('description');

  const params = new Set([...Object.keys(a.params), ...Object.keys(b.params)]);
  for (const param of params) {
    if (a.params[param] !== b.params[param]) differing.push(param);
  }
  return differing.sort();
}

/**
 * Adopt the first rule set; afterwards every incoming set must be identical.
 * Comparison is exact: "0.2mm" and "0.20mm" are different values.
 */
export function checkDesignRules(
  accumulated: DesignRuleSet | null,
  incoming: DesignRuleSet,
): DesignRuleSet {
  if (!accumulated) return incoming;

  const differing = diffDesignRules(accumulated, incoming);
  if (differing.length > 0) {
    throw new DesignRuleMismatchError(differing);
  }
  return accumulated;
}
