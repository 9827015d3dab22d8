/**
 * Conditional Permission Evaluator
 *
 * A rule grants its permission only when its time constraint holds at the
 * context's timestamp and every condition has an exact string match in the
 * context data.
 *
 * @module access/conditionalPermissions
 */

import { isTimeConstraintSatisfied, type TimeConstraintOptions } from './timeConstraint.js';
import type {
  ConditionalPermissionRule,
  Permission,
  PermissionContext,
  TimeConstraint,
} from './types.js';

export function evaluateConditionalRule(
  rule: ConditionalPermissionRule,
  context: PermissionContext,
  options: TimeConstraintOptions = {},
): boolean {
  if (
    rule.timeConstraint &&
    !isTimeConstraintSatisfied(rule.timeConstraint, context.createdAt, options)
  ) {
    return false;
  }

  for (const [key, expected] of Object.entries(rule.conditions)) {
    const actual = context.data[key];
    // Non-string values never match, even when their text form would.
    if (typeof actual !== 'string' || actual !== expected) return false;
  }

  return true;
}

/**
 * The rules in `rules` that grant `permission` for `context`.
 */
export function findGrantingRules(
  rules: readonly ConditionalPermissionRule[],
  permission: Permission,
  context: PermissionContext,
  options: TimeConstraintOptions = {},
): ConditionalPermissionRule[] {
  return rules.filter(
    (rule) => rule.permission === permission && evaluateConditionalRule(rule, context, options),
  );
}

export interface ConditionalRuleInput {
  permission: Permission;
  conditions?: Record<string, string>;
  timeConstraint?: TimeConstraint;
  priority?: number;
  description?: string;
}

export function createConditionalRule(input: ConditionalRuleInput): ConditionalPermissionRule {
  const rule: ConditionalPermissionRule = {
    permission: input.permission,
    conditions: { ...(input.conditions ?? {}) },
    priority: input.priority ?? 0,
    description: input.description ?? '',
  };
  if (input.timeConstraint) rule.timeConstraint = { ...input.timeConstraint };
  return rule;
}
