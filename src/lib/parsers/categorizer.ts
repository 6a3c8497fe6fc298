// Rule-based transaction categorization shared by every statement format.
// Rules are passed in as a value; nothing here keeps state between calls.

import { z } from 'zod';
import type { CategoryRule, Transaction } from '../../types';
import type { RuleWarning } from '../errors';
import defaultRulesJson from './defaultRules.json';

export const FALLBACK_CATEGORY = 'others';
export const TRANSFER_CATEGORY = 'payments_transfers';

// Already-stripped UPI/NEFT reference numbers and nothing else
const NUMERIC_REFERENCE = /^\d+(\s+\d+)*$/;

export const categoryRuleSchema = z.object({
  id: z.number().int().optional(),
  pattern: z.string().trim().min(1),
  isRegex: z.boolean().default(false),
  category: z.string().trim().min(1),
  priority: z.number().int().default(0),
  active: z.boolean().default(true),
});

export type CategoryRuleInput = z.input<typeof categoryRuleSchema>;

export function parseRules(input: unknown): CategoryRule[] {
  return z.array(categoryRuleSchema).parse(input);
}

/**
 * The global default rule table, validated.
 */
export function loadDefaultRules(): CategoryRule[] {
  return parseRules(defaultRulesJson);
}

interface CompiledRule {
  readonly rule: CategoryRule;
  matches(normalized: string): boolean;
}

export interface RuleSet {
  readonly rules: readonly CompiledRule[];
  readonly warnings: readonly RuleWarning[];
}

/**
 * Priority descending, then pattern ascending by code unit.
 */
export function compareRules(a: CategoryRule, b: CategoryRule): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.pattern < b.pattern) return -1;
  if (a.pattern > b.pattern) return 1;
  return 0;
}

export function normalizeDescription(description: string): string {
  return description.toLowerCase().replace(/\s+/g, ' ').trim();
}

function compileRule(rule: CategoryRule): CompiledRule | RuleWarning {
  if (!rule.isRegex) {
    const needle = normalizeDescription(rule.pattern);
    return { rule, matches: (normalized) => normalized.includes(needle) };
  }

  try {
    const regex = new RegExp(rule.pattern, 'i');
    return { rule, matches: (normalized) => regex.test(normalized) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { pattern: rule.pattern, category: rule.category, reason };
  }
}

/**
 * Freeze a snapshot of the active rules for one categorization run.
 * Regex rules that do not compile are left out and reported.
 */
export function createRuleSet(rules: readonly CategoryRule[]): RuleSet {
  const compiled: CompiledRule[] = [];
  const warnings: RuleWarning[] = [];

  const ordered = rules.filter((rule) => rule.active).map((rule) => ({ ...rule })).sort(compareRules);

  for (const rule of ordered) {
    const result = compileRule(rule);
    if ('matches' in result) {
      compiled.push(result);
    } else {
      console.warn(`[categorizer] Skipping invalid regex rule "${result.pattern}" (${result.category}): ${result.reason}`);
      warnings.push(result);
    }
  }

  return Object.freeze({
    rules: Object.freeze(compiled),
    warnings: Object.freeze(warnings),
  });
}

/**
 * First matching rule wins; "others" when nothing matches.
 */
export function categorize(description: string, ruleSet: RuleSet): string {
  const normalized = normalizeDescription(description);

  for (const compiled of ruleSet.rules) {
    if (compiled.matches(normalized)) {
      return compiled.rule.category;
    }
  }

  if (NUMERIC_REFERENCE.test(normalized)) {
    return TRANSFER_CATEGORY;
  }
  return FALLBACK_CATEGORY;
}

export function categorizeTransactions<T extends Transaction>(
  transactions: readonly T[],
  ruleSet: RuleSet
): Array<T & { category: string }> {
  return transactions.map((transaction) => ({
    ...transaction,
    category: categorize(transaction.description, ruleSet),
  }));
}
