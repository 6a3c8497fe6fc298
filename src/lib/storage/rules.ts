import { and, asc, desc, eq, isNull } from 'drizzle-orm';
import type { CategoryRule } from '../../types';
import type { RuleSetProvider } from '../services/types';
import { categoryRuleSchema, type CategoryRuleInput } from '../parsers/categorizer';
import type { LedgerDatabase } from './database';
import { categoryRules, type CategoryRuleRow } from './schema';

function toRule(row: CategoryRuleRow): CategoryRule {
  return {
    id: row.id,
    pattern: row.pattern,
    isRegex: row.isRegex,
    category: row.category,
    priority: row.priority,
    active: row.isActive,
  };
}

function scope(userId: number | null) {
  return userId === null ? isNull(categoryRules.userId) : eq(categoryRules.userId, userId);
}

/**
 * Category rules per user scope. Rules are never deleted, only
 * deactivated.
 */
export class RuleRepository implements RuleSetProvider {
  constructor(private readonly db: LedgerDatabase) {}

  /**
   * Active rules of a user, or of the global default set when the user
   * has no rules of their own.
   */
  async activeRules(userId: number | null): Promise<CategoryRule[]> {
    if (userId !== null && !this.hasRules(userId)) {
      return this.listByUser(null);
    }
    return this.listByUser(userId);
  }

  listByUser(userId: number | null): CategoryRule[] {
    return this.db
      .select()
      .from(categoryRules)
      .where(and(scope(userId), eq(categoryRules.isActive, true)))
      .orderBy(desc(categoryRules.priority), asc(categoryRules.pattern))
      .all()
      .map(toRule);
  }

  create(userId: number | null, input: CategoryRuleInput): CategoryRule {
    const rule = categoryRuleSchema.parse(input);
    const now = new Date().toISOString();
    const row = this.db
      .insert(categoryRules)
      .values({
        userId,
        pattern: rule.pattern,
        isRegex: rule.isRegex,
        category: rule.category,
        priority: rule.priority,
        isActive: rule.active,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();
    return toRule(row);
  }

  deactivate(ruleId: number): boolean {
    const updated = this.db
      .update(categoryRules)
      .set({ isActive: false, updatedAt: new Date().toISOString() })
      .where(eq(categoryRules.id, ruleId))
      .returning({ id: categoryRules.id })
      .all();
    return updated.length > 0;
  }

  importDefaults(userId: number, rules: readonly CategoryRule[]): CategoryRule[] {
    return this.db.transaction(() => rules.map((rule) => this.create(userId, rule)));
  }

  // Global defaults are written once; later calls leave them alone
  seedGlobal(rules: readonly CategoryRule[]): number {
    const existing = this.db.select({ id: categoryRules.id }).from(categoryRules).where(scope(null)).get();
    if (existing) return 0;
    return this.db.transaction(() => rules.map((rule) => this.create(null, rule)).length);
  }

  categoriesFor(userId: number): string[] {
    const categories = new Set(this.listByUser(userId).map((rule) => rule.category));
    return Array.from(categories).sort();
  }

  private hasRules(userId: number): boolean {
    return this.db.select({ id: categoryRules.id }).from(categoryRules).where(scope(userId)).get() !== undefined;
  }
}
