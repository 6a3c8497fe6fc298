import type { CategoryRule, Direction, StoredTransaction } from '../../types';
import type { CategoryRuleInput } from '../parsers/categorizer';
import {
  compareMonths,
  DEFAULT_TOP_CATEGORIES,
  filterByDateRange,
  getLargestTransactions,
  spendingSummary,
  type MonthComparison,
  type SpendingSummary,
} from '../summarizer';
import type { RuleRepository } from '../storage/rules';
import type { TransactionRepository } from '../storage/transactions';

export interface SpendingAnalysis extends SpendingSummary {
  period: { start: Date | null; end: Date | null };
}

export interface AnalysisServiceDeps {
  transactions: TransactionRepository;
  rules: RuleRepository;
  topCategories?: number;
}

/**
 * Read side over stored transactions, plus category corrections and rule
 * maintenance. Every figure is recomputed from the transaction rows.
 */
export class AnalysisService {
  private readonly topCategories: number;

  constructor(private readonly deps: AnalysisServiceDeps) {
    this.topCategories = deps.topCategories ?? DEFAULT_TOP_CATEGORIES;
  }

  spendingAnalysis(userId: number, range: { start?: Date; end?: Date } = {}): SpendingAnalysis {
    const transactions = filterByDateRange(this.deps.transactions.listByUser(userId), range.start, range.end);
    return {
      period: { start: range.start ?? null, end: range.end ?? null },
      ...spendingSummary(transactions, { topN: this.topCategories }),
    };
  }

  compareMonths(userId: number, month1: string, month2: string): MonthComparison {
    return compareMonths(this.deps.transactions.listByUser(userId), month1, month2);
  }

  largestTransactions(userId: number, direction: Direction = 'Debit', limit = 10): StoredTransaction[] {
    return getLargestTransactions(this.deps.transactions.listByUser(userId), direction, limit);
  }

  correctCategory(transactionId: number, category: string): boolean {
    return this.deps.transactions.updateCategory(transactionId, category) !== null;
  }

  addRule(userId: number, rule: CategoryRuleInput): CategoryRule {
    return this.deps.rules.create(userId, rule);
  }

  deactivateRule(ruleId: number): boolean {
    return this.deps.rules.deactivate(ruleId);
  }

  listRules(userId: number): CategoryRule[] {
    return this.deps.rules.listByUser(userId);
  }

  listCategories(userId: number): string[] {
    return this.deps.rules.categoriesFor(userId);
  }
}
