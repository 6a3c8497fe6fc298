import { basename, resolve } from 'node:path';
import type { BankType, CategoryTotal, StatementRecord, Summary, Transaction } from '../../types';
import type { FormatRegistry } from '../parsers/types';
import { parserRegistry } from '../parsers/registry';
import { extractStatement } from '../parsers/extractor';
import { categorizeTransactions, createRuleSet } from '../parsers/categorizer';
import { aggregateByCategory, buildSummary, DEFAULT_TOP_CATEGORIES } from '../summarizer';
import { statementDateFromFileName } from '../dates';
import {
  describeError,
  DocumentUnreadableError,
  FormatUnsupportedError,
  StatementError,
  type LineIssue,
  type RuleWarning,
  type StatementErrorCode,
} from '../errors';
import type { StatementRepository } from '../storage/statements';
import type { TransactionRepository } from '../storage/transactions';
import type { DocumentTextExtractor, RuleSetProvider, StatementSink } from './types';

// Lines read for bank-type detection
const FIRST_PAGE_LINES = 60;

export type CategorizedTransaction = Transaction & { category: string };

export type ProcessResult =
  | {
      status: 'completed';
      statement: StatementRecord;
      transactions: CategorizedTransaction[];
      summary: Summary;
      issues: LineIssue[];
      warnings: RuleWarning[];
    }
  | {
      status: 'failed';
      statementId: number;
      statement: StatementRecord | null;
      error: { code: StatementErrorCode | 'processing_failed'; message: string };
    };

export interface StatementSummary {
  statement: StatementRecord;
  categorySummary: Record<string, CategoryTotal>;
  storedTransactionCount: number;
}

export interface StatementServiceDeps {
  statements: StatementRepository;
  transactions: TransactionRepository;
  rules: RuleSetProvider;
  sink: StatementSink;
  extractor: DocumentTextExtractor;
  registry?: FormatRegistry;
  topCategories?: number;
}

/**
 * Runs statements through segmentation, extraction, categorization and
 * aggregation, and hands the result to the sink. Per-statement failures
 * are recorded on the statement and returned, never thrown.
 */
export class StatementService {
  private readonly registry: FormatRegistry;
  private readonly topCategories: number;

  constructor(private readonly deps: StatementServiceDeps) {
    this.registry = deps.registry ?? parserRegistry;
    this.topCategories = deps.topCategories ?? DEFAULT_TOP_CATEGORIES;
  }

  /**
   * Bank type of a document from its first page and file name.
   * An unreadable document is detected from its name alone; reading it
   * again during processing reports the failure.
   */
  async detectBankType(filePath: string): Promise<BankType> {
    let firstPage = '';
    try {
      const lines = await this.deps.extractor.extractLines(filePath);
      firstPage = lines.slice(0, FIRST_PAGE_LINES).join('\n');
    } catch (error) {
      console.warn(`[statement_detect] Could not read ${filePath}, detecting from file name:`, describeError(error));
    }
    return this.registry.detect(firstPage, basename(filePath));
  }

  async createStatement(userId: number, filePath: string, bankType?: BankType): Promise<StatementRecord> {
    const absolutePath = resolve(filePath);
    const fileName = basename(absolutePath);
    const detected = bankType ?? (await this.detectBankType(absolutePath));

    return this.deps.statements.create({
      userId,
      filePath: absolutePath,
      fileName,
      bankType: detected,
      statementDate: statementDateFromFileName(fileName) ?? today(),
    });
  }

  async processStatement(statementId: number): Promise<ProcessResult> {
    const statement = this.deps.statements.getById(statementId);
    if (!statement) {
      return {
        status: 'failed',
        statementId,
        statement: null,
        error: { code: 'not_found', message: `Statement ${statementId} not found` },
      };
    }

    this.deps.statements.setStatus(statementId, 'processing');

    try {
      const format = this.registry.get(statement.bankType);
      if (!format) {
        throw new FormatUnsupportedError(statement.bankType);
      }

      const lines = await this.readLines(statement.filePath);
      // One snapshot for the whole run
      const ruleSet = createRuleSet(await this.deps.rules.activeRules(statement.userId));

      const extraction = extractStatement(lines, format);
      const transactions = categorizeTransactions(extraction.transactions, ruleSet);
      const summary = buildSummary(transactions, { topN: this.topCategories });

      this.deps.sink.complete(
        statementId,
        transactions,
        {
          totalDebitsCents: summary.totalDebitsCents,
          totalCreditsCents: summary.totalCreditsCents,
          transactionCount: summary.transactionCount,
        },
        {
          openingBalanceCents: extraction.openingBalanceCents,
          closingBalanceCents: extraction.closingBalanceCents,
        }
      );

      if (transactions.length === 0) {
        console.warn(`[statement_process] No transactions found in statement: ${statement.fileName}`);
      }
      console.info(`[statement_process] Processed statement ${statement.fileName}: ${transactions.length} transactions`);

      return {
        status: 'completed',
        statement: this.deps.statements.getById(statementId) ?? statement,
        transactions,
        summary,
        issues: extraction.issues,
        warnings: [...ruleSet.warnings],
      };
    } catch (error) {
      return this.fail(statement, error);
    }
  }

  getStatementSummary(statementId: number): StatementSummary | null {
    const statement = this.deps.statements.getById(statementId);
    if (!statement) return null;

    const stored = this.deps.transactions.listByStatement(statementId);
    return {
      statement,
      categorySummary: aggregateByCategory(stored),
      storedTransactionCount: stored.length,
    };
  }

  private async readLines(filePath: string): Promise<string[]> {
    try {
      return await this.deps.extractor.extractLines(filePath);
    } catch (error) {
      if (error instanceof DocumentUnreadableError) throw error;
      throw new DocumentUnreadableError(filePath, error);
    }
  }

  private fail(statement: StatementRecord, error: unknown): ProcessResult {
    const message = describeError(error);
    const code = error instanceof StatementError ? error.code : 'processing_failed';

    console.error(`[statement_process] Error processing statement ${statement.id} (${statement.fileName}):`, message);
    const updated = this.deps.statements.setStatus(statement.id, 'failed', message);

    return {
      status: 'failed',
      statementId: statement.id,
      statement: updated,
      error: { code, message },
    };
  }
}

function today(): Date {
  const now = new Date();
  return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
}
