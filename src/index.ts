export * from './types';
export {
  parserRegistry,
  StatementFormatRegistry,
  axisCreditFormat,
  axisSavingsFormat,
  extractStatement,
  createRuleSet,
  categorize,
  categorizeTransactions,
  loadDefaultRules,
  parseRules,
  FALLBACK_CATEGORY,
  TRANSFER_CATEGORY,
} from './lib/parsers';
export type { StatementFormat, FormatRegistry, LineOutcome, ExtractionContext, RuleSet, CategoryRuleInput } from './lib/parsers';
export * from './lib/summarizer';
export * from './lib/errors';
export { parseAmountToCents, formatCents } from './lib/money';
export { monthBounds, statementDateFromFileName, toMonthKey } from './lib/dates';
export { getConfig } from './lib/env';
export type { Config } from './lib/env';
export { createLedger } from './lib/ledger';
export type { Ledger } from './lib/ledger';
export * from './lib/storage';
export { StatementService } from './lib/services/statementService';
export type { ProcessResult, StatementSummary, CategorizedTransaction } from './lib/services/statementService';
export { AnalysisService } from './lib/services/analysisService';
export type { SpendingAnalysis } from './lib/services/analysisService';
export { UserService } from './lib/services/userService';
export type { DocumentTextExtractor, RuleSetProvider, StatementSink, BalanceInfo } from './lib/services/types';
export { PdfTextExtractor } from './lib/pdfParser';
