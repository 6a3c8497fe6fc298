import type { Config } from './env';
import { loadDefaultRules } from './parsers/categorizer';
import type { FormatRegistry } from './parsers/types';
import { createRepositories, openDatabase, type Repositories } from './storage';
import { AnalysisService } from './services/analysisService';
import { StatementService } from './services/statementService';
import { UserService } from './services/userService';
import type { DocumentTextExtractor } from './services/types';

export interface Ledger {
  repositories: Repositories;
  statements: StatementService;
  analysis: AnalysisService;
  users: UserService;
  close(): void;
}

/**
 * Open the store, seed the global default rules, and wire the services.
 */
export async function createLedger(
  config: Config,
  extractor: DocumentTextExtractor,
  registry?: FormatRegistry
): Promise<Ledger> {
  const handle = await openDatabase(config.databasePath);
  const repositories = createRepositories(handle.db);
  const defaultRules = loadDefaultRules();
  repositories.rules.seedGlobal(defaultRules);

  return {
    repositories,
    statements: new StatementService({
      statements: repositories.statements,
      transactions: repositories.transactions,
      rules: repositories.rules,
      sink: repositories.sink,
      extractor,
      registry,
      topCategories: config.topCategories,
    }),
    analysis: new AnalysisService({
      transactions: repositories.transactions,
      rules: repositories.rules,
      topCategories: config.topCategories,
    }),
    users: new UserService({
      users: repositories.users,
      rules: repositories.rules,
      defaultRules,
    }),
    close: handle.close,
  };
}
