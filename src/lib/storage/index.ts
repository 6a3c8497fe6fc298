import type { LedgerDatabase } from './database';
import { RuleRepository } from './rules';
import { StatementRepository } from './statements';
import { DatabaseStatementSink, TransactionRepository } from './transactions';
import { UserRepository } from './users';

export { openDatabase } from './database';
export type { DatabaseHandle, LedgerDatabase } from './database';
export { RuleRepository } from './rules';
export { StatementRepository } from './statements';
export type { NewStatement, StatementStats } from './statements';
export { DatabaseStatementSink, TransactionRepository } from './transactions';
export { UserRepository } from './users';

export interface Repositories {
  users: UserRepository;
  rules: RuleRepository;
  statements: StatementRepository;
  transactions: TransactionRepository;
  sink: DatabaseStatementSink;
}

export function createRepositories(db: LedgerDatabase): Repositories {
  return {
    users: new UserRepository(db),
    rules: new RuleRepository(db),
    statements: new StatementRepository(db),
    transactions: new TransactionRepository(db),
    sink: new DatabaseStatementSink(db),
  };
}
