import { parseArgs } from 'node:util';
import { BANK_TYPES, type BankType } from './types';
import type { Ledger } from './lib/ledger';
import { formatCents } from './lib/money';

export const USAGE = `Usage: statement-ledger <command> [options]

Commands:
  create-user <username> <email>
  list-users
  process <file> <username> [--bank <type>]
  analyze <username> [--month1 YYYY-MM --month2 YYYY-MM]
  categories <username>
  add-rule <username> <pattern> <category> [--regex] [--priority N]
`;

function isBankType(value: string): value is BankType {
  return BANK_TYPES.some((type) => type === value);
}

function requireUser(ledger: Ledger, username: string | undefined) {
  if (!username) throw new Error('Missing <username>');
  const user = ledger.users.getByUsername(username);
  if (!user) throw new Error(`User not found: ${username}`);
  return user;
}

/**
 * Run one command against an open ledger. Output goes to the console;
 * invalid input throws.
 */
export async function runCommand(ledger: Ledger, command: string, args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      bank: { type: 'string' },
      month1: { type: 'string' },
      month2: { type: 'string' },
      regex: { type: 'boolean', default: false },
      priority: { type: 'string' },
    },
  });

  switch (command) {
    case 'create-user': {
      const [username, email] = positionals;
      const user = ledger.users.createUser(username ?? '', email ?? '');
      const summary = ledger.users.getUserSummary(user.id);
      console.log(`Created user: ${user.username} (ID: ${user.id})`);
      console.log(`  Categories: ${summary?.categories.length ?? 0}`);
      console.log(`  Rules: ${summary?.ruleCount ?? 0}`);
      return;
    }

    case 'list-users': {
      const users = ledger.users.listUsers();
      if (users.length === 0) {
        console.log('No users found.');
        return;
      }
      for (const user of users) {
        console.log(`${user.id}\t${user.username}\t${user.email}`);
      }
      return;
    }

    case 'process': {
      const [file, username] = positionals;
      if (!file) throw new Error('Missing <file>');
      const user = requireUser(ledger, username);
      let bankType: BankType | undefined;
      if (values.bank !== undefined) {
        if (!isBankType(values.bank)) {
          throw new Error(`Unknown bank type "${values.bank}", expected one of ${BANK_TYPES.join(', ')}`);
        }
        bankType = values.bank;
      }

      const statement = await ledger.statements.createStatement(user.id, file, bankType);
      const result = await ledger.statements.processStatement(statement.id);

      if (result.status === 'failed') {
        console.log(`Statement ${result.statementId} failed (${result.error.code}): ${result.error.message}`);
        process.exitCode = 1;
        return;
      }

      const { summary } = result;
      console.log(`Processed ${result.statement.fileName} as ${result.statement.bankType}`);
      console.log(`  Transactions: ${summary.transactionCount}`);
      console.log(`  Total debits: ${formatCents(summary.totalDebitsCents)}`);
      console.log(`  Total credits: ${formatCents(summary.totalCreditsCents)}`);
      for (const top of summary.topCategories) {
        console.log(`  ${top.category}: ${formatCents(top.totalCents)} (${top.transactionCount})`);
      }
      if (result.issues.length > 0) console.log(`  Skipped lines: ${result.issues.length}`);
      if (result.warnings.length > 0) console.log(`  Invalid rules skipped: ${result.warnings.length}`);
      return;
    }

    case 'analyze': {
      const user = requireUser(ledger, positionals[0]);

      if ((values.month1 === undefined) !== (values.month2 === undefined)) {
        throw new Error('--month1 and --month2 must be given together');
      }
      if (values.month1 !== undefined && values.month2 !== undefined) {
        const comparison = ledger.analysis.compareMonths(user.id, values.month1, values.month2);
        console.log(`${comparison.month1.month}: ${formatCents(comparison.month1.spendingCents)} (${comparison.month1.transactions})`);
        console.log(`${comparison.month2.month}: ${formatCents(comparison.month2.spendingCents)} (${comparison.month2.transactions})`);
        console.log(`Difference: ${formatCents(comparison.spendingDifferenceCents)} (${comparison.spendingChangePercentage.toFixed(1)}%)`);
        return;
      }

      const analysis = ledger.analysis.spendingAnalysis(user.id);
      console.log(`Total spending: ${formatCents(analysis.totalSpendingCents)}`);
      console.log(`Transactions: ${analysis.totalTransactions}`);
      console.log(`Average: ${formatCents(analysis.averageTransactionCents)}`);
      for (const top of analysis.topCategories) {
        console.log(`  ${top.category}: ${formatCents(top.totalCents)} (${top.transactionCount})`);
      }
      for (const month of analysis.byMonth) {
        console.log(`  ${month.month}: ${formatCents(month.amountCents)} (${month.transactionCount})`);
      }
      return;
    }

    case 'categories': {
      const user = requireUser(ledger, positionals[0]);
      for (const rule of ledger.analysis.listRules(user.id)) {
        console.log(`${rule.priority}\t${rule.isRegex ? 'regex' : 'text'}\t${rule.pattern}\t${rule.category}`);
      }
      return;
    }

    case 'add-rule': {
      const [username, pattern, category] = positionals;
      const user = requireUser(ledger, username);
      const rule = ledger.analysis.addRule(user.id, {
        pattern: pattern ?? '',
        category: category ?? '',
        isRegex: values.regex,
        priority: values.priority === undefined ? 0 : Number(values.priority),
      });
      console.log(`Added rule ${rule.id}: ${rule.pattern} -> ${rule.category} (priority ${rule.priority})`);
      return;
    }

    default:
      console.log(USAGE);
      process.exitCode = command ? 1 : 0;
  }
}
