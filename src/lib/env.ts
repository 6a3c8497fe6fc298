import { z } from 'zod';

const configSchema = z.object({
  STATEMENT_LEDGER_DB: z.string().min(1).default('statement-ledger.db'),
  STATEMENT_LEDGER_TOP_CATEGORIES: z.coerce.number().int().positive().default(5),
});

export interface Config {
  databasePath: string;
  topCategories: number;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.parse({
    STATEMENT_LEDGER_DB: env.STATEMENT_LEDGER_DB || undefined,
    STATEMENT_LEDGER_TOP_CATEGORIES: env.STATEMENT_LEDGER_TOP_CATEGORIES || undefined,
  });

  return {
    databasePath: parsed.STATEMENT_LEDGER_DB,
    topCategories: parsed.STATEMENT_LEDGER_TOP_CATEGORIES,
  };
}
