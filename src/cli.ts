import { getConfig } from './lib/env';
import { createLedger } from './lib/ledger';
import { PdfTextExtractor } from './lib/pdfParser';
import { describeError } from './lib/errors';
import { runCommand } from './commands';

async function main(): Promise<void> {
  const [command = '', ...args] = process.argv.slice(2);
  const ledger = await createLedger(getConfig(), new PdfTextExtractor());

  try {
    await runCommand(ledger, command, args);
  } finally {
    ledger.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exitCode = 1;
});
