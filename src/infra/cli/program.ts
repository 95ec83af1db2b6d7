import { Command } from 'commander';
import { z } from 'zod';
import { LedgerConfig } from '../../config.js';
import { runApply, runDumpLedgers } from './commands.js';

const BatchInputOptionsSchema = z.object({
  accounts: z.string().min(1),
  transactions: z.string().min(1),
  onError: z.enum(['abort', 'skip']).optional(),
  delimiter: z.string().length(1).optional(),
  quiet: z.boolean().optional(),
});

const ApplyOptionsSchema = BatchInputOptionsSchema.extend({
  outBalances: z.string().min(1),
});

const DumpLedgersOptionsSchema = BatchInputOptionsSchema.extend({
  outLedgers: z.string().min(1),
  outDir: z.string().min(1).optional(),
  includeOpen: z.boolean().optional(),
});

function addBatchInputOptions(command: Command): Command {
  return command
    .requiredOption('--accounts <csv>', 'Path to accounts.csv (owner,opening_balance)')
    .requiredOption(
      '--transactions <csv>',
      'Path to transactions.csv (owner,event,amount,other)'
    )
    .option('--on-error <policy>', 'abort on the first bad record, or skip it: abort, skip')
    .option('--delimiter <char>', 'CSV delimiter (sniffed from the header when omitted)')
    .option('--quiet', 'Only print warnings and errors');
}

/**
 * Build the ledger CLI. Flags take precedence over `config`.
 * Command failures reject from parseAsync; the caller maps them to exit codes.
 */
export function createProgram(config: LedgerConfig): Command {
  const program = new Command();
  program
    .name('ledger')
    .description('Apply CSV transaction batches to account ledgers')
    .version('1.0.0');

  addBatchInputOptions(
    program.command('apply').description('Apply transactions and write final balances')
  )
    .requiredOption('--out-balances <csv>', 'Where to write balances (owner,balance)')
    .action(async (rawOptions: unknown) => {
      const options = ApplyOptionsSchema.parse(rawOptions);
      await runApply({
        accounts: options.accounts,
        transactions: options.transactions,
        outBalances: options.outBalances,
        onError: options.onError ?? config.onError,
        delimiter: options.delimiter ?? config.csvDelimiter,
        quiet: options.quiet ?? false,
      });
    });

  addBatchInputOptions(
    program
      .command('dump-ledgers')
      .description('Apply transactions and export every account ledger')
  )
    .requiredOption(
      '--out-ledgers <csv>',
      'Where to write the merged ledger (owner,event,amount,other)'
    )
    .option('--out-dir <dir>', 'Also write one ledger file per account into this directory')
    .option('--include-open', 'Include OPEN events in the merged ledger')
    .action(async (rawOptions: unknown) => {
      const options = DumpLedgersOptionsSchema.parse(rawOptions);
      await runDumpLedgers({
        accounts: options.accounts,
        transactions: options.transactions,
        outLedgers: options.outLedgers,
        outDir: options.outDir,
        includeOpen: options.includeOpen ?? config.includeOpen,
        onError: options.onError ?? config.onError,
        delimiter: options.delimiter ?? config.csvDelimiter,
        quiet: options.quiet ?? false,
      });
    });

  return program;
}
