import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ZodError } from 'zod';
import { createProgram } from '../program.js';
import { LedgerConfig } from '../../../config.js';
import { UnknownAccountError } from '../../../domain/ledger/errors.js';

const defaults: LedgerConfig = { onError: 'abort', includeOpen: false };

describe('createProgram', () => {
  let dir: string;
  let accountsPath: string;
  let transactionsPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-program-'));
    accountsPath = join(dir, 'accounts.csv');
    transactionsPath = join(dir, 'transactions.csv');
    await writeFile(accountsPath, 'owner;opening_balance\nAlice;100\nBob;50\n', 'utf-8');
    await writeFile(
      transactionsPath,
      'owner;event;amount;other\nAlice;TRANSFER_OUT;40;Bob\nAlice;TRANSFER_OUT;5;Zed\n',
      'utf-8'
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function args(command: string, ...extra: string[]): string[] {
    return [
      command,
      '--accounts',
      accountsPath,
      '--transactions',
      transactionsPath,
      '--quiet',
      ...extra,
    ];
  }

  it('should reject from parseAsync when a record fails in abort mode', async () => {
    const outBalances = join(dir, 'balances.csv');

    await expect(
      createProgram(defaults).parseAsync(args('apply', '--out-balances', outBalances), {
        from: 'user',
      })
    ).rejects.toThrow(UnknownAccountError);
  });

  it('should let --on-error override the configured policy', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const outBalances = join(dir, 'balances.csv');

    await createProgram(defaults).parseAsync(
      args('apply', '--out-balances', outBalances, '--on-error', 'skip'),
      { from: 'user' }
    );

    expect(await readFile(outBalances, 'utf-8')).toBe('owner,balance\nAlice,60.00\nBob,90.00\n');
  });

  it('should fall back to the configured policy and OPEN setting', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const outLedgers = join(dir, 'ledgers.csv');

    await createProgram({ onError: 'skip', includeOpen: true }).parseAsync(
      args('dump-ledgers', '--out-ledgers', outLedgers),
      { from: 'user' }
    );

    expect(await readFile(outLedgers, 'utf-8')).toBe(
      'owner,event,amount,other\n' +
        'Alice,OPEN,100.00,\n' +
        'Alice,TRANSFER_OUT,40.00,Bob\n' +
        'Bob,OPEN,50.00,\n' +
        'Bob,TRANSFER_IN,40.00,Alice\n'
    );
  });

  it('should validate option values', async () => {
    await expect(
      createProgram(defaults).parseAsync(
        args('apply', '--out-balances', join(dir, 'balances.csv'), '--on-error', 'maybe'),
        { from: 'user' }
      )
    ).rejects.toThrow(ZodError);
  });
});
