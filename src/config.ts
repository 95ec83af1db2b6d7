import { z } from 'zod';

export const ConfigSchema = z.object({
  LEDGER_ON_ERROR: z.enum(['abort', 'skip']).default('abort'),
  LEDGER_CSV_DELIMITER: z.string().length(1).optional(),
  LEDGER_INCLUDE_OPEN: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export interface LedgerConfig {
  onError: 'abort' | 'skip';
  csvDelimiter?: string;
  includeOpen: boolean;
}

/**
 * Read configuration from environment variables. Empty values count as unset.
 * Throws a ZodError when a value is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = ConfigSchema.parse(present);

  return {
    onError: parsed.LEDGER_ON_ERROR,
    csvDelimiter: parsed.LEDGER_CSV_DELIMITER,
    includeOpen: parsed.LEDGER_INCLUDE_OPEN,
  };
}
