import { parse } from 'csv-parse/sync';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { CsvFormatError } from '../../application/errors.js';

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;

const RecordsSchema = z.array(z.array(z.string()));

export interface CsvReadOptions {
  /** Forces the field delimiter instead of sniffing it from the header line. */
  delimiter?: string;
}

export interface CsvRow {
  /** One-based position among the data rows, blank lines excluded. */
  readonly rowNumber: number;
  readonly values: Readonly<Record<string, string>>;
}

/**
 * Pick the candidate delimiter that occurs most often in the header line.
 * Falls back to a comma.
 */
export function sniffDelimiter(headerLine: string): string {
  let best = ',';
  let bestCount = 0;
  for (const candidate of CANDIDATE_DELIMITERS) {
    const count = headerLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Parse CSV text into rows keyed by normalised (trimmed, lower-cased) header.
 * Strips a leading BOM, skips blank rows and trims every value.
 */
export function parseCsvText(
  text: string,
  requiredHeaders: readonly string[],
  label: string,
  options: CsvReadOptions = {}
): CsvRow[] {
  const content = text.replace(/^\uFEFF/, '');
  const headerLine = content.split(/\r?\n/).find((line) => line.trim() !== '');
  if (headerLine === undefined) {
    throw new CsvFormatError(`${label} appears empty or has no header row`);
  }

  const delimiter = options.delimiter ?? sniffDelimiter(headerLine);
  let records: string[][];
  try {
    records = RecordsSchema.parse(
      parse(content, {
        delimiter,
        skip_empty_lines: true,
        relax_column_count: true,
      })
    );
  } catch (error) {
    if (error instanceof Error) {
      throw new CsvFormatError(`${label} could not be parsed: ${error.message}`);
    }
    throw error;
  }

  const [header = [], ...body] = records;
  const headers = header.map((name) => name.trim().toLowerCase());
  const missing = requiredHeaders.filter((name) => !headers.includes(name));
  if (missing.length > 0) {
    throw new CsvFormatError(
      `${label} missing required headers ${requiredHeaders.join(', ')}. Found: ${headers.join(', ')}`
    );
  }

  const rows: CsvRow[] = [];
  for (const raw of body) {
    const record = raw.map((value) => value.trim());
    if (record.every((value) => value === '')) {
      continue;
    }
    const values: Record<string, string> = {};
    headers.forEach((name, column) => {
      values[name] = record[column] ?? '';
    });
    rows.push({ rowNumber: rows.length + 1, values });
  }
  return rows;
}

export async function readCsvFile(
  filePath: string,
  requiredHeaders: readonly string[],
  label: string,
  options: CsvReadOptions = {}
): Promise<CsvRow[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error) {
      throw new CsvFormatError(`Cannot read ${label} at ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return parseCsvText(text, requiredHeaders, label, options);
}
