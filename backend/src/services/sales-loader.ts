import { promises as fsp } from 'node:fs';
import Papa from 'papaparse';
import { z } from 'zod';
import { ConstraintViolationError, SourceReadError } from '../errors.js';
import type { NewSalesRecord } from '../types/sales.js';
import type { SalesStore } from './sales-store.js';

export const CSV_COLUMNS = [
  'Nome Commerciale',
  'Email Commerciale',
  'Anno',
  'Trimestre',
  'Prodotto',
  'Area Geografica',
  'Quantità',
  'Ricavo (€)',
] as const;

export type CsvRow = Record<string, string | undefined>;

export type RejectedRow = {
  row: number;
  issues: string[];
};

export type IngestReport = {
  source: string;
  total: number;
  inserted: number;
  duplicates: number;
  rejected: RejectedRow[];
};

export type IngestOptions = {
  dedupe?: boolean;
};

const textCell = z.string().trim().min(1);
const numericCell = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().min(1))
  .pipe(z.coerce.number().finite());

const csvRowSchema = z.object({
  'Nome Commerciale': textCell,
  'Email Commerciale': textCell,
  Anno: numericCell,
  Trimestre: numericCell,
  Prodotto: textCell,
  'Area Geografica': textCell,
  'Quantità': numericCell,
  'Ricavo (€)': numericCell,
});

export function parseSalesCsv(text: string, source = 'csv'): CsvRow[] {
  const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const result = Papa.parse<CsvRow>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = result.meta.fields ?? [];
  const matches = fields.length === CSV_COLUMNS.length && CSV_COLUMNS.every((column, index) => fields[index] === column);
  if (!matches) {
    throw new SourceReadError(
      source,
      `unexpected columns in ${source}: expected [${CSV_COLUMNS.join(', ')}], got [${fields.join(', ')}]`
    );
  }

  return result.data;
}

export function toSalesRecord(row: CsvRow): NewSalesRecord {
  const parsed = csvRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new ConstraintViolationError(
      'row is missing required fields',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const cells = parsed.data;
  return {
    salespersonName: cells['Nome Commerciale'],
    salespersonEmail: cells['Email Commerciale'],
    year: cells.Anno,
    quarter: cells.Trimestre,
    product: cells.Prodotto,
    region: cells['Area Geografica'],
    quantity: cells['Quantità'],
    revenue: cells['Ricavo (€)'],
  };
}

/**
 * Inserts rows in source order. Rows that fail validation are reported and
 * skipped; any other failure propagates and leaves earlier rows inserted.
 */
export async function ingestRows(
  store: SalesStore,
  rows: CsvRow[],
  source: string,
  options: IngestOptions = {}
): Promise<IngestReport> {
  const report: IngestReport = { source, total: rows.length, inserted: 0, duplicates: 0, rejected: [] };

  for (const [index, row] of rows.entries()) {
    try {
      const record = toSalesRecord(row);
      if (options.dedupe && (await store.hasNaturalKey(record))) {
        report.duplicates += 1;
        continue;
      }
      await store.insert(record);
      report.inserted += 1;
    } catch (error) {
      if (!(error instanceof ConstraintViolationError)) {
        throw error;
      }
      const rejected: RejectedRow = { row: index + 1, issues: error.issues.length ? error.issues : [error.message] };
      console.warn(`[loader] ${source} row ${rejected.row} rejected: ${rejected.issues.join('; ')}`);
      report.rejected.push(rejected);
    }
  }

  return report;
}

export async function ingestCsv(
  store: SalesStore,
  text: string,
  source: string,
  options: IngestOptions = {}
): Promise<IngestReport> {
  return ingestRows(store, parseSalesCsv(text, source), source, options);
}

export async function loadAndIngest(
  store: SalesStore,
  source: string,
  options: IngestOptions = {}
): Promise<IngestReport> {
  let text: string;
  try {
    text = await fsp.readFile(source, 'utf8');
  } catch (error) {
    throw new SourceReadError(source, `cannot read ${source}`, { cause: error });
  }
  return ingestCsv(store, text, source, options);
}
