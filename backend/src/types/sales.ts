import { z } from 'zod';

const requiredText = z.string().trim().min(1);

export const newSalesRecordSchema = z.object({
  salespersonName: requiredText,
  salespersonEmail: requiredText,
  year: z.number().int(),
  quarter: z.number().int().min(1).max(4),
  product: requiredText,
  region: requiredText,
  quantity: z.number().int().nonnegative(),
  revenue: z.number().finite().nonnegative(),
});

export type NewSalesRecord = z.infer<typeof newSalesRecordSchema>;

export type SalesRecord = NewSalesRecord & {
  id: number;
};

export const GROUP_KEYS = ['year', 'quarter', 'product', 'region'] as const;

export type GroupKey = (typeof GROUP_KEYS)[number];

export type Measure = 'revenue' | 'quantity';

export const ALL = 'all';

export type Criterion<T> = T | typeof ALL;

export type FilterCriteria = {
  year?: Criterion<number | string>;
  quarter?: Criterion<number | string>;
  product?: Criterion<string>;
  region?: Criterion<string>;
};

export type ScanResult =
  | { status: 'ok'; records: SalesRecord[] }
  | { status: 'failed'; records: SalesRecord[]; error: unknown };
