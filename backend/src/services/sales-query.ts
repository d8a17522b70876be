import { ALL, type FilterCriteria, type GroupKey, type Measure, type SalesRecord } from '../types/sales.js';

export type GroupValue = number | string;

export type SummaryRow = {
  key: GroupValue;
  revenue: number;
  quantity: number;
};

export type Totals = {
  revenue: number;
  quantity: number;
  count: number;
};

export type FilterOptions = {
  years: number[];
  quarters: number[];
  products: string[];
  regions: string[];
};

function isActive<T>(value: T | typeof ALL | undefined): value is T {
  return value !== undefined && value !== ALL;
}

function toNumber(value: number | string): number {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  return trimmed ? Number(trimmed) : Number.NaN;
}

function compareValues(a: GroupValue, b: GroupValue): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function distinctSorted<T extends GroupValue>(values: T[]): T[] {
  return Array.from(new Set(values)).sort(compareValues);
}

/** Narrows `records` by exact equality on every active criterion, keeping input order. */
export function filterRecords(records: SalesRecord[], criteria: FilterCriteria = {}): SalesRecord[] {
  const { year, quarter, product, region } = criteria;
  const yearValue = isActive(year) ? toNumber(year) : undefined;
  const quarterValue = isActive(quarter) ? toNumber(quarter) : undefined;

  return records.filter(
    (record) =>
      (yearValue === undefined || record.year === yearValue) &&
      (quarterValue === undefined || record.quarter === quarterValue) &&
      (!isActive(product) || record.product === product) &&
      (!isActive(region) || record.region === region)
  );
}

function groupBy(records: SalesRecord[], groupKey: GroupKey): Map<GroupValue, SalesRecord[]> {
  const groups = new Map<GroupValue, SalesRecord[]>();
  for (const record of records) {
    const key = record[groupKey];
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  const keys = Array.from(groups.keys()).sort(compareValues);
  return new Map(keys.map((key) => [key, groups.get(key) ?? []]));
}

function sumOf(records: SalesRecord[], measure: Measure): number {
  return records.reduce((acc, record) => acc + record[measure], 0);
}

/** Sums `measure` per distinct value of `groupKey`; iteration order is ascending by key. */
export function aggregate(records: SalesRecord[], groupKey: GroupKey, measure: Measure): Map<GroupValue, number> {
  const result = new Map<GroupValue, number>();
  for (const [key, bucket] of groupBy(records, groupKey)) {
    result.set(key, sumOf(bucket, measure));
  }
  return result;
}

export function summarize(records: SalesRecord[], groupKey: GroupKey): SummaryRow[] {
  return Array.from(groupBy(records, groupKey), ([key, bucket]) => ({
    key,
    revenue: sumOf(bucket, 'revenue'),
    quantity: sumOf(bucket, 'quantity'),
  }));
}

export function computeTotals(records: SalesRecord[]): Totals {
  return {
    revenue: sumOf(records, 'revenue'),
    quantity: sumOf(records, 'quantity'),
    count: records.length,
  };
}

export function collectFilterOptions(records: SalesRecord[]): FilterOptions {
  return {
    years: distinctSorted(records.map((record) => record.year)),
    quarters: distinctSorted(records.map((record) => record.quarter)),
    products: distinctSorted(records.map((record) => record.product)),
    regions: distinctSorted(records.map((record) => record.region)),
  };
}
