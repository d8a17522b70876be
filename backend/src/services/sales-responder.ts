import type { GroupKey, SalesRecord } from '../types/sales.js';
import { aggregate, computeTotals, type GroupValue } from './sales-query.js';

export type Intent =
  | 'revenueByYear'
  | 'revenueByQuarter'
  | 'revenueByProduct'
  | 'revenueByRegion'
  | 'totalRevenue'
  | 'totalQuantity';

type Rule = {
  intent: Intent;
  matches: (question: string) => boolean;
  answer: (records: SalesRecord[]) => string;
};

export const NO_DATA_MESSAGE = 'Non ci sono dati di vendita disponibili per la tua email.';

export const FALLBACK_MESSAGE =
  'Non ho capito la domanda. Puoi chiedere informazioni sulle tue vendite per anno, trimestre, prodotto, area, ricavo totale o quantità totale.';

export function formatCurrency(value: number): string {
  return `€${value.toFixed(2)}`;
}

const hasAll = (question: string, ...words: string[]) => words.every((word) => question.includes(word));
const hasAny = (question: string, ...words: string[]) => words.some((word) => question.includes(word));

function revenueLines(
  records: SalesRecord[],
  groupKey: GroupKey,
  heading: string,
  label: (key: GroupValue) => string = String
): string {
  const lines = Array.from(aggregate(records, groupKey, 'revenue'), ([key, revenue]) => `${label(key)}: ${formatCurrency(revenue)}`);
  return [heading, ...lines].join('\n');
}

// First match wins.
const RULES: readonly Rule[] = [
  {
    intent: 'revenueByYear',
    matches: (q) => hasAll(q, 'vendite', 'anno'),
    answer: (records) => revenueLines(records, 'year', 'Le tue vendite per anno:'),
  },
  {
    intent: 'revenueByQuarter',
    matches: (q) => hasAll(q, 'vendite', 'trimestre'),
    answer: (records) => revenueLines(records, 'quarter', 'Le tue vendite per trimestre:', (key) => `Trimestre ${key}`),
  },
  {
    intent: 'revenueByProduct',
    matches: (q) => q.includes('vendite') && hasAny(q, 'prodotto', 'articolo'),
    answer: (records) => revenueLines(records, 'product', 'Le tue vendite per prodotto:'),
  },
  {
    intent: 'revenueByRegion',
    matches: (q) => q.includes('vendite') && hasAny(q, 'area', 'geografica', 'regione'),
    answer: (records) => revenueLines(records, 'region', 'Le tue vendite per area geografica:'),
  },
  {
    intent: 'totalRevenue',
    matches: (q) => hasAll(q, 'ricavo', 'totale') || q.includes('totale ricavo'),
    answer: (records) => `Il tuo ricavo totale è di ${formatCurrency(computeTotals(records).revenue)}.`,
  },
  {
    intent: 'totalQuantity',
    matches: (q) => hasAll(q, 'quantità', 'totale') || q.includes('totale quantità'),
    answer: (records) => `La tua quantità totale venduta è di ${computeTotals(records).quantity}.`,
  },
];

export function matchIntent(question: string): Intent | null {
  const normalized = question.toLowerCase();
  return RULES.find((rule) => rule.matches(normalized))?.intent ?? null;
}

export type Answer = {
  intent: Intent | null;
  answer: string;
};

export function answerQuestion(records: SalesRecord[], question: string): Answer {
  if (records.length === 0) {
    return { intent: null, answer: NO_DATA_MESSAGE };
  }
  const normalized = question.toLowerCase();
  const rule = RULES.find((candidate) => candidate.matches(normalized));
  if (!rule) {
    return { intent: null, answer: FALLBACK_MESSAGE };
  }
  return { intent: rule.intent, answer: rule.answer(records) };
}

export function respond(records: SalesRecord[], question: string): string {
  return answerQuestion(records, question).answer;
}
