/**
 * Pure ledger computations.
 * No DB and no IO.
 */
import { dateInMonth, halfOfMonth } from './calendar.js';
import {
  CASHFLOW_CATEGORIES,
  type AccountCoverage,
  type BudgetImpact,
  type CashflowCategory,
  type CashflowRow,
  type CoverageSummary,
  type HalfMonthSplit,
  type MonthId,
  type ObjectiveComparison,
  type RecurringPreviewRow,
  type TransferSuggestion,
} from './types.js';

const CASHFLOW_CATEGORY_SET: ReadonlySet<string> = new Set(CASHFLOW_CATEGORIES);

function isCashflowCategory(category: string): category is CashflowCategory {
  return CASHFLOW_CATEGORY_SET.has(category);
}

export function emptyHalfMonthSplit(): HalfMonthSplit {
  return {
    Income: { first: 0, second: 0 },
    Fixed: { first: 0, second: 0 },
    Variable: { first: 0, second: 0 },
    Savings: { first: 0, second: 0 },
  };
}

/**
 * Bucket cash-timeline rows into the two halves of the month.
 * Income is summed as signed amounts; outflow buckets as absolute values.
 * Rows without an effective date or outside the four buckets are ignored.
 */
export function splitByHalfMonth(rows: CashflowRow[]): HalfMonthSplit {
  const splits = emptyHalfMonthSplit();
  for (const row of rows) {
    if (!row.effectiveDate || !isCashflowCategory(row.category)) continue;
    const half = halfOfMonth(row.effectiveDate);
    splits[row.category][half] += row.category === 'Income' ? row.amount : Math.abs(row.amount);
  }
  return splits;
}

/**
 * Coverage of one account:
 * projected = starting + cash net, due = outstanding card charges it pays.
 */
export function coverageRow(
  account: { id: number; name: string },
  startingBalance: number,
  cashNet: number,
  cardNet: number,
): AccountCoverage {
  const projectedBalance = startingBalance + cashNet;
  const cardDue = Math.max(0, -cardNet);
  return {
    bankAccountId: account.id,
    bankAccountName: account.name,
    projectedBalance,
    cardDue,
    shortfall: Math.max(0, cardDue - projectedBalance),
  };
}

export function summarizeCoverage(rows: AccountCoverage[]): CoverageSummary {
  return rows.reduce<CoverageSummary>(
    (acc, r) => ({
      projectedBalance: acc.projectedBalance + r.projectedBalance,
      cardDue: acc.cardDue + r.cardDue,
      shortfall: acc.shortfall + r.shortfall,
    }),
    { projectedBalance: 0, cardDue: 0, shortfall: 0 },
  );
}

/**
 * Suggest moving money from the account with the highest projected balance
 * to the one with the highest shortfall. Returns null when nothing is short.
 */
export function suggestTransfer(rows: AccountCoverage[]): TransferSuggestion | null {
  const totalShortfall = rows.reduce((sum, r) => sum + r.shortfall, 0);
  if (totalShortfall <= 0) return null;

  let donor = rows[0];
  let receiver = rows[0];
  for (const r of rows) {
    if (r.projectedBalance > donor.projectedBalance) donor = r;
    if (r.shortfall > receiver.shortfall) receiver = r;
  }

  return {
    totalShortfall,
    donor: donor.projectedBalance > 0 ? donor : null,
    receiver,
  };
}

export function compareObjective(
  category: string,
  percentage: number,
  totalIncome: number,
  categorySum: number,
): ObjectiveComparison {
  const planned = totalIncome * percentage;
  const actual = Math.abs(categorySum);
  return { category, percentage, planned, actual, delta: planned - actual };
}

/** What the category would look like after one more expense of `amount` */
export function budgetImpact(
  category: string,
  planned: number,
  actual: number,
  amount: number,
): BudgetImpact {
  const simulated = actual + Math.abs(amount);
  return { category, planned, actual, simulated, exceeds: simulated > planned };
}

/** Dated, signed rows a month-open would materialize from templates */
export function previewRecurring(
  monthId: MonthId,
  templates: { name: string; amount: number; due_day: number; subcategory: string | null }[],
  sign: 1 | -1,
): { rows: RecurringPreviewRow[]; total: number } {
  const rows = templates.map((t) => ({
    date: dateInMonth(monthId, t.due_day),
    name: t.name,
    subcategory: t.subcategory,
    amount: sign * Math.abs(t.amount),
  }));
  return { rows, total: rows.reduce((sum, r) => sum + r.amount, 0) };
}
