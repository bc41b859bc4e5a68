/**
 * Read-side views over the ledger. Nothing here is cached: every call
 * recomputes from the current transaction set.
 */
import {
  budgetImpact,
  compareObjective,
  coverageRow,
  previewRecurring,
  splitByHalfMonth,
} from '../domain/computations.js';
import { MonthNotFoundError, ObjectiveMissingError } from '../domain/errors.js';
import type {
  AccountCoverage,
  BudgetImpact,
  CashflowRow,
  HalfMonthSplit,
  MonthId,
  MonthSnapshot,
  ObjectiveComparison,
  RecurringPreview,
} from '../domain/types.js';
import type { Store } from './database.js';
import {
  getActiveObjective,
  listActiveBankAccountsForMonth,
  listActiveObjectives,
  listFixedExpenses,
  listIncomeSources,
} from './masterData.js';
import { getAccountMonthBalances, getMonth } from './months.js';

function monthNet(db: Store, monthId: MonthId): number {
  const row = db.prepare<[MonthId], { net: number }>(`
    SELECT COALESCE(SUM(amount), 0) AS net FROM transactions WHERE month_id = ?
  `).get(monthId);
  return row?.net ?? 0;
}

export function getMonthSnapshot(db: Store, monthId: MonthId): MonthSnapshot {
  const month = getMonth(db, monthId);
  if (!month) throw new MonthNotFoundError(monthId);

  const net = monthNet(db, monthId);
  return {
    monthId,
    startingBalance: month.starting_balance,
    net,
    projectedEnding: month.starting_balance + net,
    endingBalance: month.ending_balance,
    status: month.status,
  };
}

/** Signed totals per category, accrual basis */
export function getCategoryTotals(db: Store, monthId: MonthId): Record<string, number> {
  const rows = db.prepare<[MonthId], { category: string; total: number }>(`
    SELECT category, COALESCE(SUM(amount), 0) AS total
    FROM transactions
    WHERE month_id = ?
    GROUP BY category
    ORDER BY category
  `).all(monthId);
  return Object.fromEntries(rows.map((r) => [r.category, r.total]));
}

function categorySum(db: Store, monthId: MonthId, category: string): number {
  const row = db.prepare<[MonthId, string], { total: number }>(`
    SELECT COALESCE(SUM(amount), 0) AS total
    FROM transactions
    WHERE month_id = ? AND category = ?
  `).get(monthId, category);
  return row?.total ?? 0;
}

export function getTotalIncome(db: Store, monthId: MonthId): number {
  return categorySum(db, monthId, 'Income');
}

export function getCategoryActual(db: Store, monthId: MonthId, category: string): number {
  return Math.abs(categorySum(db, monthId, category));
}

/** Income share set aside for a category. An undefined objective is an error, never 0. */
export function getCategoryPlanned(db: Store, monthId: MonthId, category: string): number {
  const percentage = getActiveObjective(db, category);
  if (percentage === undefined) throw new ObjectiveMissingError(category);
  return getTotalIncome(db, monthId) * percentage;
}

export function compareObjectives(db: Store, monthId: MonthId): ObjectiveComparison[] {
  const income = getTotalIncome(db, monthId);
  return Object.entries(listActiveObjectives(db)).map(([category, percentage]) =>
    compareObjective(category, percentage, income, categorySum(db, monthId, category)),
  );
}

/** Would one more expense push the category past its objective? */
export function checkBudgetImpact(db: Store, monthId: MonthId, category: string, amount: number): BudgetImpact {
  const planned = getCategoryPlanned(db, monthId, category);
  return budgetImpact(category, planned, getCategoryActual(db, monthId, category), amount);
}

/**
 * Cashflow by half-month. Debit and income rows count on their own date in
 * their own month; card charges count on their due date in the due month.
 */
export function getHalfMonthCashflow(db: Store, monthId: MonthId): HalfMonthSplit {
  const rows = db.prepare<[MonthId, MonthId], CashflowRow>(`
    SELECT category, date AS effectiveDate, amount
    FROM transactions
    WHERE month_id = ?
      AND (payment_method IS NULL OR payment_method = 'debit')
      AND category IN ('Income', 'Fixed', 'Variable', 'Savings')

    UNION ALL

    SELECT category, COALESCE(due_date, date) AS effectiveDate, amount
    FROM transactions
    WHERE COALESCE(due_month_id, month_id) = ?
      AND payment_method = 'credit_card'
      AND category IN ('Income', 'Fixed', 'Variable', 'Savings')
  `).all(monthId, monthId);
  return splitByHalfMonth(rows);
}

/** Absolute variable spending per payment method, accrual basis */
export function getVariableByPaymentMethod(db: Store, monthId: MonthId): Record<string, number> {
  const rows = db.prepare<[MonthId], { payment_method: string | null; total: number }>(`
    SELECT payment_method, ABS(SUM(amount)) AS total
    FROM transactions
    WHERE month_id = ? AND category = 'Variable'
    GROUP BY payment_method
    ORDER BY payment_method
  `).all(monthId);
  return Object.fromEntries(rows.map((r) => [r.payment_method ?? 'none', r.total]));
}

/**
 * Per active account: projected cash position against the card bills it
 * pays this month.
 */
export function getAccountCoverage(db: Store, monthId: MonthId): AccountCoverage[] {
  const accounts = listActiveBankAccountsForMonth(db, monthId);
  if (accounts.length === 0) return [];

  const starting = new Map(
    getAccountMonthBalances(db, monthId).map((b) => [b.bank_account_id, b.starting_balance]),
  );

  const cashRows = db.prepare<[MonthId], { bank_account_id: number; net: number }>(`
    SELECT bank_account_id, COALESCE(SUM(amount), 0) AS net
    FROM transactions
    WHERE month_id = ? AND bank_account_id IS NOT NULL
    GROUP BY bank_account_id
  `).all(monthId);

  const cardRows = db.prepare<[MonthId], { bank_account_id: number; net: number }>(`
    SELECT c.bank_account_id, COALESCE(SUM(t.amount), 0) AS net
    FROM transactions t
    JOIN credit_cards c ON c.id = t.credit_card_id
    WHERE COALESCE(t.due_month_id, t.month_id) = ?
    GROUP BY c.bank_account_id
  `).all(monthId);

  const cashNet = new Map(cashRows.map((r) => [r.bank_account_id, r.net]));
  const cardNet = new Map(cardRows.map((r) => [r.bank_account_id, r.net]));

  return accounts.map((acct) =>
    coverageRow(acct, starting.get(acct.id) ?? 0, cashNet.get(acct.id) ?? 0, cardNet.get(acct.id) ?? 0),
  );
}

/** What opening the month would materialize from the current templates */
export function previewRecurringForMonth(db: Store, monthId: MonthId): RecurringPreview {
  const fixed = previewRecurring(monthId, listFixedExpenses(db), -1);
  const income = previewRecurring(monthId, listIncomeSources(db), 1);
  return {
    fixedExpenses: fixed.rows,
    fixedTotal: fixed.total,
    income: income.rows,
    incomeTotal: income.total,
  };
}
