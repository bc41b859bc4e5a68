/**
 * Domain types for the monthly ledger.
 * Pure data. No DB or IO.
 */

/** YYYY-MM string */
export type MonthId = string;

/** YYYY-MM-DD string */
export type IsoDate = string;

export type MonthStatus = 'open' | 'closed';

export type PaymentMethod = 'debit' | 'credit_card';

export type TransactionType = 'normal' | 'correction';

/** Categories the half-month cashflow view buckets by */
export const CASHFLOW_CATEGORIES = ['Income', 'Fixed', 'Variable', 'Savings'] as const;
export type CashflowCategory = (typeof CASHFLOW_CATEGORIES)[number];

export type MonthHalf = 'first' | 'second';

export interface CreditCardCycle {
  statementMonthId: MonthId;
  dueMonthId: MonthId;
  dueDate: IsoDate;
}

/** Input for a single ledger entry */
export interface TransactionInput {
  date: IsoDate;
  monthId: MonthId;
  amount: number;              // positive = inflow, negative = outflow
  category: string;
  subcategory?: string | null;
  paymentMethod?: PaymentMethod | null; // null for income
  bankAccountId?: number | null;
  creditCardId?: number | null;
  statementMonthId?: MonthId | null;
  dueMonthId?: MonthId | null;
  dueDate?: IsoDate | null;
  note?: string;
  type?: TransactionType;
}

export interface BankAccountInput {
  name: string;
  effectiveFromMonthId: MonthId;
  effectiveToMonthId?: MonthId | null;
  active?: boolean;
}

export interface CreditCardInput {
  name: string;
  bankAccountId: number;
  statementCloseDay: number;
  dueDay: number;
  effectiveFromMonthId: MonthId;
  effectiveToMonthId?: MonthId | null;
  active?: boolean;
}

/** Recurring fixed expense or income source definition */
export interface RecurringInput {
  name: string;
  amount: number;
  dueDay: number;
  subcategory?: string | null;
  bankAccountId?: number | null;
}

export interface OpenMonthInput {
  monthId: MonthId;
  startingBalance?: number;
  accountBalances?: Record<number, number>;
}

export interface MonthSnapshot {
  monthId: MonthId;
  startingBalance: number;
  net: number;
  projectedEnding: number;
  endingBalance: number | null;
  status: MonthStatus;
}

export interface ObjectiveComparison {
  category: string;
  percentage: number;
  planned: number;
  actual: number;
  delta: number;               // positive = remaining, negative = over
}

export interface BudgetImpact {
  category: string;
  planned: number;
  actual: number;
  simulated: number;
  exceeds: boolean;
}

export type HalfMonthSplit = Record<CashflowCategory, Record<MonthHalf, number>>;

/** A ledger row positioned on the cash timeline */
export interface CashflowRow {
  category: string;
  effectiveDate: IsoDate | null;
  amount: number;
}

export interface AccountCoverage {
  bankAccountId: number;
  bankAccountName: string;
  projectedBalance: number;
  cardDue: number;
  shortfall: number;
}

export interface CoverageSummary {
  projectedBalance: number;
  cardDue: number;
  shortfall: number;
}

export interface TransferSuggestion {
  totalShortfall: number;
  donor: AccountCoverage | null; // null when no account has a positive projection
  receiver: AccountCoverage;
}

export interface RecurringPreviewRow {
  date: IsoDate;
  name: string;
  subcategory: string | null;
  amount: number;
}

export interface RecurringPreview {
  fixedExpenses: RecurringPreviewRow[];
  fixedTotal: number;
  income: RecurringPreviewRow[];
  incomeTotal: number;
}

export type SetupItem = 'fixed expenses' | 'income sources' | 'budget objectives' | 'bank accounts';
