/**
 * Master data: bank accounts, credit cards, recurring templates and
 * budget objectives.
 *
 * Accounts and cards are edited in place and soft-deactivated, never
 * deleted. Templates and objectives are versioned: saving one retires the
 * current active version and appends a new one.
 */
import { NotFoundError } from '../domain/errors.js';
import type {
  BankAccountInput,
  CreditCardInput,
  MonthId,
  RecurringInput,
  SetupItem,
} from '../domain/types.js';
import type { DbBankAccount, DbCreditCard, DbRecurring, Store } from './database.js';

function flag(active: boolean | undefined): number {
  return active === false ? 0 : 1;
}

function assertChanged(changes: number, entity: string, id: number): void {
  if (changes === 0) throw new NotFoundError(entity, id);
}

function exists(db: Store, table: string): boolean {
  return db.prepare(`SELECT 1 FROM ${table} WHERE active = 1 LIMIT 1`).get() !== undefined;
}

// --- Bank accounts ---

export function listBankAccounts(db: Store): DbBankAccount[] {
  return db.prepare<[], DbBankAccount>(`
    SELECT id, name, active, effective_from_month_id, effective_to_month_id
    FROM bank_accounts
    ORDER BY name
  `).all();
}

export function getBankAccount(db: Store, id: number): DbBankAccount | undefined {
  return db.prepare<[number], DbBankAccount>(`
    SELECT id, name, active, effective_from_month_id, effective_to_month_id
    FROM bank_accounts
    WHERE id = ?
  `).get(id);
}

/** Active accounts whose effective range contains the month */
export function listActiveBankAccountsForMonth(db: Store, monthId: MonthId): DbBankAccount[] {
  return db.prepare<[MonthId, MonthId], DbBankAccount>(`
    SELECT id, name, active, effective_from_month_id, effective_to_month_id
    FROM bank_accounts
    WHERE active = 1
      AND effective_from_month_id <= ?
      AND (effective_to_month_id IS NULL OR effective_to_month_id >= ?)
    ORDER BY name
  `).all(monthId, monthId);
}

export function hasBankAccounts(db: Store): boolean {
  return exists(db, 'bank_accounts');
}

export function createBankAccount(db: Store, input: BankAccountInput): number {
  const result = db.prepare(`
    INSERT INTO bank_accounts (name, active, effective_from_month_id, effective_to_month_id)
    VALUES (?, ?, ?, ?)
  `).run(input.name, flag(input.active), input.effectiveFromMonthId, input.effectiveToMonthId ?? null);
  return Number(result.lastInsertRowid);
}

export function updateBankAccount(db: Store, id: number, input: BankAccountInput): void {
  const result = db.prepare(`
    UPDATE bank_accounts
    SET name = ?, active = ?, effective_from_month_id = ?, effective_to_month_id = ?
    WHERE id = ?
  `).run(input.name, flag(input.active), input.effectiveFromMonthId, input.effectiveToMonthId ?? null, id);
  assertChanged(result.changes, 'Bank account', id);
}

export function deactivateBankAccount(db: Store, id: number): void {
  const result = db.prepare('UPDATE bank_accounts SET active = 0 WHERE id = ?').run(id);
  assertChanged(result.changes, 'Bank account', id);
}

// --- Credit cards ---

export type ActiveCreditCard = Omit<DbCreditCard, 'active' | 'effective_from_month_id' | 'effective_to_month_id'> & {
  bank_account_name: string;
};

const CARD_COLUMNS = `
  id, name, bank_account_id, statement_close_day, due_day,
  active, effective_from_month_id, effective_to_month_id
`;

export function listCreditCards(db: Store): DbCreditCard[] {
  return db.prepare<[], DbCreditCard>(`SELECT ${CARD_COLUMNS} FROM credit_cards ORDER BY name`).all();
}

export function getCreditCard(db: Store, id: number): DbCreditCard | undefined {
  return db.prepare<[number], DbCreditCard>(`SELECT ${CARD_COLUMNS} FROM credit_cards WHERE id = ?`).get(id);
}

/** Cards usable in a month: the card and its paying account must both apply */
export function listActiveCreditCardsForMonth(db: Store, monthId: MonthId): ActiveCreditCard[] {
  return db.prepare<MonthId[], ActiveCreditCard>(`
    SELECT
      c.id,
      c.name,
      c.bank_account_id,
      c.statement_close_day,
      c.due_day,
      b.name AS bank_account_name
    FROM credit_cards c
    JOIN bank_accounts b ON b.id = c.bank_account_id
    WHERE c.active = 1
      AND b.active = 1
      AND c.effective_from_month_id <= ?
      AND (c.effective_to_month_id IS NULL OR c.effective_to_month_id >= ?)
      AND b.effective_from_month_id <= ?
      AND (b.effective_to_month_id IS NULL OR b.effective_to_month_id >= ?)
    ORDER BY c.name
  `).all(monthId, monthId, monthId, monthId);
}

export function createCreditCard(db: Store, input: CreditCardInput): number {
  const result = db.prepare(`
    INSERT INTO credit_cards (
      name, bank_account_id, statement_close_day, due_day,
      active, effective_from_month_id, effective_to_month_id
    )
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    input.name,
    input.bankAccountId,
    input.statementCloseDay,
    input.dueDay,
    flag(input.active),
    input.effectiveFromMonthId,
    input.effectiveToMonthId ?? null,
  );
  return Number(result.lastInsertRowid);
}

export function updateCreditCard(db: Store, id: number, input: CreditCardInput): void {
  const result = db.prepare(`
    UPDATE credit_cards
    SET name = ?, bank_account_id = ?, statement_close_day = ?, due_day = ?,
        active = ?, effective_from_month_id = ?, effective_to_month_id = ?
    WHERE id = ?
  `).run(
    input.name,
    input.bankAccountId,
    input.statementCloseDay,
    input.dueDay,
    flag(input.active),
    input.effectiveFromMonthId,
    input.effectiveToMonthId ?? null,
    id,
  );
  assertChanged(result.changes, 'Credit card', id);
}

export function deactivateCreditCard(db: Store, id: number): void {
  const result = db.prepare('UPDATE credit_cards SET active = 0 WHERE id = ?').run(id);
  assertChanged(result.changes, 'Credit card', id);
}

// --- Recurring templates ---

type RecurringTable = 'fixed_expenses' | 'income_sources';

const RECURRING_CATEGORY: Record<RecurringTable, string> = {
  fixed_expenses: 'Fixed',
  income_sources: 'Income',
};

function listActiveRecurring(db: Store, table: RecurringTable): DbRecurring[] {
  return db.prepare<[], DbRecurring>(`
    SELECT id, name, amount, due_day, category, subcategory, bank_account_id, active, created_at
    FROM ${table}
    WHERE active = 1
    ORDER BY due_day, id
  `).all();
}

function recurringHistory(db: Store, table: RecurringTable, name: string, subcategory: string | null): DbRecurring[] {
  return db.prepare<[string, string | null], DbRecurring>(`
    SELECT id, name, amount, due_day, category, subcategory, bank_account_id, active, created_at
    FROM ${table}
    WHERE name = ? AND COALESCE(subcategory, '') = COALESCE(?, '')
    ORDER BY id DESC
  `).all(name, subcategory);
}

function upsertRecurring(db: Store, table: RecurringTable, input: RecurringInput): number {
  const subcategory = input.subcategory ?? null;
  const replace = db.transaction(() => {
    db.prepare(`
      UPDATE ${table}
      SET active = 0
      WHERE name = ?
        AND COALESCE(subcategory, '') = COALESCE(?, '')
        AND active = 1
    `).run(input.name, subcategory);

    const result = db.prepare(`
      INSERT INTO ${table} (name, amount, due_day, category, subcategory, bank_account_id)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      input.name,
      Math.abs(input.amount),
      input.dueDay,
      RECURRING_CATEGORY[table],
      subcategory,
      input.bankAccountId ?? null,
    );
    return Number(result.lastInsertRowid);
  });
  return replace();
}

function deactivateRecurring(db: Store, table: RecurringTable, id: number, entity: string): void {
  const result = db.prepare(`UPDATE ${table} SET active = 0 WHERE id = ? AND active = 1`).run(id);
  assertChanged(result.changes, entity, id);
}

export function listFixedExpenses(db: Store): DbRecurring[] {
  return listActiveRecurring(db, 'fixed_expenses');
}

export function upsertFixedExpense(db: Store, input: RecurringInput): number {
  return upsertRecurring(db, 'fixed_expenses', input);
}

export function deactivateFixedExpense(db: Store, id: number): void {
  deactivateRecurring(db, 'fixed_expenses', id, 'Fixed expense');
}

export function hasFixedExpenses(db: Store): boolean {
  return exists(db, 'fixed_expenses');
}

/** Every saved version of a fixed expense, newest first */
export function fixedExpenseHistory(db: Store, name: string, subcategory: string | null = null): DbRecurring[] {
  return recurringHistory(db, 'fixed_expenses', name, subcategory);
}

export function listIncomeSources(db: Store): DbRecurring[] {
  return listActiveRecurring(db, 'income_sources');
}

export function upsertIncomeSource(db: Store, input: RecurringInput): number {
  return upsertRecurring(db, 'income_sources', input);
}

export function deactivateIncomeSource(db: Store, id: number): void {
  deactivateRecurring(db, 'income_sources', id, 'Income source');
}

export function hasIncomeSources(db: Store): boolean {
  return exists(db, 'income_sources');
}

export function incomeSourceHistory(db: Store, name: string, subcategory: string | null = null): DbRecurring[] {
  return recurringHistory(db, 'income_sources', name, subcategory);
}

// --- Budget objectives ---

/** Active objective fraction per category */
export function listActiveObjectives(db: Store): Record<string, number> {
  const rows = db.prepare<[], { category: string; percentage: number }>(`
    SELECT category, percentage
    FROM budget_objectives
    WHERE active = 1
    ORDER BY category
  `).all();
  return Object.fromEntries(rows.map((r) => [r.category, r.percentage]));
}

export function getActiveObjective(db: Store, category: string): number | undefined {
  const row = db.prepare<[string], { percentage: number }>(`
    SELECT percentage FROM budget_objectives WHERE category = ? AND active = 1
  `).get(category);
  return row?.percentage;
}

export function upsertObjective(db: Store, category: string, percentage: number): number {
  const replace = db.transaction(() => {
    db.prepare('UPDATE budget_objectives SET active = 0 WHERE category = ? AND active = 1').run(category);
    const result = db.prepare(`
      INSERT INTO budget_objectives (category, percentage, active)
      VALUES (?, ?, 1)
    `).run(category, percentage);
    return Number(result.lastInsertRowid);
  });
  return replace();
}

export function hasObjectives(db: Store): boolean {
  return exists(db, 'budget_objectives');
}

// --- Setup ---

/** Pieces of configuration still missing before a month can be opened */
export function missingSetup(db: Store): SetupItem[] {
  const missing: SetupItem[] = [];
  if (!hasFixedExpenses(db)) missing.push('fixed expenses');
  if (!hasIncomeSources(db)) missing.push('income sources');
  if (!hasObjectives(db)) missing.push('budget objectives');
  if (!hasBankAccounts(db)) missing.push('bank accounts');
  return missing;
}
