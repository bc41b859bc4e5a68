/**
 * Month lifecycle: unopened → open → closed.
 *
 * Opening a month snapshots the active recurring templates into
 * transactions and records starting balances. Closing freezes the ending
 * balance of the month and of every account in it. There is no way back
 * from closed.
 */
import { dateInMonth, previousMonthId } from '../domain/calendar.js';
import { AccountNotActiveError, MonthNotOpenError } from '../domain/errors.js';
import type { MonthId, MonthStatus, OpenMonthInput } from '../domain/types.js';
import type { DbAccountMonthBalance, DbMonth, Store } from './database.js';
import { addTransaction } from './ledger.js';
import { listActiveBankAccountsForMonth, listFixedExpenses, listIncomeSources } from './masterData.js';

// --- Month queries ---

export function getMonth(db: Store, monthId: MonthId): DbMonth | undefined {
  return db.prepare<[MonthId], DbMonth>(`
    SELECT month_id, starting_balance, ending_balance, status, created_at
    FROM months
    WHERE month_id = ?
  `).get(monthId);
}

export function monthExists(db: Store, monthId: MonthId): boolean {
  return getMonth(db, monthId) !== undefined;
}

export function getMonthStatus(db: Store, monthId: MonthId): MonthStatus | null {
  return getMonth(db, monthId)?.status ?? null;
}

export function isMonthClosed(db: Store, monthId: MonthId): boolean {
  return getMonthStatus(db, monthId) === 'closed';
}

export function listKnownMonths(db: Store): MonthId[] {
  return db.prepare<[], { month_id: string }>('SELECT month_id FROM months ORDER BY month_id')
    .all()
    .map((r) => r.month_id);
}

/** The month a user most likely still has to work on */
export function oldestOpenMonth(db: Store): MonthId | null {
  const row = db.prepare<[], { month_id: string }>(`
    SELECT month_id FROM months WHERE status = 'open' ORDER BY month_id ASC LIMIT 1
  `).get();
  return row?.month_id ?? null;
}

/** Ending balance of the latest closed month before `monthId` */
export function previousClosedEndingBalance(db: Store, monthId: MonthId): number | null {
  const row = db.prepare<[MonthId], { ending_balance: number | null }>(`
    SELECT ending_balance
    FROM months
    WHERE month_id < ? AND status = 'closed'
    ORDER BY month_id DESC
    LIMIT 1
  `).get(monthId);
  return row?.ending_balance ?? null;
}

// --- Account balances ---

export function getAccountMonthBalances(db: Store, monthId: MonthId): DbAccountMonthBalance[] {
  return db.prepare<[MonthId], DbAccountMonthBalance>(`
    SELECT month_id, bank_account_id, starting_balance, ending_balance
    FROM account_month_balances
    WHERE month_id = ?
    ORDER BY bank_account_id
  `).all(monthId);
}

/** Per-account closing balance, falling back to the opening one while the month is open */
export function getAccountEndingBalances(db: Store, monthId: MonthId): Map<number, number> {
  const rows = db.prepare<[MonthId], { bank_account_id: number; balance: number }>(`
    SELECT bank_account_id, COALESCE(ending_balance, starting_balance) AS balance
    FROM account_month_balances
    WHERE month_id = ?
  `).all(monthId);
  return new Map(rows.map((r) => [r.bank_account_id, r.balance]));
}

export function setAccountMonthBalances(db: Store, monthId: MonthId, balances: Record<number, number>): void {
  const stmt = db.prepare(`
    INSERT INTO account_month_balances (month_id, bank_account_id, starting_balance)
    VALUES (?, ?, ?)
    ON CONFLICT(month_id, bank_account_id)
    DO UPDATE SET starting_balance = excluded.starting_balance
  `);
  const upsertAll = db.transaction((entries: [string, number][]) => {
    for (const [accountId, balance] of entries) {
      stmt.run(monthId, Number(accountId), balance);
    }
  });
  upsertAll(Object.entries(balances));
}

/**
 * Default opening balance per active account: last month's closing
 * balance when carrying over, otherwise 0.
 */
export function suggestStartingBalances(db: Store, monthId: MonthId, carryOver = true): Record<number, number> {
  const prevMonth = previousMonthId(monthId);
  const previous = carryOver && monthExists(db, prevMonth)
    ? getAccountEndingBalances(db, prevMonth)
    : new Map<number, number>();

  const suggested: Record<number, number> = {};
  for (const account of listActiveBankAccountsForMonth(db, monthId)) {
    suggested[account.id] = previous.get(account.id) ?? 0;
  }
  return suggested;
}

// --- Lifecycle ---

/**
 * Open a month. Returns false (and changes nothing) when it already exists.
 *
 * Templates are read at call time; the resulting transactions are a
 * snapshot and do not follow later template edits. Every account active
 * in the month gets a balance row, starting at 0 unless given.
 */
export function openMonth(db: Store, input: OpenMonthInput): boolean {
  const { monthId } = input;
  if (monthExists(db, monthId)) return false;

  const given = input.accountBalances ?? {};
  const activeIds = new Set(listActiveBankAccountsForMonth(db, monthId).map((a) => a.id));
  for (const id of Object.keys(given).map(Number)) {
    if (!activeIds.has(id)) throw new AccountNotActiveError(id, monthId);
  }

  const accountBalances: Record<number, number> = {};
  for (const id of activeIds) {
    accountBalances[id] = given[id] ?? 0;
  }
  const startingBalance = input.startingBalance
    ?? Object.values(accountBalances).reduce((sum, b) => sum + b, 0);

  const open = db.transaction(() => {
    db.prepare(`
      INSERT INTO months (month_id, starting_balance, status)
      VALUES (?, ?, 'open')
    `).run(monthId, startingBalance);

    for (const fx of listFixedExpenses(db)) {
      addTransaction(db, {
        date: dateInMonth(monthId, fx.due_day),
        monthId,
        amount: -Math.abs(fx.amount),
        category: fx.category,
        subcategory: fx.subcategory,
        paymentMethod: 'debit',
        bankAccountId: fx.bank_account_id,
        note: `Fixed expense: ${fx.name}`,
      });
    }

    for (const inc of listIncomeSources(db)) {
      addTransaction(db, {
        date: dateInMonth(monthId, inc.due_day),
        monthId,
        amount: Math.abs(inc.amount),
        category: 'Income',
        subcategory: inc.subcategory,
        paymentMethod: null,
        bankAccountId: inc.bank_account_id,
        note: `Income: ${inc.name}`,
      });
    }

    setAccountMonthBalances(db, monthId, accountBalances);
  });

  open();
  console.log(`[store] Opened month ${monthId} with starting balance ${startingBalance}`);
  return true;
}

/**
 * Close an open month and return its ending balance.
 * Account balances only count transactions tagged with the account itself,
 * so card charges stay out until the card bill is paid.
 */
export function closeMonth(db: Store, monthId: MonthId): number {
  const close = db.transaction((): number => {
    const month = db.prepare<[MonthId], { starting_balance: number }>(`
      SELECT starting_balance FROM months WHERE month_id = ? AND status = 'open'
    `).get(monthId);
    if (!month) throw new MonthNotOpenError(monthId);

    const { net } = db.prepare<[MonthId], { net: number }>(`
      SELECT COALESCE(SUM(amount), 0) AS net FROM transactions WHERE month_id = ?
    `).get(monthId) ?? { net: 0 };

    const endingBalance = month.starting_balance + net;

    db.prepare(`
      UPDATE months SET ending_balance = ?, status = 'closed' WHERE month_id = ?
    `).run(endingBalance, monthId);

    db.prepare(`
      UPDATE account_month_balances
      SET ending_balance = starting_balance + (
        SELECT COALESCE(SUM(t.amount), 0)
        FROM transactions t
        WHERE t.month_id = account_month_balances.month_id
          AND t.bank_account_id = account_month_balances.bank_account_id
      )
      WHERE month_id = ?
    `).run(monthId);

    return endingBalance;
  });

  const endingBalance = close();
  console.log(`[store] Closed month ${monthId} with ending balance ${endingBalance}`);
  return endingBalance;
}
