/**
 * Ledger store: append-only transactions.
 *
 * Each row lives on two timelines: its accrual month (`month_id`) and its
 * cash month (`due_month_id` for card charges, otherwise `month_id`).
 * The two query paths below are kept separate on purpose.
 */
import { creditCardCycle } from '../domain/calendar.js';
import { MonthClosedError, MonthNotFoundError, NotFoundError } from '../domain/errors.js';
import type { CreditCardCycle, MonthId, TransactionInput } from '../domain/types.js';
import type { DbTransaction, Store } from './database.js';
import { getCreditCard } from './masterData.js';
import { getMonth } from './months.js';

const TRANSACTION_COLUMNS = `
  id, date, month_id, amount, category, subcategory, payment_method, note, type,
  bank_account_id, credit_card_id, statement_month_id, due_month_id, due_date, created_at
`;

/** Statement/due attribution for a card charge, from the card's own cycle days */
function resolveCycle(db: Store, input: TransactionInput): CreditCardCycle | null {
  if (input.paymentMethod !== 'credit_card' || input.creditCardId == null) return null;
  if (input.statementMonthId && input.dueMonthId && input.dueDate) {
    return {
      statementMonthId: input.statementMonthId,
      dueMonthId: input.dueMonthId,
      dueDate: input.dueDate,
    };
  }
  const card = getCreditCard(db, input.creditCardId);
  if (!card) throw new NotFoundError('Credit card', input.creditCardId);
  return creditCardCycle(input.date, card.statement_close_day, card.due_day);
}

/**
 * Insert one transaction into an open month. Closed months reject every
 * write; corrections go into a month that is still open.
 */
export function addTransaction(db: Store, input: TransactionInput): number {
  const month = getMonth(db, input.monthId);
  if (!month) throw new MonthNotFoundError(input.monthId);
  if (month.status === 'closed') throw new MonthClosedError(input.monthId);

  const cycle = resolveCycle(db, input);
  const result = db.prepare(`
    INSERT INTO transactions (
      date, month_id, amount, category, subcategory, payment_method, note, type,
      bank_account_id, credit_card_id, statement_month_id, due_month_id, due_date
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    input.date,
    input.monthId,
    input.amount,
    input.category,
    input.subcategory ?? null,
    input.paymentMethod ?? null,
    input.note ?? '',
    input.type ?? 'normal',
    input.bankAccountId ?? null,
    input.creditCardId ?? null,
    cycle?.statementMonthId ?? null,
    cycle?.dueMonthId ?? null,
    cycle?.dueDate ?? null,
  );
  return Number(result.lastInsertRowid);
}

export function getTransaction(db: Store, id: number): DbTransaction | undefined {
  return db.prepare<[number], DbTransaction>(`SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = ?`).get(id);
}

/** Accrual view: everything dated in the month */
export function listTransactionsForMonth(db: Store, monthId: MonthId): DbTransaction[] {
  return db.prepare<[MonthId], DbTransaction>(`
    SELECT ${TRANSACTION_COLUMNS}
    FROM transactions
    WHERE month_id = ?
    ORDER BY date, category, subcategory, id
  `).all(monthId);
}

/** Cash view: everything whose money moves in the month */
export function listTransactionsDueInMonth(db: Store, monthId: MonthId): DbTransaction[] {
  return db.prepare<[MonthId], DbTransaction>(`
    SELECT ${TRANSACTION_COLUMNS}
    FROM transactions
    WHERE COALESCE(due_month_id, month_id) = ?
    ORDER BY COALESCE(due_date, date), category, subcategory, id
  `).all(monthId);
}

export function countTransactions(db: Store): number {
  const row = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM transactions').get();
  return row?.n ?? 0;
}
