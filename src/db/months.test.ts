import { beforeEach, describe, expect, it } from 'vitest';
import { AccountNotActiveError, MonthClosedError, MonthNotOpenError } from '../domain/errors.js';
import { openStore, type Store } from './database.js';
import { addTransaction, countTransactions, listTransactionsForMonth } from './ledger.js';
import { createBankAccount, createCreditCard, upsertFixedExpense, upsertIncomeSource } from './masterData.js';
import {
  closeMonth,
  getAccountEndingBalances,
  getAccountMonthBalances,
  getMonth,
  getMonthStatus,
  isMonthClosed,
  listKnownMonths,
  monthExists,
  oldestOpenMonth,
  openMonth,
  previousClosedEndingBalance,
  suggestStartingBalances,
} from './months.js';

let db: Store;
let checking: number;
let savings: number;
let visa: number;

beforeEach(() => {
  db = openStore(':memory:');
  checking = createBankAccount(db, { name: 'Checking', effectiveFromMonthId: '2024-01' });
  savings = createBankAccount(db, { name: 'Savings', effectiveFromMonthId: '2024-01' });
  visa = createCreditCard(db, {
    name: 'Visa',
    bankAccountId: checking,
    statementCloseDay: 20,
    dueDay: 5,
    effectiveFromMonthId: '2024-01',
  });
  upsertFixedExpense(db, { name: 'Rent', amount: 1200, dueDay: 31, subcategory: 'Housing', bankAccountId: checking });
  upsertIncomeSource(db, { name: 'Salary', amount: 4000, dueDay: 1, subcategory: 'Job', bankAccountId: checking });
});

function openFebruary(): void {
  openMonth(db, { monthId: '2024-02', accountBalances: { [checking]: 1000, [savings]: 500 } });
}

describe('openMonth', () => {
  it('creates an open month and materializes the active templates', () => {
    expect(openMonth(db, { monthId: '2024-02', accountBalances: { [checking]: 1000, [savings]: 500 } })).toBe(true);

    expect(getMonth(db, '2024-02')).toMatchObject({ starting_balance: 1500, ending_balance: null, status: 'open' });

    const txns = listTransactionsForMonth(db, '2024-02');
    expect(txns.map((t) => [t.date, t.amount, t.category, t.subcategory, t.payment_method, t.bank_account_id, t.note])).toEqual([
      ['2024-02-01', 4000, 'Income', 'Job', null, checking, 'Income: Salary'],
      ['2024-02-29', -1200, 'Fixed', 'Housing', 'debit', checking, 'Fixed expense: Rent'],
    ]);

    expect(getAccountMonthBalances(db, '2024-02')).toEqual([
      { month_id: '2024-02', bank_account_id: checking, starting_balance: 1000, ending_balance: null },
      { month_id: '2024-02', bank_account_id: savings, starting_balance: 500, ending_balance: null },
    ]);
  });

  it('is a no-op for a month that already exists', () => {
    openFebruary();
    expect(openMonth(db, { monthId: '2024-02', startingBalance: 9999 })).toBe(false);

    expect(getMonth(db, '2024-02')?.starting_balance).toBe(1500);
    expect(countTransactions(db)).toBe(2);
  });

  it('lets an explicit starting balance win over the account split', () => {
    openMonth(db, { monthId: '2024-02', startingBalance: 250, accountBalances: { [checking]: 1000 } });
    expect(getMonth(db, '2024-02')?.starting_balance).toBe(250);
  });

  it('snapshots templates: later edits only reach later months', () => {
    openFebruary();
    upsertFixedExpense(db, { name: 'Rent', amount: 1300, dueDay: 31, subcategory: 'Housing', bankAccountId: checking });
    openMonth(db, { monthId: '2024-03' });

    const rent = (month: string) =>
      listTransactionsForMonth(db, month).find((t) => t.note === 'Fixed expense: Rent');
    expect(rent('2024-02')?.amount).toBe(-1200);
    expect(rent('2024-03')?.amount).toBe(-1300);
    expect(rent('2024-03')?.date).toBe('2024-03-31');
  });

  it('writes nothing when any part of the open fails', () => {
    db.exec(`
      CREATE TRIGGER refuse_balances BEFORE INSERT ON account_month_balances
      BEGIN SELECT RAISE(ABORT, 'balance write refused'); END;
    `);
    expect(() => openMonth(db, { monthId: '2024-02', startingBalance: 0 })).toThrow(/balance write refused/);

    expect(monthExists(db, '2024-02')).toBe(false);
    expect(countTransactions(db)).toBe(0);
  });

  it('creates a balance row for every active account, defaulting to 0', () => {
    openMonth(db, { monthId: '2024-02', startingBalance: 100 });
    expect(getAccountMonthBalances(db, '2024-02').map((b) => [b.bank_account_id, b.starting_balance])).toEqual([
      [checking, 0],
      [savings, 0],
    ]);

    // salary 4000 and rent 1200 both go through checking
    closeMonth(db, '2024-02');
    expect(getAccountEndingBalances(db, '2024-02').get(checking)).toBe(2800);
    expect(suggestStartingBalances(db, '2024-03')).toEqual({ [checking]: 2800, [savings]: 0 });
  });

  it('fills in accounts left out of a partial balance list', () => {
    openMonth(db, { monthId: '2024-02', accountBalances: { [checking]: 1000 } });
    expect(getAccountMonthBalances(db, '2024-02').map((b) => [b.bank_account_id, b.starting_balance])).toEqual([
      [checking, 1000],
      [savings, 0],
    ]);
    expect(getMonth(db, '2024-02')?.starting_balance).toBe(1000);
  });

  it('rejects balances for accounts that do not apply to the month', () => {
    const later = createBankAccount(db, { name: 'Brokerage', effectiveFromMonthId: '2024-06' });

    expect(() => openMonth(db, { monthId: '2024-02', accountBalances: { [later]: 10 } })).toThrow(AccountNotActiveError);
    expect(() => openMonth(db, { monthId: '2024-02', accountBalances: { 999: 10 } })).toThrow(AccountNotActiveError);
    expect(monthExists(db, '2024-02')).toBe(false);
  });
});

describe('closeMonth', () => {
  it('freezes the aggregate and per-account ending balances', () => {
    openFebruary();
    addTransaction(db, {
      date: '2024-02-12',
      monthId: '2024-02',
      amount: -100,
      category: 'Variable',
      subcategory: 'Groceries',
      paymentMethod: 'debit',
      bankAccountId: checking,
    });
    addTransaction(db, {
      date: '2024-02-10',
      monthId: '2024-02',
      amount: -250,
      category: 'Variable',
      subcategory: 'Dining',
      paymentMethod: 'credit_card',
      creditCardId: visa,
    });

    // 1500 + 4000 - 1200 - 100 - 250
    expect(closeMonth(db, '2024-02')).toBe(3950);
    expect(getMonth(db, '2024-02')).toMatchObject({ ending_balance: 3950, status: 'closed' });

    // card charges stay out of the paying account until the bill is paid
    const endings = getAccountEndingBalances(db, '2024-02');
    expect(endings.get(checking)).toBe(3700);
    expect(endings.get(savings)).toBe(500);
  });

  it('never closes twice or reopens', () => {
    openFebruary();
    const ending = closeMonth(db, '2024-02');

    expect(() => closeMonth(db, '2024-02')).toThrow(MonthNotOpenError);
    expect(getMonth(db, '2024-02')?.ending_balance).toBe(ending);
    expect(openMonth(db, { monthId: '2024-02', startingBalance: 0 })).toBe(false);
    expect(getMonthStatus(db, '2024-02')).toBe('closed');
    expect(isMonthClosed(db, '2024-02')).toBe(true);
  });

  it('fails for a month that was never opened', () => {
    expect(() => closeMonth(db, '2024-05')).toThrow(MonthNotOpenError);
    expect(monthExists(db, '2024-05')).toBe(false);
  });

  it('guards closed months against new transactions', () => {
    openFebruary();
    closeMonth(db, '2024-02');
    const before = countTransactions(db);

    expect(() =>
      addTransaction(db, {
        date: '2024-02-14',
        monthId: '2024-02',
        amount: -20,
        category: 'Variable',
        subcategory: 'Flowers',
        paymentMethod: 'debit',
        bankAccountId: checking,
      }),
    ).toThrow(MonthClosedError);
    expect(countTransactions(db)).toBe(before);
  });
});

describe('month queries', () => {
  it('tracks known, open and previously closed months', () => {
    openFebruary();
    closeMonth(db, '2024-02');
    openMonth(db, { monthId: '2024-03', startingBalance: 3950 });
    openMonth(db, { monthId: '2024-04', startingBalance: 0 });

    expect(listKnownMonths(db)).toEqual(['2024-02', '2024-03', '2024-04']);
    expect(oldestOpenMonth(db)).toBe('2024-03');
    expect(previousClosedEndingBalance(db, '2024-04')).toBe(3950);
    expect(previousClosedEndingBalance(db, '2024-02')).toBeNull();
    expect(getMonthStatus(db, '2024-09')).toBeNull();
  });

  it('suggests carried-over or zero starting balances', () => {
    openFebruary();
    closeMonth(db, '2024-02');

    expect(suggestStartingBalances(db, '2024-03')).toEqual({ [checking]: 3700, [savings]: 500 });
    expect(suggestStartingBalances(db, '2024-03', false)).toEqual({ [checking]: 0, [savings]: 0 });
    expect(suggestStartingBalances(db, '2024-06')).toEqual({ [checking]: 0, [savings]: 0 });
  });

  it('uses the starting balance of a month that is still open', () => {
    openFebruary();
    expect(getAccountEndingBalances(db, '2024-02').get(savings)).toBe(500);
  });
});
