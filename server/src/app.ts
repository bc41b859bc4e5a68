import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { ZodError } from 'zod';
import { currentMonthId, monthId as monthIdOf, monthOptions } from '../../src/domain/calendar.js';
import { suggestTransfer, summarizeCoverage } from '../../src/domain/computations.js';
import { LedgerError, type LedgerErrorCode } from '../../src/domain/errors.js';
import type { TransactionInput } from '../../src/domain/types.js';
import type { Store } from '../../src/db/database.js';
import { exportStore } from '../../src/db/backup.js';
import { addTransaction, getTransaction, listTransactionsDueInMonth, listTransactionsForMonth } from '../../src/db/ledger.js';
import {
  createBankAccount,
  createCreditCard,
  deactivateBankAccount,
  deactivateCreditCard,
  deactivateFixedExpense,
  deactivateIncomeSource,
  listActiveBankAccountsForMonth,
  listActiveCreditCardsForMonth,
  listActiveObjectives,
  listBankAccounts,
  listCreditCards,
  listFixedExpenses,
  listIncomeSources,
  missingSetup,
  updateBankAccount,
  updateCreditCard,
  upsertFixedExpense,
  upsertIncomeSource,
  upsertObjective,
} from '../../src/db/masterData.js';
import {
  closeMonth,
  getAccountMonthBalances,
  listKnownMonths,
  oldestOpenMonth,
  openMonth,
  suggestStartingBalances,
} from '../../src/db/months.js';
import {
  checkBudgetImpact,
  compareObjectives,
  getAccountCoverage,
  getCategoryTotals,
  getHalfMonthCashflow,
  getMonthSnapshot,
  getVariableByPaymentMethod,
  previewRecurringForMonth,
} from '../../src/db/reports.js';
import {
  BankAccountSchema,
  BudgetCheckSchema,
  CarryOverQuerySchema,
  CreditCardSchema,
  IdParamSchema,
  MonthParamSchema,
  NewTransactionSchema,
  ObjectiveSchema,
  OpenMonthSchema,
  RecurringSchema,
  type NewTransaction,
} from './schemas.js';
import type { StoreRegistry } from './stores.js';

export const USER_HEADER = 'x-budget-user';

const ERROR_STATUS: Record<LedgerErrorCode, number> = {
  MONTH_CLOSED: 409,
  MONTH_NOT_OPEN: 409,
  MONTH_NOT_FOUND: 404,
  OBJECTIVE_MISSING: 422,
  NOT_FOUND: 404,
  ACCOUNT_NOT_ACTIVE: 422,
  INVALID_MONTH_ID: 400,
  INVALID_BACKUP: 400,
  INVALID_USER: 400,
};

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', issues: error.issues });
    return;
  }
  if (error instanceof LedgerError) {
    res.status(ERROR_STATUS[error.code]).json({ error: error.message, code: error.code });
    return;
  }
  console.error(`Error ${context}:`, error);
  res.status(500).json({ error: `Failed ${context}` });
}

/** Sign the amount by category and keep only the payment link that applies */
function toTransactionInput(monthId: string, tx: NewTransaction): TransactionInput {
  const base = {
    date: tx.date,
    monthId,
    category: tx.category,
    subcategory: tx.subcategory ?? null,
    note: tx.note,
    type: tx.type,
  };
  if (tx.category === 'Income') {
    return { ...base, amount: tx.amount, paymentMethod: null, bankAccountId: tx.bankAccountId ?? null };
  }
  if (tx.paymentMethod === 'credit_card') {
    return { ...base, amount: -tx.amount, paymentMethod: 'credit_card', creditCardId: tx.creditCardId ?? null };
  }
  return { ...base, amount: -tx.amount, paymentMethod: 'debit', bankAccountId: tx.bankAccountId ?? null };
}

export function createApp(registry: StoreRegistry, defaultUser = 'default') {
  const app = express();

  app.use(cors());
  app.use(express.json());

  function storeFor(req: Request): Store {
    return registry.get(req.header(USER_HEADER) ?? defaultUser);
  }

  function monthParam(req: Request): string {
    return MonthParamSchema.parse(req.params).monthId;
  }

  function idParam(req: Request): number {
    return IdParamSchema.parse(req.params).id;
  }

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/setup', (req, res) => {
    try {
      res.json({ missing: missingSetup(storeFor(req)) });
    } catch (error) {
      sendError(res, error, 'checking setup');
    }
  });

  // --- Months ---

  // GET /months - known months plus the next few, and the one to show first
  app.get('/months', (req, res) => {
    try {
      const db = storeFor(req);
      const known = listKnownMonths(db);
      const oldestOpen = oldestOpenMonth(db);
      const options = Array.from(new Set([...known, ...monthOptions(currentMonthId())])).sort();
      res.json({ known, options, defaultMonth: oldestOpen ?? currentMonthId() });
    } catch (error) {
      sendError(res, error, 'listing months');
    }
  });

  app.get('/months/:monthId', (req, res) => {
    try {
      res.json(getMonthSnapshot(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'fetching month');
    }
  });

  app.get('/months/:monthId/preview', (req, res) => {
    try {
      res.json(previewRecurringForMonth(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'previewing month');
    }
  });

  // GET /months/:monthId/opening-balances?carryOver=true|false
  app.get('/months/:monthId/opening-balances', (req, res) => {
    try {
      const { carryOver } = CarryOverQuerySchema.parse(req.query);
      res.json(suggestStartingBalances(storeFor(req), monthParam(req), carryOver));
    } catch (error) {
      sendError(res, error, 'suggesting opening balances');
    }
  });

  app.post('/months/:monthId/open', (req, res) => {
    try {
      const db = storeFor(req);
      const monthId = monthParam(req);
      const body = OpenMonthSchema.parse(req.body ?? {});
      const accountBalances: Record<number, number> = {};
      for (const [id, balance] of Object.entries(body.accountBalances)) {
        accountBalances[Number(id)] = balance;
      }
      const created = openMonth(db, { monthId, startingBalance: body.startingBalance, accountBalances });
      res.status(created ? 201 : 200).json({ created, snapshot: getMonthSnapshot(db, monthId) });
    } catch (error) {
      sendError(res, error, 'opening month');
    }
  });

  app.post('/months/:monthId/close', (req, res) => {
    try {
      const endingBalance = closeMonth(storeFor(req), monthParam(req));
      res.json({ endingBalance });
    } catch (error) {
      sendError(res, error, 'closing month');
    }
  });

  app.get('/months/:monthId/account-balances', (req, res) => {
    try {
      res.json(getAccountMonthBalances(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'fetching account balances');
    }
  });

  // --- Transactions ---

  app.get('/months/:monthId/transactions', (req, res) => {
    try {
      res.json(listTransactionsForMonth(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'fetching transactions');
    }
  });

  app.get('/months/:monthId/due-transactions', (req, res) => {
    try {
      res.json(listTransactionsDueInMonth(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'fetching due transactions');
    }
  });

  app.post('/months/:monthId/transactions', (req, res) => {
    try {
      const db = storeFor(req);
      const monthId = monthParam(req);
      const tx = NewTransactionSchema.parse(req.body);
      if (monthIdOf(tx.date) !== monthId) {
        res.status(400).json({ error: "This transaction's date does not match the selected month." });
        return;
      }
      const id = addTransaction(db, toTransactionInput(monthId, tx));
      res.status(201).json(getTransaction(db, id));
    } catch (error) {
      sendError(res, error, 'creating transaction');
    }
  });

  // --- Reports ---

  app.get('/months/:monthId/category-totals', (req, res) => {
    try {
      res.json(getCategoryTotals(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'computing category totals');
    }
  });

  app.get('/months/:monthId/objectives', (req, res) => {
    try {
      res.json(compareObjectives(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'comparing objectives');
    }
  });

  app.post('/months/:monthId/budget-check', (req, res) => {
    try {
      const { category, amount } = BudgetCheckSchema.parse(req.body);
      res.json(checkBudgetImpact(storeFor(req), monthParam(req), category, amount));
    } catch (error) {
      sendError(res, error, 'checking budget');
    }
  });

  app.get('/months/:monthId/cashflow', (req, res) => {
    try {
      res.json(getHalfMonthCashflow(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'computing cashflow');
    }
  });

  app.get('/months/:monthId/payment-methods', (req, res) => {
    try {
      res.json(getVariableByPaymentMethod(storeFor(req), monthParam(req)));
    } catch (error) {
      sendError(res, error, 'computing payment methods');
    }
  });

  app.get('/months/:monthId/coverage', (req, res) => {
    try {
      const accounts = getAccountCoverage(storeFor(req), monthParam(req));
      res.json({ accounts, total: summarizeCoverage(accounts), transfer: suggestTransfer(accounts) });
    } catch (error) {
      sendError(res, error, 'computing coverage');
    }
  });

  // --- Bank accounts ---

  // GET /bank-accounts?month=YYYY-MM - all accounts, or those applying to a month
  app.get('/bank-accounts', (req, res) => {
    try {
      const db = storeFor(req);
      const month = typeof req.query.month === 'string' ? MonthParamSchema.parse({ monthId: req.query.month }).monthId : null;
      res.json(month ? listActiveBankAccountsForMonth(db, month) : listBankAccounts(db));
    } catch (error) {
      sendError(res, error, 'fetching bank accounts');
    }
  });

  app.post('/bank-accounts', (req, res) => {
    try {
      const id = createBankAccount(storeFor(req), BankAccountSchema.parse(req.body));
      res.status(201).json({ id });
    } catch (error) {
      sendError(res, error, 'creating bank account');
    }
  });

  app.put('/bank-accounts/:id', (req, res) => {
    try {
      updateBankAccount(storeFor(req), idParam(req), BankAccountSchema.parse(req.body));
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error, 'updating bank account');
    }
  });

  app.post('/bank-accounts/:id/deactivate', (req, res) => {
    try {
      deactivateBankAccount(storeFor(req), idParam(req));
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error, 'deactivating bank account');
    }
  });

  // --- Credit cards ---

  app.get('/credit-cards', (req, res) => {
    try {
      const db = storeFor(req);
      const month = typeof req.query.month === 'string' ? MonthParamSchema.parse({ monthId: req.query.month }).monthId : null;
      res.json(month ? listActiveCreditCardsForMonth(db, month) : listCreditCards(db));
    } catch (error) {
      sendError(res, error, 'fetching credit cards');
    }
  });

  app.post('/credit-cards', (req, res) => {
    try {
      const id = createCreditCard(storeFor(req), CreditCardSchema.parse(req.body));
      res.status(201).json({ id });
    } catch (error) {
      sendError(res, error, 'creating credit card');
    }
  });

  app.put('/credit-cards/:id', (req, res) => {
    try {
      updateCreditCard(storeFor(req), idParam(req), CreditCardSchema.parse(req.body));
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error, 'updating credit card');
    }
  });

  app.post('/credit-cards/:id/deactivate', (req, res) => {
    try {
      deactivateCreditCard(storeFor(req), idParam(req));
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error, 'deactivating credit card');
    }
  });

  // --- Recurring templates ---

  app.get('/fixed-expenses', (req, res) => {
    try {
      res.json(listFixedExpenses(storeFor(req)));
    } catch (error) {
      sendError(res, error, 'fetching fixed expenses');
    }
  });

  // PUT /fixed-expenses - save a new version of the expense named in the body
  app.put('/fixed-expenses', (req, res) => {
    try {
      const id = upsertFixedExpense(storeFor(req), RecurringSchema.parse(req.body));
      res.json({ id });
    } catch (error) {
      sendError(res, error, 'saving fixed expense');
    }
  });

  app.post('/fixed-expenses/:id/deactivate', (req, res) => {
    try {
      deactivateFixedExpense(storeFor(req), idParam(req));
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error, 'deactivating fixed expense');
    }
  });

  app.get('/income-sources', (req, res) => {
    try {
      res.json(listIncomeSources(storeFor(req)));
    } catch (error) {
      sendError(res, error, 'fetching income sources');
    }
  });

  app.put('/income-sources', (req, res) => {
    try {
      const id = upsertIncomeSource(storeFor(req), RecurringSchema.parse(req.body));
      res.json({ id });
    } catch (error) {
      sendError(res, error, 'saving income source');
    }
  });

  app.post('/income-sources/:id/deactivate', (req, res) => {
    try {
      deactivateIncomeSource(storeFor(req), idParam(req));
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error, 'deactivating income source');
    }
  });

  // --- Objectives ---

  app.get('/objectives', (req, res) => {
    try {
      res.json(listActiveObjectives(storeFor(req)));
    } catch (error) {
      sendError(res, error, 'fetching objectives');
    }
  });

  app.put('/objectives', (req, res) => {
    try {
      const { category, percentage } = ObjectiveSchema.parse(req.body);
      const id = upsertObjective(storeFor(req), category, percentage);
      res.json({ id });
    } catch (error) {
      sendError(res, error, 'saving objective');
    }
  });

  // --- Backup ---

  app.get('/backup', (req, res) => {
    try {
      const user = req.header(USER_HEADER) ?? defaultUser;
      const bytes = exportStore(storeFor(req));
      const stamp = new Date().toISOString().slice(0, 10);
      res.setHeader('Content-Type', 'application/x-sqlite3');
      res.setHeader('Content-Disposition', `attachment; filename="ledger_${user}_${stamp}.db"`);
      res.send(bytes);
    } catch (error) {
      sendError(res, error, 'exporting backup');
    }
  });

  app.put('/backup', express.raw({ type: () => true, limit: '100mb' }), (req, res) => {
    try {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        res.status(400).json({ error: 'Expected the backup file as the request body' });
        return;
      }
      const user = req.header(USER_HEADER) ?? defaultUser;
      const db = registry.restore(user, body);
      res.json({ ok: true, months: listKnownMonths(db) });
    } catch (error) {
      sendError(res, error, 'restoring backup');
    }
  });

  return app;
}
