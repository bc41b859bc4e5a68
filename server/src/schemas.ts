/**
 * Request validation for the HTTP boundary. The core trusts its inputs,
 * so everything a client sends is checked here first.
 */
import { z } from 'zod';
import { isValidIsoDate, isValidMonthId } from '../../src/domain/calendar.js';

export const MonthIdSchema = z.string().refine(isValidMonthId, 'Expected a month id (YYYY-MM)');
export const IsoDateSchema = z.string().refine(isValidIsoDate, 'Expected a date (YYYY-MM-DD)');

const DaySchema = z.number().int().min(1).max(31);
const IdSchema = z.coerce.number().int().positive();

export const IdParamSchema = z.object({ id: IdSchema });

export const MonthParamSchema = z.object({ monthId: MonthIdSchema });

export const BankAccountSchema = z
  .object({
    name: z.string().trim().min(1),
    effectiveFromMonthId: MonthIdSchema,
    effectiveToMonthId: MonthIdSchema.nullish(),
    active: z.boolean().optional(),
  })
  .refine((a) => !a.effectiveToMonthId || a.effectiveToMonthId >= a.effectiveFromMonthId, {
    message: 'effectiveToMonthId must not precede effectiveFromMonthId',
    path: ['effectiveToMonthId'],
  });

export const CreditCardSchema = z
  .object({
    name: z.string().trim().min(1),
    bankAccountId: z.number().int().positive(),
    statementCloseDay: DaySchema,
    dueDay: DaySchema,
    effectiveFromMonthId: MonthIdSchema,
    effectiveToMonthId: MonthIdSchema.nullish(),
    active: z.boolean().optional(),
  })
  .refine((c) => !c.effectiveToMonthId || c.effectiveToMonthId >= c.effectiveFromMonthId, {
    message: 'effectiveToMonthId must not precede effectiveFromMonthId',
    path: ['effectiveToMonthId'],
  });

export const RecurringSchema = z.object({
  name: z.string().trim().min(1),
  amount: z.number().positive(),
  dueDay: DaySchema,
  subcategory: z.string().trim().min(1).nullish(),
  bankAccountId: z.number().int().positive().nullish(),
});

export const ObjectiveSchema = z.object({
  category: z.string().trim().min(1),
  percentage: z.number().min(0).max(1),
});

export const OpenMonthSchema = z.object({
  startingBalance: z.number().optional(),
  accountBalances: z.record(z.string().regex(/^\d+$/), z.number()).default({}),
});

/**
 * A transaction as a user enters it: a positive amount whose sign follows
 * the category, plus the account or card it was paid with.
 */
export const NewTransactionSchema = z
  .object({
    date: IsoDateSchema,
    amount: z.number().positive(),
    category: z.enum(['Income', 'Fixed', 'Variable', 'Savings']),
    subcategory: z.string().trim().min(1).nullish(),
    paymentMethod: z.enum(['debit', 'credit_card']).nullish(),
    bankAccountId: z.number().int().positive().nullish(),
    creditCardId: z.number().int().positive().nullish(),
    note: z.string().default(''),
    type: z.enum(['normal', 'correction']).default('normal'),
  })
  .superRefine((tx, ctx) => {
    if (tx.category === 'Income') {
      if (tx.bankAccountId == null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bankAccountId'], message: 'Income must be assigned to a bank account.' });
      }
      return;
    }
    if (!tx.subcategory) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['subcategory'], message: 'Subcategory is required.' });
    }
    if (tx.paymentMethod == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['paymentMethod'], message: 'Payment method is required.' });
    } else if (tx.paymentMethod === 'debit' && tx.bankAccountId == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bankAccountId'], message: 'Debit transactions must be assigned to a bank account.' });
    } else if (tx.paymentMethod === 'credit_card' && tx.creditCardId == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['creditCardId'], message: 'Credit card transactions must select a credit card.' });
    }
  });

export type NewTransaction = z.infer<typeof NewTransactionSchema>;

export const BudgetCheckSchema = z.object({
  category: z.string().trim().min(1),
  amount: z.number().positive(),
});

export const CarryOverQuerySchema = z.object({
  carryOver: z.enum(['true', 'false']).default('true').transform((v) => v === 'true'),
});
