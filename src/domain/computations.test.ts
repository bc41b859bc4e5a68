import { describe, expect, it } from 'vitest';
import {
  budgetImpact,
  compareObjective,
  coverageRow,
  previewRecurring,
  splitByHalfMonth,
  suggestTransfer,
  summarizeCoverage,
} from './computations.js';
import type { AccountCoverage } from './types.js';

function coverage(overrides: Partial<AccountCoverage>): AccountCoverage {
  return {
    bankAccountId: 1,
    bankAccountName: 'Checking',
    projectedBalance: 0,
    cardDue: 0,
    shortfall: 0,
    ...overrides,
  };
}

describe('splitByHalfMonth', () => {
  it('buckets by effective day, signed income and absolute outflows', () => {
    const splits = splitByHalfMonth([
      { category: 'Income', effectiveDate: '2024-03-01', amount: 3000 },
      { category: 'Income', effectiveDate: '2024-03-20', amount: -100 },
      { category: 'Fixed', effectiveDate: '2024-03-15', amount: -1200 },
      { category: 'Variable', effectiveDate: '2024-03-16', amount: -50 },
      { category: 'Savings', effectiveDate: '2024-03-31', amount: -200 },
    ]);

    expect(splits).toEqual({
      Income: { first: 3000, second: -100 },
      Fixed: { first: 1200, second: 0 },
      Variable: { first: 0, second: 50 },
      Savings: { first: 0, second: 200 },
    });
  });

  it('ignores rows without a date or outside the cashflow buckets', () => {
    const splits = splitByHalfMonth([
      { category: 'Variable', effectiveDate: null, amount: -75 },
      { category: 'Transfer', effectiveDate: '2024-03-02', amount: -75 },
    ]);

    expect(splits.Variable).toEqual({ first: 0, second: 0 });
    expect(Object.keys(splits)).toEqual(['Income', 'Fixed', 'Variable', 'Savings']);
  });
});

describe('coverage', () => {
  it('computes projection, card due and shortfall', () => {
    expect(coverageRow({ id: 1, name: 'Checking' }, 1000, -300, -900)).toEqual({
      bankAccountId: 1,
      bankAccountName: 'Checking',
      projectedBalance: 700,
      cardDue: 900,
      shortfall: 200,
    });
  });

  it('treats a net card credit as nothing due', () => {
    const row = coverageRow({ id: 2, name: 'Savings' }, 50, 0, 40);
    expect(row.cardDue).toBe(0);
    expect(row.shortfall).toBe(0);
  });

  it('sums the accounts', () => {
    const rows = [
      coverage({ projectedBalance: 700, cardDue: 900, shortfall: 200 }),
      coverage({ bankAccountId: 2, projectedBalance: 5000 }),
    ];
    expect(summarizeCoverage(rows)).toEqual({ projectedBalance: 5700, cardDue: 900, shortfall: 200 });
  });

  it('suggests moving money from the richest account to the shortest one', () => {
    const short = coverage({ bankAccountId: 1, projectedBalance: 700, cardDue: 900, shortfall: 200 });
    const rich = coverage({ bankAccountId: 2, bankAccountName: 'Savings', projectedBalance: 5000 });

    expect(suggestTransfer([short, rich])).toEqual({ totalShortfall: 200, donor: rich, receiver: short });
  });

  it('has no donor when no account is positive', () => {
    const short = coverage({ projectedBalance: -100, cardDue: 50, shortfall: 150 });
    expect(suggestTransfer([short])).toEqual({ totalShortfall: 150, donor: null, receiver: short });
  });

  it('suggests nothing when every bill is covered', () => {
    expect(suggestTransfer([coverage({ projectedBalance: 10 })])).toBeNull();
    expect(suggestTransfer([])).toBeNull();
  });
});

describe('objectives', () => {
  it('compares planned share of income with actual spending', () => {
    expect(compareObjective('Variable', 0.25, 4000, -1200)).toEqual({
      category: 'Variable',
      percentage: 0.25,
      planned: 1000,
      actual: 1200,
      delta: -200,
    });
  });

  it('flags an expense that would exceed the plan', () => {
    expect(budgetImpact('Variable', 1000, 800, 250)).toEqual({
      category: 'Variable',
      planned: 1000,
      actual: 800,
      simulated: 1050,
      exceeds: true,
    });
    expect(budgetImpact('Variable', 1000, 800, 200).exceeds).toBe(false);
  });
});

describe('previewRecurring', () => {
  it('dates each template inside the month and signs the amount', () => {
    const preview = previewRecurring(
      '2023-02',
      [
        { name: 'Rent', amount: 1200, due_day: 30, subcategory: 'Housing' },
        { name: 'Phone', amount: 40, due_day: 3, subcategory: null },
      ],
      -1,
    );

    expect(preview.rows).toEqual([
      { date: '2023-02-28', name: 'Rent', subcategory: 'Housing', amount: -1200 },
      { date: '2023-02-03', name: 'Phone', subcategory: null, amount: -40 },
    ]);
    expect(preview.total).toBe(-1240);
  });
});
