/**
 * Month-id and date arithmetic.
 * Dates are handled as YYYY-MM-DD strings so no timezone ever shifts a day.
 */
import { InvalidMonthIdError } from './errors.js';
import type { CreditCardCycle, IsoDate, MonthHalf, MonthId } from './types.js';

const MONTH_ID_RE = /^(\d{4})-(\d{2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function formatMonthId(year: number, month: number): MonthId {
  return `${year}-${pad2(month)}`;
}

export function isValidMonthId(value: string): boolean {
  const m = MONTH_ID_RE.exec(value);
  if (!m) return false;
  const month = Number(m[2]);
  return month >= 1 && month <= 12;
}

export function parseMonthId(id: MonthId): { year: number; month: number } {
  const m = MONTH_ID_RE.exec(id);
  if (!m || !isValidMonthId(id)) throw new InvalidMonthIdError(id);
  return { year: Number(m[1]), month: Number(m[2]) };
}

export function parseIsoDate(value: IsoDate): { year: number; month: number; day: number } | null {
  const m = ISO_DATE_RE.exec(value);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

export function isValidIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

/** month is 1-based */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Guards against dates like Feb 30 */
export function clampDay(year: number, month: number, day: number): number {
  return Math.min(day, daysInMonth(year, month));
}

/** Month id of a Date (local calendar) or of an ISO date string */
export function monthId(date: Date | IsoDate): MonthId {
  if (typeof date === 'string') {
    const parsed = parseIsoDate(date);
    if (!parsed) throw new InvalidMonthIdError(date);
    return formatMonthId(parsed.year, parsed.month);
  }
  return formatMonthId(date.getFullYear(), date.getMonth() + 1);
}

export function currentMonthId(now: Date = new Date()): MonthId {
  return monthId(now);
}

export function addMonths(id: MonthId, count: number): MonthId {
  const { year, month } = parseMonthId(id);
  const index = year * 12 + (month - 1) + count;
  return formatMonthId(Math.floor(index / 12), (index % 12) + 1);
}

export function previousMonthId(id: MonthId): MonthId {
  return addMonths(id, -1);
}

export function nextMonthId(id: MonthId): MonthId {
  return addMonths(id, 1);
}

/** ISO date for `day` of the month, clamped to the month's length */
export function dateInMonth(id: MonthId, day: number): IsoDate {
  const { year, month } = parseMonthId(id);
  return `${formatMonthId(year, month)}-${pad2(clampDay(year, month, day))}`;
}

/** The start month plus the next `monthsAhead` months */
export function monthOptions(start: MonthId, monthsAhead = 6): MonthId[] {
  return Array.from({ length: monthsAhead + 1 }, (_, i) => addMonths(start, i));
}

/**
 * Statement and due attribution of a card purchase.
 * A purchase on the close day stays on the current statement; a purchase
 * after it lands on the next one. The bill is due the month after the
 * statement month.
 */
export function creditCardCycle(
  txDate: IsoDate,
  statementCloseDay: number,
  dueDay: number,
): CreditCardCycle {
  const parsed = parseIsoDate(txDate);
  if (!parsed) throw new InvalidMonthIdError(txDate);

  const purchaseMonth = formatMonthId(parsed.year, parsed.month);
  const closeDay = clampDay(parsed.year, parsed.month, statementCloseDay);
  const statementMonthId = parsed.day > closeDay ? nextMonthId(purchaseMonth) : purchaseMonth;
  const dueMonthId = nextMonthId(statementMonthId);

  return {
    statementMonthId,
    dueMonthId,
    dueDate: dateInMonth(dueMonthId, dueDay),
  };
}

/** Day 1–15 is the first half, 16–end the second */
export function halfOfMonth(date: IsoDate): MonthHalf {
  const day = Number(date.slice(8, 10));
  return day <= 15 ? 'first' : 'second';
}
