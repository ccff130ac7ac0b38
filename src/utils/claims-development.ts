// src/utils/claims-development.ts
import Decimal from 'decimal.js';
import { Valuation } from '../types';

const ENTRY_SEPARATOR = '[[Break]]';
const DATE_PREFIX = /^([A-Za-z]+\s+\d{1,2},\s+\d{4})/;
const PLAIN_NUMBER = /^\d+(\.\d+)?$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

function monthIndex(name: string): number {
  const lowered = name.toLowerCase();
  return MONTHS.findIndex(month => month === lowered || (lowered.length === 3 && month.startsWith(lowered)));
}

/** `March 3, 2025` or `Mar 3, 2025` as a UTC date; null for anything that is not a real day. */
export function parseValuationDate(label: string): Date | null {
  const match = /^([A-Za-z]+)\s+(\d{1,2}),\s+(\d{4})$/.exec(label);
  if (!match) return null;
  const month = monthIndex(match[1]);
  if (month === -1) return null;
  const day = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month, day));
  return date.getUTCMonth() === month && date.getUTCDate() === day ? date : null;
}

function labelledAmount(entry: string, label: string): { found: boolean; value: Decimal } {
  const match = new RegExp(`${label}:\\s*\\$?([\\d,.]+)`).exec(entry);
  if (!match) return { found: false, value: new Decimal(0) };
  const digits = match[1].replace(/,/g, '').replace(/\.$/, '');
  return { found: true, value: PLAIN_NUMBER.test(digits) ? new Decimal(digits) : new Decimal(0) };
}

/**
 * Reads the valuation history out of a claim's activity rollup, where entries
 * are separated by `[[Break]]` and look like
 * `March 3, 2025 Valuation - Paid: $1,000 Reserved: $4,000 Expenses: $0 Total Incurred: $5,000`.
 */
export function parseClaimsDevelopment(raw: string | undefined): Valuation[] {
  if (!raw) return [];

  const valuations: Valuation[] = [];
  for (const part of raw.split(ENTRY_SEPARATOR)) {
    const entry = part.replace(/^[\s,]+|[\s,]+$/g, '');
    if (!entry.includes('Valuation') && !entry.includes('Total Incurred:')) continue;

    const paid = labelledAmount(entry, 'Paid');
    const reserved = labelledAmount(entry, 'Reserved');
    const expenses = labelledAmount(entry, 'Expenses');
    const totalIncurred = labelledAmount(entry, 'Total Incurred');
    if (!totalIncurred.value.greaterThan(0) && !paid.found && !reserved.found) continue;

    const label = DATE_PREFIX.exec(entry)?.[1] ?? 'Unknown';
    valuations.push({
      label,
      valuedOn: parseValuationDate(label),
      paid: paid.value,
      reserved: reserved.value,
      expenses: expenses.value,
      totalIncurred: totalIncurred.value,
    });
  }
  return valuations;
}

/**
 * Change in total incurred between the latest valuation and the last one
 * dated at least `months` (of 30 days) before `asOf`. With no valuation that
 * old, the baseline is zero.
 */
export function developmentDelta(valuations: readonly Valuation[], asOf: Date, months: number = 15): Decimal {
  if (valuations.length === 0) return new Decimal(0);

  const cutoff = asOf.getTime() - months * 30 * DAY_MS;
  const latest = valuations[valuations.length - 1].totalIncurred;
  let baseline = new Decimal(0);
  for (const valuation of valuations) {
    if (valuation.valuedOn && valuation.valuedOn.getTime() <= cutoff) {
      baseline = valuation.totalIncurred;
    }
  }
  return latest.minus(baseline);
}
