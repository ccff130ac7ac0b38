// src/services/aggregation.service.ts
import Decimal from 'decimal.js';
import { Aggregate, MatchResult } from '../types';

export const UNKNOWN_POLICY_YEAR = 'Unknown';

// Keys are store text, so tallies go through Maps rather than object literals
class Tally {
  private readonly counts = new Map<string, number>();
  private readonly amounts = new Map<string, Decimal>();

  add(key: string, amount?: Decimal): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
    if (amount) this.amounts.set(key, (this.amounts.get(key) ?? new Decimal(0)).plus(amount));
  }

  countRecord(): Readonly<Record<string, number>> {
    return Object.freeze(Object.fromEntries(this.counts));
  }

  amountRecord(): Readonly<Record<string, Decimal>> {
    return Object.freeze(Object.fromEntries(this.amounts));
  }
}

/** Counts and exact sums over a matched record set in one pass. */
export function aggregate(matches: MatchResult): Aggregate {
  let totalAmount = new Decimal(0);
  let totalPaid = new Decimal(0);
  let totalReserved = new Decimal(0);
  const byStatus = new Tally();
  const byCategory = new Tally();
  const byPolicyYear = new Tally();
  const byCauseOfLoss = new Tally();
  const byLocation = new Tally();

  for (const record of matches) {
    totalAmount = totalAmount.plus(record.amount);
    totalPaid = totalPaid.plus(record.paid);
    totalReserved = totalReserved.plus(record.reserved);

    byStatus.add(record.status);
    byCategory.add(record.category, record.amount);
    byPolicyYear.add(record.policyYear === null ? UNKNOWN_POLICY_YEAR : String(record.policyYear));
    byCauseOfLoss.add(record.causeOfLoss, record.amount);
    byLocation.add(record.location, record.amount);
  }

  return Object.freeze({
    totalCount: matches.length,
    totalAmount,
    totalPaid,
    totalReserved,
    byStatus: byStatus.countRecord(),
    byCategory: byCategory.countRecord(),
    amountByCategory: byCategory.amountRecord(),
    byPolicyYear: byPolicyYear.countRecord(),
    byCauseOfLoss: byCauseOfLoss.countRecord(),
    amountByCauseOfLoss: byCauseOfLoss.amountRecord(),
    byLocation: byLocation.countRecord(),
    amountByLocation: byLocation.amountRecord(),
  });
}
