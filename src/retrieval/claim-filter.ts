// src/retrieval/claim-filter.ts
import { AmountPredicate, ClaimRecord, FilterSpecification, MatchResult, TimeWindow } from '../types';

export interface EvaluateOptions {
  /** Defaults to the calendar year of the system clock. */
  currentPolicyYear?: number;
}

export function currentPolicyYear(now: Date = new Date()): number {
  return now.getFullYear();
}

function sameWord(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function amountMatches(record: ClaimRecord, predicate: AmountPredicate): boolean {
  switch (predicate.operator) {
    case 'GreaterThan':
      return record.amount.greaterThan(predicate.threshold);
    case 'LessThan':
      return record.amount.lessThan(predicate.threshold);
    case 'EqualTo':
      return record.amount.equals(predicate.threshold);
  }
}

/**
 * An N-year window holds `policyYearNow - policyYear < N`, so a 5-year window
 * ending in 2026 covers 2022 through 2026 (and any later year). `fromPolicyYear`
 * keeps that year and later. A missing year never matches a window.
 */
export function withinTimeWindow(policyYear: number | null, window: TimeWindow, policyYearNow: number): boolean {
  if (policyYear === null) return false;
  if ('fromPolicyYear' in window) return policyYear >= window.fromPolicyYear;
  return policyYearNow - policyYear < window.policyYearsBack;
}

export function clientMatches(record: ClaimRecord, clientMatcher: string): boolean {
  const needle = clientMatcher.toLowerCase();
  return [record.clientName, ...record.alternateNames].some(name => name.toLowerCase().includes(needle));
}

export function matchesSpec(spec: FilterSpecification, record: ClaimRecord, policyYearNow: number): boolean {
  if (!clientMatches(record, spec.clientMatcher)) return false;
  if (spec.status !== undefined && !sameWord(record.status, spec.status)) return false;
  if (spec.category !== undefined && !sameWord(record.category, spec.category)) return false;
  if (spec.amountPredicate && !amountMatches(record, spec.amountPredicate)) return false;
  if (spec.timeWindow && !withinTimeWindow(record.policyYear, spec.timeWindow, policyYearNow)) return false;
  return true;
}

/** Keeps the records that satisfy every present predicate, in their original order. */
export function evaluate(
  spec: FilterSpecification,
  records: readonly ClaimRecord[],
  options: EvaluateOptions = {}
): MatchResult {
  const policyYearNow = options.currentPolicyYear ?? currentPolicyYear();
  return Object.freeze(records.filter(record => matchesSpec(spec, record, policyYearNow)));
}
