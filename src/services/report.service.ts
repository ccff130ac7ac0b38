// src/services/report.service.ts
import Decimal from 'decimal.js';
import {
  Aggregate,
  AmountPredicate,
  ClaimRecord,
  FilterSpecification,
  MatchResult,
  NarrativeSection,
  PolicyRecord,
  ReportDocument,
  ReportSection,
  TableSection,
  TotalsSection,
} from '../types';
import { dataFormatter } from '../utils/data-formatter';
import { developmentDelta } from '../utils/claims-development';
import { currentPolicyYear, withinTimeWindow } from '../retrieval/claim-filter';
import { UNKNOWN_POLICY_YEAR } from './aggregation.service';

export const REPORT_TITLE = 'Executive Claims Report';
export const NO_FILTERS_NARRATIVE = 'No active filters beyond client.';

export const DETAIL_COLUMNS = [
  'Claim #',
  'Client',
  'Status',
  'Category',
  'Policy year',
  'Location',
  'Cause of loss',
  'Opened',
  'Closed',
  'Incurred',
  'Paid',
  'Reserved',
] as const;

export const DEVELOPMENT_MONTHS = 15;

const STATUS_ORDER = ['Open', 'Closed'];

export interface AssembleOptions {
  reportDate?: Date;
  /** The client's policies; the loss ratio table keeps those inside the query's time window and category. */
  policies?: readonly PolicyRecord[];
  currentPolicyYear?: number;
}

function describeAmount(predicate: AmountPredicate): string {
  const amount = dataFormatter.formatCurrency(predicate.threshold);
  switch (predicate.operator) {
    case 'GreaterThan':
      return `over ${amount}`;
    case 'LessThan':
      return `under ${amount}`;
    case 'EqualTo':
      return `exactly ${amount}`;
  }
}

/** One clause per present predicate, always in the order status, category, amount, time. */
export function describeFilters(spec: FilterSpecification): string[] {
  const clauses: string[] = [];
  if (spec.status !== undefined) {
    clauses.push(`${spec.status.toLowerCase()} claims`);
  }
  if (spec.category !== undefined) {
    clauses.push(`${spec.category.toLowerCase()} claims`);
  }
  if (spec.amountPredicate) {
    clauses.push(describeAmount(spec.amountPredicate));
  }
  const window = spec.timeWindow;
  if (window) {
    clauses.push(
      'fromPolicyYear' in window
        ? `from policy year ${window.fromPolicyYear} onward`
        : `from the last ${dataFormatter.plural(window.policyYearsBack, 'policy year')}`
    );
  }
  return clauses;
}

export function filterNarrative(spec: FilterSpecification): string {
  const clauses = describeFilters(spec);
  return clauses.length === 0 ? NO_FILTERS_NARRATIVE : `Filters: ${clauses.join(', ')}.`;
}

function compareStatuses(a: string, b: string): number {
  const rank = (status: string) => {
    const index = STATUS_ORDER.indexOf(status);
    return index === -1 ? STATUS_ORDER.length : index;
  };
  return rank(a) - rank(b) || a.localeCompare(b);
}

function comparePolicyYears(a: string, b: string): number {
  if (a === UNKNOWN_POLICY_YEAR) return b === UNKNOWN_POLICY_YEAR ? 0 : 1;
  if (b === UNKNOWN_POLICY_YEAR) return -1;
  return Number(a) - Number(b);
}

function table(title: string, columns: readonly string[], rows: string[][]): TableSection {
  return { kind: 'table', title, columns: [...columns], rows };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

function detailRow(record: ClaimRecord): string[] {
  return [
    record.claimNumber,
    record.clientName,
    record.status,
    record.category,
    record.policyYear === null ? UNKNOWN_POLICY_YEAR : String(record.policyYear),
    record.location,
    record.causeOfLoss,
    dataFormatter.formatDate(record.openedDate),
    dataFormatter.formatDate(record.closedDate),
    dataFormatter.formatCurrency(record.amount),
    dataFormatter.formatCurrency(record.paid),
    dataFormatter.formatCurrency(record.reserved),
  ];
}

function byIncurredThenName(amounts: Readonly<Record<string, Decimal>>): (a: string, b: string) => number {
  const incurred = (key: string) => amounts[key] ?? new Decimal(0);
  return (a, b) => incurred(b).comparedTo(incurred(a)) || a.localeCompare(b);
}

function lossRatio(incurred: Decimal, premium: Decimal): string {
  if (premium.isZero()) return 'N/A';
  return `${incurred.dividedBy(premium).times(100).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toString()}%`;
}

function lossRatioRows(
  policies: readonly PolicyRecord[],
  spec: FilterSpecification,
  policyYearNow: number
): string[][] {
  const { timeWindow, category } = spec;
  const kept = policies
    .filter(policy => !timeWindow || withinTimeWindow(policy.policyYear, timeWindow, policyYearNow))
    .filter(policy => category === undefined || policy.policyType.toLowerCase() === category.toLowerCase())
    .sort((a, b) => (a.policyYear ?? Infinity) - (b.policyYear ?? Infinity) || a.policyType.localeCompare(b.policyType));
  if (kept.length === 0) return [];

  let premium = new Decimal(0);
  let incurred = new Decimal(0);
  let claims = 0;
  const rows = kept.map(policy => {
    premium = premium.plus(policy.basePremium);
    incurred = incurred.plus(policy.incurred);
    claims += policy.claimCount;
    return [
      policy.policyYear === null ? UNKNOWN_POLICY_YEAR : String(policy.policyYear),
      policy.policyType,
      policy.policyNumber,
      policy.carrier,
      dataFormatter.formatCurrency(policy.basePremium),
      dataFormatter.formatCurrency(policy.incurred),
      lossRatio(policy.incurred, policy.basePremium),
      String(policy.claimCount),
    ];
  });
  rows.push([
    'Total',
    '',
    '',
    '',
    dataFormatter.formatCurrency(premium),
    dataFormatter.formatCurrency(incurred),
    lossRatio(incurred, premium),
    String(claims),
  ]);
  return rows;
}

function developmentRows(matches: MatchResult, asOf: Date): string[][] {
  return matches
    .filter(record => record.development.length > 0)
    .map(record => {
      const first = record.development[0];
      const latest = record.development[record.development.length - 1];
      return [
        record.claimNumber,
        record.clientName,
        String(record.development.length),
        dataFormatter.formatCurrency(first.totalIncurred),
        dataFormatter.formatCurrency(latest.totalIncurred),
        dataFormatter.formatCurrency(developmentDelta(record.development, asOf, DEVELOPMENT_MONTHS)),
      ];
    });
}

/**
 * Lays out the executive report. Sections always appear, in this order:
 * header narrative, totals, status, category and policy-year breakdowns,
 * cause of loss, location impact, loss ratios, one detail row per matched
 * claim in evaluator order, then claims development.
 */
export function assemble(
  clientLabel: string,
  spec: FilterSpecification,
  aggregate: Aggregate,
  matches: MatchResult,
  options: AssembleOptions = {}
): ReportDocument {
  const asOf = options.reportDate ?? new Date();
  const reportDate = dataFormatter.isoDate(asOf);
  const policyYearNow = options.currentPolicyYear ?? currentPolicyYear(asOf);

  const statusRows = Object.keys(aggregate.byStatus)
    .sort(compareStatuses)
    .map(status => [status, String(aggregate.byStatus[status])]);

  const categoryRows = Object.keys(aggregate.byCategory)
    .sort((a, b) => a.localeCompare(b))
    .map(category => [
      category,
      String(aggregate.byCategory[category]),
      dataFormatter.formatCurrency(aggregate.amountByCategory[category] ?? new Decimal(0)),
    ]);

  const yearRows = Object.keys(aggregate.byPolicyYear)
    .sort(comparePolicyYears)
    .map(year => [year, String(aggregate.byPolicyYear[year])]);

  const causeRows = Object.keys(aggregate.byCauseOfLoss)
    .sort(byIncurredThenName(aggregate.amountByCauseOfLoss))
    .map(cause => [
      cause,
      String(aggregate.byCauseOfLoss[cause]),
      dataFormatter.formatCurrency(aggregate.amountByCauseOfLoss[cause] ?? new Decimal(0)),
    ]);

  const locationRows = Object.keys(aggregate.byLocation)
    .sort(byIncurredThenName(aggregate.amountByLocation))
    .map(location => {
      const count = aggregate.byLocation[location] ?? 0;
      const incurred = aggregate.amountByLocation[location] ?? new Decimal(0);
      return [
        location,
        String(count),
        dataFormatter.formatCurrency(incurred),
        dataFormatter.formatCurrency(count > 0 ? incurred.dividedBy(count) : incurred),
      ];
    });

  const header: NarrativeSection = {
    kind: 'narrative',
    title: REPORT_TITLE,
    paragraphs: [`Client: ${clientLabel}`, filterNarrative(spec), `Report date: ${reportDate}`],
  };

  const totals: TotalsSection = {
    kind: 'totals',
    title: 'Totals',
    entries: [
      { label: 'Total claims', value: String(aggregate.totalCount) },
      { label: 'Total incurred', value: dataFormatter.formatCurrency(aggregate.totalAmount) },
      { label: 'Total paid', value: dataFormatter.formatCurrency(aggregate.totalPaid) },
      { label: 'Total reserved', value: dataFormatter.formatCurrency(aggregate.totalReserved) },
    ],
  };

  const sections: ReportSection[] = [
    header,
    totals,
    table('Claims by status', ['Status', 'Claims'], statusRows),
    table('Claims by category', ['Category', 'Claims', 'Incurred'], categoryRows),
    table('Claims by policy year', ['Policy year', 'Claims'], yearRows),
    table('Claims by cause of loss', ['Cause of loss', 'Claims', 'Incurred'], causeRows),
    table('Location impact', ['Location', 'Claims', 'Incurred', 'Average incurred'], locationRows),
    table(
      'Loss ratio by policy year',
      ['Policy year', 'Policy type', 'Policy #', 'Carrier', 'Base premium', 'Incurred', 'Loss ratio', 'Claims'],
      lossRatioRows(options.policies ?? [], spec, policyYearNow)
    ),
    table('Claim detail', DETAIL_COLUMNS, matches.map(detailRow)),
    table(
      'Claims development',
      ['Claim #', 'Client', 'Valuations', 'First incurred', 'Latest incurred', `${DEVELOPMENT_MONTHS}-month change`],
      developmentRows(matches, asOf)
    ),
  ];

  return deepFreeze<ReportDocument>({
    title: REPORT_TITLE,
    clientLabel,
    reportDate,
    sections,
  });
}
