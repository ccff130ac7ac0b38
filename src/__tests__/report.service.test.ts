import Decimal from 'decimal.js';
import { aggregate } from '../services/aggregation.service';
import {
  assemble,
  DETAIL_COLUMNS,
  describeFilters,
  filterNarrative,
  NO_FILTERS_NARRATIVE,
  REPORT_TITLE,
} from '../services/report.service';
import { ReportSection, TableSection } from '../types';
import { claim, policy, valuation } from './helpers/fakes';

const REPORT_DATE = new Date('2026-03-01T12:00:00Z');

function tableTitled(sections: readonly ReportSection[], title: string): TableSection {
  const section = sections.find(candidate => candidate.kind === 'table' && candidate.title === title);
  if (!section || section.kind !== 'table') {
    throw new Error(`Missing table ${title}`);
  }
  return section;
}

describe('filterNarrative', () => {
  test('should describe a client-only query', () => {
    expect(filterNarrative({ clientMatcher: 'Jasmin' })).toBe(NO_FILTERS_NARRATIVE);
    expect(describeFilters({ clientMatcher: 'Jasmin' })).toEqual([]);
  });

  test('should list every present filter in a fixed order', () => {
    const narrative = filterNarrative({
      clientMatcher: 'Jasmin',
      timeWindow: { policyYearsBack: 5 },
      amountPredicate: { operator: 'GreaterThan', threshold: new Decimal(25000) },
      category: 'Property',
      status: 'Open',
    });

    expect(narrative).toBe('Filters: open claims, property claims, over $25,000, from the last 5 policy years.');
  });

  test('should phrase each operator and a single policy year', () => {
    expect(
      describeFilters({
        clientMatcher: 'Jasmin',
        category: 'General Liability',
        amountPredicate: { operator: 'EqualTo', threshold: new Decimal('1234.5') },
        timeWindow: { policyYearsBack: 1 },
      })
    ).toEqual(['general liability claims', 'exactly $1,234.50', 'from the last 1 policy year']);
    expect(
      describeFilters({ clientMatcher: 'Jasmin', amountPredicate: { operator: 'LessThan', threshold: new Decimal(500) } })
    ).toEqual(['under $500']);
  });

  test('should describe a since-year window', () => {
    expect(describeFilters({ clientMatcher: 'Jasmin', timeWindow: { fromPolicyYear: 2022 } })).toEqual([
      'from policy year 2022 onward',
    ]);
  });
});

describe('assemble', () => {
  test('should produce every section for an empty result', () => {
    const document = assemble('Nobody', { clientMatcher: 'Nobody' }, aggregate([]), [], { reportDate: REPORT_DATE });

    expect(document.title).toBe(REPORT_TITLE);
    expect(document.reportDate).toBe('2026-03-01');
    expect(document.sections.map(section => section.kind)).toEqual([
      'narrative',
      'totals',
      'table',
      'table',
      'table',
      'table',
      'table',
      'table',
      'table',
      'table',
    ]);

    const [header, totals] = document.sections;
    expect(header).toEqual({
      kind: 'narrative',
      title: REPORT_TITLE,
      paragraphs: ['Client: Nobody', NO_FILTERS_NARRATIVE, 'Report date: 2026-03-01'],
    });
    expect(totals).toEqual({
      kind: 'totals',
      title: 'Totals',
      entries: [
        { label: 'Total claims', value: '0' },
        { label: 'Total incurred', value: '$0' },
        { label: 'Total paid', value: '$0' },
        { label: 'Total reserved', value: '$0' },
      ],
    });

    const detail = tableTitled(document.sections, 'Claim detail');
    expect(detail.columns).toEqual([...DETAIL_COLUMNS]);
    expect(detail.rows).toEqual([]);
  });

  test('should order breakdown rows and keep detail rows in match order', () => {
    const matches = [
      claim('r1', { status: 'Closed', category: 'Property', amount: '1000', policyYear: 2024, closedDate: '2024-09-30T00:00:00Z' }),
      claim('r2', { status: 'Reopened', category: 'Liability', amount: '250.5', policyYear: null, openedDate: null }),
      claim('r3', { status: 'Open', category: 'Property', amount: '30000', paid: '1000', reserved: '29000', policyYear: 2022 }),
    ];
    const spec = { clientMatcher: 'Jasmin' };
    const document = assemble('Jasmin Hotels', spec, aggregate(matches), matches, { reportDate: REPORT_DATE });

    expect(tableTitled(document.sections, 'Claims by status').rows).toEqual([
      ['Open', '1'],
      ['Closed', '1'],
      ['Reopened', '1'],
    ]);
    expect(tableTitled(document.sections, 'Claims by category').rows).toEqual([
      ['Liability', '1', '$250.50'],
      ['Property', '2', '$31,000'],
    ]);
    expect(tableTitled(document.sections, 'Claims by policy year').rows).toEqual([
      ['2022', '1'],
      ['2024', '1'],
      ['Unknown', '1'],
    ]);

    const detail = tableTitled(document.sections, 'Claim detail');
    expect(detail.rows.map(row => row[0])).toEqual(['C-r1', 'C-r2', 'C-r3']);
    expect(detail.rows[0]).toEqual([
      'C-r1',
      'Jasmin Hotels',
      'Closed',
      'Property',
      '2024',
      'Unknown',
      'Unknown',
      '2025-03-14',
      '2024-09-30',
      '$1,000',
      '$0',
      '$0',
    ]);
    expect(detail.rows[1][4]).toBe('Unknown');
    expect(detail.rows[1][7]).toBe('N/A');
    expect(detail.rows[2].slice(9)).toEqual(['$30,000', '$1,000', '$29,000']);
  });

  test('should freeze the assembled document', () => {
    const document = assemble('Nobody', { clientMatcher: 'Nobody' }, aggregate([]), [], { reportDate: REPORT_DATE });

    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.sections)).toBe(true);
    expect(Object.isFrozen(document.sections[8])).toBe(true);
  });

  test('should rank causes of loss and locations by incurred', () => {
    const matches = [
      claim('a', { causeOfLoss: 'Water Damage', location: 'Jasmin Inn', amount: '1000' }),
      claim('b', { causeOfLoss: 'Slip and Fall', location: 'Jasmin Suites', amount: '6000' }),
      claim('c', { causeOfLoss: 'Water Damage', location: 'Jasmin Inn', amount: '2000' }),
      claim('d', { causeOfLoss: 'Fire', location: 'Jasmin Lodge', amount: '3000' }),
    ];
    const document = assemble('Jasmin', { clientMatcher: 'Jasmin' }, aggregate(matches), matches, {
      reportDate: REPORT_DATE,
    });

    expect(tableTitled(document.sections, 'Claims by cause of loss').rows).toEqual([
      ['Slip and Fall', '1', '$6,000'],
      ['Fire', '1', '$3,000'],
      ['Water Damage', '2', '$3,000'],
    ]);
    expect(tableTitled(document.sections, 'Location impact').rows).toEqual([
      ['Jasmin Suites', '1', '$6,000', '$6,000'],
      ['Jasmin Inn', '2', '$3,000', '$1,500'],
      ['Jasmin Lodge', '1', '$3,000', '$3,000'],
    ]);
  });

  test('should list loss ratios for policies inside the window and category', () => {
    const spec = { clientMatcher: 'Jasmin', category: 'Property', timeWindow: { policyYearsBack: 3 } };
    const policies = [
      policy('old', { policyYear: 2022, basePremium: '5000', incurred: '5000' }),
      policy('p25', { policyYear: 2025, basePremium: '8000', incurred: '2000', claimCount: 3 }),
      policy('gl', { policyYear: 2025, policyType: 'Liability', basePremium: '4000', incurred: '100' }),
      policy('p24', { policyYear: 2024, basePremium: '0', incurred: '700', claimCount: 1 }),
    ];
    const document = assemble('Jasmin', spec, aggregate([]), [], {
      reportDate: REPORT_DATE,
      policies,
      currentPolicyYear: 2026,
    });

    expect(tableTitled(document.sections, 'Loss ratio by policy year').rows).toEqual([
      ['2024', 'Property', 'P-p24', 'Acme Mutual', '$0', '$700', 'N/A', '1'],
      ['2025', 'Property', 'P-p25', 'Acme Mutual', '$8,000', '$2,000', '25%', '3'],
      ['Total', '', '', '', '$8,000', '$2,700', '34%', '4'],
    ]);
  });

  test('should leave the loss ratio table empty without policies', () => {
    const document = assemble('Nobody', { clientMatcher: 'Nobody' }, aggregate([]), [], { reportDate: REPORT_DATE });

    expect(tableTitled(document.sections, 'Loss ratio by policy year').rows).toEqual([]);
  });

  test('should summarise claims development over fifteen months', () => {
    const matches = [
      claim('dev', {
        development: [
          valuation('June 1, 2024', '4000', new Date(Date.UTC(2024, 5, 1))),
          valuation('October 1, 2024', '5000', new Date(Date.UTC(2024, 9, 1))),
          valuation('February 1, 2026', '9000', new Date(Date.UTC(2026, 1, 1))),
        ],
      }),
      claim('none'),
    ];
    const document = assemble('Jasmin', { clientMatcher: 'Jasmin' }, aggregate(matches), matches, {
      reportDate: REPORT_DATE,
    });

    const development = tableTitled(document.sections, 'Claims development');
    expect(development.columns[5]).toBe('15-month change');
    expect(development.rows).toEqual([['C-dev', 'Jasmin Hotels', '3', '$4,000', '$9,000', '$4,000']]);
  });
});
