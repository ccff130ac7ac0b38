// src/services/claims-query.service.ts
import { config } from '../core/config';
import { logger } from '../core/logger';
import { FetchError, errorMessage } from '../core/errors';
import { currentPolicyYear, evaluate } from '../retrieval/claim-filter';
import { Aggregate, ClaimRecord, FilterSpecification, MatchResult, RecordStore, ReportDocument } from '../types';
import { QueryParser, queryParser } from '../utils/query-parser';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { aggregate } from './aggregation.service';
import { assemble } from './report.service';
import { airtableService } from './airtable.service';

export interface ClaimsQueryResult {
  spec: FilterSpecification;
  fetchedCount: number;
  matches: MatchResult;
  aggregate: Aggregate;
}

export interface ClaimsReportResult extends ClaimsQueryResult {
  document: ReportDocument;
}

export interface ClaimsQueryOptions {
  fetchTimeoutMs?: number;
  clock?: () => Date;
}

/** When every match belongs to the same client, the report is labelled with its full name. */
export function clientLabelFor(spec: FilterSpecification, matches: MatchResult): string {
  const names = new Set(matches.map(record => record.clientName));
  const [only] = names;
  return names.size === 1 && only ? only : spec.clientMatcher;
}

export class ClaimsQueryService {
  private fetchTimeoutMs: number;
  private clock: () => Date;

  constructor(
    private store: RecordStore = airtableService,
    private parser: QueryParser = queryParser,
    options: ClaimsQueryOptions = {}
  ) {
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? config.execution.fetchTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
  }

  /** tokenize → interpret → fetch → evaluate → aggregate */
  async runQuery(text: string): Promise<ClaimsQueryResult> {
    const spec = this.parser.parseQuery(text);
    const records = await this.load('claims', spec.clientMatcher, this.store.fetchClaims(spec.clientMatcher));
    return this.summarize(spec, records);
  }

  /** Same pipeline as runQuery, with the client's policies fetched alongside for loss ratios. */
  async buildReport(text: string): Promise<ClaimsReportResult> {
    const spec = this.parser.parseQuery(text);
    const [records, policies] = await Promise.all([
      this.load('claims', spec.clientMatcher, this.store.fetchClaims(spec.clientMatcher)),
      this.load('policies', spec.clientMatcher, this.store.fetchPolicies(spec.clientMatcher)),
    ]);
    const result = this.summarize(spec, records);
    const now = this.clock();
    const document = assemble(clientLabelFor(spec, result.matches), spec, result.aggregate, result.matches, {
      reportDate: now,
      policies,
      currentPolicyYear: currentPolicyYear(now),
    });
    return { ...result, document };
  }

  private summarize(spec: FilterSpecification, records: ClaimRecord[]): ClaimsQueryResult {
    const matches = evaluate(spec, records, { currentPolicyYear: currentPolicyYear(this.clock()) });

    logger.info('Claims query evaluated', {
      clientMatcher: spec.clientMatcher,
      fetched: records.length,
      matched: matches.length,
    });

    return {
      spec,
      fetchedCount: records.length,
      matches,
      aggregate: aggregate(matches),
    };
  }

  private async load<T>(what: string, clientMatcher: string, request: Promise<T>): Promise<T> {
    try {
      return await withTimeout(request, this.fetchTimeoutMs, `${what} fetch`);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (error instanceof TimeoutError) {
        throw new FetchError(`Record store did not respond within ${error.timeoutMs}ms`, { clientMatcher, what });
      }
      throw new FetchError(`Could not load ${what}: ${errorMessage(error)}`, { clientMatcher });
    }
  }
}

export const claimsQueryService = new ClaimsQueryService();
