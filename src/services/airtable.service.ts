// src/services/airtable.service.ts
import axios, { AxiosInstance } from 'axios';
import Decimal from 'decimal.js';
import { AppConfig, config } from '../core/config';
import { logger } from '../core/logger';
import { FetchError, errorMessage } from '../core/errors';
import { ClaimRecord, PolicyRecord, RecordStore, SalesOpportunity } from '../types';
import { parseClaimsDevelopment } from '../utils/claims-development';

export interface AirtableRecord {
  id: string;
  fields: Record<string, unknown>;
}

interface AirtableListResponse {
  records?: AirtableRecord[];
  offset?: string;
}

type AirtableSettings = AppConfig['airtable'];

const AIRTABLE_PAGE_SIZE = 100;
const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;

export function escapeFormulaString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function containsFormula(term: string, field: string): string {
  return `FIND(LOWER("${escapeFormulaString(term)}"), LOWER(ARRAYJOIN({${field}}, ",")))`;
}

function anyFieldContains(term: string, fields: readonly string[]): string {
  return `OR(${fields.map(field => containsFormula(term, field)).join(', ')})`;
}

export const CLAIM_NAME_FIELDS = ['Client Name', 'Corporate Name', 'DBA (from Location)', 'Companies'] as const;
export const POLICY_NAME_FIELDS = [
  'Corporate Name',
  'Policy Name',
  'DBA (from Locations)',
  'Client (from Locations)',
  'Clients',
] as const;

export function buildClaimsFormula(clientMatcher: string): string {
  return anyFieldContains(clientMatcher, CLAIM_NAME_FIELDS);
}

export function buildPoliciesFormula(clientMatcher: string): string {
  return anyFieldContains(clientMatcher, POLICY_NAME_FIELDS);
}

export function buildSalesFormula(term: string): string {
  return anyFieldContains(term, ['Opportunity Name', 'Opportunity Corporate Name', 'DBA']);
}

// ── Field coercion ──────────────────────────────────────────────────────────
// Lookup and rollup fields arrive as arrays; plain fields as strings or numbers.

export function textField(fields: Record<string, unknown>, name: string): string | undefined {
  const toText = (value: unknown): string | undefined => {
    if (typeof value === 'string') return value.trim() || undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
  };

  const value = fields[name];
  if (Array.isArray(value)) {
    const parts = value.map(toText).filter((part): part is string => part !== undefined);
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  return toText(value);
}

export function decimalField(
  fields: Record<string, unknown>,
  name: string,
  pick: 'first' | 'last' = 'first'
): Decimal | undefined {
  const toDecimal = (value: unknown): Decimal | undefined => {
    if (typeof value === 'number' && Number.isFinite(value)) return new Decimal(value);
    if (typeof value === 'string') {
      const cleaned = value.replace(/[$,\s]/g, '');
      return PLAIN_NUMBER.test(cleaned) ? new Decimal(cleaned) : undefined;
    }
    return undefined;
  };

  const value = fields[name];
  if (Array.isArray(value)) {
    if (value.length === 0) return undefined;
    return toDecimal(pick === 'first' ? value[0] : value[value.length - 1]);
  }
  return toDecimal(value);
}

export function yearField(fields: Record<string, unknown>, name: string): number | null {
  const text = textField(fields, name);
  if (!text) return null;
  const year = parseInt(text, 10);
  return Number.isNaN(year) ? null : year;
}

export function toClaimRecord(record: AirtableRecord): ClaimRecord {
  const f = record.fields;
  const closedDate = textField(f, 'Closed Date');
  const alternateNames = CLAIM_NAME_FIELDS.slice(1)
    .map(field => textField(f, field))
    .filter((name): name is string => name !== undefined);
  return {
    id: record.id,
    claimNumber: textField(f, 'Claim #') ?? 'N/A',
    clientName: textField(f, 'Client Name') ?? '',
    alternateNames,
    status: textField(f, 'Status') ?? 'Unknown',
    category: textField(f, 'Claim Type') ?? 'Unspecified',
    amount: decimalField(f, 'Incurred') ?? new Decimal(0),
    policyYear: yearField(f, 'Policy Year'),
    openedDate: textField(f, 'Incident Date') ?? textField(f, 'DOL') ?? null,
    ...(closedDate !== undefined ? { closedDate } : {}),
    paid: decimalField(f, 'Paid - Rollup') ?? new Decimal(0),
    reserved: decimalField(f, 'Reserved Helper', 'last') ?? new Decimal(0),
    causeOfLoss:
      textField(f, 'Cause of Loss Rollup Output') ?? textField(f, 'Cause of Loss (from Cause of Loss)') ?? 'Unknown',
    location: textField(f, 'DBA (from Location)') ?? 'Unknown',
    development: parseClaimsDevelopment(textField(f, 'Activity Rollup Raw Data')),
  };
}

export function toPolicyRecord(record: AirtableRecord): PolicyRecord {
  const f = record.fields;
  const policyType = f['Policy Type'];
  const firstType = Array.isArray(policyType) ? policyType[0] : policyType;
  return {
    id: record.id,
    policyNumber: textField(f, 'Policy #') ?? 'N/A',
    policyYear: yearField(f, 'Policy Year'),
    policyType: typeof firstType === 'string' && firstType.trim() ? firstType.trim() : 'N/A',
    carrier: textField(f, 'Carrier Name') ?? 'N/A',
    basePremium: decimalField(f, 'Base Premium') ?? new Decimal(0),
    incurred: decimalField(f, 'Incurred') ?? new Decimal(0),
    claimCount: decimalField(f, 'Claim Count')?.toNumber() ?? 0,
  };
}

export function toSalesOpportunity(record: AirtableRecord): SalesOpportunity {
  const f = record.fields;
  return {
    id: record.id,
    name: textField(f, 'Opportunity Name') ?? textField(f, 'Opportunity Corporate Name') ?? 'Unnamed opportunity',
    dba: textField(f, 'DBA'),
    status: textField(f, 'Status'),
    marketStatus: textField(f, 'Market Status'),
    effectiveDate: textField(f, 'Effective Date'),
    newOrRenewal: textField(f, 'N/R'),
    revenue: decimalField(f, 'Revenue'),
    expiringRevenue: decimalField(f, 'Expiring Revenue'),
  };
}

export class AirtableService implements RecordStore {
  private client: AxiosInstance;

  constructor(private settings: AirtableSettings = config.airtable, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        baseURL: settings.baseUrl,
        headers: {
          Authorization: `Bearer ${settings.apiKey}`,
          'Content-Type': 'application/json',
        },
        timeout: config.execution.httpTimeoutMs,
      });
  }

  async fetchClaims(clientMatcher: string): Promise<ClaimRecord[]> {
    const records = await this.listRecords(
      this.settings.consultingBaseId,
      this.settings.incidentsTableId,
      buildClaimsFormula(clientMatcher),
      this.settings.maxRecords
    );
    logger.info('Fetched claim records', { clientMatcher, count: records.length });
    return records.map(toClaimRecord);
  }

  async fetchPolicies(clientMatcher: string): Promise<PolicyRecord[]> {
    if (!this.settings.policiesTableId) {
      logger.warn('Policies table is not configured; loss ratios are skipped', { clientMatcher });
      return [];
    }
    const records = await this.listRecords(
      this.settings.consultingBaseId,
      this.settings.policiesTableId,
      buildPoliciesFormula(clientMatcher),
      this.settings.maxRecords
    );
    logger.info('Fetched policy records', { clientMatcher, count: records.length });
    return records.map(toPolicyRecord);
  }

  async searchSales(term: string): Promise<SalesOpportunity[]> {
    const records = await this.listRecords(
      this.settings.salesBaseId,
      this.settings.opportunitiesTableId,
      buildSalesFormula(term),
      this.settings.maxSalesRecords
    );
    logger.info('Fetched sales opportunities', { term, count: records.length });
    return records.map(toSalesOpportunity);
  }

  /** Follows `offset` pagination until the table is exhausted or `maxRecords` is reached. */
  private async listRecords(
    baseId: string,
    tableId: string,
    filterByFormula: string,
    maxRecords: number
  ): Promise<AirtableRecord[]> {
    if (!this.settings.apiKey || !baseId || !tableId) {
      throw new FetchError('Record store is not configured', { baseId, tableId });
    }

    const records: AirtableRecord[] = [];
    let offset: string | undefined;

    do {
      try {
        const response = await this.client.get<AirtableListResponse>(`/${baseId}/${tableId}`, {
          params: {
            filterByFormula,
            pageSize: Math.min(maxRecords, AIRTABLE_PAGE_SIZE),
            ...(offset ? { offset } : {}),
          },
        });
        records.push(...(response.data.records ?? []));
        offset = response.data.offset;
      } catch (error) {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        logger.error('Record store request failed', { baseId, tableId, status, error: errorMessage(error) });
        throw new FetchError(`Record store request failed: ${errorMessage(error)}`, { baseId, tableId, status });
      }
    } while (offset && records.length < maxRecords);

    return records.slice(0, maxRecords);
  }
}

export const airtableService = new AirtableService();
