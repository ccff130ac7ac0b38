import type Decimal from 'decimal.js';

export type ClaimStatus = 'Open' | 'Closed';

/** Canonical category name from the vocabulary, e.g. `Property` or `General Liability`. */
export type ClaimCategory = string;

export type ComparisonOperator = 'GreaterThan' | 'LessThan' | 'EqualTo';

export type TimeUnit = 'Years';

/** `Any` is the `all` keyword: it clears an earlier status. */
export type StatusKeyword = ClaimStatus | 'Any';

export type Token =
  | { readonly kind: 'client'; readonly text: string }
  | { readonly kind: 'status'; readonly value: StatusKeyword }
  | { readonly kind: 'category'; readonly value: ClaimCategory }
  | { readonly kind: 'operator'; readonly value: ComparisonOperator }
  | { readonly kind: 'amount'; readonly value: Decimal; readonly raw: string }
  | { readonly kind: 'relative-time'; readonly count: number; readonly unit: TimeUnit }
  | { readonly kind: 'since-year'; readonly year: number }
  | { readonly kind: 'literal'; readonly text: string };

export interface AmountPredicate {
  readonly operator: ComparisonOperator;
  readonly threshold: Decimal;
}

export type TimeWindow = { readonly policyYearsBack: number } | { readonly fromPolicyYear: number };

export interface FilterSpecification {
  readonly clientMatcher: string;
  readonly status?: ClaimStatus;
  readonly category?: ClaimCategory;
  readonly amountPredicate?: AmountPredicate;
  readonly timeWindow?: TimeWindow;
}

/** One entry of a claim's valuation history. */
export interface Valuation {
  /** As written in the activity log, e.g. `March 3, 2025`. */
  readonly label: string;
  readonly valuedOn: Date | null;
  readonly paid: Decimal;
  readonly reserved: Decimal;
  readonly expenses: Decimal;
  readonly totalIncurred: Decimal;
}

export interface ClaimRecord {
  readonly id: string;
  readonly claimNumber: string;
  readonly clientName: string;
  /** Corporate name, location DBA and linked companies; searched like the client name. */
  readonly alternateNames: readonly string[];
  // Whatever the store reports; Open and Closed are the ones queries can name
  readonly status: string;
  readonly category: string;
  /** Total incurred. */
  readonly amount: Decimal;
  readonly policyYear: number | null;
  readonly openedDate: string | null;
  readonly closedDate?: string;
  readonly paid: Decimal;
  readonly reserved: Decimal;
  readonly causeOfLoss: string;
  readonly location: string;
  /** Oldest valuation first. */
  readonly development: readonly Valuation[];
}

export interface PolicyRecord {
  readonly id: string;
  readonly policyNumber: string;
  readonly policyYear: number | null;
  readonly policyType: string;
  readonly carrier: string;
  readonly basePremium: Decimal;
  readonly incurred: Decimal;
  readonly claimCount: number;
}

export type MatchResult = readonly ClaimRecord[];

export interface Aggregate {
  readonly totalCount: number;
  readonly totalAmount: Decimal;
  readonly totalPaid: Decimal;
  readonly totalReserved: Decimal;
  readonly byStatus: Readonly<Record<string, number>>;
  readonly byCategory: Readonly<Record<string, number>>;
  readonly amountByCategory: Readonly<Record<string, Decimal>>;
  readonly byPolicyYear: Readonly<Record<string, number>>;
  readonly byCauseOfLoss: Readonly<Record<string, number>>;
  readonly amountByCauseOfLoss: Readonly<Record<string, Decimal>>;
  readonly byLocation: Readonly<Record<string, number>>;
  readonly amountByLocation: Readonly<Record<string, Decimal>>;
}

export interface NarrativeSection {
  readonly kind: 'narrative';
  readonly title?: string;
  readonly paragraphs: readonly string[];
}

export interface TableSection {
  readonly kind: 'table';
  readonly title: string;
  readonly columns: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

export interface TotalsSection {
  readonly kind: 'totals';
  readonly title: string;
  readonly entries: readonly { readonly label: string; readonly value: string }[];
}

export type ReportSection = NarrativeSection | TableSection | TotalsSection;

export interface ReportDocument {
  readonly title: string;
  readonly clientLabel: string;
  readonly reportDate: string;
  readonly sections: readonly ReportSection[];
}

export interface SalesOpportunity {
  id: string;
  name: string;
  dba?: string;
  status?: string;
  marketStatus?: string;
  effectiveDate?: string;
  newOrRenewal?: string;
  revenue?: Decimal;
  expiringRevenue?: Decimal;
}

export type TaskPriority = 'High' | 'Medium' | 'Low';

export type TaskStatus = 'Todo' | 'In progress' | 'Done';

export interface TaskItem {
  id: string;
  client: string;
  description: string;
  priority: TaskPriority;
  status: TaskStatus;
  createdAt: Date;
}

export interface NewTask {
  client: string;
  description: string;
  priority?: TaskPriority;
}

export interface TaskSummary {
  total: number;
  byStatus: Record<TaskStatus, number>;
}

/** Record-store collaborator (Consulting claims and Sales opportunities). */
export interface RecordStore {
  fetchClaims(clientMatcher: string): Promise<ClaimRecord[]>;
  searchSales(term: string): Promise<SalesOpportunity[]>;
  fetchPolicies(clientMatcher: string): Promise<PolicyRecord[]>;
}

export interface TaskStore {
  addTask(task: NewTask): Promise<TaskItem>;
  listTasks(options?: { includeDone?: boolean }): Promise<TaskItem[]>;
  updateTaskStatus(id: string, status: TaskStatus): Promise<TaskItem | null>;
  summarize(): Promise<TaskSummary>;
}

export interface DocumentRenderer {
  render(document: ReportDocument): Promise<Buffer>;
}

export type CommandReply =
  | { kind: 'text'; text: string }
  | { kind: 'document'; fileName: string; content: Buffer; caption: string };
