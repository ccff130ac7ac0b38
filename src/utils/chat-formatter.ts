// src/utils/chat-formatter.ts
import { ClaimRecord, SalesOpportunity, TaskItem, TaskSummary, Valuation } from '../types';
import type { ClaimsQueryResult } from '../services/claims-query.service';
import { describeFilters } from '../services/report.service';
import { dataFormatter } from './data-formatter';

const DIVIDER = '─'.repeat(35);
const TRUNCATION_NOTE = '\n\n_...truncated_';

const statusEmoji = new Map<string, string>([['Open', '✅'], ['Closed', '🔴']]);
const taskStatusEmoji = new Map<string, string>([['Todo', '🔴'], ['In progress', '🟡'], ['Done', '✅']]);
const priorityEmoji = new Map<string, string>([['High', '🔥'], ['Medium', '⚡'], ['Low', '💤']]);

export function truncateMessage(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, Math.max(0, maxLength - TRUNCATION_NOTE.length)) + TRUNCATION_NOTE;
}

/** `• March 3, 2025: *$5,000* (Paid: $1,000, Rsv: $4,000)`, listing only the parts above zero. */
export function formatValuation(valuation: Valuation): string {
  const parts = [
    ['Paid', valuation.paid],
    ['Rsv', valuation.reserved],
    ['Exp', valuation.expenses],
  ] as const;
  const breakdown = parts
    .filter(([, amount]) => amount.greaterThan(0))
    .map(([label, amount]) => `${label}: ${dataFormatter.formatCurrency(amount)}`);
  const total = `• ${valuation.label}: *${dataFormatter.formatCurrency(valuation.totalIncurred)}*`;
  return breakdown.length > 0 ? `${total} (${breakdown.join(', ')})` : total;
}

export function formatClaim(record: ClaimRecord): string {
  const md = (text: string) => dataFormatter.sanitizeForMarkdown(text);
  const lines = [
    DIVIDER,
    `📅 *Date of Loss:* ${dataFormatter.formatDate(record.openedDate)}`,
    `Claim #: ${md(record.claimNumber)}`,
    `Status: ${statusEmoji.get(record.status) ?? '⚪'} ${md(record.status)}`,
    `Type: ${md(record.category)}`,
  ];
  if (record.policyYear !== null) {
    lines.push(`Policy Year: ${record.policyYear}`);
  }
  lines.push(`Company: ${md(record.clientName)}`);
  if (record.location !== 'Unknown') {
    lines.push(`Location: ${md(record.location)}`);
  }
  if (record.causeOfLoss !== 'Unknown') {
    lines.push(`Cause of Loss: ${md(record.causeOfLoss)}`);
  }
  if (record.closedDate) {
    lines.push(`Closed: ${dataFormatter.formatDate(record.closedDate)}`);
  }
  lines.push(
    `💰 Total Incurred: ${dataFormatter.formatCurrency(record.amount)}` +
      ` (Paid: ${dataFormatter.formatCurrency(record.paid)}, Reserved: ${dataFormatter.formatCurrency(record.reserved)})`
  );
  if (record.development.length > 0) {
    lines.push('', '📈 *Claims Development*', ...record.development.map(formatValuation));
  }
  return lines.join('\n');
}

export function formatQueryResult(result: ClaimsQueryResult, maxClaims: number): string {
  const { spec, matches, aggregate } = result;
  const clauses = describeFilters(spec);
  const heading = `🔎 *${dataFormatter.sanitizeForMarkdown(spec.clientMatcher)}*` + (clauses.length ? ` (${clauses.join(', ')})` : '');

  if (matches.length === 0) {
    return `${heading}\nNo claims found matching this query.`;
  }

  const lines = [
    heading,
    `Found ${dataFormatter.plural(aggregate.totalCount, 'claim')} totalling ${dataFormatter.formatCurrency(aggregate.totalAmount)} incurred`,
    '',
    ...matches.slice(0, maxClaims).map(formatClaim),
  ];
  if (matches.length > maxClaims) {
    lines.push('', `_...and ${matches.length - maxClaims} more. Use /report for the full list._`);
  }
  return lines.join('\n');
}

export function formatSalesOpportunity(opportunity: SalesOpportunity): string {
  const md = (text: string) => dataFormatter.sanitizeForMarkdown(text);
  const lines = [DIVIDER, `🏢 *${md(opportunity.name)}*`];
  if (opportunity.dba) lines.push(`DBA: ${md(opportunity.dba)}`);
  lines.push(`Status: ${md(opportunity.status ?? 'N/A')}`);
  if (opportunity.marketStatus) lines.push(`Market Status: ${md(opportunity.marketStatus)}`);
  if (opportunity.effectiveDate) lines.push(`Effective Date: ${dataFormatter.formatDate(opportunity.effectiveDate)}`);
  if (opportunity.newOrRenewal) lines.push(`New/Renewal: ${md(opportunity.newOrRenewal)}`);
  if (opportunity.revenue) lines.push(`Revenue: ${dataFormatter.formatCurrency(opportunity.revenue)}`);
  if (opportunity.expiringRevenue) {
    lines.push(`Expiring Revenue: ${dataFormatter.formatCurrency(opportunity.expiringRevenue)}`);
  }
  return lines.join('\n');
}

export function formatTaskList(tasks: TaskItem[]): string {
  if (tasks.length === 0) return 'No open tasks found.';

  const lines = ['📋 *Open Tasks*', ''];
  tasks.forEach((task, index) => {
    const status = taskStatusEmoji.get(task.status) ?? '⚪';
    const priority = priorityEmoji.get(task.priority) ?? '';
    lines.push(`${index + 1}. ${status} ${priority} *${dataFormatter.sanitizeForMarkdown(task.client)}*: ${dataFormatter.sanitizeForMarkdown(task.description)}`);
  });
  lines.push('', 'Change a status with /update <number> <Todo|In progress|Done>');
  return lines.join('\n');
}

export function formatTaskSummary(summary: TaskSummary): string {
  if (summary.total === 0) return 'No tasks found.';

  return [
    '📊 *Task Progress*',
    '━'.repeat(27),
    `Total Tasks: ${summary.total}`,
    `✅ Done: ${summary.byStatus.Done}`,
    `🟡 In Progress: ${summary.byStatus['In progress']}`,
    `🔴 Todo: ${summary.byStatus.Todo}`,
  ].join('\n');
}
