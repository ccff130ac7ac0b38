// src/services/command.service.ts
import { config } from '../core/config';
import { logger } from '../core/logger';
import { DeskError, ValidationError, errorMessage } from '../core/errors';
import { TASK_STATUSES } from '../models/Task';
import { CommandReply, DocumentRenderer, RecordStore, TaskPriority, TaskStatus, TaskStore } from '../types';
import {
  formatQueryResult,
  formatSalesOpportunity,
  formatTaskList,
  formatTaskSummary,
  truncateMessage,
} from '../utils/chat-formatter';
import { dataFormatter } from '../utils/data-formatter';
import { airtableService } from './airtable.service';
import { ClaimsQueryService, claimsQueryService } from './claims-query.service';
import { pdfRenderer } from './pdf-renderer.service';
import { taskService } from './task.service';

export type CommandName = 'start' | 'help' | 'consulting' | 'report' | 'sales' | 'update' | 'status' | 'add';

export interface ParsedCommand {
  name: string;
  args: string;
  /** Typed as a plain `@command` message rather than a slash command. */
  alias: boolean;
}

export interface CommandServiceDeps {
  claims: ClaimsQueryService;
  records: RecordStore;
  tasks: TaskStore;
  renderer: DocumentRenderer;
  maxClaimsPerReply: number;
  maxMessageLength: number;
}

const COMMAND_NAMES: readonly CommandName[] = ['start', 'help', 'consulting', 'report', 'sales', 'update', 'status', 'add'];

const COMMAND_PATTERN = /^([/@])([a-z]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i;

const PRIORITIES = new Map<string, TaskPriority>([['high', 'High'], ['medium', 'Medium'], ['low', 'Low']]);

export const HELP_TEXT = [
  '🏨 *Claims Desk*',
  '',
  '/consulting <client> [open|closed|all] [property|liability] [over|under <amount>] [last <n> years|since <yyyy>]',
  '   Search claims, e.g. `/consulting Jasmin open greater than 25000`',
  '/report <query> - Executive PDF report for the same query',
  '/sales <term> - Search sales opportunities',
  '/update - List open tasks, or `/update <n> <Todo|In progress|Done>`',
  '/status - Task progress summary',
  '/add Client | Task | Priority - Add a task (High, Medium or Low)',
].join('\n');

export const UNKNOWN_MESSAGE_TEXT = "I didn't understand that. Use /help to see available commands.";
export const FAILURE_TEXT = '❌ Something went wrong while handling that command. Please try again.';

function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some(command => command === name);
}

export function parseCommand(text: string): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;
  const [, prefix, name, args = ''] = match;
  return { name: name.toLowerCase(), args: args.trim(), alias: prefix === '@' };
}

export function parseTaskStatus(text: string): TaskStatus | undefined {
  const wanted = text.trim().toLowerCase();
  return TASK_STATUSES.find(status => status.toLowerCase() === wanted);
}

export class CommandService {
  constructor(private deps: CommandServiceDeps) {}

  /** Never throws: every failure becomes a text reply. */
  async handle(text: string): Promise<CommandReply> {
    try {
      return await this.dispatch(text);
    } catch (error) {
      if (error instanceof DeskError) {
        logger.warn('Command failed', { code: error.code, error: error.message });
        return this.reply(`⚠️ ${error.message}`);
      }
      logger.error('Unexpected command failure', { error: errorMessage(error) });
      return this.reply(FAILURE_TEXT);
    }
  }

  private async dispatch(text: string): Promise<CommandReply> {
    const command = parseCommand(text);

    if (!command || !isCommandName(command.name)) {
      if (command && !command.alias) {
        return this.reply(`Unknown command /${command.name}. Use /help to see available commands.`);
      }
      return this.reply(/\b(help|commands)\b/i.test(text) ? HELP_TEXT : UNKNOWN_MESSAGE_TEXT);
    }

    logger.info('Handling command', { command: command.name, alias: command.alias });

    switch (command.name) {
      case 'start':
      case 'help':
        return this.reply(HELP_TEXT);
      case 'consulting':
        return this.consulting(command.args);
      case 'report':
        return this.report(command.args);
      case 'sales':
        return this.sales(command.args);
      case 'update':
        return this.update(command.args);
      case 'status':
        return this.reply(formatTaskSummary(await this.deps.tasks.summarize()));
      case 'add':
        return this.add(command.args);
    }
  }

  private reply(text: string): CommandReply {
    return { kind: 'text', text: truncateMessage(text, this.deps.maxMessageLength) };
  }

  private async consulting(args: string): Promise<CommandReply> {
    if (!args) {
      return this.reply('Usage: /consulting <client> [open|closed] [property|liability] [over <amount>] [last <n> years]');
    }
    const result = await this.deps.claims.runQuery(args);
    return this.reply(formatQueryResult(result, this.deps.maxClaimsPerReply));
  }

  private async report(args: string): Promise<CommandReply> {
    if (!args) {
      return this.reply('Usage: /report <client> [filters], e.g. /report Jasmin last 5 years');
    }
    const { document, aggregate } = await this.deps.claims.buildReport(args);
    const content = await this.deps.renderer.render(document);
    return {
      kind: 'document',
      fileName: `claims-report-${dataFormatter.slugify(document.clientLabel)}.pdf`,
      content,
      caption:
        `${document.title}: ${document.clientLabel} - ${dataFormatter.plural(aggregate.totalCount, 'claim')}, ` +
        `${dataFormatter.formatCurrency(aggregate.totalAmount)} incurred`,
    };
  }

  private async sales(args: string): Promise<CommandReply> {
    if (!args) {
      return this.reply('Usage: /sales <client or opportunity name>');
    }
    const opportunities = await this.deps.records.searchSales(args);
    if (opportunities.length === 0) {
      return this.reply(`No sales opportunities found for "${args}".`);
    }
    return this.reply(
      [`💼 *Sales: ${dataFormatter.sanitizeForMarkdown(args)}*`, ...opportunities.map(formatSalesOpportunity)].join('\n')
    );
  }

  private async update(args: string): Promise<CommandReply> {
    const tasks = await this.deps.tasks.listTasks();
    if (!args) {
      return this.reply(formatTaskList(tasks));
    }

    const match = /^(\d+)\s+(.+)$/.exec(args);
    const status = match ? parseTaskStatus(match[2]) : undefined;
    if (!match || !status) {
      throw new ValidationError('Use /update <number> <Todo|In progress|Done>');
    }

    const position = parseInt(match[1], 10);
    const task = tasks[position - 1];
    const updated = task ? await this.deps.tasks.updateTaskStatus(task.id, status) : null;
    if (!updated) {
      throw new ValidationError(`There is no open task number ${position}`);
    }
    return this.reply(`✅ Task ${position} (${updated.client}) is now ${updated.status}`);
  }

  private async add(args: string): Promise<CommandReply> {
    const [client = '', description = '', priorityText = ''] = args.split('|').map(part => part.trim());
    if (!client || !description) {
      throw new ValidationError('Please use the format: /add Client | Task | Priority');
    }

    const priority = PRIORITIES.get(priorityText.toLowerCase()) ?? 'Medium';
    const task = await this.deps.tasks.addTask({ client, description, priority });
    return this.reply(`✅ Task added for ${task.client}\n📌 ${task.description}\nPriority: ${task.priority}`);
  }
}

export const commandService = new CommandService({
  claims: claimsQueryService,
  records: airtableService,
  tasks: taskService,
  renderer: pdfRenderer,
  maxClaimsPerReply: config.chat.maxClaimsPerReply,
  maxMessageLength: config.chat.maxMessageLength,
});
