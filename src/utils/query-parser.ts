// src/utils/query-parser.ts
import { logger } from '../core/logger';
import { InterpretError } from '../core/errors';
import {
  AmountPredicate,
  ClaimCategory,
  ClaimStatus,
  ComparisonOperator,
  FilterSpecification,
  TimeWindow,
  Token,
} from '../types';
import { QueryTokenizer, queryTokenizer } from './query-tokenizer';

type AmountToken = Extract<Token, { kind: 'amount' }>;

export class QueryParser {
  constructor(private readonly tokenizer: QueryTokenizer = queryTokenizer) {}

  parseQuery(query: string): FilterSpecification {
    return this.interpret(this.tokenizer.tokenize(query));
  }

  /**
   * Folds a token sequence into a filter specification.
   *
   * Client fragments are joined in order. Status, category, amount and time
   * modifiers may appear anywhere; when one repeats, the later token wins.
   * An operator forms a predicate with the amount that directly follows it,
   * or failing that with the amount directly before it (filler literals
   * aside). Either half on its own is dropped.
   */
  interpret(tokens: readonly Token[]): FilterSpecification {
    const clientParts: string[] = [];
    const dropped: string[] = [];
    let status: ClaimStatus | undefined;
    let category: ClaimCategory | undefined;
    let amountPredicate: AmountPredicate | undefined;
    let timeWindow: TimeWindow | undefined;
    let pendingOperator: { operator: ComparisonOperator; before?: AmountToken } | undefined;
    let precedingAmount: AmountToken | undefined;

    const settle = () => {
      if (!pendingOperator) return;
      if (pendingOperator.before) {
        amountPredicate = { operator: pendingOperator.operator, threshold: pendingOperator.before.value };
      } else {
        dropped.push(`operator ${pendingOperator.operator}`);
      }
      pendingOperator = undefined;
    };
    const dropPrecedingAmount = () => {
      if (precedingAmount) dropped.push(`amount ${precedingAmount.raw}`);
      precedingAmount = undefined;
    };

    for (const token of tokens) {
      if (token.kind === 'literal') continue;

      if (token.kind === 'amount') {
        if (pendingOperator) {
          amountPredicate = { operator: pendingOperator.operator, threshold: token.value };
          pendingOperator = undefined;
        } else {
          dropPrecedingAmount();
          precedingAmount = token;
        }
        continue;
      }

      if (token.kind === 'operator') {
        settle();
        pendingOperator = precedingAmount
          ? { operator: token.value, before: precedingAmount }
          : { operator: token.value };
        precedingAmount = undefined;
        continue;
      }

      settle();
      dropPrecedingAmount();

      switch (token.kind) {
        case 'client':
          clientParts.push(token.text);
          break;
        case 'status':
          status = token.value === 'Any' ? undefined : token.value;
          break;
        case 'category':
          category = token.value;
          break;
        case 'relative-time':
          timeWindow = { policyYearsBack: token.count };
          break;
        case 'since-year':
          timeWindow = { fromPolicyYear: token.year };
          break;
      }
    }

    settle();
    dropPrecedingAmount();

    const clientMatcher = clientParts.join(' ').replace(/\s+/g, ' ').trim();
    if (!clientMatcher) {
      throw new InterpretError('EmptyClientMatcher');
    }

    if (dropped.length > 0) {
      logger.debug('Dropped incomplete query modifiers', { clientMatcher, dropped });
    }

    const spec: FilterSpecification = {
      clientMatcher,
      ...(status !== undefined ? { status } : {}),
      ...(category !== undefined ? { category } : {}),
      ...(amountPredicate !== undefined ? { amountPredicate } : {}),
      ...(timeWindow !== undefined ? { timeWindow } : {}),
    };

    logger.info('Query interpreted', {
      clientMatcher,
      status,
      category,
      amount: amountPredicate && `${amountPredicate.operator} ${amountPredicate.threshold.toString()}`,
      policyYearsBack: timeWindow && 'policyYearsBack' in timeWindow ? timeWindow.policyYearsBack : undefined,
      fromPolicyYear: timeWindow && 'fromPolicyYear' in timeWindow ? timeWindow.fromPolicyYear : undefined,
    });

    return Object.freeze(spec);
  }
}

export const queryParser = new QueryParser();
