// src/core/vocabulary.ts
import vocabularyFile from '../config/vocabulary.json';
import { ClaimCategory, ComparisonOperator, StatusKeyword, TimeUnit } from '../types';

export type PhraseMeaning =
  | { kind: 'status'; value: StatusKeyword }
  | { kind: 'category'; value: ClaimCategory }
  | { kind: 'operator'; value: ComparisonOperator };

export interface Phrase {
  readonly words: readonly string[];
  readonly meaning: PhraseMeaning;
}

export interface Vocabulary {
  /** Longest phrases first, so multi-word spellings win over their single-word tails. */
  readonly phrases: readonly Phrase[];
  readonly categories: readonly ClaimCategory[];
  readonly relativeTimeLead: string;
  readonly timeUnits: ReadonlyMap<string, TimeUnit>;
  /** Lead phrases for `since 2022`, `from policy year 2022` and the like, longest first. */
  readonly sincePolicyYearLeads: readonly (readonly string[])[];
  readonly currencySymbols: readonly string[];
  readonly fillerWords: ReadonlySet<string>;
}

export interface VocabularyDefinition {
  statuses: Record<string, string[]>;
  categories: Record<string, string[]>;
  operators: Record<string, string[]>;
  relativeTime: { lead: string; units: Record<string, string[]> };
  sincePolicyYear: string[];
  currencySymbols: string[];
  fillerWords: string[];
}

const STATUSES: readonly StatusKeyword[] = ['Open', 'Closed', 'Any'];
const OPERATORS: readonly ComparisonOperator[] = ['GreaterThan', 'LessThan', 'EqualTo'];
const TIME_UNITS: readonly TimeUnit[] = ['Years'];

function isStatus(value: string): value is StatusKeyword {
  return STATUSES.some(status => status === value);
}

function isOperator(value: string): value is ComparisonOperator {
  return OPERATORS.some(operator => operator === value);
}

function isTimeUnit(value: string): value is TimeUnit {
  return TIME_UNITS.some(unit => unit === value);
}

function splitPhrase(spelling: string): string[] {
  return spelling.trim().toLowerCase().split(/\s+/).filter(Boolean);
}

export function buildVocabulary(definition: VocabularyDefinition): Vocabulary {
  const phrases: Phrase[] = [];
  const seen = new Map<string, string>();

  const addPhrase = (spelling: string, meaning: PhraseMeaning, owner: string) => {
    const words = splitPhrase(spelling);
    if (words.length === 0) {
      throw new Error(`Empty spelling for ${owner} in vocabulary`);
    }
    const key = words.join(' ');
    const previous = seen.get(key);
    if (previous && previous !== owner) {
      throw new Error(`Vocabulary spelling "${key}" is claimed by both ${previous} and ${owner}`);
    }
    seen.set(key, owner);
    phrases.push({ words, meaning });
  };

  for (const [status, spellings] of Object.entries(definition.statuses)) {
    if (!isStatus(status)) {
      throw new Error(`Unknown claim status "${status}" in vocabulary`);
    }
    spellings.forEach(spelling => addPhrase(spelling, { kind: 'status', value: status }, `status ${status}`));
  }

  for (const [category, spellings] of Object.entries(definition.categories)) {
    spellings.forEach(spelling =>
      addPhrase(spelling, { kind: 'category', value: category }, `category ${category}`)
    );
  }

  for (const [operator, spellings] of Object.entries(definition.operators)) {
    if (!isOperator(operator)) {
      throw new Error(`Unknown comparison operator "${operator}" in vocabulary`);
    }
    spellings.forEach(spelling =>
      addPhrase(spelling, { kind: 'operator', value: operator }, `operator ${operator}`)
    );
  }

  const timeUnits = new Map<string, TimeUnit>();
  for (const [unit, spellings] of Object.entries(definition.relativeTime.units)) {
    if (!isTimeUnit(unit)) {
      throw new Error(`Unknown time unit "${unit}" in vocabulary`);
    }
    spellings.forEach(spelling => timeUnits.set(spelling.toLowerCase(), unit));
  }

  // Stable sort keeps file order among phrases of equal length
  phrases.sort((a, b) => b.words.length - a.words.length);

  const sinceLeads = definition.sincePolicyYear
    .map(splitPhrase)
    .filter(words => words.length > 0)
    .sort((a, b) => b.length - a.length);

  const currencySymbols = definition.currencySymbols.map(symbol => symbol.trim()).filter(Boolean);

  return Object.freeze({
    phrases: Object.freeze(phrases),
    categories: Object.freeze(Object.keys(definition.categories)),
    relativeTimeLead: definition.relativeTime.lead.toLowerCase(),
    timeUnits,
    sincePolicyYearLeads: Object.freeze(sinceLeads.map(words => Object.freeze(words))),
    currencySymbols: Object.freeze(currencySymbols),
    fillerWords: new Set(definition.fillerWords.map(word => word.toLowerCase())),
  });
}

export const vocabulary: Vocabulary = buildVocabulary(vocabularyFile);
