// src/utils/query-tokenizer.ts
import Decimal from 'decimal.js';
import { Phrase, PhraseMeaning, Vocabulary, vocabulary as defaultVocabulary } from '../core/vocabulary';
import { TokenizeError } from '../core/errors';
import { Token } from '../types';

// Digits, separators and a multiplier suffix, with at least one digit
const NUMERIC_LOOKING = /^[\d.,]*\d[\d.,]*[km]?$/i;
const AMOUNT_PATTERN = /^(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?([km])?$/i;
const COUNT_PATTERN = /^\d+$/;
const YEAR_PATTERN = /^\d{4}$/;

const numberMultipliers: Record<string, number> = {
  k: 1000,
  m: 1000000,
};

export class QueryTokenizer {
  constructor(private readonly vocabulary: Vocabulary = defaultVocabulary) {}

  /**
   * Splits raw query text into semantic tokens in a single left-to-right scan.
   * Words the vocabulary does not recognise are gathered, original casing kept,
   * into client-name fragments that run until the next recognised word.
   */
  tokenize(rawText: string): Token[] {
    const words = rawText.trim().split(/\s+/).filter(Boolean);
    const lowered = words.map(word => word.toLowerCase());
    const tokens: Token[] = [];
    let clientWords: string[] = [];

    const emit = (token: Token) => {
      if (clientWords.length > 0) {
        tokens.push({ kind: 'client', text: clientWords.join(' ') });
        clientWords = [];
      }
      tokens.push(token);
    };

    let i = 0;
    while (i < words.length) {
      const relative = this.matchRelativeTime(lowered, i);
      if (relative) {
        emit(relative);
        i += 3;
        continue;
      }

      const since = this.matchSinceYear(lowered, i);
      if (since) {
        emit({ kind: 'since-year', year: since.year });
        i += since.length;
        continue;
      }

      const phrase = this.matchPhrase(lowered, i);
      if (phrase) {
        emit(this.tokenFor(phrase.meaning));
        i += phrase.words.length;
        continue;
      }

      if (this.vocabulary.fillerWords.has(lowered[i])) {
        emit({ kind: 'literal', text: words[i] });
        i += 1;
        continue;
      }

      if (NUMERIC_LOOKING.test(stripCurrency(words[i], this.vocabulary.currencySymbols))) {
        emit({ kind: 'amount', value: parseAmount(words[i], this.vocabulary.currencySymbols), raw: words[i] });
        i += 1;
        continue;
      }

      clientWords.push(words[i]);
      i += 1;
    }

    if (clientWords.length > 0) {
      tokens.push({ kind: 'client', text: clientWords.join(' ') });
    }

    return tokens;
  }

  private matchPhrase(lowered: string[], start: number): Phrase | undefined {
    return this.vocabulary.phrases.find(phrase =>
      phrase.words.every((word, offset) => lowered[start + offset] === word)
    );
  }

  private matchSinceYear(lowered: string[], start: number): { year: number; length: number } | undefined {
    for (const lead of this.vocabulary.sincePolicyYearLeads) {
      const yearText = lowered[start + lead.length];
      if (
        yearText !== undefined &&
        YEAR_PATTERN.test(yearText) &&
        lead.every((word, offset) => lowered[start + offset] === word)
      ) {
        return { year: parseInt(yearText, 10), length: lead.length + 1 };
      }
    }
    return undefined;
  }

  private matchRelativeTime(lowered: string[], start: number): Token | undefined {
    if (lowered[start] !== this.vocabulary.relativeTimeLead) return undefined;

    const countText = lowered[start + 1];
    const unitText = lowered[start + 2];
    if (countText === undefined || unitText === undefined || !COUNT_PATTERN.test(countText)) {
      return undefined;
    }

    const unit = this.vocabulary.timeUnits.get(unitText);
    const count = parseInt(countText, 10);
    if (!unit || count <= 0) return undefined;

    return { kind: 'relative-time', count, unit };
  }

  private tokenFor(meaning: PhraseMeaning): Token {
    switch (meaning.kind) {
      case 'status':
        return { kind: 'status', value: meaning.value };
      case 'category':
        return { kind: 'category', value: meaning.value };
      case 'operator':
        return { kind: 'operator', value: meaning.value };
    }
  }
}

function stripCurrency(text: string, currencySymbols: readonly string[]): string {
  const symbol = currencySymbols.find(candidate => text.startsWith(candidate));
  return symbol ? text.slice(symbol.length) : text;
}

/**
 * Parses `25000`, `$25,000`, `€1,250.50` or `25k` into an exact decimal.
 * Throws TokenizeError for anything else.
 */
export function parseAmount(
  text: string,
  currencySymbols: readonly string[] = defaultVocabulary.currencySymbols
): Decimal {
  const match = AMOUNT_PATTERN.exec(stripCurrency(text, currencySymbols));
  if (!match) {
    throw new TokenizeError('UnparseableNumber', text);
  }

  const [, whole, fraction = '', suffix] = match;
  const value = new Decimal(whole.replace(/,/g, '') + fraction);
  return suffix ? value.times(numberMultipliers[suffix.toLowerCase()]) : value;
}

export const queryTokenizer = new QueryTokenizer();
