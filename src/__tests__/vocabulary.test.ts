import { buildVocabulary, vocabulary, VocabularyDefinition } from '../core/vocabulary';
import { QueryTokenizer } from '../utils/query-tokenizer';

function definition(overrides: Partial<VocabularyDefinition> = {}): VocabularyDefinition {
  return {
    statuses: { Open: ['open'], Closed: ['closed'] },
    categories: { Property: ['property'] },
    operators: { GreaterThan: ['over'] },
    relativeTime: { lead: 'last', units: { Years: ['years'] } },
    sincePolicyYear: ['since'],
    currencySymbols: ['$'],
    fillerWords: ['only'],
    ...overrides,
  };
}

describe('vocabulary', () => {
  test('should load the bundled categories in file order', () => {
    expect(vocabulary.categories).toEqual([
      'Property',
      'Liability',
      'General Liability',
      'Workers Compensation',
      'Umbrella',
    ]);
  });

  test('should order phrases longest first', () => {
    const lengths = vocabulary.phrases.map(phrase => phrase.words.length);

    expect(lengths).toEqual([...lengths].sort((a, b) => b - a));
    expect(Object.isFrozen(vocabulary)).toBe(true);
  });

  test('should reject a spelling claimed by two meanings', () => {
    expect(() => buildVocabulary(definition({ categories: { Open: ['open'] } }))).toThrow(
      'Vocabulary spelling "open" is claimed by both status Open and category Open'
    );
  });

  test('should reject unknown statuses, operators and units', () => {
    expect(() => buildVocabulary(definition({ statuses: { Pending: ['pending'] } }))).toThrow(
      'Unknown claim status "Pending" in vocabulary'
    );
    expect(() => buildVocabulary(definition({ operators: { Between: ['between'] } }))).toThrow(
      'Unknown comparison operator "Between" in vocabulary'
    );
    expect(() =>
      buildVocabulary(definition({ relativeTime: { lead: 'last', units: { Months: ['months'] } } }))
    ).toThrow('Unknown time unit "Months" in vocabulary');
  });

  test('should let a new category be added without code changes', () => {
    const tokenizer = new QueryTokenizer(
      buildVocabulary(definition({ categories: { Property: ['property'], 'Inland Marine': ['inland marine', 'marine'] } }))
    );

    expect(tokenizer.tokenize('Jasmin inland marine')).toEqual([
      { kind: 'client', text: 'Jasmin' },
      { kind: 'category', value: 'Inland Marine' },
    ]);
    expect(tokenizer.tokenize('Jasmin marine')[1]).toEqual({ kind: 'category', value: 'Inland Marine' });
  });

  test('should take amounts in any configured currency', () => {
    const tokenizer = new QueryTokenizer(buildVocabulary(definition({ currencySymbols: ['CHF'] })));

    const [, amount] = tokenizer.tokenize('Jasmin CHF900');
    expect(amount.kind === 'amount' ? amount.value.toString() : undefined).toBe('900');
  });

  test('should order since-year lead phrases longest first', () => {
    const built = buildVocabulary(definition({ sincePolicyYear: ['from', 'from policy year'] }));

    expect(built.sincePolicyYearLeads).toEqual([['from', 'policy', 'year'], ['from']]);
  });
});
