import { TokenizeError } from '../core/errors';
import { QueryTokenizer, parseAmount, queryTokenizer } from '../utils/query-tokenizer';
import { Token } from '../types';

function describeTokens(tokens: Token[]): string[] {
  return tokens.map(token => {
    switch (token.kind) {
      case 'client':
      case 'literal':
        return `${token.kind}:${token.text}`;
      case 'amount':
        return `amount:${token.value.toString()}`;
      case 'relative-time':
        return `relative-time:${token.count} ${token.unit}`;
      case 'since-year':
        return `since-year:${token.year}`;
      default:
        return `${token.kind}:${token.value}`;
    }
  });
}

describe('QueryTokenizer', () => {
  test('should split a client name, status, operator phrase and amount', () => {
    const tokens = queryTokenizer.tokenize('Jasmin open greater than 25000');

    expect(describeTokens(tokens)).toEqual([
      'client:Jasmin',
      'status:Open',
      'operator:GreaterThan',
      'amount:25000',
    ]);
  });

  test('should keep a multi-word client name together with its original casing', () => {
    const tokens = queryTokenizer.tokenize('Ocean Partners closed property');

    expect(describeTokens(tokens)).toEqual(['client:Ocean Partners', 'status:Closed', 'category:Property']);
  });

  test('should recognise a relative time phrase', () => {
    expect(describeTokens(queryTokenizer.tokenize('Jasmin last 5 years'))).toEqual([
      'client:Jasmin',
      'relative-time:5 Years',
    ]);
    expect(describeTokens(queryTokenizer.tokenize('Jasmin last 1 year'))).toEqual([
      'client:Jasmin',
      'relative-time:1 Years',
    ]);
  });

  test('should treat an incomplete time phrase as ordinary words', () => {
    expect(describeTokens(queryTokenizer.tokenize('Jasmin last 5'))).toEqual(['client:Jasmin last', 'amount:5']);
    expect(describeTokens(queryTokenizer.tokenize('Jasmin last 0 years'))).toEqual([
      'client:Jasmin last',
      'amount:0',
      'client:years',
    ]);
  });

  test('should match multi-word phrases before their single-word tails', () => {
    expect(describeTokens(queryTokenizer.tokenize('Acme general liability'))).toEqual([
      'client:Acme',
      'category:General Liability',
    ]);
    expect(describeTokens(queryTokenizer.tokenize('Acme liability'))).toEqual(['client:Acme', 'category:Liability']);
  });

  test('should map operator synonyms and symbols', () => {
    const operators = ['over', 'above', 'more than', '>', 'under', 'below', '<', 'equal to', '='].map(
      phrase => describeTokens(queryTokenizer.tokenize(`Jasmin ${phrase} 10`))[1]
    );

    expect(operators).toEqual([
      'operator:GreaterThan',
      'operator:GreaterThan',
      'operator:GreaterThan',
      'operator:GreaterThan',
      'operator:LessThan',
      'operator:LessThan',
      'operator:LessThan',
      'operator:EqualTo',
      'operator:EqualTo',
    ]);
  });

  test('should match keywords case-insensitively', () => {
    expect(describeTokens(queryTokenizer.tokenize('JASMIN OPEN Over 5'))).toEqual([
      'client:JASMIN',
      'status:Open',
      'operator:GreaterThan',
      'amount:5',
    ]);
  });

  test('should emit filler words as literals', () => {
    expect(describeTokens(queryTokenizer.tokenize('Jasmin only open over $ 500'))).toEqual([
      'client:Jasmin',
      'literal:only',
      'status:Open',
      'operator:GreaterThan',
      'literal:$',
      'amount:500',
    ]);
  });

  test('should leave words that merely contain digits in the client name', () => {
    expect(describeTokens(queryTokenizer.tokenize('Hotel 2nd Street open'))).toEqual([
      'client:Hotel 2nd Street',
      'status:Open',
    ]);
  });

  test('should fail on a numeric-looking word that is not an amount', () => {
    expect(() => queryTokenizer.tokenize('Jasmin over 1,2,3')).toThrow(TokenizeError);

    try {
      queryTokenizer.tokenize('Jasmin over 25,00');
      throw new Error('expected tokenize to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(TokenizeError);
      if (error instanceof TokenizeError) {
        expect(error.reason).toBe('UnparseableNumber');
        expect(error.fragment).toBe('25,00');
        expect(error.code).toBe('UNPARSEABLE_NUMBER');
      }
    }
  });

  test('should read a since or from policy year phrase', () => {
    expect(describeTokens(queryTokenizer.tokenize('Jasmin since 2022'))).toEqual(['client:Jasmin', 'since-year:2022']);
    expect(describeTokens(queryTokenizer.tokenize('Jasmin from policy year 2021 open'))).toEqual([
      'client:Jasmin',
      'since-year:2021',
      'status:Open',
    ]);
  });

  test('should keep since and from in the client name when no year follows', () => {
    expect(describeTokens(queryTokenizer.tokenize('Fresh from Farm'))).toEqual(['client:Fresh from Farm']);
    expect(describeTokens(queryTokenizer.tokenize('Jasmin since 22'))).toEqual(['client:Jasmin since', 'amount:22']);
  });

  test('should recognise the all status keyword', () => {
    expect(describeTokens(queryTokenizer.tokenize('Jasmin all'))).toEqual(['client:Jasmin', 'status:Any']);
  });

  test('should return no tokens for blank input', () => {
    expect(queryTokenizer.tokenize('   ')).toEqual([]);
  });

  test('should honour a custom tokenizer instance', () => {
    const tokenizer = new QueryTokenizer();
    expect(describeTokens(tokenizer.tokenize('Jasmin closed'))).toEqual(['client:Jasmin', 'status:Closed']);
  });
});

describe('parseAmount', () => {
  test('should accept currency symbols, separators, fractions and multipliers', () => {
    expect(parseAmount('25000').toString()).toBe('25000');
    expect(parseAmount('$25,000').toString()).toBe('25000');
    expect(parseAmount('1,250.50').toString()).toBe('1250.5');
    expect(parseAmount('$1,234,567.89').toString()).toBe('1234567.89');
    expect(parseAmount('25k').toString()).toBe('25000');
    expect(parseAmount('2.5M').toString()).toBe('2500000');
    expect(parseAmount('€25000').toString()).toBe('25000');
    expect(parseAmount('£1,200').toString()).toBe('1200');
  });

  test('should tokenize amounts written with other currency symbols', () => {
    expect(describeTokens(queryTokenizer.tokenize('Jasmin over €25000'))).toEqual([
      'client:Jasmin',
      'operator:GreaterThan',
      'amount:25000',
    ]);
  });

  test('should reject malformed amounts', () => {
    for (const text of ['1,2,3', '12,34', '1.2.3', '$', ',000', '25kk', '$$25', '€']) {
      expect(() => parseAmount(text)).toThrow(TokenizeError);
    }
  });
});
