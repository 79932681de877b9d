/**
 * Tokenizer Tests
 */

import { countTokens, tokenize } from '../tokenizer';

describe('tokenize', () => {
  it('should split words and punctuation', () => {
    expect(tokenize('Hello, world!')).toEqual([
      { start: 0, end: 5 },
      { start: 5, end: 6 },
      { start: 7, end: 12 },
      { start: 12, end: 13 },
    ]);
  });

  it('should make each Han character its own token', () => {
    expect(tokenize('施政報告 2024年')).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
      { start: 2, end: 3 },
      { start: 3, end: 4 },
      { start: 5, end: 9 },
      { start: 9, end: 10 },
    ]);
  });

  it('should treat symbols and inner punctuation as tokens', () => {
    expect(countTokens('e-mail')).toBe(3);
    expect(countTokens('$5 000')).toBe(3);
    expect(countTokens('  \n\t ')).toBe(0);
  });
});
