/**
 * Tokenizer
 * Han characters and punctuation/symbol characters are one token each;
 * any other run of non-space characters is one token. Whitespace is never a token.
 */

import { TokenSpan } from './chunking.types';

const TOKEN_PATTERN = /\p{Script=Han}|[^\s\p{Script=Han}\p{P}\p{S}]+|[\p{P}\p{S}]/gu;

export function tokenize(text: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

export function countTokens(text: string): number {
  return tokenize(text).length;
}
