/**
 * Syntax Lexer
 *
 * Splits a syntax specification into `symbol` and `punct` tokens.
 * Whitespace separates symbols and is dropped.
 */

import type { Token } from './types';

export const PUNCTUATION = ['<', '>', ':', '|', '(', ')', '[', ']', '{', '}', '*', '^', '~'];
export const ELLIPSIS = '...';

function isSpace(ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * Tokenize a syntax specification. Never throws; structure is checked by the
 * parser.
 *
 * @example
 * ```ts
 * tokenizeSyntax('<cmd...>').map(t => t.value);
 * // ['<', 'cmd', '...', '>']
 * ```
 */
export function tokenizeSyntax(syntax: string): Token[] {
  const tokens: Token[] = [];
  let current = '';
  let start = 0;

  function flush(end: number): void {
    if (current.length > 0) {
      tokens.push({ kind: 'symbol', text: current, start, end, value: current });
    }
    current = '';
  }

  function punct(value: string, at: number): void {
    tokens.push({ kind: 'punct', text: value, start: at, end: at + value.length, value });
  }

  for (let i = 0; i < syntax.length; i++) {
    const ch = syntax[i];

    if (isSpace(ch)) {
      flush(i);
      continue;
    }

    if (PUNCTUATION.includes(ch)) {
      flush(i);
      punct(ch, i);
      continue;
    }

    if (current.length === 0) {
      start = i;
    }
    current += ch;

    // Dots stay part of a symbol until three of them close the run
    if (current.endsWith(ELLIPSIS)) {
      current = current.slice(0, -ELLIPSIS.length);
      flush(i - ELLIPSIS.length + 1);
      punct(ELLIPSIS, i - ELLIPSIS.length + 1);
    }
  }

  flush(syntax.length);
  return tokens;
}
