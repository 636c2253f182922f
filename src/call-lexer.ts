/**
 * Call Lexer
 *
 * Splits a command call into tokens. Whitespace separates tokens; a quote
 * at the start of a token groups everything up to the matching quote into
 * one token, spaces included.
 */

import type { Token } from './types';

export interface CallLexerOptions {
  /** Characters that delimit quoted tokens. Defaults to `"` and `'`. */
  quotes?: string;
}

export class CallLexer {
  readonly quotes: string;

  constructor(options: CallLexerOptions = {}) {
    this.quotes = options.quotes ?? `"'`;
  }

  /**
   * Tokenize a call. Never throws: an unterminated quote yields a token that
   * keeps the opening quote, and a dangling backslash is kept as is.
   *
   * @example
   * ```ts
   * new CallLexer().tokenize('say "hello there"').map(t => t.value);
   * // ['say', 'hello there']
   * ```
   */
  tokenize(call: string): Token[] {
    const tokens: Token[] = [];
    let current = '';
    let start = 0;
    let quote: string | null = null;
    let escape = false;

    const plain = (end: number): void => {
      tokens.push({ kind: 'plain', text: call.slice(start, end), start, end, value: current });
    };

    for (let i = 0; i < call.length; i++) {
      const ch = call[i];

      if (quote === null && /\s/.test(ch)) {
        if (escape) {
          current += '\\';
          escape = false;
        }
        if (current !== '') {
          plain(i);
        }
        current = '';
        start = i + 1;
        continue;
      }

      if (this.quotes.includes(ch)) {
        if (escape) {
          // Outside quotes an escaped quote keeps its backslash
          current += quote === null ? `\\${ch}` : ch;
          escape = false;
        } else if (quote === null && current === '') {
          quote = ch;
          start = i;
        } else if (quote === ch) {
          tokens.push({ kind: 'quoted', text: call.slice(start, i + 1), start, end: i + 1, value: current });
          current = '';
          quote = null;
          start = i + 1;
        } else {
          current += ch;
        }
        continue;
      }

      if (ch === '\\') {
        if (escape) {
          current += ch;
          escape = false;
        } else {
          escape = true;
        }
        continue;
      }

      if (escape) {
        current += '\\';
        escape = false;
      }
      current += ch;
    }

    if (escape) {
      current += '\\';
    }

    if (quote !== null) {
      tokens.push({ kind: 'plain', text: call.slice(start), start, end: call.length, value: quote + current });
    } else if (current !== '') {
      plain(call.length);
    }

    return tokens;
  }
}

const defaultLexer = new CallLexer();

/** Tokenize a call with the default quotes. */
export function tokenize(call: string): Token[] {
  return defaultLexer.tokenize(call);
}
