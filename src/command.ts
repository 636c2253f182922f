/**
 * Command
 *
 * A compiled syntax tree bound to a callback.
 */

import { CallLexer } from './call-lexer';
import type { CallMatch } from './call-match';
import { UsageSettingsSchema } from './config';
import type { UsageOptions } from './config';
import { CallMatcher } from './context';
import { matchCall } from './matcher';
import { render } from './render';
import type { SyntaxNode } from './types';
import { wrap } from './usage';

export type CommandCallback<C, R> = (match: CallMatch, context: C) => R;

export interface CommandOptions {
  /** One-line help shown under the syntax in usage output. */
  description?: string;
  matcher?: CallMatcher;
  lexer?: CallLexer;
}

export class Command<C = void, R = unknown> {
  readonly description: string | null;
  readonly matcher: CallMatcher;
  readonly lexer: CallLexer;

  constructor(
    readonly syntax: SyntaxNode,
    readonly callback: CommandCallback<C, R>,
    options: CommandOptions = {},
  ) {
    this.description = options.description ?? null;
    this.matcher = options.matcher ?? new CallMatcher();
    this.lexer = options.lexer ?? new CallLexer();
  }

  /**
   * Match a call against this command's syntax. Throws CallMatchError when
   * it does not fit or leaves tokens over.
   */
  match(call: string): CallMatch {
    return matchCall(this.syntax, call, { matcher: this.matcher, lexer: this.lexer });
  }

  execute(match: CallMatch, context: C): R {
    return this.callback(match, context);
  }

  /** The canonical syntax followed by the indented description, wrapped. */
  usageLines(options: UsageOptions = {}): string[] {
    const { maxWidth, indentWidth } = UsageSettingsSchema.parse(options);
    const syntax = render(this.syntax);
    const indent = ' '.repeat(indentWidth);

    if (maxWidth === 0) {
      return this.description === null ? [syntax] : [syntax, indent + this.description];
    }

    const lines = wrap(syntax, maxWidth);
    if (this.description !== null) {
      lines.push(...wrap(this.description, maxWidth, indent));
    }
    return lines;
  }
}
