/**
 * cmdsyntax
 *
 * Compile command syntax specifications such as
 * `set [loud] alarm at <time: int> (am|pm)` into syntax trees and match
 * user-issued calls against them.
 */

import { compile } from './parser';
import { CallMatcher } from './context';
import { matchCall } from './matcher';
import type { MatchCallOptions } from './matcher';
import type { CallMatch } from './call-match';

// Re-export types
export type {
  Token,
  SyntaxNode,
  IdentifiableNode,
  LiteralNode,
  ParameterNode,
  TailNode,
  SequenceNode,
  OptionalNode,
  VariantGroupNode,
  UnorderedNode,
} from './types';

export { tokenizeSyntax, PUNCTUATION, ELLIPSIS } from './lexer';
export { parse, compile, ParseError } from './parser';
export type { ParserOptions } from './parser';
export { flatten } from './flatten';
export { render } from './render';
export { SymbolTable } from './symbols';
export { CallLexer, tokenize } from './call-lexer';
export type { CallLexerOptions } from './call-lexer';
export { CallMatch } from './call-match';
export { CallMatcher, similarity, looseBool, parseInteger, parseFloatStrict } from './context';
export type { TypeConstructor, CallMatcherOptions } from './context';
export { matchNode, matchTree, matchCall, LITERAL_SCORE, PARAMETER_SCORE, TAIL_SCORE } from './matcher';
export type { MatchCallOptions } from './matcher';
export { describeFailure, expectedInfo } from './failures';
export type { MatchFailure, MatchFailureKind } from './failures';
export {
  CallMatchError,
  UndefinedTypeError,
  MatchTerminatedError,
  CommandDispatchError,
  UnknownCommandError,
} from './errors';
export { Command } from './command';
export type { CommandCallback, CommandOptions } from './command';
export { Dispatcher } from './dispatcher';
export type { DispatcherOptions } from './dispatcher';
export { loadConfig, SIMPLIFY_MODES, LOG_LEVELS } from './config';
export type { Config, ParserSettingsInput, MatcherOptions, UsageOptions } from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';

/**
 * Compile a syntax and match a call against it in one step.
 *
 * @example
 * ```ts
 * import { match } from 'cmdsyntax';
 *
 * match('<n: int> times say <what>', '3 times say hi').params;
 * // { n: 3, what: 'hi' }
 * ```
 */
export function match(syntax: string, call: string, options: MatchCallOptions = {}): CallMatch {
  const matcher = options.matcher ?? new CallMatcher();
  return matchCall(compile(syntax, { matcher }), call, { ...options, matcher });
}
