/**
 * Matcher
 *
 * Matches a call against a syntax tree by backtracking. Every node either
 * consumes tokens from the CallMatch and returns null, or returns a
 * MatchFailure. Score accumulates as tokens are accepted, so when no branch
 * succeeds the best-scoring failure is the one reported.
 *
 * Scoring:
 * - exact literal: 1
 * - near-miss literal: matcher.partialScore
 * - parameter: 0.5
 * - tail: 0.5
 */

import { CallLexer } from './call-lexer';
import { CallMatch } from './call-match';
import { CallMatcher } from './context';
import { CallMatchError, MatchTerminatedError } from './errors';
import type { MatchFailure } from './failures';
import type {
  LiteralNode,
  OptionalNode,
  ParameterNode,
  SyntaxNode,
  TailNode,
  UnorderedNode,
  VariantGroupNode,
} from './types';

export const LITERAL_SCORE = 1;
export const PARAMETER_SCORE = 0.5;
export const TAIL_SCORE = 0.5;

export interface MatchCallOptions {
  matcher?: CallMatcher;
  lexer?: CallLexer;
}

/**
 * Match `node` against the front of `match`. On success the consumed tokens,
 * bindings and score are recorded in `match`; on failure the score reached
 * is still added, but nothing else is.
 *
 * Throws MatchTerminatedError when a tail has already ended the match, and
 * UndefinedTypeError for a parameter type the matcher does not know.
 */
export function matchNode(node: SyntaxNode, match: CallMatch, matcher: CallMatcher): MatchFailure | null {
  if (match.terminated) {
    throw new MatchTerminatedError(node.type);
  }

  switch (node.type) {
    case 'literal':
      return matchLiteral(node, match, matcher);
    case 'parameter':
      return matchParameter(node, match, matcher);
    case 'tail':
      return matchTail(node, match);
    case 'sequence':
      return matchSequence(node.children, match, matcher);
    case 'optional':
      return matchOptional(node, match, matcher);
    case 'variant_group':
      return matchVariantGroup(node, match, matcher);
    case 'unordered':
      return matchUnordered(node, match, matcher);
  }
}

function matchLiteral(node: LiteralNode, match: CallMatch, matcher: CallMatcher): MatchFailure | null {
  const token = match.peek();
  if (token === undefined) {
    return { kind: 'missing_literal', node };
  }

  if (matcher.equals(node.value, token.value, node.caseSensitive)) {
    match.score += LITERAL_SCORE;
    match.take(1);
    return null;
  }

  const similarity = matcher.similarity(node.value, token.value, node.caseSensitive);
  if (similarity < matcher.literalThreshold) {
    return { kind: 'mismatched_literal', node, actual: token };
  }

  match.score += matcher.partialScore;
  if (node.tolerant) {
    match.take(1);
    return null;
  }
  return { kind: 'literal_suggestion', node, actual: token, similarity };
}

function matchParameter(node: ParameterNode, match: CallMatch, matcher: CallMatcher): MatchFailure | null {
  const token = match.peek();
  if (token === undefined) {
    return { kind: 'missing_parameter', node };
  }

  let value: unknown = token.value;
  if (node.typeName !== null) {
    const construct = matcher.getType(node.typeName);
    try {
      value = construct(token.value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { kind: 'mismatched_type', node, actual: token, reason };
    }
  }

  match.set(node.name, value);
  match.score += PARAMETER_SCORE;
  match.take(1);
  return null;
}

function matchTail(node: TailNode, match: CallMatch): MatchFailure | null {
  const tokens = match.remaining;
  if (tokens.length === 0) {
    return { kind: 'missing_tail', node };
  }

  if (node.raw) {
    const first = tokens[0];
    const last = tokens[tokens.length - 1];
    const text = match.raw.slice(first.start, last.end);
    if (text.length === 0) {
      return { kind: 'missing_tail', node };
    }
    match.set(node.name, text);
  } else {
    match.set(node.name, tokens.map(token => token.value));
  }

  match.score += TAIL_SCORE;
  match.take(tokens.length);
  match.terminated = true;
  return null;
}

function matchSequence(children: SyntaxNode[], match: CallMatch, matcher: CallMatcher): MatchFailure | null {
  for (const child of children) {
    const failure = matchNode(child, match, matcher);
    if (failure !== null) {
      return failure;
    }
  }
  return null;
}

/**
 * All or nothing. A branch that fails without scoring anything means the
 * optional part is absent; one that scored means the user attempted it, so
 * its failure is reported.
 */
function matchOptional(node: OptionalNode, match: CallMatch, matcher: CallMatcher): MatchFailure | null {
  const fork = match.fork();
  const failure = matchSequence(node.children, fork, matcher);

  if (failure === null) {
    recordOptional(node, match, true);
    match.join(fork);
    return null;
  }

  if (fork.score > 0) {
    match.score += fork.score;
    return failure;
  }

  recordOptional(node, match, false);
  return null;
}

function recordOptional(node: OptionalNode, match: CallMatch, present: boolean): void {
  if (node.identifier !== null) {
    match.setGroup('optional', node.identifier, present);
  } else {
    match.addOptional(present);
  }
}

/** The highest-scoring variant wins; the first one listed wins a tie. */
function matchVariantGroup(node: VariantGroupNode, match: CallMatch, matcher: CallMatcher): MatchFailure | null {
  let best: { index: number; fork: CallMatch } | null = null;
  let closest: { failure: MatchFailure; score: number } | null = null;

  for (const [index, variant] of node.variants.entries()) {
    const fork = match.fork();
    const failure = matchSequence(variant, fork, matcher);

    if (failure === null) {
      if (best === null || fork.score > best.fork.score) {
        best = { index, fork };
      }
    } else if (fork.score > 0 && (closest === null || fork.score > closest.score)) {
      closest = { failure, score: fork.score };
    }
  }

  if (best !== null) {
    if (node.identifier !== null) {
      match.setGroup('variant', node.identifier, best.index);
    } else {
      match.addVariant(best.index);
    }
    match.join(best.fork);
    return null;
  }

  if (closest !== null) {
    match.score += closest.score;
    return closest.failure;
  }

  const token = match.peek();
  return token === undefined
    ? { kind: 'missing_variant', node }
    : { kind: 'no_matched_variant', node, actual: token };
}

/**
 * Greedy: each round commits the best-scoring child that has not matched
 * yet, until every child has matched. Positional records are added in the
 * order the children are written, not the order they matched in.
 */
function matchUnordered(node: UnorderedNode, match: CallMatch, matcher: CallMatcher): MatchFailure | null {
  const pending = node.children.map((child, index) => ({ child, index }));
  const order: number[] = [];
  const matched = new Map<number, CallMatch>();

  while (pending.length > 0) {
    let best: { position: number; fork: CallMatch } | null = null;
    let closest: { failure: MatchFailure; score: number } | null = null;

    for (const [position, { child }] of pending.entries()) {
      const fork = match.fork();
      const failure = matchNode(child, fork, matcher);

      if (failure === null) {
        if (best === null || fork.score > best.fork.score) {
          best = { position, fork };
        }
      } else if (fork.score > 0 && (closest === null || fork.score > closest.score)) {
        closest = { failure, score: fork.score };
      }
    }

    if (best === null) {
      if (closest !== null) {
        match.score += closest.score;
        return closest.failure;
      }
      const token = match.peek();
      return token === undefined
        ? { kind: 'missing_unordered', node }
        : { kind: 'unmatched_unordered', node, actual: token };
    }

    match.joinState(best.fork);
    const [done] = pending.splice(best.position, 1);
    order.push(done.index);
    matched.set(done.index, best.fork);
  }

  for (const index of node.children.keys()) {
    const fork = matched.get(index);
    if (fork !== undefined) {
      match.joinRecords(fork);
    }
  }

  if (node.identifier !== null) {
    match.setGroup('unordered', node.identifier, order);
  }
  return null;
}

/**
 * Match a whole tree against `match`. Throws CallMatchError carrying the
 * score reached when it does not fit. Tokens left over are not checked.
 */
export function matchTree(tree: SyntaxNode, match: CallMatch, matcher: CallMatcher = new CallMatcher()): CallMatch {
  const failure = matchNode(tree, match, matcher);
  if (failure !== null) {
    throw new CallMatchError(failure, match.score);
  }
  return match;
}

/**
 * Tokenize `call` and match it against `tree`, requiring every token to be
 * consumed.
 *
 * @example
 * ```ts
 * const match = matchCall(compile('set alarm at <time: int>'), 'set alarm at 7');
 * match.get('time'); // 7
 * ```
 */
export function matchCall(tree: SyntaxNode, call: string, options: MatchCallOptions = {}): CallMatch {
  const matcher = options.matcher ?? new CallMatcher();
  const lexer = options.lexer ?? new CallLexer();

  const match = matchTree(tree, new CallMatch(call, lexer.tokenize(call)), matcher);

  const leftover = match.peek();
  if (leftover !== undefined) {
    throw new CallMatchError({ kind: 'too_many_arguments', actual: leftover }, match.score);
  }
  return match;
}
