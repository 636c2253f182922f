/**
 * Match Failures
 *
 * Failures are plain values returned by the tree walk. Speculative branches
 * produce and discard many of them, so they are not Error instances; the
 * public entry points wrap the one that wins in a CallMatchError.
 */

import type {
  LiteralNode,
  ParameterNode,
  SyntaxNode,
  TailNode,
  Token,
  UnorderedNode,
  VariantGroupNode,
} from './types';

export type MatchFailure =
  | { kind: 'missing_literal'; node: LiteralNode }
  | { kind: 'mismatched_literal'; node: LiteralNode; actual: Token }
  | { kind: 'literal_suggestion'; node: LiteralNode; actual: Token; similarity: number }
  | { kind: 'missing_parameter'; node: ParameterNode }
  | { kind: 'mismatched_type'; node: ParameterNode; actual: Token; reason: string }
  | { kind: 'missing_tail'; node: TailNode }
  | { kind: 'missing_unordered'; node: UnorderedNode }
  | { kind: 'unmatched_unordered'; node: UnorderedNode; actual: Token }
  | { kind: 'missing_variant'; node: VariantGroupNode }
  | { kind: 'no_matched_variant'; node: VariantGroupNode; actual: Token }
  | { kind: 'too_many_arguments'; actual: Token };

export type MatchFailureKind = MatchFailure['kind'];

function quote(token: Token): string {
  return `'${token.text}'`;
}

/**
 * A short description of what a node expects to see first, used in
 * "Expected ..." messages.
 */
export function expectedInfo(node: SyntaxNode): string {
  switch (node.type) {
    case 'literal':
      return `'${node.value}'`;

    case 'parameter':
      return `<${node.name}>`;

    case 'tail':
      return `<${node.name}...>`;

    case 'sequence':
    case 'optional':
      return node.children.length > 0 ? expectedInfo(node.children[0]) : '';

    case 'variant_group':
      return joinAlternatives(node.variants.map(variant => variant.length > 0 ? expectedInfo(variant[0]) : ''));

    case 'unordered':
      return joinAlternatives(node.children.map(expectedInfo));
  }
}

function joinAlternatives(infos: string[]): string {
  return [...new Set(infos.filter(info => info.length > 0))].join(' or ');
}

/**
 * Human-readable message for a failure.
 */
export function describeFailure(failure: MatchFailure): string {
  switch (failure.kind) {
    case 'missing_literal':
      return `Expected literal '${failure.node.value}'`;

    case 'mismatched_literal':
      return `Expected literal '${failure.node.value}', got ${quote(failure.actual)}`;

    case 'literal_suggestion':
      return `Expected literal '${failure.node.value}', got ${quote(failure.actual)}; ` +
        `did you mean '${failure.node.value}'?`;

    case 'missing_parameter':
      return `Expected argument for parameter <${failure.node.name}>`;

    case 'mismatched_type':
      return `Argument ${quote(failure.actual)} for parameter <${failure.node.name}> ` +
        `does not match type ${failure.node.typeName ?? 'str'}`;

    case 'missing_tail':
      return `Expected argument for <${failure.node.name}...>`;

    case 'missing_unordered':
    case 'missing_variant':
      return `Expected ${expectedInfo(failure.node)}`;

    case 'unmatched_unordered':
    case 'no_matched_variant':
      return `Expected ${expectedInfo(failure.node)}, got ${quote(failure.actual)}`;

    case 'too_many_arguments':
      return `Too many arguments, starting at ${quote(failure.actual)}`;
  }
}
