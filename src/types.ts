/**
 * Token and Syntax Tree Types
 *
 * A syntax tree is a plain discriminated union on `type`. Trees are built by
 * the parser, normalized by flatten(), and never mutated afterwards.
 */

/**
 * An atomic piece of a string, produced by either the syntax lexer or the
 * call lexer.
 */
export interface Token {
  /** Lexer-specific tag ('symbol', 'punct', 'plain', 'quoted'), if any. */
  kind: string | null;
  /** The exact source slice `[start, end)`. */
  text: string;
  start: number;
  end: number;
  /** The logical value (quotes stripped and escapes resolved for call tokens). */
  value: string;
}

/** Any node of a syntax tree. */
export type SyntaxNode =
  | LiteralNode
  | ParameterNode
  | TailNode
  | SequenceNode
  | OptionalNode
  | VariantGroupNode
  | UnorderedNode;

/** Nodes that may carry a `:identifier`. */
export type IdentifiableNode = OptionalNode | VariantGroupNode | UnorderedNode;

/** A fixed word that must be present in the call. */
export interface LiteralNode {
  type: 'literal';
  value: string;
  /** false when marked with `^` */
  caseSensitive: boolean;
  /** true when marked with `~`: close-enough tokens are accepted */
  tolerant: boolean;
}

/** `<name>` or `<name: type>`. Consumes exactly one token. */
export interface ParameterNode {
  type: 'parameter';
  name: string;
  typeName: string | null;
}

/**
 * `<name...>` or `<name...*>`. Consumes every remaining token.
 * A raw tail binds the original substring, keeping the user's whitespace.
 */
export interface TailNode {
  type: 'tail';
  name: string;
  raw: boolean;
}

/** `( ... )` or the implicit root sequence. */
export interface SequenceNode {
  type: 'sequence';
  children: SyntaxNode[];
}

/** `[ ... ]`, matched as an all-or-nothing unit. */
export interface OptionalNode {
  type: 'optional';
  children: SyntaxNode[];
  identifier: string | null;
}

/**
 * `(a|b|c)` or a bare `a|b|c`.
 * Each variant is an ordered, non-empty list of nodes.
 */
export interface VariantGroupNode {
  type: 'variant_group';
  variants: SyntaxNode[][];
  identifier: string | null;
  /** true when the identifier was written after an enclosing `[...]` */
  inheritedIdentifier: boolean;
  /** Whether the group must be wrapped in parentheses when rendered. */
  parentheses: boolean;
}

/** `{ ... }`: children matched in any order. */
export interface UnorderedNode {
  type: 'unordered';
  children: SyntaxNode[];
  identifier: string | null;
}
