/**
 * Parser
 *
 * A single-pass parser that turns a syntax specification into a syntax tree
 * (see types.ts). Punctuation drives an explicit state machine; open
 * brackets push a scope onto a stack and the top scope receives new nodes.
 */

import { ParserSettingsSchema } from './config';
import type { ParserSettings, ParserSettingsInput } from './config';
import { CallMatcher } from './context';
import { ParseError } from './errors';
import { flatten } from './flatten';
import { tokenizeSyntax } from './lexer';
import { getDefaultLogger } from './logger';
import type { Logger } from './logger';
import { render } from './render';
import { SymbolTable } from './symbols';
import type {
  IdentifiableNode,
  LiteralNode,
  OptionalNode,
  SequenceNode,
  SyntaxNode,
  Token,
  UnorderedNode,
  VariantGroupNode,
} from './types';

export { ParseError };

export interface ParserOptions extends ParserSettingsInput {
  /** When given, parameter types are checked against its registry. */
  matcher?: CallMatcher;
  logger?: Logger;
}

type State =
  | 'NORMAL'
  | 'BEFORE_PARAM_NAME'
  | 'AFTER_PARAM_NAME'
  | 'BEFORE_PARAM_TYPE'
  | 'AFTER_PARAM_TYPE'
  | 'BEFORE_IDENTIFIER'
  | 'AFTER_ELLIPSIS'
  | 'AFTER_RAW_MARKER';

/**
 * An open bracket. `sealed` is set once a tail has been appended, and passes
 * to the enclosing scope when the bracket closes. The variants of one group
 * share `tails` so a tail in any of them seals the scope around the group.
 */
type Scope =
  | { kind: 'sequence'; node: SequenceNode; root: boolean; sealed: boolean }
  | { kind: 'optional'; node: OptionalNode; sealed: boolean }
  | { kind: 'unordered'; node: UnorderedNode; sealed: boolean }
  | {
    kind: 'variant';
    group: VariantGroupNode;
    children: SyntaxNode[];
    sealed: boolean;
    tails: { seen: boolean };
  };

const SCOPE_NAMES: Record<Scope['kind'], string> = {
  sequence: 'sequence',
  optional: 'optional_sequence',
  unordered: 'unordered_group',
  variant: 'variant_group',
};

function childrenOf(scope: Scope): SyntaxNode[] {
  return scope.kind === 'variant' ? scope.children : scope.node.children;
}

function unexpected(token: Token, detail?: string): ParseError {
  const message = `Unexpected '${token.value}'`;
  return new ParseError(detail === undefined ? message : `${message}: ${detail}`, token.start);
}

/**
 * The node a `:identifier` written after `last` applies to. An optional
 * sequence wrapping a bare variant group (`[a|b]:id`) passes the identifier
 * on to the group.
 */
function identifierTarget(last: SyntaxNode | undefined): { node: IdentifiableNode; inherited: boolean } | null {
  if (last === undefined) return null;

  if (last.type === 'optional') {
    const only = last.children.length === 1 ? last.children[0] : undefined;
    if (only !== undefined && only.type === 'variant_group' && !only.parentheses) {
      return { node: only, inherited: true };
    }
    return { node: last, inherited: false };
  }

  if (last.type === 'variant_group' || last.type === 'unordered') {
    return { node: last, inherited: false };
  }

  return null;
}

function newVariantGroup(first: SyntaxNode[], parentheses: boolean): VariantGroupNode {
  return {
    type: 'variant_group',
    variants: [first],
    identifier: null,
    inheritedIdentifier: false,
    parentheses,
  };
}

/**
 * Parse a syntax specification into a syntax tree.
 *
 * @example
 * ```ts
 * const tree = parse('set [loud] alarm at <time: int> (am|pm)');
 * render(tree); // 'set [loud] alarm at <time: int> (am|pm)'
 * ```
 */
export function parse(syntax: string, options: ParserOptions = {}): SyntaxNode {
  const settings: ParserSettings = ParserSettingsSchema.parse({
    simplify: options.simplify,
    caseInsensitive: options.caseInsensitive,
  });

  const tokens = tokenizeSyntax(syntax);
  const symbols = new SymbolTable();

  const root: SequenceNode = { type: 'sequence', children: [] };
  const scopes: Scope[] = [{ kind: 'sequence', node: root, root: true, sealed: false }];

  let state: State = 'NORMAL';
  let paramName: Token | null = null;
  let paramType: Token | null = null;

  function top(): Scope {
    return scopes[scopes.length - 1];
  }

  function lastChild(): SyntaxNode | undefined {
    const children = childrenOf(top());
    return children[children.length - 1];
  }

  function append(node: SyntaxNode, token: Token): void {
    const scope = top();
    if (scope.sealed) {
      throw unexpected(token, 'nothing may follow a tail');
    }
    childrenOf(scope).push(node);
  }

  function requireNormal(token: Token): void {
    if (state !== 'NORMAL') {
      throw unexpected(token);
    }
  }

  function openVariant(group: VariantGroupNode, tails: { seen: boolean }): void {
    const children: SyntaxNode[] = [];
    group.variants.push(children);
    scopes.push({ kind: 'variant', group, children, sealed: false, tails });
  }

  function closeScope(): void {
    const scope = top();
    scopes.pop();
    if (scope.sealed || (scope.kind === 'variant' && scope.tails.seen)) {
      top().sealed = true;
    }
  }

  function closeParameter(token: Token): void {
    if (paramName === null) {
      throw unexpected(token);
    }

    if (state === 'AFTER_ELLIPSIS' || state === 'AFTER_RAW_MARKER') {
      if (scopes.some(scope => scope.kind === 'unordered')) {
        throw new ParseError('A tail cannot be part of an unordered group', paramName.start);
      }
      append({
        type: 'tail',
        name: symbols.register(paramName.value, paramName.start),
        raw: state === 'AFTER_RAW_MARKER',
      }, token);
      top().sealed = true;
    } else {
      if (paramType !== null && options.matcher !== undefined && !options.matcher.hasType(paramType.value)) {
        throw new ParseError(`Undefined type '${paramType.value}'`, paramType.start);
      }
      append({
        type: 'parameter',
        name: symbols.register(paramName.value, paramName.start),
        typeName: paramType === null ? null : paramType.value,
      }, token);
    }

    paramName = null;
    paramType = null;
    state = 'NORMAL';
  }

  function handleSymbol(token: Token): void {
    switch (state) {
      case 'BEFORE_PARAM_NAME':
        paramName = token;
        state = 'AFTER_PARAM_NAME';
        return;

      case 'BEFORE_PARAM_TYPE':
        paramType = token;
        state = 'AFTER_PARAM_TYPE';
        return;

      case 'BEFORE_IDENTIFIER': {
        const target = identifierTarget(lastChild());
        if (target === null) {
          throw unexpected(token);
        }
        target.node.identifier = symbols.register(token.value, token.start);
        if (target.node.type === 'variant_group') {
          target.node.inheritedIdentifier = target.inherited;
        }
        state = 'NORMAL';
        return;
      }

      case 'NORMAL': {
        const literal: LiteralNode = {
          type: 'literal',
          value: token.value,
          caseSensitive: !settings.caseInsensitive,
          tolerant: false,
        };
        append(literal, token);
        return;
      }

      default:
        throw unexpected(token);
    }
  }

  function handleVariantSeparator(token: Token): void {
    requireNormal(token);

    const scope = top();
    if (childrenOf(scope).length === 0) {
      throw unexpected(token, 'empty variant');
    }

    switch (scope.kind) {
      case 'variant':
        scopes.pop();
        scope.tails.seen = scope.tails.seen || scope.sealed;
        openVariant(scope.group, scope.tails);
        return;

      case 'sequence': {
        if (scope.root) {
          // Bare alternatives at the top level: `a b|c` reads as `(a b)|c`
          const group = newVariantGroup(scope.node.children, false);
          scope.node.children = [group];
          openVariant(group, { seen: scope.sealed });
          scope.sealed = false;
          return;
        }

        // `( ... |` turns the open sequence into a variant group in place
        const group = newVariantGroup(scope.node.children, true);
        scopes.pop();
        const siblings = childrenOf(top());
        siblings[siblings.length - 1] = group;
        openVariant(group, { seen: scope.sealed });
        return;
      }

      case 'optional': {
        const group = newVariantGroup(scope.node.children, false);
        scope.node.children = [group];
        openVariant(group, { seen: scope.sealed });
        scope.sealed = false;
        return;
      }

      case 'unordered':
        throw unexpected(token, 'cannot define variants in an unordered group, maybe you meant to use parentheses?');
    }
  }

  function handleClose(token: Token): void {
    requireNormal(token);
    const scope = top();
    const empty = childrenOf(scope).length === 0;

    switch (token.value) {
      case ')':
        if (scope.kind === 'sequence' && !scope.root) {
          if (empty) throw unexpected(token, 'empty sequence');
          closeScope();
          return;
        }
        if (scope.kind === 'variant' && scope.group.parentheses) {
          if (empty) throw unexpected(token, 'empty variant');
          closeScope();
          return;
        }
        throw unexpected(token);

      case ']':
        if (scope.kind === 'optional') {
          if (empty) throw unexpected(token, 'empty optional sequence');
          closeScope();
          return;
        }
        if (scope.kind === 'variant' && !scope.group.parentheses && scopes[scopes.length - 2].kind === 'optional') {
          if (empty) throw unexpected(token, 'empty variant');
          closeScope();
          closeScope();
          return;
        }
        throw unexpected(token);

      case '}':
        if (scope.kind === 'unordered') {
          if (empty) throw unexpected(token, 'empty unordered group');
          closeScope();
          return;
        }
        throw unexpected(token);
    }
  }

  function handlePunct(token: Token): void {
    switch (token.value) {
      case '<':
        requireNormal(token);
        if (top().sealed) {
          throw unexpected(token, 'nothing may follow a tail');
        }
        state = 'BEFORE_PARAM_NAME';
        break;

      case '>':
        if (state === 'BEFORE_PARAM_NAME') {
          throw unexpected(token, 'empty parameter name');
        }
        if (state === 'NORMAL' || state === 'BEFORE_PARAM_TYPE' || state === 'BEFORE_IDENTIFIER') {
          throw unexpected(token);
        }
        closeParameter(token);
        break;

      case '...':
        if (state !== 'AFTER_PARAM_NAME') {
          throw unexpected(token);
        }
        state = 'AFTER_ELLIPSIS';
        break;

      case '*':
        if (state !== 'AFTER_ELLIPSIS') {
          throw unexpected(token);
        }
        state = 'AFTER_RAW_MARKER';
        break;

      case ':': {
        if (state === 'AFTER_PARAM_NAME') {
          state = 'BEFORE_PARAM_TYPE';
          break;
        }
        requireNormal(token);
        const last = lastChild();
        const target = identifierTarget(last);
        if (target === null) {
          throw unexpected(token, `cannot assign an identifier to ${last === undefined ? 'nothing' : last.type}`);
        }
        if (target.node.identifier !== null) {
          throw unexpected(token, `already identified as '${target.node.identifier}'`);
        }
        state = 'BEFORE_IDENTIFIER';
        break;
      }

      case '^':
      case '~': {
        requireNormal(token);
        const last = lastChild();
        if (last === undefined || last.type !== 'literal') {
          throw unexpected(token, 'modifiers may only follow a literal');
        }
        if (token.value === '^') {
          last.caseSensitive = false;
        } else {
          last.tolerant = true;
        }
        break;
      }

      case '|':
        handleVariantSeparator(token);
        break;

      case '(': {
        requireNormal(token);
        const node: SequenceNode = { type: 'sequence', children: [] };
        append(node, token);
        scopes.push({ kind: 'sequence', node, root: false, sealed: false });
        break;
      }

      case '[': {
        requireNormal(token);
        const node: OptionalNode = { type: 'optional', children: [], identifier: null };
        append(node, token);
        scopes.push({ kind: 'optional', node, sealed: false });
        break;
      }

      case '{': {
        requireNormal(token);
        const node: UnorderedNode = { type: 'unordered', children: [], identifier: null };
        append(node, token);
        scopes.push({ kind: 'unordered', node, sealed: false });
        break;
      }

      case ')':
      case ']':
      case '}':
        handleClose(token);
        break;

      default:
        throw new ParseError(`Unknown token '${token.value}'`, token.start);
    }
  }

  function checkInputEnd(): void {
    if (state === 'BEFORE_IDENTIFIER') {
      throw new ParseError('Expected identifier', syntax.length);
    }
    if (state !== 'NORMAL') {
      throw new ParseError('Unterminated parameter', syntax.length);
    }
  }

  for (const token of tokens) {
    if (token.kind === 'symbol') {
      handleSymbol(token);
    } else {
      handlePunct(token);
    }
  }
  checkInputEnd();

  // Leave a bare top-level variant group
  const last = top();
  if (last.kind === 'variant' && !last.group.parentheses && scopes.length === 2) {
    if (last.children.length === 0) {
      throw new ParseError('Empty variant', syntax.length);
    }
    scopes.pop();
  }

  if (scopes.length > 1) {
    const path = scopes.slice(1).map(scope => SCOPE_NAMES[scope.kind]).join(' > ');
    throw new ParseError(`Unterminated expression: ${path}`, syntax.length);
  }

  if (root.children.length === 0) {
    throw new ParseError('Empty syntax specification', 0);
  }

  if (settings.simplify === 'no') {
    return root;
  }

  const tree = root.children.length === 1 ? root.children[0] : root;
  const flat = flatten(tree);

  if (settings.simplify === 'silently') {
    return flat;
  }

  const before = render(tree);
  const after = render(flat);
  if (before !== after) {
    const log = (options.logger ?? getDefaultLogger()).child({ component: 'parser' });
    if (settings.simplify === 'warn') {
      log.warn({ syntax: before, simplified: after }, 'Syntax can be simplified');
    } else {
      log.info({ syntax: before, simplified: after }, 'Syntax simplified');
    }
  }

  return settings.simplify === 'warn' ? tree : flat;
}

/**
 * Parse a syntax specification into its canonical, flattened tree.
 * Takes the same options as parse() except `simplify`. Parameter types are
 * always checked, against the built-in types when no matcher is given.
 */
export function compile(syntax: string, options: Omit<ParserOptions, 'simplify'> = {}): SyntaxNode {
  return parse(syntax, { ...options, matcher: options.matcher ?? new CallMatcher(), simplify: 'silently' });
}
