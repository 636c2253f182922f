import { describe, it, expect } from 'vitest';
import { flatten } from '../src/flatten';
import { parse } from '../src/parser';
import { render } from '../src/render';
import type { LiteralNode, SyntaxNode } from '../src/types';

function lit(value: string): LiteralNode {
  return { type: 'literal', value, caseSensitive: true, tolerant: false };
}

/** Parse without simplification, flatten, and render. */
function canonical(syntax: string): string {
  return render(flatten(parse(syntax, { simplify: 'no' })));
}

describe('flatten', () => {
  it('unwraps single-child sequences', () => {
    expect(flatten({ type: 'sequence', children: [{ type: 'sequence', children: [lit('a')] }] })).toEqual(lit('a'));
  });

  it('splices nested sequences into their parent', () => {
    const tree: SyntaxNode = {
      type: 'sequence',
      children: [lit('a'), { type: 'sequence', children: [lit('b'), lit('c')] }],
    };
    expect(flatten(tree)).toEqual({ type: 'sequence', children: [lit('a'), lit('b'), lit('c')] });
  });

  it('unwraps a group with a single unnamed variant', () => {
    const tree: SyntaxNode = {
      type: 'variant_group',
      variants: [[lit('a'), lit('b')]],
      identifier: null,
      inheritedIdentifier: false,
      parentheses: true,
    };
    expect(flatten(tree)).toEqual({ type: 'sequence', children: [lit('a'), lit('b')] });
  });

  it('keeps a single-variant group that is identified', () => {
    const tree: SyntaxNode = {
      type: 'variant_group',
      variants: [[lit('a'), lit('b')]],
      identifier: 'g',
      inheritedIdentifier: false,
      parentheses: false,
    };
    const flat = flatten(tree);
    expect(flat).toEqual({ ...tree, parentheses: true });
    expect(render(flat)).toBe('(a b):g');
  });

  it('merges a nested group into its parent', () => {
    expect(canonical('(a|(b|c))')).toBe('a|b|c');
    expect(canonical('x ((a|b)|c)')).toBe('x (a|b|c)');
  });

  it('keeps parentheses on a group that has siblings', () => {
    expect(canonical('x ((a|b))')).toBe('x (a|b)');
  });

  it('drops redundant parentheses', () => {
    expect(canonical('(a b) c')).toBe('a b c');
    expect(canonical('[(a b)]')).toBe('[a b]');
    expect(canonical('[(a|b)]')).toBe('[a|b]');
  });

  it('keeps parentheses when an optional is identified itself', () => {
    expect(canonical('[(a|b)]:x')).toBe('[(a|b)]:x');
  });

  it('unwraps a single-child unordered group', () => {
    expect(canonical('x {a}')).toBe('x a');
  });

  it('keeps groups inside an unordered group parenthesized', () => {
    expect(canonical('{(a|b) c}')).toBe('{(a|b) c}');
    expect(canonical('{(a b) c}')).toBe('{(a b) c}');
  });

  it('does not modify its input', () => {
    const tree = parse('(a (b c))', { simplify: 'no' });
    const before = JSON.stringify(tree);
    flatten(tree);
    expect(JSON.stringify(tree)).toBe(before);
  });

  it('is idempotent', () => {
    for (const syntax of ['a (b|(c|d)) [e|f]:g', '{(a b) [c]}:o x', '((a|b)|(c d|e))']) {
      const once = flatten(parse(syntax, { simplify: 'no' }));
      expect(flatten(once)).toEqual(once);
    }
  });
});

describe('render', () => {
  it('renders literals with their modifiers', () => {
    expect(render(lit('a'))).toBe('a');
    expect(render({ type: 'literal', value: 'a', caseSensitive: false, tolerant: true })).toBe('a^~');
  });

  it('renders parameters and tails', () => {
    expect(render({ type: 'parameter', name: 'n', typeName: null })).toBe('<n>');
    expect(render({ type: 'parameter', name: 'n', typeName: 'int' })).toBe('<n: int>');
    expect(render({ type: 'tail', name: 'rest', raw: false })).toBe('<rest...>');
    expect(render({ type: 'tail', name: 'rest', raw: true })).toBe('<rest...*>');
  });

  it('renders a demo syntax unchanged', () => {
    const syntax = 'set [loud] alarm at <time: int> (am|pm) [with message <message...*>]';
    expect(render(parse(syntax))).toBe(syntax);
  });

  it('renders identifiers', () => {
    expect(render(parse('[a|b]:choice'))).toBe('[a|b]:choice');
    expect(render(parse('x (a|b):v {c d}:o [e]:p'))).toBe('x (a|b):v {c d}:o [e]:p');
  });

  it('normalizes spacing', () => {
    expect(render(parse('  set   <t:int>  [ a  |b ] '))).toBe('set <t: int> [a|b]');
  });

  it('parenthesizes nested sequences of an unflattened tree', () => {
    expect(render(parse('a (b c)', { simplify: 'no' }))).toBe('a (b c)');
  });
});
