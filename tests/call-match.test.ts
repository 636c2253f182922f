import { describe, it, expect } from 'vitest';
import { CallMatch } from '../src/call-match';
import { tokenize } from '../src/call-lexer';

function start(call: string): CallMatch {
  return new CallMatch(call, tokenize(call));
}

describe('CallMatch', () => {
  it('consumes tokens from the front', () => {
    const match = start('a b c');
    expect(match.peek()?.value).toBe('a');
    expect(match.take(2).map(token => token.value)).toEqual(['a', 'b']);
    expect(match.remaining.map(token => token.value)).toEqual(['c']);
    match.take(1);
    expect(match.hasTokens()).toBe(false);
    expect(match.peek()).toBeUndefined();
  });

  it('isolates a fork until it is joined', () => {
    const match = start('a b c');
    match.score = 1;

    const fork = match.fork();
    expect(fork.score).toBe(0);
    fork.take(2);
    fork.score = 1.5;
    fork.set('x', 1);
    fork.addOptional(true);
    fork.addVariant(2);

    expect(match.remaining).toHaveLength(3);
    expect(match.has('x')).toBe(false);
    expect(match.optionals).toEqual([]);

    match.join(fork);
    expect(match.remaining.map(token => token.value)).toEqual(['c']);
    expect(match.score).toBe(2.5);
    expect(match.get('x')).toBe(1);
    expect(match.optionals).toEqual([true]);
    expect(match.variants).toEqual([2]);
  });

  it('appends joined records after its own', () => {
    const match = start('');
    match.addVariant(0);
    const fork = match.fork();
    fork.addVariant(1);
    match.join(fork);
    expect(match.variants).toEqual([0, 1]);
  });

  it('carries termination into forks and back', () => {
    const match = start('a');
    const fork = match.fork();
    fork.terminated = true;
    match.join(fork);
    expect(match.terminated).toBe(true);
    expect(match.fork().terminated).toBe(true);
  });

  it('looks up optionals and variants by position or identifier', () => {
    const match = start('');
    match.addOptional(false);
    match.addVariant(1);
    match.setGroup('optional', 'loud', true);
    match.setGroup('variant', 'period', 0);

    expect(match.optional(0)).toBe(false);
    expect(match.optional('loud')).toBe(true);
    expect(match.variant(0)).toBe(1);
    expect(match.variant('period')).toBe(0);
  });

  it('throws RangeError for records that do not exist', () => {
    const match = start('');
    match.set('n', 3);
    expect(() => match.optional(0)).toThrow('No optional sequence at index 0');
    expect(() => match.optional('n')).toThrow(RangeError);
    expect(() => match.variant(-1)).toThrow('No variant group at index -1');
    expect(() => match.variant('missing')).toThrow("No variant group identified as 'missing'");
    expect(() => match.order('n')).toThrow("No unordered group identified as 'n'");
  });

  it('returns the order of an unordered group', () => {
    const match = start('');
    match.setGroup('unordered', 'order', [1, 0]);
    expect(match.order('order')).toEqual([1, 0]);
  });

  it('does not read a parameter as a group record', () => {
    const match = start('');
    match.set('n', 1);
    match.set('flag', true);
    match.set('list', [0]);
    expect(() => match.variant('n')).toThrow("No variant group identified as 'n'");
    expect(() => match.optional('flag')).toThrow("No optional sequence identified as 'flag'");
    expect(() => match.order('list')).toThrow("No unordered group identified as 'list'");
  });

  it('keeps group kinds across a join', () => {
    const match = start('');
    const fork = match.fork();
    fork.setGroup('variant', 'period', 1);
    match.join(fork);
    expect(match.variant('period')).toBe(1);
    expect(match.get('period')).toBe(1);
  });

  it('joins state and records separately', () => {
    const match = start('a b');
    const fork = match.fork();
    fork.take(1);
    fork.score = 1;
    fork.addOptional(true);

    match.joinState(fork);
    expect(match.remaining.map(token => token.value)).toEqual(['b']);
    expect(match.score).toBe(1);
    expect(match.optionals).toEqual([]);

    match.joinRecords(fork);
    expect(match.optionals).toEqual([true]);
  });

  it('snapshots its bindings', () => {
    const match = start('');
    match.set('n', 3);
    match.set('what', 'hi');
    const params = match.params;
    match.set('n', 4);
    expect(params).toEqual({ n: 3, what: 'hi' });
  });

  it('describes itself', () => {
    const match = start('');
    match.set('x', 1);
    match.addOptional(true);
    match.addVariant(2);
    expect(match.toString()).toBe('params: {"x":1}, optionals: [true], variants: [2]');
  });
});
