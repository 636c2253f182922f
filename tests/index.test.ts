import { describe, it, expect } from 'vitest';
import { match, CallMatcher, ParseError } from '../src/index';

describe('match', () => {
  it('compiles and matches in one step', () => {
    expect(match('<n: int> times say <what>', '3 times say hi').params).toEqual({ n: 3, what: 'hi' });
  });

  it('rejects an unknown type before matching', () => {
    expect(() => match('<n: nope>', '1')).toThrow(ParseError);
  });

  it('uses one matcher for compiling and matching', () => {
    const matcher = new CallMatcher().registerType('upper', text => text.toUpperCase());
    expect(match('shout <word: upper>', 'shout hey', { matcher }).get('word')).toBe('HEY');
  });

  it('keeps parameters apart from group identifiers', () => {
    const result = match('<n: int> (a|b):v', '1 b');
    expect(result.variant('v')).toBe(1);
    expect(() => result.variant('n')).toThrow("No variant group identified as 'n'");
  });
});
