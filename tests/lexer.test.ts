import { describe, it, expect } from 'vitest';
import { tokenizeSyntax } from '../src/lexer';

function values(syntax: string): string[] {
  return tokenizeSyntax(syntax).map(token => token.value);
}

describe('syntax lexer', () => {
  it('returns nothing for blank input', () => {
    expect(tokenizeSyntax('')).toEqual([]);
    expect(tokenizeSyntax('   ')).toEqual([]);
  });

  it('splits symbols on whitespace', () => {
    expect(tokenizeSyntax('set  alarm')).toEqual([
      { kind: 'symbol', text: 'set', start: 0, end: 3, value: 'set' },
      { kind: 'symbol', text: 'alarm', start: 5, end: 10, value: 'alarm' },
    ]);
  });

  it('emits each punctuation character on its own', () => {
    expect(values('[a|b]:x')).toEqual(['[', 'a', '|', 'b', ']', ':', 'x']);
    expect(tokenizeSyntax('{a}').map(token => token.kind)).toEqual(['punct', 'symbol', 'punct']);
  });

  it('splits a parameter with a type', () => {
    expect(values('<time: int>')).toEqual(['<', 'time', ':', 'int', '>']);
  });

  it('splits an ellipsis off a tail name', () => {
    const tokens = tokenizeSyntax('<cmd...>');
    expect(tokens.map(token => token.value)).toEqual(['<', 'cmd', '...', '>']);
    expect(tokens[1]).toMatchObject({ start: 1, end: 4 });
    expect(tokens[2]).toMatchObject({ kind: 'punct', start: 4, end: 7 });
  });

  it('recognizes a raw tail marker', () => {
    expect(values('<rest...*>')).toEqual(['<', 'rest', '...', '*', '>']);
  });

  it('keeps fewer than three dots inside a symbol', () => {
    expect(values('a.b c..d')).toEqual(['a.b', 'c..d']);
  });

  it('keeps apostrophes inside literals', () => {
    expect(values("i [don't] like")).toEqual(['i', '[', "don't", ']', 'like']);
  });

  it('recognizes literal modifiers', () => {
    expect(values('exit^~')).toEqual(['exit', '^', '~']);
  });
});
