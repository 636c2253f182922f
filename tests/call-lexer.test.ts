import { describe, it, expect } from 'vitest';
import { CallLexer, tokenize } from '../src/call-lexer';

function spans(call: string, lexer = new CallLexer()): [string, number, number][] {
  return lexer.tokenize(call).map(token => [token.value, token.start, token.end]);
}

describe('call lexer', () => {
  it('returns nothing for an empty call', () => {
    expect(spans('')).toEqual([]);
    expect(spans('   ')).toEqual([]);
  });

  it('splits plain tokens on whitespace', () => {
    expect(spans('foo')).toEqual([['foo', 0, 3]]);
    expect(spans('  foo  ')).toEqual([['foo', 2, 5]]);
    expect(spans('foo bar baz')).toEqual([['foo', 0, 3], ['bar', 4, 7], ['baz', 8, 11]]);
    expect(spans('  foo  bar  baz  ')).toEqual([['foo', 2, 5], ['bar', 7, 10], ['baz', 12, 15]]);
  });

  it('reads quoted tokens', () => {
    expect(spans('"foo"')).toEqual([['foo', 0, 5]]);
    expect(spans('"  foo  "')).toEqual([['  foo  ', 0, 9]]);
    expect(spans('  "  foo  "  ')).toEqual([['  foo  ', 2, 11]]);
  });

  it('reads adjacent quoted tokens', () => {
    expect(spans('"foo" "bar""baz"')).toEqual([['foo', 0, 5], ['bar', 6, 11], ['baz', 11, 16]]);
    expect(spans('"  foo" " bar ""baz  "')).toEqual([['  foo', 0, 7], [' bar ', 8, 15], ['baz  ', 15, 22]]);
  });

  it('tags tokens and keeps the source text', () => {
    expect(tokenize('say "hi there"')).toEqual([
      { kind: 'plain', text: 'say', start: 0, end: 3, value: 'say' },
      { kind: 'quoted', text: '"hi there"', start: 4, end: 14, value: 'hi there' },
    ]);
  });

  it('keeps the backslash of an escaped quote outside quotes', () => {
    expect(spans('\\"')).toEqual([['\\"', 0, 2]]);
    expect(spans('  \\"  ')).toEqual([['\\"', 2, 4]]);
  });

  it('resolves escapes inside quotes', () => {
    expect(spans('"\\""')).toEqual([['"', 0, 4]]);
    expect(spans('"foo \\"bar\\""')).toEqual([['foo "bar"', 0, 13]]);
    expect(spans('"a\\\\b"')).toEqual([['a\\b', 0, 6]]);
  });

  it('treats an unterminated quote as part of a plain token', () => {
    expect(spans('"')).toEqual([['"', 0, 1]]);
    expect(spans('foo "')).toEqual([['foo', 0, 3], ['"', 4, 5]]);
    expect(spans('"foo')).toEqual([['"foo', 0, 4]]);
    expect(spans('foo "bar')).toEqual([['foo', 0, 3], ['"bar', 4, 8]]);
  });

  it('keeps a dangling backslash', () => {
    expect(spans('\\')).toEqual([['\\', 0, 1]]);
    expect(spans('foo\\')).toEqual([['foo\\', 0, 4]]);
    expect(spans('foo \\')).toEqual([['foo', 0, 3], ['\\', 4, 5]]);
  });

  it('keeps the backslash of an unsupported escape', () => {
    expect(spans('\\a')).toEqual([['\\a', 0, 2]]);
  });

  it('keeps quotes inside a word', () => {
    expect(spans("i don't like")).toEqual([['i', 0, 1], ["don't", 2, 7], ['like', 8, 12]]);
  });

  it('treats the other quote character literally inside quotes', () => {
    expect(spans(`"it's"`)).toEqual([["it's", 0, 6]]);
  });

  it('uses the configured quote characters', () => {
    const lexer = new CallLexer({ quotes: '`' });
    expect(spans('`a b` "c d"', lexer)).toEqual([['a b', 0, 5], ['"c', 6, 8], ['d"', 9, 11]]);
  });
});
