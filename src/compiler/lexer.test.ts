import { describe, it, expect } from 'vitest';
import { tokenize, type Token } from './lexer';

const types = (tokens: Token[]) => tokens.map((t) => t.type);

describe('tokenize', () => {
  it('lexes a one-line check', () => {
    const tokens = tokenize('if roll 1-3 on 1d6 => set-fact "lost"\n');
    expect(types(tokens)).toEqual([
      'keyword', 'keyword', 'range', 'keyword', 'dice', 'arrow', 'keyword', 'string', 'newline', 'eof',
    ]);
    expect(tokens[2]).toEqual({ type: 'range', min: 1, max: 3, line: 1, column: 9 });
    expect(tokens[4]).toEqual({ type: 'dice', count: 1, sides: 6, line: 1, column: 16 });
  });

  it('splits a negative modifier off the dice', () => {
    const tokens = tokenize('roll 1d6-1');
    expect(tokens.slice(1, 4)).toEqual([
      { type: 'dice', count: 1, sides: 6, line: 1, column: 6 },
      { type: 'minus', line: 1, column: 9 },
      { type: 'number', value: 1, line: 1, column: 10 },
    ]);
  });

  it('emits indent and dedent around a block', () => {
    expect(types(tokenize('procedure a\n  b\n  c\nend\n'))).toEqual([
      'keyword', 'identifier', 'newline',
      'indent', 'identifier', 'newline', 'identifier', 'newline',
      'dedent', 'keyword', 'newline', 'eof',
    ]);
  });

  it('closes open blocks before eof', () => {
    const tokens = tokenize('procedure a\n    b');
    expect(types(tokens).slice(-2)).toEqual(['dedent', 'eof']);
  });

  it('skips blank and comment lines and trailing comments', () => {
    const tokens = tokenize('# heading\n\n   \nreminder "a" # trailing\n');
    expect(types(tokens)).toEqual(['keyword', 'string', 'newline', 'eof']);
  });

  it('keeps # inside strings and unescapes quotes and backslashes', () => {
    expect(tokenize('reminder "#1"')[1]).toMatchObject({ type: 'string', value: '#1' });
    expect(tokenize('reminder "say \\"hi\\" \\\\ bye"')[1]).toMatchObject({ type: 'string', value: 'say "hi" \\ bye' });
  });

  it('treats hyphenated words and keywords as whole words', () => {
    const tokens = tokenize('end-of-day\nset-persistent-fact "x"');
    expect(tokens[0]).toMatchObject({ type: 'identifier', value: 'end-of-day' });
    expect(tokens[2]).toMatchObject({ type: 'keyword', value: 'set-persistent-fact' });
  });

  it('rejects an unterminated string', () => {
    expect(() => tokenize('reminder "oops')).toThrow('unterminated string literal (line 1, column 10)');
  });

  it('rejects unknown escapes', () => {
    expect(() => tokenize('reminder "a\\nb"')).toThrow("unknown escape sequence '\\n'");
  });

  it('rejects unknown checks', () => {
    expect(() => tokenize('if maybe? "x" => y')).toThrow("unknown check 'maybe?' (line 1, column 4)");
  });

  it("rejects '=' without '>'", () => {
    expect(() => tokenize('if fact? "x" = y')).toThrow("expected '>' after '=' (line 1, column 15)");
  });

  it('rejects malformed dice', () => {
    expect(() => tokenize('roll 1dx')).toThrow("malformed number or dice '1dx' (line 1, column 6)");
  });

  it('rejects a dedent to a width that was never opened', () => {
    expect(() => tokenize('roll 1d6\n    1 => x\n  2 => y\n')).toThrow(
      'inconsistent indentation: dedent does not match any enclosing block (line 3, column 3)'
    );
  });

  it('rejects tabs and spaces mixed in one line', () => {
    expect(() => tokenize('procedure a\n \tb\nend')).toThrow('indentation mixes tabs and spaces (line 2, column 1)');
  });

  it('rejects tabs after spaces elsewhere in the file', () => {
    expect(() => tokenize('procedure a\n  b\nend\nprocedure c\n\td\nend')).toThrow(
      'indentation uses tabs but earlier lines use spaces (line 5, column 1)'
    );
  });
});
