/**
 * Tokenizer Tests
 *
 * Token kinds and texts, escapes, positions, end-of-input behavior and
 * every lexical failure.
 */

import { describe, it, expect } from 'vitest';
import { JsonTokenizer, LexError, StringSource, TokenKind, type Token } from '../src/index.js';

function tokenize(text: string): Token[] {
  const tokenizer = new JsonTokenizer(new StringSource(text));
  const tokens: Token[] = [];
  for (;;) {
    const token = tokenizer.next();
    tokens.push(token);
    if (token.kind === TokenKind.EndOfInput) {
      return tokens;
    }
  }
}

describe('JsonTokenizer', () => {
  describe('next', () => {
    it('should produce every token kind', () => {
      const tokens = tokenize('{"a": [1, -2.5e3, true, false, null]}');

      expect(tokens.map((token) => token.kind)).toEqual([
        TokenKind.ObjectOpen,
        TokenKind.String,
        TokenKind.Colon,
        TokenKind.ArrayOpen,
        TokenKind.Number,
        TokenKind.Comma,
        TokenKind.Number,
        TokenKind.Comma,
        TokenKind.True,
        TokenKind.Comma,
        TokenKind.False,
        TokenKind.Comma,
        TokenKind.Null,
        TokenKind.ArrayClose,
        TokenKind.ObjectClose,
        TokenKind.EndOfInput,
      ]);
      expect(tokens[1].text).toBe('a');
      expect(tokens[4].text).toBe('1');
      expect(tokens[6].text).toBe('-2.5e3');
    });

    it('should resolve escapes in strings', () => {
      const [token] = tokenize(String.raw`"a\"b\\c\/d\b\f\n\r\tA😀"`);

      expect(token.kind).toBe(TokenKind.String);
      expect(token.text).toBe('a"b\\c/d\b\f\n\r\tA\u{1F600}');
    });

    it('should decode unicode escapes and surrogate pairs', () => {
      const [token] = tokenize('"\\u0041\\ud83d\\ude00"');

      expect(token.text).toBe('A\u{1F600}');
    });

    it('should keep multi-byte characters as they are', () => {
      const [token] = tokenize('"héllo wörld"');

      expect(token.text).toBe('héllo wörld');
    });

    it('should accept the number grammar', () => {
      const texts = tokenize('0 -0 10 0.5 1E9 2e-3 -7.25E+2')
        .filter((token) => token.kind === TokenKind.Number)
        .map((token) => token.text);

      expect(texts).toEqual(['0', '-0', '10', '0.5', '1E9', '2e-3', '-7.25E+2']);
    });

    it('should track line, column and offset of each token', () => {
      const tokens = tokenize('{\n  "a": 1\n}');

      expect(tokens.map(({ line, column }) => [line, column])).toEqual([
        [1, 1],
        [2, 3],
        [2, 6],
        [2, 8],
        [3, 1],
        [3, 2],
      ]);
      expect(tokens[1].offset).toBe(4);
    });

    it('should keep returning end of input once exhausted', () => {
      const tokenizer = new JsonTokenizer(new StringSource('  '));

      expect(tokenizer.next().kind).toBe(TokenKind.EndOfInput);
      expect(tokenizer.next().kind).toBe(TokenKind.EndOfInput);
      expect(tokenizer.next().kind).toBe(TokenKind.EndOfInput);
    });

    it('should not read past the token it returns', () => {
      const source = new StringSource('[1] trailing');
      const tokenizer = new JsonTokenizer(source);

      expect(tokenizer.next().kind).toBe(TokenKind.ArrayOpen);
      expect(tokenizer.next().text).toBe('1');
      expect(tokenizer.next().kind).toBe(TokenKind.ArrayClose);
      expect(source.read()).toBe(' ');
    });
  });

  describe('errors', () => {
    it('should reject an unterminated string at its start', () => {
      expect(() => tokenize('  "abc')).toThrow(LexError);
      expect(() => tokenize('  "abc')).toThrow('<string>:1:3: unterminated string');
    });

    it('should reject an invalid escape', () => {
      expect(() => tokenize('"\\x"')).toThrow('<string>:1:4: invalid escape "\\x"');
    });

    it('should reject an invalid unicode escape', () => {
      expect(() => tokenize('"\\u12G4"')).toThrow('invalid unicode escape');
    });

    it('should reject a raw control character in a string', () => {
      expect(() => tokenize('"a\nb"')).toThrow('control character in string');
    });

    it('should reject a leading zero', () => {
      expect(() => tokenize('01')).toThrow('<string>:1:2: malformed number: leading zero');
    });

    it('should reject a number without fraction digits', () => {
      expect(() => tokenize('1.')).toThrow('malformed number: missing fraction digits');
    });

    it('should reject a number without exponent digits', () => {
      expect(() => tokenize('1e+')).toThrow('malformed number: missing exponent digits');
    });

    it('should reject a lone minus sign', () => {
      expect(() => tokenize('-')).toThrow('<string>:1:2: malformed number');
    });

    it('should reject letters glued to a number', () => {
      expect(() => tokenize('12abc')).toThrow('malformed number');
    });

    it('should reject misspelled literals', () => {
      expect(() => tokenize('tru')).toThrow('invalid literal, expected "true"');
      expect(() => tokenize('nulls')).toThrow('invalid literal, expected "null"');
      expect(() => tokenize('falsy')).toThrow('invalid literal, expected "false"');
    });

    it('should reject an unexpected character', () => {
      expect(() => tokenize('@')).toThrow('<string>:1:1: unexpected character "@"');
    });

    it('should attach position details', () => {
      try {
        tokenize('[1,\n @]');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LexError);
        if (error instanceof LexError) {
          expect(error.details).toEqual({ source: '<string>', line: 2, column: 2 });
        }
      }
    });
  });
});
