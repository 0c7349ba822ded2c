/**
 * JSON Tokenizer
 *
 * Pulls characters from a CharSource one at a time and produces tokens
 * lazily. Holds at most one character of lookahead, so the source is never
 * read further than the end of the token just returned plus one character.
 */

import { LexError } from '../utils/errors.js';
import { TokenKind, type CharSource, type Token } from './types.js';

const PUNCTUATION: Record<string, TokenKind> = {
  '{': TokenKind.ObjectOpen,
  '}': TokenKind.ObjectClose,
  '[': TokenKind.ArrayOpen,
  ']': TokenKind.ArrayClose,
  ':': TokenKind.Colon,
  ',': TokenKind.Comma,
};

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

function isHexDigit(char: string | undefined): char is string {
  return char !== undefined && /^[0-9a-fA-F]$/.test(char);
}

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && /^[A-Za-z0-9_]$/.test(char);
}

function isWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

/**
 * Streaming tokenizer over a character source
 */
export class JsonTokenizer {
  private lookahead: string | undefined;
  private hasLookahead = false;
  private finished = false;

  /** Position of the next character to be taken */
  private line = 1;
  private column = 1;
  private offset = 0;

  constructor(private readonly source: CharSource) {}

  get label(): string {
    return this.source.label;
  }

  /**
   * Produce the next token. Returns EndOfInput forever once the source is
   * exhausted.
   *
   * @throws {LexError} On a malformed token
   */
  next(): Token {
    while (isWhitespace(this.peekChar())) {
      this.takeChar();
    }

    const line = this.line;
    const column = this.column;
    const offset = this.offset;
    const token = (kind: TokenKind, text = ''): Token => ({ kind, text, line, column, offset });

    const char = this.takeChar();
    if (char === undefined) {
      this.finished = true;
      return token(TokenKind.EndOfInput);
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation !== undefined) {
      return token(punctuation);
    }

    switch (char) {
      case '"':
        return token(TokenKind.String, this.readString(line, column));
      case 't':
        this.readLiteral('true');
        return token(TokenKind.True);
      case 'f':
        this.readLiteral('false');
        return token(TokenKind.False);
      case 'n':
        this.readLiteral('null');
        return token(TokenKind.Null);
      default:
        if (char === '-' || isDigit(char)) {
          return token(TokenKind.Number, this.readNumber(char));
        }
        throw this.error(`unexpected character ${JSON.stringify(char)}`, line, column);
    }
  }

  private peekChar(): string | undefined {
    if (this.finished) {
      return undefined;
    }
    if (!this.hasLookahead) {
      this.lookahead = this.source.read();
      this.hasLookahead = true;
    }
    return this.lookahead;
  }

  private takeChar(): string | undefined {
    const char = this.peekChar();
    this.hasLookahead = false;
    if (char !== undefined) {
      this.offset++;
      if (char === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
    }
    return char;
  }

  /** Take a character already seen through peekChar */
  private consume(): string {
    return this.takeChar() ?? '';
  }

  private error(message: string, line = this.line, column = this.column): LexError {
    return new LexError(message, { source: this.source.label, line, column });
  }

  private readString(line: number, column: number): string {
    let text = '';

    for (;;) {
      const char = this.takeChar();
      if (char === undefined) {
        throw this.error('unterminated string', line, column);
      }
      if (char === '"') {
        return text;
      }
      if (char === '\\') {
        text += this.readEscape(line, column);
        continue;
      }
      if (char.charCodeAt(0) < 0x20) {
        throw this.error('control character in string');
      }
      text += char;
    }
  }

  private readEscape(line: number, column: number): string {
    const char = this.takeChar();
    if (char === undefined) {
      throw this.error('unterminated string', line, column);
    }
    if (char === 'u') {
      let hex = '';
      for (let i = 0; i < 4; i++) {
        const digit = this.takeChar();
        if (!isHexDigit(digit)) {
          throw this.error('invalid unicode escape');
        }
        hex += digit;
      }
      return String.fromCharCode(parseInt(hex, 16));
    }
    const escaped = ESCAPES[char];
    if (escaped === undefined) {
      throw this.error(`invalid escape "\\${char}"`);
    }
    return escaped;
  }

  private readDigits(): string {
    let digits = '';
    while (isDigit(this.peekChar())) {
      digits += this.consume();
    }
    return digits;
  }

  private readNumber(first: string): string {
    let text = first;

    if (first === '-') {
      if (!isDigit(this.peekChar())) {
        throw this.error('malformed number');
      }
      text += this.consume();
    }

    if (text.endsWith('0')) {
      if (isDigit(this.peekChar())) {
        throw this.error('malformed number: leading zero');
      }
    } else {
      text += this.readDigits();
    }

    if (this.peekChar() === '.') {
      text += this.consume();
      const fraction = this.readDigits();
      if (fraction === '') {
        throw this.error('malformed number: missing fraction digits');
      }
      text += fraction;
    }

    const exponent = this.peekChar();
    if (exponent === 'e' || exponent === 'E') {
      text += this.consume();
      const sign = this.peekChar();
      if (sign === '+' || sign === '-') {
        text += this.consume();
      }
      const digits = this.readDigits();
      if (digits === '') {
        throw this.error('malformed number: missing exponent digits');
      }
      text += digits;
    }

    if (isWordChar(this.peekChar())) {
      throw this.error('malformed number');
    }

    return text;
  }

  private readLiteral(word: string): void {
    for (let i = 1; i < word.length; i++) {
      if (this.takeChar() !== word[i]) {
        throw this.error(`invalid literal, expected "${word}"`);
      }
    }
    if (isWordChar(this.peekChar())) {
      throw this.error(`invalid literal, expected "${word}"`);
    }
  }
}
