/**
 * JSON Parser Cursor
 *
 * Wraps the tokenizer with one token of lookahead. Codecs drive it through
 * advance/expect and the shared sequence and object loops, which enforce the
 * comma and bracket discipline for every container shape.
 *
 * After a codec decodes one value, the current token is the first token
 * following that value.
 */

import { getConfig } from '../config.js';
import {
  ParseError,
  createExpectedError,
  createTypeMismatchError,
  type JsonErrorDetails,
  type TypeMismatchError,
} from '../utils/errors.js';
import { JsonTokenizer } from './tokenizer.js';
import {
  TokenKind,
  type CharSource,
  type DecodeOptions,
  type ResolvedDecodeOptions,
  type Token,
} from './types.js';

/**
 * Merge per-call options over the configured defaults
 */
export function resolveDecodeOptions(options: DecodeOptions = {}): ResolvedDecodeOptions {
  const config = getConfig();
  return {
    strictFields: options.strictFields ?? config.strictFields,
    duplicateKeys: options.duplicateKeys ?? config.duplicateKeys,
    duplicateElements: options.duplicateElements ?? config.duplicateElements,
    maxDepth: options.maxDepth ?? config.maxDepth,
  };
}

/**
 * Human-readable token description for error messages
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.String:
      return `string ${JSON.stringify(token.text)}`;
    case TokenKind.Number:
      return `number ${token.text}`;
    default:
      return token.kind;
  }
}

export class JsonParser {
  readonly options: ResolvedDecodeOptions;
  private readonly tokenizer: JsonTokenizer;
  private current: Token;
  private depth = 0;

  /**
   * Reads the first token immediately.
   *
   * @throws {LexError} If the first token is malformed
   */
  constructor(source: CharSource, options?: DecodeOptions) {
    this.options = resolveDecodeOptions(options);
    this.tokenizer = new JsonTokenizer(source);
    this.current = this.tokenizer.next();
  }

  get label(): string {
    return this.tokenizer.label;
  }

  /** The current token */
  get token(): Token {
    return this.current;
  }

  peekKind(): TokenKind {
    return this.current.kind;
  }

  advance(): void {
    this.current = this.tokenizer.next();
  }

  /**
   * Consume the current token if it has the given kind
   *
   * @throws {ParseError} If it does not
   */
  expect(kind: TokenKind): void {
    if (this.current.kind !== kind) {
      throw createExpectedError(kind, describeToken(this.current), this.position());
    }
    this.advance();
  }

  /**
   * Require that nothing follows the value just decoded
   */
  expectEnd(): void {
    this.expect(TokenKind.EndOfInput);
  }

  position(token: Token = this.current): JsonErrorDetails {
    return { source: this.label, line: token.line, column: token.column };
  }

  /**
   * Error for a codec that cannot accept the current token
   */
  mismatch(expected: string): TypeMismatchError {
    return createTypeMismatchError(expected, describeToken(this.current), this.position());
  }

  fail(message: string, details: JsonErrorDetails = this.position()): ParseError {
    return new ParseError(message, details);
  }

  /**
   * Consume a string token used as a value
   *
   * @throws {TypeMismatchError} If the current token is not a string
   */
  readString(expected = 'string'): string {
    if (this.current.kind !== TokenKind.String) {
      throw this.mismatch(expected);
    }
    const text = this.current.text;
    this.advance();
    return text;
  }

  /**
   * Consume a number token and return its lexeme
   *
   * @throws {TypeMismatchError} If the current token is not a number
   */
  readNumberText(expected = 'number'): string {
    if (this.current.kind !== TokenKind.Number) {
      throw this.mismatch(expected);
    }
    const text = this.current.text;
    this.advance();
    return text;
  }

  enter(): void {
    this.depth++;
    if (this.depth > this.options.maxDepth) {
      throw this.fail(`maximum nesting depth of ${this.options.maxDepth} exceeded`);
    }
  }

  leave(): void {
    this.depth--;
  }

  /**
   * After an element: consume a comma, or stop at the closing token.
   * A comma directly followed by the closing token is rejected.
   *
   * @throws {ParseError} On anything else
   */
  separator(close: TokenKind.ArrayClose | TokenKind.ObjectClose): void {
    if (this.current.kind === TokenKind.Comma) {
      this.advance();
      if (this.peekKind() === close) {
        throw this.fail(`trailing comma before ${close}`);
      }
      return;
    }
    if (this.current.kind !== close) {
      throw createExpectedError(
        `${TokenKind.Comma} or ${close}`,
        describeToken(this.current),
        this.position()
      );
    }
  }

  /**
   * Decode `[ value (, value)* ]`, calling `each` once per element. `each`
   * must consume exactly one JSON value.
   *
   * @param target - Shape name for the mismatch error when no array is present
   */
  readSequence(target: string, each: (index: number) => void): void {
    if (this.current.kind !== TokenKind.ArrayOpen) {
      throw this.mismatch(target);
    }
    this.enter();
    this.advance();

    let index = 0;
    while (this.peekKind() !== TokenKind.ArrayClose) {
      each(index++);
      this.separator(TokenKind.ArrayClose);
    }

    this.advance();
    this.leave();
  }

  /**
   * Decode `{ "key" : value (, "key" : value)* }`, calling `each` once per
   * entry with the cursor on the value. `each` must consume exactly one JSON
   * value.
   *
   * @param target - Shape name for the mismatch error when no object is present
   */
  readObject(target: string, each: (key: string, at: JsonErrorDetails) => void): void {
    if (this.current.kind !== TokenKind.ObjectOpen) {
      throw this.mismatch(target);
    }
    this.enter();
    this.advance();

    while (this.peekKind() !== TokenKind.ObjectClose) {
      const at = this.position();
      const token = this.token;
      if (token.kind !== TokenKind.String) {
        throw createExpectedError('object key', describeToken(token), at);
      }
      const key = token.text;
      this.advance();
      this.expect(TokenKind.Colon);
      each(key, at);
      this.separator(TokenKind.ObjectClose);
    }

    this.advance();
    this.leave();
  }

  /**
   * Consume exactly one JSON value of any shape, validating its grammar
   */
  skipValue(): void {
    switch (this.current.kind) {
      case TokenKind.String:
      case TokenKind.Number:
      case TokenKind.True:
      case TokenKind.False:
      case TokenKind.Null:
        this.advance();
        return;
      case TokenKind.ArrayOpen:
        this.readSequence('array', () => this.skipValue());
        return;
      case TokenKind.ObjectOpen:
        this.readObject('object', () => this.skipValue());
        return;
      default:
        throw createExpectedError('value', describeToken(this.current), this.position());
    }
  }
}
