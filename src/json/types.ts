/**
 * JSON Codec Types
 *
 * Shared types for the tokenizer, the parser cursor, the codecs and the
 * writer.
 */

import type { DuplicateElementPolicy, DuplicateKeyPolicy } from '../config.js';

/**
 * Lexical token kinds. The values double as the display text used in error
 * messages.
 */
export enum TokenKind {
  ObjectOpen = '"{"',
  ObjectClose = '"}"',
  ArrayOpen = '"["',
  ArrayClose = '"]"',
  Colon = '":"',
  Comma = '","',
  String = 'string',
  Number = 'number',
  True = 'true',
  False = 'false',
  Null = 'null',
  EndOfInput = 'end of input',
}

/**
 * One lexical unit of JSON
 */
export interface Token {
  kind: TokenKind;
  /** Unescaped text for strings, raw lexeme for numbers, empty otherwise */
  text: string;
  /** 1-based line of the first character */
  line: number;
  /** 1-based column of the first character */
  column: number;
  /** 0-based character offset of the first character */
  offset: number;
}

/**
 * Sequential character input
 */
export interface CharSource {
  /** Label used in error messages, such as a file path */
  readonly label: string;

  /**
   * Next character (one UTF-16 code unit), or undefined at end of input
   */
  read(): string | undefined;

  /**
   * Release the underlying resource. Must be safe to call more than once.
   */
  close(): void;
}

/**
 * Sequential character output
 */
export interface CharSink {
  write(text: string): void;

  /**
   * Flush and release the underlying resource
   */
  close(): void;
}

/**
 * Options for decoding
 */
export interface DecodeOptions {
  /**
   * Reject object keys that match no field of the target record
   * @default true (JSON_STRICT_FIELDS)
   */
  strictFields?: boolean;

  /**
   * What to do when an object repeats a key
   * @default 'error' (JSON_DUPLICATE_KEYS)
   */
  duplicateKeys?: DuplicateKeyPolicy;

  /**
   * What to do when a set receives an element it already holds
   * @default 'error' (JSON_DUPLICATE_ELEMENTS)
   */
  duplicateElements?: DuplicateElementPolicy;

  /**
   * Maximum nesting of arrays and objects
   * @default 512 (JSON_MAX_DEPTH)
   */
  maxDepth?: number;
}

export type ResolvedDecodeOptions = Required<DecodeOptions>;

/**
 * Options for encoding
 */
export interface EncodeOptions {
  /**
   * Enable pretty printing with indentation
   * @default false
   */
  pretty?: boolean;

  /**
   * Indentation string/spacing for pretty printing
   * @default 2
   */
  indent?: number | string;
}

/**
 * Shape classification carried by every codec
 */
export type CodecKind =
  | 'primitive'
  | 'optional'
  | 'sequence'
  | 'set'
  | 'map'
  | 'record'
  | 'taggedUnion'
  | 'custom';
