/**
 * Error Utilities
 *
 * Every failure raised by the codec engine is a JsonError carrying a type
 * and positional details, so callers can tell malformed input apart from a
 * shape mismatch or an unknown field.
 */

/**
 * Error types raised by the engine
 */
export enum JsonErrorType {
  LEX = 'LexError',
  PARSE = 'ParseError',
  UNKNOWN_FIELD = 'UnknownFieldError',
  TYPE_MISMATCH = 'TypeMismatchError',
  ENCODE = 'EncodeError',
}

/**
 * Positional and diagnostic details attached to an error
 */
export interface JsonErrorDetails {
  /** Source label (file path or "<string>") */
  source?: string;
  /** 1-based line of the offending token */
  line?: number;
  /** 1-based column of the offending token */
  column?: number;
  /** What the grammar or codec required at this position */
  expected?: string;
  /** What was actually found */
  actual?: string;
  /** Object key involved, for field errors */
  field?: string;
}

/**
 * Base error with type and details
 */
export class JsonError extends Error {
  constructor(
    public type: JsonErrorType,
    message: string,
    public details: JsonErrorDetails = {}
  ) {
    super(formatMessage(message, details));
    this.name = type;
  }
}

/** Malformed token: bad escape, unterminated string, malformed number */
export class LexError extends JsonError {
  constructor(message: string, details?: JsonErrorDetails) {
    super(JsonErrorType.LEX, message, details);
  }
}

/** Token present but not the kind required at this grammar position */
export class ParseError extends JsonError {
  constructor(message: string, details?: JsonErrorDetails) {
    super(JsonErrorType.PARSE, message, details);
  }
}

/** Object key matching no field of the target type under strict mode */
export class UnknownFieldError extends JsonError {
  constructor(message: string, details?: JsonErrorDetails) {
    super(JsonErrorType.UNKNOWN_FIELD, message, details);
  }
}

/** Token kind incompatible with the shape the codec expects */
export class TypeMismatchError extends JsonError {
  constructor(message: string, details?: JsonErrorDetails) {
    super(JsonErrorType.TYPE_MISMATCH, message, details);
  }
}

/** Value that has no JSON representation */
export class EncodeError extends JsonError {
  constructor(message: string, details?: JsonErrorDetails) {
    super(JsonErrorType.ENCODE, message, details);
  }
}

/**
 * Prefix a message with its source position when one is known
 *
 * @example
 * ```ts
 * formatMessage('expected ":"', { source: 'data.json', line: 3, column: 9 });
 * // 'data.json:3:9: expected ":"'
 * ```
 */
function formatMessage(message: string, details: JsonErrorDetails): string {
  if (details.source === undefined) {
    return message;
  }
  if (details.line === undefined || details.column === undefined) {
    return `${details.source}: ${message}`;
  }
  return `${details.source}:${details.line}:${details.column}: ${message}`;
}

/**
 * Type guard for engine errors
 */
export function isJsonError(error: unknown): error is JsonError {
  return error instanceof JsonError;
}

/**
 * Describe any thrown value for log output
 */
export function describeJsonError(error: unknown): string {
  if (isJsonError(error)) {
    return `${error.type}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create an "expected X but got Y" parse error
 */
export function createExpectedError(
  expected: string,
  actual: string,
  details: JsonErrorDetails = {}
): ParseError {
  return new ParseError(`expected ${expected} but got ${actual}`, {
    ...details,
    expected,
    actual,
  });
}

/**
 * Create a type mismatch error for a codec that could not accept a token
 */
export function createTypeMismatchError(
  expected: string,
  actual: string,
  details: JsonErrorDetails = {}
): TypeMismatchError {
  return new TypeMismatchError(`cannot decode ${actual} as ${expected}`, {
    ...details,
    expected,
    actual,
  });
}

/**
 * Create an unknown field error
 */
export function createUnknownFieldError(
  field: string,
  target: string,
  details: JsonErrorDetails = {}
): UnknownFieldError {
  return new UnknownFieldError(`unknown field "${field}" for ${target}`, {
    ...details,
    field,
  });
}
