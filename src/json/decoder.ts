/**
 * Decode Operations
 *
 * Entry points that bind a source to a parser and run one codec over it.
 * The source is closed on every exit path, including failures.
 */

import type { JsonCodec } from './codecs/codec.js';
import { JsonParser } from './parser.js';
import { FileSource, StringSource, closeResource } from './sources.js';
import type { CharSource, DecodeOptions } from './types.js';

function withParser<R>(
  source: CharSource,
  options: DecodeOptions | undefined,
  body: (parser: JsonParser) => R
): R {
  let pending = true;
  try {
    const result = body(new JsonParser(source, options));
    pending = false;
    return result;
  } finally {
    closeResource(source, source.label, pending);
  }
}

/**
 * Decode one JSON value from the start of `source`. The token following
 * the value is read; anything after it is left unread.
 *
 * @throws {JsonError} When the input is malformed or does not match the codec
 */
export function decode<T>(source: CharSource, codec: JsonCodec<T>, options?: DecodeOptions): T {
  return withParser(source, options, (parser) => codec.decode(parser));
}

/**
 * Decode one JSON value into an existing destination
 *
 * @example
 * ```ts
 * const settings = { retries: 3, hosts: ['a'] };
 * decodeInto(new StringSource('{"hosts":["b","c"]}'), Settings, settings);
 * // settings is now { retries: 3, hosts: ['b', 'c'] }
 * ```
 *
 * @throws {TypeError} When the codec has no mutable representation
 */
export function decodeInto<T>(
  source: CharSource,
  codec: JsonCodec<T>,
  destination: T,
  options?: DecodeOptions
): void {
  withParser(source, options, (parser) => codec.decodeInto(parser, destination));
}

/**
 * Decode a complete JSON document held in a string
 *
 * @throws {ParseError} If anything but whitespace follows the value
 */
export function fromJson<T>(text: string, codec: JsonCodec<T>, options?: DecodeOptions): T {
  return withParser(new StringSource(text), options, (parser) => {
    const value = codec.decode(parser);
    parser.expectEnd();
    return value;
  });
}

export function readJsonFile<T>(path: string, codec: JsonCodec<T>, options?: DecodeOptions): T {
  return withParser(new FileSource(path), options, (parser) => {
    const value = codec.decode(parser);
    parser.expectEnd();
    return value;
  });
}
