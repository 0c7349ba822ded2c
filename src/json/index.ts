/**
 * Typed JSON Module
 *
 * Type-directed decoding and encoding straight between JSON text and
 * application values, with no intermediate document tree:
 * - Codecs describing each target type (records, tagged unions, containers)
 * - Strict or lenient field matching with identifier normalization
 * - In-place decoding into existing values
 * - Streaming decode of large top-level arrays
 */

// Export types
export type {
  CharSink,
  CharSource,
  CodecKind,
  DecodeOptions,
  EncodeOptions,
  ResolvedDecodeOptions,
  Token,
} from './types.js';
export { TokenKind } from './types.js';

// Export codecs
export * from './codecs/index.js';

// Export low-level reader and writer
export { JsonTokenizer } from './tokenizer.js';
export { JsonParser, describeToken, resolveDecodeOptions } from './parser.js';
export { JsonWriter, encode, toJson, writeJsonFile } from './serializer.js';
export { FieldTable, matchField, normalizeIdentifier, type FieldMatch } from './fields.js';

// Export sources and sinks
export { FileSink, FileSource, StringSink, StringSource } from './sources.js';

// Export decode operations
export { decode, decodeInto, fromJson, readJsonFile } from './decoder.js';
export { streamFileItems, streamItems } from './stream.js';
