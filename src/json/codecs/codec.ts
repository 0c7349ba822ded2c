/**
 * Codec Base
 *
 * A codec is the type descriptor for one TypeScript type: it knows the
 * value's shape, how to decode it from the parser cursor and how to encode
 * it to a writer. Codecs compose, so a record codec holds one codec per
 * field, an array codec holds its element codec, and so on.
 */

import type { JsonParser } from '../parser.js';
import type { JsonWriter } from '../serializer.js';
import type { CodecKind } from '../types.js';

export abstract class JsonCodec<T> {
  abstract readonly kind: CodecKind;

  /** Shape name used in error messages */
  abstract readonly name: string;

  /**
   * Consume exactly one JSON value and return it as T
   */
  abstract decode(parser: JsonParser): T;

  abstract encode(writer: JsonWriter, value: T): void;

  /**
   * Value a record field takes when its key is absent from the input.
   * Undefined means the field is required.
   */
  initial(): { value: T } | undefined {
    return undefined;
  }

  /** Whether decodeInto mutates its destination */
  get inPlace(): boolean {
    return false;
  }

  /**
   * Consume one JSON value, storing it into an existing destination
   *
   * @throws {TypeError} For shapes that have no mutable representation
   */
  decodeInto(_parser: JsonParser, _destination: T): void {
    throw new TypeError(`${this.name} values cannot be decoded in place`);
  }
}

/**
 * Infer the TypeScript type from a codec.
 */
export type Infer<C> = C extends JsonCodec<infer T> ? T : never;
