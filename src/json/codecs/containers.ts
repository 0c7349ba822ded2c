/**
 * Container Codecs
 *
 * Optional values, arrays, tuples, sets and string-keyed maps. Sequence and map
 * codecs lean on the parser's shared loops for the comma and bracket
 * discipline.
 */

import { EncodeError, type JsonErrorDetails } from '../../utils/errors.js';
import type { JsonParser } from '../parser.js';
import type { JsonWriter } from '../serializer.js';
import { TokenKind } from '../types.js';
import { JsonCodec, type Infer } from './codec.js';

/**
 * `null` decodes to undefined; undefined encodes as `null`
 */
export class OptionalCodec<T> extends JsonCodec<T | undefined> {
  readonly kind = 'optional';
  readonly name: string;

  constructor(readonly inner: JsonCodec<T>) {
    super();
    this.name = `optional ${inner.name}`;
  }

  decode(parser: JsonParser): T | undefined {
    if (parser.peekKind() === TokenKind.Null) {
      parser.advance();
      return undefined;
    }
    return this.inner.decode(parser);
  }

  encode(writer: JsonWriter, value: T | undefined): void {
    if (value === undefined) {
      writer.null();
    } else {
      this.inner.encode(writer, value);
    }
  }

  initial(): { value: T | undefined } {
    return { value: undefined };
  }
}

/**
 * Like OptionalCodec but the absent value is `null`
 */
export class NullableCodec<T> extends JsonCodec<T | null> {
  readonly kind = 'optional';
  readonly name: string;

  constructor(readonly inner: JsonCodec<T>) {
    super();
    this.name = `nullable ${inner.name}`;
  }

  decode(parser: JsonParser): T | null {
    if (parser.peekKind() === TokenKind.Null) {
      parser.advance();
      return null;
    }
    return this.inner.decode(parser);
  }

  encode(writer: JsonWriter, value: T | null): void {
    if (value === null) {
      writer.null();
    } else {
      this.inner.encode(writer, value);
    }
  }

  initial(): { value: T | null } {
    return { value: null };
  }
}

export class ArrayCodec<T> extends JsonCodec<T[]> {
  readonly kind = 'sequence';
  readonly name: string;

  constructor(readonly element: JsonCodec<T>) {
    super();
    this.name = `array of ${element.name}`;
  }

  decode(parser: JsonParser): T[] {
    const items: T[] = [];
    parser.readSequence(this.name, () => {
      items.push(this.element.decode(parser));
    });
    return items;
  }

  encode(writer: JsonWriter, value: T[]): void {
    writer.beginArray();
    for (const item of value) {
      this.element.encode(writer, item);
    }
    writer.endArray();
  }

  get inPlace(): boolean {
    return true;
  }

  /**
   * Replace the destination's contents once the whole array has decoded
   */
  decodeInto(parser: JsonParser, destination: T[]): void {
    const items = this.decode(parser);
    destination.length = 0;
    for (const item of items) {
      destination.push(item);
    }
  }
}

/**
 * Fixed-length JSON array with one codec per position
 */
export class TupleCodec<T> extends JsonCodec<T> {
  readonly kind = 'sequence';
  readonly name: string;

  constructor(readonly elements: readonly JsonCodec<unknown>[]) {
    super();
    this.name = `tuple of ${elements.map((element) => element.name).join(', ')}`;
  }

  decode(parser: JsonParser): T {
    const at = parser.position();
    const items: unknown[] = [];
    parser.readSequence(this.name, (index) => {
      const codec = this.elements[index];
      if (codec === undefined) {
        throw parser.fail(`expected ${this.elements.length} elements for ${this.name}`);
      }
      items.push(codec.decode(parser));
    });
    if (items.length !== this.elements.length) {
      throw parser.fail(`expected ${this.elements.length} elements for ${this.name}`, at);
    }
    return items as T;
  }

  encode(writer: JsonWriter, value: T): void {
    if (!Array.isArray(value) || value.length !== this.elements.length) {
      throw new EncodeError(`expected ${this.elements.length} elements for ${this.name}`);
    }
    const items: readonly unknown[] = value;
    writer.beginArray();
    this.elements.forEach((codec, index) => codec.encode(writer, items[index]));
    writer.endArray();
  }
}

/**
 * JSON array decoded into a Set. Repeated elements follow the
 * `duplicateElements` policy; equality is SameValueZero, so only primitive
 * elements can collide.
 */
export class SetCodec<T> extends JsonCodec<Set<T>> {
  readonly kind = 'set';
  readonly name: string;

  constructor(readonly element: JsonCodec<T>) {
    super();
    this.name = `set of ${element.name}`;
  }

  decode(parser: JsonParser): Set<T> {
    const items = new Set<T>();
    parser.readSequence(this.name, () => {
      const at = parser.position();
      const item = this.element.decode(parser);
      if (items.has(item) && parser.options.duplicateElements === 'error') {
        throw parser.fail(`duplicate element ${describeElement(item)} in ${this.name}`, at);
      }
      items.add(item);
    });
    return items;
  }

  encode(writer: JsonWriter, value: Set<T>): void {
    writer.beginArray();
    for (const item of value) {
      this.element.encode(writer, item);
    }
    writer.endArray();
  }

  get inPlace(): boolean {
    return true;
  }

  decodeInto(parser: JsonParser, destination: Set<T>): void {
    const items = this.decode(parser);
    destination.clear();
    for (const item of items) {
      destination.add(item);
    }
  }
}

function describeElement(item: unknown): string {
  return typeof item === 'string' ? JSON.stringify(item) : String(item);
}

/**
 * Shared object loop for string-keyed maps with the duplicate key policy
 */
function readEntries<V>(
  parser: JsonParser,
  name: string,
  valueCodec: JsonCodec<V>,
  entries: Map<string, V>
): void {
  parser.readObject(name, (key: string, at: JsonErrorDetails) => {
    if (entries.has(key) && parser.options.duplicateKeys === 'error') {
      throw parser.fail(`duplicate key ${JSON.stringify(key)} in ${name}`, { ...at, field: key });
    }
    entries.set(key, valueCodec.decode(parser));
  });
}

/**
 * JSON object decoded into a Map, keys kept in input order
 */
export class MapCodec<V> extends JsonCodec<Map<string, V>> {
  readonly kind = 'map';
  readonly name: string;

  constructor(readonly value: JsonCodec<V>) {
    super();
    this.name = `map of ${value.name}`;
  }

  decode(parser: JsonParser): Map<string, V> {
    const entries = new Map<string, V>();
    readEntries(parser, this.name, this.value, entries);
    return entries;
  }

  encode(writer: JsonWriter, value: Map<string, V>): void {
    writer.beginObject();
    for (const [key, item] of value) {
      writer.key(key);
      this.value.encode(writer, item);
    }
    writer.endObject();
  }

  get inPlace(): boolean {
    return true;
  }

  decodeInto(parser: JsonParser, destination: Map<string, V>): void {
    const entries = this.decode(parser);
    destination.clear();
    for (const [key, item] of entries) {
      destination.set(key, item);
    }
  }
}

/**
 * JSON object decoded into a plain Record
 */
export class DictionaryCodec<V> extends JsonCodec<Record<string, V>> {
  readonly kind = 'map';
  readonly name: string;

  constructor(readonly value: JsonCodec<V>) {
    super();
    this.name = `dictionary of ${value.name}`;
  }

  decode(parser: JsonParser): Record<string, V> {
    const entries = new Map<string, V>();
    readEntries(parser, this.name, this.value, entries);
    return Object.fromEntries(entries);
  }

  encode(writer: JsonWriter, value: Record<string, V>): void {
    writer.beginObject();
    for (const [key, item] of Object.entries(value)) {
      writer.key(key);
      this.value.encode(writer, item);
    }
    writer.endObject();
  }

  get inPlace(): boolean {
    return true;
  }

  decodeInto(parser: JsonParser, destination: Record<string, V>): void {
    const entries = this.decode(parser);
    for (const key of Object.keys(destination)) {
      delete destination[key];
    }
    for (const [key, item] of Object.entries(entries)) {
      Object.defineProperty(destination, key, {
        value: item,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
}

export function optional<T>(inner: JsonCodec<T>): OptionalCodec<T> {
  return new OptionalCodec(inner);
}

export function nullable<T>(inner: JsonCodec<T>): NullableCodec<T> {
  return new NullableCodec(inner);
}

export function array<T>(element: JsonCodec<T>): ArrayCodec<T> {
  return new ArrayCodec(element);
}

export type InferTuple<C extends readonly JsonCodec<unknown>[]> = { -readonly [K in keyof C]: Infer<C[K]> };

/**
 * @example
 * ```ts
 * const pair = tuple(string, integer);
 * fromJson('["a",1]', pair); // ['a', 1]
 * ```
 */
export function tuple<C extends JsonCodec<unknown>[]>(...elements: C): TupleCodec<InferTuple<C>> {
  return new TupleCodec(elements);
}

export function set<T>(element: JsonCodec<T>): SetCodec<T> {
  return new SetCodec(element);
}

export function map<V>(value: JsonCodec<V>): MapCodec<V> {
  return new MapCodec(value);
}

export function dictionary<V>(value: JsonCodec<V>): DictionaryCodec<V> {
  return new DictionaryCodec(value);
}
