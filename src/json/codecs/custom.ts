/**
 * Custom Codecs
 *
 * Extension points for types the built-in shapes do not cover. Anything
 * implementing JsonHooks plugs into the same dispatch as the built-ins.
 */

import type { JsonParser } from '../parser.js';
import type { JsonWriter } from '../serializer.js';
import { JsonCodec } from './codec.js';

/**
 * Low-level decode/encode routines for a user-defined type. `decodeFrom`
 * must consume exactly one JSON value.
 */
export interface JsonHooks<T> {
  decodeFrom(parser: JsonParser): T;
  encodeTo(writer: JsonWriter, value: T): void;
  /** Value used when a record field of this type is absent */
  initial?(): T;
}

export class CustomCodec<T> extends JsonCodec<T> {
  readonly kind = 'custom';

  constructor(
    private readonly hooks: JsonHooks<T>,
    readonly name: string = 'custom value'
  ) {
    super();
  }

  decode(parser: JsonParser): T {
    return this.hooks.decodeFrom(parser);
  }

  encode(writer: JsonWriter, value: T): void {
    this.hooks.encodeTo(writer, value);
  }

  initial(): { value: T } | undefined {
    return this.hooks.initial ? { value: this.hooks.initial() } : undefined;
  }
}

/**
 * A codec whose JSON form is another codec's, mapped through a pair of
 * conversions
 *
 * @example
 * ```ts
 * const date = transform(string, (text) => new Date(text), (value) => value.toISOString(), 'date');
 * ```
 */
export class TransformCodec<S, T> extends JsonCodec<T> {
  readonly kind = 'custom';
  readonly name: string;

  constructor(
    private readonly base: JsonCodec<S>,
    private readonly from: (value: S) => T,
    private readonly to: (value: T) => S,
    name?: string
  ) {
    super();
    this.name = name ?? base.name;
  }

  decode(parser: JsonParser): T {
    return this.from(this.base.decode(parser));
  }

  encode(writer: JsonWriter, value: T): void {
    this.base.encode(writer, this.to(value));
  }

  initial(): { value: T } | undefined {
    const initial = this.base.initial();
    return initial === undefined ? undefined : { value: this.from(initial.value) };
  }
}

/**
 * Defers codec construction, for recursive types
 */
export class LazyCodec<T> extends JsonCodec<T> {
  readonly kind = 'custom';
  private resolved: JsonCodec<T> | undefined;

  constructor(
    private readonly resolve: () => JsonCodec<T>,
    readonly name: string = 'lazy value'
  ) {
    super();
  }

  private get codec(): JsonCodec<T> {
    if (this.resolved === undefined) {
      this.resolved = this.resolve();
    }
    return this.resolved;
  }

  decode(parser: JsonParser): T {
    return this.codec.decode(parser);
  }

  encode(writer: JsonWriter, value: T): void {
    this.codec.encode(writer, value);
  }

  initial(): { value: T } | undefined {
    return this.codec.initial();
  }

  get inPlace(): boolean {
    return this.codec.inPlace;
  }

  decodeInto(parser: JsonParser, destination: T): void {
    this.codec.decodeInto(parser, destination);
  }
}

/**
 * Gives a codec an initial value so record fields of its type may be absent
 */
export class DefaultCodec<T> extends JsonCodec<T> {
  readonly name: string;

  constructor(
    private readonly base: JsonCodec<T>,
    private readonly fallback: () => T
  ) {
    super();
    this.name = base.name;
  }

  get kind() {
    return this.base.kind;
  }

  decode(parser: JsonParser): T {
    return this.base.decode(parser);
  }

  encode(writer: JsonWriter, value: T): void {
    this.base.encode(writer, value);
  }

  initial(): { value: T } {
    return { value: this.fallback() };
  }

  get inPlace(): boolean {
    return this.base.inPlace;
  }

  decodeInto(parser: JsonParser, destination: T): void {
    this.base.decodeInto(parser, destination);
  }
}

export function custom<T>(hooks: JsonHooks<T>, name?: string): CustomCodec<T> {
  return new CustomCodec(hooks, name);
}

export function transform<S, T>(
  base: JsonCodec<S>,
  from: (value: S) => T,
  to: (value: T) => S,
  name?: string
): TransformCodec<S, T> {
  return new TransformCodec(base, from, to, name);
}

export function lazy<T>(resolve: () => JsonCodec<T>, name?: string): LazyCodec<T> {
  return new LazyCodec(resolve, name);
}

/**
 * @example
 * ```ts
 * const settings = record({ retries: withDefault(integer, () => 3) });
 * fromJson('{}', settings); // { retries: 3 }
 * ```
 */
export function withDefault<T>(base: JsonCodec<T>, fallback: () => T): DefaultCodec<T> {
  return new DefaultCodec(base, fallback);
}
