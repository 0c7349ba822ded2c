/**
 * Tagged Union Codec
 *
 * Discriminated records: a discriminant field naming the variant, followed
 * by that variant's fields. The discriminant must be the first key of the
 * JSON object. The decoder learns the active variant from it before any
 * other key is read, and every later key is resolved against that
 * variant's fields only, so a field of another variant is an unknown field.
 */

import { EncodeError } from '../../utils/errors.js';
import { normalizeIdentifier } from '../fields.js';
import type { JsonParser } from '../parser.js';
import type { JsonWriter } from '../serializer.js';
import { JsonCodec } from './codec.js';
import { EnumCodec } from './primitives.js';
import {
  createFieldLayout,
  decodeField,
  encodeFields,
  fillMissingFields,
  isRecord,
  type FieldCodecs,
  type FieldLayout,
  type InferFields,
} from './record.js';

export type VariantFields = Record<string, FieldCodecs>;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

export type UnionValue<D extends string, V extends VariantFields> = {
  [K in keyof V & string]: Simplify<{ [P in D]: K } & InferFields<V[K]>>;
}[keyof V & string];

export class TaggedUnionCodec<T> extends JsonCodec<T> {
  readonly kind = 'taggedUnion';
  readonly name: string;
  readonly tags: EnumCodec<string>;
  private readonly layouts = new Map<string, FieldLayout>();

  /**
   * @throws {TypeError} If a variant declares a field named like the discriminant
   */
  constructor(
    readonly discriminant: string,
    variants: VariantFields,
    name = 'tagged union'
  ) {
    super();
    this.name = name;
    this.tags = new EnumCodec(Object.keys(variants), `variant of ${name}`);

    const normalized = normalizeIdentifier(discriminant);
    for (const [variant, fields] of Object.entries(variants)) {
      const layout = createFieldLayout(`${name} variant ${variant}`, fields);
      if (layout.table.lookup(normalized) !== undefined) {
        throw new TypeError(`${layout.owner}: field "${discriminant}" clashes with the discriminant`);
      }
      this.layouts.set(variant, layout);
    }
  }

  decode(parser: JsonParser): T {
    const target: Record<string, unknown> = {};
    this.decodeObject(parser, target, false);
    return target as T;
  }

  encode(writer: JsonWriter, value: T): void {
    if (!isRecord(value)) {
      throw new EncodeError(`expected an object for ${this.name}`);
    }
    const tag = value[this.discriminant];
    const layout = typeof tag === 'string' ? this.layouts.get(tag) : undefined;
    if (typeof tag !== 'string' || layout === undefined) {
      throw new EncodeError(`invalid ${this.discriminant} ${JSON.stringify(tag)} for ${this.name}`);
    }
    writer.beginObject();
    writer.key(this.discriminant);
    this.tags.encode(writer, tag);
    encodeFields(writer, layout, value);
    writer.endObject();
  }

  get inPlace(): boolean {
    return true;
  }

  /**
   * Fields are kept when the variant is unchanged; otherwise the
   * destination is cleared and rebuilt for the new variant.
   */
  decodeInto(parser: JsonParser, destination: T): void {
    if (!isRecord(destination)) {
      throw new TypeError(`${this.name} can only be decoded into an object`);
    }
    this.decodeObject(parser, destination, true);
  }

  private decodeObject(parser: JsonParser, target: Record<string, unknown>, inPlace: boolean): void {
    const at = parser.position();
    const seen = new Set<number>();
    const state: { active: FieldLayout | undefined; rebuilt: boolean } = {
      active: undefined,
      rebuilt: !inPlace,
    };

    const discriminant = normalizeIdentifier(this.discriminant);

    parser.readObject(this.name, (key, keyAt) => {
      const active = state.active;
      if (active === undefined) {
        if (normalizeIdentifier(key) !== discriminant) {
          throw parser.fail('expected discriminant field first', {
            ...keyAt,
            expected: this.discriminant,
            actual: key,
            field: key,
          });
        }
        const tag = this.tags.decode(parser);
        if (target[this.discriminant] !== tag) {
          for (const existing of Object.keys(target)) {
            delete target[existing];
          }
          state.rebuilt = true;
        }
        target[this.discriminant] = tag;
        state.active = this.variant(tag);
        return;
      }
      // A second tag cannot switch variants once fields have been decoded.
      if (normalizeIdentifier(key) === discriminant) {
        throw parser.fail(`duplicate field "${key}" for ${this.name}`, { ...keyAt, field: key });
      }
      decodeField(parser, active, key, keyAt, target, seen, inPlace);
    });

    if (state.active === undefined) {
      throw parser.fail('expected discriminant field first', { ...at, expected: this.discriminant });
    }
    if (state.rebuilt) {
      fillMissingFields(parser, state.active, target, seen, at);
    }
  }

  private variant(tag: string): FieldLayout {
    const layout = this.layouts.get(tag);
    if (layout === undefined) {
      throw new TypeError(`${this.name}: no layout for variant "${tag}"`);
    }
    return layout;
  }
}

/**
 * @example
 * ```ts
 * const fruit = taggedUnion('kind', {
 *   Apple: { apple: string },
 *   Banana: { banana: number },
 * });
 * fromJson('{"kind":"Apple","apple":"x"}', fruit); // { kind: 'Apple', apple: 'x' }
 * ```
 */
export function taggedUnion<D extends string, V extends VariantFields>(
  discriminant: D,
  variants: V,
  name?: string
): TaggedUnionCodec<UnionValue<D, V>> {
  return new TaggedUnionCodec(discriminant, variants, name);
}
