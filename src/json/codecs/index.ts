import type { Infer, JsonCodec } from './codec.js';
import {
  array,
  dictionary,
  map,
  nullable,
  optional,
  set,
  tuple,
} from './containers.js';
import { custom, lazy, transform, withDefault } from './custom.js';
import {
  bigint,
  boolean,
  char,
  enumeration,
  integer,
  literal,
  number,
  string,
} from './primitives.js';
import { record } from './record.js';
import { taggedUnion } from './union.js';

export { JsonCodec, type Infer } from './codec.js';
export {
  ArrayCodec,
  DictionaryCodec,
  MapCodec,
  NullableCodec,
  OptionalCodec,
  SetCodec,
  TupleCodec,
  array,
  dictionary,
  map,
  nullable,
  optional,
  set,
  tuple,
  type InferTuple,
} from './containers.js';
export {
  CustomCodec,
  DefaultCodec,
  LazyCodec,
  TransformCodec,
  custom,
  lazy,
  transform,
  withDefault,
  type JsonHooks,
} from './custom.js';
export {
  EnumCodec,
  LiteralCodec,
  bigint,
  boolean,
  char,
  enumeration,
  integer,
  literal,
  number,
  string,
  type LiteralValue,
} from './primitives.js';
export { RecordCodec, record, type FieldCodecs, type InferFields } from './record.js';
export { TaggedUnionCodec, taggedUnion, type UnionValue, type VariantFields } from './union.js';

/**
 * All codec constructors under one name
 *
 * @example
 * ```ts
 * const Person = j.record({ name: j.string, age: j.integer });
 * type Person = j.infer<typeof Person>;
 * ```
 */
export const j = {
  // Primitives
  boolean,
  number,
  integer,
  bigint,
  string,
  char,
  literal,
  enumeration,

  // Containers
  optional,
  nullable,
  array,
  tuple,
  set,
  map,
  dictionary,

  // Records & unions
  record,
  taggedUnion,

  // Extension
  custom,
  transform,
  lazy,
  withDefault,
} as const;

export declare namespace j {
  export type infer<C> = Infer<C>;
  export type Codec<T> = JsonCodec<T>;
}
