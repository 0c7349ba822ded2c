/**
 * Record Codec
 *
 * Plain objects with a fixed set of declared fields. Keys are resolved
 * through the field-matching policy; unknown keys are rejected or skipped
 * depending on `strictFields`. Fields are written in declaration order.
 */

import { EncodeError, createUnknownFieldError, type JsonErrorDetails } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { FieldTable, matchField } from '../fields.js';
import type { JsonParser } from '../parser.js';
import type { JsonWriter } from '../serializer.js';
import { JsonCodec, type Infer } from './codec.js';

const log = createLogger('Decode');

export type FieldCodecs = Record<string, JsonCodec<unknown>>;

export type InferFields<F extends FieldCodecs> = { [K in keyof F]: Infer<F[K]> };

/**
 * Declared fields of one record or union variant
 */
export interface FieldLayout {
  owner: string;
  names: readonly string[];
  codecs: readonly JsonCodec<unknown>[];
  table: FieldTable;
}

export function createFieldLayout(owner: string, fields: FieldCodecs): FieldLayout {
  const entries = Object.entries(fields);
  const names = entries.map(([name]) => name);
  return {
    owner,
    names,
    codecs: entries.map(([, codec]) => codec),
    table: new FieldTable(names, owner),
  };
}

/**
 * Decode the value of one object entry into `target`. The cursor sits on
 * the value; exactly one JSON value is consumed whatever the outcome.
 *
 * @param seen - Indices of fields already decoded from this object
 * @param inPlace - Decode nested mutable values into what `target` holds
 */
export function decodeField(
  parser: JsonParser,
  layout: FieldLayout,
  key: string,
  at: JsonErrorDetails,
  target: Record<string, unknown>,
  seen: Set<number>,
  inPlace: boolean
): void {
  const match = matchField(layout.table, key, parser.options.strictFields);
  if (!match.matched) {
    if (match.action === 'reject') {
      throw createUnknownFieldError(key, layout.owner, at);
    }
    log.debug(`skipping unknown field "${key}" for ${layout.owner} at ${parser.label}:${at.line}:${at.column}`);
    parser.skipValue();
    return;
  }

  const name = layout.names[match.index];
  if (seen.has(match.index) && parser.options.duplicateKeys === 'error') {
    throw parser.fail(`duplicate field "${key}" for ${layout.owner}`, { ...at, field: key });
  }
  seen.add(match.index);

  const codec = layout.codecs[match.index];
  const current = target[name];
  if (inPlace && codec.inPlace && typeof current === 'object' && current !== null) {
    codec.decodeInto(parser, current);
  } else {
    target[name] = codec.decode(parser);
  }
}

/**
 * Give every field absent from the input its initial value
 *
 * @throws {ParseError} For a missing field that has no initial value
 */
export function fillMissingFields(
  parser: JsonParser,
  layout: FieldLayout,
  target: Record<string, unknown>,
  seen: Set<number>,
  at: JsonErrorDetails
): void {
  layout.names.forEach((name, index) => {
    if (seen.has(index)) {
      return;
    }
    const initial = layout.codecs[index].initial();
    if (initial === undefined) {
      throw parser.fail(`missing field "${name}" for ${layout.owner}`, { ...at, field: name });
    }
    target[name] = initial.value;
  });
}

export function encodeFields(
  writer: JsonWriter,
  layout: FieldLayout,
  value: Record<string, unknown>
): void {
  layout.names.forEach((name, index) => {
    writer.key(name);
    layout.codecs[index].encode(writer, value[name]);
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class RecordCodec<T> extends JsonCodec<T> {
  readonly kind = 'record';
  readonly name: string;
  readonly layout: FieldLayout;

  constructor(fields: FieldCodecs, name = 'record') {
    super();
    this.name = name;
    this.layout = createFieldLayout(name, fields);
  }

  decode(parser: JsonParser): T {
    const at = parser.position();
    const target: Record<string, unknown> = {};
    const seen = new Set<number>();
    parser.readObject(this.name, (key, keyAt) => {
      decodeField(parser, this.layout, key, keyAt, target, seen, false);
    });
    fillMissingFields(parser, this.layout, target, seen, at);
    return target as T;
  }

  encode(writer: JsonWriter, value: T): void {
    if (!isRecord(value)) {
      throw new EncodeError(`expected an object for ${this.name}`);
    }
    writer.beginObject();
    encodeFields(writer, this.layout, value);
    writer.endObject();
  }

  get inPlace(): boolean {
    return true;
  }

  /**
   * Fields absent from the input keep their current values
   */
  decodeInto(parser: JsonParser, destination: T): void {
    if (!isRecord(destination)) {
      throw new TypeError(`${this.name} can only be decoded into an object`);
    }
    const target = destination;
    const seen = new Set<number>();
    parser.readObject(this.name, (key, keyAt) => {
      decodeField(parser, this.layout, key, keyAt, target, seen, true);
    });
  }
}

/**
 * @example
 * ```ts
 * const user = record({ id: integer, userName: string, email: optional(string) }, 'User');
 * fromJson('{"id":1,"user_name":"ada","email":null}', user);
 * // { id: 1, userName: 'ada', email: undefined }
 * ```
 */
export function record<F extends FieldCodecs>(fields: F, name?: string): RecordCodec<InferFields<F>> {
  return new RecordCodec(fields, name);
}
