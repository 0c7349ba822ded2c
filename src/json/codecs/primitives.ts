/**
 * Primitive Codecs
 *
 * Scalars that map onto a single token: booleans, numbers, strings,
 * single characters, bigints, literals and string enumerations.
 */

import { EncodeError, createExpectedError, createTypeMismatchError } from '../../utils/errors.js';
import { FieldTable } from '../fields.js';
import { describeToken, type JsonParser } from '../parser.js';
import type { JsonWriter } from '../serializer.js';
import { TokenKind } from '../types.js';
import { JsonCodec } from './codec.js';

class PrimitiveCodec<T> extends JsonCodec<T> {
  readonly kind = 'primitive';

  constructor(
    readonly name: string,
    private readonly read: (parser: JsonParser) => T,
    private readonly write: (writer: JsonWriter, value: T) => void
  ) {
    super();
  }

  decode(parser: JsonParser): T {
    return this.read(parser);
  }

  encode(writer: JsonWriter, value: T): void {
    this.write(writer, value);
  }
}

function createPrimitiveCodec<T>(
  name: string,
  read: (parser: JsonParser) => T,
  write: (writer: JsonWriter, value: T) => void
): JsonCodec<T> {
  return new PrimitiveCodec(name, read, write);
}

export const boolean: JsonCodec<boolean> = createPrimitiveCodec(
  'boolean',
  (parser) => {
    const kind = parser.peekKind();
    if (kind !== TokenKind.True && kind !== TokenKind.False) {
      throw parser.mismatch('boolean');
    }
    parser.advance();
    return kind === TokenKind.True;
  },
  (writer, value) => writer.boolean(value)
);

/** Any finite JSON number */
export const number: JsonCodec<number> = createPrimitiveCodec(
  'number',
  (parser) => {
    const at = parser.position();
    const text = parser.readNumberText('number');
    const value = Number(text);
    if (!Number.isFinite(value)) {
      throw createTypeMismatchError('finite number', `number ${text}`, at);
    }
    return value;
  },
  (writer, value) => writer.number(value)
);

/** A number whose value is a safe integer (`1e2` is accepted, `1.5` is not) */
export const integer: JsonCodec<number> = createPrimitiveCodec(
  'integer',
  (parser) => {
    const at = parser.position();
    const text = parser.readNumberText('integer');
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
      throw createTypeMismatchError('integer', `number ${text}`, at);
    }
    return value;
  },
  (writer, value) => {
    if (!Number.isSafeInteger(value)) {
      throw new EncodeError(`cannot encode ${String(value)} as an integer`);
    }
    writer.number(value);
  }
);

/** Arbitrary-precision integer written as a bare JSON number */
export const bigint: JsonCodec<bigint> = createPrimitiveCodec(
  'bigint',
  (parser) => {
    const at = parser.position();
    const text = parser.readNumberText('bigint');
    if (!/^-?\d+$/.test(text)) {
      throw createTypeMismatchError('bigint', `number ${text}`, at);
    }
    return BigInt(text);
  },
  (writer, value) => writer.bigint(value)
);

export const string: JsonCodec<string> = createPrimitiveCodec(
  'string',
  (parser) => parser.readString('string'),
  (writer, value) => writer.string(value)
);

/** A string of exactly one UTF-16 code unit */
export const char: JsonCodec<string> = createPrimitiveCodec(
  'char',
  (parser) => {
    const at = parser.position();
    const text = parser.readString('char');
    if (text.length !== 1) {
      throw createTypeMismatchError('char', `string ${JSON.stringify(text)}`, at);
    }
    return text;
  },
  (writer, value) => {
    if (typeof value !== 'string' || value.length !== 1) {
      throw new EncodeError(`cannot encode ${JSON.stringify(value)} as a single character`);
    }
    writer.string(value);
  }
);

/**
 * Codec for a closed set of names written as JSON strings. Input names are
 * matched under identifier normalization; output uses the declared spelling.
 */
export class EnumCodec<N extends string> extends JsonCodec<N> {
  readonly kind = 'primitive';
  readonly name: string;
  private readonly table: FieldTable;

  constructor(
    readonly values: readonly N[],
    name?: string
  ) {
    super();
    this.name = name ?? `enumeration of ${values.join(', ')}`;
    this.table = new FieldTable(values, this.name);
  }

  decode(parser: JsonParser): N {
    const at = parser.position();
    const text = parser.readString(this.name);
    const index = this.table.lookup(text);
    if (index === undefined) {
      throw parser.fail(`invalid value ${JSON.stringify(text)} for ${this.name}`, {
        ...at,
        expected: this.values.join(' | '),
        actual: text,
      });
    }
    return this.values[index];
  }

  encode(writer: JsonWriter, value: N): void {
    if (!this.values.includes(value)) {
      throw new EncodeError(`invalid value ${JSON.stringify(value)} for ${this.name}`);
    }
    writer.string(value);
  }
}

/**
 * @example
 * ```ts
 * const color = enumeration(['red', 'green', 'blue']);
 * fromJson('"Green"', color); // 'green'
 * ```
 */
export function enumeration<N extends string>(values: readonly N[], name?: string): EnumCodec<N> {
  return new EnumCodec(values, name);
}

export type LiteralValue = string | number | boolean;

/**
 * Exactly one constant. Strings compare verbatim, numbers by value, so the
 * literal 100 also accepts `1e2`.
 */
export class LiteralCodec<V extends LiteralValue> extends JsonCodec<V> {
  readonly kind = 'primitive';
  readonly name: string;

  constructor(readonly value: V) {
    super();
    this.name = `literal ${JSON.stringify(value)}`;
  }

  decode(parser: JsonParser): V {
    const at = parser.position();
    const actual = describeToken(parser.token);
    if (!this.accepts(parser)) {
      throw createExpectedError(JSON.stringify(this.value), actual, at);
    }
    return this.value;
  }

  encode(writer: JsonWriter, value: V): void {
    if (value !== this.value) {
      throw new EncodeError(`cannot encode ${JSON.stringify(value)} as ${this.name}`);
    }
    const output: LiteralValue = value;
    if (typeof output === 'string') {
      writer.string(output);
    } else if (typeof output === 'number') {
      writer.number(output);
    } else {
      writer.boolean(output);
    }
  }

  private accepts(parser: JsonParser): boolean {
    const expected: LiteralValue = this.value;
    if (typeof expected === 'string') {
      return parser.readString(this.name) === expected;
    }
    if (typeof expected === 'number') {
      return Number(parser.readNumberText(this.name)) === expected;
    }
    return boolean.decode(parser) === expected;
  }
}

export function literal<V extends LiteralValue>(value: V): LiteralCodec<V> {
  return new LiteralCodec(value);
}
