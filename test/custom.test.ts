/**
 * Custom Codec Tests
 *
 * User hooks, transforms, recursive codecs, defaults and in-place decoding.
 */

import { describe, it, expect } from 'vitest';
import {
  StringSource,
  TypeMismatchError,
  array,
  custom,
  decodeInto,
  dictionary,
  fromJson,
  integer,
  j,
  lazy,
  map,
  optional,
  record,
  set,
  string,
  toJson,
  transform,
  withDefault,
  type Infer,
  type JsonCodec,
} from '../src/index.js';

interface Point {
  x: number;
  y: number;
}

const point = custom<Point>(
  {
    decodeFrom(parser) {
      const [x, y] = parser.readString('point').split(',').map(Number);
      return { x, y };
    },
    encodeTo(writer, value) {
      writer.string(`${value.x},${value.y}`);
    },
  },
  'point'
);

const timestamp = transform(
  string,
  (text) => new Date(text),
  (value) => value.toISOString(),
  'timestamp'
);

interface TreeNode {
  value: number;
  children: TreeNode[];
}

const Tree: JsonCodec<TreeNode> = lazy(() => record({ value: integer, children: array(Tree) }, 'Tree'));

describe('Custom codecs', () => {
  describe('custom', () => {
    it('should decode and encode through the hooks', () => {
      expect(fromJson('"1,2"', point)).toEqual({ x: 1, y: 2 });
      expect(toJson(point, { x: 3, y: 4 })).toBe('"3,4"');
    });

    it('should plug into records', () => {
      const Segment = record({ from: point, to: point });

      expect(fromJson('{"from":"0,0","to":"1,1"}', Segment)).toEqual({
        from: { x: 0, y: 0 },
        to: { x: 1, y: 1 },
      });
    });

    it('should require a field without an initial hook', () => {
      expect(() => fromJson('{}', record({ at: point }))).toThrow('missing field "at" for record');
    });

    it('should use the initial hook for an absent field', () => {
      const origin = custom<Point>({
        decodeFrom: (parser) => point.decode(parser),
        encodeTo: (writer, value) => point.encode(writer, value),
        initial: () => ({ x: 0, y: 0 }),
      });

      expect(fromJson('{}', record({ at: origin }))).toEqual({ at: { x: 0, y: 0 } });
    });

    it('should surface hook errors', () => {
      expect(() => fromJson('12', point)).toThrow(TypeMismatchError);
      expect(() => fromJson('12', point)).toThrow('cannot decode number 12 as point');
    });
  });

  describe('transform', () => {
    it('should map through the conversions', () => {
      const when = Date.UTC(2024, 0, 2, 3, 4, 5);

      expect(fromJson('"2024-01-02T03:04:05.000Z"', timestamp).getTime()).toBe(when);
      expect(toJson(timestamp, new Date(when))).toBe('"2024-01-02T03:04:05.000Z"');
    });

    it('should map the initial value of its base', () => {
      const count = transform(optional(integer), (value) => value ?? 0, (value) => value);

      expect(fromJson('{}', record({ count }))).toEqual({ count: 0 });
    });
  });

  describe('lazy', () => {
    it('should decode recursive types', () => {
      const json = '{"value":1,"children":[{"value":2,"children":[]},{"value":3,"children":[{"value":4,"children":[]}]}]}';
      const tree = fromJson(json, Tree);

      expect(tree.children.map((child) => child.value)).toEqual([2, 3]);
      expect(tree.children[1].children[0].value).toBe(4);
      expect(toJson(Tree, tree)).toBe(json);
    });
  });

  describe('withDefault', () => {
    it('should call the fallback for each absent field', () => {
      const Config = record({ hosts: withDefault(array(string), () => []) });
      const first = fromJson('{}', Config);
      const second = fromJson('{}', Config);

      first.hosts.push('a');

      expect(second.hosts).toEqual([]);
    });
  });

  describe('decodeInto', () => {
    const Settings = record(
      {
        retries: integer,
        hosts: array(string),
        limits: record({ rate: integer, burst: integer }, 'Limits'),
        labels: dictionary(string),
      },
      'Settings'
    );

    it('should keep absent fields and update nested values in place', () => {
      const settings: Infer<typeof Settings> = {
        retries: 3,
        hosts: ['a'],
        limits: { rate: 1, burst: 2 },
        labels: { env: 'dev' },
      };
      const { hosts, limits, labels } = settings;

      decodeInto(
        new StringSource('{"hosts":["b","c"],"limits":{"rate":5},"labels":{"team":"core"}}'),
        Settings,
        settings
      );

      expect(settings).toEqual({
        retries: 3,
        hosts: ['b', 'c'],
        limits: { rate: 5, burst: 2 },
        labels: { team: 'core' },
      });
      expect(settings.hosts).toBe(hosts);
      expect(settings.limits).toBe(limits);
      expect(settings.labels).toBe(labels);
    });

    it('should refill sets and maps', () => {
      const tags = new Set(['old']);
      const counts = new Map([['old', 1]]);

      decodeInto(new StringSource('["new"]'), set(string), tags);
      decodeInto(new StringSource('{"new":2}'), map(integer), counts);

      expect([...tags]).toEqual(['new']);
      expect([...counts]).toEqual([['new', 2]]);
    });

    it('should keep every dictionary key as an own property', () => {
      const counts: Record<string, number> = { old: 1 };

      decodeInto(new StringSource('{"__proto__":2,"b":3}'), dictionary(integer), counts);

      expect(Object.keys(counts)).toEqual(['__proto__', 'b']);
      expect(Object.getPrototypeOf(counts)).toBe(Object.prototype);
      expect(Object.keys(fromJson('{"__proto__":2,"b":3}', dictionary(integer)))).toEqual(['__proto__', 'b']);
    });

    it('should delegate through lazy and default codecs', () => {
      const node: TreeNode = { value: 1, children: [] };

      decodeInto(new StringSource('{"value":7}'), Tree, node);
      decodeInto(new StringSource('{"value":8}'), withDefault(Tree, () => ({ value: 0, children: [] })), node);

      expect(node).toEqual({ value: 8, children: [] });
    });

    it('should refuse codecs without a mutable form and close the source', () => {
      const source = new StringSource('1');

      expect(() => decodeInto(source, integer, 0)).toThrow('integer values cannot be decoded in place');
      expect(source.closed).toBe(true);
    });
  });

  describe('j', () => {
    it('should expose every constructor under one name', () => {
      const Person = j.record({ name: j.string, age: j.optional(j.integer) }, 'Person');
      const person: j.infer<typeof Person> = { name: 'ada', age: undefined };

      expect(toJson(Person, person)).toBe('{"name":"ada","age":null}');
    });
  });
});
