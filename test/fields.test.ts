import { describe, it, expect } from 'vitest';
import { FieldTable, matchField, normalizeIdentifier } from '../src/index.js';

describe('Field matching', () => {
  describe('normalizeIdentifier', () => {
    it('should ignore case and word separators', () => {
      expect(normalizeIdentifier('fooBar')).toBe('foobar');
      expect(normalizeIdentifier('foo_bar')).toBe('foobar');
      expect(normalizeIdentifier('Foo-Bar')).toBe('foobar');
      expect(normalizeIdentifier('FOO BAR')).toBe('foobar');
    });
  });

  describe('matchField', () => {
    const table = new FieldTable(['id', 'userName'], 'User');

    it('should resolve keys to declaration indices', () => {
      expect(matchField(table, 'user_name', true)).toEqual({ matched: true, index: 1 });
      expect(matchField(table, 'ID', false)).toEqual({ matched: true, index: 0 });
    });

    it('should reject a miss in strict mode and skip it otherwise', () => {
      expect(matchField(table, 'email', true)).toEqual({ matched: false, action: 'reject' });
      expect(matchField(table, 'email', false)).toEqual({ matched: false, action: 'skip' });
    });
  });

  describe('FieldTable', () => {
    it('should refuse names that collide after normalization', () => {
      expect(() => new FieldTable(['fooBar', 'foo_bar'], 'Pair')).toThrow(
        'Pair: "fooBar" and "foo_bar" are the same name after normalization'
      );
    });
  });
});
