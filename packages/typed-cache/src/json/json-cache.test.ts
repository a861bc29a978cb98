import { describe, it, expect } from 'vitest';
import { valueType } from '../value-type/value-type.js';
import { createJsonCache, parseJsonArray, parseJsonObject } from './json-cache.js';

describe('parseJsonObject', () => {
  describe('given JSON text holding an object', () => {
    it('creates a cache of its entries', () => {
      const result = parseJsonObject('{"name":"Ada","age":36}');

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.get('name', valueType.string)).toBe('Ada');
        expect(result.value.get('age', valueType.number)).toBe(36);
      }
    });
  });

  describe('given an own __proto__ key', () => {
    it('keeps it as an entry', () => {
      const result = parseJsonObject('{"__proto__":{"admin":true},"name":"Ada"}');

      expect(result.isOk() && [...result.value.allValues().keys()]).toEqual(['__proto__', 'name']);
      expect(result.isOk() && result.value.toJson()).toBe(
        '{"__proto__":{"admin":true},"name":"Ada"}'
      );
    });
  });

  describe('given invalid JSON text', () => {
    it('fails with invalid_json', () => {
      const result = parseJsonObject('{name: Ada}');

      expect(result.isErr() && result.error.code).toBe('invalid_json');
      expect(result.isErr() && result.error.message).toBe('Failed to parse JSON text');
    });
  });

  describe.each(['[1, 2]', 'null', '"text"', '42'])('given %s at the top level', (text) => {
    it('fails with not_an_object', () => {
      const result = parseJsonObject(text);

      expect(result.isErr() && result.error).toEqual({
        code: 'not_an_object',
        message: 'JSON text does not hold an object',
      });
    });
  });
});

describe('parseJsonArray', () => {
  it('creates a cache for each object, skipping other elements', () => {
    const caches = parseJsonArray('[{"id":1}, 2, "x", {"id":2}]');

    expect(caches.map((cache) => cache.get('id'))).toEqual([1, 2]);
  });

  it.each(['{"id":1}', 'not json'])('returns an empty list for %s', (text) => {
    expect(parseJsonArray(text)).toEqual([]);
  });
});

describe('createJsonCache', () => {
  describe('json', () => {
    it('reads a nested object', () => {
      const user = createJsonCache([['address', { city: 'London' }]]);

      expect(user.json('address')?.get('city')).toBe('London');
    });

    it('reads a nested object stored as JSON text', () => {
      const user = createJsonCache([['address', '{"city":"Paris"}']]);

      expect(user.json('address')?.get('city')).toBe('Paris');
    });

    it('returns a nested JSON cache as is', () => {
      const address = createJsonCache([['city', 'Rome']]);
      const user = createJsonCache([['address', address]]);

      expect(user.json('address')).toBe(address);
    });

    it.each([
      ['an absent key', 'missing'],
      ['a number', 'age'],
      ['text that is not an object', 'name'],
      ['an array', 'tags'],
    ])('returns undefined for %s', (_description, key) => {
      const user = createJsonCache([
        ['age', 36],
        ['name', 'Ada'],
        ['tags', [{ a: 1 }]],
      ]);

      expect(user.json(key)).toBeUndefined();
    });
  });

  describe('array', () => {
    it('reads nested objects, skipping other elements', () => {
      const order = createJsonCache([['items', [{ sku: 'a' }, 'skip', { sku: 'b' }]]]);

      expect(order.array('items')?.map((item) => item.get('sku'))).toEqual(['a', 'b']);
    });

    it('reads an array stored as JSON text', () => {
      const order = createJsonCache([['items', '[{"sku":"c"}]']]);

      expect(order.array('items')?.map((item) => item.get('sku'))).toEqual(['c']);
    });

    it('returns undefined when the value is not an array', () => {
      const order = createJsonCache([['items', { sku: 'a' }]]);

      expect(order.array('items')).toBeUndefined();
      expect(order.array('missing')).toBeUndefined();
    });
  });

  describe('toJson', () => {
    it('encodes every entry, expanding nested caches', () => {
      const user = createJsonCache([['name', 'Ada']]);
      user.set('address', createJsonCache([['city', 'London']]));

      expect(user.toJson()).toBe('{"name":"Ada","address":{"city":"London"}}');
    });

    it('expands caches inside arrays', () => {
      const order = createJsonCache([['items', [createJsonCache([['sku', 'a']])]]]);

      expect(order.toJson()).toBe('{"items":[{"sku":"a"}]}');
    });

    it('throws when a value cannot be encoded', () => {
      const cache = createJsonCache([['big', 1n]]);

      expect(() => cache.toJson()).toThrow(TypeError);
    });
  });

  describe('require', () => {
    it('returns the cache', () => {
      const cache = createJsonCache([['name', 'Ada']]);

      const result = cache.require('name');

      expect(result.isOk() && result.value).toBe(cache);
    });
  });
});
