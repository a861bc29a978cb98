import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { valueType } from '../value-type/value-type.js';
import { KEY_A, KEY_B, KEY_C, KEY_D } from '../test/fixtures.js';
import { createRecordingListener, createRecordingLogger } from '../test/mocks.js';
import { createLruCache } from './lru-cache.js';

describe('createLruCache', () => {
  describe('given an invalid capacity', () => {
    it.each([-1, 1.5])('throws a ZodError for %s', (capacity) => {
      expect(() => createLruCache({ capacity })).toThrow(ZodError);
    });
  });

  describe('given no capacity', () => {
    it('uses the number of distinct initial values', () => {
      const cache = createLruCache<string, number>({
        initialValues: [
          [KEY_A, 1],
          [KEY_B, 2],
          [KEY_A, 3],
        ],
      });

      expect(cache.capacity).toBe(2);
      expect(cache.get(KEY_A)).toBe(3);
    });

    it('is zero when there are no initial values', () => {
      expect(createLruCache<string, number>().capacity).toBe(0);
    });
  });

  describe('given more initial values than capacity', () => {
    it('keeps the last ones', () => {
      const cache = createLruCache<string, number>({
        capacity: 2,
        initialValues: [
          [KEY_A, 1],
          [KEY_B, 2],
          [KEY_C, 3],
        ],
      });

      expect(cache.recency()).toEqual([KEY_B, KEY_C]);
    });
  });

  describe('set', () => {
    describe('given capacity C and C + 1 inserts with no reads', () => {
      it('keeps exactly the last C keys', () => {
        const cache = createLruCache<string, number>({ capacity: 3 });

        cache.set(KEY_A, 1);
        cache.set(KEY_B, 2);
        cache.set(KEY_C, 3);
        cache.set(KEY_D, 4);

        expect(cache.allValues()).toEqual(
          new Map([
            [KEY_B, 2],
            [KEY_C, 3],
            [KEY_D, 4],
          ])
        );
        expect(cache.recency()).toEqual([KEY_B, KEY_C, KEY_D]);
      });
    });

    describe('given an existing key', () => {
      it('replaces the value and promotes the key without evicting', () => {
        const cache = createLruCache<string, number>({ capacity: 2 });
        cache.set(KEY_A, 1);
        cache.set(KEY_B, 2);

        cache.set(KEY_A, 10);

        expect(cache.size()).toBe(2);
        expect(cache.recency()).toEqual([KEY_B, KEY_A]);
        expect(cache.allValues().get(KEY_A)).toBe(10);
      });
    });

    describe('given capacity 0', () => {
      it('evicts every write immediately', () => {
        const cache = createLruCache<string, number>({ capacity: 0 });

        cache.set(KEY_A, 1);

        expect(cache.get(KEY_A)).toBeUndefined();
        expect(cache.size()).toBe(0);
        expect(cache.recency()).toEqual([]);
      });

      it('publishes the write and its eviction', () => {
        const cache = createLruCache<string, number>({ capacity: 0 });
        const { changes, listener } = createRecordingListener<string, number>();
        cache.subscribe(listener);

        cache.set(KEY_A, 1);

        expect(changes.map(({ change }) => change)).toEqual([
          { type: 'set', key: KEY_A, value: 1 },
          { type: 'remove', key: KEY_A },
        ]);
      });
    });

    it('logs each eviction', () => {
      const logger = createRecordingLogger();
      const cache = createLruCache<string, number>({ capacity: 1, logger });

      cache.set(KEY_A, 1);
      cache.set(KEY_B, 2);

      expect(logger.lines).toEqual([
        {
          level: 'debug',
          message: 'evicted least recently used key',
          context: { key: KEY_A, capacity: 1 },
        },
      ]);
    });
  });

  describe('get', () => {
    describe('given keys 1..C, a read of key 1, then key C + 1', () => {
      it('evicts key 2 instead of key 1', () => {
        const cache = createLruCache<number, string>({ capacity: 3 });
        cache.set(1, 'one');
        cache.set(2, 'two');
        cache.set(3, 'three');

        expect(cache.get(1)).toBe('one');
        cache.set(4, 'four');

        expect(cache.recency()).toEqual([3, 1, 4]);
        expect(cache.get(2)).toBeUndefined();
        expect(cache.get(1)).toBe('one');
      });
    });

    describe('given a value of another type', () => {
      it('returns undefined and does not promote', () => {
        const cache = createLruCache<string, unknown>({ capacity: 2 });
        cache.set(KEY_A, 1);
        cache.set(KEY_B, 2);

        expect(cache.get(KEY_A, valueType.string)).toBeUndefined();
        cache.set(KEY_C, 3);

        expect(cache.recency()).toEqual([KEY_B, KEY_C]);
      });
    });
  });

  describe('contains', () => {
    it('promotes a hit', () => {
      const cache = createLruCache<string, number>({ capacity: 2 });
      cache.set(KEY_A, 1);
      cache.set(KEY_B, 2);

      expect(cache.contains(KEY_A)).toBe(true);
      cache.set(KEY_C, 3);

      expect(cache.recency()).toEqual([KEY_A, KEY_C]);
    });

    it('returns false for a miss', () => {
      expect(createLruCache<string, number>({ capacity: 1 }).contains(KEY_A)).toBe(false);
    });
  });

  describe('resolve', () => {
    describe('given a present value of another type', () => {
      it('fails with type_mismatch and still promotes the key', () => {
        const cache = createLruCache<string, unknown>({ capacity: 2 });
        cache.set(KEY_A, 1);
        cache.set(KEY_B, 2);

        const result = cache.resolve(KEY_A, valueType.string);

        expect(result.isErr() && result.error.code).toBe('type_mismatch');
        expect(cache.recency()).toEqual([KEY_B, KEY_A]);
      });
    });

    describe('given a missing key', () => {
      it('fails with missing_key', () => {
        const cache = createLruCache<string, number>({ capacity: 1 });

        const result = cache.resolve(KEY_A);

        expect(result.isErr() && result.error.code).toBe('missing_key');
        expect(cache.recency()).toEqual([]);
      });
    });
  });

  describe('remove', () => {
    it('drops the key from the store and the recency list', () => {
      const cache = createLruCache<string, number>({ capacity: 2 });
      cache.set(KEY_A, 1);
      cache.set(KEY_B, 2);

      cache.remove(KEY_A);

      expect(cache.recency()).toEqual([KEY_B]);
      expect(cache.contains(KEY_A)).toBe(false);
    });

    it('frees capacity for a new key', () => {
      const cache = createLruCache<string, number>({ capacity: 2 });
      cache.set(KEY_A, 1);
      cache.set(KEY_B, 2);

      cache.remove(KEY_A);
      cache.set(KEY_C, 3);

      expect(cache.recency()).toEqual([KEY_B, KEY_C]);
    });

    describe('given an absent key', () => {
      it('does nothing and publishes nothing', () => {
        const cache = createLruCache<string, number>({ capacity: 2 });
        cache.set(KEY_A, 1);
        const { changes, listener } = createRecordingListener<string, number>();
        cache.subscribe(listener);

        cache.remove(KEY_B);

        expect(cache.recency()).toEqual([KEY_A]);
        expect(changes).toEqual([]);
      });
    });
  });

  describe('require', () => {
    it('does not promote', () => {
      const cache = createLruCache<string, number>({ capacity: 2 });
      cache.set(KEY_A, 1);
      cache.set(KEY_B, 2);

      const result = cache.require(KEY_A);
      cache.set(KEY_C, 3);

      expect(result.isOk() && result.value).toBe(cache);
      expect(cache.recency()).toEqual([KEY_B, KEY_C]);
    });

    it('reports every missing key', () => {
      const cache = createLruCache<string, number>({ capacity: 2 });
      cache.set(KEY_A, 1);

      const result = cache.requireKeys([KEY_A, KEY_B]);

      expect(result.isErr() && result.error.keys).toEqual(new Set([KEY_B]));
    });
  });

  describe('valuesOfType', () => {
    it('does not change recency', () => {
      const cache = createLruCache<string, unknown>({ capacity: 2 });
      cache.set(KEY_A, 'text');
      cache.set(KEY_B, 2);

      expect(cache.valuesOfType(valueType.string)).toEqual(new Map([[KEY_A, 'text']]));
      expect(cache.recency()).toEqual([KEY_A, KEY_B]);
    });
  });

  describe('given a listener that reads the cache', () => {
    it('sees the state after the write', () => {
      const cache = createLruCache<string, number>({ capacity: 1 });
      const sizes: number[] = [];
      cache.subscribe(() => {
        sizes.push(cache.size());
      });

      cache.set(KEY_A, 1);
      cache.set(KEY_B, 2);

      // set a; then set b and the eviction of a
      expect(sizes).toEqual([1, 1, 1]);
    });
  });

  describe('given many interleaved tasks on one cache', () => {
    it('keeps the recency list in step with the store', async () => {
      const capacity = 5;
      const cache = createLruCache<string, number>({ capacity });
      const keys = Array.from({ length: 12 }, (_, index) => `k${String(index)}`);
      let removals = 0;

      cache.subscribe((change) => {
        if (change.type === 'remove') {
          removals += 1;
          cache.contains(change.key);
        }
        if (change.type === 'set' && change.key === 'k0') {
          cache.set('mirror', change.value);
        }
      });

      const task = async (taskId: number): Promise<void> => {
        for (let step = 0; step < 200; step += 1) {
          const key = keys[(taskId * 3 + step) % keys.length] ?? 'k0';
          switch (step % 5) {
            case 0:
              cache.set(key, step);
              break;
            case 1:
              expect(cache.resolve(key, valueType.string).isErr()).toBe(true);
              break;
            case 2:
              cache.get(key, valueType.number);
              break;
            case 3:
              cache.contains(key);
              break;
            default:
              cache.remove(key);
          }
          expect(cache.size()).toBeLessThanOrEqual(capacity);
          if (step % 10 === 0) {
            await new Promise<void>((resolve) => setImmediate(resolve));
          }
        }
      };

      await Promise.all(Array.from({ length: 8 }, (_, taskId) => task(taskId)));

      expect([...cache.recency()].sort()).toEqual([...cache.allValues().keys()].sort());
      expect(cache.size()).toBeLessThanOrEqual(capacity);
      expect(removals).toBeGreaterThan(0);
    });
  });
});
