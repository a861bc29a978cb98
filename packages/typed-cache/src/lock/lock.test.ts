import { describe, it, expect } from 'vitest';
import { LockReentryError } from '../errors.js';
import { createLock } from './lock.js';

describe('createLock', () => {
  describe('withLock', () => {
    it('returns the result of the section', () => {
      const lock = createLock('test');

      expect(lock.withLock(() => 42)).toBe(42);
    });

    it('is held only while the section runs', () => {
      const lock = createLock('test');

      const heldInside = lock.withLock(() => lock.isHeld());

      expect(heldInside).toBe(true);
      expect(lock.isHeld()).toBe(false);
    });

    describe('given a section that re-enters the lock', () => {
      it('throws LockReentryError naming the lock', () => {
        const lock = createLock('store');

        expect(() => lock.withLock(() => lock.withLock(() => 1))).toThrow(LockReentryError);
        expect(() => lock.withLock(() => lock.withLock(() => 1))).toThrow(
          'Lock "store" is already held by the current call stack'
        );
      });

      it('releases the lock afterwards', () => {
        const lock = createLock('store');

        expect(() => lock.withLock(() => lock.withLock(() => 1))).toThrow();

        expect(lock.isHeld()).toBe(false);
        expect(lock.withLock(() => 'free')).toBe('free');
      });
    });

    describe('given a section that throws', () => {
      it('releases the lock and rethrows', () => {
        const lock = createLock('test');

        expect(() =>
          lock.withLock(() => {
            throw new Error('boom');
          })
        ).toThrow('boom');
        expect(lock.isHeld()).toBe(false);
      });
    });

    describe('given two different locks', () => {
      it('allows nesting one inside the other', () => {
        const outer = createLock('outer');
        const inner = createLock('inner');

        expect(outer.withLock(() => inner.withLock(() => 'nested'))).toBe('nested');
      });
    });
  });
});
