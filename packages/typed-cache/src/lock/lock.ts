import { LockReentryError } from '../errors.js';

/**
 * Mutual-exclusion lock guarding one cache instance's state.
 *
 * Cache operations are synchronous, so a section can never be interleaved
 * with another caller's. What the lock does catch is re-entry: a section
 * that calls back into a locking operation of the same instance throws
 * LockReentryError instead of silently corrupting state or, with a
 * blocking lock, deadlocking.
 */
export interface Lock {
  /** Name used in LockReentryError messages */
  readonly name: string;

  /**
   * Runs `section` while holding the lock and returns its result.
   * The lock is released even if `section` throws.
   * @throws LockReentryError if the lock is already held
   */
  readonly withLock: <T>(section: () => T) => T;

  /**
   * Whether a section is currently running.
   */
  readonly isHeld: () => boolean;
}

/**
 * Creates a non-reentrant lock.
 *
 * @param name - Name reported when the lock is re-entered
 *
 * @example
 * ```typescript
 * const lock = createLock('store');
 * const size = lock.withLock(() => entries.size);
 * ```
 */
export const createLock = (name: string): Lock => {
  let held = false;

  const withLock = <T>(section: () => T): T => {
    if (held) {
      throw new LockReentryError(name);
    }

    held = true;
    try {
      return section();
    } finally {
      held = false;
    }
  };

  return {
    name,
    withLock,
    isHeld: () => held,
  };
};
