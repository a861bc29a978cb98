import type { CacheChange, CacheListener } from '../types.js';

/**
 * Change notification shared by the cache variants.
 *
 * Callers queue changes while holding their lock and call `publish`
 * only once the lock is released, so a listener can read or write the
 * cache it is listening to.
 */
export interface ChangePublisher<K, V> {
  readonly subscribe: (listener: CacheListener<K, V>) => () => void;
  /** Whether anyone is listening, so callers can skip building snapshots */
  readonly hasListeners: () => boolean;
  /**
   * Delivers changes to every listener in registration order.
   * Must not be called while holding the publishing cache's lock.
   */
  readonly publish: (changes: readonly CacheChange<K, V>[], snapshot: ReadonlyMap<K, V>) => void;
}

/**
 * Creates a change publisher.
 */
export const createChangePublisher = <K, V>(): ChangePublisher<K, V> => {
  const listeners = new Set<CacheListener<K, V>>();

  const subscribe = (listener: CacheListener<K, V>): (() => void) => {
    // Wrap so the same function can be registered twice and removed independently
    const registration: CacheListener<K, V> = (change, snapshot) => {
      listener(change, snapshot);
    };
    listeners.add(registration);
    return () => {
      listeners.delete(registration);
    };
  };

  const publish = (changes: readonly CacheChange<K, V>[], snapshot: ReadonlyMap<K, V>): void => {
    // Copy first: a listener may subscribe or unsubscribe while being notified
    const current = [...listeners];
    for (const change of changes) {
      for (const listener of current) {
        listener(change, snapshot);
      }
    }
  };

  return {
    subscribe,
    hasListeners: () => listeners.size > 0,
    publish,
  };
};
