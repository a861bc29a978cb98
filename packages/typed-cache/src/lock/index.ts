export { createLock } from './lock.js';
export type { Lock } from './lock.js';
