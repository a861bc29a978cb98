export {
  DEBUG_ENV_VAR,
  durationUnitSchema,
  expirationDurationSchema,
  lruOptionsSchema,
  persistableOptionsSchema,
  readDebugFlag,
} from './options.js';
