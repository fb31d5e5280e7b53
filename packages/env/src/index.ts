export {
  getLogLevel,
  getTaxonomyDirectory,
  isConsoleLoggingEnabled,
  isStrictUnstructured,
  parseEnv,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
