export {
  DEFAULT_PREPARED_FILE,
  DEFAULT_REPORT_YEAR,
  DEFAULT_SOURCE_FILE,
  createRuntimeLogger,
  resolveRuntimeConfig,
  type RuntimeConfig,
  type RuntimeEnv,
} from './config/runtime-config.ts';
