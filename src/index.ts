export * from './core/matching';
export * from './core/sources';
export {
  SeqProbeError,
  ParseError,
  ConfigError,
  ProviderError,
  OfflineIndexError,
  isSeqProbeError,
} from './core/errors';
export type { ProviderErrorKind } from './core/errors';
export { mergeRuntimeConfig, defaultRuntimeConfig, runtimeConfigFromEnv, DEFAULT_BASE_URL, DEFAULT_CACHE_TTL_DAYS } from './core/config';
export type { ProbeRuntimeConfig, RuntimeOverrides } from './core/config';
export { createLogger, resolveLogLevel, serializeError } from './core/log';
export type { Logger, LogLevel, LogFields, LogSink, LoggerOptions } from './core/log';
