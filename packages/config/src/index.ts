// Shared configuration: table store selection, logging, import defaults.

export {
  readConverterConfig,
  ConfigError,
  DEFAULT_CONFIG,
  TABLE_STORE_KINDS,
  LOG_LEVELS,
  type ConverterConfig,
  type TableStoreKind,
  type LogLevel,
  type Env,
} from './settings'
