/** Converter settings, read from the environment once at startup. */

export type TableStoreKind = 'memory' | 'redis'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const TABLE_STORE_KINDS: readonly TableStoreKind[] = ['memory', 'redis']

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export interface ConverterConfig {
  tableStore: TableStoreKind
  redisUrl: string
  tableKeyPrefix: string
  /** Expiry applied to saved tables; unset keeps them forever. */
  tableTtlSeconds: number | undefined
  logLevel: LogLevel
  /** CRS applied by import when the caller names none. */
  defaultEpsgCode: number | undefined
  port: number
  nodeEnv: string
}

/** Defaults used when a variable is unset. */
export const DEFAULT_CONFIG: ConverterConfig = {
  tableStore: 'memory',
  redisUrl: 'redis://localhost:6379',
  tableKeyPrefix: 'tables:',
  tableTtlSeconds: undefined,
  logLevel: 'info',
  defaultEpsgCode: undefined,
  port: 4000,
  nodeEnv: 'development',
}

export type Env = Record<string, string | undefined>

/** Error when an environment variable holds a value the converter cannot use. */
export class ConfigError extends Error {
  constructor(public readonly key: string, message: string) {
    super(`Invalid environment variable ${key}: ${message}`)
    this.name = 'ConfigError'
  }
}

function optional(env: Env, key: string, fallback: string): string {
  const val = env[key]
  return val === undefined || val === '' ? fallback : val
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
  const val = optional(env, key, fallback)
  const match = allowed.find((a) => a === val)
  if (match === undefined) {
    throw new ConfigError(key, `'${val}' is not one of ${allowed.join(', ')}`)
  }
  return match
}

function positiveInt(env: Env, key: string): number | undefined {
  const val = env[key]
  if (val === undefined || val === '') return undefined
  const n = Number(val)
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(key, `'${val}' is not a positive integer`)
  }
  return n
}

/** Resolve settings: environment overrides > defaults. */
export function readConverterConfig(env: Env = process.env): ConverterConfig {
  return {
    tableStore: oneOf(env, 'TABLE_STORE', TABLE_STORE_KINDS, DEFAULT_CONFIG.tableStore),
    redisUrl: optional(env, 'REDIS_URL', DEFAULT_CONFIG.redisUrl),
    tableKeyPrefix: optional(env, 'TABLE_KEY_PREFIX', DEFAULT_CONFIG.tableKeyPrefix),
    tableTtlSeconds: positiveInt(env, 'TABLE_TTL_SECONDS'),
    logLevel: oneOf(env, 'LOG_LEVEL', LOG_LEVELS, DEFAULT_CONFIG.logLevel),
    defaultEpsgCode: positiveInt(env, 'DEFAULT_EPSG_CODE'),
    port: positiveInt(env, 'PORT') ?? DEFAULT_CONFIG.port,
    nodeEnv: optional(env, 'NODE_ENV', DEFAULT_CONFIG.nodeEnv),
  }
}
