/**
 * Resolves the settings a dataset is opened with. Explicit options win over
 * the environment, the environment wins over the configuration file and the
 * defaults fill in the rest.
 */

import {
  loadConfigurationFile,
  type ConfigurationManager,
} from "@rowkit/core/configuration"
import {
  LogLevel,
  parseLogLevel,
  type LogWriter,
} from "@rowkit/core/logging"
import { ConfigurationError } from "./errors"
import { MEMORY_LOCATOR } from "./locator"

/**
 * The fully resolved settings
 */
export interface DatasetConfiguration {
  /** The storage locator */
  store: string
  /** Reject kind conflicts and filters on undeclared columns */
  strict: boolean
  /** Create tables on first reference */
  autoCreate: boolean
  /** How long a write waits for the table lock */
  lockTimeoutMs: number
  /** The level for every component logger */
  logLevel: LogLevel
}

/**
 * Explicit settings, anything left out is resolved from the environment or
 * the configuration file
 */
export interface ConfigurationOptions extends Partial<DatasetConfiguration> {
  /** JSON file of configuration items, defaults to `ROWKIT_CONFIG` */
  configFile?: string
  /** Writer for problems found while loading the file */
  logWriter?: LogWriter
}

/** Configuration item `store` */
interface StoreItem {
  locator?: string
  strict?: boolean
  autoCreate?: boolean
  lockTimeoutMs?: number
}

/** Configuration item `logging` */
interface LoggingItem {
  level?: string
}

export const DEFAULT_CONFIGURATION: Readonly<DatasetConfiguration> = {
  store: MEMORY_LOCATOR,
  strict: false,
  autoCreate: true,
  lockTimeoutMs: 5_000,
  logLevel: LogLevel.WARN,
}

const TRUE_VALUES = ["true", "1", "yes", "on"]
const FALSE_VALUES = ["false", "0", "no", "off"]

/**
 * Resolve the settings for a dataset
 *
 * @param options The explicit {@link ConfigurationOptions}
 * @param env The environment to read `ROWKIT_*` variables from
 * @returns The {@link DatasetConfiguration}
 * @throws {ConfigurationError} if a value can't be interpreted
 */
export function resolveConfiguration(
  options: ConfigurationOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): DatasetConfiguration {
  const configFile = options.configFile ?? nonEmpty(env.ROWKIT_CONFIG)
  const manager =
    configFile !== undefined
      ? loadConfigurationFile(configFile, { logWriter: options.logWriter })
      : undefined

  const store = readStoreItem(manager)
  const logging = readLoggingItem(manager)

  return {
    store:
      options.store ??
      nonEmpty(env.ROWKIT_STORE) ??
      store.locator ??
      DEFAULT_CONFIGURATION.store,
    strict:
      options.strict ??
      parseBoolean("ROWKIT_STRICT", env.ROWKIT_STRICT) ??
      store.strict ??
      DEFAULT_CONFIGURATION.strict,
    autoCreate:
      options.autoCreate ??
      parseBoolean("ROWKIT_AUTO_CREATE", env.ROWKIT_AUTO_CREATE) ??
      store.autoCreate ??
      DEFAULT_CONFIGURATION.autoCreate,
    lockTimeoutMs:
      options.lockTimeoutMs ??
      parseTimeout("ROWKIT_LOCK_TIMEOUT_MS", env.ROWKIT_LOCK_TIMEOUT_MS) ??
      store.lockTimeoutMs ??
      DEFAULT_CONFIGURATION.lockTimeoutMs,
    logLevel:
      options.logLevel ??
      parseLevel("ROWKIT_LOG_LEVEL", env.ROWKIT_LOG_LEVEL) ??
      parseLevel("logging.level", logging.level) ??
      DEFAULT_CONFIGURATION.logLevel,
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0
    ? value.trim()
    : undefined
}

function parseBoolean(key: string, value: string | undefined): boolean | undefined {
  const text = nonEmpty(value)?.toLowerCase()
  if (text === undefined) {
    return
  }

  if (TRUE_VALUES.includes(text)) {
    return true
  }

  if (FALSE_VALUES.includes(text)) {
    return false
  }

  throw new ConfigurationError(key, `${key} must be a boolean, got ${value}`)
}

function parseTimeout(key: string, value: string | undefined): number | undefined {
  const text = nonEmpty(value)
  if (text === undefined) {
    return
  }

  const timeout = Number(text)
  if (!Number.isSafeInteger(timeout) || timeout <= 0) {
    throw new ConfigurationError(
      key,
      `${key} must be a positive integer, got ${value}`,
    )
  }

  return timeout
}

function parseLevel(key: string, value: string | undefined): LogLevel | undefined {
  const text = nonEmpty(value)
  if (text === undefined) {
    return
  }

  const level = parseLogLevel(text)
  if (level === undefined) {
    throw new ConfigurationError(key, `${key} is not a log level: ${value}`)
  }

  return level
}

function readStoreItem(manager?: ConfigurationManager): StoreItem {
  const item = manager?.getConfiguration("store")
  if (item === undefined) {
    return {}
  }

  if (typeof item !== "object" || item === null) {
    throw new ConfigurationError("store", `Configuration item store must be an object`)
  }

  const store: StoreItem = {}
  if ("locator" in item) {
    store.locator = requireKind("store.locator", item.locator, "string")
  }

  if ("strict" in item) {
    store.strict = requireKind("store.strict", item.strict, "boolean")
  }

  if ("autoCreate" in item) {
    store.autoCreate = requireKind("store.autoCreate", item.autoCreate, "boolean")
  }

  if ("lockTimeoutMs" in item) {
    const timeout = requireKind("store.lockTimeoutMs", item.lockTimeoutMs, "number")
    if (!Number.isSafeInteger(timeout) || timeout <= 0) {
      throw new ConfigurationError(
        "store.lockTimeoutMs",
        `store.lockTimeoutMs must be a positive integer`,
      )
    }

    store.lockTimeoutMs = timeout
  }

  return store
}

function readLoggingItem(manager?: ConfigurationManager): LoggingItem {
  const item = manager?.getConfiguration("logging")
  if (typeof item !== "object" || item === null || !("level" in item)) {
    return {}
  }

  return { level: requireKind("logging.level", item.level, "string") }
}

interface Kinds {
  string: string
  number: number
  boolean: boolean
}

function requireKind<K extends keyof Kinds>(
  key: string,
  value: unknown,
  kind: K,
): Kinds[K] {
  if (!isKind(value, kind)) {
    throw new ConfigurationError(key, `${key} must be a ${kind}`)
  }

  return value
}

function isKind<K extends keyof Kinds>(value: unknown, kind: K): value is Kinds[K] {
  return typeof value === kind
}
