/**
 * Turns storage locators into drivers and open stores
 */

import type { Logger } from "@rowkit/core/logging"
import type { Optional } from "@rowkit/core/type/utils"
import { createPostgresDriver } from "@rowkit/postgres"
import {
  InMemoryStorageDriver,
  TableStore,
  type StorageDriver,
  type TableStoreOptions,
} from "@rowkit/store"
import { ConfigurationError, LocatorError } from "./errors"

/** Locator for a private in memory store */
export const MEMORY_LOCATOR = "memory:"

const NAMED_MEMORY_PREFIX = "memory://"
const POSTGRES_PROTOCOLS = ["postgres:", "postgresql:"]

/**
 * The {@link TableStoreOptions} a store is opened with
 */
export type StoreSettings = Required<
  Pick<TableStoreOptions, "strict" | "autoCreate" | "lockTimeoutMs">
>

/**
 * Provides the {@link Logger} for a named component
 */
export type LoggerFactory = (name: string) => Logger

/**
 * Named in memory stores live as long as the process, every open of a name
 * shares the one store so schema and table locks stay in one place
 */
const NAMED_STORES: Map<string, Promise<TableStore>> = new Map()

/**
 * @param locator The storage locator
 * @returns The store name for `memory://<name>` locators
 * @throws {LocatorError} if the name is empty or has a path separator
 */
function memoryStoreName(locator: string): Optional<string> {
  if (!locator.startsWith(NAMED_MEMORY_PREFIX)) {
    return
  }

  const name = locator.slice(NAMED_MEMORY_PREFIX.length)
  if (name.length === 0 || name.includes("/")) {
    throw new LocatorError(locator, `Invalid memory store name in ${locator}`)
  }

  return name
}

/**
 * Create the driver for the locator
 *
 * - `memory:` a fresh, private in memory store
 * - `memory://<name>` an in memory driver for the named store, use
 *   {@link openStore} to share it
 * - `postgres://…` or `postgresql://…` a PostgreSQL database
 *
 * @param locator The storage locator
 * @param logger The {@link Logger} for drivers that log
 * @returns A new {@link StorageDriver}
 * @throws {LocatorError} if the locator is not supported
 */
export function createDriver(locator: string, logger?: Logger): StorageDriver {
  if (locator === MEMORY_LOCATOR) {
    return new InMemoryStorageDriver()
  }

  const name = memoryStoreName(locator)
  if (name !== undefined) {
    return new InMemoryStorageDriver(`memory:${name}`)
  }

  if (POSTGRES_PROTOCOLS.some((p) => locator.startsWith(`${p}//`))) {
    return createPostgresDriver(locator, { logger })
  }

  throw new LocatorError(redactLocator(locator))
}

async function createStore(
  locator: string,
  settings: StoreSettings,
  logger: LoggerFactory,
): Promise<TableStore> {
  const driver = createDriver(locator, logger("PostgresStorageDriver"))
  const store = new TableStore(driver, {
    ...settings,
    logger: logger(`TableStore:${driver.name}`),
  })

  try {
    await store.initialize()
  } catch (err) {
    await store.close()
    throw err
  }

  return store
}

/**
 * Open the initialized {@link TableStore} for the locator. Every open of a
 * `memory://<name>` locator returns the same store.
 *
 * @param locator The storage locator
 * @param settings The {@link StoreSettings}
 * @param logger The {@link LoggerFactory} for the driver and store
 * @returns The open {@link TableStore}
 * @throws {LocatorError} if the locator is not supported
 * @throws {ConfigurationError} if a named store is already open with other
 * settings
 */
export async function openStore(
  locator: string,
  settings: StoreSettings,
  logger: LoggerFactory,
): Promise<TableStore> {
  const name = memoryStoreName(locator)
  if (name === undefined) {
    return createStore(locator, settings, logger)
  }

  const shared = NAMED_STORES.get(name)
  if (shared === undefined) {
    const pending = createStore(locator, settings, logger)
    NAMED_STORES.set(name, pending)

    try {
      return await pending
    } catch (err) {
      NAMED_STORES.delete(name)
      throw err
    }
  }

  const store = await shared
  for (const key of ["strict", "autoCreate", "lockTimeoutMs"] as const) {
    if (store[key] !== settings[key]) {
      throw new ConfigurationError(
        key,
        `${locator} is already open with ${key} ${String(store[key])}`,
      )
    }
  }

  return store
}

/**
 * Hide any password in the locator so it can be logged
 *
 * @param locator The storage locator
 * @returns The locator with the password replaced
 */
export function redactLocator(locator: string): string {
  let url: URL
  try {
    url = new URL(locator)
  } catch {
    return locator
  }

  if (url.password.length === 0) {
    return locator
  }

  url.password = "***"
  return url.toString()
}
