/**
 * Package for handling configuration in an application
 */

import fs from "fs"
import { DefaultLogger, type LogWriter, type Logger } from "./logging"

/**
 * Required shape for configuration items, a file may hold a single item or an
 * array of them
 */
export type ConfigurationItem<T extends object = object> = {
  /** The configuration key  */
  key: string

  /** The item contents associated with this key */
  item: T
}

/**
 * Manages configuration values
 */
export interface ConfigurationManager {
  /**
   * Iterate over the known keys
   */
  getKeys(): IterableIterator<string>

  /**
   * Gets the configuration value associated with the given key, callers are
   * expected to validate the shape
   *
   * @param configKey The key for the configuration to load
   */
  getConfiguration(configKey: string): unknown
}

/**
 * {@link ConfigurationManager} over a fixed set of {@link ConfigurationItem}
 */
export class StaticConfigurationManager implements ConfigurationManager {
  private readonly _configMap: Map<string, object> = new Map()

  constructor(items: ConfigurationItem[] = []) {
    for (const item of items) {
      this._configMap.set(item.key, item.item)
    }
  }

  getKeys(): IterableIterator<string> {
    return this._configMap.keys()
  }

  getConfiguration(configKey: string): unknown {
    return this._configMap.get(configKey)
  }
}

/**
 * Options for {@link loadConfigurationFile}
 */
export interface ConfigurationFileOptions {
  /** The optional log writer to use */
  logWriter?: LogWriter
}

/**
 * Loads a JSON file of {@link ConfigurationItem} values
 *
 * @param fileName The file to load
 * @param options The {@link ConfigurationFileOptions} to use
 * @returns A {@link StaticConfigurationManager} with the file contents
 * @throws if the file is missing or is not a regular file
 */
export function loadConfigurationFile(
  fileName: string,
  options: ConfigurationFileOptions = {},
): ConfigurationManager {
  const logger = new DefaultLogger({
    name: "Configuration",
    writer: options.logWriter,
  })

  if (!fs.existsSync(fileName)) {
    throw new Error(`${fileName} does not exist`)
  }

  if (!fs.statSync(fileName).isFile()) {
    throw new Error(`${fileName} is not a valid file`)
  }

  logger.info(`Loading ${fileName}`)
  const items = contentsAsItemArray(fs.readFileSync(fileName, "utf8"), logger)
  logger.debug(`Loaded ${items.length} configuration items`)

  return new StaticConfigurationManager(items)
}

/**
 * Load the file contents assuming they are formatted as a single
 * {@link ConfigurationItem} or array, entries that don't have that shape are
 * skipped
 *
 * @param contents The file contents
 * @param logger The {@link Logger} to report problems on
 * @returns An array of {@link ConfigurationItem} loaded from the file
 */
export function contentsAsItemArray(
  contents: string,
  logger?: Logger,
): ConfigurationItem[] {
  let json: unknown
  try {
    json = JSON.parse(contents)
  } catch (err) {
    logger?.warn(`Failure to decode contents`, err)
    return []
  }

  const candidates: unknown[] = Array.isArray(json) ? json : [json]
  const items: ConfigurationItem[] = []

  for (const candidate of candidates) {
    if (isConfigurationItem(candidate)) {
      items.push(candidate)
    } else {
      logger?.warn(`Skipping malformed configuration item`, candidate)
    }
  }

  return items
}

function isConfigurationItem(value: unknown): value is ConfigurationItem {
  return (
    typeof value === "object" &&
    value !== null &&
    "key" in value &&
    typeof value.key === "string" &&
    "item" in value &&
    typeof value.item === "object" &&
    value.item !== null
  )
}
