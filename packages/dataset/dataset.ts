/**
 * Opens a store by locator and moves its tables to and from files and
 * streams through the format registry
 */

import { getErrorMessage } from "@rowkit/core/errors"
import { DefaultLogger, type Logger } from "@rowkit/core/logging"
import type { Optional } from "@rowkit/core/type/utils"
import {
  createDefaultRegistry,
  readText,
  type FormatOptions,
  type FormatRegistry,
  type ImportOptions,
  type ImportResult,
  type ImportSource,
} from "@rowkit/formats"
import type {
  InsertManyOptions,
  InsertManyResult,
  Row,
  RowFilter,
  RowSnapshot,
  Table,
  TableDefinition,
  TableOptions,
  TableStore,
} from "@rowkit/store"
import { readFile, writeFile } from "fs/promises"
import type { Readable, Writable } from "stream"
import {
  resolveConfiguration,
  type ConfigurationOptions,
  type DatasetConfiguration,
} from "./configuration"
import { DatasetError } from "./errors"
import { openStore, redactLocator } from "./locator"

/** A file path or a stream to write an export to */
export type Destination = string | Writable

/** A file path or a stream to read an import from */
export type Source = string | Readable

/**
 * Options for {@link open}
 */
export interface OpenOptions extends ConfigurationOptions {
  /** The registry to use instead of the built-in codecs */
  registry?: FormatRegistry
  /** The environment to resolve `ROWKIT_*` settings from */
  env?: NodeJS.ProcessEnv
}

/**
 * Options for {@link DatasetTable.export}
 */
export interface ExportOptions extends FormatOptions {
  /** Only export the rows matching the filter */
  filter?: RowFilter
}

/**
 * Open the store the locator (or the resolved configuration) points at
 *
 * @param target A storage locator or the {@link OpenOptions}
 * @returns The open {@link Dataset}
 * @throws {LocatorError} if the locator is not supported
 * @throws {ConfigurationError} if a setting can't be interpreted or a named
 * memory store is already open with other settings
 */
export async function open(target: string | OpenOptions = {}): Promise<Dataset> {
  const options: OpenOptions =
    typeof target === "string" ? { store: target } : target
  const configuration = resolveConfiguration(options, options.env)

  const logger = (name: string): Logger =>
    new DefaultLogger({
      name,
      level: configuration.logLevel,
      writer: options.logWriter,
    })

  const store = await openStore(
    configuration.store,
    {
      strict: configuration.strict,
      autoCreate: configuration.autoCreate,
      lockTimeoutMs: configuration.lockTimeoutMs,
    },
    logger,
  )

  const dataset = new Dataset(
    store,
    options.registry ?? createDefaultRegistry(logger("FormatRegistry")),
    configuration,
    logger("Dataset"),
  )

  dataset.logger.info(
    `Opened ${dataset.locator} with ${store.tables().length} table(s)`,
  )
  return dataset
}

/**
 * A store together with the registry used to export and import its tables
 */
export class Dataset {
  /** The locator with any password hidden */
  readonly locator: string
  readonly configuration: Readonly<DatasetConfiguration>
  readonly registry: FormatRegistry
  readonly logger: Logger

  readonly #store: TableStore
  #closed = false

  constructor(
    store: TableStore,
    registry: FormatRegistry,
    configuration: DatasetConfiguration,
    logger: Logger,
  ) {
    this.#store = store
    this.registry = registry
    this.configuration = Object.freeze({ ...configuration })
    this.locator = redactLocator(configuration.store)
    this.logger = logger
  }

  get store(): TableStore {
    return this.#store
  }

  get closed(): boolean {
    return this.#closed
  }

  /**
   * @returns The table names, sorted
   */
  tables(): string[] {
    return this.#store.tables()
  }

  has(name: string): boolean {
    return this.#store.has(name)
  }

  /**
   * Get a table, creating it when it is missing and either options are
   * given or the store creates tables automatically
   *
   * @param name The table name
   * @param options The {@link TableOptions} for a new table
   * @returns The {@link DatasetTable}
   * @throws {UnknownTableError} if the table is missing and can't be created
   */
  async table(name: string, options?: TableOptions): Promise<DatasetTable> {
    const table =
      options !== undefined
        ? await this.#store.getOrCreate(name, options)
        : await this.#store.table(name)

    return new DatasetTable(table, this.registry, this.logger)
  }

  drop(name: string): Promise<boolean> {
    return this.#store.drop(name)
  }

  /**
   * Export the table to a file or stream
   */
  async freeze(
    table: string,
    format: string,
    destination: Destination,
    options?: ExportOptions,
  ): Promise<void> {
    await (await this.table(table)).export(format, destination, options)
  }

  /**
   * Import a file or stream into the table, detecting the format when none
   * is given
   */
  async thaw(
    table: string,
    format: Optional<string>,
    source: Source,
    options?: ImportOptions,
  ): Promise<ImportResult> {
    return (await this.table(table)).import(format, source, options)
  }

  /**
   * Release the store, calling it again does nothing
   */
  async close(): Promise<void> {
    if (this.#closed) {
      return
    }

    this.#closed = true
    await this.#store.close()
    this.logger.debug(`Closed ${this.locator}`)
  }
}

/**
 * A {@link Table} that can also be exported and imported
 */
export class DatasetTable {
  readonly #table: Table
  readonly #registry: FormatRegistry
  readonly #logger: Logger

  constructor(table: Table, registry: FormatRegistry, logger: Logger) {
    this.#table = table
    this.#registry = registry
    this.#logger = logger
  }

  get name(): string {
    return this.#table.name
  }

  get columns(): string[] {
    return this.#table.columns
  }

  get definition(): TableDefinition {
    return this.#table.definition
  }

  insert(row: Row): Promise<Row> {
    return this.#table.insert(row)
  }

  insertMany(
    rows: Iterable<Row>,
    options?: InsertManyOptions,
  ): Promise<InsertManyResult> {
    return this.#table.insertMany(rows, options)
  }

  update(filter: RowFilter, patch: Row): Promise<number> {
    return this.#table.update(filter, patch)
  }

  upsert(row: Row): Promise<Row> {
    return this.#table.upsert(row)
  }

  delete(filter?: RowFilter): Promise<number> {
    return this.#table.delete(filter)
  }

  find(filter?: RowFilter): Promise<RowSnapshot> {
    return this.#table.find(filter)
  }

  findOne(filter: RowFilter): Promise<Optional<Row>> {
    return this.#table.findOne(filter)
  }

  count(filter?: RowFilter): Promise<number> {
    return this.#table.count(filter)
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Row> {
    yield* this.#table
  }

  /**
   * Write the table (or the rows matching `options.filter`) in the format
   *
   * @param format The format name
   * @param destination A file path or {@link Writable}, streams are left open
   * @param options The {@link ExportOptions}
   */
  async export(
    format: string,
    destination: Destination,
    options: ExportOptions = {},
  ): Promise<void> {
    const source =
      options.filter !== undefined
        ? await this.#table.find(options.filter)
        : this.#table
    const output = await this.#registry.export(format, source, options)

    if (typeof destination === "string") {
      await writeFile(destination, output)
      this.#logger.debug(`Wrote ${this.name} as ${format} to ${destination}`)
    } else {
      await writeChunk(destination, output)
    }
  }

  /**
   * Read a file or stream into the table
   *
   * @param format The format name, when undefined it comes from the file
   * extension or the contents
   * @param source A file path or {@link Readable}
   * @param options The {@link ImportOptions}
   * @returns The {@link ImportResult}
   * @throws {DatasetError} if no format is given and none can be detected
   */
  async import(
    format: Optional<string>,
    source: Source,
    options: ImportOptions = {},
  ): Promise<ImportResult> {
    let input: ImportSource =
      typeof source === "string" ? await readFileSource(source) : source
    let resolved =
      format ??
      (typeof source === "string"
        ? importableFormat(this.#registry, source)
        : undefined)

    if (resolved === undefined) {
      const text = await readSourceText(input, source)
      resolved = this.#registry.detect(text)
      if (resolved === undefined) {
        throw new DatasetError(
          `Unable to detect the format of ${describeSource(source)}`,
        )
      }

      this.#logger.debug(`Detected ${resolved} in ${describeSource(source)}`)
      input = text
    }

    return this.#registry.import(resolved, input, this.#table, options)
  }
}

/**
 * The format for the file's extension, if that format can be imported
 *
 * @param registry The {@link FormatRegistry} to look in
 * @param file The file path
 * @returns The format name
 */
export function importableFormat(
  registry: FormatRegistry,
  file: string,
): Optional<string> {
  const format = registry.forPath(file)
  return format !== undefined && registry.canImport(format) ? format : undefined
}

function describeSource(source: Source): string {
  return typeof source === "string" ? source : "stream"
}

async function readFileSource(file: string): Promise<Uint8Array> {
  try {
    return await readFile(file)
  } catch (err) {
    throw new DatasetError(
      `Unable to read ${file}: ${getErrorMessage(err) ?? String(err)}`,
      { cause: err },
    )
  }
}

async function readSourceText(
  input: ImportSource,
  source: Source,
): Promise<string> {
  try {
    return await readText(input)
  } catch (err) {
    throw new DatasetError(
      `Unable to read ${describeSource(source)}: ${getErrorMessage(err) ?? String(err)}`,
      { cause: err },
    )
  }
}

function writeChunk(
  destination: Writable,
  chunk: string | Uint8Array,
): Promise<void> {
  if (chunk.length === 0) {
    return Promise.resolve()
  }

  return new Promise((resolve, reject) => {
    destination.write(chunk, (err) => {
      if (err) {
        reject(err)
      } else {
        resolve()
      }
    })
  })
}
