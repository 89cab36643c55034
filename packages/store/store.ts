/**
 * Name addressed row storage with schema-on-write
 */

import type { Span } from "@opentelemetry/api"
import { KeyedLock } from "@rowkit/core/concurrency"
import { DefaultLogger, type Logger } from "@rowkit/core/logging"
import { getDataMetrics } from "@rowkit/core/observability/metrics"
import { traced } from "@rowkit/core/observability/tracing"
import type { Optional } from "@rowkit/core/type/utils"
import type { StorageDriver } from "./driver"
import {
  DuplicateKeyError,
  InvalidFilterError,
  SchemaError,
  StoreError,
  UnknownTableError,
} from "./errors"
import { TableSchema, type SchemaChange } from "./schema"
import { RowSnapshot } from "./snapshot"
import { Table } from "./table"
import {
  coerceScalar,
  compareScalars,
  isScalarValue,
  kindOf,
  normalizeRow,
  readColumn,
  scalarEquals,
  writeColumn,
  type ColumnDescriptor,
  type Row,
  type RowFilter,
  type ScalarValue,
  type TableDefinition,
  type TableOptions,
} from "./types"

/**
 * Options for controlling the behavior of a {@link TableStore}
 */
export interface TableStoreOptions {
  /** Reject kind conflicts and filters on undeclared columns (default false) */
  strict?: boolean
  /** Create tables on first reference (default true) */
  autoCreate?: boolean
  /** Longest wait for a table's write lock (default 5 seconds) */
  lockTimeoutMs?: number
  /** The {@link Logger} to use, default is a named {@link DefaultLogger} */
  logger?: Logger
}

/**
 * Options for {@link TableStore.insertMany}
 */
export interface InsertManyOptions {
  /** Drop columns that are not already declared instead of adding them */
  onlyDeclared?: boolean
  /** Convert text values to the kind of their declared column */
  coerce?: boolean
  /** Checked between rows, rows already inserted are kept on abort */
  signal?: AbortSignal
  /** Invoked after each row with the running insert count */
  onProgress?: (inserted: number) => void
}

/**
 * The outcome of {@link TableStore.insertMany}
 */
export interface InsertManyResult {
  /** Rows written */
  inserted: number
  /** Rows with no declared columns left (only with `onlyDeclared`) */
  skipped: number
  /** True if the signal aborted the batch before every row was written */
  cancelled: boolean
}

/**
 * Maps table names to their {@link TableSchema} and routes rows to a
 * {@link StorageDriver}. Writes to a table are serialized through a per-table
 * lock while reads capture the columns and matching rows in one step.
 */
export class TableStore {
  readonly strict: boolean
  readonly autoCreate: boolean
  readonly lockTimeoutMs: number

  readonly #driver: StorageDriver
  readonly #schemas: Map<string, TableSchema> = new Map()
  readonly #locks: KeyedLock = new KeyedLock()
  readonly #logger: Logger

  constructor(driver: StorageDriver, options: TableStoreOptions = {}) {
    this.#driver = driver
    this.strict = options.strict ?? false
    this.autoCreate = options.autoCreate ?? true
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5_000
    this.#logger =
      options.logger ?? new DefaultLogger({ name: `TableStore:${driver.name}` })
  }

  /** The name of the underlying driver */
  get driverName(): string {
    return this.#driver.name
  }

  /**
   * Load the definitions of tables that already exist in the driver
   */
  async initialize(): Promise<void> {
    const definitions = await this.#driver.introspect()
    for (const definition of definitions) {
      this.#schemas.set(definition.name, new TableSchema(definition))
    }

    this.#logger.debug(
      `Loaded ${definitions.length} table(s) from ${this.#driver.name}`,
    )
  }

  has(name: string): boolean {
    return this.#schemas.has(name)
  }

  /**
   * @returns The known table names, sorted
   */
  tables(): string[] {
    return Array.from(this.#schemas.keys()).sort()
  }

  /**
   * @param name The table name
   * @returns The current {@link TableDefinition}
   * @throws {UnknownTableError} if the table does not exist
   */
  schema(name: string): TableDefinition {
    return this.#existing(name).toDefinition()
  }

  /**
   * @param name The table name
   * @returns The declared column names in order
   * @throws {UnknownTableError} if the table does not exist
   */
  columns(name: string): string[] {
    return this.#existing(name).columnNames
  }

  /**
   * Returns the existing table or creates it, concurrent callers for the same
   * new name create it exactly once
   *
   * @param name The table name
   * @param options The {@link TableOptions}, ignored if the table exists
   * @returns A {@link Table} handle
   */
  async getOrCreate(name: string, options?: TableOptions): Promise<Table> {
    await this.#create(name, options)
    return new Table(this, name)
  }

  /**
   * @param name The table name
   * @returns A {@link Table} handle
   * @throws {UnknownTableError} if the table is missing and auto creation is
   * disabled
   */
  async table(name: string): Promise<Table> {
    await this.#resolve(name)
    return new Table(this, name)
  }

  /**
   * Insert the row, adding any columns it introduces first
   *
   * @param name The table name
   * @param row The {@link Row} to insert
   * @returns The stored row with every declared column
   */
  insert(name: string, row: Row): Promise<Row> {
    return this.#write(name, "insert", async (schema) => {
      const stored = await this.#insertRow(schema, row, false)
      // Can't be skipped when all columns are allowed
      return stored ?? normalizeRow(schema.columnNames, row)
    })
  }

  /**
   * Insert the rows one at a time while holding the table lock for the whole
   * batch. Every row is checked against the schema and the primary key before
   * the first one is written, so a rejected row leaves the table untouched.
   *
   * @param name The table name
   * @param rows The rows to insert
   * @param options The {@link InsertManyOptions}
   * @returns The {@link InsertManyResult}
   * @throws {SchemaError} or {@link DuplicateKeyError} carrying the `rowIndex`
   * of the first rejected row
   */
  insertMany(
    name: string,
    rows: Iterable<Row>,
    options: InsertManyOptions = {},
  ): Promise<InsertManyResult> {
    return this.#write(name, "insertMany", async (schema, span) => {
      const result: InsertManyResult = {
        inserted: 0,
        skipped: 0,
        cancelled: false,
      }

      const batch = await this.#prepare(schema, rows, options)

      for (const values of batch) {
        if (options.signal?.aborted) {
          result.cancelled = true
          this.#logger.warn(
            `Batch into ${name} cancelled after ${result.inserted} row(s)`,
          )
          break
        }

        if (values === undefined) {
          result.skipped++
        } else {
          await this.#storeRow(schema, values)
          result.inserted++
          options.onProgress?.(result.inserted)
        }
      }

      span.setAttribute("rows.inserted", result.inserted)
      return result
    })
  }

  /**
   * Apply the patch to every row that matches the filter, columns introduced
   * by the patch are added even if nothing matches
   *
   * @param name The table name
   * @param filter The {@link RowFilter}
   * @param patch The values to set
   * @returns The number of rows updated
   */
  update(name: string, filter: RowFilter, patch: Row): Promise<number> {
    return this.#write(name, "update", async (schema) => {
      const prepared = this.#prepareFilter(schema, filter)
      const changes = schema.plan(patch, this.strict)
      if (prepared !== undefined) {
        await this.#checkKeyChange(schema, prepared, patch)
      }

      await this.#applyChanges(schema, changes)

      if (prepared === undefined || Object.keys(patch).length === 0) {
        return 0
      }

      const updated = await this.#driver.update(
        schema.toDefinition(),
        prepared,
        patch,
      )
      getDataMetrics().rowsWritten.add(updated, { table: name })
      return updated
    })
  }

  /**
   * Insert the row or, if a row with the same primary key exists, update it
   *
   * @param name The table name
   * @param row The {@link Row} to write
   * @returns The row as stored
   * @throws {SchemaError} if the table has no primary key
   */
  upsert(name: string, row: Row): Promise<Row> {
    return this.#write(name, "upsert", async (schema) => {
      const primaryKey = schema.primaryKey
      if (primaryKey === undefined) {
        throw new SchemaError(`Table ${name} has no primary key`, {
          table: name,
        })
      }

      const key = readColumn(row, primaryKey.column)
      if (key !== null) {
        const filter: RowFilter = { [primaryKey.column]: key }
        const existing = await this.#driver.select(schema.toDefinition(), filter)

        if (existing.length > 0) {
          await this.#applyChanges(schema, schema.plan(row, this.strict))
          await this.#driver.update(schema.toDefinition(), filter, row)
          getDataMetrics().rowsWritten.add(1, { table: name })

          const [updated] = await this.#driver.select(
            schema.toDefinition(),
            filter,
          )
          return normalizeRow(schema.columnNames, updated ?? row)
        }
      }

      const stored = await this.#insertRow(schema, row, false)
      return stored ?? normalizeRow(schema.columnNames, row)
    })
  }

  /**
   * Remove every row that matches the filter
   *
   * @param name The table name
   * @param filter The {@link RowFilter}, default matches everything
   * @returns The number of rows removed
   */
  delete(name: string, filter: RowFilter = {}): Promise<number> {
    return this.#write(name, "delete", async (schema) => {
      const prepared = this.#prepareFilter(schema, filter)
      if (prepared === undefined) {
        return 0
      }

      const deleted = await this.#driver.delete(schema.toDefinition(), prepared)
      getDataMetrics().rowsDeleted.add(deleted, { table: name })
      return deleted
    })
  }

  /**
   * Read the matching rows, in insertion order or by ascending primary key
   *
   * @param name The table name
   * @param filter The {@link RowFilter}, default matches everything
   * @returns A {@link RowSnapshot} of the columns and rows at read time
   */
  async find(name: string, filter: RowFilter = {}): Promise<RowSnapshot> {
    const schema = await this.#resolve(name)

    // Capture the columns before reading so a concurrent extension can't leak in
    const columns = schema.columnNames
    const definition = schema.toDefinition()
    const primaryKey = schema.primaryKey?.column

    const prepared = this.#prepareFilter(schema, filter)
    const rows =
      prepared === undefined
        ? []
        : await this.#driver.select(definition, prepared)

    if (primaryKey !== undefined) {
      rows.sort((left, right) =>
        compareScalars(
          readColumn(left, primaryKey),
          readColumn(right, primaryKey),
        ),
      )
    }

    return new RowSnapshot(name, columns, rows, primaryKey)
  }

  /**
   * @param name The table name
   * @param filter The {@link RowFilter}
   * @returns The first matching row or undefined
   */
  async findOne(name: string, filter: RowFilter): Promise<Optional<Row>> {
    return (await this.find(name, filter)).toArray().at(0)
  }

  /**
   * @param name The table name
   * @param filter The {@link RowFilter}, default matches everything
   * @returns The number of matching rows
   */
  async count(name: string, filter: RowFilter = {}): Promise<number> {
    return (await this.find(name, filter)).length
  }

  /**
   * Destroy the table and its rows
   *
   * @param name The table name
   * @returns True if the table existed
   */
  drop(name: string): Promise<boolean> {
    return this.#locks.withLock(
      name,
      async () => {
        if (!this.#schemas.has(name)) {
          return false
        }

        await this.#driver.dropTable(name)
        this.#schemas.delete(name)
        this.#logger.info(`Dropped table ${name}`)
        return true
      },
      this.lockTimeoutMs,
    )
  }

  async close(): Promise<void> {
    await this.#driver.close()
    this.#logger.debug(`Closed ${this.#driver.name}`)
  }

  #existing(name: string): TableSchema {
    const schema = this.#schemas.get(name)
    if (schema === undefined) {
      throw new UnknownTableError(name)
    }

    return schema
  }

  async #resolve(name: string): Promise<TableSchema> {
    const schema = this.#schemas.get(name)
    if (schema !== undefined) {
      return schema
    }

    if (!this.autoCreate) {
      throw new UnknownTableError(name)
    }

    return this.#create(name)
  }

  #create(name: string, options?: TableOptions): Promise<TableSchema> {
    if (typeof name !== "string" || name.length === 0) {
      return Promise.reject(new StoreError(`Table names cannot be empty`))
    }

    return this.#locks.withLock(
      name,
      async () => {
        // Someone else may have created it while we waited
        const existing = this.#schemas.get(name)
        if (existing !== undefined) {
          return existing
        }

        const schema = TableSchema.create(name, options)
        await this.#driver.createTable(schema.toDefinition())
        this.#schemas.set(name, schema)
        this.#logger.info(`Created table ${name}`)

        return schema
      },
      this.lockTimeoutMs,
    )
  }

  /**
   * Run the write under the table lock inside a span
   */
  async #write<T>(
    name: string,
    operation: string,
    work: (schema: TableSchema, span: Span) => Promise<T>,
  ): Promise<T> {
    await this.#resolve(name)

    return this.#locks.withLock(
      name,
      () =>
        traced(
          `store.${operation}`,
          { "table.name": name, "store.driver": this.#driver.name },
          (span) => work(this.#existing(name), span),
        ),
      this.lockTimeoutMs,
    )
  }

  /**
   * Insert a single row, the caller holds the table lock
   *
   * @returns The stored row or undefined if nothing was left to write
   */
  async #insertRow(
    schema: TableSchema,
    row: Row,
    onlyDeclared: boolean,
  ): Promise<Optional<Row>> {
    const [values] = await this.#prepare(schema, [row], { onlyDeclared })
    return values === undefined ? undefined : this.#storeRow(schema, values)
  }

  /**
   * Extend the schema for the values then hand them to the driver, the values
   * have already been through {@link TableStore.#prepare}
   */
  async #storeRow(schema: TableSchema, values: Row): Promise<Row> {
    await this.#applyChanges(schema, schema.plan(values, this.strict))

    const stored = await this.#driver.insert(schema.toDefinition(), values)
    getDataMetrics().rowsWritten.add(1, { table: schema.name })

    return normalizeRow(schema.columnNames, stored)
  }

  /**
   * Select the values to write from each row and verify the whole batch
   * against a copy of the schema and the stored keys without changing
   * anything
   *
   * @returns The values for each row, undefined where nothing is left
   */
  async #prepare(
    schema: TableSchema,
    rows: Iterable<Row>,
    options: Pick<InsertManyOptions, "onlyDeclared" | "coerce">,
  ): Promise<Optional<Row>[]> {
    const onlyDeclared = options.onlyDeclared ?? false
    const planned = new TableSchema(schema.toDefinition())
    const batch: Optional<Row>[] = []

    for (const row of rows) {
      const rowIndex = batch.length
      const values: Row = {}

      for (const [column, value] of Object.entries(row)) {
        const declared = schema.column(column)
        if (declared === undefined && onlyDeclared) {
          continue
        }

        writeColumn(
          values,
          column,
          options.coerce && declared !== undefined
            ? coerceScalar(value, declared.kind)
            : value,
        )
      }

      if (onlyDeclared && Object.keys(values).length === 0) {
        batch.push(undefined)
        continue
      }

      try {
        for (const change of planned.plan(values, this.strict)) {
          planned.apply(change)
        }
      } catch (err) {
        if (err instanceof SchemaError) {
          throw new SchemaError(err.message, {
            table: schema.name,
            column: err.column,
            rowIndex,
            cause: err,
          })
        }

        throw err
      }

      batch.push(values)
    }

    await this.#checkKeys(schema, batch)
    return batch
  }

  /**
   * Verify every row has a usable primary key that is not already stored or
   * repeated in the batch
   */
  async #checkKeys(
    schema: TableSchema,
    batch: readonly Optional<Row>[],
  ): Promise<void> {
    const primaryKey = schema.primaryKey
    if (primaryKey === undefined) {
      return
    }

    const column = primaryKey.column
    const keys: Map<string, { key: ScalarValue; rowIndex: number }> = new Map()

    batch.forEach((values, rowIndex) => {
      if (values === undefined) {
        return
      }

      const key = readColumn(values, column)
      if (key === null) {
        if (!primaryKey.autoIncrement) {
          throw new SchemaError(`A value for ${column} is required`, {
            table: schema.name,
            column,
            rowIndex,
          })
        }

        return
      }

      const id = keyId(key)
      if (keys.has(id)) {
        throw new DuplicateKeyError(schema.name, key, { column, rowIndex })
      }

      keys.set(id, { key, rowIndex })
    })

    const [first, ...rest] = keys.values()
    if (first === undefined) {
      return
    }

    // A single key can be looked up directly
    const stored = await this.#driver.select(
      schema.toDefinition(),
      rest.length === 0 ? { [column]: first.key } : {},
    )

    for (const row of stored) {
      const existing = keys.get(keyId(readColumn(row, column)))
      if (existing !== undefined) {
        throw new DuplicateKeyError(schema.name, existing.key, {
          column,
          rowIndex: existing.rowIndex,
        })
      }
    }
  }

  /**
   * Verify a patch that sets the primary key leaves it unique
   */
  async #checkKeyChange(
    schema: TableSchema,
    filter: RowFilter,
    patch: Row,
  ): Promise<void> {
    const primaryKey = schema.primaryKey
    if (primaryKey === undefined || !Object.hasOwn(patch, primaryKey.column)) {
      return
    }

    const column = primaryKey.column
    const key = readColumn(patch, column)
    const definition = schema.toDefinition()

    const matches = await this.#driver.select(definition, filter)
    const [only] = matches
    if (only === undefined) {
      return
    }

    const holders = await this.#driver.select(definition, { [column]: key })
    if (
      matches.length > 1 ||
      (holders.length > 0 && !scalarEquals(readColumn(only, column), key))
    ) {
      throw new DuplicateKeyError(schema.name, key, { column })
    }
  }

  async #applyChanges(
    schema: TableSchema,
    changes: SchemaChange[],
  ): Promise<void> {
    for (const change of changes) {
      if (change.type === "add") {
        await this.#driver.addColumn(schema.name, change.column)
        this.#logger.debug(
          `Extended ${schema.name} with ${describeColumn(change.column)}`,
        )
      } else {
        await this.#driver.adoptColumn(schema.name, change.column)
      }

      schema.apply(change)
    }
  }

  /**
   * Validate the filter against the schema
   *
   * @returns The filter to hand the driver or undefined when no row can match
   * @throws {InvalidFilterError} for non-scalar values or (strict) undeclared
   * columns
   */
  #prepareFilter(schema: TableSchema, filter: RowFilter): Optional<RowFilter> {
    const prepared: Row = {}
    let satisfiable = true

    for (const [column, value] of Object.entries(filter)) {
      const candidate: unknown = value
      if (!isScalarValue(candidate)) {
        throw new InvalidFilterError(
          `Filter value for ${column} is not a scalar`,
          { table: schema.name, column },
        )
      }

      if (!schema.has(column)) {
        if (this.strict) {
          throw new InvalidFilterError(
            `Table ${schema.name} has no column ${column}`,
            { table: schema.name, column },
          )
        }

        // Undeclared columns read as null everywhere
        satisfiable = satisfiable && candidate === null
        continue
      }

      writeColumn(prepared, column, candidate)
    }

    return satisfiable ? prepared : undefined
  }
}

/**
 * Identity for a key value, equal keys under {@link scalarEquals} share it
 */
function keyId(key: ScalarValue): string {
  return `${kindOf(key)}:${key instanceof Date ? key.getTime() : String(key)}`
}

function describeColumn(column: ColumnDescriptor): string {
  return `${column.name} (${column.kind})`
}
