/**
 * Postgres backed table storage
 */

import { getErrorCode, getErrorMessage } from "@rowkit/core/errors"
import { DefaultLogger, type Logger } from "@rowkit/core/logging"
import type { Optional } from "@rowkit/core/type/utils"
import {
  DuplicateKeyError,
  SchemaError,
  StoreError,
  isScalarValue,
  writeColumn,
  type ColumnDescriptor,
  type ColumnKind,
  type PrimaryKeyDefinition,
  type Row,
  type RowFilter,
  type ScalarValue,
  type StorageDriver,
  type TableDefinition,
} from "@rowkit/store"
import pg, { type TypeOverrides } from "pg"

/**
 * Generated keys are BIGINT, there is no bigint scalar so values past the
 * safe range are refused rather than rounded
 */
const safeNumber = (v: string): number => {
  const value = Number(v)
  if (!Number.isSafeInteger(value)) {
    throw new StoreError(`Integer ${v} cannot be represented as a number`)
  }

  return value
}

/**
 * Type parsers for the driver's own pool, other pools in the process keep
 * the default parsing
 *
 * @returns The {@link TypeOverrides} that read BIGINT as a number
 */
export function createTypeOverrides(): TypeOverrides {
  const types = new pg.TypeOverrides()
  types.setTypeParser(pg.types.builtins.INT8, safeNumber)
  return types
}

/**
 * Keeps insertion order for tables without a primary key, never returned
 */
export const SEQUENCE_COLUMN = "_rowkit_seq"

/**
 * The subset of a {@link pg.Pool} the driver needs, tests provide their own
 */
export interface Queryable {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>
  end(): Promise<void>
}

/**
 * Options for a {@link PostgresStorageDriver}
 */
export interface PostgresDriverOptions {
  /** The schema holding the tables (default `public`) */
  schema?: string
  /** The {@link Logger} to use */
  logger?: Logger
}

const UNIQUE_VIOLATION = "23505"
const NOT_NULL_VIOLATION = "23502"

function refuseSequenceColumn(table: string, column: string): void {
  if (column === SEQUENCE_COLUMN) {
    throw new SchemaError(`Column name ${column} is reserved`, {
      table,
      column,
    })
  }
}

/**
 * Quote an identifier so any name can be used as a table or column
 *
 * @param name The identifier
 * @returns The quoted identifier
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

/**
 * @param kind The {@link ColumnKind}
 * @returns The SQL type used to store the kind, `unknown` columns are TEXT
 * until a value arrives
 */
export function sqlType(kind: ColumnKind): string {
  switch (kind) {
    case "number":
      return "DOUBLE PRECISION"
    case "boolean":
      return "BOOLEAN"
    case "timestamp":
      return "TIMESTAMPTZ"
    default:
      return "TEXT"
  }
}

/**
 * @param dataType The `information_schema` data type
 * @returns The matching {@link ColumnKind}
 */
export function kindForSqlType(dataType: string): ColumnKind {
  switch (dataType) {
    case "double precision":
    case "real":
    case "numeric":
    case "bigint":
    case "integer":
    case "smallint":
      return "number"
    case "boolean":
      return "boolean"
    case "timestamp with time zone":
    case "timestamp without time zone":
    case "date":
      return "timestamp"
    default:
      return "string"
  }
}

function keyColumnSql(primaryKey: PrimaryKeyDefinition): string {
  const name = quoteIdentifier(primaryKey.column)

  if (primaryKey.kind === "string") {
    return `${name} TEXT PRIMARY KEY`
  }

  return primaryKey.autoIncrement
    ? `${name} BIGINT GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY`
    : `${name} DOUBLE PRECISION PRIMARY KEY`
}

/**
 * Build the WHERE clause for the filter, parameters start after the offset
 */
function whereClause(
  filter: RowFilter,
  offset: number,
): { sql: string; values: unknown[] } {
  const clauses: string[] = []
  const values: unknown[] = []

  for (const [column, value] of Object.entries(filter)) {
    if (value === null) {
      clauses.push(`${quoteIdentifier(column)} IS NULL`)
    } else {
      values.push(value)
      clauses.push(`${quoteIdentifier(column)} = $${offset + values.length}`)
    }
  }

  return {
    sql: clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "",
    values,
  }
}

/**
 * {@link StorageDriver} that keeps each table as a Postgres table
 */
export class PostgresStorageDriver implements StorageDriver {
  readonly name = "postgres"
  readonly schema: string

  readonly #client: Queryable
  readonly #logger: Logger
  readonly #sequenced: Set<string> = new Set()

  constructor(client: Queryable, options: PostgresDriverOptions = {}) {
    this.#client = client
    this.schema = options.schema ?? "public"
    this.#logger =
      options.logger ?? new DefaultLogger({ name: "PostgresStorageDriver" })
  }

  async introspect(): Promise<TableDefinition[]> {
    const columns = await this.#query(
      undefined,
      `SELECT table_name, column_name, data_type, is_identity FROM information_schema.columns WHERE table_schema = $1 ORDER BY table_name, ordinal_position`,
      [this.schema],
    )
    const keys = await this.#query(
      undefined,
      `SELECT tc.table_name, kcu.column_name FROM information_schema.table_constraints tc JOIN information_schema.key_column_usage kcu ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = $1`,
      [this.schema],
    )

    const keyColumns = new Map<string, string>()
    for (const row of keys.rows) {
      keyColumns.set(String(row.table_name), String(row.column_name))
    }

    const tables = new Map<
      string,
      { columns: ColumnDescriptor[]; primaryKey?: PrimaryKeyDefinition }
    >()

    for (const row of columns.rows) {
      const table = String(row.table_name)
      const column = String(row.column_name)
      const kind = kindForSqlType(String(row.data_type))

      let entry = tables.get(table)
      if (entry === undefined) {
        entry = { columns: [] }
        tables.set(table, entry)
      }

      if (column === SEQUENCE_COLUMN) {
        this.#sequenced.add(table)
        continue
      }

      entry.columns.push({ name: column, kind })

      if (keyColumns.get(table) === column) {
        entry.primaryKey = {
          column,
          kind: kind === "number" ? "number" : "string",
          autoIncrement: row.is_identity === "YES",
        }
      }
    }

    return Array.from(tables.entries()).map(([name, entry]) => ({
      name,
      columns: entry.columns,
      primaryKey: entry.primaryKey,
    }))
  }

  async createTable(definition: TableDefinition): Promise<void> {
    const primaryKey = definition.primaryKey
    const parts: string[] = []

    if (primaryKey !== undefined) {
      parts.push(keyColumnSql(primaryKey))
    } else {
      parts.push(
        `${quoteIdentifier(SEQUENCE_COLUMN)} BIGINT GENERATED ALWAYS AS IDENTITY`,
      )
    }

    for (const column of definition.columns) {
      refuseSequenceColumn(definition.name, column.name)
      if (column.name !== primaryKey?.column) {
        parts.push(`${quoteIdentifier(column.name)} ${sqlType(column.kind)}`)
      }
    }

    await this.#query(
      definition.name,
      `CREATE TABLE IF NOT EXISTS ${this.#table(definition.name)} (${parts.join(", ")})`,
    )

    if (primaryKey === undefined) {
      this.#sequenced.add(definition.name)
    }
  }

  async dropTable(table: string): Promise<void> {
    await this.#query(table, `DROP TABLE IF EXISTS ${this.#table(table)}`)
    this.#sequenced.delete(table)
  }

  async addColumn(table: string, column: ColumnDescriptor): Promise<void> {
    refuseSequenceColumn(table, column.name)
    await this.#query(
      table,
      `ALTER TABLE ${this.#table(table)} ADD COLUMN IF NOT EXISTS ${quoteIdentifier(column.name)} ${sqlType(column.kind)}`,
    )
  }

  async adoptColumn(table: string, column: ColumnDescriptor): Promise<void> {
    // The column has only ever held nulls so nothing needs converting
    await this.#query(
      table,
      `ALTER TABLE ${this.#table(table)} ALTER COLUMN ${quoteIdentifier(column.name)} TYPE ${sqlType(column.kind)} USING NULL`,
    )
  }

  async insert(table: TableDefinition, row: Row): Promise<Row> {
    const columns = Object.keys(row)
    const values = Object.values(row)

    const sql =
      columns.length === 0
        ? `INSERT INTO ${this.#table(table.name)} DEFAULT VALUES RETURNING *`
        : `INSERT INTO ${this.#table(table.name)} (${columns.map(quoteIdentifier).join(", ")}) VALUES (${columns.map((_, i) => `$${i + 1}`).join(", ")}) RETURNING *`

    const primaryKey = table.primaryKey
    const result = await this.#query(
      table.name,
      sql,
      values,
      primaryKey ? row[primaryKey.column] : undefined,
    )

    // Explicit keys don't move the identity sequence along
    if (
      primaryKey?.autoIncrement &&
      row[primaryKey.column] !== undefined &&
      row[primaryKey.column] !== null
    ) {
      const key = quoteIdentifier(primaryKey.column)
      await this.#query(
        table.name,
        `SELECT setval(pg_get_serial_sequence($1, $2), GREATEST((SELECT MAX(${key}) FROM ${this.#table(table.name)}), 1))`,
        [this.#table(table.name), primaryKey.column],
      )
    }

    const [stored] = result.rows
    if (stored === undefined) {
      throw new StoreError(`Insert into ${table.name} returned no row`, {
        table: table.name,
      })
    }

    return toRow(table.name, stored)
  }

  async update(
    table: TableDefinition,
    filter: RowFilter,
    patch: Row,
  ): Promise<number> {
    const columns = Object.keys(patch)
    const where = whereClause(filter, columns.length)

    const result = await this.#query(
      table.name,
      `UPDATE ${this.#table(table.name)} SET ${columns.map((c, i) => `${quoteIdentifier(c)} = $${i + 1}`).join(", ")}${where.sql}`,
      [...Object.values(patch), ...where.values],
      table.primaryKey ? patch[table.primaryKey.column] : undefined,
    )

    return result.rowCount ?? 0
  }

  async delete(table: TableDefinition, filter: RowFilter): Promise<number> {
    const where = whereClause(filter, 0)

    const result = await this.#query(
      table.name,
      `DELETE FROM ${this.#table(table.name)}${where.sql}`,
      where.values,
    )

    return result.rowCount ?? 0
  }

  async select(table: TableDefinition, filter: RowFilter): Promise<Row[]> {
    const where = whereClause(filter, 0)
    const orderBy =
      table.primaryKey?.column ??
      (this.#sequenced.has(table.name) ? SEQUENCE_COLUMN : undefined)
    const order =
      orderBy !== undefined ? ` ORDER BY ${quoteIdentifier(orderBy)}` : ""

    const result = await this.#query(
      table.name,
      `SELECT * FROM ${this.#table(table.name)}${where.sql}${order}`,
      where.values,
    )

    return result.rows.map((row) => toRow(table.name, row))
  }

  async close(): Promise<void> {
    await this.#client.end()
  }

  #table(name: string): string {
    return `${quoteIdentifier(this.schema)}.${quoteIdentifier(name)}`
  }

  /**
   * Run the statement, translating constraint failures into store errors
   */
  async #query(
    table: Optional<string>,
    sql: string,
    values: unknown[] = [],
    key?: ScalarValue,
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }> {
    this.#logger.debug(sql)

    try {
      return await this.#client.query(sql, values)
    } catch (err) {
      switch (getErrorCode(err)) {
        case UNIQUE_VIOLATION:
          throw new DuplicateKeyError(table ?? "unknown", key ?? null, {
            cause: err,
          })
        case NOT_NULL_VIOLATION:
          throw new SchemaError(
            getErrorMessage(err) ?? `Missing value in ${table ?? "unknown"}`,
            { table, cause: err },
          )
      }

      this.#logger.error(`Statement failed: ${sql}`, err)
      throw new StoreError(
        `Postgres failure${table ? ` on ${table}` : ""}: ${getErrorMessage(err) ?? String(err)}`,
        { table, cause: err },
      )
    }
  }
}

function toRow(table: string, source: Record<string, unknown>): Row {
  const row: Row = {}
  for (const [column, value] of Object.entries(source)) {
    if (column === SEQUENCE_COLUMN) {
      continue
    }

    if (!isScalarValue(value)) {
      throw new StoreError(`Column ${column} returned a non scalar value`, {
        table,
        column,
      })
    }

    writeColumn(row, column, value)
  }

  return row
}

/**
 * Create a driver on a new {@link pg.Pool}
 *
 * @param connectionString The postgres:// connection string
 * @param options The {@link PostgresDriverOptions}
 * @returns A {@link PostgresStorageDriver} that owns the pool
 */
export function createPostgresDriver(
  connectionString: string,
  options: PostgresDriverOptions = {},
): PostgresStorageDriver {
  const logger =
    options.logger ?? new DefaultLogger({ name: "PostgresStorageDriver" })
  const pool = new pg.Pool({ connectionString, types: createTypeOverrides() })

  // Idle clients can fail without anyone waiting on them
  pool.on("error", (err) => {
    logger.error(`Idle client failure: ${err.message}`, err)
  })

  return new PostgresStorageDriver(
    {
      query: (text, values) => pool.query(text, values),
      end: () => pool.end(),
    },
    { ...options, logger },
  )
}
