/**
 * Keeps tables as in memory arrays of rows
 */

import type { StorageDriver } from "./driver"
import { DuplicateKeyError, SchemaError, StoreError } from "./errors"
import {
  copyRow,
  matchesFilter,
  readColumn,
  scalarEquals,
  writeColumn,
  type ColumnDescriptor,
  type Row,
  type RowFilter,
  type ScalarValue,
  type TableDefinition,
} from "./types"

/**
 * Define an in memory table as the rows in insertion order plus the next
 * generated key
 */
interface InMemoryTable {
  definition: TableDefinition
  rows: Row[]
  nextKey: number
}

/**
 * {@link StorageDriver} over plain arrays, nothing survives the process
 */
export class InMemoryStorageDriver implements StorageDriver {
  readonly name: string
  readonly #tables: Map<string, InMemoryTable> = new Map()

  constructor(name: string = "memory") {
    this.name = name
  }

  introspect(): TableDefinition[] {
    return Array.from(this.#tables.values()).map((t) => t.definition)
  }

  createTable(definition: TableDefinition): void {
    if (!this.#tables.has(definition.name)) {
      this.#tables.set(definition.name, {
        definition,
        rows: [],
        nextKey: 1,
      })
    }
  }

  dropTable(table: string): void {
    this.#tables.delete(table)
  }

  addColumn(table: string, column: ColumnDescriptor): void {
    const target = this.#get(table)
    if (target.definition.columns.some((c) => c.name === column.name)) {
      return
    }

    target.definition = {
      ...target.definition,
      columns: [...target.definition.columns, column],
    }

    for (const row of target.rows) {
      writeColumn<ScalarValue>(row, column.name, null)
    }
  }

  adoptColumn(table: string, column: ColumnDescriptor): void {
    const target = this.#get(table)

    target.definition = {
      ...target.definition,
      columns: target.definition.columns.map((c) =>
        c.name === column.name ? column : c,
      ),
    }
  }

  insert(table: TableDefinition, row: Row): Row {
    const target = this.#get(table.name)
    const stored = copyRow(row)
    const primaryKey = table.primaryKey

    if (primaryKey !== undefined) {
      let key = readColumn(stored, primaryKey.column)

      if (key === null) {
        if (!primaryKey.autoIncrement) {
          throw new SchemaError(
            `A value for ${primaryKey.column} is required`,
            { table: table.name, column: primaryKey.column },
          )
        }

        key = target.nextKey
        writeColumn<ScalarValue>(stored, primaryKey.column, key)
      }

      if (this.#hasKey(target, primaryKey.column, key)) {
        throw new DuplicateKeyError(table.name, key, {
          column: primaryKey.column,
        })
      }

      if (typeof key === "number" && Number.isInteger(key)) {
        target.nextKey = Math.max(target.nextKey, key + 1)
      }
    }

    target.rows.push(stored)
    return copyRow(stored)
  }

  update(table: TableDefinition, filter: RowFilter, patch: Row): number {
    const target = this.#get(table.name)
    const matches = target.rows.filter((row) => matchesFilter(row, filter))
    const primaryKey = table.primaryKey

    // Verify the key stays unique before touching anything
    if (primaryKey !== undefined && Object.hasOwn(patch, primaryKey.column)) {
      const key = readColumn(patch, primaryKey.column)
      const collides = target.rows.some(
        (row) =>
          !matches.includes(row) &&
          scalarEquals(readColumn(row, primaryKey.column), key),
      )

      if (matches.length > 1 || collides) {
        throw new DuplicateKeyError(table.name, key, {
          column: primaryKey.column,
        })
      }
    }

    for (const row of matches) {
      for (const [column, value] of Object.entries(copyRow(patch))) {
        writeColumn(row, column, value)
      }
    }

    return matches.length
  }

  delete(table: TableDefinition, filter: RowFilter): number {
    const target = this.#get(table.name)
    const before = target.rows.length
    target.rows = target.rows.filter((row) => !matchesFilter(row, filter))

    return before - target.rows.length
  }

  select(table: TableDefinition, filter: RowFilter): Row[] {
    return this.#get(table.name)
      .rows.filter((row) => matchesFilter(row, filter))
      .map(copyRow)
  }

  close(): void {}

  #get(table: string): InMemoryTable {
    const target = this.#tables.get(table)
    if (target === undefined) {
      throw new StoreError(`Table ${table} has no storage`, { table })
    }

    return target
  }

  #hasKey(target: InMemoryTable, column: string, key: ScalarValue): boolean {
    return target.rows.some((row) => scalarEquals(readColumn(row, column), key))
  }
}
