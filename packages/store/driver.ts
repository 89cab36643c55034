/**
 * Contract between the {@link TableStore} and the storage underneath it
 */

import type { MaybeAwaitable } from "@rowkit/core"
import type {
  ColumnDescriptor,
  Row,
  RowFilter,
  TableDefinition,
} from "./types"

/**
 * Persists tables and rows. The store owns schemas, validation and locking,
 * so a driver only ever sees columns that are already declared and filters
 * over those columns.
 */
export interface StorageDriver {
  /** A name for logs and traces */
  readonly name: string

  /**
   * Read the tables that already exist
   */
  introspect(): MaybeAwaitable<TableDefinition[]>

  /**
   * Create a new, empty table
   *
   * @param definition The {@link TableDefinition} to create
   */
  createTable(definition: TableDefinition): MaybeAwaitable<void>

  /**
   * Remove the table and its rows
   *
   * @param table The table name
   */
  dropTable(table: string): MaybeAwaitable<void>

  /**
   * Add a nullable column, existing rows read it as `null`
   *
   * @param table The table name
   * @param column The {@link ColumnDescriptor} to add
   */
  addColumn(table: string, column: ColumnDescriptor): MaybeAwaitable<void>

  /**
   * Give a column that has only held `null` its first known kind
   *
   * @param table The table name
   * @param column The {@link ColumnDescriptor} with the adopted kind
   */
  adoptColumn(table: string, column: ColumnDescriptor): MaybeAwaitable<void>

  /**
   * Store a single row
   *
   * @param table The current {@link TableDefinition}
   * @param row The row to store
   * @returns The row as stored, including any generated key
   */
  insert(table: TableDefinition, row: Row): MaybeAwaitable<Row>

  /**
   * Apply the patch to every matching row
   *
   * @returns The number of rows updated
   */
  update(
    table: TableDefinition,
    filter: RowFilter,
    patch: Row,
  ): MaybeAwaitable<number>

  /**
   * Remove every matching row
   *
   * @returns The number of rows removed
   */
  delete(table: TableDefinition, filter: RowFilter): MaybeAwaitable<number>

  /**
   * Read every matching row in one operation
   *
   * @returns The rows in storage order
   */
  select(table: TableDefinition, filter: RowFilter): MaybeAwaitable<Row[]>

  /**
   * Release any resources held by the driver
   */
  close(): MaybeAwaitable<void>
}
