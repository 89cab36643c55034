import type { Optional } from "@rowkit/core/type/utils"
import { normalizeRow, type Row } from "./types"

/**
 * The columns and rows a codec works from
 */
export interface TabularData {
  readonly columns: readonly string[]
  readonly rows: readonly Row[]
}

/**
 * Immutable copy of a table's columns and matching rows taken at a single
 * point in time
 */
export class RowSnapshot implements TabularData, Iterable<Row> {
  readonly table: string
  readonly columns: readonly string[]
  readonly primaryKey?: string
  readonly rows: readonly Row[]

  /**
   * @param table The table the rows came from
   * @param columns The declared columns at the time of the read
   * @param rows The matching rows, projected onto the columns
   * @param primaryKey The primary key column, if declared
   */
  constructor(
    table: string,
    columns: readonly string[],
    rows: readonly Row[],
    primaryKey?: string,
  ) {
    this.table = table
    this.columns = Object.freeze([...columns])
    this.primaryKey = primaryKey
    this.rows = Object.freeze(
      rows.map((row) => Object.freeze(normalizeRow(columns, row))),
    )
  }

  get length(): number {
    return this.rows.length
  }

  at(index: number): Optional<Row> {
    return this.rows.at(index)
  }

  *[Symbol.iterator](): Iterator<Row> {
    for (const row of this.rows) {
      yield row
    }
  }

  /**
   * @returns Mutable copies of the rows
   */
  toArray(): Row[] {
    return this.rows.map((row) => normalizeRow(this.columns, row))
  }
}
