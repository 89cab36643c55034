/**
 * Explicit, mutable schema for a table that grows as new columns are written
 */

import type { Optional } from "@rowkit/core/type/utils"
import { SchemaError } from "./errors"
import {
  isScalarValue,
  kindOf,
  type ColumnDescriptor,
  type PrimaryKeyDefinition,
  type Row,
  type TableDefinition,
  type TableOptions,
} from "./types"

/**
 * A change that has to be applied before a row can be written
 */
export type SchemaChange =
  /** A new column, existing rows read it as `null` */
  | { type: "add"; column: ColumnDescriptor }
  /** A column created from `null` values now has a known kind */
  | { type: "adopt"; column: ColumnDescriptor }

/**
 * Ordered set of {@link ColumnDescriptor} plus the optional primary key
 */
export class TableSchema {
  readonly name: string
  readonly primaryKey?: PrimaryKeyDefinition
  readonly #columns: Map<string, ColumnDescriptor> = new Map()

  constructor(definition: TableDefinition) {
    this.name = definition.name
    this.primaryKey = definition.primaryKey

    for (const column of definition.columns) {
      this.#columns.set(column.name, column)
    }

    if (this.primaryKey && !this.#columns.has(this.primaryKey.column)) {
      this.#columns.set(this.primaryKey.column, {
        name: this.primaryKey.column,
        kind: this.primaryKey.kind,
      })
    }
  }

  /**
   * Build the schema for a brand new table
   *
   * @param name The table name
   * @param options The {@link TableOptions} for the table
   * @returns A {@link TableSchema} with only the key column (if any) declared
   */
  static create(name: string, options?: TableOptions): TableSchema {
    const key = options?.primaryKey
    const primaryKey: Optional<PrimaryKeyDefinition> =
      key === undefined
        ? undefined
        : typeof key === "string"
          ? { column: key, kind: "number", autoIncrement: true }
          : {
              column: key.column,
              kind: key.kind ?? "number",
              // Only numeric keys can be generated
              autoIncrement:
                (key.kind ?? "number") === "number" &&
                (key.autoIncrement ?? true),
            }

    return new TableSchema({ name, columns: [], primaryKey })
  }

  get columns(): readonly ColumnDescriptor[] {
    return Array.from(this.#columns.values())
  }

  get columnNames(): string[] {
    return Array.from(this.#columns.keys())
  }

  has(column: string): boolean {
    return this.#columns.has(column)
  }

  column(name: string): Optional<ColumnDescriptor> {
    return this.#columns.get(name)
  }

  /**
   * Work out the changes needed before the values can be written
   *
   * @param values The values about to be written
   * @param strict When true, a value whose kind differs from the declared
   * kind is rejected
   * @returns The {@link SchemaChange} list in the order of the row keys
   * @throws {SchemaError} for invalid names, non-scalar values or (strict)
   * kind conflicts
   */
  plan(values: Row, strict: boolean): SchemaChange[] {
    const changes: SchemaChange[] = []

    for (const [name, value] of Object.entries(values)) {
      if (name.length === 0) {
        throw new SchemaError(`Column names cannot be empty`, {
          table: this.name,
        })
      }

      // Runtime input (parsed files, JSON bodies) does not respect the types
      const candidate: unknown = value
      if (!isScalarValue(candidate)) {
        throw new SchemaError(
          `Column ${name} cannot store a value of type ${describe(candidate)}`,
          { table: this.name, column: name },
        )
      }

      const kind = kindOf(candidate)
      const existing = this.#columns.get(name)

      if (existing === undefined) {
        changes.push({ type: "add", column: { name, kind } })
      } else if (kind !== "unknown") {
        if (existing.kind === "unknown") {
          changes.push({ type: "adopt", column: { name, kind } })
        } else if (strict && existing.kind !== kind) {
          throw new SchemaError(
            `Column ${name} is declared as ${existing.kind} but received ${kind}`,
            { table: this.name, column: name },
          )
        }
      }
    }

    return changes
  }

  /**
   * Apply a change from {@link plan}
   *
   * @param change The {@link SchemaChange} to apply
   */
  apply(change: SchemaChange): void {
    this.#columns.set(change.column.name, change.column)
  }

  toDefinition(): TableDefinition {
    return {
      name: this.name,
      columns: this.columns,
      primaryKey: this.primaryKey,
    }
  }
}

function describe(value: unknown): string {
  if (value === undefined) {
    return "undefined"
  }

  if (Array.isArray(value)) {
    return "array"
  }

  if (value instanceof Date) {
    return "invalid date"
  }

  return typeof value
}
