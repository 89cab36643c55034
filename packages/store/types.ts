/**
 * Row and schema types shared by the store, its drivers and the codecs
 */

/**
 * The values a column can hold, {@link Date} is the timestamp scalar
 */
export type ScalarValue = string | number | boolean | Date | null

/**
 * An ordered mapping of column name to {@link ScalarValue}
 */
export type Row = Record<string, ScalarValue>

/**
 * Column to expected value, every entry must match (logical AND)
 */
export type RowFilter = Readonly<Record<string, ScalarValue>>

/**
 * The kind of value a column holds, `unknown` until a non-null value is seen
 */
export type ColumnKind = "unknown" | "string" | "number" | "boolean" | "timestamp"

/**
 * Describes a single declared column
 */
export interface ColumnDescriptor {
  readonly name: string
  readonly kind: ColumnKind
}

/**
 * A declared primary key
 */
export interface PrimaryKeyDefinition {
  readonly column: string
  readonly kind: "number" | "string"
  /** Assign the next integer when a row is inserted without a key */
  readonly autoIncrement: boolean
}

/**
 * The persisted shape of a table that drivers work from
 */
export interface TableDefinition {
  readonly name: string
  readonly columns: readonly ColumnDescriptor[]
  readonly primaryKey?: PrimaryKeyDefinition
}

/**
 * Options when creating a table
 */
export interface TableOptions {
  /** Either the key column name (numeric, auto-incremented) or the full definition */
  primaryKey?:
    | string
    | {
        column: string
        kind?: "number" | "string"
        autoIncrement?: boolean
      }
}

/**
 * Type guard for {@link ScalarValue}, invalid dates are not scalars
 *
 * @param value The value to inspect
 * @returns True if the value can be stored in a column
 */
export function isScalarValue(value: unknown): value is ScalarValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true
    case "object":
      return (
        value === null ||
        (value instanceof Date && !Number.isNaN(value.getTime()))
      )
    default:
      return false
  }
}

/**
 * @param value The value to inspect
 * @returns The {@link ColumnKind} for the value
 */
export function kindOf(value: ScalarValue): ColumnKind {
  if (value === null) {
    return "unknown"
  }

  if (value instanceof Date) {
    return "timestamp"
  }

  switch (typeof value) {
    case "string":
      return "string"
    case "number":
      return "number"
    default:
      return "boolean"
  }
}

/**
 * Equality used by filters, dates compare by time value
 *
 * @param left The left value
 * @param right The right value
 * @returns True if the two values are equal
 */
export function scalarEquals(left: ScalarValue, right: ScalarValue): boolean {
  if (left instanceof Date || right instanceof Date) {
    return (
      left instanceof Date &&
      right instanceof Date &&
      left.getTime() === right.getTime()
    )
  }

  return left === right
}

const KIND_ORDER: Record<ColumnKind, number> = {
  unknown: 0,
  boolean: 1,
  number: 2,
  timestamp: 3,
  string: 4,
}

/**
 * Ordering used for primary keys, nulls sort first and mixed kinds sort by
 * kind before value
 *
 * @param left The left value
 * @param right The right value
 * @returns A negative, zero or positive number
 */
export function compareScalars(left: ScalarValue, right: ScalarValue): number {
  const leftKind = kindOf(left)
  const rightKind = kindOf(right)
  if (leftKind !== rightKind) {
    return KIND_ORDER[leftKind] - KIND_ORDER[rightKind]
  }

  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0
  }

  return toOrdinal(left) - toOrdinal(right)
}

function toOrdinal(value: ScalarValue): number {
  return value instanceof Date ? value.getTime() : Number(value)
}

/**
 * @param value The value to copy
 * @returns A copy that shares no mutable state with the original
 */
export function cloneScalar(value: ScalarValue): ScalarValue {
  return value instanceof Date ? new Date(value.getTime()) : value
}

/**
 * Read a column from the row's own properties, so names like `constructor`
 * read as `null` when the row doesn't carry them
 *
 * @param row The row to read
 * @param column The column name
 * @returns The value or `null` when absent
 */
export function readColumn(row: Readonly<Row>, column: string): ScalarValue {
  return Object.hasOwn(row, column) ? (row[column] ?? null) : null
}

/**
 * Set the column as an own property, assignment would treat `__proto__` as
 * the prototype instead
 *
 * @param record The record to write into
 * @param column The column name
 * @param value The value to set
 */
export function writeColumn<T>(
  record: Record<string, T>,
  column: string,
  value: T,
): void {
  Object.defineProperty(record, column, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

/**
 * Copy the row, column by column
 *
 * @param row The row to copy
 * @returns A new {@link Row} sharing no mutable state with the original
 */
export function copyRow(row: Readonly<Row>): Row {
  const copy: Row = {}
  for (const [column, value] of Object.entries(row)) {
    writeColumn(copy, column, cloneScalar(value))
  }

  return copy
}

/**
 * Convert cell text to the declared kind, empty text reads as `null` and
 * text that doesn't convert is returned unchanged
 *
 * @param value The value to convert
 * @param kind The declared {@link ColumnKind}
 * @returns The converted value
 */
export function coerceScalar(value: ScalarValue, kind: ColumnKind): ScalarValue {
  if (typeof value !== "string" || kind === "string" || kind === "unknown") {
    return value
  }

  const text = value.trim()
  if (text.length === 0) {
    return null
  }

  switch (kind) {
    case "number": {
      const parsed = Number(text)
      return Number.isFinite(parsed) ? parsed : value
    }
    case "boolean": {
      const lower = text.toLowerCase()
      if (lower === "true" || lower === "1") {
        return true
      }

      return lower === "false" || lower === "0" ? false : value
    }
    default: {
      const time = Date.parse(text)
      return Number.isNaN(time) ? value : new Date(time)
    }
  }
}

/**
 * Project the row onto the columns, in column order, with absent values as
 * `null`
 *
 * @param columns The columns to project onto
 * @param row The source row
 * @returns A new {@link Row}
 */
export function normalizeRow(columns: readonly string[], row: Row): Row {
  const normalized: Row = {}
  for (const column of columns) {
    writeColumn(normalized, column, cloneScalar(readColumn(row, column)))
  }

  return normalized
}

/**
 * @param row The row to test
 * @param filter The {@link RowFilter} to apply
 * @returns True if every filter entry matches, absent values read as `null`
 */
export function matchesFilter(row: Row, filter: RowFilter): boolean {
  for (const [column, expected] of Object.entries(filter)) {
    if (!scalarEquals(readColumn(row, column), expected)) {
      return false
    }
  }

  return true
}
