/**
 * Defines error handling for the store
 */

import type { ScalarValue } from "./types"

/**
 * Extension of {@link ErrorOptions} for store operations
 */
export interface StoreErrorOptions extends ErrorOptions {
  /** The table the operation targeted */
  table?: string
  /** The column involved, if any */
  column?: string
  /** The index of the row in a batch, if any */
  rowIndex?: number
}

/**
 * Represents an error that occurred during table store operations
 */
export class StoreError extends Error {
  readonly table?: string
  readonly column?: string
  readonly rowIndex?: number

  constructor(message?: string, options?: StoreErrorOptions) {
    super(message, options)
    this.name = "StoreError"
    this.table = options?.table
    this.column = options?.column
    this.rowIndex = options?.rowIndex
  }
}

/**
 * The table does not exist and automatic creation is disabled
 */
export class UnknownTableError extends StoreError {
  constructor(table: string, options?: ErrorOptions) {
    super(`Table ${table} does not exist`, { ...options, table })
    this.name = "UnknownTableError"
  }
}

/**
 * A write conflicts with the declared schema
 */
export class SchemaError extends StoreError {
  constructor(message: string, options?: StoreErrorOptions) {
    super(message, options)
    this.name = "SchemaError"
  }
}

/**
 * A filter cannot be applied to the table
 */
export class InvalidFilterError extends StoreError {
  constructor(message: string, options?: StoreErrorOptions) {
    super(message, options)
    this.name = "InvalidFilterError"
  }
}

/**
 * A write would store two rows with the same primary key
 */
export class DuplicateKeyError extends StoreError {
  readonly key: ScalarValue

  constructor(table: string, key: ScalarValue, options?: StoreErrorOptions) {
    super(`Duplicate primary key ${String(key)} in ${table}`, {
      ...options,
      table,
    })
    this.name = "DuplicateKeyError"
    this.key = key
  }
}

/**
 * Type guard for {@link StoreError}
 *
 * @param error The error to inspect
 * @returns True if the error is a {@link StoreError}
 */
export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError
}
