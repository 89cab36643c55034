/**
 * Errors raised while converting tables to and from external formats
 */

import type { Optional } from "@rowkit/core/type/utils"
import { isStoreError } from "@rowkit/store"

/**
 * Extension of {@link ErrorOptions} for format failures
 */
export interface FormatErrorOptions extends ErrorOptions {
  /** The index of the data row that failed, when it is known */
  rowIndex?: number
}

/**
 * Base class for everything the format layer raises
 */
export class FormatError extends Error {
  readonly format: string
  readonly rowIndex?: number

  constructor(format: string, message: string, options?: FormatErrorOptions) {
    super(message, options)
    this.name = "FormatError"
    this.format = format
    this.rowIndex = options?.rowIndex
  }
}

/**
 * No codec is registered for the format, or it cannot import
 */
export class UnsupportedFormatError extends FormatError {
  constructor(format: string, message?: string) {
    super(format, message ?? `Format ${format} is not supported`)
    this.name = "UnsupportedFormatError"
  }
}

/**
 * A codec failed to serialize a snapshot
 */
export class ExportError extends FormatError {
  constructor(format: string, message: string, options?: FormatErrorOptions) {
    super(format, message, options)
    this.name = "ExportError"
  }
}

/**
 * The input could not be read or the table rejected one of its rows, nothing
 * was written to the table
 */
export class ImportError extends FormatError {
  constructor(format: string, message: string, options?: FormatErrorOptions) {
    super(format, message, options)
    this.name = "ImportError"
  }
}

/**
 * Raised by codecs, the registry wraps it into an {@link ExportError} or
 * {@link ImportError} with the format name attached
 */
export class CodecError extends Error {
  readonly rowIndex?: number

  constructor(message: string, options?: FormatErrorOptions) {
    super(message, options)
    this.name = "CodecError"
    this.rowIndex = options?.rowIndex
  }
}

export function isFormatError(error: unknown): error is FormatError {
  return error instanceof FormatError
}

export function isUnsupportedFormatError(
  error: unknown,
): error is UnsupportedFormatError {
  return error instanceof UnsupportedFormatError
}

/**
 * @param error The error a codec or the store raised
 * @returns The row index the error carries
 */
export function rowIndexOf(error: unknown): Optional<number> {
  return error instanceof CodecError || isStoreError(error)
    ? error.rowIndex
    : undefined
}
