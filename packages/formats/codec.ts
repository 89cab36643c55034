/**
 * The contract every format implements
 */

import type { Optional } from "@rowkit/core/type/utils"
import type { Row, ScalarValue, TabularData } from "@rowkit/store"
import { isScalarValue, writeColumn } from "@rowkit/store"
import { CodecError } from "./errors"

/**
 * Options understood by the built-in codecs, each codec ignores what it
 * doesn't use
 */
export interface FormatOptions {
  /** Field separator for delimited text */
  delimiter?: string
  /** Whether delimited text starts with a header row (default true) */
  header?: boolean
  /** Columns to read headerless delimited text into */
  columns?: readonly string[]
  /** Convert numeric and boolean looking cells when reading delimited text */
  dynamicTyping?: boolean
  /** Caption for LaTeX tables */
  title?: string
  /** Indentation for JSON and YAML output */
  indent?: number
  /** Tags for the XML `row` element */
  rowTags?: (row: Row, index: number) => Optional<readonly string[]>
}

/**
 * A serializer with optional deserializer and sniffing probe for a single
 * external representation
 */
export interface Codec {
  /** The format name the codec registers under */
  readonly name: string
  /** File extensions without the leading dot */
  readonly extensions: readonly string[]

  /**
   * @param data The {@link TabularData} to write
   * @param options The {@link FormatOptions}
   * @returns The serialized representation
   * @throws {CodecError} when a value cannot be represented
   */
  serialize(data: TabularData, options: FormatOptions): string | Uint8Array

  /**
   * @param input The decoded input
   * @param options The {@link FormatOptions}
   * @returns The columns and rows that were read
   * @throws {CodecError} when the input is malformed
   */
  deserialize?(input: string, options: FormatOptions): TabularData

  /**
   * @param sample The start of some input
   * @returns True if the sample looks like this format
   */
  detect?(sample: string): boolean
}

/**
 * Render a value as cell text, `null` is empty and dates use ISO-8601
 *
 * @param value The value to render
 * @returns The text for the cell
 */
export function cellText(value: Optional<ScalarValue>): string {
  if (value === null || value === undefined) {
    return ""
  }

  return value instanceof Date ? value.toISOString() : String(value)
}

/**
 * Convert parsed records (JSON, YAML) into rows, every record must be a flat
 * object of scalars
 *
 * @param value The parsed document
 * @returns The {@link TabularData} with columns in order of first appearance
 * @throws {CodecError} if the document has any other shape
 */
export function recordsToRows(value: unknown): TabularData {
  if (!Array.isArray(value)) {
    throw new CodecError(`Expected an array of rows`)
  }

  const columns = new Set<string>()
  const rows: Row[] = []

  value.forEach((record: unknown, rowIndex: number) => {
    if (typeof record !== "object" || record === null || Array.isArray(record)) {
      throw new CodecError(`Row ${rowIndex} is not an object`, { rowIndex })
    }

    const row: Row = {}
    for (const [column, cell] of Object.entries(record)) {
      const candidate: unknown = cell
      if (!isScalarValue(candidate)) {
        throw new CodecError(`Row ${rowIndex} has a nested value in ${column}`, {
          rowIndex,
        })
      }

      columns.add(column)
      writeColumn(row, column, candidate)
    }

    rows.push(row)
  })

  return { columns: Array.from(columns), rows }
}
