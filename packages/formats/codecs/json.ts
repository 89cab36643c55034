import { getErrorMessage } from "@rowkit/core/errors"
import { readColumn, writeColumn, type Row, type TabularData } from "@rowkit/store"
import { recordsToRows, type Codec, type FormatOptions } from "../codec"
import { CodecError } from "../errors"

/**
 * Copy the rows into plain objects in column order, dates become ISO-8601
 * strings and non-finite numbers are refused
 */
export function plainRecords(
  data: TabularData,
): Record<string, string | number | boolean | null>[] {
  return data.rows.map((row: Row, rowIndex: number) => {
    const record: Record<string, string | number | boolean | null> = {}

    for (const column of data.columns) {
      const value = readColumn(row, column)

      if (typeof value === "number" && !Number.isFinite(value)) {
        throw new CodecError(
          `Row ${rowIndex} has a non-finite number in ${column}`,
          { rowIndex },
        )
      }

      writeColumn(record, column, value instanceof Date ? value.toISOString() : value)
    }

    return record
  })
}

/**
 * An array of row objects
 */
export const JsonCodec: Codec = {
  name: "json",
  extensions: ["json", "jsn"],

  serialize(data: TabularData, options: FormatOptions): string {
    return JSON.stringify(plainRecords(data), undefined, options.indent)
  },

  deserialize(input: string): TabularData {
    let document: unknown
    try {
      document = JSON.parse(input)
    } catch (err) {
      throw new CodecError(`Invalid JSON: ${getErrorMessage(err) ?? String(err)}`, {
        cause: err,
      })
    }

    return recordsToRows(document)
  },

  detect(sample: string): boolean {
    try {
      const document: unknown = JSON.parse(sample)
      return typeof document === "object" && document !== null
    } catch {
      return false
    }
  },
}
