/**
 * Delimiter separated text (CSV, TSV) on papaparse
 */

import type { Row, ScalarValue, TabularData } from "@rowkit/store"
import { isScalarValue, readColumn, writeColumn } from "@rowkit/store"
import Papa from "papaparse"
import { cellText, type Codec, type FormatOptions } from "../codec"
import { CodecError } from "../errors"

/** The amount of input the detection probe looks at */
const DETECT_SAMPLE_SIZE = 1024

const LINE_ENDING = "\r\n"

/**
 * Create a codec for text separated by the delimiter
 *
 * @param name The format name
 * @param delimiter The default field separator
 * @param extensions The file extensions for the format
 * @returns A new {@link Codec}
 */
export function createDelimitedCodec(
  name: string,
  delimiter: string,
  extensions: readonly string[],
): Codec {
  return {
    name,
    extensions,

    serialize(data: TabularData, options: FormatOptions): string {
      if (data.columns.length === 0) {
        return ""
      }

      const header = options.header ?? true
      const text = Papa.unparse(
        {
          fields: [...data.columns],
          data: data.rows.map((row) =>
            data.columns.map((c) => cellText(readColumn(row, c))),
          ),
        },
        {
          delimiter: options.delimiter ?? delimiter,
          newline: LINE_ENDING,
          header,
          // A lone empty cell would otherwise be written as a blank line
          quotes:
            data.columns.length === 1 ? (value: unknown) => value === "" : false,
        },
      )

      // Every record is terminated, including the last one
      return text.length > 0 ? `${text}${LINE_ENDING}` : text
    },

    deserialize(input: string, options: FormatOptions): TabularData {
      const header = options.header ?? true
      const records: unknown[][] = []
      const failures: CodecError[] = []
      let consumed = 0

      Papa.parse<unknown[]>(input, {
        delimiter: options.delimiter ?? delimiter,
        dynamicTyping: options.dynamicTyping ?? false,
        step(results) {
          // Blank lines hold nothing but the line break, a quoted empty cell
          // still has its quotes
          const text = input.slice(consumed, results.meta.cursor)
          consumed = results.meta.cursor

          const [error] = results.errors
          if (error !== undefined) {
            const rowIndex = header ? records.length - 1 : records.length
            failures.push(
              new CodecError(`${error.message} (${error.code})`, {
                rowIndex: rowIndex >= 0 ? rowIndex : undefined,
              }),
            )
          }

          if (text.replace(/[\r\n]/g, "").length > 0) {
            records.push(results.data)
          }
        },
      })

      const [failure] = failures
      if (failure !== undefined) {
        throw failure
      }

      const columns = header
        ? (records.shift() ?? []).map((c) => cellText(asScalar(c)))
        : [...(options.columns ?? [])]

      validateColumns(columns, records.length > 0)

      const rows = records.map((record, rowIndex) => {
        if (record.length > columns.length) {
          throw new CodecError(
            `Row ${rowIndex} has ${record.length} fields but there are only ${columns.length} columns`,
            { rowIndex },
          )
        }

        const row: Row = {}
        columns.forEach((column, i) => {
          // Short rows are padded out to the full width
          writeColumn(
            row,
            column,
            i < record.length ? asScalar(record[i], rowIndex) : "",
          )
        })

        return row
      })

      return { columns, rows }
    },

    detect(sample: string): boolean {
      const parsed = Papa.parse<unknown[]>(
        sample.slice(0, DETECT_SAMPLE_SIZE),
        {
          delimiter,
          skipEmptyLines: true,
          preview: 5,
        },
      )

      const [first] = parsed.data
      return (
        parsed.errors.length === 0 && first !== undefined && first.length > 1
      )
    },
  }
}

function asScalar(value: unknown, rowIndex?: number): ScalarValue {
  if (value === undefined) {
    return ""
  }

  if (!isScalarValue(value)) {
    throw new CodecError(`Unexpected cell value ${String(value)}`, {
      rowIndex,
    })
  }

  return value
}

function validateColumns(columns: readonly string[], hasRows: boolean): void {
  if (columns.length === 0 && hasRows) {
    throw new CodecError(`There are no columns to read the rows into`)
  }

  const seen = new Set<string>()
  for (const column of columns) {
    if (column.length === 0) {
      throw new CodecError(`Header contains an empty column name`)
    }

    if (seen.has(column)) {
      throw new CodecError(`Header repeats the column ${column}`)
    }

    seen.add(column)
  }
}

/** Comma separated values */
export const CsvCodec: Codec = createDelimitedCodec("csv", ",", ["csv"])

/** Tab separated values */
export const TsvCodec: Codec = createDelimitedCodec("tsv", "\t", ["tsv"])
