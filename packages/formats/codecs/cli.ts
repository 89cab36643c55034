import { readColumn, type TabularData } from "@rowkit/store"
import { cellText, type Codec } from "../codec"

const COLUMN_GAP = "  "

/**
 * Plain text columns for a terminal, columns holding only numbers are right
 * aligned
 */
export const CliCodec: Codec = {
  name: "cli",
  extensions: ["txt"],

  serialize(data: TabularData): string {
    if (data.columns.length === 0) {
      return ""
    }

    const numeric = data.columns.map((column) => {
      const values = data.rows.map((row) => readColumn(row, column))
      return (
        values.some((v) => v !== null) &&
        values.every((v) => v === null || typeof v === "number")
      )
    })

    const lines = [
      [...data.columns],
      ...data.rows.map((row) => data.columns.map((c) => cellText(readColumn(row, c)))),
    ]

    const widths = data.columns.map((_, i) =>
      Math.max(...lines.map((line) => line[i]?.length ?? 0)),
    )

    return lines
      .map((line) =>
        line
          .map((cell, i) =>
            numeric[i] ? cell.padStart(widths[i] ?? 0) : cell.padEnd(widths[i] ?? 0),
          )
          .join(COLUMN_GAP)
          .trimEnd(),
      )
      .join("\n")
  },
}
