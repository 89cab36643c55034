/**
 * Table markups that are only ever written (HTML, LaTeX, XML, Jira)
 */

import type { Row, ScalarValue, TabularData } from "@rowkit/store"
import { readColumn } from "@rowkit/store"
import { cellText, type Codec, type FormatOptions } from "../codec"
import { CodecError } from "../errors"

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
}

/**
 * @param text The text to escape
 * @returns The text with markup characters replaced by entities
 */
export function escapeMarkup(text: string): string {
  return text.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c)
}

/**
 * An HTML `table`, the header is only written when there are columns
 */
export const HtmlCodec: Codec = {
  name: "html",
  extensions: ["html", "htm"],

  serialize(data: TabularData): string {
    const cells = (tag: string, values: string[]) =>
      values.map((v) => `<${tag}>${escapeMarkup(v)}</${tag}>`).join("")

    const lines = ["<table>"]
    if (data.columns.length > 0) {
      lines.push("<thead>", `<tr>${cells("th", [...data.columns])}</tr>`, "</thead>")
    }

    for (const row of data.rows) {
      lines.push(
        `<tr>${cells(
          "td",
          data.columns.map((c) => cellText(readColumn(row, c))),
        )}</tr>`,
      )
    }

    lines.push("</table>")
    return lines.join("\n")
  },
}

const TEX_ESCAPES: Record<string, string> = {
  "\\": "\\textbackslash{}",
  "{": "\\{",
  "}": "\\}",
  $: "\\$",
  "&": "\\&",
  "#": "\\#",
  "^": "\\textasciicircum{}",
  _: "\\_",
  "~": "\\textasciitilde{}",
  "%": "\\%",
}

/**
 * @param text The text to escape
 * @returns The text with every TeX reserved character escaped
 */
export function escapeTex(text: string): string {
  return text.replace(/[\\{}$&#^_~%]/g, (c) => TEX_ESCAPES[c] ?? c)
}

function texRow(values: readonly string[]): string {
  return `      ${values.map(escapeTex).join(" & ")} \\\\`
}

function midrule(width: number): string {
  if (width <= 1) {
    return "\\midrule"
  }

  const rules: string[] = []
  for (let column = 1; column <= width; column++) {
    const trim = column === 1 ? "r" : column === width ? "l" : "lr"
    rules.push(`\\cmidrule(${trim}){${column}-${column}}`)
  }

  return rules.join(" ")
}

/**
 * A booktabs table, the first column is left aligned and the rest right
 * aligned
 */
export const LatexCodec: Codec = {
  name: "latex",
  extensions: ["tex"],

  serialize(data: TabularData, options: FormatOptions): string {
    const width = data.columns.length
    const caption =
      options.title !== undefined && options.title.length > 0
        ? `\\caption{${escapeTex(options.title)}}`
        : "%"
    const header = width > 0 ? texRow(data.columns) : ""
    const body = data.rows
      .map((row) =>
        texRow(data.columns.map((c) => cellText(readColumn(row, c)))),
      )
      .join("\n")

    return [
      "% Note: add \\usepackage{booktabs} to your preamble",
      "%",
      "\\begin{table}[!htbp]",
      "  \\centering",
      `  ${caption}`,
      `  \\begin{tabular}{l${"r".repeat(Math.max(width - 1, 0))}}`,
      "    \\toprule",
      header,
      `    ${midrule(width)}`,
      body,
      "    \\bottomrule",
      "  \\end{tabular}",
      "\\end{table}",
      "",
    ].join("\n")
  },
}

const XML_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/

function xmlElement(name: string, value: ScalarValue | undefined): string {
  const text = cellText(value)
  return text.length > 0
    ? `<${name}>${escapeMarkup(text)}</${name}>`
    : `<${name} />`
}

/**
 * A `Table` element holding one `row` per row and one child per column
 */
export const XmlCodec: Codec = {
  name: "xml",
  extensions: ["xml"],

  serialize(data: TabularData, options: FormatOptions): string {
    for (const column of data.columns) {
      if (!XML_NAME.test(column)) {
        throw new CodecError(`Column ${column} is not a valid element name`)
      }
    }

    if (data.rows.length === 0) {
      return "<Table />"
    }

    const rows = data.rows.map((row: Row, index: number) => {
      const tags = options.rowTags?.(row, index) ?? []
      const open =
        tags.length > 0 ? `<row tags="${escapeMarkup(tags.join(","))}">` : "<row>"

      return `${open}${data.columns.map((c) => xmlElement(c, readColumn(row, c))).join("")}</row>`
    })

    return `<Table>${rows.join("")}</Table>`
  },
}

function jiraRow(values: readonly string[], delimiter: string): string {
  return `${delimiter}${values.map((v) => (v.length > 0 ? v : " ")).join(delimiter)}${delimiter}`
}

/**
 * Jira wiki markup, `||` around headings and `|` around cells
 */
export const JiraCodec: Codec = {
  name: "jira",
  extensions: [],

  serialize(data: TabularData): string {
    const body = data.rows
      .map((row) =>
        jiraRow(
          data.columns.map((c) => cellText(readColumn(row, c))),
          "|",
        ),
      )
      .join("\n")

    return data.columns.length > 0
      ? `${jiraRow(data.columns, "||")}\n${body}`
      : body
  },
}
