import { CodecError } from "../errors"
import {
  HtmlCodec,
  JiraCodec,
  LatexCodec,
  XmlCodec,
  escapeTex,
} from "./markup"

describe("Markup codecs", () => {
  it("Should write escaped HTML", () => {
    expect(
      HtmlCodec.serialize(
        { columns: ["name", "note"], rows: [{ name: "<b>", note: null }] },
        {},
      ),
    ).toBe(
      [
        "<table>",
        "<thead>",
        "<tr><th>name</th><th>note</th></tr>",
        "</thead>",
        "<tr><td>&lt;b&gt;</td><td></td></tr>",
        "</table>",
      ].join("\n"),
    )

    expect(HtmlCodec.serialize({ columns: [], rows: [] }, {})).toBe(
      "<table>\n</table>",
    )
  })

  it("Should write a booktabs table", () => {
    expect(
      LatexCodec.serialize(
        { columns: ["name", "score"], rows: [{ name: "A_B", score: 0 }] },
        { title: "Results" },
      ),
    ).toBe(
      [
        "% Note: add \\usepackage{booktabs} to your preamble",
        "%",
        "\\begin{table}[!htbp]",
        "  \\centering",
        "  \\caption{Results}",
        "  \\begin{tabular}{lr}",
        "    \\toprule",
        "      name & score \\\\",
        "    \\cmidrule(r){1-1} \\cmidrule(l){2-2}",
        "      A\\_B & 0 \\\\",
        "    \\bottomrule",
        "  \\end{tabular}",
        "\\end{table}",
        "",
      ].join("\n"),
    )
  })

  it("Should use a plain midrule for a single column", () => {
    const lines = LatexCodec.serialize(
      { columns: ["only"], rows: [] },
      {},
    ).toString().split("\n")

    expect(lines[4]).toBe("  %")
    expect(lines[5]).toBe("  \\begin{tabular}{l}")
    expect(lines[8]).toBe("    \\midrule")
  })

  it("Should trim rules for inner columns", () => {
    const lines = LatexCodec.serialize(
      { columns: ["a", "b", "c"], rows: [] },
      {},
    ).toString().split("\n")

    expect(lines[5]).toBe("  \\begin{tabular}{lrr}")
    expect(lines[8]).toBe(
      "    \\cmidrule(r){1-1} \\cmidrule(lr){2-2} \\cmidrule(l){3-3}",
    )
  })

  it("Should escape every TeX reserved character", () => {
    expect(escapeTex("50% of $5 & #1 ^ ~ {x} \\ _")).toBe(
      "50\\% of \\$5 \\& \\#1 \\textasciicircum{} \\textasciitilde{} \\{x\\} \\textbackslash{} \\_",
    )
  })

  it("Should write XML rows with tags", () => {
    expect(
      XmlCodec.serialize(
        {
          columns: ["name", "score"],
          rows: [
            { name: "A&B", score: null },
            { name: "C", score: 2 },
          ],
        },
        { rowTags: (_row, index) => (index === 0 ? ["x", "y"] : undefined) },
      ),
    ).toBe(
      '<Table><row tags="x,y"><name>A&amp;B</name><score /></row><row><name>C</name><score>2</score></row></Table>',
    )

    expect(XmlCodec.serialize({ columns: ["a"], rows: [] }, {})).toBe(
      "<Table />",
    )
  })

  it("Should refuse invalid element names", () => {
    expect(() =>
      XmlCodec.serialize({ columns: ["bad name"], rows: [] }, {}),
    ).toThrow(CodecError)
  })

  it("Should write Jira markup", () => {
    expect(
      JiraCodec.serialize(
        {
          columns: ["a", "b"],
          rows: [
            { a: "x", b: null },
            { a: 0, b: "y" },
          ],
        },
        {},
      ),
    ).toBe("||a||b||\n|x| |\n|0|y|")

    expect(JiraCodec.serialize({ columns: ["a", "b"], rows: [] }, {})).toBe(
      "||a||b||\n",
    )
  })
})
