import { UnknownTableError } from "@rowkit/store"
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import { join } from "path"
import { Writable } from "stream"
import { runCli, type CliStreams } from "./cli"
import { open } from "./dataset"

function captureStreams(): CliStreams & { out: () => string; err: () => string } {
  const out: string[] = []
  const err: string[] = []
  const collect = (chunks: string[]) =>
    new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString())
        callback()
      },
    })

  return {
    stdout: collect(out),
    stderr: collect(err),
    out: () => out.join(""),
    err: () => err.join(""),
  }
}

async function seed(store: string): Promise<void> {
  const dataset = await open(store)
  const people = await dataset.table("people")
  await people.insert({ name: "Ada", age: 36 })
  await people.insert({ name: "Bob", age: 41 })
  await dataset.close()
}

describe("rowkit", () => {
  let dir: string
  let streams: ReturnType<typeof captureStreams>

  const run = (...args: string[]) =>
    runCli(["node", "rowkit", ...args], streams)

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "rowkit-cli-"))
    streams = captureStreams()
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it("Should list the formats", async () => {
    await run("formats")

    const lines = streams.out().split("\n")
    expect(lines[0]).toBe("format  extensions  import")
    expect(lines[2]).toBe(`csv${" ".repeat(5)}csv${" ".repeat(9)}true`)
    expect(lines).toHaveLength(11)
  })

  it("Should list the tables", async () => {
    await seed("memory://cli-tables")
    await run("--store", "memory://cli-tables", "tables")

    expect(streams.out()).toBe("people\n")
  })

  it("Should export to stdout", async () => {
    await seed("memory://cli-export")
    await run("--store", "memory://cli-export", "export", "people", "--format", "csv")

    expect(streams.out()).toBe("name,age\r\nAda,36\r\nBob,41\r\n")
  })

  it("Should export to a file in the format of its extension", async () => {
    await seed("memory://cli-export-file")
    const out = join(dir, "people.json")
    await run("--store", "memory://cli-export-file", "export", "people", "--out", out)

    expect(streams.out()).toBe(`Wrote ${out}\n`)
    expect(readFileSync(out, "utf8")).toBe(
      '[{"name":"Ada","age":36},{"name":"Bob","age":41}]',
    )
  })

  it("Should refuse to export missing tables", async () => {
    await expect(
      run("--store", "memory://cli-empty", "export", "ghosts"),
    ).rejects.toThrow(new UnknownTableError("ghosts"))
  })

  it("Should import a file", async () => {
    const file = join(dir, "people.csv")
    writeFileSync(file, "name,age\nCy,29\nDi,33\n", "utf8")

    await run("--store", "memory://cli-import", "import", "people", file)

    expect(streams.out()).toBe("Imported 2 row(s) into people\n")

    const dataset = await open("memory://cli-import")
    expect((await (await dataset.table("people")).find()).toArray()).toEqual([
      { name: "Cy", age: "29" },
      { name: "Di", age: "33" },
    ])
    await dataset.close()
  })

  it("Should convert between formats", async () => {
    const input = join(dir, "in.csv")
    const output = join(dir, "out.json")
    writeFileSync(input, "a,b\n1,2\n", "utf8")

    await run("convert", input, output)

    expect(streams.out()).toBe("Converted 1 row(s) from csv to json\n")
    expect(readFileSync(output, "utf8")).toBe('[{"a":"1","b":"2"}]')
  })

  it("Should detect the input format when converting", async () => {
    const input = join(dir, "data.txt")
    const output = join(dir, "data.csv")
    writeFileSync(input, '[{"a":1}]', "utf8")

    await run("convert", input, output)

    expect(streams.out()).toBe("Converted 1 row(s) from json to csv\n")
    expect(readFileSync(output, "utf8")).toBe("a\r\n1\r\n")
  })

  it("Should print help without failing", async () => {
    await run("--help")

    expect(streams.out()).toContain("Usage: rowkit")
  })

  it("Should reject unknown log levels", async () => {
    await expect(run("--log-level", "loud", "tables")).rejects.toHaveProperty(
      "code",
      "commander.invalidArgument",
    )
    expect(streams.err()).toContain("Unknown log level loud")
  })
})
