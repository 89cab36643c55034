import { DefaultLogger, LogLevel, MemoryLogWriter } from "@rowkit/core/logging"
import { InMemoryStorageDriver, TableStore } from "@rowkit/store"
import { Readable } from "stream"
import type { Codec } from "./codec"
import {
  CodecError,
  ExportError,
  ImportError,
  UnsupportedFormatError,
} from "./errors"
import { FormatRegistry, createDefaultRegistry } from "./registry"

describe("FormatRegistry", () => {
  let store: TableStore
  let registry: FormatRegistry

  beforeEach(() => {
    store = new TableStore(new InMemoryStorageDriver())
    registry = createDefaultRegistry()
  })

  describe("Lookup", () => {
    it("Should register every built-in format", () => {
      expect(registry.formats()).toEqual([
        "cli",
        "csv",
        "html",
        "jira",
        "json",
        "latex",
        "tsv",
        "xml",
        "yaml",
      ])
    })

    it("Should resolve extensions and paths", () => {
      expect(registry.forExtension(".YML")).toBe("yaml")
      expect(registry.forExtension("jsn")).toBe("json")
      expect(registry.forPath("/tmp/out.tex")).toBe("latex")
      expect(registry.forPath("/tmp/noext")).toBeUndefined()
      expect(registry.forExtension("docx")).toBeUndefined()
    })

    it("Should know which formats can be imported", () => {
      expect(registry.canImport("csv")).toBe(true)
      expect(registry.canImport("yaml")).toBe(true)
      expect(registry.canImport("latex")).toBe(false)
      expect(registry.canImport("docx")).toBe(false)
    })

    it("Should replace a codec registered under the same name", async () => {
      const custom: Codec = {
        name: "csv",
        extensions: ["csv2"],
        serialize: () => "custom",
      }

      registry.register(custom)

      expect(registry.get("csv")).toBe(custom)
      expect(registry.forExtension("csv")).toBeUndefined()
      expect(registry.forExtension("csv2")).toBe("csv")
      expect(await registry.export("csv", { columns: ["a"], rows: [] })).toBe(
        "custom",
      )
    })
  })

  describe("Detection", () => {
    it("Should detect the built-in text formats", () => {
      expect(registry.detect('[{"a":1}]')).toBe("json")
      expect(registry.detect("- a: 1\n")).toBe("yaml")
      expect(registry.detect("a,b\n1,2\n")).toBe("csv")
      expect(registry.detect("a\tb\n1\t2\n")).toBe("tsv")
      expect(registry.detect("plain")).toBeUndefined()
    })

    it("Should treat a failing probe as a miss", () => {
      const custom = new FormatRegistry().register({
        name: "broken",
        extensions: [],
        serialize: () => "",
        detect: () => {
          throw new Error("probe failed")
        },
      })

      expect(custom.detect("anything")).toBeUndefined()
    })
  })

  describe("Export", () => {
    it("Should snapshot a table", async () => {
      const table = await store.getOrCreate("t")
      await table.insert({ a: "x", b: null })

      expect(await registry.export("csv", table)).toBe("a,b\r\nx,\r\n")
      expect(await registry.export("jira", table)).toBe("||a||b||\n|x| |")
    })

    it("Should refuse unknown formats before reading", async () => {
      const table = await store.getOrCreate("t")
      await table.insert({ a: 1 })

      await expect(registry.export("docx", table)).rejects.toThrow(
        new UnsupportedFormatError("docx"),
      )
      expect(await table.count()).toBe(1)
    })

    it("Should report the failing row", async () => {
      expect.assertions(5)
      try {
        await registry.export("json", {
          columns: ["n"],
          rows: [{ n: 1 }, { n: Number.NaN }],
        })
      } catch (err) {
        expect(err).toBeInstanceOf(ExportError)
        expect(err).toHaveProperty(
          "message",
          "Export to json failed at row 1: Row 1 has a non-finite number in n",
        )
        expect(err).toHaveProperty("rowIndex", 1)
        expect(err).toHaveProperty("format", "json")
        expect(err).toHaveProperty("cause", expect.any(CodecError))
      }
    })

    it("Should include columns only some rows carry", async () => {
      expect(
        await registry.export("csv", {
          columns: ["a"],
          rows: [{ a: 1, b: 2 }],
        }),
      ).toBe("a,b\r\n1,2\r\n")
    })
  })

  describe("Import", () => {
    it("Should add new columns unless strict", async () => {
      const loose = await store.getOrCreate("loose")
      await loose.insert({ a: "0", b: "0" })
      const strict = await store.getOrCreate("strict")
      await strict.insert({ a: "0", b: "0" })

      const input = "a,b,c\n1,2,3\n"
      await registry.import("csv", input, loose)
      const result = await registry.import("csv", input, strict, {
        strict: true,
      })

      expect(result).toEqual({
        format: "csv",
        table: "strict",
        inserted: 1,
        skipped: 0,
        cancelled: false,
      })
      expect(loose.columns).toEqual(["a", "b", "c"])
      expect(strict.columns).toEqual(["a", "b"])
      expect((await strict.find()).toArray()).toEqual([
        { a: "0", b: "0" },
        { a: "1", b: "2" },
      ])
    })

    it("Should pad short rows", async () => {
      const table = await store.getOrCreate("t")
      await registry.import("csv", "a,b,c\n1,2\n", table)

      expect((await table.find()).toArray()).toEqual([
        { a: "1", b: "2", c: "" },
      ])
    })

    it("Should insert nothing when parsing fails", async () => {
      const table = await store.getOrCreate("t")

      await expect(
        registry.import("csv", "a,b\n1,2\n3,4,5\n", table),
      ).rejects.toThrow(
        new ImportError(
          "csv",
          "Import from csv failed at row 1: Row 1 has 3 fields but there are only 2 columns",
        ),
      )
      expect(await table.count()).toBe(0)
    })

    it("Should insert nothing when the table rejects a row", async () => {
      const strict = new TableStore(new InMemoryStorageDriver(), {
        strict: true,
      })
      const table = await strict.getOrCreate("t")

      const err: unknown = await registry
        .import("json", '[{"n":1},{"n":2},{"n":"three"}]', table)
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ImportError)
      expect(err).toHaveProperty("rowIndex", 2)
      expect(err).toHaveProperty(
        "message",
        "Import into t failed at row 2: Column n is declared as number but received string",
      )
      expect(await table.count()).toBe(0)
    })

    it("Should convert text to the declared kinds when strict", async () => {
      const strict = new TableStore(new InMemoryStorageDriver(), {
        strict: true,
      })
      const table = await strict.getOrCreate("t")
      await table.insert({ n: 0, ok: false, at: new Date(0) })

      await registry.import(
        "csv",
        "n,ok,at,extra\n1.5,true,2024-01-02T03:04:05.000Z,x\n,,,\n",
        table,
        { strict: true },
      )

      expect((await table.find()).toArray().slice(1)).toEqual([
        { n: 1.5, ok: true, at: new Date("2024-01-02T03:04:05.000Z") },
        { n: null, ok: null, at: null },
      ])
    })

    it("Should refuse formats that can't be read", async () => {
      const table = await store.getOrCreate("t")

      await expect(registry.import("jira", "||a||", table)).rejects.toThrow(
        "Format jira cannot be imported",
      )
      await expect(registry.import("docx", "", table)).rejects.toThrow(
        UnsupportedFormatError,
      )
    })

    it("Should read headerless text into the declared columns", async () => {
      const table = await store.getOrCreate("t")
      await table.insert({ x: "1", y: "2" })

      await registry.import("csv", "3,4\n", table, { header: false })

      expect((await table.find()).toArray()).toEqual([
        { x: "1", y: "2" },
        { x: "3", y: "4" },
      ])
    })

    it("Should read streams and bytes", async () => {
      const table = await store.getOrCreate("t")

      await registry.import("csv", Readable.from(["a,b\n", "1,2\n"]), table)
      await registry.import("csv", Buffer.from("a\n3\n"), table)

      expect((await table.find()).toArray()).toEqual([
        { a: "1", b: "2" },
        { a: "3", b: null },
      ])
    })

    it("Should keep the rows inserted before cancellation", async () => {
      const table = await store.getOrCreate("t")
      const controller = new AbortController()

      const result = await registry.import(
        "csv",
        "n\n1\n2\n3\n4\n5\n",
        table,
        {
          signal: controller.signal,
          onProgress: (inserted) => {
            if (inserted === 2) {
              controller.abort()
            }
          },
        },
      )

      expect(result).toEqual({
        format: "csv",
        table: "t",
        inserted: 2,
        skipped: 0,
        cancelled: true,
      })
      expect(await table.count()).toBe(2)
    })

    it("Should log completed imports", async () => {
      const writer = new MemoryLogWriter()
      const logged = createDefaultRegistry(
        new DefaultLogger({ writer, level: LogLevel.INFO }),
      )

      await logged.import("json", '[{"a":1}]', await store.getOrCreate("t"))

      expect(writer.messages(LogLevel.INFO)).toEqual([
        "Imported 1 row(s) into t from json",
      ])
    })

    it("Should parse without touching a table", async () => {
      expect(await registry.parse("json", '[{"a":1}]')).toEqual({
        columns: ["a"],
        rows: [{ a: 1 }],
      })
    })
  })

  describe("Round trips", () => {
    it("Should restore delimited text exactly", async () => {
      const source = await store.getOrCreate("source")
      await source.insert({ name: "Ada", city: "London" })
      await source.insert({ name: "Bob, Jr.", city: 'Paris "FR"' })

      const csv = await registry.export("csv", source)
      expect(csv).toBe(
        'name,city\r\nAda,London\r\n"Bob, Jr.","Paris ""FR"""\r\n',
      )

      const first = await store.getOrCreate("first")
      const second = await store.getOrCreate("second")
      await registry.import("csv", csv, first)
      await registry.import("csv", csv, second)

      expect((await first.find()).toArray()).toEqual(
        (await source.find()).toArray(),
      )
      expect(second.columns).toEqual(first.columns)
      expect(await registry.export("csv", second)).toBe(csv)
    })

    it("Should keep empty cells of a single column", async () => {
      const source = await store.getOrCreate("source")
      await source.insertMany([{ note: "x" }, { note: "" }, { note: "y" }])

      const target = await store.getOrCreate("target")
      await registry.import("csv", await registry.export("csv", source), target)

      expect((await target.find()).toArray()).toEqual([
        { note: "x" },
        { note: "" },
        { note: "y" },
      ])
    })

    it.each(["json", "csv"])(
      "Should keep %s columns named after object properties",
      async (format) => {
        const source = await store.getOrCreate("source")
        await source.insert(JSON.parse('{"constructor":"a","__proto__":"b"}'))

        const target = await store.getOrCreate("target")
        await registry.import(
          format,
          await registry.export(format, source),
          target,
        )

        const [row] = (await target.find()).toArray()
        expect(target.columns).toEqual(["constructor", "__proto__"])
        expect(row?.constructor).toBe("a")
        expect(Object.getOwnPropertyDescriptor(row, "__proto__")?.value).toBe(
          "b",
        )
      },
    )

    it.each(["json", "yaml"])(
      "Should bring %s timestamps back as text",
      async (format) => {
        const source = await store.getOrCreate("source")
        await source.insert({ at: new Date("2024-01-02T03:04:05.000Z"), n: 1 })

        const target = await store.getOrCreate("target")
        await registry.import(
          format,
          await registry.export(format, source),
          target,
        )

        expect((await target.find()).toArray()).toEqual([
          { at: "2024-01-02T03:04:05.000Z", n: 1 },
        ])
      },
    )
  })
})
