/**
 * Lookup of codecs by format name and the export/import flows around them
 */

import { getErrorMessage } from "@rowkit/core/errors"
import { DefaultLogger, type Logger } from "@rowkit/core/logging"
import { getDataMetrics } from "@rowkit/core/observability/metrics"
import { traced } from "@rowkit/core/observability/tracing"
import { Timer } from "@rowkit/core/time"
import type { Optional } from "@rowkit/core/type/utils"
import {
  Table,
  isStoreError,
  type InsertManyResult,
  type TabularData,
} from "@rowkit/store"
import path from "path"
import type { Codec, FormatOptions } from "./codec"
import { CliCodec } from "./codecs/cli"
import { CsvCodec, TsvCodec } from "./codecs/delimited"
import { JsonCodec } from "./codecs/json"
import { HtmlCodec, JiraCodec, LatexCodec, XmlCodec } from "./codecs/markup"
import { YamlCodec } from "./codecs/yaml"
import {
  ExportError,
  ImportError,
  UnsupportedFormatError,
  isFormatError,
  rowIndexOf,
} from "./errors"

/**
 * Anything an import can read from, node streams are async iterables of
 * chunks
 */
export type ImportSource =
  | string
  | Uint8Array
  | AsyncIterable<string | Uint8Array>

/**
 * Options for {@link FormatRegistry.import}
 */
export interface ImportOptions extends FormatOptions {
  /**
   * Keep only the columns the table already declares and convert text to
   * their kinds (default false)
   */
  strict?: boolean
  /** Checked between rows */
  signal?: AbortSignal
  /** Invoked after each inserted row with the running count */
  onProgress?: (inserted: number) => void
}

/**
 * The outcome of {@link FormatRegistry.import}
 */
export interface ImportResult extends InsertManyResult {
  /** The format that was read */
  format: string
  /** The table the rows went into */
  table: string
}

/**
 * Read the whole source as text
 *
 * @param input The {@link ImportSource}
 * @returns The decoded UTF-8 text
 */
export async function readText(input: ImportSource): Promise<string> {
  if (typeof input === "string") {
    return input
  }

  const decoder = new TextDecoder()
  if (input instanceof Uint8Array) {
    return decoder.decode(input)
  }

  let text = ""
  for await (const chunk of input) {
    text +=
      typeof chunk === "string"
        ? chunk
        : decoder.decode(chunk, { stream: true })
  }

  return text + decoder.decode()
}

/**
 * Declared columns first, then any other keys the rows carry
 */
function withAllColumns(data: TabularData): TabularData {
  const columns = new Set(data.columns)
  for (const row of data.rows) {
    for (const column of Object.keys(row)) {
      columns.add(column)
    }
  }

  return columns.size === data.columns.length
    ? data
    : { columns: Array.from(columns), rows: data.rows }
}

/**
 * Maps format names to {@link Codec} implementations, registering a name again
 * replaces the previous codec
 */
export class FormatRegistry {
  readonly #codecs: Map<string, Codec> = new Map()
  readonly #extensions: Map<string, string> = new Map()
  readonly #logger: Logger

  constructor(logger?: Logger) {
    this.#logger = logger ?? new DefaultLogger({ name: "FormatRegistry" })
  }

  /**
   * Add the codec, replacing any codec with the same name
   *
   * @param codec The {@link Codec} to register
   * @returns This registry
   */
  register(codec: Codec): this {
    const previous = this.#codecs.get(codec.name)
    if (previous !== undefined) {
      this.#logger.debug(`Replacing codec for ${codec.name}`)

      for (const [extension, name] of this.#extensions) {
        if (name === codec.name) {
          this.#extensions.delete(extension)
        }
      }
    }

    this.#codecs.set(codec.name, codec)
    for (const extension of codec.extensions) {
      this.#extensions.set(normalizeExtension(extension), codec.name)
    }

    return this
  }

  get(format: string): Optional<Codec> {
    return this.#codecs.get(format)
  }

  has(format: string): boolean {
    return this.#codecs.has(format)
  }

  /**
   * @param format The format name
   * @returns True if the format is registered and has a deserializer
   */
  canImport(format: string): boolean {
    return this.#codecs.get(format)?.deserialize !== undefined
  }

  /**
   * @returns The registered format names, sorted
   */
  formats(): string[] {
    return Array.from(this.#codecs.keys()).sort()
  }

  /**
   * @param extension A file extension with or without the dot
   * @returns The format registered for the extension
   */
  forExtension(extension: string): Optional<string> {
    return this.#extensions.get(normalizeExtension(extension))
  }

  /**
   * @param file A file path
   * @returns The format registered for the file's extension
   */
  forPath(file: string): Optional<string> {
    const extension = path.extname(file)
    return extension.length > 0 ? this.forExtension(extension) : undefined
  }

  /**
   * Run the detection probes in registration order, a probe that throws
   * counts as a miss
   *
   * @param sample The start of some input
   * @returns The first format whose probe matched
   */
  detect(sample: string): Optional<string> {
    for (const codec of this.#codecs.values()) {
      if (codec.detect === undefined) {
        continue
      }

      try {
        if (codec.detect(sample)) {
          return codec.name
        }
      } catch (err) {
        this.#logger.debug(`Probe for ${codec.name} failed`, err)
      }
    }

    return
  }

  /**
   * Serialize the table (or data) in the format
   *
   * @param format The format name
   * @param source The {@link Table} to snapshot or the {@link TabularData} to
   * write
   * @param options The {@link FormatOptions}
   * @returns The serialized representation
   * @throws {UnsupportedFormatError} before reading anything if the format is
   * unknown
   * @throws {ExportError} if the codec fails
   */
  async export(
    format: string,
    source: Table | TabularData,
    options: FormatOptions = {},
  ): Promise<string | Uint8Array> {
    const codec = this.#require(format)

    return traced("formats.export", { "format.name": format }, async (span) => {
      const timer = Timer.startNew()
      const data = withAllColumns(
        source instanceof Table ? await source.find() : source,
      )

      let output: string | Uint8Array
      try {
        output = codec.serialize(data, options)
      } catch (err) {
        const rowIndex = rowIndexOf(err)
        throw new ExportError(
          format,
          `Export to ${format} failed${rowIndex !== undefined ? ` at row ${rowIndex}` : ""}: ${getErrorMessage(err) ?? String(err)}`,
          { rowIndex, cause: err },
        )
      }

      const elapsed = timer.stop()
      span.setAttribute("rows.exported", data.rows.length)
      getDataMetrics().transferDuration.record(elapsed.seconds(), {
        "format.name": format,
        direction: "export",
      })

      this.#logger.debug(
        `Exported ${data.rows.length} row(s) as ${format} in ${elapsed}`,
      )
      return output
    })
  }

  /**
   * Read the input without touching any table
   *
   * @param format The format name
   * @param input The {@link ImportSource}
   * @param options The {@link FormatOptions}
   * @returns The {@link TabularData} that was read
   * @throws {UnsupportedFormatError} if the format is unknown or can't be read
   * @throws {ImportError} if the input is malformed
   */
  async parse(
    format: string,
    input: ImportSource,
    options: FormatOptions = {},
  ): Promise<TabularData> {
    const codec = this.#require(format)
    return this.#deserialize(codec, await this.#read(format, input), options)
  }

  /**
   * Parse the whole input then insert the rows into the table as one batch
   * under its write lock. A row that fails to parse or that the table rejects
   * inserts nothing, cancellation keeps the rows inserted so far.
   *
   * @param format The format name
   * @param input The {@link ImportSource}
   * @param table The target {@link Table}
   * @param options The {@link ImportOptions}
   * @returns The {@link ImportResult}
   * @throws {UnsupportedFormatError} if the format is unknown or can't be read
   * @throws {ImportError} if the input is malformed or a row is rejected
   */
  async import(
    format: string,
    input: ImportSource,
    table: Table,
    options: ImportOptions = {},
  ): Promise<ImportResult> {
    const codec = this.#require(format)
    if (codec.deserialize === undefined) {
      throw new UnsupportedFormatError(format, `Format ${format} cannot be imported`)
    }

    return traced(
      "formats.import",
      { "format.name": format, "table.name": table.name },
      async (span) => {
        const timer = Timer.startNew()
        const data = this.#deserialize(
          codec,
          await this.#read(format, input),
          { ...options, columns: options.columns ?? table.columns },
        )

        const strict = options.strict ?? false
        let result: InsertManyResult
        try {
          result = await table.insertMany(data.rows, {
            onlyDeclared: strict,
            coerce: strict,
            signal: options.signal,
            onProgress: options.onProgress,
          })
        } catch (err) {
          const rowIndex = rowIndexOf(err)
          if (isStoreError(err) && rowIndex !== undefined) {
            throw new ImportError(
              format,
              `Import into ${table.name} failed at row ${rowIndex}: ${err.message}`,
              { rowIndex, cause: err },
            )
          }

          throw err
        }

        const elapsed = timer.stop()
        span.setAttribute("rows.imported", result.inserted)
        getDataMetrics().transferDuration.record(elapsed.seconds(), {
          "format.name": format,
          direction: "import",
        })

        if (result.cancelled) {
          this.#logger.warn(
            `Import into ${table.name} cancelled after ${result.inserted} row(s)`,
          )
        } else {
          this.#logger.info(
            `Imported ${result.inserted} row(s) into ${table.name} from ${format}`,
          )
        }

        return { format, table: table.name, ...result }
      },
    )
  }

  #require(format: string): Codec {
    const codec = this.#codecs.get(format)
    if (codec === undefined) {
      throw new UnsupportedFormatError(format)
    }

    return codec
  }

  async #read(format: string, input: ImportSource): Promise<string> {
    try {
      return await readText(input)
    } catch (err) {
      throw new ImportError(
        format,
        `Unable to read ${format} input: ${getErrorMessage(err) ?? String(err)}`,
        { cause: err },
      )
    }
  }

  #deserialize(codec: Codec, text: string, options: FormatOptions): TabularData {
    if (codec.deserialize === undefined) {
      throw new UnsupportedFormatError(
        codec.name,
        `Format ${codec.name} cannot be imported`,
      )
    }

    try {
      return codec.deserialize(text, options)
    } catch (err) {
      if (isFormatError(err)) {
        throw err
      }

      const rowIndex = rowIndexOf(err)
      throw new ImportError(
        codec.name,
        `Import from ${codec.name} failed${rowIndex !== undefined ? ` at row ${rowIndex}` : ""}: ${getErrorMessage(err) ?? String(err)}`,
        { rowIndex, cause: err },
      )
    }
  }
}

function normalizeExtension(extension: string): string {
  return extension.replace(/^\./, "").toLowerCase()
}

/**
 * @param logger The {@link Logger} for the registry
 * @returns A {@link FormatRegistry} with every built-in codec
 */
export function createDefaultRegistry(logger?: Logger): FormatRegistry {
  return new FormatRegistry(logger)
    .register(JsonCodec)
    .register(YamlCodec)
    .register(CsvCodec)
    .register(TsvCodec)
    .register(HtmlCodec)
    .register(LatexCodec)
    .register(XmlCodec)
    .register(JiraCodec)
    .register(CliCodec)
}
