#!/usr/bin/env node
/**
 * The `rowkit` command line
 */

import { getErrorMessage } from "@rowkit/core/errors"
import {
  ConsoleLogWriter,
  DefaultLogger,
  parseLogLevel,
  setDefaultWriter,
  type LogLevel,
} from "@rowkit/core/logging"
import { ROWKIT_VERSION } from "@rowkit/core/version"
import { createDefaultRegistry, type FormatRegistry } from "@rowkit/formats"
import { UnknownTableError } from "@rowkit/store"
import { Command, CommanderError, InvalidArgumentError } from "commander"
import { readFile, writeFile } from "fs/promises"
import type { Writable } from "stream"
import { resolveConfiguration } from "./configuration"
import { importableFormat, open, type Dataset } from "./dataset"
import { DatasetError } from "./errors"

/**
 * Where the command line writes its output
 */
export interface CliStreams {
  stdout: Writable
  stderr: Writable
}

// Commander option values are plain records, so these stay type aliases
type GlobalOptions = {
  store?: string
  config?: string
  logLevel?: LogLevel
}

type ExportCommandOptions = GlobalOptions & {
  format?: string
  out?: string
}

type ImportCommandOptions = GlobalOptions & {
  format?: string
  strict?: boolean
}

type ConvertCommandOptions = GlobalOptions & {
  from?: string
  to?: string
}

/** Exits that only mean help or the version was printed */
const INFORMATIONAL_EXITS = [
  "commander.help",
  "commander.helpDisplayed",
  "commander.version",
]

function parseLevel(value: string): LogLevel {
  const level = parseLogLevel(value)
  if (level === undefined) {
    throw new InvalidArgumentError(`Unknown log level ${value}`)
  }

  return level
}

/**
 * Write the output, text gets a final newline when it has none
 */
function writeOutput(stream: Writable, output: string | Uint8Array): void {
  stream.write(
    typeof output === "string" && !output.endsWith("\n") ? `${output}\n` : output,
  )
}

async function withDataset<T>(
  options: GlobalOptions,
  work: (dataset: Dataset) => Promise<T>,
): Promise<T> {
  const dataset = await open({
    store: options.store,
    configFile: options.config,
    logLevel: options.logLevel,
  })

  try {
    return await work(dataset)
  } finally {
    await dataset.close()
  }
}

function standaloneRegistry(options: GlobalOptions): FormatRegistry {
  const configuration = resolveConfiguration({
    configFile: options.config,
    logLevel: options.logLevel,
  })

  return createDefaultRegistry(
    new DefaultLogger({ name: "FormatRegistry", level: configuration.logLevel }),
  )
}

/**
 * Build the `rowkit` program
 *
 * @param streams The {@link CliStreams} to write to
 * @returns The configured {@link Command}
 */
export function createProgram(
  streams: CliStreams = { stdout: process.stdout, stderr: process.stderr },
): Command {
  const program = new Command()

  program
    .name("rowkit")
    .description("Move tables between stores and file formats")
    .version(ROWKIT_VERSION)
    .option(
      "--store <locator>",
      "storage locator (memory:, memory://<name>, postgres://…)",
    )
    .option("--config <file>", "JSON configuration file")
    .option(
      "--log-level <level>",
      "debug, info, warn, error or fatal",
      parseLevel,
    )
    .configureOutput({
      writeOut: (text) => streams.stdout.write(text),
      writeErr: (text) => streams.stderr.write(text),
    })
    .exitOverride()

  program
    .command("formats")
    .description("List the registered formats")
    .action(async (_options: unknown, command: Command) => {
      const registry = standaloneRegistry(command.optsWithGlobals<GlobalOptions>())
      const rows = registry.formats().map((format) => {
        return {
          format,
          extensions: registry.get(format)?.extensions.join(",") ?? "",
          import: registry.canImport(format),
        }
      })

      writeOutput(
        streams.stdout,
        await registry.export("cli", {
          columns: ["format", "extensions", "import"],
          rows,
        }),
      )
    })

  program
    .command("tables")
    .description("List the tables in the store")
    .action(async (_options: unknown, command: Command) => {
      await withDataset(command.optsWithGlobals<GlobalOptions>(), async (dataset) => {
        for (const table of dataset.tables()) {
          streams.stdout.write(`${table}\n`)
        }
      })
    })

  program
    .command("export")
    .description("Write a table to stdout or a file")
    .argument("<table>", "the table to export")
    .option("--format <format>", "output format, defaults to the file extension")
    .option("--out <file>", "file to write instead of stdout")
    .action(async (name: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<ExportCommandOptions>()

      await withDataset(options, async (dataset) => {
        if (!dataset.has(name)) {
          throw new UnknownTableError(name)
        }

        const out = options.out
        const format =
          options.format ??
          (out !== undefined ? dataset.registry.forPath(out) : "cli")
        if (format === undefined) {
          throw new DatasetError(
            `Unable to tell the format of ${out ?? "stdout"}, use --format`,
          )
        }

        const table = await dataset.table(name)
        if (out !== undefined) {
          await table.export(format, out)
          streams.stdout.write(`Wrote ${out}\n`)
        } else {
          writeOutput(
            streams.stdout,
            await dataset.registry.export(format, await table.find()),
          )
        }
      })
    })

  program
    .command("import")
    .description("Read a file into a table")
    .argument("<table>", "the table to import into")
    .argument("<file>", "the file to read")
    .option("--format <format>", "input format, defaults to the file extension")
    .option("--strict", "keep only the columns the table already has")
    .action(
      async (name: string, file: string, _options: unknown, command: Command) => {
        const options = command.optsWithGlobals<ImportCommandOptions>()

        await withDataset(options, async (dataset) => {
          const table = await dataset.table(name)
          const result = await table.import(options.format, file, {
            strict: options.strict ?? false,
          })

          const skipped =
            result.skipped > 0 ? `, skipped ${result.skipped}` : ""
          streams.stdout.write(
            `Imported ${result.inserted} row(s) into ${name}${skipped}\n`,
          )
        })
      },
    )

  program
    .command("convert")
    .description("Convert a file from one format to another")
    .argument("<input>", "the file to read")
    .argument("<output>", "the file to write")
    .option("--from <format>", "input format, detected when missing")
    .option("--to <format>", "output format, defaults to the file extension")
    .action(
      async (input: string, output: string, _options: unknown, command: Command) => {
        const options = command.optsWithGlobals<ConvertCommandOptions>()
        const registry = standaloneRegistry(options)
        const text = await readFile(input, "utf8")

        const from =
          options.from ??
          importableFormat(registry, input) ??
          registry.detect(text)
        if (from === undefined) {
          throw new DatasetError(
            `Unable to tell the format of ${input}, use --from`,
          )
        }

        const to = options.to ?? registry.forPath(output)
        if (to === undefined) {
          throw new DatasetError(
            `Unable to tell the format of ${output}, use --to`,
          )
        }

        const data = await registry.parse(from, text)
        await writeFile(output, await registry.export(to, data))
        streams.stdout.write(
          `Converted ${data.rows.length} row(s) from ${from} to ${to}\n`,
        )
      },
    )

  return program
}

/**
 * Run the program against the arguments
 *
 * @param argv The arguments including the node and script entries
 * @param streams The {@link CliStreams} to write to
 * @throws {CommanderError} for usage errors
 */
export async function runCli(
  argv: string[] = process.argv,
  streams?: CliStreams,
): Promise<void> {
  try {
    await createProgram(streams).parseAsync(argv)
  } catch (err) {
    if (err instanceof CommanderError && INFORMATIONAL_EXITS.includes(err.code)) {
      return
    }

    throw err
  }
}

if (require.main === module) {
  setDefaultWriter(new ConsoleLogWriter())

  runCli().catch((err: unknown) => {
    if (err instanceof CommanderError) {
      // Commander already reported it
      process.exitCode = err.exitCode
      return
    }

    process.stderr.write(`${getErrorMessage(err) ?? String(err)}\n`)
    process.exitCode = 1
  })
}
