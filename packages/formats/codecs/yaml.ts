import { getErrorMessage } from "@rowkit/core/errors"
import type { TabularData } from "@rowkit/store"
import { parse, stringify } from "yaml"
import { recordsToRows, type Codec, type FormatOptions } from "../codec"
import { CodecError } from "../errors"
import { plainRecords } from "./json"

/**
 * A block style sequence of mappings, only the core schema is used in either
 * direction so no tags can construct objects
 */
export const YamlCodec: Codec = {
  name: "yaml",
  extensions: ["yaml", "yml"],

  serialize(data: TabularData, options: FormatOptions): string {
    return stringify(plainRecords(data), {
      schema: "core",
      indent: options.indent ?? 2,
    })
  },

  deserialize(input: string): TabularData {
    let document: unknown
    try {
      document = parse(input, { schema: "core" })
    } catch (err) {
      throw new CodecError(`Invalid YAML: ${getErrorMessage(err) ?? String(err)}`, {
        cause: err,
      })
    }

    // An empty document holds no rows
    return recordsToRows(document ?? [])
  },

  detect(sample: string): boolean {
    try {
      const document: unknown = parse(sample, { schema: "core" })
      return typeof document === "object" && document !== null
    } catch {
      return false
    }
  },
}
