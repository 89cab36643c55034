/**
 * Codecs and the registry that converts tables to and from external formats
 */

export * from "./codec"
export * from "./codecs/cli"
export * from "./codecs/delimited"
export * from "./codecs/json"
export * from "./codecs/markup"
export * from "./codecs/yaml"
export * from "./errors"
export * from "./registry"
