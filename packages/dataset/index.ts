/**
 * Opens rowkit stores by locator and moves their tables through files
 */

export * from "./configuration"
export * from "./dataset"
export * from "./errors"
export * from "./locator"
