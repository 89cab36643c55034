/**
 * Schema-on-write table storage
 */

export * from "./driver"
export * from "./errors"
export * from "./memory"
export * from "./schema"
export * from "./snapshot"
export * from "./store"
export * from "./table"
export * from "./types"
