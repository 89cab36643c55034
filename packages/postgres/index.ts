/**
 * Postgres storage for the table store
 */

export * from "./driver"
