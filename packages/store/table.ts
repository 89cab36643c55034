import type { Optional } from "@rowkit/core/type/utils"
import type { RowSnapshot } from "./snapshot"
import type {
  InsertManyOptions,
  InsertManyResult,
  TableStore,
} from "./store"
import type { Row, RowFilter, TableDefinition } from "./types"

/**
 * Handle to a single table in a {@link TableStore}, every call goes through
 * the store so the handle stays valid while the table grows
 */
export class Table {
  readonly name: string
  readonly #store: TableStore

  constructor(store: TableStore, name: string) {
    this.#store = store
    this.name = name
  }

  get columns(): string[] {
    return this.#store.columns(this.name)
  }

  get definition(): TableDefinition {
    return this.#store.schema(this.name)
  }

  insert(row: Row): Promise<Row> {
    return this.#store.insert(this.name, row)
  }

  insertMany(
    rows: Iterable<Row>,
    options?: InsertManyOptions,
  ): Promise<InsertManyResult> {
    return this.#store.insertMany(this.name, rows, options)
  }

  update(filter: RowFilter, patch: Row): Promise<number> {
    return this.#store.update(this.name, filter, patch)
  }

  upsert(row: Row): Promise<Row> {
    return this.#store.upsert(this.name, row)
  }

  delete(filter?: RowFilter): Promise<number> {
    return this.#store.delete(this.name, filter)
  }

  find(filter?: RowFilter): Promise<RowSnapshot> {
    return this.#store.find(this.name, filter)
  }

  findOne(filter: RowFilter): Promise<Optional<Row>> {
    return this.#store.findOne(this.name, filter)
  }

  count(filter?: RowFilter): Promise<number> {
    return this.#store.count(this.name, filter)
  }

  /** Iterate the rows of a fresh snapshot */
  async *[Symbol.asyncIterator](): AsyncIterator<Row> {
    yield* await this.find()
  }
}
