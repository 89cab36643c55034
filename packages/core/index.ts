/** Simple type representing `T | PromiseLike<T>` */
export type MaybeAwaitable<T> = T | PromiseLike<T>

/**
 * A resolver type for {@link PromiseLike} constructors
 */
export type Resolver<T> = (value: MaybeAwaitable<T>) => void

/**
 * A rejector type for {@link PromiseLike} constructors
 */
export type Rejector = (reason: unknown) => void

/**
 * Helper class that implements {@link Promise} while exposing the
 * {@link Resolver} and {@link Rejector} via `resolve` and `reject`
 */
export class DeferredPromise<T = void> implements Promise<T> {
  #resolver: Resolver<T>
  #rejector: Rejector
  #promise: Promise<T>

  constructor() {
    let resolver: Resolver<T> = () => {}
    let rejector: Rejector = () => {}

    this.#promise = new Promise<T>((resolve: Resolver<T>, reject: Rejector) => {
      resolver = resolve
      rejector = reject
    })

    this.#resolver = resolver
    this.#rejector = rejector

    Object.seal(this)
  }

  get [Symbol.toStringTag](): string {
    return `Deferred=>${this.#promise[Symbol.toStringTag]}`
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?:
      | ((value: T) => TResult1 | PromiseLike<TResult1>)
      | null
      | undefined,
    onrejected?:
      | ((reason: unknown) => TResult2 | PromiseLike<TResult2>)
      | null
      | undefined,
  ): Promise<TResult1 | TResult2> {
    return this.#promise.then(onfulfilled, onrejected)
  }

  catch<TResult = never>(
    onrejected?:
      | ((reason: unknown) => TResult | PromiseLike<TResult>)
      | null
      | undefined,
  ): Promise<T | TResult> {
    return this.#promise.catch(onrejected)
  }

  finally(onfinally?: (() => void) | null | undefined): Promise<T> {
    return this.#promise.finally(onfinally)
  }

  /**
   * Resolve the underlying {@link Promise} with the given value
   *
   * @param value The {@link MaybeAwaitable} to provide to the {@link Promise} chain
   */
  resolve(value: MaybeAwaitable<T>): void {
    this.#resolver(value)
  }

  /**
   * Reject the underlying {@link Promise} with the given value
   *
   * @param reason The reason to provide the {@link Promise} chain for rejection
   */
  reject(reason: unknown): void {
    this.#rejector(reason)
  }
}
