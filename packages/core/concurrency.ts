/**
 * Concurrency primitives
 */

import { TimeoutError } from "./errors"
import type { Provider } from "./type/utils"

/**
 * Simple type definition for a mutex callback that mirrors what a {@link Promise} will provide
 */
type MutexCallback = (value: boolean) => void

/**
 * Class representing a simple FIFO mutex
 */
export class Mutex {
  #locked = false
  #callbacks: MutexCallback[] = []

  /** True while some caller holds the mutex */
  get locked(): boolean {
    return this.#locked
  }

  /** The number of callers waiting to acquire */
  get waiting(): number {
    return this.#callbacks.length
  }

  /**
   * Tries to acquire the {@link Mutex} but will not block if unavailable
   *
   * @returns True if the mutex was acquired
   */
  tryAcquire(): boolean {
    if (!this.#locked) {
      this.#locked = true
      return true
    }

    return false
  }

  /**
   * Acquires the {@link Mutex}, waiting if necessary
   *
   * @param timeoutMs An optional limit on the wait in milliseconds
   *
   * @returns True once acquired, false if the timeout elapsed first
   */
  acquire(timeoutMs?: number): Promise<boolean> | boolean {
    if (!this.#locked) {
      this.#locked = true
      return true
    }

    return new Promise((resolve) => {
      if (timeoutMs !== undefined) {
        // eslint-disable-next-line prefer-const
        let timer: NodeJS.Timeout | undefined

        // Have to create the callback before the timeout
        const callback: MutexCallback = (v) => {
          clearTimeout(timer)
          resolve(v)
        }

        timer = setTimeout(() => {
          // Only give up if release() hasn't already handed us the lock
          const idx = this.#callbacks.indexOf(callback)
          if (idx >= 0) {
            this.#callbacks.splice(idx, 1)
            resolve(false)
          }
        }, timeoutMs)

        this.#callbacks.push(callback)
      } else {
        this.#callbacks.push(resolve)
      }
    })
  }

  /**
   * Releases the {@link Mutex} to the next waiting caller
   */
  release(): void {
    this.#locked = false

    const next = this.#callbacks.shift()
    if (next !== undefined) {
      // Ownership moves directly to the next waiter
      this.#locked = true

      // Fire the next piece of code right after this since we can't know which
      // phase of the event loop we are currently in
      process.nextTick(() => {
        next(true)
      })
    }
  }
}

/**
 * A set of {@link Mutex} objects addressed by key, created on demand and
 * discarded once nobody holds or waits on them
 */
export class KeyedLock {
  readonly #locks: Map<string, { mutex: Mutex; users: number }> = new Map()

  /**
   * @param key The key to check
   * @returns True if the lock for the key is currently held
   */
  isLocked(key: string): boolean {
    return this.#locks.get(key)?.mutex.locked ?? false
  }

  /**
   * Runs the provider while holding the lock for the key
   *
   * @param key The key to lock
   * @param fn The work to run under the lock
   * @param timeoutMs Optional limit on how long to wait for the lock
   * @returns The result of the provider
   * @throws {TimeoutError} if the lock was not acquired in time
   */
  async withLock<T>(
    key: string,
    fn: Provider<T>,
    timeoutMs?: number,
  ): Promise<T> {
    let entry = this.#locks.get(key)
    if (entry === undefined) {
      entry = { mutex: new Mutex(), users: 0 }
      this.#locks.set(key, entry)
    }

    entry.users++
    try {
      if (!(await entry.mutex.acquire(timeoutMs))) {
        throw new TimeoutError(
          `Timed out after ${timeoutMs ?? 0}ms waiting for lock on ${key}`,
          timeoutMs ?? 0,
        )
      }

      try {
        return await fn()
      } finally {
        entry.mutex.release()
      }
    } finally {
      if (--entry.users === 0) {
        this.#locks.delete(key)
      }
    }
  }
}
