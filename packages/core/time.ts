/**
 * Elapsed time tracking
 */

/** Factors for translating nanoseconds */
const NANO_PER_MICRO = 1_000n
const MICRO_PER_SECOND = 1_000_000
const MICRO_PER_MILLI = 1_000

/**
 * Represents a duration of time at microsecond resolution
 */
export class Duration {
  private _microseconds: number

  private constructor(microseconds: number) {
    this._microseconds = microseconds
  }

  /**
   * @returns The number of seconds with 6 decimal places
   */
  seconds(): number {
    return this._microseconds / MICRO_PER_SECOND
  }

  /**
   * @returns The number of milliseconds with 3 decimal places
   */
  milliseconds(): number {
    return this._microseconds / MICRO_PER_MILLI
  }

  toString(): string {
    return `${this.milliseconds()}ms`
  }

  /**
   * @param nanoseconds The elapsed nanoseconds (from {@link process.hrtime.bigint})
   */
  static ofNano(nanoseconds: bigint): Duration {
    return new Duration(Number(nanoseconds / NANO_PER_MICRO))
  }

  static ofMilli(milliseconds: number): Duration {
    return new Duration(milliseconds * MICRO_PER_MILLI)
  }

  static ZERO: Duration = new Duration(0)
}

/**
 * Tracks the elapsed {@link Duration} since it was started
 */
export class Timer {
  #started?: bigint

  /**
   * @returns A new {@link Timer} that has been started
   */
  static startNew(): Timer {
    const timer = new Timer()
    timer.start()
    return timer
  }

  get running(): boolean {
    return this.#started !== undefined
  }

  start(): void {
    this.#started ??= process.hrtime.bigint()
  }

  /**
   * Stop the timer
   *
   * @returns The {@link Duration} the timer ran or {@link Duration.ZERO} if
   * it was never started
   */
  stop(): Duration {
    const elapsed = this.elapsed()
    this.#started = undefined
    return elapsed
  }

  elapsed(): Duration {
    return this.#started !== undefined
      ? Duration.ofNano(process.hrtime.bigint() - this.#started)
      : Duration.ZERO
  }
}
