/**
 * Timing helpers
 */

/** Factors for translating nanoseconds -> microseconds */
const NANO_PER_SECOND = 1_000_000_000n
const MICRO_PER_SECOND = 1_000_000
const MICRO_PER_MILLI = 1_000

/**
 * Represents a duration of time at microsecond resolution
 */
export class Duration {
  private readonly _microseconds: number

  private constructor(nanoseconds: bigint) {
    this._microseconds = Number((nanoseconds * 1_000_000n) / NANO_PER_SECOND)
  }

  /**
   * @returns The number of seconds with 6 decimal places for microsecond resolution
   */
  seconds(): number {
    return this._microseconds / MICRO_PER_SECOND
  }

  /**
   * @returns the number of milliseconds with 3 decimal places for microsecond resolution
   */
  milliseconds(): number {
    return this._microseconds / MICRO_PER_MILLI
  }

  microseconds(): number {
    return this._microseconds
  }

  /**
   * @returns A short human readable form such as `850µs`, `12.5ms` or `1.25s`
   */
  toString(): string {
    if (this._microseconds < MICRO_PER_MILLI) {
      return `${this._microseconds}µs`
    }

    if (this._microseconds < MICRO_PER_SECOND) {
      return `${Number(this.milliseconds().toFixed(1))}ms`
    }

    return `${Number(this.seconds().toFixed(2))}s`
  }

  /**
   * Create a {@link Duration} from the nanosecond measurement (from something like {@link process.hrtime.bigint()})
   *
   * @param nanoseconds The number of nanoseconds elapsed
   * @returns A new {@link Duration} object
   */
  static ofNano(nanoseconds: bigint): Duration {
    return new Duration(nanoseconds)
  }

  /**
   * Create a {@link Duration} from the millisecond measurement
   *
   * @param milliseconds The number of whole milliseconds elapsed
   * @returns A new {@link Duration} object
   */
  static ofMilli(milliseconds: number): Duration {
    return new Duration(1_000_000n * BigInt(Math.trunc(milliseconds)))
  }

  static readonly ZERO: Duration = Duration.ofNano(0n)
}

/**
 * Custom class that tracks elapsed {@link Duration}
 */
export class Timer {
  private _running = false
  private _started = 0n

  /**
   * @returns A new {@link Timer} that has been started
   */
  static startNew(): Timer {
    const timer = new Timer()
    timer.start()
    return timer
  }

  get running(): boolean {
    return this._running
  }

  start(): void {
    if (!this._running) {
      this._started = process.hrtime.bigint()
      this._running = true
    }
  }

  /**
   * Stop the timer
   *
   * @returns The {@link Duration} the timer was running or {@link Duration.ZERO} if it was not started
   */
  stop(): Duration {
    if (!this._running) {
      return Duration.ZERO
    }

    const elapsed = this.elapsed()
    this._running = false
    this._started = 0n
    return elapsed
  }

  /**
   * @returns The {@link Duration} the timer has been running or {@link Duration.ZERO} if it was not started
   */
  elapsed(): Duration {
    return this._running
      ? Duration.ofNano(process.hrtime.bigint() - this._started)
      : Duration.ZERO
  }
}

/**
 * A point in time anchored to the wall clock at process start but measured
 * with the high resolution timer
 */
export class Timestamp {
  private static readonly ORIGIN_HRTIME: bigint = process.hrtime.bigint()
  private static readonly ORIGIN_UTC: number = Date.now()

  private readonly _hrtime: bigint

  constructor(hrtime: bigint) {
    this._hrtime = hrtime
  }

  toISOString(): string {
    const offsetMs = Number((this._hrtime - Timestamp.ORIGIN_HRTIME) / 1_000_000n)
    return new Date(Timestamp.ORIGIN_UTC + offsetMs).toISOString()
  }
}

/**
 * A clock that can be used to track time at sub-millisecond precision
 */
export class HiResClock {
  static timestamp(): Timestamp {
    return new Timestamp(process.hrtime.bigint())
  }
}
