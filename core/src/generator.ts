/**
 * IdGenerator - monotonic (millisecond, sequence) ticks and id construction
 *
 * Every tick issued by a generator is strictly greater than the one before,
 * as `milli << 12 | seq`. Generators built on the same shared state buffer
 * (see {@link IdGenerator.createSharedState}) share that guarantee, including
 * across worker threads.
 *
 * @example
 * ```typescript
 * import { createGenerator } from '@sortid/core'
 *
 * const ids = createGenerator()
 * const id = ids.newId()
 * id.toString() // '06bpkb8pz000fkgw'
 * ```
 */

import { getRandomValues } from 'node:crypto'
import {
  NANOS_PER_MILLI,
  RANDOM_OFFSET,
  RAW_LEN,
  SEQUENCE_BITS,
  SEQUENCE_MASK,
  SUB_MILLI_SHIFT,
  TICK_STATE_BYTES,
} from './config.js'
import { Id } from './id.js'
import { createLogger, logError, type Logger } from './logger.js'

/** Nanoseconds since the Unix epoch */
export type Clock = () => bigint

/** Fills the whole buffer with random bytes */
export type RandomSource = (buf: Uint8Array) => void

/** One issued tick */
export interface Tick {
  /** Milliseconds since the Unix epoch */
  milli: number
  /** Sequence within the millisecond, 0-4095 */
  seq: number
}

export interface IdGeneratorOptions {
  /** Time source, defaults to {@link systemClock} */
  clock?: Clock
  /** Random source for bytes 8-9, defaults to the platform CSPRNG */
  random?: RandomSource
  /** Tick storage shared with other generators */
  state?: SharedArrayBuffer
  /** Receives clock regression warnings and random source failures */
  logger?: Logger
}

/**
 * Wall clock with sub-millisecond resolution: `Date.now()` taken once,
 * advanced by the monotonic high-resolution timer.
 */
export function systemClock(): Clock {
  const wallNanos = BigInt(Date.now()) * NANOS_PER_MILLI
  const start = process.hrtime.bigint()
  return () => wallNanos + (process.hrtime.bigint() - start)
}

const cryptoRandom: RandomSource = (buf) => {
  getRandomValues(buf)
}

export class IdGenerator {
  private readonly state: BigInt64Array
  private readonly clock: Clock
  private readonly random: RandomSource
  private readonly log: Logger
  private lastClockMilli = -1n

  constructor(options: IdGeneratorOptions = {}) {
    this.state = new BigInt64Array(options.state ?? new ArrayBuffer(TICK_STATE_BYTES), 0, 1)
    this.clock = options.clock ?? systemClock()
    this.random = options.random ?? cryptoRandom
    this.log = (options.logger ?? createLogger({}, 'warn')).child({ component: 'IdGenerator' })
  }

  /**
   * Allocates tick storage that several generators can share.
   */
  static createSharedState(): SharedArrayBuffer {
    return new SharedArrayBuffer(TICK_STATE_BYTES)
  }

  /** The last tick issued through this generator's state */
  get lastTick(): bigint {
    return Atomics.load(this.state, 0)
  }

  /**
   * Issues the next tick. Never fails.
   *
   * The read-compare-store runs as one compare-and-swap on the state word;
   * a caller that loses the race starts over from a fresh clock reading.
   */
  next(): Tick {
    for (;;) {
      const last = Atomics.load(this.state, 0)
      const nanos = this.clock()
      const milli = nanos / NANOS_PER_MILLI
      const seq = (nanos - milli * NANOS_PER_MILLI) >> SUB_MILLI_SHIFT
      let now = (milli << SEQUENCE_BITS) + seq
      if (now <= last) {
        now = last + 1n
      }
      if (Atomics.compareExchange(this.state, 0, last, now) !== last) {
        continue
      }
      this.trackClock(milli)
      return { milli: Number(now >> SEQUENCE_BITS), seq: Number(now & SEQUENCE_MASK) }
    }
  }

  /**
   * Creates a new id from one tick and two random bytes.
   */
  newId(): Id {
    const { milli, seq } = this.next()
    const random = new Uint8Array(RAW_LEN - RANDOM_OFFSET)
    try {
      this.random(random)
    } catch (err) {
      // the tick alone keeps the id unique; keep whatever bytes were written
      logError(this.log, 'Random source failed', err)
    }
    return Id.fromParts(milli, seq, random)
  }

  private trackClock(milli: bigint): void {
    if (milli < this.lastClockMilli) {
      this.log.warn('Clock moved backwards, issuing ticks ahead of wall time', {
        clockMs: Number(milli),
        previousMs: Number(this.lastClockMilli),
      })
    }
    this.lastClockMilli = milli
  }
}

/**
 * Creates a generator. Create one per process (or per shared state buffer)
 * and pass it to the code that needs ids.
 */
export function createGenerator(options?: IdGeneratorOptions): IdGenerator {
  return new IdGenerator(options)
}

let defaultGenerator: IdGenerator | undefined

/**
 * Creates a new id from a lazily created process-wide generator.
 */
export function newId(): Id {
  defaultGenerator ??= new IdGenerator()
  return defaultGenerator.newId()
}
