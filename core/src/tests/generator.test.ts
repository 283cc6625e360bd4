/**
 * IdGenerator Tests
 *
 * Tick derivation, monotonicity under stalled and backwards clocks, shared
 * state, concurrent callers and id construction.
 */

import { Worker } from 'node:worker_threads'
import { describe, it, expect } from 'vitest'
import { IdGenerator, createGenerator, newId, systemClock, type Clock } from '../generator.js'
import type { Logger, LogLevel } from '../logger.js'
import type { TickWorkerData } from './fixtures/tick-worker.js'

// 2024-01-01T00:00:00.000Z in nanoseconds
const NEW_YEAR_NS = 1_704_067_200_000n * 1_000_000n
const NEW_YEAR_MS = 1704067200000

interface Recorded {
  level: LogLevel
  message: string
  context?: Record<string, unknown> | undefined
}

function recordingLogger(): { log: Logger; entries: Recorded[] } {
  const entries: Recorded[] = []
  const log: Logger = {
    debug: (message, context) => { entries.push({ level: 'debug', message, context }) },
    info: (message, context) => { entries.push({ level: 'info', message, context }) },
    warn: (message, context) => { entries.push({ level: 'warn', message, context }) },
    error: (message, context) => { entries.push({ level: 'error', message, context }) },
    child: () => log,
  }
  return { log, entries }
}

function fixedClock(nanos: bigint): Clock {
  return () => nanos
}

function sequenceClock(...readings: bigint[]): Clock {
  let i = 0
  return () => readings[Math.min(i++, readings.length - 1)] ?? 0n
}

function tickOf(milli: number, seq: number): bigint {
  return (BigInt(milli) << 12n) + BigInt(seq)
}

// ============================================================================
// Tick derivation
// ============================================================================

describe('IdGenerator.next', () => {
  it('derives the millisecond and sequence from the clock', () => {
    const gen = new IdGenerator({ clock: fixedClock(NEW_YEAR_NS + 123_456n) })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS, seq: 482 })
    expect(gen.lastTick).toBe(6979859251200482n)
  })

  it('maps the end of a millisecond to sequence 3906', () => {
    const gen = new IdGenerator({ clock: fixedClock(NEW_YEAR_NS + 999_999n) })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS, seq: 3906 })
  })

  it('starts from a zero tick', () => {
    expect(new IdGenerator().lastTick).toBe(0n)
  })

  it('bumps the sequence while the clock stands still', () => {
    const gen = new IdGenerator({ clock: fixedClock(NEW_YEAR_NS + 123_456n) })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS, seq: 482 })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS, seq: 483 })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS, seq: 484 })
  })

  it('runs ahead into the next millisecond after 4096 ticks', () => {
    const gen = new IdGenerator({ clock: fixedClock(NEW_YEAR_NS) })
    let tick = gen.next()
    for (let i = 1; i < 4096; i++) {
      tick = gen.next()
    }
    expect(tick).toEqual({ milli: NEW_YEAR_MS, seq: 4095 })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS + 1, seq: 0 })
  })

  it('follows the clock again once it moves past the last tick', () => {
    const gen = new IdGenerator({
      clock: sequenceClock(NEW_YEAR_NS, NEW_YEAR_NS, NEW_YEAR_NS + 5_000_000n),
    })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS, seq: 0 })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS, seq: 1 })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS + 5, seq: 0 })
  })

  it('keeps increasing when the clock goes backwards and warns once', () => {
    const { log, entries } = recordingLogger()
    const gen = new IdGenerator({
      clock: sequenceClock(NEW_YEAR_NS + 10_000_000n, NEW_YEAR_NS, NEW_YEAR_NS + 256n),
      logger: log,
    })

    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS + 10, seq: 0 })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS + 10, seq: 1 })
    expect(gen.next()).toEqual({ milli: NEW_YEAR_MS + 10, seq: 2 })

    expect(entries).toEqual([
      {
        level: 'warn',
        message: 'Clock moved backwards, issuing ticks ahead of wall time',
        context: { clockMs: NEW_YEAR_MS, previousMs: NEW_YEAR_MS + 10 },
      },
    ])
  })
})

// ============================================================================
// Shared state and concurrency
// ============================================================================

describe('shared state', () => {
  it('serializes ticks across generators on one buffer', () => {
    const state = IdGenerator.createSharedState()
    const a = new IdGenerator({ state, clock: fixedClock(NEW_YEAR_NS) })
    const b = new IdGenerator({ state, clock: fixedClock(NEW_YEAR_NS) })

    expect(a.next()).toEqual({ milli: NEW_YEAR_MS, seq: 0 })
    expect(b.next()).toEqual({ milli: NEW_YEAR_MS, seq: 1 })
    expect(a.next()).toEqual({ milli: NEW_YEAR_MS, seq: 2 })
    expect(a.lastTick).toBe(b.lastTick)
  })

  it('does not share state between generators on separate buffers', () => {
    const a = new IdGenerator({ clock: fixedClock(NEW_YEAR_NS) })
    const b = new IdGenerator({ clock: fixedClock(NEW_YEAR_NS) })
    expect(a.next()).toEqual(b.next())
  })

  it('issues unique, per-caller increasing ticks to interleaved async callers', async () => {
    const state = IdGenerator.createSharedState()
    const callers = 8
    const perCaller = 2000

    const results = await Promise.all(
      Array.from({ length: callers }, async () => {
        const gen = new IdGenerator({ state })
        const ticks: bigint[] = []
        for (let i = 0; i < perCaller; i++) {
          const { milli, seq } = gen.next()
          ticks.push(tickOf(milli, seq))
          if (i % 100 === 0) {
            await new Promise((resolve) => setImmediate(resolve))
          }
        }
        return ticks
      })
    )

    for (const ticks of results) {
      for (let i = 1; i < ticks.length; i++) {
        expect(ticks[i]).toBeGreaterThan(ticks[i - 1] ?? 0n)
      }
    }
    expect(new Set(results.flat()).size).toBe(callers * perCaller)
  })
})

// ============================================================================
// Worker threads
// ============================================================================

const TICK_WORKER = new URL('./fixtures/tick-worker.ts', import.meta.url).href

// Workers do not inherit the test runner's TypeScript loader, so register tsx first
const TICK_WORKER_BOOTSTRAP = `
const { workerData } = require('node:worker_threads')
import('tsx/esm/api').then(({ register }) => {
  register()
  return import(workerData.entry)
})
`

interface TickWorkerRun {
  ready: Promise<void>
  ticks: Promise<bigint[]>
}

function startTickWorker(data: TickWorkerData): TickWorkerRun {
  const worker = new Worker(TICK_WORKER_BOOTSTRAP, { eval: true, workerData: data })
  const ready = new Promise<void>((resolve, reject) => {
    worker.once('message', () => resolve())
    worker.once('error', reject)
  })
  const ticks = new Promise<bigint[]>((resolve, reject) => {
    worker.on('message', (msg: unknown) => {
      if (msg instanceof BigInt64Array) {
        resolve(Array.from(msg))
      }
    })
    worker.on('error', reject)
    worker.on('exit', (code) => {
      if (code !== 0) {
        reject(new Error(`tick worker exited with code ${code}`))
      }
    })
  })
  return { ready, ticks }
}

describe('worker threads', () => {
  it('serializes ticks across threads sharing one state buffer', async () => {
    const workers = 4
    const perWorker = 20_000
    const total = workers * perWorker
    const state = IdGenerator.createSharedState()
    const gate = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)

    const runs = Array.from({ length: workers }, () =>
      startTickWorker({ entry: TICK_WORKER, state, gate, count: perWorker, clockNs: NEW_YEAR_NS })
    )
    await Promise.all(runs.map((run) => run.ready))

    // release every worker at once so their compare-and-swaps contend
    const start = new Int32Array(gate)
    Atomics.store(start, 0, 1)
    Atomics.notify(start, 0)

    const results = await Promise.all(runs.map((run) => run.ticks))

    for (const ticks of results) {
      expect(ticks).toHaveLength(perWorker)
      for (let i = 1; i < ticks.length; i++) {
        expect(ticks[i]).toBeGreaterThan(ticks[i - 1] ?? 0n)
      }
    }

    // with the clock frozen every tick is last + 1, so together they fill one run
    const first = tickOf(NEW_YEAR_MS, 0)
    const all = results.flat().sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    expect(new Set(all).size).toBe(total)
    expect(all[0]).toBe(first)
    expect(all[total - 1]).toBe(first + BigInt(total - 1))
    expect(new IdGenerator({ state }).lastTick).toBe(first + BigInt(total - 1))
  })
})

// ============================================================================
// Id construction
// ============================================================================

describe('IdGenerator.newId', () => {
  it('packs the tick and random bytes', () => {
    const gen = createGenerator({
      clock: fixedClock(NEW_YEAR_NS + 256n),
      random: (buf) => buf.set([0xbe, 0xef]),
    })
    const id = gen.newId()
    expect(id.toString()).toBe('066d4mgm00003gqg')
    expect(id.timestamp()).toBe(NEW_YEAR_MS)
    expect(id.sequence()).toBe(1)
    expect(id.random()).toBe(0xbeef)
  })

  it('asks the random source for exactly two bytes', () => {
    const lengths: number[] = []
    const gen = createGenerator({ random: (buf) => { lengths.push(buf.length) } })
    gen.newId()
    expect(lengths).toEqual([2])
  })

  it('still returns an id when the random source throws', () => {
    const { log, entries } = recordingLogger()
    const gen = createGenerator({
      clock: fixedClock(NEW_YEAR_NS),
      random: () => { throw new Error('entropy unavailable') },
      logger: log,
    })

    const id = gen.newId()
    expect(id.random()).toBe(0)
    expect(id.timestamp()).toBe(NEW_YEAR_MS)
    expect(entries).toHaveLength(1)
    expect(entries[0]?.level).toBe('error')
    expect(entries[0]?.message).toBe('Random source failed')
  })

  it('uses the platform random source by default', () => {
    const gen = createGenerator({ clock: fixedClock(NEW_YEAR_NS) })
    const randoms = new Set<number>()
    for (let i = 0; i < 50; i++) {
      randoms.add(gen.newId().random())
    }
    // 50 draws of 16 bits collide rarely; all equal would mean no randomness
    expect(randoms.size).toBeGreaterThan(1)
  })

  it('orders one caller\'s ids over 1,000,000 generations', () => {
    const gen = createGenerator()
    let prev = gen.newId()
    let violations = 0
    for (let i = 1; i < 1_000_000; i++) {
      const id = gen.newId()
      const ts = id.timestamp()
      const prevTs = prev.timestamp()
      if (ts < prevTs || (ts === prevTs && id.sequence() <= prev.sequence())) {
        violations++
      }
      prev = id
    }
    expect(violations).toBe(0)
  })
})

describe('newId', () => {
  it('returns increasing ids from the default generator', () => {
    const a = newId()
    const b = newId()
    expect(a.isNil()).toBe(false)
    expect(a.compare(b)).toBe(-1)
  })
})

describe('systemClock', () => {
  it('reads wall time in nanoseconds', () => {
    const before = BigInt(Date.now()) * 1_000_000n
    const nanos = systemClock()()
    const after = BigInt(Date.now() + 1) * 1_000_000n
    expect(nanos).toBeGreaterThanOrEqual(before)
    expect(nanos).toBeLessThanOrEqual(after)
  })

  it('never goes backwards', () => {
    const clock = systemClock()
    let prev = clock()
    for (let i = 0; i < 1000; i++) {
      const now = clock()
      expect(now).toBeGreaterThanOrEqual(prev)
      prev = now
    }
  })
})
