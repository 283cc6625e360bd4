/**
 * Worker thread that issues ticks from a shared generator state.
 *
 * Waits on `gate[0]` so every worker starts issuing at the same moment,
 * then posts its ticks back as a BigInt64Array.
 */

import { parentPort, workerData } from 'node:worker_threads'
import { IdGenerator } from '../../generator.js'

export interface TickWorkerData {
  entry: string
  state: SharedArrayBuffer
  gate: SharedArrayBuffer
  count: number
  clockNs: bigint
}

const { state, gate, count, clockNs }: TickWorkerData = workerData

const generator = new IdGenerator({ state, clock: () => clockNs })
const start = new Int32Array(gate)

parentPort?.postMessage('ready')
Atomics.wait(start, 0, 0)

const ticks = new BigInt64Array(count)
for (let i = 0; i < count; i++) {
  const { milli, seq } = generator.next()
  ticks[i] = (BigInt(milli) << 12n) + BigInt(seq)
}
parentPort?.postMessage(ticks)
