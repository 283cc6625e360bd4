import { Command } from 'commander'
import pc from 'picocolors'
import { Id, toErrorObject, type ErrorObject } from '@sortid/core'

export interface Inspection {
  input: string
  id?: Id
  error?: ErrorObject
}

export interface InspectResult {
  inspections: Inspection[]
  failed: number
}

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => `0x${b.toString(16).padStart(2, '0')}`).join(' ')
}

/**
 * One line describing an id: text form, timestamp, sequence, random field,
 * UTC time and raw bytes.
 *
 * @example
 * formatInspection(Id.fromString('06bpkb8pz000fkgw'))
 * // '06bpkb8pz000fkgw ts:1741226055416 seq:    7 rnd:18940 2025-03-06T01:54:15.416Z [0x01 0x95 ...]'
 */
export function formatInspection(id: Id, input: string = id.toString()): string {
  const seq = String(id.sequence()).padStart(5)
  const rnd = String(id.random()).padStart(5)
  return `${input} ts:${id.timestamp()} seq:${seq} rnd:${rnd} ${id.time().toISOString()} [${hex(id.bytes())}]`
}

/**
 * Decode each input and print what it contains.
 * Inputs that fail to decode are reported and skipped.
 */
export function runInspect(inputs: string[]): InspectResult {
  const inspections: Inspection[] = []
  let failed = 0

  for (const input of inputs) {
    try {
      const id = Id.fromString(input)
      inspections.push({ input, id })
      console.log(formatInspection(id, input))
    } catch (err) {
      const error = toErrorObject(err)
      inspections.push({ input, error })
      failed++
      console.log(pc.red(`[${input}] ${error.error}`))
    }
  }

  return { inspections, failed }
}

export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Decode ids and show their timestamp, sequence and random parts')
    .argument('<ids...>', 'Ids in their 16-character text form')
    .action((ids: string[]) => {
      const { failed } = runInspect(ids)
      if (failed > 0) {
        process.exitCode = 1
      }
    })
}
