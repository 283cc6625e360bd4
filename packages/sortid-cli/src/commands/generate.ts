import { Command } from 'commander'
import { createGenerator, type Id, type IdGenerator } from '@sortid/core'
import { OUTPUT_CHUNK, createCliLogger, parseCount } from '../config.js'

export interface GenerateOptions {
  /** Number of ids, as a number or the raw option string */
  count?: number | string
  /** Generator to draw from; one is created when omitted */
  generator?: IdGenerator
}

/**
 * Generate ids and print them one per line
 */
export function runGenerate(options: GenerateOptions = {}): Id[] {
  const count = parseCount(options.count ?? 1)
  const generator = options.generator ?? createGenerator({ logger: createCliLogger() })

  const ids: Id[] = []
  let lines: string[] = []
  for (let i = 0; i < count; i++) {
    const id = generator.newId()
    ids.push(id)
    lines.push(id.toString())
    if (lines.length === OUTPUT_CHUNK) {
      console.log(lines.join('\n'))
      lines = []
    }
  }
  if (lines.length > 0) {
    console.log(lines.join('\n'))
  }
  return ids
}

export function createGenerateCommand(generator?: IdGenerator): Command {
  return new Command('generate')
    .description('Generate new ids')
    .option('-c, --count <n>', 'Number of ids to generate', '1')
    .action((opts: { count: string }) => {
      runGenerate({ count: opts.count, ...(generator && { generator }) })
    })
}
