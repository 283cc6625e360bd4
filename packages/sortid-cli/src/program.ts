import { Command, CommanderError } from 'commander'
import pc from 'picocolors'
import { InvalidConfigError, wrapError, type IdGenerator } from '@sortid/core'
import { createGenerateCommand, runGenerate } from './commands/generate.js'
import { createInspectCommand, runInspect } from './commands/inspect.js'
import { VERSION, parseCount } from './config.js'

export interface ProgramOptions {
  /** Generator shared by every command; each run creates one when omitted */
  generator?: IdGenerator
}

/**
 * Builds the `sortid` command tree.
 *
 * Root options are only read before a subcommand name, so `generate -c n`
 * keeps its own count.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const { generator } = options
  const program = new Command()

  program
    .name('sortid')
    .description('Generate and inspect compact, time-ordered ids')
    .version(VERSION)
    .enablePositionalOptions()

  program.addCommand(createGenerateCommand(generator))
  program.addCommand(createInspectCommand())

  // Bare `sortid` generates; `sortid <ids...>` inspects
  program
    .argument('[ids...]', 'Ids to inspect')
    .option('-c, --count <n>', 'Number of ids to generate', '1')
    .addHelpText('after', `
Examples:
  sortid                      Generate one id
  sortid -c 4                 Generate 4 ids
  sortid generate -c 4        Generate 4 ids
  sortid 06bpkb8pz000fkgw     Inspect an id
  sortid \`sortid -c 4\`        Generate and inspect 4 ids`)
    .action((ids: string[], opts: { count: string }) => {
      const count = parseCount(opts.count)
      if (ids.length > 0) {
        if (count > 1) {
          throw new InvalidConfigError('cannot generate and inspect ids at the same time', { field: 'count' })
        }
        const { failed } = runInspect(ids)
        if (failed > 0) {
          process.exitCode = 1
        }
        return
      }
      runGenerate({ count, ...(generator && { generator }) })
    })

  program.exitOverride()
  for (const command of program.commands) {
    command.exitOverride()
  }

  return program
}

/**
 * Parses `argv` and runs the matching command.
 * Returns the exit code for usage and runtime errors; a command that only
 * reports failed inputs sets `process.exitCode` itself.
 */
export async function run(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  try {
    await createProgram(options).parseAsync(argv)
    return 0
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed help, the version or a usage error
      return err.exitCode
    }
    const error = wrapError(err)
    console.error(pc.red(`Error: ${error.message}`))
    return 1
  }
}
