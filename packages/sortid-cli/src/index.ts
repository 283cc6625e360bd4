/**
 * @sortid/cli - generate and inspect sortid ids
 *
 * This module exports the command implementations for programmatic use.
 */

export { createProgram, run, type ProgramOptions } from './program.js'
export { runGenerate, type GenerateOptions } from './commands/generate.js'
export { runInspect, formatInspection, type Inspection, type InspectResult } from './commands/inspect.js'
export { loadConfig, parseCount, createCliLogger, MAX_COUNT, VERSION, type CliConfig } from './config.js'
