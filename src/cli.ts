#!/usr/bin/env node
import { parseToolArgs } from './cli-args.js'
import { loadConfig } from './config/load.js'
import { errorMessage } from './core/errors.js'
import { logger } from './core/logger.js'
import { createPfrun } from './runtime.js'

const USAGE = [
  'Usage:',
  '  pfrun <tool> [name=value ...] [value ...]   run a tool',
  '  pfrun --list <tool>                          show parameters and defaults',
  '  pfrun --tools                                list known tools'
].join('\n')

async function main(argv: string[]): Promise<number> {
  const [first, ...rest] = argv
  if (first === undefined || first === '--help' || first === '-h') {
    process.stdout.write(`${USAGE}\n`)
    return first === undefined ? 1 : 0
  }

  const app = await createPfrun(loadConfig())

  if (first === '--tools') {
    process.stdout.write(`${app.registry.list().join('\n')}\n`)
    return 0
  }

  if (first === '--list') {
    const [name] = rest
    if (!name) {
      process.stdout.write(`${USAGE}\n`)
      return 1
    }
    process.stdout.write(`${app.makeTool(name).describe()}\n`)
    return 0
  }

  const store = app.makeTool(first)
  const args = parseToolArgs(rest)
  const result = await app.runner.run(store, { args: args.positional, params: args.named })
  if (result.output !== null) process.stdout.write(`${result.output}\n`)
  return 0
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    logger.error('fatal', { error: errorMessage(error) })
    process.stderr.write(`${errorMessage(error)}\n`)
    process.exitCode = 1
  })
