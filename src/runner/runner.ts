import { randomUUID } from 'node:crypto'
import { rm } from 'node:fs/promises'
import { tmpdir as osTmpdir } from 'node:os'
import { join } from 'node:path'

import { SchemaError, ToolExecutionError, ValidationError, errorMessage } from '../core/errors.js'
import { logger as defaultLogger } from '../core/logger.js'
import type { InvocationRecord, Logger, ParamInput, ToolSchema } from '../core/types.js'
import { ParFileCodec, type OverflowMap } from '../parfile/codec.js'
import { STACK_TOKEN, formatValue } from '../parfile/format.js'
import type { ParameterStore } from '../params/store.js'
import { runProcess, type ProcessOptions, type ProcessResult } from './process.js'

/** `mode=h` on the command line keeps the tool from prompting. */
export const NON_INTERACTIVE_ARG = 'mode=h'

export type InvocationState =
  | 'idle'
  | 'arguments_bound'
  | 'config_written'
  | 'process_running'
  | 'config_reread'
  | 'failed'

export interface RunOptions {
  /** Values for parameters in declaration order (required first). */
  args?: ParamInput[]
  /** Values by (possibly abbreviated) parameter name. */
  params?: Record<string, ParamInput>
  /** Environment for the child, e.g. `scope.env`; defaults to the runner's. */
  env?: NodeJS.ProcessEnv
  cwd?: string
  /** Aborting kills the child; temporary files are still removed. */
  signal?: AbortSignal
}

export interface RunResult {
  /** Trimmed combined output, or `null` when the tool printed nothing. */
  output: string | null
  record: InvocationRecord
}

export interface ToolRunnerOptions {
  /** Directory holding the executables; unset means a PATH lookup. */
  binDir?: string
  /** Where private parameter files are written. */
  tmpdir?: string
  fieldLimit?: number
  /** Check the written parameter file before starting the tool. */
  verify?: boolean
  env?: NodeJS.ProcessEnv
  logger?: Logger
  /** Process launcher; replaceable in tests. */
  exec?: (command: string, args: string[], options: ProcessOptions) => Promise<ProcessResult>
}

/**
 * Runs external tools against a parameter store.
 *
 * Each run writes a private copy of the store to a fresh temporary
 * parameter file, starts the tool on it, and on success reads the file
 * back so values the tool changed land in the store. A failed run leaves
 * the store exactly as it was; temporary files are removed either way.
 */
export class ToolRunner {
  private readonly binDir: string | undefined
  private readonly tmpdir: string
  private readonly verify: boolean
  private readonly env: NodeJS.ProcessEnv
  private readonly logger: Logger
  private readonly codec: ParFileCodec
  private readonly exec: NonNullable<ToolRunnerOptions['exec']>

  constructor(options: ToolRunnerOptions = {}) {
    this.binDir = options.binDir
    this.tmpdir = options.tmpdir ?? osTmpdir()
    this.verify = options.verify ?? true
    this.env = options.env ?? process.env
    this.logger = options.logger ?? defaultLogger
    this.codec = new ParFileCodec({ fieldLimit: options.fieldLimit, logger: this.logger, env: this.env })
    this.exec = options.exec ?? runProcess
  }

  /** Executable path for a tool. */
  commandFor(schema: ToolSchema): string {
    const executable = schema.executable ?? schema.name
    if (this.binDir === undefined || executable.includes('/')) return executable
    return join(this.binDir, executable)
  }

  async run(store: ParameterStore, options: RunOptions = {}): Promise<RunResult> {
    const schema = store.schema
    if (schema.kind === 'paramonly') {
      throw new SchemaError(`${schema.name} is a parameter file, not a tool, and can not be run`)
    }

    const before = store.snapshot()
    let state: InvocationState = 'idle'
    const transition = (next: InvocationState): void => {
      this.logger.debug('runner.state', { tool: schema.name, from: state, to: next })
      state = next
    }

    try {
      this.bindArguments(store, options)
    } catch (error) {
      store.restore(before)
      throw error
    }
    transition('arguments_bound')

    const parfile = join(this.tmpdir, `${schema.name}.${randomUUID()}.par`)
    const overflow: OverflowMap = new Map()
    const command = this.commandFor(schema)
    const record: InvocationRecord = {
      toolName: schema.name,
      command,
      args: [],
      parameters: [],
      startedAt: new Date().toISOString(),
      exitCode: null,
      signal: null,
      output: ''
    }

    try {
      await this.codec.write(store, parfile, overflow)
      transition('config_written')
      if (this.verify) await this.codec.verify(store, parfile, overflow)

      record.parameters = store.declarations.map((decl) => {
        const stack = overflow.get(decl.name)
        return [decl.name, stack ? `${STACK_TOKEN}${stack}` : formatValue(decl, store.getEntry(decl.name))]
      })
      record.args =
        schema.kind === 'direct'
          ? [NON_INTERACTIVE_ARG, ...record.parameters.map(([name, value]) => `${name}=${value}`)]
          : [`@@${parfile}`, NON_INTERACTIVE_ARG]

      transition('process_running')
      this.logger.info('runner.spawn_start', { tool: schema.name, command, args: record.args })
      let result: ProcessResult
      try {
        result = await this.exec(command, record.args, {
          env: options.env ?? this.env,
          cwd: options.cwd,
          signal: options.signal
        })
      } catch (error) {
        record.output = errorMessage(error)
        record.finishedAt = new Date().toISOString()
        this.logger.error('runner.spawn_failed', { tool: schema.name, command, error: record.output })
        throw new ToolExecutionError(schema.name, null, record.output, record)
      }

      record.exitCode = result.code
      record.signal = result.signal
      record.output = result.output
      record.finishedAt = new Date().toISOString()
      this.logger.info('runner.spawn_exit', {
        tool: schema.name,
        exitCode: result.code,
        signal: result.signal,
        outputBytes: result.output.length
      })

      if (result.code !== 0) {
        throw new ToolExecutionError(schema.name, result.code, result.output, record)
      }

      await this.codec.read(store, parfile, overflow)
      transition('config_reread')

      const output = result.output.trim()
      return { output: output === '' ? null : output, record }
    } catch (error) {
      transition('failed')
      store.restore(before)
      throw error
    } finally {
      await this.cleanup([parfile, ...overflow.values()])
    }
  }

  /** Assigns positional then named arguments; nothing is written to disk here. */
  private bindArguments(store: ParameterStore, options: RunOptions): void {
    const args = options.args ?? []
    if (args.length > store.declarations.length) {
      throw new ValidationError(
        'arguments',
        `${store.toolName} has ${store.declarations.length} parameters but was sent ${args.length} positional arguments`
      )
    }

    args.forEach((value, index) => {
      const decl = store.declarations[index]
      if (decl) store.set(decl.name, value)
    })

    for (const [name, value] of Object.entries(options.params ?? {})) {
      store.set(name, value)
    }
  }

  private async cleanup(paths: string[]): Promise<void> {
    for (const path of paths) {
      try {
        await rm(path, { force: true })
      } catch (error) {
        this.logger.warn('runner.cleanup_failed', { path, error: errorMessage(error) })
      }
    }
  }
}
