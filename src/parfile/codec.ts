import { readFile, writeFile } from 'node:fs/promises'

import { ReadError, WriteError, errorMessage } from '../core/errors.js'
import { logger as defaultLogger } from '../core/logger.js'
import type { Logger, ParamInput, ParameterDeclaration } from '../core/types.js'
import type { ParameterStore } from '../params/store.js'
import { isRedirect } from '../schema/par-line.js'
import { MODE_LINE, STACK_TOKEN, expandEnv, formatLine, formatValue, parseValues } from './format.js'

/** Parameter name -> stack file written in place of an oversized value. */
export type OverflowMap = Map<string, string>

export interface VerifyMismatch {
  name: string
  expected: string
  actual: string | undefined
}

export interface CodecOptions {
  /** Longest value written inline; longer values go to a stack file. */
  fieldLimit?: number
  logger?: Logger
  /** Environment used to expand `$VAR` references when verifying. */
  env?: NodeJS.ProcessEnv
}

export const DEFAULT_FIELD_LIMIT = 1023

function stackPath(parfile: string, name: string): string {
  return `${parfile}.${name}.stk`
}

/**
 * Reads and writes parameter files for a store.
 */
export class ParFileCodec {
  private readonly fieldLimit: number
  private readonly logger: Logger
  private readonly env: NodeJS.ProcessEnv

  constructor(options: CodecOptions = {}) {
    this.fieldLimit = options.fieldLimit ?? DEFAULT_FIELD_LIMIT
    this.logger = options.logger ?? defaultLogger
    this.env = options.env ?? process.env
  }

  /**
   * Writes every parameter of `store` to `path`, followed by the
   * non-interactive mode line.
   *
   * Values longer than the field limit are written one element per line
   * to a stack file and referenced as `@-<stackfile>`. Each stack file is
   * recorded in `overflow` as soon as it exists, so a caller holding the
   * map can remove them even when this method throws.
   */
  async write(store: ParameterStore, path: string, overflow: OverflowMap = new Map()): Promise<OverflowMap> {
    const lines: string[] = []

    for (const decl of store.declarations) {
      let text = formatValue(decl, store.getEntry(decl.name))
      if (Buffer.byteLength(text, 'utf-8') > this.fieldLimit) {
        const stack = stackPath(path, decl.name)
        try {
          await writeFile(stack, `${text.split(',').join('\n')}\n`, 'utf-8')
        } catch (error) {
          throw new WriteError(stack, errorMessage(error))
        }
        overflow.set(decl.name, stack)
        this.logger.debug('parfile.overflow', { tool: store.toolName, name: decl.name, stack, length: text.length })
        text = `${STACK_TOKEN}${stack}`
      }
      lines.push(formatLine(decl, text))
    }
    lines.push(MODE_LINE, '')

    try {
      await writeFile(path, lines.join('\n'), 'utf-8')
    } catch (error) {
      throw new WriteError(path, errorMessage(error))
    }
    this.logger.debug('parfile.write', { tool: store.toolName, path, overflow: overflow.size })
    return overflow
  }

  /**
   * Re-reads a written file and compares each value with the store.
   * Differences are logged as warnings and returned; redirects and
   * `$VAR` references are resolved before comparing.
   */
  async verify(store: ParameterStore, path: string, overflow: OverflowMap = new Map()): Promise<VerifyMismatch[]> {
    let onDisk: Map<string, string>
    try {
      onDisk = parseValues(await readFile(path, 'utf-8'))
    } catch (error) {
      this.logger.warn('parfile.verify_unreadable', { tool: store.toolName, path, error: errorMessage(error) })
      return []
    }

    const mismatches: VerifyMismatch[] = []
    for (const decl of store.declarations) {
      const stack = overflow.get(decl.name)
      const expected = stack ? `${STACK_TOKEN}${stack}` : formatValue(decl, store.getEntry(decl.name))
      const actual = onDisk.get(decl.name)
      if (actual === expected) continue
      if (actual !== undefined && this.equivalent(store, decl, actual, onDisk)) continue

      mismatches.push({ name: decl.name, expected, actual })
      this.logger.warn('parfile.verify_mismatch', {
        tool: store.toolName,
        path,
        name: decl.name,
        expected,
        actual: actual ?? null
      })
    }
    return mismatches
  }

  /**
   * Loads values from `path` into `store` through `store.set`, so the same
   * validation applies as for caller-supplied values. Stack-file references
   * listed in `overflow` are expanded back into comma-separated values.
   * On any failure the store is left unchanged.
   */
  async read(store: ParameterStore, path: string, overflow: OverflowMap = new Map()): Promise<void> {
    let onDisk: Map<string, string>
    try {
      onDisk = parseValues(await readFile(path, 'utf-8'))
    } catch (error) {
      throw new ReadError(path, errorMessage(error))
    }

    const snapshot = store.snapshot()
    try {
      for (const decl of store.declarations) {
        const text = onDisk.get(decl.name)
        if (text === undefined) {
          this.logger.warn('parfile.read_missing', { tool: store.toolName, path, name: decl.name })
          continue
        }
        store.set(decl.name, await this.toInput(decl, text, overflow))
      }
    } catch (error) {
      store.restore(snapshot)
      throw error
    }
    this.logger.debug('parfile.read', { tool: store.toolName, path })
  }

  private async toInput(decl: ParameterDeclaration, text: string, overflow: OverflowMap): Promise<ParamInput> {
    const stack = overflow.get(decl.name)
    if (stack !== undefined && text === `${STACK_TOKEN}${stack}`) {
      let contents: string
      try {
        contents = await readFile(stack, 'utf-8')
      } catch (error) {
        throw new ReadError(stack, errorMessage(error))
      }
      return contents
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line !== '')
        .join(',')
    }
    if (decl.type === 'string' || decl.type === 'filename') {
      return text === '' ? null : text
    }
    return text
  }

  private equivalent(
    store: ParameterStore,
    decl: ParameterDeclaration,
    actual: string,
    onDisk: ReadonlyMap<string, string>
  ): boolean {
    const concrete = (text: string): string => expandEnv(this.followOnDisk(text, onDisk), this.env)
    const expected = concrete(formatValue(decl, store.getEntry(decl.name)))

    let resolvedExpected = expected
    try {
      const value = store.resolve(decl.name)
      resolvedExpected = formatValue(decl, { kind: 'literal', value })
    } catch (error) {
      // An unresolvable redirect compares by its on-disk text.
      this.logger.debug('parfile.verify_unresolved', {
        tool: store.toolName,
        name: decl.name,
        error: errorMessage(error)
      })
    }

    const got = concrete(actual)
    if (got === expected || got === resolvedExpected) return true
    if (decl.type === 'integer' || decl.type === 'real') {
      const a = Number(got)
      const b = Number(resolvedExpected)
      return got.trim() !== '' && !Number.isNaN(a) && a === b
    }
    return false
  }

  private followOnDisk(text: string, onDisk: ReadonlyMap<string, string>): string {
    const seen = new Set<string>()
    let current = text
    while (isRedirect(current)) {
      const target = current.slice(1).trim()
      const next = onDisk.get(target)
      if (next === undefined || seen.has(target)) break
      seen.add(target)
      current = next
    }
    return current
  }
}

/** Saves a store to a parameter file of the caller's choosing, every value inline. */
export async function writeParams(store: ParameterStore, path: string, logger?: Logger): Promise<void> {
  await new ParFileCodec({ fieldLimit: Number.POSITIVE_INFINITY, logger }).write(store, path)
}

/** Loads a store's values from a parameter file written by `writeParams` or a tool. */
export async function readParams(store: ParameterStore, path: string, logger?: Logger): Promise<void> {
  await new ParFileCodec({ logger }).read(store, path)
}
