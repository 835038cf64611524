import type { InvocationRecord } from './types.js'

/** Base class for every error raised by pfrun. */
export class PfrunError extends Error {
  readonly code: string = 'E_PFRUN'

  constructor(message: string) {
    super(message)
    this.name = 'PfrunError'
  }
}

export class UnknownNameError extends PfrunError {
  override readonly code = 'E_UNKNOWN_NAME'

  constructor(
    readonly toolName: string,
    readonly requested: string
  ) {
    super(`There is no parameter for ${toolName} that matches '${requested}'`)
    this.name = 'UnknownNameError'
  }
}

export class AmbiguousNameError extends PfrunError {
  override readonly code = 'E_AMBIGUOUS_NAME'

  constructor(
    readonly toolName: string,
    readonly requested: string,
    readonly candidates: readonly string[]
  ) {
    super(
      `Multiple matches for ${toolName} parameter '${requested}', choose from:\n  ${candidates.join(' ')}`
    )
    this.name = 'AmbiguousNameError'
  }
}

export type ValidationKind = 'type' | 'range' | 'option' | 'redirect' | 'cycle' | 'arguments'

export class ValidationError extends PfrunError {
  override readonly code = 'E_VALIDATION'

  constructor(
    readonly kind: ValidationKind,
    message: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** Malformed schema data or a request for a tool the registry does not know. */
export class SchemaError extends PfrunError {
  override readonly code = 'E_SCHEMA'

  constructor(message: string) {
    super(message)
    this.name = 'SchemaError'
  }
}

export class WriteError extends PfrunError {
  override readonly code = 'E_WRITE'

  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Unable to write parameter file ${path}: ${reason}`)
    this.name = 'WriteError'
  }
}

export class ReadError extends PfrunError {
  override readonly code = 'E_READ'

  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Unable to read parameter file ${path}: ${reason}`)
    this.name = 'ReadError'
  }
}

/** Indents each line of tool output for inclusion in an error message. */
export function indentOutput(output: string, prefix = '  '): string {
  return output
    .trimEnd()
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n')
}

export class ToolExecutionError extends PfrunError {
  override readonly code = 'E_TOOL_EXEC'

  constructor(
    readonly toolName: string,
    readonly exitCode: number | null,
    readonly output: string,
    readonly record?: InvocationRecord
  ) {
    const detail = output.trim() === '' ? '  (no output)' : indentOutput(output)
    super(`An error occurred while running '${toolName}':\n${detail}`)
    this.name = 'ToolExecutionError'
  }
}

export class ScopeError extends PfrunError {
  override readonly code = 'E_SCOPE'

  constructor(message: string) {
    super(message)
    this.name = 'ScopeError'
  }
}

/** Extracts a printable message from an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** True for Node system errors carrying the given `code` (e.g. `ENOENT`). */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
