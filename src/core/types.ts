export type TypeTag = 'boolean' | 'integer' | 'real' | 'string' | 'filename'

/** How a tool accepts its parameter file on the command line. */
export type ToolKind = 'parfile' | 'direct' | 'paramonly'

/** A concrete, fully resolved parameter value. */
export type Scalar = boolean | number | string | null

/**
 * Anything a caller may assign to a parameter. Arrays are joined into a
 * comma-separated stack for string-typed parameters.
 */
export type ParamInput = Scalar | ReadonlyArray<string | number>

/** A range bound is a number, unbounded (`null`), or a redirect such as `)lo`. */
export type RangeBound = number | null | string

export type Constraint =
  | { kind: 'range'; low: RangeBound; high: RangeBound }
  | { kind: 'options'; options: readonly string[] }

/**
 * One declared parameter of a tool, as read from the schema registry.
 */
export interface ParameterDeclaration {
  readonly name: string
  readonly type: TypeTag
  readonly help: string
  /** Raw default: may itself be a redirect string (`)other`). */
  readonly defaultValue: Scalar
  readonly required: boolean
  /** Parameter-file mode column (`a`, `h`, `hl`, ...). */
  readonly mode: string
  readonly constraint?: Constraint
}

export interface ToolSchema {
  readonly name: string
  readonly kind: ToolKind
  /** Explicit executable; defaults to the tool name. */
  readonly executable?: string
  readonly required: readonly ParameterDeclaration[]
  readonly optional: readonly ParameterDeclaration[]
}

/**
 * Ephemeral description of a single tool run.
 */
export interface InvocationRecord {
  toolName: string
  command: string
  args: string[]
  /** Ordered (name, on-disk value) pairs sent to the tool. */
  parameters: Array<[string, string]>
  startedAt: string
  finishedAt?: string
  exitCode: number | null
  signal: NodeJS.Signals | null
  output: string
}

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}
