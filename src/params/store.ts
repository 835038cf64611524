import { AmbiguousNameError, UnknownNameError, ValidationError } from '../core/errors.js'
import { logger as defaultLogger } from '../core/logger.js'
import type { Logger, ParamInput, ParameterDeclaration, Scalar, ToolSchema } from '../core/types.js'
import { isRedirect } from '../schema/par-line.js'
import type { SchemaRegistry } from '../schema/registry.js'
import { checkConstraint, coerce, describeType } from './coerce.js'
import { literal, rawValue, redirect, redirectTarget, toStored, type StoredValue } from './value.js'

export type SetResult = { ok: true; value: Scalar } | { ok: false; error: Error }

/** Opaque copy of a store's values, used to roll back a failed run. */
export type StoreSnapshot = ReadonlyMap<string, StoredValue>

const NAME_WIDTH = 20
const VALUE_WIDTH = 15

function displayValue(value: Scalar): string {
  if (value === null) return ''
  if (typeof value === 'boolean') return value ? 'True' : 'False'
  return String(value)
}

/**
 * Current parameter values for one tool.
 *
 * Names may be abbreviated to any unique prefix. Every assignment goes
 * through `validate`, so stored values always match their declared type;
 * redirects (`)other`) are kept as references and resolved on demand.
 */
export class ParameterStore implements Iterable<[string, Scalar]> {
  readonly toolName: string
  readonly declarations: readonly ParameterDeclaration[]
  private readonly byName: ReadonlyMap<string, ParameterDeclaration>
  private readonly defaults: ReadonlyMap<string, StoredValue>
  private values: Map<string, StoredValue>

  constructor(
    readonly schema: ToolSchema,
    private readonly logger: Logger = defaultLogger
  ) {
    this.toolName = schema.name
    this.declarations = [...schema.required, ...schema.optional]
    this.byName = new Map(this.declarations.map((decl) => [decl.name, decl]))
    this.defaults = new Map(this.declarations.map((decl) => [decl.name, toStored(decl.defaultValue)]))
    this.values = new Map(this.defaults)
  }

  /** Creates a store for a registered tool. */
  static fromRegistry(registry: SchemaRegistry, toolName: string, logger?: Logger): ParameterStore {
    return new ParameterStore(registry.get(toolName), logger)
  }

  /** Maps an exact name or unique prefix to the declared parameter name. */
  resolveName(prefix: string): string {
    if (this.byName.has(prefix)) return prefix
    const candidates = this.declarations
      .map((decl) => decl.name)
      .filter((name) => name.startsWith(prefix))
    const [only] = candidates
    if (candidates.length === 1 && only !== undefined) return only
    if (candidates.length === 0) throw new UnknownNameError(this.toolName, prefix)
    throw new AmbiguousNameError(this.toolName, prefix, candidates)
  }

  declaration(name: string): ParameterDeclaration {
    const exact = this.resolveName(name)
    const decl = this.byName.get(exact)
    if (!decl) throw new UnknownNameError(this.toolName, name)
    return decl
  }

  /** Current value; redirects are returned in their `)name` form. */
  get(name: string): Scalar {
    return rawValue(this.entry(this.resolveName(name)))
  }

  /** Current value as a tagged literal/redirect. */
  getEntry(name: string): StoredValue {
    return this.entry(this.resolveName(name))
  }

  /** Current value with any redirect chain followed to a concrete value. */
  resolve(name: string): Scalar {
    return this.follow(this.resolveName(name), [])
  }

  /** Validates and stores a value, returning the stored (raw) form. */
  set(name: string, value: ParamInput): Scalar {
    const exact = this.resolveName(name)
    const stored = this.validate(exact, value)
    this.values.set(exact, stored)
    const result = rawValue(stored)
    this.logger.debug('store.set', { tool: this.toolName, name: exact, value: result })
    return result
  }

  /** `set` without throwing. */
  trySet(name: string, value: ParamInput): SetResult {
    try {
      return { ok: true, value: this.set(name, value) }
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) }
    }
  }

  /**
   * Checks a value against the parameter's type and constraint without
   * storing it, returning the normalised form.
   */
  validate(name: string, value: ParamInput): StoredValue {
    const decl = this.declaration(name)
    this.logger.debug('store.validate', {
      tool: this.toolName,
      name: decl.name,
      value: Array.isArray(value) ? value.join(',') : value,
      as: describeType(decl)
    })

    const resolveTarget = (target: string): Scalar => this.followTarget(decl.name, target, [decl.name])

    if (isRedirect(value)) {
      const target = redirectTarget(value)
      const concrete = coerce(this.toolName, decl, resolveTarget(target))
      checkConstraint(this.toolName, decl, concrete, resolveTarget)
      return redirect(target)
    }

    const coerced = coerce(this.toolName, decl, value)
    return literal(checkConstraint(this.toolName, decl, coerced, resolveTarget))
  }

  /** Restores every parameter to its schema default. */
  reset(): void {
    this.values = new Map(this.defaults)
    this.logger.debug('store.reset', { tool: this.toolName })
  }

  /** Default value of a parameter, in raw form. */
  defaultOf(name: string): Scalar {
    const stored = this.defaults.get(this.resolveName(name))
    return stored ? rawValue(stored) : null
  }

  /** (name, raw value) pairs in declaration order: required, then optional. */
  entries(): Array<[string, Scalar]> {
    return this.declarations.map((decl) => [decl.name, rawValue(this.entry(decl.name))])
  }

  [Symbol.iterator](): Iterator<[string, Scalar]> {
    return this.entries()[Symbol.iterator]()
  }

  /** Plain object of current raw values. */
  toObject(): Record<string, Scalar> {
    return Object.fromEntries(this.entries())
  }

  snapshot(): StoreSnapshot {
    return new Map(this.values)
  }

  restore(snapshot: StoreSnapshot): void {
    this.values = new Map(snapshot)
  }

  /** Human-readable listing of the parameters and their values. */
  describe(): string {
    const line = (decl: ParameterDeclaration): string => {
      const text = displayValue(rawValue(this.entry(decl.name)))
      return `${decl.name.padStart(NAME_WIDTH)} = ${text.padEnd(VALUE_WIDTH)}  ${decl.help}`.trimEnd()
    }

    const out = [`Parameters for ${this.toolName}:`]
    if (this.schema.required.length > 0) {
      out.push('', 'Required parameters:', ...this.schema.required.map(line))
    }
    if (this.schema.optional.length > 0) {
      out.push('', 'Optional parameters:', ...this.schema.optional.map(line))
    }
    return out.join('\n')
  }

  toString(): string {
    return this.describe()
  }

  private entry(exact: string): StoredValue {
    return this.values.get(exact) ?? literal(null)
  }

  private follow(exact: string, chain: string[]): Scalar {
    const stored = this.entry(exact)
    if (stored.kind === 'literal') return stored.value
    return this.followTarget(exact, stored.target, [...chain, exact])
  }

  private followTarget(from: string, target: string, chain: string[]): Scalar {
    if (chain.includes(target)) {
      const start = chain[0] ?? from
      throw new ValidationError(
        'cycle',
        `Redirect cycle detected for ${this.toolName}.${start}: ${[...chain, target].join(' -> ')}`
      )
    }
    if (!this.byName.has(target)) {
      throw new ValidationError(
        'redirect',
        `Unable to resolve redirect ${this.toolName}.${from} -> '${target}'`
      )
    }
    return this.follow(target, chain)
  }
}
