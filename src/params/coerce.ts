import { ValidationError } from '../core/errors.js'
import type { ParamInput, ParameterDeclaration, RangeBound, Scalar } from '../core/types.js'
import { isRedirect } from '../schema/par-line.js'
import { redirectTarget } from './value.js'

const TRUE_WORDS = new Set(['yes', 'true', 'on', '1'])
const FALSE_WORDS = new Set(['no', 'false', 'off', '0'])

const INTEGER_PATTERN = /^[+-]?\d+$/

/** Resolves a same-tool parameter name to its concrete value. */
export type TargetResolver = (target: string) => Scalar

function show(value: ParamInput): string {
  return Array.isArray(value) ? value.join(',') : String(value)
}

/** Describes how a declaration is validated, for debug tracing. */
export function describeType(decl: ParameterDeclaration): string {
  switch (decl.type) {
    case 'boolean':
      return 'a boolean'
    case 'integer':
      return 'an integer'
    case 'real':
      return 'a number'
    case 'string':
      return 'a string'
    case 'filename':
      return 'a filename'
  }
}

function toBoolean(tool: string, decl: ParameterDeclaration, value: ParamInput): boolean {
  if (typeof value === 'boolean') return value
  if (value === 1 || value === 0) return value === 1
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase()
    if (TRUE_WORDS.has(word)) return true
    if (FALSE_WORDS.has(word)) return false
  }
  throw new ValidationError(
    'type',
    `The ${tool}.${decl.name} value should be a boolean, not '${show(value)}'`
  )
}

function toNumber(tool: string, decl: ParameterDeclaration, value: ParamInput): number | null {
  const integer = decl.type === 'integer'
  const fail = (): never => {
    throw new ValidationError(
      'type',
      `The ${tool}.${decl.name} value should be ${integer ? 'an integer' : 'a number'}, not '${show(value)}'`
    )
  }

  if (value === null) return null
  if (typeof value === 'number') {
    if (integer ? !Number.isInteger(value) : !Number.isFinite(value)) fail()
    return value
  }
  if (typeof value !== 'string') return fail()

  const text = value.trim()
  if (text === 'INDEF') return null
  if (text === '') return 0
  if (integer) {
    if (!INTEGER_PATTERN.test(text)) fail()
    return Number.parseInt(text, 10)
  }
  const parsed = Number(text)
  if (!Number.isFinite(parsed)) fail()
  return parsed
}

function toText(value: ParamInput): string | null {
  if (value === null) return null
  const text = Array.isArray(value) ? value.join(',') : String(value)
  return text === '' ? null : text
}

/**
 * Converts a caller-supplied value to the declaration's type. Redirects
 * must be resolved before calling this.
 */
export function coerce(tool: string, decl: ParameterDeclaration, value: ParamInput): Scalar {
  switch (decl.type) {
    case 'boolean':
      return toBoolean(tool, decl, value)
    case 'integer':
    case 'real':
      return toNumber(tool, decl, value)
    case 'string':
    case 'filename':
      return toText(value)
  }
}

function resolveBound(
  tool: string,
  decl: ParameterDeclaration,
  bound: RangeBound,
  resolveTarget: TargetResolver
): number | null {
  if (typeof bound !== 'string') return bound
  if (!isRedirect(bound)) {
    const parsed = Number(bound)
    return bound.trim() === 'INDEF' || Number.isNaN(parsed) ? null : parsed
  }
  const resolved = resolveTarget(redirectTarget(bound))
  if (resolved === null) return null
  if (typeof resolved === 'number') return resolved
  if (typeof resolved === 'string' && resolved.trim() !== '' && Number.isFinite(Number(resolved))) {
    return Number(resolved)
  }
  throw new ValidationError(
    'redirect',
    `The ${tool}.${decl.name} limit ${bound} does not resolve to a number`
  )
}

function matchOption(tool: string, decl: ParameterDeclaration, value: Scalar, options: readonly string[]): Scalar {
  if (value === null) {
    if (options.includes('')) return null
    throw new ValidationError(
      'option',
      `The parameter ${decl.name} was set to '' when it must be one of:\n  ${options.join(' ')}`
    )
  }

  const text = String(value)
  if (decl.type === 'string' || decl.type === 'filename') {
    if (options.includes(text)) return text
    const matches = options.filter((option) => option.startsWith(text))
    if (matches.length === 1) return matches[0] ?? text
    if (matches.length > 1) {
      throw new ValidationError(
        'option',
        `The parameter ${decl.name} was set to ${text} which matches multiple options:\n  ${matches.join(' ')}`
      )
    }
  } else if (options.some((option) => option === text || Number(option) === value)) {
    return value
  }

  throw new ValidationError(
    'option',
    `The parameter ${decl.name} was set to ${text} when it must be one of:\n  ${options.join(' ')}`
  )
}

/**
 * Applies the declaration's range or option constraint to a coerced value,
 * returning the normalised value (options may expand an abbreviation).
 */
export function checkConstraint(
  tool: string,
  decl: ParameterDeclaration,
  value: Scalar,
  resolveTarget: TargetResolver
): Scalar {
  const constraint = decl.constraint
  if (!constraint) return value

  if (constraint.kind === 'options') {
    return matchOption(tool, decl, value, constraint.options)
  }

  if (typeof value !== 'number') return value

  const low = resolveBound(tool, decl, constraint.low, resolveTarget)
  if (low !== null && value < low) {
    throw new ValidationError('range', `${tool}.${decl.name} must be >= ${low} but set to ${value}`)
  }
  const high = resolveBound(tool, decl, constraint.high, resolveTarget)
  if (high !== null && value > high) {
    throw new ValidationError('range', `${tool}.${decl.name} must be <= ${high} but set to ${value}`)
  }
  return value
}
