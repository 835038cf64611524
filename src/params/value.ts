import type { Scalar } from '../core/types.js'
import { isRedirect } from '../schema/par-line.js'

/**
 * A parameter value as held by a store: either a concrete literal or a
 * reference to another parameter of the same tool (`)name` on disk).
 */
export type StoredValue =
  | { readonly kind: 'literal'; readonly value: Scalar }
  | { readonly kind: 'redirect'; readonly target: string }

export function literal(value: Scalar): StoredValue {
  return { kind: 'literal', value }
}

export function redirect(target: string): StoredValue {
  return { kind: 'redirect', target }
}

/** Name referenced by a `)name` string. */
export function redirectTarget(value: string): string {
  return value.slice(1).trim()
}

/** Wraps a raw schema/default value, recognising redirect strings. */
export function toStored(raw: Scalar): StoredValue {
  return isRedirect(raw) ? redirect(redirectTarget(raw)) : literal(raw)
}

/** The user-facing form: literals as-is, redirects as `)name`. */
export function rawValue(stored: StoredValue): Scalar {
  return stored.kind === 'redirect' ? `)${stored.target}` : stored.value
}
