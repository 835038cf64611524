import type { Constraint, ParameterDeclaration, RangeBound, TypeTag } from '../core/types.js'
import type { StoredValue } from '../params/value.js'
import { splitParLine } from '../schema/par-line.js'

const TYPE_LETTER: Record<TypeTag, string> = {
  boolean: 'b',
  integer: 'i',
  real: 'r',
  string: 's',
  filename: 'f'
}

/** Written last so the tool never prompts. */
export const NON_INTERACTIVE_MODE = 'hl'
export const MODE_LINE = `mode,s,h,"${NON_INTERACTIVE_MODE}",,,`

/** Prefix of a value that points at a stack file. */
export const STACK_TOKEN = '@-'

/** On-disk (unquoted) text for a stored value. */
export function formatValue(decl: ParameterDeclaration, stored: StoredValue): string {
  if (stored.kind === 'redirect') return `)${stored.target}`
  const value = stored.value
  switch (decl.type) {
    case 'boolean':
      return value === true ? 'yes' : 'no'
    case 'integer':
    case 'real':
      return value === null ? 'INDEF' : String(value)
    case 'string':
    case 'filename':
      return value === null ? '' : String(value)
  }
}

function formatBound(bound: RangeBound): string {
  return bound === null ? '' : String(bound)
}

function formatLimits(constraint: Constraint | undefined): [string, string] {
  if (!constraint) return ['', '']
  if (constraint.kind === 'options') return [constraint.options.join('|'), '']
  return [formatBound(constraint.low), formatBound(constraint.high)]
}

/** Quoted column text, with `"` and `\` escaped by a backslash. */
export function quote(text: string): string {
  return `"${text.replace(/[\\"]/g, '\\$&')}"`
}

/** One `name,type,mode,value,min,max,"help"` line. */
export function formatLine(decl: ParameterDeclaration, text: string): string {
  const quoted = decl.type === 'string' || decl.type === 'filename'
  const mode = decl.mode || (decl.required ? 'a' : 'h')
  const [min, max] = formatLimits(decl.constraint)
  const help = decl.help ? quote(decl.help) : ''
  const value = quoted ? quote(text) : text
  return [decl.name, TYPE_LETTER[decl.type], mode, value, min, max, help].join(',')
}

/** Maps each parameter name in a file to its (unquoted) value column. */
export function parseValues(text: string): Map<string, string> {
  const values = new Map<string, string>()
  for (const raw of text.split('\n')) {
    const line = raw.trim()
    if (line === '' || line.startsWith('#')) continue
    const [name, , , value = ''] = splitParLine(line)
    if (name) values.set(name, value)
  }
  return values
}

/** Expands `$NAME` and `${NAME}` references; unknown names are left alone. */
export function expandEnv(text: string, env: NodeJS.ProcessEnv): string {
  return text.replace(/\$\{(\w+)\}|\$(\w+)/g, (match, braced: string | undefined, bare: string | undefined) => {
    const key = braced ?? bare
    if (key === undefined) return match
    return env[key] ?? match
  })
}
