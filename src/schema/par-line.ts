import { SchemaError } from '../core/errors.js'
import type {
  Constraint,
  ParameterDeclaration,
  RangeBound,
  Scalar,
  ToolKind,
  ToolSchema,
  TypeTag
} from '../core/types.js'

const TYPE_LETTERS: Record<string, TypeTag> = {
  b: 'boolean',
  i: 'integer',
  r: 'real',
  s: 'string',
  f: 'filename'
}

const FIELD_COUNT = 7

/**
 * Splits a parameter-file line on commas, keeping commas that sit inside
 * double quotes (default values such as `"a,b"`). Quotes are removed and
 * `\"` or `\\` inside them stand for the bare character.
 */
export function splitParLine(line: string): string[] {
  const fields: string[] = []
  let current = ''
  let inString = false
  let expectComma = false

  for (let i = 0; i < line.length; i++) {
    const c = line.charAt(i)
    if (expectComma) {
      if (c !== ',') {
        throw new SchemaError(`Expected a comma after a quote, found ${c} in [${line}]`)
      }
      expectComma = false
    }

    if (inString && c === '\\') {
      const next = line.charAt(i + 1)
      if (next === '"' || next === '\\') {
        current += next
        i++
        continue
      }
    }

    if (c === '"') {
      if (inString) {
        inString = false
        expectComma = true
      } else {
        inString = true
      }
      continue
    }

    if (c === ',' && !inString) {
      fields.push(current)
      current = ''
      continue
    }

    current += c
  }

  if (inString) throw new SchemaError(`Unterminated quote in [${line}]`)
  fields.push(current)
  return fields
}

export function isRedirect(value: unknown): value is `)${string}` {
  return typeof value === 'string' && value.startsWith(')')
}

function parseNumber(toolName: string, name: string, raw: string): number | null {
  const text = raw.trim()
  if (text === '' || text === 'INDEF') return null
  const value = Number(text)
  if (Number.isNaN(value)) {
    throw new SchemaError(`Invalid number '${raw}' for ${toolName}.${name}`)
  }
  return value
}

function parseBound(toolName: string, name: string, raw: string): RangeBound {
  return isRedirect(raw) ? raw : parseNumber(toolName, name, raw)
}

function parseDefault(toolName: string, name: string, type: TypeTag, raw: string): Scalar {
  if (isRedirect(raw)) return raw
  switch (type) {
    case 'boolean':
      return raw === 'yes'
    case 'integer':
    case 'real':
      return parseNumber(toolName, name, raw)
    case 'string':
    case 'filename':
      return raw === '' ? null : raw
  }
}

/**
 * Parses one `name,type,mode,value,min,max,prompt` line.
 *
 * Returns `undefined` for lines that do not describe a user-visible
 * parameter: the `mode` entry and enumerations with a single option.
 */
export function parseParLine(toolName: string, line: string): ParameterDeclaration | undefined {
  const fields = splitParLine(line)
  if (fields.length < 4) {
    throw new SchemaError(`Unable to process parameter line '${line}' for ${toolName}`)
  }
  while (fields.length < FIELD_COUNT) fields.push('')

  const [name = '', letter = '', mode = '', value = '', minval = '', maxval = '', prompt = ''] = fields
  const type = TYPE_LETTERS[letter]
  if (type === undefined) {
    throw new SchemaError(`Unknown parameter type '${letter}' in '${line}' for ${toolName}`)
  }

  const required = mode === 'a'
  let constraint: Constraint | undefined
  const isText = type === 'string' || type === 'filename'

  if (type !== 'boolean' && minval !== '' && (minval.includes('|') || isText)) {
    constraint = { kind: 'options', options: minval.split('|') }
  } else if (type !== 'boolean' && (minval !== '' || maxval !== '')) {
    constraint = {
      kind: 'range',
      low: parseBound(toolName, name, minval),
      high: parseBound(toolName, name, maxval)
    }
  }

  const skip =
    name === 'mode' || (constraint?.kind === 'options' && constraint.options.length === 1)
  if (skip) {
    if (required) {
      throw new SchemaError(`Found a required parameter that is to be skipped: ${toolName}.${name}`)
    }
    return undefined
  }

  return {
    name,
    type,
    help: prompt.trim(),
    defaultValue: parseDefault(toolName, name, type, value),
    required,
    mode,
    ...(constraint ? { constraint } : {})
  }
}

/** Parses a whole parameter file into a tool schema. */
export function parseParFile(toolName: string, text: string, kind: ToolKind = 'parfile'): ToolSchema {
  const required: ParameterDeclaration[] = []
  const optional: ParameterDeclaration[] = []

  for (const raw of text.split('\n')) {
    const line = raw.trim()
    if (line === '' || line.startsWith('#')) continue
    const decl = parseParLine(toolName, line)
    if (!decl) continue
    if (decl.required) required.push(decl)
    else optional.push(decl)
  }

  const names = new Set<string>()
  for (const decl of [...required, ...optional]) {
    if (names.has(decl.name)) {
      throw new SchemaError(`Duplicate parameter ${toolName}.${decl.name}`)
    }
    names.add(decl.name)
  }

  return { name: toolName, kind, required, optional }
}
