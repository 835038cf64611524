import type { ParamInput } from './core/types.js'

export interface ParsedArgs {
  positional: ParamInput[]
  named: Record<string, ParamInput>
}

/** Splits `name=value` words from positional values. */
export function parseToolArgs(words: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], named: {} }
  for (const word of words) {
    const eq = word.indexOf('=')
    if (eq > 0) parsed.named[word.slice(0, eq)] = word.slice(eq + 1)
    else parsed.positional.push(word)
  }
  return parsed
}
