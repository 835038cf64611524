import { readFile, readdir } from 'node:fs/promises'
import { basename, join } from 'node:path'

import { z } from 'zod'

import { SchemaError, errorMessage } from '../core/errors.js'
import type { ToolKind, ToolSchema } from '../core/types.js'
import { parseParFile } from './par-line.js'

const toolEntrySchema = z.object({
  kind: z.enum(['parfile', 'direct', 'paramonly']).default('parfile'),
  executable: z.string().min(1).optional(),
  /** Parameter-file lines, in file order. */
  lines: z.array(z.string())
})

/**
 * On-disk registry asset: tool name -> parameter-file lines.
 */
export const registryFileSchema = z.object({
  tools: z.record(z.string(), toolEntrySchema)
})

export type RegistryFile = z.infer<typeof registryFileSchema>

/**
 * In-memory registry of tool schemas, keyed by tool name.
 */
export class SchemaRegistry {
  private readonly tools = new Map<string, ToolSchema>()

  /** Registers or replaces a schema by tool name. */
  register(schema: ToolSchema): void {
    this.tools.set(schema.name, schema)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  /** Gets a schema by tool name, failing for unknown tools. */
  get(name: string): ToolSchema {
    const schema = this.tools.get(name)
    if (!schema) throw new SchemaError(`Unknown tool '${name}'`)
    return schema
  }

  /** Returns all tool names, sorted. */
  list(): string[] {
    return [...this.tools.keys()].sort()
  }

  /** Registers every tool described by a parsed registry asset. */
  addAll(data: RegistryFile): void {
    for (const [name, entry] of Object.entries(data.tools)) {
      const schema = parseParFile(name, entry.lines.join('\n'), entry.kind)
      this.register(entry.executable ? { ...schema, executable: entry.executable } : schema)
    }
  }

  /** Loads a JSON registry asset (see `registryFileSchema`). */
  async loadJson(path: string): Promise<void> {
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      throw new SchemaError(`Unable to read schema registry ${path}: ${errorMessage(error)}`)
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      throw new SchemaError(`Invalid JSON in schema registry ${path}: ${errorMessage(error)}`)
    }

    const parsed = registryFileSchema.safeParse(json)
    if (!parsed.success) {
      throw new SchemaError(`Invalid schema registry ${path}: ${parsed.error.message}`)
    }
    this.addAll(parsed.data)
  }

  /**
   * Registers every `<tool>.par` file in `dir`. Tools already present are
   * replaced, so later directories override earlier ones.
   */
  async loadParDirectory(dir: string, kind: ToolKind = 'parfile'): Promise<string[]> {
    const names = (await readdir(dir)).filter((name) => name.endsWith('.par')).sort()
    const loaded: string[] = []
    for (const filename of names) {
      const toolName = basename(filename, '.par')
      const text = await readFile(join(dir, filename), 'utf-8')
      this.register(parseParFile(toolName, text, kind))
      loaded.push(toolName)
    }
    return loaded
  }
}
