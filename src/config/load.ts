import { config as loadEnv } from 'dotenv'
import { existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'

import { configSchema, type PfrunConfig } from './schema.js'

const BUNDLED_SCHEMAS = path.join('data', 'schemas.json')

/**
 * Finds the registry asset shipped with the package by walking up from
 * this module (works from both `src/` and the compiled `dist/src/`).
 */
export function bundledSchemaPath(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (;;) {
    const candidate = path.join(dir, BUNDLED_SCHEMAS)
    if (existsSync(candidate)) return candidate
    const parent = path.dirname(dir)
    if (parent === dir) return path.resolve(BUNDLED_SCHEMAS)
    dir = parent
  }
}

function parseBoolean(input: string | undefined): boolean | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return !['0', 'false', 'no', 'off'].includes(input.trim().toLowerCase())
}

function parseNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return Number(input)
}

/**
 * Loads runtime configuration from `PFRUN_*` environment variables.
 *
 * When reading `process.env`, a `.env` file in the working directory is
 * loaded first.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PfrunConfig {
  if (env === process.env) loadEnv()

  return configSchema.parse({
    pfilesVar: env.PFRUN_PFILES_VAR?.trim() || undefined,
    tmpdir: env.PFRUN_TMPDIR?.trim() || tmpdir(),
    binDir: env.PFRUN_BIN_DIR?.trim() || undefined,
    schemaPath: env.PFRUN_SCHEMA_PATH?.trim() || bundledSchemaPath(),
    parDir: env.PFRUN_PAR_DIR?.trim() || undefined,
    fieldLimit: parseNumber(env.PFRUN_FIELD_LIMIT),
    logLevel: env.PFRUN_LOG_LEVEL?.trim() || undefined,
    verify: parseBoolean(env.PFRUN_VERIFY)
  })
}
