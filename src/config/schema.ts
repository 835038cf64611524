import { z } from 'zod'

/**
 * Runtime configuration schema for pfrun.
 */
export const configSchema = z.object({
  /** Environment variable holding the parameter search path. */
  pfilesVar: z.string().min(1).default('PFILES'),
  tmpdir: z.string().min(1),
  binDir: z.string().min(1).optional(),
  /** JSON schema registry asset. */
  schemaPath: z.string().min(1),
  /** Directory of `<tool>.par` files registered on top of `schemaPath`. */
  parDir: z.string().min(1).optional(),
  fieldLimit: z.number().int().positive().default(1023),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  verify: z.boolean().default(true)
})

export type PfrunConfig = z.infer<typeof configSchema>
