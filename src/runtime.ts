import type { PfrunConfig } from './config/schema.js'
import { createLogger } from './core/logger.js'
import type { Logger } from './core/types.js'
import { ParameterStore } from './params/store.js'
import { ToolRunner } from './runner/runner.js'
import { SchemaRegistry } from './schema/registry.js'
import { ScopeManager } from './scope/pfiles.js'

export interface Pfrun {
  config: PfrunConfig
  logger: Logger
  registry: SchemaRegistry
  runner: ToolRunner
  scopes: ScopeManager
  /** Fresh parameter store (schema defaults) for a registered tool. */
  makeTool(name: string): ParameterStore
}

/** Wires registry, runner and scope manager from a loaded configuration. */
export async function createPfrun(config: PfrunConfig, logger: Logger = createLogger(config.logLevel)): Promise<Pfrun> {
  const registry = new SchemaRegistry()
  await registry.loadJson(config.schemaPath)
  if (config.parDir) {
    const loaded = await registry.loadParDirectory(config.parDir)
    logger.debug('registry.par_dir', { dir: config.parDir, tools: loaded.length })
  }

  const runner = new ToolRunner({
    binDir: config.binDir,
    tmpdir: config.tmpdir,
    fieldLimit: config.fieldLimit,
    verify: config.verify,
    logger
  })
  const scopes = new ScopeManager({ variable: config.pfilesVar, tmpdir: config.tmpdir, logger })

  logger.debug('startup.config', { tools: registry.list().length, schemaPath: config.schemaPath })

  return {
    config,
    logger,
    registry,
    runner,
    scopes,
    makeTool: (name) => ParameterStore.fromRegistry(registry, name, logger)
  }
}
