export { loadConfig, bundledSchemaPath } from './config/load.js'
export { configSchema, type PfrunConfig } from './config/schema.js'
export {
  AmbiguousNameError,
  PfrunError,
  ReadError,
  SchemaError,
  ScopeError,
  ToolExecutionError,
  UnknownNameError,
  ValidationError,
  WriteError,
  type ValidationKind
} from './core/errors.js'
export { createLogger, logger, type LogLevel } from './core/logger.js'
export type {
  Constraint,
  InvocationRecord,
  Logger,
  ParamInput,
  ParameterDeclaration,
  RangeBound,
  Scalar,
  ToolKind,
  ToolSchema,
  TypeTag
} from './core/types.js'
export {
  DEFAULT_FIELD_LIMIT,
  ParFileCodec,
  readParams,
  writeParams,
  type CodecOptions,
  type OverflowMap,
  type VerifyMismatch
} from './parfile/codec.js'
export { ParameterStore, type SetResult, type StoreSnapshot } from './params/store.js'
export type { StoredValue } from './params/value.js'
export { ToolRunner, type InvocationState, type RunOptions, type RunResult, type ToolRunnerOptions } from './runner/runner.js'
export { createPfrun, type Pfrun } from './runtime.js'
export { parseParFile, parseParLine } from './schema/par-line.js'
export { SchemaRegistry, registryFileSchema, type RegistryFile } from './schema/registry.js'
export {
  ScopeManager,
  formatPfiles,
  parsePfiles,
  type PfilesPath,
  type PfilesScope,
  type ScopeOptions
} from './scope/pfiles.js'
