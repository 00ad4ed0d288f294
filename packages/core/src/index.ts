// Roles
export { ROLES, STAGE_OF_ROLE, isRole, type Role } from './roles.js'

// Errors
export {
  ErrorCodes,
  CoreError,
  SchemaError,
  InitializationError,
  NotInitializedError,
  UnknownRoleError,
  UnresolvedComponentError,
  ComponentError,
  SeederError,
  FetcherError,
  GeneratorError,
  ParserError,
  RefinerError,
  SplitterError,
  MapperError,
  BuilderError,
  WriterError,
  ROLE_ERRORS,
  isCoreError,
  isRetryable,
  errorMessage,
  type CoreErrorCode,
  type CoreErrorOptions,
} from './errors.js'

// Logging & config
export { Logger, LOG_LEVELS, isLogLevel, logger, type LogLevel, type LogSink } from './logger.js'
export {
  PipelineConfigSchema,
  DEFAULT_STRATEGIES,
  loadConfig,
  defaultStrategyFor,
  type PipelineConfig,
  type PipelineConfigInput,
} from './config.js'

// Records
export {
  AtomRecordSchema,
  createAtom,
  atomFromRecord,
  atomToRecord,
  deriveAtom,
  type Atom,
  type AtomPayload,
  type AtomRecord,
} from './atom.js'
export {
  ATOM_TYPES,
  ContentBlockSchema,
  toBlockAtom,
  readBlock,
  readPayload,
  type ContentBlock,
} from './content.js'
export { NodeClass, Predicate, Attribute } from './vocabulary.js'
export {
  GraphNodeSchema,
  KnowledgeGraph,
  type GraphNode,
  type GraphSummary,
  type BuiltObject,
  type PersistUnit,
} from './graph.js'

// Resilience
export {
  runWithCallContext,
  currentCallContext,
  advisoryTimeoutSignal,
  type CallContext,
} from './call-context.js'
export {
  sleep,
  withRetry,
  withSafeDefault,
  withTiming,
  type RetryOptions,
  type SafeDefaultOptions,
  type TimingOptions,
  type TimingRecord,
} from './resilience.js'

// Components
export {
  BaseComponent,
  type ComponentState,
  type ComponentContext,
  type OptionsSchema,
  type RunOptions,
} from './component.js'
export {
  Seeder,
  Fetcher,
  Generator,
  Parser,
  Refiner,
  Splitter,
  Mapper,
  Builder,
  Writer,
  type FetchedResource,
  type SeedRequest,
  type FetchRequest,
  type GenerateRequest,
  type TransformRequest,
  type BuildRequest,
  type StoreRequest,
  type StoreResult,
} from './capabilities.js'
export {
  ComponentRegistry,
  type ComponentFactory,
  type RoleComponentMap,
} from './registry.js'
