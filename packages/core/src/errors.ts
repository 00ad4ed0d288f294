import type { Role } from './roles.js'

export const ErrorCodes = {
  SCHEMA_INVALID: 'SCHEMA_INVALID',
  INITIALIZATION_FAILED: 'INITIALIZATION_FAILED',
  NOT_INITIALIZED: 'NOT_INITIALIZED',
  UNKNOWN_ROLE: 'UNKNOWN_ROLE',
  UNRESOLVED_COMPONENT: 'UNRESOLVED_COMPONENT',
  INVALID_REQUEST: 'INVALID_REQUEST',
  COMPONENT_FAILED: 'COMPONENT_FAILED',
  GRAPH_SEALED: 'GRAPH_SEALED',
} as const

export type CoreErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export interface CoreErrorOptions {
  cause?: unknown
  suggestion?: string
  /** Whether a resilience wrapper may re-invoke the failed operation */
  retryable?: boolean
}

/**
 * Root of the graphweave error taxonomy.
 */
export class CoreError extends Error {
  readonly code: CoreErrorCode
  readonly suggestion?: string
  readonly retryable: boolean

  constructor(code: CoreErrorCode, message: string, options: CoreErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.suggestion = options.suggestion
    this.retryable = options.retryable ?? false
  }
}

export class SchemaError extends CoreError {
  constructor(message: string, options: CoreErrorOptions = {}) {
    super(ErrorCodes.SCHEMA_INVALID, message, options)
  }
}

export class InitializationError extends CoreError {
  readonly component: string

  constructor(component: string, message: string, options: CoreErrorOptions = {}) {
    super(ErrorCodes.INITIALIZATION_FAILED, `[${component}] ${message}`, options)
    this.component = component
  }
}

export class NotInitializedError extends CoreError {
  constructor(component: string) {
    super(
      ErrorCodes.NOT_INITIALIZED,
      `[${component}] Component used before a successful initialize()`,
      { suggestion: 'Call initialize(options) and wait for it to resolve first' }
    )
  }
}

export class UnknownRoleError extends CoreError {
  readonly role: string

  constructor(role: string, knownRoles: readonly string[]) {
    super(ErrorCodes.UNKNOWN_ROLE, `Unknown component role: '${role}'`, {
      suggestion: `Declared roles: ${knownRoles.join(', ')}`,
    })
    this.role = role
  }
}

export class UnresolvedComponentError extends CoreError {
  readonly role: Role
  readonly componentName: string

  constructor(role: Role, name: string, available: readonly string[]) {
    super(ErrorCodes.UNRESOLVED_COMPONENT, `No ${role} registered under '${name}'`, {
      suggestion:
        available.length > 0
          ? `Registered ${role} components: ${available.join(', ')}`
          : `No ${role} components are registered`,
    })
    this.role = role
    this.componentName = name
  }
}

/**
 * Error raised by a component's execute template, tagged with the role it serves.
 */
export class ComponentError extends CoreError {
  readonly role: Role
  readonly component: string

  constructor(
    role: Role,
    component: string,
    message: string,
    options: CoreErrorOptions & { code?: CoreErrorCode } = {}
  ) {
    super(options.code ?? ErrorCodes.COMPONENT_FAILED, `[${component}] ${message}`, {
      retryable: true,
      ...options,
    })
    this.role = role
    this.component = component
  }
}

export class SeederError extends ComponentError {}
export class FetcherError extends ComponentError {}
export class GeneratorError extends ComponentError {}
export class ParserError extends ComponentError {}
export class RefinerError extends ComponentError {}
export class SplitterError extends ComponentError {}
export class MapperError extends ComponentError {}
export class BuilderError extends ComponentError {}
export class WriterError extends ComponentError {}

type ComponentErrorClass = new (
  role: Role,
  component: string,
  message: string,
  options?: CoreErrorOptions & { code?: CoreErrorCode }
) => ComponentError

export const ROLE_ERRORS: Record<Role, ComponentErrorClass> = {
  seeder: SeederError,
  fetcher: FetcherError,
  generator: GeneratorError,
  parser: ParserError,
  refiner: RefinerError,
  splitter: SplitterError,
  mapper: MapperError,
  builder: BuilderError,
  writer: WriterError,
}

export function isCoreError(error: unknown): error is CoreError {
  return error instanceof CoreError
}

/**
 * Whether a resilience wrapper should try the operation again.
 * Plain errors (network resets, fs hiccups) count as transient.
 */
export function isRetryable(error: unknown): boolean {
  return isCoreError(error) ? error.retryable : true
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
