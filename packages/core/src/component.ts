/**
 * BaseComponent - lifecycle and execute template shared by every adapter.
 *
 * execute() runs three fixed phases:
 *   1. role-level request validation (fails fast, never retried)
 *   2. the adapter hook
 *   3. error wrapping into the role's error kind, with uniform logging
 *
 * Role classes (see capabilities.ts) supply phase 1 and the hook signature;
 * leaf adapters only implement the hook and, optionally, setup/teardown.
 */

import type { z } from 'zod'
import {
  ComponentError,
  CoreError,
  ErrorCodes,
  InitializationError,
  NotInitializedError,
  ROLE_ERRORS,
  errorMessage,
  isRetryable,
} from './errors.js'
import { logger as defaultLogger, type Logger } from './logger.js'
import type { Role } from './roles.js'

export type ComponentState = 'uninitialized' | 'ready' | 'failed'

/**
 * Free-form run options handed to every component's initialize().
 */
export type RunOptions = Record<string, unknown>

export interface ComponentContext {
  logger: Logger
  /** Consecutive hook failures before the instance is marked failed (default 3) */
  failureThreshold?: number
}

export type OptionsSchema<TOptions> = z.ZodType<TOptions, z.ZodTypeDef, unknown>

export abstract class BaseComponent<TOptions, TRequest, TResponse> {
  abstract readonly role: Role
  abstract readonly name: string

  /** Recognized options for this adapter; unknown keys are ignored */
  protected abstract readonly optionsSchema: OptionsSchema<TOptions>

  protected readonly logger: Logger
  private readonly failureThreshold: number
  private state: ComponentState = 'uninitialized'
  private consecutiveFailures = 0
  private parsedOptions: TOptions | undefined

  constructor(context: ComponentContext = { logger: defaultLogger }) {
    this.logger = context.logger
    this.failureThreshold = context.failureThreshold ?? 3
  }

  getState(): ComponentState {
    return this.state
  }

  /**
   * Validate recognized options and open external resources.
   * A second call on a ready instance is a no-op.
   */
  async initialize(options: RunOptions = {}): Promise<void> {
    if (this.state === 'ready') {
      this.logger.debug(`[${this.name}] Already initialized`)
      return
    }
    if (this.state === 'failed') {
      throw new InitializationError(
        this.name,
        'Instance is in failed state and cannot be re-initialized',
        { suggestion: 'Build a new instance from the registry factory' }
      )
    }

    const parsed = this.optionsSchema.safeParse(options)
    if (!parsed.success) {
      this.state = 'failed'
      const problems = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(options)'}: ${issue.message}`
      )
      throw new InitializationError(this.name, `Invalid options - ${problems.join('; ')}`, {
        cause: parsed.error,
      })
    }

    try {
      await this.setup(parsed.data)
    } catch (error) {
      this.state = 'failed'
      if (error instanceof InitializationError) throw error
      throw new InitializationError(this.name, `Setup failed: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    this.parsedOptions = parsed.data
    this.state = 'ready'
    this.logger.debug(`[${this.name}] Initialized as ${this.role}`)
  }

  async execute(request: TRequest): Promise<TResponse> {
    if (this.state === 'uninitialized') {
      throw new NotInitializedError(this.name)
    }
    const RoleError = ROLE_ERRORS[this.role]
    if (this.state === 'failed') {
      throw new RoleError(this.role, this.name, 'Component is in failed state', {
        suggestion: 'Discard this instance and rebuild it from the registry factory',
      })
    }

    const invalid = this.validateRequest(request)
    if (invalid !== undefined) {
      this.logger.warn(`[${this.name}] Rejected request: ${invalid}`)
      throw new RoleError(this.role, this.name, `Invalid request: ${invalid}`, {
        code: ErrorCodes.INVALID_REQUEST,
        retryable: false,
      })
    }

    try {
      const response = await this.run(request)
      this.consecutiveFailures = 0
      return response
    } catch (error) {
      this.consecutiveFailures++
      if (this.consecutiveFailures >= this.failureThreshold) {
        this.state = 'failed'
        this.logger.warn(
          `[${this.name}] Marked failed after ${this.consecutiveFailures} consecutive errors`
        )
      }
      this.logger.error(`[${this.name}] ${this.role} failed: ${errorMessage(error)}`)
      throw this.wrapError(error)
    }
  }

  /**
   * Release external resources. Safe to call in any state.
   */
  async dispose(): Promise<void> {
    await this.teardown()
  }

  /** Options accepted by initialize(); throws before initialization */
  protected get options(): TOptions {
    if (this.parsedOptions === undefined) {
      throw new NotInitializedError(this.name)
    }
    return this.parsedOptions
  }

  /** Returns a problem description, or undefined when the request is well-formed */
  protected abstract validateRequest(request: TRequest): string | undefined

  protected abstract run(request: TRequest): Promise<TResponse>

  protected async setup(_options: TOptions): Promise<void> {}

  protected async teardown(): Promise<void> {}

  private wrapError(error: unknown): ComponentError {
    if (error instanceof ComponentError && error.role === this.role) {
      return error
    }
    const RoleError = ROLE_ERRORS[this.role]
    return new RoleError(this.role, this.name, errorMessage(error), {
      cause: error,
      retryable: isRetryable(error),
      suggestion: error instanceof CoreError ? error.suggestion : undefined,
    })
  }

  toString(): string {
    return `<${this.name}>`
  }
}
