/**
 * Role base classes - the capability contracts pipeline adapters implement.
 *
 * Each class fixes the request shape for its role, validates it, and exposes
 * a capability method (seed, fetch, generate, transform, build, store) that
 * routes through BaseComponent.execute().
 */

import type { Atom } from './atom.js'
import { BaseComponent } from './component.js'
import type { BuiltObject } from './graph.js'
import { withRetry, withSafeDefault, type RetryOptions } from './resilience.js'

// ============================================================================
// Seed
// ============================================================================

export interface SeedRequest {
  source: string
}

export abstract class Seeder<TOptions = unknown> extends BaseComponent<
  TOptions,
  SeedRequest,
  string[]
> {
  readonly role = 'seeder'

  seed(source: string): Promise<string[]> {
    return this.execute({ source })
  }

  protected validateRequest(request: SeedRequest): string | undefined {
    return request.source.trim() === '' ? 'source must be a non-empty string' : undefined
  }

  protected async run(request: SeedRequest): Promise<string[]> {
    const identifiers = await this.doSeed(request.source)
    this.logger.info(`[${this.name}] Generated ${identifiers.length} seeds`)
    return identifiers
  }

  protected abstract doSeed(source: string): Promise<string[]>
}

// ============================================================================
// Fetch
// ============================================================================

/**
 * Raw payload of one fetched identifier.
 */
export interface FetchedResource {
  identifier: string
  content: string
  /** MIME type when the transport reports one */
  contentType?: string
  metadata: Record<string, unknown>
}

export interface FetchRequest {
  identifier: string
}

export abstract class Fetcher<TOptions = unknown> extends BaseComponent<
  TOptions,
  FetchRequest,
  FetchedResource | null
> {
  readonly role = 'fetcher'

  /** Resolves to null when the identifier exists but yields nothing to process */
  fetch(identifier: string): Promise<FetchedResource | null> {
    return this.execute({ identifier })
  }

  protected validateRequest(request: FetchRequest): string | undefined {
    return request.identifier.trim() === ''
      ? 'identifier must be a non-empty string'
      : undefined
  }

  protected run(request: FetchRequest): Promise<FetchedResource | null> {
    return this.doFetch(request.identifier)
  }

  protected abstract doFetch(identifier: string): Promise<FetchedResource | null>
}

// ============================================================================
// Generate
// ============================================================================

export interface GenerateRequest {
  resource: FetchedResource
}

export abstract class Generator<TOptions = unknown> extends BaseComponent<
  TOptions,
  GenerateRequest,
  string[]
> {
  readonly role = 'generator'

  generate(resource: FetchedResource): Promise<string[]> {
    return this.execute({ resource })
  }

  protected validateRequest(request: GenerateRequest): string | undefined {
    return request.resource.identifier.trim() === ''
      ? 'resource.identifier must be a non-empty string'
      : undefined
  }

  protected run(request: GenerateRequest): Promise<string[]> {
    return this.doGenerate(request.resource)
  }

  protected abstract doGenerate(resource: FetchedResource): Promise<string[]>
}

// ============================================================================
// Parse / Refine / Chunk / Wrap
// ============================================================================

export interface TransformRequest {
  atoms: readonly Atom[]
}

/**
 * Batch transformation over the full atom list of the previous stage.
 */
abstract class Transformer<TOptions> extends BaseComponent<
  TOptions,
  TransformRequest,
  Atom[]
> {
  transform(atoms: readonly Atom[]): Promise<Atom[]> {
    return this.execute({ atoms })
  }

  protected validateRequest(request: TransformRequest): string | undefined {
    return Array.isArray(request.atoms) ? undefined : 'atoms must be an array'
  }

  protected async run(request: TransformRequest): Promise<Atom[]> {
    const output = await this.doTransform(request.atoms)
    this.logger.debug(
      `[${this.name}] ${this.role}: ${request.atoms.length} atoms in, ${output.length} out`
    )
    return output
  }

  protected abstract doTransform(atoms: readonly Atom[]): Promise<Atom[]>
}

export abstract class Parser<TOptions = unknown> extends Transformer<TOptions> {
  readonly role = 'parser'
}

export abstract class Refiner<TOptions = unknown> extends Transformer<TOptions> {
  readonly role = 'refiner'
}

export abstract class Splitter<TOptions = unknown> extends Transformer<TOptions> {
  readonly role = 'splitter'
}

export abstract class Mapper<TOptions = unknown> extends Transformer<TOptions> {
  readonly role = 'mapper'
}

// ============================================================================
// Assemble
// ============================================================================

export interface BuildRequest {
  atoms: readonly Atom[]
}

export abstract class Builder<TOptions = unknown> extends BaseComponent<
  TOptions,
  BuildRequest,
  BuiltObject
> {
  readonly role = 'builder'

  build(atoms: readonly Atom[]): Promise<BuiltObject> {
    return this.execute({ atoms })
  }

  protected validateRequest(request: BuildRequest): string | undefined {
    return Array.isArray(request.atoms) ? undefined : 'atoms must be an array'
  }

  protected run(request: BuildRequest): Promise<BuiltObject> {
    return this.doBuild(request.atoms)
  }

  protected abstract doBuild(atoms: readonly Atom[]): Promise<BuiltObject>
}

// ============================================================================
// Store
// ============================================================================

export interface StoreRequest {
  built: BuiltObject
  destination: string
  /** Retry policy applied to each unit write */
  unitRetry?: Partial<RetryOptions>
}

export interface StoreResult {
  written: number
  failed: number
  failedUnits: string[]
}

/**
 * Writers persist a built object unit by unit. One unit failing (after its
 * retries) is counted and skipped; failures to open or close the destination
 * fail the whole store.
 */
export abstract class Writer<TOptions = unknown> extends BaseComponent<
  TOptions,
  StoreRequest,
  StoreResult
> {
  readonly role = 'writer'

  store(
    built: BuiltObject,
    destination: string,
    unitRetry?: Partial<RetryOptions>
  ): Promise<StoreResult> {
    return this.execute({ built, destination, unitRetry })
  }

  protected validateRequest(request: StoreRequest): string | undefined {
    return request.destination.trim() === ''
      ? 'destination must be a non-empty string'
      : undefined
  }

  protected async run(request: StoreRequest): Promise<StoreResult> {
    const result: StoreResult = { written: 0, failed: 0, failedUnits: [] }

    await this.open(request.destination, request.built)

    for (const unit of request.built.units()) {
      const write = withSafeDefault(
        withRetry(() => this.writeUnit(unit.record, unit.id), {
          name: `${this.name}:${unit.id}`,
          logger: this.logger,
          ...request.unitRetry,
        }),
        false,
        { name: `${this.name} unit ${unit.id}`, logger: this.logger }
      )
      if ((await write()) === false) {
        result.failed++
        result.failedUnits.push(unit.id)
      } else {
        result.written++
      }
    }

    await this.close(request.built)
    this.logger.info(
      `[${this.name}] Stored ${result.written} units to ${request.destination} (${result.failed} failed)`
    )
    return result
  }

  protected abstract open(destination: string, built: BuiltObject): Promise<void>

  protected abstract writeUnit(record: Record<string, unknown>, id: string): Promise<void>

  protected abstract close(built: BuiltObject): Promise<void>
}
