/**
 * PipelineProcessor - runs one pipeline from a source to a destination.
 *
 * Flow: Seed → Fetch/Generate (frontier + worker pool) → Parse → Refine →
 * Chunk → Wrap → Assemble → Store
 *
 * - Every component is resolved from the registry before any of them is
 *   initialized, so a bad strategy map fails without side effects.
 * - Fetch and Generate run per identifier on a p-queue pool; a failure on
 *   one identifier is counted and the crawl goes on.
 * - The batch stages after the crawl each see the complete output of the
 *   stage before them.
 */

import PQueue from 'p-queue';
import {
  ATOM_TYPES,
  ROLES,
  STAGE_OF_ROLE,
  UnknownRoleError,
  UnresolvedComponentError,
  createAtom,
  defaultStrategyFor,
  isRole,
  loadConfig,
  logger as defaultLogger,
  withRetry,
  withSafeDefault,
  withTiming,
  type Atom,
  type ComponentContext,
  type ComponentRegistry,
  type FetchedResource,
  type Logger,
  type PipelineConfig,
  type RetryOptions,
  type Role,
  type RunOptions,
  type TimingOptions,
} from '@graphweave/core';
import { ComponentSlot } from './component-slot.js';
import { Frontier, type FrontierItem } from './frontier.js';
import type {
  PipelinePhase,
  PipelineRequest,
  ProgressCallback,
  RunStats,
} from './types.js';

/**
 * Roles a pipeline may run without
 */
const OPTIONAL_ROLES: ReadonlySet<Role> = new Set<Role>(['generator']);

const FAILED = Symbol('failed');

type TransformRole = 'parser' | 'refiner' | 'splitter' | 'mapper';

interface PipelineSlots {
  seeder: ComponentSlot<'seeder'>;
  fetcher: ComponentSlot<'fetcher'>;
  generator: ComponentSlot<'generator'> | null;
  parser: ComponentSlot<'parser'>;
  refiner: ComponentSlot<'refiner'>;
  splitter: ComponentSlot<'splitter'>;
  mapper: ComponentSlot<'mapper'>;
  builder: ComponentSlot<'builder'>;
  writer: ComponentSlot<'writer'>;
}

/**
 * Per-run state shared by the crawl helpers
 */
interface RunState {
  request: PipelineRequest;
  slots: PipelineSlots;
  stats: RunStats;
  notify: (phase: PipelinePhase, currentIdentifier?: string) => void;
}

export interface PipelineProcessorOptions {
  config?: PipelineConfig;
  logger?: Logger;
}

export function emptyStats(): RunStats {
  return { seeded: 0, fetched: 0, generated: 0, written: 0, failed: 0, skipped: 0 };
}

export class PipelineProcessor {
  private readonly config: PipelineConfig;
  private readonly logger: Logger;

  constructor(
    private readonly registry: ComponentRegistry,
    options: PipelineProcessorOptions = {}
  ) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Run the pipeline once and report its counters.
   *
   * @throws UnknownRoleError, UnresolvedComponentError or InitializationError
   * before anything is seeded; errors of the batch stages abort the run
   */
  async process(request: PipelineRequest, onProgress?: ProgressCallback): Promise<RunStats> {
    const startTime = Date.now();
    const stats = emptyStats();
    const notify = (phase: PipelinePhase, currentIdentifier?: string): void => {
      onProgress?.({ phase, currentIdentifier, stats: { ...stats } });
    };

    const strategies = this.validateStrategies(request.strategies ?? {});
    const context: ComponentContext = {
      logger: this.logger,
      failureThreshold: this.config.failureThreshold,
    };
    const slots = this.resolveSlots(strategies, context);
    const state: RunState = { request, slots, stats, notify };

    try {
      notify('initializing');
      for (const slot of listSlots(slots)) {
        await slot.initialize(request.options ?? {});
      }

      notify('seeding');
      const frontier = await this.seed(state);

      const rawAtoms = await this.crawl(frontier, state);
      if (this.cancelled(state)) return stats;

      notify('parsing');
      const parsed = await this.transformStage(slots.parser, rawAtoms);
      if (this.cancelled(state)) return stats;
      notify('refining');
      const refined = await this.transformStage(slots.refiner, parsed);
      if (this.cancelled(state)) return stats;
      notify('chunking');
      const chunks = await this.transformStage(slots.splitter, refined);
      if (this.cancelled(state)) return stats;
      notify('wrapping');
      const wrapped = await this.transformStage(slots.mapper, chunks);
      if (this.cancelled(state)) return stats;

      notify('assembling');
      const builder = await slots.builder.acquire();
      const built = await withTiming(() => builder.build(wrapped), this.timing(STAGE_OF_ROLE.builder))();
      if (this.cancelled(state)) return stats;

      notify('storing');
      built.seal();
      const writer = await slots.writer.acquire();
      const result = await withTiming(
        () => writer.store(built, request.destination, this.unitRetry()),
        this.timing(STAGE_OF_ROLE.writer)
      )();
      stats.written = result.written;
      stats.failed += result.failed;

      notify('done');
      this.logger.info(
        `[Processor] Finished in ${Date.now() - startTime}ms: ${stats.fetched} fetched, ${stats.written} written, ${stats.failed} failed, ${stats.skipped} skipped`
      );
      return stats;
    } finally {
      for (const slot of listSlots(slots)) {
        await slot.dispose();
        if (slot.rebuilds > 0) {
          this.logger.info(`[Processor] ${slot.role} ${slot.strategy} rebuilt ${slot.rebuilds}x`);
        }
      }
    }
  }

  // ============================================================================
  // Resolution
  // ============================================================================

  private validateStrategies(strategies: Record<string, string>): Partial<Record<Role, string>> {
    const validated: Partial<Record<Role, string>> = {};
    for (const [role, name] of Object.entries(strategies)) {
      if (!isRole(role)) {
        throw new UnknownRoleError(role, ROLES);
      }
      validated[role] = name;
    }
    return validated;
  }

  private resolveSlots(
    strategies: Partial<Record<Role, string>>,
    context: ComponentContext
  ): PipelineSlots {
    return {
      seeder: this.requiredSlot('seeder', strategies, context),
      fetcher: this.requiredSlot('fetcher', strategies, context),
      generator: this.optionalSlot('generator', strategies, context),
      parser: this.requiredSlot('parser', strategies, context),
      refiner: this.requiredSlot('refiner', strategies, context),
      splitter: this.requiredSlot('splitter', strategies, context),
      mapper: this.requiredSlot('mapper', strategies, context),
      builder: this.requiredSlot('builder', strategies, context),
      writer: this.requiredSlot('writer', strategies, context),
    };
  }

  private optionalSlot<R extends Role>(
    role: R,
    strategies: Partial<Record<Role, string>>,
    context: ComponentContext
  ): ComponentSlot<R> | null {
    const name = strategies[role] ?? defaultStrategyFor(this.config, role);
    if (name === undefined) {
      if (OPTIONAL_ROLES.has(role)) {
        this.logger.debug(`[Processor] No ${role} configured, stage skipped`);
        return null;
      }
      throw new UnresolvedComponentError(role, '(unset)', this.registry.list(role));
    }
    const slot = new ComponentSlot(role, name, this.registry, context);
    this.logger.debug(`[Processor] ${role}: ${name} (${slot.name})`);
    return slot;
  }

  private requiredSlot<R extends Role>(
    role: R,
    strategies: Partial<Record<Role, string>>,
    context: ComponentContext
  ): ComponentSlot<R> {
    const slot = this.optionalSlot(role, strategies, context);
    if (!slot) {
      throw new UnresolvedComponentError(role, '(unset)', this.registry.list(role));
    }
    return slot;
  }

  // ============================================================================
  // Seed / Crawl
  // ============================================================================

  private async seed(state: RunState): Promise<Frontier> {
    // Seeding is not retried
    const seeder = await state.slots.seeder.acquire();
    const identifiers = await seeder.seed(state.request.source);

    const frontier = new Frontier();
    for (const identifier of identifiers) {
      if (frontier.add(identifier, 0)) {
        state.stats.seeded++;
      }
    }
    this.logger.info(`[Processor] Seeded ${state.stats.seeded} identifiers`);
    return frontier;
  }

  /**
   * Drain the frontier through the worker pool and collect one raw atom per
   * fetched identifier, in dispatch order.
   */
  private async crawl(frontier: Frontier, state: RunState): Promise<Atom[]> {
    const { concurrency, maxItems, rateLimitMs } = this.config;
    const { signal } = state.request;
    const queue = new PQueue(
      rateLimitMs > 0
        ? { concurrency, interval: rateLimitMs, intervalCap: 1 }
        : { concurrency }
    );

    const results: Atom[] = [];
    const notStarted = new Set<number>();
    let dispatched = 0;

    const pump = (): void => {
      while (!signal?.aborted && dispatched < maxItems) {
        const item = frontier.next();
        if (!item) return;
        const index = dispatched++;
        notStarted.add(index);
        queue
          .add(async () => {
            notStarted.delete(index);
            const atom = await this.processItem(item, frontier, state);
            if (atom) results[index] = atom;
            pump();
          })
          .catch((error: unknown) => {
            state.stats.failed++;
            this.logger.error(`[Processor] Error processing ${item.identifier}:`, error);
          });
      }
    };

    const onAbort = (): void => {
      this.logger.warn('[Processor] Cancellation requested, finishing in-flight items');
      queue.clear();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      state.notify('fetching');
      pump();
      await queue.onIdle();
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const leftover = notStarted.size + frontier.drain().length;
    if (leftover > 0) {
      this.logger.info(`[Processor] ${leftover} identifiers left undispatched`);
    }
    state.stats.skipped += leftover;

    return results.filter((atom): atom is Atom => atom !== undefined);
  }

  /**
   * Fetch one identifier and feed its links back into the frontier.
   * @returns the raw atom, or null when nothing was fetched
   */
  private async processItem(
    item: FrontierItem,
    frontier: Frontier,
    state: RunState
  ): Promise<Atom | null> {
    const { slots, stats } = state;

    const fetchOne = withSafeDefault(
      withRetry(
        async (identifier: string) => (await slots.fetcher.acquire()).fetch(identifier),
        this.retryOptions(`fetch ${item.identifier}`)
      ),
      FAILED,
      { name: `fetch ${item.identifier}`, logger: this.logger }
    );
    const resource = await fetchOne(item.identifier);

    if (resource === FAILED) {
      stats.failed++;
      state.notify('fetching', item.identifier);
      return null;
    }
    if (resource === null) {
      stats.skipped++;
      this.logger.debug(`[Processor] Nothing to process at ${item.identifier}`);
      state.notify('fetching', item.identifier);
      return null;
    }

    stats.fetched++;
    await this.expand(item, resource, frontier, state);
    state.notify('fetching', item.identifier);

    return createAtom(item.identifier, ATOM_TYPES.RAW, {
      identifier: resource.identifier,
      content: resource.content,
      ...(resource.contentType === undefined ? {} : { contentType: resource.contentType }),
      depth: item.depth,
      metadata: resource.metadata,
    });
  }

  private async expand(
    item: FrontierItem,
    resource: FetchedResource,
    frontier: Frontier,
    state: RunState
  ): Promise<void> {
    const generator = state.slots.generator;
    if (!generator || item.depth >= this.config.maxDepth) return;

    const generateOne = withSafeDefault(
      withRetry(
        async (fetched: FetchedResource) => (await generator.acquire()).generate(fetched),
        this.retryOptions(`generate ${item.identifier}`)
      ),
      FAILED,
      { name: `generate ${item.identifier}`, logger: this.logger }
    );
    const identifiers = await generateOne(resource);

    if (identifiers === FAILED) {
      state.stats.failed++;
      return;
    }
    for (const identifier of identifiers) {
      if (frontier.add(identifier, item.depth + 1)) {
        state.stats.generated++;
      }
    }
  }

  // ============================================================================
  // Batch stages
  // ============================================================================

  private async transformStage<R extends TransformRole>(
    slot: ComponentSlot<R>,
    atoms: Atom[]
  ): Promise<Atom[]> {
    const component = await slot.acquire();
    const timing = this.timing(STAGE_OF_ROLE[slot.role]);
    return withTiming((input: Atom[]) => component.transform(input), timing)(atoms);
  }

  private cancelled(state: RunState): boolean {
    if (!state.request.signal?.aborted) return false;
    this.logger.warn('[Processor] Run cancelled, remaining stages skipped');
    state.notify('cancelled');
    return true;
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private retryOptions(name: string): Partial<RetryOptions> {
    return {
      name,
      logger: this.logger,
      maxAttempts: this.config.retry.maxAttempts,
      delayMs: this.config.retry.delayMs,
      backoffMultiplier: this.config.retry.backoffMultiplier,
      timeoutMs: this.config.timeoutMs,
    };
  }

  /** Per-unit write policy; the writer names and logs each unit itself */
  private unitRetry(): Partial<RetryOptions> {
    return { ...this.config.retry, timeoutMs: this.config.timeoutMs };
  }

  private timing(stage: string): TimingOptions {
    return {
      name: stage,
      logger: this.logger,
      onDuration: ({ durationMs, ok }) => {
        this.logger.info(
          `[Processor] ${stage} ${ok ? 'finished' : 'failed'} in ${durationMs.toFixed(0)}ms`
        );
      },
    };
  }
}

interface SlotLifecycle {
  readonly role: Role;
  readonly strategy: string;
  readonly rebuilds: number;
  initialize(options: RunOptions): Promise<void>;
  dispose(): Promise<void>;
}

/** Slots in stage order, absent optional roles left out */
function listSlots(slots: PipelineSlots): SlotLifecycle[] {
  const ordered: Array<SlotLifecycle | null> = [
    slots.seeder,
    slots.fetcher,
    slots.generator,
    slots.parser,
    slots.refiner,
    slots.splitter,
    slots.mapper,
    slots.builder,
    slots.writer,
  ];
  return ordered.filter((slot): slot is SlotLifecycle => slot !== null);
}

/**
 * Create a processor over the given registry
 */
export function createProcessor(
  registry: ComponentRegistry,
  options?: PipelineProcessorOptions
): PipelineProcessor {
  return new PipelineProcessor(registry, options);
}
