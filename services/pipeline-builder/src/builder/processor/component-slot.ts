/**
 * ComponentSlot - owns the live instance the orchestrator uses for one role.
 *
 * When the instance ends up in the failed state (too many consecutive hook
 * errors), the next acquire() disposes it and builds a fresh one through the
 * registry. Concurrent callers share a single rebuild.
 */

import {
  errorMessage,
  type ComponentContext,
  type ComponentRegistry,
  type Logger,
  type Role,
  type RoleComponentMap,
  type RunOptions,
} from '@graphweave/core';

export class ComponentSlot<R extends Role> {
  private instance: RoleComponentMap[R];
  private options: RunOptions = {};
  private rebuilding: Promise<RoleComponentMap[R]> | null = null;
  private rebuildCount = 0;

  constructor(
    readonly role: R,
    readonly strategy: string,
    private readonly registry: ComponentRegistry,
    private readonly context: ComponentContext
  ) {
    this.instance = registry.create(role, strategy, context);
  }

  get name(): string {
    return this.instance.name;
  }

  /** Number of times a failed instance was replaced */
  get rebuilds(): number {
    return this.rebuildCount;
  }

  async initialize(options: RunOptions): Promise<void> {
    this.options = options;
    await this.instance.initialize(options);
  }

  /**
   * Ready instance for the next call, rebuilding a failed one first.
   */
  async acquire(): Promise<RoleComponentMap[R]> {
    if (this.instance.getState() !== 'failed') {
      return this.instance;
    }
    if (!this.rebuilding) {
      this.rebuilding = this.rebuild().finally(() => {
        this.rebuilding = null;
      });
    }
    return this.rebuilding;
  }

  async dispose(): Promise<void> {
    try {
      await this.instance.dispose();
    } catch (error) {
      this.logger.warn(`[${this.instance.name}] Dispose failed: ${errorMessage(error)}`);
    }
  }

  private get logger(): Logger {
    return this.context.logger;
  }

  private async rebuild(): Promise<RoleComponentMap[R]> {
    const stale = this.instance;
    this.logger.warn(`[${stale.name}] Failed ${this.role} replaced with a fresh instance`);
    await this.dispose();

    const fresh = this.registry.create(this.role, this.strategy, this.context);
    await fresh.initialize(this.options);
    this.instance = fresh;
    this.rebuildCount++;
    return fresh;
  }
}
