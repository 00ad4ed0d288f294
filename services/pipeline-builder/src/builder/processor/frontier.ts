/**
 * Frontier - FIFO of identifiers still to fetch plus the run's visited set.
 *
 * An identifier is marked visited when it is enqueued, so it can be dequeued
 * at most once per run. Identifiers are compared in canonical form (see
 * canonicalIdentifier), so `docs/a.html` and `file:///.../docs/a.html` are one
 * entry; the form first added is the one handed out. All methods are
 * synchronous; callers on the event loop never observe a half-applied update.
 */

import { canonicalIdentifier } from '../urls.js';

export interface FrontierItem {
  identifier: string;
  /** Link distance from a seed; seeds are 0 */
  depth: number;
}

export class Frontier {
  private readonly items: FrontierItem[] = [];
  private head = 0;
  private readonly visited = new Set<string>();

  /**
   * Enqueue an identifier unless it was seen before in this run.
   * @returns whether the identifier was added
   */
  add(identifier: string, depth: number): boolean {
    const key = canonicalIdentifier(identifier);
    if (this.visited.has(key)) return false;
    this.visited.add(key);
    this.items.push({ identifier, depth });
    return true;
  }

  has(identifier: string): boolean {
    return this.visited.has(canonicalIdentifier(identifier));
  }

  next(): FrontierItem | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.head++;
    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items.splice(0, this.head);
      this.head = 0;
    }
    return item;
  }

  get pending(): number {
    return this.items.length - this.head;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  /** Remove and return everything still queued */
  drain(): FrontierItem[] {
    const rest = this.items.slice(this.head);
    this.items.length = 0;
    this.head = 0;
    return rest;
  }
}
