/**
 * Processor Layer - types shared by the orchestrator and its callers
 */

import type { RunOptions } from '@graphweave/core';

/**
 * Counters reported at the end of a run
 */
export interface RunStats {
  /** Identifiers contributed by the seeder, after de-duplication */
  seeded: number;
  /** Fetches that returned content */
  fetched: number;
  /** Identifiers the generator added to the frontier */
  generated: number;
  /** Units the writer persisted */
  written: number;
  /** Failed fetches, generations and store units */
  failed: number;
  /** Empty fetches plus identifiers never dispatched */
  skipped: number;
}

export interface PipelineRequest {
  source: string;
  destination: string;
  /** role → registered strategy name; roles left out use configured defaults */
  strategies?: Record<string, string>;
  /** Handed to every component's initialize() */
  options?: RunOptions;
  /** Aborting stops dispatch; in-flight fetches finish, later stages are skipped */
  signal?: AbortSignal;
}

export type PipelinePhase =
  | 'initializing'
  | 'seeding'
  | 'fetching'
  | 'parsing'
  | 'refining'
  | 'chunking'
  | 'wrapping'
  | 'assembling'
  | 'storing'
  | 'done'
  | 'cancelled';

export interface PipelineProgress {
  phase: PipelinePhase;
  /** Identifier just fetched, during the fetching phase */
  currentIdentifier?: string;
  stats: Readonly<RunStats>;
}

export type ProgressCallback = (progress: PipelineProgress) => void;
