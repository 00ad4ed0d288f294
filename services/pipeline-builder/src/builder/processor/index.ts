/**
 * Processor Layer
 *
 * Orchestrates the pipeline:
 * Seed → Fetch → Generate → Parse → Refine → Chunk → Wrap → Assemble → Store
 */

// Types
export type {
  RunStats,
  PipelineRequest,
  PipelinePhase,
  PipelineProgress,
  ProgressCallback,
} from './types.js';

// Implementation
export {
  PipelineProcessor,
  createProcessor,
  emptyStats,
  type PipelineProcessorOptions,
} from './pipeline-processor.js';
export { Frontier, type FrontierItem } from './frontier.js';
export { ComponentSlot } from './component-slot.js';
export { formatRunReport } from './report.js';
