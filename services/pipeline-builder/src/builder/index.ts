/**
 * Builder Layer - Unified entry point
 *
 * Usage:
 * ```typescript
 * import { createProcessor, getDefaultRegistry } from '@graphweave/pipeline-builder'
 *
 * const processor = createProcessor(getDefaultRegistry())
 * const stats = await processor.process({
 *   source: './docs',
 *   destination: './out/graph.json',
 *   strategies: { seeder: 'directory' },
 *   options: { extensions: ['.md'] },
 * })
 * ```
 */

// ============================================================================
// Processor Layer (Primary Entry Point)
// ============================================================================
export * from './processor/index.js'

// ============================================================================
// Built-in adapters
// ============================================================================
export * from './adapters/index.js'

// ============================================================================
// Pipeline files
// ============================================================================
export {
  PipelineFileSchema,
  parsePipelineFile,
  loadPipelineFile,
  type PipelineFile,
} from './pipeline-file.js'

// ============================================================================
// Building blocks
// ============================================================================
export { Converter, ConverterOptionsSchema, type ConverterOptions } from './converter.js'
export {
  DocumentChunker,
  DEFAULT_CHUNKER_OPTIONS,
  estimateTokens,
  classifyChunk,
  type ChunkData,
  type ChunkerOptions,
  type HeadingItem,
} from './chunker.js'
export {
  extractWithSelectors,
  extractReadable,
  type ExtractedContent,
} from './extractor.js'
export * from './payloads.js'
export * from './urls.js'
