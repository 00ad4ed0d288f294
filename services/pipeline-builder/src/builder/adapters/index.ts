import { ComponentRegistry } from '@graphweave/core'
import { GraphBuilder } from './builders.js'
import { FileFetcher, HttpFetcher } from './fetchers.js'
import { HtmlLinkGenerator } from './generators.js'
import { DocumentChunkMapper } from './mappers.js'
import { AutoParser, HtmlParser, ReadableParser } from './parsers.js'
import { TextCleaner } from './refiners.js'
import { DirectorySeeder, ManifestSeeder, UriSeeder } from './seeders.js'
import { FixedLengthSplitter, MarkdownSplitter } from './splitters.js'
import { ConsoleWriter, JsonFileWriter, JsonlWriter } from './writers.js'

export * from './builders.js'
export * from './fetchers.js'
export * from './generators.js'
export * from './mappers.js'
export * from './parsers.js'
export * from './refiners.js'
export * from './seeders.js'
export * from './splitters.js'
export * from './writers.js'

/**
 * Registry pre-loaded with every built-in adapter. Callers may register more
 * (or override a built-in) on the returned instance.
 */
export function createDefaultRegistry(): ComponentRegistry {
  return new ComponentRegistry()
    .register('seeder', 'uri', (context) => new UriSeeder(context))
    .register('seeder', 'manifest', (context) => new ManifestSeeder(context))
    .register('seeder', 'directory', (context) => new DirectorySeeder(context))
    .register('fetcher', 'file', (context) => new FileFetcher(context))
    .register('fetcher', 'http', (context) => new HttpFetcher(context))
    .register('generator', 'html_link', (context) => new HtmlLinkGenerator(context))
    .register('parser', 'auto', (context) => new AutoParser(context))
    .register('parser', 'html', (context) => new HtmlParser(context))
    .register('parser', 'readable', (context) => new ReadableParser(context))
    .register('refiner', 'text_cleaner', (context) => new TextCleaner(context))
    .register('splitter', 'markdown', (context) => new MarkdownSplitter(context))
    .register('splitter', 'fixed_length', (context) => new FixedLengthSplitter(context))
    .register('mapper', 'document_chunk', (context) => new DocumentChunkMapper(context))
    .register('builder', 'graph', (context) => new GraphBuilder(context))
    .register('writer', 'json_file', (context) => new JsonFileWriter(context))
    .register('writer', 'jsonl', (context) => new JsonlWriter(context))
    .register('writer', 'console', (context) => new ConsoleWriter(context))
}

let defaultRegistry: ComponentRegistry | null = null

export function getDefaultRegistry(): ComponentRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultRegistry()
  }
  return defaultRegistry
}
