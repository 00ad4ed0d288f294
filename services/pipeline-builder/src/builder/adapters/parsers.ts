import {
  ATOM_TYPES,
  Parser,
  ParserError,
  deriveAtom,
  readPayload,
  type Atom,
} from '@graphweave/core'
import { z } from 'zod'
import { Converter, ConverterOptionsSchema } from '../converter.js'
import {
  DEFAULT_CONTENT_SELECTOR,
  DEFAULT_REMOVE_SELECTORS,
  extractReadable,
  extractWithSelectors,
  type ExtractedContent,
} from '../extractor.js'
import { RawPayloadSchema, type DocumentPayload, type RawPayload } from '../payloads.js'
import { contentTypeFromExtension } from '../urls.js'

export const HtmlParserOptionsSchema = ConverterOptionsSchema.extend({
  contentSelector: z.string().min(1).default(DEFAULT_CONTENT_SELECTOR),
  removeSelectors: z.array(z.string()).default(DEFAULT_REMOVE_SELECTORS),
})

export type HtmlParserOptions = z.infer<typeof HtmlParserOptionsSchema>

/**
 * Shared raw → document step. Subclasses decide how one raw payload becomes
 * a document; atoms of other types are rejected.
 */
abstract class RawDocumentParser<TOptions> extends Parser<TOptions> {
  protected async doTransform(atoms: readonly Atom[]): Promise<Atom[]> {
    return atoms.map((atom) => {
      const raw = readPayload(atom, ATOM_TYPES.RAW, RawPayloadSchema)
      const document = this.parseRaw(raw)
      return deriveAtom(atom, ATOM_TYPES.DOCUMENT, {
        ...document,
        metadata: {
          ...raw.metadata,
          ...document.metadata,
          identifier: raw.identifier,
          depth: raw.depth,
          contentType: raw.contentType ?? null,
        },
      })
    })
  }

  protected abstract parseRaw(raw: RawPayload): DocumentPayload
}

function htmlDocument(extracted: ExtractedContent, converter: Converter): DocumentPayload {
  return {
    title: extracted.title,
    description: extracted.description,
    format: 'md',
    content: converter.convert(extracted.contentHtml),
    metadata: { extraction: extracted.method },
  }
}

/**
 * Selector-based HTML extraction converted to Markdown.
 */
export class HtmlParser extends RawDocumentParser<HtmlParserOptions> {
  readonly name = 'HtmlParser'
  protected readonly optionsSchema = HtmlParserOptionsSchema
  private converter = new Converter()

  protected async setup(options: HtmlParserOptions): Promise<void> {
    this.converter = new Converter(options)
  }

  protected parseRaw(raw: RawPayload): DocumentPayload {
    const extracted = extractWithSelectors(
      raw.content,
      this.options.contentSelector,
      this.options.removeSelectors
    )
    return htmlDocument(extracted, this.converter)
  }
}

/**
 * Mozilla Readability extraction with selector fallback, converted to Markdown.
 */
export class ReadableParser extends RawDocumentParser<z.infer<typeof ConverterOptionsSchema>> {
  readonly name = 'ReadableParser'
  protected readonly optionsSchema = ConverterOptionsSchema
  private converter = new Converter()

  protected async setup(options: z.infer<typeof ConverterOptionsSchema>): Promise<void> {
    this.converter = new Converter(options)
  }

  protected parseRaw(raw: RawPayload): DocumentPayload {
    return htmlDocument(extractReadable(raw.content), this.converter)
  }
}

export type ContentFormat = 'html' | 'markdown' | 'json' | 'text'

/**
 * Format of a raw payload, by content type first, then by extension.
 */
export function detectFormat(raw: RawPayload): ContentFormat {
  const contentType = raw.contentType ?? contentTypeFromExtension(raw.identifier)
  switch (contentType) {
    case 'text/html':
    case 'application/xhtml+xml':
      return 'html'
    case 'text/markdown':
    case 'text/x-markdown':
      return 'markdown'
    case 'application/json':
      return 'json'
    default:
      return /^\s*<(!doctype html|html)[\s>]/i.test(raw.content) ? 'html' : 'text'
  }
}

/**
 * Picks html, markdown, json or plain text handling per resource.
 */
export class AutoParser extends RawDocumentParser<HtmlParserOptions> {
  readonly name = 'AutoParser'
  protected readonly optionsSchema = HtmlParserOptionsSchema
  private converter = new Converter()

  protected async setup(options: HtmlParserOptions): Promise<void> {
    this.converter = new Converter(options)
  }

  protected parseRaw(raw: RawPayload): DocumentPayload {
    const format = detectFormat(raw)
    switch (format) {
      case 'html':
        return htmlDocument(
          extractWithSelectors(raw.content, this.options.contentSelector, this.options.removeSelectors),
          this.converter
        )
      case 'markdown':
        return {
          title: raw.content.match(/^#\s+(.+)$/m)?.[1]?.trim() ?? titleFromIdentifier(raw.identifier),
          format: 'md',
          content: raw.content.trim(),
          metadata: {},
        }
      case 'json':
        return this.parseJson(raw)
      case 'text':
        return {
          title: titleFromIdentifier(raw.identifier),
          format: 'text',
          content: raw.content.trim(),
          metadata: {},
        }
    }
  }

  private parseJson(raw: RawPayload): DocumentPayload {
    let data: unknown
    try {
      data = JSON.parse(raw.content)
    } catch (error) {
      throw new ParserError(this.role, this.name, `Invalid JSON in ${raw.identifier}`, {
        cause: error,
        retryable: false,
      })
    }

    const record = z.union([z.record(z.unknown()), z.array(z.unknown())]).safeParse(data)
    if (!record.success) {
      return {
        title: titleFromIdentifier(raw.identifier),
        format: 'text',
        content: String(data),
        metadata: {},
      }
    }
    return {
      title: titleFromIdentifier(raw.identifier),
      format: 'record',
      content: record.data,
      metadata: {},
    }
  }
}

function titleFromIdentifier(identifier: string): string {
  const last = identifier.replace(/[?#].*$/, '').split(/[\\/]/).filter(Boolean).pop()
  return last ?? identifier
}
