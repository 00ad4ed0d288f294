import * as cheerio from 'cheerio'
import type { CheerioAPI } from 'cheerio'
import { Readability } from '@mozilla/readability'
import { parseHTML } from 'linkedom'
import { z } from 'zod'

/**
 * Content pulled out of an HTML page, before Markdown conversion
 */
export interface ExtractedContent {
  title: string
  description?: string
  contentHtml: string
  contentText: string
  /** How the main content was located */
  method: 'selector' | 'readability' | 'fallback'
}

export const DEFAULT_CONTENT_SELECTOR = 'article, main, [role="main"], .content, #content, body'

/**
 * Default elements to remove
 */
export const DEFAULT_REMOVE_SELECTORS = [
  'nav',
  'footer',
  'header',
  'aside',
  '.sidebar',
  '.toc',
  'script',
  'style',
  'noscript',
  'iframe',
  '[aria-hidden="true"]',
  '[hidden]',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
]

/**
 * Selector-based extraction: strip noise, then take the first element
 * matching `contentSelector` (a comma list is tried in order).
 */
export function extractWithSelectors(
  html: string,
  contentSelector: string = DEFAULT_CONTENT_SELECTOR,
  removeSelectors: readonly string[] = DEFAULT_REMOVE_SELECTORS
): ExtractedContent {
  const $ = cheerio.load(html)
  const { title, description } = extractMetadata($)

  for (const selector of removeSelectors) {
    $(selector).remove()
  }

  for (const selector of contentSelector.split(',').map((s) => s.trim()).filter(Boolean)) {
    const $el = $(selector).first()
    if ($el.length) {
      return {
        title: title || $el.find('h1').first().text().trim() || 'Untitled',
        description,
        contentHtml: $el.html() ?? '',
        contentText: $el.text().trim(),
        method: 'selector',
      }
    }
  }

  const root = $.root()
  return {
    title: title || 'Untitled',
    description,
    contentHtml: root.html() ?? '',
    contentText: root.text().trim(),
    method: 'fallback',
  }
}

/**
 * Mozilla Readability over a linkedom document, falling back to selector
 * extraction when Readability finds no article.
 */
export function extractReadable(html: string, minTextLength = 100): ExtractedContent {
  const $ = cheerio.load(html)
  const metadata = extractMetadata($)

  const { document } = parseHTML(html)
  const article = new Readability(document, { keepClasses: false, charThreshold: minTextLength }).parse()

  if (!article?.content || (article.textContent ?? '').length < minTextLength) {
    const fallback = extractWithSelectors(html)
    return { ...fallback, method: 'fallback' }
  }

  return {
    title: article.title || metadata.title || 'Untitled',
    description: metadata.description || article.excerpt || undefined,
    contentHtml: article.content,
    contentText: article.textContent ?? '',
    method: 'readability',
  }
}

const JsonLdEntitySchema = z
  .object({
    '@type': z.union([z.string(), z.array(z.string())]).optional(),
    headline: z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough()

const ARTICLE_TYPES = new Set([
  'Article',
  'WebPage',
  'BlogPosting',
  'NewsArticle',
  'TechArticle',
  'HowTo',
])

/**
 * Title and description from JSON-LD, OpenGraph, then plain tags
 */
export function extractMetadata($: CheerioAPI): { title: string; description?: string } {
  let title: string | undefined
  let description: string | undefined

  $('script[type="application/ld+json"]').each((_, el) => {
    const entities = parseJsonLd($(el).html())
    for (const entity of entities) {
      const types = Array.isArray(entity['@type']) ? entity['@type'] : [entity['@type']]
      if (!types.some((type) => type !== undefined && ARTICLE_TYPES.has(type))) continue
      title = title || entity.headline || entity.name
      description = description || entity.description
    }
  })

  title =
    title ||
    $('meta[property="og:title"]').attr('content') ||
    $('title').first().text().trim() ||
    $('h1').first().text().trim()
  description =
    description ||
    $('meta[property="og:description"]').attr('content') ||
    $('meta[name="description"]').attr('content')

  return { title: title ?? '', description: description || undefined }
}

function parseJsonLd(text: string | null): z.infer<typeof JsonLdEntitySchema>[] {
  if (!text) return []
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    // Invalid JSON, skip
    return []
  }

  const items = Array.isArray(json) ? json : [json]
  const entities: z.infer<typeof JsonLdEntitySchema>[] = []
  for (const item of items) {
    const graph = z.object({ '@graph': z.array(z.unknown()) }).safeParse(item)
    for (const candidate of graph.success ? graph.data['@graph'] : [item]) {
      const parsed = JsonLdEntitySchema.safeParse(candidate)
      if (parsed.success) entities.push(parsed.data)
    }
  }
  return entities
}
