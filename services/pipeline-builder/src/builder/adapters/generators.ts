import * as cheerio from 'cheerio'
import { Generator, type FetchedResource } from '@graphweave/core'
import { z } from 'zod'
import { baseUrlOf, contentTypeFromExtension, normalizeUrl, shouldCrawl } from '../urls.js'

export const HtmlLinkGeneratorOptionsSchema = z.object({
  includePatterns: z.array(z.string()).default([]),
  excludePatterns: z.array(z.string()).default([]),
  followExternal: z.boolean().default(false),
})

export type HtmlLinkGeneratorOptions = z.infer<typeof HtmlLinkGeneratorOptionsSchema>

const RESOURCE_EXTENSIONS = /\.(pdf|jpg|jpeg|png|gif|svg|webp|ico|css|js|zip|tar|gz|mp4|mp3)$/i

/**
 * Discovers follow-up identifiers from the anchors of an HTML resource.
 * Links are resolved, stripped of their fragment and filtered by host and
 * include/exclude path patterns.
 */
export class HtmlLinkGenerator extends Generator<HtmlLinkGeneratorOptions> {
  readonly name = 'HtmlLinkGenerator'
  protected readonly optionsSchema = HtmlLinkGeneratorOptionsSchema

  protected async doGenerate(resource: FetchedResource): Promise<string[]> {
    const contentType = resource.contentType ?? contentTypeFromExtension(resource.identifier)
    if (contentType !== 'text/html') return []

    const base = baseUrlOf(resource.identifier)
    if (!base) return []

    const $ = cheerio.load(resource.content)
    const links: string[] = []
    const seen = new Set<string>()

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href')
      if (!href) return

      const link = this.resolveLink(href, base)
      if (link && !seen.has(link)) {
        seen.add(link)
        links.push(link)
      }
    })

    this.logger.debug(`[${this.name}] ${links.length} links from ${resource.identifier}`)
    return links
  }

  private resolveLink(href: string, base: URL): string | null {
    let url: URL
    try {
      url = new URL(href, base)
    } catch {
      return null
    }

    if (url.protocol !== base.protocol) return null
    if (url.protocol !== 'http:' && url.protocol !== 'https:' && url.protocol !== 'file:') {
      return null
    }
    if (!this.options.followExternal && url.host !== base.host) return null
    if (RESOURCE_EXTENSIONS.test(url.pathname)) return null

    const normalized = normalizeUrl(url.href)
    if (normalized === normalizeUrl(base.href)) return null

    return shouldCrawl(normalized, this.options.includePatterns, this.options.excludePatterns)
      ? normalized
      : null
  }
}
