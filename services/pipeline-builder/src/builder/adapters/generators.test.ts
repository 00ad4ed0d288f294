import { Logger, type FetchedResource } from '@graphweave/core'
import { describe, expect, it } from 'vitest'
import { HtmlLinkGenerator } from './generators.js'

const quiet = new Logger('error', () => {})

const PAGE = `
<a href="/docs/install#step-2">Install</a>
<a href="guide/">Guide</a>
<a href="https://other.dev/x">Elsewhere</a>
<a href="/logo.png">Logo</a>
<a href="mailto:team@example.com">Mail</a>
<a href="#top">Top</a>
<a href="/docs/install">Install again</a>
<a href="/blog/news">News</a>
`

function page(content: string, contentType = 'text/html'): FetchedResource {
  return { identifier: 'https://example.com/docs/start', content, contentType, metadata: {} }
}

describe('HtmlLinkGenerator', () => {
  it('keeps same-host page links that match the include patterns', async () => {
    const generator = new HtmlLinkGenerator({ logger: quiet })
    await generator.initialize({ includePatterns: ['/docs/*'] })

    expect(await generator.generate(page(PAGE))).toEqual([
      'https://example.com/docs/install',
      'https://example.com/docs/guide',
    ])
  })

  it('follows external hosts when allowed', async () => {
    const generator = new HtmlLinkGenerator({ logger: quiet })
    await generator.initialize({ followExternal: true, excludePatterns: ['/docs/*'] })

    expect(await generator.generate(page(PAGE))).toEqual([
      'https://other.dev/x',
      'https://example.com/blog/news',
    ])
  })

  it('ignores resources that are not html', async () => {
    const generator = new HtmlLinkGenerator({ logger: quiet })
    await generator.initialize()

    expect(await generator.generate(page('[a](/docs/x)', 'text/markdown'))).toEqual([])
  })
})
