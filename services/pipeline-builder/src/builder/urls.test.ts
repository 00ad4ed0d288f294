import { describe, expect, it } from 'vitest'
import path from 'path'
import {
  canonicalIdentifier,
  contentTypeFromExtension,
  isHttpUrl,
  matchPattern,
  normalizeUrl,
  shortHash,
  shouldCrawl,
  toLocalPath,
} from './urls.js'

describe('normalizeUrl', () => {
  it('drops the fragment and a trailing slash', () => {
    expect(normalizeUrl('https://docs.example.com/guide/#install')).toBe(
      'https://docs.example.com/guide'
    )
  })

  it('keeps the root path', () => {
    expect(normalizeUrl('https://docs.example.com/')).toBe('https://docs.example.com/')
  })
})

describe('matchPattern', () => {
  it('treats * as any run of characters', () => {
    expect(matchPattern('/docs/api/auth', '/docs/*')).toBe(true)
    expect(matchPattern('/blog/post', '/docs/*')).toBe(false)
  })

  it('matches regex metacharacters literally', () => {
    expect(matchPattern('/v1.2/notes', '/v1.2/*')).toBe(true)
    expect(matchPattern('/v102/notes', '/v1.2/*')).toBe(false)
  })
})

describe('shouldCrawl', () => {
  const include = ['/docs/*']
  const exclude = ['/docs/internal*']

  it('applies exclude patterns before include patterns', () => {
    expect(shouldCrawl('https://example.com/docs/start', include, exclude)).toBe(true)
    expect(shouldCrawl('https://example.com/docs/internal/keys', include, exclude)).toBe(false)
    expect(shouldCrawl('https://example.com/pricing', include, exclude)).toBe(false)
  })

  it('accepts everything without patterns', () => {
    expect(shouldCrawl('https://example.com/anything')).toBe(true)
  })

  it('rejects strings that are not URLs', () => {
    expect(shouldCrawl('not a url')).toBe(false)
  })
})

describe('identifier helpers', () => {
  it('guesses content types from the path extension', () => {
    expect(contentTypeFromExtension('https://example.com/page.HTML?ref=nav')).toBe('text/html')
    expect(contentTypeFromExtension('notes/readme.md')).toBe('text/markdown')
    expect(contentTypeFromExtension('LICENSE')).toBeUndefined()
  })

  it('maps file URLs to local paths', () => {
    expect(toLocalPath('file:///tmp/site/index.html')).toBe('/tmp/site/index.html')
  })

  it('recognizes http identifiers', () => {
    expect(isHttpUrl('https://example.com')).toBe(true)
    expect(isHttpUrl('ftp://example.com')).toBe(false)
  })

  it('produces stable 16 character hashes', () => {
    expect(shortHash('https://example.com')).toMatch(/^[0-9a-f]{16}$/)
    expect(shortHash('https://example.com')).toBe(shortHash('https://example.com'))
    expect(shortHash('a')).not.toBe(shortHash('b'))
  })
})

describe('canonicalIdentifier', () => {
  it('drops trailing slashes and fragments from web URLs', () => {
    expect(canonicalIdentifier('https://example.com/docs/')).toBe('https://example.com/docs')
    expect(canonicalIdentifier('https://example.com/docs#intro')).toBe('https://example.com/docs')
  })

  it('maps file URLs and relative paths to the same absolute path', () => {
    const absolute = path.resolve('site/a.html')

    expect(canonicalIdentifier('site/a.html')).toBe(absolute)
    expect(canonicalIdentifier('./site/../site/a.html')).toBe(absolute)
    expect(canonicalIdentifier('file:///tmp/site/a.html#top')).toBe('/tmp/site/a.html')
  })

  it('keeps identifiers under other schemes as given', () => {
    expect(canonicalIdentifier('urn:isbn:0451450523')).toBe('urn:isbn:0451450523')
  })
})
