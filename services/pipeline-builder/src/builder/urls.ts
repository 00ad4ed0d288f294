/**
 * Identifier helpers shared by seeders, fetchers and generators.
 */

import crypto from 'crypto'
import path from 'path'
import { fileURLToPath, pathToFileURL } from 'url'

export function isHttpUrl(identifier: string): boolean {
  return identifier.startsWith('http://') || identifier.startsWith('https://')
}

export function isFileUrl(identifier: string): boolean {
  return identifier.startsWith('file://')
}

/**
 * Local path for a file identifier (plain path or file:// URL).
 */
export function toLocalPath(identifier: string): string {
  return isFileUrl(identifier) ? fileURLToPath(identifier) : path.resolve(identifier)
}

/**
 * URL an identifier's relative links resolve against, or null if it has none.
 */
export function baseUrlOf(identifier: string): URL | null {
  try {
    if (isHttpUrl(identifier) || isFileUrl(identifier)) return new URL(identifier)
    return pathToFileURL(path.resolve(identifier))
  } catch {
    return null
  }
}

/**
 * Normalize a URL (remove hash, normalize trailing slash)
 */
export function normalizeUrl(url: string): string {
  const urlObj = new URL(url)
  urlObj.hash = ''
  if (urlObj.pathname !== '/' && urlObj.pathname.endsWith('/')) {
    urlObj.pathname = urlObj.pathname.slice(0, -1)
  }
  return urlObj.href
}

/**
 * Form under which an identifier is de-duplicated. http(s) URLs are
 * normalized, local paths and file:// URLs both become absolute paths, and
 * identifiers under any other scheme are kept as given.
 */
export function canonicalIdentifier(identifier: string): string {
  try {
    if (isHttpUrl(identifier)) return normalizeUrl(identifier)
    if (isFileUrl(identifier)) return fileURLToPath(normalizeUrl(identifier))
  } catch {
    return identifier
  }
  // a single letter before the colon is a Windows drive, not a scheme
  if (/^[a-z][a-z\d+.-]+:/i.test(identifier)) return identifier
  return path.resolve(identifier)
}

/**
 * Glob-style path match: `*` any run of characters, `?` one character,
 * anchored at the start of the path.
 */
export function matchPattern(pathname: string, pattern: string): boolean {
  const regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.')
  return new RegExp(`^${regexPattern}`).test(pathname)
}

/**
 * Check if a URL should be crawled based on include/exclude patterns
 */
export function shouldCrawl(
  url: string,
  includePatterns: readonly string[] = [],
  excludePatterns: readonly string[] = []
): boolean {
  let pathname: string
  try {
    pathname = new URL(url).pathname
  } catch {
    return false
  }

  if (excludePatterns.some((pattern) => matchPattern(pathname, pattern))) {
    return false
  }
  if (includePatterns.length > 0) {
    return includePatterns.some((pattern) => matchPattern(pathname, pattern))
  }
  return true
}

/**
 * Short stable hash used in node ids
 */
export function shortHash(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex').substring(0, 16)
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.md': 'text/markdown',
  '.markdown': 'text/markdown',
  '.json': 'application/json',
  '.txt': 'text/plain',
}

/**
 * MIME type guessed from an identifier's extension
 */
export function contentTypeFromExtension(identifier: string): string | undefined {
  let pathname = identifier
  if (isHttpUrl(identifier) || isFileUrl(identifier)) {
    try {
      pathname = new URL(identifier).pathname
    } catch {
      return undefined
    }
  }
  return CONTENT_TYPES[path.extname(pathname).toLowerCase()]
}
