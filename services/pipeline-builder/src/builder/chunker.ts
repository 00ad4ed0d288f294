import type { SemanticType } from './payloads.js'

export interface ChunkerOptions {
  chunkSize: number // Target tokens per chunk
  chunkOverlap: number // Overlap words carried into the next chunk
  minChunkSize: number // Smaller trailing pieces merge into the previous chunk
  splitHeadingLevel: number // Only split at this heading level (1=H1, 2=H2, etc.)
}

export interface HeadingItem {
  level: number
  text: string
}

export interface ChunkData {
  content: string
  chunkIndex: number
  startChar: number
  endChar: number
  heading: string
  headingHierarchy: HeadingItem[]
  tokenCount: number
  semanticType: SemanticType
}

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
  chunkSize: 2000,
  chunkOverlap: 50,
  minChunkSize: 100,
  splitHeadingLevel: 2,
}

interface Section {
  content: string
  heading: string
  headingHierarchy: HeadingItem[]
  startChar: number
}

/**
 * Heading-aware Markdown chunker. Sections split at `splitHeadingLevel`;
 * sections over `chunkSize` tokens split again on paragraph boundaries,
 * keeping fenced code blocks whole.
 */
export class DocumentChunker {
  private options: ChunkerOptions

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = { ...DEFAULT_CHUNKER_OPTIONS, ...options }
  }

  /**
   * Split a markdown document into chunks
   */
  chunk(content: string): ChunkData[] {
    if (content.trim() === '') return []

    const contentTokens = estimateTokens(content)
    if (contentTokens <= this.options.chunkSize) {
      const h1 = firstHeading(content, 1)
      return [
        {
          content: content.trim(),
          chunkIndex: 0,
          startChar: 0,
          endChar: content.length,
          heading: h1 ?? '',
          headingHierarchy: h1 ? [{ level: 1, text: h1 }] : [],
          tokenCount: contentTokens,
          semanticType: classifyChunk(content),
        },
      ]
    }

    const chunks: ChunkData[] = []
    for (const section of this.splitByHeadings(content)) {
      chunks.push(...this.chunkSection(section, chunks.length))
    }
    return chunks
  }

  /**
   * Split content by markdown headings at the specified level
   */
  private splitByHeadings(content: string): Section[] {
    const splitLevel = this.options.splitHeadingLevel
    const headingPattern = new RegExp(`^(#{1,${splitLevel}})\\s+(.+)$`, 'gm')
    const headingStack: HeadingItem[] = []

    const splitPositions: number[] = []
    let match: RegExpExecArray | null
    while ((match = headingPattern.exec(content)) !== null) {
      if (match[1]?.length === splitLevel) {
        splitPositions.push(match.index)
      }
    }
    splitPositions.push(content.length)

    const sections: Section[] = []
    let scanFrom = 0

    for (let i = 0; i < splitPositions.length - 1; i++) {
      const start = splitPositions[i] ?? 0
      const end = splitPositions[i + 1] ?? content.length
      const sectionContent = content.substring(start, end)

      // Headings above the split level never start a section but still nest it
      for (const outer of headingsAbove(content.substring(scanFrom, start), splitLevel)) {
        popTo(headingStack, outer.level)
        headingStack.push(outer)
      }
      scanFrom = start

      const firstLine = sectionContent.match(/^(#{1,6})\s+(.+)$/m)
      const heading = firstLine?.[2]?.trim() ?? ''
      const level = firstLine?.[1]?.length ?? splitLevel

      popTo(headingStack, level)
      if (heading) headingStack.push({ level, text: heading })

      sections.push({
        content: sectionContent,
        heading,
        headingHierarchy: headingStack.map((h) => ({ ...h })),
        startChar: start,
      })
    }

    // Content before the first split-level heading
    const firstSplit = splitPositions[0] ?? 0
    if (firstSplit > 0) {
      const intro = content.substring(0, firstSplit)
      if (intro.trim()) {
        const h1 = firstHeading(intro, 1)
        sections.unshift({
          content: intro,
          heading: h1 ?? '',
          headingHierarchy: h1 ? [{ level: 1, text: h1 }] : [],
          startChar: 0,
        })
      }
    }

    return sections
  }

  /**
   * Chunk a single section
   */
  private chunkSection(section: Section, startIndex: number): ChunkData[] {
    const tokens = estimateTokens(section.content)
    const base = {
      heading: section.heading,
      headingHierarchy: section.headingHierarchy,
    }

    if (tokens <= this.options.chunkSize) {
      return [
        {
          ...base,
          content: section.content.trim(),
          chunkIndex: startIndex,
          startChar: section.startChar,
          endChar: section.startChar + section.content.length,
          tokenCount: tokens,
          semanticType: classifyChunk(section.content),
        },
      ]
    }

    const paragraphs = splitParagraphs(section.content)
    const chunks: ChunkData[] = []

    let currentChunk = ''
    let currentTokens = 0
    let chunkStartChar = section.startChar
    let charOffset = 0

    for (const paragraph of paragraphs) {
      const paraTokens = estimateTokens(paragraph)

      if (currentTokens + paraTokens > this.options.chunkSize && currentChunk) {
        chunks.push({
          ...base,
          content: currentChunk.trim(),
          chunkIndex: startIndex + chunks.length,
          startChar: chunkStartChar,
          endChar: section.startChar + charOffset,
          tokenCount: currentTokens,
          semanticType: classifyChunk(currentChunk),
        })

        const overlap = this.getOverlapText(currentChunk)
        currentChunk = overlap + paragraph
        currentTokens = estimateTokens(currentChunk)
        chunkStartChar = section.startChar + charOffset - overlap.length
      } else {
        currentChunk += paragraph
        currentTokens += paraTokens
      }

      charOffset += paragraph.length
    }

    if (currentChunk.trim()) {
      const finalTokens = estimateTokens(currentChunk)
      const lastChunk = chunks[chunks.length - 1]

      if (finalTokens >= this.options.minChunkSize || !lastChunk) {
        chunks.push({
          ...base,
          content: currentChunk.trim(),
          chunkIndex: startIndex + chunks.length,
          startChar: chunkStartChar,
          endChar: section.startChar + section.content.length,
          tokenCount: finalTokens,
          semanticType: classifyChunk(currentChunk),
        })
      } else {
        // Small final chunk: merge into previous chunk to avoid losing content
        lastChunk.content = `${lastChunk.content}\n\n${currentChunk.trim()}`
        lastChunk.endChar = section.startChar + section.content.length
        lastChunk.tokenCount = estimateTokens(lastChunk.content)
      }
    }

    return chunks
  }

  /**
   * Get overlap text from the end of a chunk
   */
  private getOverlapText(text: string): string {
    if (this.options.chunkOverlap <= 0) return ''
    const words = text.trim().split(/\s+/)
    return words.slice(-this.options.chunkOverlap).join(' ') + ' '
  }
}

/**
 * Estimate token count (rough approximation)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

/**
 * Dominant block kind of a piece of Markdown.
 */
export function classifyChunk(content: string): SemanticType {
  const lines = content
    .trim()
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
  if (lines.length === 0) return 'text'

  const body = /^#{1,6}\s/.test(lines[0] ?? '') ? lines.slice(1) : lines
  if (body.length === 0) return 'heading'

  if ((body[0] ?? '').startsWith('```')) return 'code_block'
  if (body.every((line) => line.startsWith('|'))) return 'table'
  if (body.every((line) => /^([-*+]|\d+\.)\s/.test(line))) return 'list_item'
  return 'text'
}

function firstHeading(content: string, level: number): string | undefined {
  const match = content.match(new RegExp(`^#{${level}}\\s+(.+)$`, 'm'))
  return match?.[1]?.trim()
}

function headingsAbove(text: string, splitLevel: number): HeadingItem[] {
  const pattern = /^(#{1,6})\s+(.+)$/gm
  const found: HeadingItem[] = []
  let match: RegExpExecArray | null
  while ((match = pattern.exec(text)) !== null) {
    const level = match[1]?.length ?? splitLevel
    if (level < splitLevel) {
      found.push({ level, text: (match[2] ?? '').trim() })
    }
  }
  return found
}

function popTo(stack: HeadingItem[], level: number): void {
  while (stack.length > 0 && (stack[stack.length - 1]?.level ?? 0) >= level) {
    stack.pop()
  }
}

/**
 * Split content into paragraphs while preserving code blocks
 */
function splitParagraphs(content: string): string[] {
  const codeBlocks: string[] = []
  const protectedContent = content.replace(/```[\s\S]*?```/g, (match) => {
    codeBlocks.push(match)
    return `__CODE_BLOCK_${codeBlocks.length - 1}__`
  })

  return protectedContent
    .split(/\n\s*\n/)
    .map((p) => p + '\n\n')
    .map((para) =>
      para.replace(/__CODE_BLOCK_(\d+)__/g, (_, index: string) => codeBlocks[Number(index)] ?? '')
    )
}
