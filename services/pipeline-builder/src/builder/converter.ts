/**
 * Converter - HTML to Markdown conversion
 *
 * Responsibilities:
 * - Convert extracted HTML to clean Markdown
 * - Apply custom conversion rules for code blocks, media, etc.
 * - Normalize output Markdown format
 *
 * Does NOT handle:
 * - Fetching (handled by fetchers)
 * - Content extraction (handled by parsers)
 * - Chunking (handled by splitters)
 */

import TurndownService from 'turndown';
import { z } from 'zod';

export const ConverterOptionsSchema = z.object({
  /** Heading style: 'atx' (#) or 'setext' (underline) */
  headingStyle: z.enum(['atx', 'setext']).default('atx'),
  /** Code block style: 'fenced' (```) or 'indented' */
  codeBlockStyle: z.enum(['fenced', 'indented']).default('fenced'),
  /** Bullet list marker: '-', '+', or '*' */
  bulletListMarker: z.enum(['-', '+', '*']).default('-'),
  /** Emphasis delimiter: '*' or '_' */
  emDelimiter: z.enum(['*', '_']).default('*'),
  /** Whether to remove images */
  removeImages: z.boolean().default(true),
  /** Whether to remove media (video, audio, iframe) */
  removeMedia: z.boolean().default(true),
});

export type ConverterOptions = z.infer<typeof ConverterOptionsSchema>;

/**
 * Converter - converts HTML to Markdown
 */
export class Converter {
  private turndown: TurndownService;
  private config: ConverterOptions;

  constructor(config: Partial<ConverterOptions> = {}) {
    this.config = ConverterOptionsSchema.parse(config);
    this.turndown = this.createTurndownService();
  }

  /**
   * Convert HTML content to Markdown
   */
  convert(html: string): string {
    const markdown = this.turndown.turndown(html);
    return this.normalize(markdown);
  }

  /**
   * Normalize Markdown content
   * - Collapse multiple blank lines
   * - Remove trailing whitespace
   * - Trim start/end
   */
  private normalize(content: string): string {
    return content
      .replace(/\n{3,}/g, '\n\n')
      .replace(/[ \t]+$/gm, '')
      .trim();
  }

  private createTurndownService(): TurndownService {
    const turndown = new TurndownService({
      headingStyle: this.config.headingStyle,
      codeBlockStyle: this.config.codeBlockStyle,
      bulletListMarker: this.config.bulletListMarker,
      emDelimiter: this.config.emDelimiter,
    });

    // Code blocks - preserve language hints
    turndown.addRule('codeBlock', {
      filter: (node) => node.nodeName === 'PRE' && node.querySelector('code') !== null,
      replacement: (_content, node) => {
        const codeNode = node.querySelector('code');
        const language = codeNode?.className.match(/language-(\w+)/)?.[1] ?? '';
        const code = codeNode?.textContent ?? '';
        return `\n\`\`\`${language}\n${code.replace(/\n$/, '')}\n\`\`\`\n`;
      },
    });

    turndown.addRule('paragraph', {
      filter: 'p',
      replacement: (content) => `\n\n${content}\n\n`,
    });

    turndown.addRule('div', {
      filter: 'div',
      replacement: (content) => (content ? `\n${content}\n` : ''),
    });

    if (this.config.removeImages) {
      turndown.addRule('removeImages', {
        filter: (node) => ['IMG', 'PICTURE', 'FIGURE', 'SVG'].includes(node.nodeName),
        replacement: () => '',
      });
    }

    if (this.config.removeMedia) {
      turndown.addRule('removeMedia', {
        filter: (node) => ['VIDEO', 'AUDIO', 'IFRAME', 'CANVAS'].includes(node.nodeName),
        replacement: () => '',
      });
    }

    return turndown;
  }
}
