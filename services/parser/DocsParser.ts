/**
 * DocsParser
 *
 * Derives the structure of linearized page text: header-delimited sections,
 * fenced code blocks, inline links and a short plain-text summary.
 */

import type { CodeBlock, ContentSection, Link, ParsedDocument } from '../../shared/domain/models/ParsedDocument.js';

export const SUMMARY_MAX_LENGTH = 300;
export const ELLIPSIS = '...';

const HEADER_LINE = /^(#{1,6})\s+(.+)$/;
const HEADER_LINES = /^(#{1,6})\s+(.+)$/gm;
const CODE_BLOCK = /```(\w+)?\n([\s\S]*?)\n```/g;
const LINK = /\[([^\]]+)\]\(([^)]+)\)/g;

/**
 * Slugify a section title.
 * Duplicate titles produce duplicate anchors; callers must not assume uniqueness.
 */
export function generateAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Cut text to at most maxLength characters on a word boundary and append an ellipsis.
 * Text within the limit is returned unchanged.
 */
export function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  let cut = text.slice(0, maxLength);
  if (!/\s/.test(text.charAt(maxLength))) {
    const lastSpace = cut.lastIndexOf(' ');
    if (lastSpace > 0) {
      cut = cut.slice(0, lastSpace);
    }
  }
  return cut.trimEnd() + ELLIPSIS;
}

export class DocsParser {
  /**
   * Parse linearized text into a structured document
   * @param text Text produced by the content extractor
   * @param titleHint Title to use instead of the first section's
   */
  parse(text: string, titleHint: string = ''): ParsedDocument {
    const sections = this.extractSections(text);

    return {
      title: titleHint || sections[0]?.title || '',
      sections,
      codeBlocks: this.extractCodeBlocks(text),
      links: this.extractLinks(text),
      summary: this.generateSummary(text)
    };
  }

  /**
   * Sections whose title or body contains the query, case-insensitively, in document order
   */
  searchContent(document: ParsedDocument, query: string): ContentSection[] {
    const needle = query.toLowerCase();
    return document.sections.filter(section =>
      section.title.toLowerCase().includes(needle) || section.body.toLowerCase().includes(needle)
    );
  }

  /**
   * First section carrying the given anchor
   */
  getSectionByAnchor(document: ParsedDocument, anchor: string): ContentSection | null {
    return document.sections.find(section => section.anchor === anchor) ?? null;
  }

  extractSections(text: string): ContentSection[] {
    const sections: ContentSection[] = [];
    let current: Omit<ContentSection, 'body'> | null = null;
    let bodyLines: string[] = [];

    const finish = (): void => {
      if (current) {
        sections.push({ ...current, body: bodyLines.join('\n').trim() });
      }
    };

    for (const line of text.split('\n')) {
      const header = HEADER_LINE.exec(line);
      if (header) {
        finish();
        const title = header[2].trim();
        current = { title, level: header[1].length, anchor: generateAnchor(title) };
        bodyLines = [];
      } else if (current) {
        bodyLines.push(line);
      }
    }
    finish();

    return sections;
  }

  extractCodeBlocks(text: string): CodeBlock[] {
    return Array.from(text.matchAll(CODE_BLOCK), (match): CodeBlock => {
      const offset = match.index ?? 0;
      const block: CodeBlock = {
        content: match[2],
        startLine: countNewlines(text.slice(0, offset)) + 1
      };
      if (match[1]) {
        block.language = match[1];
      }
      return block;
    });
  }

  extractLinks(text: string): Link[] {
    return Array.from(text.matchAll(LINK), (match): Link => ({
      text: match[1],
      target: match[2],
      isExternal: !match[2].startsWith('#') && !match[2].startsWith('/')
    }));
  }

  generateSummary(text: string): string {
    const clean = text
      .replace(CODE_BLOCK, '')
      .replace(LINK, '$1')
      .replace(HEADER_LINES, '')
      .replace(/\s+/g, ' ')
      .trim();

    return truncateAtWord(clean, SUMMARY_MAX_LENGTH);
  }
}

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}
