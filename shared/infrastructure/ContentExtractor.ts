/**
 * Content extraction utilities for DocShelf
 *
 * Linearizes an HTML page into markdown-like text: header lines, paragraphs,
 * fenced code and list items, in document order.
 */

import { JSDOM } from 'jsdom';
import { getLogger } from './logging.js';

/**
 * Selectors tried in order when looking for the main content element;
 * <body> is used when none match.
 */
export const CONTENT_ROOT_SELECTORS = ['main', '.content', 'article', '[role="main"]', '.markdown-body'];

export const UNTITLED = 'Untitled';

/**
 * Result of content extraction
 */
export interface ContentExtractionResult {
  /** Trimmed <title> text, or "Untitled" when the page has no <title> */
  title: string;

  /** Linearized text content; empty when nothing was recognised */
  content: string;
}

/**
 * Block-level nodes the extractor renders
 */
export type BlockNode =
  | { kind: 'heading'; level: number; text: string }
  | { kind: 'paragraph'; text: string }
  | { kind: 'code'; language?: string; text: string }
  | { kind: 'list'; items: string[] };

const HEADING_TAGS: Record<string, number> = { H1: 1, H2: 2, H3: 3, H4: 4, H5: 5, H6: 6 };
const LANGUAGE_CLASS = /^(?:language|lang)-(\w+)$/;

function normalizedText(element: Element): string {
  return (element.textContent ?? '').replace(/\s+/g, ' ').trim();
}

function languageOf(element: Element): string | undefined {
  const candidates = [element];
  if (element.tagName === 'PRE') {
    const inner = Array.from(element.children).find(child => child.tagName === 'CODE');
    if (inner) candidates.push(inner);
  }

  for (const candidate of candidates) {
    for (const className of Array.from(candidate.classList)) {
      const match = LANGUAGE_CLASS.exec(className);
      if (match) {
        return match[1];
      }
    }
  }
  return undefined;
}

/**
 * Classify an element as one of the rendered block kinds
 * @returns The block, or null for elements that are not rendered
 */
export function classifyElement(element: Element): BlockNode | null {
  const tag = element.tagName;

  if (tag in HEADING_TAGS) {
    return { kind: 'heading', level: HEADING_TAGS[tag], text: normalizedText(element) };
  }

  switch (tag) {
    case 'P':
      return { kind: 'paragraph', text: normalizedText(element) };
    case 'CODE':
    case 'PRE':
      return { kind: 'code', language: languageOf(element), text: (element.textContent ?? '').trim() };
    case 'UL':
    case 'OL':
      return {
        kind: 'list',
        items: Array.from(element.children)
          .filter(child => child.tagName === 'LI')
          .map(normalizedText)
      };
    default:
      return null;
  }
}

/**
 * Render a block as output lines (blank separator included)
 */
export function renderBlock(block: BlockNode): string[] {
  switch (block.kind) {
    case 'heading':
      return block.text ? [`${'#'.repeat(block.level)} ${block.text}`, ''] : [];
    case 'paragraph':
      return block.text ? [block.text, ''] : [];
    case 'code':
      return block.text ? ['```' + (block.language ?? ''), block.text, '```', ''] : [];
    case 'list':
      return [...block.items.filter(item => item.length > 0).map(item => `- ${item}`), ''];
  }
}

/**
 * Collapse runs of blank lines to one and trim the result
 */
export function collapseBlankLines(lines: string[]): string {
  const result: string[] = [];
  let previousBlank = false;

  for (const line of lines) {
    const blank = line.trim() === '';
    if (blank && previousBlank) {
      continue;
    }
    result.push(blank ? '' : line);
    previousBlank = blank;
  }

  return result.join('\n').trim();
}

/**
 * Find the element whose descendants are linearized
 */
export function findContentRoot(document: Document): Element | null {
  for (const selector of CONTENT_ROOT_SELECTORS) {
    const element = document.querySelector(selector);
    if (element) {
      return element;
    }
  }
  return document.body;
}

/**
 * Linearize the descendants of an element in document order
 */
export function linearize(root: Element | null): string {
  if (!root) {
    return '';
  }

  const lines: string[] = [];
  for (const element of Array.from(root.querySelectorAll('*'))) {
    const block = classifyElement(element);
    if (block) {
      lines.push(...renderBlock(block));
    }
  }
  return collapseBlankLines(lines);
}

/**
 * Extract title and linearized content from an HTML document.
 * Never throws; unparsable input yields empty content.
 * @param html HTML content
 * @param url URL of the document, used for logging
 */
export function extractContent(html: string, url: string): ContentExtractionResult {
  const context = 'ContentExtractor';
  const logger = getLogger();

  try {
    const dom = new JSDOM(html);
    const document = dom.window.document;

    const title = document.querySelector('title')?.textContent?.trim() ?? UNTITLED;
    const content = linearize(findContentRoot(document));

    logger.debug(`Extracted ${content.length} chars from ${url}`, context);
    return { title, content };
  } catch (error) {
    logger.warn(`Failed to extract content from ${url}`, context, error);
    return { title: UNTITLED, content: '' };
  }
}
