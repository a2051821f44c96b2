/**
 * Structured representation of a documentation page after parsing
 */

/**
 * A section of content introduced by a header line
 */
export interface ContentSection {
  /** Header text */
  title: string;

  /** Text between this header and the next one, trimmed */
  body: string;

  /** Header level (1-6) */
  level: number;

  /** Slug derived from the title; not unique across a document */
  anchor: string;
}

/**
 * A fenced code block
 */
export interface CodeBlock {
  /** Language tag following the opening fence, if any */
  language?: string;

  /** Code between the fences */
  content: string;

  /** 1-based line of the opening fence */
  startLine: number;
}

/**
 * An inline markdown link
 */
export interface Link {
  text: string;
  target: string;

  /** False for in-page (#) and site-relative (/) targets */
  isExternal: boolean;
}

export interface ParsedDocument {
  title: string;
  sections: ContentSection[];
  codeBlocks: CodeBlock[];
  links: Link[];

  /** Plain-text summary, at most 300 characters before the ellipsis */
  summary: string;
}
