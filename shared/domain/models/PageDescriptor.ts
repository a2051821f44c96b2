/**
 * A documentation page served by DocShelf.
 * Descriptors are fixed at startup and never mutated.
 */
export interface PageDescriptor {
  /** URL the page is fetched from */
  sourceUrl: string;

  /** Stable logical identifier exposed to MCP clients */
  resourceUri: string;

  /** Human-readable page title */
  title: string;

  /** Grouping label (e.g. "How-To", "Reference") */
  category: string;

  /** Short description of the page */
  description: string;
}
