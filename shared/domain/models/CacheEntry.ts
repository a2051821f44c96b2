/**
 * Metadata recorded for every fetched page
 */
export interface PageMetadata {
  /** Title taken from the page's <title> element */
  title: string;

  /** URL the content was fetched from */
  sourceUrl: string;

  /** When the page was fetched */
  fetchedAt: Date;

  /** Length of the extracted text content */
  contentLength: number;
}

/**
 * A cached fetch result as held in memory
 */
export interface CacheEntry {
  sourceUrl: string;
  content: string;
  metadata: PageMetadata;
  cachedAt: Date;
}

/**
 * Result of loading a page, either from the cache or from the network
 */
export interface PageContent {
  content: string;
  metadata: PageMetadata;
  fromCache: boolean;
}
