/**
 * DocsFetcher
 *
 * Loads documentation pages: cache first, then HTTP on a miss, extracting
 * the HTML into linear text and persisting the result.
 */

import type { PageContent, PageMetadata } from '../../shared/domain/models/CacheEntry.js';
import type { PageDescriptor } from '../../shared/domain/models/PageDescriptor.js';
import type { ICacheStore } from '../../shared/domain/repositories/CacheStore.js';
import { type ContentExtractionResult, extractContent } from '../../shared/infrastructure/ContentExtractor.js';
import type { IHttpClient } from '../../shared/infrastructure/HttpClient.js';
import { type Logger, getLogger } from '../../shared/infrastructure/logging.js';

export type HtmlExtractor = (html: string, url: string) => ContentExtractionResult;

/**
 * Page loading as seen by the resource layer
 */
export interface IPageFetcher {
  getPageContent(page: PageDescriptor): Promise<PageContent>;
  refreshCache(page: PageDescriptor): Promise<PageContent>;
}

export interface DocsFetcherOptions {
  cacheStore: ICacheStore;
  httpClient: IHttpClient;
  extractor?: HtmlExtractor;
  now?: () => Date;
  logger?: Logger;
}

export class DocsFetcher implements IPageFetcher {
  private readonly cacheStore: ICacheStore;
  private readonly httpClient: IHttpClient;
  private readonly extractor: HtmlExtractor;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: DocsFetcherOptions) {
    this.cacheStore = options.cacheStore;
    this.httpClient = options.httpClient;
    this.extractor = options.extractor ?? extractContent;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Get page content, using the cache when it holds a fresh entry
   * @throws FetchError when the page has to be fetched and the fetch fails
   */
  async getPageContent(page: PageDescriptor): Promise<PageContent> {
    const cached = await this.cacheStore.load(page.sourceUrl);
    if (cached) {
      this.logger.debug(`Serving ${page.resourceUri} from cache`, 'DocsFetcher.getPageContent');
      return {
        content: cached.content,
        metadata: cached.metadata,
        fromCache: true
      };
    }

    return this.fetchAndStore(page);
  }

  /**
   * Fetch a page from its source regardless of the cache, then re-cache it
   * @throws FetchError when the fetch fails
   */
  async refreshCache(page: PageDescriptor): Promise<PageContent> {
    this.logger.info(`Refreshing ${page.resourceUri}`, 'DocsFetcher.refreshCache');
    return this.fetchAndStore(page);
  }

  private async fetchAndStore(page: PageDescriptor): Promise<PageContent> {
    const { content, metadata } = await this.fetchPageContent(page.sourceUrl);

    try {
      await this.cacheStore.save(page.sourceUrl, content, metadata);
    } catch (error: unknown) {
      // The caller already has the content; a failed write only costs a refetch later
      this.logger.warn(`Failed to cache ${page.sourceUrl}`, 'DocsFetcher.fetchAndStore', error);
    }

    return { content, metadata, fromCache: false };
  }

  private async fetchPageContent(url: string): Promise<{ content: string; metadata: PageMetadata }> {
    this.logger.info(`Fetching ${url}`, 'DocsFetcher.fetchPageContent');
    const response = await this.httpClient.get(url);
    const { title, content } = this.extractor(response.body, url);

    this.logger.debug(`Fetched ${url} in ${response.timeTaken}ms (${content.length} chars)`, 'DocsFetcher.fetchPageContent');

    return {
      content,
      metadata: {
        title,
        sourceUrl: url,
        fetchedAt: this.now(),
        contentLength: content.length
      }
    };
  }
}
