import type { IPageFetcher } from '../../fetcher/DocsFetcher.js';
import { FetchNetworkError } from '../../../shared/domain/errors.js';
import type { PageContent } from '../../../shared/domain/models/CacheEntry.js';
import type { PageDescriptor } from '../../../shared/domain/models/PageDescriptor.js';

/**
 * Page fetcher serving fixed text per source URL.
 * URLs listed in `failing` reject with a network error.
 */
export class MockPageFetcher implements IPageFetcher {
  readonly contents = new Map<string, string>();
  readonly failing = new Set<string>();
  readonly calls: Array<{ method: 'get' | 'refresh'; url: string }> = [];

  async getPageContent(page: PageDescriptor): Promise<PageContent> {
    this.calls.push({ method: 'get', url: page.sourceUrl });
    return this.respond(page);
  }

  async refreshCache(page: PageDescriptor): Promise<PageContent> {
    this.calls.push({ method: 'refresh', url: page.sourceUrl });
    return this.respond(page);
  }

  private respond(page: PageDescriptor): PageContent {
    const content = this.contents.get(page.sourceUrl);
    if (content === undefined || this.failing.has(page.sourceUrl)) {
      throw new FetchNetworkError(page.sourceUrl, new Error('connection refused'));
    }
    return {
      content,
      metadata: {
        title: page.title,
        sourceUrl: page.sourceUrl,
        fetchedAt: new Date('2024-05-01T12:00:00.000Z'),
        contentLength: content.length
      },
      fromCache: false
    };
  }
}

export const BALANCES_PAGE: PageDescriptor = {
  sourceUrl: 'https://docs.example.com/balances',
  resourceUri: 'docs://guides/balances',
  title: 'Getting Balances',
  category: 'How-To',
  description: 'Reading balances'
};

export const FAQ_PAGE: PageDescriptor = {
  sourceUrl: 'https://docs.example.com/faq',
  resourceUri: 'docs://reference/faq',
  title: 'FAQ',
  category: 'Reference',
  description: 'Common questions'
};

export const BALANCES_TEXT = '# Balances\nUse getBalance to read a balance.\n## Errors\nRetry later.';
export const FAQ_TEXT = '# FAQ\nAsk anything.';

/**
 * Fetcher preloaded with both sample pages
 */
export function createMockFetcher(): MockPageFetcher {
  const fetcher = new MockPageFetcher();
  fetcher.contents.set(BALANCES_PAGE.sourceUrl, BALANCES_TEXT);
  fetcher.contents.set(FAQ_PAGE.sourceUrl, FAQ_TEXT);
  return fetcher;
}
