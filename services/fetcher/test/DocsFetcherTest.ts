import { beforeEach, describe, expect, it } from 'vitest';
import { DocsFetcher } from '../DocsFetcher.js';
import { FetchHttpError, FileSystemError } from '../../../shared/domain/errors.js';
import type { CacheEntry, PageMetadata } from '../../../shared/domain/models/CacheEntry.js';
import type { PageDescriptor } from '../../../shared/domain/models/PageDescriptor.js';
import type { ICacheStore } from '../../../shared/domain/repositories/CacheStore.js';
import type { HttpResponse, IHttpClient } from '../../../shared/infrastructure/HttpClient.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const HTML = '<html><head><title>Guide</title></head><body><main><h1>Intro</h1><p>Hello world</p></main></body></html>';

const PAGE: PageDescriptor = {
  sourceUrl: 'https://docs.example.com/intro',
  resourceUri: 'docs://intro',
  title: 'Intro',
  category: 'Core',
  description: 'Introduction'
};

/**
 * In-memory cache store
 */
class MockCacheStore implements ICacheStore {
  entries = new Map<string, CacheEntry>();
  failSaves = false;

  pathFor(url: string): string {
    return `memory:${url}`;
  }

  async isValid(cachePath: string): Promise<boolean> {
    return this.entries.has(cachePath.replace('memory:', ''));
  }

  async load(url: string): Promise<CacheEntry | null> {
    return this.entries.get(url) ?? null;
  }

  async save(url: string, content: string, metadata: PageMetadata): Promise<CacheEntry> {
    if (this.failSaves) {
      throw new FileSystemError('disk full', this.pathFor(url));
    }
    const entry: CacheEntry = { sourceUrl: url, content, metadata, cachedAt: NOW };
    this.entries.set(url, entry);
    return entry;
  }
}

/**
 * HTTP client answering every request with a fixed body or error
 */
class MockHttpClient implements IHttpClient {
  requests: string[] = [];

  constructor(private readonly reply: string | Error) {}

  async get(url: string): Promise<HttpResponse> {
    this.requests.push(url);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return { statusCode: 200, headers: {}, body: this.reply, timeTaken: 1 };
  }
}

describe('DocsFetcher', () => {
  let cacheStore: MockCacheStore;

  beforeEach(() => {
    cacheStore = new MockCacheStore();
  });

  it('fetches, extracts and caches a page on a miss', async () => {
    const httpClient = new MockHttpClient(HTML);
    const fetcher = new DocsFetcher({ cacheStore, httpClient, now: () => NOW });

    const result = await fetcher.getPageContent(PAGE);

    expect(result).toEqual({
      content: '# Intro\n\nHello world',
      metadata: {
        title: 'Guide',
        sourceUrl: PAGE.sourceUrl,
        fetchedAt: NOW,
        contentLength: 20
      },
      fromCache: false
    });
    expect(httpClient.requests).toEqual([PAGE.sourceUrl]);
    expect(cacheStore.entries.get(PAGE.sourceUrl)?.content).toBe('# Intro\n\nHello world');
  });

  it('serves a cache hit without touching the network', async () => {
    const httpClient = new MockHttpClient(HTML);
    const fetcher = new DocsFetcher({ cacheStore, httpClient, now: () => NOW });
    await cacheStore.save(PAGE.sourceUrl, 'cached text', {
      title: 'Cached',
      sourceUrl: PAGE.sourceUrl,
      fetchedAt: NOW,
      contentLength: 11
    });

    const result = await fetcher.getPageContent(PAGE);

    expect(result.fromCache).toBe(true);
    expect(result.content).toBe('cached text');
    expect(httpClient.requests).toEqual([]);
  });

  it('refreshes from the network even when the cache holds the page', async () => {
    const httpClient = new MockHttpClient(HTML);
    const fetcher = new DocsFetcher({ cacheStore, httpClient, now: () => NOW });
    await cacheStore.save(PAGE.sourceUrl, 'stale text', {
      title: 'Cached',
      sourceUrl: PAGE.sourceUrl,
      fetchedAt: NOW,
      contentLength: 10
    });

    const result = await fetcher.refreshCache(PAGE);

    expect(result.fromCache).toBe(false);
    expect(result.content).toBe('# Intro\n\nHello world');
    expect(cacheStore.entries.get(PAGE.sourceUrl)?.content).toBe('# Intro\n\nHello world');
  });

  it('returns fetched content when the cache write fails', async () => {
    cacheStore.failSaves = true;
    const fetcher = new DocsFetcher({ cacheStore, httpClient: new MockHttpClient(HTML), now: () => NOW });

    const result = await fetcher.getPageContent(PAGE);

    expect(result.content).toBe('# Intro\n\nHello world');
    expect(cacheStore.entries.size).toBe(0);
  });

  it('propagates fetch failures and caches nothing', async () => {
    const httpClient = new MockHttpClient(new FetchHttpError(PAGE.sourceUrl, 503, 'Service Unavailable'));
    const fetcher = new DocsFetcher({ cacheStore, httpClient, now: () => NOW });

    await expect(fetcher.getPageContent(PAGE)).rejects.toBeInstanceOf(FetchHttpError);
    expect(cacheStore.entries.size).toBe(0);
  });

  it('uses an injected extractor', async () => {
    const fetcher = new DocsFetcher({
      cacheStore,
      httpClient: new MockHttpClient('<p>ignored</p>'),
      extractor: (html, url) => ({ title: url, content: html.length.toString() }),
      now: () => NOW
    });

    const result = await fetcher.getPageContent(PAGE);

    expect(result.content).toBe('14');
    expect(result.metadata.title).toBe(PAGE.sourceUrl);
  });
});
