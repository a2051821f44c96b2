/**
 * ResourceManager
 *
 * The boundary the MCP layer calls into: lists pages, serves formatted
 * documents, searches across pages and forces refreshes.
 */

import { ResourceNotFoundError, toError } from '../../shared/domain/errors.js';
import type { PageDescriptor } from '../../shared/domain/models/PageDescriptor.js';
import type { ParsedDocument } from '../../shared/domain/models/ParsedDocument.js';
import { type Logger, getLogger } from '../../shared/infrastructure/logging.js';
import type { PageRegistry } from '../../shared/infrastructure/PageRegistry.js';
import type { IPageFetcher } from '../fetcher/DocsFetcher.js';
import { DocsParser } from '../parser/DocsParser.js';
import { formatDocument } from '../parser/DocumentFormatter.js';
import { type IParsedDocumentStore, ParsedDocumentStore } from './ParsedDocumentStore.js';

export const RESOURCE_MIME_TYPE = 'text/plain';
export const SNIPPET_MAX_LENGTH = 200;

export type ResourceDescriptor = {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
};

export type ResourceLookup =
  | { status: 'found'; uri: string; text: string; mimeType: string }
  | { status: 'not_found'; uri: string; error: ResourceNotFoundError }
  | { status: 'error'; uri: string; error: Error };

export interface SectionMatch {
  title: string;
  /** Section body, cut to 200 characters plus an ellipsis when longer */
  content: string;
  anchor: string;
}

export interface SearchResult {
  resourceUri: string;
  title: string;
  category: string;
  matchingSections: SectionMatch[];
}

export interface ResourceManagerOptions {
  registry: PageRegistry;
  fetcher: IPageFetcher;
  parser?: DocsParser;
  store?: IParsedDocumentStore;
  formatter?: (document: ParsedDocument, page: PageDescriptor) => string;
  logger?: Logger;
}

function snippet(body: string): string {
  return body.length > SNIPPET_MAX_LENGTH ? `${body.slice(0, SNIPPET_MAX_LENGTH)}...` : body;
}

export class ResourceManager {
  private readonly registry: PageRegistry;
  private readonly fetcher: IPageFetcher;
  private readonly parser: DocsParser;
  private readonly store: IParsedDocumentStore;
  private readonly formatter: (document: ParsedDocument, page: PageDescriptor) => string;
  private readonly logger: Logger;

  constructor(options: ResourceManagerOptions) {
    this.registry = options.registry;
    this.fetcher = options.fetcher;
    this.parser = options.parser ?? new DocsParser();
    this.store = options.store ?? new ParsedDocumentStore();
    this.formatter = options.formatter ?? formatDocument;
    this.logger = options.logger ?? getLogger();
  }

  listResources(): ResourceDescriptor[] {
    return this.registry.all().map(page => ({
      uri: page.resourceUri,
      name: page.title,
      description: page.description,
      mimeType: RESOURCE_MIME_TYPE
    }));
  }

  pagesByCategory(): Map<string, PageDescriptor[]> {
    return this.registry.byCategory();
  }

  /**
   * Formatted text for a resource. Never rejects: unknown URIs and
   * fetch or parse failures come back as distinct outcomes.
   */
  async getResource(uri: string): Promise<ResourceLookup> {
    const context = 'ResourceManager.getResource';
    const page = this.registry.findByUri(uri);
    if (!page) {
      this.logger.warn(`Unknown resource URI: ${uri}`, context);
      return { status: 'not_found', uri, error: new ResourceNotFoundError(uri) };
    }

    try {
      const document = await this.loadDocument(page);
      const text = this.formatter(document, page);
      this.logger.info(`Served ${uri} (${text.length} chars)`, context);
      return { status: 'found', uri, text, mimeType: RESOURCE_MIME_TYPE };
    } catch (error: unknown) {
      const cause = toError(error);
      this.logger.error(`Failed to load ${uri}: ${cause.message}`, context, cause);
      return { status: 'error', uri, error: cause };
    }
  }

  /**
   * Search every page's sections for the query. Pages that fail to load are skipped.
   */
  async searchResources(query: string): Promise<SearchResult[]> {
    const results: SearchResult[] = [];

    for (const page of this.registry.all()) {
      let document: ParsedDocument;
      try {
        document = await this.loadDocument(page);
      } catch (error: unknown) {
        this.logger.warn(`Skipping ${page.resourceUri} in search`, 'ResourceManager.searchResources', toError(error));
        continue;
      }

      const matches = this.parser.searchContent(document, query);
      if (matches.length > 0) {
        results.push({
          resourceUri: page.resourceUri,
          title: page.title,
          category: page.category,
          matchingSections: matches.map(section => ({
            title: section.title,
            content: snippet(section.body),
            anchor: section.anchor
          }))
        });
      }
    }

    this.logger.info(`Search for "${query}" matched ${results.length} pages`, 'ResourceManager.searchResources');
    return results;
  }

  /**
   * Re-fetch a page bypassing the disk cache and replace its parsed document
   * @returns false for unknown URIs or when the fetch fails
   */
  async refreshResource(uri: string): Promise<boolean> {
    const page = this.registry.findByUri(uri);
    if (!page) {
      return false;
    }

    try {
      const { content } = await this.fetcher.refreshCache(page);
      this.store.set(uri, this.parser.parse(content, page.title));
      return true;
    } catch (error: unknown) {
      this.logger.error(`Failed to refresh ${uri}`, 'ResourceManager.refreshResource', toError(error));
      return false;
    }
  }

  /**
   * Drop every parsed document; the disk cache is untouched
   */
  clearCache(): void {
    this.store.clear();
  }

  private async loadDocument(page: PageDescriptor): Promise<ParsedDocument> {
    const stored = this.store.get(page.resourceUri);
    if (stored) {
      return stored;
    }

    const { content, fromCache } = await this.fetcher.getPageContent(page);
    const document = this.parser.parse(content, page.title);
    this.store.set(page.resourceUri, document);
    this.logger.debug(
      `Parsed ${page.resourceUri}: ${document.sections.length} sections (${fromCache ? 'disk cache' : 'network'})`,
      'ResourceManager.loadDocument'
    );
    return document;
  }
}
