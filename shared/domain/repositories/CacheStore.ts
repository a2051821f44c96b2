/**
 * Repository interface for cached page content
 * Abstracts the storage of fetched pages keyed by source URL
 */
import type { CacheEntry, PageMetadata } from '../models/CacheEntry.js';

/**
 * Cache store interface
 */
export interface ICacheStore {
  /**
   * Derive the storage key (file path) for a URL
   * @param url Source URL
   */
  pathFor(url: string): string;

  /**
   * Check whether the entry stored under a key is present, decodable and unexpired.
   * Never rejects; any read or decode failure resolves to false.
   * @param cachePath Key returned by pathFor
   * @param ttlMs Time to live in milliseconds
   */
  isValid(cachePath: string, ttlMs: number): Promise<boolean>;

  /**
   * Load the entry for a URL
   * @param url Source URL
   * @returns The entry, or null when missing, corrupt or expired
   */
  load(url: string): Promise<CacheEntry | null>;

  /**
   * Persist content for a URL, stamping the cache time
   * @param url Source URL
   * @param content Extracted text content
   * @param metadata Page metadata
   */
  save(url: string, content: string, metadata: PageMetadata): Promise<CacheEntry>;
}
