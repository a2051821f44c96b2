import { promises as fs } from 'fs';
import path from 'path';
import { createHash, randomUUID } from 'crypto';
import { FileSystemError, SerializationError } from '../../../domain/errors.js';
import type { CacheEntry, PageMetadata } from '../../../domain/models/CacheEntry.js';
import type { ICacheStore } from '../../../domain/repositories/CacheStore.js';
import { type Logger, getLogger } from '../../logging.js';
import { decodeCacheEntry, encodeCacheEntry } from './CacheEntryCodec.js';

export interface FileSystemCacheStoreOptions {
  /** Directory holding one JSON file per cached URL */
  cacheDir: string;

  /** Time to live in milliseconds */
  ttlMs: number;

  /** Clock, injectable for tests */
  now?: () => Date;

  logger?: Logger;
}

/**
 * File system backed page cache.
 * Entries are keyed by the MD5 hash of the source URL and replaced atomically
 * (write to a temp file, then rename over the target).
 */
export class FileSystemCacheStore implements ICacheStore {
  private readonly cacheDir: string;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: FileSystemCacheStoreOptions) {
    this.cacheDir = options.cacheDir;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
    } catch (error: unknown) {
      throw new FileSystemError('Failed to create cache directory', this.cacheDir, error instanceof Error ? error : undefined);
    }
    this.logger.debug(`Cache store initialized at ${this.cacheDir}`, 'FileSystemCacheStore.initialize');
  }

  pathFor(url: string): string {
    const hash = createHash('md5').update(url).digest('hex');
    return path.join(this.cacheDir, `${hash}.json`);
  }

  async isValid(cachePath: string, ttlMs: number = this.ttlMs): Promise<boolean> {
    const entry = await this.readEntry(cachePath);
    return entry !== null && this.isFresh(entry, ttlMs);
  }

  async load(url: string): Promise<CacheEntry | null> {
    const cachePath = this.pathFor(url);
    const entry = await this.readEntry(cachePath);

    if (!entry) {
      this.logger.debug(`Cache miss for ${url}`, 'FileSystemCacheStore.load');
      return null;
    }
    if (!this.isFresh(entry, this.ttlMs)) {
      this.logger.debug(`Cache entry expired for ${url} (cached at ${entry.cachedAt.toISOString()})`, 'FileSystemCacheStore.load');
      return null;
    }
    return entry;
  }

  async save(url: string, content: string, metadata: PageMetadata): Promise<CacheEntry> {
    const entry: CacheEntry = {
      sourceUrl: url,
      content,
      metadata,
      cachedAt: this.now()
    };
    const cachePath = this.pathFor(url);
    const tempPath = `${cachePath}.${randomUUID()}.tmp`;

    let data: string;
    try {
      data = JSON.stringify(encodeCacheEntry(entry), null, 2);
    } catch (error: unknown) {
      throw new SerializationError(`Failed to serialize cache entry for ${url}`, error instanceof Error ? error : undefined);
    }

    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
      await fs.writeFile(tempPath, data, 'utf-8');
      await fs.rename(tempPath, cachePath);
    } catch (error: unknown) {
      await this.safeUnlink(tempPath);
      throw new FileSystemError(`Failed to write cache entry for ${url}`, cachePath, error instanceof Error ? error : undefined);
    }

    this.logger.debug(`Cached ${content.length} chars for ${url}`, 'FileSystemCacheStore.save');
    return entry;
  }

  /**
   * An entry is fresh while cachedAt + ttl is still in the future
   */
  private isFresh(entry: CacheEntry, ttlMs: number): boolean {
    return this.now().getTime() < entry.cachedAt.getTime() + ttlMs;
  }

  /**
   * Read and decode an entry; any failure is a miss
   */
  private async readEntry(cachePath: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await fs.readFile(cachePath, 'utf-8');
    } catch {
      return null;
    }

    try {
      return decodeCacheEntry(JSON.parse(raw));
    } catch (error: unknown) {
      this.logger.debug(`Ignoring undecodable cache file ${cachePath}`, 'FileSystemCacheStore.readEntry', error);
      return null;
    }
  }

  private async safeUnlink(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      this.logger.warn(`Failed to delete temp file ${filePath}`, 'FileSystemCacheStore.safeUnlink', error);
    }
  }
}
