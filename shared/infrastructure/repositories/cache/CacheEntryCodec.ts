/**
 * Encoding of cache entries to and from their on-disk JSON form.
 *
 * On disk: { url, content, metadata: { title, url, fetched_at, content_length }, cached_at }
 * with ISO-8601 timestamps.
 */

import { z } from 'zod';
import type { CacheEntry } from '../../../domain/models/CacheEntry.js';

const storedMetadataSchema = z.object({
  title: z.string().optional(),
  url: z.string().optional(),
  fetched_at: z.string().optional(),
  content_length: z.number().int().nonnegative().optional()
});

const storedEntrySchema = z.object({
  url: z.string(),
  content: z.string(),
  metadata: storedMetadataSchema,
  cached_at: z.string()
});

export type StoredCacheEntry = z.infer<typeof storedEntrySchema>;

function parseTimestamp(value: string): Date | null {
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}

export function encodeCacheEntry(entry: CacheEntry): StoredCacheEntry {
  return {
    url: entry.sourceUrl,
    content: entry.content,
    metadata: {
      title: entry.metadata.title,
      url: entry.metadata.sourceUrl,
      fetched_at: entry.metadata.fetchedAt.toISOString(),
      content_length: entry.metadata.contentLength
    },
    cached_at: entry.cachedAt.toISOString()
  };
}

/**
 * Decode parsed JSON into a cache entry
 * @returns The entry, or null when fields are missing or cached_at is not a timestamp
 */
export function decodeCacheEntry(raw: unknown): CacheEntry | null {
  const parsed = storedEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const stored = parsed.data;
  const cachedAt = parseTimestamp(stored.cached_at);
  if (!cachedAt) {
    return null;
  }

  const fetchedAt = stored.metadata.fetched_at ? parseTimestamp(stored.metadata.fetched_at) : null;

  return {
    sourceUrl: stored.url,
    content: stored.content,
    metadata: {
      title: stored.metadata.title ?? 'Untitled',
      sourceUrl: stored.metadata.url ?? stored.url,
      fetchedAt: fetchedAt ?? cachedAt,
      contentLength: stored.metadata.content_length ?? stored.content.length
    },
    cachedAt
  };
}
