/**
 * Registry of the documentation pages DocShelf serves.
 * Loaded once at startup; read-only afterwards.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';
import type { PageDescriptor } from '../domain/models/PageDescriptor.js';

const pageSchema = z.object({
  sourceUrl: z.string().url(),
  resourceUri: z.string().min(1),
  title: z.string().min(1),
  category: z.string().min(1),
  description: z.string()
});

const pagesSchema = z.array(pageSchema);

export class PageRegistry {
  private readonly pages: readonly PageDescriptor[];
  private readonly byUri: ReadonlyMap<string, PageDescriptor>;

  /**
   * @throws ConfigurationError on duplicate resource URIs
   */
  constructor(pages: PageDescriptor[]) {
    const byUri = new Map<string, PageDescriptor>();
    for (const page of pages) {
      if (byUri.has(page.resourceUri)) {
        throw new ConfigurationError(`Duplicate resource URI in page registry: ${page.resourceUri}`);
      }
      byUri.set(page.resourceUri, Object.freeze({ ...page }));
    }
    this.pages = Object.freeze(Array.from(byUri.values()));
    this.byUri = byUri;
  }

  /**
   * Load and validate a registry from a JSON file holding an array of page descriptors
   */
  static fromFile(filePath: string): PageRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read page registry ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = pagesSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid page registry ${filePath}: ${issues.join('; ')}`, { issues });
    }
    return new PageRegistry(result.data);
  }

  all(): readonly PageDescriptor[] {
    return this.pages;
  }

  findByUri(resourceUri: string): PageDescriptor | undefined {
    return this.byUri.get(resourceUri);
  }

  get size(): number {
    return this.pages.length;
  }

  /**
   * Group pages by category, categories in order of first appearance
   */
  byCategory(): Map<string, PageDescriptor[]> {
    const groups = new Map<string, PageDescriptor[]>();
    for (const page of this.pages) {
      const group = groups.get(page.category);
      if (group) {
        group.push(page);
      } else {
        groups.set(page.category, [page]);
      }
    }
    return groups;
  }
}
