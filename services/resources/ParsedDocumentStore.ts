/**
 * In-memory store of parsed documents keyed by resource URI.
 * Sits above the on-disk page cache; entries are replaced whole and
 * only ever removed all together by clear().
 */

import type { ParsedDocument } from '../../shared/domain/models/ParsedDocument.js';
import { getLogger } from '../../shared/infrastructure/logging.js';

export interface IParsedDocumentStore {
  has(resourceUri: string): boolean;
  get(resourceUri: string): ParsedDocument | undefined;
  set(resourceUri: string, document: ParsedDocument): void;
  clear(): void;
  readonly size: number;
}

export class ParsedDocumentStore implements IParsedDocumentStore {
  private documents = new Map<string, ParsedDocument>();

  has(resourceUri: string): boolean {
    return this.documents.has(resourceUri);
  }

  get(resourceUri: string): ParsedDocument | undefined {
    return this.documents.get(resourceUri);
  }

  set(resourceUri: string, document: ParsedDocument): void {
    this.documents.set(resourceUri, document);
  }

  clear(): void {
    const count = this.documents.size;
    this.documents.clear();
    getLogger().debug(`Cleared ${count} parsed documents`, 'ParsedDocumentStore.clear');
  }

  get size(): number {
    return this.documents.size;
  }
}
