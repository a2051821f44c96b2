#!/usr/bin/env node
/**
 * Entry point for the DocShelf MCP server
 */

import { toError } from '../../shared/domain/errors.js';
import { DocsFetcher } from '../../services/fetcher/DocsFetcher.js';
import { ResourceManager } from '../../services/resources/ResourceManager.js';
import { cacheTtlMs, ensureDirectories, getConfig } from '../../shared/infrastructure/config.js';
import { HttpClient } from '../../shared/infrastructure/HttpClient.js';
import { getLogger } from '../../shared/infrastructure/logging.js';
import { PageRegistry } from '../../shared/infrastructure/PageRegistry.js';
import { FileSystemCacheStore } from '../../shared/infrastructure/repositories/cache/FileSystemCacheStore.js';
import { DocShelfServer } from './server.js';

async function main(): Promise<void> {
  const config = getConfig();
  ensureDirectories(config);
  const logger = getLogger();

  const cacheStore = new FileSystemCacheStore({
    cacheDir: config.cacheDir,
    ttlMs: cacheTtlMs(config)
  });
  await cacheStore.initialize();

  const fetcher = new DocsFetcher({
    cacheStore,
    httpClient: new HttpClient({
      timeout: config.http.timeoutMs,
      userAgent: config.http.userAgent
    })
  });

  const registry = PageRegistry.fromFile(config.pagesFile);
  logger.info(`Loaded ${registry.size} pages from ${config.pagesFile}`, 'main');

  const server = new DocShelfServer({
    name: config.mcp.name,
    version: config.mcp.version,
    resourceManager: new ResourceManager({ registry, fetcher })
  });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`, 'main');
    void server
      .close()
      .catch((error: unknown) => logger.error('Error while closing server', 'main', error))
      .finally(() => {
        logger.close();
        process.exit(0);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

main().catch((error: unknown) => {
  getLogger().logError(toError(error), 'main', 'Failed to start DocShelf MCP server');
  process.exit(1);
});
