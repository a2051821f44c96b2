import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { cacheTtlMs, ensureDirectories, loadConfig } from '../config.js';
import { ConfigurationError } from '../../domain/errors.js';

describe('loadConfig', () => {
  let home: string;
  let cwd: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'docshelf-home-'));
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'docshelf-cwd-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('uses defaults under the home directory', () => {
    const config = loadConfig({ env: {}, cwd, home });

    expect(config.dataDir).toBe(path.join(home, '.docshelf'));
    expect(config.cacheDir).toBe(path.join(home, '.docshelf', 'cache'));
    expect(config.cacheTtlHours).toBe(24);
    expect(config.logLevel).toBe('info');
    expect(config.logToFile).toBe(true);
    expect(config.http).toEqual({ userAgent: 'DocShelf/1.0.0', timeoutMs: 30000 });
    expect(config.mcp).toEqual({ name: 'docshelf', version: '1.0.0' });
    expect(path.basename(config.pagesFile)).toBe('pages.json');
  });

  it('applies environment overrides and moves the cache with the data dir', () => {
    const config = loadConfig({
      env: {
        DOCSHELF_DATA_DIR: '/srv/docshelf',
        DOCSHELF_CACHE_TTL_HOURS: '2',
        DOCSHELF_LOG_LEVEL: 'DEBUG',
        DOCSHELF_LOG_TO_FILE: 'false',
        DOCSHELF_FETCH_TIMEOUT_MS: '5000'
      },
      cwd,
      home
    });

    expect(config.dataDir).toBe('/srv/docshelf');
    expect(config.cacheDir).toBe(path.join('/srv/docshelf', 'cache'));
    expect(config.cacheTtlHours).toBe(2);
    expect(config.logLevel).toBe('debug');
    expect(config.logToFile).toBe(false);
    expect(config.http).toEqual({ userAgent: 'DocShelf/1.0.0', timeoutMs: 5000 });
  });

  it('layers the working directory file over the home file and the environment over both', () => {
    fs.mkdirSync(path.join(home, '.docshelf'));
    fs.writeFileSync(path.join(home, '.docshelf', 'config.json'), JSON.stringify({ cacheTtlHours: 12, logLevel: 'warn' }));
    fs.writeFileSync(path.join(cwd, 'docshelf.config.json'), JSON.stringify({ cacheTtlHours: 6, mcp: { name: 'docs-test' } }));

    const fromFiles = loadConfig({ env: {}, cwd, home });
    expect(fromFiles.cacheTtlHours).toBe(6);
    expect(fromFiles.logLevel).toBe('warn');
    expect(fromFiles.mcp).toEqual({ name: 'docs-test', version: '1.0.0' });

    const withEnv = loadConfig({ env: { DOCSHELF_CACHE_TTL_HOURS: '1' }, cwd, home });
    expect(withEnv.cacheTtlHours).toBe(1);
  });

  it('keeps an explicitly configured cache dir when the data dir moves', () => {
    fs.writeFileSync(path.join(cwd, 'docshelf.config.json'), JSON.stringify({ cacheDir: '/var/cache/docs' }));

    const config = loadConfig({ env: { DOCSHELF_DATA_DIR: '/srv/docshelf' }, cwd, home });

    expect(config.cacheDir).toBe('/var/cache/docs');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ env: { DOCSHELF_LOG_LEVEL: 'loud' }, cwd, home })).toThrow(ConfigurationError);
  });

  it('rejects a TTL that is not a positive number', () => {
    expect(() => loadConfig({ env: { DOCSHELF_CACHE_TTL_HOURS: '0' }, cwd, home })).toThrow(ConfigurationError);
    expect(() => loadConfig({ env: { DOCSHELF_CACHE_TTL_HOURS: 'soon' }, cwd, home })).toThrow(ConfigurationError);
  });

  it('rejects a malformed config file', () => {
    fs.writeFileSync(path.join(cwd, 'docshelf.config.json'), '{ not json');

    expect(() => loadConfig({ env: {}, cwd, home })).toThrow(ConfigurationError);
  });

  it('creates the data, cache and log directories', () => {
    const config = loadConfig({ env: {}, cwd, home });
    ensureDirectories(config);

    expect(fs.existsSync(config.cacheDir)).toBe(true);
    expect(fs.existsSync(path.join(config.dataDir, 'logs'))).toBe(true);
  });
});

describe('cacheTtlMs', () => {
  it('converts hours to milliseconds', () => {
    const config = loadConfig({ env: {}, cwd: os.tmpdir(), home: os.tmpdir() });
    expect(cacheTtlMs({ ...config, cacheTtlHours: 24 })).toBe(86_400_000);
  });
});
