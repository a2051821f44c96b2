/**
 * Configuration module for DocShelf
 *
 * Loads configuration from defaults, config files and environment variables,
 * in that order of precedence (later wins), and validates the merged result.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';

// Load environment variables from .env file if present
dotenv.config();

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const configSchema = z.object({
  /** Base directory for data storage */
  dataDir: z.string().min(1),

  /** Directory holding cached page content */
  cacheDir: z.string().min(1),

  /** How long a cached page stays fresh */
  cacheTtlHours: z.number().positive(),

  /** Log level */
  logLevel: z.enum(LOG_LEVELS),

  /** Whether log lines are also written to <dataDir>/logs */
  logToFile: z.boolean(),

  /** JSON file listing the served documentation pages */
  pagesFile: z.string().min(1),

  /** Upstream fetch settings */
  http: z.object({
    userAgent: z.string().min(1),
    timeoutMs: z.number().int().positive()
  }),

  /** MCP server settings */
  mcp: z.object({
    name: z.string().min(1),
    version: z.string().min(1)
  })
});

/**
 * Partial configuration as it may appear in a config file
 */
const overridesSchema = configSchema.partial().extend({
  http: configSchema.shape.http.partial().optional(),
  mcp: configSchema.shape.mcp.partial().optional()
});

export type DocShelfConfig = z.infer<typeof configSchema>;
export type DocShelfConfigOverrides = z.infer<typeof overridesSchema>;
export type LogLevelName = DocShelfConfig['logLevel'];

export const VERSION = '1.0.0';

/**
 * Locate the package root (the nearest directory holding package.json),
 * so bundled data files resolve from both sources and dist/.
 */
function findPackageRoot(startDir: string): string {
  let dir = startDir;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      return startDir;
    }
    dir = parent;
  }
  return dir;
}

export const PACKAGE_ROOT = findPackageRoot(path.dirname(fileURLToPath(import.meta.url)));

function defaultConfig(home: string): DocShelfConfig {
  const dataDir = path.join(home, '.docshelf');
  return {
    dataDir,
    cacheDir: path.join(dataDir, 'cache'),
    cacheTtlHours: 24,
    logLevel: 'info',
    logToFile: true,
    pagesFile: path.join(PACKAGE_ROOT, 'config', 'pages.json'),
    http: {
      userAgent: `DocShelf/${VERSION}`,
      timeoutMs: 30000
    },
    mcp: {
      name: 'docshelf',
      version: VERSION
    }
  };
}

/**
 * Read overrides from a JSON config file; a missing file yields no overrides
 */
function loadConfigFromFile(filePath: string): DocShelfConfigOverrides {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const result = overridesSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`${filePath} is invalid: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim().toLowerCase() !== 'false';
}

/**
 * Collect overrides from DOCSHELF_* environment variables
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): DocShelfConfigOverrides {
  const overrides: DocShelfConfigOverrides = {};
  const dataDir = env.DOCSHELF_DATA_DIR;
  const logLevel = env.DOCSHELF_LOG_LEVEL;

  if (dataDir) overrides.dataDir = dataDir;
  if (env.DOCSHELF_CACHE_DIR) overrides.cacheDir = env.DOCSHELF_CACHE_DIR;
  if (env.DOCSHELF_PAGES_FILE) overrides.pagesFile = env.DOCSHELF_PAGES_FILE;

  const ttl = parseNumber(env.DOCSHELF_CACHE_TTL_HOURS);
  if (ttl !== undefined) overrides.cacheTtlHours = ttl;

  const logToFile = parseBoolean(env.DOCSHELF_LOG_TO_FILE);
  if (logToFile !== undefined) overrides.logToFile = logToFile;

  if (logLevel) {
    const level = LOG_LEVELS.find(candidate => candidate === logLevel.toLowerCase());
    if (!level) {
      throw new ConfigurationError(`DOCSHELF_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, { value: logLevel });
    }
    overrides.logLevel = level;
  }

  const timeoutMs = parseNumber(env.DOCSHELF_FETCH_TIMEOUT_MS);
  if (env.DOCSHELF_USER_AGENT || timeoutMs !== undefined) {
    overrides.http = {};
    if (env.DOCSHELF_USER_AGENT) overrides.http.userAgent = env.DOCSHELF_USER_AGENT;
    if (timeoutMs !== undefined) overrides.http.timeoutMs = timeoutMs;
  }

  return overrides;
}

function merge(base: DocShelfConfig, overrides: DocShelfConfigOverrides): DocShelfConfig {
  const merged: DocShelfConfig = {
    ...base,
    ...overrides,
    http: { ...base.http, ...overrides.http },
    mcp: { ...base.mcp, ...overrides.mcp }
  };
  // A relocated data dir moves the cache with it unless the cache dir is set explicitly
  if (overrides.dataDir && !overrides.cacheDir && base.cacheDir === path.join(base.dataDir, 'cache')) {
    merged.cacheDir = path.join(overrides.dataDir, 'cache');
  }
  return merged;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

/**
 * Build the configuration: defaults < ~/.docshelf/config.json < ./docshelf.config.json < environment
 * @throws ConfigurationError when a file is unreadable or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): DocShelfConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? os.homedir();

  let config = defaultConfig(home);
  config = merge(config, loadConfigFromFile(path.join(home, '.docshelf', 'config.json')));
  config = merge(config, loadConfigFromFile(path.join(cwd, 'docshelf.config.json')));
  config = merge(config, loadConfigFromEnv(env));

  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(issues.join('; '), { issues });
  }
  return result.data;
}

let cachedConfig: DocShelfConfig | null = null;

/**
 * Get the process-wide configuration, loading it on first use
 */
export function getConfig(): DocShelfConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Cache TTL in milliseconds
 */
export function cacheTtlMs(config: DocShelfConfig): number {
  return config.cacheTtlHours * 60 * 60 * 1000;
}

// Create necessary directories
export function ensureDirectories(config: DocShelfConfig = getConfig()): void {
  for (const dir of [config.dataDir, config.cacheDir, path.join(config.dataDir, 'logs')]) {
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(`Failed to create directory ${dir}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
