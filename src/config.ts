/**
 * Configuration loading and management
 * Loads from YAML config file with environment variable overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { type ServerConfig, DEFAULT_CONFIG } from './types/config.js';
import { expandPath, getDefaultDataDirectory } from './utils/paths.js';
import { logWarn } from './utils/logger.js';

/**
 * File layout accepted from YAML; every section and key is optional
 */
const FileConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().min(1),
        port: z.number().int().min(0).max(65535),
      })
      .partial(),
    auth: z
      .object({
        header: z.string().min(1),
        apiKeys: z.array(z.string()),
      })
      .partial(),
    data: z.object({ dir: z.string().min(1) }).partial(),
    mcp: z
      .object({
        path: z.string().startsWith('/'),
        serverName: z.string().min(1),
        serverVersion: z.string().min(1),
        protocolLabel: z.string().min(1),
      })
      .partial(),
    logging: z
      .object({
        level: z.string().min(1),
        file: z.string().min(1),
      })
      .partial(),
  })
  .partial();

type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Configuration search paths (in priority order)
 *
 * 1. KB_CONFIG_PATH environment variable (if set)
 * 2. Project-local: studio-knowledge.yaml / .yml in the working directory
 */
function getConfigSearchPaths(): string[] {
  const paths: string[] = [];

  const explicitPath = process.env['KB_CONFIG_PATH'];
  if (explicitPath) {
    paths.push(expandPath(explicitPath));
  }

  const cwd = process.cwd();
  paths.push(join(cwd, 'studio-knowledge.yaml'));
  paths.push(join(cwd, 'studio-knowledge.yml'));

  return paths;
}

export function findConfigFile(): string | null {
  for (const path of getConfigSearchPaths()) {
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

export function loadConfigFromFile(filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logWarn(`Failed to load config from ${filePath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logWarn(`Ignoring invalid config file ${filePath}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return {};
  }
  return parsed.data;
}

function mergeConfigs(base: ServerConfig, override: FileConfig): ServerConfig {
  return {
    server: { ...base.server, ...override.server },
    auth: { ...base.auth, ...override.auth },
    data: { ...base.data, ...override.data },
    mcp: { ...base.mcp, ...override.mcp },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Split a comma separated key list, dropping blanks
 */
export function parseApiKeys(value: string): string[] {
  return value
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

function applyEnvironmentOverrides(config: ServerConfig): ServerConfig {
  const result = { ...config };

  const apiKeys = process.env['API_KEYS'];
  if (apiKeys !== undefined) {
    result.auth = { ...result.auth, apiKeys: parseApiKeys(apiKeys) };
  }
  if (process.env['KB_API_KEY_HEADER']) {
    result.auth = { ...result.auth, header: process.env['KB_API_KEY_HEADER'] };
  }

  if (process.env['HOST']) {
    result.server = { ...result.server, host: process.env['HOST'] };
  }
  if (process.env['PORT']) {
    const port = parseInt(process.env['PORT'], 10);
    if (!isNaN(port)) {
      result.server = { ...result.server, port };
    }
  }

  if (process.env['DATA_DIR']) {
    result.data = { ...result.data, dir: process.env['DATA_DIR'] };
  }

  const level = process.env['KB_LOG_LEVEL'] ?? process.env['LOG_LEVEL'];
  if (level) {
    result.logging = { ...result.logging, level };
  }
  if (process.env['KB_LOG_FILE']) {
    result.logging = { ...result.logging, file: process.env['KB_LOG_FILE'] };
  }

  return result;
}

export function loadConfig(): ServerConfig {
  let config: ServerConfig = { ...DEFAULT_CONFIG };

  const configPath = findConfigFile();
  if (configPath) {
    config = mergeConfigs(config, loadConfigFromFile(configPath));
  }

  config = applyEnvironmentOverrides(config);

  // Expand paths
  if (config.data.dir !== null) {
    config.data = { dir: expandPath(config.data.dir) };
  }
  if (config.logging.file) {
    config.logging = { ...config.logging, file: expandPath(config.logging.file) };
  }

  return config;
}

export function getDataDirectory(config?: ServerConfig): string {
  const cfg = config ?? loadConfig();
  return cfg.data.dir ?? getDefaultDataDirectory();
}
