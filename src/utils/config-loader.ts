/**
 * YAML Configuration Loader
 * Loads and caches smellscope configuration files with Zod validation
 */

import { existsSync, readFileSync } from 'fs';
import { extname, resolve } from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '../analyzers/errors.js';
import { resolveConfig } from '../analyzers/code-smells/code-smell-analyzer.js';
import type { SmellDetectorConfig } from '../schemas/detector-schemas.js';
import { ConfigFileSchema, type ReportFormat } from '../schemas/yaml-schemas.js';
import { extractErrorMessage } from './error-handler.js';

export const DEFAULT_CONFIG_FILE = 'smellscope.yaml';

export interface LoadedConfig {
  readonly detectors: SmellDetectorConfig;
  readonly report: {
    readonly format: ReportFormat;
  };
  /** Absolute path of the file that was read; undefined when defaults were used */
  readonly source?: string;
}

// Cache for loaded configurations, keyed by absolute path
const configCache = new Map<string, LoadedConfig>();

/**
 * Parse configuration text. `source` only labels error messages.
 */
export function parseConfigText(text: string, source: string = DEFAULT_CONFIG_FILE): LoadedConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`Malformed YAML in ${source}`, [extractErrorMessage(error)], { source });
  }

  // An empty document loads as undefined
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Validation failed for ${source}`,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      { source }
    );
  }

  const { report, ...sections } = result.data;
  return Object.freeze({
    detectors: resolveConfig(sections),
    report: Object.freeze({ format: report?.format ?? 'json' }),
  });
}

/**
 * Load a configuration file. A missing file yields the defaults.
 */
export function loadConfigFile(filePath: string = DEFAULT_CONFIG_FILE): LoadedConfig {
  const configPath = resolve(filePath);

  const cached = configCache.get(configPath);
  if (cached) return cached;

  if (!existsSync(configPath)) {
    return parseConfigText('', filePath);
  }

  const ext = extname(configPath).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml') {
    throw new ConfigError(`Invalid config file: ${filePath}. Only .yaml/.yml files are allowed.`);
  }

  let text: string;
  try {
    text = readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${filePath}`, [extractErrorMessage(error)], {
      source: configPath,
    });
  }

  const config = Object.freeze({ ...parseConfigText(text, filePath), source: configPath });
  configCache.set(configPath, config);
  return config;
}

/**
 * Clear the configuration cache
 * Useful for testing or reloading configs
 */
export function clearConfigCache(): void {
  configCache.clear();
}
