import { isAbsolute, join, resolve } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError as JsoncParseError } from 'jsonc-parser';

import type { GenerateOptions, GeneratorConfig, OutputFormat } from '../types/index.js';
import { DEFAULT_PATHS, FILE_PATTERNS, RESOLVER_DEFAULTS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration for manifest generation.
 * Sources, lowest precedence first: built-in defaults, an optional
 * lockvendor.jsonc / lockvendor.json file, command-line options.
 */

export const DEFAULT_CONFIG: GeneratorConfig = {
  vendorDir: DEFAULT_PATHS.VENDOR_DIR,
  gitCheckoutDir: DEFAULT_PATHS.GIT_CHECKOUT_DIR,
  concurrency: RESOLVER_DEFAULTS.CONCURRENCY,
  retries: RESOLVER_DEFAULTS.RETRIES,
  timeoutMs: RESOLVER_DEFAULTS.TIMEOUT_MS,
  backoffMs: RESOLVER_DEFAULTS.BACKOFF_MS,
  gitTarballs: false,
  format: 'manifest',
  registries: {}
};

const OUTPUT_FORMATS: readonly OutputFormat[] = ['manifest', 'flatpak'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPositiveInteger(value: unknown, key: string, allowZero: boolean): number {
  const min = allowZero ? 0 : 1;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`Invalid '${key}': expected an integer >= ${min}, got ${JSON.stringify(value)}`, { key });
  }
  return value;
}

function readRelativePath(value: unknown, key: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Invalid '${key}': expected a non-empty path`, { key });
  }
  if (isAbsolute(value)) {
    throw new ConfigError(`Invalid '${key}': '${value}' must be relative to the build directory`, { key });
  }
  return value.replace(/\/+$/, '');
}

export function parseOutputFormat(value: unknown): OutputFormat {
  const format = OUTPUT_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new ConfigError(`Invalid format ${JSON.stringify(value)}. Use one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return format;
}

/**
 * Validate a raw configuration object (file contents or merged options).
 */
export function validateConfig(raw: unknown, source: string): Partial<GeneratorConfig> {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source} must contain an object`);
  }

  const config: Partial<GeneratorConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    switch (key) {
      case 'vendorDir':
        config.vendorDir = readRelativePath(value, key);
        break;
      case 'gitCheckoutDir':
        config.gitCheckoutDir = readRelativePath(value, key);
        break;
      case 'concurrency':
        config.concurrency = readPositiveInteger(value, key, false);
        break;
      case 'retries':
        config.retries = readPositiveInteger(value, key, true);
        break;
      case 'timeoutMs':
        config.timeoutMs = readPositiveInteger(value, key, false);
        break;
      case 'backoffMs':
        config.backoffMs = readPositiveInteger(value, key, true);
        break;
      case 'gitTarballs':
        if (typeof value !== 'boolean') {
          throw new ConfigError(`Invalid 'gitTarballs': expected true or false`, { key });
        }
        config.gitTarballs = value;
        break;
      case 'format':
        config.format = parseOutputFormat(value);
        break;
      case 'registries': {
        if (!isRecord(value)) {
          throw new ConfigError(`Invalid 'registries': expected an object of index URL -> download URL`, { key });
        }
        const registries: Record<string, string> = {};
        for (const [index, base] of Object.entries(value)) {
          if (typeof base !== 'string' || base === '') {
            throw new ConfigError(`Invalid download URL for registry '${index}'`, { key, index });
          }
          registries[index] = base;
        }
        config.registries = registries;
        break;
      }
      default:
        logger.warn(`Ignoring unknown configuration key '${key}' in ${source}`);
    }
  }
  return config;
}

/**
 * Find the config file: an explicit path, or the first default name present
 * in `cwd`. Returns null when there is none.
 */
async function findConfigFile(cwd: string, configPath?: string): Promise<string | null> {
  if (configPath) {
    const path = resolve(cwd, configPath);
    if (!(await exists(path))) {
      throw new ConfigError(`Config file not found: ${path}`, { path });
    }
    return path;
  }

  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(cwd, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

export async function loadConfigFile(cwd: string, configPath?: string): Promise<Partial<GeneratorConfig>> {
  const path = await findConfigFile(cwd, configPath);
  if (!path) {
    return {};
  }

  logger.debug(`Loading config from: ${path}`);
  const errors: JsoncParseError[] = [];
  const raw: unknown = parseJsonc(await readTextFile(path), errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigError(
      `Failed to parse ${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      { path }
    );
  }
  return validateConfig(raw, path);
}

/**
 * Merge defaults, the config file and command-line options.
 */
export async function resolveGeneratorConfig(options: GenerateOptions, cwd: string): Promise<GeneratorConfig> {
  const fromFile = await loadConfigFile(cwd, options.configPath);
  const fromOptions = validateConfig(
    {
      vendorDir: options.vendorDir,
      gitCheckoutDir: options.gitCheckoutDir,
      concurrency: options.concurrency,
      retries: options.retries,
      timeoutMs: options.timeoutMs,
      gitTarballs: options.gitTarballs,
      format: options.format
    },
    'command-line options'
  );

  const config: GeneratorConfig = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...fromOptions,
    registries: { ...DEFAULT_CONFIG.registries, ...fromFile.registries }
  };
  logger.debug('Resolved configuration', config);
  return config;
}
