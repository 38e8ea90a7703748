/**
 * Site configuration.
 *
 * Loaded from a JSON file; every path in it is relative to the file's
 * directory. Command-line flags override the switches.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export interface SiteConfig {
  title: string;
  /** Markdown shown on the index page */
  description?: string;
  /** Absolute path of the model file */
  modelPath: string;
  /** Absolute paths of glossary files */
  definitionPaths: string[];
  /** Absolute path of the translation file */
  translationPath?: string;
  /** Emit one document with client-side navigation (default: false) */
  singlePage: boolean;
  /** Copy glossary images into the output (default: true) */
  copyImages: boolean;
  /** Treat dangling `next` references as fatal (default: false) */
  strict: boolean;
}

export type ConfigOverrides = Partial<Pick<SiteConfig, 'singlePage' | 'copyImages' | 'strict'>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, key: string, configPath: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`"${key}" must be a string`, configPath);
  }
  return value;
}

function optionalBoolean(raw: Record<string, unknown>, key: string, configPath: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`"${key}" must be true or false`, configPath);
  }
  return value;
}

/**
 * Validate a decoded configuration file
 */
export function parseConfig(raw: unknown, configPath: string, overrides: ConfigOverrides = {}): SiteConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('configuration must be a JSON object', configPath);
  }
  const baseDir = path.dirname(path.resolve(configPath));
  const resolve = (p: string) => path.resolve(baseDir, p);

  const model = optionalString(raw, 'model', configPath);
  if (!model) {
    throw new ConfigError('"model" is required', configPath);
  }

  let definitions: string[] = [];
  const rawDefinitions = raw['definitions'];
  if (typeof rawDefinitions === 'string') {
    definitions = [rawDefinitions];
  } else if (Array.isArray(rawDefinitions)) {
    definitions = rawDefinitions.map(d => {
      if (typeof d !== 'string') {
        throw new ConfigError('"definitions" must list file paths', configPath);
      }
      return d;
    });
  } else if (rawDefinitions !== undefined && rawDefinitions !== null) {
    throw new ConfigError('"definitions" must be a path or a list of paths', configPath);
  }

  const translation = optionalString(raw, 'translation', configPath);
  const description = optionalString(raw, 'description', configPath);

  const config: SiteConfig = {
    title: optionalString(raw, 'title', configPath) ?? 'Identification key',
    modelPath: resolve(model),
    definitionPaths: definitions.map(resolve),
    singlePage: overrides.singlePage ?? optionalBoolean(raw, 'singlePage', configPath) ?? false,
    copyImages: overrides.copyImages ?? optionalBoolean(raw, 'copyImages', configPath) ?? true,
    strict: overrides.strict ?? optionalBoolean(raw, 'strict', configPath) ?? false
  };
  if (description !== undefined) config.description = description;
  if (translation !== undefined) config.translationPath = resolve(translation);
  return config;
}

/**
 * Read and validate the configuration file
 */
export async function loadConfig(configPath: string, overrides: ConfigOverrides = {}): Promise<SiteConfig> {
  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (err) {
    throw new ConfigError(`cannot read configuration: ${err instanceof Error ? err.message : err}`, configPath);
  }
  const config = parseConfig(raw, configPath, overrides);
  logger.debug(`Loaded config from ${configPath}`);
  return config;
}
