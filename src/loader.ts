import fs from 'fs-extra';
import { KeyWarning, Model } from './types.js';
import { SiteConfig } from './config.js';
import { MalformedModelError, ConfigError } from './errors.js';
import { parseModel, ParseModelResult } from './model.js';
import { buildIndex, GraphIndex } from './graph-index.js';
import { computeClosures, SpeciesClosure } from './closure.js';
import { DefinitionCatalog, DefinitionSource, loadDefinitions } from './definitions.js';
import { Annotator } from './annotator.js';
import { Translator } from './translation.js';
import { PageMap } from './paths.js';
import { logger } from './logger.js';

/**
 * Everything the page orchestrator reads. Immutable once built.
 */
export interface KeySite {
  title: string;
  description?: string;
  model: Model;
  index: GraphIndex;
  /** Page id of every characteristic and species */
  pages: PageMap;
  closure: SpeciesClosure;
  catalog: DefinitionCatalog;
  annotator: Annotator;
  translator: Translator;
  /** Warnings from every loading stage, in stage order */
  warnings: KeyWarning[];
}

/**
 * Decoded inputs of a site
 */
export interface SiteInput {
  title?: string;
  description?: string;
  /** Decoded model file */
  model: unknown;
  modelSource?: string;
  definitions?: DefinitionSource[];
  translation?: Record<string, unknown>;
  strict?: boolean;
  assetExists?: (absolutePath: string) => boolean;
}

/**
 * Build all indices from decoded inputs: model, graph index, species
 * closure, then the glossary.
 */
export function createSite(input: SiteInput): KeySite {
  const parsed: ParseModelResult = parseModel(input.model, {
    source: input.modelSource,
    strict: input.strict
  });
  const index = buildIndex(parsed.model);
  const pages = new PageMap(index);
  const closure = computeClosures(parsed.model, index);
  const definitions = loadDefinitions(input.definitions ?? [], { assetExists: input.assetExists });

  const site: KeySite = {
    title: input.title ?? 'Identification key',
    model: parsed.model,
    index,
    pages,
    closure,
    catalog: definitions.catalog,
    annotator: new Annotator(definitions.catalog),
    translator: new Translator(input.translation),
    warnings: [...parsed.warnings, ...index.warnings, ...pages.warnings, ...definitions.warnings]
  };
  if (input.description !== undefined) site.description = input.description;
  return site;
}

export async function readModelFile(modelPath: string): Promise<unknown> {
  try {
    return await fs.readJson(modelPath);
  } catch (err) {
    throw new MalformedModelError(
      `cannot read model: ${err instanceof Error ? err.message : err}`,
      modelPath
    );
  }
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    return await fs.readJson(filePath);
  } catch (err) {
    throw new ConfigError(`cannot read ${filePath}: ${err instanceof Error ? err.message : err}`, filePath);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read every file named by the configuration and build the site
 */
export async function loadSite(config: SiteConfig): Promise<KeySite> {
  logger.debug(`Loading model from ${config.modelPath}`);
  const model = await readModelFile(config.modelPath);

  const definitions: DefinitionSource[] = [];
  for (const definitionPath of config.definitionPaths) {
    definitions.push({ path: definitionPath, data: await readJsonFile(definitionPath) });
  }

  let translation: Record<string, unknown> | undefined;
  if (config.translationPath) {
    const raw = await readJsonFile(config.translationPath);
    if (!isRecord(raw)) {
      throw new ConfigError('translation file must be a JSON object', config.translationPath);
    }
    translation = raw;
  }

  const site = createSite({
    title: config.title,
    description: config.description,
    model,
    modelSource: config.modelPath,
    definitions,
    translation,
    strict: config.strict,
    assetExists: p => fs.pathExistsSync(p)
  });

  logger.info(
    `Loaded ${site.model.nodes.size} characteristics, ${site.closure.allSpecies().length} species, ` +
    `${site.catalog.size} glossary terms`
  );
  return site;
}
