import fs from 'fs-extra';
import * as path from 'node:path';
import { KeyWarning } from './types.js';
import { KeySite } from './loader.js';
import { CycleDetectedError, DanglingReferenceError } from './errors.js';
import { DocumentBuilder, MultiPageBuilder, OutputFile, SinglePageBuilder } from './builders.js';
import { GraphRenderer, SvgGraphRenderer } from './graph-render.js';
import {
  RenderContext,
  RenderedPage,
  renderCharacteristicPage,
  renderDictionaryPage,
  renderIndexPage,
  renderSpeciesListPage,
  renderSpeciesPage
} from './renderer.js';
import { Paths, STYLESHEET_FILE, imageOutputPath } from './paths.js';
import { logger } from './logger.js';

/**
 * Options for generating a site
 */
export interface GenerateOptions {
  /** One document instead of one file per page (default: false) */
  singlePage?: boolean;
  /** Copy glossary images and reference them (default: true) */
  copyImages?: boolean;
  /** Graph drawing (default: SvgGraphRenderer) */
  graph?: GraphRenderer;
}

/**
 * A page that could not be rendered
 */
export interface PageFailure {
  pageId: string;
  error: Error;
}

export interface GenerateResult {
  files: OutputFile[];
  /** Absolute paths of glossary images the pages reference */
  images: string[];
  failures: PageFailure[];
  warnings: KeyWarning[];
}

export interface WriteResult {
  written: number;
  warnings: KeyWarning[];
}

function renderSafely(
  pageId: string,
  render: () => RenderedPage,
  failures: PageFailure[]
): RenderedPage | undefined {
  try {
    return render();
  } catch (err) {
    if (err instanceof CycleDetectedError || err instanceof DanglingReferenceError) {
      logger.error(`Skipping ${pageId}: ${err.message}`);
      failures.push({ pageId, error: err });
      return undefined;
    }
    throw err;
  }
}

/**
 * Render every page of the site into the builder: index, one page per
 * characteristic, one per species, the species list and the dictionary.
 * Pages that hit a cycle or a dangling reference are reported and
 * skipped; the rest of the key still builds.
 */
export function generateDocuments(
  site: KeySite,
  builder: DocumentBuilder,
  options: Omit<GenerateOptions, 'singlePage'> = {}
): PageFailure[] {
  const ctx: RenderContext = {
    site,
    links: builder.links,
    graph: options.graph ?? new SvgGraphRenderer(),
    showImages: options.copyImages ?? true,
  };
  const failures: PageFailure[] = [];
  const species = site.closure.allSpecies();
  const total = site.model.nodes.size + species.length + 3;
  let counter = 0;

  const add = (pageId: string, render: () => RenderedPage) => {
    counter++;
    const page = renderSafely(pageId, render, failures);
    if (page) {
      builder.addPage(page);
      logger.debug(`${((counter / total) * 100).toFixed(1)}% rendered page: ${pageId}`);
    }
  };

  add('index', () => renderIndexPage(ctx));
  for (const nodeId of site.model.nodes.keys()) {
    add(site.pages.pageOf(nodeId, 'characteristic'), () => renderCharacteristicPage(ctx, nodeId));
  }
  for (const label of species) {
    add(site.pages.pageOf(label, 'species'), () => renderSpeciesPage(ctx, label));
  }
  add('species', () => renderSpeciesListPage(ctx));
  add('dictionary', () => renderDictionaryPage(ctx));

  return failures;
}

/**
 * Render the whole site in memory
 */
export function generateSite(site: KeySite, options: GenerateOptions = {}): GenerateResult {
  const builder: DocumentBuilder = options.singlePage
    ? new SinglePageBuilder(site.title)
    : new MultiPageBuilder(site.title);
  const failures = generateDocuments(site, builder, options);

  const images = options.copyImages === false
    ? []
    : Array.from(new Set(site.catalog.allEntries().flatMap(entry => (entry.image ? [entry.image] : []))));

  return {
    files: builder.build(),
    images,
    failures,
    warnings: [...site.warnings, ...site.translator.warnings],
  };
}

/**
 * Write generated files, the stylesheet and glossary images
 */
export async function writeOutput(
  outDir: string,
  files: readonly OutputFile[],
  images: readonly string[] = []
): Promise<WriteResult> {
  const warnings: KeyWarning[] = [];
  await fs.ensureDir(outDir);

  for (const file of files) {
    const target = path.join(outDir, file.path);
    logger.debug(`writing page: ${target}`);
    await fs.outputFile(target, file.content, 'utf-8');
  }

  await fs.copy(Paths.stylesheet, path.join(outDir, STYLESHEET_FILE));

  for (const image of images) {
    const target = path.join(outDir, imageOutputPath(image));
    try {
      await fs.copy(image, target);
    } catch (err) {
      warnings.push({
        kind: 'MissingAsset',
        message: `cannot copy image ${image}: ${err instanceof Error ? err.message : err}`,
        subject: image,
      });
    }
  }

  return { written: files.length, warnings };
}
