/**
 * Output layout and the location of bundled assets.
 *
 * Page ids double as output paths without the `.html` suffix:
 *   index, species, dictionary, page/<file name of a node or species>
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { KeyWarning } from './types.js';
import { GraphIndex, NodeKind } from './graph-index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const Paths = {
  // Works from both src/ and dist/
  codeRoot: path.resolve(__dirname, '..'),
  get assets() { return path.join(this.codeRoot, 'assets'); },
  get stylesheet() { return path.join(this.assets, 'styles.css'); },
};

export const INDEX_PAGE = 'index';
export const SPECIES_PAGE = 'species';
export const DICTIONARY_PAGE = 'dictionary';
export const STYLESHEET_FILE = 'styles.css';
export const IMAGE_DIR = 'img';

/**
 * File name for a characteristic id or species label
 */
export function fileNameFor(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[\\/?%*:|"<>#]/g, '_')
    .replace(/\s+/g, '_');
}

export function pageIdFor(nodeId: string): string {
  return `page/${fileNameFor(nodeId)}`;
}

/**
 * Page ids of every node of an index, unique per (kind, id).
 *
 * Names are taken in index order, so characteristics claim their file
 * names before species. A later name whose file name is already taken
 * gets `_2`, `_3` and so on appended.
 */
export class PageMap {
  private readonly pages: Record<NodeKind, Map<string, string>> = {
    characteristic: new Map(),
    species: new Map()
  };
  /** NameCollision warnings for distinct names sharing a file name */
  readonly warnings: readonly KeyWarning[];

  constructor(index: GraphIndex) {
    const owners = new Map<string, string>();
    const warnings: KeyWarning[] = [];

    for (const { id, kind } of index.nodes()) {
      const base = pageIdFor(id);
      let pageId = base;
      for (let n = 2; owners.has(pageId); n++) {
        pageId = `${base}_${n}`;
      }
      const owner = owners.get(base);
      // the same name under both kinds is reported when the model is parsed
      if (pageId !== base && owner !== id) {
        warnings.push({
          kind: 'NameCollision',
          message: `${kind} "${id}" shares the file name of "${owner}"; using ${pageFile(pageId)}`,
          subject: id
        });
      }
      owners.set(pageId, id);
      this.pages[kind].set(id, pageId);
    }
    this.warnings = warnings;
  }

  /**
   * Page id of a node. Without a kind a characteristic wins over a
   * species of the same name; unknown names fall back to `pageIdFor`.
   */
  pageOf(id: string, kind?: NodeKind): string {
    const found = kind
      ? this.pages[kind].get(id)
      : this.pages.characteristic.get(id) ?? this.pages.species.get(id);
    return found ?? pageIdFor(id);
  }
}

export function pageFile(pageId: string): string {
  return `${pageId}.html`;
}

/**
 * Output path of a copied glossary image: the image's directory name and
 * file name, so pictures of different terms with the same file name do
 * not collide.
 */
export function imageOutputPath(sourcePath: string): string {
  const normalized = sourcePath.split(path.sep).join('/');
  const parts = normalized.split('/').filter(p => p !== '');
  const tail = parts.slice(-2).map(fileNameFor).join('/');
  return `${IMAGE_DIR}/${tail}`;
}
