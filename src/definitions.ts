import * as path from 'node:path';
import { DefinitionEntry, DefinitionTerm, KeyWarning } from './types.js';
import { ConfigError } from './errors.js';

/**
 * One decoded glossary file
 */
export interface DefinitionSource {
  /** Path of the file; images are resolved against its directory */
  path: string;
  /** A single record or a list of records */
  data: unknown;
}

/**
 * Options for loading definitions
 */
export interface LoadDefinitionsOptions {
  /** Existence check for image files (default: every image exists) */
  assetExists?: (absolutePath: string) => boolean;
}

export interface LoadDefinitionsResult {
  catalog: DefinitionCatalog;
  warnings: KeyWarning[];
}

/**
 * Fields shared by a record and its items
 */
interface RawFields {
  defs?: string[];
  label?: string;
  caseSensitive?: boolean;
  description?: string;
}

interface RawItem extends RawFields {
  image?: string;
  text?: string;
}

interface RawRecord extends RawFields {
  items?: RawItem[];
}

/**
 * Order in which terms are tried: longest first, then by value
 */
export function compareTerms(a: DefinitionTerm, b: DefinitionTerm): number {
  if (a.value.length !== b.value.length) {
    return b.value.length - a.value.length;
  }
  if (a.value < b.value) return -1;
  if (a.value > b.value) return 1;
  return 0;
}

/**
 * Normalized glossary: term value -> entries explaining it.
 */
export class DefinitionCatalog {
  private readonly terms = new Map<string, DefinitionTerm>();
  private readonly entries = new Map<string, DefinitionEntry[]>();
  private readonly sortedTerms: DefinitionTerm[];

  constructor(entries: readonly DefinitionEntry[]) {
    for (const entry of entries) {
      for (const value of entry.terms) {
        if (!this.terms.has(value)) {
          const term: DefinitionTerm = { value, caseSensitive: entry.caseSensitive };
          if (entry.label !== undefined) term.label = entry.label;
          this.terms.set(value, term);
        }
        const list = this.entries.get(value) ?? [];
        list.push(entry);
        this.entries.set(value, list);
      }
    }
    this.sortedTerms = Array.from(this.terms.values()).sort(compareTerms);
  }

  get size(): number {
    return this.terms.size;
  }

  /** Terms in matching order */
  allTerms(): DefinitionTerm[] {
    return [...this.sortedTerms];
  }

  getTerm(value: string): DefinitionTerm | undefined {
    return this.terms.get(value);
  }

  /** Entries for a term, in load order; empty when the term is unknown */
  entriesFor(value: string): DefinitionEntry[] {
    return [...(this.entries.get(value) ?? [])];
  }

  /** Every entry once, in load order */
  allEntries(): DefinitionEntry[] {
    const seen = new Set<DefinitionEntry>();
    for (const list of this.entries.values()) {
      for (const entry of list) seen.add(entry);
    }
    return Array.from(seen);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFields(raw: Record<string, unknown>, where: string, file: string): RawFields {
  const fields: RawFields = {};
  const defs = raw['defs'];
  if (defs !== undefined) {
    if (!Array.isArray(defs) || !defs.every(d => typeof d === 'string')) {
      throw new ConfigError(`${where}: "defs" must be a list of strings`, file);
    }
    fields.defs = defs.map(d => String(d).trim()).filter(d => d !== '');
  }
  const label = raw['label'];
  if (typeof label === 'string') fields.label = label;
  const caseSensitive = raw['casesensitive'];
  if (typeof caseSensitive === 'boolean') fields.caseSensitive = caseSensitive;
  const description = raw['description'];
  if (typeof description === 'string') fields.description = description;
  return fields;
}

function readRecord(raw: unknown, where: string, file: string): RawRecord {
  if (!isRecord(raw)) {
    throw new ConfigError(`${where}: definition must be an object`, file);
  }
  const record: RawRecord = readFields(raw, where, file);
  const items = raw['items'];
  if (items !== undefined) {
    if (!Array.isArray(items)) {
      throw new ConfigError(`${where}: "items" must be a list`, file);
    }
    record.items = items.map((item, i) => {
      const itemWhere = `${where}, item ${i}`;
      if (!isRecord(item)) {
        throw new ConfigError(`${itemWhere}: item must be an object`, file);
      }
      const parsed: RawItem = readFields(item, itemWhere, file);
      const image = item['image'];
      if (typeof image === 'string' && image !== '') parsed.image = image;
      const text = item['text'];
      if (typeof text === 'string') parsed.text = text;
      return parsed;
    });
  }
  return record;
}

/**
 * Normalize glossary files into a catalog.
 *
 * Items inherit `defs`, `label`, `casesensitive` and `description` from
 * their record. A missing image is reported and dropped.
 */
export function loadDefinitions(
  sources: readonly DefinitionSource[],
  options: LoadDefinitionsOptions = {}
): LoadDefinitionsResult {
  const { assetExists = () => true } = options;
  const entries: DefinitionEntry[] = [];
  const warnings: KeyWarning[] = [];

  for (const source of sources) {
    const rawRecords: unknown[] = Array.isArray(source.data) ? source.data : [source.data];
    const baseDir = path.dirname(source.path);

    rawRecords.forEach((rawRecord, recordIndex) => {
      const where = `record ${recordIndex}`;
      const record = readRecord(rawRecord, where, source.path);
      const items: RawItem[] = record.items ?? [{}];

      for (const item of items) {
        const terms = item.defs ?? record.defs ?? [];
        if (terms.length === 0) {
          throw new ConfigError(`${where}: definition has no "defs"`, source.path);
        }
        const entry: DefinitionEntry = {
          terms,
          caseSensitive: item.caseSensitive ?? record.caseSensitive ?? false,
          source: source.path
        };
        const label = item.label ?? record.label;
        if (label !== undefined) entry.label = label;
        const description = item.description ?? record.description;
        if (description !== undefined) entry.description = description;
        if (item.text !== undefined) entry.displayText = item.text;

        if (item.image !== undefined) {
          const imagePath = path.resolve(baseDir, item.image);
          if (assetExists(imagePath)) {
            entry.image = imagePath;
          } else {
            warnings.push({
              kind: 'MissingAsset',
              message: `image for "${terms[0]}" not found: ${imagePath}`,
              subject: imagePath
            });
          }
        }
        entries.push(entry);
      }
    });
  }

  return { catalog: new DefinitionCatalog(entries), warnings };
}
