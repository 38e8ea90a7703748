/**
 * A terminal outcome of a choice: the species it identifies.
 */
export interface SpeciesTarget {
  /** Species label, also used as the species page id */
  label: string;

  /** Optional link to an external description of the species */
  url?: string;
}

/**
 * One option offered by a characteristic.
 * At most one of `next` and `target` is set; neither means "unknown".
 */
export interface Choice {
  description: string;

  /** Id of the characteristic this choice leads to */
  next?: string;

  target?: SpeciesTarget;
}

/**
 * The identification key. Immutable for the whole run.
 */
export interface Model {
  /** Id of the first characteristic */
  start: string;

  /** Characteristic id -> ordered choices, in file order */
  nodes: ReadonlyMap<string, readonly Choice[]>;
}

/**
 * Kinds of recoverable problems reported while loading and rendering.
 */
export type WarningKind =
  | 'DanglingReference'
  | 'MissingAsset'
  | 'AmbiguousParent'
  | 'NameCollision'
  | 'MissingTranslation';

/**
 * A recoverable problem. The run continues; the affected piece renders
 * without the missing part.
 */
export interface KeyWarning {
  kind: WarningKind;
  message: string;

  /** The id, label, term or path the warning is about */
  subject: string;
}

/**
 * A glossary keyword. Two terms are the same term when their values are equal.
 */
export interface DefinitionTerm {
  value: string;
  label?: string;
  caseSensitive: boolean;
}

/**
 * A fully resolved glossary entry. Nothing is inherited any more.
 */
export interface DefinitionEntry {
  /** Every term value this entry explains */
  terms: readonly string[];
  label?: string;
  caseSensitive: boolean;

  /** Absolute path of an existing image file */
  image?: string;

  /** Short text shown above the image */
  displayText?: string;

  description?: string;

  /** The file the entry was loaded from */
  source: string;
}

/**
 * Result of scanning a text for glossary terms.
 */
export interface AnnotationResult {
  annotatedText: string;

  /** Accepted terms, first occurrence order, no duplicates */
  matchedTerms: DefinitionTerm[];
}
