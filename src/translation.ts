import { KeyWarning } from './types.js';

const URL_PATTERN = /^https?:\/\/\S+$/;

function isUrl(value: string): boolean {
  return URL_PATTERN.test(value);
}

/**
 * Label lookup backed by a translation file.
 *
 * Without a dictionary every label translates to itself. A label missing
 * from the dictionary is returned untranslated and reported once.
 */
export class Translator {
  private readonly missing = new Set<string>();
  private readonly reported: KeyWarning[] = [];

  constructor(private readonly dictionary?: Record<string, unknown>) {}

  translate(key: string, group?: string): string {
    if (!this.dictionary || isUrl(key)) {
      return key;
    }
    let scope: Record<string, unknown> | undefined = this.dictionary;
    if (group !== undefined) {
      const nested = this.dictionary[group];
      scope = typeof nested === 'object' && nested !== null && !Array.isArray(nested)
        ? Object.fromEntries(Object.entries(nested))
        : undefined;
    }
    const value = scope?.[key];
    if (typeof value === 'string') {
      return value;
    }
    const missingKey = group === undefined ? key : `${group}/${key}`;
    if (!this.missing.has(missingKey)) {
      this.missing.add(missingKey);
      this.reported.push({
        kind: 'MissingTranslation',
        message: `translation not found for "${missingKey}"`,
        subject: missingKey
      });
    }
    return key;
  }

  /** MissingTranslation warnings reported so far */
  get warnings(): readonly KeyWarning[] {
    return this.reported;
  }
}
