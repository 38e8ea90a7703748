import { AnnotationResult, DefinitionTerm } from './types.js';
import { DefinitionCatalog } from './definitions.js';

/**
 * Options for a single annotation call
 */
export interface AnnotateOptions {
  /** Page the text is rendered on; anchors are unique per page */
  pageId?: string;
}

interface Match {
  position: number;
  length: number;
  term: DefinitionTerm;
}

/**
 * Spans that are never searched. Whole anchors cover earlier markers;
 * other tags and character references are skipped as they are.
 */
const PROTECTED_PATTERN = /<a\b[^>]*>[\s\S]*?<\/a\s*>|<[^>]*>|&(?:#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/gi;

const MARKER_TERM_PATTERN = /^<a\b[^>]*\bclass="def_item"[^>]*\bdata-term="([^"]*)"/i;

const LETTER = /\p{L}/u;

/**
 * Escape text for use inside a double-quoted HTML attribute
 */
export function escapeAttribute(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function unescapeAttribute(text: string): string {
  return text
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

/**
 * A name made safe for use inside an HTML id
 */
export function anchorPart(text: string): string {
  return text
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}. ]/gu, ch => `-${(ch.codePointAt(0) ?? 0).toString(16)}-`)
    .replace(/ /g, '_');
}

/**
 * Anchor id of a glossary row for a term on a page. The same id is used
 * by multi-page and single-page output.
 */
export function anchorFor(pageId: string, termValue: string): string {
  return `def_${anchorPart(pageId)}__${anchorPart(termValue)}`;
}

/**
 * Lower-case character by character, keeping every character's length so
 * positions in the folded text are positions in the original.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (const ch of text) {
    const lower = ch.toLowerCase();
    folded += lower.length === ch.length ? lower : ch;
  }
  return folded;
}

function isLetterBefore(text: string, index: number): boolean {
  if (index <= 0) return false;
  let start = index - 1;
  const unit = text.charCodeAt(start);
  if (unit >= 0xdc00 && unit <= 0xdfff && start > 0) start--;
  return LETTER.test(String.fromCodePoint(text.codePointAt(start) ?? 0));
}

function isLetterAt(text: string, index: number): boolean {
  if (index >= text.length) return false;
  return LETTER.test(String.fromCodePoint(text.codePointAt(index) ?? 0));
}

/**
 * Marks glossary terms inside texts.
 *
 * Every occurrence of every term is a candidate unless a letter touches
 * it on either side. Candidates are taken left to right, longest first at
 * equal positions, and a candidate is dropped when it starts at or before
 * the end of the last accepted one.
 */
export class Annotator {
  private readonly cache = new Map<string, AnnotationResult>();
  private readonly terms: readonly DefinitionTerm[];

  constructor(private readonly catalog: DefinitionCatalog) {
    this.terms = catalog.allTerms();
  }

  annotate(text: string, options: AnnotateOptions = {}): AnnotationResult {
    const pageId = options.pageId ?? '';
    const key = `${pageId}\u0000${text}`;
    const cached = this.cache.get(key);
    if (cached) {
      return { annotatedText: cached.annotatedText, matchedTerms: [...cached.matchedTerms] };
    }
    const result = this.scan(text, pageId);
    this.cache.set(key, result);
    return { annotatedText: result.annotatedText, matchedTerms: [...result.matchedTerms] };
  }

  /**
   * The given terms plus every term mentioned, directly or through other
   * entries, in the texts of their glossary entries. `prepare` turns an
   * entry text into what the page shows, so the closure sees the same
   * markup as the rendered table.
   */
  glossaryClosure(
    terms: readonly DefinitionTerm[],
    prepare: (text: string) => string = text => text
  ): DefinitionTerm[] {
    const visited = new Set<string>();
    const result: DefinitionTerm[] = [];
    const queue = [...terms];

    while (queue.length > 0) {
      const term = queue.shift();
      if (term === undefined) break;
      if (visited.has(term.value)) continue;
      visited.add(term.value);
      result.push(term);

      for (const entry of this.catalog.entriesFor(term.value)) {
        for (const text of [entry.displayText, entry.description]) {
          if (!text) continue;
          for (const found of this.annotate(prepare(text)).matchedTerms) {
            if (!visited.has(found.value)) queue.push(found);
          }
        }
      }
    }
    return result;
  }

  private scan(text: string, pageId: string): AnnotationResult {
    const isProtected = new Uint8Array(text.length);
    const existing: Match[] = [];

    for (const match of text.matchAll(PROTECTED_PATTERN)) {
      const start = match.index ?? 0;
      isProtected.fill(1, start, start + match[0].length);
      const marker = MARKER_TERM_PATTERN.exec(match[0]);
      if (marker) {
        const term = this.catalog.getTerm(unescapeAttribute(marker[1]));
        if (term) {
          existing.push({ position: start, length: match[0].length, term });
        }
      }
    }

    const folded = foldCase(text);
    const candidates: Match[] = [];

    for (const term of this.terms) {
      const needle = term.caseSensitive ? term.value : foldCase(term.value);
      const haystack = term.caseSensitive ? text : folded;
      if (needle === '') continue;

      let position = haystack.indexOf(needle);
      while (position >= 0) {
        const end = position + needle.length;
        if (
          !isLetterBefore(text, position) &&
          !isLetterAt(text, end) &&
          isProtected.subarray(position, end).every(flag => flag === 0)
        ) {
          candidates.push({ position, length: needle.length, term });
        }
        position = haystack.indexOf(needle, position + 1);
      }
    }

    candidates.sort((a, b) => a.position - b.position || b.length - a.length);

    const accepted: Match[] = [];
    let recentEnd = -1;
    for (const candidate of candidates) {
      if (candidate.position <= recentEnd) continue;
      accepted.push(candidate);
      recentEnd = candidate.position + candidate.length;
    }

    let annotatedText = '';
    let cursor = 0;
    for (const match of accepted) {
      const end = match.position + match.length;
      const anchor = anchorFor(pageId, match.term.value);
      annotatedText += text.slice(cursor, match.position);
      annotatedText +=
        `<a href="#${escapeAttribute(anchor)}" class="def_item" data-term="${escapeAttribute(match.term.value)}">` +
        `${text.slice(match.position, end)}</a>`;
      cursor = end;
    }
    annotatedText += text.slice(cursor);

    const matchedTerms: DefinitionTerm[] = [];
    const seen = new Set<string>();
    const ordered = [...existing, ...accepted].sort((a, b) => a.position - b.position);
    for (const match of ordered) {
      if (!seen.has(match.term.value)) {
        seen.add(match.term.value);
        matchedTerms.push(match.term);
      }
    }

    return { annotatedText, matchedTerms };
  }
}
