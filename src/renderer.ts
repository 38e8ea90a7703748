import { Marked } from 'marked';
import { DefinitionTerm } from './types.js';
import { KeySite } from './loader.js';
import { GraphRenderer, graphNodeId, graphView } from './graph-render.js';
import { anchorFor, escapeAttribute } from './annotator.js';
import { getTarget } from './model.js';
import { DanglingReferenceError } from './errors.js';
import {
  DICTIONARY_PAGE,
  INDEX_PAGE,
  SPECIES_PAGE,
  imageOutputPath
} from './paths.js';

/**
 * Turns page ids and output-relative asset paths into hrefs, as seen
 * from the page being rendered. Owned by the document builder.
 */
export interface LinkResolver {
  page(targetPageId: string, fromPageId: string): string;
  asset(assetPath: string, fromPageId: string): string;
}

/**
 * Everything a page needs. Read-only, shared by all pages.
 */
export interface RenderContext {
  site: KeySite;
  links: LinkResolver;
  graph: GraphRenderer;
  /** Emit glossary pictures (default: true) */
  showImages?: boolean;
}

/**
 * A rendered page body, before the builder wraps it into a document
 */
export interface RenderedPage {
  pageId: string;
  title: string;
  body: string;
}

const markedInstance = new Marked({
  gfm: true,
  breaks: true,
});

/**
 * Escape text for HTML element content
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Render inline markdown (descriptions, glossary texts) to HTML
 */
export function renderInline(markdown: string): string {
  const html = markedInstance.parseInline(markdown);
  if (typeof html !== 'string') {
    throw new Error('inline markdown rendering must be synchronous');
  }
  return html;
}

/**
 * Render block markdown (the key description on the index page)
 */
export function renderBlock(markdown: string): string {
  const html = markedInstance.parse(markdown);
  if (typeof html !== 'string') {
    throw new Error('markdown rendering must be synchronous');
  }
  return html;
}

function label(ctx: RenderContext, key: string): string {
  return escapeHtml(ctx.site.translator.translate(key));
}

function link(href: string, text: string, className?: string): string {
  const cls = className ? ` class="${className}"` : '';
  return `<a href="${escapeAttribute(href)}"${cls}>${text}</a>`;
}

/**
 * Markdown text with glossary terms marked for this page
 */
function annotated(ctx: RenderContext, text: string, pageId: string, found: DefinitionTerm[]): string {
  const result = ctx.site.annotator.annotate(renderInline(text), { pageId });
  found.push(...result.matchedTerms);
  return result.annotatedText;
}

function renderBreadcrumb(ctx: RenderContext, pageId: string, ancestors: readonly string[]): string {
  const links = [link(ctx.links.page(INDEX_PAGE, pageId), label(ctx, 'Main page'))];
  for (const id of ancestors) {
    links.push(link(ctx.links.page(ctx.site.pages.pageOf(id, 'characteristic'), pageId), escapeHtml(id)));
  }
  return `<div class="breadcrumb">${label(ctx, 'Back to')}: ${links.join(' | ')}</div>\n`;
}

function renderGraph(ctx: RenderContext, pageId: string, highlighted: string): string {
  const { index, pages } = ctx.site;
  const { nodes, edges } = graphView(index, node => ctx.links.page(pages.pageOf(node.id, node.kind), pageId));
  return `<div class="graph_content">\n${ctx.graph.render(nodes, edges, highlighted)}\n</div>\n`;
}

function renderSpeciesList(ctx: RenderContext, pageId: string, species: readonly string[]): string {
  const items = species.map(s => `<li>${link(ctx.links.page(ctx.site.pages.pageOf(s, 'species'), pageId), escapeHtml(s))}</li>`);
  return `<ul>\n${items.join('\n')}\n</ul>\n`;
}

/**
 * Keywords table for a set of terms, including every term their entries
 * mention. Returns an empty string when there is nothing to show.
 */
export function renderDefinitionsTable(ctx: RenderContext, terms: readonly DefinitionTerm[], pageId: string): string {
  const { annotator, catalog } = ctx.site;
  const rows = annotator.glossaryClosure(terms, renderInline).sort((a, b) => (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
  if (rows.length === 0) {
    return '';
  }

  let content = '<div>\n<table class="defs_table">\n';
  content += `<tr class="title_row"> <td colspan="2">${label(ctx, 'Keywords')}:</td> </tr>\n`;
  for (const term of rows) {
    const anchor = anchorFor(pageId, term.value);
    content += `<tr class="def_row"> <td class="def_item" id="${escapeAttribute(anchor)}">${escapeHtml(term.label ?? term.value)}</td> <td>\n`;
    for (const entry of catalog.entriesFor(term.value)) {
      content += '<div class="imgtile">\n';
      if (entry.displayText) {
        content += `    <div>${annotated(ctx, entry.displayText, pageId, [])}</div>\n`;
      }
      if (entry.image && ctx.showImages !== false) {
        const href = ctx.links.asset(imageOutputPath(entry.image), pageId);
        content += `    <a href="${escapeAttribute(href)}"><img src="${escapeAttribute(href)}" alt="${escapeAttribute(term.value)}"></a>\n`;
      }
      if (entry.description) {
        content += `    <div>${annotated(ctx, entry.description, pageId, [])}</div>\n`;
      }
      content += '</div>\n';
    }
    content += '</td> </tr>\n';
  }
  content += '</table>\n</div>\n';
  return content;
}

export function renderIndexPage(ctx: RenderContext): RenderedPage {
  const { site, links } = ctx;
  const pageId = INDEX_PAGE;
  let body = `<div class="main_section title">${escapeHtml(site.title)}</div>\n`;
  if (site.description) {
    body += `<div class="main_section description">\n${renderBlock(site.description)}</div>\n`;
  }
  body += `<div class="main_section">${link(links.page(site.pages.pageOf(site.model.start, 'characteristic'), pageId), label(ctx, 'Start'))}</div>\n`;
  body += `<div class="main_section">${link(links.page(SPECIES_PAGE, pageId), label(ctx, 'Species'))}</div>\n`;
  body += `<div class="main_section">${link(links.page(DICTIONARY_PAGE, pageId), label(ctx, 'Dictionary'))}</div>\n`;
  return { pageId, title: site.title, body };
}

/**
 * Page of one characteristic: breadcrumb, graph, choices, potential
 * species and keywords. Throws CycleDetectedError when the breadcrumb
 * cannot be built.
 */
export function renderCharacteristicPage(ctx: RenderContext, nodeId: string): RenderedPage {
  const { site, links } = ctx;
  const choices = site.model.nodes.get(nodeId);
  if (!choices) {
    throw new DanglingReferenceError(`Unknown characteristic: ${nodeId}`, nodeId);
  }
  const pageId = site.pages.pageOf(nodeId, 'characteristic');
  const ancestors = site.index.ancestorChain(nodeId, 'characteristic').slice(0, -1);
  const columns = choices.length;
  const keywords: DefinitionTerm[] = [];

  let body = renderBreadcrumb(ctx, pageId, ancestors);
  body += renderGraph(ctx, pageId, graphNodeId(site.index, nodeId, 'characteristic'));

  body += '<div>\n<table class="choices_table">\n';
  body += `<tr class="title_row"> <td colspan="${columns}">${label(ctx, 'Characteristic')} ${escapeHtml(nodeId)}:</td> </tr>\n`;

  body += '<tr class="description_row">';
  for (const choice of choices) {
    body += `\n   <td>${annotated(ctx, choice.description, pageId, keywords)}</td>`;
  }
  body += '\n</tr>\n';

  body += '<tr class="navigation_row">';
  for (const choice of choices) {
    if (choice.next !== undefined) {
      const text = `${label(ctx, 'next')}: ${escapeHtml(choice.next)}`;
      body += ` <td>${link(links.page(site.pages.pageOf(choice.next, 'characteristic'), pageId), text, 'next_char')}</td>`;
    } else if (choice.target) {
      const text = escapeHtml(choice.target.label);
      body += ` <td>${link(links.page(site.pages.pageOf(choice.target.label, 'species'), pageId), text, 'next_char')}</td>`;
    } else {
      body += ` <td>--- ${label(ctx, 'unknown')} ---</td>`;
    }
  }
  body += ' </tr>\n';

  const potential = choices.map(choice =>
    choice.next === undefined ? [] : Array.from(site.closure.closureOf(choice.next)).sort()
  );
  if (potential.some(list => list.length > 0)) {
    body += `<tr class="title_row"> <td colspan="${columns}">${label(ctx, 'Potential species')}:</td> </tr>\n`;
    body += '<tr class="species_row">';
    for (const list of potential) {
      body += list.length > 0 ? ` <td>${renderSpeciesList(ctx, pageId, list)}</td>` : ' <td></td>';
    }
    body += ' </tr>\n';
  }
  body += '</table>\n</div>\n';

  body += renderDefinitionsTable(ctx, keywords, pageId);
  return { pageId, title: `${ctx.site.translator.translate('Characteristic')} ${nodeId}`, body };
}

/**
 * Page of one species: the characteristic steps that identify it
 */
export function renderSpeciesPage(ctx: RenderContext, speciesLabel: string): RenderedPage {
  const { site, links } = ctx;
  if (!site.index.has(speciesLabel, 'species')) {
    throw new DanglingReferenceError(`Unknown species: ${speciesLabel}`, speciesLabel);
  }
  const pageId = site.pages.pageOf(speciesLabel, 'species');
  const steps = site.index.ancestorLinks(speciesLabel, 'species');
  const last = steps[steps.length - 1];
  const target = last ? getTarget(site.model, last.parent, last.choiceIndex) : undefined;
  const keywords: DefinitionTerm[] = [];

  let body = renderBreadcrumb(ctx, pageId, []);
  body += renderGraph(ctx, pageId, graphNodeId(site.index, speciesLabel, 'species'));
  body += `<div class="species_name"><b>${escapeHtml(speciesLabel)}</b>:</div>\n`;
  if (target?.url) {
    body += `<div>${label(ctx, 'Info')}: ${link(target.url, escapeHtml(target.url))}</div>\n`;
  }

  body += '<ul class="steps">\n';
  for (const step of steps) {
    const choice = site.model.nodes.get(step.parent)?.[step.choiceIndex];
    const description = choice ? annotated(ctx, choice.description, pageId, keywords) : '';
    body += `<li>${link(links.page(site.pages.pageOf(step.parent, 'characteristic'), pageId), escapeHtml(step.parent))}: ${description}</li>\n`;
  }
  body += '</ul>\n';

  body += renderDefinitionsTable(ctx, keywords, pageId);
  return { pageId, title: speciesLabel, body };
}

export function renderSpeciesListPage(ctx: RenderContext): RenderedPage {
  const pageId = SPECIES_PAGE;
  let body = renderBreadcrumb(ctx, pageId, []);
  body += `<div>${label(ctx, 'List of species included in the key')}:</div>\n`;
  body += renderSpeciesList(ctx, pageId, ctx.site.closure.allSpecies());
  return { pageId, title: ctx.site.translator.translate('Species'), body };
}

export function renderDictionaryPage(ctx: RenderContext): RenderedPage {
  const pageId = DICTIONARY_PAGE;
  let body = renderBreadcrumb(ctx, pageId, []);
  body += `<div>${label(ctx, 'Explanation of some definitions used in the characteristics')}.</div>\n`;
  body += renderDefinitionsTable(ctx, ctx.site.catalog.allTerms(), pageId);
  return { pageId, title: ctx.site.translator.translate('Dictionary'), body };
}
