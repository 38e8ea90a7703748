import * as path from 'node:path';
import { LinkResolver, RenderedPage, escapeHtml } from './renderer.js';
import { INDEX_PAGE, STYLESHEET_FILE, pageFile } from './paths.js';

/**
 * A file to write, relative to the output directory
 */
export interface OutputFile {
  path: string;
  content: string;
}

/**
 * Collects rendered pages and turns them into output files.
 * The orchestrator owns one and passes it to every page call.
 */
export interface DocumentBuilder {
  readonly links: LinkResolver;
  addPage(page: RenderedPage): void;
  build(): OutputFile[];
}

const GENERATED_NOTICE = '<!-- Generated by keypages. Changes will be overwritten. -->';

function documentShell(siteTitle: string, pageTitle: string, stylesheetHref: string, body: string): string {
  const title = pageTitle === siteTitle ? siteTitle : `${siteTitle} - ${pageTitle}`;
  return `<!DOCTYPE html>
<html>
${GENERATED_NOTICE}
<head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <link rel="stylesheet" type="text/css" href="${stylesheetHref}">
</head>
<body>
${body}
</body>
</html>
`;
}

function relativeFrom(fromPageId: string, target: string): string {
  return path.posix.relative(path.posix.dirname(fromPageId), target);
}

/**
 * One HTML file per page, linked by relative paths
 */
export class MultiPageBuilder implements DocumentBuilder {
  private readonly pages = new Map<string, RenderedPage>();

  readonly links: LinkResolver = {
    page: (targetPageId, fromPageId) => relativeFrom(fromPageId, pageFile(targetPageId)),
    asset: (assetPath, fromPageId) => relativeFrom(fromPageId, assetPath),
  };

  constructor(private readonly siteTitle: string) {}

  addPage(page: RenderedPage): void {
    this.pages.set(page.pageId, page);
  }

  build(): OutputFile[] {
    return Array.from(this.pages.values()).map(page => ({
      path: pageFile(page.pageId),
      content: documentShell(this.siteTitle, page.title, this.links.asset(STYLESHEET_FILE, page.pageId), page.body),
    }));
  }
}

/**
 * Element id of a page's section in single-page output
 */
export function sectionIdFor(pageId: string): string {
  return pageId.split('/').join('-');
}

const SECTION_SCRIPT = `<script>
(function () {
  function show() {
    var id = decodeURIComponent(location.hash.slice(1));
    var el = id ? document.getElementById(id) : null;
    var section = el ? el.closest('section.page') : null;
    if (!section) section = document.getElementById('${INDEX_PAGE}');
    document.querySelectorAll('section.page').forEach(function (s) { s.hidden = s !== section; });
    if (el && el !== section) el.scrollIntoView();
  }
  window.addEventListener('hashchange', show);
  show();
})();
</script>`;

/**
 * Every page in one index.html, one section per page; a small script
 * shows the section named by the location hash.
 */
export class SinglePageBuilder implements DocumentBuilder {
  private readonly pages = new Map<string, RenderedPage>();

  readonly links: LinkResolver = {
    page: targetPageId => `#${sectionIdFor(targetPageId)}`,
    asset: assetPath => assetPath,
  };

  constructor(private readonly siteTitle: string) {}

  addPage(page: RenderedPage): void {
    this.pages.set(page.pageId, page);
  }

  build(): OutputFile[] {
    const sections = Array.from(this.pages.values()).map(page =>
      `<section class="page" id="${sectionIdFor(page.pageId)}"${page.pageId === INDEX_PAGE ? '' : ' hidden'}>\n${page.body}</section>`
    );
    const body = `${sections.join('\n')}\n${SECTION_SCRIPT}`;
    return [{
      path: pageFile(INDEX_PAGE),
      content: documentShell(this.siteTitle, this.siteTitle, STYLESHEET_FILE, body),
    }];
  }
}
