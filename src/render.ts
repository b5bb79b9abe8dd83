import type { SiteConfig } from "./config.js";
import type { LayoutRegistry } from "./layouts.js";
import { createMarkdownRenderer, type MarkdownRenderer } from "./markdown.js";
import { renderBreadcrumbs, renderNav } from "./nav.js";
import { formatDate, prettyHref, urlToOutputPath } from "./paths.js";
import { escapeHtml, renderTemplate, type TemplateVars } from "./template.js";
import type { Document, FrontMatter, IndexEntry, RenderedPage, SectionNode } from "./types.js";

export interface RenderContext {
  config: Pick<SiteConfig, "title" | "description" | "url" | "basePath" | "defaultLayout">;
  layouts: LayoutRegistry;
  nav: SectionNode;
  index: readonly IndexEntry[];
}

export interface GeneratedPage {
  title: string;
  urlPath: string;
  bodyHtml: string;
}

function scalarToString(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  if (v instanceof Date && !Number.isNaN(v.getTime())) return formatDate(v);
  return undefined;
}

function prefixedVars(prefix: string, meta: FrontMatter): TemplateVars {
  const vars: TemplateVars = {};
  for (const [k, v] of Object.entries(meta)) {
    const s = scalarToString(v);
    if (s !== undefined) vars[`${prefix}.${k}`] = escapeHtml(s);
  }
  return vars;
}

/** Chronological post list used for the `index` slot and the generated home page. */
export function renderIndexList(index: readonly IndexEntry[], basePath: string): string {
  if (!index.length) return `<ul class="post-index"></ul>`;
  const items = index.map(e => {
    const day = formatDate(e.date);
    return `<li><time datetime="${day}">${day}</time> <a href="${escapeHtml(prettyHref(basePath, e.urlPath))}">${escapeHtml(e.title)}</a></li>`;
  });
  return `<ul class="post-index">${items.join("")}</ul>`;
}

// Used when the site has no default layout for generated pages.
function bareShell(title: string, content: string): string {
  return `<!doctype html>\n<html><head><meta charset="utf-8"><title>${title}</title></head><body>${content}</body></html>\n`;
}

export class Renderer {
  private readonly markdown: MarkdownRenderer;
  private readonly indexHtml: string;
  private readonly siteVars: TemplateVars;

  constructor(private readonly ctx: RenderContext) {
    const { config } = ctx;
    this.markdown = createMarkdownRenderer(config.basePath);
    this.indexHtml = renderIndexList(ctx.index, config.basePath);
    this.siteVars = {
      "site.title": escapeHtml(config.title),
      "site.description": escapeHtml(config.description),
      "site.url": escapeHtml(config.url),
      base: escapeHtml(config.basePath),
    };
  }

  private pageVars(title: string, urlPath: string, meta: FrontMatter, date: Date | null): TemplateVars {
    return {
      ...this.siteVars,
      ...prefixedVars("page", meta),
      title: escapeHtml(title),
      "page.title": escapeHtml(title),
      "page.url": escapeHtml(prettyHref(this.ctx.config.basePath, urlPath)),
      "page.date": date ? formatDate(date) : "",
      nav: renderNav(this.ctx.nav, this.ctx.config.basePath, urlPath),
      breadcrumbs: renderBreadcrumbs(this.ctx.nav, urlPath),
      index: this.indexHtml,
    };
  }

  /** Apply the layout chain innermost first, feeding each output in as `content`. */
  private applyLayouts(layoutName: string, vars: TemplateVars, content: string, referencedFrom?: string): string {
    let out = content;
    for (const layout of this.ctx.layouts.resolveChain(layoutName, referencedFrom)) {
      out = renderTemplate(layout.template, { ...vars, ...prefixedVars("layout", layout.meta), content: out });
    }
    return out;
  }

  /**
   * Render one document through its layout chain. Throws MissingLayoutError
   * or TemplateError; never writes anything.
   */
  renderDocument(doc: Document): RenderedPage {
    const bodyHtml = this.markdown(doc.body);
    const vars = this.pageVars(doc.title, doc.urlPath, doc.meta, doc.date);
    const html = this.applyLayouts(doc.layout, vars, bodyHtml, doc.sourcePath);
    return { urlPath: doc.urlPath, outputPath: urlToOutputPath(doc.urlPath), sourcePath: doc.sourcePath, html };
  }

  /** Pages the assembler adds (home index, 404). Uses the default layout when there is one. */
  renderGenerated(page: GeneratedPage): RenderedPage {
    const outputPath = urlToOutputPath(page.urlPath);
    const { defaultLayout } = this.ctx.config;
    const html = this.ctx.layouts.has(defaultLayout)
      ? this.applyLayouts(defaultLayout, this.pageVars(page.title, page.urlPath, {}, null), page.bodyHtml)
      : bareShell(escapeHtml(page.title), page.bodyHtml);
    return { urlPath: page.urlPath, outputPath, sourcePath: `(generated) ${outputPath}`, html };
  }

  homePage(): GeneratedPage {
    return {
      title: this.ctx.config.title,
      urlPath: "/",
      bodyHtml: `<h1>${escapeHtml(this.ctx.config.title)}</h1>${this.indexHtml}`,
    };
  }

  notFoundPage(): GeneratedPage {
    return {
      title: "404",
      urlPath: "/404.html",
      bodyHtml: `<h1>404</h1><p>Page not found</p>`,
    };
  }
}

export function createRenderer(ctx: RenderContext): Renderer {
  return new Renderer(ctx);
}
