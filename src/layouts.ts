import fs from "node:fs";
import path from "node:path";
import { IOError, MissingLayoutError, ParseError, TemplateError, getErrorMessage, toSiteError } from "./errors.js";
import type { SiteError } from "./errors.js";
import { parseFrontMatter } from "./content.js";
import { compileTemplate, type Template } from "./template.js";
import type { FrontMatter } from "./types.js";

export type Layout = {
  name: string;
  filePath: string;
  /** Layout this one is wrapped in, from its own front matter */
  parent: string | undefined;
  meta: FrontMatter;
  template: Template;
};

const LAYOUT_EXTENSION = ".html";

/**
 * Named layouts plus the ones that failed to load. Lookups of a broken
 * layout rethrow its compile error.
 */
export class LayoutRegistry {
  private readonly layouts = new Map<string, Layout>();
  private readonly broken = new Map<string, SiteError>();

  add(layout: Layout): void {
    this.layouts.set(layout.name, layout);
    this.broken.delete(layout.name);
  }

  markBroken(name: string, error: SiteError): void {
    this.broken.set(name, error);
    this.layouts.delete(name);
  }

  has(name: string): boolean {
    return this.layouts.has(name);
  }

  names(): string[] {
    return [...this.layouts.keys()].sort();
  }

  failures(): Array<{ name: string; error: SiteError }> {
    return [...this.broken.entries()].map(([name, error]) => ({ name, error }));
  }

  get(name: string, referencedFrom?: string): Layout {
    const broken = this.broken.get(name);
    if (broken) throw broken;
    const layout = this.layouts.get(name);
    if (!layout) throw new MissingLayoutError(name, referencedFrom);
    return layout;
  }

  /**
   * Layouts to apply, innermost first: the named layout, then its parent,
   * and so on.
   */
  resolveChain(name: string, referencedFrom?: string): Layout[] {
    const chain: Layout[] = [];
    const seen = new Set<string>();
    let current: string | undefined = name;
    let from = referencedFrom;

    while (current !== undefined) {
      if (seen.has(current)) {
        throw new TemplateError(
          `layout inheritance cycle: ${[...seen, current].join(" -> ")}`,
          referencedFrom
        );
      }
      seen.add(current);
      const layout = this.get(current, from);
      chain.push(layout);
      from = layout.filePath;
      current = layout.parent;
    }

    return chain;
  }
}

function countLines(s: string): number {
  return s.split("\n").length - 1;
}

export function parseLayout(name: string, raw: string, filePath: string): Layout {
  let meta: FrontMatter;
  let body: string;
  try {
    ({ meta, body } = parseFrontMatter(raw, filePath));
  } catch (err) {
    if (err instanceof ParseError) throw new TemplateError(err.message, filePath);
    throw err;
  }
  const parentRaw = meta.layout;
  if (parentRaw !== undefined && typeof parentRaw !== "string") {
    throw new TemplateError(`"layout" must name a layout`, filePath);
  }
  // report template lines relative to the whole file
  const offset = countLines(raw) - countLines(body);
  const template = compileTemplate(body, filePath, offset);
  return { name, filePath, parent: parentRaw || undefined, meta, template };
}

/** Read every `*.html` file directly under `dir`. A missing directory yields an empty registry. */
export function loadLayouts(dir: string): LayoutRegistry {
  const registry = new LayoutRegistry();
  if (!fs.existsSync(dir)) return registry;

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new IOError(`cannot read layouts directory: ${getErrorMessage(err)}`, dir, { cause: err });
  }

  for (const e of entries) {
    if (!e.isFile() || !e.name.toLowerCase().endsWith(LAYOUT_EXTENSION)) continue;
    const name = e.name.slice(0, -LAYOUT_EXTENSION.length);
    const filePath = path.join(dir, e.name);
    try {
      registry.add(parseLayout(name, fs.readFileSync(filePath, "utf-8"), filePath));
    } catch (err) {
      registry.markBroken(name, toSiteError(err, filePath));
    }
  }

  return registry;
}
