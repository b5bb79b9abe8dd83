import { normalizeSlug } from "./content.js";
import { escapeHtml } from "./template.js";
import { prettyHref } from "./paths.js";
import type { Document, PageNode, SectionNode } from "./types.js";

function byOrderThenTitle(a: SectionNode | PageNode, b: SectionNode | PageNode): number {
  return (a.order - b.order) || a.title.localeCompare(b.title) || a.path.localeCompare(b.path);
}

function pageNode(doc: Document): PageNode {
  return { type: "page", title: doc.title, slug: doc.slug, path: doc.urlPath, sourcePath: doc.sourcePath, order: doc.order };
}

/**
 * Sections follow the content directories; `index` documents become their
 * section's index page and lend it their title and order. A root `index`
 * document becomes the root's index page.
 */
export function buildNavTree(documents: readonly Document[]): SectionNode {
  const root: SectionNode = { type: "section", title: "root", slug: "", path: "", order: 0, children: [] };

  function sectionFor(dirs: string[]): SectionNode {
    let cur = root;
    for (const dir of dirs) {
      const slug = normalizeSlug(dir);
      let next = cur.children.find((c): c is SectionNode => c.type === "section" && c.slug === slug);
      if (!next) {
        next = { type: "section", title: dir, slug, path: `${cur.path}/${slug}`, order: 0, children: [] };
        cur.children.push(next);
      }
      cur = next;
    }
    return cur;
  }

  for (const doc of documents) {
    const segments = doc.id.split("/");
    const base = segments.pop() ?? "";
    const sec = sectionFor(segments);
    const page = pageNode(doc);
    if (base.toLowerCase() === "index") {
      sec.indexPage = page;
      if (sec !== root) {
        sec.title = doc.title;
        sec.order = doc.order;
      }
    } else {
      sec.children.push(page);
    }
  }

  function sortAll(sec: SectionNode) {
    sec.children.sort(byOrderThenTitle);
    for (const ch of sec.children) if (ch.type === "section") sortAll(ch);
  }
  sortAll(root);
  return root;
}

/** Section titles down to the page, e.g. ["Guides", "Setup"]. */
export function findBreadcrumbTitles(tree: SectionNode, urlPath: string): string[] {
  const target = urlPath.replace(/\/$/, "");
  const out: string[] = [];

  function walk(sec: SectionNode, trail: string[]): boolean {
    const here = sec === tree ? trail : [...trail, sec.title];
    if (sec.indexPage && sec.indexPage.path.replace(/\/$/, "") === target) {
      out.push(...here);
      if (sec === tree) out.push(sec.indexPage.title);
      return true;
    }
    for (const ch of sec.children) {
      if (ch.type === "page") {
        if (ch.path.replace(/\/$/, "") === target) {
          out.push(...here, ch.title);
          return true;
        }
      } else if (walk(ch, here)) {
        return true;
      }
    }
    return false;
  }

  walk(tree, []);
  return out;
}

export function renderBreadcrumbs(tree: SectionNode, urlPath: string): string {
  const crumbs = findBreadcrumbTitles(tree, urlPath);
  if (!crumbs.length) return "";
  return `<nav class="breadcrumbs">${crumbs.map(c => `<span class="crumb">${escapeHtml(c)}</span>`).join(" / ")}</nav>`;
}

export function renderNav(tree: SectionNode, basePath: string, activePath: string = ""): string {
  const esc = escapeHtml;
  const active = activePath.replace(/\/$/, "");

  function link(title: string, href: string, depth: number, cls: string) {
    const isActive = href.replace(/\/$/, "") === active;
    const current = isActive ? ` aria-current="page"` : "";
    return `<a class="nav-link ${cls} d-${depth}" href="${esc(prettyHref(basePath, href))}"${current}><span class="nav-text">${esc(title)}</span></a>`;
  }

  function label(title: string, depth: number) {
    return `<div class="nav-link nav-label d-${depth}"><span class="nav-text">${esc(title)}</span></div>`;
  }

  function nodeHtml(node: SectionNode | PageNode, depth: number): string {
    if (node.type === "page") return link(node.title, node.path, depth, "nav-page");

    const hasKids = node.children.length > 0;
    const isOpen = !!active && (active === node.path || active.startsWith(node.path + "/"));

    const head = node.indexPage
      ? link(node.title, node.indexPage.path, depth, "nav-section")
      : label(node.title, depth);

    const kids = node.children.map(c => nodeHtml(c, depth + 1)).join("");
    const kidsWrap = kids ? `<div class="nav-children">${kids}</div>` : "";

    const stateCls = hasKids ? (isOpen ? "is-open" : "is-collapsed") : "is-leaf";
    return `<div class="nav-item ${stateCls}" data-nav-path="${esc(encodeURI(node.path))}">${head}${kidsWrap}</div>`;
  }

  const home = tree.indexPage ? link(tree.indexPage.title, "/", 0, "nav-home") : "";
  return `<nav class="nav">${home}${tree.children.map(n => nodeHtml(n, 0)).join("")}</nav>`;
}
