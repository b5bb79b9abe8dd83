import { OutputConflictError } from "./errors.js";
import { renderFeed, type FeedOptions } from "./feed.js";
import type { Document, DocumentFailure, IndexEntry, OutputFile, RenderedPage, SectionNode, Site } from "./types.js";

export const HTML_TYPE = "text/html; charset=utf-8";
export const FEED_TYPE = "application/rss+xml; charset=utf-8";

export function compareIndexEntries(a: IndexEntry, b: IndexEntry): number {
  return (
    b.date.getTime() - a.date.getTime() ||
    a.title.localeCompare(b.title) ||
    (a.urlPath < b.urlPath ? -1 : a.urlPath > b.urlPath ? 1 : 0)
  );
}

/** Dated documents, newest first, then by title and URL. */
export function buildIndex(documents: readonly Document[]): IndexEntry[] {
  const entries: IndexEntry[] = [];
  for (const doc of documents) {
    if (!doc.date) continue;
    const description = typeof doc.meta.description === "string" ? doc.meta.description : "";
    entries.push({ id: doc.id, title: doc.title, urlPath: doc.urlPath, date: doc.date, description });
  }
  return entries.sort(compareIndexEntries);
}

export interface AssembleInput {
  pages: readonly RenderedPage[];
  index: readonly IndexEntry[];
  nav: SectionNode;
  /** Added only where no rendered document produced the same output path */
  generated?: readonly RenderedPage[];
  feed?: (FeedOptions & { path: string }) | undefined;
}

export interface AssembleResult {
  site: Site;
  conflicts: DocumentFailure[];
}

function byPath(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Build the output tree. The result depends only on the input set, never
 * on its order: pages are taken in source-path order (the first one wins an
 * output path) and the tree's keys are sorted.
 */
export function assembleSite(input: AssembleInput): AssembleResult {
  const owners = new Map<string, RenderedPage>();
  const conflicts: DocumentFailure[] = [];

  const pages = [...input.pages].sort((a, b) => byPath(a.sourcePath, b.sourcePath));
  for (const page of pages) {
    const owner = owners.get(page.outputPath);
    if (owner) {
      conflicts.push({
        filePath: page.sourcePath,
        error: new OutputConflictError(page.outputPath, page.sourcePath, owner.sourcePath),
      });
      continue;
    }
    owners.set(page.outputPath, page);
  }

  for (const page of input.generated ?? []) {
    if (!owners.has(page.outputPath)) owners.set(page.outputPath, page);
  }

  const files: OutputFile[] = [...owners.values()].map(p => ({ path: p.outputPath, contentType: HTML_TYPE, body: p.html }));

  if (input.feed) {
    const feedPath = input.feed.path.replace(/^\/+/, "");
    if (!owners.has(feedPath)) {
      files.push({ path: feedPath, contentType: FEED_TYPE, body: renderFeed(input.index, input.feed) });
    }
  }

  files.sort((a, b) => byPath(a.path, b.path));
  const index = [...input.index].sort(compareIndexEntries);

  return {
    site: { files: new Map(files.map(f => [f.path, f])), index, nav: input.nav },
    conflicts,
  };
}
