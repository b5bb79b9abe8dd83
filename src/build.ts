import fs from "node:fs";
import path from "node:path";
import { assembleSite, buildIndex } from "./assemble.js";
import type { SiteConfig } from "./config.js";
import { loadContent } from "./content.js";
import { IOError, OutputConflictError, getErrorMessage, toSiteError } from "./errors.js";
import { loadLayouts, type LayoutRegistry } from "./layouts.js";
import type { Logger } from "./logger.js";
import { buildNavTree } from "./nav.js";
import { outputFilePath, urlToOutputPath } from "./paths.js";
import { createRenderer } from "./render.js";
import type { Document, DocumentFailure, RenderedPage, Site } from "./types.js";

interface ScreenResult {
  documents: Document[];
  rejected: DocumentFailure[];
}

/**
 * Drop documents whose layout chain does not resolve and documents whose
 * output path is already taken by a lexically smaller source path.
 */
function screenDocuments(documents: readonly Document[], layouts: LayoutRegistry): ScreenResult {
  const kept: Document[] = [];
  const rejected: DocumentFailure[] = [];
  const owners = new Map<string, Document>();

  const ordered = [...documents].sort((a, b) => (a.sourcePath < b.sourcePath ? -1 : a.sourcePath > b.sourcePath ? 1 : 0));
  for (const doc of ordered) {
    try {
      layouts.resolveChain(doc.layout, doc.sourcePath);
    } catch (err) {
      rejected.push({ filePath: doc.sourcePath, error: toSiteError(err, doc.sourcePath) });
      continue;
    }

    const outputPath = urlToOutputPath(doc.urlPath);
    const owner = owners.get(outputPath);
    if (owner) {
      rejected.push({
        filePath: doc.sourcePath,
        error: new OutputConflictError(outputPath, doc.sourcePath, owner.sourcePath),
      });
      continue;
    }
    owners.set(outputPath, doc);
    kept.push(doc);
  }

  return { documents: kept, rejected };
}

export interface BuildResult {
  site: Site;
  failures: DocumentFailure[];
  /** Documents that made it into the site */
  rendered: number;
}

/**
 * Content store -> renderer -> assembler, synchronously. Per-document
 * failures are collected; every other document is still rendered.
 * Throws only when the content root itself cannot be read.
 */
export function buildSite(config: SiteConfig, logger: Logger): BuildResult {
  const log = logger.child("build");

  const content = loadContent(config.contentDir, { defaultLayout: config.defaultLayout, drafts: config.drafts });
  const failures: DocumentFailure[] = [...content.failures];
  log.debug(`Loaded ${content.documents.length} document(s) from ${config.contentDir}`);

  const layouts = loadLayouts(config.layoutsDir);
  for (const { error } of layouts.failures()) {
    failures.push({ filePath: error.filePath ?? config.layoutsDir, error });
  }
  log.debug(`Loaded layouts: ${layouts.names().join(", ") || "(none)"}`);

  // Only documents that will be written may appear in the index, nav or feed.
  const { documents, rejected } = screenDocuments(content.documents, layouts);
  failures.push(...rejected);

  let candidates = documents;
  let index = buildIndex(candidates);
  let nav = buildNavTree(candidates);
  let renderer = createRenderer({ config, layouts, nav, index });
  let pages: RenderedPage[] = [];

  // A render failure removes the document; derive everything again without it.
  for (;;) {
    pages = [];
    const failed = new Set<Document>();
    for (const doc of candidates) {
      try {
        pages.push(renderer.renderDocument(doc));
      } catch (err) {
        failed.add(doc);
        failures.push({ filePath: doc.sourcePath, error: toSiteError(err, doc.sourcePath) });
      }
    }
    if (!failed.size) break;
    candidates = candidates.filter(doc => !failed.has(doc));
    index = buildIndex(candidates);
    nav = buildNavTree(candidates);
    renderer = createRenderer({ config, layouts, nav, index });
  }

  const generated: RenderedPage[] = [];
  for (const page of [renderer.homePage(), renderer.notFoundPage()]) {
    try {
      generated.push(renderer.renderGenerated(page));
    } catch (err) {
      const where = path.join(config.layoutsDir, `${config.defaultLayout}.html`);
      failures.push({ filePath: where, error: toSiteError(err, where) });
    }
  }

  const { site, conflicts } = assembleSite({
    pages,
    index,
    nav,
    generated,
    feed: config.feed.enabled
      ? {
          path: config.feed.path,
          limit: config.feed.limit,
          title: config.title,
          description: config.description,
          url: config.url,
          basePath: config.basePath,
        }
      : undefined,
  });
  failures.push(...conflicts);
  failures.sort((a, b) => (a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : 0));

  for (const f of failures) log.debug(`${f.filePath}: ${f.error.kind}: ${f.error.message}`);

  return { site, failures, rendered: pages.length - conflicts.length };
}

function copyDir(src: string, dst: string) {
  fs.mkdirSync(dst, { recursive: true });
  for (const ent of fs.readdirSync(src, { withFileTypes: true })) {
    const s = path.join(src, ent.name);
    const d = path.join(dst, ent.name);
    if (ent.isDirectory()) copyDir(s, d);
    else if (ent.isFile()) fs.copyFileSync(s, d);
  }
}

/** Replace `config.outDir` with `public/` plus every file of the output tree. */
export function writeSite(site: Site, config: SiteConfig): void {
  const outDir = config.outDir;
  try {
    fs.rmSync(outDir, { recursive: true, force: true });
    fs.mkdirSync(outDir, { recursive: true });
    if (fs.existsSync(config.publicDir)) copyDir(config.publicDir, outDir);
  } catch (err) {
    throw new IOError(`cannot prepare output directory: ${getErrorMessage(err)}`, outDir, { cause: err });
  }

  for (const file of site.files.values()) {
    const target = outputFilePath(outDir, file.path);
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, file.body);
    } catch (err) {
      throw new IOError(`cannot write output file: ${getErrorMessage(err)}`, target, { cause: err });
    }
  }
}
