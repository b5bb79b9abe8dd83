import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolveConfig, type RawSiteConfig, type SiteConfig } from "./config.js";
import { LogLevel, createLogger } from "./logger.js";
import type { Document } from "./types.js";

export const silentLogger = createLogger({ level: LogLevel.NONE });

/** Create a temporary project directory populated with `files` (relative path -> text). */
export function makeSite(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "inkwell-test-"));
  for (const [rel, text] of Object.entries(files)) writeFile(root, rel, text);
  return root;
}

export function writeFile(root: string, rel: string, text: string): void {
  const full = path.join(root, ...rel.split("/"));
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, text);
}

export function removeSite(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export function siteConfig(root: string, raw: RawSiteConfig = {}): SiteConfig {
  return resolveConfig(root, raw, { env: {} });
}

export function makeDocument(overrides: Partial<Document> & Pick<Document, "id">): Document {
  const slug = overrides.slug ?? overrides.id.split("/").pop() ?? overrides.id;
  return {
    sourcePath: `/content/${overrides.id}.md`,
    slug,
    urlPath: `/${overrides.id}`,
    title: slug,
    date: null,
    layout: "default",
    order: 0,
    published: true,
    meta: {},
    body: "",
    ...overrides,
  };
}
