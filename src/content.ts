import fs from "node:fs";
import path from "node:path";
import matter from "gray-matter";
import { IOError, ParseError, getErrorMessage, toSiteError } from "./errors.js";
import type { Document, DocumentFailure, FrontMatter } from "./types.js";

const DOCUMENT_EXTENSIONS = [".md", ".markdown"];

// Jekyll-style post names: 2023-03-16-some-title.md
const DATED_NAME = /^(\d{4})-(\d{2})-(\d{2})-(.+)$/;

export interface ContentOptions {
  defaultLayout: string;
  drafts: boolean;
}

export interface ContentResult {
  documents: Document[];
  failures: DocumentFailure[];
}

export function normalizeSlug(s: string): string {
  return String(s).trim().replace(/\s+/g, "-");
}

function isDocumentFile(name: string): boolean {
  const lower = name.toLowerCase();
  return DOCUMENT_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Recursively list document files under `root`. Dot-prefixed entries are
 * skipped. Paths are returned absolute, in directory-listing order.
 */
export function listSourceFiles(root: string): string[] {
  const out: string[] = [];
  function walk(dir: string) {
    for (const e of fs.readdirSync(dir, { withFileTypes: true })) {
      if (e.name.startsWith(".")) continue;
      const full = path.join(dir, e.name);
      if (e.isDirectory()) walk(full);
      else if (e.isFile() && isDocumentFile(e.name)) out.push(full);
    }
  }
  walk(root);
  return out;
}

/**
 * Split the metadata block from the body. The block must start on the first
 * line with `---` and be closed by another `---` line.
 */
export function parseFrontMatter(raw: string, filePath: string): { meta: FrontMatter; body: string } {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  const lines = text.split(/\r?\n/);
  if (lines[0]?.trimEnd() !== "---") return { meta: {}, body: text };

  const closed = lines.slice(1).some(l => l.trimEnd() === "---");
  if (!closed) throw new ParseError("unterminated front matter block", filePath);

  let parsed: matter.GrayMatterFile<string>;
  try {
    // passing options bypasses gray-matter's content-keyed cache
    parsed = matter(text, { language: "yaml" });
  } catch (err) {
    throw new ParseError(`invalid front matter: ${getErrorMessage(err)}`, filePath, { cause: err });
  }

  const data: unknown = parsed.data;
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new ParseError("front matter must be a mapping", filePath);
  }
  return { meta: Object.fromEntries(Object.entries(data)), body: parsed.content };
}

function optionalString(meta: FrontMatter, key: string, filePath: string): string | undefined {
  const v = meta[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v === "number") return String(v);
  if (typeof v !== "string") throw new ParseError(`"${key}" must be a string`, filePath);
  return v;
}

// Dates and times without a zone are read as UTC, like YAML timestamps.
const ZONELESS_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;

function parseDateString(s: string): Date {
  const m = ZONELESS_DATE.exec(s.trim());
  if (!m) return new Date(s);
  const [, y, mo, d, h = "0", mi = "0", sec = "0", ms = "0"] = m;
  const date = new Date(
    Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(sec), Number(ms.padEnd(3, "0")))
  );
  // Date.UTC rolls 2023-02-30 over into March
  if (date.getUTCMonth() !== Number(mo) - 1 || date.getUTCDate() !== Number(d)) return new Date(NaN);
  return date;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function parseDate(value: unknown, filePath: string): Date | null {
  if (isBlank(value)) return null;
  const date = value instanceof Date ? value : typeof value === "string" ? parseDateString(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ParseError(`"date" is not a valid date: ${String(value)}`, filePath);
  }
  return date;
}

function urlFor(dirSegments: string[], slug: string, isIndex: boolean): string {
  const parts = isIndex ? dirSegments : [...dirSegments, slug];
  return parts.length ? "/" + parts.join("/") : "/";
}

function normalizePermalink(p: string): string {
  const withLead = p.startsWith("/") ? p : "/" + p;
  return withLead.length > 1 ? withLead.replace(/\/+$/, "") : withLead;
}

/**
 * Build a Document from raw file text. `relPath` is relative to the content
 * root and decides the default slug, URL and date.
 */
export function parseDocument(
  relPath: string,
  raw: string,
  sourcePath: string,
  options: ContentOptions
): Document {
  const { meta, body } = parseFrontMatter(raw, sourcePath);

  const posix = relPath.split(path.sep).join("/");
  const ext = path.posix.extname(posix);
  const id = posix.slice(0, posix.length - ext.length);
  const segments = id.split("/");
  const baseName = segments.pop() ?? id;
  const dirSegments = segments.map(normalizeSlug);
  const isIndex = baseName.toLowerCase() === "index";

  const dated = DATED_NAME.exec(baseName);
  const fileSlug = dated?.[4] ?? baseName;
  const fileDate = dated ? `${dated[1]}-${dated[2]}-${dated[3]}` : undefined;

  const slug = normalizeSlug(optionalString(meta, "slug", sourcePath) ?? fileSlug);
  const title = optionalString(meta, "title", sourcePath) ?? slug;
  const layout = optionalString(meta, "layout", sourcePath) ?? options.defaultLayout;
  const permalink = optionalString(meta, "permalink", sourcePath);
  const date = parseDate(isBlank(meta.date) ? fileDate : meta.date, sourcePath);
  const order = typeof meta.order === "number" ? meta.order : 0;
  const published = meta.published !== false;

  const urlPath = permalink ? normalizePermalink(permalink) : urlFor(dirSegments, slug, isIndex);

  return { id, sourcePath, slug, urlPath, title, date, layout, order, published, meta, body };
}

/**
 * Enumerate and parse every document under `root`. A document that cannot
 * be read or parsed is reported in `failures`; the rest still load.
 */
export function loadContent(root: string, options: ContentOptions): ContentResult {
  let files: string[];
  try {
    files = listSourceFiles(root);
  } catch (err) {
    throw new IOError(`cannot read content directory: ${getErrorMessage(err)}`, root, { cause: err });
  }

  const documents: Document[] = [];
  const failures: DocumentFailure[] = [];

  for (const file of files) {
    try {
      const raw = fs.readFileSync(file, "utf-8");
      const doc = parseDocument(path.relative(root, file), raw, file, options);
      if (!doc.published && !options.drafts) continue;
      documents.push(doc);
    } catch (err) {
      failures.push({ filePath: file, error: toSiteError(err, file) });
    }
  }

  return { documents, failures };
}
