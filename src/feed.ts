import { prettyHref } from "./paths.js";
import type { IndexEntry } from "./types.js";

export interface FeedOptions {
  title: string;
  description: string;
  /** Absolute site origin, no trailing slash; may be empty */
  url: string;
  basePath: string;
  limit: number;
}

function escapeXml(s: string): string {
  return s.replace(/[&<>"']/g, c => {
    switch (c) {
      case "&": return "&amp;";
      case "<": return "&lt;";
      case ">": return "&gt;";
      case '"': return "&quot;";
      default: return "&apos;";
    }
  });
}

/**
 * RSS 2.0 document for the newest `limit` index entries. `lastBuildDate` is
 * the newest entry's date so the feed only changes when content does.
 */
export function renderFeed(index: readonly IndexEntry[], options: FeedOptions): string {
  const link = (urlPath: string) => options.url + prettyHref(options.basePath, urlPath);
  const entries = index.slice(0, options.limit);

  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<rss version="2.0">`,
    `<channel>`,
    `<title>${escapeXml(options.title)}</title>`,
    `<link>${escapeXml(link("/"))}</link>`,
    `<description>${escapeXml(options.description)}</description>`,
  ];
  const newest = entries[0];
  if (newest) lines.push(`<lastBuildDate>${newest.date.toUTCString()}</lastBuildDate>`);

  for (const e of entries) {
    const href = escapeXml(link(e.urlPath));
    lines.push(
      `<item>`,
      `<title>${escapeXml(e.title)}</title>`,
      `<link>${href}</link>`,
      `<guid>${href}</guid>`,
      `<pubDate>${e.date.toUTCString()}</pubDate>`,
      ...(e.description ? [`<description>${escapeXml(e.description)}</description>`] : []),
      `</item>`
    );
  }

  lines.push(`</channel>`, `</rss>`, "");
  return lines.join("\n");
}
