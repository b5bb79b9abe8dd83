import path from "node:path";

// Sites served from a sub-path (GitHub Pages project sites are served
// under /<repo>/) need every root-relative link prefixed with the base.

export function withBase(basePath: string, url: string): string {
  const u = String(url || "");
  if (!u) return u;
  if (u.startsWith("http://") || u.startsWith("https://") || u.startsWith("//")) return u;
  if (u.startsWith("/")) return basePath + u.slice(1);
  return basePath + u;
}

/** "/a/b" -> "<base>a/b/" so static hosts resolve index.html */
export function prettyHref(basePath: string, urlPath: string): string {
  const p = String(urlPath || "");
  if (!p || p === "/") return withBase(basePath, "/");
  if (/\.[a-z0-9]+$/i.test(p)) return withBase(basePath, p);
  return withBase(basePath, p.endsWith("/") ? p : p + "/");
}

/** Rewrite root-relative href/src attributes, e.g. href="/x" -> href="/notes/x". */
export function applyBaseToHtml(basePath: string, html: string): string {
  if (!basePath || basePath === "/") return html;
  return String(html || "").replace(/\b(href|src)=(["'])\/(?!\/)/g, `$1=$2${basePath}`);
}

/**
 * Output file for a URL path, relative and "/"-separated:
 * "/" -> "index.html", "/a/b" -> "a/b/index.html", "/feed.xml" -> "feed.xml".
 */
export function urlToOutputPath(urlPath: string): string {
  const clean = urlPath.replace(/\/+$/, "");
  if (!clean) return "index.html";
  const parts = clean.split("/").filter(Boolean);
  const last = parts[parts.length - 1] ?? "";
  if (/\.(html?|xml|txt|json)$/i.test(last)) return parts.join("/");
  return [...parts, "index.html"].join("/");
}

/** Absolute path inside `outDir` for a relative output path. */
export function outputFilePath(outDir: string, outputPath: string): string {
  return path.join(outDir, ...outputPath.split("/"));
}

/** YYYY-MM-DD in UTC, which is how YAML dates without a time are read. */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
