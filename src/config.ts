import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError, getErrorMessage } from "./errors.js";

export const CONFIG_FILENAME = "site.config.json";

// Optional project configuration. Every key has a default, so an absent
// file builds with the conventional layout:
// {
//   "title": "Field notes",
//   "basePath": "/notes/",
//   "feed": { "limit": 10 }
// }
const configSchema = z
  .object({
    title: z.string().default("Untitled site"),
    description: z.string().default(""),
    url: z
      .string()
      .default("")
      .transform(u => u.trim().replace(/\/+$/, "")),
    basePath: z.string().default("/"),
    contentDir: z.string().min(1).default("content"),
    layoutsDir: z.string().min(1).default("layouts"),
    publicDir: z.string().min(1).default("public"),
    outDir: z.string().min(1).default("site"),
    defaultLayout: z.string().min(1).default("default"),
    drafts: z.boolean().default(false),
    feed: z
      .object({
        enabled: z.boolean().default(true),
        path: z.string().min(1).default("feed.xml"),
        limit: z.number().int().positive().default(20),
      })
      .strict()
      .default({}),
    server: z
      .object({
        host: z.string().min(1).default("127.0.0.1"),
        port: z.number().int().min(0).max(65535).default(4000),
        debounceMs: z.number().int().nonnegative().default(100),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RawSiteConfig = z.input<typeof configSchema>;

export type SiteConfig = Omit<z.output<typeof configSchema>, "contentDir" | "layoutsDir" | "publicDir" | "outDir"> & {
  rootDir: string;
  configPath: string;
  /** Absolute directories */
  contentDir: string;
  layoutsDir: string;
  publicDir: string;
  outDir: string;
};

export interface ConfigOverrides {
  outDir?: string;
  drafts?: boolean;
  host?: string;
  port?: number;
}

export function normalizeBase(b: string): string {
  b = String(b || "").trim();
  if (!b) return "/";
  if (!b.startsWith("/")) b = "/" + b;
  if (!b.endsWith("/")) b = b + "/";
  return b;
}

function parsePort(raw: string, source: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || port > 65535) {
    throw new ConfigError(`${source} must be a port number between 0 and 65535, got "${raw}"`);
  }
  return port;
}

function isInside(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Validate raw configuration and resolve it against the project root.
 * Precedence: overrides (CLI flags) > environment > file > defaults.
 */
export function resolveConfig(
  rootDir: string,
  raw: unknown,
  options: { env?: NodeJS.ProcessEnv; overrides?: ConfigOverrides; configPath?: string } = {}
): SiteConfig {
  const root = path.resolve(rootDir);
  const configPath = options.configPath ?? path.join(root, CONFIG_FILENAME);
  const env = options.env ?? {};
  const overrides = options.overrides ?? {};

  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join(".") : "(root)";
    throw new ConfigError(`invalid configuration at ${where}: ${issue?.message ?? "unknown issue"}`, configPath);
  }
  const cfg = parsed.data;

  const basePath = normalizeBase(env.BASE_PATH ?? cfg.basePath);
  let port = cfg.server.port;
  if (env.PORT !== undefined && env.PORT !== "") port = parsePort(env.PORT, "PORT");
  if (overrides.port !== undefined) port = overrides.port;

  const resolved: SiteConfig = {
    ...cfg,
    basePath,
    drafts: overrides.drafts ?? cfg.drafts,
    server: { ...cfg.server, port, host: overrides.host ?? cfg.server.host },
    rootDir: root,
    configPath,
    contentDir: path.resolve(root, cfg.contentDir),
    layoutsDir: path.resolve(root, cfg.layoutsDir),
    publicDir: path.resolve(root, cfg.publicDir),
    outDir: path.resolve(root, overrides.outDir ?? cfg.outDir),
  };

  // outDir is wiped before every write
  if (
    resolved.outDir === root ||
    isInside(resolved.outDir, resolved.contentDir) ||
    isInside(resolved.outDir, resolved.layoutsDir) ||
    isInside(resolved.outDir, resolved.publicDir)
  ) {
    throw new ConfigError(
      `outDir "${resolved.outDir}" must not be the project root or contain the content, layouts or public directory`,
      configPath
    );
  }

  return resolved;
}

/** Load `site.config.json` from the project root, if it exists, and resolve it. */
export function loadConfig(
  rootDir: string,
  options: { env?: NodeJS.ProcessEnv; overrides?: ConfigOverrides } = {}
): SiteConfig {
  const configPath = path.resolve(rootDir, CONFIG_FILENAME);
  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    let text: string;
    try {
      text = fs.readFileSync(configPath, "utf-8");
    } catch (err) {
      throw new ConfigError(`cannot read ${CONFIG_FILENAME}: ${getErrorMessage(err)}`, configPath, { cause: err });
    }
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`${CONFIG_FILENAME} is not valid JSON: ${getErrorMessage(err)}`, configPath, { cause: err });
    }
  }
  return resolveConfig(rootDir, raw, { ...options, configPath });
}
