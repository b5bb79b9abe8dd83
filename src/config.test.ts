import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, normalizeBase, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { makeSite, removeSite } from "./test-helpers.js";

const root = path.resolve("/projects/notes");

describe("normalizeBase", () => {
  it("adds leading and trailing slashes", () => {
    expect(normalizeBase("")).toBe("/");
    expect(normalizeBase("notes")).toBe("/notes/");
    expect(normalizeBase("/notes/")).toBe("/notes/");
  });
});

describe("resolveConfig", () => {
  it("fills in defaults and resolves directories against the root", () => {
    const config = resolveConfig(root, {}, { env: {} });
    expect(config.title).toBe("Untitled site");
    expect(config.basePath).toBe("/");
    expect(config.contentDir).toBe(path.join(root, "content"));
    expect(config.outDir).toBe(path.join(root, "site"));
    expect(config.server).toEqual({ host: "127.0.0.1", port: 4000, debounceMs: 100 });
    expect(config.feed).toEqual({ enabled: true, path: "feed.xml", limit: 20 });
  });

  it("strips a trailing slash from the site url", () => {
    expect(resolveConfig(root, { url: "https://example.test/" }, { env: {} }).url).toBe("https://example.test");
  });

  it("prefers flags over the environment over the file", () => {
    const env = { BASE_PATH: "docs", PORT: "8080" };
    const fromEnv = resolveConfig(root, { basePath: "/x/", server: { port: 5000 } }, { env });
    expect(fromEnv.basePath).toBe("/docs/");
    expect(fromEnv.server.port).toBe(8080);

    const fromFlags = resolveConfig(root, {}, { env, overrides: { port: 9000, drafts: true, outDir: "dist" } });
    expect(fromFlags.server.port).toBe(9000);
    expect(fromFlags.drafts).toBe(true);
    expect(fromFlags.outDir).toBe(path.join(root, "dist"));
  });

  it("rejects an invalid PORT", () => {
    expect(() => resolveConfig(root, {}, { env: { PORT: "http" } })).toThrow(ConfigError);
  });

  it("rejects unknown keys and wrong types", () => {
    expect(() => resolveConfig(root, { bogus: true }, { env: {} })).toThrow("invalid configuration at (root)");
    expect(() => resolveConfig(root, { title: 3 }, { env: {} })).toThrow("invalid configuration at title");
  });

  it("refuses an outDir that would wipe sources", () => {
    expect(() => resolveConfig(root, { outDir: "." }, { env: {} })).toThrow(ConfigError);
    expect(() => resolveConfig(root, { outDir: "content" }, { env: {} })).toThrow(ConfigError);
    expect(() => resolveConfig(root, { contentDir: "site/content" }, { env: {} })).toThrow(ConfigError);
  });

  it("refuses an outDir that would wipe public assets", () => {
    expect(() => resolveConfig(root, { outDir: "public" }, { env: {} })).toThrow(
      "must not be the project root or contain the content, layouts or public directory"
    );
    expect(() => resolveConfig(root, { publicDir: "site/assets" }, { env: {} })).toThrow(ConfigError);
    expect(() => resolveConfig(root, {}, { env: {}, overrides: { outDir: "public" } })).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;
  afterEach(() => {
    if (dir) removeSite(dir);
    dir = undefined;
  });

  it("uses defaults without a config file", () => {
    dir = makeSite({});
    expect(loadConfig(dir, { env: {} }).title).toBe("Untitled site");
  });

  it("reads site.config.json", () => {
    dir = makeSite({ "site.config.json": JSON.stringify({ title: "Field Notes", basePath: "notes" }) });
    const config = loadConfig(dir, { env: {} });
    expect(config.title).toBe("Field Notes");
    expect(config.basePath).toBe("/notes/");
    expect(config.configPath).toBe(path.join(dir, "site.config.json"));
  });

  it("reports malformed JSON as a ConfigError", () => {
    dir = makeSite({ "site.config.json": "{ title: " });
    expect(() => loadConfig(dir ?? "", { env: {} })).toThrow("site.config.json is not valid JSON");
  });
});
