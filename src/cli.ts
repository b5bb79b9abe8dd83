#!/usr/bin/env node
import path from "node:path";
import sade from "sade";
import { buildSite, writeSite } from "./build.js";
import { loadConfig, type ConfigOverrides } from "./config.js";
import { SiteError, getErrorMessage } from "./errors.js";
import { LogLevel, createLogger, type Logger } from "./logger.js";
import { PreviewServer } from "./server.js";

interface CommonOptions {
  drafts?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

interface BuildOptions extends CommonOptions {
  out?: string;
}

interface ServeOptions extends CommonOptions {
  watch?: boolean;
  port?: string | number;
  host?: string;
}

function loggerFor(opts: CommonOptions): Logger {
  const level = opts.verbose ? LogLevel.DEBUG : opts.quiet ? LogLevel.WARN : LogLevel.INFO;
  return createLogger({ level });
}

function fail(logger: Logger, err: unknown): never {
  const where = err instanceof SiteError && err.filePath ? `${err.filePath}: ` : "";
  logger.error(`${where}${getErrorMessage(err)}`);
  process.exit(1);
}

function parsePortFlag(raw: string | number | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new Error(`--port must be a port number, got "${raw}"`);
  return n;
}

function build(root: string | undefined, opts: BuildOptions) {
  const logger = loggerFor(opts);
  const rootDir = path.resolve(root || ".");
  try {
    const overrides: ConfigOverrides = { drafts: opts.drafts, outDir: opts.out };
    const config = loadConfig(rootDir, { env: process.env, overrides });
    const result = buildSite(config, logger);
    writeSite(result.site, config);

    if (result.failures.length) {
      for (const f of result.failures) console.error(`${f.filePath}: ${f.error.message}`);
      console.error(`✗ Build failed: ${result.failures.length} error(s), ${result.rendered} document(s) rendered`);
      process.exit(1);
    }
    console.log(`✅ Static site generated into: ${config.outDir}`);
    console.log(`BASE_PATH=${config.basePath}`);
  } catch (err) {
    fail(logger, err);
  }
}

async function serve(root: string | undefined, opts: ServeOptions) {
  const logger = loggerFor(opts);
  const rootDir = path.resolve(root || ".");
  let server: PreviewServer;
  try {
    const overrides: ConfigOverrides = { drafts: opts.drafts, host: opts.host, port: parsePortFlag(opts.port) };
    const load = () => loadConfig(rootDir, { env: process.env, overrides });
    server = new PreviewServer({ config: load(), logger, watch: Boolean(opts.watch), reloadConfig: load });
    await server.start();
  } catch (err) {
    fail(logger, err);
  }

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    server.stop().then(
      () => process.exit(0),
      err => fail(logger, err)
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

const prog = sade("inkwell");

prog
  .version("0.1.0")
  .describe("Static site pipeline for Markdown blogs.")
  .option("--drafts", "Include documents with `published: false`")
  .option("-v, --verbose", "Debug logging")
  .option("-q, --quiet", "Only warnings and errors");

prog
  .command("build [root]")
  .describe("Render the site once into the output directory.")
  .option("-o, --out", "Output directory (default from site.config.json)")
  .example("build")
  .example("build ./blog --out public_html")
  .action(build);

prog
  .command("serve [root]")
  .describe("Preview the site from memory.")
  .option("-w, --watch", "Rebuild when content, layouts or config change")
  .option("-p, --port", "Port to listen on")
  .option("--host", "Interface to bind")
  .example("serve --watch")
  .example("serve ./blog --port 8080")
  .action((root: string | undefined, opts: ServeOptions) => {
    void serve(root, opts);
  });

prog.parse(process.argv);
