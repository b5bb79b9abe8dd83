import express from "express";
import type { Express, Request, Response } from "express";
import type { Server } from "node:http";
import { buildSite, type BuildResult } from "./build.js";
import type { SiteConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { OutputFile, Site } from "./types.js";
import { SourceWatcher } from "./watch.js";

export interface PreviewServerOptions {
  config: SiteConfig;
  logger: Logger;
  watch?: boolean;
  /** Re-read configuration before each rebuild; defaults to reusing `config` */
  reloadConfig?: () => SiteConfig;
  /** Build function, swappable in tests */
  build?: (config: SiteConfig, logger: Logger) => BuildResult;
}

/**
 * Find the output file for a request path relative to the mount point:
 * exact file, then `<path>/index.html`, then `<path>.html`.
 */
export function lookupFile(site: Site, requestPath: string): OutputFile | undefined {
  let p: string;
  try {
    p = decodeURIComponent(requestPath);
  } catch {
    return undefined;
  }
  p = p.replace(/^\/+/, "");
  if (p.split("/").includes("..")) return undefined;

  const candidates = !p || p.endsWith("/")
    ? [`${p}index.html`]
    : [p, `${p}/index.html`, `${p}.html`];
  for (const c of candidates) {
    const file = site.files.get(c);
    if (file) return file;
  }
  return undefined;
}

/**
 * Serves the in-memory output tree. The tree is swapped as a whole after
 * each rebuild, so a request sees either the old site or the new one.
 */
export class PreviewServer {
  private site: Site;
  private config: SiteConfig;
  private server: Server | undefined;
  private watcher: SourceWatcher | undefined;
  private readonly logger: Logger;
  private readonly options: PreviewServerOptions;
  readonly app: Express;

  constructor(options: PreviewServerOptions) {
    this.options = options;
    this.config = options.config;
    this.logger = options.logger.child("serve");
    this.site = this.runBuild().site;
    this.app = this.createApp();
  }

  get current(): Site {
    return this.site;
  }

  private runBuild(): BuildResult {
    const build = this.options.build ?? buildSite;
    const result = build(this.config, this.logger);
    for (const f of result.failures) this.logger.error(`${f.filePath}: ${f.error.message}`);
    if (result.failures.length) {
      this.logger.warn(`Built with ${result.failures.length} failure(s); ${result.rendered} document(s) rendered`);
    } else {
      this.logger.info(`Built ${result.rendered} document(s)`);
    }
    return result;
  }

  /**
   * Re-run the pipeline and swap the tree. Runs synchronously, so no request
   * is served in between.
   */
  rebuild(): BuildResult {
    if (this.options.reloadConfig) {
      // port and host stay as bound
      const next = this.options.reloadConfig();
      this.config = { ...next, server: this.config.server, basePath: this.config.basePath };
    }
    const result = this.runBuild();
    this.site = result.site;
    return result;
  }

  private send(res: Response, file: OutputFile, status = 200) {
    res.status(status).type(file.contentType).send(file.body);
  }

  private createApp(): Express {
    const app = express();
    const base = this.config.basePath;
    const mount = base === "/" ? "/" : base.slice(0, -1);

    const router = express.Router();
    router.use(express.static(this.config.publicDir));
    router.get("*", (req: Request, res: Response) => {
      const file = lookupFile(this.site, req.path);
      if (file) return this.send(res, file);

      const notFound = this.site.files.get("404.html");
      if (notFound) return this.send(res, notFound, 404);
      res.status(404).type("text/plain").send("Not found");
    });

    app.use(mount, router);
    if (mount !== "/") app.get("/", (_req: Request, res: Response) => res.redirect(base));
    return app;
  }

  /** Listen on the configured host/port; resolves with the preview URL. */
  start(): Promise<string> {
    if (this.server) return Promise.reject(new Error("preview server already started"));
    const { host, port } = this.config.server;

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host);
      server.once("error", reject);
      server.once("listening", () => {
        server.off("error", reject);
        this.server = server;
        const addr = server.address();
        const boundPort = addr && typeof addr === "object" ? addr.port : port;
        const url = `http://${host}:${boundPort}${this.config.basePath}`;
        this.logger.info(`Preview: ${url}`);

        if (this.options.watch) {
          this.watcher = new SourceWatcher({
            paths: [this.config.contentDir, this.config.layoutsDir, this.config.configPath],
            debounceMs: this.config.server.debounceMs,
            logger: this.logger,
            onChange: changes => {
              this.logger.info(`${changes.size} file(s) changed, rebuilding`);
              this.rebuild();
            },
          });
          this.watcher.start();
        }
        resolve(url);
      });
    });
  }

  /** Stop watching and release the port. */
  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.stop();
      this.watcher = undefined;
    }
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.logger.info("Preview server stopped");
  }
}
