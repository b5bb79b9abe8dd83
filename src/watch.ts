import { watch, type FSWatcher } from "chokidar";
import type { Logger } from "./logger.js";

export type ChangeEvent = "add" | "change" | "unlink" | "addDir" | "unlinkDir";

export interface SourceWatcherOptions {
  paths: string[];
  /** Quiet period before a batch of changes is delivered */
  debounceMs: number;
  logger: Logger;
  onChange: (changes: ReadonlyMap<string, ChangeEvent>) => void;
}

/**
 * Watches the site sources and delivers changes in batches, so saving
 * several files at once triggers one rebuild.
 */
export class SourceWatcher {
  private watcher: FSWatcher | undefined;
  private pendingChanges = new Map<string, ChangeEvent>();
  private batchTimeout: NodeJS.Timeout | undefined;
  private readonly options: SourceWatcherOptions;

  constructor(options: SourceWatcherOptions) {
    this.options = options;
  }

  get watching(): boolean {
    return this.watcher !== undefined;
  }

  start(): void {
    if (this.watcher) {
      this.options.logger.debug("Already watching sources");
      return;
    }

    this.options.logger.info(`Watching ${this.options.paths.join(", ")}`);
    this.watcher = watch(this.options.paths, {
      ignored: /(^|[/\\])\../, // dotfiles
      ignoreInitial: true,
      persistent: true,
    });

    this.watcher
      .on("add", p => this.queue("add", p))
      .on("change", p => this.queue("change", p))
      .on("unlink", p => this.queue("unlink", p))
      .on("addDir", p => this.queue("addDir", p))
      .on("unlinkDir", p => this.queue("unlinkDir", p))
      .on("error", err => this.options.logger.error("Watcher error", err));
  }

  /** Record a change and (re)start the quiet-period timer. */
  queue(event: ChangeEvent, filePath: string): void {
    this.pendingChanges.set(filePath, event);
    if (this.batchTimeout) clearTimeout(this.batchTimeout);
    this.batchTimeout = setTimeout(() => this.flush(), this.options.debounceMs);
  }

  /** Deliver pending changes now, if there are any. */
  flush(): void {
    if (this.batchTimeout) {
      clearTimeout(this.batchTimeout);
      this.batchTimeout = undefined;
    }
    if (this.pendingChanges.size === 0) return;
    const changes = this.pendingChanges;
    this.pendingChanges = new Map();
    this.options.logger.debug(`Processing ${changes.size} change(s)`);
    try {
      this.options.onChange(changes);
    } catch (err) {
      this.options.logger.error("Change handler failed", err);
    }
  }

  async stop(): Promise<void> {
    if (this.batchTimeout) {
      clearTimeout(this.batchTimeout);
      this.batchTimeout = undefined;
    }
    this.pendingChanges.clear();
    if (this.watcher) {
      const w = this.watcher;
      this.watcher = undefined;
      await w.close();
      this.options.logger.info("Stopped watching sources");
    }
  }
}
