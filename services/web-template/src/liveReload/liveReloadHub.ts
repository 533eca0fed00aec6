import fs from "node:fs";
import type { FastifyBaseLogger } from "fastify";

export type ReloadListener = (changedPath: string) => void;

export interface DirectoryWatcher {
  close(): void;
}

export type WatchDirectory = (
  dir: string,
  onChange: (changedPath: string) => void,
  onError: (err: Error) => void
) => DirectoryWatcher;

export interface LiveReloadHubOptions {
  dirs: string[];
  debounceMs?: number;
  watch?: WatchDirectory;
}

export type HubLogger = Pick<FastifyBaseLogger, "debug" | "warn">;

export const watchDirectory: WatchDirectory = (dir, onChange, onError) => {
  const watcher = fs.watch(dir, { recursive: true }, (_event, filename) => {
    onChange(filename ? `${dir}/${filename}` : dir);
  });
  watcher.on("error", onError);
  return watcher;
};

/**
 * Watches the template and static directories and fans a debounced "reload"
 * out to every connected browser.
 */
export class LiveReloadHub {
  private readonly listeners = new Set<ReloadListener>();
  private readonly watchers: DirectoryWatcher[] = [];
  private pending: NodeJS.Timeout | null = null;
  private lastChanged = "";
  private closed = false;
  private started = false;
  private log: HubLogger | undefined;

  constructor(private readonly options: LiveReloadHubOptions) {}

  get listenerCount() {
    return this.listeners.size;
  }

  /**
   * Begins watching. A directory that cannot be watched (e.g. missing) is
   * logged and skipped; the server keeps running without reloads for it.
   */
  start(log?: HubLogger) {
    if (this.closed || this.started) return;
    this.started = true;
    this.log = log;
    const watch = this.options.watch ?? watchDirectory;
    for (const dir of this.options.dirs) {
      try {
        this.watchers.push(
          watch(
            dir,
            (changedPath) => this.notifyChange(changedPath),
            (err) => this.log?.warn({ err, dir }, "live reload watcher failed")
          )
        );
      } catch (err) {
        this.log?.warn({ err, dir }, "live reload cannot watch directory; skipping it");
      }
    }
  }

  get watchedCount() {
    return this.watchers.length;
  }

  subscribe(listener: ReloadListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  notifyChange(changedPath: string) {
    if (this.closed) return;
    this.lastChanged = changedPath;
    // Editors often write a file several times in a row; collapse the burst into one reload.
    if (this.pending) clearTimeout(this.pending);
    this.pending = setTimeout(() => {
      this.pending = null;
      this.emit(this.lastChanged);
    }, this.options.debounceMs ?? 100);
  }

  close() {
    this.closed = true;
    if (this.pending) {
      clearTimeout(this.pending);
      this.pending = null;
    }
    for (const w of this.watchers.splice(0)) {
      w.close();
    }
    this.listeners.clear();
  }

  private emit(changedPath: string) {
    this.log?.debug({ changedPath, clients: this.listeners.size }, "live reload");
    for (const listener of [...this.listeners]) {
      listener(changedPath);
    }
  }
}
