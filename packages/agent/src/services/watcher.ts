import chokidar, { type FSWatcher } from 'chokidar';
import { promises as fsp } from 'fs';
import { extname, join, normalize } from 'path';
import { logger } from '../logger';

export const DEFAULT_SETTLE_DELAY_MS = 500;
export const DEFAULT_EXTENSIONS = ['.nc', '.gcode'];
export const DEFAULT_MAX_TRACKED = 10_000;

function delay(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Paths already handed to the processor. Oldest entries are evicted past `limit`. */
export class ProcessedPaths {
  private readonly seen = new Set<string>();

  constructor(private readonly limit = DEFAULT_MAX_TRACKED) {}

  has(path: string): boolean {
    return this.seen.has(path);
  }

  add(path: string): void {
    this.seen.add(path);
    while (this.seen.size > this.limit) {
      const oldest = this.seen.values().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }

  get size(): number {
    return this.seen.size;
  }
}

export type WatcherOptions = {
  settleDelayMs?: number;
  extensions?: string[];
  processed?: ProcessedPaths;
};

export type FileHandler = (path: string) => Promise<unknown>;

/**
 * Watches one directory (not recursive) for new program files and runs
 * `handler` for each, strictly one at a time.
 */
export class ProgramWatcher {
  private watcher: FSWatcher | null = null;
  private chain: Promise<void> = Promise.resolve();
  private readonly processed: ProcessedPaths;
  private readonly extensions: Set<string>;
  private readonly settleDelayMs: number;

  constructor(
    readonly directory: string,
    private readonly handler: FileHandler,
    options: WatcherOptions = {}
  ) {
    this.processed = options.processed ?? new ProcessedPaths();
    this.extensions = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map((ext) => ext.toLowerCase()));
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
  }

  accepts(path: string): boolean {
    return this.extensions.has(extname(path).toLowerCase());
  }

  /** Queues `path` behind any file in flight. Returns false when it was ignored. */
  enqueue(path: string): boolean {
    const normalizedPath = normalize(path);
    if (!this.accepts(normalizedPath)) return false;
    if (this.processed.has(normalizedPath)) {
      logger.debug({ path: normalizedPath }, 'watcher: duplicate event ignored');
      return false;
    }
    this.processed.add(normalizedPath);
    logger.info({ path: normalizedPath }, 'watcher: new file detected');
    this.chain = this.chain
      .then(() => delay(this.settleDelayMs))
      .then(() => this.handler(normalizedPath))
      .then(
        () => {
          logger.debug({ path: normalizedPath }, 'watcher: file handled');
        },
        (err: unknown) => {
          logger.error({ err, path: normalizedPath }, 'watcher: handler failed');
        }
      );
    return true;
  }

  async start(): Promise<void> {
    if (this.watcher) return;
    await fsp.mkdir(this.directory, { recursive: true });
    const watcher = chokidar.watch(this.directory, {
      ignoreInitial: true,
      depth: 0,
      persistent: true
    });
    this.watcher = watcher;
    watcher.on('add', (path: string) => {
      this.enqueue(path);
    });
    watcher.on('error', (err: unknown) => {
      logger.error({ err, dir: this.directory }, 'watcher: error');
    });
    await new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve());
    });
    logger.info({ dir: this.directory }, 'watcher: ready');
  }

  /** Queues the program files already sitting in the directory. */
  async enqueueExisting(): Promise<number> {
    const entries = await fsp.readdir(this.directory, { withFileTypes: true });
    let queued = 0;
    for (const entry of entries) {
      if (entry.isFile() && this.enqueue(join(this.directory, entry.name))) queued += 1;
    }
    if (queued > 0) {
      logger.info({ dir: this.directory, count: queued }, 'watcher: queued existing files');
    }
    return queued;
  }

  /** Resolves when every queued file has been handled. */
  async idle(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.chain;
      await current;
    } while (current !== this.chain);
  }

  async stop(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      try {
        await watcher.close();
      } catch (err) {
        logger.warn({ err }, 'watcher: failed to close file watcher');
      }
    }
    await this.idle();
    logger.info({ dir: this.directory }, 'watcher: stopped');
  }
}
