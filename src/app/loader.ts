/**
 * Loader: hot reloading for application code.
 *
 * Watches the application directory and, after a burst of changes has
 * settled, runs the `onReload` hook (typically re-importing the root
 * component with `importFresh`) and enqueues a reload message. Stopping the
 * loader deletes the snapshots `importFresh` made of the directory.
 *
 * Watching is optional: when the platform or directory does not support
 * it, the loader logs a warning and the program runs without it.
 */

import { watch as fsWatch } from 'node:fs';
import { cp, rm } from 'node:fs/promises';
import { basename, dirname, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { SteepError } from '../core/errors.js';
import { Message } from '../core/message.js';
import type { Runtime } from '../core/runtime.js';
import { silentLogger, type Logger } from './logger.js';

const DEFAULT_DEBOUNCE_MS = 40;

const TRACKED_EXTENSIONS = new Set(['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs', '.json']);

export interface Watcher {
  close(): void;
  on?(event: 'error', listener: (error: Error) => void): unknown;
}

export type WatchFn = (dir: string, listener: (event: string, filename: string | null) => void) => Watcher;

export interface LoaderOptions {
  appDir: string;
  runtime: Runtime;
  logger?: Logger;
  debounceMs?: number;
  /** Runs before the reload message is enqueued. */
  onReload?: (changedPath: string | undefined) => void | Promise<void>;
  /** Called when `onReload` fails. Defaults to logging the error. */
  onError?: (error: unknown) => void;
  /** File watcher. Defaults to a recursive `fs.watch`. */
  watch?: WatchFn;
}

const defaultWatch: WatchFn = (dir, listener) => fsWatch(dir, { recursive: true }, listener);

export class Loader {
  readonly appDir: string;
  private readonly runtime: Runtime;
  private readonly logger: Logger;
  private readonly debounceMs: number;
  private readonly onReload: LoaderOptions['onReload'];
  private readonly onError: (error: unknown) => void;
  private readonly watchFn: WatchFn;
  private watcher: Watcher | null = null;
  private timer: NodeJS.Timeout | null = null;
  private lastChanged: string | undefined;
  private reloads = 0;

  constructor(options: LoaderOptions) {
    this.appDir = toAbsolute(options.appDir);
    this.runtime = options.runtime;
    this.logger = options.logger ?? silentLogger;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.onReload = options.onReload;
    this.onError = options.onError ?? ((error) => this.logger.error('hot reload failed', error));
    this.watchFn = options.watch ?? defaultWatch;
  }

  /** Completed reloads since construction. */
  get reloadCount(): number {
    return this.reloads;
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  /** Start watching. Returns false when watching is unavailable. */
  start(): boolean {
    if (this.watcher) return true;

    try {
      this.watcher = this.watchFn(this.appDir, (_event, filename) => this.handleChange(filename));
    } catch (error) {
      this.logger.warn(`hot reloading disabled: cannot watch ${this.appDir}`, error);
      return false;
    }

    this.watcher.on?.('error', (error) => {
      this.logger.warn(`hot reloading disabled: watcher failed for ${this.appDir}`, error);
      this.stop();
    });

    this.logger.info(`watching ${this.appDir} for changes`);
    return true;
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.watcher?.close();
    this.watcher = null;
    clearSnapshots(this.appDir).catch((error: unknown) => {
      this.logger.warn(`could not remove reload snapshots of ${this.appDir}`, error);
    });
  }

  /** Run the reload hook and enqueue a reload message. */
  async reload(changedPath?: string): Promise<void> {
    await this.onReload?.(changedPath);
    this.reloads++;
    this.logger.debug(`reloaded${changedPath ? ` after change to ${changedPath}` : ''}`);
    this.runtime.enqueue(Message.reload());
  }

  private handleChange(filename: string | null): void {
    if (filename !== null && !TRACKED_EXTENSIONS.has(extname(filename))) return;

    this.lastChanged = filename ?? undefined;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.reload(this.lastChanged).catch(this.onError);
    }, this.debounceMs);
  }
}

const SNAPSHOT_SKIPPED_DIRS = new Set(['.git', 'node_modules', 'dist', 'coverage']);
const PRESERVED_SNAPSHOTS = 2;

let snapshotRevision = 0;
const snapshots = new Map<string, string[]>();

/**
 * Import a module so that edits since the last import take effect, including
 * edits to the modules it imports from inside `root`.
 *
 * `root` is copied to a fresh directory beside it and the copy of
 * `modulePath` is imported. Relative imports that leave `root` resolve to the
 * original files, so framework classes stay shared with the running program.
 */
export async function importFresh(modulePath: string, root: string = dirname(modulePath)): Promise<unknown> {
  const entry = toAbsolute(modulePath);
  const rootDir = toAbsolute(root);
  const entryInRoot = relative(rootDir, entry);
  if (entryInRoot.startsWith('..') || isAbsolute(entryInRoot)) {
    throw new SteepError(`Cannot reload ${entry}: it is outside ${rootDir}`);
  }

  const snapshotDir = join(dirname(rootDir), `.${basename(rootDir)}-reload-${++snapshotRevision}`);
  await cp(rootDir, snapshotDir, {
    recursive: true,
    filter: (path) => !relative(rootDir, path).split(sep).some((part) => SNAPSHOT_SKIPPED_DIRS.has(part)),
  });

  const kept = snapshots.get(rootDir) ?? [];
  kept.push(snapshotDir);
  snapshots.set(rootDir, kept);

  const mod: unknown = await import(pathToFileURL(join(snapshotDir, entryInRoot)).href);

  while (kept.length > PRESERVED_SNAPSHOTS) {
    const stale = kept.shift();
    if (stale) await rm(stale, { recursive: true, force: true });
  }
  return mod;
}

/** Delete the snapshot directories `importFresh` made for `root`. */
export async function clearSnapshots(root: string): Promise<void> {
  const rootDir = toAbsolute(root);
  const kept = snapshots.get(rootDir) ?? [];
  snapshots.delete(rootDir);
  await Promise.all(kept.map((dir) => rm(dir, { recursive: true, force: true })));
}

/**
 * A `reloadRoot` hook that re-imports `moduleUrl` with `importFresh` and
 * returns its `exportName` export. `root` defaults to the module's directory.
 */
export function reloadExport(moduleUrl: string, exportName: string, root?: string): () => Promise<unknown> {
  return async () => {
    const path = fileURLToPath(moduleUrl);
    const mod = await importFresh(path, root ?? dirname(path));
    return typeof mod === 'object' && mod !== null ? Reflect.get(mod, exportName) : undefined;
  };
}

function toAbsolute(path: string): string {
  return isAbsolute(path) ? path : resolve(process.cwd(), path);
}
