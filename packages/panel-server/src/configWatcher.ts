import path from 'node:path';

import chokidar, { type FSWatcher } from 'chokidar';
import { panelConfigsEqual, type PanelConfig, type PanelContainerConfig } from '@edgebar/shared';

import { loadContainerConfig } from './config';
import { withPrefix, type Logger } from './logger';

export interface ContainerConfigDiff {
  /** New or changed panel configs, in file order. */
  applied: PanelConfig[];
  /** Names of panels that disappeared. */
  removed: string[];
}

export function diffContainerConfigs(
  previous: PanelContainerConfig | null,
  next: PanelContainerConfig,
): ContainerConfigDiff {
  const previousByName = new Map((previous?.panels ?? []).map((panel) => [panel.name, panel]));
  const nextNames = new Set(next.panels.map((panel) => panel.name));

  const applied = next.panels.filter((panel) => {
    const before = previousByName.get(panel.name);
    return !before || !panelConfigsEqual(before, panel);
  });
  const removed = (previous?.panels ?? [])
    .map((panel) => panel.name)
    .filter((name) => !nextNames.has(name));

  return { applied, removed };
}

export interface ConfigChangeTarget {
  apply(config: PanelConfig): unknown;
  remove(name: string): unknown;
}

export interface ConfigWatcherOptions {
  configPath: string;
  target: ConfigChangeTarget;
  logger?: Logger;
  debounceMs?: number;
}

/**
 * Reloads the container config file when it changes and forwards the difference to the
 * target. A file that fails to load keeps the last good config.
 */
export class ConfigWatcher {
  private readonly configPath: string;
  private readonly target: ConfigChangeTarget;
  private readonly logger: Logger;
  private readonly debounceMs: number;
  private current: PanelContainerConfig | null = null;
  private watcher: FSWatcher | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: ConfigWatcherOptions) {
    this.configPath = path.resolve(options.configPath);
    this.target = options.target;
    this.logger = withPrefix('config', options.logger);
    this.debounceMs = options.debounceMs ?? 100;
  }

  get config(): PanelContainerConfig | null {
    return this.current;
  }

  /**
   * Loads the file once, applies every panel, and starts watching it.
   */
  start(): PanelContainerConfig {
    const loaded = this.reload();
    if (!loaded) {
      throw new Error(`Unable to load panel configuration from ${this.configPath}`);
    }
    if (!this.watcher) {
      this.watcher = chokidar.watch(this.configPath, {
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
          stabilityThreshold: 50,
          pollInterval: 25,
        },
      });
      this.watcher.on('change', () => this.scheduleReload());
      this.watcher.on('add', () => this.scheduleReload());
      this.watcher.on('unlink', () => {
        this.logger.warn(`${this.configPath} was removed, keeping the last loaded panels`);
      });
      this.watcher.on('error', (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`watch failed for ${this.configPath}: ${message}`);
      });
    }
    return loaded;
  }

  async stop(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    const watcher = this.watcher;
    this.watcher = null;
    await watcher?.close();
  }

  /**
   * Reads the file and applies what changed. Returns null when the file could not be
   * loaded or applied; the previous config stays current.
   */
  reload(): PanelContainerConfig | null {
    let next: PanelContainerConfig;
    try {
      next = loadContainerConfig(this.configPath);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`reload failed: ${message}`);
      return null;
    }

    const diff = diffContainerConfigs(this.current, next);
    try {
      for (const name of diff.removed) {
        this.target.remove(name);
      }
      for (const panel of diff.applied) {
        this.target.apply(panel);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`apply failed for ${this.configPath}: ${message}`);
      return null;
    }
    this.current = next;
    if (diff.applied.length > 0 || diff.removed.length > 0) {
      this.logger.info(
        `applied ${diff.applied.length} panel(s), removed ${diff.removed.length} from ${this.configPath}`,
      );
    }
    return next;
  }

  private scheduleReload(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.reload();
    }, this.debounceMs);
  }
}
