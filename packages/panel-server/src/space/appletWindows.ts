import type { Alignment, Size } from '@edgebar/shared';

export interface AppletWindow {
  id: string;
  pluginName: string;
  region: Alignment;
  /** Ordering index within the region, contiguous from 0. */
  index: number;
  /** Bounding size in physical pixels, as reported by the window. */
  size: Size;
  isMinimizeTarget: boolean;
}

export interface AppletWindowInput {
  id: string;
  pluginName: string;
  size: Size;
  isMinimizeTarget?: boolean;
}

export interface RegionPlugins {
  left: string[] | null;
  center: string[] | null;
  right: string[] | null;
}

/**
 * Windows of one panel instance: an arena keyed by window id plus one ordered id list per
 * region.
 */
export class AppletWindowCollection {
  private readonly arena = new Map<string, AppletWindow>();
  /** Position requested when the window was added; renumbering sorts by it. */
  private readonly slots = new Map<string, number>();
  private readonly regions: Record<Alignment, string[]> = {
    left: [],
    center: [],
    right: [],
  };

  /**
   * Adds a window for a plugin, placing it in the region whose configured list names the
   * plugin. Returns null when no region lists it.
   */
  map(input: AppletWindowInput, plugins: RegionPlugins): AppletWindow | null {
    const placement = findPluginRegion(input.pluginName, plugins);
    if (!placement) {
      return null;
    }
    return this.add({
      id: input.id,
      pluginName: input.pluginName,
      size: { ...input.size },
      isMinimizeTarget: input.isMinimizeTarget ?? false,
      region: placement.region,
      index: placement.index,
    });
  }

  add(window: AppletWindow): AppletWindow {
    this.remove(window.id);
    const stored: AppletWindow = { ...window, size: { ...window.size } };
    this.arena.set(stored.id, stored);
    this.slots.set(stored.id, stored.index);
    this.regions[stored.region].push(stored.id);
    this.renumber(stored.region);
    return stored;
  }

  remove(id: string): AppletWindow | null {
    const existing = this.arena.get(id);
    if (!existing) {
      return null;
    }
    this.arena.delete(id);
    this.slots.delete(id);
    const ids = this.regions[existing.region];
    const position = ids.indexOf(id);
    if (position >= 0) {
      ids.splice(position, 1);
    }
    this.renumber(existing.region);
    return existing;
  }

  /**
   * Records a new bounding size. Returns true when the size changed.
   */
  resize(id: string, size: Size): boolean {
    const existing = this.arena.get(id);
    if (!existing) {
      return false;
    }
    if (existing.size.width === size.width && existing.size.height === size.height) {
      return false;
    }
    existing.size = { ...size };
    return true;
  }

  get(id: string): AppletWindow | undefined {
    return this.arena.get(id);
  }

  has(id: string): boolean {
    return this.arena.has(id);
  }

  inRegion(region: Alignment): AppletWindow[] {
    const windows: AppletWindow[] = [];
    for (const id of this.regions[region]) {
      const window = this.arena.get(id);
      if (window) {
        windows.push(window);
      }
    }
    return windows;
  }

  all(): AppletWindow[] {
    return [...this.inRegion('left'), ...this.inRegion('center'), ...this.inRegion('right')];
  }

  get size(): number {
    return this.arena.size;
  }

  clear(): void {
    this.arena.clear();
    this.slots.clear();
    this.regions.left = [];
    this.regions.center = [];
    this.regions.right = [];
  }

  private renumber(region: Alignment): void {
    const ordered = this.regions[region]
      .map((id, insertion) => ({
        id,
        insertion,
        slot: this.slots.get(id) ?? 0,
        window: this.arena.get(id),
      }))
      .filter(
        (entry): entry is { id: string; insertion: number; slot: number; window: AppletWindow } =>
          entry.window !== undefined,
      )
      .sort((a, b) => a.slot - b.slot || a.insertion - b.insertion);

    ordered.forEach((entry, index) => {
      entry.window.index = index;
    });
    this.regions[region] = ordered.map((entry) => entry.id);
  }
}

function findPluginRegion(
  pluginName: string,
  plugins: RegionPlugins,
): { region: Alignment; index: number } | null {
  const lists: Array<[Alignment, string[] | null]> = [
    ['left', plugins.left],
    ['center', plugins.center],
    ['right', plugins.right],
  ];
  for (const [region, list] of lists) {
    const index = list ? list.indexOf(pluginName) : -1;
    if (index >= 0) {
      return { region, index };
    }
  }
  return null;
}
