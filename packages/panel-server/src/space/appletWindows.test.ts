import { describe, expect, it } from 'vitest';

import { AppletWindowCollection, type RegionPlugins } from './appletWindows';

const plugins: RegionPlugins = {
  left: ['launcher', 'workspaces'],
  center: ['clock'],
  right: ['tray', 'battery', 'power'],
};

function mapAll(collection: AppletWindowCollection, names: string[]): void {
  for (const name of names) {
    collection.map({ id: `${name}-win`, pluginName: name, size: { width: 30, height: 30 } }, plugins);
  }
}

describe('AppletWindowCollection', () => {
  it('places windows in the region listing their plugin', () => {
    const collection = new AppletWindowCollection();
    mapAll(collection, ['clock', 'launcher']);
    expect(collection.get('clock-win')?.region).toBe('center');
    expect(collection.get('launcher-win')?.region).toBe('left');
  });

  it('returns null for plugins no region lists', () => {
    const collection = new AppletWindowCollection();
    const window = collection.map(
      { id: 'x', pluginName: 'weather', size: { width: 1, height: 1 } },
      plugins,
    );
    expect(window).toBeNull();
    expect(collection.size).toBe(0);
  });

  it('orders by configured position and keeps indices contiguous', () => {
    const collection = new AppletWindowCollection();
    mapAll(collection, ['power', 'tray']);
    expect(collection.inRegion('right').map((window) => [window.id, window.index])).toEqual([
      ['tray-win', 0],
      ['power-win', 1],
    ]);

    mapAll(collection, ['battery']);
    expect(collection.inRegion('right').map((window) => window.id)).toEqual([
      'tray-win',
      'battery-win',
      'power-win',
    ]);

    collection.remove('tray-win');
    expect(collection.inRegion('right').map((window) => [window.id, window.index])).toEqual([
      ['battery-win', 0],
      ['power-win', 1],
    ]);
  });

  it('reports whether a resize changed anything', () => {
    const collection = new AppletWindowCollection();
    mapAll(collection, ['clock']);
    expect(collection.resize('clock-win', { width: 30, height: 30 })).toBe(false);
    expect(collection.resize('clock-win', { width: 60, height: 30 })).toBe(true);
    expect(collection.get('clock-win')?.size).toEqual({ width: 60, height: 30 });
    expect(collection.resize('missing', { width: 1, height: 1 })).toBe(false);
  });

  it('lists every window left to right and clears', () => {
    const collection = new AppletWindowCollection();
    mapAll(collection, ['power', 'clock', 'workspaces']);
    expect(collection.all().map((window) => window.pluginName)).toEqual([
      'workspaces',
      'clock',
      'power',
    ]);
    collection.clear();
    expect(collection.size).toBe(0);
    expect(collection.all()).toEqual([]);
  });
});
