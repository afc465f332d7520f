import { describe, expect, it } from 'vitest';
import { parsePanelConfig, type OutputDescriptor, type PanelConfigInput } from '@edgebar/shared';

import { DEFAULT_DARK_BACKGROUND } from '../container/themeColors';
import { HeadlessCompositor } from '../headless';
import { centerLeftSpacing, LayoutEngine, regionSum, type LayoutOutcome } from './layoutEngine';
import { PanelInstance } from './panelInstance';

const OUTPUT: OutputDescriptor = { name: 'DP-1', width: 1920, height: 1080 };

function createInstance(input: PanelConfigInput, output: OutputDescriptor = OUTPUT) {
  const compositor = new HeadlessCompositor([output]);
  const config = parsePanelConfig(input);
  const surface = compositor.createSurface({
    namespace: config.name,
    output: output.name,
    anchor: config.anchor,
    layer: config.layer,
    keyboardInteractivity: config.keyboardInteractivity,
  });
  const instance = new PanelInstance({
    config,
    output,
    surface,
    backgroundColor: DEFAULT_DARK_BACKGROUND,
    now: 0,
  });
  instance.state.pendingDimensions = null;
  return instance;
}

function expectPlaced(outcome: LayoutOutcome) {
  if (outcome.kind !== 'placed') {
    throw new Error(`expected a placed layout, got ${outcome.kind}`);
  }
  return outcome;
}

function mapWindows(instance: PanelInstance, plugins: string[], width: number, height: number) {
  for (const plugin of plugins) {
    instance.mapWindow({ id: plugin, pluginName: plugin, size: { width, height } });
  }
}

describe('regionSum', () => {
  it('adds one spacing between neighbours', () => {
    expect(regionSum([40, 40, 40], 4)).toBe(128);
    expect(regionSum([25], 4)).toBe(25);
    expect(regionSum([], 4)).toBe(0);
  });
});

describe('centerLeftSpacing', () => {
  it('centers the middle region when every region fits in a third', () => {
    expect(centerLeftSpacing({ left: 100, center: 60, right: 100 }, 900, 4, false)).toBe(316);
  });

  it('splits the leftover space when a region is too long', () => {
    expect(centerLeftSpacing({ left: 400, center: 60, right: 100 }, 900, 4, false)).toBe(166);
  });
});

describe('LayoutEngine', () => {
  const engine = new LayoutEngine();

  it('places three left windows on a top bar', () => {
    const instance = createInstance({
      name: 'top-bar',
      pluginsWings: { left: ['a', 'b', 'c'], right: [] },
    });
    mapWindows(instance, ['a', 'b', 'c'], 40, 32);
    instance.state.dimensions = { width: 1920, height: 40 };

    const outcome = expectPlaced(engine.layout(instance));
    expect(outcome.placements.map(({ windowId, x, y }) => ({ windowId, x, y }))).toEqual([
      { windowId: 'a', x: 4, y: 4 },
      { windowId: 'b', x: 48, y: 4 },
      { windowId: 'c', x: 92, y: 4 },
    ]);
    expect(outcome.actualSize).toEqual({ width: 136, height: 40 });
    expect(outcome.regionSums).toEqual({ left: 128, center: 0, right: 0 });
    expect(outcome.containerLength).toBe(1920);
    expect(outcome.containerPosition).toBe(0);
    expect(outcome.panelRect?.size).toEqual({ width: 1920, height: 40 });
  });

  it('spans the region sum from the first to the last window', () => {
    const instance = createInstance({
      name: 'top-bar',
      pluginsWings: { left: ['a', 'b', 'c'], right: [] },
    });
    mapWindows(instance, ['a', 'b', 'c'], 40, 32);
    instance.state.dimensions = { width: 1920, height: 40 };

    const { placements, regionSums } = expectPlaced(engine.layout(instance));
    const first = placements[0];
    const last = placements[placements.length - 1];
    expect(first && last ? last.x + last.width - first.x : null).toBe(regionSums.left);
  });

  it('gives the same placement twice and skips the unchanged background', () => {
    const instance = createInstance({
      name: 'top-bar',
      pluginsWings: { left: ['a', 'b'], right: [] },
    });
    mapWindows(instance, ['a', 'b'], 40, 32);
    instance.state.dimensions = { width: 1920, height: 40 };

    const first = expectPlaced(engine.layout(instance));
    const second = expectPlaced(engine.layout(instance));
    expect(second.placements).toEqual(first.placements);
    expect(first.panelRect).not.toBeNull();
    expect(second.panelRect).toBeNull();
  });

  it('asks for a resize when the content needs more thickness', () => {
    const instance = createInstance({
      name: 'top-bar',
      pluginsWings: { left: ['a'], right: [] },
    });
    mapWindows(instance, ['a'], 40, 32);
    instance.state.dimensions = { width: 1920, height: 8 };

    expect(engine.layout(instance)).toEqual({
      kind: 'resize',
      desired: { width: 1920, height: 40 },
    });
  });

  it('includes the anchor gap in the requested size', () => {
    const instance = createInstance({
      name: 'floating',
      anchorGap: true,
      pluginsWings: { left: ['a'], right: [] },
    });
    mapWindows(instance, ['a'], 40, 32);
    instance.state.dimensions = { width: 1920, height: 8 };

    expect(engine.layout(instance)).toEqual({
      kind: 'resize',
      desired: { width: 1920, height: 44 },
    });
  });

  it('offsets windows of a top bar by its anchor gap', () => {
    const instance = createInstance({
      name: 'floating',
      anchorGap: true,
      pluginsWings: { left: ['a'], right: [] },
    });
    mapWindows(instance, ['a'], 40, 32);
    instance.state.dimensions = { width: 1920, height: 40 };

    const outcome = expectPlaced(engine.layout(instance));
    expect(outcome.placements[0]).toMatchObject({ x: 4, y: 8 });
    expect(outcome.panelRect?.location).toEqual({ x: 0, y: 4 });
  });

  it('right-aligns the right region', () => {
    const instance = createInstance({
      name: 'top-bar',
      pluginsWings: { left: [], right: ['tray'] },
    });
    mapWindows(instance, ['tray'], 24, 24);
    instance.state.dimensions = { width: 1920, height: 32 };

    const outcome = expectPlaced(engine.layout(instance));
    expect(outcome.placements).toEqual([
      { windowId: 'tray', region: 'right', x: 1892, y: 4, width: 24, height: 24 },
    ]);
  });

  it('centers a dock and reports its minimize target once', () => {
    const instance = createInstance({
      name: 'dock',
      anchor: 'bottom',
      expandToEdges: false,
      pluginsCenter: ['a', 'b'],
    });
    instance.mapWindow({
      id: 'a',
      pluginName: 'a',
      size: { width: 48, height: 48 },
      isMinimizeTarget: true,
    });
    instance.mapWindow({ id: 'b', pluginName: 'b', size: { width: 48, height: 48 } });
    instance.state.dimensions = { width: 1920, height: 56 };

    const outcome = expectPlaced(engine.layout(instance));
    expect(outcome.containerLength).toBe(108);
    expect(outcome.containerPosition).toBe(906);
    expect(outcome.placements.map(({ x, y }) => [x, y])).toEqual([
      [910, 4],
      [962, 4],
    ]);
    expect(outcome.minimizeTargets).toEqual([
      {
        output: 'DP-1',
        rect: { x: 910, y: 4, width: 48, height: 48 },
        priority: 1,
        surfaceId: 'layer-1',
      },
    ]);

    expect(expectPlaced(engine.layout(instance)).minimizeTargets).toEqual([]);
  });

  it('works in physical pixels on a scaled output', () => {
    const instance = createInstance(
      { name: 'top-bar', pluginsWings: { left: ['a', 'b', 'c'], right: [] } },
      { name: 'DP-1', width: 1920, height: 1080, scale: 2 },
    );
    mapWindows(instance, ['a', 'b', 'c'], 80, 64);
    instance.state.dimensions = { width: 1920, height: 40 };

    const outcome = expectPlaced(engine.layout(instance));
    expect(outcome.actualSize).toEqual({ width: 136, height: 40 });
    expect(outcome.regionSums.left).toBe(128);
    expect(outcome.placements.map(({ x, width }) => [x, width])).toEqual([
      [4, 40],
      [48, 40],
      [92, 40],
    ]);
  });
});
