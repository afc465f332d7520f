import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';
import { PanelContainerConfigSchema, parsePanelOutput } from '@edgebar/shared';

import { loadAppletList, runLayoutSimulation } from './layout';
import { runPriority } from './priority';
import { runValidate } from './validate';

function createTempFile(prefix: string, ext = '.json'): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(16)}${ext}`);
}

const DP1 = { name: 'DP-1', width: 1920, height: 1080 };

describe('runValidate', () => {
  it('summarizes every panel of a valid YAML file', async () => {
    const filePath = createTempFile('edgebar-cli', '.yaml');
    await fs.writeFile(
      filePath,
      [
        'panels:',
        '  - name: main-panel',
        '    margin: 0',
        '  - name: dock',
        '    anchor: bottom',
        '    expandToEdges: false',
        '    autohide: {}',
        '    output:',
        '      name: HDMI-A-1',
      ].join('\n'),
      'utf8',
    );

    expect(runValidate(filePath)).toEqual({
      valid: true,
      path: filePath,
      panels: [
        {
          name: 'main-panel',
          anchor: 'top',
          size: 'M',
          iconSize: 36,
          output: 'All',
          priority: 1310,
          autohide: false,
        },
        {
          name: 'dock',
          anchor: 'bottom',
          size: 'M',
          iconSize: 36,
          output: 'Name(HDMI-A-1)',
          priority: 100,
          autohide: true,
        },
      ],
    });
  });

  it('throws on an invalid file', async () => {
    const filePath = createTempFile('edgebar-cli');
    await fs.writeFile(filePath, JSON.stringify({ panels: [{ name: 'a', size: 'XXL' }] }), 'utf8');
    expect(() => runValidate(filePath)).toThrow(/Invalid panel configuration in .*panels\.0\.size/);
  });
});

describe('runPriority', () => {
  const container = PanelContainerConfigSchema.parse({
    panels: [
      { name: 'dock', expandToEdges: false },
      { name: 'main-panel', margin: 0 },
      { name: 'laptop-bar', output: { name: 'eDP-1' } },
    ],
  });

  it('orders panels from highest priority', () => {
    expect(runPriority(container).map((entry) => [entry.name, entry.priority])).toEqual([
      ['main-panel', 1310],
      ['laptop-bar', 1100],
      ['dock', 100],
    ]);
  });

  it('filters by the configured target', () => {
    expect(
      runPriority(container, undefined, parsePanelOutput('Name(eDP-1)')).map((entry) => entry.name),
    ).toEqual(['laptop-bar']);
    expect(
      runPriority(container, undefined, parsePanelOutput('All')).map((entry) => entry.name),
    ).toEqual(['main-panel', 'dock']);
  });

  it('filters by output', () => {
    expect(runPriority(container, 'DP-1').map((entry) => entry.name)).toEqual([
      'main-panel',
      'dock',
    ]);
  });
});

describe('loadAppletList', () => {
  it('validates the applet file', async () => {
    const filePath = createTempFile('edgebar-applets');
    await fs.writeFile(filePath, JSON.stringify([{ plugin: 'clock', width: -1, height: 20 }]));
    expect(() => loadAppletList(filePath)).toThrow(/Invalid applet list in .*0\.width/);
  });

  it('reports unreadable files', () => {
    expect(() => loadAppletList(createTempFile('edgebar-none'))).toThrow(
      /Unable to read applet list/,
    );
  });
});

describe('runLayoutSimulation', () => {
  it('settles a top bar and reports what the compositor saw', () => {
    const container = PanelContainerConfigSchema.parse({
      panels: [{ name: 'top-bar', pluginsWings: { left: ['a', 'b', 'c'], right: [] } }],
    });
    const result = runLayoutSimulation({
      container,
      panelName: 'top-bar',
      output: DP1,
      applets: [
        { plugin: 'a', width: 40, height: 32 },
        { plugin: 'b', width: 40, height: 32 },
        { plugin: 'c', width: 40, height: 32 },
        { plugin: 'weather', width: 40, height: 32 },
      ],
    });

    expect(result.settled).toBe(true);
    expect(result.frames).toBe(5);
    expect(result.surfaceSize).toEqual({ width: 1920, height: 40 });
    expect(result.exclusiveZone).toBe(40);
    expect(result.margins).toEqual({ top: 0, right: 4, bottom: 0, left: 4 });
    expect(result.actualSize).toEqual({ width: 136, height: 40 });
    expect(result.placements.map(({ windowId, x, y }) => [windowId, x, y])).toEqual([
      ['a-0', 4, 4],
      ['b-1', 48, 4],
      ['c-2', 92, 4],
    ]);
    expect(result.unplaced).toEqual(['weather-3']);
    expect(result.inputRegion).toEqual([{ x: 0, y: 0, width: 1920, height: 40 }]);
    expect(result.minimizeTarget).toBeNull();
  });

  it('reports the dock minimize target', () => {
    const container = PanelContainerConfigSchema.parse({
      panels: [
        { name: 'dock', anchor: 'bottom', expandToEdges: false, pluginsCenter: ['apps'] },
      ],
    });
    const result = runLayoutSimulation({
      container,
      panelName: 'dock',
      output: DP1,
      applets: [{ id: 'apps', plugin: 'apps', width: 48, height: 48, minimize: true }],
    });
    expect(result.containerLength).toBe(56);
    expect(result.containerPosition).toBe(932);
    expect(result.inputRegion).toEqual([{ x: 932, y: 0, width: 56, height: 56 }]);
    expect(result.minimizeTarget?.rect).toEqual({ x: 936, y: 4, width: 48, height: 48 });
  });

  it('rejects unknown panels', () => {
    const container = PanelContainerConfigSchema.parse({ panels: [] });
    expect(() =>
      runLayoutSimulation({ container, panelName: 'nope', output: DP1, applets: [] }),
    ).toThrow('No panel named nope');
  });
});
