import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';
import { deepSubstitute, loadContainerConfig, parseContainerConfig } from './config';
import { isPanelError } from './errors';

function createTempFile(prefix: string, ext = '.json'): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(16)}${ext}`);
}

const originalEnv = { ...process.env };

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    delete process.env[key];
  }
  Object.assign(process.env, originalEnv);
});

describe('loadContainerConfig', () => {
  it('loads a JSON file and applies defaults', async () => {
    const filePath = createTempFile('edgebar-valid');
    await fs.writeFile(
      filePath,
      JSON.stringify({
        panels: [
          {
            name: 'main-panel',
            anchor: 'bottom',
            pluginsWings: { left: ['workspaces'], right: ['clock'] },
          },
        ],
      }),
      'utf8',
    );

    const config = loadContainerConfig(filePath);
    expect(config.panels).toHaveLength(1);
    const [panel] = config.panels;
    expect(panel?.name).toBe('main-panel');
    expect(panel?.anchor).toBe('bottom');
    expect(panel?.size).toBe('M');
    expect(panel?.padding).toBe(4);
    expect(panel?.opacity).toBe(0.8);
    expect(panel?.autohide).toBeNull();
    expect(panel?.pluginsWings).toEqual({ left: ['workspaces'], right: ['clock'] });
  });

  it('loads YAML and substitutes environment variables', async () => {
    process.env['EDGEBAR_TEST_OUTPUT'] = 'HDMI-A-1';
    const filePath = createTempFile('edgebar-yaml', '.yaml');
    await fs.writeFile(
      filePath,
      [
        'panels:',
        '  - name: dock',
        '    expandToEdges: false',
        '    output:',
        '      name: ${EDGEBAR_TEST_OUTPUT}',
        '    autohide:',
        '      waitTime: 500',
        '',
      ].join('\n'),
      'utf8',
    );

    const config = loadContainerConfig(filePath);
    const [dock] = config.panels;
    expect(dock?.output).toEqual({ name: 'HDMI-A-1' });
    expect(dock?.autohide).toEqual({ waitTime: 500, transitionTime: 200, handleSize: 4 });
  });

  it('reports a missing file with config_not_found', () => {
    const filePath = createTempFile('edgebar-missing');
    let caught: unknown;
    try {
      loadContainerConfig(filePath);
    } catch (err) {
      caught = err;
    }
    expect(isPanelError(caught, 'config_not_found')).toBe(true);
  });

  it('rejects malformed JSON', async () => {
    const filePath = createTempFile('edgebar-bad');
    await fs.writeFile(filePath, '{ "panels": [', 'utf8');
    expect(() => loadContainerConfig(filePath)).toThrow(/is not valid JSON/);
  });
});

describe('parseContainerConfig', () => {
  it('rejects duplicate panel names', () => {
    expect(() =>
      parseContainerConfig({ panels: [{ name: 'bar' }, { name: 'bar' }] }, 'inline'),
    ).toThrow('Invalid panel configuration in inline: panels.1.name: duplicate panel name "bar"');
  });

  it('rejects padding that leaves no thickness', () => {
    expect(() => parseContainerConfig({ panels: [{ name: 'bar', size: 'XS', padding: 31 }] })).toThrow(
      /panels\.0\.padding: padding 31 is too large for size XS/,
    );
  });

  it('rejects unknown keys', () => {
    let caught: unknown;
    try {
      parseContainerConfig({ panels: [{ name: 'bar', colour: 'red' }] });
    } catch (err) {
      caught = err;
    }
    expect(isPanelError(caught, 'invalid_config')).toBe(true);
  });
});

describe('deepSubstitute', () => {
  it('replaces unset variables with empty strings', () => {
    delete process.env['EDGEBAR_UNSET_VAR'];
    expect(deepSubstitute({ a: ['x-${EDGEBAR_UNSET_VAR}-y', 3] })).toEqual({ a: ['x--y', 3] });
  });
});
