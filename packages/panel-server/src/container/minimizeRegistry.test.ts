import { describe, expect, it, vi } from 'vitest';
import type { MinimizeTarget } from '@edgebar/shared';

import { silentLogger } from '../logger';
import { MinimizeRegistry } from './minimizeRegistry';

function target(overrides: Partial<MinimizeTarget> = {}): MinimizeTarget {
  return {
    output: 'DP-1',
    rect: { x: 10, y: 0, width: 32, height: 32 },
    priority: 0,
    surfaceId: 'layer-1',
    ...overrides,
  };
}

describe('MinimizeRegistry', () => {
  it('takes the first report for an output and notifies the sink', () => {
    const setRectangle = vi.fn();
    const registry = new MinimizeRegistry({
      sink: { setRectangle },
      isSurfaceAlive: () => true,
      logger: silentLogger,
    });
    expect(registry.report(target())).toBe(true);
    expect(setRectangle).toHaveBeenCalledWith(target());
    expect(registry.get('DP-1')).toEqual(target());
  });

  it('lets a dock outrank a bar but not the reverse', () => {
    const registry = new MinimizeRegistry({ isSurfaceAlive: () => true, logger: silentLogger });
    registry.report(target());
    expect(registry.report(target({ surfaceId: 'layer-2', priority: 1 }))).toBe(true);
    expect(registry.report(target({ surfaceId: 'layer-1', priority: 0 }))).toBe(false);
    expect(registry.get('DP-1')?.surfaceId).toBe('layer-2');
  });

  it('follows the current surface when its rectangle moves', () => {
    const registry = new MinimizeRegistry({ isSurfaceAlive: () => true, logger: silentLogger });
    registry.report(target());
    expect(registry.report(target())).toBe(false);
    expect(registry.report(target({ rect: { x: 50, y: 0, width: 32, height: 32 } }))).toBe(true);
    expect(registry.get('DP-1')?.rect.x).toBe(50);
  });

  it('replaces a target whose surface is gone', () => {
    const alive = new Set(['layer-1', 'layer-3']);
    const registry = new MinimizeRegistry({
      isSurfaceAlive: (surfaceId) => alive.has(surfaceId),
      logger: silentLogger,
    });
    registry.report(target({ priority: 1 }));
    alive.delete('layer-1');
    expect(registry.report(target({ surfaceId: 'layer-3' }))).toBe(true);
  });

  it('keeps outputs apart and forgets them', () => {
    const registry = new MinimizeRegistry({ isSurfaceAlive: () => true, logger: silentLogger });
    registry.report(target());
    registry.report(target({ output: 'HDMI-A-1', surfaceId: 'layer-2' }));
    registry.forgetOutput('DP-1');
    expect(registry.get('DP-1')).toBeUndefined();
    expect(registry.get('HDMI-A-1')?.surfaceId).toBe('layer-2');
  });
});
