import { isHorizontal, type Size } from '@edgebar/shared';

import type { PanelInstance } from './panelInstance';
import { Region } from './region';

export type InputRegionMode = 'dock' | 'expand';

export interface InputRegionParams {
  /** Logical surface size, anchor gap included. */
  surface: Size;
  /** Lengthwise extent of the content. */
  contentLength: number;
  horizontal: boolean;
  mode: InputRegionMode;
}

/**
 * Hit-test region of the panel surface. A dock only accepts input over its centered
 * content; an expanded bar accepts it everywhere. `region` is reset and reused when given.
 */
export function computeInputRegion(params: InputRegionParams, region = new Region()): Region {
  const { surface, contentLength, horizontal, mode } = params;
  region.subtract(0, 0, surface.width, surface.height);

  if (mode === 'expand') {
    return region.add(0, 0, surface.width, surface.height);
  }

  const surfaceLength = horizontal ? surface.width : surface.height;
  const side = Math.max(Math.trunc((surfaceLength - contentLength) / 2), 0);
  if (horizontal) {
    return region.add(side, 0, contentLength, surface.height);
  }
  return region.add(0, side, surface.width, contentLength);
}

export function inputRegionMode(instance: PanelInstance): InputRegionMode {
  return instance.config.expandToEdges ? 'expand' : 'dock';
}

/**
 * Pushes the input region to the surface whenever the surface size or content length
 * changed since the last push.
 */
export class InputRegionManager {
  private readonly lastKeys = new WeakMap<PanelInstance, string>();

  update(instance: PanelInstance): boolean {
    const { surface, inputRegion } = instance.requireSurface();
    const surfaceSize = instance.surfaceSize();
    const contentLength = instance.lengthOf(instance.state.actualSize);
    const mode = inputRegionMode(instance);
    const key = `${surfaceSize.width}x${surfaceSize.height}:${contentLength}:${mode}`;
    if (this.lastKeys.get(instance) === key) {
      return false;
    }

    const previous = inputRegion.bounds();
    if (previous) {
      inputRegion.subtract(previous.x, previous.y, previous.width, previous.height);
    }
    computeInputRegion(
      { surface: surfaceSize, contentLength, horizontal: isHorizontal(instance.config), mode },
      inputRegion,
    );
    surface.setInputRegion(inputRegion);
    surface.commit();
    this.lastKeys.set(instance, key);
    return true;
  }

  forget(instance: PanelInstance): void {
    this.lastKeys.delete(instance);
  }
}
