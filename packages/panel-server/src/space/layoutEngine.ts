import {
  ALIGNMENTS,
  isHorizontal,
  pluginsLeft,
  rectangleEquals,
  sizeEquals,
  toLogicalSize,
  type Alignment,
  type MinimizeTarget,
  type PanelConfig,
  type Rectangle,
  type Size,
} from '@edgebar/shared';

import { withPrefix, type Logger } from '../logger';
import type { AppletWindow } from './appletWindows';
import type { PanelInstance, PanelRectSettings, WindowPlacement } from './panelInstance';
import { computePanelRect } from './panelRect';

export type RegionSums = Record<Alignment, number>;

export type LayoutOutcome =
  | { kind: 'resize'; desired: Size }
  | {
      kind: 'placed';
      placements: WindowPlacement[];
      actualSize: Size;
      containerLength: number;
      containerPosition: number;
      /** Logical lengthwise sum of each region, spacing included. */
      regionSums: RegionSums;
      /** Present only when the background rectangle was recomputed. */
      panelRect: PanelRectSettings | null;
      /** Minimize-target rectangles that changed during this pass. */
      minimizeTargets: MinimizeTarget[];
    };

export interface LayoutEngineOptions {
  logger?: Logger;
  debug?: boolean;
}

interface WindowMetrics {
  length: number;
  thickness: number;
}

function windowMetrics(window: AppletWindow, horizontal: boolean): WindowMetrics {
  return horizontal
    ? { length: window.size.width, thickness: window.size.height }
    : { length: window.size.height, thickness: window.size.width };
}

/**
 * Lengthwise extent of a region: window lengths plus one spacing between neighbours.
 * Values are in the same units as `spacing`.
 */
export function regionSum(lengths: number[], spacing: number): number {
  const total = lengths.reduce((sum, length) => sum + length, 0);
  return total + spacing * (Math.max(lengths.length, 1) - 1);
}

/**
 * Offset added after the left windows before the center region starts.
 */
export function centerLeftSpacing(
  sums: RegionSums,
  containerLength: number,
  padding: number,
  isDock: boolean,
): number {
  const equalLength = containerLength / 3;
  if (
    isDock ||
    (sums.left < equalLength && sums.center < equalLength && sums.right < equalLength)
  ) {
    const centerSpacing = (equalLength - sums.center) / 2;
    const leftSpacing = equalLength - sums.left - padding;
    return leftSpacing + centerSpacing;
  }
  return (containerLength - sums.left - sums.center - sums.right - 2 * padding) / 2;
}

function centerInBar(thickness: number, dim: number): number {
  return Math.trunc((Math.trunc(thickness) - Math.trunc(dim)) / 2);
}

export class LayoutEngine {
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(options: LayoutEngineOptions = {}) {
    this.logger = withPrefix('layout', options.logger);
    this.debug = options.debug ?? false;
  }

  layout(instance: PanelInstance): LayoutOutcome {
    const { surface } = instance.requireSurface();
    const config = instance.config;
    const horizontal = isHorizontal(config);
    const scale = instance.state.scale;
    const padding = config.padding;
    const spacing = config.spacing;
    const paddingScaled = padding * scale;
    const spacingScaled = spacing * scale;
    const isDock = !config.expandToEdges;

    const byRegion: Record<Alignment, AppletWindow[]> = {
      left: instance.windows.inRegion('left'),
      center: instance.windows.inRegion('center'),
      right: instance.windows.inRegion('right'),
    };

    const sumsScaled: RegionSums = { left: 0, center: 0, right: 0 };
    let maxThickness = 0;
    let nonEmptyRegions = 0;
    for (const region of ALIGNMENTS) {
      const metrics = byRegion[region].map((window) => windowMetrics(window, horizontal));
      sumsScaled[region] = regionSum(
        metrics.map((metric) => metric.length),
        spacingScaled,
      );
      for (const metric of metrics) {
        maxThickness = Math.max(maxThickness, metric.thickness);
      }
      if (metrics.length > 0) {
        nonEmptyRegions += 1;
      }
    }

    const totalSumScaled = sumsScaled.left + sumsScaled.center + sumsScaled.right;
    const listLength = Math.trunc(
      totalSumScaled + paddingScaled * 2 + spacingScaled * Math.max(nonEmptyRegions - 1, 0),
    );
    const listThickness = Math.trunc(2 * paddingScaled + maxThickness);

    const previousActual = instance.state.actualSize;
    const physical: Size = horizontal
      ? { width: listLength, height: listThickness }
      : { width: listThickness, height: listLength };
    const actual = toLogicalSize(physical, scale);
    const constrained = instance.constrain(actual);
    const current = instance.surfaceSize();
    let desired = instance.withGap(constrained);
    // The compositor already answered this exact request with the current size.
    const answered = instance.state.answeredRequest;
    const imposed =
      answered !== null &&
      sizeEquals(answered.requested, desired) &&
      sizeEquals(answered.configured, current);
    const target = imposed ? instance.state.dimensions : constrained;
    if (imposed) {
      desired = current;
    }
    if (horizontal) {
      actual.height = target.height;
    } else {
      actual.width = target.width;
    }
    instance.state.actualSize = actual;

    if (
      !sizeEquals(previousActual, actual) ||
      instance.thicknessOf(desired) !== instance.thicknessOf(current)
    ) {
      instance.panelChanged = true;
    }

    if (!sizeEquals(desired, current)) {
      if (this.debug) {
        this.logger.debug?.(
          `${instance.key} needs ${desired.width}x${desired.height}, surface is ${current.width}x${current.height}`,
        );
      }
      return { kind: 'resize', desired };
    }

    const logicalLength = instance.lengthOf(actual);
    const logicalThickness = instance.thicknessOf(actual);
    const surfaceLength = instance.lengthOf(desired);
    const containerLength = isDock ? logicalLength : surfaceLength;
    const containerPosition = Math.trunc((surfaceLength - containerLength) / 2);
    instance.state.containerLength = containerLength;
    instance.state.containerPosition = containerPosition;

    let panelRect: PanelRectSettings | null = null;
    if (instance.panelChanged) {
      panelRect = computePanelRect({
        anchor: config.anchor,
        horizontal,
        gap: instance.gap(),
        borderRadius: config.borderRadius,
        actualSize: actual,
        containerLength,
        containerPosition,
      });
      instance.panelRect = panelRect;
      instance.panelChanged = false;
    }

    const sums: RegionSums = {
      left: sumsScaled.left / scale,
      center: sumsScaled.center / scale,
      right: sumsScaled.right / scale,
    };
    const leftGap = centerLeftSpacing(sums, containerLength, padding, isDock);
    const marginOffset =
      config.anchor === 'top' || config.anchor === 'left' ? instance.gap() : 0;

    const placements: WindowPlacement[] = [];
    const minimizeTargets: MinimizeTarget[] = [];
    const placeRegion = (windows: AppletWindow[], start: number): number => {
      let prev = start;
      for (const window of windows) {
        const width = window.size.width / scale;
        const height = window.size.height / scale;
        const cur = prev + spacing * window.index;
        let x: number;
        let y: number;
        if (horizontal) {
          x = Math.trunc(cur);
          y = marginOffset + centerInBar(logicalThickness, height);
          prev += width;
        } else {
          x = marginOffset + centerInBar(logicalThickness, width);
          y = Math.trunc(cur);
          prev += height;
        }
        placements.push({ windowId: window.id, region: window.region, x, y, width, height });

        if (window.isMinimizeTarget) {
          const rect: Rectangle = {
            x,
            y,
            width: Math.max(Math.ceil(width), 1),
            height: Math.max(Math.ceil(height), 1),
          };
          if (!instance.lastMinimizeRect || !rectangleEquals(rect, instance.lastMinimizeRect)) {
            instance.lastMinimizeRect = rect;
            minimizeTargets.push({
              output: instance.outputName ?? '',
              rect,
              priority: isDock ? 1 : 0,
              surfaceId: surface.id,
            });
          }
        }
      }
      return prev;
    };

    let prev = placeRegion(byRegion.left, containerPosition + padding);
    if (hasLeftPlugins(config)) {
      prev += leftGap;
    }
    placeRegion(byRegion.center, prev);
    placeRegion(
      byRegion.right,
      containerPosition + containerLength - padding - sums.right,
    );

    instance.lastPlacements = placements;
    if (this.debug) {
      this.logger.debug?.(
        `${instance.key} placed ${placements.length} windows, container ${containerLength} at ${containerPosition}`,
      );
    }

    return {
      kind: 'placed',
      placements,
      actualSize: { ...actual },
      containerLength,
      containerPosition,
      regionSums: sums,
      panelRect,
      minimizeTargets,
    };
  }
}

function hasLeftPlugins(config: PanelConfig): boolean {
  const left = pluginsLeft(config);
  return left !== null && left.length > 0;
}
