import {
  clampToRange,
  getDimensions,
  getEffectiveAnchorGap,
  isHorizontal,
  pluginsCenter,
  pluginsLeft,
  pluginsRight,
  type OutputDescriptor,
  type PanelConfig,
  type Rectangle,
  type Size,
} from '@edgebar/shared';

import type { Rgba } from '../container/themeColors';
import { PanelError } from '../errors';
import { AppletWindowCollection, type AppletWindow, type AppletWindowInput } from './appletWindows';
import { Region } from './region';
import type { LayerSurfaceHandle, PopupHandle, PopupHost } from './surface';

export interface PanelSurfaceState {
  /** Logical surface size without the anchor gap, as last configured. */
  dimensions: Size;
  /** Content-driven size from the last layout pass. */
  actualSize: Size;
  /** Surface size (gap included) requested but not yet sent. */
  pendingDimensions: Size | null;
  /** Surface size (gap included) sent to the compositor, waiting for a configure. */
  awaitingConfigure: Size | null;
  /** Last request the compositor answered with a different size, and that answer. */
  answeredRequest: { requested: Size; configured: Size } | null;
  scale: number;
  containerLength: number;
  containerPosition: number;
  suggestedLength: number | null;
  /** Reveal margin currently applied to the anchored edge. */
  revealMargin: number;
  /** Anchored-edge margin used while hidden. */
  hideMargin: number;
}

export type VisibilityState =
  | { kind: 'visible' }
  | { kind: 'hidden' }
  | { kind: 'transition_to_visible'; since: number; elapsed: number; prevMargin: number }
  | { kind: 'transition_to_hidden'; since: number; elapsed: number; prevMargin: number };

export type PanelInstanceEvent =
  | { kind: 'configure'; width: number; height: number }
  | { kind: 'toggle_overflow'; windowId: string | null; anchorRect: Rectangle }
  | { kind: 'popup_done'; surfaceId: string }
  | { kind: 'close_popups' };

export interface CornerRadii {
  topLeft: number;
  topRight: number;
  bottomLeft: number;
  bottomRight: number;
}

export interface PanelRectSettings {
  radii: CornerRadii;
  /** Top-left corner of the rounded rectangle in surface coordinates. */
  location: { x: number; y: number };
  size: Size;
}

export interface WindowPlacement {
  windowId: string;
  region: AppletWindow['region'];
  x: number;
  y: number;
  /** Logical size used for placement. */
  width: number;
  height: number;
}

export interface PanelInstanceOptions {
  config: PanelConfig;
  output: OutputDescriptor | null;
  surface: LayerSurfaceHandle | null;
  backgroundColor: Rgba;
  /** Monotonic creation time in milliseconds. */
  now: number;
}

export function instanceKey(name: string, outputName: string | null): string {
  return `${name}@${outputName ?? 'active'}`;
}

/**
 * One panel config bound to one output, with the state the layout, resize and
 * visibility stages share.
 */
export class PanelInstance {
  config: PanelConfig;
  output: OutputDescriptor | null;
  surface: LayerSurfaceHandle | null;
  inputRegion: Region | null;
  readonly state: PanelSurfaceState;
  visibility: VisibilityState;
  readonly windows = new AppletWindowCollection();
  popups: PopupHandle[] = [];
  overflowPopup: PopupHandle | null = null;
  backgroundColor: Rgba;
  isDirty = true;
  panelChanged = true;
  readonly createdAt: number;
  lastMinimizeRect: Rectangle | null = null;
  lastPlacements: WindowPlacement[] = [];
  panelRect: PanelRectSettings | null = null;
  private events: PanelInstanceEvent[] = [];
  private destroyed = false;

  constructor(options: PanelInstanceOptions) {
    this.config = options.config;
    this.output = options.output;
    this.surface = options.surface;
    this.inputRegion = options.surface ? new Region() : null;
    this.backgroundColor = options.backgroundColor;
    this.createdAt = options.now;
    this.visibility = options.config.autohide ? { kind: 'hidden' } : { kind: 'visible' };
    this.state = {
      dimensions: { width: 0, height: 0 },
      actualSize: { width: 0, height: 0 },
      pendingDimensions: null,
      awaitingConfigure: null,
      answeredRequest: null,
      scale: options.output?.scale ?? 1,
      containerLength: 0,
      containerPosition: 0,
      suggestedLength: null,
      revealMargin: 0,
      hideMargin: 0,
    };
    this.state.pendingDimensions = this.withGap(this.constrain({ width: 1, height: 1 }));
  }

  get name(): string {
    return this.config.name;
  }

  get outputName(): string | null {
    return this.output?.name ?? null;
  }

  get key(): string {
    return instanceKey(this.config.name, this.outputName);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  requireSurface(): { surface: LayerSurfaceHandle; inputRegion: Region } {
    if (!this.surface || !this.inputRegion) {
      throw new PanelError('missing_surface', `Panel ${this.key} has no layer surface`);
    }
    return { surface: this.surface, inputRegion: this.inputRegion };
  }

  /**
   * Clamps a logical size to the size-class thickness range and the output length.
   */
  constrain(size: Size): Size {
    const outputDims = this.output ? { width: this.output.width, height: this.output.height } : null;
    const ranges = getDimensions(this.config, outputDims, this.state.suggestedLength);
    return {
      width: clampToRange(size.width, ranges.width),
      height: clampToRange(size.height, ranges.height),
    };
  }

  gap(): number {
    return getEffectiveAnchorGap(this.config);
  }

  withGap(size: Size): Size {
    const gap = this.gap();
    return isHorizontal(this.config)
      ? { width: size.width, height: size.height + gap }
      : { width: size.width + gap, height: size.height };
  }

  /**
   * Current surface size including the anchor gap.
   */
  surfaceSize(): Size {
    return this.withGap(this.state.dimensions);
  }

  thicknessOf(size: Size): number {
    return isHorizontal(this.config) ? size.height : size.width;
  }

  lengthOf(size: Size): number {
    return isHorizontal(this.config) ? size.width : size.height;
  }

  regionPlugins(): { left: string[] | null; center: string[] | null; right: string[] | null } {
    return {
      left: pluginsLeft(this.config),
      center: pluginsCenter(this.config),
      right: pluginsRight(this.config),
    };
  }

  mapWindow(input: AppletWindowInput): AppletWindow | null {
    const window = this.windows.map(input, this.regionPlugins());
    if (window) {
      this.isDirty = true;
    }
    return window;
  }

  unmapWindow(windowId: string): boolean {
    const removed = this.windows.remove(windowId);
    const popupCount = this.popups.length;
    this.popups = this.popups.filter((popup) => popup.parentWindowId !== windowId);
    if (this.overflowPopup && this.overflowPopup.parentWindowId === windowId) {
      this.overflowPopup = null;
    }
    if (removed || popupCount !== this.popups.length) {
      this.isDirty = true;
      return true;
    }
    return false;
  }

  resizeWindow(windowId: string, size: Size): boolean {
    const changed = this.windows.resize(windowId, size);
    if (changed) {
      this.isDirty = true;
    }
    return changed;
  }

  updateConfig(config: PanelConfig, backgroundColor: Rgba): void {
    this.config = config;
    this.setBackgroundColor(backgroundColor);
    if (!config.autohide) {
      this.visibility = { kind: 'visible' };
    }
  }

  setBackgroundColor(color: Rgba): void {
    this.backgroundColor = color;
    this.isDirty = true;
    this.panelChanged = true;
  }

  setOutput(output: OutputDescriptor): void {
    this.output = output;
    this.state.scale = output.scale ?? 1;
    this.isDirty = true;
    this.panelChanged = true;
  }

  enqueue(event: PanelInstanceEvent): void {
    if (this.destroyed) {
      return;
    }
    this.events.push(event);
  }

  drainEvents(): PanelInstanceEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  get queuedEventCount(): number {
    return this.events.length;
  }

  addPopup(popup: PopupHandle): void {
    this.popups.push(popup);
  }

  removePopup(surfaceId: string): boolean {
    const count = this.popups.length;
    this.popups = this.popups.filter((popup) => popup.surfaceId !== surfaceId);
    if (this.overflowPopup && this.overflowPopup.surfaceId === surfaceId) {
      this.overflowPopup = null;
    }
    return count !== this.popups.length;
  }

  closePopups(): void {
    const popups = this.popups;
    this.popups = [];
    this.overflowPopup = null;
    for (const popup of popups) {
      popup.close();
    }
  }

  /**
   * Opens the overflow popup, or closes it when it is already open.
   */
  toggleOverflow(host: PopupHost, windowId: string | null, anchorRect: Rectangle): boolean {
    if (this.overflowPopup) {
      const popup = this.overflowPopup;
      this.removePopup(popup.surfaceId);
      popup.close();
      return false;
    }
    const { surface } = this.requireSurface();
    const popup = host.openPopup({
      parentSurfaceId: surface.id,
      parentWindowId: windowId,
      anchorRect,
    });
    this.overflowPopup = popup;
    this.popups.push(popup);
    return true;
  }

  ownsSurface(surfaceId: string): boolean {
    if (this.surface && this.surface.id === surfaceId) {
      return true;
    }
    return this.popups.some((popup) => popup.surfaceId === surfaceId);
  }

  surfaceIds(): string[] {
    const ids = this.popups.map((popup) => popup.surfaceId);
    if (this.surface) {
      ids.unshift(this.surface.id);
    }
    return ids;
  }

  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.events = [];
    this.closePopups();
    this.windows.clear();
    this.surface?.destroy();
    this.surface = null;
    this.inputRegion = null;
  }
}
