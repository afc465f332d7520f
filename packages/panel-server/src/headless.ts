import type {
  ConfigureEvent,
  Margins,
  OutputDescriptor,
  Rectangle,
  Size,
} from '@edgebar/shared';

import type { Region } from './space/region';
import type {
  LayerShell,
  LayerSurfaceHandle,
  LayerSurfaceRequest,
  PopupHandle,
  PopupHost,
  PopupRequest,
} from './space/surface';

export type HeadlessSurfaceCall =
  | { kind: 'set_size'; width: number; height: number }
  | { kind: 'set_exclusive_zone'; zone: number }
  | { kind: 'set_margin'; margins: Margins }
  | { kind: 'set_input_region'; rectangles: Rectangle[] }
  | { kind: 'commit' }
  | { kind: 'destroy' };

export class HeadlessLayerSurface implements LayerSurfaceHandle {
  readonly calls: HeadlessSurfaceCall[] = [];
  requestedSize: Size | null = null;
  exclusiveZone: number | null = null;
  margins: Margins | null = null;
  inputRegion: Rectangle[] | null = null;
  commits = 0;
  destroyed = false;
  private sizeDirty = false;

  constructor(
    readonly id: string,
    readonly request: LayerSurfaceRequest,
    private readonly onSizeCommitted: (surface: HeadlessLayerSurface) => void,
  ) {}

  setSize(width: number, height: number): void {
    this.calls.push({ kind: 'set_size', width, height });
    this.requestedSize = { width, height };
    this.sizeDirty = true;
  }

  setExclusiveZone(zone: number): void {
    this.calls.push({ kind: 'set_exclusive_zone', zone });
    this.exclusiveZone = zone;
  }

  setMargin(margins: Margins): void {
    this.calls.push({ kind: 'set_margin', margins: { ...margins } });
    this.margins = { ...margins };
  }

  setInputRegion(region: Region): void {
    const rectangles = region.rectangles();
    this.calls.push({ kind: 'set_input_region', rectangles });
    this.inputRegion = rectangles;
  }

  commit(): void {
    this.calls.push({ kind: 'commit' });
    this.commits += 1;
    if (this.sizeDirty) {
      this.sizeDirty = false;
      this.onSizeCommitted(this);
    }
  }

  destroy(): void {
    this.calls.push({ kind: 'destroy' });
    this.destroyed = true;
  }
}

export class HeadlessPopup implements PopupHandle {
  closed = false;

  constructor(
    readonly surfaceId: string,
    readonly parentWindowId: string | null,
    readonly anchorRect: Rectangle,
  ) {}

  close(): void {
    this.closed = true;
  }
}

/**
 * In-process compositor. Every committed size request is answered with a configure event,
 * filling zero axes from the surface's output; callers deliver the queued events on their
 * next frame.
 */
export class HeadlessCompositor implements LayerShell, PopupHost {
  private readonly outputs = new Map<string, OutputDescriptor>();
  private readonly surfaces = new Map<string, HeadlessLayerSurface>();
  private readonly popups: HeadlessPopup[] = [];
  private queued: ConfigureEvent[] = [];
  private nextId = 1;

  constructor(outputs: OutputDescriptor[] = []) {
    for (const output of outputs) {
      this.outputs.set(output.name, output);
    }
  }

  setOutput(output: OutputDescriptor): void {
    this.outputs.set(output.name, output);
  }

  removeOutput(name: string): void {
    this.outputs.delete(name);
  }

  createSurface(request: LayerSurfaceRequest): HeadlessLayerSurface {
    const id = `layer-${this.nextId++}`;
    const surface = new HeadlessLayerSurface(id, request, (committed) => {
      this.queueConfigure(committed);
    });
    this.surfaces.set(id, surface);
    return surface;
  }

  openPopup(request: PopupRequest): HeadlessPopup {
    const popup = new HeadlessPopup(
      `popup-${this.nextId++}`,
      request.parentWindowId,
      { ...request.anchorRect },
    );
    this.popups.push(popup);
    return popup;
  }

  getSurface(id: string): HeadlessLayerSurface | undefined {
    return this.surfaces.get(id);
  }

  getSurfaces(): HeadlessLayerSurface[] {
    return Array.from(this.surfaces.values());
  }

  getPopups(): HeadlessPopup[] {
    return [...this.popups];
  }

  takeConfigures(): ConfigureEvent[] {
    const events = this.queued;
    this.queued = [];
    return events;
  }

  private queueConfigure(surface: HeadlessLayerSurface): void {
    if (surface.destroyed || !surface.requestedSize) {
      return;
    }
    const output = this.outputFor(surface.request.output);
    const { width, height } = surface.requestedSize;
    this.queued = this.queued.filter((event) => event.surfaceId !== surface.id);
    this.queued.push({
      surfaceId: surface.id,
      width: width === 0 ? (output?.width ?? 0) : width,
      height: height === 0 ? (output?.height ?? 0) : height,
    });
  }

  private outputFor(name: string | null): OutputDescriptor | undefined {
    if (name !== null) {
      return this.outputs.get(name);
    }
    const [first] = this.outputs.values();
    return first;
  }
}
