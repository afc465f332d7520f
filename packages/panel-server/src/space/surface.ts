import type {
  KeyboardInteractivity,
  Margins,
  PanelAnchor,
  PanelLayer,
  Rectangle,
} from '@edgebar/shared';

import type { Region } from './region';

/**
 * Client side of a layer-shell surface. Requests are double buffered and take effect on
 * `commit`.
 */
export interface LayerSurfaceHandle {
  readonly id: string;
  setSize(width: number, height: number): void;
  setExclusiveZone(zone: number): void;
  setMargin(margins: Margins): void;
  setInputRegion(region: Region): void;
  commit(): void;
  destroy(): void;
}

export interface LayerSurfaceRequest {
  namespace: string;
  /** Output name, or null to let the compositor pick the active output. */
  output: string | null;
  anchor: PanelAnchor;
  layer: PanelLayer;
  keyboardInteractivity: KeyboardInteractivity;
}

export interface LayerShell {
  createSurface(request: LayerSurfaceRequest): LayerSurfaceHandle;
}

export interface PopupHandle {
  readonly surfaceId: string;
  /** Applet window that owns the popup, if any. */
  readonly parentWindowId: string | null;
  close(): void;
}

export interface PopupRequest {
  parentSurfaceId: string;
  parentWindowId: string | null;
  anchorRect: Rectangle;
}

export interface PopupHost {
  openPopup(request: PopupRequest): PopupHandle;
}

/**
 * Layer-shell margins with `offset` on the anchored edge and `margin` on the two sides
 * running along it.
 */
export function marginsForAnchor(anchor: PanelAnchor, margin: number, offset: number): Margins {
  switch (anchor) {
    case 'left':
      return { top: margin, right: 0, bottom: margin, left: offset };
    case 'right':
      return { top: margin, right: offset, bottom: margin, left: 0 };
    case 'top':
      return { top: offset, right: margin, bottom: 0, left: margin };
    case 'bottom':
      return { top: 0, right: margin, bottom: offset, left: margin };
  }
}
