import type { PanelAnchor, Size } from '@edgebar/shared';

import type { CornerRadii, PanelRectSettings } from './panelInstance';

/**
 * Rounds the corners away from the anchored edge. With an anchor gap the panel floats, so
 * every corner is rounded. The radius never exceeds half of either side.
 */
export function computeCornerRadii(
  anchor: PanelAnchor,
  gap: number,
  borderRadius: number,
  size: Size,
): CornerRadii {
  const radius = Math.max(0, Math.min(borderRadius, size.width / 2, size.height / 2));
  if (gap > 0) {
    return { topLeft: radius, topRight: radius, bottomLeft: radius, bottomRight: radius };
  }
  switch (anchor) {
    case 'right':
      return { topLeft: radius, topRight: 0, bottomLeft: radius, bottomRight: 0 };
    case 'left':
      return { topLeft: 0, topRight: radius, bottomLeft: 0, bottomRight: radius };
    case 'bottom':
      return { topLeft: radius, topRight: radius, bottomLeft: 0, bottomRight: 0 };
    case 'top':
      return { topLeft: 0, topRight: 0, bottomLeft: radius, bottomRight: radius };
  }
}

export interface PanelRectInput {
  anchor: PanelAnchor;
  horizontal: boolean;
  gap: number;
  borderRadius: number;
  actualSize: Size;
  containerLength: number;
  containerPosition: number;
}

/**
 * Rounded background rectangle: the content-driven size stretched to the container length,
 * placed past the anchor gap.
 */
export function computePanelRect(input: PanelRectInput): PanelRectSettings {
  const size: Size = input.horizontal
    ? { width: input.containerLength, height: input.actualSize.height }
    : { width: input.actualSize.width, height: input.containerLength };

  let location: { x: number; y: number };
  switch (input.anchor) {
    case 'top':
      location = { x: input.containerPosition, y: input.gap };
      break;
    case 'bottom':
      location = { x: input.containerPosition, y: 0 };
      break;
    case 'left':
      location = { x: input.gap, y: input.containerPosition };
      break;
    case 'right':
      location = { x: 0, y: input.containerPosition };
      break;
  }

  return {
    radii: computeCornerRadii(input.anchor, input.gap, input.borderRadius, size),
    location,
    size,
  };
}
