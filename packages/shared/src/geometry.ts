export interface Size {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Half-open integer range `[start, end)`.
 */
export interface Range {
  start: number;
  end: number;
}

export type Alignment = 'left' | 'center' | 'right';

export const ALIGNMENTS: readonly Alignment[] = ['left', 'center', 'right'];

export function sizeEquals(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}

export function rectangleEquals(a: Rectangle, b: Rectangle): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

export function toLogicalSize(size: Size, scale: number): Size {
  return {
    width: Math.round(size.width / scale),
    height: Math.round(size.height / scale),
  };
}

export function clampToRange(value: number, range: Range): number {
  if (value < range.start) {
    return range.start;
  }
  if (value >= range.end) {
    return range.end - 1;
  }
  return value;
}
