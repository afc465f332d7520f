import type { Point, Rectangle } from '@edgebar/shared';

function intersects(a: Rectangle, b: Rectangle): boolean {
  return (
    a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height
  );
}

function isEmptyRect(rect: Rectangle): boolean {
  return rect.width <= 0 || rect.height <= 0;
}

/**
 * Pieces of `rect` left after cutting `hole` out of it, as up to four disjoint bands.
 */
function cut(rect: Rectangle, hole: Rectangle): Rectangle[] {
  if (!intersects(rect, hole)) {
    return [rect];
  }
  const pieces: Rectangle[] = [];
  const rectBottom = rect.y + rect.height;
  const rectRight = rect.x + rect.width;
  const top = Math.max(rect.y, hole.y);
  const bottom = Math.min(rectBottom, hole.y + hole.height);

  if (hole.y > rect.y) {
    pieces.push({ x: rect.x, y: rect.y, width: rect.width, height: hole.y - rect.y });
  }
  if (bottom < rectBottom) {
    pieces.push({ x: rect.x, y: bottom, width: rect.width, height: rectBottom - bottom });
  }
  if (hole.x > rect.x) {
    pieces.push({ x: rect.x, y: top, width: hole.x - rect.x, height: bottom - top });
  }
  const holeRight = hole.x + hole.width;
  if (holeRight < rectRight) {
    pieces.push({ x: holeRight, y: top, width: rectRight - holeRight, height: bottom - top });
  }
  return pieces.filter((piece) => !isEmptyRect(piece));
}

/**
 * Set of surface-local pixels, kept as disjoint rectangles. Mirrors the add/subtract
 * model of a compositor region object.
 */
export class Region {
  private parts: Rectangle[] = [];

  add(x: number, y: number, width: number, height: number): this {
    const rect = { x, y, width, height };
    if (isEmptyRect(rect)) {
      return this;
    }
    this.parts = this.parts.flatMap((part) => cut(part, rect));
    this.parts.push(rect);
    return this;
  }

  subtract(x: number, y: number, width: number, height: number): this {
    const rect = { x, y, width, height };
    if (isEmptyRect(rect)) {
      return this;
    }
    this.parts = this.parts.flatMap((part) => cut(part, rect));
    return this;
  }

  contains(point: Point): boolean {
    return this.parts.some(
      (part) =>
        point.x >= part.x &&
        point.x < part.x + part.width &&
        point.y >= part.y &&
        point.y < part.y + part.height,
    );
  }

  area(): number {
    return this.parts.reduce((sum, part) => sum + part.width * part.height, 0);
  }

  isEmpty(): boolean {
    return this.parts.length === 0;
  }

  rectangles(): Rectangle[] {
    return this.parts.map((part) => ({ ...part }));
  }

  /**
   * Smallest rectangle covering the region, or null when empty.
   */
  bounds(): Rectangle | null {
    if (this.parts.length === 0) {
      return null;
    }
    const left = Math.min(...this.parts.map((part) => part.x));
    const top = Math.min(...this.parts.map((part) => part.y));
    const right = Math.max(...this.parts.map((part) => part.x + part.width));
    const bottom = Math.max(...this.parts.map((part) => part.y + part.height));
    return { x: left, y: top, width: right - left, height: bottom - top };
  }
}
