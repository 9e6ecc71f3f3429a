import type { Point } from "../librepcb/shapes";
import { sign } from "../librepcb/format";
import type { OutlineGeometry, PadGeometry } from "./types";

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export const EMPTY_BOUNDS: Bounds = {
  minX: Infinity,
  minY: Infinity,
  maxX: -Infinity,
  maxY: -Infinity,
};

export function padBounds(pad: PadGeometry): Bounds {
  return {
    minX: pad.x - pad.width / 2,
    minY: pad.y - pad.height / 2,
    maxX: pad.x + pad.width / 2,
    maxY: pad.y + pad.height / 2,
  };
}

export function pointsBounds(points: readonly Point[]): Bounds {
  let result = EMPTY_BOUNDS;
  for (const p of points) {
    result = union(result, { minX: p.x, minY: p.y, maxX: p.x, maxY: p.y });
  }
  return result;
}

export function union(a: Bounds, b: Bounds): Bounds {
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

export function expand(bounds: Bounds, margin: number): Bounds {
  return {
    minX: bounds.minX - margin,
    minY: bounds.minY - margin,
    maxX: bounds.maxX + margin,
    maxY: bounds.maxY + margin,
  };
}

/** Area covered by a shape, including half its stroke width. */
export function outlineBounds(shape: OutlineGeometry): Bounds {
  return expand(pointsBounds(shape.vertices), shape.width / 2);
}

/** Union of all pads and documentation shapes of a variant. */
export function featureBounds(pads: readonly PadGeometry[], documentation: readonly OutlineGeometry[]): Bounds {
  let result = EMPTY_BOUNDS;
  for (const pad of pads) {
    result = union(result, padBounds(pad));
  }
  for (const shape of documentation) {
    result = union(result, outlineBounds(shape));
  }
  return result;
}

/** Rectangle NW, NE, SE, SW without repeating the first vertex. */
export function rectangleCourtyard(bounds: Bounds): Point[] {
  return [
    { x: bounds.minX, y: bounds.maxY },
    { x: bounds.maxX, y: bounds.maxY },
    { x: bounds.maxX, y: bounds.minY },
    { x: bounds.minX, y: bounds.minY },
  ];
}

/** Closed rectangle centered on the origin, starting and ending at NW. */
export function closedRectangle(halfX: number, halfY: number): Point[] {
  return [
    { x: -halfX, y: halfY },
    { x: halfX, y: halfY },
    { x: halfX, y: -halfY },
    { x: -halfX, y: -halfY },
    { x: -halfX, y: halfY },
  ];
}

/** Closed rectangle between two corners, as used for filled lead shapes. */
export function closedBox(x1: number, y1: number, x2: number, y2: number): Point[] {
  return [
    { x: x1, y: y1 },
    { x: x2, y: y1 },
    { x: x2, y: y2 },
    { x: x1, y: y2 },
    { x: x1, y: y1 },
  ];
}

/** Move every vertex away from both axes by `margin`. */
export function pushOutward(points: readonly Point[], margin: number): Point[] {
  return points.map((p) => ({ x: p.x + sign(p.x) * margin, y: p.y + sign(p.y) * margin }));
}

/** Whether `outer` contains `inner` with at least `margin` to spare on every side. */
export function containsWithMargin(outer: Bounds, inner: Bounds, margin: number, tolerance = 1e-9): boolean {
  return (
    outer.minX <= inner.minX - margin + tolerance &&
    outer.minY <= inner.minY - margin + tolerance &&
    outer.maxX >= inner.maxX + margin - tolerance &&
    outer.maxY >= inner.maxY + margin - tolerance
  );
}
