import { GeometryError } from "../errors";
import type { Bounds } from "./bounds";
import { padBounds } from "./bounds";
import type { PadGeometry } from "./types";

/** Minimum copper-to-copper distance between two lands, in mm. */
export const MIN_PAD_CLEARANCE = 0.2;

/** Edge-to-edge distance of two rectangles, 0 when they touch or overlap. */
export function rectDistance(a: Bounds, b: Bounds): number {
  const dx = Math.max(0, a.minX - b.maxX, b.minX - a.maxX);
  const dy = Math.max(0, a.minY - b.maxY, b.minY - a.maxY);
  return Math.sqrt(dx * dx + dy * dy);
}

export interface ClearanceReport {
  distance: number;
  /** Pad ids of the closest pair */
  between: [string, string];
}

/** The closest pair among all pads, `undefined` for fewer than two pads. */
export function minimumClearance(pads: readonly PadGeometry[]): ClearanceReport | undefined {
  const boxes = pads.map(padBounds);
  let best: ClearanceReport | undefined;
  for (let i = 0; i < pads.length; i++) {
    for (let j = i + 1; j < pads.length; j++) {
      const distance = rectDistance(boxes[i], boxes[j]);
      if (best === undefined || distance < best.distance) {
        best = { distance, between: [pads[i].pad, pads[j].pad] };
      }
    }
  }
  return best;
}

/**
 * Throw when any two pads are closer than {@link MIN_PAD_CLEARANCE}
 * (up to float noise).
 */
export function assertPadClearance(pads: readonly PadGeometry[], entry?: string): void {
  const closest = minimumClearance(pads);
  if (closest !== undefined && closest.distance < MIN_PAD_CLEARANCE - 1e-6) {
    const [a, b] = closest.between;
    throw new GeometryError(
      `Pads ${a} and ${b} are ${closest.distance.toFixed(3)} mm apart, minimum is ${MIN_PAD_CLEARANCE} mm`,
      entry,
    );
  }
}
