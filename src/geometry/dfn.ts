import type { Point } from "../librepcb/shapes";
import { GeometryError } from "../errors";
import { roundTo } from "../librepcb/format";
import { closedBox, closedRectangle, expand, featureBounds, rectangleCourtyard } from "./bounds";
import { MIN_PAD_CLEARANCE } from "./clearance";
import { pinPosition, rowY } from "./gullwing";
import type {
  CircleGeometry,
  FootprintGeometry,
  FootprintVariant,
  OutlineGeometry,
  PackageGeometry,
  PadGeometry,
  PadSpec,
  SolidBox,
} from "./types";

// ─── Types ───────────────────────────────────────────────────────────

/**
 * Dual flat no-lead package (JEDEC MO-229). The two pin rows run along
 * y on the left and right edge of the body.
 */
export interface DfnPart {
  pinCount: number;
  pitch: number;
  /** Body extent along y */
  bodyLength: number;
  /** Body extent along x, edge to edge across the rows */
  bodyWidth: number;
  height: number;
  leadLength: number;
  leadWidth: number;
  /** How far the lands reach past the body edge */
  toeHeel: number;
  /** Exposed pad; `length` runs along x and `width` along y */
  exposed?: { length: number; width: number };
}

export interface DfnVariant extends FootprintVariant {
  /** Extra land length outwards, for soldering iron access */
  padExtension: number;
}

export const DFN_VARIANTS: readonly DfnVariant[] = [
  { key: "reflow", name: "reflow", padExtension: 0 },
  { key: "hand-soldering", name: "hand soldering", padExtension: 0.3 },
];

export const DFN_EXPOSED_PAD_ID = "exposed";

const LINE_WIDTH = 0.254;
const OUTLINE_WIDTH = 0.2;
const SILKSCREEN_OFFSET = 0.15;
const LABEL_OFFSET = 1.0;
const COURTYARD_EXCESS = 0.2;
const MIN_EXPOSED_LENGTH = 0.1;
const LEAD_THICKNESS = 0.2;

// ─── Lands ───────────────────────────────────────────────────────────

export interface DfnLands {
  padLength: number;
  /** Distance of the pad centers from the y axis */
  padX: number;
  /** Exposed pad length after the clearance adjustment, 0 without one */
  exposedLength: number;
}

/**
 * Land size and position of one variant. Pads and exposed pad both give
 * way until they are {@link MIN_PAD_CLEARANCE} apart, and the exposed pad
 * never gets narrower than 0.1 mm.
 */
export function dfnLands(part: DfnPart, variant: DfnVariant): DfnLands {
  const extension = variant.padExtension;
  let padLength = part.leadLength + part.toeHeel + extension;
  let padX = part.bodyWidth / 2 - part.leadLength / 2 + part.toeHeel / 2 + extension / 2;
  let exposedLength = 0;

  if (part.exposed !== undefined) {
    exposedLength = part.exposed.length;
    const clearance = part.bodyWidth / 2 - part.leadLength - exposedLength / 2;
    if (clearance < MIN_PAD_CLEARANCE) {
      const shift = (MIN_PAD_CLEARANCE - clearance) / 2;
      padLength -= shift;
      exposedLength -= 2 * shift;
      padX += shift / 2;
    }
    if (exposedLength < MIN_EXPOSED_LENGTH) {
      const grow = MIN_EXPOSED_LENGTH - exposedLength;
      exposedLength += grow;
      padLength -= grow / 2;
      padX += grow / 4;
    }
  }

  if (padLength <= 0) {
    throw new GeometryError(`Pad length ${padLength.toFixed(3)} mm of variant ${variant.key} is not positive`);
  }
  return { padLength, padX, exposedLength };
}

// ─── Footprint ───────────────────────────────────────────────────────

/**
 * Silkscreen lines above and below the body. They bend down along the
 * body edges and stop short of pin 1; with an exposed pad reaching the
 * body edge they move up to keep their offset.
 */
function dfnLegend(part: DfnPart): { legend: OutlineGeometry[]; drop: number } {
  const perRow = part.pinCount / 2;
  let drop =
    part.bodyLength / 2 - SILKSCREEN_OFFSET - rowY(1, perRow, part.pitch) - part.leadWidth / 2 - LINE_WIDTH / 2;
  let top = part.bodyLength / 2;
  if (part.exposed !== undefined) {
    const clearance = top - LINE_WIDTH / 2 - part.exposed.width / 2;
    if (roundTo(clearance, 2) < SILKSCREEN_OFFSET) {
      top += SILKSCREEN_OFFSET - clearance;
      drop += SILKSCREEN_OFFSET - clearance;
    }
  }

  const halfX = part.bodyWidth / 2;
  const legend = [-1, 1].map((side, i): OutlineGeometry => {
    const vertices: Point[] = [{ x: -halfX, y: side * (top - drop) }];
    if (drop > 0) {
      vertices.push({ x: -halfX, y: side * top }, { x: halfX, y: side * top });
    }
    vertices.push({ x: halfX, y: side * (top - drop) });
    return {
      feature: `polygon-silkscreen-${i}`,
      layer: "top_legend",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices,
    };
  });
  return { legend, drop };
}

/** Pin 1 dot left of the top silkscreen line; larger on bodies of 3 mm and up. */
function pin1Dot(part: DfnPart, drop: number): CircleGeometry {
  const large = part.bodyWidth >= 3.0 && part.bodyLength >= 3.0;
  const diameter = large ? 2 * LINE_WIDTH : LINE_WIDTH;
  let y = large ? part.bodyLength / 2 + LINE_WIDTH / 2 : part.bodyLength / 2 + diameter;
  const x = large ? -part.bodyWidth / 2 - diameter : -part.bodyWidth / 2 - LINE_WIDTH;
  if (drop < 0) {
    y -= drop;
  }
  return { feature: "circle-silkscreen", layer: "top_legend", width: 0, fill: true, diameter, position: { x, y } };
}

export function dfnFootprint(part: DfnPart, variant: DfnVariant): FootprintGeometry {
  const lands = dfnLands(part, variant);

  const pads: PadGeometry[] = [];
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, part, lands.padX);
    pads.push({ pad: String(pin), x, y, width: lands.padLength, height: part.leadWidth });
  }
  if (part.exposed !== undefined) {
    pads.push({ pad: DFN_EXPOSED_PAD_ID, x: 0, y: 0, width: lands.exposedLength, height: part.exposed.width });
  }

  const documentation: OutlineGeometry[] = [];
  const leadInner = part.bodyWidth / 2 - part.leadLength;
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, part, leadInner);
    const side = x < 0 ? -1 : 1;
    documentation.push({
      feature: `lead-${pin}`,
      layer: "top_documentation",
      width: 0,
      fill: true,
      grabArea: false,
      vertices: closedBox(side * leadInner, y + part.leadWidth / 2, side * part.bodyWidth / 2, y - part.leadWidth / 2),
    });
  }
  if (part.exposed !== undefined) {
    documentation.push({
      feature: "lead-exposed",
      layer: "top_documentation",
      width: 0,
      fill: true,
      grabArea: false,
      vertices: closedRectangle(part.exposed.length / 2, part.exposed.width / 2),
    });
  }
  documentation.push({
    feature: "body-outline",
    layer: "top_documentation",
    width: OUTLINE_WIDTH,
    fill: false,
    grabArea: false,
    vertices: closedRectangle(part.bodyWidth / 2 - OUTLINE_WIDTH / 2, part.bodyLength / 2 - OUTLINE_WIDTH / 2),
  });

  const { legend, drop } = dfnLegend(part);
  return {
    pads,
    documentation,
    legend,
    circles: [pin1Dot(part, drop)],
    courtyard: rectangleCourtyard(expand(featureBounds(pads, documentation), COURTYARD_EXCESS)),
    courtyardExcess: COURTYARD_EXCESS,
    labelY: part.bodyLength / 2 + LABEL_OFFSET,
  };
}

// ─── Package ─────────────────────────────────────────────────────────

export function dfnBodies(part: DfnPart): SolidBox[] {
  const boxes: SolidBox[] = [
    {
      name: "body",
      color: "#1a1a1a",
      center: { x: 0, y: 0, z: part.height / 2 },
      size: { x: part.bodyWidth, y: part.bodyLength, z: part.height },
    },
  ];
  const leadX = part.bodyWidth / 2 - part.leadLength / 2;
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, part, leadX);
    boxes.push({
      name: `lead-${pin}`,
      color: "#d4d4d4",
      center: { x, y, z: LEAD_THICKNESS / 2 },
      size: { x: part.leadLength, y: part.leadWidth, z: LEAD_THICKNESS },
    });
  }
  if (part.exposed !== undefined) {
    boxes.push({
      name: "lead-exposed",
      color: "#d4d4d4",
      center: { x: 0, y: 0, z: LEAD_THICKNESS / 2 },
      size: { x: part.exposed.length, y: part.exposed.width, z: LEAD_THICKNESS },
    });
  }
  return boxes;
}

export function dfnPackage(part: DfnPart): PackageGeometry {
  const pads: PadSpec[] = [];
  for (let pin = 1; pin <= part.pinCount; pin++) {
    pads.push({ id: String(pin), name: String(pin) });
  }
  if (part.exposed !== undefined) {
    pads.push({ id: DFN_EXPOSED_PAD_ID, name: "ExposedPad" });
  }
  return { pads, bodies: dfnBodies(part) };
}
