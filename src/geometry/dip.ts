import type { Point, Vertex } from "../librepcb/shapes";
import { closedRectangle } from "./bounds";
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

/** Through-hole dual in-line package on the 2.54 mm grid. */
export interface DipPart {
  pinCount: number;
  bodyLength: number;
  /** Row to row, hole center to hole center */
  leadSpan: number;
  height: number;
}

export interface DipVariant extends FootprintVariant {
  /** Land size, x by y */
  padSize: [number, number];
}

export const DIP_VARIANTS: readonly DipVariant[] = [
  { key: "handsoldering", name: "hand soldering", padSize: [2.54, 1.27] },
  { key: "compact", name: "compact", padSize: [1.6, 1.6] },
];

export const DIP_PITCH = 2.54;
export const DIP_LEAD_WIDTH = 0.55;
export const DIP_DRILL = 0.8;

const LINE_WIDTH = 0.25;
const SILKSCREEN_OFFSET = 0.2;
const TEXT_OFFSET = 0.6;
/** Outer body edge to hole center */
const BODY_HOLE_OFFSET = 0.4;
const COURTYARD_EXCESS = 0.4;
const PIN1_DOT_DIAMETER = 1.0;
const PIN1_DOT_OFFSET = 1.5;
/** Standoff below the body and lead length below the board surface */
const STANDOFF = 0.5;
const LEAD_DEPTH = 3.0;
const LEAD_THICKNESS = 0.25;

export function dipBodyWidth(part: DipPart): number {
  return part.leadSpan - 2 * BODY_HOLE_OFFSET;
}

function rows(part: DipPart): { pinCount: number; pitch: number } {
  return { pinCount: part.pinCount, pitch: DIP_PITCH };
}

/**
 * Twelve-corner outline: the body reaches out to `outer.y` between
 * ±`inner.x`, the pad columns reach out to `outer.x` between ±`inner.y`.
 */
function crossOutline(inner: Point, outer: Point): Point[] {
  return [
    { x: -inner.x, y: outer.y },
    { x: inner.x, y: outer.y },
    { x: inner.x, y: inner.y },
    { x: outer.x, y: inner.y },
    { x: outer.x, y: -inner.y },
    { x: inner.x, y: -inner.y },
    { x: inner.x, y: -outer.y },
    { x: -inner.x, y: -outer.y },
    { x: -inner.x, y: -inner.y },
    { x: -outer.x, y: -inner.y },
    { x: -outer.x, y: inner.y },
    { x: -inner.x, y: inner.y },
  ];
}

export function dipFootprint(part: DipPart, variant: DipVariant): FootprintGeometry {
  const [padWidth, padHeight] = variant.padSize;
  const padX = part.leadSpan / 2;
  const bodyWidth = dipBodyWidth(part);
  const firstY = rowY(1, part.pinCount / 2, DIP_PITCH);

  // Pin 1 keeps square corners
  const pads: PadGeometry[] = [];
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, rows(part), padX);
    pads.push({ pad: String(pin), x, y, width: padWidth, height: padHeight, radius: pin === 1 ? 0 : 1, drill: DIP_DRILL });
  }

  // Top line with a half-circle notch, running out over pin 1
  const dx = bodyWidth / 2 + LINE_WIDTH / 2;
  const dxPin1 = padX + padWidth / 2 - LINE_WIDTH / 2;
  const notch = dx / 4;
  const dy1 = firstY + padHeight / 2 + LINE_WIDTH / 2 + SILKSCREEN_OFFSET;
  const dy2 = part.bodyLength / 2 + LINE_WIDTH / 2;
  const top: Vertex[] = [
    { x: -dxPin1, y: dy1 },
    { x: -dx, y: dy1 },
    { x: -dx, y: dy2 },
    { x: -notch, y: dy2, angle: 180 },
    { x: notch, y: dy2 },
    { x: dx, y: dy2 },
    { x: dx, y: dy1 },
  ];
  const bottom: Vertex[] = [
    { x: -dx, y: -dy1 },
    { x: -dx, y: -dy2 },
    { x: dx, y: -dy2 },
    { x: dx, y: -dy1 },
  ];
  const legend: OutlineGeometry[] = [
    { feature: "polygon-silkscreen", layer: "top_legend", width: LINE_WIDTH, fill: false, grabArea: false, vertices: top },
    {
      feature: "polygon-silkscreen-bot",
      layer: "top_legend",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices: bottom,
    },
  ];

  const documentation: OutlineGeometry[] = [
    {
      feature: "polygon-body",
      layer: "top_documentation",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices: closedRectangle(bodyWidth / 2 - LINE_WIDTH / 2, part.bodyLength / 2 - LINE_WIDTH / 2),
    },
  ];
  const pin1: CircleGeometry = {
    feature: "pin1-dot",
    layer: "top_documentation",
    width: 0,
    fill: true,
    diameter: PIN1_DOT_DIAMETER,
    position: { x: -(bodyWidth / 2 - PIN1_DOT_OFFSET), y: part.bodyLength / 2 - PIN1_DOT_OFFSET },
  };

  const margin = LINE_WIDTH / 2 + COURTYARD_EXCESS;
  const courtyard = crossOutline(
    { x: bodyWidth / 2 + margin, y: firstY + padHeight / 2 + margin },
    { x: padX + padWidth / 2 + margin, y: part.bodyLength / 2 + margin },
  );

  return {
    pads,
    documentation,
    legend,
    circles: [pin1],
    courtyard,
    courtyardExcess: COURTYARD_EXCESS,
    labelY: part.bodyLength / 2 + LINE_WIDTH + TEXT_OFFSET,
  };
}

export function dipBodies(part: DipPart): SolidBox[] {
  const bodyHeight = part.height - STANDOFF;
  const boxes: SolidBox[] = [
    {
      name: "body",
      color: "#1a1a1a",
      center: { x: 0, y: 0, z: STANDOFF + bodyHeight / 2 },
      size: { x: dipBodyWidth(part), y: part.bodyLength, z: bodyHeight },
    },
  ];
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, rows(part), part.leadSpan / 2);
    boxes.push({
      name: `lead-${pin}`,
      color: "#d4d4d4",
      center: { x, y, z: (STANDOFF - LEAD_DEPTH) / 2 },
      size: { x: LEAD_THICKNESS, y: DIP_LEAD_WIDTH, z: STANDOFF + LEAD_DEPTH },
    });
  }
  return boxes;
}

export function dipPackage(part: DipPart): PackageGeometry {
  const pads: PadSpec[] = [];
  for (let pin = 1; pin <= part.pinCount; pin++) {
    pads.push({ id: String(pin), name: String(pin) });
  }
  return { pads, bodies: dipBodies(part) };
}
