import type { Point } from "../librepcb/shapes";
import { GeometryError } from "../errors";
import { truncateToGrid } from "../librepcb/format";
import { closedRectangle, expand, featureBounds, rectangleCourtyard } from "./bounds";
import { MIN_PAD_CLEARANCE } from "./clearance";
import { DensityVariant, QFN_DENSITY, qfnMaxLeadWidth } from "./density";
import type { FootprintGeometry, OutlineGeometry, PackageGeometry, PadGeometry, PadSpec, SolidBox } from "./types";

// ─── Types ───────────────────────────────────────────────────────────

/**
 * Quad flat no-lead package with exposed pad, as tabulated in JEDEC MO-220.
 * Letters in the comments are the datasheet designators.
 */
export interface QfnPart {
  /** Variation code, e.g. "VEEC-3"; the first letter selects V or W QFN */
  variation: string;
  /** A */
  height: number;
  /** e */
  pitch: number;
  /** D */
  bodyX: number;
  /** E */
  bodyY: number;
  /** D2 (max) */
  exposedX: number;
  /** E2 (max) */
  exposedY: number;
  /** L (max) */
  leadLength: number;
  /** ND, pins along the bottom and top edges */
  pinsX: number;
  /** NE, pins along the left and right edges */
  pinsY: number;
}

/** Lead and exposed pad dimensions after the clearance adjustment. */
export interface QfnLayout {
  leadLength: number;
  exposedX: number;
  exposedY: number;
  /** b max of the pitch */
  maxLeadWidth: number;
  /** Whether any of the nominal dimensions had to shrink */
  adjusted: boolean;
  /** Diagonal clearance between the corner pads of adjacent edges */
  cornerClearance: number;
  /** Clearance between the perimeter pads and the exposed pad, per axis */
  exposedClearanceX: number;
  exposedClearanceY: number;
}

const LINE_WIDTH = 0.25;
const LABEL_OFFSET = 1.0;
const SILKSCREEN_OFFSET = 0.15;
const ADJUSTMENT_GRID = 0.01;
const TOLERANCE = 1e-6;

export function qfnPinCount(part: QfnPart): number {
  return 2 * part.pinsX + 2 * part.pinsY;
}

// ─── Clearance solver ────────────────────────────────────────────────

/**
 * Distance between the body corner and the outer edge of the outermost
 * pad of each edge, along x and along y.
 */
function cornerSlack(part: QfnPart, maxLeadWidth: number): { x: number; y: number } {
  return {
    x: part.bodyX / 2 - (part.pitch * (part.pinsX - 1) / 2 + maxLeadWidth / 2),
    y: part.bodyY / 2 - (part.pitch * (part.pinsY - 1) / 2 + maxLeadWidth / 2),
  };
}

function cornerDistance(slack: { x: number; y: number }, leadLength: number): number {
  const dx = Math.max(slack.x - leadLength, 0);
  const dy = Math.max(slack.y - leadLength, 0);
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Shrink the lead length (and the exposed pad) until every pad keeps
 * 0.2 mm to its neighbours.
 *
 * 1. Corner pads of two adjacent edges: if they come too close, L is cut
 *    along the axis with more slack, or solved for the diagonal when the
 *    slack is similar on both axes.
 * 2. Exposed pad: the missing clearance of the worse axis is split between
 *    L and the exposed pad; the other axis takes the exposed pad cut it
 *    still needs.
 *
 * Adjusted values are truncated onto a 0.01 mm grid and the result is
 * checked again. Throws {@link GeometryError} when no valid layout exists.
 */
export function solveQfnLayout(part: QfnPart): QfnLayout {
  const maxLeadWidth = qfnMaxLeadWidth(part.pitch);
  const slack = cornerSlack(part, maxLeadWidth);
  let leadLength = part.leadLength;
  let exposedX = part.exposedX;
  let exposedY = part.exposedY;
  let adjusted = false;

  if (cornerDistance(slack, leadLength) < MIN_PAD_CLEARANCE) {
    if (slack.x - slack.y >= MIN_PAD_CLEARANCE) {
      leadLength = slack.x - (MIN_PAD_CLEARANCE + 0.0001);
    } else if (slack.y - slack.x >= MIN_PAD_CLEARANCE) {
      leadLength = slack.y - (MIN_PAD_CLEARANCE + 0.0001);
    } else {
      const { x, y } = slack;
      leadLength = 0.5 * (x + y) - Math.sqrt((x * y) / 2 - (x * x + y * y) / 4 + 0.02) - 0.001;
    }
    leadLength = truncateToGrid(leadLength, ADJUSTMENT_GRID);
    adjusted = true;
  }

  const gapX = part.bodyX / 2 - (leadLength + exposedX / 2);
  const gapY = part.bodyY / 2 - (leadLength + exposedY / 2);
  if (gapX < MIN_PAD_CLEARANCE || gapY < MIN_PAD_CLEARANCE) {
    const adjX = MIN_PAD_CLEARANCE - gapX;
    const adjY = MIN_PAD_CLEARANCE - gapY;
    if (adjX > adjY) {
      exposedX -= adjX;
      leadLength -= adjX / 2;
      if (adjY > adjX / 2) {
        exposedY -= 2 * (adjY - adjX / 2);
      }
    } else {
      exposedY -= adjY;
      leadLength -= adjY / 2;
      if (adjX > adjY / 2) {
        exposedX -= 2 * (adjX - adjY / 2);
      }
    }
    leadLength = truncateToGrid(leadLength, ADJUSTMENT_GRID);
    exposedX = truncateToGrid(exposedX, ADJUSTMENT_GRID);
    exposedY = truncateToGrid(exposedY, ADJUSTMENT_GRID);
    adjusted = true;
  }

  if (!(leadLength > 0 && exposedX > 0 && exposedY > 0)) {
    throw new GeometryError("Not big enough to keep 0.2 mm between pads and exposed pad", part.variation);
  }

  const layout: QfnLayout = {
    leadLength,
    exposedX,
    exposedY,
    maxLeadWidth,
    adjusted,
    cornerClearance: cornerDistance(slack, leadLength),
    exposedClearanceX: part.bodyX / 2 - (leadLength + exposedX / 2),
    exposedClearanceY: part.bodyY / 2 - (leadLength + exposedY / 2),
  };
  const worst = Math.min(layout.cornerClearance, layout.exposedClearanceX, layout.exposedClearanceY);
  if (worst < MIN_PAD_CLEARANCE - TOLERANCE) {
    throw new GeometryError(`Pad clearance ${worst.toFixed(4)} mm is below 0.2 mm after adjustment`, part.variation);
  }
  return layout;
}

// ─── Footprint ───────────────────────────────────────────────────────

/**
 * Pad center and size. Pads are numbered counter-clockwise starting at
 * the top of the left edge.
 */
export function qfnPad(pin: number, part: QfnPart, layout: QfnLayout, variant: DensityVariant): PadGeometry {
  const excess = QFN_DENSITY[variant.level];
  const { pinsX, pinsY } = part;

  // Left/right edges carry pinsY pads, bottom/top edges pinsX pads
  let leftRight: boolean;
  let upperHalf: boolean;
  let sideNumber: number;
  if (pin <= pinsY) {
    leftRight = true;
    upperHalf = false;
    sideNumber = pin - (pinsY + 1) / 2;
  } else if (pin <= pinsY + pinsX) {
    leftRight = false;
    upperHalf = false;
    sideNumber = pin - pinsY - (pinsX + 1) / 2;
  } else if (pin <= 2 * pinsY + pinsX) {
    leftRight = true;
    upperHalf = true;
    sideNumber = pin - pinsY - pinsX - (pinsY + 1) / 2;
  } else if (pin <= 2 * pinsY + 2 * pinsX) {
    leftRight = false;
    upperHalf = true;
    sideNumber = pin - 2 * pinsY - pinsX - (pinsX + 1) / 2;
  } else {
    throw new GeometryError(`Bad pad number ${pin}`, part.variation);
  }

  const length = layout.leadLength + excess.toe + excess.heel;
  const width = layout.maxLeadWidth + 2 * excess.side;
  let x: number;
  let y: number;
  if (leftRight) {
    x = part.bodyX / 2 + excess.toe - length / 2;
    y = sideNumber * part.pitch;
  } else {
    y = part.bodyY / 2 + excess.toe - length / 2;
    x = -sideNumber * part.pitch;
  }
  if (!upperHalf) {
    x = -x;
    y = -y;
  }
  return {
    pad: String(pin),
    x: x === 0 ? 0 : x,
    y: y === 0 ? 0 : y,
    width: leftRight ? length : width,
    height: leftRight ? width : length,
  };
}

export const EXPOSED_PAD_ID = "epad";

export function qfnFootprint(part: QfnPart, variant: DensityVariant, layout = solveQfnLayout(part)): FootprintGeometry {
  const excess = QFN_DENSITY[variant.level];
  const count = qfnPinCount(part);

  const pads: PadGeometry[] = [];
  for (let pin = 1; pin <= count; pin++) {
    pads.push(qfnPad(pin, part, layout, variant));
  }
  pads.push({ pad: EXPOSED_PAD_ID, x: 0, y: 0, width: layout.exposedX, height: layout.exposedY });

  // Right angles at every corner; the pin 1 corner only gets its top line
  const pinExtX = part.pitch * part.pinsX / 2 + layout.maxLeadWidth / 2 + excess.side + SILKSCREEN_OFFSET;
  const pinExtY = part.pitch * part.pinsY / 2 + layout.maxLeadWidth / 2 + excess.side + SILKSCREEN_OFFSET;
  const fullExtX = Math.max(part.bodyX / 2, pinExtX + LINE_WIDTH);
  const fullExtY = Math.max(part.bodyY / 2, pinExtY + LINE_WIDTH);
  const half = LINE_WIDTH / 2;
  const legend: OutlineGeometry[] = [];
  for (const quadrant of [1, 2, 3, 4]) {
    const sx = quadrant === 1 || quadrant === 4 ? 1 : -1;
    const sy = quadrant === 1 || quadrant === 2 ? 1 : -1;
    const corner: Point[] =
      quadrant === 2
        ? [
            { x: fullExtX + half, y: fullExtY + half },
            { x: pinExtX + half, y: fullExtY + half },
          ]
        : [
            { x: fullExtX + half, y: pinExtY + half },
            { x: fullExtX + half, y: fullExtY + half },
            { x: pinExtX + half, y: fullExtY + half },
          ];
    legend.push({
      feature: `polygon-silkscreen-${quadrant}`,
      layer: "top_legend",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices: corner.map((v) => ({ x: sx * v.x, y: sy * v.y })),
    });
  }

  const documentation: OutlineGeometry[] = [
    {
      feature: "polygon-outline",
      layer: "top_documentation",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices: closedRectangle(part.bodyX / 2 - half, part.bodyY / 2 - half),
    },
  ];

  return {
    pads,
    documentation,
    legend,
    circles: [],
    courtyard: rectangleCourtyard(expand(featureBounds(pads, documentation), excess.courtyard)),
    courtyardExcess: excess.courtyard,
    labelY: part.bodyY / 2 + LABEL_OFFSET,
  };
}

export function qfnBodies(part: QfnPart, layout: QfnLayout): SolidBox[] {
  const leadThickness = 0.2;
  const boxes: SolidBox[] = [
    {
      name: "body",
      color: "#1a1a1a",
      center: { x: 0, y: 0, z: part.height / 2 },
      size: { x: part.bodyX, y: part.bodyY, z: part.height },
    },
    {
      name: "exposed-pad",
      color: "#d4d4d4",
      center: { x: 0, y: 0, z: leadThickness / 2 },
      size: { x: layout.exposedX, y: layout.exposedY, z: leadThickness },
    },
  ];
  for (let pin = 1; pin <= qfnPinCount(part); pin++) {
    // Density B pad centers, pulled back inside the body outline
    const pad = qfnPad(pin, part, layout, { key: "body", name: "body", level: "B" });
    const horizontal = pad.width > pad.height;
    const inset = QFN_DENSITY.B.toe / 2;
    boxes.push({
      name: `lead-${pin}`,
      color: "#d4d4d4",
      center: {
        x: horizontal ? pad.x - Math.sign(pad.x) * inset : pad.x,
        y: horizontal ? pad.y : pad.y - Math.sign(pad.y) * inset,
        z: leadThickness / 2,
      },
      size: horizontal
        ? { x: layout.leadLength, y: layout.maxLeadWidth, z: leadThickness }
        : { x: layout.maxLeadWidth, y: layout.leadLength, z: leadThickness },
    });
  }
  return boxes;
}

export function qfnPackage(part: QfnPart, layout = solveQfnLayout(part)): PackageGeometry {
  const pads: PadSpec[] = [];
  const count = qfnPinCount(part);
  for (let pin = 1; pin <= count; pin++) {
    pads.push({ id: String(pin), name: String(pin) });
  }
  pads.push({ id: EXPOSED_PAD_ID, name: String(count + 1) });
  return { pads, bodies: qfnBodies(part, layout) };
}
