import type { Point } from "../librepcb/shapes";
import { ConfigurationError } from "../errors";
import { closedBox, closedRectangle, pushOutward } from "./bounds";
import { DensityVariant, QFP_DENSITY, QFP_LEAD_CONTACT_LENGTH, excessForPitch } from "./density";
import type { FootprintGeometry, OutlineGeometry, PackageGeometry, PadGeometry, PadSpec, SolidBox } from "./types";

/** Gull-wing quad flat package, leads on all four sides. */
export interface QuadFlatPart {
  bodySizeX: number;
  bodySizeY: number;
  pitch: number;
  leadCount: number;
  /** Lead tip to lead tip */
  leadSpanX: number;
  leadSpanY: number;
  leadWidth: number;
  heightNom: number;
  heightMax: number;
}

export interface QuadPosition {
  x: number;
  y: number;
  /** Left and right rows; their leads run along x */
  horizontal: boolean;
}

const LINE_WIDTH = 0.25;
const LABEL_OFFSET = 1.0;
const SILKSCREEN_OFFSET = 0.15;

/**
 * Position of a lead, 1-based, counter-clockwise from the top of the left
 * row. `offsetX` applies to the left/right rows, `offsetY` to the bottom/top rows.
 */
export function quadPosition(pin: number, count: number, pitch: number, offsetX: number, offsetY = offsetX): QuadPosition {
  if (count % 4 !== 0) {
    throw new ConfigurationError(`Lead count ${count} is not divisible by 4`);
  }
  if (pin < 1 || pin > count) {
    throw new ConfigurationError(`Invalid pad number ${pin}, out of range`);
  }
  const group = count / 4;
  const mid = Math.floor((group + 1) / 2);
  const p = ((pin - 1) % group) + 1;
  const evenCount = group % 2 === 0;
  const dynamic = Number(((mid - p) * pitch + (evenCount ? pitch / 2 : 0)).toFixed(3));
  const side = Math.floor((pin - 1) / group);

  let x: number;
  let y: number;
  switch (side) {
    case 0:
      x = -offsetX;
      y = dynamic;
      break;
    case 1:
      x = -dynamic;
      y = -offsetY;
      break;
    case 2:
      x = offsetX;
      y = -dynamic;
      break;
    default:
      x = dynamic;
      y = offsetY;
  }
  return { x: x === 0 ? 0 : x, y: y === 0 ? 0 : y, horizontal: side === 0 || side === 2 };
}

export function quadFlatFootprint(part: QuadFlatPart, variant: DensityVariant): FootprintGeometry {
  const excess = excessForPitch(QFP_DENSITY, part.pitch, variant.level);
  const contact = QFP_LEAD_CONTACT_LENGTH;

  // Inner end of the lead contact area
  const contactX = part.leadSpanX / 2 - contact;
  const contactY = part.leadSpanY / 2 - contact;
  const first = quadPosition(1, part.leadCount, part.pitch, contactX, contactY);
  const last = quadPosition(part.leadCount, part.leadCount, part.pitch, contactX, contactY);

  const padWidth = part.leadWidth + excess.side * 2;
  const padLength = contact + excess.heel + excess.toe;
  const pads: PadGeometry[] = [];
  for (let pin = 1; pin <= part.leadCount; pin++) {
    const pos = quadPosition(
      pin,
      part.leadCount,
      part.pitch,
      part.leadSpanX / 2 - padLength / 2 + excess.toe,
      part.leadSpanY / 2 - padLength / 2 + excess.toe,
    );
    pads.push({
      pad: String(pin),
      x: pos.x,
      y: pos.y,
      width: pos.horizontal ? padLength : padWidth,
      height: pos.horizontal ? padWidth : padLength,
    });
  }

  const documentation: OutlineGeometry[] = [];
  const halfLead = part.leadWidth / 2;
  for (let pin = 1; pin <= part.leadCount; pin++) {
    const pos = quadPosition(pin, part.leadCount, part.pitch, contactX, contactY);
    let contactArea: Point[];
    let projection: Point[];
    if (pos.horizontal) {
      const s = Math.sign(pos.x);
      contactArea = closedBox(pos.x, pos.y - halfLead, pos.x + s * contact, pos.y + halfLead);
      projection = closedBox((s * part.bodySizeX) / 2, pos.y - halfLead, pos.x, pos.y + halfLead);
    } else {
      const s = Math.sign(pos.y);
      contactArea = closedBox(pos.x - halfLead, pos.y, pos.x + halfLead, pos.y + s * contact);
      projection = closedBox(pos.x - halfLead, (s * part.bodySizeY) / 2, pos.x + halfLead, pos.y);
    }
    documentation.push({
      feature: `lead-contact-${pin}`,
      layer: "top_documentation",
      width: 0,
      fill: true,
      grabArea: false,
      vertices: contactArea,
    });
    documentation.push({
      feature: `lead-proj-${pin}`,
      layer: "top_documentation",
      width: 0,
      fill: true,
      grabArea: false,
      vertices: projection,
    });
  }
  documentation.push({
    feature: "polygon-outline",
    layer: "top_documentation",
    width: LINE_WIDTH,
    fill: false,
    grabArea: false,
    vertices: closedRectangle(part.bodySizeX / 2 - LINE_WIDTH / 2, part.bodySizeY / 2 - LINE_WIDTH / 2),
  });

  // One silkscreen corner per quadrant, counter-clockwise from the top right
  const legend: OutlineGeometry[] = [];
  const xMin = Math.abs(last.x) + halfLead + excess.side + SILKSCREEN_OFFSET + LINE_WIDTH / 2;
  const xMax = part.bodySizeX / 2 + LINE_WIDTH / 2;
  const yMin = Math.abs(first.y) + halfLead + excess.side + SILKSCREEN_OFFSET + LINE_WIDTH / 2;
  const yMax = part.bodySizeY / 2 + LINE_WIDTH / 2;
  for (const quadrant of [1, 2, 3, 4]) {
    const corner: Point[] = [
      { x: xMin, y: yMax },
      { x: xMax, y: yMax },
      { x: xMax, y: yMin },
    ];
    if (quadrant === 2) {
      // Pin 1 marking
      corner.push({ x: part.leadSpanX / 2 + excess.toe - LINE_WIDTH / 2, y: yMin });
    }
    const sx = quadrant === 1 || quadrant === 4 ? 1 : -1;
    const sy = quadrant === 1 || quadrant === 2 ? 1 : -1;
    legend.push({
      feature: `polygon-silkscreen-${quadrant}`,
      layer: "top_legend",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices: corner.map((v) => ({ x: sx * v.x, y: sy * v.y })),
    });
  }

  return {
    pads,
    documentation,
    legend,
    circles: [],
    courtyard: steppedCourtyard(part, first, last, excess.toe, excess.side, excess.courtyard),
    courtyardExcess: excess.courtyard,
    labelY: part.leadSpanY / 2 + LABEL_OFFSET,
  };
}

/**
 * Courtyard that follows the lead rows and steps in at the body corners.
 * 20 vertices, starting at the top left, first vertex not repeated.
 */
function steppedCourtyard(
  part: QuadFlatPart,
  first: QuadPosition,
  last: QuadPosition,
  toe: number,
  side: number,
  excess: number,
): Point[] {
  const xMax = part.leadSpanX / 2 + toe;
  const xMid = part.bodySizeX / 2;
  const xMin = Math.abs(last.x) + part.leadWidth / 2 + side;
  const yMax = part.leadSpanY / 2 + toe;
  const yMid = part.bodySizeY / 2;
  const yMin = Math.abs(first.y) + part.leadWidth / 2 + side;
  const vertices: Point[] = [
    // Top
    { x: -xMin, y: yMax }, { x: xMin, y: yMax }, { x: xMin, y: yMid }, { x: xMid, y: yMid }, { x: xMid, y: yMin },
    // Right
    { x: xMax, y: yMin }, { x: xMax, y: -yMin }, { x: xMid, y: -yMin }, { x: xMid, y: -yMid }, { x: xMin, y: -yMid },
    // Bottom
    { x: xMin, y: -yMax }, { x: -xMin, y: -yMax }, { x: -xMin, y: -yMid }, { x: -xMid, y: -yMid }, { x: -xMid, y: -yMin },
    // Left
    { x: -xMax, y: -yMin }, { x: -xMax, y: yMin }, { x: -xMid, y: yMin }, { x: -xMid, y: yMid }, { x: -xMin, y: yMid },
  ];
  return pushOutward(vertices, excess);
}

export function quadFlatBodies(part: QuadFlatPart): SolidBox[] {
  const standoff = 0.1;
  const bodyHeight = part.heightNom - standoff;
  const boxes: SolidBox[] = [
    {
      name: "body",
      color: "#1a1a1a",
      center: { x: 0, y: 0, z: standoff + bodyHeight / 2 },
      size: { x: part.bodySizeX, y: part.bodySizeY, z: bodyHeight },
    },
  ];
  const leadX = (part.leadSpanX - part.bodySizeX) / 2;
  const leadY = (part.leadSpanY - part.bodySizeY) / 2;
  for (let pin = 1; pin <= part.leadCount; pin++) {
    const pos = quadPosition(
      pin,
      part.leadCount,
      part.pitch,
      part.bodySizeX / 2 + leadX / 2,
      part.bodySizeY / 2 + leadY / 2,
    );
    boxes.push({
      name: `lead-${pin}`,
      color: "#d4d4d4",
      center: { x: pos.x, y: pos.y, z: 0.075 },
      size: pos.horizontal
        ? { x: leadX, y: part.leadWidth, z: 0.15 }
        : { x: part.leadWidth, y: leadY, z: 0.15 },
    });
  }
  return boxes;
}

export function quadFlatPackage(part: QuadFlatPart): PackageGeometry {
  const pads: PadSpec[] = [];
  for (let pin = 1; pin <= part.leadCount; pin++) {
    pads.push({ id: String(pin), name: String(pin) });
  }
  return { pads, bodies: quadFlatBodies(part) };
}
