import { roundTo } from "../librepcb/format";
import { closedBox, closedRectangle, expand, featureBounds, rectangleCourtyard } from "./bounds";
import { DensityVariant, soExcess } from "./density";
import type { FootprintGeometry, OutlineGeometry, PackageGeometry, PadGeometry, PadSpec, SolidBox } from "./types";

/** Dual-row gull-wing small outline package. */
export interface SmallOutlinePart {
  pinCount: number;
  pitch: number;
  bodyLength: number;
  bodyWidth: number;
  /** Lead tip to lead tip */
  totalWidth: number;
  height: number;
  leadWidth: number;
  leadContactLength: number;
}

const LINE_WIDTH = 0.25;
const LABEL_OFFSET = 1.27;

/**
 * Y coordinate of a pin within one row. Pin 1 is at the top, the middle
 * of the row sits at (or near) 0. Rounded to 0.01 mm.
 */
export function rowY(pin: number, rowCount: number, pitch: number): number {
  const mid = (rowCount + 1) / 2;
  const y = -roundTo(pin * pitch - mid * pitch, 2);
  return y === 0 ? 0 : y;
}

/** Pin position: the left row runs top to bottom, the right row back up. */
export function pinPosition(
  pin: number,
  part: Pick<SmallOutlinePart, "pinCount" | "pitch">,
  xOffset: number,
): { x: number; y: number } {
  const perRow = Math.floor(part.pinCount / 2);
  if (pin <= perRow) {
    return { x: -xOffset, y: rowY(pin, perRow, part.pitch) };
  }
  const y = -rowY(pin - perRow, perRow, part.pitch);
  return { x: xOffset, y: y === 0 ? 0 : y };
}

export function smallOutlineFootprint(part: SmallOutlinePart, variant: DensityVariant): FootprintGeometry {
  const excess = soExcess(part.pitch, variant.level);

  const padWidth = part.leadWidth + excess.side;
  const padLength = part.leadContactLength + excess.heel + excess.toe;
  const padX = part.totalWidth / 2 - part.leadContactLength / 2 - excess.heel / 2 + excess.toe / 2;

  const pads: PadGeometry[] = [];
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, part, padX);
    pads.push({ pad: String(pin), x, y, width: padLength, height: padWidth });
  }

  const documentation: OutlineGeometry[] = [];
  const contactInner = part.totalWidth / 2 - part.leadContactLength;
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, part, contactInner);
    const side = x < 0 ? -1 : 1;
    const top = y - part.leadWidth / 2;
    const bottom = y + part.leadWidth / 2;
    documentation.push({
      feature: `lead-contact-${pin}`,
      layer: "top_documentation",
      width: 0,
      fill: true,
      grabArea: false,
      vertices: closedBox(side * contactInner, top, side * part.totalWidth / 2, bottom),
    });
    documentation.push({
      feature: `lead-proj-${pin}`,
      layer: "top_documentation",
      width: 0,
      fill: true,
      grabArea: false,
      vertices: closedBox(side * part.bodyWidth / 2, top, side * contactInner, bottom),
    });
  }
  documentation.push({
    feature: "polygon-outline",
    layer: "top_documentation",
    width: LINE_WIDTH,
    fill: false,
    grabArea: true,
    vertices: closedRectangle(part.bodyWidth / 2 - LINE_WIDTH / 2, part.bodyLength / 2 - LINE_WIDTH / 2),
  });

  // Silkscreen outside the body; the longer top line marks pin 1
  const silkY = part.bodyLength / 2 + LINE_WIDTH / 2;
  const shortX = part.bodyWidth / 2 - LINE_WIDTH / 2;
  const longX = part.totalWidth / 2 - LINE_WIDTH / 2 + excess.toe;
  const legend: OutlineGeometry[] = [
    {
      feature: "polygon-silkscreen",
      layer: "top_legend",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices: [
        { x: -longX, y: silkY },
        { x: shortX, y: silkY },
      ],
    },
    {
      feature: "polygon-silkscreen2",
      layer: "top_legend",
      width: LINE_WIDTH,
      fill: false,
      grabArea: false,
      vertices: [
        { x: -shortX, y: -silkY },
        { x: shortX, y: -silkY },
      ],
    },
  ];

  return {
    pads,
    documentation,
    legend,
    circles: [],
    courtyard: rectangleCourtyard(expand(featureBounds(pads, documentation), excess.courtyard)),
    courtyardExcess: excess.courtyard,
    labelY: part.bodyLength / 2 + LABEL_OFFSET,
  };
}

export function smallOutlineBodies(part: SmallOutlinePart): SolidBox[] {
  const standoff = 0.1;
  const boxes: SolidBox[] = [
    {
      name: "body",
      color: "#1a1a1a",
      center: { x: 0, y: 0, z: standoff + (part.height - standoff) / 2 },
      size: { x: part.bodyWidth, y: part.bodyLength, z: part.height - standoff },
    },
  ];
  const leadSpan = part.totalWidth / 2 - part.bodyWidth / 2;
  const leadX = part.bodyWidth / 2 + leadSpan / 2;
  for (let pin = 1; pin <= part.pinCount; pin++) {
    const { x, y } = pinPosition(pin, part, leadX);
    boxes.push({
      name: `lead-${pin}`,
      color: "#d4d4d4",
      center: { x, y, z: 0.1 },
      size: { x: leadSpan, y: part.leadWidth, z: 0.2 },
    });
  }
  return boxes;
}

export function smallOutlinePackage(part: SmallOutlinePart): PackageGeometry {
  const pads: PadSpec[] = [];
  for (let pin = 1; pin <= part.pinCount; pin++) {
    pads.push({ id: String(pin), name: String(pin) });
  }
  return { pads, bodies: smallOutlineBodies(part) };
}
