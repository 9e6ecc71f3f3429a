import type { Point } from "../librepcb/shapes";
import { ConfigurationError, GeometryError } from "../errors";
import { expand, featureBounds, rectangleCourtyard } from "./bounds";
import {
  DENSITY_LEVELS,
  DENSITY_VARIANTS,
  DensityLevel,
  DensityVariant,
  HAND_SOLDERING_TOE_EXTENSION,
  chipExcess,
} from "./density";
import type { FootprintGeometry, OutlineGeometry, PackageGeometry, PadGeometry, PadSpec, SolidBox } from "./types";

// ─── Types ───────────────────────────────────────────────────────────

export interface ChipBody {
  length: number;
  width: number;
  height: number;
  /** Only known for molded bodies whose leads do not span the full width */
  leadLength?: number;
  leadWidth?: number;
}

/** Land dimensions taken from a datasheet instead of the density tables. */
export interface ChipLand {
  padLength: number;
  padWidth: number;
  padGap: number;
}

export interface ChipPolarization {
  marked: PadSpec;
  unmarked: PadSpec;
}

/**
 * A two-terminal chip. Exactly one of `gap` (land gap, pads derived from
 * the density tables) or `lands` (explicit per-level land dimensions) is set.
 */
export interface ChipPart {
  body: ChipBody;
  gap?: number;
  lands?: Partial<Record<DensityLevel, ChipLand>>;
  polarization?: ChipPolarization;
}

export interface ChipVariant extends DensityVariant {
  handSoldering: boolean;
}

/** Resolved land of one footprint variant. */
export interface ChipLandLayout {
  padLength: number;
  padWidth: number;
  padGap: number;
  /** Distance of each pad center from the origin */
  padDx: number;
  courtyardExcess: number;
}

// ─── Constants ───────────────────────────────────────────────────────

const LINE_WIDTH = 0.25;
const LINE_WIDTH_THIN = 0.15;
const LINE_WIDTH_THINNER = 0.05;
const LABEL_OFFSET = 1.1;
const LABEL_OFFSET_THIN = 0.8;
const SILKSCREEN_CLEARANCE = 0.15;

export const HAND_SOLDERING_VARIANT: ChipVariant = {
  key: "handsoldering",
  name: "Hand Soldering",
  level: "B",
  handSoldering: true,
};

// ─── Layout ──────────────────────────────────────────────────────────

export function validateChipPart(part: ChipPart): void {
  const hasLands = part.lands !== undefined && Object.keys(part.lands).length > 0;
  if (part.gap !== undefined && hasLands) {
    throw new ConfigurationError("Only set either lands or gap, but not both");
  }
  if (part.gap === undefined && !hasLands) {
    throw new ConfigurationError("Set lands or gap");
  }
  const { length } = part.body;
  if (part.gap !== undefined && part.gap >= length) {
    throw new ConfigurationError(`Gap ${part.gap} mm must be smaller than the body length ${length} mm`);
  }
  for (const level of DENSITY_LEVELS) {
    const land = part.lands?.[level];
    if (land !== undefined && land.padGap >= length) {
      throw new ConfigurationError(
        `Pad gap ${land.padGap} mm of density level ${level} must be smaller than the body length ${length} mm`,
      );
    }
  }
  if (part.polarization && part.polarization.marked.id === part.polarization.unmarked.id) {
    throw new ConfigurationError(`Marked and unmarked pad share the id "${part.polarization.marked.id}"`);
  }
}

/** Gap between the leads of the body, when the lead length is known. */
export function bodyGap(body: ChipBody): number | undefined {
  return body.leadLength !== undefined ? body.length - 2 * body.leadLength : undefined;
}

export function chipPads(part: ChipPart): PadSpec[] {
  if (part.polarization) {
    return [part.polarization.marked, part.polarization.unmarked];
  }
  return [
    { id: "1", name: "1" },
    { id: "2", name: "2" },
  ];
}

/**
 * Footprint variants in output order: B then A for gap based parts,
 * B, A, C (as far as given) for explicit lands, then hand soldering.
 */
export function chipVariants(part: ChipPart, handSoldering = false): ChipVariant[] {
  validateChipPart(part);
  const levels: DensityLevel[] = part.gap !== undefined ? ["B", "A"] : ["B", "A", "C"];
  const variants: ChipVariant[] = levels
    .filter((level) => part.gap !== undefined || part.lands?.[level] !== undefined)
    .map((level) => ({ ...DENSITY_VARIANTS[level], handSoldering: false }));
  if (handSoldering) {
    variants.push(HAND_SOLDERING_VARIANT);
  }
  return variants;
}

/** Pad dimensions of one variant. Throws when a pad would come out empty. */
export function chipLand(part: ChipPart, variant: ChipVariant): ChipLandLayout {
  const layout = resolveChipLand(part, variant);
  if (layout.padLength <= 0 || layout.padWidth <= 0) {
    throw new GeometryError(
      `Pad size ${layout.padLength.toFixed(3)} x ${layout.padWidth.toFixed(3)} mm of variant ${variant.key} is not positive`,
    );
  }
  return layout;
}

function resolveChipLand(part: ChipPart, variant: ChipVariant): ChipLandLayout {
  const { body } = part;
  const excess = chipExcess(body.length, variant.level);
  const toeExtension = variant.handSoldering ? HAND_SOLDERING_TOE_EXTENSION : 0;

  if (part.gap !== undefined) {
    const padLength = (body.length - part.gap) / 2 + excess.toe + toeExtension;
    return {
      padLength,
      padWidth: body.width + excess.side,
      padGap: part.gap,
      padDx: part.gap / 2 + padLength / 2,
      courtyardExcess: excess.courtyard,
    };
  }

  const land = part.lands?.[variant.level];
  if (land === undefined) {
    throw new ConfigurationError(`No land dimensions for density level ${variant.level}`);
  }
  const padLength = land.padLength + toeExtension;
  return {
    padLength,
    padWidth: land.padWidth,
    padGap: land.padGap,
    padDx: land.padGap / 2 + padLength / 2,
    courtyardExcess: excess.courtyard,
  };
}

/** Silkscreen and documentation line widths scale with the body length. */
export function chipLineWidths(length: number): { silk: number; doc: number } {
  if (length >= 2.0) {
    return { silk: LINE_WIDTH, doc: LINE_WIDTH };
  }
  if (length >= 1.0) {
    return { silk: LINE_WIDTH_THIN, doc: LINE_WIDTH_THIN };
  }
  return { silk: LINE_WIDTH_THIN, doc: LINE_WIDTH_THINNER };
}

function filled(feature: string, vertices: Point[], grabArea = false): OutlineGeometry {
  return { feature, layer: "top_documentation", width: 0, fill: true, grabArea, vertices };
}

function line(feature: string, layer: "top_documentation" | "top_legend", width: number, vertices: Point[]): OutlineGeometry {
  return { feature, layer, width, fill: false, grabArea: false, vertices };
}

/** Lead shape between the body end and the lead gap, on the left (-1) or right (1). */
function leadShape(feature: string, side: 1 | -1, dx: number, halfGap: number, dy: number): OutlineGeometry {
  return filled(feature, [
    { x: side * dx, y: dy },
    { x: side * halfGap, y: dy },
    { x: side * halfGap, y: -dy },
    { x: side * dx, y: -dy },
    { x: side * dx, y: dy },
  ]);
}

function chipDocumentation(part: ChipPart, land: ChipLandLayout, docWidth: number): OutlineGeometry[] {
  const { body } = part;
  const halfGap = (bodyGap(body) ?? land.padGap) / 2;
  const shapes: OutlineGeometry[] = [];

  if (part.gap !== undefined) {
    // Leads span the whole body width
    const dx = body.length / 2;
    const dy = body.width / 2;
    shapes.push(leadShape("polygon-outline-left", -1, dx, halfGap, dy));
    shapes.push(leadShape("polygon-outline-right", 1, dx, halfGap, dy));
    const lineY = body.width / 2 - docWidth / 2;
    shapes.push(line("polygon-outline-top", "top_documentation", docWidth, [
      { x: -halfGap, y: lineY },
      { x: halfGap, y: lineY },
    ]));
    shapes.push(line("polygon-outline-bot", "top_documentation", docWidth, [
      { x: -halfGap, y: -lineY },
      { x: halfGap, y: -lineY },
    ]));
  } else {
    const ox = body.length / 2 - docWidth / 2;
    const oy = body.width / 2 - docWidth / 2;
    shapes.push(line("polygon-outline-around", "top_documentation", docWidth, [
      { x: -ox, y: oy },
      { x: ox, y: oy },
      { x: ox, y: -oy },
      { x: -ox, y: -oy },
      { x: -ox, y: oy },
    ]));
    const dx = body.length / 2;
    const dy = (body.leadWidth ?? land.padWidth) / 2;
    shapes.push(leadShape("polygon-outline-left", -1, dx, halfGap, dy));
    shapes.push(leadShape("polygon-outline-right", 1, dx, halfGap, dy));
  }

  if (part.polarization) {
    const markWidth = body.width / 8;
    const outer = halfGap - markWidth / 2;
    const inner = halfGap - markWidth * 1.5;
    const dy = body.width / 2 - docWidth;
    shapes.push(
      filled(
        "polygon-polarization-mark",
        [
          { x: -outer, y: dy },
          { x: -inner, y: dy },
          { x: -inner, y: -dy },
          { x: -outer, y: -dy },
          { x: -outer, y: dy },
        ],
        true,
      ),
    );
  }
  return shapes;
}

function chipLegend(part: ChipPart, land: ChipLandLayout, silkWidth: number): OutlineGeometry[] {
  const { body } = part;
  if (body.length <= 1.0) {
    return [];
  }
  if (part.polarization) {
    const dxUnmarked = land.padDx + land.padLength / 2;
    const dxMarked = dxUnmarked + silkWidth / 2 + SILKSCREEN_CLEARANCE;
    const dy = Math.max(
      body.width / 2 + silkWidth / 2,
      land.padWidth / 2 + silkWidth / 2 + SILKSCREEN_CLEARANCE,
    );
    return [
      line("line-silkscreen-top", "top_legend", silkWidth, [
        { x: dxUnmarked, y: dy },
        { x: -dxMarked, y: dy },
        { x: -dxMarked, y: -dy },
        { x: dxUnmarked, y: -dy },
      ]),
    ];
  }
  const dx = land.padGap / 2 - silkWidth / 2 - SILKSCREEN_CLEARANCE;
  if (dx <= 0) {
    return [];
  }
  const dy = body.width / 2 + silkWidth / 2;
  return [
    line("line-silkscreen-top", "top_legend", silkWidth, [
      { x: -dx, y: dy },
      { x: dx, y: dy },
    ]),
    line("line-silkscreen-bot", "top_legend", silkWidth, [
      { x: -dx, y: -dy },
      { x: dx, y: -dy },
    ]),
  ];
}

export function chipFootprint(part: ChipPart, variant: ChipVariant): FootprintGeometry {
  const land = chipLand(part, variant);
  const widths = chipLineWidths(part.body.length);
  const [first, second] = chipPads(part);

  // The first (marked) pad sits on the left
  const pads: PadGeometry[] = [
    { pad: first.id, x: -land.padDx, y: 0, width: land.padLength, height: land.padWidth },
    { pad: second.id, x: land.padDx, y: 0, width: land.padLength, height: land.padWidth },
  ];
  const documentation = chipDocumentation(part, land, widths.doc);
  const courtyard = rectangleCourtyard(expand(featureBounds(pads, documentation), land.courtyardExcess));
  const labelOffset = part.body.width < 2.0 ? LABEL_OFFSET_THIN : LABEL_OFFSET;

  return {
    pads,
    documentation,
    legend: chipLegend(part, land, widths.silk),
    circles: [],
    courtyard,
    courtyardExcess: land.courtyardExcess,
    labelY: part.body.width / 2 + labelOffset,
  };
}

export function chipBodies(part: ChipPart): SolidBox[] {
  const { body } = part;
  const leadLength = body.leadLength ?? (part.gap !== undefined ? (body.length - part.gap) / 2 : 0);
  const boxes: SolidBox[] = [
    {
      name: "body",
      color: part.polarization ? "#c89b26" : "#1a1a1a",
      center: { x: 0, y: 0, z: body.height / 2 },
      size: { x: body.length - 2 * leadLength, y: body.width, z: body.height },
    },
  ];
  if (leadLength > 0) {
    const leadWidth = body.leadWidth ?? body.width;
    for (const [index, side] of [-1, 1].entries()) {
      boxes.push({
        name: `lead-${index + 1}`,
        color: "#d4d4d4",
        center: { x: side * (body.length / 2 - leadLength / 2), y: 0, z: body.height / 2 },
        size: { x: leadLength, y: leadWidth, z: body.height },
      });
    }
  }
  return boxes;
}

export function chipPackage(part: ChipPart): PackageGeometry {
  return { pads: chipPads(part), bodies: chipBodies(part) };
}
