import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import { BuildContext, LibraryHeader, TemplateParams, fillTemplate, plainNumber } from "../builders/common";
import { ChipPackageConfig, buildChipPackage } from "../builders/packages";
import type { ChipLand, ChipPart } from "../geometry/chip";
import { DENSITY_LEVELS, DensityLevel } from "../geometry/density";
import { formatIpcDimension } from "../librepcb/format";
import { AlternativeNameSchema, GroupBaseSchema, alternativeNamesOf, entryLabel, loadTable } from "./table";
import type { Family } from "./types";

// ─── Schemas ─────────────────────────────────────────────────────────

const length = z.number().positive();

/** [pad length, pad width, pad gap] */
const LandSchema = z.tuple([length, length, length]);

const PadSpecSchema = z.object({ id: z.string().min(1), name: z.string().min(1) });

export const ChipGroupSchema = GroupBaseSchema.extend({
  name: z.string(),
  description: z.string(),
  keywords: z.string().default(""),
  hand_soldering: z.boolean().default(false),
  alternative_names: z.array(AlternativeNameSchema).default([]),
  polarization: z
    .object({ marked: PadSpecSchema, unmarked: PadSpecSchema })
    .refine((pads) => pads.marked.id !== pads.unmarked.id, {
      message: "Marked and unmarked pad need different ids",
      path: ["unmarked", "id"],
    })
    .optional(),
});

export const ChipEntrySchema = z.object({
  size_imperial: z.string().default(""),
  length,
  width: length,
  height: length,
  lead_length: length.optional(),
  lead_width: length.optional(),
  gap: length.optional(),
  lands: z.object({ A: LandSchema.optional(), B: LandSchema.optional(), C: LandSchema.optional() }).optional(),
  meta: z.record(z.string(), z.union([z.string(), z.number()])).default({}),
});

export type ChipGroup = z.output<typeof ChipGroupSchema>;
export type ChipEntry = z.output<typeof ChipEntrySchema>;

// ─── Config ──────────────────────────────────────────────────────────

/**
 * Metric size code: length and width in tenths of a millimeter, two
 * digits each at least (1.0 x 0.5 → "1005").
 */
export function chipSizeMetric(length: number, width: number): string {
  return formatIpcDimension(length, 1).padStart(2, "0") + formatIpcDimension(width, 1).padStart(2, "0");
}

function landsOf(entry: ChipEntry): Partial<Record<DensityLevel, ChipLand>> | undefined {
  if (entry.lands === undefined) {
    return undefined;
  }
  const lands: Partial<Record<DensityLevel, ChipLand>> = {};
  for (const level of DENSITY_LEVELS) {
    const land = entry.lands[level];
    if (land !== undefined) {
      const [padLength, padWidth, padGap] = land;
      lands[level] = { padLength, padWidth, padGap };
    }
  }
  return lands;
}

export function chipConfig(group: ChipGroup, entry: ChipEntry, header: LibraryHeader): ChipPackageConfig {
  const sizeMetric = chipSizeMetric(entry.length, entry.width);
  const params: TemplateParams = {
    ...entry.meta,
    size_metric: sizeMetric,
    size_imperial: entry.size_imperial,
    length: plainNumber(entry.length),
    width: plainNumber(entry.width),
    height: plainNumber(entry.height),
    length_ipc: formatIpcDimension(entry.length),
    width_ipc: formatIpcDimension(entry.width),
    height_ipc: formatIpcDimension(entry.height),
    lead_length_ipc: entry.lead_length !== undefined ? formatIpcDimension(entry.lead_length) : "",
    lead_width_ipc: entry.lead_width !== undefined ? formatIpcDimension(entry.lead_width) : "",
  };

  const part: ChipPart = {
    body: {
      length: entry.length,
      width: entry.width,
      height: entry.height,
      leadLength: entry.lead_length,
      leadWidth: entry.lead_width,
    },
    gap: entry.gap,
    lands: landsOf(entry),
    polarization: group.polarization,
  };

  const keywords = [sizeMetric, entry.size_imperial, fillTemplate(group.keywords, params).toLowerCase()]
    .filter((keyword) => keyword !== "")
    .join(",");

  return {
    name: fillTemplate(group.name, params),
    description: fillTemplate(group.description, params),
    keywords,
    header,
    alternativeNames: alternativeNamesOf(group.alternative_names, params),
    part,
    handSoldering: group.hand_soldering,
  };
}

// ─── Family ──────────────────────────────────────────────────────────

export const chipFamily: Family = {
  name: "chip",
  title: "two-terminal chip packages",
  file: "chip.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, ChipGroupSchema).flatMap(({ index, header, group }) => {
      const prefix = group.name.split("{")[0] || `group ${index}`;
      return group.parts.map((raw, i) => ({
        entry: `${prefix} ${entryLabel(raw, ["size_imperial"], `#${i + 1}`)}`,
        build: () => [buildChipPackage(chipConfig(group, ChipEntrySchema.parse(raw), header), ctx)],
      }));
    });
  },
};
