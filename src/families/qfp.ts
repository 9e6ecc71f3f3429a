import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import { BuildContext, LibraryHeader, plainNumber } from "../builders/common";
import { QuadFlatPackageConfig, buildQuadFlatPackage } from "../builders/packages";
import { formatIpcDimension } from "../librepcb/format";
import { GroupBaseSchema, loadTable } from "./table";
import type { Family } from "./types";

const length = z.number().positive();

const ProfileSchema = z.object({
  title: z.string(),
  height_nom: length,
  height_max: length,
});

export const QuadFlatGroupSchema = GroupBaseSchema.extend({
  standard: z.string(),
  name_prefix: z.string().default(""),
  keywords: z.string().default(""),
  profiles: z.record(z.string().length(1), ProfileSchema),
});

export const QuadFlatEntrySchema = z.object({
  body: length,
  pitch: length,
  lead_count: z.number().int().positive(),
  lead_span: length,
  lead_width: length,
  /** Profile key → JEDEC variation code */
  variations: z.record(z.string(), z.string()),
});

export type QuadFlatGroup = z.output<typeof QuadFlatGroupSchema>;
export type QuadFlatEntry = z.output<typeof QuadFlatEntrySchema>;

/** One package per profile the row has a variation for, in profile order. */
export function quadFlatConfigs(group: QuadFlatGroup, entry: QuadFlatEntry, header: LibraryHeader): QuadFlatPackageConfig[] {
  const configs: QuadFlatPackageConfig[] = [];
  for (const [key, profile] of Object.entries(group.profiles)) {
    const variation = entry.variations[key];
    if (variation === undefined) {
      continue;
    }
    const fd = formatIpcDimension;
    const name =
      `${group.name_prefix}${key}QFP${fd(entry.pitch)}P${fd(entry.lead_span)}X${fd(entry.lead_span)}` +
      `X${fd(profile.height_nom)}-${entry.lead_count}`;
    const description =
      `${entry.lead_count}-pin ${profile.title}, standardized by JEDEC in ${group.standard}.\n\n` +
      `Pitch: ${plainNumber(entry.pitch)} mm\n` +
      `Body size: ${plainNumber(entry.body)}x${plainNumber(entry.body)} mm\n` +
      `Lead span: ${plainNumber(entry.lead_span)}x${plainNumber(entry.lead_span)} mm\n` +
      `Nominal height: ${plainNumber(profile.height_nom)} mm\n` +
      `Max height: ${plainNumber(profile.height_max)} mm`;
    const keywords = [group.keywords, `${key}qfp`, variation]
      .filter((keyword) => keyword !== "")
      .join(",")
      .toLowerCase();

    configs.push({
      name,
      description,
      keywords,
      header,
      part: {
        bodySizeX: entry.body,
        bodySizeY: entry.body,
        pitch: entry.pitch,
        leadCount: entry.lead_count,
        leadSpanX: entry.lead_span,
        leadSpanY: entry.lead_span,
        leadWidth: entry.lead_width,
        heightNom: profile.height_nom,
        heightMax: profile.height_max,
      },
    });
  }
  return configs;
}

export const quadFlatFamily: Family = {
  name: "qfp",
  title: "quad flat packages",
  file: "qfp.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, QuadFlatGroupSchema).flatMap(({ header, group }) =>
      group.parts.map((raw, i) => ({
        entry: `${group.standard} row ${i + 1}`,
        build: () =>
          quadFlatConfigs(group, QuadFlatEntrySchema.parse(raw), header).map((config) =>
            buildQuadFlatPackage(config, ctx),
          ),
      })),
    );
  },
};
