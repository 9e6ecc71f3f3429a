import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import { BuildContext, LibraryHeader, TemplateParams } from "../builders/common";
import { DipPackageConfig, buildDipPackage } from "../builders/packages";
import { DIP_LEAD_WIDTH, DIP_PITCH } from "../geometry/dip";
import { formatIpcDimension } from "../librepcb/format";
import { AlternativeNameSchema, GroupBaseSchema, alternativeNamesOf, entryLabel, loadTable } from "./table";
import type { Family } from "./types";

const length = z.number().positive();

/** One group per lead span; parts list the pin counts and body lengths. */
export const DipGroupSchema = GroupBaseSchema.extend({
  lead_span: length,
  height: length,
  keywords: z.string().default(""),
  alternative_names: z.array(AlternativeNameSchema).default([]),
});

export const DipEntrySchema = z.object({
  pin_count: z
    .number()
    .int()
    .positive()
    .refine((count) => count % 2 === 0, "Pin count must be even"),
  body_length: length,
  /** Standard the body follows, e.g. "JEDEC MS001 AA" */
  standard: z.string().optional(),
});

export type DipGroup = z.output<typeof DipGroupSchema>;
export type DipEntry = z.output<typeof DipEntrySchema>;

/**
 * IPC-7251 name: lead span, lead width, pitch, body length, height and
 * pin count, e.g. DIP762W55P254L1905H533Q14.
 */
export function dipName(leadSpan: number, bodyLength: number, height: number, pinCount: number): string {
  const fd = formatIpcDimension;
  return `DIP${fd(leadSpan)}W${fd(DIP_LEAD_WIDTH)}P${fd(DIP_PITCH)}L${fd(bodyLength)}H${fd(height)}Q${pinCount}`;
}

export function dipConfig(group: DipGroup, entry: DipEntry, header: LibraryHeader): DipPackageConfig {
  const params: TemplateParams = { pin_count: entry.pin_count };
  const standard = entry.standard !== undefined ? ` (${entry.standard})` : "";
  return {
    name: dipName(group.lead_span, entry.body_length, group.height, entry.pin_count),
    description:
      `${entry.pin_count}-lead DIP (Dual In-Line) package${standard}\n\n` +
      `Pitch: ${DIP_PITCH.toFixed(2)}mm\n` +
      `Lead span: ${group.lead_span.toFixed(2)}mm\n` +
      `Body length: ${entry.body_length.toFixed(2)}mm\n` +
      `Lead width: ${DIP_LEAD_WIDTH.toFixed(2)}mm\n` +
      `Max height: ${group.height.toFixed(2)}mm`,
    keywords: [`dip${entry.pin_count}`, `pdip${entry.pin_count}`, group.keywords]
      .filter((keyword) => keyword !== "")
      .join(",")
      .toLowerCase(),
    header,
    alternativeNames: alternativeNamesOf(group.alternative_names, params),
    part: {
      pinCount: entry.pin_count,
      bodyLength: entry.body_length,
      leadSpan: group.lead_span,
      height: group.height,
    },
  };
}

export const dipFamily: Family = {
  name: "dip",
  title: "dual in-line packages",
  file: "dip.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, DipGroupSchema).flatMap(({ index, header, group }) =>
      group.parts.map((raw, i) => ({
        entry: `group ${index} (${entryLabel(raw, ["pin_count"], `#${i + 1}`)} pins)`,
        build: () => [buildDipPackage(dipConfig(group, DipEntrySchema.parse(raw), header), ctx)],
      })),
    );
  },
};
