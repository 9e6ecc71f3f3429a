import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import { BuildContext, LibraryHeader, TemplateParams, fillTemplate } from "../builders/common";
import { SmallOutlinePackageConfig, buildSmallOutlinePackage } from "../builders/packages";
import { ConfigurationError } from "../errors";
import { formatIpcDimension } from "../librepcb/format";
import { AlternativeNameSchema, GroupBaseSchema, alternativeNamesOf, loadTable } from "./table";
import type { Family } from "./types";

const length = z.number().positive();

/** One group is a matrix of pin counts and heights sharing a body profile. */
export const SmallOutlineGroupSchema = GroupBaseSchema.extend({
  name: z.string(),
  description: z.string(),
  keywords: z.string().default(""),
  alternative_names: z.array(AlternativeNameSchema).default([]),
  pitch: length,
  pin_counts: z
    .array(
      z
        .number()
        .int()
        .positive()
        .refine((count) => count % 2 === 0, "Pin count must be even"),
    )
    .min(1),
  heights: z.array(length).min(1),
  body_length_offset: z.number(),
  body_width: length,
  total_width: length,
  lead_width: length,
  lead_contact_length: length,
});

export type SmallOutlineGroup = z.output<typeof SmallOutlineGroupSchema>;

export function smallOutlineConfig(
  group: SmallOutlineGroup,
  pinCount: number,
  height: number,
  header: LibraryHeader,
): SmallOutlinePackageConfig {
  if (pinCount % 2 !== 0) {
    throw new ConfigurationError(`Pin count ${pinCount} is odd, both rows need the same number of pins`);
  }
  const params: TemplateParams = {
    pin_count: pinCount,
    pitch: group.pitch,
    height,
    pitch_ipc: formatIpcDimension(group.pitch),
    height_ipc: formatIpcDimension(height),
  };
  return {
    name: fillTemplate(group.name, params),
    description: fillTemplate(group.description, params),
    keywords: [`soic${pinCount}`, `so${pinCount}`, fillTemplate(group.keywords, params)]
      .filter((keyword) => keyword !== "")
      .join(",")
      .toLowerCase(),
    header,
    alternativeNames: alternativeNamesOf(group.alternative_names, params),
    part: {
      pinCount,
      pitch: group.pitch,
      bodyLength: (pinCount / 2 - 1) * group.pitch + group.body_length_offset,
      bodyWidth: group.body_width,
      totalWidth: group.total_width,
      height,
      leadWidth: group.lead_width,
      leadContactLength: group.lead_contact_length,
    },
  };
}

export const smallOutlineFamily: Family = {
  name: "so",
  title: "small outline packages",
  file: "so.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    const items: BatchItem[] = [];
    for (const { index, header, group } of loadTable(filePath, SmallOutlineGroupSchema)) {
      for (const pinCount of group.pin_counts) {
        for (const height of group.heights) {
          items.push({
            entry: `group ${index} (${pinCount} pins, ${height} mm)`,
            build: () => [buildSmallOutlinePackage(smallOutlineConfig(group, pinCount, height, header), ctx)],
          });
        }
      }
    }
    return items;
  },
};
