import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import type { BuildContext, LibraryHeader } from "../builders/common";
import { DfnPackageConfig, buildDfnPackage } from "../builders/packages";
import { ConfigurationError } from "../errors";
import type { DfnPart } from "../geometry/dfn";
import { formatIpcDimension } from "../librepcb/format";
import { GroupBaseSchema, entryLabel, loadTable } from "./table";
import type { Family } from "./types";

const length = z.number().positive();

export const DfnGroupSchema = GroupBaseSchema.extend({
  standard: z.string(),
  keywords: z.string().default(""),
  /** How far the lands reach past the body edge */
  toe_heel: z.number().nonnegative().default(0.3),
});

export const DfnEntrySchema = z.object({
  variation: z.string().min(1),
  /** D, along the pin rows */
  length,
  /** E, across the pin rows */
  width: length,
  pitch: length,
  pins: z
    .number()
    .int()
    .positive()
    .refine((count) => count % 2 === 0, "Pin count must be even"),
  /** Nominal height */
  height: length,
  lead_length: length,
  /** b max; looked up by pitch when missing */
  lead_width: length.optional(),
  /** [E2, D2] of the exposed pad */
  exposed: z.tuple([length, length]).optional(),
  /** Also generate the package without exposed pad */
  plain: z.boolean().default(true),
  /** Add the lead length to the name, for packages that only differ in it */
  print_pad: z.boolean().default(false),
});

export type DfnGroup = z.output<typeof DfnGroupSchema>;
export type DfnEntry = z.output<typeof DfnEntrySchema>;

/** Maximum lead width b by pitch, JEDEC MO-229 table 4 */
const LEAD_WIDTH: Record<string, number> = {
  "0.95": 0.45,
  "0.80": 0.35,
  "0.65": 0.35,
  "0.50": 0.3,
  "0.40": 0.25,
};

function leadWidthOf(entry: DfnEntry): number {
  if (entry.lead_width !== undefined) {
    return entry.lead_width;
  }
  const width = LEAD_WIDTH[entry.pitch.toFixed(2)];
  if (width === undefined) {
    throw new ConfigurationError(`Unhandled pitch: ${entry.pitch}`);
  }
  return width;
}

/** Package config of one entry, with or without its exposed pad. */
export function dfnConfig(group: DfnGroup, entry: DfnEntry, withExposed: boolean, header: LibraryHeader): DfnPackageConfig {
  const fd = formatIpcDimension;
  const exposed = withExposed ? entry.exposed : undefined;
  if (withExposed && exposed === undefined) {
    throw new ConfigurationError(`No exposed pad given for ${entry.variation}`);
  }

  let name = `DFN${fd(entry.pitch)}P${fd(entry.length)}X${fd(entry.width)}X${fd(entry.height)}-${entry.pins}`;
  if (entry.print_pad) {
    name += `P${fd(entry.lead_length)}`;
  }
  let description =
    `${entry.pins}-pin Dual Flat No-Lead package (DFN), standardized by JEDEC ${group.standard}.\n\n` +
    `Pitch: ${entry.pitch.toFixed(2)} mm\n` +
    `Nominal width: ${entry.width.toFixed(2)} mm\n` +
    `Nominal length: ${entry.length.toFixed(2)} mm\n` +
    `Height: ${entry.height.toFixed(2)}mm`;
  if (exposed !== undefined) {
    const [exposedWidth, exposedLength] = exposed;
    name += exposedWidth === exposedLength ? `T${fd(exposedWidth)}` : `T${fd(exposedWidth)}X${fd(exposedLength)}`;
    description += `\nExposed Pad: ${exposedWidth.toFixed(2)} x ${exposedLength.toFixed(2)} mm`;
  }
  if (entry.print_pad) {
    description += `\nPad length: ${entry.lead_length.toFixed(2)} mm`;
  }

  const part: DfnPart = {
    pinCount: entry.pins,
    pitch: entry.pitch,
    bodyLength: entry.length,
    bodyWidth: entry.width,
    height: entry.height,
    leadLength: entry.lead_length,
    leadWidth: leadWidthOf(entry),
    toeHeel: group.toe_heel,
    exposed: exposed !== undefined ? { width: exposed[0], length: exposed[1] } : undefined,
  };

  return {
    name,
    description,
    keywords: [`dfn${entry.pins}`, group.keywords].filter((keyword) => keyword !== "").join(",").toLowerCase(),
    header,
    part,
  };
}

export const dfnFamily: Family = {
  name: "dfn",
  title: "dual flat no-lead packages",
  file: "dfn.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, DfnGroupSchema).flatMap(({ header, group }) =>
      group.parts.map((raw, i) => ({
        entry: `${group.standard} ${entryLabel(raw, ["variation"], `#${i + 1}`)}`,
        build: () => {
          const entry = DfnEntrySchema.parse(raw);
          const settings = entry.exposed === undefined ? [false] : entry.plain ? [true, false] : [true];
          return settings.map((withExposed) => buildDfnPackage(dfnConfig(group, entry, withExposed, header), ctx));
        },
      })),
    );
  },
};
