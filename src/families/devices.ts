import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import { BuildContext, LibraryHeader, TemplateParams, fillTemplate } from "../builders/common";
import { DeviceConfig, buildDevice } from "../builders/device";
import { GroupBaseSchema, entryLabel, loadTable } from "./table";
import type { Family } from "./types";

const PadSchema = z.object({
  pad: z.string().min(1),
  signal: z.string().min(1).nullable(),
});

const ManufacturerPartSchema = z.object({
  mpn: z.string().min(1),
  manufacturer: z.string().min(1),
});

export const DeviceGroupSchema = GroupBaseSchema.extend({
  name: z.string(),
  description: z.string().default(""),
  keywords: z.string().default(""),
  /** Component name, as generated from components.yml */
  component: z.string().min(1),
  pads: z.array(PadSchema).min(1),
});

/** Every extra scalar field of an entry is a template parameter. */
export const DeviceEntrySchema = z
  .object({
    package: z.string().min(1),
    manufacturer_parts: z.array(ManufacturerPartSchema).default([]),
  })
  .catchall(z.union([z.string(), z.number()]));

export type DeviceGroup = z.output<typeof DeviceGroupSchema>;
export type DeviceEntry = z.output<typeof DeviceEntrySchema>;

export function deviceConfig(group: DeviceGroup, entry: DeviceEntry, header: LibraryHeader): DeviceConfig {
  const templateParams: TemplateParams = {};
  for (const [key, value] of Object.entries(entry)) {
    if (key !== "package" && (typeof value === "string" || typeof value === "number")) {
      templateParams[key] = value;
    }
  }
  return {
    name: fillTemplate(group.name, templateParams),
    description: fillTemplate(group.description, templateParams),
    keywords: fillTemplate(group.keywords, templateParams).toLowerCase(),
    header,
    component: group.component,
    package: entry.package,
    pads: group.pads,
    parts: entry.manufacturer_parts,
  };
}

export const deviceFamily: Family = {
  name: "devices",
  title: "devices",
  file: "devices.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, DeviceGroupSchema).flatMap(({ header, group }) =>
      group.parts.map((raw, i) => ({
        entry: `${group.component} ${entryLabel(raw, ["package"], `#${i + 1}`)}`,
        build: () => [buildDevice(deviceConfig(group, DeviceEntrySchema.parse(raw), header), ctx)],
      })),
    );
  },
};
