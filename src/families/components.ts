import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import type { BuildContext, LibraryHeader } from "../builders/common";
import { ComponentConfig, buildComponent } from "../builders/component";
import { GroupBaseSchema, entryLabel, loadTable } from "./table";
import type { Family } from "./types";

const SignalSchema = z.object({
  name: z.string().min(1),
  /** Pin name on the symbol */
  pin: z.string().min(1),
  role: z.enum(["passive", "power", "input", "output", "inout", "opendrain"]).optional(),
  required: z.boolean().optional(),
});

export const ComponentEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  keywords: z.string().default(""),
  prefix: z.string().min(1),
  default_value: z.string().default(""),
  /** Symbol name, as generated from symbols.yml */
  symbol: z.string().min(1),
  norm: z.string().optional(),
  signals: z.array(SignalSchema).min(1),
});

export type ComponentEntry = z.output<typeof ComponentEntrySchema>;

export function componentConfig(entry: ComponentEntry, header: LibraryHeader): ComponentConfig {
  return {
    name: entry.name,
    description: entry.description,
    keywords: entry.keywords,
    header,
    prefix: entry.prefix,
    defaultValue: entry.default_value,
    symbol: entry.symbol,
    norm: entry.norm,
    signals: entry.signals,
  };
}

export const componentFamily: Family = {
  name: "components",
  title: "components",
  file: "components.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, GroupBaseSchema).flatMap(({ header, group }) =>
      group.parts.map((raw, i) => ({
        entry: entryLabel(raw, ["name"], `component #${i + 1}`),
        build: () => [buildComponent(componentConfig(ComponentEntrySchema.parse(raw), header), ctx)],
      })),
    );
  },
};
