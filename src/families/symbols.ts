import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import type { BuildContext, LibraryHeader } from "../builders/common";
import { SymbolConfig, buildSymbol } from "../builders/symbol";
import { GroupBaseSchema, entryLabel, loadTable } from "./table";
import type { Family } from "./types";

const PinSchema = z.object({
  name: z.string().min(1),
  side: z.enum(["left", "right", "top", "bottom"]),
});

export const SymbolEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  keywords: z.string().default(""),
  pins: z.array(PinSchema).min(1),
});

export type SymbolEntry = z.output<typeof SymbolEntrySchema>;

export function symbolConfig(entry: SymbolEntry, header: LibraryHeader): SymbolConfig {
  return {
    name: entry.name,
    description: entry.description,
    keywords: entry.keywords,
    header,
    pins: entry.pins,
  };
}

export const symbolFamily: Family = {
  name: "symbols",
  title: "symbols",
  file: "symbols.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, GroupBaseSchema).flatMap(({ header, group }) =>
      group.parts.map((raw, i) => ({
        entry: entryLabel(raw, ["name"], `symbol #${i + 1}`),
        build: () => [buildSymbol(symbolConfig(SymbolEntrySchema.parse(raw), header), ctx)],
      })),
    );
  },
};
