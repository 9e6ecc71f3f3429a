import { z } from "zod";
import type { BatchItem } from "../builders/batch";
import { BuildContext, LibraryHeader, plainNumber } from "../builders/common";
import { QfnPackageConfig, buildQfnPackage } from "../builders/packages";
import { ConfigurationError } from "../errors";
import { QfnPart, qfnPinCount } from "../geometry/qfn";
import { formatIpcDimension } from "../librepcb/format";
import { GroupBaseSchema, entryLabel, loadTable } from "./table";
import type { Family } from "./types";

const length = z.number().positive();
const pins = z.number().int().positive();

export const QfnGroupSchema = GroupBaseSchema.extend({
  standard: z.string(),
});

/** [variation, A, e, D, E, D2, E2, L, ND, NE] */
export const QfnRowSchema = z
  .tuple([z.string().min(1), length, length, length, length, length, length, length, pins, pins])
  .transform(
    ([variation, height, pitch, bodyX, bodyY, exposedX, exposedY, leadLength, pinsX, pinsY]): QfnPart => ({
      variation,
      height,
      pitch,
      bodyX,
      bodyY,
      exposedX,
      exposedY,
      leadLength,
      pinsX,
      pinsY,
    }),
  );

export type QfnGroup = z.output<typeof QfnGroupSchema>;

const PROFILE_TITLES: Record<string, string> = {
  V: "Very Thin Quad Flat No Lead Package (VQFN)",
  W: "Very Very Thin Quad Flat No Lead Package (WQFN)",
};

export function qfnConfig(group: QfnGroup, part: QfnPart, header: LibraryHeader): QfnPackageConfig {
  const profile = part.variation[0];
  const title = PROFILE_TITLES[profile];
  if (title === undefined) {
    throw new ConfigurationError(`Invalid variation ${part.variation}`);
  }
  const fd = formatIpcDimension;
  const count = qfnPinCount(part);
  return {
    name:
      `${profile}QFN${fd(part.pitch)}P${fd(part.bodyX)}X${fd(part.bodyY)}X${fd(part.height)}` +
      `-${count}-${part.variation}`,
    description:
      `${count}-pin ${title}, standardized by JEDEC in ${group.standard}. Variation ${part.variation}\n\n` +
      `Pitch: ${plainNumber(part.pitch)} mm\n` +
      `Body size: ${plainNumber(part.bodyX)}x${plainNumber(part.bodyY)} mm\n` +
      `Max height: ${plainNumber(part.height)} mm`,
    keywords: ["qfn", `${profile}qfn`, group.standard, part.variation].join(",").toLowerCase(),
    header,
    part,
  };
}

export const qfnFamily: Family = {
  name: "qfn",
  title: "quad flat no-lead packages",
  file: "qfn.yml",
  items(filePath: string, ctx: BuildContext): BatchItem[] {
    return loadTable(filePath, QfnGroupSchema).flatMap(({ header, group }) =>
      group.parts.map((raw, i) => ({
        entry: `${group.standard} ${entryLabel(raw, [], `row ${i + 1}`)}`,
        build: () => [buildQfnPackage(qfnConfig(group, QfnRowSchema.parse(raw), header), ctx)],
      })),
    );
  },
};
