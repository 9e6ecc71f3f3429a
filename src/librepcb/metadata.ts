import { bool, date, renderValue, str, uuidRef } from "./values";

/** Library element kinds and their directory/file names. */
export type ArtifactKind = "sym" | "pkg" | "cmp" | "dev";

export const ARTIFACT_FILES: Record<ArtifactKind, { marker: string; file: string; label: string }> = {
  sym: { marker: ".librepcb-sym", file: "symbol.lp", label: "symbol" },
  pkg: { marker: ".librepcb-pkg", file: "package.lp", label: "package" },
  cmp: { marker: ".librepcb-cmp", file: "component.lp", label: "component" },
  dev: { marker: ".librepcb-dev", file: "device.lp", label: "device" },
};

/** Anything that ends up as a file in the library. */
export interface LibraryArtifact {
  readonly kind: ArtifactKind;
  readonly uuid: string;
  readonly name: string;
  serialize(): string;
}

export interface ArtifactMetadata {
  name: string;
  description: string;
  keywords: string;
  author: string;
  version: string;
  /** ISO-8601 timestamp, e.g. 2019-01-02T00:00:00Z */
  created: string;
  deprecated?: boolean;
  generatedBy?: string;
  categories: string[];
}

/** Header lines shared by every library element (unindented). */
export function metadataLines(meta: ArtifactMetadata): string[] {
  const lines = [
    renderValue(str("name", meta.name)),
    renderValue(str("description", meta.description)),
    renderValue(str("keywords", meta.keywords)),
    renderValue(str("author", meta.author)),
    renderValue(str("version", meta.version)),
    renderValue(date("created", meta.created)),
    renderValue(bool("deprecated", meta.deprecated ?? false)),
    renderValue(str("generated_by", meta.generatedBy ?? "")),
  ];
  for (const category of meta.categories) {
    lines.push(renderValue(uuidRef("category", category)));
  }
  return lines;
}
