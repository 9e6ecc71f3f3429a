import * as fs from "fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { describeError } from "../builders/batch";
import { AlternativeName, LibraryHeader, TemplateParams, fillTemplate } from "../builders/common";
import { ConfigurationError } from "../errors";

// ─── Schemas ─────────────────────────────────────────────────────────

/** js-yaml turns unquoted timestamps into dates; keep them as text. */
const timestamp = z.preprocess(
  (value) => (value instanceof Date ? value.toISOString().replace(/\.\d{3}Z$/, "Z") : value),
  z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/, "expected YYYY-MM-DDThh:mm:ssZ"),
);

export const HeaderSchema = z.object({
  author: z.string().min(1),
  version: z.string().min(1),
  created: timestamp,
  category: z.string().uuid(),
  generated_by: z.string().default(""),
});

/** Fields every group may carry; families extend it. */
export const GroupBaseSchema = z.object({
  library: HeaderSchema.partial().optional(),
  parts: z.array(z.unknown()).default([]),
});

/** Another name of a package; `name` is a template like the package name. */
export const AlternativeNameSchema = z.object({
  name: z.string().min(1),
  reference: z.string().min(1),
});

export function alternativeNamesOf(
  templates: ReadonlyArray<z.output<typeof AlternativeNameSchema>>,
  params: TemplateParams,
): AlternativeName[] {
  return templates.map((alternative) => ({ name: fillTemplate(alternative.name, params), reference: alternative.reference }));
}

const DocumentSchema = z.object({
  library: HeaderSchema,
  groups: z.array(z.unknown()),
});

// ─── Loading ─────────────────────────────────────────────────────────

export interface TableGroup<G> {
  /** 1-based position in the file, for messages */
  index: number;
  header: LibraryHeader;
  group: G;
}

/**
 * Read a YAML table and validate its header and groups. Parts stay
 * unvalidated; each is checked when its entry is built.
 */
export function loadTable<S extends z.ZodTypeAny>(filePath: string, groupSchema: S): Array<TableGroup<z.output<S>>> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Table not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${describeError(err)}`);
  }

  const document = DocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new ConfigurationError(`Invalid table header in ${filePath}: ${describeError(document.error)}`);
  }
  return document.data.groups.map((rawGroup, i) => {
    const parsed = groupSchema.safeParse(rawGroup);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid group ${i + 1} in ${filePath}: ${describeError(parsed.error)}`);
    }
    const group: z.output<S> = parsed.data;
    return { index: i + 1, header: resolveHeader(document.data.library, overridesOf(rawGroup)), group };
  });
}

function overridesOf(rawGroup: unknown): Partial<z.output<typeof HeaderSchema>> {
  const parsed = GroupBaseSchema.pick({ library: true }).safeParse(rawGroup);
  return parsed.success ? parsed.data.library ?? {} : {};
}

export function resolveHeader(
  base: z.output<typeof HeaderSchema>,
  override: Partial<z.output<typeof HeaderSchema>> = {},
): LibraryHeader {
  return {
    author: override.author ?? base.author,
    version: override.version ?? base.version,
    created: override.created ?? base.created,
    category: override.category ?? base.category,
    generatedBy: override.generated_by ?? base.generated_by,
  };
}

/**
 * A label for an entry that may not have parsed yet: the first string
 * field among `keys`, or `fallback`.
 */
export function entryLabel(raw: unknown, keys: readonly string[], fallback: string): string {
  if (Array.isArray(raw) && typeof raw[0] === "string") {
    return raw[0];
  }
  if (typeof raw === "object" && raw !== null) {
    for (const key of keys) {
      const value: unknown = Reflect.get(raw, key);
      if (typeof value === "string" || typeof value === "number") {
        return String(value);
      }
    }
  }
  return fallback;
}
