import { ZodError } from "zod";
import { GeneratorError } from "../errors";
import { Library } from "../librepcb/Library";
import { ARTIFACT_FILES, ArtifactKind, LibraryArtifact } from "../librepcb/metadata";

// ─── Types ───────────────────────────────────────────────────────────

/** One configuration entry; `build` may produce several artifacts. */
export interface BatchItem {
  entry: string;
  build(): LibraryArtifact[];
}

export interface GeneratedArtifact {
  kind: ArtifactKind;
  name: string;
  uuid: string;
  path: string;
}

export interface BatchFailure {
  entry: string;
  message: string;
}

export interface DuplicateName {
  kind: ArtifactKind;
  name: string;
}

export interface BatchResult {
  generated: GeneratedArtifact[];
  failures: BatchFailure[];
  duplicates: DuplicateName[];
}

export function emptyResult(): BatchResult {
  return { generated: [], failures: [], duplicates: [] };
}

export function mergeResults(into: BatchResult, from: BatchResult): BatchResult {
  into.generated.push(...from.generated);
  into.failures.push(...from.failures);
  into.duplicates.push(...from.duplicates);
  return into;
}

// ─── Errors ──────────────────────────────────────────────────────────

/** Whether an error only invalidates the entry it came from. */
export function isEntryError(err: unknown): err is GeneratorError | ZodError {
  return err instanceof GeneratorError || err instanceof ZodError;
}

export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

// ─── Runner ──────────────────────────────────────────────────────────

/**
 * Build and write every item in order. Entry errors are logged and
 * collected so the remaining items still run; anything else propagates.
 *
 * Pass the same `seen` set to several runs to catch duplicate names
 * across tables.
 */
export function runBatch(
  title: string,
  items: Iterable<BatchItem>,
  library: Library,
  seen: Set<string> = new Set(),
): BatchResult {
  const result = emptyResult();

  console.log(`\n📦  Generating ${title}`);
  for (const item of items) {
    let artifacts: LibraryArtifact[];
    try {
      artifacts = item.build();
    } catch (err) {
      if (!isEntryError(err)) {
        throw err;
      }
      const message = describeError(err);
      console.error(`  ❌ Error in ${item.entry}: ${message}`);
      result.failures.push({ entry: item.entry, message });
      continue;
    }

    for (const artifact of artifacts) {
      const label = ARTIFACT_FILES[artifact.kind].label;
      const nameKey = `${artifact.kind}:${artifact.name}`;
      if (seen.has(nameKey)) {
        console.warn(`  ⚠️  Warning: duplicate ${label} name "${artifact.name}"`);
        result.duplicates.push({ kind: artifact.kind, name: artifact.name });
      }
      seen.add(nameKey);

      const filePath = library.write(artifact);
      console.log(`  → ${label} ${artifact.name}: ${artifact.uuid}`);
      result.generated.push({ kind: artifact.kind, name: artifact.name, uuid: artifact.uuid, path: filePath });
    }
  }

  if (result.failures.length === 0) {
    console.log(`  ✅ ${result.generated.length} artifacts generated`);
  } else {
    console.log(`  ❌ ${result.generated.length} artifacts generated, ${result.failures.length} entries failed`);
  }
  return result;
}
