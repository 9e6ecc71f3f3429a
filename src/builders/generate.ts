import * as path from "path";
import { ConfigurationError } from "../errors";
import type { Family } from "../families/types";
import { Library } from "../librepcb/Library";
import { UuidCache } from "../librepcb/UuidCache";
import type { SolidModelKernel } from "../model3d/types";
import { BatchItem, BatchResult, describeError, emptyResult, mergeResults, runBatch } from "./batch";
import type { BuildContext } from "./common";

export interface GenerateOptions {
  dataDir: string;
  outDir: string;
  cacheFile: string;
  families: readonly Family[];
  kernel?: SolidModelKernel;
}

/**
 * Run the given families in order against one library and one shared
 * UUID cache. A family whose table does not load counts as a single
 * failure; the others still run. The cache is saved once at the end,
 * also when entries failed.
 */
export function generateLibrary(options: GenerateOptions): BatchResult {
  const cache = UuidCache.load(options.cacheFile);
  const library = new Library(options.outDir);
  const ctx: BuildContext = { cache, library, kernel: options.kernel };
  const seen = new Set<string>();
  const result = emptyResult();

  try {
    for (const family of options.families) {
      const tablePath = path.join(options.dataDir, family.file);
      let items: BatchItem[];
      try {
        items = family.items(tablePath, ctx);
      } catch (err) {
        if (!(err instanceof ConfigurationError)) {
          throw err;
        }
        const message = describeError(err);
        console.error(`\n❌ Could not load ${family.file}: ${message}`);
        result.failures.push({ entry: family.file, message });
        continue;
      }
      mergeResults(result, runBatch(family.title, items, library, seen));
    }
  } catch (err) {
    saveAfterFailure(cache, err);
    throw err;
  }
  if (cache.dirty) {
    cache.save();
  }
  return result;
}

/**
 * Keep the UUIDs minted before `primary` was thrown. A failing save
 * is reported with `primary` as its cause.
 */
function saveAfterFailure(cache: UuidCache, primary: unknown): void {
  if (!cache.dirty) {
    return;
  }
  try {
    cache.save();
  } catch (saveError) {
    throw new Error(`Could not save the UUID cache: ${describeError(saveError)}`, { cause: primary });
  }
}
