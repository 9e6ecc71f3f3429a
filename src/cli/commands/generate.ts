import { getConfig } from "@parts/cli/config";
import { die } from "@parts/cli/utils";
import { generateLibrary } from "@parts/builders/generate";
import { FAMILIES, Family, findFamily } from "@parts/families";

/**
 * generate: Build the LibrePCB library from the family tables.
 *
 * Usage:
 *   npm run generate -- [family ...] [--data <dir>] [--out <dir>] [--cache <file>]
 *
 * Without family names every family runs, symbols first and devices last.
 */
export async function cmdGenerate(args: string[]): Promise<void> {
  const families: Family[] = [];
  for (const name of args) {
    const family = findFamily(name);
    if (!family) {
      die(`Unknown family: ${name} (known: ${FAMILIES.map((f) => f.name).join(", ")})`);
    }
    families.push(family);
  }
  // Keep the dependency order even when names are given out of order
  const selected = families.length > 0 ? FAMILIES.filter((f) => families.includes(f)) : FAMILIES;

  const { dataDir, outDir, cacheFile } = getConfig();
  console.log(`\n📚  LibrePCB Library Generator`);
  console.log(`  Tables: ${dataDir}`);
  console.log(`  Output: ${outDir}`);
  console.log(`  Cache:  ${cacheFile}`);

  const result = generateLibrary({ dataDir, outDir, cacheFile, families: selected });

  console.log("");
  if (result.duplicates.length > 0) {
    console.warn(`⚠️  ${result.duplicates.length} duplicate names`);
  }
  if (result.failures.length > 0) {
    console.error(`❌  ${result.generated.length} artifacts written, ${result.failures.length} entries failed:`);
    for (const failure of result.failures) {
      console.error(`  - ${failure.entry}: ${failure.message}`);
    }
    process.exit(1);
  }
  console.log(`✅  ${result.generated.length} artifacts written to ${outDir}`);
}
