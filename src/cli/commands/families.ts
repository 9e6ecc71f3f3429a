import * as path from "path";
import { getConfig } from "@parts/cli/config";
import { FAMILIES } from "@parts/families";

/** families: List the families in generation order with their tables. */
export async function cmdFamilies(_args: string[]): Promise<void> {
  const { dataDir } = getConfig();
  console.log("\n✨  Families\n" + "─".repeat(30));
  for (const family of FAMILIES) {
    console.log(`  ${family.name.padEnd(12)}${family.title} (${path.join(dataDir, family.file)})`);
  }
  console.log("─".repeat(30));
}
