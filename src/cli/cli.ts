#!/usr/bin/env node

/**
 * LibrePCB parts generator CLI
 */

import "ts-node/register";
import "tsconfig-paths/register";
import { cmdGenerate } from "@parts/cli/commands/generate";
import { cmdFamilies } from "@parts/cli/commands/families";
import { applyPathFlags } from "@parts/cli/utils";

function printHelp(): void {
  console.log(`
LibrePCB Parts Generator

Usage:
  npm run generate -- [family ...] [options]
  pcb-parts <command> [options]

Commands:
  generate [family ...]          Generate symbols, packages, components and devices
                                 (families: symbols, components, chip, so, qfp, qfn,
                                  dfn, dip, devices)
  families                       List the families and their tables
  help                           Show this help

Options:
  --data <dir>                   Table directory      (env PARTSGEN_DATA_DIR)
  --out <dir>                    Library output root  (env PARTSGEN_OUT_DIR, default ./out)
  --cache <file>                 UUID cache file      (env PARTSGEN_CACHE_FILE, default ./uuid_cache.csv)

Examples:
  pcb-parts generate
  pcb-parts generate chip qfn --out ./librepcb/Generated.lplib
`);
}

async function main(): Promise<void> {
  // Path flags are read before any command so getConfig() sees them
  const args = applyPathFlags(process.argv.slice(2));
  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "generate":
      return cmdGenerate(commandArgs);
    case "families":
      return cmdFamilies(commandArgs);
    case "--help":
    case "-h":
    case "help":
      printHelp();
      break;
    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      printHelp();
      process.exit(command ? 1 : 0);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
