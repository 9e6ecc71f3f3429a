export function die(msg: string): never {
  console.error(`❌  ${msg}`);
  process.exit(1);
}

/** Flags that take a value and the environment variable each one sets. */
export const PATH_FLAGS: ReadonlyMap<string, string> = new Map([
  ["--data", "PARTSGEN_DATA_DIR"],
  ["--out", "PARTSGEN_OUT_DIR"],
  ["--cache", "PARTSGEN_CACHE_FILE"],
]);

/**
 * Move the path flags into the environment so getConfig() picks them up.
 * @returns The remaining arguments.
 */
export function applyPathFlags(args: string[], env: NodeJS.ProcessEnv = process.env): string[] {
  const rest: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const envName = PATH_FLAGS.get(args[i]);
    if (envName === undefined) {
      rest.push(args[i]);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      die(`Missing value for ${args[i]}`);
    }
    env[envName] = value;
    i++;
  }
  return rest;
}
