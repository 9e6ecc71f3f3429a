import * as path from "path";

export interface Config {
    projectRoot: string;
    /** Directory holding the family tables (chip.yml, qfn.yml, ...) */
    dataDir: string;
    /** Root of the generated LibrePCB library */
    outDir: string;
    /** UUID cache shared by every family */
    cacheFile: string;
}

let configCache: Config | null = null;

export function getConfig(): Config {
    if (configCache) return configCache;

    const projectRoot = process.env.INIT_CWD || process.cwd();

    // Tables ship with the package
    const dataDir = process.env.PARTSGEN_DATA_DIR
        ? path.resolve(projectRoot, process.env.PARTSGEN_DATA_DIR)
        : path.resolve(__dirname, "../../data");

    const outDir = path.resolve(projectRoot, process.env.PARTSGEN_OUT_DIR || "out");
    const cacheFile = path.resolve(projectRoot, process.env.PARTSGEN_CACHE_FILE || "uuid_cache.csv");

    configCache = {
        projectRoot,
        dataDir,
        outDir,
        cacheFile,
    };

    return configCache;
}

/** Forget the cached config, e.g. after the environment changed. */
export function resetConfig(): void {
    configCache = null;
}
