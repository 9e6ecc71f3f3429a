import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { ConfigurationError } from "../errors";
import { compareText, escapeString } from "./format";

/**
 * Build the normalized cache key for a feature of a generated artifact.
 *
 *   cacheKey("pkg", "RESC1005X40", "pad-1") → "pkg-resc1005x40-pad-1"
 */
export function cacheKey(category: string, instance: string, feature: string): string {
  return `${category}-${instance}-${feature}`.toLowerCase().replace(/ /g, "~");
}

/** Resolves a feature identifier of one artifact to its stable UUID. */
export type IdResolver = (feature: string) => string;

/**
 * Persistent mapping from semantic keys to UUIDs.
 *
 * Entries are never removed or reassigned: once a key has a UUID, every
 * later run that loads the same file gets the same one back.
 */
export class UuidCache {
  private entries = new Map<string, string>();
  private issued = new Set<string>();
  private _dirty = false;

  constructor(public readonly filePath?: string) {}

  /**
   * Load a cache file. A missing file yields an empty cache.
   */
  static load(filePath: string): UuidCache {
    const cache = new UuidCache(filePath);
    if (!fs.existsSync(filePath)) {
      return cache;
    }
    const content = fs.readFileSync(filePath, "utf-8");
    content.split(/\r?\n/).forEach((line, index) => {
      if (line.trim() === "") return;
      const fields = parseRow(line);
      if (fields.length !== 2) {
        throw new ConfigurationError(
          `Malformed row ${index + 1} in ${filePath}: expected 2 columns, got ${fields.length}`,
        );
      }
      cache.entries.set(fields[0], fields[1]);
      cache.issued.add(fields[1]);
    });
    return cache;
  }

  get size(): number {
    return this.entries.size;
  }

  get dirty(): boolean {
    return this._dirty;
  }

  /**
   * Return the UUID stored for `key`, minting and recording a new one on
   * the first request.
   */
  resolve(key: string): string {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }
    let uuid = crypto.randomUUID();
    while (this.issued.has(uuid)) {
      uuid = crypto.randomUUID();
    }
    this.entries.set(key, uuid);
    this.issued.add(uuid);
    this._dirty = true;
    return uuid;
  }

  lookup(key: string): string | undefined {
    return this.entries.get(key);
  }

  /**
   * Like {@link resolve}, but an unknown key is a configuration error.
   * Used where a reference must point at something generated earlier.
   */
  require(key: string): string {
    const uuid = this.entries.get(key);
    if (uuid === undefined) {
      throw new ConfigurationError(`Unknown reference "${key}" (nothing generated it yet)`);
    }
    return uuid;
  }

  /** Bind category and instance so callers only pass the feature part. */
  resolver(category: string, instance: string): IdResolver {
    return (feature) => this.resolve(cacheKey(category, instance, feature));
  }

  /** All entries, sorted by key. */
  sortedEntries(): Array<[string, string]> {
    return Array.from(this.entries.entries()).sort(([a], [b]) => compareText(a, b));
  }

  /**
   * Write all entries sorted by key. The file is first written next to the
   * target and then renamed over it, so an interrupted write leaves the
   * previous version intact. Write errors propagate.
   */
  save(filePath = this.filePath): void {
    if (!filePath) {
      throw new Error("UuidCache.save: no file path given");
    }
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const lines = this.sortedEntries().map(
      ([key, uuid]) => `${quoteField(key)},${quoteField(uuid)}\n`,
    );
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, lines.join(""), "utf-8");
    fs.renameSync(tmpPath, filePath);
    this._dirty = false;
  }
}

function quoteField(value: string): string {
  return `"${escapeString(value)}"`;
}

const UNESCAPES: Record<string, string> = {
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
};

/**
 * Split one cache row into fields. Quoted fields use the backslash escapes
 * written by {@link quoteField}; unquoted fields are taken verbatim.
 */
function parseRow(line: string): string[] {
  const fields: string[] = [];
  let i = 0;
  while (i <= line.length) {
    if (line[i] === '"') {
      let value = "";
      i++;
      while (i < line.length && line[i] !== '"') {
        if (line[i] === "\\" && i + 1 < line.length) {
          const next = line[i + 1];
          value += UNESCAPES[next] ?? next;
          i += 2;
        } else {
          value += line[i];
          i++;
        }
      }
      if (i >= line.length) {
        throw new ConfigurationError(`Unterminated quoted field in cache row: ${line}`);
      }
      fields.push(value);
      i++; // closing quote
      if (i < line.length && line[i] !== ",") {
        throw new ConfigurationError(`Unexpected character after quoted field in cache row: ${line}`);
      }
      i++; // comma
    } else {
      const end = line.indexOf(",", i);
      if (end === -1) {
        fields.push(line.slice(i));
        break;
      }
      fields.push(line.slice(i, end));
      i = end + 1;
    }
  }
  return fields;
}
