import * as fs from "fs";
import * as path from "path";
import { ARTIFACT_FILES, ArtifactKind, LibraryArtifact } from "./metadata";

/** File format version written into every element's marker file. */
export const FILE_FORMAT_VERSION = "1";

/**
 * Writes generated elements into a LibrePCB library directory.
 *
 * Each element gets its own directory `<root>/<kind>/<uuid>/` holding a
 * version marker and the serialized element.
 *
 * @example
 * ```ts
 * const lib = new Library("out/chip");
 * lib.write(pkg); // → out/chip/pkg/<uuid>/package.lp
 * ```
 */
export class Library {
  constructor(public readonly rootDir: string) {}

  /** Directory of one element. */
  public elementDir(kind: ArtifactKind, uuid: string): string {
    return path.join(this.rootDir, kind, uuid);
  }

  /**
   * Write an element, creating its directory if needed.
   * @returns The full path to the written element file.
   */
  public write(artifact: LibraryArtifact): string {
    const files = ARTIFACT_FILES[artifact.kind];
    const dir = this.elementDir(artifact.kind, artifact.uuid);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(path.join(dir, files.marker), `${FILE_FORMAT_VERSION}\n`, "utf-8");
    const filePath = path.join(dir, files.file);
    fs.writeFileSync(filePath, `${artifact.serialize()}\n`, "utf-8");
    return filePath;
  }
}
