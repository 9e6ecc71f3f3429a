import type { BatchItem } from "../builders/batch";
import type { BuildContext } from "../builders/common";

export type FamilyName = "symbols" | "components" | "chip" | "so" | "qfp" | "qfn" | "dfn" | "dip" | "devices";

/** A configuration table and how to turn it into batch items. */
export interface Family {
  name: FamilyName;
  title: string;
  /** Table file name inside the data directory */
  file: string;
  /**
   * Load the table. Header and group errors throw here; entry errors are
   * left to the returned items.
   */
  items(filePath: string, ctx: BuildContext): BatchItem[];
}
