import { chipFamily } from "./chip";
import { componentFamily } from "./components";
import { deviceFamily } from "./devices";
import { dfnFamily } from "./dfn";
import { dipFamily } from "./dip";
import { qfnFamily } from "./qfn";
import { quadFlatFamily } from "./qfp";
import { smallOutlineFamily } from "./so";
import { symbolFamily } from "./symbols";
import type { Family } from "./types";

export type { Family, FamilyName } from "./types";

/**
 * Every family in generation order. Components reference the symbols
 * before them and devices, last, the components and packages.
 */
export const FAMILIES: readonly Family[] = [
  symbolFamily,
  componentFamily,
  chipFamily,
  smallOutlineFamily,
  quadFlatFamily,
  qfnFamily,
  dfnFamily,
  dipFamily,
  deviceFamily,
];

export function findFamily(name: string): Family | undefined {
  return FAMILIES.find((family) => family.name === name);
}
