import { ConfigurationError } from "../errors";
import type { FootprintVariant } from "./types";

// ─── Types ───────────────────────────────────────────────────────────

/** IPC-7351 density level: A = most, B = median, C = least material. */
export type DensityLevel = "A" | "B" | "C";

export const DENSITY_LEVELS: readonly DensityLevel[] = ["A", "B", "C"];

/** Land excess over the nominal lead dimensions, in mm. */
export interface Excess {
  toe: number;
  heel: number;
  side: number;
  courtyard: number;
}

export type DensityTable = Record<DensityLevel, Excess>;

/** Pitch-keyed density tables (keyed by pitch formatted to two decimals). */
export type PitchTable = Record<string, DensityTable>;

export interface DensityVariant extends FootprintVariant {
  level: DensityLevel;
}

export const DENSITY_VARIANTS: Record<DensityLevel, DensityVariant> = {
  A: { key: "density~a", name: "Density Level A (max protrusion)", level: "A" },
  B: { key: "density~b", name: "Density Level B (median protrusion)", level: "B" },
  C: { key: "density~c", name: "Density Level C (min protrusion)", level: "C" },
};

/** Output order of the footprint variants: median first. */
export const STANDARD_VARIANTS: readonly DensityVariant[] = [DENSITY_VARIANTS.B, DENSITY_VARIANTS.A, DENSITY_VARIANTS.C];

// ─── Two-terminal chips (IPC-7351B table 3-5) ────────────────────────

/** Chips with a body length of 1.6 mm or more */
export const CHIP_DENSITY: DensityTable = {
  A: { toe: 0.55, heel: 0.0, side: 0.05, courtyard: 0.5 },
  B: { toe: 0.35, heel: 0.0, side: 0.0, courtyard: 0.25 },
  C: { toe: 0.15, heel: 0.0, side: -0.05, courtyard: 0.12 },
};

/** Chips shorter than 1.6 mm */
export const CHIP_DENSITY_SMALL: DensityTable = {
  A: { toe: 0.2, heel: 0.0, side: 0.05, courtyard: 0.2 },
  B: { toe: 0.1, heel: 0.0, side: 0.0, courtyard: 0.15 },
  C: { toe: 0.0, heel: 0.0, side: 0.0, courtyard: 0.1 },
};

export const CHIP_SMALL_LENGTH_LIMIT = 1.6;

/** Toe extension added to the hand-soldering variant of a chip */
export const HAND_SOLDERING_TOE_EXTENSION = 0.5;

export function chipExcess(bodyLength: number, level: DensityLevel): Excess {
  const table = bodyLength >= CHIP_SMALL_LENGTH_LIMIT ? CHIP_DENSITY : CHIP_DENSITY_SMALL;
  return table[level];
}

// ─── Gull-wing small outline ─────────────────────────────────────────

/** Pitch of 0.625 mm or more */
export const SO_DENSITY: DensityTable = {
  A: { toe: 0.55, heel: 0.45, side: 0.05, courtyard: 0.5 },
  B: { toe: 0.35, heel: 0.35, side: 0.03, courtyard: 0.25 },
  C: { toe: 0.15, heel: 0.25, side: 0.01, courtyard: 0.1 },
};

export const SO_DENSITY_SMALL_PITCH: DensityTable = {
  A: { toe: 0.55, heel: 0.45, side: 0.01, courtyard: 0.5 },
  B: { toe: 0.35, heel: 0.35, side: -0.02, courtyard: 0.25 },
  C: { toe: 0.15, heel: 0.25, side: -0.04, courtyard: 0.1 },
};

export const SO_SMALL_PITCH_LIMIT = 0.625;

export function soExcess(pitch: number, level: DensityLevel): Excess {
  const table = pitch >= SO_SMALL_PITCH_LIMIT ? SO_DENSITY : SO_DENSITY_SMALL_PITCH;
  return table[level];
}

// ─── Quad flat package ───────────────────────────────────────────────

const qfp = (toe: number, heel: number, side: number, courtyard: number): Excess => ({
  toe,
  heel,
  side,
  courtyard,
});

export const QFP_DENSITY: PitchTable = {
  "1.00": { A: qfp(0.35, 0.45, 0.06, 0.4), B: qfp(0.3, 0.4, 0.05, 0.2), C: qfp(0.25, 0.35, 0.04, 0.1) },
  "0.80": { A: qfp(0.3, 0.4, 0.05, 0.4), B: qfp(0.25, 0.35, 0.04, 0.2), C: qfp(0.2, 0.3, 0.03, 0.1) },
  "0.65": { A: qfp(0.25, 0.35, 0.03, 0.4), B: qfp(0.2, 0.3, 0.02, 0.2), C: qfp(0.15, 0.25, 0.01, 0.1) },
  "0.50": { A: qfp(0.2, 0.3, 0.0, 0.4), B: qfp(0.15, 0.25, -0.01, 0.2), C: qfp(0.1, 0.2, -0.02, 0.1) },
  "0.40": { A: qfp(0.2, 0.3, -0.01, 0.4), B: qfp(0.15, 0.25, -0.02, 0.2), C: qfp(0.1, 0.2, -0.03, 0.1) },
};

/** Nominal lead contact length of gull-wing quad packages */
export const QFP_LEAD_CONTACT_LENGTH = 0.6;

export function pitchKey(pitch: number): string {
  return pitch.toFixed(2);
}

/** Look up a pitch-keyed table; unknown pitches are configuration errors. */
export function excessForPitch(table: PitchTable, pitch: number, level: DensityLevel): Excess {
  const entry = table[pitchKey(pitch)];
  if (entry === undefined) {
    throw new ConfigurationError(`Unhandled pitch: ${pitch}`);
  }
  return entry[level];
}

// ─── Quad flat no-lead ───────────────────────────────────────────────

/** Toe (J_T), heel (J_H) and side (J_S) goals plus courtyard excess. */
export const QFN_DENSITY: DensityTable = {
  A: { toe: 0.4, heel: 0.0, side: -0.04, courtyard: 0.5 },
  B: { toe: 0.3, heel: 0.0, side: -0.04, courtyard: 0.25 },
  C: { toe: 0.2, heel: 0.0, side: -0.04, courtyard: 0.1 },
};

/** Maximum terminal width (b max) per pitch. */
export const QFN_MAX_LEAD_WIDTH: Record<string, number> = {
  "1.00": 0.45,
  "0.80": 0.35,
  "0.65": 0.35,
  "0.50": 0.3,
  "0.40": 0.25,
};

export function qfnMaxLeadWidth(pitch: number): number {
  const width = QFN_MAX_LEAD_WIDTH[pitchKey(pitch)];
  if (width === undefined) {
    throw new ConfigurationError(`Unhandled pitch: ${pitch}`);
  }
  return width;
}
