/**
 * Text formatting rules shared by every serialized node.
 */

/**
 * Format a length or angle with at most three decimals.
 *
 * Trailing zeros are stripped, but at least one fractional digit is kept,
 * and negative zero always comes out as "0.0".
 */
export function formatFloat(value: number): string {
  let text = value.toFixed(3);
  if (text.endsWith("00")) {
    text = text.slice(0, -2);
  } else if (text.endsWith("0")) {
    text = text.slice(0, -1);
  }
  if (text === "-0.0") {
    return "0.0";
  }
  return text;
}

const CONTROL_ESCAPES: Array<[string, string]> = [
  ["\b", "\\b"],
  ["\f", "\\f"],
  ["\n", "\\n"],
  ["\r", "\\r"],
  ["\t", "\\t"],
  ["\v", "\\v"],
];

/**
 * Escape a string for use inside double quotes.
 * Backslashes go first so later replacements are not escaped twice.
 */
export function escapeString(value: string): string {
  let result = value.replace(/\\/g, "\\\\");
  for (const [raw, escaped] of CONTROL_ESCAPES) {
    result = result.split(raw).join(escaped);
  }
  return result.replace(/"/g, '\\"');
}

/**
 * Dimension fragment used in IPC-7351 names: the value in hundredths of a
 * millimeter (by default), truncated.
 *
 *   formatIpcDimension(3.14456, 1) === "31"
 *   formatIpcDimension(0.4) === "40"
 */
export function formatIpcDimension(value: number, decimals = 2): string {
  const scaled = Number((value * Math.pow(10, decimals)).toFixed(6));
  return String(Math.floor(scaled));
}

/** -1 for negative values, 1 otherwise (including zero). */
export function sign(value: number): 1 | -1 {
  return value >= 0 ? 1 : -1;
}

/** Round to the given number of decimals. */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Truncate a positive value down onto a grid. Values that sit on a grid
 * line up to float noise stay where they are.
 */
export function truncateToGrid(value: number, grid: number): number {
  const steps = Math.floor(value / grid + 1e-9);
  return Number((steps * grid).toFixed(6));
}

/** Indent every line of a serialized child node by one space. */
export function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => ` ${line}`)
    .join("\n");
}

/** Code-point order, the comparator for every sorted child collection. */
export function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
