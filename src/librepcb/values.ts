import { escapeString, formatFloat } from "./format";

// ─── Scalar values ───────────────────────────────────────────────────

export type ScalarValue =
  | { kind: "string"; name: string; value: string }
  | { kind: "float"; name: string; value: number }
  | { kind: "bool"; name: string; value: boolean }
  | { kind: "date"; name: string; value: string }
  | { kind: "enum"; name: string; value: string }
  | { kind: "uuid"; name: string; value: string };

export const str = (name: string, value: string): ScalarValue => ({ kind: "string", name, value });
export const float = (name: string, value: number): ScalarValue => ({ kind: "float", name, value });
export const bool = (name: string, value: boolean): ScalarValue => ({ kind: "bool", name, value });
export const date = (name: string, value: string): ScalarValue => ({ kind: "date", name, value });
export const enumValue = (name: string, value: string): ScalarValue => ({ kind: "enum", name, value });
export const uuidRef = (name: string, value: string): ScalarValue => ({ kind: "uuid", name, value });

/** Render the bare value of a scalar, without its name. */
export function renderScalar(value: ScalarValue): string {
  switch (value.kind) {
    case "string":
      return `"${escapeString(value.value)}"`;
    case "float":
      return formatFloat(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "date":
    case "enum":
    case "uuid":
      return value.value;
  }
}

/** Render a named scalar: `(name value)`. */
export function renderValue(value: ScalarValue): string {
  return `(${value.name} ${renderScalar(value)})`;
}

/** Render several named scalars on one line. */
export function renderValues(...values: ScalarValue[]): string {
  return values.map(renderValue).join(" ");
}
