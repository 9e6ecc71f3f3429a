import { ConfigurationError } from "../errors";
import { Polygon } from "../librepcb/shapes";
import { SchematicSymbol, SymbolPin, SymbolText } from "../librepcb/Symbol";
import { closedRectangle } from "../geometry/bounds";
import { BuildContext, LibraryHeader, withGeneratorNote } from "./common";

export type PinSide = "left" | "right" | "top" | "bottom";

export interface SymbolPinConfig {
  name: string;
  side: PinSide;
}

/** A rectangular box symbol with pins around it. */
export interface SymbolConfig {
  name: string;
  description: string;
  keywords: string;
  header: LibraryHeader;
  pins: SymbolPinConfig[];
}

/** Schematic grid; pins and body corners sit on it. */
export const SYMBOL_GRID = 2.54;
const LINE_WIDTH = 0.25;
const PIN_LENGTH = SYMBOL_GRID;

/** Pin rotation per side: the pin line points into the body. */
const PIN_ROTATION: Record<PinSide, number> = { left: 0, right: 180, top: 270, bottom: 90 };

/**
 * Grid steps of the i-th of `count` pins on one side, centered on 0.
 * An even count puts the extra pin below (or right of) the center.
 */
export function pinOffset(index: number, count: number): number {
  return Math.floor((count - 1) / 2) - index;
}

/** Half the body size: one grid step beyond the outermost pin, at least `min` steps. */
function halfSize(count: number, min: number): number {
  return Math.max(Math.floor(count / 2) + 1, min) * SYMBOL_GRID;
}

export interface SymbolLayout {
  halfWidth: number;
  halfHeight: number;
  pins: Array<{ name: string; x: number; y: number; rotation: number }>;
}

export function symbolLayout(pins: readonly SymbolPinConfig[]): SymbolLayout {
  const bySide = (side: PinSide) => pins.filter((pin) => pin.side === side);
  const rows = Math.max(bySide("left").length, bySide("right").length, 1);
  const columns = Math.max(bySide("top").length, bySide("bottom").length, 1);
  const halfHeight = halfSize(rows, 1);
  const halfWidth = halfSize(columns, 2);

  const placed: SymbolLayout["pins"] = [];
  for (const side of ["left", "right", "top", "bottom"] as const) {
    const onSide = bySide(side);
    onSide.forEach((pin, i) => {
      const along = pinOffset(i, onSide.length) * SYMBOL_GRID;
      const rotation = PIN_ROTATION[side];
      switch (side) {
        case "left":
          placed.push({ name: pin.name, x: -halfWidth - PIN_LENGTH, y: along, rotation });
          break;
        case "right":
          placed.push({ name: pin.name, x: halfWidth + PIN_LENGTH, y: along, rotation });
          break;
        case "top":
          placed.push({ name: pin.name, x: -along, y: halfHeight + PIN_LENGTH, rotation });
          break;
        case "bottom":
          placed.push({ name: pin.name, x: -along, y: -halfHeight - PIN_LENGTH, rotation });
          break;
      }
    });
  }
  return { halfWidth, halfHeight, pins: placed };
}

export function buildSymbol(config: SymbolConfig, ctx: BuildContext): SchematicSymbol {
  const names = new Set<string>();
  for (const pin of config.pins) {
    if (names.has(pin.name)) {
      throw new ConfigurationError(`Duplicate pin name "${pin.name}"`, config.name);
    }
    names.add(pin.name);
  }

  const ids = ctx.cache.resolver("sym", config.name);
  const { header } = config;
  const symbol = new SchematicSymbol({
    uuid: ids("sym"),
    name: config.name,
    description: withGeneratorNote(config.description, header),
    keywords: config.keywords,
    author: header.author,
    version: header.version,
    created: header.created,
    generatedBy: header.generatedBy,
    categories: [header.category],
  });

  const layout = symbolLayout(config.pins);
  for (const pin of layout.pins) {
    symbol.addPin(new SymbolPin(ids(`pin-${pin.name}`), pin.name, { x: pin.x, y: pin.y }, pin.rotation, PIN_LENGTH));
  }
  symbol.addPolygon(
    new Polygon({
      uuid: ids("polygon-contour"),
      layer: "sym_outlines",
      width: LINE_WIDTH,
      grabArea: true,
      vertices: closedRectangle(layout.halfWidth, layout.halfHeight),
    }),
  );
  symbol.addText(
    new SymbolText(ids("text-name"), "sym_names", "{{NAME}}", ["center", "bottom"], { x: 0, y: layout.halfHeight }),
  );
  symbol.addText(
    new SymbolText(ids("text-value"), "sym_values", "{{VALUE}}", ["center", "top"], { x: 0, y: -layout.halfHeight }),
  );
  return symbol;
}
