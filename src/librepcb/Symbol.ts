import { formatFloat, indent } from "./format";
import { ArtifactMetadata, LibraryArtifact, metadataLines } from "./metadata";
import { HAlign, Layer, Point, Polygon, VAlign, positionOf } from "./shapes";
import { enumValue, float, renderValue, renderValues, str } from "./values";

const NAME_OFFSET = 1.27;
const NAME_HEIGHT = 2.5;

/**
 * A symbol pin. `position` is where wires connect; the pin line runs
 * `length` from there in the direction of `rotation`.
 */
export class SymbolPin {
  constructor(
    public readonly uuid: string,
    public readonly name: string,
    public readonly position: Point,
    public readonly rotation: number,
    public readonly length: number,
  ) {}

  serialize(): string {
    return [
      `(pin ${this.uuid} ${renderValue(str("name", this.name))}`,
      ` ${positionOf(this.position)} ${renderValues(float("rotation", this.rotation), float("length", this.length))}`,
      ` (name_position ${formatFloat(this.length + NAME_OFFSET)} 0.0)` +
        ` ${renderValues(float("name_rotation", 0), float("name_height", NAME_HEIGHT))}`,
      " (name_align left center)",
      ")",
    ].join("\n");
  }
}

/** Schematic text, e.g. the `{{NAME}}` label above the body. */
export class SymbolText {
  constructor(
    public readonly uuid: string,
    public readonly layer: Layer,
    public readonly value: string,
    public readonly align: [HAlign, VAlign],
    public readonly position: Point,
    public readonly height = 2.54,
  ) {}

  serialize(): string {
    return [
      `(text ${this.uuid} ${renderValues(enumValue("layer", this.layer), str("value", this.value))}`,
      ` (align ${this.align[0]} ${this.align[1]}) ${renderValue(float("height", this.height))}` +
        ` ${positionOf(this.position)} ${renderValue(float("rotation", 0))}`,
      ")",
    ].join("\n");
  }
}

/**
 * A LibrePCB symbol: the schematic drawing of one gate. Children keep
 * insertion order: pins, then polygons, then texts.
 */
export class SchematicSymbol implements LibraryArtifact {
  readonly kind = "sym";
  readonly uuid: string;
  readonly metadata: ArtifactMetadata;

  private _pins: SymbolPin[] = [];
  private _polygons: Polygon[] = [];
  private _texts: SymbolText[] = [];

  constructor(options: ArtifactMetadata & { uuid: string }) {
    const { uuid, ...metadata } = options;
    this.uuid = uuid;
    this.metadata = { ...metadata, categories: [...metadata.categories] };
  }

  get name(): string {
    return this.metadata.name;
  }

  get pins(): readonly SymbolPin[] {
    return this._pins;
  }

  get polygons(): readonly Polygon[] {
    return this._polygons;
  }

  get texts(): readonly SymbolText[] {
    return this._texts;
  }

  addPin(pin: SymbolPin): this {
    this._pins.push(pin);
    return this;
  }

  addPolygon(polygon: Polygon): this {
    this._polygons.push(polygon);
    return this;
  }

  addText(text: SymbolText): this {
    this._texts.push(text);
    return this;
  }

  serialize(): string {
    const parts = [`(librepcb_symbol ${this.uuid}`];
    for (const line of metadataLines(this.metadata)) {
      parts.push(` ${line}`);
    }
    for (const child of [...this._pins, ...this._polygons, ...this._texts]) {
      parts.push(indent(child.serialize()));
    }
    parts.push(")");
    return parts.join("\n");
  }
}
