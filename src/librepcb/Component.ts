import { compareText, indent } from "./format";
import { ArtifactMetadata, LibraryArtifact, metadataLines } from "./metadata";
import { positionOf, refOf } from "./shapes";
import { bool, enumValue, float, renderValue, renderValues, str } from "./values";

export type SignalRole = "passive" | "power" | "input" | "output" | "inout" | "opendrain";

export class Signal {
  constructor(
    public readonly uuid: string,
    public readonly name: string,
    public readonly role: SignalRole = "passive",
    public readonly required = false,
  ) {}

  serialize(): string {
    return [
      `(signal ${this.uuid} ${renderValues(str("name", this.name), enumValue("role", this.role))}`,
      ` ${renderValues(bool("required", this.required), bool("negated", false), bool("clock", false), str("forced_net", ""))}`,
      ")",
    ].join("\n");
  }
}

/** Connects a symbol pin to a component signal. */
export class PinSignalMap {
  constructor(
    public readonly pin: string,
    public readonly signal: string,
    public readonly text: "signal" | "pin" | "none" = "signal",
  ) {}

  serialize(): string {
    return `(pin ${this.pin} ${refOf("signal", this.signal)} ${renderValue(enumValue("text", this.text))})`;
  }
}

export class Gate {
  private _pins: PinSignalMap[] = [];

  constructor(
    public readonly uuid: string,
    public readonly symbol: string,
    public readonly suffix = "",
  ) {}

  addPin(pin: PinSignalMap): this {
    this._pins.push(pin);
    return this;
  }

  serialize(): string {
    const parts = [
      `(gate ${this.uuid}`,
      ` ${refOf("symbol", this.symbol)}`,
      ` ${positionOf({ x: 0, y: 0 })} ${renderValues(float("rotation", 0), bool("required", true), str("suffix", this.suffix))}`,
    ];
    for (const pin of [...this._pins].sort((a, b) => compareText(a.pin, b.pin))) {
      parts.push(indent(pin.serialize()));
    }
    parts.push(")");
    return parts.join("\n");
  }
}

export class Variant {
  private _gates: Gate[] = [];

  constructor(
    public readonly uuid: string,
    public readonly name: string,
    public readonly description = "",
    public readonly norm = "",
  ) {}

  addGate(gate: Gate): this {
    this._gates.push(gate);
    return this;
  }

  serialize(): string {
    const parts = [
      `(variant ${this.uuid} ${renderValue(str("norm", this.norm))}`,
      ` ${renderValue(str("name", this.name))}`,
      ` ${renderValue(str("description", this.description))}`,
    ];
    for (const gate of [...this._gates].sort((a, b) => compareText(a.uuid, b.uuid))) {
      parts.push(indent(gate.serialize()));
    }
    parts.push(")");
    return parts.join("\n");
  }
}

/**
 * A LibrePCB component: the logical part (signals plus the symbol gates
 * they are drawn with), independent of any package.
 */
export class Component implements LibraryArtifact {
  readonly kind = "cmp";
  readonly uuid: string;
  readonly metadata: ArtifactMetadata;
  readonly prefix: string;
  readonly defaultValue: string;
  readonly schematicOnly: boolean;

  private _signals: Signal[] = [];
  private _variants: Variant[] = [];

  constructor(
    options: ArtifactMetadata & { uuid: string; prefix: string; defaultValue: string; schematicOnly?: boolean },
  ) {
    const { uuid, prefix, defaultValue, schematicOnly, ...metadata } = options;
    this.uuid = uuid;
    this.metadata = { ...metadata, categories: [...metadata.categories] };
    this.prefix = prefix;
    this.defaultValue = defaultValue;
    this.schematicOnly = schematicOnly ?? false;
  }

  get name(): string {
    return this.metadata.name;
  }

  get signals(): readonly Signal[] {
    return this._signals;
  }

  addSignal(signal: Signal): this {
    this._signals.push(signal);
    return this;
  }

  addVariant(variant: Variant): this {
    this._variants.push(variant);
    return this;
  }

  serialize(): string {
    const parts = [`(librepcb_component ${this.uuid}`];
    for (const line of metadataLines(this.metadata)) {
      parts.push(` ${line}`);
    }
    parts.push(` ${renderValue(bool("schematic_only", this.schematicOnly))}`);
    parts.push(` ${renderValue(str("default_value", this.defaultValue))}`);
    parts.push(` ${renderValue(str("prefix", this.prefix))}`);
    for (const child of [...this._signals, ...this._variants]) {
      parts.push(indent(child.serialize()));
    }
    parts.push(")");
    return parts.join("\n");
  }
}
