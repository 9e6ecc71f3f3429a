import { compareText, indent } from "./format";
import { ArtifactMetadata, LibraryArtifact, metadataLines } from "./metadata";
import { refOf } from "./shapes";
import { renderScalar, renderValue, str } from "./values";

/** Package pad → component signal. A pad without signal stays unconnected. */
export class DevicePad {
  constructor(public readonly pad: string, public readonly signal: string | null) {}

  serialize(): string {
    const signal = this.signal === null ? "(signal none)" : refOf("signal", this.signal);
    return `(pad ${this.pad} ${signal})`;
  }
}

export class ManufacturerPart {
  constructor(public readonly mpn: string, public readonly manufacturer: string) {}

  serialize(): string {
    return [
      `(part ${renderScalar(str("mpn", this.mpn))} ${renderValue(str("manufacturer", this.manufacturer))}`,
      ")",
    ].join("\n");
  }
}

/**
 * A LibrePCB device: a component bound to a package, with the mapping
 * between package pads and component signals.
 */
export class Device implements LibraryArtifact {
  readonly kind = "dev";
  readonly uuid: string;
  readonly metadata: ArtifactMetadata;
  readonly component: string;
  readonly package: string;

  private _pads: DevicePad[] = [];
  private _parts: ManufacturerPart[] = [];
  private _approvals: string[] = [];

  constructor(options: ArtifactMetadata & { uuid: string; component: string; package: string }) {
    const { uuid, component, package: pkg, ...metadata } = options;
    this.uuid = uuid;
    this.metadata = { ...metadata, categories: [...metadata.categories] };
    this.component = component;
    this.package = pkg;
  }

  get name(): string {
    return this.metadata.name;
  }

  get pads(): readonly DevicePad[] {
    return this._pads;
  }

  addPad(pad: DevicePad): this {
    this._pads.push(pad);
    return this;
  }

  addPart(part: ManufacturerPart): this {
    this._parts.push(part);
    return this;
  }

  addApproval(approval: string): this {
    this._approvals.push(approval);
    return this;
  }

  serialize(): string {
    const parts = [`(librepcb_device ${this.uuid}`];
    for (const line of metadataLines(this.metadata)) {
      parts.push(` ${line}`);
    }
    parts.push(` ${refOf("component", this.component)}`);
    parts.push(` ${refOf("package", this.package)}`);
    for (const pad of [...this._pads].sort((a, b) => compareText(a.pad, b.pad))) {
      parts.push(indent(pad.serialize()));
    }
    for (const part of this._parts) {
      parts.push(indent(part.serialize()));
    }
    for (const approval of [...this._approvals].sort(compareText)) {
      parts.push(indent(approval));
    }
    parts.push(")");
    return parts.join("\n");
  }
}
