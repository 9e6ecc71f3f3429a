import { compareText, formatFloat, indent } from "./format";
import { ArtifactMetadata, LibraryArtifact, metadataLines } from "./metadata";
import { Circle, Hole, Point, Polygon, StrokeText, positionOf, refOf } from "./shapes";
import { enumValue, float, renderScalar, renderValue, renderValues, str } from "./values";

// ─── Types ───────────────────────────────────────────────────────────

export type PadShape = "roundrect" | "octagon";
export type PadSide = "top" | "bottom";
export type PadFunction = "unspecified" | "standard" | "thermal" | "test";
export type AssemblyType = "none" | "tht" | "smt" | "mixed" | "other" | "auto";
export type SolderPaste = "auto" | "off";

export interface FootprintPadOptions {
    uuid: string;
    packagePad: string;
    position: Point;
    width: number;
    height: number;
    rotation?: number;
    side?: PadSide;
    shape?: PadShape;
    /** Corner radius as a fraction of the smaller side, 0 for plain rectangles */
    radius?: number;
    function?: PadFunction;
    solderPaste?: SolderPaste;
    holes?: Hole[];
}

// ─── Package pad ─────────────────────────────────────────────────────

export class PackagePad {
    constructor(public readonly uuid: string, public readonly name: string) {}

    public serialize(): string {
        return `(pad ${this.uuid} ${renderValue(str("name", this.name))})`;
    }
}

// ─── Footprint pad ───────────────────────────────────────────────────

export class FootprintPad {
    public readonly uuid: string;
    /** UUID of the {@link PackagePad} this pad connects to */
    public readonly packagePad: string;
    public readonly position: Point;
    public readonly width: number;
    public readonly height: number;
    public readonly rotation: number;
    public readonly side: PadSide;
    public readonly shape: PadShape;
    public readonly radius: number;
    public readonly function: PadFunction;
    public readonly solderPaste: SolderPaste;
    private _holes: Hole[];

    constructor(options: FootprintPadOptions) {
        this.uuid = options.uuid;
        this.packagePad = options.packagePad;
        this.position = { x: options.position.x, y: options.position.y };
        this.width = options.width;
        this.height = options.height;
        this.rotation = options.rotation ?? 0;
        this.side = options.side ?? "top";
        this.shape = options.shape ?? "roundrect";
        this.radius = options.radius ?? 0;
        this.function = options.function ?? "unspecified";
        this.solderPaste = options.solderPaste ?? "auto";
        this._holes = [...(options.holes ?? [])];
    }

    get holes(): readonly Hole[] {
        return this._holes;
    }

    public serialize(): string {
        const parts: string[] = [];
        parts.push(
            `(pad ${this.uuid} ${renderValues(enumValue("side", this.side), enumValue("shape", this.shape))}`,
        );
        parts.push(
            ` ${positionOf(this.position)} ${renderValue(float("rotation", this.rotation))}` +
                ` (size ${formatFloat(this.width)} ${formatFloat(this.height)})` +
                ` ${renderValue(float("radius", this.radius))}`,
        );
        parts.push(
            ` (stop_mask auto) ${renderValue(enumValue("solder_paste", this.solderPaste))}` +
                ` ${renderValue(float("clearance", 0))}` +
                ` ${renderValue(enumValue("function", this.function))}`,
        );
        parts.push(` ${refOf("package_pad", this.packagePad)}`);
        for (const hole of this._holes) {
            parts.push(indent(hole.serialize()));
        }
        parts.push(")");
        return parts.join("\n");
    }
}

// ─── 3D model references ─────────────────────────────────────────────

export class Package3DModel {
    constructor(public readonly uuid: string, public readonly name: string) {}

    public serialize(): string {
        return `(3d_model ${this.uuid} ${renderValue(str("name", this.name))})`;
    }
}

export class Footprint3DModel {
    constructor(public readonly uuid: string) {}

    public serialize(): string {
        return `(3d_model ${this.uuid})`;
    }
}

// ─── Footprint ───────────────────────────────────────────────────────

/**
 * One land pattern variant of a package.
 *
 * Children serialize grouped by type. Pads, polygons, circles, texts and
 * holes keep insertion order; 3D model references are sorted by UUID.
 */
export class Footprint {
    public readonly uuid: string;
    public readonly name: string;
    public readonly description: string;

    private _pads: FootprintPad[] = [];
    private _polygons: Polygon[] = [];
    private _circles: Circle[] = [];
    private _texts: StrokeText[] = [];
    private _holes: Hole[] = [];
    private _models3d: Footprint3DModel[] = [];

    constructor(options: { uuid: string; name: string; description?: string }) {
        this.uuid = options.uuid;
        this.name = options.name;
        this.description = options.description ?? "";
    }

    // ── Builder methods ────────────────────────────────────────────────

    public addPad(pad: FootprintPad): this {
        this._pads.push(pad);
        return this;
    }

    public addPolygon(polygon: Polygon): this {
        this._polygons.push(polygon);
        return this;
    }

    public addCircle(circle: Circle): this {
        this._circles.push(circle);
        return this;
    }

    public addText(text: StrokeText): this {
        this._texts.push(text);
        return this;
    }

    public addHole(hole: Hole): this {
        this._holes.push(hole);
        return this;
    }

    public add3DModel(model: Footprint3DModel): this {
        this._models3d.push(model);
        return this;
    }

    get pads(): readonly FootprintPad[] {
        return this._pads;
    }

    get polygons(): readonly Polygon[] {
        return this._polygons;
    }

    get circles(): readonly Circle[] {
        return this._circles;
    }

    get texts(): readonly StrokeText[] {
        return this._texts;
    }

    get holes(): readonly Hole[] {
        return this._holes;
    }

    // ── Serialization ──────────────────────────────────────────────────

    public serialize(): string {
        const parts: string[] = [];
        parts.push(`(footprint ${this.uuid}`);
        parts.push(` ${renderValue(str("name", this.name))}`);
        parts.push(` ${renderValue(str("description", this.description))}`);
        parts.push(" (3d_position 0.0 0.0 0.0) (3d_rotation 0.0 0.0 0.0)");

        const models = [...this._models3d].sort((a, b) => compareText(a.uuid, b.uuid));
        for (const child of [
            ...models,
            ...this._pads,
            ...this._polygons,
            ...this._circles,
            ...this._texts,
            ...this._holes,
        ]) {
            parts.push(indent(child.serialize()));
        }
        parts.push(")");
        return parts.join("\n");
    }
}

// ─── Package ─────────────────────────────────────────────────────────

/**
 * A LibrePCB package: metadata, the logical pads and one or more footprints.
 *
 * @example
 * ```ts
 * const pkg = new Package({ uuid, name: "RESC1005X40", ...meta });
 * pkg.addPad(new PackagePad(padUuid, "1"));
 * pkg.addFootprint(footprint);
 * fs.writeFileSync("package.lp", pkg.serialize() + "\n");
 * ```
 */
export class Package implements LibraryArtifact {
    public readonly kind = "pkg";
    public readonly uuid: string;
    public readonly metadata: ArtifactMetadata;
    public readonly assemblyType: AssemblyType;

    private _pads: PackagePad[] = [];
    private _models3d: Package3DModel[] = [];
    private _footprints: Footprint[] = [];
    private _approvals: string[] = [];
    private _alternativeNames: Array<{ name: string; reference: string }> = [];

    constructor(options: ArtifactMetadata & { uuid: string; assemblyType?: AssemblyType }) {
        const { uuid, assemblyType, ...metadata } = options;
        this.uuid = uuid;
        this.metadata = { ...metadata, categories: [...metadata.categories] };
        this.assemblyType = assemblyType ?? "smt";
    }

    get name(): string {
        return this.metadata.name;
    }

    // ── Builder methods ────────────────────────────────────────────────

    public addPad(pad: PackagePad): this {
        this._pads.push(pad);
        return this;
    }

    public add3DModel(model: Package3DModel): this {
        this._models3d.push(model);
        return this;
    }

    public addFootprint(footprint: Footprint): this {
        this._footprints.push(footprint);
        return this;
    }

    /** Add an approval S-expression, e.g. `(approved missing_footprint_3d_model)` */
    public addApproval(approval: string): this {
        this._approvals.push(approval);
        return this;
    }

    public addAlternativeName(name: string, reference: string): this {
        this._alternativeNames.push({ name, reference });
        return this;
    }

    get pads(): readonly PackagePad[] {
        return this._pads;
    }

    get footprints(): readonly Footprint[] {
        return this._footprints;
    }

    get models3d(): readonly Package3DModel[] {
        return this._models3d;
    }

    // ── Serialization ──────────────────────────────────────────────────

    public serialize(): string {
        const parts: string[] = [];
        parts.push(`(librepcb_package ${this.uuid}`);
        for (const line of metadataLines(this.metadata)) {
            parts.push(` ${line}`);
        }
        for (const alt of this._alternativeNames) {
            parts.push(
                ` (alternative_name ${renderScalar(str("name", alt.name))} ${renderValue(str("reference", alt.reference))})`,
            );
        }
        parts.push(` ${renderValue(enumValue("assembly_type", this.assemblyType))}`);
        for (const child of [...this._pads, ...this._models3d, ...this._footprints]) {
            parts.push(indent(child.serialize()));
        }
        for (const approval of [...this._approvals].sort(compareText)) {
            parts.push(indent(approval));
        }
        parts.push(")");
        return parts.join("\n");
    }
}
