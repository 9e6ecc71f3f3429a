import { formatFloat } from "./format";
import { bool, enumValue, float, renderValue, renderValues, str, uuidRef } from "./values";

// ─── Types ───────────────────────────────────────────────────────────

export type Layer =
    | "top_documentation"
    | "top_legend"
    | "top_names"
    | "top_values"
    | "top_courtyard"
    | "top_hidden_grab_areas"
    | "top_stop_mask"
    | "top_solder_paste"
    | "sym_outlines"
    | "sym_names"
    | "sym_values";

export type HAlign = "left" | "center" | "right";
export type VAlign = "top" | "center" | "bottom";

export interface Point {
    x: number;
    y: number;
}

/** Polygon corner; `angle` bends the segment towards the next vertex. */
export interface Vertex extends Point {
    angle?: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────

/** `(position x y)` */
export function positionOf(point: Point): string {
    return `(position ${formatFloat(point.x)} ${formatFloat(point.y)})`;
}

export function vertexOf(point: Point, angle = 0): string {
    return `(vertex ${positionOf(point)} ${renderValue(float("angle", angle))})`;
}

// ─── Shapes ──────────────────────────────────────────────────────────

export interface PolygonOptions {
    uuid: string;
    layer: Layer;
    width: number;
    fill?: boolean;
    grabArea?: boolean;
    vertices?: Vertex[];
}

/**
 * A polyline or polygon. A closed outline repeats its first vertex;
 * courtyards do not, they are closed implicitly.
 */
export class Polygon {
    public readonly uuid: string;
    public readonly layer: Layer;
    public readonly width: number;
    public readonly fill: boolean;
    public readonly grabArea: boolean;
    private _vertices: Vertex[];

    constructor(options: PolygonOptions) {
        this.uuid = options.uuid;
        this.layer = options.layer;
        this.width = options.width;
        this.fill = options.fill ?? false;
        this.grabArea = options.grabArea ?? false;
        this._vertices = [...(options.vertices ?? [])];
    }

    get vertices(): readonly Vertex[] {
        return this._vertices;
    }

    public addVertex(vertex: Vertex): this {
        this._vertices.push({ ...vertex });
        return this;
    }

    public serialize(): string {
        const parts: string[] = [];
        parts.push(`(polygon ${this.uuid} ${renderValue(enumValue("layer", this.layer))}`);
        parts.push(
            ` ${renderValues(float("width", this.width), bool("fill", this.fill), bool("grab_area", this.grabArea))}`,
        );
        for (const v of this._vertices) {
            parts.push(` ${vertexOf(v, v.angle)}`);
        }
        parts.push(")");
        return parts.join("\n");
    }
}

export interface CircleOptions {
    uuid: string;
    layer: Layer;
    width: number;
    diameter: number;
    position: Point;
    fill?: boolean;
    grabArea?: boolean;
}

export class Circle {
    constructor(public readonly options: CircleOptions) {}

    get uuid(): string {
        return this.options.uuid;
    }

    public serialize(): string {
        const o = this.options;
        return [
            `(circle ${o.uuid} ${renderValue(enumValue("layer", o.layer))}`,
            ` ${renderValues(
                float("width", o.width),
                bool("fill", o.fill ?? false),
                bool("grab_area", o.grabArea ?? false),
                float("diameter", o.diameter),
            )} ${positionOf(o.position)}`,
            ")",
        ].join("\n");
    }
}

export interface StrokeTextOptions {
    uuid: string;
    layer: Layer;
    value: string;
    position: Point;
    align: [HAlign, VAlign];
    height?: number;
    strokeWidth?: number;
    rotation?: number;
    autoRotate?: boolean;
    mirror?: boolean;
}

export class StrokeText {
    constructor(public readonly options: StrokeTextOptions) {}

    get uuid(): string {
        return this.options.uuid;
    }

    get position(): Point {
        return this.options.position;
    }

    public serialize(): string {
        const o = this.options;
        return [
            `(stroke_text ${o.uuid} ${renderValue(enumValue("layer", o.layer))}`,
            ` ${renderValues(float("height", o.height ?? 1.0), float("stroke_width", o.strokeWidth ?? 0.2))}` +
                " (letter_spacing auto) (line_spacing auto)",
            ` (align ${o.align[0]} ${o.align[1]}) ${positionOf(o.position)} ${renderValue(float("rotation", o.rotation ?? 0))}`,
            ` ${renderValues(bool("auto_rotate", o.autoRotate ?? true), bool("mirror", o.mirror ?? false), str("value", o.value))}`,
            ")",
        ].join("\n");
    }
}

/** A drilled hole, either a round hole (one vertex) or a slot. */
export class Hole {
    private _vertices: Point[];

    constructor(
        public readonly uuid: string,
        public readonly diameter: number,
        vertices: Point[],
        public readonly stopMask: "auto" | "off" = "auto",
    ) {
        this._vertices = [...vertices];
    }

    get vertices(): readonly Point[] {
        return this._vertices;
    }

    public serialize(): string {
        const parts = [
            `(hole ${this.uuid} ${renderValue(float("diameter", this.diameter))}`,
            ` ${renderValue(enumValue("stop_mask", this.stopMask))}`,
        ];
        for (const v of this._vertices) {
            parts.push(` ${vertexOf(v)}`);
        }
        parts.push(")");
        return parts.join("\n");
    }
}

/** `(name <uuid>)` */
export function refOf(name: string, uuid: string): string {
    return renderValue(uuidRef(name, uuid));
}
