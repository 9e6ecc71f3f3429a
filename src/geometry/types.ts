import type { Layer, Point, Vertex } from "../librepcb/shapes";

// ─── Types ───────────────────────────────────────────────────────────

/** One footprint of a package, e.g. a density level or a soldering process. */
export interface FootprintVariant {
  /** Feature-key suffix, part of every UUID cache key of the variant */
  key: string;
  name: string;
}

/**
 * Axis-aligned copper land. `width` runs along x and `height` along y,
 * pads are never rotated.
 */
export interface PadGeometry {
  /** Id of the package pad this land belongs to, e.g. "1" or "p" */
  pad: string;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Corner radius as a fraction of the smaller side */
  radius?: number;
  /** Hole diameter of a through-hole pad; such pads get no solder paste */
  drill?: number;
}

/**
 * Polyline or polygon. `feature` is the UUID cache feature name without
 * the variant suffix, e.g. "polygon-outline".
 */
export interface OutlineGeometry {
  feature: string;
  layer: Layer;
  width: number;
  fill: boolean;
  grabArea: boolean;
  vertices: Vertex[];
}

export interface CircleGeometry {
  feature: string;
  layer: Layer;
  width: number;
  fill: boolean;
  diameter: number;
  position: Point;
}

/** Body or lead box of the 3D model, centered at `center`. */
export interface SolidBox {
  name: string;
  color: string;
  center: { x: number; y: number; z: number };
  size: { x: number; y: number; z: number };
}

/** Everything needed to place one footprint variant. */
export interface FootprintGeometry {
  pads: PadGeometry[];
  /** Filled lead shapes and the body outline on the documentation layer */
  documentation: OutlineGeometry[];
  /** Open silkscreen polylines */
  legend: OutlineGeometry[];
  circles: CircleGeometry[];
  /** Implicitly closed: the first vertex is not repeated */
  courtyard: Point[];
  courtyardExcess: number;
  /** Baseline of the name label (above the body); the value label mirrors it */
  labelY: number;
}

/** A logical pad: `id` feeds the UUID cache key, `name` is what the user sees. */
export interface PadSpec {
  id: string;
  name: string;
}

export interface PackageGeometry {
  /** In package pad order */
  pads: PadSpec[];
  /** Solid bodies of the part, used only when a 3D kernel is present */
  bodies: SolidBox[];
}
