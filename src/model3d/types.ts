/**
 * Boundary to an external solid-model kernel.
 * All dimensions are in millimeters.
 */

export interface Vec3 {
    x: number;
    y: number;
    z: number;
}

export interface ColorRGBA {
    /** Red 0–1 */
    r: number;
    /** Green 0–1 */
    g: number;
    /** Blue 0–1 */
    b: number;
    /** Alpha 0–1 (default 1) */
    a?: number;
}

/** Axis-aligned box, placed by its center. */
export interface BoxSolid {
    center: Vec3;
    size: Vec3;
}

/**
 * One model under construction. Bodies are added in order and written
 * out as a single STEP file.
 */
export interface SolidAssembly {
    addBody(name: string, color: ColorRGBA, solid: BoxSolid): void;
    export(filePath: string): void;
}

/**
 * The three calls the generator makes into a CAD kernel. No geometry
 * decisions are delegated to it.
 */
export interface SolidModelKernel {
    beginAssembly(name: string): SolidAssembly;
}

/**
 * Parse a hex color string (#RRGGBB or #RGB) to ColorRGBA.
 */
export function parseHexColor(hex: string): ColorRGBA {
    let h = hex.replace(/^#/, "");
    if (h.length === 3) {
        h = h[0] + h[0] + h[1] + h[1] + h[2] + h[2];
    }
    const r = parseInt(h.substring(0, 2), 16) / 255;
    const g = parseInt(h.substring(2, 4), 16) / 255;
    const b = parseInt(h.substring(4, 6), 16) / 255;
    return { r, g, b, a: 1 };
}
