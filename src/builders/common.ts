import * as fs from "fs";
import * as path from "path";
import type { FootprintGeometry, FootprintVariant, OutlineGeometry, PackageGeometry, SolidBox } from "../geometry/types";
import { Library } from "../librepcb/Library";
import { AssemblyType, Footprint, Footprint3DModel, FootprintPad, Package, Package3DModel, PackagePad } from "../librepcb/Package";
import { Circle, Hole, Polygon, StrokeText } from "../librepcb/shapes";
import { IdResolver, UuidCache } from "../librepcb/UuidCache";
import { ConfigurationError } from "../errors";
import { SolidModelKernel, parseHexColor } from "../model3d/types";

// ─── Types ───────────────────────────────────────────────────────────

/** Metadata shared by every artifact of one table. */
export interface LibraryHeader {
  author: string;
  version: string;
  /** ISO-8601 timestamp */
  created: string;
  category: string;
  generatedBy: string;
}

/** Everything a builder needs besides the entry itself. */
export interface BuildContext {
  cache: UuidCache;
  library: Library;
  /** Solid bodies are only built when a kernel is given */
  kernel?: SolidModelKernel;
}

/**
 * Per-variant hook run after the standard features are placed. Features
 * it adds get their UUIDs from `ids` like everything else.
 */
export type FootprintDecorator<C> = (config: C, ids: IdResolver, footprint: Footprint) => void;

export interface FootprintDraft {
  variant: FootprintVariant;
  geometry: FootprintGeometry;
}

/** Another name of the package and the standard or vendor using it. */
export interface AlternativeName {
  name: string;
  reference: string;
}

export interface PackageDraft<C> {
  config: C;
  header: LibraryHeader;
  name: string;
  description: string;
  keywords: string;
  alternativeNames?: AlternativeName[];
  /** Defaults to "smt" */
  assemblyType?: AssemblyType;
  geometry: PackageGeometry;
  footprints: FootprintDraft[];
  decorate?: FootprintDecorator<C>;
}

const TEXT_HEIGHT = 1.0;
const TEXT_STROKE_WIDTH = 0.2;

// ─── Templates ───────────────────────────────────────────────────────

export type TemplateParams = Record<string, string | number>;

/**
 * Fill `{key}` placeholders. `{key:.2f}` formats a number with a fixed
 * number of decimals. Unknown keys are configuration errors.
 */
export function fillTemplate(template: string, params: TemplateParams): string {
  return template.replace(/\{(\w+)(?::\.(\d+)f)?\}/g, (_match, key: string, decimals?: string) => {
    const value = params[key];
    if (value === undefined) {
      throw new ConfigurationError(`Unknown placeholder {${key}} in "${template}"`);
    }
    if (decimals !== undefined) {
      if (typeof value !== "number") {
        throw new ConfigurationError(`Placeholder {${key}} is not a number`);
      }
      return value.toFixed(Number(decimals));
    }
    return String(value);
  });
}

/**
 * Plain decimal rendering used in descriptions: integers keep one
 * fractional digit (3 → "3.0"), everything else is printed as is.
 */
export function plainNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function withGeneratorNote(description: string, header: LibraryHeader): string {
  return header.generatedBy ? `${description}\n\nGenerated with ${header.generatedBy}` : description;
}

// ─── Node construction ───────────────────────────────────────────────

export function polygonOf(shape: OutlineGeometry, ids: IdResolver, variantKey: string): Polygon {
  return new Polygon({
    uuid: ids(`${shape.feature}-${variantKey}`),
    layer: shape.layer,
    width: shape.width,
    fill: shape.fill,
    grabArea: shape.grabArea,
    vertices: shape.vertices,
  });
}

/**
 * Build one footprint variant. Pads reuse the UUID of their package pad,
 * and so does the hole of a drilled pad.
 */
export function buildFootprint(
  draft: FootprintDraft,
  ids: IdResolver,
  padUuids: ReadonlyMap<string, string>,
): Footprint {
  const { variant, geometry } = draft;
  const key = variant.key;
  const footprint = new Footprint({ uuid: ids(`footprint-${key}`), name: variant.name });

  for (const pad of geometry.pads) {
    const uuid = padUuids.get(pad.pad);
    if (uuid === undefined) {
      throw new ConfigurationError(`Footprint pad "${pad.pad}" has no package pad`);
    }
    footprint.addPad(
      new FootprintPad({
        uuid,
        packagePad: uuid,
        position: { x: pad.x, y: pad.y },
        width: pad.width,
        height: pad.height,
        radius: pad.radius,
        solderPaste: pad.drill === undefined ? "auto" : "off",
        holes: pad.drill === undefined ? [] : [new Hole(uuid, pad.drill, [{ x: 0, y: 0 }])],
      }),
    );
  }

  for (const shape of [...geometry.documentation, ...geometry.legend]) {
    footprint.addPolygon(polygonOf(shape, ids, key));
  }
  footprint.addPolygon(
    new Polygon({
      uuid: ids(`polygon-courtyard-${key}`),
      layer: "top_courtyard",
      width: 0,
      vertices: geometry.courtyard,
    }),
  );

  for (const circle of geometry.circles) {
    footprint.addCircle(
      new Circle({
        uuid: ids(`${circle.feature}-${key}`),
        layer: circle.layer,
        width: circle.width,
        fill: circle.fill,
        diameter: circle.diameter,
        position: circle.position,
      }),
    );
  }

  footprint.addText(
    new StrokeText({
      uuid: ids(`text-name-${key}`),
      layer: "top_names",
      value: "{{NAME}}",
      align: ["center", "bottom"],
      position: { x: 0, y: geometry.labelY },
      height: TEXT_HEIGHT,
      strokeWidth: TEXT_STROKE_WIDTH,
    }),
  );
  footprint.addText(
    new StrokeText({
      uuid: ids(`text-value-${key}`),
      layer: "top_values",
      value: "{{VALUE}}",
      align: ["center", "top"],
      position: { x: 0, y: -geometry.labelY },
      height: TEXT_HEIGHT,
      strokeWidth: TEXT_STROKE_WIDTH,
    }),
  );
  return footprint;
}

/**
 * Export the solid bodies next to the package file.
 * @returns The UUID of the model.
 */
export function exportModel(
  kernel: SolidModelKernel,
  library: Library,
  packageUuid: string,
  name: string,
  ids: IdResolver,
  bodies: readonly SolidBox[],
): string {
  const modelUuid = ids("3d");
  const assembly = kernel.beginAssembly(name);
  for (const body of bodies) {
    assembly.addBody(body.name, parseHexColor(body.color), { center: body.center, size: body.size });
  }
  const dir = library.elementDir("pkg", packageUuid);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  assembly.export(path.join(dir, `${modelUuid}.step`));
  return modelUuid;
}

/**
 * Assemble a package from its geometry: package pads first, then every
 * footprint variant in the given order.
 */
export function buildPackage<C>(draft: PackageDraft<C>, ctx: BuildContext): Package {
  const padIds = new Set<string>();
  for (const pad of draft.geometry.pads) {
    if (padIds.has(pad.id)) {
      throw new ConfigurationError(`Duplicate pad id "${pad.id}"`, draft.name);
    }
    padIds.add(pad.id);
  }

  const ids = ctx.cache.resolver("pkg", draft.name);
  const { header } = draft;
  const pkg = new Package({
    uuid: ids("pkg"),
    name: draft.name,
    description: withGeneratorNote(draft.description, header),
    keywords: draft.keywords,
    author: header.author,
    version: header.version,
    created: header.created,
    generatedBy: header.generatedBy,
    categories: [header.category],
    assemblyType: draft.assemblyType,
  });
  for (const alternative of draft.alternativeNames ?? []) {
    pkg.addAlternativeName(alternative.name, alternative.reference);
  }

  const padUuids = new Map<string, string>();
  for (const pad of draft.geometry.pads) {
    const uuid = ids(`pad-${pad.id}`);
    padUuids.set(pad.id, uuid);
    pkg.addPad(new PackagePad(uuid, pad.name));
  }

  const modelUuid = ctx.kernel
    ? exportModel(ctx.kernel, ctx.library, pkg.uuid, draft.name, ids, draft.geometry.bodies)
    : undefined;
  if (modelUuid !== undefined) {
    pkg.add3DModel(new Package3DModel(modelUuid, draft.name));
  }

  for (const fpDraft of draft.footprints) {
    const footprint = buildFootprint(fpDraft, ids, padUuids);
    draft.decorate?.(draft.config, ids, footprint);
    if (modelUuid !== undefined) {
      footprint.add3DModel(new Footprint3DModel(modelUuid));
    } else {
      pkg.addApproval(`(approved missing_footprint_3d_model (footprint ${footprint.uuid}))`);
    }
    pkg.addFootprint(footprint);
  }
  return pkg;
}
