/**
 * LibrePCB Parts Generator
 *
 * Parametric symbols, packages, components and devices for LibrePCB libraries,
 * with UUIDs that stay stable across regenerations.
 */

// Errors
export { GeneratorError, ConfigurationError, GeometryError } from "./errors";

// Node model and output
export { UuidCache, cacheKey } from "./librepcb/UuidCache";
export type { IdResolver } from "./librepcb/UuidCache";
export { Library } from "./librepcb/Library";
export { Package, PackagePad, Footprint, FootprintPad, Package3DModel, Footprint3DModel } from "./librepcb/Package";
export { Component, Signal, Gate, Variant, PinSignalMap } from "./librepcb/Component";
export { Device, DevicePad, ManufacturerPart } from "./librepcb/Device";
export { SchematicSymbol, SymbolPin, SymbolText } from "./librepcb/Symbol";
export { Polygon, Circle, StrokeText, Hole } from "./librepcb/shapes";
export type { Layer, Point, Vertex } from "./librepcb/shapes";
export { formatFloat, escapeString, formatIpcDimension } from "./librepcb/format";

// Geometry
export { DENSITY_VARIANTS, STANDARD_VARIANTS } from "./geometry/density";
export type { DensityLevel, DensityVariant } from "./geometry/density";
export { solveQfnLayout, qfnFootprint } from "./geometry/qfn";
export type { QfnPart, QfnLayout } from "./geometry/qfn";
export { DFN_VARIANTS, dfnLands, dfnFootprint } from "./geometry/dfn";
export type { DfnPart, DfnVariant } from "./geometry/dfn";
export { DIP_VARIANTS, dipFootprint } from "./geometry/dip";
export type { DipPart, DipVariant } from "./geometry/dip";
export { minimumClearance, assertPadClearance, MIN_PAD_CLEARANCE } from "./geometry/clearance";

// Builders
export {
  buildChipPackage,
  buildSmallOutlinePackage,
  buildQuadFlatPackage,
  buildQfnPackage,
  buildDfnPackage,
  buildDipPackage,
} from "./builders/packages";
export type {
  ChipPackageConfig,
  SmallOutlinePackageConfig,
  QuadFlatPackageConfig,
  QfnPackageConfig,
  DfnPackageConfig,
  DipPackageConfig,
} from "./builders/packages";
export { buildSymbol, symbolLayout, SYMBOL_GRID } from "./builders/symbol";
export type { SymbolConfig, SymbolPinConfig, PinSide } from "./builders/symbol";
export { buildComponent } from "./builders/component";
export { buildDevice } from "./builders/device";
export { runBatch } from "./builders/batch";
export type { BatchItem, BatchResult } from "./builders/batch";
export { generateLibrary } from "./builders/generate";
export type { AlternativeName, BuildContext, FootprintDecorator, LibraryHeader } from "./builders/common";

// Families
export { FAMILIES, findFamily } from "./families";
export type { Family, FamilyName } from "./families";

// 3D model boundary
export type { SolidModelKernel, SolidAssembly, BoxSolid, ColorRGBA, Vec3 } from "./model3d/types";
