import { ChipPart, chipFootprint, chipPackage, chipVariants } from "../geometry/chip";
import { assertPadClearance } from "../geometry/clearance";
import { STANDARD_VARIANTS } from "../geometry/density";
import { DFN_VARIANTS, DfnPart, dfnFootprint, dfnPackage } from "../geometry/dfn";
import { DIP_VARIANTS, DipPart, dipFootprint, dipPackage } from "../geometry/dip";
import { SmallOutlinePart, smallOutlineFootprint, smallOutlinePackage } from "../geometry/gullwing";
import { QfnPart, qfnFootprint, qfnPackage, solveQfnLayout } from "../geometry/qfn";
import { QuadFlatPart, quadFlatFootprint, quadFlatPackage } from "../geometry/quad";
import { Package } from "../librepcb/Package";
import { AlternativeName, BuildContext, FootprintDecorator, LibraryHeader, buildPackage } from "./common";

// ─── Types ───────────────────────────────────────────────────────────

/** Resolved naming and metadata of one package, plus its family geometry input. */
export interface PackageConfig<P> {
  name: string;
  description: string;
  keywords: string;
  header: LibraryHeader;
  alternativeNames?: AlternativeName[];
  part: P;
}

export interface ChipPackageConfig extends PackageConfig<ChipPart> {
  /** Add a hand-soldering variant after the density variants */
  handSoldering?: boolean;
}

export type SmallOutlinePackageConfig = PackageConfig<SmallOutlinePart>;
export type QuadFlatPackageConfig = PackageConfig<QuadFlatPart>;
export type QfnPackageConfig = PackageConfig<QfnPart>;
export type DfnPackageConfig = PackageConfig<DfnPart>;
export type DipPackageConfig = PackageConfig<DipPart>;

// ─── Builders ────────────────────────────────────────────────────────

type PackageMetadata = Pick<PackageConfig<unknown>, "name" | "description" | "keywords" | "header" | "alternativeNames">;

function metadataOf<P>(config: PackageConfig<P>): PackageMetadata {
  return {
    name: config.name,
    description: config.description,
    keywords: config.keywords,
    header: config.header,
    alternativeNames: config.alternativeNames,
  };
}

export function buildChipPackage(
  config: ChipPackageConfig,
  ctx: BuildContext,
  decorate?: FootprintDecorator<ChipPackageConfig>,
): Package {
  const { part } = config;
  return buildPackage(
    {
      ...metadataOf(config),
      config,
      geometry: chipPackage(part),
      footprints: chipVariants(part, config.handSoldering).map((variant) => ({
        variant,
        geometry: chipFootprint(part, variant),
      })),
      decorate,
    },
    ctx,
  );
}

export function buildSmallOutlinePackage(
  config: SmallOutlinePackageConfig,
  ctx: BuildContext,
  decorate?: FootprintDecorator<SmallOutlinePackageConfig>,
): Package {
  const { part } = config;
  return buildPackage(
    {
      ...metadataOf(config),
      config,
      geometry: smallOutlinePackage(part),
      footprints: STANDARD_VARIANTS.map((variant) => ({
        variant,
        geometry: smallOutlineFootprint(part, variant),
      })),
      decorate,
    },
    ctx,
  );
}

export function buildQuadFlatPackage(
  config: QuadFlatPackageConfig,
  ctx: BuildContext,
  decorate?: FootprintDecorator<QuadFlatPackageConfig>,
): Package {
  const { part } = config;
  return buildPackage(
    {
      ...metadataOf(config),
      config,
      geometry: quadFlatPackage(part),
      footprints: STANDARD_VARIANTS.map((variant) => ({
        variant,
        geometry: quadFlatFootprint(part, variant),
      })),
      decorate,
    },
    ctx,
  );
}

/**
 * QFN packages run the clearance solver once; every variant is then
 * checked pad against pad before anything is built.
 */
export function buildQfnPackage(
  config: QfnPackageConfig,
  ctx: BuildContext,
  decorate?: FootprintDecorator<QfnPackageConfig>,
): Package {
  const { part } = config;
  const layout = solveQfnLayout(part);
  const footprints = STANDARD_VARIANTS.map((variant) => {
    const geometry = qfnFootprint(part, variant, layout);
    assertPadClearance(geometry.pads, config.name);
    return { variant, geometry };
  });
  return buildPackage(
    {
      ...metadataOf(config),
      config,
      geometry: qfnPackage(part, layout),
      footprints,
      decorate,
    },
    ctx,
  );
}

/** DFN packages get a reflow and a hand soldering variant, each checked pad against pad. */
export function buildDfnPackage(
  config: DfnPackageConfig,
  ctx: BuildContext,
  decorate?: FootprintDecorator<DfnPackageConfig>,
): Package {
  const { part } = config;
  const footprints = DFN_VARIANTS.map((variant) => {
    const geometry = dfnFootprint(part, variant);
    assertPadClearance(geometry.pads, config.name);
    return { variant, geometry };
  });
  return buildPackage(
    {
      ...metadataOf(config),
      config,
      geometry: dfnPackage(part),
      footprints,
      decorate,
    },
    ctx,
  );
}

export function buildDipPackage(
  config: DipPackageConfig,
  ctx: BuildContext,
  decorate?: FootprintDecorator<DipPackageConfig>,
): Package {
  const { part } = config;
  return buildPackage(
    {
      ...metadataOf(config),
      config,
      assemblyType: "tht",
      geometry: dipPackage(part),
      footprints: DIP_VARIANTS.map((variant) => ({
        variant,
        geometry: dipFootprint(part, variant),
      })),
      decorate,
    },
    ctx,
  );
}
