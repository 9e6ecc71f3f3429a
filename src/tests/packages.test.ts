import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { BuildContext, FootprintDecorator, LibraryHeader, buildPackage } from "../builders/common";
import { ChipPackageConfig, buildChipPackage, buildDfnPackage, buildDipPackage, buildQfnPackage } from "../builders/packages";
import { ChipEntrySchema, ChipGroupSchema, chipConfig, chipSizeMetric } from "../families/chip";
import { DfnEntrySchema, DfnGroupSchema, dfnConfig } from "../families/dfn";
import { DipEntrySchema, DipGroupSchema, dipConfig, dipName } from "../families/dip";
import { ChipPart, chipFootprint, chipLand, chipVariants } from "../geometry/chip";
import { containsWithMargin, featureBounds, pointsBounds } from "../geometry/bounds";
import { DENSITY_VARIANTS, STANDARD_VARIANTS } from "../geometry/density";
import { DFN_VARIANTS, DfnPart, dfnFootprint, dfnLands } from "../geometry/dfn";
import { DIP_VARIANTS, dipFootprint } from "../geometry/dip";
import { smallOutlineFootprint } from "../geometry/gullwing";
import { qfnFootprint } from "../geometry/qfn";
import { quadFlatFootprint } from "../geometry/quad";
import type { FootprintGeometry } from "../geometry/types";
import { Library } from "../librepcb/Library";
import { Circle } from "../librepcb/shapes";
import { UuidCache } from "../librepcb/UuidCache";
import type { BoxSolid, ColorRGBA, SolidAssembly, SolidModelKernel } from "../model3d/types";
import { ConfigurationError, GeometryError } from "../errors";

const HEADER: LibraryHeader = {
  author: "test-author",
  version: "0.1",
  created: "2019-11-18T21:56:00Z",
  category: "00000000-0000-4000-8000-000000000001",
  generatedBy: "test-generator",
};

const TANTALUM_GROUP = ChipGroupSchema.parse({
  name: "CAPPM{length_ipc}X{width_ipc}X{height_ipc}L{lead_length_ipc}X{lead_width_ipc}",
  description: "Molded capacitor (EIA {eia}).\n\nLength: {length}mm",
  keywords: "c,capacitor,{eia}",
  polarization: { marked: { id: "p", name: "+" }, unmarked: { id: "n", name: "-" } },
});

const TANTALUM_3216 = ChipEntrySchema.parse({
  length: 3.2,
  width: 1.6,
  height: 1.0,
  lead_length: 0.8,
  lead_width: 1.2,
  lands: { A: [2.2, 1.35, 0.62], B: [1.8, 1.23, 0.82], C: [1.42, 1.13, 0.98] },
  meta: { eia: "3216-10" },
});

const MLCC_GROUP = ChipGroupSchema.parse({
  name: "CAPC{size_metric} ({size_imperial})",
  description: "Chip capacitor {size_metric}",
  hand_soldering: true,
});

const MLCC_0402 = ChipEntrySchema.parse({ size_imperial: "0402", length: 1.0, width: 0.5, height: 0.55, gap: 0.5 });

let tmpDir: string;
let ctx: BuildContext;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "packages-"));
  ctx = { cache: new UuidCache(), library: new Library(tmpDir) };
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ─── Naming ──────────────────────────────────────────────────────────

describe("chipConfig", () => {
  it("fills the IPC name of a molded part", () => {
    const config = chipConfig(TANTALUM_GROUP, TANTALUM_3216, HEADER);
    expect(config.name).toBe("CAPPM320X160X100L80X120");
    expect(config.description).toBe("Molded capacitor (EIA 3216-10).\n\nLength: 3.2mm");
    expect(config.keywords).toBe("3216,c,capacitor,3216-10");
  });

  it("derives the metric size code", () => {
    expect(chipSizeMetric(0.4, 0.2)).toBe("0402");
    expect(chipSizeMetric(11.56, 6.98)).toBe("11569");
    const config = chipConfig(MLCC_GROUP, MLCC_0402, HEADER);
    expect(config.name).toBe("CAPC1005 (0402)");
    expect(config.keywords).toBe("1005,0402");
  });

  it("rejects parts with both gap and lands", () => {
    const config = chipConfig(TANTALUM_GROUP, { ...TANTALUM_3216, gap: 1.0 }, HEADER);
    expect(() => buildChipPackage(config, ctx)).toThrow("Only set either lands or gap, but not both");
  });

  it("rejects a gap that is not smaller than the body", () => {
    const entry = ChipEntrySchema.parse({ length: 1.0, width: 0.5, height: 0.35, gap: 1.6 });
    const config = chipConfig(MLCC_GROUP, entry, HEADER);
    expect(() => buildChipPackage(config, ctx)).toThrow(ConfigurationError);
    expect(() => buildChipPackage(config, ctx)).toThrow("Gap 1.6 mm must be smaller than the body length 1 mm");
    expect(ctx.cache.size).toBe(0);
  });

  it("rejects explicit lands wider apart than the body", () => {
    const config = chipConfig(TANTALUM_GROUP, { ...TANTALUM_3216, lands: { B: [1.8, 1.23, 3.5] } }, HEADER);
    expect(() => buildChipPackage(config, ctx)).toThrow(
      "Pad gap 3.5 mm of density level B must be smaller than the body length 3.2 mm",
    );
  });

  it("rejects polarization pads that share an id", () => {
    const result = ChipGroupSchema.safeParse({
      name: "CAPPM",
      description: "",
      polarization: { marked: { id: "p", name: "+" }, unmarked: { id: "p", name: "-" } },
    });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => [issue.path.join("."), issue.message])).toEqual([
      ["polarization.unmarked.id", "Marked and unmarked pad need different ids"],
    ]);
  });
});

describe("chipLand", () => {
  it("refuses to produce empty pads", () => {
    const part: ChipPart = { body: { length: 1.0, width: 0.5, height: 0.35 }, gap: 1.6 };
    const variant = { ...DENSITY_VARIANTS.B, handSoldering: false };
    // (1.0 - 1.6) / 2 + 0.1 toe
    expect(() => chipLand(part, variant)).toThrow(GeometryError);
    expect(() => chipLand(part, variant)).toThrow("Pad size -0.200 x 0.500 mm of variant density~b is not positive");
  });
});

describe("buildPackage", () => {
  it("rejects repeated pad ids before minting any UUID", () => {
    const draft = {
      config: null,
      header: HEADER,
      name: "TEST-DUP",
      description: "",
      keywords: "",
      geometry: {
        pads: [
          { id: "1", name: "1" },
          { id: "1", name: "2" },
        ],
        bodies: [],
      },
      footprints: [],
    };
    expect(() => buildPackage(draft, ctx)).toThrow('TEST-DUP: Duplicate pad id "1"');
    expect(ctx.cache.size).toBe(0);
  });
});

// ─── Two-pin polarized part ──────────────────────────────────────────

describe("polarized chip package", () => {
  it("has two package pads and two matching pads per footprint", () => {
    const pkg = buildChipPackage(chipConfig(TANTALUM_GROUP, TANTALUM_3216, HEADER), ctx);

    expect(pkg.pads.map((pad) => pad.name)).toEqual(["+", "-"]);
    expect(pkg.footprints.map((fp) => fp.name)).toEqual([
      "Density Level B (median protrusion)",
      "Density Level A (max protrusion)",
      "Density Level C (min protrusion)",
    ]);
    const padUuids = pkg.pads.map((pad) => pad.uuid);
    for (const footprint of pkg.footprints) {
      expect(footprint.pads).toHaveLength(2);
      expect(footprint.pads.map((pad) => pad.uuid)).toEqual(padUuids);
      expect(footprint.pads.map((pad) => pad.packagePad)).toEqual(padUuids);
    }
  });

  it("puts the marked pad on the left", () => {
    const pkg = buildChipPackage(chipConfig(TANTALUM_GROUP, TANTALUM_3216, HEADER), ctx);
    const [plus, minus] = pkg.footprints[0].pads;
    expect(plus.position.x).toBeCloseTo(-1.31, 9);
    expect(minus.position.x).toBeCloseTo(1.31, 9);
    expect(plus.width).toBe(1.8);
    expect(plus.height).toBe(1.23);
  });

  it("reuses every UUID on a second build from the same cache", () => {
    const config = chipConfig(TANTALUM_GROUP, TANTALUM_3216, HEADER);
    const first = buildChipPackage(config, ctx).serialize();
    const second = buildChipPackage(config, ctx).serialize();
    expect(second).toBe(first);
  });

  it("approves the missing 3D model of each footprint", () => {
    const pkg = buildChipPackage(chipConfig(TANTALUM_GROUP, TANTALUM_3216, HEADER), ctx);
    const text = pkg.serialize();
    for (const footprint of pkg.footprints) {
      expect(text).toContain(` (approved missing_footprint_3d_model (footprint ${footprint.uuid}))`);
    }
    expect(text).toContain(' (description "Molded capacitor (EIA 3216-10).\\n\\nLength: 3.2mm\\n\\nGenerated with test-generator")');
  });
});

// ─── Variants ────────────────────────────────────────────────────────

describe("chip variants", () => {
  it("appends a hand soldering variant with a longer toe", () => {
    const pkg = buildChipPackage(chipConfig(MLCC_GROUP, MLCC_0402, HEADER), ctx);
    expect(pkg.footprints.map((fp) => fp.name)).toEqual([
      "Density Level B (median protrusion)",
      "Density Level A (max protrusion)",
      "Hand Soldering",
    ]);
    // (1.0 - 0.5) / 2 + 0.1 toe, plus 0.5 for hand soldering
    expect(pkg.footprints[0].pads[0].width).toBeCloseTo(0.35, 9);
    expect(pkg.footprints[2].pads[0].width).toBeCloseTo(0.85, 9);
  });

  it("uses separate UUIDs per variant", () => {
    const pkg = buildChipPackage(chipConfig(MLCC_GROUP, MLCC_0402, HEADER), ctx);
    const uuids = new Set(pkg.footprints.map((fp) => fp.uuid));
    expect(uuids.size).toBe(3);
    expect(ctx.cache.lookup("pkg-capc1005~(0402)-footprint-handsoldering")).toBe(pkg.footprints[2].uuid);
  });
});

// ─── Courtyard ───────────────────────────────────────────────────────

describe("courtyard containment", () => {
  function expectContained(geometry: FootprintGeometry): void {
    const courtyard = pointsBounds(geometry.courtyard);
    const features = featureBounds(geometry.pads, geometry.documentation);
    expect(containsWithMargin(courtyard, features, geometry.courtyardExcess)).toBe(true);
  }

  it("holds for chips", () => {
    for (const entry of [TANTALUM_3216, MLCC_0402]) {
      const part = chipConfig(entry === MLCC_0402 ? MLCC_GROUP : TANTALUM_GROUP, entry, HEADER).part;
      for (const variant of chipVariants(part, true)) {
        expectContained(chipFootprint(part, variant));
      }
    }
  });

  it("holds for small outline, quad flat and no-lead packages", () => {
    for (const variant of STANDARD_VARIANTS) {
      expectContained(
        smallOutlineFootprint(
          {
            pinCount: 8,
            pitch: 1.27,
            bodyLength: 4.9,
            bodyWidth: 3.9,
            totalWidth: 6.0,
            height: 1.75,
            leadWidth: 0.45,
            leadContactLength: 0.835,
          },
          variant,
        ),
      );
      expectContained(
        quadFlatFootprint(
          {
            bodySizeX: 7.0,
            bodySizeY: 7.0,
            pitch: 0.5,
            leadCount: 48,
            leadSpanX: 9.0,
            leadSpanY: 9.0,
            leadWidth: 0.22,
            heightNom: 1.4,
            heightMax: 1.6,
          },
          variant,
        ),
      );
      expectContained(
        qfnFootprint(
          {
            variation: "VGGD-8",
            height: 1.0,
            pitch: 0.5,
            bodyX: 4.0,
            bodyY: 4.0,
            exposedX: 2.8,
            exposedY: 2.8,
            leadLength: 0.5,
            pinsX: 6,
            pinsY: 6,
          },
          variant,
        ),
      );
    }
  });

  it("writes the courtyard as four implicitly closed vertices", () => {
    const pkg = buildChipPackage(chipConfig(MLCC_GROUP, MLCC_0402, HEADER), ctx);
    const courtyard = pkg.footprints[0].polygons.find((polygon) => polygon.layer === "top_courtyard");
    expect(courtyard?.vertices).toHaveLength(4);
  });
});

// ─── Decorator hook ──────────────────────────────────────────────────

describe("footprint decorator", () => {
  it("runs once per variant after the standard features", () => {
    const seen: string[] = [];
    const decorate: FootprintDecorator<ChipPackageConfig> = (config, ids, footprint) => {
      seen.push(`${config.name}/${footprint.name}`);
      footprint.addCircle(
        new Circle({
          uuid: ids(`circle-marker-${footprint.uuid}`),
          layer: "top_documentation",
          width: 0.1,
          diameter: 0.3,
          position: { x: 0, y: 0 },
        }),
      );
    };

    const pkg = buildChipPackage(chipConfig(MLCC_GROUP, MLCC_0402, HEADER), ctx, decorate);

    expect(seen).toEqual([
      "CAPC1005 (0402)/Density Level B (median protrusion)",
      "CAPC1005 (0402)/Density Level A (max protrusion)",
      "CAPC1005 (0402)/Hand Soldering",
    ]);
    for (const footprint of pkg.footprints) {
      expect(footprint.circles).toHaveLength(1);
      expect(ctx.cache.lookup(`pkg-capc1005~(0402)-circle-marker-${footprint.uuid}`)).toBe(footprint.circles[0].uuid);
    }
  });
});

// ─── 3D models ───────────────────────────────────────────────────────

interface RecordedBody {
  name: string;
  color: ColorRGBA;
  solid: BoxSolid;
}

class FakeKernel implements SolidModelKernel {
  readonly assemblies: Array<{ name: string; bodies: RecordedBody[]; file?: string }> = [];

  beginAssembly(name: string): SolidAssembly {
    const record: { name: string; bodies: RecordedBody[]; file?: string } = { name, bodies: [] };
    this.assemblies.push(record);
    return {
      addBody: (bodyName, color, solid) => {
        record.bodies.push({ name: bodyName, color, solid });
      },
      export: (filePath) => {
        record.file = filePath;
        fs.writeFileSync(filePath, "ISO-10303-21;\n");
      },
    };
  }
}

describe("3D models", () => {
  it("exports one model per package and links it from every footprint", () => {
    const kernel = new FakeKernel();
    const pkg = buildChipPackage(chipConfig(TANTALUM_GROUP, TANTALUM_3216, HEADER), { ...ctx, kernel });

    expect(kernel.assemblies).toHaveLength(1);
    const [assembly] = kernel.assemblies;
    expect(assembly.name).toBe("CAPPM320X160X100L80X120");
    expect(assembly.bodies.map((body) => body.name)).toEqual(["body", "lead-1", "lead-2"]);
    expect(assembly.bodies[0].color).toEqual({ r: 200 / 255, g: 155 / 255, b: 38 / 255, a: 1 });

    expect(pkg.models3d).toHaveLength(1);
    const modelUuid = pkg.models3d[0].uuid;
    expect(assembly.file).toBe(path.join(tmpDir, "pkg", pkg.uuid, `${modelUuid}.step`));
    expect(fs.existsSync(path.join(tmpDir, "pkg", pkg.uuid, `${modelUuid}.step`))).toBe(true);

    const text = pkg.serialize();
    expect(text).not.toContain("approved");
    for (const footprint of pkg.footprints) {
      expect(footprint.serialize()).toContain(` (3d_model ${modelUuid})`);
    }
  });
});

// ─── QFN builder ─────────────────────────────────────────────────────

describe("buildQfnPackage", () => {
  it("adds the exposed pad to every footprint", () => {
    const pkg = buildQfnPackage(
      {
        name: "VQFN65P300X300X100-8-VEEC-3",
        description: "",
        keywords: "",
        header: HEADER,
        part: {
          variation: "VEEC-3",
          height: 1.0,
          pitch: 0.65,
          bodyX: 3.0,
          bodyY: 3.0,
          exposedX: 1.8,
          exposedY: 1.8,
          leadLength: 0.5,
          pinsX: 2,
          pinsY: 2,
        },
      },
      ctx,
    );
    expect(pkg.pads).toHaveLength(9);
    expect(pkg.footprints).toHaveLength(3);
    for (const footprint of pkg.footprints) {
      const epad = footprint.pads[8];
      expect(epad.uuid).toBe(pkg.pads[8].uuid);
      expect(epad.width).toBe(1.7);
    }
  });
});

// ─── DFN ─────────────────────────────────────────────────────────────

const DFN_GROUP = DfnGroupSchema.parse({ standard: "MO-229F", keywords: "dfn,mo-229f" });

const DFN_2020 = DfnEntrySchema.parse({
  variation: "V2020D-2",
  length: 2.0,
  width: 2.0,
  pitch: 0.5,
  pins: 6,
  height: 0.95,
  lead_length: 0.55,
  exposed: [1.2, 0.6],
});

describe("dfnConfig", () => {
  it("names the package with and without exposed pad", () => {
    expect(dfnConfig(DFN_GROUP, DFN_2020, true, HEADER).name).toBe("DFN50P200X200X95-6T120X60");
    const plain = dfnConfig(DFN_GROUP, DFN_2020, false, HEADER);
    expect(plain.name).toBe("DFN50P200X200X95-6");
    expect(plain.description).toBe(
      "6-pin Dual Flat No-Lead package (DFN), standardized by JEDEC MO-229F.\n\n" +
        "Pitch: 0.50 mm\nNominal width: 2.00 mm\nNominal length: 2.00 mm\nHeight: 0.95mm",
    );
    expect(plain.keywords).toBe("dfn6,dfn,mo-229f");
    expect(plain.part.exposed).toBeUndefined();
  });

  it("uses a single size for a square exposed pad and adds the lead length on request", () => {
    const exposed: [number, number] = [1.6, 1.6];
    const entry = { ...DFN_2020, pins: 10, exposed, print_pad: true };
    expect(dfnConfig(DFN_GROUP, entry, true, HEADER).name).toBe("DFN50P200X200X95-10P55T160");
  });

  it("looks up the lead width by pitch", () => {
    expect(dfnConfig(DFN_GROUP, DFN_2020, false, HEADER).part.leadWidth).toBe(0.3);
    expect(() => dfnConfig(DFN_GROUP, { ...DFN_2020, pitch: 0.3 }, false, HEADER)).toThrow("Unhandled pitch: 0.3");
  });

  it("rejects an odd pin count", () => {
    const result = DfnEntrySchema.safeParse({ ...DFN_2020, pins: 7 });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => [issue.path.join("."), issue.message])).toEqual([
      ["pins", "Pin count must be even"],
    ]);
  });
});

describe("dfnLands", () => {
  const part: DfnPart = dfnConfig(DFN_GROUP, DFN_2020, true, HEADER).part;

  it("moves pads and exposed pad apart to the minimum clearance", () => {
    // 1.0 - 0.55 - 0.3 = 0.15 mm apart before
    const lands = dfnLands(part, DFN_VARIANTS[0]);
    expect(lands.padLength).toBeCloseTo(0.825, 9);
    expect(lands.padX).toBeCloseTo(0.8875, 9);
    expect(lands.exposedLength).toBeCloseTo(0.55, 9);
    expect(lands.padX - lands.padLength / 2 - lands.exposedLength / 2).toBeCloseTo(0.2, 9);
  });

  it("extends the hand soldering lands outwards only", () => {
    const lands = dfnLands(part, DFN_VARIANTS[1]);
    expect(lands.padLength).toBeCloseTo(1.125, 9);
    expect(lands.padX).toBeCloseTo(1.0375, 9);
    expect(lands.exposedLength).toBeCloseTo(0.55, 9);
  });

  it("keeps a thin exposed pad at 0.1 mm", () => {
    const thin = { ...part, bodyLength: 1.5, bodyWidth: 1.5, pinCount: 4, exposed: { width: 0.7, length: 0.1 } };
    const lands = dfnLands(thin, DFN_VARIANTS[0]);
    expect(lands.exposedLength).toBeCloseTo(0.1, 9);
    expect(lands.padLength).toBeCloseTo(0.8, 9);
    expect(lands.padX).toBeCloseTo(0.65, 9);
  });

  it("refuses lands that vanish", () => {
    const short = { ...part, leadLength: 0.05, toeHeel: 0, exposed: { width: 1.2, length: 1.8 } };
    expect(() => dfnLands(short, DFN_VARIANTS[0])).toThrow(GeometryError);
  });
});

describe("buildDfnPackage", () => {
  it("adds the exposed pad to every footprint", () => {
    const pkg = buildDfnPackage(dfnConfig(DFN_GROUP, DFN_2020, true, HEADER), ctx);
    expect(pkg.pads.map((pad) => pad.name)).toEqual(["1", "2", "3", "4", "5", "6", "ExposedPad"]);
    expect(pkg.footprints.map((footprint) => footprint.name)).toEqual(["reflow", "hand soldering"]);
    for (const footprint of pkg.footprints) {
      const exposed = footprint.pads[6];
      expect(exposed.uuid).toBe(pkg.pads[6].uuid);
      expect(exposed.width).toBeCloseTo(0.55, 9);
      expect(exposed.height).toBe(1.2);
    }
    const pin1 = pkg.footprints[0].pads[0];
    expect(pin1.position.x).toBeCloseTo(-0.8875, 9);
    expect(pin1.position.y).toBe(0.5);
  });

  it("keeps the courtyard clear of pads and body", () => {
    const part = dfnConfig(DFN_GROUP, DFN_2020, true, HEADER).part;
    for (const variant of DFN_VARIANTS) {
      const geometry = dfnFootprint(part, variant);
      const features = featureBounds(geometry.pads, geometry.documentation);
      expect(containsWithMargin(pointsBounds(geometry.courtyard), features, geometry.courtyardExcess)).toBe(true);
    }
  });
});

// ─── DIP ─────────────────────────────────────────────────────────────

const DIP_GROUP = DipGroupSchema.parse({
  lead_span: 7.62,
  height: 5.33,
  keywords: "dip,pdip",
  alternative_names: [{ name: "PDIP-{pin_count}", reference: "JEDEC MS-001" }],
});

const DIP_8 = DipEntrySchema.parse({ pin_count: 8, body_length: 9.65 });

describe("dipConfig", () => {
  it("follows the IPC-7251 name", () => {
    expect(dipName(7.62, 9.65, 5.33, 8)).toBe("DIP762W55P254L965H533Q8");
    expect(dipName(15.24, 52.32, 5.33, 40)).toBe("DIP1524W55P254L5232H533Q40");
  });

  it("describes the package", () => {
    const config = dipConfig(DIP_GROUP, { ...DIP_8, standard: "JEDEC MS001" }, HEADER);
    expect(config.description).toBe(
      "8-lead DIP (Dual In-Line) package (JEDEC MS001)\n\n" +
        "Pitch: 2.54mm\nLead span: 7.62mm\nBody length: 9.65mm\nLead width: 0.55mm\nMax height: 5.33mm",
    );
    expect(config.keywords).toBe("dip8,pdip8,dip,pdip");
    expect(config.alternativeNames).toEqual([{ name: "PDIP-8", reference: "JEDEC MS-001" }]);
  });
});

describe("buildDipPackage", () => {
  it("drills every pad and leaves it without solder paste", () => {
    const pkg = buildDipPackage(dipConfig(DIP_GROUP, DIP_8, HEADER), ctx);
    expect(pkg.footprints.map((footprint) => footprint.name)).toEqual(["hand soldering", "compact"]);
    for (const footprint of pkg.footprints) {
      expect(footprint.pads).toHaveLength(8);
      for (const pad of footprint.pads) {
        expect(pad.solderPaste).toBe("off");
        expect(pad.holes.map((hole) => [hole.uuid, hole.diameter, hole.vertices])).toEqual([
          [pad.uuid, 0.8, [{ x: 0, y: 0 }]],
        ]);
      }
    }
    const pin1 = pkg.footprints[0].pads[0];
    expect(pin1.serialize()).toContain(" (stop_mask auto) (solder_paste off) (clearance 0.0)");
    expect(pin1.serialize()).toContain(`\n (hole ${pin1.uuid} (diameter 0.8)\n`);
  });

  it("marks pin 1 with square corners", () => {
    const pkg = buildDipPackage(dipConfig(DIP_GROUP, DIP_8, HEADER), ctx);
    const [pin1, pin2] = pkg.footprints[0].pads;
    expect([pin1.position, pin1.radius]).toEqual([{ x: -3.81, y: 3.81 }, 0]);
    expect(pin2.radius).toBe(1);
  });

  it("is a through-hole package with its alternative name", () => {
    const text = buildDipPackage(dipConfig(DIP_GROUP, DIP_8, HEADER), ctx).serialize();
    expect(text).toContain('\n (alternative_name "PDIP-8" (reference "JEDEC MS-001"))\n (assembly_type tht)\n');
  });

  it("notches the top silkscreen line", () => {
    const geometry = dipFootprint({ pinCount: 8, bodyLength: 9.65, leadSpan: 7.62, height: 5.33 }, DIP_VARIANTS[0]);
    expect(geometry.legend[0].vertices.map((vertex) => vertex.angle ?? 0)).toEqual([0, 0, 0, 180, 0, 0, 0]);
    const pkg = buildDipPackage(dipConfig(DIP_GROUP, DIP_8, HEADER), ctx);
    const legend = pkg.footprints[0].polygons.filter((polygon) => polygon.layer === "top_legend");
    expect(legend).toHaveLength(2);
    expect(legend[0].serialize()).toContain(" (angle 180.0))");
  });

  it("keeps the courtyard clear of pads and body", () => {
    for (const variant of DIP_VARIANTS) {
      const geometry = dipFootprint({ pinCount: 14, bodyLength: 19.05, leadSpan: 7.62, height: 5.33 }, variant);
      const features = featureBounds(geometry.pads, geometry.documentation);
      expect(geometry.courtyard).toHaveLength(12);
      expect(containsWithMargin(pointsBounds(geometry.courtyard), features, geometry.courtyardExcess)).toBe(true);
    }
  });
});

// ─── Alternative names ───────────────────────────────────────────────

describe("alternative names", () => {
  it("fill from the part parameters", () => {
    const group = ChipGroupSchema.parse({
      name: "CAPPM{length_ipc}X{width_ipc}X{height_ipc}L{lead_length_ipc}X{lead_width_ipc}",
      description: "",
      polarization: { marked: { id: "p", name: "+" }, unmarked: { id: "n", name: "-" } },
      alternative_names: [{ name: "{eia}", reference: "EIA" }],
    });
    const pkg = buildChipPackage(chipConfig(group, TANTALUM_3216, HEADER), ctx);
    expect(pkg.serialize()).toContain('\n (alternative_name "3216-10" (reference "EIA"))\n');
  });

  it("are left out by default", () => {
    const pkg = buildChipPackage(chipConfig(MLCC_GROUP, MLCC_0402, HEADER), ctx);
    expect(pkg.serialize()).not.toContain("alternative_name");
  });
});
