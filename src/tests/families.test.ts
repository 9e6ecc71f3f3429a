import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type { LibraryHeader } from "../builders/common";
import { ComponentEntrySchema, componentConfig } from "../families/components";
import { DeviceEntrySchema, DeviceGroupSchema, deviceConfig } from "../families/devices";
import { SmallOutlineGroupSchema, smallOutlineConfig } from "../families/so";
import { SymbolEntrySchema, symbolConfig } from "../families/symbols";
import { GroupBaseSchema, entryLabel, loadTable } from "../families/table";
import { findFamily } from "../families";
import { dfnFamily } from "../families/dfn";
import { dipFamily } from "../families/dip";
import { Library } from "../librepcb/Library";
import { UuidCache } from "../librepcb/UuidCache";
import { ConfigurationError } from "../errors";

const HEADER: LibraryHeader = {
  author: "test-author",
  version: "0.1",
  created: "2019-01-29T19:47:42Z",
  category: "00000000-0000-4000-8000-000000000001",
  generatedBy: "",
};

const LIBRARY_BLOCK = [
  "library:",
  "  author: test-author",
  '  version: "0.2"',
  "  created: 2019-01-29T19:47:42Z",
  "  category: 00000000-0000-4000-8000-000000000001",
].join("\n");

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "families-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeTable(content: string): string {
  const filePath = path.join(tmpDir, "table.yml");
  fs.writeFileSync(filePath, content);
  return filePath;
}

// ─── Tables ──────────────────────────────────────────────────────────

describe("loadTable", () => {
  it("reads the header and applies group overrides", () => {
    const filePath = writeTable(
      [LIBRARY_BLOCK, "groups:", "  - parts: [a]", "  - library:", '      version: "0.3"', "    parts: [b, c]"].join("\n"),
    );
    const groups = loadTable(filePath, GroupBaseSchema);

    expect(groups.map((g) => g.index)).toEqual([1, 2]);
    // Unquoted timestamps come back as text
    expect(groups[0].header).toEqual({
      author: "test-author",
      version: "0.2",
      created: "2019-01-29T19:47:42Z",
      category: "00000000-0000-4000-8000-000000000001",
      generatedBy: "",
    });
    expect(groups[1].header.version).toBe("0.3");
    expect(groups[1].group.parts).toEqual(["b", "c"]);
  });

  it("reports a missing file", () => {
    const filePath = path.join(tmpDir, "missing.yml");
    expect(() => loadTable(filePath, GroupBaseSchema)).toThrow(ConfigurationError);
    expect(() => loadTable(filePath, GroupBaseSchema)).toThrow(`Table not found: ${filePath}`);
  });

  it("reports broken YAML", () => {
    const filePath = writeTable("groups: [unclosed");
    expect(() => loadTable(filePath, GroupBaseSchema)).toThrow(`Invalid YAML in ${filePath}`);
  });

  it("reports an invalid header field by path", () => {
    const filePath = writeTable(LIBRARY_BLOCK.replace("00000000-0000-4000-8000-000000000001", "not-a-uuid") + "\ngroups: []\n");
    expect(() => loadTable(filePath, GroupBaseSchema)).toThrow(
      `Invalid table header in ${filePath}: library.category: Invalid uuid`,
    );
  });

  it("reports an invalid group by position", () => {
    const filePath = writeTable([LIBRARY_BLOCK, "groups:", "  - parts: []", "  - pitch: -1"].join("\n"));
    expect(() => loadTable(filePath, SmallOutlineGroupSchema)).toThrow(/^Invalid group 1 in /);
  });
});

describe("entryLabel", () => {
  it("prefers the first column of a row", () => {
    expect(entryLabel(["VEEC-3", 1.0], ["variation"], "#1")).toBe("VEEC-3");
  });

  it("uses the first key present", () => {
    expect(entryLabel({ size_imperial: "0402" }, ["name", "size_imperial"], "#1")).toBe("0402");
  });

  it("falls back for anything else", () => {
    expect(entryLabel(42, ["name"], "#3")).toBe("#3");
    expect(entryLabel({ name: true }, ["name"], "#4")).toBe("#4");
  });
});

describe("findFamily", () => {
  it("finds families by name", () => {
    expect(findFamily("qfn")?.file).toBe("qfn.yml");
    expect(findFamily("sot")).toBeUndefined();
  });
});

// ─── No-lead and through-hole ────────────────────────────────────────

describe("dfnFamily", () => {
  it("generates each exposed pad part with and without the pad", () => {
    const filePath = writeTable(
      [
        LIBRARY_BLOCK,
        "groups:",
        "  - standard: MO-229F",
        "    parts:",
        "      - { variation: V2020D-3, length: 2.0, width: 2.0, pitch: 0.5, pins: 8, height: 0.95, lead_length: 0.3, exposed: [1.2, 0.6] }",
        "      - { variation: V2020D-4, length: 2.0, width: 2.0, pitch: 0.5, pins: 6, height: 0.95, lead_length: 0.4, exposed: [1.75, 0.8], plain: false }",
      ].join("\n"),
    );
    const ctx = { cache: new UuidCache(), library: new Library(path.join(tmpDir, "lib")) };
    const items = dfnFamily.items(filePath, ctx);

    expect(items.map((item) => item.entry)).toEqual(["MO-229F V2020D-3", "MO-229F V2020D-4"]);
    expect(items[0].build().map((artifact) => artifact.name)).toEqual(["DFN50P200X200X95-8T120X60", "DFN50P200X200X95-8"]);
    expect(items[1].build().map((artifact) => artifact.name)).toEqual(["DFN50P200X200X95-6T175X80"]);
  });
});

describe("dipFamily", () => {
  it("labels entries by group and pin count", () => {
    const filePath = writeTable(
      [
        LIBRARY_BLOCK,
        "groups:",
        "  - lead_span: 7.62",
        "    height: 5.33",
        "    parts:",
        "      - { pin_count: 8, body_length: 9.65 }",
        "      - { pin_count: 7, body_length: 9.65 }",
      ].join("\n"),
    );
    const ctx = { cache: new UuidCache(), library: new Library(path.join(tmpDir, "lib")) };
    const items = dipFamily.items(filePath, ctx);

    expect(items.map((item) => item.entry)).toEqual(["group 1 (8 pins)", "group 1 (7 pins)"]);
    expect(items[0].build().map((artifact) => artifact.name)).toEqual(["DIP762W55P254L965H533Q8"]);
    expect(() => items[1].build()).toThrow("Pin count must be even");
  });
});

// ─── Small outline ───────────────────────────────────────────────────

describe("smallOutlineConfig", () => {
  const group = SmallOutlineGroupSchema.parse({
    name: "SOIC{pitch_ipc}P600X{height_ipc}-{pin_count}",
    description: "{pin_count}-pin SOIC, {pitch} mm pitch",
    pitch: 1.27,
    pin_counts: [8],
    heights: [1.75],
    body_length_offset: 0.4,
    body_width: 3.9,
    total_width: 6.0,
    lead_width: 0.41,
    lead_contact_length: 0.835,
  });

  it("fills the name from pin count and height", () => {
    const config = smallOutlineConfig(group, 8, 1.75, HEADER);
    expect(config.name).toBe("SOIC127P600X175-8");
    expect(config.description).toBe("8-pin SOIC, 1.27 mm pitch");
    expect(config.keywords).toBe("soic8,so8");
  });

  it("fills the alternative names per pin count", () => {
    const named = SmallOutlineGroupSchema.parse({ ...group, alternative_names: [{ name: "SOIC-{pin_count}", reference: "JEDEC" }] });
    expect(smallOutlineConfig(named, 14, 1.75, HEADER).alternativeNames).toEqual([{ name: "SOIC-14", reference: "JEDEC" }]);
    expect(smallOutlineConfig(group, 14, 1.75, HEADER).alternativeNames).toEqual([]);
  });

  it("grows the body with the pin count", () => {
    expect(smallOutlineConfig(group, 8, 1.75, HEADER).part.bodyLength).toBeCloseTo(4.21, 9);
    expect(smallOutlineConfig(group, 14, 1.75, HEADER).part.bodyLength).toBeCloseTo(8.02, 9);
  });

  it("rejects an odd pin count", () => {
    expect(() => smallOutlineConfig(group, 7, 1.75, HEADER)).toThrow(ConfigurationError);
    expect(() => smallOutlineConfig(group, 7, 1.75, HEADER)).toThrow(
      "Pin count 7 is odd, both rows need the same number of pins",
    );
    const result = SmallOutlineGroupSchema.safeParse({ ...group, pin_counts: [8, 7] });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => [issue.path.join("."), issue.message])).toEqual([
      ["pin_counts.1", "Pin count must be even"],
    ]);
  });
});

// ─── Components & devices ────────────────────────────────────────────

describe("componentConfig", () => {
  it("maps the entry onto a single gate", () => {
    const entry = ComponentEntrySchema.parse({
      name: "Polarized Capacitor",
      prefix: "C",
      symbol: "Polarized Capacitor",
      signals: [{ name: "+", pin: "+", role: "passive", required: true }],
    });
    const config = componentConfig(entry, HEADER);
    expect(config.symbol).toBe("Polarized Capacitor");
    expect(config.defaultValue).toBe("");
    expect(config.description).toBe("");
    expect(config.norm).toBeUndefined();
    expect(config.signals).toEqual([{ name: "+", pin: "+", role: "passive", required: true }]);
  });

  it("rejects signals without a symbol pin", () => {
    const result = ComponentEntrySchema.safeParse({ name: "R", prefix: "R", symbol: "Resistor", signals: [{ name: "1" }] });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.path.join("."))).toEqual(["signals.0.pin"]);
  });
});

describe("symbolConfig", () => {
  it("keeps the pins in table order", () => {
    const entry = SymbolEntrySchema.parse({
      name: "Resistor",
      pins: [
        { name: "1", side: "left" },
        { name: "2", side: "right" },
      ],
    });
    const config = symbolConfig(entry, HEADER);
    expect(config.keywords).toBe("");
    expect(config.pins.map((pin) => pin.name)).toEqual(["1", "2"]);
  });

  it("rejects an unknown pin side", () => {
    const result = SymbolEntrySchema.safeParse({ name: "X", pins: [{ name: "1", side: "middle" }] });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.path.join("."))).toEqual(["pins.0.side"]);
  });
});

describe("deviceConfig", () => {
  const group = DeviceGroupSchema.parse({
    name: "Resistor {size_metric} ({size_imperial})",
    keywords: "{size_metric},R,Resistor",
    component: "Resistor",
    pads: [
      { pad: "1", signal: "1" },
      { pad: "2", signal: null },
    ],
  });

  it("fills templates from the extra fields of the entry", () => {
    const entry = DeviceEntrySchema.parse({
      package: "RESC1005 (0402)",
      size_metric: "1005",
      size_imperial: "0402",
      manufacturer_parts: [{ mpn: "RC0402", manufacturer: "Example Corp" }],
    });
    const config = deviceConfig(group, entry, HEADER);

    expect(config.name).toBe("Resistor 1005 (0402)");
    expect(config.keywords).toBe("1005,r,resistor");
    expect(config.package).toBe("RESC1005 (0402)");
    expect(config.pads).toEqual([
      { pad: "1", signal: "1" },
      { pad: "2", signal: null },
    ]);
    expect(config.parts).toEqual([{ mpn: "RC0402", manufacturer: "Example Corp" }]);
  });

  it("does not offer the package name as a placeholder", () => {
    const byPackage = DeviceGroupSchema.parse({ ...group, name: "{package}" });
    const entry = DeviceEntrySchema.parse({ package: "RESC1005 (0402)" });
    expect(() => deviceConfig(byPackage, entry, HEADER)).toThrow('Unknown placeholder {package} in "{package}"');
  });

  it("only accepts scalar extra fields", () => {
    expect(DeviceEntrySchema.safeParse({ package: "X", flag: true }).success).toBe(false);
  });
});
