import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { Footprint, Footprint3DModel, FootprintPad, Package, PackagePad } from "../librepcb/Package";
import { Component, Gate, PinSignalMap, Signal, Variant } from "../librepcb/Component";
import { Device, DevicePad, ManufacturerPart } from "../librepcb/Device";
import { Hole, Polygon, StrokeText } from "../librepcb/shapes";
import { Library } from "../librepcb/Library";
import { SchematicSymbol, SymbolPin, SymbolText } from "../librepcb/Symbol";

const META = {
  name: "TEST",
  description: "Line one\nLine two",
  keywords: "test,demo",
  author: "test-author",
  version: "0.1",
  created: "2019-01-01T00:00:00Z",
  categories: ["cat-1"],
};

// ─── Shapes ──────────────────────────────────────────────────────────

describe("Polygon", () => {
  it("serializes vertices in order", () => {
    const polygon = new Polygon({
      uuid: "poly-1",
      layer: "top_courtyard",
      width: 0,
      vertices: [
        { x: -1, y: 1 },
        { x: 1.25, y: 1 },
      ],
    });
    expect(polygon.serialize()).toBe(
      [
        "(polygon poly-1 (layer top_courtyard)",
        " (width 0.0) (fill false) (grab_area false)",
        " (vertex (position -1.0 1.0) (angle 0.0))",
        " (vertex (position 1.25 1.0) (angle 0.0))",
        ")",
      ].join("\n"),
    );
  });
});

describe("StrokeText", () => {
  it("serializes with default height and stroke", () => {
    const text = new StrokeText({
      uuid: "text-1",
      layer: "top_names",
      value: "{{NAME}}",
      position: { x: 0, y: 1.5 },
      align: ["center", "bottom"],
    });
    expect(text.serialize()).toBe(
      [
        "(stroke_text text-1 (layer top_names)",
        " (height 1.0) (stroke_width 0.2) (letter_spacing auto) (line_spacing auto)",
        " (align center bottom) (position 0.0 1.5) (rotation 0.0)",
        ' (auto_rotate true) (mirror false) (value "{{NAME}}")',
        ")",
      ].join("\n"),
    );
  });
});

describe("Hole", () => {
  it("serializes a round hole", () => {
    expect(new Hole("hole-1", 0.8, [{ x: 0, y: 0 }]).serialize()).toBe(
      ["(hole hole-1 (diameter 0.8)", " (stop_mask auto)", " (vertex (position 0.0 0.0) (angle 0.0))", ")"].join("\n"),
    );
  });
});

// ─── Package ─────────────────────────────────────────────────────────

describe("Package", () => {
  it("serializes metadata, pads, footprints and sorted approvals", () => {
    const pkg = new Package({ uuid: "pkg-1", ...META });
    pkg.addPad(new PackagePad("pad-1", "1"));
    const footprint = new Footprint({ uuid: "fp-1", name: "default" });
    footprint.addPad(
      new FootprintPad({ uuid: "pad-1", packagePad: "pad-1", position: { x: -1, y: 0 }, width: 1.2, height: 0.5 }),
    );
    pkg.addFootprint(footprint);
    pkg.addApproval("(approved b)");
    pkg.addApproval("(approved a)");

    expect(pkg.serialize()).toBe(
      [
        "(librepcb_package pkg-1",
        ' (name "TEST")',
        ' (description "Line one\\nLine two")',
        ' (keywords "test,demo")',
        ' (author "test-author")',
        ' (version "0.1")',
        " (created 2019-01-01T00:00:00Z)",
        " (deprecated false)",
        ' (generated_by "")',
        " (category cat-1)",
        " (assembly_type smt)",
        ' (pad pad-1 (name "1"))',
        " (footprint fp-1",
        '  (name "default")',
        '  (description "")',
        "  (3d_position 0.0 0.0 0.0) (3d_rotation 0.0 0.0 0.0)",
        "  (pad pad-1 (side top) (shape roundrect)",
        "   (position -1.0 0.0) (rotation 0.0) (size 1.2 0.5) (radius 0.0)",
        "   (stop_mask auto) (solder_paste auto) (clearance 0.0) (function unspecified)",
        "   (package_pad pad-1)",
        "  )",
        " )",
        " (approved a)",
        " (approved b)",
        ")",
      ].join("\n"),
    );
  });

  it("sorts footprint 3D models by uuid but keeps pads in insertion order", () => {
    const footprint = new Footprint({ uuid: "fp-1", name: "default" });
    footprint.add3DModel(new Footprint3DModel("m-2"));
    footprint.add3DModel(new Footprint3DModel("m-1"));
    for (const id of ["z", "a"]) {
      footprint.addPad(
        new FootprintPad({ uuid: id, packagePad: id, position: { x: 0, y: 0 }, width: 1, height: 1 }),
      );
    }
    const lines = footprint.serialize().split("\n");
    const heads = lines.filter((line) => line.startsWith(" (3d_model") || line.startsWith(" (pad"));
    expect(heads).toEqual([
      " (3d_model m-1)",
      " (3d_model m-2)",
      " (pad z (side top) (shape roundrect)",
      " (pad a (side top) (shape roundrect)",
    ]);
  });
});

// ─── Symbol ──────────────────────────────────────────────────────────

describe("SymbolPin", () => {
  it("puts the name behind the pin line", () => {
    expect(new SymbolPin("pin-1", "1", { x: -7.62, y: 0 }, 0, 2.54).serialize()).toBe(
      [
        '(pin pin-1 (name "1")',
        " (position -7.62 0.0) (rotation 0.0) (length 2.54)",
        " (name_position 3.81 0.0) (name_rotation 0.0) (name_height 2.5)",
        " (name_align left center)",
        ")",
      ].join("\n"),
    );
  });
});

describe("SchematicSymbol", () => {
  it("writes pins, polygons and texts after the header", () => {
    const symbol = new SchematicSymbol({ uuid: "sym-1", ...META });
    symbol.addText(new SymbolText("text-1", "sym_names", "{{NAME}}", ["center", "bottom"], { x: 0, y: 2.54 }));
    symbol.addPolygon(new Polygon({ uuid: "poly-1", layer: "sym_outlines", width: 0.25, grabArea: true }));
    symbol.addPin(new SymbolPin("pin-1", "1", { x: 7.62, y: 0 }, 180, 2.54));

    const text = symbol.serialize();
    expect(text.startsWith("(librepcb_symbol sym-1\n (name \"TEST\")\n")).toBe(true);
    expect(text).toContain(
      [
        " (category cat-1)",
        ' (pin pin-1 (name "1")',
        "  (position 7.62 0.0) (rotation 180.0) (length 2.54)",
        "  (name_position 3.81 0.0) (name_rotation 0.0) (name_height 2.5)",
        "  (name_align left center)",
        " )",
        " (polygon poly-1 (layer sym_outlines)",
        "  (width 0.25) (fill false) (grab_area true)",
        " )",
        ' (text text-1 (layer sym_names) (value "{{NAME}}")',
        "  (align center bottom) (height 2.54) (position 0.0 2.54) (rotation 0.0)",
        " )",
        ")",
      ].join("\n"),
    );
  });
});

// ─── Component & device ──────────────────────────────────────────────

describe("Component", () => {
  it("sorts gate pins by pin uuid", () => {
    const component = new Component({ uuid: "cmp-1", ...META, prefix: "R", defaultValue: "{{RESISTANCE}}" });
    component.addSignal(new Signal("sig-1", "1"));
    const gate = new Gate("gate-1", "sym-1");
    gate.addPin(new PinSignalMap("pin-b", "sig-2"));
    gate.addPin(new PinSignalMap("pin-a", "sig-1"));
    component.addVariant(new Variant("var-1", "default").addGate(gate));

    const text = component.serialize();
    expect(text).toContain(
      [
        ' (schematic_only false)',
        ' (default_value "{{RESISTANCE}}")',
        ' (prefix "R")',
        ' (signal sig-1 (name "1") (role passive)',
        '  (required false) (negated false) (clock false) (forced_net "")',
        " )",
        ' (variant var-1 (norm "")',
        '  (name "default")',
        '  (description "")',
        "  (gate gate-1",
        "   (symbol sym-1)",
        '   (position 0.0 0.0) (rotation 0.0) (required true) (suffix "")',
        "   (pin pin-a (signal sig-1) (text signal))",
        "   (pin pin-b (signal sig-2) (text signal))",
        "  )",
        " )",
        ")",
      ].join("\n"),
    );
  });
});

describe("Device", () => {
  it("sorts pads by uuid and writes unconnected pads", () => {
    const device = new Device({ uuid: "dev-1", ...META, component: "cmp-1", package: "pkg-1" });
    device.addPad(new DevicePad("pad-b", "sig-1"));
    device.addPad(new DevicePad("pad-a", null));
    device.addPart(new ManufacturerPart("RC0402", "Example Corp"));

    expect(device.serialize()).toContain(
      [
        " (component cmp-1)",
        " (package pkg-1)",
        " (pad pad-a (signal none))",
        " (pad pad-b (signal sig-1))",
        ' (part "RC0402" (manufacturer "Example Corp")',
        " )",
        ")",
      ].join("\n"),
    );
  });
});

// ─── Library writer ──────────────────────────────────────────────────

describe("Library", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes a version marker and the element file", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "library-"));
    const library = new Library(tmpDir);
    const pkg = new Package({ uuid: "pkg-1", ...META });

    const filePath = library.write(pkg);

    expect(filePath).toBe(path.join(tmpDir, "pkg", "pkg-1", "package.lp"));
    expect(fs.readFileSync(path.join(tmpDir, "pkg", "pkg-1", ".librepcb-pkg"), "utf-8")).toBe("1\n");
    expect(fs.readFileSync(filePath, "utf-8")).toBe(`${pkg.serialize()}\n`);
  });
});
