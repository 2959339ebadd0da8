import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadOverrides, parseOverrides, resolveProfile } from "./config.js";
import { ConfigurationError, PaletteError } from "./errors.js";

describe("parseOverrides", () => {
  it("accepts a full set of overrides", () => {
    expect(
      parseOverrides({
        font: "sans",
        palette: "viridis",
        watermark: " Internal ",
        lineWidth: 3,
        dashPattern: [4, 2],
        axis: { titleOffset: 1.2, titleColor: "navy" },
        markerShape: "open-square",
        boxes: { stats: true },
      }),
    ).toEqual({
      font: "sans",
      palette: "viridis",
      watermark: "Internal",
      lineWidth: 3,
      dashPattern: [4, 2],
      axis: { titleOffset: 1.2, titleColor: "navy" },
      markerShape: "open-square",
      boxes: { stats: true },
    });
  });

  it("accepts an empty object", () => {
    expect(parseOverrides({})).toEqual({});
  });

  it("rejects unknown keys with their path", () => {
    expect(() => parseOverrides({ colour: "red" })).toThrow('Unknown key "colour"');
    expect(() => parseOverrides({ axis: { size: 1 } })).toThrow('Unknown key "axis.size"');
    expect(() => parseOverrides({ boxes: { legend: true } })).toThrow('Unknown key "boxes.legend"');
  });

  it("accepts separate histogram and fit line widths", () => {
    expect(parseOverrides({ lineWidth: 2, histogramLineWidth: 1.5, fitLineWidth: 3 })).toEqual({
      lineWidth: 2,
      histogramLineWidth: 1.5,
      fitLineWidth: 3,
    });
  });

  it("rejects an axis title colour that is not a colour", () => {
    expect(() => parseOverrides({ axis: { titleColor: "not-a-colour" } })).toThrow(ConfigurationError);
    expect(() => parseOverrides({ axis: { titleColor: "not-a-colour" } })).toThrow(
      '"axis.titleColor" is not a colour: "not-a-colour"',
    );
  });

  it("collects box flags into a fresh object", () => {
    expect(parseOverrides({ boxes: { title: true, fitParams: false } })).toEqual({
      boxes: { title: true, fitParams: false },
    });
  });

  it("rejects unsafe palettes", () => {
    expect(() => parseOverrides({ palette: "rainbow" })).toThrow(PaletteError);
  });

  it("rejects bad values", () => {
    expect(() => parseOverrides({ font: "mono" })).toThrow('"font" must be one of: serif, sans');
    expect(() => parseOverrides({ lineWidth: -1 })).toThrow('"lineWidth" must be a non-negative number');
    expect(() => parseOverrides({ axis: { tickLength: "long" } })).toThrow('"axis.tickLength" must be a non-negative number');
    expect(() => parseOverrides({ dashPattern: [4, 0] })).toThrow(ConfigurationError);
    expect(() => parseOverrides({ boxes: { title: "yes" } })).toThrow('"boxes.title" must be true or false');
    expect(() => parseOverrides([])).toThrow("Style configuration must be a JSON object");
  });
});

describe("loadOverrides", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "plotstyle-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads a JSON file", () => {
    const path = join(dir, "style.json");
    writeFileSync(path, JSON.stringify({ palette: "cividis" }));
    expect(loadOverrides(path)).toEqual({ palette: "cividis" });
  });

  it("reports invalid JSON as a configuration error", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ palette: ");
    expect(() => loadOverrides(path)).toThrow(ConfigurationError);
    expect(() => loadOverrides(path)).toThrow(`${path}: invalid JSON`);
  });

  it("lets a missing file through as a filesystem error", () => {
    expect(() => loadOverrides(join(dir, "missing.json"))).toThrow(/ENOENT/);
  });
});

describe("resolveProfile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "plotstyle-resolve-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: object): string {
    const path = join(dir, "style.json");
    writeFileSync(path, JSON.stringify(content));
    return path;
  }

  it("defaults to the publication preset", () => {
    const profile = resolveProfile({});
    expect(profile.name).toBe("publication");
    expect(profile.typography.font).toBe("serif");
  });

  it("takes the font from the config file when no flag is given", () => {
    const profile = resolveProfile({ config: writeConfig({ font: "sans" }) });
    expect(profile.name).toBe("slides");
    expect(profile.typography.font).toBe("sans");
  });

  it("lets the font flag beat the config file", () => {
    const profile = resolveProfile({ font: "serif", config: writeConfig({ font: "sans", palette: "viridis" }) });
    expect(profile.name).toBe("publication");
    expect(profile.typography.font).toBe("serif");
    expect(profile.palette).toBe("viridis");
  });

  it("lets the palette flag beat the config file", () => {
    const profile = resolveProfile({ palette: "inferno", config: writeConfig({ palette: "viridis" }) });
    expect(profile.palette).toBe("inferno");
  });

  it("rejects an unknown font flag", () => {
    expect(() => resolveProfile({ font: "mono" })).toThrow('--font must be one of: serif, sans, got "mono"');
  });
});
