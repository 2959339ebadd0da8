import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { DATA_POINTS, example1D, example2D, runExamples } from "./examples.js";
import { presetProfile } from "./profile.js";
import { ActiveStyle, FONT_FAMILIES } from "./style.js";
import { createRandom } from "./toolkit/random.js";

describe("example1D", () => {
  it("builds the fit, model and data overlay", () => {
    const style = new ActiveStyle();
    style.apply(presetProfile());
    const { canvas, curve, histogram, graph, legend } = example1D(style, { random: createRandom(9) });
    expect(canvas.reportedSize).toEqual({ width: 800, height: 600 });
    expect(curve.parameters).toEqual([1, 0, 0.5]);
    expect(histogram.entries).toBe(100);
    expect(histogram.contents.reduce((a, b) => a + b, 0)).toBeCloseTo(5, 10);
    expect(graph.points).toEqual(DATA_POINTS);
    expect(legend.entries.map((e) => e.label)).toEqual(["Gaussian Fit", "MC histo", "Data points"]);
  });
});

describe("example2D", () => {
  it("fills the density map and titles every axis", () => {
    const style = new ActiveStyle();
    style.apply(presetProfile());
    const { canvas, histogram } = example2D(style, { random: createRandom(9) });
    expect(canvas.margins.right).toBe(0.2);
    expect(histogram.entries).toBe(5000);
    expect([histogram.axes.x.title, histogram.axes.y.title, histogram.axes.z.title]).toEqual([
      "X^{2} (mm)",
      "Y^{2} (mm)",
      "Counts",
    ]);
  });
});

describe("runExamples", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "plotstyle-examples-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes both figures", () => {
    const written = runExamples(join(dir, "out"));
    expect(written).toEqual([join(dir, "out", "example1D.svg"), join(dir, "out", "example2D.svg")]);
    for (const path of written) {
      expect(readFileSync(path, "utf-8").startsWith("<svg")).toBe(true);
    }
  });

  it("uses the profile it is given", () => {
    const [path] = runExamples(dir, { profile: presetProfile("sans") });
    expect(readFileSync(path, "utf-8")).toContain(`font-family="${FONT_FAMILIES.sans}"`);
  });

  it("corrects for host window decorations", () => {
    const [path] = runExamples(dir, { host: { width: 4, height: 28 }, aspect: { kind: "16:9" } });
    expect(readFileSync(path, "utf-8")).toContain('width="1600" height="900" viewBox="0 0 1600 900"');
  });
});
