import { describe, it, expect } from "vitest";
import { AXIS_LABELS, applyRole, watermark } from "./labels.js";
import { markupToText } from "./formatters/markup.js";
import { buildProfile, presetProfile } from "./profile.js";
import { ActiveStyle } from "./style.js";
import { FunctionCurve, GraphErrors, Histogram1D } from "./toolkit/objects.js";

describe("applyRole", () => {
  it("colours fit, model and data series", () => {
    const style = new ActiveStyle();
    style.apply(presetProfile());
    const curve = new FunctionCurve(style, "f", "gaus", 0, 1);
    const hist = new Histogram1D(style, "h", "h", 10, 0, 1);
    const graph = new GraphErrors(style, [{ x: 0, y: 0 }]);
    applyRole(style, curve, "fit");
    applyRole(style, hist, "model");
    applyRole(style, graph, "data");
    expect(curve.line.color).toBe("red");
    expect(hist.line.color).toBe("blue");
    expect(graph.line.color).toBe("black");
    expect(graph.marker.color).toBe("black");
  });

  it("colours graph markers with the line", () => {
    const style = new ActiveStyle();
    const graph = new GraphErrors(style, [{ x: 0, y: 0 }]);
    applyRole(style, graph, "model");
    expect(graph.marker.color).toBe("blue");
  });

  it("uses the publication line widths for each role", () => {
    const style = new ActiveStyle();
    style.apply(presetProfile("serif"));
    const curve = new FunctionCurve(style, "f", "gaus", 0, 1);
    const hist = new Histogram1D(style, "h", "h", 10, 0, 1);
    const graph = new GraphErrors(style, [{ x: 0, y: 0 }]);
    applyRole(style, curve, "fit");
    applyRole(style, hist, "model");
    applyRole(style, graph, "data");
    expect(curve.line.width).toBe(2.5);
    expect(hist.line.width).toBe(2);
    expect(graph.line.width).toBe(2);
  });

  it("uses thinner slide widths for fit and model", () => {
    const style = new ActiveStyle();
    style.apply(presetProfile("sans"));
    const curve = new FunctionCurve(style, "f", "gaus", 0, 1);
    const hist = new Histogram1D(style, "h", "h", 10, 0, 1);
    const graph = new GraphErrors(style, [{ x: 0, y: 0 }]);
    applyRole(style, curve, "fit");
    applyRole(style, hist, "model");
    applyRole(style, graph, "data");
    expect(curve.line.width).toBe(2);
    expect(hist.line.width).toBe(1.5);
    expect(graph.line.width).toBe(2);
  });

  it("keeps toolkit widths before a profile is applied", () => {
    const style = new ActiveStyle();
    const curve = new FunctionCurve(style, "f", "gaus", 0, 1);
    applyRole(style, curve, "fit");
    expect(curve.line.width).toBe(1);
  });
});

describe("AXIS_LABELS", () => {
  it("renders Greek letters and exponents", () => {
    expect(markupToText(AXIS_LABELS.isotropy)).toBe("β14");
    expect(markupToText(AXIS_LABELS.normalizedVolume)).toBe("R3 / RAV3");
  });
});

describe("watermark", () => {
  it("takes its text from the active profile", () => {
    const style = new ActiveStyle();
    style.apply(buildProfile("t", "t", { watermark: "Work in progress" }));
    const label = watermark(style, 0.88, 0.65);
    expect(label.content).toBe("Work in progress");
    expect(label.x).toBe(0.88);
    expect(label.y).toBe(0.65);
    expect(label.text.color).toBe("black");
  });

  it("accepts a colour", () => {
    const style = new ActiveStyle();
    style.apply(presetProfile());
    expect(watermark(style, 0.5, 0.5, { color: "gray" }).text.color).toBe("gray");
  });
});
