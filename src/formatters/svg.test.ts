import { describe, it, expect } from "vitest";
import { renderMarker } from "./svg.js";
import { example1D, example2D } from "../examples.js";
import { buildProfile, presetProfile } from "../profile.js";
import { ActiveStyle, FONT_FAMILIES } from "../style.js";
import { Canvas } from "../toolkit/canvas.js";
import { FunctionCurve } from "../toolkit/objects.js";
import { createRandom } from "../toolkit/random.js";

const SERIF = "&#39;Times New Roman&#39;, Times, serif";

function primitives(svg: string): string[] {
  return [...svg.matchAll(/data-primitive="([^"]+)"/g)].map((m) => m[1]);
}

function count(svg: string, needle: string): number {
  return svg.split(needle).length - 1;
}

function group(svg: string, attr: string): string {
  const start = svg.indexOf(`<g ${attr}`);
  if (start < 0) return "";
  return svg.slice(start, svg.indexOf("</g>", start));
}

function publicationStyle(): ActiveStyle {
  const style = new ActiveStyle();
  style.apply(presetProfile());
  return style;
}

describe("1D figure with the publication profile", () => {
  const svg = example1D(publicationStyle(), { random: createRandom(11) }).canvas.toSvg();

  it("draws fit, model, data, legend and watermark in order", () => {
    expect(primitives(svg)).toEqual(["function", "histogram", "graph", "legend", "text"]);
  });

  it("has the requested size and a plain white canvas", () => {
    expect(svg).toContain('width="800" height="600" viewBox="0 0 800 600"');
    expect(svg).toContain('<rect data-role="canvas" x="0" y="0" width="800" height="600" fill="#ffffff"/>');
    expect(svg).not.toContain('data-role="pad"');
  });

  it("shows no title, stats or fit boxes", () => {
    expect(svg).not.toContain("data-box");
  });

  it("colours each series by role", () => {
    expect(group(svg, 'data-primitive="function"')).toContain('stroke="#ff0000" stroke-width="2.5"');
    expect(group(svg, 'data-primitive="histogram"')).toContain('stroke="#0000ff" stroke-width="2"');
    const graph = group(svg, 'data-primitive="graph"');
    expect(count(graph, 'data-marker="filled-square"')).toBe(4);
    expect(graph).toContain('fill="#000000"/>');
  });

  it("renders axis titles in the serif font with markup", () => {
    expect(svg).toMatch(new RegExp(`class="axis-title" data-axis="x"[^>]*font-family="${SERIF}" font-size="36"`));
    expect(svg).toContain('>β<tspan baseline-shift="sub" font-size="70%">14</tspan></text>');
    expect(svg).toContain(
      '>R<tspan baseline-shift="super" font-size="70%">3</tspan> / R<tspan baseline-shift="sub" font-size="70%">AV</tspan><tspan baseline-shift="super" font-size="70%">3</tspan></text>',
    );
  });

  it("draws the legend without a border", () => {
    const legend = group(svg, 'data-primitive="legend"');
    expect(legend).toContain('<rect x="560" y="66" width="152" height="114" fill="#ffffff"/>');
    expect(legend).toContain(">Gaussian Fit</text>");
    expect(legend).toContain(">Data points</text>");
  });

  it("places the watermark", () => {
    expect(svg).toContain(
      `<text x="704" y="210" text-anchor="end" dominant-baseline="middle" font-family="${SERIF}" font-size="36" fill="#000000">Preliminary</text>`,
    );
  });
});

describe("2D figure with the publication profile", () => {
  const { canvas, histogram } = example2D(publicationStyle(), { random: createRandom(5) });
  const svg = canvas.toSvg();

  it("draws the density map and the watermark", () => {
    expect(primitives(svg)).toEqual(["density", "text"]);
  });

  it("uses the profile palette with a colour scale", () => {
    expect(group(svg, 'data-primitive="density"')).toContain('data-palette="inverted-dark-body-radiator"');
    expect(svg).toContain('<g data-role="color-scale" data-palette="inverted-dark-body-radiator">');
    expect(svg).toContain('class="axis-title" data-axis="z"');
    expect(svg).toContain(">Counts</text>");
  });

  it("shows no boxes", () => {
    expect(svg).not.toContain("data-box");
  });

  it("leaves rows outside the source range empty", () => {
    expect(histogram.contents.slice(0, 16).every((row) => row.every((c) => c === 0))).toBe(true);
    expect(svg).toContain('>X<tspan baseline-shift="super" font-size="70%">2</tspan> (mm)</text>');
  });
});

describe("figures built before the profile is applied", () => {
  it("keep the toolkit look for the 1D figure", () => {
    const style = new ActiveStyle();
    const { canvas } = example1D(style, { random: createRandom(11) });
    style.apply(presetProfile());
    const svg = canvas.toSvg();

    expect(svg).toContain('<rect data-role="canvas" x="0" y="0" width="800" height="600" fill="#e8e8e8" stroke="#000000" stroke-width="2"/>');
    expect(svg).toContain('<g data-box="title">');
    expect(count(svg, 'data-marker="dot"')).toBe(5);
    expect(svg).toMatch(
      new RegExp(`class="axis-title" data-axis="x"[^>]*font-family="${FONT_FAMILIES.sans}" font-size="21"`),
    );
    expect(group(svg, 'data-primitive="legend"')).toContain('stroke="#000000" stroke-width="1"');
  });

  it("keep the toolkit look for the 2D figure", () => {
    const svg = example2D(new ActiveStyle(), { random: createRandom(5) }).canvas.toSvg();
    expect(group(svg, 'data-primitive="density"')).toContain('data-palette="bird"');
    const stats = group(svg, 'data-box="stats"');
    expect(stats).toContain(">h2</text>");
    expect(stats).toContain(">Entries 5000</text>");
    expect(svg).not.toContain('data-box="title"');
  });
});

describe("renderCanvas", () => {
  it("gives the same output when the profile is applied twice", () => {
    const profile = presetProfile();
    const once = new ActiveStyle();
    once.apply(profile);
    const twice = new ActiveStyle();
    twice.apply(profile);
    twice.apply(profile);
    const a = example1D(once, { random: createRandom(3) }).canvas.toSvg();
    const b = example1D(twice, { random: createRandom(3) }).canvas.toSvg();
    expect(b).toBe(a);
  });

  it("lists fit parameters when the fit box is enabled", () => {
    const style = new ActiveStyle();
    style.apply(buildProfile("fit", "fit", { boxes: { fitParams: true } }));
    const svg = example1D(style, { random: createRandom(1) }).canvas.toSvg();
    const fit = group(svg, 'data-box="fit"');
    expect(fit).toContain(">f p0 = 1.000</text>");
    expect(fit).toContain(">f p1 = 0.000</text>");
    expect(fit).toContain(">f p2 = 0.500</text>");
  });

  it("dashes a curve with the profile pattern", () => {
    const style = publicationStyle();
    const canvas = new Canvas(style, "dash");
    const curve = new FunctionCurve(style, "f", "gaus", 0, 1);
    curve.line.style = "dashed";
    canvas.draw(curve);
    expect(canvas.toSvg()).toContain('stroke-dasharray="12 12"');
  });

  it("draws a pad when its colour differs from the canvas", () => {
    const style = publicationStyle();
    const canvas = new Canvas(style, "pad");
    canvas.setCanvasSize(400, 300);
    canvas.fillColor = "#eeeeee";
    canvas.draw(new FunctionCurve(style, "f", "gaus", 0, 1));
    expect(canvas.toSvg()).toContain('<rect data-role="pad" x="0" y="0" width="400" height="300" fill="#ffffff"/>');
  });
});

describe("renderMarker", () => {
  it("draws each shape at the marker size", () => {
    expect(renderMarker({ color: "red", shape: "circle", size: 1 }, 10, 20)).toBe(
      '<circle data-marker="circle" cx="10" cy="20" r="4" fill="none" stroke="#ff0000"/>',
    );
    expect(renderMarker({ color: "black", shape: "filled-square", size: 2 }, 10, 20)).toBe(
      '<rect data-marker="filled-square" x="2" y="12" width="16" height="16" fill="#000000"/>',
    );
    expect(renderMarker({ color: "blue", shape: "filled-triangle", size: 1 }, 0, 0)).toBe(
      '<polygon data-marker="filled-triangle" points="0,-4 4,4 -4,4" fill="#0000ff"/>',
    );
  });
});
