/**
 * The two reference figures: a 1D fit/model/data overlay and a 2D density map.
 * Both are used as acceptance checks for the profile.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { AXIS_LABELS, applyRole, watermark } from "./labels.js";
import { DEFAULT_ASPECT, applyMargins, sizeCanvas, type AspectRatio } from "./layout.js";
import { presetProfile } from "./profile.js";
import { ActiveStyle } from "./style.js";
import { Canvas, type HostChrome } from "./toolkit/canvas.js";
import {
  Function2D,
  FunctionCurve,
  GraphErrors,
  Histogram1D,
  Histogram2D,
  Legend,
  type TextAnnotation,
} from "./toolkit/objects.js";
import { createRandom, type Random } from "./toolkit/random.js";
import type { StyleProfile } from "./types.js";

export interface ExampleOptions {
  aspect?: AspectRatio;
  host?: HostChrome;
  random?: Random;
}

export interface Example1D {
  canvas: Canvas;
  curve: FunctionCurve;
  histogram: Histogram1D;
  graph: GraphErrors;
  legend: Legend;
  label: TextAnnotation;
}

export interface Example2D {
  canvas: Canvas;
  histogram: Histogram2D;
  label: TextAnnotation;
}

export const DATA_POINTS = [
  { x: 0.1, y: 0.6, ey: 0.05 },
  { x: 0.4, y: 0.5, ey: 0.05 },
  { x: 0.6, y: 0.4, ey: 0.05 },
  { x: 0.8, y: 0.3, ey: 0.05 },
];

export function example1D(style: ActiveStyle, options: ExampleOptions = {}): Example1D {
  const random = options.random ?? createRandom();
  const canvas = new Canvas(style, "c1", "c1", { host: options.host });
  sizeCanvas(canvas, options.aspect ?? DEFAULT_ASPECT);
  applyMargins(canvas);

  const curve = new FunctionCurve(style, "f", "gaus", 0, 1).setParameters(1, 0, 0.5);
  curve.axes.x.title = AXIS_LABELS.isotropy;
  curve.axes.y.title = AXIS_LABELS.normalizedVolume;
  applyRole(style, curve, "fit");
  canvas.draw(curve);

  const histogram = new Histogram1D(style, "h", "h", 10, 0, 1);
  histogram.fillRandom(curve, 100, random);
  applyRole(style, histogram, "model");
  histogram.scale(0.05);
  canvas.draw(histogram, "histo,same");

  const graph = new GraphErrors(style, DATA_POINTS, "g");
  applyRole(style, graph, "data");
  canvas.draw(graph, "P,same");

  const legend = new Legend(style, 0.7, 0.7, 0.89, 0.89)
    .addEntry(curve, "Gaussian Fit", "L")
    .addEntry(histogram, "MC histo", "L")
    .addEntry(graph, "Data points", "PL");
  canvas.draw(legend, "same");

  const label = watermark(style, 0.88, 0.65);
  canvas.draw(label, "same");

  return { canvas, curve, histogram, graph, legend, label };
}

export function example2D(style: ActiveStyle, options: ExampleOptions = {}): Example2D {
  const random = options.random ?? createRandom();
  const canvas = new Canvas(style, "c2", "c2", { host: options.host });
  sizeCanvas(canvas, options.aspect ?? DEFAULT_ASPECT);
  applyMargins(canvas, { colorScale: true });

  const histogram = new Histogram2D(style, "h2", "", 40, -4, 4, 40, -20, 20);
  const source = new Function2D("f2", (x, y) => x * x + y * y, -4, 4, -4, 4);
  histogram.fillRandom(source, 5000, random);
  histogram.axes.x.title = "X^{2} (mm)";
  histogram.axes.y.title = "Y^{2} (mm)";
  histogram.axes.z.title = "Counts";
  canvas.draw(histogram, "COLZ");

  const label = watermark(style, 0.78, 0.5);
  canvas.draw(label, "same");

  return { canvas, histogram, label };
}

export interface RunOptions extends ExampleOptions {
  profile?: StyleProfile;
}

/** Apply the profile to a fresh style context and write both figures. Returns the written paths. */
export function runExamples(outDir: string, options: RunOptions = {}): string[] {
  const style = new ActiveStyle();
  style.apply(options.profile ?? presetProfile());

  mkdirSync(outDir, { recursive: true });
  const random = options.random ?? createRandom();
  const figures: [string, Canvas][] = [
    ["example1D.svg", example1D(style, { ...options, random }).canvas],
    ["example2D.svg", example2D(style, { ...options, random }).canvas],
  ];

  return figures.map(([file, canvas]) => {
    const path = join(outDir, file);
    canvas.saveAs(path);
    return path;
  });
}
