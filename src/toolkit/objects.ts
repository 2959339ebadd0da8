/**
 * Plot objects of the in-process toolkit.
 *
 * Every object copies the attributes it needs from the active style when it is
 * constructed. Setting an attribute on the object afterwards overrides the style
 * for that object only.
 */

import type { ActiveStyle } from "../style.js";
import type { AxisName, AxisStyle, MarkerShape, ResolvedStyle, TextAlign } from "../types.js";
import { createRandom, sampleIndex, type Random } from "./random.js";

export type LineStyle = "solid" | "dashed";

export interface LineAttributes {
  color: string;
  width: number;
  style: LineStyle;
  dashArray: readonly number[];
}

export interface MarkerAttributes {
  color: string;
  shape: MarkerShape;
  size: number;
}

export interface TextAttributes {
  fontFamily: string;
  /** Fraction of the smaller canvas dimension. */
  size: number;
  color: string;
  align: TextAlign;
}

export interface Axis extends AxisStyle {
  title: string;
  fontFamily: string;
}

export type FramedObject = FunctionCurve | Histogram1D | GraphErrors | Histogram2D;
export type PlotObject = FramedObject | Legend | TextAnnotation;

function makeAxis(style: Readonly<ResolvedStyle>, name: AxisName): Axis {
  return { ...style.axes[name], title: "", fontFamily: style.fontFamily };
}

function makeAxes(style: Readonly<ResolvedStyle>): Record<AxisName, Axis> {
  return { x: makeAxis(style, "x"), y: makeAxis(style, "y"), z: makeAxis(style, "z") };
}

function makeLine(style: Readonly<ResolvedStyle>, width: number): LineAttributes {
  return { color: "black", width, style: "solid", dashArray: style.dashArray };
}

// ═══════════════════════════════════════
// 1D function
// ═══════════════════════════════════════

export type CurveFormula = "gaus" | ((x: number, params: readonly number[]) => number);

function gaus(x: number, p: readonly number[]): number {
  const [amplitude = 1, mean = 0, sigma = 1] = p;
  if (sigma === 0) return 0;
  const z = (x - mean) / sigma;
  return amplitude * Math.exp(-0.5 * z * z);
}

export class FunctionCurve {
  readonly kind = "function";
  readonly name: string;
  readonly xmin: number;
  readonly xmax: number;
  readonly axes: Record<AxisName, Axis>;
  readonly line: LineAttributes;
  /** Number of points used when drawing or integrating. */
  npx = 100;
  title: string;
  private params: number[] = [];
  private readonly formula: (x: number, params: readonly number[]) => number;

  constructor(style: ActiveStyle, name: string, formula: CurveFormula, xmin: number, xmax: number) {
    const s = style.current;
    this.name = name;
    this.title = name;
    this.formula = formula === "gaus" ? gaus : formula;
    this.xmin = xmin;
    this.xmax = xmax;
    this.axes = makeAxes(s);
    this.line = makeLine(s, s.lineWidth);
  }

  setParameters(...params: number[]): this {
    this.params = [...params];
    return this;
  }

  get parameters(): readonly number[] {
    return this.params;
  }

  evaluate(x: number): number {
    return this.formula(x, this.params);
  }

  /** Evenly spaced (x, f(x)) samples over the range, endpoints included. */
  sample(points: number = this.npx): [number, number][] {
    const n = Math.max(2, points);
    const step = (this.xmax - this.xmin) / (n - 1);
    const out: [number, number][] = [];
    for (let i = 0; i < n; i++) {
      const x = this.xmin + i * step;
      out.push([x, this.evaluate(x)]);
    }
    return out;
  }
}

// ═══════════════════════════════════════
// 1D histogram
// ═══════════════════════════════════════

export class Histogram1D {
  readonly kind = "histogram";
  readonly name: string;
  readonly nbins: number;
  readonly xmin: number;
  readonly xmax: number;
  readonly axes: Record<AxisName, Axis>;
  readonly line: LineAttributes;
  title: string;
  fillColor: string | null = null;
  entries = 0;
  /** Bin contents, without under/overflow. */
  readonly contents: number[];
  private sumX = 0;
  private sumX2 = 0;
  private sumW = 0;

  constructor(style: ActiveStyle, name: string, title: string, nbins: number, xmin: number, xmax: number) {
    if (nbins < 1) throw new Error(`Histogram "${name}" needs at least one bin`);
    if (!(xmax > xmin)) throw new Error(`Histogram "${name}" has an empty range`);
    const s = style.current;
    this.name = name;
    this.title = title;
    this.nbins = nbins;
    this.xmin = xmin;
    this.xmax = xmax;
    this.contents = new Array<number>(nbins).fill(0);
    this.axes = makeAxes(s);
    this.line = makeLine(s, s.histogramLineWidth);
  }

  get binWidth(): number {
    return (this.xmax - this.xmin) / this.nbins;
  }

  binCenter(i: number): number {
    return this.xmin + (i + 0.5) * this.binWidth;
  }

  /** Index of the bin holding x, or -1 outside the range. */
  findBin(x: number): number {
    if (x < this.xmin || x >= this.xmax) return -1;
    return Math.min(this.nbins - 1, Math.floor((x - this.xmin) / this.binWidth));
  }

  fill(x: number, weight: number = 1): void {
    this.entries++;
    const bin = this.findBin(x);
    if (bin < 0) return;
    this.contents[bin] += weight;
    this.sumW += weight;
    this.sumX += weight * x;
    this.sumX2 += weight * x * x;
  }

  /** Fill with n values drawn from the curve's shape over the histogram range. */
  fillRandom(curve: FunctionCurve, n: number, random: Random = createRandom()): void {
    const cells = Math.max(curve.npx, this.nbins * 10);
    const width = (this.xmax - this.xmin) / cells;
    const cumulative: number[] = [];
    let total = 0;
    for (let i = 0; i < cells; i++) {
      total += Math.max(0, curve.evaluate(this.xmin + (i + 0.5) * width));
      cumulative.push(total);
    }
    if (total <= 0) throw new Error(`Function "${curve.name}" is not positive over [${this.xmin}, ${this.xmax}]`);
    for (let k = 0; k < n; k++) {
      const cell = sampleIndex(cumulative, random);
      this.fill(this.xmin + (cell + random()) * width);
    }
  }

  scale(factor: number): void {
    for (let i = 0; i < this.nbins; i++) this.contents[i] *= factor;
    this.sumW *= factor;
    this.sumX *= factor;
    this.sumX2 *= factor;
  }

  get maximum(): number {
    return Math.max(...this.contents);
  }

  get mean(): number {
    return this.sumW === 0 ? 0 : this.sumX / this.sumW;
  }

  get stdDev(): number {
    if (this.sumW === 0) return 0;
    const m = this.mean;
    return Math.sqrt(Math.max(0, this.sumX2 / this.sumW - m * m));
  }
}

// ═══════════════════════════════════════
// Points with error bars
// ═══════════════════════════════════════

export interface GraphPoint {
  x: number;
  y: number;
  ex?: number;
  ey?: number;
}

export class GraphErrors {
  readonly kind = "graph";
  readonly points: readonly GraphPoint[];
  readonly axes: Record<AxisName, Axis>;
  readonly line: LineAttributes;
  readonly marker: MarkerAttributes;
  name: string;
  title = "";

  constructor(style: ActiveStyle, points: readonly GraphPoint[], name: string = "graph") {
    const s = style.current;
    this.points = points.map((p) => ({ ...p }));
    this.name = name;
    this.axes = makeAxes(s);
    this.line = makeLine(s, s.lineWidth);
    this.marker = { color: "black", shape: s.markerShape, size: s.markerSize };
  }
}

// ═══════════════════════════════════════
// 2D function and histogram
// ═══════════════════════════════════════

export class Function2D {
  readonly kind = "function2d";
  readonly name: string;
  readonly xmin: number;
  readonly xmax: number;
  readonly ymin: number;
  readonly ymax: number;
  npx = 30;
  npy = 30;
  private readonly formula: (x: number, y: number) => number;

  constructor(name: string, formula: (x: number, y: number) => number, xmin: number, xmax: number, ymin: number, ymax: number) {
    this.name = name;
    this.formula = formula;
    this.xmin = xmin;
    this.xmax = xmax;
    this.ymin = ymin;
    this.ymax = ymax;
  }

  evaluate(x: number, y: number): number {
    return this.formula(x, y);
  }
}

export class Histogram2D {
  readonly kind = "histogram2d";
  readonly name: string;
  readonly nx: number;
  readonly xmin: number;
  readonly xmax: number;
  readonly ny: number;
  readonly ymin: number;
  readonly ymax: number;
  readonly axes: Record<AxisName, Axis>;
  title: string;
  entries = 0;
  /** contents[iy][ix] */
  readonly contents: number[][];
  private sumW = 0;
  private sumX = 0;
  private sumY = 0;

  constructor(
    style: ActiveStyle,
    name: string,
    title: string,
    nx: number,
    xmin: number,
    xmax: number,
    ny: number,
    ymin: number,
    ymax: number,
  ) {
    if (nx < 1 || ny < 1) throw new Error(`Histogram "${name}" needs at least one bin per axis`);
    this.name = name;
    this.title = title;
    this.nx = nx;
    this.xmin = xmin;
    this.xmax = xmax;
    this.ny = ny;
    this.ymin = ymin;
    this.ymax = ymax;
    this.contents = Array.from({ length: ny }, () => new Array<number>(nx).fill(0));
    this.axes = makeAxes(style.current);
  }

  fill(x: number, y: number, weight: number = 1): void {
    this.entries++;
    if (x < this.xmin || x >= this.xmax || y < this.ymin || y >= this.ymax) return;
    const ix = Math.min(this.nx - 1, Math.floor(((x - this.xmin) / (this.xmax - this.xmin)) * this.nx));
    const iy = Math.min(this.ny - 1, Math.floor(((y - this.ymin) / (this.ymax - this.ymin)) * this.ny));
    this.contents[iy][ix] += weight;
    this.sumW += weight;
    this.sumX += weight * x;
    this.sumY += weight * y;
  }

  /** Fill with n points drawn from the function over its own range. */
  fillRandom(fn: Function2D, n: number = 5000, random: Random = createRandom()): void {
    const dx = (fn.xmax - fn.xmin) / fn.npx;
    const dy = (fn.ymax - fn.ymin) / fn.npy;
    const cumulative: number[] = [];
    let total = 0;
    for (let j = 0; j < fn.npy; j++) {
      for (let i = 0; i < fn.npx; i++) {
        total += Math.max(0, fn.evaluate(fn.xmin + (i + 0.5) * dx, fn.ymin + (j + 0.5) * dy));
        cumulative.push(total);
      }
    }
    if (total <= 0) throw new Error(`Function "${fn.name}" is not positive over its range`);
    for (let k = 0; k < n; k++) {
      const cell = sampleIndex(cumulative, random);
      const i = cell % fn.npx;
      const j = Math.floor(cell / fn.npx);
      this.fill(fn.xmin + (i + random()) * dx, fn.ymin + (j + random()) * dy);
    }
  }

  get maximum(): number {
    return Math.max(...this.contents.map((row) => Math.max(...row)));
  }

  get meanX(): number {
    return this.sumW === 0 ? 0 : this.sumX / this.sumW;
  }

  get meanY(): number {
    return this.sumW === 0 ? 0 : this.sumY / this.sumW;
  }
}

// ═══════════════════════════════════════
// Legend and annotations
// ═══════════════════════════════════════

/** L: line sample, P: marker, PL: both, F: filled box. */
export type LegendOption = "L" | "P" | "PL" | "F";

export interface LegendEntry {
  object: FramedObject;
  label: string;
  option: LegendOption;
}

export class Legend {
  readonly kind = "legend";
  /** NDC corners. */
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
  readonly entries: LegendEntry[] = [];
  borderSize: number;
  fillColor: string;
  readonly text: TextAttributes;

  constructor(style: ActiveStyle, x1: number, y1: number, x2: number, y2: number) {
    const s = style.current;
    this.x1 = x1;
    this.y1 = y1;
    this.x2 = x2;
    this.y2 = y2;
    this.borderSize = s.legendBorderSize;
    this.fillColor = s.legendFillColor;
    this.text = { fontFamily: s.legendFontFamily, size: s.legendTextSize, color: "black", align: "left-center" };
  }

  addEntry(object: FramedObject, label: string, option: LegendOption = "L"): this {
    this.entries.push({ object, label, option });
    return this;
  }
}

/** Text placed in normalized device coordinates: (0, 0) bottom left, (1, 1) top right. */
export class TextAnnotation {
  readonly kind = "text";
  readonly x: number;
  readonly y: number;
  readonly content: string;
  readonly text: TextAttributes;

  constructor(style: ActiveStyle, x: number, y: number, content: string) {
    const s = style.current;
    this.x = x;
    this.y = y;
    this.content = content;
    this.text = { fontFamily: s.fontFamily, size: s.textSize, color: "black", align: s.textAlign };
  }
}
