/**
 * Canvas to SVG.
 * Pure function over a canvas's draw list; returns the SVG document as a string.
 *
 * Each drawn object becomes one `<g data-primitive="...">`. Title, stats and fit
 * boxes are drawn as `<g data-box="...">` when the canvas style enables them.
 */

import type { Canvas } from "../toolkit/canvas.js";
import { cssColor, paletteByCode, paletteColor, type ToolkitPalette } from "../toolkit/colors.js";
import type {
  Axis,
  FramedObject,
  FunctionCurve,
  GraphErrors,
  Histogram1D,
  Histogram2D,
  Legend,
  LegendEntry,
  LineAttributes,
  MarkerAttributes,
  TextAnnotation,
  TextAttributes,
} from "../toolkit/objects.js";
import type { ResolvedStyle } from "../types.js";
import { escapeXml, fmt, formatTick, niceTicks } from "../utils.js";
import { markupToSvg, markupToText } from "./markup.js";

/** Marker size 1 in pixels. */
const MARKER_UNIT = 8;
const COLOR_SCALE_BANDS = 50;

interface Frame {
  left: number;
  right: number;
  top: number;
  bottom: number;
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
  /** Colour scale range for 2D content. */
  zmax: number | null;
  clipId: string;
}

interface RenderContext {
  width: number;
  height: number;
  /** Text sizes are fractions of this length. */
  unit: number;
  style: Readonly<ResolvedStyle>;
  palette: ToolkitPalette;
}

export function renderCanvas(canvas: Canvas): string {
  const { width, height } = canvas.reportedSize;
  const ctx: RenderContext = {
    width,
    height,
    unit: Math.min(width, height),
    style: canvas.style,
    palette: paletteByCode(canvas.style.paletteCode),
  };

  let svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">\n`;
  const border = canvas.borders ? ` stroke="#000000" stroke-width="2"` : "";
  svg += `  <rect data-role="canvas" x="0" y="0" width="${width}" height="${height}" fill="${cssColor(canvas.fillColor)}"${border}/>\n`;
  if (ctx.style.padColor !== canvas.fillColor) {
    const inset = canvas.borders ? 2 : 0;
    svg += `  <rect data-role="pad" x="${inset}" y="${inset}" width="${fmt(width - 2 * inset)}" height="${fmt(height - 2 * inset)}" fill="${cssColor(ctx.style.padColor)}"/>\n`;
  }

  const owner = canvas.frameOwner;
  const hasColorScale = canvas.primitives.some((p) => p.object.kind === "histogram2d" && p.options.includes("COLZ"));
  let frame: Frame | null = null;
  if (owner) {
    frame = computeFrame(canvas, owner);
    svg += `  <defs><clipPath id="${frame.clipId}"><rect x="${fmt(frame.left)}" y="${fmt(frame.top)}" width="${fmt(frame.right - frame.left)}" height="${fmt(frame.bottom - frame.top)}"/></clipPath></defs>\n`;
    svg += `  <rect data-role="frame" x="${fmt(frame.left)}" y="${fmt(frame.top)}" width="${fmt(frame.right - frame.left)}" height="${fmt(frame.bottom - frame.top)}" fill="${cssColor(ctx.style.frameColor)}"/>\n`;
  }

  for (const { object, options } of canvas.primitives) {
    switch (object.kind) {
      case "function":
        if (frame) svg += renderCurve(object, frame);
        break;
      case "histogram":
        if (frame) svg += renderHistogram(object, frame);
        break;
      case "graph":
        if (frame) svg += renderGraph(object, options, frame);
        break;
      case "histogram2d":
        if (frame) svg += renderDensity(object, options, frame, ctx);
        break;
      case "legend":
        svg += renderLegend(object, ctx);
        break;
      case "text":
        svg += renderText(object, ctx);
        break;
    }
  }

  if (owner && frame) {
    svg += renderAxes(owner, frame, ctx, hasColorScale);
    svg += renderBoxes(canvas, owner, frame, ctx);
  }

  svg += `</svg>\n`;
  return svg;
}

// ═══════════════════════════════════════
// Frame
// ═══════════════════════════════════════

function computeFrame(canvas: Canvas, owner: FramedObject): Frame {
  const { width, height } = canvas.reportedSize;
  const m = canvas.margins;
  const base = {
    left: m.left * width,
    right: (1 - m.right) * width,
    top: m.top * height,
    bottom: (1 - m.bottom) * height,
    clipId: `${canvas.name.replace(/[^A-Za-z0-9_-]/g, "_")}-frame`,
  };

  switch (owner.kind) {
    case "function": {
      const ys = owner.sample().map(([, y]) => y);
      const [ymin, ymax] = padRange(Math.min(0, ...ys), Math.max(...ys));
      return { ...base, xmin: owner.xmin, xmax: owner.xmax, ymin, ymax, zmax: null };
    }
    case "histogram": {
      const [ymin, ymax] = padRange(Math.min(0, ...owner.contents), owner.maximum);
      return { ...base, xmin: owner.xmin, xmax: owner.xmax, ymin, ymax, zmax: null };
    }
    case "graph": {
      const xs = owner.points.flatMap((p) => [p.x - (p.ex ?? 0), p.x + (p.ex ?? 0)]);
      const ys = owner.points.flatMap((p) => [p.y - (p.ey ?? 0), p.y + (p.ey ?? 0)]);
      const [xmin, xmax] = spreadRange(xs);
      const [ymin, ymax] = spreadRange(ys);
      return { ...base, xmin, xmax, ymin, ymax, zmax: null };
    }
    case "histogram2d":
      return {
        ...base,
        xmin: owner.xmin,
        xmax: owner.xmax,
        ymin: owner.ymin,
        ymax: owner.ymax,
        zmax: owner.maximum > 0 ? owner.maximum : 1,
      };
  }
}

/** Leave 5% headroom above the maximum. */
function padRange(lo: number, hi: number): [number, number] {
  if (!(hi > lo)) return [lo, lo + 1];
  return [lo, hi + 0.05 * (hi - lo)];
}

/** Extend a value spread by 10% on both sides. */
function spreadRange(values: number[]): [number, number] {
  if (values.length === 0) return [0, 1];
  const lo = Math.min(...values);
  const hi = Math.max(...values);
  if (hi === lo) return [lo - 1, hi + 1];
  const pad = 0.1 * (hi - lo);
  return [lo - pad, hi + pad];
}

function px(frame: Frame, x: number): number {
  return frame.left + ((x - frame.xmin) / (frame.xmax - frame.xmin)) * (frame.right - frame.left);
}

function py(frame: Frame, y: number): number {
  return frame.bottom - ((y - frame.ymin) / (frame.ymax - frame.ymin)) * (frame.bottom - frame.top);
}

// ═══════════════════════════════════════
// Primitives
// ═══════════════════════════════════════

function strokeAttrs(line: LineAttributes): string {
  const dash = line.style === "dashed" ? ` stroke-dasharray="${line.dashArray.join(" ")}"` : "";
  return `stroke="${cssColor(line.color)}" stroke-width="${fmt(line.width)}"${dash}`;
}

function renderCurve(curve: FunctionCurve, frame: Frame): string {
  const points = curve.sample().map(([x, y]) => `${fmt(px(frame, x))},${fmt(py(frame, y))}`).join(" ");
  return (
    `  <g data-primitive="function" data-name="${escapeXml(curve.name)}" clip-path="url(#${frame.clipId})">\n` +
    `    <polyline points="${points}" fill="none" ${strokeAttrs(curve.line)} stroke-linejoin="round"/>\n` +
    `  </g>\n`
  );
}

function renderHistogram(hist: Histogram1D, frame: Frame): string {
  const base = py(frame, Math.max(frame.ymin, 0));
  let d = `M${fmt(px(frame, hist.xmin))} ${fmt(base)}`;
  hist.contents.forEach((content, i) => {
    d += ` V${fmt(py(frame, content))} H${fmt(px(frame, hist.xmin + (i + 1) * hist.binWidth))}`;
  });
  d += ` V${fmt(base)}`;
  const fill = hist.fillColor ? cssColor(hist.fillColor) : "none";
  return (
    `  <g data-primitive="histogram" data-name="${escapeXml(hist.name)}" clip-path="url(#${frame.clipId})">\n` +
    `    <path d="${d}" fill="${fill}" ${strokeAttrs(hist.line)}/>\n` +
    `  </g>\n`
  );
}

function renderGraph(graph: GraphErrors, options: string[], frame: Frame): string {
  const showLine = options.some((o) => o.includes("L"));
  const showMarkers = options.some((o) => o.includes("P")) || !showLine;
  let svg = `  <g data-primitive="graph" data-name="${escapeXml(graph.name)}" clip-path="url(#${frame.clipId})">\n`;

  for (const p of graph.points) {
    const x = px(frame, p.x);
    const y = py(frame, p.y);
    if (p.ey) {
      svg += `    <line x1="${fmt(x)}" y1="${fmt(py(frame, p.y - p.ey))}" x2="${fmt(x)}" y2="${fmt(py(frame, p.y + p.ey))}" ${strokeAttrs(graph.line)}/>\n`;
    }
    if (p.ex) {
      svg += `    <line x1="${fmt(px(frame, p.x - p.ex))}" y1="${fmt(y)}" x2="${fmt(px(frame, p.x + p.ex))}" y2="${fmt(y)}" ${strokeAttrs(graph.line)}/>\n`;
    }
  }
  if (showLine && graph.points.length > 1) {
    const pts = graph.points.map((p) => `${fmt(px(frame, p.x))},${fmt(py(frame, p.y))}`).join(" ");
    svg += `    <polyline points="${pts}" fill="none" ${strokeAttrs(graph.line)}/>\n`;
  }
  if (showMarkers) {
    for (const p of graph.points) {
      svg += `    ${renderMarker(graph.marker, px(frame, p.x), py(frame, p.y))}\n`;
    }
  }
  svg += `  </g>\n`;
  return svg;
}

export function renderMarker(marker: MarkerAttributes, x: number, y: number): string {
  const size = MARKER_UNIT * marker.size;
  const half = size / 2;
  const color = cssColor(marker.color);
  switch (marker.shape) {
    case "dot":
      return `<circle data-marker="dot" cx="${fmt(x)}" cy="${fmt(y)}" r="1" fill="${color}"/>`;
    case "circle":
      return `<circle data-marker="circle" cx="${fmt(x)}" cy="${fmt(y)}" r="${fmt(half)}" fill="none" stroke="${color}"/>`;
    case "filled-circle":
      return `<circle data-marker="filled-circle" cx="${fmt(x)}" cy="${fmt(y)}" r="${fmt(half)}" fill="${color}"/>`;
    case "filled-square":
      return `<rect data-marker="filled-square" x="${fmt(x - half)}" y="${fmt(y - half)}" width="${fmt(size)}" height="${fmt(size)}" fill="${color}"/>`;
    case "open-square":
      return `<rect data-marker="open-square" x="${fmt(x - half)}" y="${fmt(y - half)}" width="${fmt(size)}" height="${fmt(size)}" fill="none" stroke="${color}"/>`;
    case "filled-triangle":
      return `<polygon data-marker="filled-triangle" points="${fmt(x)},${fmt(y - half)} ${fmt(x + half)},${fmt(y + half)} ${fmt(x - half)},${fmt(y + half)}" fill="${color}"/>`;
  }
}

function renderDensity(hist: Histogram2D, options: string[], frame: Frame, ctx: RenderContext): string {
  const zmax = frame.zmax ?? (hist.maximum > 0 ? hist.maximum : 1);
  const cellW = (frame.right - frame.left) * ((hist.xmax - hist.xmin) / (frame.xmax - frame.xmin)) / hist.nx;
  const cellH = (frame.bottom - frame.top) * ((hist.ymax - hist.ymin) / (frame.ymax - frame.ymin)) / hist.ny;
  let svg = `  <g data-primitive="density" data-name="${escapeXml(hist.name)}" data-palette="${ctx.palette.name}" clip-path="url(#${frame.clipId})">\n`;

  hist.contents.forEach((row, iy) => {
    row.forEach((content, ix) => {
      if (content <= 0) return;
      const x = px(frame, hist.xmin + (ix * (hist.xmax - hist.xmin)) / hist.nx);
      const y = py(frame, hist.ymin + ((iy + 1) * (hist.ymax - hist.ymin)) / hist.ny);
      svg += `    <rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(cellW)}" height="${fmt(cellH)}" fill="${paletteColor(ctx.palette, content / zmax)}"/>\n`;
    });
  });
  svg += `  </g>\n`;

  if (options.includes("COLZ")) svg += renderColorScale(hist.axes.z, zmax, frame, ctx);
  return svg;
}

function renderColorScale(axis: Axis, zmax: number, frame: Frame, ctx: RenderContext): string {
  const x = frame.right + 0.01 * ctx.width;
  const w = 0.04 * ctx.width;
  const bandH = (frame.bottom - frame.top) / COLOR_SCALE_BANDS;
  let svg = `  <g data-role="color-scale" data-palette="${ctx.palette.name}">\n`;
  for (let i = 0; i < COLOR_SCALE_BANDS; i++) {
    const y = frame.bottom - (i + 1) * bandH;
    svg += `    <rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(w)}" height="${fmt(bandH)}" fill="${paletteColor(ctx.palette, (i + 0.5) / COLOR_SCALE_BANDS)}"/>\n`;
  }

  const labelSize = axis.labelSize * ctx.unit;
  const { step, values } = niceTicks(0, zmax, 5);
  for (const v of values) {
    const y = frame.bottom - (v / zmax) * (frame.bottom - frame.top);
    svg += `    <line x1="${fmt(x + w)}" y1="${fmt(y)}" x2="${fmt(x + w - axis.tickLength * ctx.unit)}" y2="${fmt(y)}" stroke="#000000"/>\n`;
    svg += `    <text class="axis-label" data-axis="z" x="${fmt(x + w + axis.labelOffset * ctx.unit)}" y="${fmt(y + labelSize * 0.35)}" font-family="${escapeXml(axis.fontFamily)}" font-size="${fmt(labelSize)}">${formatTick(v, step)}</text>\n`;
  }
  if (axis.title) {
    const tx = Math.min(ctx.width - 2, x + w + axis.labelOffset * ctx.unit + labelWidth(values, step, labelSize) + axis.titleOffset * axis.titleSize * ctx.unit);
    svg += `    ${axisTitle(axis, "z", tx, frame.top, ctx, true)}\n`;
  }
  svg += `  </g>\n`;
  return svg;
}

function textAnchor(attrs: TextAttributes): { anchor: string; baseline: string } {
  const [h, v] = attrs.align.split("-");
  const anchor = h === "left" ? "start" : h === "right" ? "end" : "middle";
  const baseline = v === "center" ? ` dominant-baseline="middle"` : v === "top" ? ` dominant-baseline="hanging"` : "";
  return { anchor, baseline };
}

function textElement(attrs: TextAttributes, x: number, y: number, content: string, unit: number): string {
  const { anchor, baseline } = textAnchor(attrs);
  return `<text x="${fmt(x)}" y="${fmt(y)}" text-anchor="${anchor}"${baseline} font-family="${escapeXml(attrs.fontFamily)}" font-size="${fmt(attrs.size * unit)}" fill="${cssColor(attrs.color)}">${markupToSvg(content)}</text>`;
}

function renderText(text: TextAnnotation, ctx: RenderContext): string {
  const x = text.x * ctx.width;
  const y = (1 - text.y) * ctx.height;
  return `  <g data-primitive="text">\n    ${textElement(text.text, x, y, text.content, ctx.unit)}\n  </g>\n`;
}

function renderLegend(legend: Legend, ctx: RenderContext): string {
  const x = legend.x1 * ctx.width;
  const y = (1 - legend.y2) * ctx.height;
  const w = (legend.x2 - legend.x1) * ctx.width;
  const h = (legend.y2 - legend.y1) * ctx.height;
  const stroke = legend.borderSize > 0 ? ` stroke="#000000" stroke-width="${fmt(legend.borderSize)}"` : "";
  let svg = `  <g data-primitive="legend">\n`;
  svg += `    <rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(w)}" height="${fmt(h)}" fill="${cssColor(legend.fillColor)}"${stroke}/>\n`;

  const n = Math.max(1, legend.entries.length);
  const rowH = h / n;
  const symbolW = 0.25 * w;
  // size 0 means fit the row
  const text: TextAttributes = legend.text.size > 0 ? legend.text : { ...legend.text, size: (0.6 * rowH) / ctx.unit };
  legend.entries.forEach((entry, i) => {
    const cy = y + (i + 0.5) * rowH;
    svg += legendSymbol(entry, x + 0.05 * w, x + symbolW, cy, rowH);
    svg += `    ${textElement(text, x + symbolW + 0.05 * w, cy, entry.label, ctx.unit)}\n`;
  });
  svg += `  </g>\n`;
  return svg;
}

function legendSymbol(entry: LegendEntry, x1: number, x2: number, cy: number, rowH: number): string {
  const { object, option } = entry;
  const line = "line" in object ? object.line : null;
  let svg = "";
  if (option === "F") {
    const fill = object.kind === "histogram" && object.fillColor ? object.fillColor : (line?.color ?? "black");
    svg += `    <rect x="${fmt(x1)}" y="${fmt(cy - rowH * 0.3)}" width="${fmt(x2 - x1)}" height="${fmt(rowH * 0.6)}" fill="${cssColor(fill)}"/>\n`;
    return svg;
  }
  if (option.includes("L") && line) {
    svg += `    <line x1="${fmt(x1)}" y1="${fmt(cy)}" x2="${fmt(x2)}" y2="${fmt(cy)}" ${strokeAttrs(line)}/>\n`;
  }
  if (option.includes("P") && object.kind === "graph") {
    svg += `    ${renderMarker(object.marker, (x1 + x2) / 2, cy)}\n`;
  }
  return svg;
}

// ═══════════════════════════════════════
// Axes
// ═══════════════════════════════════════

function renderAxes(owner: FramedObject, frame: Frame, ctx: RenderContext, hasColorScale: boolean): string {
  const { style } = ctx;
  const xAxis = owner.axes.x;
  const yAxis = owner.axes.y;
  let svg = `  <g data-role="axes">\n`;
  svg += `    <rect x="${fmt(frame.left)}" y="${fmt(frame.top)}" width="${fmt(frame.right - frame.left)}" height="${fmt(frame.bottom - frame.top)}" fill="none" stroke="#000000"/>\n`;

  // x axis
  const xt = niceTicks(frame.xmin, frame.xmax, 8);
  const xTick = xAxis.tickLength * ctx.unit;
  const xDir = style.ticksInward ? -1 : 1;
  for (const [v, len] of tickMarks(xt.values, xt.step, frame.xmin, frame.xmax, xTick, style.minorTicks)) {
    const x = px(frame, v);
    svg += `    <line x1="${fmt(x)}" y1="${fmt(frame.bottom)}" x2="${fmt(x)}" y2="${fmt(frame.bottom + xDir * len)}" stroke="#000000"/>\n`;
    if (style.ticksBothSides) {
      svg += `    <line x1="${fmt(x)}" y1="${fmt(frame.top)}" x2="${fmt(x)}" y2="${fmt(frame.top - xDir * len)}" stroke="#000000"/>\n`;
    }
  }
  const xLabelSize = xAxis.labelSize * ctx.unit;
  const xLabelY = frame.bottom + xAxis.labelOffset * ctx.unit + xLabelSize;
  for (const v of xt.values) {
    svg += `    <text class="axis-label" data-axis="x" x="${fmt(px(frame, v))}" y="${fmt(xLabelY)}" text-anchor="middle" font-family="${escapeXml(xAxis.fontFamily)}" font-size="${fmt(xLabelSize)}">${formatTick(v, xt.step)}</text>\n`;
  }
  if (xAxis.title) {
    const ty = xLabelY + xAxis.titleOffset * 1.6 * xAxis.titleSize * ctx.unit;
    svg += `    ${axisTitle(xAxis, "x", frame.right, ty, ctx, false)}\n`;
  }

  // y axis
  const yt = niceTicks(frame.ymin, frame.ymax, 6);
  const yTick = yAxis.tickLength * ctx.unit;
  const yDir = style.ticksInward ? 1 : -1;
  for (const [v, len] of tickMarks(yt.values, yt.step, frame.ymin, frame.ymax, yTick, style.minorTicks)) {
    const y = py(frame, v);
    svg += `    <line x1="${fmt(frame.left)}" y1="${fmt(y)}" x2="${fmt(frame.left + yDir * len)}" y2="${fmt(y)}" stroke="#000000"/>\n`;
    if (style.ticksBothSides && !hasColorScale) {
      svg += `    <line x1="${fmt(frame.right)}" y1="${fmt(y)}" x2="${fmt(frame.right - yDir * len)}" y2="${fmt(y)}" stroke="#000000"/>\n`;
    }
  }
  const yLabelSize = yAxis.labelSize * ctx.unit;
  const yLabelX = frame.left - yAxis.labelOffset * ctx.unit - 0.25 * yLabelSize;
  for (const v of yt.values) {
    svg += `    <text class="axis-label" data-axis="y" x="${fmt(yLabelX)}" y="${fmt(py(frame, v) + 0.35 * yLabelSize)}" text-anchor="end" font-family="${escapeXml(yAxis.fontFamily)}" font-size="${fmt(yLabelSize)}">${formatTick(v, yt.step)}</text>\n`;
  }
  if (yAxis.title) {
    const tx = Math.max(
      2,
      yLabelX - labelWidth(yt.values, yt.step, yLabelSize) - yAxis.titleOffset * 1.6 * yAxis.titleSize * ctx.unit,
    );
    svg += `    ${axisTitle(yAxis, "y", tx, frame.top, ctx, true)}\n`;
  }

  svg += `  </g>\n`;
  return svg;
}

/** Major and minor tick positions with their lengths. */
function tickMarks(majors: number[], step: number, min: number, max: number, length: number, minor: boolean): [number, number][] {
  const marks: [number, number][] = majors.map((v) => [v, length]);
  if (!minor) return marks;
  const minorStep = step / 5;
  const first = Math.ceil(min / minorStep - 1e-9);
  const last = Math.floor(max / minorStep + 1e-9);
  for (let k = first; k <= last; k++) {
    if (k % 5 === 0) continue;
    marks.push([k * minorStep, length / 2]);
  }
  return marks;
}

/** Rough rendered width of the widest tick label. */
function labelWidth(values: number[], step: number, size: number): number {
  const chars = Math.max(1, ...values.map((v) => formatTick(v, step).length));
  return chars * 0.5 * size;
}

function axisTitle(axis: Axis, name: "x" | "y" | "z", x: number, y: number, ctx: RenderContext, rotated: boolean): string {
  const rotate = rotated ? ` transform="rotate(-90 ${fmt(x)} ${fmt(y)})"` : "";
  return `<text class="axis-title" data-axis="${name}" x="${fmt(x)}" y="${fmt(y)}"${rotate} text-anchor="end" font-family="${escapeXml(axis.fontFamily)}" font-size="${fmt(axis.titleSize * ctx.unit)}" fill="${cssColor(axis.titleColor)}">${markupToSvg(axis.title)}</text>`;
}

// ═══════════════════════════════════════
// Title, stats and fit boxes
// ═══════════════════════════════════════

function renderBoxes(canvas: Canvas, owner: FramedObject, frame: Frame, ctx: RenderContext): string {
  const { style } = ctx;
  const boxText: TextAttributes = { fontFamily: style.fontFamily, size: style.axisLabelSize, color: "black", align: "left-center" };
  let svg = "";

  if (style.showTitle && markupToText(owner.title).trim()) {
    const title: TextAttributes = { ...boxText, size: style.axisTitleSize, align: "center-center" };
    svg += `  <g data-box="title">\n    ${textElement(title, ctx.width / 2, frame.top / 2, owner.title, ctx.unit)}\n  </g>\n`;
  }

  if (style.showStats && (owner.kind === "histogram" || owner.kind === "histogram2d")) {
    const lines =
      owner.kind === "histogram"
        ? [owner.name, `Entries ${owner.entries}`, `Mean ${owner.mean.toFixed(4)}`, `Std Dev ${owner.stdDev.toFixed(4)}`]
        : [owner.name, `Entries ${owner.entries}`, `Mean x ${owner.meanX.toFixed(4)}`, `Mean y ${owner.meanY.toFixed(4)}`];
    svg += statBox("stats", lines, frame, boxText, ctx);
  }

  if (style.showFitParams) {
    const lines: string[] = [];
    for (const { object } of canvas.primitives) {
      if (object.kind !== "function") continue;
      object.parameters.forEach((p, i) => lines.push(`${object.name} p${i} = ${p.toFixed(3)}`));
    }
    if (lines.length > 0) svg += statBox("fit", lines, frame, boxText, ctx);
  }

  return svg;
}

function statBox(kind: string, lines: string[], frame: Frame, text: TextAttributes, ctx: RenderContext): string {
  const rowH = text.size * ctx.unit * 1.3;
  const w = 0.25 * ctx.width;
  const h = rowH * lines.length;
  const x = frame.right - w;
  const y = kind === "fit" ? frame.bottom - h : frame.top;
  let svg = `  <g data-box="${kind}">\n`;
  svg += `    <rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(w)}" height="${fmt(h)}" fill="#ffffff" stroke="#000000"/>\n`;
  lines.forEach((line, i) => {
    svg += `    ${textElement(text, x + 0.04 * w, y + (i + 0.5) * rowH, line, ctx.unit)}\n`;
  });
  svg += `  </g>\n`;
  return svg;
}
