/**
 * Canvas: a drawing surface with a requested size, a window size and the
 * inner size the toolkit actually reports.
 *
 * On a desktop host the window decorations eat into the window, so after
 * `setCanvasSize(w, h)` the reported inner size is smaller than requested.
 * In batch mode there is no chrome and the two agree.
 */

import { writeFileSync } from "node:fs";
import { extname } from "node:path";
import { EmptyCanvasError, ExportFormatError } from "../errors.js";
import type { ActiveStyle } from "../style.js";
import type { Margins, ResolvedStyle, Size } from "../types.js";
import { renderCanvas } from "../formatters/svg.js";
import type { FramedObject, PlotObject } from "./objects.js";

/** Pixels taken by window decorations on the host. */
export interface HostChrome {
  width: number;
  height: number;
}

export const BATCH_HOST: HostChrome = { width: 0, height: 0 };

export const DEFAULT_CANVAS_SIZE: Size = { width: 700, height: 500 };

export interface DrawnPrimitive {
  object: PlotObject;
  /** Upper-cased draw option tokens, e.g. ["HISTO", "SAME"]. */
  options: string[];
}

export interface CanvasOptions {
  host?: HostChrome;
}

export class Canvas {
  readonly name: string;
  readonly title: string;
  readonly host: HostChrome;
  /** Style as it was when the canvas was created. */
  readonly style: Readonly<ResolvedStyle>;
  fillColor: string;
  borders: boolean;
  readonly margins: Margins = { left: 0.1, right: 0.1, top: 0.1, bottom: 0.1 };
  private canvasSize: Size = { ...DEFAULT_CANVAS_SIZE };
  private windowSize: Size = { ...DEFAULT_CANVAS_SIZE };
  private drawn: DrawnPrimitive[] = [];

  constructor(style: ActiveStyle, name: string, title: string = name, options: CanvasOptions = {}) {
    this.name = name;
    this.title = title;
    this.host = options.host ?? BATCH_HOST;
    this.style = style.current;
    this.fillColor = this.style.canvasColor;
    this.borders = this.style.borders;
  }

  /** Set the drawing area size. The window is resized to the same outer size. */
  setCanvasSize(width: number, height: number): void {
    this.canvasSize = { width, height };
    this.windowSize = { width, height };
  }

  setWindowSize(width: number, height: number): void {
    this.windowSize = { width, height };
  }

  get requestedSize(): Size {
    return { ...this.canvasSize };
  }

  get window(): Size {
    return { ...this.windowSize };
  }

  /** Inner size the toolkit reports: window minus host decorations. */
  get reportedSize(): Size {
    return {
      width: Math.max(0, this.windowSize.width - this.host.width),
      height: Math.max(0, this.windowSize.height - this.host.height),
    };
  }

  setLeftMargin(m: number): void {
    this.margins.left = m;
  }

  setRightMargin(m: number): void {
    this.margins.right = m;
  }

  setTopMargin(m: number): void {
    this.margins.top = m;
  }

  setBottomMargin(m: number): void {
    this.margins.bottom = m;
  }

  /**
   * Add an object to the draw list. A framed object drawn without "same"
   * replaces everything drawn so far.
   */
  draw(object: PlotObject, option: string = ""): void {
    const options = option
      .split(/[,\s]+/)
      .map((o) => o.trim().toUpperCase())
      .filter((o) => o.length > 0);
    if (isFramed(object) && !options.includes("SAME")) this.drawn = [];
    this.drawn.push({ object, options });
  }

  clear(): void {
    this.drawn = [];
  }

  get primitives(): readonly DrawnPrimitive[] {
    return this.drawn;
  }

  /** The first framed object defines the axes. */
  get frameOwner(): FramedObject | null {
    for (const p of this.drawn) {
      if (isFramed(p.object)) return p.object;
    }
    return null;
  }

  toSvg(): string {
    if (this.drawn.length === 0) throw new EmptyCanvasError(this.name);
    return renderCanvas(this);
  }

  /** Write the canvas as SVG. Filesystem errors propagate unchanged. */
  saveAs(path: string): void {
    if (extname(path).toLowerCase() !== ".svg") throw new ExportFormatError(path);
    writeFileSync(path, this.toSvg());
  }
}

export function isFramed(object: PlotObject): object is FramedObject {
  return object.kind !== "legend" && object.kind !== "text";
}
