/**
 * Canvas sizing and margins.
 */

import type { Canvas } from "./toolkit/canvas.js";
import type { Size } from "./types.js";

export type AspectRatio =
  | { kind: "4:3" }
  | { kind: "16:9" }
  | { kind: "custom"; width: number; height: number };

export const DEFAULT_ASPECT: AspectRatio = { kind: "4:3" };

/** Margin reserved for axis titles and, on 2D plots, the colour scale. */
export const PLOT_MARGIN = 0.2;

export function aspectSize(aspect: AspectRatio): Size {
  switch (aspect.kind) {
    case "4:3":
      return { width: 800, height: 600 };
    case "16:9":
      return { width: 1600, height: 900 };
    case "custom":
      return { width: aspect.width, height: aspect.height };
  }
}

/** Parse "4:3", "16:9" or "WIDTHxHEIGHT". */
export function parseAspect(value: string): AspectRatio | null {
  const v = value.trim().toLowerCase();
  if (v === "4:3") return { kind: "4:3" };
  if (v === "16:9") return { kind: "16:9" };
  const match = /^(\d+)x(\d+)$/.exec(v);
  if (!match) return null;
  const width = parseInt(match[1], 10);
  const height = parseInt(match[2], 10);
  if (width <= 0 || height <= 0) return null;
  return { kind: "custom", width, height };
}

/**
 * Window size that makes the toolkit-reported inner size equal the requested one:
 * each dimension grows by however much the toolkit fell short.
 */
export function correctedWindowSize(requested: Size, reported: Size): Size {
  return {
    width: requested.width + (requested.width - reported.width),
    height: requested.height + (requested.height - reported.height),
  };
}

/** Size a canvas for the aspect ratio, compensating for host window decorations. */
export function sizeCanvas(canvas: Canvas, aspect: AspectRatio = DEFAULT_ASPECT): Size {
  const requested = aspectSize(aspect);
  canvas.setCanvasSize(requested.width, requested.height);
  const corrected = correctedWindowSize(requested, canvas.reportedSize);
  canvas.setWindowSize(corrected.width, corrected.height);
  return corrected;
}

export function applyMargins(canvas: Canvas, options: { colorScale?: boolean } = {}): void {
  canvas.setLeftMargin(PLOT_MARGIN);
  canvas.setBottomMargin(PLOT_MARGIN);
  if (options.colorScale) canvas.setRightMargin(PLOT_MARGIN);
}
