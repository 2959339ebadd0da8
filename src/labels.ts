/**
 * Plotting conventions that sit on top of the profile: series colours by role,
 * standard axis labels, and the mandatory watermark.
 */

import type { ActiveStyle } from "./style.js";
import { GraphErrors, TextAnnotation, type FunctionCurve, type Histogram1D } from "./toolkit/objects.js";

/**
 * data: black points with error bars, model (MC): blue histogram, fit: red curve.
 * These hold when a single series of each kind is shown.
 */
export type SeriesRole = "data" | "model" | "fit";

export const ROLE_COLORS: Record<SeriesRole, string> = {
  data: "black",
  model: "blue",
  fit: "red",
};

/** Standard axis titles, in axis-title markup. */
export const AXIS_LABELS = {
  isotropy: "#beta_{14}",
  normalizedVolume: "R^{3} / R_{AV}^{3}",
} as const;

/** Style field holding the line width of each role. */
const ROLE_WIDTHS: Record<SeriesRole, "lineWidth" | "histogramLineWidth" | "fitLineWidth"> = {
  data: "lineWidth",
  model: "histogramLineWidth",
  fit: "fitLineWidth",
};

/**
 * Colour an object for its role and give it the role's line width from the
 * active style. Markers follow the colour for data points.
 */
export function applyRole(style: ActiveStyle, object: FunctionCurve | Histogram1D | GraphErrors, role: SeriesRole): void {
  const color = ROLE_COLORS[role];
  object.line.color = color;
  object.line.width = style.current[ROLE_WIDTHS[role]];
  if (object instanceof GraphErrors) object.marker.color = color;
}

export interface WatermarkOptions {
  color?: string;
}

/**
 * The watermark every figure must carry. Position is in normalized device
 * coordinates; the text comes from the active style.
 */
export function watermark(style: ActiveStyle, x: number, y: number, options: WatermarkOptions = {}): TextAnnotation {
  const text = new TextAnnotation(style, x, y, style.current.watermarkText);
  if (options.color) text.text.color = options.color;
  return text;
}
