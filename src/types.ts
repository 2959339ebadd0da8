/**
 * Shared types for style profiles, the resolved style the toolkit reads,
 * and canvas geometry.
 */

// --- Profile ---

export type AxisName = "x" | "y" | "z";

export const AXIS_NAMES: readonly AxisName[] = ["x", "y", "z"];

/** Per-axis styling. Sizes and offsets are fractions of the pad height, as in the toolkit. */
export interface AxisStyle {
  labelOffset: number;
  tickLength: number;
  titleOffset: number;
  labelSize: number;
  titleSize: number;
  titleColor: string;
}

export type FontVariant = "serif" | "sans";

export type MarkerShape =
  | "dot"
  | "circle"
  | "filled-circle"
  | "filled-square"
  | "open-square"
  | "filled-triangle";

export type PaletteName = "viridis" | "cividis" | "inverted-dark-body-radiator" | "plasma" | "inferno";

/** Horizontal then vertical anchor, e.g. "right-center". */
export type TextAlign = `${"left" | "center" | "right"}-${"top" | "center" | "bottom"}`;

export interface StyleProfile {
  readonly name: string;
  readonly description: string;
  readonly version: number;
  readonly canvas: {
    readonly color: string;
    readonly padColor: string;
    readonly frameColor: string;
    readonly borders: boolean;
  };
  readonly lines: {
    readonly width: number;
    readonly histogramWidth: number;
    /** Width of fitted curves. */
    readonly fitWidth: number;
    /** Dash array for the secondary ("dashed") line style. */
    readonly dashPattern: readonly number[];
  };
  readonly typography: {
    readonly font: FontVariant;
    readonly axisLabelSize: number;
    readonly axisTitleSize: number;
    readonly legendTextSize: number;
    readonly annotationTextSize: number;
  };
  readonly axes: Readonly<Record<AxisName, Readonly<AxisStyle>>>;
  readonly ticks: {
    readonly bothSides: boolean;
    readonly inward: boolean;
    readonly minor: boolean;
  };
  readonly legend: {
    readonly borderSize: number;
    readonly fillColor: string;
    readonly font: FontVariant;
  };
  readonly markers: {
    readonly shape: MarkerShape;
    readonly size: number;
  };
  readonly palette: PaletteName;
  readonly boxes: {
    readonly title: boolean;
    readonly stats: boolean;
    readonly fitParams: boolean;
  };
  readonly annotation: {
    readonly align: TextAlign;
  };
  readonly watermark: {
    readonly text: string;
  };
}

// --- Resolved style (what the toolkit consults) ---

export interface ResolvedStyle {
  /** Name of the applied profile, or null for the toolkit built-ins. */
  source: string | null;
  canvasColor: string;
  padColor: string;
  frameColor: string;
  borders: boolean;
  lineWidth: number;
  histogramLineWidth: number;
  fitLineWidth: number;
  dashArray: readonly number[];
  fontFamily: string;
  legendFontFamily: string;
  axisLabelSize: number;
  axisTitleSize: number;
  legendTextSize: number;
  textSize: number;
  textAlign: TextAlign;
  axes: Readonly<Record<AxisName, Readonly<AxisStyle>>>;
  ticksBothSides: boolean;
  ticksInward: boolean;
  minorTicks: boolean;
  legendBorderSize: number;
  legendFillColor: string;
  markerShape: MarkerShape;
  markerSize: number;
  /** Toolkit palette code, resolved from the profile's palette name at apply time. */
  paletteCode: number;
  showTitle: boolean;
  showStats: boolean;
  showFitParams: boolean;
  watermarkText: string;
}

// --- Geometry ---

export interface Size {
  width: number;
  height: number;
}

export interface Margins {
  left: number;
  right: number;
  top: number;
  bottom: number;
}
