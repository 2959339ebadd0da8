/**
 * StyleProfile construction.
 * Profiles are frozen values; every change returns a new profile.
 */

import { assertSafePalette } from "./palettes.js";
import type { AxisName, AxisStyle, FontVariant, MarkerShape, StyleProfile } from "./types.js";

export const PROFILE_VERSION = 1;

const AXIS_KEYS: readonly (keyof AxisStyle)[] = ["labelOffset", "tickLength", "titleOffset", "labelSize", "titleSize", "titleColor"];

export const DEFAULT_AXIS_STYLE: Readonly<AxisStyle> = Object.freeze({
  labelOffset: 0.01,
  tickLength: 0.015,
  titleOffset: 0.8,
  labelSize: 0.05,
  titleSize: 0.06,
  titleColor: "black",
});

/** Overrides accepted by `buildProfile` and `withOverrides`. */
export interface ProfileOverrides {
  font?: FontVariant;
  palette?: string;
  watermark?: string;
  lineWidth?: number;
  histogramLineWidth?: number;
  fitLineWidth?: number;
  dashPattern?: number[];
  axis?: Partial<AxisStyle>;
  legendTextSize?: number;
  annotationTextSize?: number;
  markerShape?: MarkerShape;
  markerSize?: number;
  boxes?: Partial<Record<keyof StyleProfile["boxes"], boolean>>;
}

/** Build a profile with the shared defaults, then apply any overrides. */
export function buildProfile(name: string, description: string, overrides: ProfileOverrides = {}): StyleProfile {
  const axis = { ...DEFAULT_AXIS_STYLE };
  const base: StyleProfile = {
    name,
    description,
    version: PROFILE_VERSION,
    canvas: { color: "white", padColor: "white", frameColor: "white", borders: false },
    lines: { width: 2, histogramWidth: 2, fitWidth: 2.5, dashPattern: [12, 12] },
    typography: {
      font: "serif",
      axisLabelSize: 0.05,
      axisTitleSize: 0.06,
      legendTextSize: 0.04,
      annotationTextSize: 0.06,
    },
    axes: { x: axis, y: axis, z: axis },
    ticks: { bothSides: true, inward: true, minor: true },
    legend: { borderSize: 0, fillColor: "white", font: "serif" },
    markers: { shape: "filled-square", size: 1 },
    palette: "inverted-dark-body-radiator",
    boxes: { title: false, stats: false, fitParams: false },
    annotation: { align: "right-center" },
    watermark: { text: "Preliminary" },
  };
  return withOverrides(base, overrides);
}

/**
 * The publication (serif) or slide (sans) profile. Slides use thinner
 * histogram and fit lines; explicit overrides still win.
 */
export function presetProfile(font: FontVariant = "serif", overrides: ProfileOverrides = {}): StyleProfile {
  return font === "sans"
    ? buildProfile("slides", "Plot style for talks and slides", {
        histogramLineWidth: 1.5,
        fitLineWidth: 2,
        ...overrides,
        font,
      })
    : buildProfile("publication", "Plot style for publications", { ...overrides, font });
}

/**
 * Set the same axis style on x, y and z in one step. There is no per-axis variant.
 */
export function setAxisStyle(profile: StyleProfile, style: Partial<AxisStyle>): StyleProfile {
  const axis: AxisStyle = { ...profile.axes.x, ...style };
  return freezeProfile({
    ...profile,
    axes: { x: axis, y: axis, z: axis },
    typography: {
      ...profile.typography,
      axisLabelSize: axis.labelSize,
      axisTitleSize: axis.titleSize,
    },
  });
}

export function withOverrides(profile: StyleProfile, overrides: ProfileOverrides): StyleProfile {
  const palette = overrides.palette !== undefined ? assertSafePalette(overrides.palette) : profile.palette;
  const font = overrides.font ?? profile.typography.font;

  const next: StyleProfile = {
    ...profile,
    lines: {
      width: overrides.lineWidth ?? profile.lines.width,
      histogramWidth: overrides.histogramLineWidth ?? profile.lines.histogramWidth,
      fitWidth: overrides.fitLineWidth ?? profile.lines.fitWidth,
      dashPattern: overrides.dashPattern ? [...overrides.dashPattern] : profile.lines.dashPattern,
    },
    typography: {
      ...profile.typography,
      font,
      legendTextSize: overrides.legendTextSize ?? profile.typography.legendTextSize,
      annotationTextSize: overrides.annotationTextSize ?? profile.typography.annotationTextSize,
    },
    legend: { ...profile.legend, font },
    markers: {
      shape: overrides.markerShape ?? profile.markers.shape,
      size: overrides.markerSize ?? profile.markers.size,
    },
    palette,
    boxes: { ...profile.boxes, ...overrides.boxes },
    watermark: { text: overrides.watermark ?? profile.watermark.text },
  };

  return setAxisStyle(next, overrides.axis ?? {});
}

/** JSON-friendly view of a profile. */
export function describeProfile(profile: StyleProfile): Record<string, unknown> {
  return {
    name: profile.name,
    description: profile.description,
    version: profile.version,
    font: profile.typography.font,
    palette: profile.palette,
    lineWidth: profile.lines.width,
    histogramLineWidth: profile.lines.histogramWidth,
    fitLineWidth: profile.lines.fitWidth,
    dashPattern: [...profile.lines.dashPattern],
    axis: { ...profile.axes.x },
    sizes: {
      axisLabel: profile.typography.axisLabelSize,
      axisTitle: profile.typography.axisTitleSize,
      legend: profile.typography.legendTextSize,
      annotation: profile.typography.annotationTextSize,
    },
    legend: { ...profile.legend },
    markers: { ...profile.markers },
    boxes: { ...profile.boxes },
    watermark: profile.watermark.text,
  };
}

/** True when all three axes carry identical values. */
export function axesInSync(profile: StyleProfile): boolean {
  const others: AxisName[] = ["y", "z"];
  return others.every((name) => AXIS_KEYS.every((k) => profile.axes[name][k] === profile.axes.x[k]));
}

function freezeProfile(profile: StyleProfile): StyleProfile {
  const axis = Object.freeze({ ...profile.axes.x });
  return Object.freeze({
    ...profile,
    canvas: Object.freeze({ ...profile.canvas }),
    lines: Object.freeze({ ...profile.lines, dashPattern: Object.freeze([...profile.lines.dashPattern]) }),
    typography: Object.freeze({ ...profile.typography }),
    axes: Object.freeze({ x: axis, y: axis, z: axis }),
    ticks: Object.freeze({ ...profile.ticks }),
    legend: Object.freeze({ ...profile.legend }),
    markers: Object.freeze({ ...profile.markers }),
    boxes: Object.freeze({ ...profile.boxes }),
    annotation: Object.freeze({ ...profile.annotation }),
    watermark: Object.freeze({ ...profile.watermark }),
  });
}
