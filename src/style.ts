/**
 * The active style context.
 *
 * Toolkit objects read `ActiveStyle.current` when they are constructed. Objects
 * created before `apply` keep the toolkit built-ins; the context cannot tell and
 * does not try to.
 */

import { resolvePaletteCode } from "./palettes.js";
import type { AxisStyle, FontVariant, ResolvedStyle, StyleProfile } from "./types.js";

export const FONT_FAMILIES: Record<FontVariant, string> = {
  serif: "'Times New Roman', Times, serif",
  sans: "Helvetica, Arial, sans-serif",
};

const BUILTIN_AXIS: Readonly<AxisStyle> = Object.freeze({
  labelOffset: 0.005,
  tickLength: 0.03,
  titleOffset: 1,
  labelSize: 0.035,
  titleSize: 0.035,
  titleColor: "black",
});

/** What the toolkit uses when no profile has been applied. */
export const BUILTIN_STYLE: Readonly<ResolvedStyle> = Object.freeze({
  source: null,
  canvasColor: "#e8e8e8",
  padColor: "#e8e8e8",
  frameColor: "white",
  borders: true,
  lineWidth: 1,
  histogramLineWidth: 1,
  fitLineWidth: 1,
  dashArray: [5, 5],
  fontFamily: FONT_FAMILIES.sans,
  legendFontFamily: FONT_FAMILIES.sans,
  axisLabelSize: 0.035,
  axisTitleSize: 0.035,
  legendTextSize: 0.035,
  textSize: 0.05,
  textAlign: "left-bottom",
  axes: Object.freeze({ x: BUILTIN_AXIS, y: BUILTIN_AXIS, z: BUILTIN_AXIS }),
  ticksBothSides: false,
  ticksInward: true,
  minorTicks: true,
  legendBorderSize: 1,
  legendFillColor: "white",
  markerShape: "dot",
  markerSize: 1,
  paletteCode: 57,
  showTitle: true,
  showStats: true,
  showFitParams: false,
  watermarkText: "Preliminary",
});

/** Resolve a profile into the flat form the toolkit reads. Pure. */
export function resolveStyle(profile: StyleProfile): ResolvedStyle {
  return Object.freeze({
    source: profile.name,
    canvasColor: profile.canvas.color,
    padColor: profile.canvas.padColor,
    frameColor: profile.canvas.frameColor,
    borders: profile.canvas.borders,
    lineWidth: profile.lines.width,
    histogramLineWidth: profile.lines.histogramWidth,
    fitLineWidth: profile.lines.fitWidth,
    dashArray: [...profile.lines.dashPattern],
    fontFamily: FONT_FAMILIES[profile.typography.font],
    legendFontFamily: FONT_FAMILIES[profile.legend.font],
    axisLabelSize: profile.typography.axisLabelSize,
    axisTitleSize: profile.typography.axisTitleSize,
    legendTextSize: profile.typography.legendTextSize,
    textSize: profile.typography.annotationTextSize,
    textAlign: profile.annotation.align,
    axes: profile.axes,
    ticksBothSides: profile.ticks.bothSides,
    ticksInward: profile.ticks.inward,
    minorTicks: profile.ticks.minor,
    legendBorderSize: profile.legend.borderSize,
    legendFillColor: profile.legend.fillColor,
    markerShape: profile.markers.shape,
    markerSize: profile.markers.size,
    paletteCode: resolvePaletteCode(profile.palette),
    showTitle: profile.boxes.title,
    showStats: profile.boxes.stats,
    showFitParams: profile.boxes.fitParams,
    watermarkText: profile.watermark.text,
  });
}

export class ActiveStyle {
  private applied: StyleProfile | null = null;
  private resolved: Readonly<ResolvedStyle> = BUILTIN_STYLE;

  /** Install a profile. Applying the profile that is already active changes nothing. */
  apply(profile: StyleProfile): void {
    if (this.applied === profile) return;
    this.resolved = resolveStyle(profile);
    this.applied = profile;
  }

  get current(): Readonly<ResolvedStyle> {
    return this.resolved;
  }

  get profile(): StyleProfile | null {
    return this.applied;
  }
}
