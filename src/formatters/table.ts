/**
 * Terminal table formatter.
 * Hand-rolled, no dependencies.
 */

import { SAFE_PALETTES, resolvePaletteCode } from "../palettes.js";
import type { StyleProfile } from "../types.js";
import { padRight } from "../utils.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const LABEL_WIDTH = 20;

/** Rows shown by `printProfile`. */
export function profileRows(profile: StyleProfile): [string, string][] {
  const axis = profile.axes.x;
  const boxes = Object.entries(profile.boxes)
    .filter(([, on]) => on)
    .map(([name]) => name);
  return [
    ["Font", profile.typography.font],
    ["Palette", profile.palette],
    ["Line width", `${profile.lines.width} (histogram ${profile.lines.histogramWidth}, fit ${profile.lines.fitWidth})`],
    ["Dash pattern", profile.lines.dashPattern.join(" ")],
    ["Axis label", `offset ${axis.labelOffset}, size ${axis.labelSize}`],
    ["Axis title", `offset ${axis.titleOffset}, size ${axis.titleSize}, colour ${axis.titleColor}`],
    ["Tick length", String(axis.tickLength)],
    ["Legend", `border ${profile.legend.borderSize}, fill ${profile.legend.fillColor}, text ${profile.typography.legendTextSize}`],
    ["Annotation size", String(profile.typography.annotationTextSize)],
    ["Marker", `${profile.markers.shape} x${profile.markers.size}`],
    ["Boxes", boxes.length > 0 ? boxes.join(", ") : "none"],
    ["Watermark", profile.watermark.text],
  ];
}

/** Print a profile as an aligned two-column table. */
export function printProfile(profile: StyleProfile): void {
  console.log(`\n  ${profile.name} ${DIM}v${profile.version}: ${profile.description}${RESET}\n`);
  console.log(`  ${"─".repeat(60)}`);
  for (const [label, value] of profileRows(profile)) {
    console.log(`  ${padRight(label, LABEL_WIDTH)}${value}`);
  }
  console.log();
}

export function printPalettes(current?: string): void {
  console.log(`\n  Colour-vision-safe palettes\n`);
  for (const name of SAFE_PALETTES) {
    const marker = name === current ? "*" : " ";
    console.log(`  ${marker} ${padRight(name, 32)}${DIM}code ${resolvePaletteCode(name)}${RESET}`);
  }
  console.log();
}
