/**
 * Toolkit palette table and colour helpers.
 *
 * Palettes are addressed by numeric code, as in the toolkit's own API. Code
 * outside the toolkit should go through `resolvePaletteCode` in ../palettes.ts
 * rather than hard-coding these numbers.
 */

import tinycolor from "tinycolor2";

export interface ToolkitPalette {
  code: number;
  name: string;
  /** Low-to-high CSS colour stops, interpolated linearly. */
  stops: readonly string[];
}

const DARK_BODY_STOPS = ["#000000", "#4b0000", "#a01e00", "#e15a00", "#f5a500", "#ffe650", "#ffffff"] as const;

export const TOOLKIT_PALETTES: readonly ToolkitPalette[] = [
  { code: 53, name: "dark-body-radiator", stops: DARK_BODY_STOPS },
  { code: 55, name: "rainbow", stops: ["#4b0082", "#0000ff", "#00ffff", "#00ff00", "#ffff00", "#ff7f00", "#ff0000"] },
  { code: 56, name: "inverted-dark-body-radiator", stops: [...DARK_BODY_STOPS].reverse() },
  { code: 57, name: "bird", stops: ["#352a87", "#0363e1", "#1485d4", "#06a7c6", "#38b99e", "#92bf73", "#d9ba56", "#fcce2e", "#f9fb0e"] },
  { code: 112, name: "viridis", stops: ["#440154", "#3b528b", "#21918c", "#5ec962", "#fde725"] },
  { code: 113, name: "cividis", stops: ["#00204d", "#31446b", "#666970", "#958f78", "#cbba69", "#ffea46"] },
  { code: 114, name: "plasma", stops: ["#0d0887", "#6a00a8", "#b12a90", "#e16462", "#fca636", "#f0f921"] },
  { code: 115, name: "inferno", stops: ["#000004", "#420a68", "#932667", "#dd513a", "#fca50a", "#fcffa4"] },
];

export function paletteByCode(code: number): ToolkitPalette {
  const palette = TOOLKIT_PALETTES.find((p) => p.code === code);
  if (!palette) throw new Error(`Toolkit has no palette with code ${code}`);
  return palette;
}

/** Colour at position t in [0, 1] along a palette. Values outside the range are clamped. */
export function paletteColor(palette: ToolkitPalette, t: number): string {
  const { stops } = palette;
  const clamped = Math.min(1, Math.max(0, Number.isFinite(t) ? t : 0));
  const scaled = clamped * (stops.length - 1);
  const lower = Math.floor(scaled);
  if (lower >= stops.length - 1) return tinycolor(stops[stops.length - 1]).toHexString();
  const frac = scaled - lower;
  return tinycolor.mix(stops[lower], stops[lower + 1], frac * 100).toHexString();
}

/** Normalize any CSS colour to #rrggbb, or "none" for a fully transparent one. */
export function cssColor(color: string): string {
  const c = tinycolor(color);
  if (!c.isValid()) throw new Error(`Invalid colour "${color}"`);
  return c.getAlpha() === 0 ? "none" : c.toHexString();
}
