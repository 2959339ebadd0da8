/**
 * The closed set of colour-vision-deficiency safe palettes a profile may use.
 * Profiles store palettes by name; the numeric toolkit code is looked up only
 * when a profile is applied.
 */

import { PaletteError } from "./errors.js";
import { TOOLKIT_PALETTES } from "./toolkit/colors.js";
import type { PaletteName } from "./types.js";

export const SAFE_PALETTES: readonly PaletteName[] = [
  "viridis",
  "cividis",
  "inverted-dark-body-radiator",
  "plasma",
  "inferno",
];

export function isSafePalette(name: string): name is PaletteName {
  return SAFE_PALETTES.some((p) => p === name);
}

/** Validate a palette name against the safe set. Never falls back to a default. */
export function assertSafePalette(name: string): PaletteName {
  if (!isSafePalette(name)) throw new PaletteError(name, SAFE_PALETTES);
  return name;
}

/** Toolkit code for a safe palette. */
export function resolvePaletteCode(name: PaletteName): number {
  const safe = assertSafePalette(name);
  const entry = TOOLKIT_PALETTES.find((p) => p.name === safe);
  if (!entry) throw new PaletteError(name, SAFE_PALETTES);
  return entry.code;
}
