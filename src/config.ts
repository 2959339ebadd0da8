/**
 * Profile overrides from a JSON file.
 *
 * {
 *   "font": "sans",
 *   "palette": "viridis",
 *   "axis": { "titleOffset": 1.2 },
 *   "boxes": { "stats": true }
 * }
 */

import { readFileSync } from "node:fs";
import tinycolor from "tinycolor2";
import { ConfigurationError } from "./errors.js";
import { assertSafePalette } from "./palettes.js";
import { presetProfile, type ProfileOverrides } from "./profile.js";
import type { AxisStyle, FontVariant, MarkerShape, StyleProfile } from "./types.js";

const FONTS: readonly FontVariant[] = ["serif", "sans"];
const MARKERS: readonly MarkerShape[] = ["dot", "circle", "filled-circle", "filled-square", "open-square", "filled-triangle"];
const AXIS_NUMBER_KEYS = ["labelOffset", "tickLength", "titleOffset", "labelSize", "titleSize"] as const;
const BOX_KEYS = ["title", "stats", "fitParams"] as const;
const TOP_LEVEL_KEYS = [
  "font",
  "palette",
  "watermark",
  "lineWidth",
  "histogramLineWidth",
  "fitLineWidth",
  "dashPattern",
  "axis",
  "legendTextSize",
  "annotationTextSize",
  "markerShape",
  "markerSize",
  "boxes",
];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function checkKeys(obj: JsonObject, allowed: readonly string[], where: string): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.includes(key)) throw new ConfigurationError(`Unknown key "${where}${key}"`);
  }
}

function takeNumber(obj: JsonObject, key: string, where: string): number | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
    throw new ConfigurationError(`"${where}${key}" must be a non-negative number`);
  }
  return v;
}

function takeString(obj: JsonObject, key: string, where: string): string | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v !== "string" || v.trim().length === 0) {
    throw new ConfigurationError(`"${where}${key}" must be a non-empty string`);
  }
  return v.trim();
}

function takeChoice<T extends string>(obj: JsonObject, key: string, choices: readonly T[]): T | undefined {
  const v = takeString(obj, key, "");
  if (v === undefined) return undefined;
  const match = choices.find((c) => c === v);
  if (!match) throw new ConfigurationError(`"${key}" must be one of: ${choices.join(", ")}`);
  return match;
}

function parseAxis(raw: unknown): Partial<AxisStyle> {
  if (!isObject(raw)) throw new ConfigurationError(`"axis" must be an object`);
  checkKeys(raw, [...AXIS_NUMBER_KEYS, "titleColor"], "axis.");
  const axis: Partial<AxisStyle> = {};
  for (const key of AXIS_NUMBER_KEYS) {
    const v = takeNumber(raw, key, "axis.");
    if (v !== undefined) axis[key] = v;
  }
  const color = takeString(raw, "titleColor", "axis.");
  if (color !== undefined) {
    if (!tinycolor(color).isValid()) throw new ConfigurationError(`"axis.titleColor" is not a colour: "${color}"`);
    axis.titleColor = color;
  }
  return axis;
}

function parseBoxes(raw: unknown): NonNullable<ProfileOverrides["boxes"]> {
  if (!isObject(raw)) throw new ConfigurationError(`"boxes" must be an object`);
  checkKeys(raw, BOX_KEYS, "boxes.");
  const boxes: NonNullable<ProfileOverrides["boxes"]> = {};
  for (const key of BOX_KEYS) {
    const v = raw[key];
    if (v === undefined) continue;
    if (typeof v !== "boolean") throw new ConfigurationError(`"boxes.${key}" must be true or false`);
    boxes[key] = v;
  }
  return boxes;
}

/** Validate parsed JSON into profile overrides. */
export function parseOverrides(raw: unknown): ProfileOverrides {
  if (!isObject(raw)) throw new ConfigurationError("Style configuration must be a JSON object");
  checkKeys(raw, TOP_LEVEL_KEYS, "");

  const overrides: ProfileOverrides = {};
  const font = takeChoice(raw, "font", FONTS);
  if (font) overrides.font = font;
  const palette = takeString(raw, "palette", "");
  if (palette) overrides.palette = assertSafePalette(palette);
  const watermark = takeString(raw, "watermark", "");
  if (watermark) overrides.watermark = watermark;
  const markerShape = takeChoice(raw, "markerShape", MARKERS);
  if (markerShape) overrides.markerShape = markerShape;

  for (const key of [
    "lineWidth",
    "histogramLineWidth",
    "fitLineWidth",
    "legendTextSize",
    "annotationTextSize",
    "markerSize",
  ] as const) {
    const v = takeNumber(raw, key, "");
    if (v !== undefined) overrides[key] = v;
  }

  if (raw.dashPattern !== undefined) {
    const dash = raw.dashPattern;
    if (!Array.isArray(dash) || dash.length === 0 || !dash.every((d): d is number => typeof d === "number" && d > 0)) {
      throw new ConfigurationError(`"dashPattern" must be a non-empty array of positive numbers`);
    }
    overrides.dashPattern = dash;
  }
  if (raw.axis !== undefined) overrides.axis = parseAxis(raw.axis);
  if (raw.boxes !== undefined) overrides.boxes = parseBoxes(raw.boxes);

  return overrides;
}

/** Read and validate an overrides file. Read errors propagate unchanged. */
export function loadOverrides(path: string): ProfileOverrides {
  const text = readFileSync(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`${path}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return parseOverrides(raw);
}

/** Command-line profile options, as strings straight from the parser. */
export interface ProfileOptions {
  font?: string;
  palette?: string;
  config?: string;
}

/** Build the profile for a run. Flags beat the config file, which beats the preset defaults. */
export function resolveProfile(opts: ProfileOptions): StyleProfile {
  const overrides: ProfileOverrides = opts.config ? loadOverrides(opts.config) : {};
  let font: FontVariant = overrides.font ?? "serif";
  if (opts.font !== undefined) {
    const flag = FONTS.find((f) => f === opts.font);
    if (!flag) throw new ConfigurationError(`--font must be one of: ${FONTS.join(", ")}, got "${opts.font}"`);
    font = flag;
  }
  if (opts.palette !== undefined) overrides.palette = opts.palette;
  return presetProfile(font, overrides);
}
