/**
 * Library entry point.
 */

export * from "./types.js";
export * from "./errors.js";
export { SAFE_PALETTES, isSafePalette, assertSafePalette, resolvePaletteCode } from "./palettes.js";
export {
  DEFAULT_AXIS_STYLE,
  PROFILE_VERSION,
  buildProfile,
  presetProfile,
  setAxisStyle,
  withOverrides,
  describeProfile,
  axesInSync,
  type ProfileOverrides,
} from "./profile.js";
export { ActiveStyle, BUILTIN_STYLE, FONT_FAMILIES, resolveStyle } from "./style.js";
export {
  type AspectRatio,
  DEFAULT_ASPECT,
  PLOT_MARGIN,
  aspectSize,
  parseAspect,
  correctedWindowSize,
  sizeCanvas,
  applyMargins,
} from "./layout.js";
export { AXIS_LABELS, ROLE_COLORS, applyRole, watermark, type SeriesRole, type WatermarkOptions } from "./labels.js";
export { loadOverrides, parseOverrides, resolveProfile, type ProfileOptions } from "./config.js";
export { Canvas, BATCH_HOST, type HostChrome, type CanvasOptions } from "./toolkit/canvas.js";
export * from "./toolkit/objects.js";
export { createRandom, type Random } from "./toolkit/random.js";
export { renderCanvas } from "./formatters/svg.js";
export { markupToSvg, markupToText, parseMarkup } from "./formatters/markup.js";
export { example1D, example2D, runExamples, type ExampleOptions, type RunOptions } from "./examples.js";
