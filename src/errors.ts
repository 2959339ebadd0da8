/**
 * Error types surfaced to callers. Filesystem errors are not wrapped.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class PaletteError extends ConfigurationError {
  readonly palette: string;
  readonly validNames: readonly string[];

  constructor(palette: string, validNames: readonly string[]) {
    super(`Unknown palette "${palette}". Valid palettes: ${validNames.join(", ")}`);
    this.name = "PaletteError";
    this.palette = palette;
    this.validNames = validNames;
  }
}

export class EmptyCanvasError extends Error {
  readonly canvas: string;

  constructor(canvas: string) {
    super(`Canvas "${canvas}" is empty: draw something before exporting it`);
    this.name = "EmptyCanvasError";
    this.canvas = canvas;
  }
}

export class ExportFormatError extends Error {
  constructor(path: string) {
    super(`Cannot export "${path}": only .svg output is supported`);
    this.name = "ExportFormatError";
  }
}
