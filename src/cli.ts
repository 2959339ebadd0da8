/**
 * Command-line program: `examples` (default), `profile` and `palettes`.
 */

import { Command } from "commander";
import { resolveProfile, type ProfileOptions } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { runExamples } from "./examples.js";
import { printJson } from "./formatters/json.js";
import { printPalettes, printProfile } from "./formatters/table.js";
import { parseAspect } from "./layout.js";
import { presetProfile } from "./profile.js";
import type { HostChrome } from "./toolkit/canvas.js";

export function createProgram(): Command {
  const program: Command = new Command();

  program
    .name("plotstyle")
    .description("Shared style profile and reference figures for analysis plots")
    .version("0.1.0");

  // Shared options
  function addProfileOptions(cmd: Command): Command {
    return cmd
      .option("--font <font>", "Font variant: serif (publications, default), sans (slides)")
      .option("--palette <name>", "Colour-vision-safe palette for 2D plots")
      .option("--config <path>", "JSON file with profile overrides");
  }

  function fail(err: unknown): never {
    if (err instanceof ConfigurationError) program.error(`error: ${err.message}`);
    throw err;
  }

  function parseChrome(value: string): HostChrome {
    const match = /^(\d+)x(\d+)$/.exec(value.trim());
    if (!match) program.error(`error: --chrome must look like WIDTHxHEIGHT, got "${value}"`);
    return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
  }

  // examples
  addProfileOptions(
    program
      .command("examples", { isDefault: true })
      .description("Write the reference 1D and 2D figures as SVG")
      .option("-o, --output <dir>", "Output directory", ".")
      .option("--aspect <ratio>", "Aspect ratio: 4:3, 16:9 or WIDTHxHEIGHT", "4:3")
      .option("--chrome <size>", "Window decoration size to compensate for, WIDTHxHEIGHT")
  ).action((opts: ProfileOptions & { output: string; aspect: string; chrome?: string }) => {
    try {
      const aspect = parseAspect(opts.aspect);
      if (!aspect) program.error(`error: --aspect must be 4:3, 16:9 or WIDTHxHEIGHT, got "${opts.aspect}"`);
      const profile = resolveProfile(opts);
      const host = opts.chrome ? parseChrome(opts.chrome) : undefined;
      const written = runExamples(opts.output, { profile, aspect, host });
      for (const path of written) console.log(`Wrote ${path}`);
    } catch (err) {
      fail(err);
    }
  });

  // profile
  addProfileOptions(
    program
      .command("profile")
      .description("Show the resolved style profile")
      .option("-f, --format <format>", "Output format: table, json", "table")
  ).action((opts: ProfileOptions & { format: string }) => {
    try {
      const profile = resolveProfile(opts);
      if (opts.format === "json") {
        printJson("profile", profile);
      } else {
        printProfile(profile);
      }
    } catch (err) {
      fail(err);
    }
  });

  // palettes
  program
    .command("palettes")
    .description("List the colour-vision-safe palettes")
    .option("--palette <name>", "Palette to mark as current")
    .option("-f, --format <format>", "Output format: table, json", "table")
    .action((opts: { palette?: string; format: string }) => {
      try {
        const profile = presetProfile("serif", opts.palette ? { palette: opts.palette } : {});
        if (opts.format === "json") {
          printJson("palettes", profile);
        } else {
          printPalettes(profile.palette);
        }
      } catch (err) {
        fail(err);
      }
    });

  return program;
}
