import { describe, it, expect, vi, afterEach } from "vitest";
import { createProgram } from "./cli.js";

function optionsOf(name: string): string[] {
  const cmd = createProgram().commands.find((c) => c.name() === name);
  return cmd ? cmd.options.map((o) => o.long ?? "") : [];
}

describe("createProgram", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("gives the figure and profile commands the profile options", () => {
    expect(optionsOf("examples")).toEqual(["--output", "--aspect", "--chrome", "--font", "--palette", "--config"]);
    expect(optionsOf("profile")).toEqual(["--format", "--font", "--palette", "--config"]);
  });

  it("gives the palettes command only a palette and a format", () => {
    expect(optionsOf("palettes")).toEqual(["--palette", "--format"]);
  });

  it("prints the slide profile as JSON", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createProgram().parse(["profile", "--font", "sans", "-f", "json"], { from: "user" });
    expect(log).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(printed).toMatchObject({ name: "slides", font: "sans", fitLineWidth: 2, histogramLineWidth: 1.5 });
  });

  it("marks the chosen palette", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createProgram().parse(["palettes", "--palette", "plasma", "-f", "json"], { from: "user" });
    const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(printed).toMatchObject({ current: "plasma" });
  });
});
