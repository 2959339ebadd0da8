/**
 * JSON output formatter.
 */

import { SAFE_PALETTES, resolvePaletteCode } from "../palettes.js";
import { describeProfile } from "../profile.js";
import type { StyleProfile } from "../types.js";

export function toJsonObject(command: "profile" | "palettes", profile: StyleProfile): Record<string, unknown> {
  switch (command) {
    case "profile":
      return describeProfile(profile);
    case "palettes":
      return {
        current: profile.palette,
        palettes: SAFE_PALETTES.map((name) => ({ name, code: resolvePaletteCode(name) })),
      };
  }
}

/** Print to stdout as indented JSON. */
export function printJson(command: "profile" | "palettes", profile: StyleProfile): void {
  console.log(JSON.stringify(toJsonObject(command, profile), null, 2));
}
