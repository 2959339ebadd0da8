/**
 * Axis-title markup: `#beta` for Greek letters, `_{..}` subscripts, `^{..}` superscripts.
 * A single character after `_` or `^` works without braces.
 */

import { escapeXml } from "../utils.js";

export type Shift = "none" | "sub" | "super";

export interface MarkupRun {
  text: string;
  shift: Shift;
}

const GREEK_NAMES = [
  "alpha", "beta", "gamma", "delta", "epsilon", "zeta", "eta", "theta",
  "iota", "kappa", "lambda", "mu", "nu", "xi", "omicron", "pi",
  "rho", "sigma", "tau", "upsilon", "phi", "chi", "psi", "omega",
];

/** Greek letter for a name; capitalized names give upper case. */
export function greekLetter(name: string): string | null {
  const index = GREEK_NAMES.indexOf(name.toLowerCase());
  if (index < 0) return null;
  // U+03A2 / U+03C2 sit between rho and sigma
  const offset = index > 16 ? index + 1 : index;
  const upper = name[0] !== name[0].toLowerCase();
  return String.fromCodePoint((upper ? 0x391 : 0x3b1) + offset);
}

/** Split markup into runs of plain, subscript and superscript text. */
export function parseMarkup(input: string): MarkupRun[] {
  const runs: MarkupRun[] = [];
  parseInto(input, "none", runs);
  return mergeRuns(runs);
}

function parseInto(input: string, shift: Shift, runs: MarkupRun[]): void {
  let i = 0;
  let buffer = "";
  const flush = () => {
    if (buffer) runs.push({ text: buffer, shift });
    buffer = "";
  };

  while (i < input.length) {
    const ch = input[i];
    if (ch === "#") {
      const match = /^[A-Za-z]+/.exec(input.slice(i + 1));
      const letter = match ? greekLetter(match[0]) : null;
      if (match && letter) {
        buffer += letter;
        i += 1 + match[0].length;
        continue;
      }
      buffer += ch;
      i++;
      continue;
    }
    if (ch === "_" || ch === "^") {
      const inner = readGroup(input, i + 1);
      if (inner === null) {
        buffer += ch;
        i++;
        continue;
      }
      flush();
      parseInto(inner.content, ch === "_" ? "sub" : "super", runs);
      i = inner.end;
      continue;
    }
    buffer += ch;
    i++;
  }
  flush();
}

/** Read `{...}` (balanced) or a single character starting at `start`. */
function readGroup(input: string, start: number): { content: string; end: number } | null {
  if (start >= input.length) return null;
  if (input[start] !== "{") return { content: input[start], end: start + 1 };
  let depth = 0;
  for (let j = start; j < input.length; j++) {
    if (input[j] === "{") depth++;
    else if (input[j] === "}") {
      depth--;
      if (depth === 0) return { content: input.slice(start + 1, j), end: j + 1 };
    }
  }
  return null;
}

function mergeRuns(runs: MarkupRun[]): MarkupRun[] {
  const out: MarkupRun[] = [];
  for (const run of runs) {
    const last = out[out.length - 1];
    if (last && last.shift === run.shift) last.text += run.text;
    else out.push({ ...run });
  }
  return out;
}

/** Plain text with markup resolved, e.g. for legends read by tests or tooltips. */
export function markupToText(input: string): string {
  return parseMarkup(input).map((r) => r.text).join("");
}

/** SVG <tspan> content for a markup string. */
export function markupToSvg(input: string): string {
  return parseMarkup(input)
    .map((run) => {
      const text = escapeXml(run.text);
      if (run.shift === "none") return text;
      return `<tspan baseline-shift="${run.shift}" font-size="70%">${text}</tspan>`;
    })
    .join("");
}
