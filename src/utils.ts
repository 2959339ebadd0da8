/**
 * Utility functions for formatting and axis ticks.
 */

/** Escape text for use in SVG/XML content and attribute values. */
export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Format a coordinate with at most two decimals. */
export function fmt(n: number): string {
  const rounded = Number(n.toFixed(2));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

/** Round a rough step to 1, 2 or 5 times a power of ten. */
export function niceStep(span: number, targetTicks: number): number {
  const rough = span / targetTicks;
  if (!(rough > 0) || !Number.isFinite(rough)) return 1;
  const mag = Math.pow(10, Math.floor(Math.log10(rough)));
  const residual = rough / mag;
  let nice: number;
  if (residual <= 1.5) nice = 1;
  else if (residual <= 3) nice = 2;
  else if (residual <= 7) nice = 5;
  else nice = 10;
  return nice * mag;
}

/** Tick values inside [min, max], on multiples of a nice step. */
export function niceTicks(min: number, max: number, targetTicks: number): { step: number; values: number[] } {
  const step = niceStep(max - min, targetTicks);
  const decimals = tickDecimals(step);
  const values: number[] = [];
  const first = Math.ceil(min / step - 1e-9);
  const last = Math.floor(max / step + 1e-9);
  for (let k = first; k <= last; k++) {
    values.push(Number((k * step).toFixed(decimals)));
  }
  return { step, values };
}

/** Digits after the decimal point needed to print multiples of step. */
export function tickDecimals(step: number): number {
  return Math.max(0, -Math.floor(Math.log10(step) + 1e-9));
}

export function formatTick(value: number, step: number): string {
  const text = value.toFixed(tickDecimals(step));
  return /^-0(\.0+)?$/.test(text) ? text.slice(1) : text;
}

/** Pad a string to a given width. */
export function padRight(s: string, width: number): string {
  return s.length >= width ? s : s + " ".repeat(width - s.length);
}
