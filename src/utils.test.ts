import { describe, it, expect } from "vitest";
import { escapeXml, fmt, formatTick, niceStep, niceTicks, padRight, tickDecimals } from "./utils.js";

describe("escapeXml", () => {
  it("escapes XML special characters", () => {
    expect(escapeXml('<tspan>"a" & \'b\'')).toBe("&lt;tspan&gt;&quot;a&quot; &amp; &#39;b&#39;");
  });

  it("passes through safe strings", () => {
    expect(escapeXml("Gaussian Fit")).toBe("Gaussian Fit");
  });
});

describe("fmt", () => {
  it("keeps at most two decimals", () => {
    expect(fmt(100)).toBe("100");
    expect(fmt(2.5)).toBe("2.5");
    expect(fmt(1 / 3)).toBe("0.33");
  });

  it("never prints negative zero", () => {
    expect(fmt(-0.001)).toBe("0");
  });
});

describe("niceStep", () => {
  it("rounds to 1, 2 or 5 times a power of ten", () => {
    expect(niceStep(1.05, 8)).toBeCloseTo(0.1);
    expect(niceStep(40, 8)).toBe(5);
    expect(niceStep(8, 8)).toBe(1);
    expect(niceStep(100, 4)).toBe(20);
  });

  it("falls back to 1 for an empty span", () => {
    expect(niceStep(0, 5)).toBe(1);
  });
});

describe("niceTicks", () => {
  it("covers the range on multiples of the step", () => {
    const { values } = niceTicks(0, 1.05, 8);
    expect(values).toEqual([0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1]);
  });

  it("handles negative ranges", () => {
    const { step, values } = niceTicks(-20, 20, 6);
    expect(step).toBe(5);
    expect(values[0]).toBe(-20);
    expect(values[values.length - 1]).toBe(20);
    expect(values).toHaveLength(9);
  });
});

describe("formatTick", () => {
  it("prints as many decimals as the step needs", () => {
    expect(tickDecimals(0.1)).toBe(1);
    expect(tickDecimals(0.05)).toBe(2);
    expect(tickDecimals(5)).toBe(0);
    expect(formatTick(0.3, 0.1)).toBe("0.3");
    expect(formatTick(10, 5)).toBe("10");
    expect(formatTick(-0, 0.1)).toBe("0.0");
  });
});

describe("padRight", () => {
  it("pads short strings and leaves long ones", () => {
    expect(padRight("ab", 4)).toBe("ab  ");
    expect(padRight("abcdef", 4)).toBe("abcdef");
  });
});
