import { describe, it, expect } from "vitest";
import { renderConfig, countKeyOccurrences, findMissingKeys } from "./render-config.js";

describe("renderConfig", () => {
  it("replaces a top-level key and leaves other lines verbatim", () => {
    const input = "start: 2023-01-01\nbreakout_atr_buf: 0.20\nmax_positions: 3\n";
    const { text, missingKeys } = renderConfig(input, { breakout_atr_buf: 0.25 });
    expect(text).toBe("start: 2023-01-01\nbreakout_atr_buf: 0.25\nmax_positions: 3\n");
    expect(missingKeys).toEqual([]);
  });

  it("tolerates arbitrary trailing whitespace and values", () => {
    const { text } = renderConfig("breakout_atr_buf:    0.20   # tuned\n", { breakout_atr_buf: 0.3 });
    expect(text).toBe("breakout_atr_buf: 0.3\n");
  });

  it("rewrites an indented key with a two-space indent and keeps siblings", () => {
    const input = [
      "strategycfg:",
      "  breakout_atr_buf: 0.20",
      "  trail_atr_mult: 1.10",
      "  atr_pct_max: 0.08",
      "",
    ].join("\n");
    const { text } = renderConfig(input, { breakout_atr_buf: 0.25, trail_atr_mult: 1.3 });
    expect(text).toBe(
      ["strategycfg:", "  breakout_atr_buf: 0.25", "  trail_atr_mult: 1.3", "  atr_pct_max: 0.08", ""].join("\n"),
    );
  });

  it("normalizes deeper indentation to two spaces", () => {
    const { text } = renderConfig("block:\n    trail_atr_mult: 2\n", { trail_atr_mult: 1.5 });
    expect(text).toBe("block:\n  trail_atr_mult: 1.5\n");
  });

  it("rewrites every occurrence", () => {
    const input = "trail_atr_mult: 1\nnested:\n  trail_atr_mult: 1\n";
    const { text } = renderConfig(input, { trail_atr_mult: 0.9 });
    expect(text).toBe("trail_atr_mult: 0.9\nnested:\n  trail_atr_mult: 0.9\n");
  });

  it("does not touch keys that only share a prefix", () => {
    const input = "breakout_atr_buf_max: 1\nmy_breakout_atr_buf: 2\n";
    const { text, missingKeys } = renderConfig(input, { breakout_atr_buf: 0.25 });
    expect(text).toBe(input);
    expect(missingKeys).toEqual(["breakout_atr_buf"]);
  });

  it("adds no line for an absent key and reports it", () => {
    const input = "breakout_atr_buf: 0.20\n";
    const { text, missingKeys } = renderConfig(input, { breakout_atr_buf: 0.25, trail_atr_mult: 1.3 });
    expect(text).toBe("breakout_atr_buf: 0.25\n");
    expect(missingKeys).toEqual(["trail_atr_mult"]);
  });

  it("writes whole-number values with a fractional part", () => {
    const { text } = renderConfig("trail_atr_mult: 1.1\n", { trail_atr_mult: 1 });
    expect(text).toBe("trail_atr_mult: 1.0\n");
  });

  it("keeps CRLF line endings", () => {
    const { text } = renderConfig("a: 1\r\nbreakout_atr_buf: 0.2\r\n", { breakout_atr_buf: 0.35 });
    expect(text).toBe("a: 1\r\nbreakout_atr_buf: 0.35\r\n");
  });

  it("ignores overrides that are undefined", () => {
    const { text, missingKeys } = renderConfig("x: 1\n", { atr_pct_max: undefined });
    expect(text).toBe("x: 1\n");
    expect(missingKeys).toEqual([]);
  });

  it("does not mutate the input string", () => {
    const input = "breakout_atr_buf: 0.20\n";
    renderConfig(input, { breakout_atr_buf: 0.25 });
    expect(input).toBe("breakout_atr_buf: 0.20\n");
  });
});

describe("countKeyOccurrences", () => {
  it("separates top-level from nested matches", () => {
    const text = "trail_atr_mult: 1\nstrategy:\n  trail_atr_mult: 2\n\ttrail_atr_mult: 3\n";
    expect(countKeyOccurrences(text, "trail_atr_mult")).toEqual({ topLevel: 1, nested: 2 });
  });

  it("returns zeros for an absent key", () => {
    expect(countKeyOccurrences("a: 1\n", "atr_pct_max")).toEqual({ topLevel: 0, nested: 0 });
  });
});

describe("findMissingKeys", () => {
  it("returns keys with no occurrence in order", () => {
    const text = "strategycfg:\n  trail_atr_mult: 1.1\n";
    expect(findMissingKeys(text, ["breakout_atr_buf", "trail_atr_mult", "atr_pct_max"])).toEqual([
      "breakout_atr_buf",
      "atr_pct_max",
    ]);
  });
});
