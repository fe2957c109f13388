import { OverrideKeySchema } from "../types/config.js";
import type { ConfigOverrides, OverrideKey } from "../types/config.js";
import { formatNumber } from "./grid.js";

export interface RenderedConfig {
  text: string;
  /** Override keys that matched no line, so their value was not applied. */
  missingKeys: OverrideKey[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function keyPatterns(key: string): { topLevel: RegExp; nested: RegExp } {
  const k = escapeRegExp(key);
  return {
    topLevel: new RegExp(`^${k}:\\s*.*`),
    nested: new RegExp(`^\\s+${k}:\\s*.*`),
  };
}

/**
 * Line-based rewrite of `key: value` lines. No YAML parsing: a top-level match
 * becomes `key: value`, an indented match becomes `  key: value` (two spaces).
 * Every other line, including its line ending, passes through untouched.
 */
export function renderConfig(text: string, overrides: ConfigOverrides): RenderedConfig {
  const entries = OverrideKeySchema.options.flatMap((key) => {
    const value = overrides[key];
    return value === undefined ? [] : [{ key, value, ...keyPatterns(key) }];
  });
  const seen = new Set<OverrideKey>();

  const lines = text.split("\n").map((line) => {
    const cr = line.endsWith("\r") ? "\r" : "";
    const body = cr ? line.slice(0, -1) : line;
    for (const { key, value, topLevel, nested } of entries) {
      if (topLevel.test(body)) {
        seen.add(key);
        return `${key}: ${formatNumber(value)}${cr}`;
      }
      if (nested.test(body)) {
        seen.add(key);
        return `  ${key}: ${formatNumber(value)}${cr}`;
      }
    }
    return line;
  });

  return {
    text: lines.join("\n"),
    missingKeys: entries.map((e) => e.key).filter((key) => !seen.has(key)),
  };
}

/** Counts top-level and indented occurrences of a key. */
export function countKeyOccurrences(text: string, key: string): { topLevel: number; nested: number } {
  const { topLevel, nested } = keyPatterns(key);
  let top = 0;
  let inner = 0;
  for (const raw of text.split("\n")) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    if (topLevel.test(line)) top++;
    else if (nested.test(line)) inner++;
  }
  return { topLevel: top, nested: inner };
}

/** Keys with no top-level or indented occurrence in the document. */
export function findMissingKeys(text: string, keys: readonly OverrideKey[]): OverrideKey[] {
  return keys.filter((key) => {
    const { topLevel, nested } = countKeyOccurrences(text, key);
    return topLevel + nested === 0;
  });
}
