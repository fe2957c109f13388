import { isMap, isScalar, parseDocument } from "yaml";
import type { OverrideKey } from "../types/config.js";
import { countKeyOccurrences } from "../sweep/render-config.js";
import { PreflightError } from "./errors.js";

/** Blocks whose direct children are listed, when present. */
export const INSPECTED_BLOCKS: readonly string[] = ["strategy", "strategycfg", "engine", "backtest"];

/** Top-level keys the engine usually expects; names vary between engine versions. */
export const EXPECTED_TOP_LEVEL_KEYS = ["start", "end", "max_positions", "symbols", "data", "risk"] as const;

export interface ConfigInspection {
  /** False when the document is not a mapping; key checks are skipped then. */
  rootIsMap: boolean;
  topLevelKeys: string[];
  blocks: Record<string, string[]>;
  overrideKeys: Record<OverrideKey, { topLevel: number; nested: number }>;
  missingExpected: string[];
}

function mapKeys(node: unknown): string[] | null {
  if (!isMap(node)) return null;
  return node.items.map((pair) => String(isScalar(pair.key) ? pair.key.value : pair.key));
}

/**
 * Parses a config document and summarizes it: what is at the top level, what the
 * known blocks contain, and on which lines the swept keys sit. The swept-key
 * counts are line-based because that is how the sweep rewrites them.
 */
export function inspectConfig(text: string): ConfigInspection {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new PreflightError(`YAML parse error: ${doc.errors[0].message}`);
  }

  const topLevelKeys = mapKeys(doc.contents);
  const blocks: Record<string, string[]> = {};
  for (const block of INSPECTED_BLOCKS) {
    const children = mapKeys(doc.get(block, true));
    if (children) blocks[block] = children;
  }

  const count = (key: OverrideKey) => countKeyOccurrences(text, key);

  return {
    rootIsMap: topLevelKeys !== null,
    topLevelKeys: topLevelKeys ?? [],
    blocks,
    overrideKeys: {
      breakout_atr_buf: count("breakout_atr_buf"),
      trail_atr_mult: count("trail_atr_mult"),
      atr_pct_max: count("atr_pct_max"),
    },
    missingExpected: topLevelKeys
      ? EXPECTED_TOP_LEVEL_KEYS.filter((key) => !topLevelKeys.includes(key))
      : [],
  };
}
