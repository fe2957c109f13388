import fs from "node:fs";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { Scalar, isMap, parseDocument } from "yaml";
import type { ConfigOverrides, OverrideKey } from "../types/config.js";
import { readBaseConfig } from "./sweep-runner.js";
import { renderConfig } from "./render-config.js";

/** Block that receives overrides the base config does not mention. */
export const OVERLAY_BLOCK = "strategycfg";

/**
 * Adds each key under `strategycfg`, creating the block when the config has none.
 * Only used when the line rewrite left keys unapplied, so configs that already
 * carry every key come out of the overlay byte for byte as rendered.
 */
function insertKeys(text: string, overrides: ConfigOverrides, keys: readonly OverrideKey[]): string {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new Error(`Base config is not valid YAML: ${doc.errors[0].message}`);
  }
  if (doc.contents !== null && !isMap(doc.contents)) {
    throw new Error(`Base config is not a mapping; cannot add ${keys.join(", ")}`);
  }

  for (const key of keys) {
    const value = overrides[key];
    if (value === undefined) continue;
    const node = new Scalar(value);
    node.minFractionDigits = 1;
    doc.setIn([OVERLAY_BLOCK, key], node);
  }
  return doc.toString();
}

/**
 * Renders the base config with the given overrides and writes it to `outPath`,
 * for running the engine once by hand with a specific parameter set.
 */
export function writeOverlay(opts: {
  basePath: string;
  outPath: string;
  overrides: ConfigOverrides;
}): { outPath: string; insertedKeys: OverrideKey[] } {
  const { basePath, outPath, overrides } = opts;
  if (path.resolve(basePath) === path.resolve(outPath)) {
    throw new Error(`Refusing to overwrite the base config: ${basePath}`);
  }

  const rendered = renderConfig(readBaseConfig(basePath), overrides);
  const text =
    rendered.missingKeys.length > 0 ? insertKeys(rendered.text, overrides, rendered.missingKeys) : rendered.text;

  fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
  writeFileAtomic.sync(outPath, text, "utf8");
  return { outPath, insertedKeys: rendered.missingKeys };
}
