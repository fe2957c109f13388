import fs from "node:fs";
import path from "node:path";
import { logger as baseLogger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";
import { PreflightError } from "./errors.js";
import { inspectConfig } from "./inspect-config.js";
import type { ConfigInspection } from "./inspect-config.js";
import { DEFAULT_SMOKE_SIZE, loadUniverse, resolveUniversePath, writeSmokeList } from "./universe.js";

export { PreflightError };

export interface PreflightReport {
  configPath: string;
  config: ConfigInspection;
  universePath: string;
  symbolCount: number;
  smokeListPath: string;
  smokeListWritten: boolean;
}

/** The configured universe first, then the usual fallbacks beside it. */
export function universeCandidates(universePath: string): string[] {
  const dir = path.dirname(universePath);
  const candidates = [universePath, path.join(dir, "symbols.csv"), path.join(dir, "universe.csv")];
  return [...new Set(candidates)];
}

/**
 * Checks that the base config and the universe are usable before a sweep.
 * Writes a smoke list of the first symbols next to the universe if there is none.
 */
export function runPreflight(opts: {
  configPath: string;
  universePath: string;
  logger?: Logger;
}): PreflightReport {
  const log = opts.logger ?? baseLogger.createChild("preflight");

  if (!fs.existsSync(opts.configPath)) {
    throw new PreflightError(`Config not found: ${opts.configPath}`);
  }
  const config = inspectConfig(fs.readFileSync(opts.configPath, "utf8"));
  log.info({ configPath: opts.configPath, topLevelKeys: config.topLevelKeys, blocks: config.blocks }, "Config read");

  if (!config.rootIsMap) {
    log.warn({ configPath: opts.configPath }, "Config root is not a mapping; skipping key checks");
  }

  const unswept = Object.entries(config.overrideKeys)
    .filter(([, where]) => where.topLevel + where.nested === 0)
    .map(([key]) => key);
  if (unswept.length > 0) {
    log.warn({ keys: unswept }, "Config lacks keys the sweep rewrites");
  }
  if (config.missingExpected.length > 0) {
    log.info({ keys: config.missingExpected }, "Expected top-level keys not found (ignore if the engine names them differently)");
  }

  const candidates = universeCandidates(opts.universePath);
  const universePath = resolveUniversePath(candidates);
  if (!universePath) {
    throw new PreflightError(`No universe file found at: ${candidates.join(", ")}`);
  }

  const symbols = loadUniverse(universePath);
  if (symbols.length === 0) {
    throw new PreflightError(`Universe is empty: ${universePath}`);
  }
  log.info({ universePath, symbols: symbols.length, head: symbols.slice(0, 12) }, "Universe read");

  const smokeListPath = path.join(path.dirname(universePath), `smoke${DEFAULT_SMOKE_SIZE}.csv`);
  const smokeListWritten = writeSmokeList(symbols, smokeListPath);
  log.info({ smokeListPath, written: smokeListWritten }, smokeListWritten ? "Smoke list created" : "Smoke list already present");

  return {
    configPath: opts.configPath,
    config,
    universePath,
    symbolCount: symbols.length,
    smokeListPath,
    smokeListWritten,
  };
}
