import fs from "node:fs";
import { logger as baseLogger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";
import type { ParameterGrid } from "../types/config.js";
import { expandGrid, formatCell } from "./grid.js";
import type { GridCell } from "./grid.js";
import { findMissingKeys, renderConfig } from "./render-config.js";
import { METRICS_PATTERN, parseMetrics } from "./parse-metrics.js";
import { ResultsReport } from "./results-report.js";
import type { RunResult } from "./results-report.js";
import { withTempConfig } from "./temp-config.js";
import type { EngineRunner } from "./run-engine.js";

const OUTPUT_TAIL_CHARS = 300;

export type CellFailureReason = "parse_miss" | "engine_failed";

export interface CellFailure {
  cell: GridCell;
  reason: CellFailureReason;
  exitCode: number | null;
  timedOut: boolean;
  /** End of the engine output, for the warning. */
  outputTail: string;
}

export type CellOutcome =
  | { ok: true; result: RunResult; exitCode: number | null; timedOut: boolean }
  | { ok: false; failure: CellFailure };

export interface SweepOptions {
  start: string;
  end: string;
  universePath: string;
  configPath: string;
  reportPath: string;
  maxPositions: number;
  grid: ParameterGrid;
  runEngine: EngineRunner;
  metricsPattern?: RegExp;
  logger?: Logger;
}

export interface SweepSummary {
  reportPath: string;
  results: RunResult[];
  failures: CellFailure[];
}

export function readBaseConfig(configPath: string): string {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Base config not found: ${configPath}`);
  }
  return fs.readFileSync(configPath, "utf8");
}

/**
 * One grid cell: render a fresh copy of the base config, run the engine against it
 * from a temp file, and scrape the metrics. The temp file is gone when this settles.
 */
export async function runCell(
  cell: GridCell,
  opts: Omit<SweepOptions, "grid" | "reportPath" | "logger">,
): Promise<CellOutcome> {
  const { text } = renderConfig(readBaseConfig(opts.configPath), {
    breakout_atr_buf: cell.buffer,
    trail_atr_mult: cell.trailMultiplier,
  });

  const engine = await withTempConfig(text, (configPath) =>
    opts.runEngine({
      start: opts.start,
      end: opts.end,
      universePath: opts.universePath,
      maxPositions: opts.maxPositions,
      configPath,
    }),
  );

  const metrics = parseMetrics(engine.output, opts.metricsPattern ?? METRICS_PATTERN);
  if (metrics) {
    return {
      ok: true,
      result: { buffer: cell.buffer, trailMultiplier: cell.trailMultiplier, ...metrics },
      exitCode: engine.exitCode,
      timedOut: engine.timedOut,
    };
  }

  const engineFailed = engine.timedOut || (engine.exitCode !== null && engine.exitCode !== 0);
  return {
    ok: false,
    failure: {
      cell,
      reason: engineFailed ? "engine_failed" : "parse_miss",
      exitCode: engine.exitCode,
      timedOut: engine.timedOut,
      outputTail: engine.output.slice(-OUTPUT_TAIL_CHARS),
    },
  };
}

/**
 * Runs every cell of the grid in order, one engine process at a time.
 * Cells without metrics are warned about and skipped; an EngineError aborts the sweep.
 */
export async function runSweep(opts: SweepOptions): Promise<SweepSummary> {
  const log = opts.logger ?? baseLogger.createChild("sweep");
  const cells = expandGrid(opts.grid);

  const missingKeys = findMissingKeys(readBaseConfig(opts.configPath), ["breakout_atr_buf", "trail_atr_mult"]);
  if (missingKeys.length > 0) {
    log.warn(
      { configPath: opts.configPath, missingKeys },
      "Swept keys not found in base config; their values will not be applied",
    );
  }

  const report = ResultsReport.create(opts.reportPath);
  const results: RunResult[] = [];
  const failures: CellFailure[] = [];

  log.info({ cells: cells.length, reportPath: opts.reportPath }, "Starting sweep");

  for (const [i, cell] of cells.entries()) {
    const progress = `${i + 1}/${cells.length}`;
    const outcome = await runCell(cell, opts);

    if (outcome.ok) {
      report.append(outcome.result);
      results.push(outcome.result);
      if (outcome.timedOut) {
        log.warn({ progress, timedOut: true }, `Engine timed out for ${formatCell(cell)} but reported metrics`);
      } else if (outcome.exitCode !== 0) {
        log.warn({ progress, exitCode: outcome.exitCode }, `Engine exited non-zero for ${formatCell(cell)} but reported metrics`);
      }
      log.info(
        {
          progress,
          buf: cell.buffer,
          trail: cell.trailMultiplier,
          cagr: outcome.result.cagr,
          maxDD: outcome.result.maxDrawdown,
        },
        `${formatCell(cell)} CAGR ${outcome.result.cagr}% MaxDD ${outcome.result.maxDrawdown}%`,
      );
      continue;
    }

    const { failure } = outcome;
    failures.push(failure);
    log.warn(
      {
        progress,
        buf: cell.buffer,
        trail: cell.trailMultiplier,
        reason: failure.reason,
        exitCode: failure.exitCode,
        timedOut: failure.timedOut,
        outputTail: failure.outputTail,
      },
      failure.reason === "engine_failed"
        ? `Engine failed for ${formatCell(cell)}`
        : `No metrics in engine output for ${formatCell(cell)}`,
    );
  }

  log.info({ rows: results.length, failures: failures.length, reportPath: opts.reportPath }, "Sweep finished");
  return { reportPath: opts.reportPath, results, failures };
}
