export { runSweep, runCell, readBaseConfig } from "./sweep/sweep-runner.js";
export type { SweepOptions, SweepSummary, CellFailure, CellFailureReason, CellOutcome } from "./sweep/sweep-runner.js";
export { expandGrid } from "./sweep/grid.js";
export type { GridCell } from "./sweep/grid.js";
export { renderConfig, findMissingKeys } from "./sweep/render-config.js";
export { parseMetrics, METRICS_PATTERN } from "./sweep/parse-metrics.js";
export type { EngineMetrics } from "./sweep/parse-metrics.js";
export { ResultsReport, REPORT_HEADER } from "./sweep/results-report.js";
export type { RunResult } from "./sweep/results-report.js";
export { createEngineRunner, EngineError } from "./sweep/run-engine.js";
export type { EngineRunner, EngineRequest, EngineOutput } from "./sweep/run-engine.js";
export { withTempConfig } from "./sweep/temp-config.js";
export { writeOverlay } from "./sweep/write-overlay.js";
export { runPreflight, PreflightError } from "./preflight/run-preflight.js";
export type { ParameterGrid, ConfigOverrides, OverrideKey } from "./types/config.js";
