/** Matches the engine's summary line, e.g. `CAGR: 12.34%, Max Drawdown: -5.67%`. */
export const METRICS_PATTERN = /CAGR:\s*([-0-9.]+)%,\s*Max Drawdown:\s*([-0-9.]+)%/;

export interface EngineMetrics {
  /** Captured text, not reparsed, so the report keeps the engine's formatting. */
  cagr: string;
  maxDrawdown: string;
}

/**
 * First match of the pattern in the engine output, or null when absent.
 * The pattern must have two capture groups: CAGR, then max drawdown.
 */
export function parseMetrics(output: string, pattern: RegExp = METRICS_PATTERN): EngineMetrics | null {
  const match = pattern.exec(output);
  if (!match) return null;
  const [, cagr, maxDrawdown] = match;
  if (cagr === undefined || maxDrawdown === undefined) return null;
  return { cagr, maxDrawdown };
}
