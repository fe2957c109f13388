import fs from "node:fs";
import path from "node:path";
import { formatNumber } from "./grid.js";

export const REPORT_HEADER = "buf,trail,CAGR,MaxDD";

export interface RunResult {
  buffer: number;
  trailMultiplier: number;
  cagr: string;
  maxDrawdown: string;
}

export function formatReportRow(result: RunResult): string {
  return `${formatNumber(result.buffer)},${formatNumber(result.trailMultiplier)},${result.cagr},${result.maxDrawdown}`;
}

/**
 * Append-only CSV. `create` truncates and writes the header; every `append`
 * goes straight to disk so an interrupted sweep keeps the rows it produced.
 */
export class ResultsReport {
  private constructor(readonly filePath: string) {}

  static create(filePath: string): ResultsReport {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(filePath, `${REPORT_HEADER}\n`, "utf8");
    return new ResultsReport(filePath);
  }

  append(result: RunResult): void {
    fs.appendFileSync(this.filePath, `${formatReportRow(result)}\n`, "utf8");
  }
}
