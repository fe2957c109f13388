import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ResultsReport, REPORT_HEADER, formatReportRow } from "./results-report.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "results-report-test-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("formatReportRow", () => {
  it("joins fields with commas and no quoting", () => {
    expect(formatReportRow({ buffer: 0.25, trailMultiplier: 0.9, cagr: "12.34", maxDrawdown: "-5.67" })).toBe(
      "0.25,0.9,12.34,-5.67",
    );
  });

  it("prints whole-number parameters with a fractional part", () => {
    expect(formatReportRow({ buffer: 0.3, trailMultiplier: 1, cagr: "8", maxDrawdown: "-3" })).toBe("0.3,1.0,8,-3");
  });
});

describe("ResultsReport", () => {
  it("writes the header on create", () => {
    const file = path.join(tmpDir, "results.csv");
    ResultsReport.create(file);
    expect(fs.readFileSync(file, "utf8")).toBe(`${REPORT_HEADER}\n`);
  });

  it("truncates an existing report", () => {
    const file = path.join(tmpDir, "results.csv");
    fs.writeFileSync(file, "stale,data\n1,2\n");
    ResultsReport.create(file);
    expect(fs.readFileSync(file, "utf8")).toBe("buf,trail,CAGR,MaxDD\n");
  });

  it("makes each appended row visible on disk immediately", () => {
    const file = path.join(tmpDir, "results.csv");
    const report = ResultsReport.create(file);

    report.append({ buffer: 0.3, trailMultiplier: 1.3, cagr: "8.1", maxDrawdown: "-9.4" });
    expect(fs.readFileSync(file, "utf8")).toBe("buf,trail,CAGR,MaxDD\n0.3,1.3,8.1,-9.4\n");

    report.append({ buffer: 0.35, trailMultiplier: 1.5, cagr: "-1.0", maxDrawdown: "-15.2" });
    expect(fs.readFileSync(file, "utf8").split("\n")).toEqual([
      "buf,trail,CAGR,MaxDD",
      "0.3,1.3,8.1,-9.4",
      "0.35,1.5,-1.0,-15.2",
      "",
    ]);
  });

  it("creates missing parent directories", () => {
    const file = path.join(tmpDir, "out", "nested", "results.csv");
    const report = ResultsReport.create(file);
    expect(report.filePath).toBe(file);
    expect(fs.existsSync(file)).toBe(true);
  });
});
