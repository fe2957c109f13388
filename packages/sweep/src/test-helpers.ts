/**
 * Shared test helpers — temp workspaces and engine stubs.
 */
import { vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { EngineOutput, EngineRequest } from "./sweep/run-engine.js";

export const BASE_CONFIG = [
  "start: 2023-01-01",
  "end: 2024-12-31",
  "max_positions: 3",
  "strategycfg:",
  "  breakout_atr_buf: 0.20",
  "  trail_atr_mult: 1.10",
  "  atr_pct_max: 0.08",
  "",
].join("\n");

export function createTmpDir(prefix = "atr-sweep-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(dir: string, name: string, content: string): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, "utf8");
  return file;
}

/** Silent pino logger whose methods can be spied on. */
export function createTestLogger(): pino.Logger {
  return pino({ level: "silent" });
}

export interface EngineCall {
  request: EngineRequest;
  /** Config text as the engine saw it. */
  configText: string;
}

/**
 * Stub engine that records the rendered config it was given and replies with
 * whatever `respond` returns for that config.
 */
export function createStubEngine(
  respond: (configText: string, request: EngineRequest) => Partial<EngineOutput>,
) {
  const calls: EngineCall[] = [];
  const run = vi.fn(async (request: EngineRequest): Promise<EngineOutput> => {
    const configText = fs.readFileSync(request.configPath, "utf8");
    calls.push({ request, configText });
    return { output: "", exitCode: 0, timedOut: false, ...respond(configText, request) };
  });
  return { run, calls };
}

/** Pulls the value of a key back out of a rendered config. */
export function readKey(configText: string, key: string): string | undefined {
  const line = configText.split("\n").find((l) => l.trim().startsWith(`${key}:`));
  return line?.split(":")[1]?.trim();
}
