import { execa, ExecaError } from "execa";
import { logger as baseLogger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";

export interface EngineRequest {
  start: string;
  end: string;
  universePath: string;
  maxPositions: number;
  configPath: string;
}

export interface EngineOutput {
  /** stdout and stderr, interleaved. */
  output: string;
  /** null when the engine was stopped by the timeout. */
  exitCode: number | null;
  timedOut: boolean;
}

export type EngineRunner = (request: EngineRequest) => Promise<EngineOutput>;

/** The engine could not be run at all. Fatal for the sweep. */
export class EngineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EngineError";
  }
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function buildEngineArgs(request: EngineRequest): string[] {
  return [
    "--start", request.start,
    "--end", request.end,
    "--universe", request.universePath,
    "--max-pos", String(request.maxPositions),
    "--config", request.configPath,
  ];
}

export function splitCommand(command: string): { file: string; args: string[] } {
  const [file, ...args] = command.trim().split(/\s+/);
  if (!file) {
    throw new EngineError("Engine command is empty");
  }
  return { file, args };
}

/**
 * Runs the engine as a child process per request. A non-zero exit or a timeout is
 * returned to the caller with whatever output was produced; failing to start the
 * process (missing binary, killed by a signal) throws EngineError.
 */
export function createEngineRunner(opts: {
  command: string;
  cwd?: string;
  timeoutMs?: number;
  logger?: Logger;
}): EngineRunner {
  const { file, args: baseArgs } = splitCommand(opts.command);
  const timeout = opts.timeoutMs && opts.timeoutMs > 0 ? opts.timeoutMs : undefined;
  const log = opts.logger ?? baseLogger.createChild("engine");

  return async (request) => {
    const args = [...baseArgs, ...buildEngineArgs(request)];
    log.debug({ file, args }, "Starting engine");

    try {
      const result = await execa(file, args, {
        all: true,
        cwd: opts.cwd,
        timeout,
        stdin: "ignore",
      });
      return { output: asText(result.all), exitCode: result.exitCode ?? 0, timedOut: false };
    } catch (err) {
      if (err instanceof ExecaError) {
        if (err.timedOut) {
          return { output: asText(err.all), exitCode: null, timedOut: true };
        }
        if (err.exitCode !== undefined) {
          return { output: asText(err.all), exitCode: err.exitCode, timedOut: false };
        }
      }
      throw new EngineError(`Could not run engine: ${[file, ...args].join(" ")}`, { cause: err });
    }
  };
}
