import { cac } from "cac";
import type { z } from "zod";
import { formatZodErrors } from "@atr-sweep/kit";
import { CheckOptionsSchema, OverlayOptionsSchema, RunOptionsSchema } from "../types/config.js";
import type { CheckOptions, OverlayOptions, RunOptions } from "../types/config.js";

export type ParsedCommand =
  | { command: "run"; options: RunOptions }
  | { command: "check"; options: CheckOptions }
  | { command: "overlay"; options: OverlayOptions }
  | { command: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, options: Record<string, unknown>): z.output<T> {
  const result = schema.safeParse(options);
  if (!result.success) {
    throw new UsageError(`Invalid options:\n  ${formatZodErrors(result.error).join("\n  ")}`);
  }
  return result.data;
}

/**
 * Parse the command line. `run` is the default command; defaults live in the
 * zod schemas so the help text and validation cannot drift apart.
 */
export function parseArgs(argv: string[] = process.argv): ParsedCommand {
  const cli = cac("atr-sweep");

  const run = cli
    .command("", "Sweep breakout_atr_buf x trail_atr_mult and append results to a CSV")
    .alias("run")
    .option("--start <date>", "Backtest start date (default 2023-01-01)")
    .option("--end <date>", "Backtest end date (default 2024-12-31)")
    .option("--universe <path>", "Universe CSV passed to the engine")
    .option("--config <path>", "Base engine config (default ./backtest/config.yaml)")
    .option("--out <path>", "Report path (default results.csv)")
    .option("--buffers <list>", "Comma-separated breakout_atr_buf values")
    .option("--trails <list>", "Comma-separated trail_atr_mult values")
    .option("--max-pos <n>", "Max open positions passed to the engine (default 3)");

  const check = cli
    .command("check", "Check the base config and universe file")
    .option("--universe <path>", "Universe CSV")
    .option("--config <path>", "Base engine config");

  const overlay = cli
    .command("overlay", "Write a single rendered config for a manual engine run")
    .option("--config <path>", "Base engine config")
    .option("--out <path>", "Output path (default backtest/config_tmp.yaml)")
    .option("--buf <value>", "breakout_atr_buf")
    .option("--trail <value>", "trail_atr_mult")
    .option("--atrp <value>", "atr_pct_max");

  cli.help();

  const { args, options } = cli.parse(argv, { run: false });
  if (options.help) return { command: "help" };

  if (cli.matchedCommand === check) {
    return { command: "check", options: validate(CheckOptionsSchema, options) };
  }
  if (cli.matchedCommand === overlay) {
    return { command: "overlay", options: validate(OverlayOptionsSchema, options) };
  }
  if (cli.matchedCommand === run && args.length === 0) {
    return { command: "run", options: validate(RunOptionsSchema, options) };
  }
  throw new UsageError(`Unknown command: ${args.join(" ")}`);
}
