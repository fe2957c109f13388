/**
 * cli.ts — grid sweep over breakout_atr_buf x trail_atr_mult.
 *
 * Usage (from the repository root):
 *   npm run sweep -- [run] [--start 2023-01-01] [--end 2024-12-31] [--buffers 0.2,0.3] [--trails 0.9,1.3]
 *   npm run sweep -- check [--config ./backtest/config.yaml] [--universe ./data/symbols.csv]
 *   npm run sweep -- overlay --buf 0.3 --trail 1.4 [--atrp 0.1]
 */

import { isMainModule } from "@atr-sweep/kit";
import { env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { parseArgs, UsageError } from "./cli/parse-args.js";
import { runPreflight, PreflightError } from "./preflight/run-preflight.js";
import { createEngineRunner } from "./sweep/run-engine.js";
import { runSweep } from "./sweep/sweep-runner.js";
import { writeOverlay } from "./sweep/write-overlay.js";

const log = logger.createChild("cli");

export async function main(argv: string[] = process.argv): Promise<void> {
  const parsed = parseArgs(argv);

  switch (parsed.command) {
    case "help":
      return;

    case "check": {
      runPreflight({ configPath: parsed.options.config, universePath: parsed.options.universe });
      log.info("Preflight passed");
      return;
    }

    case "overlay": {
      const { config, out, buf, trail, atrp } = parsed.options;
      const { outPath, insertedKeys } = writeOverlay({
        basePath: config,
        outPath: out,
        overrides: { breakout_atr_buf: buf, trail_atr_mult: trail, atr_pct_max: atrp },
      });
      if (insertedKeys.length > 0) {
        log.info({ insertedKeys }, "Keys missing from the base config were added under strategycfg");
      }
      log.info({ outPath }, "Overlay written");
      return;
    }

    case "run": {
      const opts = parsed.options;
      const runEngine = createEngineRunner({
        command: env.SWEEP_ENGINE,
        timeoutMs: env.SWEEP_ENGINE_TIMEOUT_MS,
      });
      const summary = await runSweep({
        start: opts.start,
        end: opts.end,
        universePath: opts.universe,
        configPath: opts.config,
        reportPath: opts.out,
        maxPositions: opts.maxPos,
        grid: { buffers: opts.buffers, trailMultipliers: opts.trails },
        runEngine,
      });
      if (summary.failures.length > 0) {
        log.warn(
          { skipped: summary.failures.map((f) => ({ ...f.cell, reason: f.reason })) },
          `${summary.failures.length} cell(s) produced no row`,
        );
      }
      return;
    }
  }
}

if (isMainModule(import.meta.url)) {
  main().catch((err: unknown) => {
    if (err instanceof UsageError || err instanceof PreflightError) {
      log.error(err.message);
    } else {
      log.error(err, "Fatal error");
    }
    process.exitCode = 1;
  });
}
