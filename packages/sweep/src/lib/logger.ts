import pino from "pino";

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const level = process.env.LOG_LEVEL ?? "info";
  const logDir = process.env.LOG_DIR;

  const targets: pino.TransportTargetOptions[] = [
    { target: "pino/file", level, options: { destination: 1 } },
  ];
  if (logDir) {
    targets.push({
      target: "pino-roll",
      level,
      options: {
        file: `${logDir}/sweep`,
        frequency: "daily",
        dateFormat: "yyyy-MM-dd",
        extension: ".ndjson",
        mkdir: true,
      },
    });
  }

  return pino({ level }, pino.transport({ targets }));
}

const pinoInstance = createPinoLogger();

/** Base pino instance plus a per-module child factory. */
export const logger = Object.assign(pinoInstance, {
  createChild(module: string): pino.Logger {
    return pinoInstance.child({ module });
  },
});

export type Logger = pino.Logger;
