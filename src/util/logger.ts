import pino from "pino";

let loggerInstance: pino.Logger | null = null;

export function getLogger(verbose = false): pino.Logger {
  if (!loggerInstance) {
    const level = process.env.LOG_LEVEL || (verbose ? "debug" : "info");
    loggerInstance = pino({
      level,
      transport:
        verbose && level !== "silent"
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            }
          : undefined,
    });
  }
  return loggerInstance;
}

export type Logger = pino.Logger;
