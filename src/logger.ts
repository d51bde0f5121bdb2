import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: "formula-engine",
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
