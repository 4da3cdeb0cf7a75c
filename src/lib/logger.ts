import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import { loadOptimizerConfig, type LogLevel } from "@/src/lib/config";

export type { Logger };

export const createLogger = (
  service: string,
  level?: LogLevel,
  destination?: DestinationStream
): Logger => {
  const options: LoggerOptions = {
    level: level ?? loadOptimizerConfig().logLevel,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
      // base and child bindings pass through here too, so only pid and hostname are dropped
      bindings: (bindings) =>
        Object.fromEntries(Object.entries(bindings).filter(([key]) => key !== "pid" && key !== "hostname"))
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: { service }
  };

  return destination ? pino(options, destination) : pino(options);
};

export const logger = createLogger("expiration-optimizer");
