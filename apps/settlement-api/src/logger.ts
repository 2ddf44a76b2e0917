import { pino, type Logger } from "pino";

export function createLogger(level: string, name = "settlement-api"): Logger {
  return pino({
    name,
    level,
    base: { service: name },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label })
    }
  });
}
