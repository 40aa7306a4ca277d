import pino from "pino";

export function createLogger(level: string): pino.Logger {
  return pino({
    name: "issue-corpus",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
