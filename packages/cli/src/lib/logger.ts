import pino from "pino";

/** stdout logger for the CLI. Silent under the test runner. */
export function createLogger(level: string): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }
  return pino({ level });
}
