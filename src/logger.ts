import pino from "pino";

/**
 * JSON logs go to stderr: stdout carries the MCP stdio transport.
 */
export type Logger = pino.Logger;

const LEVELS: readonly pino.LevelWithSilent[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function resolveLogLevel(value: string | undefined): pino.LevelWithSilent {
  const level = value?.trim().toLowerCase();
  return LEVELS.find((l) => l === level) ?? "info";
}

export function createLogger(level: pino.LevelWithSilent = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  return pino(
    {
      name: "message-id-resolver",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export const silentLogger: Logger = pino({ level: "silent" });

const logger = createLogger();

export default logger;
