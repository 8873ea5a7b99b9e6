/**
 * Logging for persona-relay
 *
 * tslog loggers, one sub logger per conversation context so every line a
 * context writes carries its `contextId`. JSON lines can be mirrored to a
 * file for replaying a call afterwards.
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Ordered as tslog's numeric minLevel */
export const LOG_LEVELS: readonly LogLevel[] = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
  logToFile: boolean;
  /** Required for file output; ignored otherwise */
  logDir?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "relay",
  level: "info",
  prettyPrint: true,
  logToFile: false,
};

export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const { name, level, prettyPrint, logToFile, logDir } = { ...DEFAULT_CONFIG, ...config };

  const logger = new Logger<ILogObj>({
    name,
    type: prettyPrint ? "pretty" : "json",
    minLevel: LOG_LEVELS.indexOf(level),
    prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}}.{{ms}} {{logLevelName}} [{{name}}] ",
    prettyLogTimeZone: "local",
    stylePrettyLogs: prettyPrint,
  });

  if (logToFile && logDir) {
    appendToFile(logger, path.join(logDir, `${name}.log`));
  }

  return logger;
}

function appendToFile(logger: Logger<ILogObj>, logFile: string): void {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  logger.attachTransport((logObj) => {
    fs.appendFileSync(logFile, `${JSON.stringify(logObj)}\n`);
  });
}

export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

/**
 * Sub logger for one conversation; `contextId` is merged into every entry
 */
export function createContextLogger(parent: Logger<ILogObj>, contextId: string): Logger<ILogObj> {
  return parent.getSubLogger({ name: `ctx:${contextId}` }, { contextId });
}

let globalLogger: Logger<ILogObj> | null = null;

export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}

/**
 * Log a named lifecycle event such as "context:connected"
 */
export function logEvent(
  logger: Logger<ILogObj>,
  event: string,
  data: Record<string, unknown> = {},
): void {
  logger.info({ event, ...data });
}

/**
 * Run `fn`, logging how long it took; failures are logged and rethrown
 */
export async function logTiming<T>(
  logger: Logger<ILogObj>,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  const elapsed = (): number => Math.round(performance.now() - start);
  try {
    const result = await fn();
    logger.debug({ operation, durationMs: elapsed(), status: "success" });
    return result;
  } catch (error) {
    logger.error({ operation, durationMs: elapsed(), status: "error", error });
    throw error;
  }
}
