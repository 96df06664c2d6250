import dbg from "debug";
import winston, { LogEntry } from "winston";
import { disableLogOutput, logLevel } from "./config";
import { formatError } from "./formatError";

type LogLevel = "error" | "warn" | "info" | "debug";

export type Tags = Record<string, unknown>;

const localDebugger = dbg("driverfetch");

const consoleTransport = new winston.transports.Console({
  // Log lines go to stderr so stdout stays usable for command output
  stderrLevels: ["error", "warn", "info", "debug"],
});

const winstonLogger = winston.createLogger({
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  level: logLevel,
  silent: disableLogOutput,
  transports: [consoleTransport],
});

let closed = false;

export async function flushLog() {
  if (closed) {
    return;
  }
  closed = true;

  await new Promise<void>(resolve => {
    winstonLogger.on("finish", () => resolve());
    winstonLogger.end();
  });
}

export function logDebug(message: string, tags?: Tags) {
  log(message, "debug", tags);
}

export function logError(message: string, tags?: Tags) {
  log(message, "error", tags);
}

export function logInfo(message: string, tags?: Tags) {
  log(message, "info", tags);
}

function log(message: string, level: LogLevel, tags?: Tags) {
  const formattedTags = formatTags(tags);

  localDebugger(message, formattedTags);

  if (closed) {
    return;
  }

  const entry: LogEntry = {
    level,
    message,
    ...formattedTags,
  };

  winstonLogger.log(entry);
}

function formatTags(tags?: Tags) {
  if (!tags) {
    return;
  }

  return Object.fromEntries(
    Object.entries(tags).map(([key, value]) => [
      key,
      value instanceof Error ? formatError(value) : value,
    ])
  );
}
