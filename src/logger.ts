import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const LOG_LEVEL: pino.LevelWithSilent =
  LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? "info";
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Tee to stderr and the log file; stdout is reserved for the report
  const streamLevel: pino.Level = LOG_LEVEL === "silent" ? "fatal" : LOG_LEVEL;
  const streams: pino.StreamEntry[] = [
    { level: streamLevel, stream: process.stderr },
    {
      level: streamLevel,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions, pino.destination(2));

// Child loggers for different modules
export const syncLogger = logger.child({ module: "sync" });
export const connectorLogger = logger.child({ module: "connector" });
export const contentLogger = logger.child({ module: "content" });
export const cliLogger = logger.child({ module: "cli" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.debug(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
