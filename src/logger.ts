import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS: readonly pino.Level[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

function parseLevel(value: string | undefined): pino.Level {
  return LEVELS.find((level) => level === value) ?? "info";
}

const LOG_LEVEL = parseLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Create streams for both stdout and file
  const streams: pino.StreamEntry[] = [
    { level: LOG_LEVEL, stream: process.stdout },
    {
      level: LOG_LEVEL,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

// Base logger options
export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

// Create the main logger
export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// For Fastify: export config that Fastify can use directly
export const fastifyLoggerConfig =
  destination !== undefined
    ? { level: LOG_LEVEL, stream: destination }
    : { level: LOG_LEVEL };

// Child loggers for different modules
export const apiLogger = logger.child({ module: "remote-api" });
export const syncLogger = logger.child({ module: "ingestion" });
export const scheduleLogger = logger.child({ module: "scheduling" });
export const alertLogger = logger.child({ module: "alerts" });
export const dbLogger = logger.child({ module: "database" });

export type Logger = pino.Logger;

// Log startup info
if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
