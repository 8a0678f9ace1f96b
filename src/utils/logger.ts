import pino from "pino";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type Logger = pino.Logger;

// Silent until initLogger() runs, so tests and library use stay quiet.
let logger: Logger = pino({ level: "silent" });

interface LoggerOptions {
  level?: string;
  file?: string;
  stdout?: boolean;
}

export function initLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const targets: pino.TransportTargetOptions[] = [];

  if (options.stdout ?? true) {
    targets.push({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
        ignore: "pid,hostname",
      },
      level,
    });
  }

  if (options.file) {
    const dir = dirname(options.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    targets.push({
      target: "pino/file",
      options: { destination: options.file },
      level,
    });
  }

  logger = targets.length > 0
    ? pino({ level, transport: { targets } })
    : pino({ level });

  return logger;
}

/**
 * Named child of the current root logger.
 * Call it after initLogger(); children keep the root they were made from.
 */
export function getLogger(name?: string): Logger {
  return name ? logger.child({ module: name }) : logger;
}
