#!/usr/bin/env node
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import { createApp } from "./app";
import { ConfigError, loadConfig, type Config } from "./configs";
import { initLogger } from "./utils/logger";

dotenv.config();

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parsed;
}

interface CliOptions {
  host?: string;
  dataDir?: string;
  persistence: boolean;
  sweepInterval?: number;
  logLevel?: string;
  logFile?: string;
}

const program = new Command();

function resolveConfig(port: number | undefined, options: CliOptions): Config {
  try {
    return loadConfig(process.env, {
      port,
      host: options.host,
      dataDir: options.dataDir,
      // --no-persistence only; otherwise the environment decides
      persistence: options.persistence ? undefined : "false",
      sweepIntervalMs: options.sweepInterval,
      logLevel: options.logLevel,
      logFile: options.logFile,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      program.error(error.message);
    }
    throw error;
  }
}

program
  .name("tinykv")
  .description("In-memory key-value store with named databases and TTLs")
  .argument("[port]", "TCP port to listen on", parseInteger)
  .option("--host <host>", "interface to bind")
  .option("--data-dir <dir>", "directory for database snapshots")
  .option("--no-persistence", "keep databases in memory only")
  .option("--sweep-interval <ms>", "expiry sweep interval in milliseconds", parseInteger)
  .option("--log-level <level>", "fatal, error, warn, info, debug, trace or silent")
  .option("--log-file <file>", "also write logs to this file")
  .action(async (port: number | undefined, options: CliOptions) => {
    const config = resolveConfig(port, options);
    const log = initLogger({ level: config.logLevel, file: config.logFile });
    const app = createApp(config);
    await app.start();

    const shutdown = (signal: string) => {
      log.info({ signal }, "shutting down");
      void app.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error({ err: error }, "shutdown failed");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
