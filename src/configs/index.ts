import { z } from "zod";

export const DEFAULT_PORT = 4000;
export const DEFAULT_SWEEP_INTERVAL_MS = 5_000;
export const DEFAULT_MAX_AUTH_ATTEMPTS = 3;
export const DEFAULT_BCRYPT_ROUNDS = 10;

/**
 * TTL suffix → milliseconds
 */
export const TTL_UNITS = {
  s: 1_000,
  m: 60 * 1_000,
  d: 24 * 60 * 60 * 1_000,
} as const;

export type TtlUnit = keyof typeof TTL_UNITS;

const booleanFromEnv = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const ConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65_535).default(DEFAULT_PORT),
  host: z.string().min(1).default("0.0.0.0"),
  dataDir: z.string().min(1).default("dbs"),
  persistence: booleanFromEnv.default("true"),
  sweepIntervalMs: z.coerce.number().int().positive().default(DEFAULT_SWEEP_INTERVAL_MS),
  maxAuthAttempts: z.coerce.number().int().positive().default(DEFAULT_MAX_AUTH_ATTEMPTS),
  // bcrypt accepts 4..31
  bcryptRounds: z.coerce.number().int().min(4).max(31).default(DEFAULT_BCRYPT_ROUNDS),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  logFile: z.string().min(1).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
/**
 * Raw values (e.g. CLI flags), validated like the environment
 */
export type ConfigOverrides = { [K in keyof Config]?: string | number };

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.issues = issues;
  }
}

/**
 * Builds the runtime config from TINYKV_* variables.
 * Overrides (CLI flags) win over the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Config {
  const raw = {
    port: env.TINYKV_PORT,
    host: env.TINYKV_HOST,
    dataDir: env.TINYKV_DATA_DIR,
    persistence: env.TINYKV_PERSISTENCE?.toLowerCase(),
    sweepIntervalMs: env.TINYKV_SWEEP_INTERVAL_MS,
    maxAuthAttempts: env.TINYKV_MAX_AUTH_ATTEMPTS,
    bcryptRounds: env.TINYKV_BCRYPT_ROUNDS,
    logLevel: env.TINYKV_LOG_LEVEL,
    logFile: env.TINYKV_LOG_FILE || undefined,
  };

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const result = ConfigSchema.safeParse({ ...raw, ...definedOverrides });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return result.data;
}
