import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError, messageOf } from "./errors.js";

export interface TimeoutPolicy {
  lookupMs: number;
  listMs: number;
  maintenanceMs: number;
  privilegedMs: number;
}

export interface AppConfig {
  brewPath: string;
  logCapacity: number;
  tickIntervalMs: number;
  maxConcurrentLookups: number;
  searchInfoPrefetch: number;
  /** `null` keeps re-prompting after every incorrect password. */
  maxPasswordAttempts: number | null;
  confirmBeforeActions: boolean;
  timeouts: TimeoutPolicy;
  askpassPath?: string;
  logFile?: string;
  logLevel: "debug" | "info" | "warn" | "error";
}

export const DEFAULT_CONFIG: AppConfig = {
  brewPath: "brew",
  logCapacity: 200,
  tickIntervalMs: 100,
  maxConcurrentLookups: 15,
  searchInfoPrefetch: 50,
  maxPasswordAttempts: null,
  confirmBeforeActions: true,
  timeouts: {
    lookupMs: 10_000,
    listMs: 120_000,
    maintenanceMs: 600_000,
    privilegedMs: 1_800_000
  },
  logLevel: "info"
};

const positiveInt = z.number().int().positive();

const fileSchema = z
  .object({
    brewPath: z.string().min(1),
    logCapacity: positiveInt,
    tickIntervalMs: positiveInt,
    maxConcurrentLookups: positiveInt,
    searchInfoPrefetch: z.number().int().nonnegative(),
    maxPasswordAttempts: positiveInt.nullable(),
    confirmBeforeActions: z.boolean(),
    timeouts: z
      .object({
        lookupMs: positiveInt,
        listMs: positiveInt,
        maintenanceMs: positiveInt,
        privilegedMs: positiveInt
      })
      .partial()
      .strict(),
    askpassPath: z.string().min(1),
    logFile: z.string().min(1),
    logLevel: z.enum(["debug", "info", "warn", "error"])
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof fileSchema>;

export interface ConfigOverrides {
  brewPath?: string;
  logFile?: string;
  logLevel?: AppConfig["logLevel"];
}

export function defaultConfigPath(): string {
  return join(homedir(), ".config", "tapdeck", "config.json");
}

export function parseConfig(raw: unknown, source = "config"): AppConfig {
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join("; ")}`, { issues });
  }

  return mergeConfig(DEFAULT_CONFIG, parsed.data);
}

export function mergeConfig(base: AppConfig, file: ConfigFile): AppConfig {
  const { timeouts, ...rest } = file;
  return {
    ...base,
    ...rest,
    timeouts: { ...base.timeouts, ...(timeouts ?? {}) }
  };
}

/**
 * Loads the config file when present. A missing file at the default location
 * falls back to defaults; an explicit path that cannot be read is an error.
 */
export async function loadConfig(path?: string, overrides: ConfigOverrides = {}): Promise<AppConfig> {
  const target = path ?? defaultConfigPath();
  let config: AppConfig;

  let content: string | undefined;
  try {
    content = await readFile(target, "utf8");
  } catch (error) {
    if (path !== undefined || !isMissingFile(error)) {
      throw new ConfigError(`Unable to read config at ${target}: ${messageOf(error)}`);
    }
  }

  if (content === undefined) {
    config = { ...DEFAULT_CONFIG, timeouts: { ...DEFAULT_CONFIG.timeouts } };
  } else {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Config at ${target} is not valid JSON: ${messageOf(error)}`);
    }
    config = parseConfig(raw, `config at ${target}`);
  }

  return applyOverrides(config, overrides);
}

function applyOverrides(config: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...config,
    ...(overrides.brewPath ? { brewPath: overrides.brewPath } : {}),
    ...(overrides.logFile ? { logFile: overrides.logFile } : {}),
    ...(overrides.logLevel ? { logLevel: overrides.logLevel } : {})
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
