/**
 * Configuration loading for tenantci
 *
 * Layers, later wins: defaults, global ~/.tenantci/config.json,
 * project .tenantci/config.json, environment variables, CLI flags.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { EXECUTORS } from "../types/executor";
import { logger, type Logger } from "../utils/ui";
import { ConfigError } from "./errors";

const CONFIG_DIR = ".tenantci";
const JSON_CONFIG_FILE = "config.json";

const DatabaseSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  maxAttempts: z.number().int().positive(),
  intervalMs: z.number().int().nonnegative(),
  connectTimeoutMs: z.number().int().positive(),
});

const TestsSchema = z.object({
  python: z.string().min(1),
  manageScript: z.string().min(1),
  target: z.string().min(1),
  projectDir: z.string().min(1),
  executors: z.array(z.enum(EXECUTORS)).min(1),
  keepDb: z.boolean(),
});

const ConfigSchema = z.object({
  database: DatabaseSchema,
  tests: TestsSchema,
});

// Config files may set any subset of fields
const ConfigFileSchema = z.object({
  database: DatabaseSchema.partial().optional(),
  tests: TestsSchema.partial().optional(),
});

export type TenantCiConfig = z.infer<typeof ConfigSchema>;
export type DatabaseConfig = TenantCiConfig["database"];
export type TestsConfig = TenantCiConfig["tests"];
export type ConfigLayer = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_CONFIG: TenantCiConfig = {
  database: {
    host: "localhost",
    port: 5432,
    maxAttempts: 50,
    intervalMs: 1000,
    connectTimeoutMs: 1000,
  },
  tests: {
    python: "python3",
    manageScript: "manage.py",
    target: "django_tenants.tests",
    projectDir: "dts_test_project",
    executors: [...EXECUTORS],
    keepDb: false,
  },
};

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  log?: Logger;
}

/**
 * Merge a layer onto a config, section by section.
 * Undefined fields in the layer leave the base value in place.
 */
export function mergeConfig(base: TenantCiConfig, layer: ConfigLayer): TenantCiConfig {
  return {
    database: { ...base.database, ...definedOnly<DatabaseConfig>(layer.database) },
    tests: { ...base.tests, ...definedOnly<TestsConfig>(layer.tests) },
  };
}

function definedOnly<T extends object>(section: Partial<T> | undefined): Partial<T> {
  if (!section) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(section) as (keyof T)[]) {
    if (section[key] !== undefined) {
      result[key] = section[key];
    }
  }
  return result;
}

function toIssues(error: z.ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Read one JSON config file. Missing files yield an empty layer;
 * unreadable or invalid files are skipped with a warning.
 */
function readConfigFile(path: string, log: Logger): ConfigLayer {
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    log.warn(
      `Could not parse config at '${path}', ignoring it. Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = toIssues(parsed.error)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join("; ");
    log.warn(`Invalid config at '${path}', ignoring it. ${details}`);
    return {};
  }

  return parsed.data;
}

/**
 * Environment layer. DATABASE_HOST counts only when non-empty;
 * KEEPDB, when present, is true for the literal "true" and nothing else.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};

  if (env.DATABASE_HOST) {
    layer.database = { host: env.DATABASE_HOST };
  }

  if (env.KEEPDB !== undefined) {
    layer.tests = { keepDb: env.KEEPDB === "true" };
  }

  return layer;
}

/**
 * Validate a fully merged config. Throws ConfigError listing every issue.
 */
export function validateConfig(config: unknown): TenantCiConfig {
  const parsed = ConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigError(toIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load the config from defaults, config files and environment.
 * CLI overrides are applied separately with applyOverrides().
 */
export async function getConfig(options: LoadConfigOptions = {}): Promise<TenantCiConfig> {
  const {
    cwd = process.cwd(),
    homeDir = homedir(),
    env = process.env,
    log = logger,
  } = options;

  let config = mergeConfig(DEFAULT_CONFIG, {});

  const globalPath = join(homeDir, CONFIG_DIR, JSON_CONFIG_FILE);
  config = mergeConfig(config, readConfigFile(globalPath, log));

  const projectPath = join(cwd, CONFIG_DIR, JSON_CONFIG_FILE);
  if (projectPath !== globalPath) {
    config = mergeConfig(config, readConfigFile(projectPath, log));
  }

  config = mergeConfig(config, configFromEnv(env));

  return validateConfig(config);
}

/**
 * Apply command-line overrides on top of a loaded config and re-validate.
 */
export function applyOverrides(config: TenantCiConfig, overrides: ConfigLayer): TenantCiConfig {
  return validateConfig(mergeConfig(config, overrides));
}
