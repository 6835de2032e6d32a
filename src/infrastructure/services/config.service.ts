import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { IConfigService } from "../../core/domain/services/config.service.js";
import { Config, ConfigSchema } from "../../core/domain/entities/config.entity.js";
import { ConfigurationError, errorMessage } from "../../core/domain/errors.js";

type ConfigSection = "archive" | "storage" | "s3" | "logging";

/** Environment variables that override a single config field. */
const ENV_OVERRIDES: ReadonlyArray<[string, ConfigSection, string]> = [
  ["ARCHIVE_DIRS", "archive", "dirs"],
  ["REFRESH_CRON", "archive", "refreshCron"],
  ["RETAINED_JOBS", "archive", "retainedJobs"],
  ["CLEANUP_EXPIRED_JOBS", "archive", "cleanupExpiredJobs"],
  ["CLEANUP_BEYOND_LIMIT", "archive", "cleanupBeyondLimit"],
  ["STORAGE_BACKEND", "storage", "backend"],
  ["STORAGE_DIR", "storage", "dir"],
  ["STORAGE_KV_PATH", "storage", "kvPath"],
  ["AWS_REGION", "s3", "region"],
  ["S3_ENDPOINT", "s3", "endpoint"],
  ["S3_FORCE_PATH_STYLE", "s3", "forcePathStyle"],
  ["LOG_LEVEL", "logging", "level"],
  ["LOG_PRETTY", "logging", "pretty"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Replaces "${VAR}" strings with the variable's value, when it is set. */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

export function defaultConfigPath(): string {
  return resolve(process.cwd(), "config", "config.yaml");
}

export class ConfigService implements IConfigService {
  private config: Config;

  /**
   * @param configPath - YAML file; must exist when given (or set via CONFIG_PATH).
   * @param env - Defaults to process.env, after loading `.env`.
   */
  constructor(configPath?: string, env?: NodeJS.ProcessEnv) {
    if (!env) loadEnv();
    const source = env ?? process.env;
    const explicitPath = configPath || source.CONFIG_PATH;
    this.config = this.loadConfig(explicitPath || defaultConfigPath(), !explicitPath, source);
  }

  private loadConfig(path: string, optional: boolean, env: NodeJS.ProcessEnv): Config {
    let parsed: unknown = {};
    if (existsSync(path)) {
      try {
        parsed = yaml.load(readFileSync(path, "utf-8")) ?? {};
      } catch (e) {
        throw new ConfigurationError(`Invalid YAML in ${path}. ${errorMessage(e)}`, { cause: e });
      }
      if (!isRecord(parsed)) {
        throw new ConfigurationError(`Config at ${path} must be a YAML object.`);
      }
    } else if (!optional) {
      throw new ConfigurationError(`Config file not found: ${path}`);
    }

    const substituted = substituteEnv(parsed, env);
    const raw: Record<string, unknown> = isRecord(substituted) ? { ...substituted } : {};
    for (const [name, section, key] of ENV_OVERRIDES) {
      const value = env[name];
      if (value === undefined || value === "") continue;
      const current = raw[section];
      raw[section] = { ...(isRecord(current) ? current : {}), [key]: value };
    }

    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const invalid = result.error.issues
        .map((i) => `${i.path.join(".")} (${i.message})`)
        .join(", ");
      throw new ConfigurationError(`Invalid config at ${path}. Missing or invalid: ${invalid}.`);
    }
    return result.data;
  }

  getConfig(): Config {
    return this.config;
  }
  getArchiveConfig(): Config["archive"] {
    return this.config.archive;
  }
  getStorageConfig(): Config["storage"] {
    return this.config.storage;
  }
  getS3Config(): Config["s3"] {
    return this.config.s3;
  }
  getLoggingConfig(): Config["logging"] {
    return this.config.logging;
  }
}
