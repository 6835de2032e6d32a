import { z } from "zod";

/** `retainedJobs` value that disables retention by count. */
export const RETAIN_ALL_JOBS = -1;

const booleanish = z.union([
  z.boolean(),
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((v) => v === "true" || v === "1" || v === "yes"),
]);

const commaSeparated = z
  .union([z.string(), z.array(z.string())])
  .transform((v) =>
    (Array.isArray(v) ? v : v.split(","))
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

export const ArchiveConfigSchema = z.object({
  dirs: commaSeparated.pipe(
    z.array(z.string()).min(1, "at least one archive directory is required"),
  ),
  refreshCron: z.string().min(1).default("*/10 * * * * *"),
  retainedJobs: z.coerce
    .number()
    .int()
    .refine(
      (n) => n === RETAIN_ALL_JOBS || n >= 1,
      "must be -1 (unbounded) or at least 1",
    )
    .default(RETAIN_ALL_JOBS),
  cleanupExpiredJobs: booleanish.default(true),
  cleanupBeyondLimit: booleanish.default(true),
});

export const StorageConfigSchema = z.object({
  backend: z.enum(["file", "kvstore"]).default("file"),
  dir: z.string().min(1).default("./output/history"),
  kvPath: z.string().min(1).default("./output/history.sqlite"),
});

export const S3ConfigSchema = z.object({
  region: z.string().min(1).default("us-east-1"),
  endpoint: z.string().url().optional(),
  forcePathStyle: booleanish.default(false),
});

export const LoggingConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  pretty: booleanish.default(false),
});

export const ConfigSchema = z.object({
  archive: ArchiveConfigSchema,
  storage: StorageConfigSchema.default({}),
  s3: S3ConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type S3Config = z.infer<typeof S3ConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
