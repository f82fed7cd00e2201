import { availableParallelism } from "node:os";
import { z } from "zod";

const MiB = 1024 * 1024;

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  validation: {
    tolerance: {
      mode: "fraction" as const,
      value: 0,
    },
    checkExistence: true,
  },
  sharding: {
    shardSizeBytes: 512 * MiB,
  },
  upload: {
    concurrency: Math.min(4, availableParallelism()),
    maxAttempts: 5,
    baseDelayMs: 1_000,
    maxDelayMs: 60_000,
    maxJitterMs: 1_000,
  },
  storage: {
    backend: "local" as const,
    config: {},
  },
  manifest: {},
};

export const ToleranceSettingSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("fraction"),
    value: z.number().min(0).lt(1),
  }),
  z.object({
    mode: z.literal("absolute"),
    value: z.number().int().min(0),
  }),
]);

export const StorageBackend = z.enum(["local", "http"]);

export const LocalStorageConfigSchema = z.object({
  rootDir: z.string().min(1).describe("Hub directory; defaults to <root>/hub"),
});

export const HttpStorageConfigSchema = z.object({
  apiUrl: z.url(),
  token: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const PipelineConfigSchema = z.object({
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  validation: z
    .object({
      tolerance: ToleranceSettingSchema.default(DEFAULTS.validation.tolerance),
      checkExistence: z.boolean().default(DEFAULTS.validation.checkExistence),
    })
    .default(DEFAULTS.validation),
  sharding: z
    .object({
      shardSizeBytes: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.sharding.shardSizeBytes),
      maxRecordsPerShard: z.number().int().positive().optional(),
    })
    .default(DEFAULTS.sharding),
  upload: z
    .object({
      concurrency: z
        .number()
        .int()
        .min(1)
        .default(DEFAULTS.upload.concurrency),
      maxAttempts: z.number().int().min(1).default(DEFAULTS.upload.maxAttempts),
      baseDelayMs: z.number().int().min(0).default(DEFAULTS.upload.baseDelayMs),
      maxDelayMs: z.number().int().min(0).default(DEFAULTS.upload.maxDelayMs),
      maxJitterMs: z.number().int().min(0).default(DEFAULTS.upload.maxJitterMs),
    })
    .default(DEFAULTS.upload),
  storage: z
    .object({
      backend: StorageBackend.default(DEFAULTS.storage.backend),
      config: z
        .object({
          local: LocalStorageConfigSchema.optional(),
          http: HttpStorageConfigSchema.optional(),
        })
        .default(DEFAULTS.storage.config),
    })
    .default(DEFAULTS.storage),
  manifest: z
    .object({
      path: z
        .string()
        .min(1)
        .optional()
        .describe("SQLite ledger; defaults to <root>/manifest.db"),
    })
    .default(DEFAULTS.manifest),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type LoggingConfig = PipelineConfig["logging"];
export type ValidationConfig = PipelineConfig["validation"];
export type ShardingConfig = PipelineConfig["sharding"];
export type UploadConfig = PipelineConfig["upload"];
export type StorageConfig = PipelineConfig["storage"];
export type ToleranceSetting = z.infer<typeof ToleranceSettingSchema>;
