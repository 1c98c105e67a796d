import type { LogLevel as NestLogLevel } from "@nestjs/common";
import { z } from "zod";

export type LogLevel = "error" | "warn" | "info" | "debug" | "verbose";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

// Node clamps longer timer delays to 1ms.
const MAX_TIMER_MS = 2_147_483_647;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug", "verbose"]).default("info"),
  OBJECT_STORE: z.enum(["s3", "memory"]).default("s3"),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  S3_ENDPOINT: optionalString,
  S3_FORCE_PATH_STYLE: booleanFlag,
  MAX_OBJECT_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  DETECTOR_BACKEND: z.enum(["http", "noop"]).default("noop"),
  DETECTOR_URL: optionalString.pipe(z.string().url().optional()),
  DETECTOR_MODEL: z.string().min(1).default("yolov8n"),
  DEFAULT_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.25),
  DEFAULT_SUMMARY_SENTENCES: z.coerce.number().int().positive().default(2),
  SUMMARY_LOCALE: z.string().min(2).default("en"),
  SUMMARY_MAX_SENTENCES: z.coerce.number().int().positive().default(1_000),
  PIPELINE_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(30_000),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(250),
  INFERENCE_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  INFERENCE_MAX_QUEUE: z.coerce.number().int().min(0).default(16),
  INFERENCE_QUEUE_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(2_000),
});

export interface ObjectStorageConfig {
  readonly driver: "s3" | "memory";
  readonly region: string;
  readonly endpoint?: string;
  readonly forcePathStyle: boolean;
  readonly accessKeyId?: string;
  readonly secretAccessKey?: string;
  readonly maxObjectBytes: number;
}

export interface DetectorConfig {
  readonly backend: "http" | "noop";
  readonly url?: string;
  readonly model: string;
  readonly defaultConfidenceThreshold: number;
}

export interface SummarizerConfig {
  readonly defaultSentenceCount: number;
  readonly locale: string;
  /** Texts with more sentences are refused before any ranking work. */
  readonly maxSentences: number;
}

export interface AdmissionConfig {
  readonly maxConcurrent: number;
  readonly maxQueue: number;
  readonly queueTimeoutMs: number;
}

export interface PipelineConfig {
  readonly timeoutMs: number;
  readonly retryBackoffMs: number;
  readonly admission: AdmissionConfig;
}

export interface AppConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly objectStorage: ObjectStorageConfig;
  readonly detector: DetectorConfig;
  readonly summarizer: SummarizerConfig;
  readonly pipeline: PipelineConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Resolves the environment once into an immutable configuration object.
 * Components receive it through the `APP_CONFIG` token and never read
 * `process.env` themselves.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;

  if (values.DETECTOR_BACKEND === "http" && !values.DETECTOR_URL) {
    throw new ConfigError("Invalid configuration: DETECTOR_URL is required when DETECTOR_BACKEND is http");
  }

  return deepFreeze<AppConfig>({
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    objectStorage: {
      driver: values.OBJECT_STORE,
      region: values.AWS_REGION,
      endpoint: values.S3_ENDPOINT,
      forcePathStyle: values.S3_FORCE_PATH_STYLE,
      accessKeyId: values.AWS_ACCESS_KEY_ID,
      secretAccessKey: values.AWS_SECRET_ACCESS_KEY,
      maxObjectBytes: values.MAX_OBJECT_BYTES,
    },
    detector: {
      backend: values.DETECTOR_BACKEND,
      url: values.DETECTOR_URL,
      model: values.DETECTOR_MODEL,
      defaultConfidenceThreshold: values.DEFAULT_CONFIDENCE_THRESHOLD,
    },
    summarizer: {
      defaultSentenceCount: values.DEFAULT_SUMMARY_SENTENCES,
      locale: values.SUMMARY_LOCALE,
      maxSentences: values.SUMMARY_MAX_SENTENCES,
    },
    pipeline: {
      timeoutMs: values.PIPELINE_TIMEOUT_MS,
      retryBackoffMs: values.RETRY_BACKOFF_MS,
      admission: {
        maxConcurrent: values.INFERENCE_MAX_CONCURRENT,
        maxQueue: values.INFERENCE_MAX_QUEUE,
        queueTimeoutMs: values.INFERENCE_QUEUE_TIMEOUT_MS,
      },
    },
  });
}

/** Levels handed to Nest's logger: the configured one and everything more severe. */
export function logLevelsFor(level: LogLevel): NestLogLevel[] {
  const ordered: NestLogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];
  const target: NestLogLevel = level === "info" ? "log" : level;
  return ordered.slice(0, ordered.indexOf(target) + 1);
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === "object") {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
