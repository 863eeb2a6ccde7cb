import "dotenv/config";
import { z } from "zod";
import type { RetryPolicy } from "../../core/policies/retryStateMachine";

const supportedCatalogProviders = ["tmdb", "mock"] as const;
const supportedAuthModes = ["query", "bearer"] as const;

export type CatalogProviderName = (typeof supportedCatalogProviders)[number];
export type CatalogAuthMode = (typeof supportedAuthModes)[number];

export const DEFAULT_RECORD_IDS = [
  299534, 19995, 140607, 299536, 597, 135397, 420818, 24428, 168259, 99861,
  284054, 12445, 181808, 330457, 351286, 109445, 321612, 260513,
];

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  CATALOG_PROVIDER: z.enum(supportedCatalogProviders).default("tmdb"),
  CATALOG_BASE_URL: z.string().url().default("https://api.themoviedb.org/3"),
  CATALOG_API_KEY: z.string().default(""),
  CATALOG_AUTH_MODE: z.enum(supportedAuthModes).default("query"),
  CATALOG_LANGUAGE: z.string().default("en-US"),
  CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CATALOG_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  CATALOG_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(1_000),
  CATALOG_BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(8_000),
  CATALOG_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  PIPELINE_RECORD_IDS: z.string().default(DEFAULT_RECORD_IDS.join(",")),
  PIPELINE_DATA_DIR: z.string().default("./data"),
  PIPELINE_ROI_MIN_BUDGET_MUSD: z.coerce.number().nonnegative().default(10),
  PIPELINE_MIN_QUALITY_SCORE: z.coerce.number().min(0).max(100).default(80),
  PIPELINE_OUTLIER_IQR_MULTIPLE: z.coerce.number().positive().default(1.5),
  PIPELINE_SKIP_EXISTING: booleanFlag.default("true"),
  ANALYSIS_TOP_N: z.coerce.number().int().positive().default(5),
});

export type AppEnv = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv =>
  envSchema.parse(source);

export const env: AppEnv = parseEnv(process.env);

export type CatalogConfig = {
  provider: CatalogProviderName;
  baseUrl: string;
  apiKey: string;
  authMode: CatalogAuthMode;
  language: string;
  timeoutMs: number;
  requestDelayMs: number;
  retry: RetryPolicy;
};

/**
 * Immutable run configuration built once and handed to every component at construction.
 */
export type PipelineConfig = {
  catalog: CatalogConfig;
  recordIds: number[];
  rejectedRecordIds: string[];
  dataDir: string;
  roiMinBudgetMusd: number;
  minQualityScore: number;
  outlierIqrMultiple: number;
  skipExisting: boolean;
  topN: number;
};

export type RecordIdParseResult = {
  ids: number[];
  rejected: string[];
};

/**
 * Keeps positive integer identifiers in their given order, dropping repeats and
 * reporting everything else.
 */
export const parseRecordIds = (raw: string): RecordIdParseResult => {
  const ids: number[] = [];
  const rejected: string[] = [];

  raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .forEach((item) => {
      const parsed = Number(item);
      if (!Number.isSafeInteger(parsed) || parsed <= 0) {
        rejected.push(item);
        return;
      }

      if (!ids.includes(parsed)) {
        ids.push(parsed);
      }
    });

  return { ids, rejected };
};

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  Object.values(value).forEach((child) => {
    if (child !== null && typeof child === "object") {
      deepFreeze(child);
    }
  });
  return Object.freeze(value);
};

export const buildPipelineConfig = (
  appEnv: AppEnv,
): Readonly<PipelineConfig> => {
  const { ids, rejected } = parseRecordIds(appEnv.PIPELINE_RECORD_IDS);

  return deepFreeze({
    catalog: {
      provider: appEnv.CATALOG_PROVIDER,
      baseUrl: appEnv.CATALOG_BASE_URL,
      apiKey: appEnv.CATALOG_API_KEY.trim(),
      authMode: appEnv.CATALOG_AUTH_MODE,
      language: appEnv.CATALOG_LANGUAGE,
      timeoutMs: appEnv.CATALOG_TIMEOUT_MS,
      requestDelayMs: appEnv.CATALOG_REQUEST_DELAY_MS,
      retry: {
        maxAttempts: appEnv.CATALOG_MAX_ATTEMPTS,
        baseDelayMs: appEnv.CATALOG_BACKOFF_BASE_MS,
        maxDelayMs: Math.max(
          appEnv.CATALOG_BACKOFF_BASE_MS,
          appEnv.CATALOG_BACKOFF_MAX_MS,
        ),
      },
    },
    recordIds: ids,
    rejectedRecordIds: rejected,
    dataDir: appEnv.PIPELINE_DATA_DIR,
    roiMinBudgetMusd: appEnv.PIPELINE_ROI_MIN_BUDGET_MUSD,
    minQualityScore: appEnv.PIPELINE_MIN_QUALITY_SCORE,
    outlierIqrMultiple: appEnv.PIPELINE_OUTLIER_IQR_MULTIPLE,
    skipExisting: appEnv.PIPELINE_SKIP_EXISTING,
    topN: appEnv.ANALYSIS_TOP_N,
  });
};
