import { z } from "zod";
import type {
  CleanArtifact,
  MetricArtifact,
  RawArtifact,
  RecordFailure,
} from "../../core/entities/pipeline";
import type { QualityReport } from "../../core/entities/quality";
import type {
  CleanRecord,
  MetricRecord,
  RawRecord,
} from "../../core/entities/record";

const nullableString = z.string().nullable();
const nullableNumber = z.number().nullable();
const rawNumeric = z.union([z.number(), z.string(), z.null()]);
const namedEntity = z.object({ name: nullableString });

export const rawRecordSchema: z.ZodType<RawRecord> = z.object({
  id: z.number().int().positive(),
  title: nullableString,
  tagline: nullableString,
  releaseDate: nullableString,
  originalLanguage: nullableString,
  overview: nullableString,
  budget: rawNumeric,
  revenue: rawNumeric,
  runtime: rawNumeric,
  popularity: rawNumeric,
  voteAverage: rawNumeric,
  voteCount: rawNumeric,
  genres: z.array(namedEntity),
  productionCompanies: z.array(namedEntity),
  productionCountries: z.array(namedEntity),
  spokenLanguages: z.array(namedEntity),
  collection: namedEntity.nullable(),
  credits: z
    .object({
      cast: z.array(z.object({ name: nullableString, character: nullableString })),
      crew: z.array(
        z.object({
          name: nullableString,
          job: nullableString,
          department: nullableString,
        }),
      ),
    })
    .nullable(),
});

const cleanRecordObject = z.object({
  id: z.number().int().positive(),
  title: nullableString,
  tagline: nullableString,
  releaseDate: nullableString,
  genres: nullableString,
  collection: nullableString,
  originalLanguage: nullableString,
  budgetMusd: nullableNumber,
  revenueMusd: nullableNumber,
  productionCompanies: nullableString,
  productionCountries: nullableString,
  spokenLanguages: nullableString,
  voteCount: nullableNumber,
  voteAverage: nullableNumber,
  popularity: nullableNumber,
  runtime: nullableNumber,
  overview: nullableString,
  cast: nullableString,
  castSize: nullableNumber,
  crewSize: nullableNumber,
  directors: nullableString,
});

export const cleanRecordSchema: z.ZodType<CleanRecord> = cleanRecordObject;

export const metricRecordSchema: z.ZodType<MetricRecord> =
  cleanRecordObject.extend({
    profit: nullableNumber,
    roi: nullableNumber,
  });

export const qualityReportSchema: z.ZodType<QualityReport> = z.object({
  rowCount: z.number().int().nonnegative(),
  requiredColumns: z.array(z.string()),
  columns: z.array(
    z.object({
      column: z.string(),
      missingCount: z.number().int().nonnegative(),
      missingPercent: z.number(),
      coercionErrors: z.number().int().nonnegative(),
    }),
  ),
  qualityScore: z.number(),
  outliers: z.array(
    z.object({
      rowIndex: z.number().int().nonnegative(),
      recordId: nullableNumber,
      column: z.string(),
      value: z.number(),
      lowerFence: z.number(),
      upperFence: z.number(),
    }),
  ),
  warnings: z.array(
    z.object({
      code: z.enum(["coercion_errors", "high_missing", "quality_gate", "outliers"]),
      message: z.string(),
      column: z.string().optional(),
    }),
  ),
});

const recordFailureSchema: z.ZodType<RecordFailure> = z.object({
  recordId: z.number(),
  kind: z.enum([
    "not_found",
    "transient",
    "rejected",
    "malformed_response",
    "invalid_identifier",
  ]),
  message: z.string(),
  attempts: z.number().int().nonnegative(),
});

const artifactBase = z.object({
  stage: z.enum(["extract", "clean", "metrics"]),
  version: z.number().int().positive(),
  report: qualityReportSchema,
  failures: z.array(recordFailureSchema),
});

export const rawArtifactSchema: z.ZodType<RawArtifact> = artifactBase.extend({
  rows: z.array(rawRecordSchema),
});

export const cleanArtifactSchema: z.ZodType<CleanArtifact> = artifactBase.extend({
  rows: z.array(cleanRecordSchema),
});

export const metricArtifactSchema: z.ZodType<MetricArtifact> =
  artifactBase.extend({
    rows: z.array(metricRecordSchema),
  });

export const completionMarkerSchema = z.object({
  stage: z.enum(["extract", "clean", "metrics"]),
  version: z.number().int().positive(),
  rowCount: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
});

export type CompletionMarker = z.infer<typeof completionMarkerSchema>;
