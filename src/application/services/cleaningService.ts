import { ok, type Result } from "neverthrow";
import type { SchemaError } from "../../core/entities/appError";
import type { QualityReport } from "../../core/entities/quality";
import {
  LIST_SEPARATOR,
  type CleanRecord,
  type RawNumeric,
  type RawRecord,
} from "../../core/entities/record";
import { logger } from "../../shared/logger/logger";
import type {
  CellValue,
  TableSchema,
  ValidatedRow,
  ValidationService,
} from "./validationService";

export type CleanStageOutput = {
  records: CleanRecord[];
  report: QualityReport;
  droppedDuplicates: number;
};

const MILLION = 1_000_000;

export const cleanTableSchema: TableSchema = {
  stage: "clean",
  columns: [
    { name: "id", type: "number", nonNegative: true },
    { name: "title", type: "string" },
    { name: "tagline", type: "string" },
    { name: "releaseDate", type: "date" },
    { name: "genres", type: "string" },
    { name: "collection", type: "string" },
    { name: "originalLanguage", type: "string" },
    { name: "budget", type: "number", zeroIsMissing: true, nonNegative: true },
    { name: "revenue", type: "number", zeroIsMissing: true, nonNegative: true },
    { name: "productionCompanies", type: "string" },
    { name: "productionCountries", type: "string" },
    { name: "spokenLanguages", type: "string" },
    { name: "voteCount", type: "number", nonNegative: true },
    { name: "voteAverage", type: "number", nonNegative: true },
    { name: "popularity", type: "number", nonNegative: true },
    { name: "runtime", type: "number", zeroIsMissing: true, nonNegative: true },
    { name: "overview", type: "string" },
    { name: "cast", type: "string" },
    { name: "castSize", type: "number", nonNegative: true },
    { name: "crewSize", type: "number", nonNegative: true },
    { name: "directors", type: "string" },
  ],
  requiredColumns: ["id", "title", "budget", "revenue"],
  outlierColumns: [],
};

const joinNames = (items: ReadonlyArray<{ name: string | null }>): string | null => {
  const names = items
    .map((item) => item.name?.trim() ?? "")
    .filter(Boolean);
  return names.length === 0 ? null : names.join(LIST_SEPARATOR);
};

const isZeroCount = (value: RawNumeric): boolean => {
  if (value === null) {
    return false;
  }
  if (typeof value === "string" && value.trim() === "") {
    return false;
  }
  return Number(value) === 0;
};

/**
 * Turns nested catalog fields into one scalar row per record.
 */
export const flattenRecord = (record: RawRecord): Record<string, unknown> => {
  const cast = record.credits?.cast ?? [];
  const crew = record.credits?.crew ?? [];

  return {
    id: record.id,
    title: record.title,
    tagline: record.tagline,
    releaseDate: record.releaseDate,
    genres: joinNames(record.genres),
    collection: record.collection?.name ?? null,
    originalLanguage: record.originalLanguage,
    budget: record.budget,
    revenue: record.revenue,
    productionCompanies: joinNames(record.productionCompanies),
    productionCountries: joinNames(record.productionCountries),
    spokenLanguages: joinNames(record.spokenLanguages),
    voteCount: record.voteCount,
    // A rating with no votes behind it is not a rating.
    voteAverage: isZeroCount(record.voteCount) ? null : record.voteAverage,
    popularity: record.popularity,
    runtime: record.runtime,
    overview: record.overview,
    cast: joinNames(cast),
    castSize: record.credits ? cast.length : null,
    crewSize: record.credits ? crew.length : null,
    directors: joinNames(crew.filter((member) => member.job === "Director")),
  };
};

const text = (value: CellValue | undefined): string | null =>
  typeof value === "string" ? value : null;

const numeric = (value: CellValue | undefined): number | null =>
  typeof value === "number" ? value : null;

const toMillions = (value: CellValue | undefined): number | null => {
  const amount = numeric(value);
  return amount === null ? null : amount / MILLION;
};

const toCleanRecord = (row: ValidatedRow, id: number): CleanRecord => ({
  id,
  title: text(row.title),
  tagline: text(row.tagline),
  releaseDate: text(row.releaseDate),
  genres: text(row.genres),
  collection: text(row.collection),
  originalLanguage: text(row.originalLanguage),
  budgetMusd: toMillions(row.budget),
  revenueMusd: toMillions(row.revenue),
  productionCompanies: text(row.productionCompanies),
  productionCountries: text(row.productionCountries),
  spokenLanguages: text(row.spokenLanguages),
  voteCount: numeric(row.voteCount),
  voteAverage: numeric(row.voteAverage),
  popularity: numeric(row.popularity),
  runtime: numeric(row.runtime),
  overview: text(row.overview),
  cast: text(row.cast),
  castSize: numeric(row.castSize),
  crewSize: numeric(row.crewSize),
  directors: text(row.directors),
});

export class CleaningService {
  constructor(
    private readonly validator: ValidationService,
    private readonly schema: TableSchema = cleanTableSchema,
  ) {}

  /**
   * Quality of the fetched table as received, reported on the extract artifact.
   */
  assessRaw(records: RawRecord[]): Result<QualityReport, SchemaError> {
    return this.validator
      .validate(records.map(flattenRecord), { ...this.schema, stage: "extract" })
      .map((table) => table.report);
  }

  clean(records: RawRecord[]): Result<CleanStageOutput, SchemaError> {
    const seen = new Set<number>();
    const unique = records.filter((record) => {
      if (seen.has(record.id)) {
        return false;
      }
      seen.add(record.id);
      return true;
    });
    const droppedDuplicates = records.length - unique.length;

    if (droppedDuplicates > 0) {
      logger.warn(
        { stage: "clean", droppedDuplicates },
        "Dropped duplicate catalog records",
      );
    }

    return this.validator
      .validate(unique.map(flattenRecord), this.schema)
      .andThen((table) => {
        const cleaned = table.rows.flatMap((row) => {
          const id = numeric(row.id);
          return id === null ? [] : [toCleanRecord(row, id)];
        });

        logger.info(
          {
            stage: "clean",
            rowCount: cleaned.length,
            qualityScore: table.report.qualityScore,
          },
          "Records cleaned",
        );

        return ok({ records: cleaned, report: table.report, droppedDuplicates });
      });
  }
}
