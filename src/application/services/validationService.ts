import { err, ok, type Result } from "neverthrow";
import type {
  DataQualityWarning,
  SchemaError,
} from "../../core/entities/appError";
import type { StageName } from "../../core/entities/pipeline";
import type {
  ColumnQuality,
  OutlierFlag,
  QualityReport,
} from "../../core/entities/quality";
import { logger } from "../../shared/logger/logger";
import { quantile, round } from "../../shared/utils/statistics";

export type ColumnType = "number" | "date" | "string";

export type ColumnRule = {
  name: string;
  type: ColumnType;
  zeroIsMissing?: boolean;
  nonNegative?: boolean;
};

export type TableSchema = {
  stage: StageName;
  columns: ColumnRule[];
  requiredColumns: string[];
  outlierColumns: string[];
};

export type CellValue = string | number | null;

export type ValidatedRow = Record<string, CellValue>;

export type ValidatedTable = {
  rows: ValidatedRow[];
  report: QualityReport;
};

type Coerced = { value: CellValue; error: boolean };

const HIGH_MISSING_PERCENT = 50;

const PLACEHOLDER_TOKENS = new Set([
  "",
  "nan",
  "none",
  "null",
  "n/a",
  "no data",
  "no overview available.",
]);

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

const isPlaceholder = (value: string): boolean =>
  PLACEHOLDER_TOKENS.has(value.trim().toLowerCase());

const missing: Coerced = { value: null, error: false };
const invalid: Coerced = { value: null, error: true };

const coerceNumber = (raw: unknown, rule: ColumnRule): Coerced => {
  let parsed: number;

  if (typeof raw === "number") {
    parsed = raw;
  } else if (typeof raw === "string") {
    if (isPlaceholder(raw)) {
      return missing;
    }
    parsed = Number(raw.trim());
  } else {
    return invalid;
  }

  if (!Number.isFinite(parsed)) {
    return invalid;
  }

  if (rule.nonNegative && parsed < 0) {
    return invalid;
  }

  if (rule.zeroIsMissing && parsed === 0) {
    return missing;
  }

  return { value: parsed, error: false };
};

const coerceDate = (raw: unknown): Coerced => {
  if (typeof raw !== "string") {
    return invalid;
  }

  if (isPlaceholder(raw)) {
    return missing;
  }

  const text = raw.trim();
  const isoMatch = ISO_DATE.exec(text);
  if (isoMatch) {
    const [, year, month, day] = isoMatch;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    const valid =
      date.getUTCFullYear() === Number(year) &&
      date.getUTCMonth() === Number(month) - 1 &&
      date.getUTCDate() === Number(day);
    return valid ? { value: `${year}-${month}-${day}`, error: false } : invalid;
  }

  const timestamp = Date.parse(text);
  if (Number.isNaN(timestamp)) {
    return invalid;
  }

  return { value: new Date(timestamp).toISOString().slice(0, 10), error: false };
};

const coerceString = (raw: unknown): Coerced => {
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return { value: String(raw), error: false };
  }

  if (typeof raw !== "string") {
    return invalid;
  }

  return isPlaceholder(raw) ? missing : { value: raw.trim(), error: false };
};

const coerce = (raw: unknown, rule: ColumnRule): Coerced => {
  if (raw === null || raw === undefined) {
    return missing;
  }

  if (rule.type === "number") {
    return coerceNumber(raw, rule);
  }

  if (rule.type === "date") {
    return coerceDate(raw);
  }

  return coerceString(raw);
};

/**
 * Scores and normalizes a table between stages. Output rows keep input order
 * and carry only the columns the schema names.
 */
export class ValidationService {
  constructor(private readonly outlierIqrMultiple: number) {}

  validate(
    rows: ReadonlyArray<Readonly<Record<string, unknown>>>,
    schema: TableSchema,
  ): Result<ValidatedTable, SchemaError> {
    const missingColumns =
      rows.length === 0
        ? []
        : schema.requiredColumns.filter(
            (column) => !rows.some((row) => column in row),
          );

    if (missingColumns.length > 0) {
      const message = `Required columns absent from every ${schema.stage} row: ${missingColumns.join(", ")}.`;
      logger.error({ stage: schema.stage, missingColumns }, "Schema check failed");
      return err({
        code: "schema_error",
        stage: schema.stage,
        missingColumns,
        message,
      });
    }

    const missingCounts = new Map<string, number>();
    const errorCounts = new Map<string, number>();

    const validatedRows = rows.map((row) => {
      const output: ValidatedRow = {};

      schema.columns.forEach((rule) => {
        const coerced = coerce(row[rule.name], rule);
        output[rule.name] = coerced.value;

        if (coerced.value === null) {
          missingCounts.set(rule.name, (missingCounts.get(rule.name) ?? 0) + 1);
        }
        if (coerced.error) {
          errorCounts.set(rule.name, (errorCounts.get(rule.name) ?? 0) + 1);
        }
      });

      return output;
    });

    const rowCount = validatedRows.length;
    const columns: ColumnQuality[] = schema.columns.map((rule) => {
      const missingCount = missingCounts.get(rule.name) ?? 0;
      return {
        column: rule.name,
        missingCount,
        missingPercent:
          rowCount === 0 ? 0 : round((missingCount / rowCount) * 100, 2),
        coercionErrors: errorCounts.get(rule.name) ?? 0,
      };
    });

    const qualityScore = this.qualityScore(
      rowCount,
      schema.requiredColumns.map((column) => missingCounts.get(column) ?? 0),
    );
    const outliers = schema.outlierColumns.flatMap((column) =>
      this.findOutliers(validatedRows, column),
    );
    const warnings = this.collectWarnings(schema, columns, outliers);

    warnings.forEach((warning) => {
      logger.warn({ stage: schema.stage, ...warning }, "Data quality warning");
    });
    logger.debug(
      { stage: schema.stage, rowCount, qualityScore, outliers: outliers.length },
      "Table validated",
    );

    return ok({
      rows: validatedRows,
      report: {
        rowCount,
        requiredColumns: [...schema.requiredColumns],
        columns,
        qualityScore,
        outliers,
        warnings,
      },
    });
  }

  private qualityScore(rowCount: number, missingPerColumn: number[]): number {
    if (rowCount === 0 || missingPerColumn.length === 0) {
      return 0;
    }

    const completeness = missingPerColumn.map(
      (missingCount) => ((rowCount - missingCount) / rowCount) * 100,
    );
    const total = completeness.reduce((acc, value) => acc + value, 0);
    return round(total / completeness.length, 2);
  }

  private findOutliers(rows: ValidatedRow[], column: string): OutlierFlag[] {
    const points = rows.flatMap((row, rowIndex) => {
      const value = row[column];
      return typeof value === "number" ? [{ rowIndex, row, value }] : [];
    });

    if (points.length < 4) {
      return [];
    }

    const values = points.map((point) => point.value);
    const q1 = quantile(values, 0.25);
    const q3 = quantile(values, 0.75);
    if (q1 === null || q3 === null) {
      return [];
    }

    const spread = (q3 - q1) * this.outlierIqrMultiple;
    const lowerFence = round(q1 - spread);
    const upperFence = round(q3 + spread);

    return points
      .filter((point) => point.value < lowerFence || point.value > upperFence)
      .map((point) => {
        const id = point.row.id;
        return {
          rowIndex: point.rowIndex,
          recordId: typeof id === "number" ? id : null,
          column,
          value: point.value,
          lowerFence,
          upperFence,
        };
      });
  }

  private collectWarnings(
    schema: TableSchema,
    columns: ColumnQuality[],
    outliers: OutlierFlag[],
  ): DataQualityWarning[] {
    const coercionWarnings = columns
      .filter((column) => column.coercionErrors > 0)
      .map((column) => ({
        code: "coercion_errors" as const,
        column: column.column,
        message: `${column.coercionErrors} value(s) in ${column.column} could not be coerced.`,
      }));

    const missingWarnings = columns
      .filter(
        (column) =>
          schema.requiredColumns.includes(column.column) &&
          column.missingPercent >= HIGH_MISSING_PERCENT,
      )
      .map((column) => ({
        code: "high_missing" as const,
        column: column.column,
        message: `${column.missingPercent}% of ${column.column} values are missing.`,
      }));

    const outlierWarnings = schema.outlierColumns.flatMap((column) => {
      const count = outliers.filter((flag) => flag.column === column).length;
      return count === 0
        ? []
        : [
            {
              code: "outliers" as const,
              column,
              message: `${count} value(s) in ${column} fall outside the IQR fences.`,
            },
          ];
    });

    return [...coercionWarnings, ...missingWarnings, ...outlierWarnings];
  }
}
