import type { Result } from "neverthrow";
import type { SchemaError } from "../../core/entities/appError";
import type { QualityReport } from "../../core/entities/quality";
import type { CleanRecord, MetricRecord } from "../../core/entities/record";
import { logger } from "../../shared/logger/logger";
import { round } from "../../shared/utils/statistics";
import type { TableSchema, ValidationService } from "./validationService";

export const metricTableSchema: TableSchema = {
  stage: "metrics",
  columns: [
    { name: "id", type: "number", nonNegative: true },
    { name: "title", type: "string" },
    { name: "budgetMusd", type: "number", nonNegative: true },
    { name: "revenueMusd", type: "number", nonNegative: true },
    { name: "profit", type: "number" },
    { name: "roi", type: "number", nonNegative: true },
    { name: "voteAverage", type: "number", nonNegative: true },
    { name: "popularity", type: "number", nonNegative: true },
  ],
  requiredColumns: ["id", "title", "budgetMusd", "revenueMusd"],
  outlierColumns: ["roi"],
};

// Zero money means "not reported", never "free".
const reported = (value: number | null): number | null =>
  value === null || value === 0 || !Number.isFinite(value) ? null : value;

/**
 * Derives profit and ROI. ROI is left missing below the reliability threshold
 * so low-budget titles do not dominate rankings.
 */
export class MetricService {
  constructor(
    private readonly validator: ValidationService,
    private readonly roiMinBudgetMusd: number,
  ) {}

  compute(records: CleanRecord[]): MetricRecord[] {
    const computed = records.map((record) => {
      const budget = reported(record.budgetMusd);
      const revenue = reported(record.revenueMusd);
      const bothReported = budget !== null && revenue !== null;

      const profit = bothReported ? round(revenue - budget, 6) : null;
      const roi =
        bothReported && budget >= this.roiMinBudgetMusd
          ? round(revenue / budget, 6)
          : null;

      return { ...record, profit, roi };
    });

    logger.info(
      {
        stage: "metrics",
        rowCount: computed.length,
        withProfit: computed.filter((record) => record.profit !== null).length,
        withRoi: computed.filter((record) => record.roi !== null).length,
        roiMinBudgetMusd: this.roiMinBudgetMusd,
      },
      "Metrics computed",
    );

    return computed;
  }

  assess(records: MetricRecord[]): Result<QualityReport, SchemaError> {
    return this.validator
      .validate(records, metricTableSchema)
      .map((table) => table.report);
  }
}
