import type { DataQualityWarning } from "./appError";

export type ColumnQuality = {
  column: string;
  missingCount: number;
  missingPercent: number;
  coercionErrors: number;
};

export type OutlierFlag = {
  rowIndex: number;
  recordId: number | null;
  column: string;
  value: number;
  lowerFence: number;
  upperFence: number;
};

/**
 * Per-artifact data quality summary computed before an artifact is persisted.
 */
export type QualityReport = {
  rowCount: number;
  requiredColumns: string[];
  columns: ColumnQuality[];
  qualityScore: number;
  outliers: OutlierFlag[];
  warnings: DataQualityWarning[];
};
