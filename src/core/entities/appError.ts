import type { StageName } from "./pipeline";

/**
 * Why a transient fetch attempt failed; drives the retry state machine.
 */
export type TransientErrorKind =
  | "rate_limited"
  | "server_error"
  | "timeout"
  | "transport_error";

/**
 * Record-scoped failures: the record is skipped and the batch continues.
 */
export type RecoverableFetchFailureKind =
  | "not_found"
  | "transient"
  | "rejected"
  | "malformed_response"
  | "invalid_identifier";

export type RecoverableFetchFailure = {
  severity: "recoverable";
  kind: RecoverableFetchFailureKind;
  recordId: number;
  message: string;
  attempts: number;
  elapsedMs: number;
  httpStatus?: number;
  lastErrorKind?: TransientErrorKind;
};

/**
 * Run-scoped failures: the whole batch stops, nothing is retried.
 */
export type FatalFetchFailure = {
  severity: "fatal";
  kind: "authentication";
  recordId: number;
  message: string;
  attempts: number;
  elapsedMs: number;
  httpStatus?: number;
};

export type FetchFailure = RecoverableFetchFailure | FatalFetchFailure;

export type SchemaError = {
  code: "schema_error";
  stage: StageName;
  missingColumns: string[];
  message: string;
};

export type StageStoreError = {
  code: "not_found" | "corrupt";
  stage: StageName;
  message: string;
  cause?: unknown;
};

export type DataQualityWarningCode =
  | "coercion_errors"
  | "high_missing"
  | "quality_gate"
  | "outliers";

/**
 * Non-fatal data quality finding surfaced in reports and logs only.
 */
export type DataQualityWarning = {
  code: DataQualityWarningCode;
  message: string;
  column?: string;
};

export type PipelineFailureKind =
  | "authentication"
  | "schema_error"
  | "empty_artifact"
  | "missing_input"
  | "store_error";
