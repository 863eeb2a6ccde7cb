import type { Result } from "neverthrow";
import type { StageStoreError } from "../entities/appError";
import type {
  CleanArtifact,
  MetricArtifact,
  PersistedStage,
  RawArtifact,
} from "../entities/pipeline";

export type ReportName = "analysis_report" | "run_summary";

/**
 * Durable per-stage artifacts. `has` only reports artifacts whose write completed.
 */
export interface StageStorePort {
  has(stage: PersistedStage): Promise<boolean>;
  load(stage: "extract"): Promise<Result<RawArtifact, StageStoreError>>;
  load(stage: "clean"): Promise<Result<CleanArtifact, StageStoreError>>;
  load(stage: "metrics"): Promise<Result<MetricArtifact, StageStoreError>>;
  save(stage: "extract", artifact: RawArtifact): Promise<void>;
  save(stage: "clean", artifact: CleanArtifact): Promise<void>;
  save(stage: "metrics", artifact: MetricArtifact): Promise<void>;
  writeReport(name: ReportName, payload: unknown): Promise<void>;
}

export interface ClockPort {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export interface IdGeneratorPort {
  next(): string;
}
