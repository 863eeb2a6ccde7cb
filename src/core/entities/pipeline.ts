import type {
  DataQualityWarning,
  PipelineFailureKind,
  RecoverableFetchFailureKind,
} from "./appError";
import type { CleanRecord, MetricRecord, RawRecord } from "./record";
import type { QualityReport } from "./quality";

export const STAGE_ORDER = ["extract", "clean", "metrics", "analyze"] as const;

export type StageName = (typeof STAGE_ORDER)[number];

/**
 * Stages whose output is a persisted table.
 */
export type PersistedStage = Exclude<StageName, "analyze">;

export const ARTIFACT_VERSION = 1;

export type RecordFailure = {
  recordId: number;
  kind: RecoverableFetchFailureKind;
  message: string;
  attempts: number;
};

export type StageArtifact<TRow> = {
  stage: PersistedStage;
  version: number;
  rows: TRow[];
  report: QualityReport;
  failures: RecordFailure[];
};

export type RawArtifact = StageArtifact<RawRecord>;
export type CleanArtifact = StageArtifact<CleanRecord>;
export type MetricArtifact = StageArtifact<MetricRecord>;
export type AnyArtifact = RawArtifact | CleanArtifact | MetricArtifact;

export type StageStatus = "skipped" | "succeeded" | "failed" | "fell_back";

export type GateOutcome = "passed" | "warned" | "blocked";

export type StageRunSummary = {
  stage: StageName;
  status: StageStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  rowCount: number;
  qualityScore: number | null;
  gate: GateOutcome | null;
  warnings: DataQualityWarning[];
};

export type ExtractionStats = {
  requested: number;
  succeeded: number;
  failed: number;
  successRate: number;
  failures: RecordFailure[];
};

export type HeadlineRecord = {
  recordId: number;
  title: string | null;
  value: number;
};

export type PipelineHeadline = {
  highestRevenue: HeadlineRecord | null;
  highestRoi: HeadlineRecord | null;
};

export type PipelineRunStatus = "running" | "succeeded" | "failed";

export type PipelineRun = {
  runId: string;
  status: PipelineRunStatus;
  startedAt: string;
  finishedAt: string | null;
  durationMs: number | null;
  skipExisting: boolean;
  stages: StageRunSummary[];
  qualityReports: Array<{ stage: PersistedStage; report: QualityReport }>;
  extraction: ExtractionStats | null;
  headline: PipelineHeadline | null;
  failure: {
    stage: StageName;
    kind: PipelineFailureKind;
    message: string;
  } | null;
};

export type PipelineRunFailure = {
  stage: StageName;
  kind: PipelineFailureKind;
  message: string;
  run: PipelineRun;
};
