import { err, ok, type Result } from "neverthrow";
import type { AnalysisReport } from "../../core/entities/analysis";
import type {
  DataQualityWarning,
  PipelineFailureKind,
  SchemaError,
  StageStoreError,
} from "../../core/entities/appError";
import {
  ARTIFACT_VERSION,
  type AnyArtifact,
  type CleanArtifact,
  type ExtractionStats,
  type MetricArtifact,
  type PersistedStage,
  type PipelineRun,
  type PipelineRunFailure,
  type RawArtifact,
  type StageName,
  type StageRunSummary,
  type StageStatus,
} from "../../core/entities/pipeline";
import type { MetricRecord } from "../../core/entities/record";
import type {
  ClockPort,
  IdGeneratorPort,
  StageStorePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { round } from "../../shared/utils/statistics";
import type { AnalysisService } from "./analysisService";
import type { CleaningService } from "./cleaningService";
import type { ExtractionService } from "./extractionService";
import type { MetricService } from "./metricService";

export type RunOptions = {
  recordIds?: number[];
  skipExisting?: boolean;
};

export type OrchestratorSettings = {
  recordIds: number[];
  skipExisting: boolean;
  minQualityScore: number;
};

export type StageFailure = {
  stage: StageName;
  kind: PipelineFailureKind;
  message: string;
};

type Resolved<TArtifact> = {
  artifact: TArtifact;
  status: StageStatus;
};

type StageSteps<TArtifact> = {
  load: () => Promise<Result<TArtifact, StageStoreError>>;
  compute: () => Promise<Result<TArtifact, StageFailure>>;
  save: (artifact: TArtifact) => Promise<void>;
};

type StagePolicy = {
  // Reuse a complete persisted artifact instead of computing.
  reuse: boolean;
  // On a schema error, fall back to a complete persisted artifact.
  fallback: boolean;
};

const schemaFailure = (error: SchemaError): StageFailure => ({
  stage: error.stage,
  kind: "schema_error",
  message: error.message,
});

/**
 * Runs extract, clean, metrics and analyze in strict order. Each persisted
 * stage is validated before it is saved, gated before the next stage reads it,
 * and reused on later runs while everything upstream of it was reused too.
 */
export class PipelineOrchestratorService {
  constructor(
    private readonly extraction: ExtractionService,
    private readonly cleaning: CleaningService,
    private readonly metrics: MetricService,
    private readonly analysis: AnalysisService,
    private readonly store: StageStorePort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly settings: OrchestratorSettings,
  ) {}

  async run(
    options: RunOptions = {},
  ): Promise<Result<PipelineRun, PipelineRunFailure>> {
    const run = this.startRun(options.skipExisting ?? this.settings.skipExisting);
    const recordIds = options.recordIds ?? this.settings.recordIds;
    const skip = run.skipExisting;

    logger.info(
      { runId: run.runId, recordCount: recordIds.length, skipExisting: skip },
      "Pipeline run started",
    );

    const raw = await this.resolveExtract(run, recordIds, {
      reuse: skip,
      fallback: skip,
    });
    if (raw.isErr()) {
      return this.fail(run, raw.error);
    }

    const rawGate = this.gate(run, raw.value.artifact);
    if (rawGate.isErr()) {
      return this.fail(run, rawGate.error);
    }

    const clean = await this.resolveClean(run, raw.value.artifact, {
      reuse: skip && raw.value.status === "skipped",
      fallback: skip,
    });
    if (clean.isErr()) {
      return this.fail(run, clean.error);
    }

    const cleanGate = this.gate(run, clean.value.artifact);
    if (cleanGate.isErr()) {
      return this.fail(run, cleanGate.error);
    }

    const metrics = await this.resolveMetrics(run, clean.value.artifact, {
      reuse: skip && clean.value.status === "skipped",
      fallback: skip,
    });
    if (metrics.isErr()) {
      return this.fail(run, metrics.error);
    }

    const metricsGate = this.gate(run, metrics.value.artifact);
    if (metricsGate.isErr()) {
      return this.fail(run, metricsGate.error);
    }

    await this.analyze(run, metrics.value.artifact);
    return this.succeed(run);
  }

  /**
   * Recomputes one stage from the persisted output of the stage before it.
   */
  async runStage(
    stage: StageName,
    options: RunOptions = {},
  ): Promise<Result<PipelineRun, PipelineRunFailure>> {
    const run = this.startRun(options.skipExisting ?? false);
    const policy: StagePolicy = { reuse: false, fallback: run.skipExisting };

    logger.info(
      { runId: run.runId, stage, skipExisting: run.skipExisting },
      "Single stage run started",
    );

    switch (stage) {
      case "extract": {
        const raw = await this.resolveExtract(
          run,
          options.recordIds ?? this.settings.recordIds,
          policy,
        );
        return this.settle(run, raw);
      }
      case "clean": {
        const input = await this.loadInput(run, "extract", () =>
          this.store.load("extract"),
        );
        if (input.isErr()) {
          return this.fail(run, input.error);
        }
        this.recordExtraction(run, input.value);
        const gate = this.gate(run, input.value);
        if (gate.isErr()) {
          return this.fail(run, gate.error);
        }
        const clean = await this.resolveClean(run, input.value, policy);
        return this.settle(run, clean);
      }
      case "metrics": {
        const input = await this.loadInput(run, "clean", () =>
          this.store.load("clean"),
        );
        if (input.isErr()) {
          return this.fail(run, input.error);
        }
        const gate = this.gate(run, input.value);
        if (gate.isErr()) {
          return this.fail(run, gate.error);
        }
        const metrics = await this.resolveMetrics(run, input.value, policy);
        return this.settle(run, metrics);
      }
      case "analyze": {
        const input = await this.loadInput(run, "metrics", () =>
          this.store.load("metrics"),
        );
        if (input.isErr()) {
          return this.fail(run, input.error);
        }
        const gate = this.gate(run, input.value);
        if (gate.isErr()) {
          return this.fail(run, gate.error);
        }
        await this.analyze(run, input.value);
        return this.succeed(run);
      }
    }
  }

  /**
   * Gates the output of a single stage run before reporting it.
   */
  private async settle<TArtifact extends AnyArtifact>(
    run: PipelineRun,
    resolved: Result<Resolved<TArtifact>, StageFailure>,
  ): Promise<Result<PipelineRun, PipelineRunFailure>> {
    const gated = resolved.andThen((value) => this.gate(run, value.artifact));
    return gated.isErr() ? this.fail(run, gated.error) : this.succeed(run);
  }

  private startRun(skipExisting: boolean): PipelineRun {
    return {
      runId: this.ids.next(),
      status: "running",
      startedAt: this.clock.now().toISOString(),
      finishedAt: null,
      durationMs: null,
      skipExisting,
      stages: [],
      qualityReports: [],
      extraction: null,
      headline: null,
      failure: null,
    };
  }

  private async resolveExtract(
    run: PipelineRun,
    recordIds: number[],
    policy: StagePolicy,
  ): Promise<Result<Resolved<RawArtifact>, StageFailure>> {
    const steps: StageSteps<RawArtifact> = {
      load: () => this.store.load("extract"),
      save: (artifact) => this.store.save("extract", artifact),
      compute: async (): Promise<Result<RawArtifact, StageFailure>> => {
        const batch = await this.extraction.run(recordIds);
        if (batch.isErr()) {
          return err({
            stage: "extract",
            kind: "authentication",
            message: batch.error.message,
          });
        }

        return this.cleaning
          .assessRaw(batch.value.records)
          .map((report): RawArtifact => ({
            stage: "extract",
            version: ARTIFACT_VERSION,
            rows: batch.value.records,
            report,
            failures: batch.value.failures,
          }))
          .mapErr(schemaFailure);
      },
    };

    const resolved = await this.resolveStage(run, "extract", policy, steps);
    if (resolved.isOk()) {
      this.recordExtraction(run, resolved.value.artifact);
    }
    return resolved;
  }

  private resolveClean(
    run: PipelineRun,
    input: RawArtifact,
    policy: StagePolicy,
  ): Promise<Result<Resolved<CleanArtifact>, StageFailure>> {
    return this.resolveStage<CleanArtifact>(run, "clean", policy, {
      load: () => this.store.load("clean"),
      save: (artifact) => this.store.save("clean", artifact),
      compute: async (): Promise<Result<CleanArtifact, StageFailure>> =>
        this.cleaning
          .clean(input.rows)
          .map(
            (output): CleanArtifact => ({
              stage: "clean",
              version: ARTIFACT_VERSION,
              rows: output.records,
              report: output.report,
              failures: [],
            }),
          )
          .mapErr(schemaFailure),
    });
  }

  private resolveMetrics(
    run: PipelineRun,
    input: CleanArtifact,
    policy: StagePolicy,
  ): Promise<Result<Resolved<MetricArtifact>, StageFailure>> {
    return this.resolveStage<MetricArtifact>(run, "metrics", policy, {
      load: () => this.store.load("metrics"),
      save: (artifact) => this.store.save("metrics", artifact),
      compute: async (): Promise<Result<MetricArtifact, StageFailure>> => {
        const rows = this.metrics.compute(input.rows);
        return this.metrics
          .assess(rows)
          .map(
            (report): MetricArtifact => ({
              stage: "metrics",
              version: ARTIFACT_VERSION,
              rows,
              report,
              failures: [],
            }),
          )
          .mapErr(schemaFailure);
      },
    });
  }

  private async resolveStage<TArtifact extends AnyArtifact>(
    run: PipelineRun,
    stage: PersistedStage,
    policy: StagePolicy,
    steps: StageSteps<TArtifact>,
  ): Promise<Result<Resolved<TArtifact>, StageFailure>> {
    const startedAt = this.clock.now();

    if (policy.reuse && (await this.store.has(stage))) {
      const loaded = await steps.load();
      if (loaded.isOk() && loaded.value.rows.length > 0) {
        this.recordStage(run, stage, "skipped", startedAt, loaded.value);
        logger.info(
          { runId: run.runId, stage, rowCount: loaded.value.rows.length },
          "Stage skipped; reusing persisted artifact",
        );
        return ok({ artifact: loaded.value, status: "skipped" });
      }

      logger.warn(
        { runId: run.runId, stage },
        loaded.isErr()
          ? `Persisted artifact unusable, recomputing: ${loaded.error.message}`
          : "Persisted artifact has no rows, recomputing",
      );
    }

    logger.info({ runId: run.runId, stage }, "Stage started");
    const computed = await steps.compute();

    if (computed.isErr()) {
      const failure = computed.error;

      if (
        failure.kind === "schema_error" &&
        policy.fallback &&
        (await this.store.has(stage))
      ) {
        const previous = await steps.load();
        if (previous.isOk() && previous.value.rows.length > 0) {
          this.recordStage(run, stage, "fell_back", startedAt, previous.value);
          logger.warn(
            { runId: run.runId, stage, reason: failure.message },
            "Stage failed its schema check; falling back to persisted artifact",
          );
          return ok({ artifact: previous.value, status: "fell_back" });
        }
      }

      this.recordFailedStage(run, stage, startedAt);
      return err(failure);
    }

    // An empty table is never persisted, so a later run fetches again.
    if (computed.value.rows.length === 0) {
      this.recordStage(run, stage, "failed", startedAt, computed.value);
      return err(this.blockEmpty(run, computed.value));
    }

    await steps.save(computed.value);
    this.recordStage(run, stage, "succeeded", startedAt, computed.value);
    logger.info(
      {
        runId: run.runId,
        stage,
        rowCount: computed.value.rows.length,
        qualityScore: computed.value.report.qualityScore,
      },
      "Stage succeeded",
    );
    return ok({ artifact: computed.value, status: "succeeded" });
  }

  private async loadInput<TArtifact extends AnyArtifact>(
    run: PipelineRun,
    stage: PersistedStage,
    load: () => Promise<Result<TArtifact, StageStoreError>>,
  ): Promise<Result<TArtifact, StageFailure>> {
    const startedAt = this.clock.now();
    const loaded = await load();

    if (loaded.isErr()) {
      return err({
        stage,
        kind: loaded.error.code === "not_found" ? "missing_input" : "store_error",
        message: loaded.error.message,
      });
    }

    this.recordStage(run, stage, "skipped", startedAt, loaded.value);
    return ok(loaded.value);
  }

  /**
   * An empty table stops the run; a low quality score only warns.
   */
  private gate(run: PipelineRun, artifact: AnyArtifact): Result<void, StageFailure> {
    if (artifact.rows.length === 0) {
      return err(this.blockEmpty(run, artifact));
    }

    const summary = this.latestSummary(run, artifact.stage);

    const score = artifact.report.qualityScore;
    if (score < this.settings.minQualityScore) {
      const warning: DataQualityWarning = {
        code: "quality_gate",
        message: `Quality score ${score} for ${artifact.stage} is below the minimum of ${this.settings.minQualityScore}.`,
      };
      if (summary) {
        summary.gate = "warned";
        summary.warnings.push(warning);
      }
      logger.warn(
        { runId: run.runId, stage: artifact.stage, qualityScore: score },
        warning.message,
      );
      return ok(undefined);
    }

    if (summary) {
      summary.gate = "passed";
    }
    return ok(undefined);
  }

  private blockEmpty(run: PipelineRun, artifact: AnyArtifact): StageFailure {
    const summary = this.latestSummary(run, artifact.stage);
    if (summary) {
      summary.gate = "blocked";
    }
    logger.error(
      { runId: run.runId, stage: artifact.stage },
      "Stage produced an empty artifact",
    );
    return {
      stage: artifact.stage,
      kind: "empty_artifact",
      message: `Stage ${artifact.stage} produced no rows.`,
    };
  }

  private latestSummary(
    run: PipelineRun,
    stage: StageName,
  ): StageRunSummary | undefined {
    return [...run.stages].reverse().find((entry) => entry.stage === stage);
  }

  private async analyze(run: PipelineRun, input: MetricArtifact): Promise<void> {
    const startedAt = this.clock.now();
    const rows: MetricRecord[] = input.rows;
    const report: AnalysisReport = this.analysis.analyze(rows);

    await this.store.writeReport("analysis_report", report);
    run.headline = this.analysis.headline(rows);

    const finishedAt = this.clock.now();
    run.stages.push({
      stage: "analyze",
      status: "succeeded",
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      rowCount: rows.length,
      qualityScore: null,
      gate: null,
      warnings: [],
    });
    logger.info(
      { runId: run.runId, stage: "analyze", rowCount: rows.length },
      "Analysis report written",
    );
  }

  private recordExtraction(run: PipelineRun, artifact: RawArtifact): void {
    const succeeded = artifact.rows.length;
    const requested = succeeded + artifact.failures.length;
    const stats: ExtractionStats = {
      requested,
      succeeded,
      failed: artifact.failures.length,
      successRate: requested === 0 ? 0 : round(succeeded / requested),
      failures: artifact.failures,
    };
    run.extraction = stats;
  }

  private recordStage(
    run: PipelineRun,
    stage: PersistedStage,
    status: StageStatus,
    startedAt: Date,
    artifact: AnyArtifact,
  ): void {
    const finishedAt = this.clock.now();
    run.stages.push({
      stage,
      status,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      rowCount: artifact.rows.length,
      qualityScore: artifact.report.qualityScore,
      gate: null,
      warnings: [...artifact.report.warnings],
    });
    run.qualityReports.push({ stage, report: artifact.report });
  }

  private recordFailedStage(
    run: PipelineRun,
    stage: PersistedStage,
    startedAt: Date,
  ): void {
    const finishedAt = this.clock.now();
    run.stages.push({
      stage,
      status: "failed",
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      rowCount: 0,
      qualityScore: null,
      gate: null,
      warnings: [],
    });
  }

  private finish(run: PipelineRun): void {
    const finishedAt = this.clock.now();
    run.finishedAt = finishedAt.toISOString();
    run.durationMs = finishedAt.getTime() - new Date(run.startedAt).getTime();
  }

  private async succeed(
    run: PipelineRun,
  ): Promise<Result<PipelineRun, PipelineRunFailure>> {
    run.status = "succeeded";
    this.finish(run);
    await this.store.writeReport("run_summary", run);

    logger.info(
      {
        runId: run.runId,
        durationMs: run.durationMs,
        stages: run.stages.map((entry) => `${entry.stage}:${entry.status}`),
        successRate: run.extraction?.successRate,
      },
      "Pipeline run succeeded",
    );
    return ok(run);
  }

  private async fail(
    run: PipelineRun,
    failure: StageFailure,
  ): Promise<Result<PipelineRun, PipelineRunFailure>> {
    run.status = "failed";
    run.failure = failure;
    this.finish(run);
    await this.store.writeReport("run_summary", run);

    logger.error(
      { runId: run.runId, stage: failure.stage, kind: failure.kind },
      `Pipeline run failed: ${failure.message}`,
    );
    return err({ ...failure, run });
  }
}
