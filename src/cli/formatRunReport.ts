import type {
  HeadlineRecord,
  PipelineRun,
  StageRunSummary,
} from "../core/entities/pipeline";
import type { MetricRecord } from "../core/entities/record";

const formatStage = (entry: StageRunSummary): string => {
  const quality =
    entry.qualityScore === null ? "" : `, quality=${entry.qualityScore}`;
  const gate = entry.gate === null ? "" : `, gate=${entry.gate}`;
  return `- ${entry.stage}: ${entry.status}, rows=${entry.rowCount}${quality}${gate}`;
};

const formatHeadline = (label: string, entry: HeadlineRecord | null): string =>
  entry === null
    ? `- ${label}: n/a`
    : `- ${label}: ${entry.title ?? "(untitled)"} (#${entry.recordId}) ${entry.value}`;

/**
 * Compact terminal rendering of a run summary for manual inspection.
 */
export const formatRunReport = (run: PipelineRun): string => {
  const lines: string[] = [];

  lines.push(`Run ${run.runId} ${run.status} in ${run.durationMs ?? 0}ms`);
  lines.push("");
  lines.push("Stages:");
  if (run.stages.length === 0) {
    lines.push("- none");
  } else {
    run.stages.forEach((entry) => lines.push(formatStage(entry)));
  }

  if (run.extraction) {
    const { succeeded, requested, successRate, failures } = run.extraction;
    lines.push("");
    lines.push(
      `Extraction: ${succeeded}/${requested} records (success rate ${(successRate * 100).toFixed(1)}%)`,
    );
    failures.forEach((failure) => {
      lines.push(
        `- record ${failure.recordId}: ${failure.kind} after ${failure.attempts} attempt(s), ${failure.message}`,
      );
    });
  }

  const warnings = run.stages.flatMap((entry) =>
    entry.warnings.map((warning) => `- ${entry.stage}: [${warning.code}] ${warning.message}`),
  );
  lines.push("");
  lines.push("Data quality alerts:");
  if (warnings.length === 0) {
    lines.push("- none");
  } else {
    lines.push(...warnings);
  }

  if (run.headline) {
    lines.push("");
    lines.push("Headline:");
    lines.push(formatHeadline("highest revenue (MUSD)", run.headline.highestRevenue));
    lines.push(formatHeadline("highest ROI", run.headline.highestRoi));
  }

  if (run.failure) {
    lines.push("");
    lines.push(
      `Failure: stage=${run.failure.stage}, kind=${run.failure.kind}, reason=${run.failure.message}`,
    );
  }

  return lines.join("\n");
};

export const formatSearchResults = (records: MetricRecord[]): string => {
  if (records.length === 0) {
    return "No matching records.";
  }

  return records
    .map((record, index) => {
      const rating = record.voteAverage === null ? "n/a" : String(record.voteAverage);
      const runtime = record.runtime === null ? "n/a" : `${record.runtime}min`;
      return `${index + 1}. ${record.title ?? "(untitled)"} (#${record.id}) rating=${rating}, votes=${record.voteCount ?? 0}, runtime=${runtime}`;
    })
    .join("\n");
};
