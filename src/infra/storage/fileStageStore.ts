import { createHash } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { err, ok, type Result } from "neverthrow";
import { unparse } from "papaparse";
import type { z } from "zod";
import type { StageStoreError } from "../../core/entities/appError";
import type {
  AnyArtifact,
  CleanArtifact,
  MetricArtifact,
  PersistedStage,
  RawArtifact,
} from "../../core/entities/pipeline";
import type {
  ReportName,
  StageStorePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  cleanArtifactSchema,
  completionMarkerSchema,
  metricArtifactSchema,
  rawArtifactSchema,
  type CompletionMarker,
} from "./artifactSchemas";

type ArtifactPaths = {
  artifact: string;
  csv: string;
  marker: string;
};

type Verification =
  | { status: "complete"; marker: CompletionMarker; content: string }
  | { status: "missing" }
  | { status: "mismatch"; message: string };

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const sha256 = (content: string): string =>
  createHash("sha256").update(content, "utf8").digest("hex");

const serialize = (payload: unknown): string =>
  `${JSON.stringify(payload, null, 2)}\n`;

const toCsvCell = (value: unknown): string | number | boolean | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return JSON.stringify(value);
};

/**
 * Flat-file artifact store. Each stage owns `<stage>.json`, a `<stage>.csv`
 * export and a `<stage>.complete.json` marker written last; an artifact
 * without a matching marker is treated as absent.
 */
export class FileStageStore implements StageStorePort {
  constructor(private readonly dataDir: string) {}

  async has(stage: PersistedStage): Promise<boolean> {
    const verification = await this.verify(stage);
    return verification.status === "complete";
  }

  load(stage: "extract"): Promise<Result<RawArtifact, StageStoreError>>;
  load(stage: "clean"): Promise<Result<CleanArtifact, StageStoreError>>;
  load(stage: "metrics"): Promise<Result<MetricArtifact, StageStoreError>>;
  async load(
    stage: PersistedStage,
  ): Promise<Result<AnyArtifact, StageStoreError>> {
    switch (stage) {
      case "extract":
        return this.read(stage, rawArtifactSchema);
      case "clean":
        return this.read(stage, cleanArtifactSchema);
      case "metrics":
        return this.read(stage, metricArtifactSchema);
    }
  }

  save(stage: "extract", artifact: RawArtifact): Promise<void>;
  save(stage: "clean", artifact: CleanArtifact): Promise<void>;
  save(stage: "metrics", artifact: MetricArtifact): Promise<void>;
  async save(stage: PersistedStage, artifact: AnyArtifact): Promise<void> {
    const paths = this.paths(stage);
    await mkdir(this.dataDir, { recursive: true });

    // Drop the marker first so an interrupted write never looks complete.
    await rm(paths.marker, { force: true });

    const content = serialize(artifact);
    await this.writeAtomic(paths.artifact, content);
    await this.writeAtomic(paths.csv, this.toCsv(artifact));

    const marker: CompletionMarker = {
      stage,
      version: artifact.version,
      rowCount: artifact.rows.length,
      sha256: sha256(content),
    };
    await this.writeAtomic(paths.marker, serialize(marker));

    logger.info(
      { stage, rowCount: marker.rowCount, path: paths.artifact },
      "Stage artifact saved",
    );
  }

  async writeReport(name: ReportName, payload: unknown): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const path = join(this.dataDir, `${name}.json`);
    await this.writeAtomic(path, serialize(payload));
    logger.debug({ report: name, path }, "Report written");
  }

  private paths(stage: PersistedStage): ArtifactPaths {
    return {
      artifact: join(this.dataDir, `${stage}.json`),
      csv: join(this.dataDir, `${stage}.csv`),
      marker: join(this.dataDir, `${stage}.complete.json`),
    };
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const tempPath = `${path}.tmp`;
    await writeFile(tempPath, content, "utf8");
    await rename(tempPath, path);
  }

  private toCsv(artifact: AnyArtifact): string {
    const rows: Array<Record<string, unknown>> = artifact.rows;
    const first = rows.at(0);
    if (!first) {
      return "";
    }

    const columns = Object.keys(first);
    return unparse({
      fields: columns,
      data: rows.map((row) => columns.map((column) => toCsvCell(row[column]))),
    });
  }

  private async readOptional(path: string): Promise<string | null> {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  private async verify(stage: PersistedStage): Promise<Verification> {
    const paths = this.paths(stage);
    const markerContent = await this.readOptional(paths.marker);
    if (markerContent === null) {
      return { status: "missing" };
    }

    const content = await this.readOptional(paths.artifact);
    if (content === null) {
      return { status: "missing" };
    }

    let markerJson: unknown;
    try {
      markerJson = JSON.parse(markerContent);
    } catch {
      return {
        status: "mismatch",
        message: `Completion marker for ${stage} is not valid JSON.`,
      };
    }

    const marker = completionMarkerSchema.safeParse(markerJson);
    if (!marker.success || marker.data.stage !== stage) {
      return {
        status: "mismatch",
        message: `Completion marker for ${stage} is malformed.`,
      };
    }

    if (marker.data.sha256 !== sha256(content)) {
      return {
        status: "mismatch",
        message: `Artifact for ${stage} does not match its completion marker checksum.`,
      };
    }

    return { status: "complete", marker: marker.data, content };
  }

  private async read<TArtifact extends AnyArtifact>(
    stage: PersistedStage,
    schema: z.ZodType<TArtifact>,
  ): Promise<Result<TArtifact, StageStoreError>> {
    const verification = await this.verify(stage);

    if (verification.status === "missing") {
      return err({
        code: "not_found",
        stage,
        message: `No completed artifact stored for ${stage}.`,
      });
    }

    if (verification.status === "mismatch") {
      logger.warn({ stage }, verification.message);
      return err({ code: "corrupt", stage, message: verification.message });
    }

    let json: unknown;
    try {
      json = JSON.parse(verification.content);
    } catch (error) {
      return err({
        code: "corrupt",
        stage,
        message: `Artifact for ${stage} is not valid JSON.`,
        cause: error,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ");
      return err({
        code: "corrupt",
        stage,
        message: `Artifact for ${stage} failed validation: ${issues}`,
        cause: parsed.error,
      });
    }

    if (
      parsed.data.stage !== stage ||
      parsed.data.rows.length !== verification.marker.rowCount
    ) {
      return err({
        code: "corrupt",
        stage,
        message: `Artifact for ${stage} disagrees with its completion marker.`,
      });
    }

    return ok(parsed.data);
  }
}
