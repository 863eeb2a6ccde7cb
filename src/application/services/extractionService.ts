import { err, ok, type Result } from "neverthrow";
import type { FatalFetchFailure } from "../../core/entities/appError";
import type { RecordFailure } from "../../core/entities/pipeline";
import type { RawRecord } from "../../core/entities/record";
import type { CatalogProviderPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { round } from "../../shared/utils/statistics";

export type ExtractionBatch = {
  records: RawRecord[];
  failures: RecordFailure[];
  requested: number;
  succeeded: number;
  successRate: number;
};

/**
 * Fetches records strictly one at a time in request order. Per-record failures
 * are collected; only a fatal failure stops the batch.
 */
export class ExtractionService {
  constructor(
    private readonly provider: CatalogProviderPort,
    private readonly clock: ClockPort,
    private readonly requestDelayMs: number,
  ) {}

  async run(
    recordIds: number[],
  ): Promise<Result<ExtractionBatch, FatalFetchFailure>> {
    const records: RawRecord[] = [];
    const failures: RecordFailure[] = [];

    for (const [index, recordId] of recordIds.entries()) {
      if (index > 0 && this.requestDelayMs > 0) {
        await this.clock.sleep(this.requestDelayMs);
      }

      const result = await this.provider.fetchRecord(recordId);

      if (result.isOk()) {
        records.push(result.value.record);
        continue;
      }

      const failure = result.error;
      if (failure.severity === "fatal") {
        logger.error(
          { stage: "extract", recordId, attempts: failure.attempts },
          "Extraction aborted by fatal catalog failure",
        );
        return err(failure);
      }

      failures.push({
        recordId,
        kind: failure.kind,
        message: failure.message,
        attempts: failure.attempts,
      });
    }

    const requested = recordIds.length;
    const succeeded = records.length;
    const successRate = requested === 0 ? 0 : round(succeeded / requested);

    logger.info(
      {
        stage: "extract",
        requested,
        succeeded,
        failed: failures.length,
        successRate,
      },
      "Extraction batch finished",
    );

    return ok({ records, failures, requested, succeeded, successRate });
  }
}
