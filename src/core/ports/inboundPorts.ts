import type { Result } from "neverthrow";
import type { FetchFailure } from "../entities/appError";
import type { RawRecord } from "../entities/record";

export type FetchedRecord = {
  record: RawRecord;
  attempts: number;
  elapsedMs: number;
};

export interface CatalogProviderPort {
  fetchRecord(recordId: number): Promise<Result<FetchedRecord, FetchFailure>>;
}
