import { err, ok, type Result } from "neverthrow";
import type { FetchFailure } from "../../../core/entities/appError";
import type { RawRecord } from "../../../core/entities/record";
import type {
  CatalogProviderPort,
  FetchedRecord,
} from "../../../core/ports/inboundPorts";

const genrePool = ["Action", "Adventure", "Science Fiction", "Drama", "Comedy"];

/**
 * Derives a stable movie from its identifier so local runs exercise every stage
 * without network access or credentials.
 */
export const buildMockRecord = (recordId: number): RawRecord => {
  const seed = recordId % 97;
  const budget = seed % 5 === 0 ? 0 : (seed + 20) * 1_000_000;
  const revenue = budget === 0 ? 0 : budget * (1 + (seed % 7));
  const franchise = seed % 3 === 0;

  return {
    id: recordId,
    title: `Mock Feature ${recordId}`,
    tagline: seed % 4 === 0 ? "" : `Tagline ${seed}`,
    releaseDate: `${2000 + (seed % 20)}-0${1 + (seed % 9)}-15`,
    originalLanguage: "en",
    overview: `Synthetic overview for record ${recordId}.`,
    budget,
    revenue,
    runtime: 90 + (seed % 60),
    popularity: 10 + seed,
    voteAverage: 5 + (seed % 5),
    voteCount: seed * 100,
    genres: [
      { name: genrePool[seed % genrePool.length] ?? "Drama" },
      { name: genrePool[(seed + 2) % genrePool.length] ?? "Comedy" },
    ],
    productionCompanies: [{ name: "Mock Studios" }],
    productionCountries: [{ name: "United States of America" }],
    spokenLanguages: [{ name: "English" }],
    collection: franchise ? { name: `Mock Collection ${seed % 4}` } : null,
    credits: {
      cast: [
        { name: `Lead Actor ${seed % 6}`, character: "Hero" },
        { name: `Support Actor ${seed % 4}`, character: "Sidekick" },
      ],
      crew: [
        { name: `Director ${seed % 5}`, job: "Director", department: "Directing" },
        { name: "Mock Composer", job: "Original Music Composer", department: "Sound" },
      ],
    },
  };
};

export class MockCatalogProvider implements CatalogProviderPort {
  async fetchRecord(
    recordId: number,
  ): Promise<Result<FetchedRecord, FetchFailure>> {
    if (!Number.isSafeInteger(recordId) || recordId <= 0) {
      return err({
        severity: "recoverable",
        kind: "invalid_identifier",
        recordId,
        message: `Identifier ${recordId} is not a positive integer.`,
        attempts: 0,
        elapsedMs: 0,
      });
    }

    return ok({ record: buildMockRecord(recordId), attempts: 1, elapsedMs: 0 });
  }
}
