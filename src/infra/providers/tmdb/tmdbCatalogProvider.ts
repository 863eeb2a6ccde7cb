import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type {
  FetchFailure,
  RecoverableFetchFailureKind,
  TransientErrorKind,
} from "../../../core/entities/appError";
import type { RawRecord } from "../../../core/entities/record";
import type {
  CatalogProviderPort,
  FetchedRecord,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import {
  initialRetryState,
  recordFailure,
  recordSuccess,
  type RetryState,
} from "../../../core/policies/retryStateMachine";
import type { CatalogConfig } from "../../../shared/config/env";
import { logger } from "../../../shared/logger/logger";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";

const nullableText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const looseNumeric = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => value ?? null);

const namedEntitySchema = z.object({ name: nullableText });

const namedList = z
  .array(namedEntitySchema)
  .nullish()
  .transform((value) => value ?? []);

const spokenLanguageSchema = z
  .object({ english_name: nullableText, name: nullableText })
  .transform((value) => ({ name: value.english_name ?? value.name }));

const tmdbMovieSchema = z.object({
  id: z.number().int().positive(),
  title: nullableText,
  tagline: nullableText,
  release_date: nullableText,
  original_language: nullableText,
  overview: nullableText,
  budget: looseNumeric,
  revenue: looseNumeric,
  runtime: looseNumeric,
  popularity: looseNumeric,
  vote_average: looseNumeric,
  vote_count: looseNumeric,
  genres: namedList,
  production_companies: namedList,
  production_countries: namedList,
  spoken_languages: z
    .array(spokenLanguageSchema)
    .nullish()
    .transform((value) => value ?? []),
  belongs_to_collection: namedEntitySchema.nullish().transform((v) => v ?? null),
  credits: z
    .object({
      cast: z
        .array(z.object({ name: nullableText, character: nullableText }))
        .nullish()
        .transform((value) => value ?? []),
      crew: z
        .array(
          z.object({
            name: nullableText,
            job: nullableText,
            department: nullableText,
          }),
        )
        .nullish()
        .transform((value) => value ?? []),
    })
    .nullish()
    .transform((value) => value ?? null),
});

type TmdbMovie = z.infer<typeof tmdbMovieSchema>;

type AttemptOutcome =
  | { type: "success"; record: RawRecord }
  | {
      type: "retry";
      kind: TransientErrorKind;
      message: string;
      httpStatus?: number;
    }
  | { type: "fatal"; message: string; httpStatus?: number }
  | {
      type: "skip";
      kind: RecoverableFetchFailureKind;
      message: string;
      httpStatus?: number;
    };

const toRawRecord = (movie: TmdbMovie): RawRecord => ({
  id: movie.id,
  title: movie.title,
  tagline: movie.tagline,
  releaseDate: movie.release_date,
  originalLanguage: movie.original_language,
  overview: movie.overview,
  budget: movie.budget,
  revenue: movie.revenue,
  runtime: movie.runtime,
  popularity: movie.popularity,
  voteAverage: movie.vote_average,
  voteCount: movie.vote_count,
  genres: movie.genres,
  productionCompanies: movie.production_companies,
  productionCountries: movie.production_countries,
  spokenLanguages: movie.spoken_languages,
  collection: movie.belongs_to_collection,
  credits: movie.credits,
});

/**
 * Fetches single movie records from the TMDB API and classifies every failure
 * into fatal, recoverable or retryable outcomes.
 */
export class TmdbCatalogProvider implements CatalogProviderPort {
  constructor(
    private readonly config: CatalogConfig,
    private readonly clock: ClockPort,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async fetchRecord(
    recordId: number,
  ): Promise<Result<FetchedRecord, FetchFailure>> {
    const startedAt = this.clock.now().getTime();
    const elapsed = () => this.clock.now().getTime() - startedAt;

    if (!this.config.apiKey.trim()) {
      logger.error({ recordId }, "Catalog credential is empty");
      return err({
        severity: "fatal",
        kind: "authentication",
        recordId,
        message: "Catalog credential is empty.",
        attempts: 0,
        elapsedMs: 0,
      });
    }

    if (!Number.isSafeInteger(recordId) || recordId <= 0) {
      logger.warn({ recordId }, "Skipping invalid catalog identifier");
      return err({
        severity: "recoverable",
        kind: "invalid_identifier",
        recordId,
        message: `Identifier ${recordId} is not a positive integer.`,
        attempts: 0,
        elapsedMs: 0,
      });
    }

    let state: RetryState = initialRetryState();

    for (;;) {
      const outcome = await this.attempt(recordId);

      if (outcome.type === "success") {
        state = recordSuccess(state);
        const elapsedMs = elapsed();
        logger.info(
          { recordId, attempts: state.attempts, elapsedMs },
          "Catalog record fetched",
        );
        return ok({ record: outcome.record, attempts: state.attempts, elapsedMs });
      }

      if (outcome.type === "fatal") {
        const attempts = state.attempts + 1;
        const elapsedMs = elapsed();
        logger.error(
          { recordId, attempts, elapsedMs, httpStatus: outcome.httpStatus },
          "Catalog authentication rejected",
        );
        return err({
          severity: "fatal",
          kind: "authentication",
          recordId,
          message: outcome.message,
          attempts,
          elapsedMs,
          httpStatus: outcome.httpStatus,
        });
      }

      if (outcome.type === "skip") {
        const attempts = state.attempts + 1;
        const elapsedMs = elapsed();
        logger.warn(
          {
            recordId,
            attempts,
            elapsedMs,
            kind: outcome.kind,
            httpStatus: outcome.httpStatus,
          },
          "Catalog record skipped",
        );
        return err({
          severity: "recoverable",
          kind: outcome.kind,
          recordId,
          message: outcome.message,
          attempts,
          elapsedMs,
          httpStatus: outcome.httpStatus,
        });
      }

      state = recordFailure(state, outcome.kind, this.config.retry);

      if (state.phase === "exhausted" || state.nextDelayMs === null) {
        const elapsedMs = elapsed();
        logger.warn(
          {
            recordId,
            attempts: state.attempts,
            elapsedMs,
            lastErrorKind: outcome.kind,
            cumulativeDelayMs: state.cumulativeDelayMs,
          },
          "Catalog record failed after exhausting retries",
        );
        return err({
          severity: "recoverable",
          kind: "transient",
          recordId,
          message: `${outcome.message} Gave up after ${state.attempts} attempts.`,
          attempts: state.attempts,
          elapsedMs,
          httpStatus: outcome.httpStatus,
          lastErrorKind: outcome.kind,
        });
      }

      logger.debug(
        {
          recordId,
          attempts: state.attempts,
          elapsedMs: elapsed(),
          lastErrorKind: outcome.kind,
          delayMs: state.nextDelayMs,
        },
        "Transient catalog failure; backing off",
      );
      await this.clock.sleep(state.nextDelayMs);
    }
  }

  private buildRequest(recordId: number): {
    url: string;
    headers: Record<string, string>;
  } {
    const base = this.config.baseUrl.endsWith("/")
      ? this.config.baseUrl
      : `${this.config.baseUrl}/`;
    const url = new URL(`movie/${recordId}`, base);
    url.searchParams.set("language", this.config.language);
    url.searchParams.set("append_to_response", "credits");

    const headers: Record<string, string> = { accept: "application/json" };
    if (this.config.authMode === "bearer") {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    } else {
      url.searchParams.set("api_key", this.config.apiKey);
    }

    return { url: url.toString(), headers };
  }

  private async attempt(recordId: number): Promise<AttemptOutcome> {
    const { url, headers } = this.buildRequest(recordId);
    const response = await this.httpClient.requestJson({
      url,
      headers,
      timeoutMs: this.config.timeoutMs,
    });

    if (response.isErr()) {
      return this.classifyHttpError(recordId, response.error);
    }

    const parsed = tmdbMovieSchema.safeParse(response.value);
    if (!parsed.success) {
      return {
        type: "skip",
        kind: "malformed_response",
        message: `Catalog payload for ${recordId} did not match the expected shape: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`,
      };
    }

    return { type: "success", record: toRawRecord(parsed.data) };
  }

  private classifyHttpError(
    recordId: number,
    error: HttpClientError,
  ): AttemptOutcome {
    const status = error.httpStatus;

    if (error.code === "timeout") {
      return { type: "retry", kind: "timeout", message: error.message };
    }

    if (error.code === "transport_error") {
      return { type: "retry", kind: "transport_error", message: error.message };
    }

    if (error.code === "invalid_json") {
      return {
        type: "skip",
        kind: "malformed_response",
        message: error.message,
      };
    }

    if (status === 401) {
      return {
        type: "fatal",
        message: "Catalog rejected the credential with status 401.",
        httpStatus: status,
      };
    }

    if (status === 404) {
      return {
        type: "skip",
        kind: "not_found",
        message: `Catalog record ${recordId} was not found.`,
        httpStatus: status,
      };
    }

    if (status === 429) {
      return {
        type: "retry",
        kind: "rate_limited",
        message: "Catalog rate limit reached.",
        httpStatus: status,
      };
    }

    if (status !== undefined && status >= 500) {
      return {
        type: "retry",
        kind: "server_error",
        message: `Catalog server error with status ${status}.`,
        httpStatus: status,
      };
    }

    return {
      type: "skip",
      kind: "rejected",
      message: error.message,
      httpStatus: status,
    };
  }
}
