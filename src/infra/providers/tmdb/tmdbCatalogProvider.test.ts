import { afterEach, describe, expect, it, vi } from "vitest";
import { TmdbCatalogProvider } from "./tmdbCatalogProvider";
import type { CatalogConfig } from "../../../shared/config/env";
import { FakeClock } from "../../../__tests__/support/fakes";

const config: CatalogConfig = {
  provider: "tmdb",
  baseUrl: "https://catalog.example/3",
  apiKey: "test-key",
  authMode: "query",
  language: "en-US",
  timeoutMs: 500,
  requestDelayMs: 0,
  retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 250 },
};

const moviePayload = {
  id: 19995,
  title: "Avatar",
  tagline: "Enter the world.",
  release_date: "2009-12-15",
  original_language: "en",
  overview: "A paraplegic marine dispatched to a moon.",
  budget: 237000000,
  revenue: 2923706026,
  runtime: 162,
  popularity: 79.9,
  vote_average: 7.6,
  vote_count: 31000,
  adult: false,
  genres: [
    { id: 28, name: "Action" },
    { id: 12, name: "Adventure" },
  ],
  production_companies: [{ id: 1, name: "Lightstorm" }],
  production_countries: [{ iso_3166_1: "US", name: "United States of America" }],
  spoken_languages: [{ english_name: "English", name: "English" }],
  belongs_to_collection: { id: 87096, name: "Avatar Collection" },
  credits: {
    cast: [{ name: "Sam Worthington", character: "Jake Sully", order: 0 }],
    crew: [{ name: "James Cameron", job: "Director", department: "Directing" }],
  },
};

type RecordedRequest = { url: string; headers: Headers };

const stubResponses = (
  responses: Array<() => Response | Promise<Response>>,
): RecordedRequest[] => {
  const requests: RecordedRequest[] = [];
  let index = 0;

  vi.stubGlobal(
    "fetch",
    async (
      input: Parameters<typeof fetch>[0],
      init?: Parameters<typeof fetch>[1],
    ): Promise<Response> => {
      requests.push({ url: String(input), headers: new Headers(init?.headers) });
      const next = responses[Math.min(index, responses.length - 1)];
      index += 1;
      if (!next) {
        throw new Error("no scripted response");
      }
      return next();
    },
  );

  return requests;
};

const json = (body: unknown, status = 200) => () =>
  new Response(JSON.stringify(body), { status });

const status = (code: number) => () => new Response("error", { status: code });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("TmdbCatalogProvider", () => {
  it("maps a catalog payload into a raw record", async () => {
    const requests = stubResponses([json(moviePayload)]);
    const provider = new TmdbCatalogProvider(config, new FakeClock());

    const result = await provider.fetchRecord(19995);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe(
      "https://catalog.example/3/movie/19995?language=en-US&append_to_response=credits&api_key=test-key",
    );
    expect(requests[0]?.headers.get("accept")).toBe("application/json");
    expect(result.value.attempts).toBe(1);
    expect(result.value.elapsedMs).toBe(0);
    expect(result.value.record).toEqual({
      id: 19995,
      title: "Avatar",
      tagline: "Enter the world.",
      releaseDate: "2009-12-15",
      originalLanguage: "en",
      overview: "A paraplegic marine dispatched to a moon.",
      budget: 237000000,
      revenue: 2923706026,
      runtime: 162,
      popularity: 79.9,
      voteAverage: 7.6,
      voteCount: 31000,
      genres: [{ name: "Action" }, { name: "Adventure" }],
      productionCompanies: [{ name: "Lightstorm" }],
      productionCountries: [{ name: "United States of America" }],
      spokenLanguages: [{ name: "English" }],
      collection: { name: "Avatar Collection" },
      credits: {
        cast: [{ name: "Sam Worthington", character: "Jake Sully" }],
        crew: [
          { name: "James Cameron", job: "Director", department: "Directing" },
        ],
      },
    });
  });

  it("defaults absent optional fields", async () => {
    stubResponses([json({ id: 7, title: "Sparse" })]);
    const provider = new TmdbCatalogProvider(config, new FakeClock());

    const result = await provider.fetchRecord(7);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.record.genres).toEqual([]);
    expect(result.value.record.collection).toBeNull();
    expect(result.value.record.credits).toBeNull();
    expect(result.value.record.budget).toBeNull();
  });

  it("sends the credential as a bearer header when configured", async () => {
    const requests = stubResponses([json(moviePayload)]);
    const provider = new TmdbCatalogProvider(
      { ...config, authMode: "bearer" },
      new FakeClock(),
    );

    await provider.fetchRecord(19995);

    expect(requests[0]?.url).toBe(
      "https://catalog.example/3/movie/19995?language=en-US&append_to_response=credits",
    );
    expect(requests[0]?.headers.get("authorization")).toBe("Bearer test-key");
  });

  it("reports missing records as recoverable without retrying", async () => {
    const requests = stubResponses([status(404)]);
    const clock = new FakeClock();
    const provider = new TmdbCatalogProvider(config, clock);

    const result = await provider.fetchRecord(99999999);

    if (result.isOk()) {
      throw new Error("expected not_found");
    }

    expect(requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
    expect(result.error).toEqual({
      severity: "recoverable",
      kind: "not_found",
      recordId: 99999999,
      message: "Catalog record 99999999 was not found.",
      attempts: 1,
      elapsedMs: 0,
      httpStatus: 404,
    });
  });

  it("treats a rejected credential as fatal without retrying", async () => {
    const requests = stubResponses([status(401)]);
    const provider = new TmdbCatalogProvider(config, new FakeClock());

    const result = await provider.fetchRecord(19995);

    if (result.isOk()) {
      throw new Error("expected authentication failure");
    }

    expect(requests).toHaveLength(1);
    expect(result.error.severity).toBe("fatal");
    expect(result.error.kind).toBe("authentication");
    expect(result.error.message).toBe(
      "Catalog rejected the credential with status 401.",
    );
    expect(result.error.attempts).toBe(1);
  });

  it("fails fast on an empty credential before any request", async () => {
    const requests = stubResponses([json(moviePayload)]);
    const provider = new TmdbCatalogProvider(
      { ...config, apiKey: "  " },
      new FakeClock(),
    );

    const result = await provider.fetchRecord(19995);

    if (result.isOk()) {
      throw new Error("expected authentication failure");
    }

    expect(requests).toHaveLength(0);
    expect(result.error.severity).toBe("fatal");
    expect(result.error.attempts).toBe(0);
  });

  it("rejects identifiers that are not positive integers", async () => {
    const requests = stubResponses([json(moviePayload)]);
    const provider = new TmdbCatalogProvider(config, new FakeClock());

    const result = await provider.fetchRecord(-3);

    if (result.isOk()) {
      throw new Error("expected invalid identifier");
    }

    expect(requests).toHaveLength(0);
    expect(result.error.kind).toBe("invalid_identifier");
  });

  it("backs off through transient server errors and then succeeds", async () => {
    const requests = stubResponses([status(503), status(503), json(moviePayload)]);
    const clock = new FakeClock();
    const provider = new TmdbCatalogProvider(config, clock);

    const result = await provider.fetchRecord(19995);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(result.value.attempts).toBe(3);
    expect(result.value.elapsedMs).toBe(300);
  });

  it("gives up after the configured attempts when rate limited", async () => {
    const requests = stubResponses([status(429)]);
    const clock = new FakeClock();
    const provider = new TmdbCatalogProvider(config, clock);

    const result = await provider.fetchRecord(19995);

    if (result.isOk()) {
      throw new Error("expected transient failure");
    }

    expect(requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(result.error).toEqual({
      severity: "recoverable",
      kind: "transient",
      recordId: 19995,
      message: "Catalog rate limit reached. Gave up after 3 attempts.",
      attempts: 3,
      elapsedMs: 300,
      httpStatus: 429,
      lastErrorKind: "rate_limited",
    });
  });

  it("retries connection failures", async () => {
    const requests = stubResponses([
      () => {
        throw new Error("connect ECONNREFUSED");
      },
      json(moviePayload),
    ]);
    const clock = new FakeClock();
    const provider = new TmdbCatalogProvider(config, clock);

    const result = await provider.fetchRecord(19995);

    expect(result.isOk()).toBe(true);
    expect(requests).toHaveLength(2);
    expect(clock.sleeps).toEqual([100]);
  });

  it("retries a body read that times out", async () => {
    const requests = stubResponses([
      () => {
        const response = new Response("{}", { status: 200 });
        vi.spyOn(response, "json").mockRejectedValue(
          Object.assign(new Error("This operation was aborted"), {
            name: "AbortError",
          }),
        );
        return response;
      },
    ]);
    const clock = new FakeClock();
    const provider = new TmdbCatalogProvider(config, clock);

    const result = await provider.fetchRecord(19995);

    if (result.isOk()) {
      throw new Error("expected transient failure");
    }

    expect(requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(result.error.kind).toBe("transient");
    expect(result.error.attempts).toBe(3);
    expect(result.error.message).toBe(
      "HTTP request timed out after 500ms. Gave up after 3 attempts.",
    );
    expect(
      result.error.severity === "recoverable" && result.error.lastErrorKind,
    ).toBe("timeout");
  });

  it("skips other client errors without retrying", async () => {
    const requests = stubResponses([status(400)]);
    const provider = new TmdbCatalogProvider(config, new FakeClock());

    const result = await provider.fetchRecord(19995);

    if (result.isOk()) {
      throw new Error("expected rejected");
    }

    expect(requests).toHaveLength(1);
    expect(result.error.kind).toBe("rejected");
    expect(result.error.httpStatus).toBe(400);
  });

  it("reports payloads without an id as malformed", async () => {
    stubResponses([json({ title: "No id" })]);
    const provider = new TmdbCatalogProvider(config, new FakeClock());

    const result = await provider.fetchRecord(19995);

    if (result.isOk()) {
      throw new Error("expected malformed_response");
    }

    expect(result.error.kind).toBe("malformed_response");
    expect(result.error.attempts).toBe(1);
  });

  it("reports invalid JSON as malformed", async () => {
    stubResponses([() => new Response("<html>", { status: 200 })]);
    const provider = new TmdbCatalogProvider(config, new FakeClock());

    const result = await provider.fetchRecord(19995);

    if (result.isOk()) {
      throw new Error("expected malformed_response");
    }

    expect(result.error.kind).toBe("malformed_response");
    expect(result.error.message).toBe("HTTP response body was not valid JSON.");
  });
});
