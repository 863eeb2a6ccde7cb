import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpJsonClient } from "./httpJsonClient";

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  vi.stubGlobal("fetch", handler);
};

const abortError = (): Error =>
  Object.assign(new Error("This operation was aborted"), {
    name: "AbortError",
  });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpJsonClient", () => {
  it("returns parsed JSON on success", async () => {
    let requestedUrl = "";
    let requestInit: RequestInit | undefined;
    setFetch(async (input, init) => {
      requestedUrl = String(input);
      requestInit = init;
      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/record",
      timeoutMs: 500,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({ ok: true });
    expect(requestedUrl).toBe("https://example.test/record");
    expect(requestInit?.method).toBe("GET");
    expect(requestInit?.body).toBeUndefined();
  });

  it("issues a single attempt even for retryable failures", async () => {
    let attempts = 0;
    setFetch(async () => {
      attempts += 1;
      throw new Error("socket reset");
    });

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/retry",
      timeoutMs: 500,
    });

    expect(attempts).toBe(1);
    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected transport error");
    }

    expect(result.error.code).toBe("transport_error");
    expect(result.error.message).toBe("socket reset");
    expect(result.error.retryable).toBe(true);
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(abortError());
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/timeout",
      timeoutMs: 5,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.message).toBe("HTTP request timed out after 5ms.");
    expect(result.error.retryable).toBe(true);
  });

  it("maps a timeout while reading the body to a timeout error", async () => {
    setFetch(async () => {
      const response = new Response("{}", { status: 200 });
      vi.spyOn(response, "json").mockRejectedValue(abortError());
      return response;
    });

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/slow-body",
      timeoutMs: 20,
    });

    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.message).toBe("HTTP request timed out after 20ms.");
    expect(result.error.retryable).toBe(true);
  });

  it("maps non-success statuses with retryability metadata", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/status",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.code).toBe("non_success_status");
    expect(result.error.httpStatus).toBe(503);
    expect(result.error.retryable).toBe(true);
  });

  it("marks client errors other than 429 as non-retryable", async () => {
    setFetch(async () => new Response("missing", { status: 404 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/missing",
      timeoutMs: 500,
    });

    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.httpStatus).toBe(404);
    expect(result.error.retryable).toBe(false);
  });

  it("maps invalid JSON payloads as non-retryable", async () => {
    setFetch(async () => new Response("not-json", { status: 200 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/json",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected invalid json error");
    }

    expect(result.error.code).toBe("invalid_json");
    expect(result.error.retryable).toBe(false);
  });
});
