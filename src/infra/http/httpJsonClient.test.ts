import { ReadableStream } from "node:stream/web";
import { TextEncoder } from "node:util";
import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpJsonClient } from "./httpJsonClient";

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  vi.stubGlobal("fetch", handler);
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpJsonClient", () => {
  it("issues one GET with the given headers and returns the parsed body", async () => {
    const calls: Array<{ url: string; init?: RequestInit }> = [];

    setFetch(async (input, init) => {
      calls.push({ url: String(input), init });
      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.getJson<{ ok: boolean }>({
      url: "https://example.test/json",
      timeoutMs: 500,
      headers: { "User-Agent": "test-agent" },
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({ ok: true });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://example.test/json");
    expect(calls[0]?.init?.method).toBe("GET");
    expect(new Headers(calls[0]?.init?.headers).get("User-Agent")).toBe(
      "test-agent",
    );
  });

  it("does not retry transport failures", async () => {
    let attempts = 0;

    setFetch(async () => {
      attempts += 1;
      throw new Error("socket reset");
    });

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/reset",
      timeoutMs: 500,
    });

    expect(attempts).toBe(1);
    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected transport error");
    }

    expect(result.error.code).toBe("transport_error");
    expect(result.error.message).toBe("socket reset");
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
            reject(Object.assign(new Error("Aborted"), { name: "AbortError" }));
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/timeout",
      timeoutMs: 5,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.message).toBe("HTTP request timed out after 5ms.");
  });

  it("maps a body that stalls past the deadline to a timeout", async () => {
    setFetch(async (_input, init) => {
      const signal = init?.signal;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"facts":'));
          signal?.addEventListener("abort", () => {
            controller.error(
              Object.assign(new Error("Aborted"), { name: "AbortError" }),
            );
          });
        },
      });

      return new Response(body, { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/slow-body",
      timeoutMs: 20,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.message).toBe("HTTP request timed out after 20ms.");
  });

  it("maps non-success statuses with the status code", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/status",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.code).toBe("non_success_status");
    expect(result.error.httpStatus).toBe(503);
  });

  it("maps invalid JSON payloads", async () => {
    setFetch(async () => new Response("not-json", { status: 200 }));

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/json",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected invalid json error");
    }

    expect(result.error.code).toBe("invalid_json");
  });
});
