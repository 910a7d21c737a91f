import { describe, expect, it } from "vitest";

import {
  FetchLike,
  ServingEndpointClient,
  ServingEndpointConfigError,
  ServingEndpointError,
  ServingEndpointResponseError,
  ServingEndpointTimeoutError,
} from "./servingEndpointClient";

type MockResponse = {
  ok?: boolean;
  status?: number;
  textBody?: string;
};

type RecordedCall = {
  url: string;
  init: Parameters<FetchLike>[1];
};

const baseConfig = {
  servingEndpointUrl: "https://serving.test/invocations",
  servingToken: "test-token",
  requestTimeoutMs: 1000,
  maxTokens: 1000,
  temperature: 0.7,
};

function createFetch(response: MockResponse, calls: RecordedCall[] = []): FetchLike {
  return async (url, init) => {
    calls.push({ url, init });
    return {
      ok: response.ok ?? true,
      status: response.status ?? 200,
      async text() {
        return response.textBody ?? "";
      },
    };
  };
}

describe("ServingEndpointClient", () => {
  it("posts a single chat message with bearer auth", async () => {
    const calls: RecordedCall[] = [];
    const client = new ServingEndpointClient(
      baseConfig,
      createFetch({ textBody: '{"choices":[]}' }, calls),
    );

    await expect(client.complete("write it")).resolves.toEqual({ choices: [] });

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("https://serving.test/invocations");
    expect(calls[0].init.method).toBe("POST");
    expect(calls[0].init.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(calls[0].init.body)).toEqual({
      messages: [{ role: "user", content: "write it" }],
      max_tokens: 1000,
      temperature: 0.7,
    });
  });

  it("returns non-JSON bodies as text", async () => {
    const client = new ServingEndpointClient(
      baseConfig,
      createFetch({ textBody: "plain words" }),
    );

    await expect(client.complete("write it")).resolves.toBe("plain words");
  });

  it("reports a missing token without calling the endpoint", async () => {
    const calls: RecordedCall[] = [];
    const client = new ServingEndpointClient(
      { ...baseConfig, servingToken: null },
      createFetch({}, calls),
    );

    await expect(client.complete("write it")).rejects.toThrow(
      ServingEndpointConfigError,
    );
    await expect(client.complete("write it")).rejects.toThrow(
      "DATABRICKS_API_TOKEN not configured",
    );
    expect(calls).toHaveLength(0);
  });

  it("reports a missing endpoint URL", async () => {
    const client = new ServingEndpointClient(
      { ...baseConfig, servingEndpointUrl: null },
      createFetch({}),
    );

    await expect(client.complete("write it")).rejects.toThrow(
      "DATABRICKS_ENDPOINT_URL not configured",
    );
  });

  it("carries status and body of non-2xx responses", async () => {
    const client = new ServingEndpointClient(
      baseConfig,
      createFetch({ ok: false, status: 429, textBody: "slow down" }),
    );

    const error = await client.complete("write it").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ServingEndpointResponseError);
    if (error instanceof ServingEndpointResponseError) {
      expect(error.status).toBe(429);
      expect(error.responseBody).toBe("slow down");
      expect(error.message).toBe("Serving endpoint responded with status 429.");
    }
  });

  it("aborts the request when the timeout elapses", async () => {
    let signal: AbortSignal | undefined;
    const hangingFetch: FetchLike = (_url, init) => {
      signal = init.signal;
      return new Promise((_, reject) => {
        init.signal.addEventListener("abort", () => reject(new Error("aborted")));
      });
    };
    const client = new ServingEndpointClient(
      { ...baseConfig, requestTimeoutMs: 20 },
      hangingFetch,
    );

    await expect(client.complete("write it")).rejects.toThrow(
      ServingEndpointTimeoutError,
    );
    expect(signal?.aborted).toBe(true);
  });

  it("wraps transport failures", async () => {
    const client = new ServingEndpointClient(baseConfig, async () => {
      throw new Error("connect ECONNREFUSED");
    });

    const error = await client.complete("write it").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ServingEndpointError);
    expect(error).not.toBeInstanceOf(ServingEndpointTimeoutError);
    expect(error).toHaveProperty(
      "message",
      "Serving endpoint request failed: connect ECONNREFUSED",
    );
  });
});
