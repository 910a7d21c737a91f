import { ServiceConfig } from "../config";

type FetchResponseLike = {
  ok: boolean;
  status: number;
  text(): Promise<string>;
};

type FetchInit = {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
};

export type FetchLike = (input: string, init: FetchInit) => Promise<FetchResponseLike>;

type ServingClientConfig = Pick<
  ServiceConfig,
  "servingEndpointUrl" | "servingToken" | "requestTimeoutMs" | "maxTokens" | "temperature"
>;

export interface ChatCompletionClient {
  complete(prompt: string): Promise<unknown>;
}

export class ServingEndpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ServingEndpointError";
  }
}

export class ServingEndpointConfigError extends ServingEndpointError {
  constructor(message: string) {
    super(message);
    this.name = "ServingEndpointConfigError";
  }
}

export class ServingEndpointTimeoutError extends ServingEndpointError {
  constructor(timeoutMs: number) {
    super(`Serving endpoint request timed out after ${timeoutMs}ms.`);
    this.name = "ServingEndpointTimeoutError";
  }
}

export class ServingEndpointResponseError extends ServingEndpointError {
  constructor(
    readonly status: number,
    readonly responseBody: string,
  ) {
    super(`Serving endpoint responded with status ${status}.`);
    this.name = "ServingEndpointResponseError";
  }
}

async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new ServingEndpointTimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}

function parseResponseText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (_error) {
    // Handed to the normalizer as opaque content.
    return text;
  }
}

/**
 * Single-shot client for a chat-style model serving endpoint. No retries.
 */
export class ServingEndpointClient implements ChatCompletionClient {
  constructor(
    private readonly config: ServingClientConfig,
    private readonly fetchImpl: FetchLike = (input, init) => globalThis.fetch(input, init),
  ) {}

  async complete(prompt: string): Promise<unknown> {
    const { servingEndpointUrl, servingToken, requestTimeoutMs } = this.config;

    if (!servingToken) {
      throw new ServingEndpointConfigError("DATABRICKS_API_TOKEN not configured");
    }

    if (!servingEndpointUrl) {
      throw new ServingEndpointConfigError("DATABRICKS_ENDPOINT_URL not configured");
    }

    const payload = {
      messages: [
        {
          role: "user",
          content: prompt,
        },
      ],
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };

    try {
      return await withTimeout(async (signal) => {
        const response = await this.fetchImpl(servingEndpointUrl, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${servingToken}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(payload),
          signal,
        });

        const text = await response.text();
        if (!response.ok) {
          throw new ServingEndpointResponseError(response.status, text);
        }

        return parseResponseText(text);
      }, requestTimeoutMs);
    } catch (error) {
      if (error instanceof ServingEndpointError) {
        throw error;
      }

      throw new ServingEndpointError(
        error instanceof Error
          ? `Serving endpoint request failed: ${error.message}`
          : "Serving endpoint request failed.",
      );
    }
  }
}
