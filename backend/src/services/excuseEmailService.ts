import { buildExcusePrompt } from "../prompts/excuseEmail";
import { ExcuseRequest, GenerationResult } from "../types/excuse";
import { normalizeExcuseResponse } from "./excuseResponseNormalizer";
import {
  ChatCompletionClient,
  ServingEndpointResponseError,
} from "./servingEndpointClient";

const logPreviewChars = 500;

export interface ExcuseGenerator {
  generate(request: ExcuseRequest): Promise<GenerationResult>;
}

export class ExcuseEmailService implements ExcuseGenerator {
  constructor(private readonly client: ChatCompletionClient) {}

  async generate(request: ExcuseRequest): Promise<GenerationResult> {
    const startedAt = Date.now();
    console.log(
      JSON.stringify({
        event: "excuse_generation_started",
        category: request.category,
        tone: request.tone,
        seriousness: request.seriousness,
      }),
    );

    let raw: unknown;
    try {
      raw = await this.client.complete(buildExcusePrompt(request));
    } catch (error) {
      console.error(
        JSON.stringify({
          event: "serving_endpoint_failed",
          duration_ms: Date.now() - startedAt,
          status:
            error instanceof ServingEndpointResponseError ? error.status : null,
          response_preview:
            error instanceof ServingEndpointResponseError
              ? error.responseBody.slice(0, logPreviewChars)
              : null,
          error: error instanceof Error ? error.message : "Unknown error",
        }),
      );
      throw error;
    }

    const result = normalizeExcuseResponse(raw);

    if (result.kind === "success") {
      console.log(
        JSON.stringify({
          event: "excuse_normalized",
          strategy: result.strategy,
          subject: result.subject,
          duration_ms: Date.now() - startedAt,
        }),
      );
    } else {
      console.error(
        JSON.stringify({
          event: "excuse_normalization_failed",
          diagnostic: result.diagnostic,
          duration_ms: Date.now() - startedAt,
        }),
      );
    }

    return result;
  }
}
