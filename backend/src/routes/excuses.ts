import { Router, Request, Response } from "express";

import {
  ExcuseValidationError,
  createExcuseRequest,
} from "../schemas/excuseRequest.schema";
import { ExcuseGenerator } from "../services/excuseEmailService";
import {
  ServingEndpointConfigError,
  ServingEndpointResponseError,
  ServingEndpointTimeoutError,
} from "../services/servingEndpointClient";
import { ExcuseRequest, ExcuseResponse, GenerationResult } from "../types/excuse";

export function toExcuseResponse(result: GenerationResult): ExcuseResponse {
  if (result.kind === "success") {
    return {
      subject: result.subject,
      body: result.body,
      success: true,
      error: null,
    };
  }

  return {
    subject: "Error",
    body: "Failed to parse LLM response",
    success: false,
    error: result.diagnostic,
  };
}

function resolveUpstreamStatus(status: number): number {
  return status >= 400 && status <= 599 ? status : 502;
}

export function createExcusesRouter(generator: ExcuseGenerator): Router {
  const router = Router();

  // -------------------------------------------------------------------------
  // POST /generate-excuse
  //
  // Request body:
  //   {
  //     category: string;
  //     tone: string;              // "Sincere" | "Playful" | "Corporate"; others read as professional
  //     seriousness: number;       // integer 1-5
  //     recipient_name: string;
  //     sender_name: string;
  //     eta_when: string;
  //   }
  //
  // Response (200 even when the model output could not be parsed):
  //   { subject: string; body: string; success: boolean; error: string | null }
  // -------------------------------------------------------------------------
  router.post("/generate-excuse", async (req: Request, res: Response) => {
    let excuseRequest: ExcuseRequest;
    try {
      excuseRequest = createExcuseRequest(req.body);
    } catch (error) {
      res.status(error instanceof ExcuseValidationError ? 400 : 500).json({
        error: {
          message:
            error instanceof Error ? error.message : "Unexpected server error",
        },
      });
      return;
    }

    try {
      const result = await generator.generate(excuseRequest);
      res.json(toExcuseResponse(result));
    } catch (error) {
      console.error(
        JSON.stringify({
          event: "excuse_generation_failed",
          error: error instanceof Error ? error.message : "Unknown error",
        }),
      );

      if (error instanceof ServingEndpointConfigError) {
        res.status(500).json({
          error: { message: error.message },
        });
        return;
      }

      if (error instanceof ServingEndpointTimeoutError) {
        res.status(504).json({
          error: { message: "Request timeout" },
        });
        return;
      }

      if (error instanceof ServingEndpointResponseError) {
        res.status(resolveUpstreamStatus(error.status)).json({
          error: { message: "LLM service error" },
        });
        return;
      }

      res.status(500).json({
        error: { message: "Internal server error" },
      });
    }
  });

  return router;
}
