import cors from "cors";
import express, { Express, NextFunction, Request, Response } from "express";

import { ServiceConfig } from "./config";
import { createExcusesRouter } from "./routes/excuses";
import { createHealthRouter } from "./routes/health";
import { ExcuseGenerator } from "./services/excuseEmailService";

type AppDependencies = {
  config: ServiceConfig;
  generator: ExcuseGenerator;
};

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "status" in error &&
    error.status === 400
  );
}

export function createApp({ config, generator }: AppDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    console.log(
      JSON.stringify({
        event: "http_request",
        method: req.method,
        path: req.originalUrl,
      }),
    );

    res.on("finish", () => {
      console.log(
        JSON.stringify({
          event: "http_response",
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          duration_ms: Date.now() - startedAt,
        }),
      );
    });

    next();
  });

  app.use(createHealthRouter(config));
  app.use("/api", createExcusesRouter(generator));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      res.status(400).json({
        error: {
          message: "Request body is not valid JSON.",
        },
      });
      return;
    }

    const message =
      error instanceof Error ? error.message : "Internal server error";

    res.status(500).json({
      error: {
        message,
      },
    });
  });

  return app;
}
