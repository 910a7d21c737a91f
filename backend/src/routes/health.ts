import { Router, Request, Response } from "express";

import { ServiceConfig } from "../config";

export function createHealthRouter(config: ServiceConfig): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: config.version,
    });
  });

  // Orchestrator-style probes.
  router.get("/healthz", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  router.get("/ready", (_req: Request, res: Response) => {
    res.json({ status: "ready" });
  });

  router.get("/ping", (_req: Request, res: Response) => {
    res.json({ message: "pong" });
  });

  // Reports whether the token is set, never the token itself.
  router.get("/debug", (_req: Request, res: Response) => {
    res.json({
      environment: {
        has_databricks_token: config.servingToken !== null,
        databricks_endpoint: config.servingEndpointUrl,
        port: config.port,
        host: config.host,
      },
    });
  });

  return router;
}
