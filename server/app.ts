import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import type { AppConfig } from "./config";
import { HttpError } from "./errors";
import { log, logError } from "./log";
import { registerRoutes } from "./routes";
import { createServices, type ReconciliationServices } from "./services";

export function createApp(config: AppConfig, services: ReconciliationServices = createServices()): Express {
  const app = express();

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = (bodyJson) => {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }

        if (logLine.length > 80) {
          logLine = logLine.slice(0, 79) + "…";
        }

        log(logLine);
      }
    });

    next();
  });

  registerRoutes(app, services, config);

  // Errors raised by middleware, multer's upload limits in particular
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: err.message, field: err.field });
    }
    if (err instanceof HttpError) {
      return res.status(err.status).json(err.toJSON());
    }

    logError("Unhandled request error", err);
    const message = err instanceof Error ? err.message : "";
    return res.status(500).json({ error: message || "Internal Server Error" });
  });

  return app;
}
