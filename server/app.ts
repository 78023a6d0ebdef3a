import express, { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { log } from "./logger";
import { registerRoutes, type RouteDeps } from "./routes";

function statusOf(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err && typeof err === "object") {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : null;
    if (typeof candidate === "number" && candidate >= 400 && candidate < 600) return candidate;
  }
  return 500;
}

function printable(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

export function createApp(deps: RouteDeps) {
  const app = express();

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      if (logLine.length > 120) {
        logLine = logLine.slice(0, 119) + "…";
      }
      log(logLine);
    });

    next();
  });

  registerRoutes(app, deps);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = statusOf(err);
    const isZodError = err instanceof ZodError;
    const message = isZodError
      ? "Validation error"
      : err instanceof Error && err.message
        ? err.message
        : "Internal Server Error";
    if (status >= 500) {
      console.error("Internal Server Error:", printable(err));
    }

    if (res.headersSent) {
      return next(err);
    }

    if (isZodError) {
      return res.status(status).json({ message, issues: err.issues });
    }

    return res.status(status).json({ message });
  });

  return app;
}
