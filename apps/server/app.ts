import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import type { Server } from "http";
import { registerRoutes } from "./routes";
import { log, logError } from "./log";
import type { ServerConfig } from "./config";

const MAX_LOG_LINE = 80;

export interface CreateAppOptions {
  logRequests?: boolean;
}

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json.bind(res);
  res.json = (bodyJson?: unknown) => {
    capturedJsonResponse = bodyJson;
    return originalResJson(bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > MAX_LOG_LINE) {
        logLine = logLine.slice(0, MAX_LOG_LINE - 1) + "…";
      }

      log(logLine);
    }
  });

  next();
}

export async function createApp(
  config: ServerConfig,
  options: CreateAppOptions = {}
): Promise<{ app: Express; server: Server }> {
  const app = express();

  app.use(cors({
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true,
  }));

  app.use(express.json({ limit: "5mb" }));
  app.use(express.urlencoded({ extended: false }));

  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  const server = await registerRoutes(app, config);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    if (status >= 500) {
      logError("Unhandled request error", err);
    }
    res.status(status).json({ message });
  });

  return { app, server };
}
