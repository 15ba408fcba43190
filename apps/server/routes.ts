import type { Express } from "express";
import { createServer, type Server } from "http";
import { packRequestSchema, parseCatalogRequestSchema } from "@shared/schema";
import {
  PackingInputError,
  assignItemColors,
  buildPackingReport,
  packItems,
  parseItemCatalog,
  runValidationPipeline
} from "@stowplan/engine";
import type { ServerConfig } from "./config";

export async function registerRoutes(app: Express, config: ServerConfig): Promise<Server> {
  // ============================================================================
  // STATUS ROUTES
  // ============================================================================

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/containers/default", (_req, res) => {
    res.json(config.defaultContainer);
  });

  // ============================================================================
  // CATALOG ROUTES
  // ============================================================================

  app.post("/api/catalog/parse", (req, res) => {
    const parsed = parseCatalogRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    try {
      res.json(parseItemCatalog(parsed.data.csv));
    } catch (error) {
      // Only header problems throw; row problems are part of the result.
      res.status(400).json({
        error: "Invalid catalog",
        message: error instanceof Error ? error.message : String(error)
      });
    }
  });

  // ============================================================================
  // PACKING ROUTES
  // ============================================================================

  app.post("/api/pack", (req, res, next) => {
    const parsed = packRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    const { items } = parsed.data;
    const container = parsed.data.container ?? config.defaultContainer;

    const requestedUnits = items.reduce((sum, item) => sum + item.count, 0);
    if (requestedUnits > config.maxUnitsPerRequest) {
      return res.status(413).json({
        error: "Too many items",
        limit: config.maxUnitsPerRequest,
        requested: requestedUnits
      });
    }

    try {
      const result = packItems(container, items);
      res.json({
        result,
        report: buildPackingReport(result),
        validation: runValidationPipeline(result),
        colors: assignItemColors(items.map(item => item.name))
      });
    } catch (error) {
      if (error instanceof PackingInputError) {
        return res.status(400).json({ error: "Invalid packing input", issues: error.issues });
      }
      next(error);
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
