import type { Express, Request, Response } from "express";
import { queryRequestSchema } from "@shared/schema";
import type { DatabaseManager } from "./db";
import { errorMessage, log } from "./log";
import type { FurnitureParser } from "./parser";
import type { QuerySuggestion } from "./suggestion";

export interface RouteDeps {
  parser: FurnitureParser;
  suggest: QuerySuggestion;
  database: Pick<DatabaseManager, "getStats">;
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms.toFixed(2)} ms` : `${(ms / 1000).toFixed(2)} sec`;
}

function readQuery(req: Request, res: Response): string | null {
  const parsed = queryRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({ success: false, error: "Query is required" });
    return null;
  }
  return parsed.data.query;
}

export function registerRoutes(app: Express, { parser, suggest, database }: RouteDeps): void {
  // Main processing endpoint for query analysis
  app.post("/query/analyze", (req, res) => {
    try {
      const query = readQuery(req, res);
      if (query === null) return;

      const start = performance.now();
      const result = parser.analyzeQueryText(query);
      const processingTime = formatDuration(performance.now() - start);

      log(`Processed query in ${processingTime}: ${query}`, "analyze");
      res.json({ success: true, result: { ...result, processing_time: processingTime } });
    } catch (error) {
      console.error(`[analyze] Error in analyzeQuery: ${errorMessage(error)}`);
      res.status(500).json({ success: false, error: `Server error: ${errorMessage(error)}` });
    }
  });

  // Top product names, brand names and styles starting with the query
  app.post("/query/suggestion", async (req, res) => {
    try {
      const query = readQuery(req, res);
      if (query === null) return;

      res.json(await suggest.suggestQueryResults(query));
    } catch (error) {
      console.error(`[suggestion] Error in querySuggestion: ${errorMessage(error)}`);
      res.status(500).json({ success: false, error: `Server error: ${errorMessage(error)}` });
    }
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      service: "query-parser-api",
    });
  });

  app.get("/api/debug/db-stats", (_req, res) => {
    res.json(database.getStats());
  });
}
