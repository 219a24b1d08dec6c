import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app";
import { TtlCache } from "./cache";
import { loadConfig } from "./config";
import { DatabaseManager } from "./db";
import { errorMessage, log, setLogLevel } from "./log";
import { FurnitureParser } from "./parser";
import { QuerySuggestion } from "./suggestion";
import type { NamedRecord } from "@shared/schema";

const config = loadConfig();
setLogLevel(config.logLevel);

// Dictionaries and patterns are loaded once here and shared by every request.
log("Loading FurnitureParser and QuerySuggestion...", "startup");
const database = new DatabaseManager(config.database, {
  cache: new TtlCache<NamedRecord[]>({ ttlMs: config.cacheTtlMs, name: "Lookup Cache" }),
});
const parser = new FurnitureParser();
const suggest = new QuerySuggestion(database);
log("Parser and suggestion data loaded", "startup");

const app = createApp({ parser, suggest, database });
const httpServer = createServer(app);

httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.port}`);
});

async function shutdown(signal: string): Promise<void> {
  log(`${signal} received, shutting down`, "startup");
  httpServer.close();
  try {
    await database.closeConnectionPool();
  } catch (error) {
    console.error(`[startup] Error closing connection pool: ${errorMessage(error)}`);
  }
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
