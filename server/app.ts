import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { errorMessage, log } from "./log";
import { registerRoutes, type RouteDeps } from "./routes";

export function createApp(deps: RouteDeps): Express {
  const app = express();

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept'],
    credentials: false
  }));

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/query") || path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });

    next();
  });

  registerRoutes(app, deps);

  // Malformed JSON bodies and anything a route let through
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = status === 400 ? "Invalid request body" : `Server error: ${errorMessage(err)}`;
    if (status >= 500) {
      console.error(`[express] ${errorMessage(err)}`);
    }
    res.status(status).json({ success: false, error: message });
  });

  return app;
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}
