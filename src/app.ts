import express from "express";
import type { Request, Response, NextFunction } from "express";
import { rateLimit } from "./middleware/rateLimit.middleware";
import { getMetrics } from "./utils/metrics";
import type { Clock } from "./gcra/time";
import type { Env } from "./config/env";

export interface AppOptions {
  env: Pick<Env, "RATE_LIMIT_BURST" | "RATE_LIMIT_WINDOW_SECONDS">;
  clock?: Clock;
}

export function createApp({ env, clock }: AppOptions) {
  const app = express();
  app.use(express.json());

  app.set("trust proxy", true);

  app.get("/metrics", (_req, res) => {
    res.json(getMetrics());
  });

  // Apply rate limit to a route
  app.get(
    "/api/test",
    rateLimit(
      {
        limit: env.RATE_LIMIT_BURST,
        windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
      },
      { clock }
    ),
    (_req, res) => {
      res.json({ message: "Request successful" });
    }
  );

  // Bulk endpoint: each request spends `?count=` units
  app.get(
    "/api/batch",
    (req, res, next) => {
      const error = checkCount(req.query.count, env.RATE_LIMIT_BURST);
      if (error) {
        res.status(400).json({ message: error });
        return;
      }
      next();
    },
    rateLimit(
      {
        limit: env.RATE_LIMIT_BURST,
        windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
        cost: (req) => Number(req.query.count ?? 1),
      },
      { clock }
    ),
    (_req, res) => {
      res.json({ message: "Batch accepted" });
    }
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    res.status(500).json({ message: err.message });
  });

  return app;
}

// `count` is client input: anything but a single integer in 1..max is a bad request
function checkCount(raw: unknown, max: number): string | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== "string" || !/^[1-9][0-9]*$/.test(raw)) {
    return "count must be a positive integer";
  }
  if (Number(raw) > max) {
    return `count must not exceed ${max}`;
  }
  return undefined;
}
