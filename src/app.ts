import express from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { requireAuth } from "./middleware/requireAuth";
import { createQuoteRouter } from "./routes/quoteRoutes";
import type { UnderwritingDeps } from "./modules/quote.service";

export const API_PREFIX = "/api/uw";

export interface AppOptions extends UnderwritingDeps {
  reportsDir: string;
  jwtSecret: string;
  corsOrigin: string;
  /** Requests per 15 minute window per client. */
  rateLimitMax?: number;
}

export function createApp(options: AppOptions) {
  const app = express();

  app.use(cors({ origin: options.corsOrigin }));
  app.use(express.json({ limit: "1mb" }));

  /* ================= RATE LIMIT ================= */

  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: options.rateLimitMax ?? 500
    })
  );

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /* ================= QUOTES ================= */

  app.use(
    API_PREFIX,
    requireAuth(options.jwtSecret),
    createQuoteRouter({ ...options, basePath: API_PREFIX })
  );

  return app;
}
