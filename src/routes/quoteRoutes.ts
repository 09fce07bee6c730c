import { Router } from "express";
import { createQuoteController, type QuoteControllerDeps } from "../modules/quote.controller";

export function createQuoteRouter(deps: QuoteControllerDeps) {
  const router = Router();
  const quotes = createQuoteController(deps);

  router.post("/quotes", quotes.createQuote);
  router.post("/quotes/batch", quotes.createBatch);
  router.get("/quotes/:quoteId/report", quotes.getReport);

  return router;
}
