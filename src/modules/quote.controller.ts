import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { Request, Response } from "express";
import { ApplicationSchema, BatchSchema, formatIssues } from "./application.schema";
import { underwriteApplication, underwriteBatch, type UnderwritingDeps } from "./quote.service";
import { reportFileName } from "../services/reportService";
import { AssessorError } from "../services/riskAssessor";
import type { UnderwritingDecision } from "./types";

const quoteIdSchema = z.string().uuid();

export interface QuoteControllerDeps extends UnderwritingDeps {
  reportsDir: string;
  /** Path prefix the router is mounted under, used to build report links. */
  basePath: string;
}

function isMissingFile(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function createQuoteController(deps: QuoteControllerDeps) {
  function toResponse({ reportPath, ...decision }: UnderwritingDecision) {
    return {
      ...decision,
      reportUrl: reportPath ? `${deps.basePath}/quotes/${decision.quoteId}/report` : null
    };
  }

  async function createQuote(req: Request, res: Response) {
    const parsed = ApplicationSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: formatIssues(parsed.error) });
    }

    try {
      const decision = await underwriteApplication(parsed.data, deps);
      console.log(
        `Quote ${decision.quoteId} issued for ${decision.businessName}: ${decision.premiumEstimate} (${decision.riskProfile})`
      );
      return res.status(201).json(toResponse(decision));
    } catch (err) {
      if (err instanceof AssessorError) {
        console.error("Risk assessor error:", err);
        return res.status(502).json({ error: "Risk assessment unavailable" });
      }
      console.error("Quote error:", err);
      return res.status(500).json({ error: "Server error" });
    }
  }

  async function createBatch(req: Request, res: Response) {
    const parsed = BatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: formatIssues(parsed.error) });
    }

    try {
      const results = await underwriteBatch(parsed.data, deps);
      return res.json({
        results: results.map((result) =>
          result.ok ? { ...result, decision: toResponse(result.decision) } : result
        )
      });
    } catch (err) {
      console.error("Batch quote error:", err);
      return res.status(500).json({ error: "Server error" });
    }
  }

  async function getReport(req: Request, res: Response) {
    const quoteId = quoteIdSchema.safeParse(req.params.quoteId);
    if (!quoteId.success) {
      return res.status(400).json({ error: "Invalid quote id" });
    }

    try {
      const pdf = await readFile(path.join(deps.reportsDir, reportFileName(quoteId.data)));
      return res.type("application/pdf").send(pdf);
    } catch (err) {
      if (isMissingFile(err)) {
        return res.status(404).json({ error: "Report not found" });
      }
      console.error("Report read error:", err);
      return res.status(500).json({ error: "Server error" });
    }
  }

  return { createQuote, createBatch, getReport };
}
