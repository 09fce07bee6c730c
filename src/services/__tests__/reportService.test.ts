import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { renderQuotePdf, reportFileName, writeQuoteReport } from "../reportService";
import { assembleQuote } from "../../modules/quote.assembler";
import { computePremiumBreakdown } from "../../modules/premium.service";
import { determineConditions } from "../../modules/underwriting.service";
import { AS_OF, makeApplication, makeAssessment } from "../../modules/__tests__/fixtures";
import type { ApplicationRecord, UnderwritingDecision } from "../../modules/types";

function decisionFor(application: ApplicationRecord): UnderwritingDecision {
  const assessment = makeAssessment({ riskProfile: "high" });
  const breakdown = computePremiumBreakdown(application, assessment.riskProfile, { asOf: AS_OF });

  return {
    ...assembleQuote(application, assessment, breakdown.premium),
    conditions: determineConditions(application, assessment.riskProfile),
    breakdown,
    explanation: ""
  };
}

describe("renderQuotePdf", () => {
  it("produces a PDF document", async () => {
    const application = makeApplication({ additionalNotes: "Seasonal patio seating" });
    const pdf = await renderQuotePdf(application, decisionFor(application));

    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(pdf.subarray(-16).toString("latin1")).toContain("%%EOF");
  });

  it("renders applications without claims or factors", async () => {
    const application = makeApplication({ claimsHistory: [], annualRevenue: 0 });
    const decision = { ...decisionFor(application), riskFactors: [], riskScore: null };

    const pdf = await renderQuotePdf(application, decision);

    expect(pdf.length).toBeGreaterThan(0);
  });
});

describe("writeQuoteReport", () => {
  let dir = "";

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the reports directory and names the file after the quote", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "uw-report-"));
    const reportsDir = path.join(dir, "nested", "reports");
    const application = makeApplication();
    const decision = decisionFor(application);

    const reportPath = await writeQuoteReport(reportsDir, application, decision);

    expect(reportPath).toBe(path.join(reportsDir, reportFileName(decision.quoteId)));
    expect(path.basename(reportPath)).toBe(`quote_${decision.quoteId}.pdf`);
    const written = await readFile(reportPath);
    expect(written.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});
