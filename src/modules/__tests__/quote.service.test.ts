import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { underwriteApplication, underwriteBatch } from "../quote.service";
import { AssessorError, type RiskAssessor } from "../../services/riskAssessor";
import { AS_OF, applicationBody, makeApplication } from "./fixtures";

function cannedAssessor(output: unknown): RiskAssessor {
  return { assess: vi.fn().mockResolvedValue(output) };
}

const mediumOutput = JSON.stringify({
  risk_profile: "medium",
  risk_factors: ["Fryer use"],
  risk_score: 64
});

describe("underwriteApplication", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it("combines the assessment, premium and conditions", async () => {
    const assessor = cannedAssessor(mediumOutput);
    const application = makeApplication();

    const decision = await underwriteApplication(application, { assessor, asOf: AS_OF });

    expect(assessor.assess).toHaveBeenCalledWith(application);
    expect(decision).toMatchObject({
      businessName: "Harbor Street Bistro",
      premiumEstimate: 7500,
      riskProfile: "medium",
      riskFactors: ["Fryer use"],
      riskScore: 64
    });
    expect(decision.conditions).toHaveLength(5);
    expect(decision.breakdown.claimsSurcharge).toBe(1500);
    expect(decision.reportPath).toBeUndefined();
  });

  it("prices high risk above medium", async () => {
    const decision = await underwriteApplication(makeApplication(), {
      assessor: cannedAssessor({ risk_profile: "high" }),
      asOf: AS_OF
    });

    expect(decision.premiumEstimate).toBe(9600);
  });

  it("falls back to medium when the assessor output is unreadable", async () => {
    const decision = await underwriteApplication(makeApplication(), {
      assessor: cannedAssessor("???"),
      asOf: AS_OF
    });

    expect(decision.riskProfile).toBe("medium");
    expect(decision.riskFactors).toEqual([]);
    expect(decision.premiumEstimate).toBe(7500);
  });

  it("gives the same premium with a different id on every run", async () => {
    const deps = { assessor: cannedAssessor(mediumOutput), asOf: AS_OF };
    const first = await underwriteApplication(makeApplication(), deps);
    const second = await underwriteApplication(makeApplication(), deps);

    expect(second.premiumEstimate).toBe(first.premiumEstimate);
    expect(second.quoteId).not.toBe(first.quoteId);
  });

  it("wraps assessor failures", async () => {
    const cause = new Error("socket hang up");
    const assessor: RiskAssessor = { assess: vi.fn().mockRejectedValue(cause) };

    const error = await underwriteApplication(makeApplication(), { assessor }).catch((err) => err);

    expect(error).toBeInstanceOf(AssessorError);
    expect(error.cause).toBe(cause);
  });

  it("writes a PDF report when a reports directory is given", async () => {
    const reportsDir = await mkdtemp(path.join(os.tmpdir(), "uw-reports-"));
    tempDirs.push(reportsDir);

    const decision = await underwriteApplication(makeApplication(), {
      assessor: cannedAssessor(mediumOutput),
      reportsDir,
      asOf: AS_OF
    });

    expect(decision.reportPath).toBe(path.join(reportsDir, `quote_${decision.quoteId}.pdf`));
    const pdf = await readFile(path.join(reportsDir, `quote_${decision.quoteId}.pdf`));
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});

describe("underwriteBatch", () => {
  it("reports each entry independently in input order", async () => {
    const results = await underwriteBatch(
      [applicationBody, { businessName: "" }, { ...applicationBody, claimsHistory: [] }],
      { assessor: cannedAssessor(mediumOutput), asOf: AS_OF }
    );

    expect(results.map((result) => [result.index, result.ok])).toEqual([
      [0, true],
      [1, false],
      [2, true]
    ]);

    const [first, second, third] = results;
    expect(first.ok && first.decision.premiumEstimate).toBe(7500);
    expect(!second.ok && second.error).toContain("businessName");
    expect(third.ok && third.decision.premiumEstimate).toBe(6000);
  });

  it("keeps going when the assessor fails for one entry", async () => {
    const assess = vi
      .fn()
      .mockRejectedValueOnce(new Error("rate limited"))
      .mockResolvedValue(mediumOutput);

    const results = await underwriteBatch([applicationBody, applicationBody], {
      assessor: { assess },
      asOf: AS_OF
    });

    expect(results[0]).toEqual({ index: 0, ok: false, error: "Risk assessment failed" });
    expect(results[1].ok).toBe(true);
  });
});
