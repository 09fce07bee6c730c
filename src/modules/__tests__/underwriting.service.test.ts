import { describe, it, expect } from "vitest";
import { computePremiumBreakdown } from "../premium.service";
import {
  CLAIMS_CONDITIONS,
  HIGH_RISK_CONDITIONS,
  buildExplanation,
  determineConditions
} from "../underwriting.service";
import { AS_OF, makeApplication, makeAssessment } from "./fixtures";

describe("determineConditions", () => {
  it("stacks high-risk, trade and claims conditions in that order", () => {
    expect(determineConditions(makeApplication(), "high")).toEqual([
      ...HIGH_RISK_CONDITIONS,
      "Food safety certification required",
      "Regular kitchen equipment maintenance",
      "Employee hygiene training",
      ...CLAIMS_CONDITIONS
    ]);
  });

  it("adds manufacturing conditions", () => {
    expect(
      determineConditions(makeApplication({ businessType: "manufacturing", claimsHistory: [] }), "medium")
    ).toEqual(["Equipment safety inspections", "Worker safety training", "Emergency response plan"]);
  });

  it("matches the trade the same way the premium does", () => {
    expect(
      determineConditions(makeApplication({ businessType: " Restaurant ", claimsHistory: [] }), "medium")
    ).toEqual([
      "Food safety certification required",
      "Regular kitchen equipment maintenance",
      "Employee hygiene training"
    ]);
  });

  it("returns nothing for a clean, low-risk office", () => {
    expect(
      determineConditions(makeApplication({ businessType: "office", claimsHistory: [] }), "low")
    ).toEqual([]);
  });
});

describe("buildExplanation", () => {
  const application = makeApplication();
  const breakdown = computePremiumBreakdown(application, "medium", { asOf: AS_OF });

  it("walks through each step of the calculation", () => {
    const lines = buildExplanation(application, makeAssessment(), breakdown).split("\n");

    expect(lines[0]).toBe("Premium calculation for Harbor Street Bistro:");
    expect(lines[1]).toBe("1. Base Rate: $12.00 per $1,000 of revenue (Restaurant rate class)");
    expect(lines[2]).toBe(
      "2. Revenue Base: $500,000.00 revenue x 1.00x employee factor (15 employees) = $6,000.00"
    );
    expect(lines[3]).toBe("3. Risk Adjustment: 1.00x for medium risk = $6,000.00");
    expect(lines[4]).toBe("4. Claims Surcharge: $1,500.00 (1 of 1 claims within lookback window)");
    expect(lines[5]).toBe("5. Tenure Adjustment: 1.00x (5 years in business)");
    expect(lines).toContain("Final Premium: $7,500.00");
    expect(lines).toContain("Risk Score: 64.00");
    expect(lines.slice(-3)).toEqual(["Key Risk Factors:", "- Fryer use", "- Late-night hours"]);
  });

  it("omits the score and factor sections when the assessor gave none", () => {
    const text = buildExplanation(
      application,
      makeAssessment({ riskFactors: [], riskScore: null }),
      breakdown
    );

    expect(text.endsWith("Risk Profile: Medium")).toBe(true);
  });

  it("notes when the minimum premium applies", () => {
    const tiny = makeApplication({ annualRevenue: 0, claimsHistory: [] });
    const lines = buildExplanation(
      tiny,
      makeAssessment(),
      computePremiumBreakdown(tiny, "medium", { asOf: AS_OF })
    ).split("\n");

    expect(lines[6]).toBe("Minimum premium applied.");
    expect(lines).toContain("Final Premium: $250.00");
  });
});
