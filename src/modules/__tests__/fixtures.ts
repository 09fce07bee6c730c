import type { ApplicationRecord, RiskAssessment } from "../types";

export const AS_OF = new Date("2026-06-01T00:00:00Z");

export function makeApplication(overrides: Partial<ApplicationRecord> = {}): ApplicationRecord {
  return {
    businessName: "Harbor Street Bistro",
    businessType: "restaurant",
    annualRevenue: 500_000,
    employeeCount: 15,
    state: "CA",
    city: "San Francisco",
    yearsInBusiness: 5,
    businessDescription: "Family-owned restaurant serving lunch and dinner",
    claimsHistory: [{ date: "2025-03-10", type: "property", amount: 5000 }],
    ...overrides
  };
}

export function makeAssessment(overrides: Partial<RiskAssessment> = {}): RiskAssessment {
  return {
    riskProfile: "medium",
    riskFactors: ["Fryer use", "Late-night hours"],
    riskScore: 64,
    ...overrides
  };
}

/** Request body as an API client would send it. */
export const applicationBody = {
  businessName: "Harbor Street Bistro",
  businessType: "Restaurant",
  annualRevenue: 500000,
  employeeCount: 15,
  state: "ca",
  city: "San Francisco",
  yearsInBusiness: 5,
  businessDescription: "Family-owned restaurant serving lunch and dinner",
  claimsHistory: [{ date: "2025-03-10", type: "property", amount: 5000 }]
};
