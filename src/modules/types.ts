export const RISK_PROFILES = ["low", "medium", "high"] as const;

export type RiskProfile = (typeof RISK_PROFILES)[number];

export type ClaimType = "property" | "liability" | "workers_comp" | "auto";

export interface ClaimRecord {
  readonly date: string;
  readonly type: ClaimType;
  readonly amount: number;
}

export interface ApplicationRecord {
  readonly businessName: string;
  readonly businessType: string;
  readonly annualRevenue: number;
  readonly employeeCount: number;
  readonly state: string;
  readonly city: string;
  readonly yearsInBusiness: number;
  readonly businessDescription: string;
  readonly claimsHistory: readonly ClaimRecord[];
  readonly additionalNotes?: string;
}

export interface RiskAssessment {
  readonly riskProfile: RiskProfile;
  readonly riskFactors: readonly string[];
  /** 0-100 when the assessor supplied one */
  readonly riskScore: number | null;
}

export interface PremiumBreakdown {
  /** Rate table key actually used; unlisted types resolve to "other". */
  readonly rateClass: string;
  readonly baseRate: number;
  readonly revenueUnits: number;
  readonly employeeFactor: number;
  readonly basePremium: number;
  readonly riskProfile: RiskProfile;
  readonly riskMultiplier: number;
  readonly riskAdjustedPremium: number;
  readonly claimsInWindow: number;
  readonly claimsSurcharge: number;
  readonly tenureFactor: number;
  readonly minimumApplied: boolean;
  readonly premium: number;
}

export interface QuoteResult {
  readonly quoteId: string;
  readonly businessName: string;
  readonly premiumEstimate: number;
  readonly riskProfile: RiskProfile;
  readonly riskFactors: readonly string[];
  readonly riskScore: number | null;
  readonly timestamp: string;
}

export interface UnderwritingDecision extends QuoteResult {
  readonly conditions: readonly string[];
  readonly breakdown: PremiumBreakdown;
  readonly explanation: string;
  readonly reportPath?: string;
}
