import { randomUUID } from "crypto";
import type { ApplicationRecord, QuoteResult, RiskAssessment } from "./types";

export function assembleQuote(
  application: ApplicationRecord,
  assessment: RiskAssessment,
  premium: number
): QuoteResult {
  return Object.freeze({
    quoteId: randomUUID(),
    businessName: application.businessName,
    premiumEstimate: premium,
    riskProfile: assessment.riskProfile,
    riskFactors: Object.freeze([...assessment.riskFactors]),
    riskScore: assessment.riskScore,
    timestamp: new Date().toISOString()
  });
}
