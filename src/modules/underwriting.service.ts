import { formatCurrency, formatFactor, titleCase } from "./format";
import { resolveRateClass } from "./rate.tables";
import type {
  ApplicationRecord,
  PremiumBreakdown,
  RiskAssessment,
  RiskProfile
} from "./types";

export const HIGH_RISK_CONDITIONS = [
  "Monthly safety inspections required",
  "Employee training program implementation",
  "Security system installation",
  "Regular risk assessment reviews"
] as const;

export const TRADE_CONDITIONS: Readonly<Record<string, readonly string[]>> = {
  restaurant: [
    "Food safety certification required",
    "Regular kitchen equipment maintenance",
    "Employee hygiene training"
  ],
  manufacturing: [
    "Equipment safety inspections",
    "Worker safety training",
    "Emergency response plan"
  ]
};

export const CLAIMS_CONDITIONS = [
  "Claims review every 6 months",
  "Risk mitigation plan required"
] as const;

export function determineConditions(
  application: ApplicationRecord,
  riskProfile: RiskProfile
): string[] {
  const conditions: string[] = [];

  if (riskProfile === "high") {
    conditions.push(...HIGH_RISK_CONDITIONS);
  }

  const trade = resolveRateClass(application.businessType);
  if (Object.prototype.hasOwnProperty.call(TRADE_CONDITIONS, trade)) {
    conditions.push(...TRADE_CONDITIONS[trade]);
  }

  if (application.claimsHistory.length > 0) {
    conditions.push(...CLAIMS_CONDITIONS);
  }

  return conditions;
}

export function buildExplanation(
  application: ApplicationRecord,
  assessment: RiskAssessment,
  breakdown: PremiumBreakdown
) {
  const lines = [
    `Premium calculation for ${application.businessName}:`,
    `1. Base Rate: ${formatCurrency(breakdown.baseRate)} per $1,000 of revenue (${titleCase(breakdown.rateClass)} rate class)`,
    `2. Revenue Base: ${formatCurrency(application.annualRevenue)} revenue x ${formatFactor(breakdown.employeeFactor)} employee factor (${application.employeeCount} employees) = ${formatCurrency(breakdown.basePremium)}`,
    `3. Risk Adjustment: ${formatFactor(breakdown.riskMultiplier)} for ${assessment.riskProfile} risk = ${formatCurrency(breakdown.riskAdjustedPremium)}`,
    `4. Claims Surcharge: ${formatCurrency(breakdown.claimsSurcharge)} (${breakdown.claimsInWindow} of ${application.claimsHistory.length} claims within lookback window)`,
    `5. Tenure Adjustment: ${formatFactor(breakdown.tenureFactor)} (${application.yearsInBusiness} years in business)`
  ];

  if (breakdown.minimumApplied) {
    lines.push("Minimum premium applied.");
  }

  lines.push(
    "",
    `Final Premium: ${formatCurrency(breakdown.premium)}`,
    "",
    `Risk Profile: ${titleCase(assessment.riskProfile)}`
  );

  if (assessment.riskScore !== null) {
    lines.push(`Risk Score: ${assessment.riskScore.toFixed(2)}`);
  }

  if (assessment.riskFactors.length > 0) {
    lines.push("", "Key Risk Factors:", ...assessment.riskFactors.map((factor) => `- ${factor}`));
  }

  return lines.join("\n");
}
