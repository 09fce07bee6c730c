import {
  BASE_RATES,
  CLAIMS_LOOKBACK_YEARS,
  CLAIM_FLAT_SURCHARGE,
  CLAIM_SEVERITY_RATE,
  EMPLOYEE_BANDS,
  MINIMUM_PREMIUM,
  REVENUE_UNIT,
  RISK_MULTIPLIERS,
  TENURE_BANDS,
  bandFactor,
  resolveRateClass
} from "./rate.tables";
import { roundCurrency } from "./format";
import type {
  ApplicationRecord,
  ClaimRecord,
  PremiumBreakdown,
  RiskProfile
} from "./types";

export interface PremiumOptions {
  /** Reference date for the claims lookback window. Defaults to now. */
  asOf?: Date;
}

function claimTime(date: string) {
  const [year, month, day] = date.split("-").map(Number);
  return Date.UTC(year, month - 1, day);
}

export function lookbackCutoff(asOf: Date) {
  return Date.UTC(
    asOf.getUTCFullYear() - CLAIMS_LOOKBACK_YEARS,
    asOf.getUTCMonth(),
    asOf.getUTCDate()
  );
}

export function claimsInWindow(claims: readonly ClaimRecord[], asOf: Date) {
  const cutoff = lookbackCutoff(asOf);
  return claims.filter((claim) => claimTime(claim.date) >= cutoff);
}

export function claimSurcharge(claim: ClaimRecord) {
  return CLAIM_FLAT_SURCHARGE + claim.amount * CLAIM_SEVERITY_RATE;
}

/**
 * Premium composition, in order:
 *   base      = rate(type) * revenue / 1000 * employeeFactor
 *   adjusted  = base * riskMultiplier
 *   subtotal  = (adjusted + sum(claim surcharges in window)) * tenureFactor
 *   premium   = round2(max(subtotal, MINIMUM_PREMIUM))
 */
export function computePremiumBreakdown(
  application: ApplicationRecord,
  riskProfile: RiskProfile,
  options: PremiumOptions = {}
): PremiumBreakdown {
  const asOf = options.asOf ?? new Date();

  const rateClass = resolveRateClass(application.businessType);
  const baseRate = BASE_RATES[rateClass];
  const revenueUnits = application.annualRevenue / REVENUE_UNIT;
  const employeeFactor = bandFactor(EMPLOYEE_BANDS, application.employeeCount);
  const basePremium = baseRate * revenueUnits * employeeFactor;

  const riskMultiplier = RISK_MULTIPLIERS[riskProfile];
  const riskAdjustedPremium = basePremium * riskMultiplier;

  const recentClaims = claimsInWindow(application.claimsHistory, asOf);
  const claimsSurcharge = recentClaims.reduce(
    (total, claim) => total + claimSurcharge(claim),
    0
  );

  const tenureFactor = bandFactor(TENURE_BANDS, application.yearsInBusiness);
  const subtotal = (riskAdjustedPremium + claimsSurcharge) * tenureFactor;
  const minimumApplied = subtotal < MINIMUM_PREMIUM;

  return {
    rateClass,
    baseRate,
    revenueUnits,
    employeeFactor,
    basePremium: roundCurrency(basePremium),
    riskProfile,
    riskMultiplier,
    riskAdjustedPremium: roundCurrency(riskAdjustedPremium),
    claimsInWindow: recentClaims.length,
    claimsSurcharge: roundCurrency(claimsSurcharge),
    tenureFactor,
    minimumApplied,
    premium: roundCurrency(minimumApplied ? MINIMUM_PREMIUM : subtotal)
  };
}

export function computePremium(
  application: ApplicationRecord,
  riskProfile: RiskProfile,
  options: PremiumOptions = {}
) {
  return computePremiumBreakdown(application, riskProfile, options).premium;
}
