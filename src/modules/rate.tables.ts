import type { RiskProfile } from "./types";

/* ================= BASE RATES ================= */

/** Dollars of premium per $1,000 of annual revenue. */
export const BASE_RATES = Object.freeze({
  restaurant: 12,
  retail: 8,
  office: 4.5,
  professional_services: 5,
  manufacturing: 15,
  construction: 18,
  contractor: 16,
  other: 10
});

export type RateClass = keyof typeof BASE_RATES;

export const DEFAULT_RATE_CLASS: RateClass = "other";

export const REVENUE_UNIT = 1_000;

/* ================= RISK ================= */

export const RISK_MULTIPLIERS: Readonly<Record<RiskProfile, number>> = Object.freeze({
  low: 0.85,
  medium: 1,
  high: 1.35
});

/* ================= CLAIMS ================= */

export const CLAIMS_LOOKBACK_YEARS = 3;
export const CLAIM_FLAT_SURCHARGE = 500;
export const CLAIM_SEVERITY_RATE = 0.2;

/* ================= BANDS ================= */

export interface Band {
  readonly minimum: number;
  readonly factor: number;
}

// Ordered highest minimum first; the first band the value reaches wins.
export const EMPLOYEE_BANDS: readonly Band[] = Object.freeze([
  { minimum: 50, factor: 1.3 },
  { minimum: 25, factor: 1.15 },
  { minimum: 10, factor: 1 },
  { minimum: 0, factor: 0.9 }
]);

export const TENURE_BANDS: readonly Band[] = Object.freeze([
  { minimum: 20, factor: 0.9 },
  { minimum: 10, factor: 0.95 },
  { minimum: 3, factor: 1 },
  { minimum: 0, factor: 1.1 }
]);

export const MINIMUM_PREMIUM = 250;

function isRateClass(value: string): value is RateClass {
  return Object.prototype.hasOwnProperty.call(BASE_RATES, value);
}

export function resolveRateClass(businessType: string): RateClass {
  const key = businessType.trim().toLowerCase();
  return isRateClass(key) ? key : DEFAULT_RATE_CLASS;
}

export function bandFactor(bands: readonly Band[], value: number) {
  const band = bands.find((candidate) => value >= candidate.minimum);
  return band ? band.factor : 1;
}
