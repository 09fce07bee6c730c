import { z } from "zod";
import type { RiskAssessment, RiskProfile } from "./types";

export const DEFAULT_RISK_PROFILE: RiskProfile = "medium";
export const MAX_RISK_FACTORS = 20;
export const MAX_FACTOR_LENGTH = 200;

const PROFILE_ALIASES: Readonly<Record<string, RiskProfile>> = Object.freeze({
  low: "low",
  minimal: "low",
  medium: "medium",
  moderate: "medium",
  high: "high",
  elevated: "high",
  severe: "high"
});

const AssessorPayload = z
  .object({
    risk_profile: z.unknown(),
    riskProfile: z.unknown(),
    risk_level: z.unknown(),
    riskLevel: z.unknown(),
    category: z.unknown(),
    risk_factors: z.unknown(),
    riskFactors: z.unknown(),
    factors: z.unknown(),
    risk_score: z.unknown(),
    riskScore: z.unknown()
  })
  .partial()
  .passthrough();

type AssessorPayload = z.infer<typeof AssessorPayload>;

const BULLET = /^\s*(?:[-*•]|\d+[.)](?=\s))\s*/;
const BULLET_LINE = /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/gm;
const PROFILE_IN_TEXT =
  /risk[\s_-]*(?:profile|level|category|rating)?["'\s:=-]*(low|minimal|medium|moderate|high|elevated|severe)\b/i;
const PROFILE_BEFORE_RISK = /\b(low|minimal|medium|moderate|high|elevated|severe)[\s-]+risk\b/i;
const SCORE_IN_TEXT = /risk[\s_-]*score["'\s:=]*(-?\d+(?:\.\d+)?)/i;

export function coerceRiskProfile(value: unknown): RiskProfile | undefined {
  if (typeof value !== "string") return undefined;

  const normalized = value
    .trim()
    .toLowerCase()
    .replace(/[\s_-]*risk$/, "");

  return Object.prototype.hasOwnProperty.call(PROFILE_ALIASES, normalized)
    ? PROFILE_ALIASES[normalized]
    : undefined;
}

function cleanFactor(value: string) {
  return value.replace(BULLET, "").trim().slice(0, MAX_FACTOR_LENGTH).trim();
}

export function coerceRiskFactors(value: unknown): string[] {
  let candidates: string[] = [];

  if (typeof value === "string") {
    candidates = value.split(/\r?\n|;/);
  } else if (Array.isArray(value)) {
    candidates = value.filter((item): item is string => typeof item === "string");
  }

  return candidates
    .map(cleanFactor)
    .filter((factor) => factor.length > 0)
    .slice(0, MAX_RISK_FACTORS);
}

export function coerceRiskScore(value: unknown): number | null {
  const score =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim() !== ""
        ? Number(value)
        : Number.NaN;

  if (!Number.isFinite(score)) return null;

  return Number(Math.min(100, Math.max(0, score)).toFixed(2));
}

/**
 * Pulls a JSON document out of model output: a fenced block first, then the
 * outermost braces.
 */
export function extractJsonPayload(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");

  const candidate = fenced
    ? fenced[1].trim()
    : start >= 0 && end > start
      ? text.slice(start, end + 1)
      : text.trim();

  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

function fromPayload(payload: AssessorPayload): RiskAssessment {
  const profile = [
    payload.risk_profile,
    payload.riskProfile,
    payload.risk_level,
    payload.riskLevel,
    payload.category
  ]
    .map(coerceRiskProfile)
    .find((candidate) => candidate !== undefined);

  return {
    riskProfile: profile ?? DEFAULT_RISK_PROFILE,
    riskFactors: coerceRiskFactors(
      payload.risk_factors ?? payload.riskFactors ?? payload.factors
    ),
    riskScore: coerceRiskScore(payload.risk_score ?? payload.riskScore)
  };
}

function fromText(text: string): RiskAssessment {
  const profileMatch = text.match(PROFILE_IN_TEXT) ?? text.match(PROFILE_BEFORE_RISK);
  const scoreMatch = text.match(SCORE_IN_TEXT);
  const bullets = Array.from(text.matchAll(BULLET_LINE), (match) => match[1]);

  return {
    riskProfile: coerceRiskProfile(profileMatch?.[1]) ?? DEFAULT_RISK_PROFILE,
    riskFactors: coerceRiskFactors(bullets),
    riskScore: coerceRiskScore(scoreMatch?.[1])
  };
}

/**
 * Turns whatever the risk assessor produced into a bounded RiskAssessment.
 * A bare category word ("High", "\"low\"") is read as the profile itself.
 * Never throws: anything unreadable becomes a medium profile with no factors.
 */
export function normalizeRisk(raw: unknown): RiskAssessment {
  if (typeof raw === "string") {
    const extracted = extractJsonPayload(raw);
    const bare = coerceRiskProfile(raw) ?? coerceRiskProfile(extracted);
    if (bare) {
      return { riskProfile: bare, riskFactors: [], riskScore: null };
    }

    const payload = AssessorPayload.safeParse(extracted);
    return payload.success ? fromPayload(payload.data) : fromText(raw);
  }

  const payload = AssessorPayload.safeParse(raw);
  if (payload.success) {
    return fromPayload(payload.data);
  }

  return {
    riskProfile: DEFAULT_RISK_PROFILE,
    riskFactors: [],
    riskScore: null
  };
}
