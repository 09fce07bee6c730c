import { ApplicationSchema, formatIssues } from "./application.schema";
import { assembleQuote } from "./quote.assembler";
import { computePremiumBreakdown } from "./premium.service";
import { normalizeRisk } from "./risk.normalizer";
import { buildExplanation, determineConditions } from "./underwriting.service";
import { writeQuoteReport } from "../services/reportService";
import { AssessorError, type RiskAssessor } from "../services/riskAssessor";
import type { ApplicationRecord, UnderwritingDecision } from "./types";

export interface UnderwritingDeps {
  assessor: RiskAssessor;
  /** When set, a PDF report is written here for every quote. */
  reportsDir?: string;
  /** Reference date for the claims lookback window. */
  asOf?: Date;
}

export type BatchItemResult =
  | { index: number; ok: true; decision: UnderwritingDecision }
  | { index: number; ok: false; error: string };

export async function underwriteApplication(
  application: ApplicationRecord,
  deps: UnderwritingDeps
): Promise<UnderwritingDecision> {
  let raw: unknown;
  try {
    raw = await deps.assessor.assess(application);
  } catch (err) {
    if (err instanceof AssessorError) throw err;
    throw new AssessorError("Risk assessment failed", { cause: err });
  }

  const assessment = normalizeRisk(raw);
  const breakdown = computePremiumBreakdown(application, assessment.riskProfile, {
    asOf: deps.asOf
  });
  const quote = assembleQuote(application, assessment, breakdown.premium);

  const decision: UnderwritingDecision = {
    ...quote,
    conditions: determineConditions(application, assessment.riskProfile),
    breakdown,
    explanation: buildExplanation(application, assessment, breakdown)
  };

  if (!deps.reportsDir) {
    return decision;
  }

  const reportPath = await writeQuoteReport(deps.reportsDir, application, decision);
  return { ...decision, reportPath };
}

function describeError(err: unknown) {
  if (err instanceof Error) return err.message;
  return "Unknown error";
}

/**
 * Underwrites each entry independently. Invalid entries and assessor failures
 * are reported per item; results keep input order.
 */
export async function underwriteBatch(
  entries: readonly unknown[],
  deps: UnderwritingDeps
): Promise<BatchItemResult[]> {
  const settled = await Promise.allSettled(
    entries.map(async (entry) => {
      const parsed = ApplicationSchema.safeParse(entry);
      if (!parsed.success) {
        throw new Error(formatIssues(parsed.error));
      }
      return underwriteApplication(parsed.data, deps);
    })
  );

  return settled.map((result, index): BatchItemResult =>
    result.status === "fulfilled"
      ? { index, ok: true, decision: result.value }
      : { index, ok: false, error: describeError(result.reason) }
  );
}
